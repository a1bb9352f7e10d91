/**
 * Upload checks applied to file parameters before a handler sees them.
 */
import { FormFile } from '../entities/formFile';

export interface FileValidationOptions {
  maxFileSizeBytes?: number;
  /** Lowercase extensions including the dot. Empty means any extension not prohibited. */
  allowedExtensions?: string[];
  allowedMimeTypes?: string[];
  prohibitedExtensions?: string[];
  rejectExecutables?: boolean;
  /** Compare magic bytes with the extension for the formats we know. */
  checkSignatures?: boolean;
}

export interface FileValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export const DEFAULT_PROHIBITED_EXTENSIONS = ['.exe', '.bat', '.cmd', '.com', '.pif', '.scr', '.vbs', '.js'];
const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;

const EXECUTABLE_SIGNATURES: Buffer[] = [
  Buffer.from([0x4d, 0x5a]), // MZ (PE)
  Buffer.from([0x7f, 0x45, 0x4c, 0x46]), // ELF
];

const KNOWN_SIGNATURES: Record<string, Buffer> = {
  '.pdf': Buffer.from('%PDF'),
  '.jpg': Buffer.from([0xff, 0xd8, 0xff]),
  '.jpeg': Buffer.from([0xff, 0xd8, 0xff]),
  '.png': Buffer.from([0x89, 0x50, 0x4e, 0x47]),
  '.gif': Buffer.from('GIF8'),
};

function startsWith(data: Buffer, signature: Buffer): boolean {
  return data.length >= signature.length && data.subarray(0, signature.length).equals(signature);
}

function formatMb(bytes: number): string {
  return (bytes / (1024 * 1024)).toFixed(2).replace(/\.?0+$/, '');
}

export function validateFile(file: FormFile, options: FileValidationOptions = {}): FileValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const maxSize = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
  const prohibited = options.prohibitedExtensions ?? DEFAULT_PROHIBITED_EXTENSIONS;
  const extension = file.extension;

  if (file.length === 0) {
    errors.push('File is empty');
  } else if (file.length > maxSize) {
    errors.push(`File size exceeds maximum allowed size of ${formatMb(maxSize)} MB`);
  }

  if (prohibited.includes(extension)) {
    errors.push(`File type '${extension}' is not allowed`);
  } else if (options.allowedExtensions?.length && !options.allowedExtensions.includes(extension)) {
    errors.push(
      `File extension '${extension || '(none)'}' is not allowed. Allowed: ${options.allowedExtensions.join(', ')}`,
    );
  }

  const mime = file.contentType.split(';')[0].trim().toLowerCase();
  if (options.allowedMimeTypes?.length && !options.allowedMimeTypes.includes(mime)) {
    errors.push(`Content type '${mime}' is not allowed`);
  }

  const head = file.peek(8);
  if ((options.rejectExecutables ?? true) && EXECUTABLE_SIGNATURES.some((sig) => startsWith(head, sig))) {
    errors.push('File appears to be an executable and is not allowed');
  }
  const expected = KNOWN_SIGNATURES[extension];
  if (options.checkSignatures && expected && !startsWith(head, expected)) {
    warnings.push(`File content does not match its '${extension}' extension`);
  }

  return { valid: errors.length === 0, errors, warnings };
}
