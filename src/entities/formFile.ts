/**
 * src/entities/formFile.ts
 * Decoded form fields and the file handle exposed to upload handlers.
 */
import path from 'path';

export const DEFAULT_FILE_CONTENT_TYPE = 'application/octet-stream';

export interface FormField {
  name: string;
  /** UTF-8 text for plain fields, empty for files. */
  value: string;
  fileName?: string;
  contentType?: string;
  data?: Buffer;
  isFile: boolean;
}

/** Case-insensitive name → field map; later duplicates replace earlier ones. */
export class FormFieldCollection {
  private readonly fields = new Map<string, FormField>();

  set(field: FormField): void {
    this.fields.set(field.name.toLowerCase(), field);
  }

  get(name: string): FormField | undefined {
    return this.fields.get(name.toLowerCase());
  }

  has(name: string): boolean {
    return this.fields.has(name.toLowerCase());
  }

  get size(): number {
    return this.fields.size;
  }
}

/**
 * Read-only handle over an uploaded file.
 */
export class FormFile {
  readonly contentType: string;

  constructor(
    private readonly data: Buffer,
    readonly name: string,
    readonly fileName: string,
    contentType?: string,
  ) {
    this.contentType = contentType || DEFAULT_FILE_CONTENT_TYPE;
  }

  static fromField(field: FormField): FormFile {
    return new FormFile(field.data ?? Buffer.alloc(0), field.name, field.fileName ?? '', field.contentType);
  }

  get length(): number {
    return this.data.length;
  }

  /** Lowercased extension including the dot, or '' */
  get extension(): string {
    return path.extname(this.fileName).toLowerCase();
  }

  /** First `count` bytes, without copying the payload. */
  peek(count: number): Buffer {
    return this.data.subarray(0, count);
  }

  toBuffer(): Buffer {
    return Buffer.from(this.data);
  }
}
