/**
 * Multipart Decoder
 *
 * Splits a multipart/form-data body into named fields. Parts are located by
 * searching the raw bytes for the boundary delimiter, so binary file payloads
 * are never decoded as text.
 *
 * @module core/multipartParser
 */
import { ClientInputError } from '../entities/errors';
import { FormField, FormFieldCollection } from '../entities/formFile';

const LF = 0x0a;
const CR = 0x0d;
const DASH = 0x2d;
const CRLF_CRLF = Buffer.from('\r\n\r\n');
const LF_LF = Buffer.from('\n\n');

/**
 * Extracts the boundary token from a Content-Type header value.
 * Accepts `boundary="quoted"` and bare tokens; attributes after `;` are ignored.
 */
export function extractBoundary(contentType: string): string {
  const match = /boundary\s*=\s*(?:"([^"]+)"|([^\s;]+))/i.exec(contentType);
  const token = (match?.[1] ?? match?.[2] ?? '').replace(/^"+|"+$/g, '');
  if (!token) {
    throw new ClientInputError('Invalid multipart request: boundary not found in Content-Type');
  }
  return token;
}

// A delimiter only counts at the start of the body or directly after a line break.
function findDelimiter(body: Buffer, delimiter: Buffer, from: number): number {
  let idx = body.indexOf(delimiter, from);
  while (idx > 0 && body[idx - 1] !== LF) {
    idx = body.indexOf(delimiter, idx + 1);
  }
  return idx;
}

function trimTrailingLineBreak(part: Buffer): Buffer {
  const len = part.length;
  if (len >= 2 && part[len - 2] === CR && part[len - 1] === LF) return part.subarray(0, len - 2);
  if (len >= 1 && part[len - 1] === LF) return part.subarray(0, len - 1);
  return part;
}

function dispositionParam(disposition: string, param: string): string | undefined {
  const pattern = new RegExp(`(?:^|;)\\s*${param}\\s*=\\s*(?:"([^"]*)"|([^;\\s]*))`, 'i');
  const match = pattern.exec(disposition);
  if (!match) return undefined;
  return match[1] ?? match[2];
}

function parsePart(part: Buffer): FormField | undefined {
  const crlfEnd = part.indexOf(CRLF_CRLF);
  const lfEnd = part.indexOf(LF_LF);
  let headerEnd: number;
  let separatorLength: number;
  if (crlfEnd !== -1 && (lfEnd === -1 || crlfEnd <= lfEnd)) {
    headerEnd = crlfEnd;
    separatorLength = CRLF_CRLF.length;
  } else if (lfEnd !== -1) {
    headerEnd = lfEnd;
    separatorLength = LF_LF.length;
  } else {
    return undefined;
  }

  let name: string | undefined;
  let fileName: string | undefined;
  let contentType: string | undefined;
  for (const line of part.subarray(0, headerEnd).toString('utf8').split(/\r?\n/)) {
    const colon = line.indexOf(':');
    if (colon === -1) continue;
    const header = line.slice(0, colon).trim().toLowerCase();
    const value = line.slice(colon + 1).trim();
    if (header === 'content-disposition') {
      name = dispositionParam(value, 'name');
      fileName = dispositionParam(value, 'filename') || undefined;
    } else if (header === 'content-type') {
      contentType = value;
    }
  }
  if (!name) return undefined;

  const payload = part.subarray(headerEnd + separatorLength);
  if (fileName !== undefined) {
    return { name, value: '', fileName, contentType, data: Buffer.from(payload), isFile: true };
  }
  return { name, value: payload.toString('utf8'), contentType, isFile: false };
}

/**
 * Parses a multipart/form-data body.
 *
 * @throws ClientInputError when the boundary is missing or a part is never closed
 */
export function parseMultipart(body: Buffer, contentType: string): FormFieldCollection {
  const delimiter = Buffer.from(`--${extractBoundary(contentType)}`);
  const fields = new FormFieldCollection();

  let cursor = findDelimiter(body, delimiter, 0);
  while (cursor !== -1) {
    const afterDelimiter = cursor + delimiter.length;
    if (body[afterDelimiter] === DASH && body[afterDelimiter + 1] === DASH) break;

    const lineEnd = body.indexOf(LF, afterDelimiter);
    if (lineEnd === -1) break;
    const partStart = lineEnd + 1;

    const next = findDelimiter(body, delimiter, partStart);
    if (next === -1) {
      throw new ClientInputError('Invalid multipart request: missing closing boundary');
    }
    const field = parsePart(trimTrailingLineBreak(body.subarray(partStart, next)));
    if (field) fields.set(field);
    cursor = next;
  }
  return fields;
}
