/**
 * src/entities/actionResult.ts
 * Handler outcomes. A handler may return one of these tagged results or any
 * other value, which is treated as a 200 structured response.
 */
import { Readable } from 'stream';

export type ActionResult =
  | { kind: 'status'; status: number }
  | { kind: 'value'; status: number; value: unknown }
  | { kind: 'content'; status: number; content: string | Buffer; contentType: string; encoding?: BufferEncoding }
  | { kind: 'file'; status: number; data: Buffer; contentType: string; fileName: string }
  | {
      kind: 'stream';
      status: number;
      stream: Readable;
      contentType: string;
      fileName?: string;
      /** inline or attachment; omitted for anonymous byte streams */
      disposition?: 'inline' | 'attachment';
      length?: number;
    };

const RESULT_KINDS = new Set(['status', 'value', 'content', 'file', 'stream']);

export function isActionResult(value: unknown): value is ActionResult {
  if (typeof value !== 'object' || value === null || !('kind' in value) || !('status' in value)) {
    return false;
  }
  return typeof value.kind === 'string' && RESULT_KINDS.has(value.kind) && typeof value.status === 'number';
}

export const statusCode = (status: number, value?: unknown): ActionResult =>
  value === undefined ? { kind: 'status', status } : { kind: 'value', status, value };

export const ok = (value?: unknown): ActionResult => statusCode(200, value);
export const created = (value?: unknown): ActionResult => statusCode(201, value);
export const noContent = (): ActionResult => ({ kind: 'status', status: 204 });
export const badRequest = (value?: unknown): ActionResult => statusCode(400, value);
export const unauthorized = (value?: unknown): ActionResult => statusCode(401, value);
export const forbidden = (value?: unknown): ActionResult => statusCode(403, value);
export const notFound = (value?: unknown): ActionResult => statusCode(404, value);

export function content(
  body: string | Buffer,
  contentType = 'text/plain; charset=utf-8',
  status = 200,
): ActionResult {
  return { kind: 'content', status, content: body, contentType };
}

export function file(data: Buffer, contentType: string, fileName: string): ActionResult {
  return { kind: 'file', status: 200, data, contentType, fileName };
}

export function streamFile(
  stream: Readable,
  contentType: string,
  options: { fileName?: string; inline?: boolean; length?: number } = {},
): ActionResult {
  return {
    kind: 'stream',
    status: 200,
    stream,
    contentType,
    fileName: options.fileName,
    disposition: options.inline ? 'inline' : 'attachment',
    length: options.length,
  };
}
