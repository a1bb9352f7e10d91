/**
 * Response Writer
 *
 * Serializes whatever a handler returned onto the socket:
 * - an ActionResult is unwrapped to its status and payload;
 * - raw content and buffers are written verbatim with their content type;
 * - files are sent as attachments, streams are copied in bounded chunks;
 * - strings become text/plain, everything else camelCase JSON.
 *
 * Every response gets the CORS and security defaults unless the handler (or
 * the payload) already set a header of that name.
 *
 * @module core/responseWriter
 */
import { Socket } from 'net';
import { Readable } from 'stream';
import { CorsSettings } from '../config/server.config';
import { ActionResult, isActionResult } from '../entities/actionResult';
import { errorMessage } from '../entities/errors';
import { beginChunkedResponse, formatHead, sendResponse } from '../entities/sendResponse';
import { Logger } from '../utils/logger';
import { corsHeaders } from './middlewares/cors';
import { appendMissingHeaders, securityHeaders } from './middlewares/securityHeaders';

/** Largest slice written to the socket at once when copying a stream. */
export const STREAM_COPY_CHUNK_BYTES = 81920;

export const JSON_CONTENT_TYPE = 'application/json; charset=utf-8';
const TEXT_CONTENT_TYPE = 'text/plain; charset=utf-8';
const BINARY_CONTENT_TYPE = 'application/octet-stream';

export interface ResponseWriterOptions {
  cors: CorsSettings;
  securityHeadersEnabled: boolean;
}

export interface ResponseTarget {
  socket: Socket;
  path: string;
  requestId: string;
  keepAlive: boolean;
  logger: Logger;
  /** Set by the handler through its context; wins over every default. */
  headers?: Record<string, string>;
}

type Payload =
  | { type: 'empty' }
  | { type: 'bytes'; body: Buffer; contentType: string; disposition?: string }
  | {
      type: 'stream';
      stream: Readable;
      contentType: string;
      disposition?: string;
      length?: number;
    };

function isUpper(char: string): boolean {
  return char !== char.toLowerCase();
}

/** `UserName` → `userName`, `IPAddress` → `ipAddress`, `ID` → `id` */
export function toCamelCase(key: string): string {
  if (key === '' || !isUpper(key[0])) return key;
  const chars = [...key];
  for (let i = 0; i < chars.length; i++) {
    if (i === 1 && !isUpper(chars[i])) break;
    const hasNext = i + 1 < chars.length;
    if (i > 0 && hasNext && !isUpper(chars[i + 1])) break;
    chars[i] = chars[i].toLowerCase();
  }
  return chars.join('');
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function camelizeKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(camelizeKeys);
  if (!isPlainObject(value)) return value;
  return Object.fromEntries(
    Object.entries(value).map(([key, inner]) => [toCamelCase(key), camelizeKeys(inner)]),
  );
}

export function toJson(value: unknown): string {
  return JSON.stringify(camelizeKeys(value));
}

export function contentDisposition(type: 'inline' | 'attachment', fileName?: string): string {
  if (!fileName) return type;
  const ascii = fileName.replace(/[^\x20-\x7e]/g, '_').replace(/(["\\])/g, '\\$1');
  const header = `${type}; filename="${ascii}"`;
  return ascii === fileName ? header : `${header}; filename*=UTF-8''${encodeURIComponent(fileName)}`;
}

function payloadOf(value: unknown): Payload {
  if (value === undefined || value === null) return { type: 'empty' };
  if (value instanceof Readable) return { type: 'stream', stream: value, contentType: BINARY_CONTENT_TYPE };
  if (Buffer.isBuffer(value)) return { type: 'bytes', body: value, contentType: BINARY_CONTENT_TYPE };
  if (typeof value === 'string') {
    return { type: 'bytes', body: Buffer.from(value, 'utf8'), contentType: TEXT_CONTENT_TYPE };
  }
  return { type: 'bytes', body: Buffer.from(toJson(value), 'utf8'), contentType: JSON_CONTENT_TYPE };
}

function unwrap(result: ActionResult): { status: number; payload: Payload } {
  switch (result.kind) {
    case 'status':
      return { status: result.status, payload: { type: 'empty' } };
    case 'value':
      return { status: result.status, payload: payloadOf(result.value) };
    case 'content': {
      const body =
        typeof result.content === 'string'
          ? Buffer.from(result.content, result.encoding ?? 'utf8')
          : result.content;
      return { status: result.status, payload: { type: 'bytes', body, contentType: result.contentType } };
    }
    case 'file':
      return {
        status: result.status,
        payload: {
          type: 'bytes',
          body: result.data,
          contentType: result.contentType,
          disposition: contentDisposition('attachment', result.fileName),
        },
      };
    case 'stream':
      return {
        status: result.status,
        payload: {
          type: 'stream',
          stream: result.stream,
          contentType: result.contentType,
          disposition: result.disposition
            ? contentDisposition(result.disposition, result.fileName)
            : undefined,
          length: result.length,
        },
      };
  }
}

function waitForDrain(socket: Socket): Promise<void> {
  return new Promise((resolve) => {
    const done = (): void => {
      socket.off('drain', done);
      socket.off('close', done);
      resolve();
    };
    socket.on('drain', done);
    socket.on('close', done);
  });
}

async function* slices(stream: Readable): AsyncGenerator<Buffer> {
  for await (const chunk of stream) {
    const data: Buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    for (let offset = 0; offset < data.length; offset += STREAM_COPY_CHUNK_BYTES) {
      yield data.subarray(offset, offset + STREAM_COPY_CHUNK_BYTES);
    }
  }
}

export class ResponseWriter {
  constructor(private readonly options: ResponseWriterOptions) {}

  /** Handler headers first; payload headers and defaults only fill in names that are missing. */
  buildHeaders(target: ResponseTarget, payloadHeaders: Record<string, string> = {}): Record<string, string> {
    let headers = appendMissingHeaders({ ...target.headers }, payloadHeaders);
    headers = appendMissingHeaders(headers, corsHeaders(this.options.cors));
    if (this.options.securityHeadersEnabled) {
      headers = appendMissingHeaders(headers, securityHeaders(target.path));
    }
    return appendMissingHeaders(headers, {
      'X-Request-ID': target.requestId,
      Connection: target.keepAlive ? 'keep-alive' : 'close',
    });
  }

  /**
   * Writes a handler outcome.
   * @returns the status that went on the wire (500 when writing failed before the head)
   */
  async write(target: ResponseTarget, outcome: unknown): Promise<number> {
    let status = 200;
    let payload: Payload = { type: 'empty' };
    let headSent = false;

    try {
      if (isActionResult(outcome)) {
        ({ status, payload } = unwrap(outcome));
      } else {
        payload = payloadOf(outcome);
      }

      if (payload.type === 'empty') {
        headSent = true;
        sendResponse(target.socket, status, this.buildHeaders(target));
        return status;
      }

      const payloadHeaders: Record<string, string> = { 'Content-Type': payload.contentType };
      if (payload.disposition) payloadHeaders['Content-Disposition'] = payload.disposition;

      if (payload.type === 'bytes') {
        headSent = true;
        sendResponse(target.socket, status, this.buildHeaders(target, payloadHeaders), payload.body);
        return status;
      }

      headSent = true;
      await this.copyStream(target, status, payloadHeaders, payload.stream, payload.length);
      return status;
    } catch (err) {
      target.logger.error('Failed to write response', { error: errorMessage(err), status });
      if (!headSent) {
        this.writeJson(target, 500, { error: 'Internal server error' });
        return 500;
      }
      if (!target.socket.destroyed) target.socket.destroy();
      return status;
    } finally {
      if (payload.type === 'stream' && !payload.stream.destroyed) payload.stream.destroy();
    }
  }

  /** Structured body with the default headers; used for every pipeline-generated answer. */
  writeJson(
    target: ResponseTarget,
    status: number,
    body: unknown,
    extraHeaders: Record<string, string> = {},
  ): void {
    const headers = this.buildHeaders(target, { ...extraHeaders, 'Content-Type': JSON_CONTENT_TYPE });
    sendResponse(target.socket, status, headers, toJson(body));
  }

  /** Head only; used for the preflight answer. */
  writeEmpty(target: ResponseTarget, status: number, headers: Record<string, string>): void {
    sendResponse(target.socket, status, headers);
  }

  private async copyStream(
    target: ResponseTarget,
    status: number,
    payloadHeaders: Record<string, string>,
    stream: Readable,
    length?: number,
  ): Promise<void> {
    const { socket } = target;

    if (length !== undefined) {
      const headers = this.buildHeaders(target, { ...payloadHeaders, 'Content-Length': String(length) });
      socket.write(formatHead(status, headers));
      for await (const slice of slices(stream)) {
        if (socket.destroyed) return;
        if (!socket.write(slice)) await waitForDrain(socket);
      }
      if (!target.keepAlive && !socket.destroyed) socket.end();
      return;
    }

    const response = beginChunkedResponse(socket, {
      status,
      headers: this.buildHeaders(target, payloadHeaders),
    });
    for await (const slice of slices(stream)) {
      if (socket.destroyed) return;
      if (!response.sendChunk(slice)) await waitForDrain(socket);
    }
    response.endResponse();
  }
}
