/**
 * src/entities/sendResponse.ts
 * Low-level HTTP/1.1 response framing on a raw socket.
 */
import { Socket } from 'net';
import logger from '../utils/logger';
import { errorMessage } from './errors';

export const STATUS_TEXT: Record<number, string> = {
  200: 'OK',
  201: 'Created',
  202: 'Accepted',
  204: 'No Content',
  206: 'Partial Content',
  301: 'Moved Permanently',
  302: 'Found',
  304: 'Not Modified',
  400: 'Bad Request',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not Found',
  405: 'Method Not Allowed',
  408: 'Request Timeout',
  409: 'Conflict',
  413: 'Payload Too Large',
  415: 'Unsupported Media Type',
  416: 'Range Not Satisfiable',
  429: 'Too Many Requests',
  500: 'Internal Server Error',
  502: 'Bad Gateway',
  503: 'Service Unavailable',
};

export interface ChunkedResponseOptions {
  status: number;
  headers: Record<string, string>;
}

export interface ChunkedResponse {
  /** False once the socket is gone; otherwise the result of `socket.write`. */
  sendChunk(data: Buffer | string): boolean;
  endResponse(): void;
}

function hasHeader(headers: Record<string, string>, name: string): boolean {
  const wanted = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === wanted);
}

function wantsClose(headers: Record<string, string>): boolean {
  return Object.entries(headers).some(
    ([key, value]) => key.toLowerCase() === 'connection' && value.toLowerCase() === 'close',
  );
}

/** Status line plus header block, terminated by the blank line. */
export function formatHead(status: number, headers: Record<string, string>): string {
  const headerLines = Object.entries(headers)
    .map(([k, v]) => `${k}: ${v}`)
    .join('\r\n');
  const separator = headerLines ? '\r\n' : '';
  return `HTTP/1.1 ${status} ${STATUS_TEXT[status] ?? 'Status'}\r\n${headerLines}${separator}\r\n`;
}

/**
 * Writes a complete response with a fixed-length body. Content-Length is
 * filled in when the caller did not set one.
 */
export function sendResponse(
  socket: Socket,
  status: number,
  initialHeaders: Record<string, string>,
  body?: string | Buffer,
): void {
  if (socket.destroyed) {
    logger.debug('[sendResponse] Attempted to write to destroyed socket', { status });
    return;
  }

  try {
    const finalHeaders = { ...initialHeaders };
    if (!hasHeader(finalHeaders, 'content-length') && !hasHeader(finalHeaders, 'transfer-encoding')) {
      finalHeaders['Content-Length'] = String(body ? Buffer.byteLength(body) : 0);
    }
    if (body && body.length > 0 && !hasHeader(finalHeaders, 'content-type')) {
      logger.warn('[sendResponse] Content-Type not set, defaulting to application/octet-stream', {
        status,
      });
      finalHeaders['Content-Type'] = 'application/octet-stream';
    }
    const shouldClose = wantsClose(finalHeaders);

    socket.write(formatHead(status, finalHeaders));
    if (!body || body.length === 0) {
      if (shouldClose) socket.end();
      return;
    }

    socket.write(body, (err?: Error | null) => {
      if (err) {
        logger.error('[sendResponse] Error writing body', { error: err.message, status });
        if (!socket.destroyed) socket.destroy(err);
        return;
      }
      if (shouldClose && !socket.destroyed) socket.end();
    });
  } catch (err) {
    logger.error('[sendResponse] General error during response sending', {
      error: errorMessage(err),
      status,
      socketDestroyed: socket.destroyed,
    });
    if (!socket.destroyed) socket.destroy();
  }
}

/**
 * Begins a `Transfer-Encoding: chunked` response; the caller streams chunks
 * and finishes with `endResponse()`.
 */
export function beginChunkedResponse(socket: Socket, options: ChunkedResponseOptions): ChunkedResponse {
  if (socket.destroyed) {
    logger.debug('[beginChunkedResponse] Attempted to use destroyed socket', {
      status: options.status,
    });
    return { sendChunk: () => false, endResponse: () => undefined };
  }

  const finalHeaders: Record<string, string> = {
    ...options.headers,
    'Transfer-Encoding': 'chunked',
  };
  const shouldClose = wantsClose(finalHeaders);
  socket.write(formatHead(options.status, finalHeaders));

  return {
    sendChunk: (data) => {
      if (socket.destroyed) return false;
      const length = Buffer.byteLength(data);
      if (length === 0) return true;
      socket.write(`${length.toString(16)}\r\n`);
      socket.write(data);
      return socket.write('\r\n');
    },
    endResponse: () => {
      if (socket.destroyed) {
        logger.warn('[beginChunkedResponse] Attempted to end response on destroyed socket');
        return;
      }
      socket.write('0\r\n\r\n');
      if (shouldClose) socket.end();
    },
  };
}
