import { Socket } from 'net';
import { IncomingRequest } from '../../src/entities/http';
import { HttpRequestParser } from '../../src/core/httpParser';

/**
 * Unconnected socket that records everything written to it.
 */
export class FakeSocket extends Socket {
  readonly chunks: Buffer[] = [];
  ended = false;

  constructor(remoteAddress = '127.0.0.1') {
    super();
    Object.defineProperty(this, 'remoteAddress', { value: remoteAddress });
  }

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(Buffer.from(chunk));
    callback();
  }

  _writev(
    chunks: Array<{ chunk: Buffer; encoding: BufferEncoding }>,
    callback: (error?: Error | null) => void,
  ): void {
    for (const entry of chunks) this.chunks.push(Buffer.from(entry.chunk));
    callback();
  }

  _final(callback: (error?: Error | null) => void): void {
    this.ended = true;
    callback();
  }

  get written(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }
}

export interface ParsedResponse {
  status: number;
  statusText: string;
  /** lowercased names */
  headers: Record<string, string>;
  /** header names in the order they were written */
  headerOrder: string[];
  body: string;
}

function decodeChunked(text: string): { body: string; rest: string } {
  let body = '';
  let rest = text;
  for (;;) {
    const lineEnd = rest.indexOf('\r\n');
    const size = parseInt(rest.slice(0, lineEnd), 16);
    rest = rest.slice(lineEnd + 2);
    if (size === 0) return { body, rest: rest.slice(2) };
    body += rest.slice(0, size);
    rest = rest.slice(size + 2);
  }
}

/** Splits raw socket output into responses. Bodies must be ASCII. */
export function parseResponses(raw: string): ParsedResponse[] {
  const responses: ParsedResponse[] = [];
  let rest = raw;
  while (rest.length > 0) {
    const headEnd = rest.indexOf('\r\n\r\n');
    if (headEnd === -1) throw new Error(`Incomplete response head: ${rest}`);
    const [statusLine, ...lines] = rest.slice(0, headEnd).split('\r\n');
    rest = rest.slice(headEnd + 4);
    const match = /^HTTP\/1\.1 (\d{3}) (.*)$/.exec(statusLine);
    if (!match) throw new Error(`Bad status line: ${statusLine}`);

    const headers: Record<string, string> = {};
    const headerOrder: string[] = [];
    for (const line of lines) {
      const colon = line.indexOf(':');
      const name = line.slice(0, colon);
      headers[name.toLowerCase()] = line.slice(colon + 1).trim();
      headerOrder.push(name);
    }

    let body = '';
    if (headers['transfer-encoding'] === 'chunked') {
      ({ body, rest } = decodeChunked(rest));
    } else {
      const length = parseInt(headers['content-length'] ?? '0', 10);
      body = rest.slice(0, length);
      rest = rest.slice(length);
    }
    responses.push({ status: Number(match[1]), statusText: match[2], headers, headerOrder, body });
  }
  return responses;
}

export function parseResponse(raw: string): ParsedResponse {
  const [first] = parseResponses(raw);
  if (!first) throw new Error('No response was written');
  return first;
}

/** Parses one raw request with a generous body limit. */
export function buildRequest(raw: string, maxBodyBytes = 1024 * 1024): IncomingRequest {
  const req = new HttpRequestParser({ maxBodyBytes }).feed(Buffer.from(raw, 'utf8'));
  if (!req) throw new Error('Request is incomplete');
  return req;
}

/** Lets queued callbacks and socket writes settle. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/** Serialises a request with Host and, when there is a body, Content-Length. */
export function rawRequest(
  method: string,
  target: string,
  headers: Record<string, string> = {},
  body = '',
): string {
  const lines = [`${method} ${target} HTTP/1.1`, 'Host: localhost'];
  for (const [name, value] of Object.entries(headers)) lines.push(`${name}: ${value}`);
  if (body) lines.push(`Content-Length: ${Buffer.byteLength(body)}`);
  return `${lines.join('\r\n')}\r\n\r\n${body}`;
}

export function multipartBody(
  boundary: string,
  parts: Array<{ name: string; value: string; fileName?: string; contentType?: string }>,
): string {
  const lines: string[] = [];
  for (const part of parts) {
    lines.push(`--${boundary}`);
    const fileName = part.fileName === undefined ? '' : `; filename="${part.fileName}"`;
    lines.push(`Content-Disposition: form-data; name="${part.name}"${fileName}`);
    if (part.contentType) lines.push(`Content-Type: ${part.contentType}`);
    lines.push('', part.value);
  }
  lines.push(`--${boundary}--`, '');
  return lines.join('\r\n');
}
