import { IncomingRequest } from '../entities/http';
import { URL } from 'url';
import logger from '../utils/logger';
import { errorMessage } from '../entities/errors';

enum ParserState {
  REQUEST_LINE,
  HEADERS,
  BODY,
  CHUNK_SIZE,
  CHUNK_BODY,
  CHUNK_TRAILER,
  DONE,
  DISCARD,
  ERROR,
}

const ALLOWED_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'HEAD', 'OPTIONS'];
export const MAX_HEADER_BYTES = 8192; // 8KB
const MAX_HEADERS = 100;
const CRLF = Buffer.from('\r\n');

export interface HttpRequestParserOptions {
  maxBodyBytes: number;
}

/**
 * Incremental HTTP/1.1 request parser. Feed it socket chunks; it returns a
 * request once one is complete and keeps any pipelined remainder buffered.
 *
 * A body larger than `maxBodyBytes` (declared or, for chunked bodies, seen so
 * far) is not buffered: the parser returns the request flagged `bodyTooLarge`
 * and swallows everything after it, since the connection is closed after the
 * 413 answer.
 */
export class HttpRequestParser {
  protected buffer: Buffer = Buffer.alloc(0);
  private state = ParserState.REQUEST_LINE;
  private headers: Record<string, string> = {};
  private headersMap = new Map<string, string[]>();
  private bodyChunks: Buffer[] = [];
  private bodyBytes = 0;
  private method = '';
  private httpVersion = '';
  private url = new URL('http://placeholder');
  private remainingBody = 0;
  private lastHeaderKey: string | null = null;
  private errorText = '';
  private readonly maxBodyBytes: number;

  constructor(options: HttpRequestParserOptions) {
    this.maxBodyBytes = options.maxBodyBytes;
  }

  /**
   * Returns the number of pending bytes in the parser buffer.
   */
  public getPendingBytes(): number {
    return this.buffer.length;
  }

  feed(data: Buffer): IncomingRequest | null {
    if (this.state === ParserState.DISCARD) return null;
    this.buffer = this.buffer.length ? Buffer.concat([this.buffer, data]) : data;
    try {
      for (;;) {
        // REQUEST_LINE
        if (this.state === ParserState.REQUEST_LINE) {
          const idx = this.buffer.indexOf('\r\n');
          if (idx === -1) {
            if (this.buffer.length > MAX_HEADER_BYTES) {
              this._setError('Request line too long');
              continue;
            }
            return null;
          }
          const requestLine = this.buffer.subarray(0, idx).toString('utf8');
          this.buffer = this.buffer.subarray(idx + 2);
          if (requestLine === '') continue; // stray CRLF between pipelined requests
          const parts = requestLine.split(' ');
          if (parts.length !== 3) {
            this._setError('Invalid request line: ' + requestLine);
            continue;
          }
          const [method, reqPath, version] = parts;
          if (!ALLOWED_METHODS.includes(method)) {
            this._setError('Unsupported method: ' + method);
            continue;
          }
          if (!version.startsWith('HTTP/')) {
            this._setError('Invalid HTTP version: ' + version);
            continue;
          }
          try {
            this.url = new URL(reqPath, 'http://placeholder');
          } catch {
            this._setError('Malformed URL: ' + reqPath);
            continue;
          }
          this.method = method;
          this.httpVersion = version;
          this.state = ParserState.HEADERS;
        }

        // HEADERS
        if (this.state === ParserState.HEADERS) {
          let headersRaw = '';
          if (this.buffer.subarray(0, 2).equals(CRLF)) {
            // immediate blank line → zero headers
            this.buffer = this.buffer.subarray(2);
          } else {
            const idx = this.buffer.indexOf('\r\n\r\n');
            if (idx === -1) {
              if (this.buffer.length > MAX_HEADER_BYTES) {
                this._setError('Headers too large');
                continue;
              }
              return null;
            }
            if (idx > MAX_HEADER_BYTES) {
              this._setError('Headers too large');
              continue;
            }
            headersRaw = this.buffer.subarray(0, idx).toString('utf8');
            this.buffer = this.buffer.subarray(idx + 4);
          }

          if (!this.readHeaderBlock(headersRaw)) continue;

          // enforce Host header for HTTP/1.1
          if (this.httpVersion === 'HTTP/1.1' && !this.headers['host']) {
            this._setError('Missing Host header');
            continue;
          }

          const transferEncoding = this.headers['transfer-encoding']?.toLowerCase();
          if (transferEncoding === 'chunked') {
            this.state = ParserState.CHUNK_SIZE;
          } else if (this.headers['content-length'] !== undefined) {
            const declared = this.headers['content-length'].trim();
            const contentLength = /^\d+$/.test(declared) ? parseInt(declared, 10) : NaN;
            if (Number.isNaN(contentLength)) {
              this._setError('Invalid Content-Length');
              continue;
            }
            if (contentLength > this.maxBodyBytes) {
              return this._tooLarge(contentLength);
            }
            this.remainingBody = contentLength;
            this.state = contentLength > 0 ? ParserState.BODY : ParserState.DONE;
          } else {
            this.state = ParserState.DONE;
          }
        }

        // BODY
        if (this.state === ParserState.BODY) {
          if (this.buffer.length < this.remainingBody) return null;
          this.pushBody(this.buffer.subarray(0, this.remainingBody));
          this.buffer = this.buffer.subarray(this.remainingBody);
          this.remainingBody = 0;
          this.state = ParserState.DONE;
        }

        // CHUNK_SIZE
        if (this.state === ParserState.CHUNK_SIZE) {
          const idx = this.buffer.indexOf('\r\n');
          if (idx === -1) return null;
          const line = this.buffer.subarray(0, idx).toString('utf8');
          this.buffer = this.buffer.subarray(idx + 2);
          // chunk extensions after ';' are ignored
          const sizeText = line.split(';')[0].trim();
          const chunkSize = /^[0-9a-f]+$/i.test(sizeText) ? parseInt(sizeText, 16) : NaN;
          if (Number.isNaN(chunkSize)) {
            this._setError('Invalid chunk size: ' + line);
            continue;
          }
          if (this.bodyBytes + chunkSize > this.maxBodyBytes) {
            return this._tooLarge(this.bodyBytes + chunkSize);
          }
          if (chunkSize === 0) {
            this.state = ParserState.CHUNK_TRAILER;
          } else {
            this.remainingBody = chunkSize;
            this.state = ParserState.CHUNK_BODY;
          }
        }

        // CHUNK_BODY
        if (this.state === ParserState.CHUNK_BODY) {
          if (this.buffer.length < this.remainingBody + 2) return null;
          this.pushBody(this.buffer.subarray(0, this.remainingBody));
          this.buffer = this.buffer.subarray(this.remainingBody);
          this.remainingBody = 0;
          if (!this.buffer.subarray(0, 2).equals(CRLF)) {
            this._setError('Missing CRLF after chunk');
            continue;
          }
          this.buffer = this.buffer.subarray(2);
          this.state = ParserState.CHUNK_SIZE;
          continue;
        }

        // CHUNK_TRAILER
        if (this.state === ParserState.CHUNK_TRAILER) {
          if (this.buffer.subarray(0, 2).equals(CRLF)) {
            this.buffer = this.buffer.subarray(2);
          } else {
            const idx = this.buffer.indexOf('\r\n\r\n');
            if (idx === -1) return null;
            this.buffer = this.buffer.subarray(idx + 4);
          }
          this.state = ParserState.DONE;
        }

        // DONE
        if (this.state === ParserState.DONE) {
          const request = this.buildRequest();
          this.resetMessage();
          return request;
        }

        // ERROR
        if (this.state === ParserState.ERROR) {
          const errReq = this._errorResponse();
          this.reset();
          return errReq;
        }
      }
    } catch (err) {
      this._setError(`Error during parsing: ${errorMessage(err)}`);
      const errReq = this._errorResponse();
      this.reset();
      return errReq;
    }
  }

  /** Parses header lines; false when the block is malformed (state is then ERROR). */
  private readHeaderBlock(headersRaw: string): boolean {
    let headerCount = 0;
    for (const line of headersRaw.split('\r\n')) {
      if (line.trim() === '') continue;
      // folded continuation line (RFC 7230 §3.2.4)
      if (line.startsWith(' ') || line.startsWith('\t')) {
        if (!this.lastHeaderKey) {
          this._setError('Invalid header folding');
          return false;
        }
        const key = this.lastHeaderKey;
        const joined = `${this.headers[key]} ${line.trim()}`;
        this.headers[key] = joined;
        const values = this.headersMap.get(key) ?? [];
        values[values.length - 1] = joined;
        this.headersMap.set(key, values);
        continue;
      }
      const colon = line.indexOf(':');
      if (colon === -1) {
        this._setError('Invalid header line: ' + line);
        return false;
      }
      const key = line.slice(0, colon).trim().toLowerCase();
      const value = line.slice(colon + 1).trim();
      this.headers[key] = value;
      this.headersMap.set(key, [...(this.headersMap.get(key) ?? []), value]);
      this.lastHeaderKey = key;
      headerCount++;
      if (headerCount > MAX_HEADERS) {
        this._setError('Too many headers');
        return false;
      }
    }
    return true;
  }

  private pushBody(chunk: Buffer): void {
    this.bodyChunks.push(chunk);
    this.bodyBytes += chunk.length;
  }

  private buildRequest(): IncomingRequest {
    return {
      method: this.method,
      path: this.url.pathname,
      query: Object.fromEntries(this.url.searchParams.entries()),
      headers: this.headers,
      headersMap: this.headersMap,
      httpVersion: this.httpVersion,
      url: this.url,
      body: this.bodyChunks.length ? Buffer.concat(this.bodyChunks) : undefined,
    };
  }

  private _tooLarge(receivedBytes: number): IncomingRequest {
    logger.warn('Request body exceeds limit, discarding', {
      method: this.method,
      path: this.url.pathname,
      receivedBytes,
      maxBodyBytes: this.maxBodyBytes,
    });
    const request = { ...this.buildRequest(), body: undefined, bodyTooLarge: { receivedBytes } };
    this.resetMessage();
    this.buffer = Buffer.alloc(0);
    this.state = ParserState.DISCARD;
    return request;
  }

  private _setError(message: string): void {
    logger.error(message);
    this.errorText = message;
    this.state = ParserState.ERROR;
  }

  /** Build a minimal invalid IncomingRequest */
  private _errorResponse(): IncomingRequest {
    return {
      method: '',
      path: '',
      query: {},
      headers: {},
      headersMap: new Map(),
      httpVersion: '',
      url: new URL('http://invalid'),
      body: undefined,
      invalid: true,
      error: this.errorText,
    };
  }

  // Clears per-message state but keeps buffered bytes of the next pipelined request.
  private resetMessage(): void {
    this.state = ParserState.REQUEST_LINE;
    this.headers = {};
    this.headersMap = new Map();
    this.bodyChunks = [];
    this.bodyBytes = 0;
    this.method = '';
    this.httpVersion = '';
    this.url = new URL('http://placeholder');
    this.remainingBody = 0;
    this.lastHeaderKey = null;
    this.errorText = '';
  }

  reset(): void {
    this.resetMessage();
    this.buffer = Buffer.alloc(0);
  }
}
