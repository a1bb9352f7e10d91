/**
 * src/entities/http.ts
 * Interface definitions for parsed HTTP requests.
 */

export interface IncomingRequest {
  url: URL; // canonical URL (always present)
  path: string; // == url.pathname
  query: Record<string, string>; // decoded, last value wins
  httpVersion: string; // e.g. "HTTP/1.1"

  method: string;
  headers: Record<string, string>; // lowercase names, last value wins
  headersMap: Map<string, string[]>;
  body?: Buffer;

  /**
   * Set when the body was larger than the configured limit. The body itself is
   * discarded; the dispatcher answers 413 and the connection is closed.
   */
  bodyTooLarge?: { receivedBytes: number };

  invalid?: boolean;
  /** Parser diagnostic for invalid requests. */
  error?: string;
}

/**
 * An authenticated principal as returned by the token verifier.
 */
export interface AuthenticatedUser {
  name: string;
  roles: string[];
  claims: Record<string, unknown>;
}
