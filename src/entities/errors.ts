/**
 * src/entities/errors.ts
 * Error taxonomy used by the dispatch pipeline. Each class carries the HTTP
 * status it maps to; anything that is not an HttpError is an unhandled fault (500).
 */

export abstract class HttpError extends Error {
  abstract readonly status: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Malformed or invalid client-supplied data: bad JSON, failed conversion,
 * missing required header or body, malformed multipart.
 */
export class ClientInputError extends HttpError {
  readonly status: number = 400;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
