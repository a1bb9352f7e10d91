import { IncomingRequest } from '../entities/http';

/**
 * Case-insensitive lookup that handles multi-value headers.
 * @returns the first value sent for the header, or undefined
 * @example
 * const contentType = getHeader(req, 'Content-Type');
 */
export function getHeader(req: IncomingRequest, name: string): string | undefined {
  const key = name.toLowerCase();
  const values = req.headersMap.get(key);
  if (values && values.length > 0) return values[0];
  return req.headers[key];
}

/**
 * Case-insensitive query lookup. The parser already decodes the query into
 * `req.query`; names are compared ignoring case here.
 */
export function getQuery(req: IncomingRequest, key: string): string | undefined {
  if (req.invalid) return undefined;
  const direct = req.query[key];
  if (direct !== undefined) return direct;
  const wanted = key.toLowerCase();
  for (const [name, value] of Object.entries(req.query)) {
    if (name.toLowerCase() === wanted) return value;
  }
  return undefined;
}

/**
 * Extracts the token from `Authorization: Bearer <token>`.
 * @returns the scheme and token, or undefined when no Authorization header was sent
 */
export function getAuthorization(req: IncomingRequest): { scheme: string; token: string } | undefined {
  const header = getHeader(req, 'authorization')?.trim();
  if (!header) return undefined;
  const space = header.indexOf(' ');
  if (space === -1) return { scheme: header, token: '' };
  return { scheme: header.slice(0, space), token: header.slice(space + 1).trim() };
}

export function getContentType(req: IncomingRequest): string {
  return getHeader(req, 'content-type') ?? '';
}
