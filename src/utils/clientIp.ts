import { isIP } from 'net';
import { IncomingRequest } from '../entities/http';
import { getHeader } from './httpHelpers';

// checked in this order; the first valid address wins
const PROXY_HEADERS = ['cf-connecting-ip', 'true-client-ip', 'x-real-ip', 'x-forwarded-for', 'x-client-ip'];

function cleanAddress(raw: string): string {
  let value = raw.trim().replace(/^"|"$/g, '');
  // [v6]:port and bracketed v6
  const bracketed = /^\[([^\]]+)\](?::\d+)?$/.exec(value);
  if (bracketed) return bracketed[1];
  // v4:port
  if (/^\d{1,3}(\.\d{1,3}){3}:\d+$/.test(value)) value = value.slice(0, value.lastIndexOf(':'));
  return value;
}

function fromForwarded(header: string): string | undefined {
  for (const element of header.split(',')) {
    const match = /(?:^|;)\s*for=("[^"]*"|[^;,\s]+)/i.exec(element);
    if (match) return cleanAddress(match[1]);
  }
  return undefined;
}

/** Strips the IPv4-mapped IPv6 prefix Node reports for dual-stack sockets. */
export function normalizeIp(address: string): string {
  return address.startsWith('::ffff:') && isIP(address.slice(7)) === 4 ? address.slice(7) : address;
}

/**
 * Resolves the caller's address. Proxy headers are consulted only when
 * trusted; otherwise, or when none holds a valid IP, the socket address is used.
 */
export function resolveClientIp(
  req: IncomingRequest,
  remoteAddress: string | undefined,
  trustProxyHeaders: boolean,
): string {
  if (trustProxyHeaders) {
    for (const name of PROXY_HEADERS) {
      const value = getHeader(req, name);
      if (!value) continue;
      const candidate = cleanAddress(name === 'x-forwarded-for' ? value.split(',')[0] : value);
      if (isIP(candidate)) return normalizeIp(candidate);
    }
    const forwarded = getHeader(req, 'forwarded');
    const candidate = forwarded ? fromForwarded(forwarded) : undefined;
    if (candidate && isIP(candidate)) return normalizeIp(candidate);
  }
  return normalizeIp(remoteAddress ?? 'unknown');
}
