const DEFAULT_CSP = "default-src 'self'";
// Interactive API docs load their bundles from public CDNs and use inline scripts.
const DOCS_CSP =
  "default-src 'self'; " +
  "script-src 'self' 'unsafe-inline' https://unpkg.com https://cdn.jsdelivr.net; " +
  "style-src 'self' 'unsafe-inline' https://unpkg.com https://cdn.jsdelivr.net; " +
  "img-src 'self' data: https:";

export function isDocumentationPath(path: string): boolean {
  const lower = path.toLowerCase();
  return lower.includes('/docs') || lower.includes('/swagger');
}

export function securityHeaders(path: string): Record<string, string> {
  return {
    'X-Content-Type-Options': 'nosniff',
    'X-Frame-Options': 'DENY',
    'X-XSS-Protection': '1; mode=block',
    'Strict-Transport-Security': 'max-age=31536000; includeSubDomains',
    'Referrer-Policy': 'no-referrer',
    'Permissions-Policy': 'geolocation=(), microphone=()',
    'Content-Security-Policy': isDocumentationPath(path) ? DOCS_CSP : DEFAULT_CSP,
  };
}

/**
 * Copies each default into `headers` unless a header of the same name
 * (compared without case) is already there.
 */
export function appendMissingHeaders(
  headers: Record<string, string>,
  defaults: Record<string, string>,
): Record<string, string> {
  const present = new Set(Object.keys(headers).map((name) => name.toLowerCase()));
  const merged = { ...headers };
  for (const [name, value] of Object.entries(defaults)) {
    if (!present.has(name.toLowerCase())) merged[name] = value;
  }
  return merged;
}
