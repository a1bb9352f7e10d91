import { RateLimitSettings } from '../config/server.config';
import { EndpointLimit } from '../config/rateLimits';

function normalize(path: string): string {
  const trimmed = path.trim().toLowerCase().replace(/\/+$/, '');
  return trimmed === '' ? '/' : trimmed;
}

/**
 * Chooses the limit that applies to a request path: an exact prefix entry,
 * else the longest entry the path starts with, else the default limit.
 * Prefixes are compared as plain strings, so `/api/upload` also covers
 * `/api/uploads`.
 */
export class RateLimitPolicy {
  private readonly limits: { key: string; limit: EndpointLimit }[];

  constructor(
    limits: EndpointLimit[],
    readonly defaultLimit: EndpointLimit,
  ) {
    this.limits = limits
      .map((limit) => ({ key: normalize(limit.pathPrefix), limit }))
      .sort((a, b) => b.key.length - a.key.length);
  }

  static fromSettings(settings: RateLimitSettings): RateLimitPolicy {
    return new RateLimitPolicy(settings.endpointLimits, {
      pathPrefix: '*',
      maxRequests: settings.defaultMaxRequests,
      timeWindowMs: settings.defaultTimeWindowMs,
      description: 'Default limit',
    });
  }

  limitFor(path: string): EndpointLimit {
    const wanted = normalize(path);
    const exact = this.limits.find((entry) => entry.key === wanted);
    if (exact) return exact.limit;
    return this.limits.find((entry) => wanted.startsWith(entry.key))?.limit ?? this.defaultLimit;
  }
}

/** "2 minutes" for whole minutes, otherwise seconds. */
export function describeWindow(timeWindowMs: number): string {
  const seconds = Math.round(timeWindowMs / 1000);
  if (seconds >= 60 && seconds % 60 === 0) return `${seconds / 60} minutes`;
  return `${seconds} seconds`;
}
