import { z } from 'zod';
import rawEndpointLimits from './rateLimits.json';

export interface EndpointLimit {
  pathPrefix: string;
  maxRequests: number;
  timeWindowMs: number;
  description: string;
}

const endpointLimitSchema = z.object({
  pathPrefix: z.string().min(1),
  maxRequests: z.number().int().positive(),
  timeWindowSeconds: z.number().positive(),
  description: z.string().default(''),
});

/**
 * Validates a list of endpoint limits as stored in rateLimits.json.
 * Throws a ZodError naming the offending entry when the data is malformed.
 */
export function parseEndpointLimits(data: unknown): EndpointLimit[] {
  return z
    .array(endpointLimitSchema)
    .parse(data)
    .map((entry) => ({
      pathPrefix: entry.pathPrefix,
      maxRequests: entry.maxRequests,
      timeWindowMs: entry.timeWindowSeconds * 1000,
      description: entry.description,
    }));
}

export function loadEndpointLimits(): EndpointLimit[] {
  return parseEndpointLimits(rawEndpointLimits);
}
