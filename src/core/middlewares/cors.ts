import { CorsSettings } from '../../config/server.config';

/**
 * CORS headers sent on every dispatched response, preflight answers included.
 */
export function corsHeaders(settings: CorsSettings): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': settings.allowedOrigin,
    'Access-Control-Allow-Methods': settings.allowedMethods,
    'Access-Control-Allow-Headers': settings.allowedHeaders,
    'Access-Control-Allow-Credentials': 'true',
  };
}

/** Headers for a 204 preflight answer: CORS only, no body. */
export function preflightHeaders(settings: CorsSettings, requestId: string): Record<string, string> {
  return { ...corsHeaders(settings), 'X-Request-ID': requestId };
}
