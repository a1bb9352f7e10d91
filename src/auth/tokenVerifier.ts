import { AuthenticatedUser } from '../entities/http';

/**
 * Checks a bearer token. Resolves to the caller's identity, or null when the
 * token is malformed, expired or not signed by us.
 */
export interface TokenVerifier {
  verifyToken(token: string): Promise<AuthenticatedUser | null>;
}
