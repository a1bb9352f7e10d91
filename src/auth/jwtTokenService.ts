import jwt, { JwtPayload, SignOptions } from 'jsonwebtoken';
import { AuthenticatedUser } from '../entities/http';
import { errorMessage } from '../entities/errors';
import logger, { Logger } from '../utils/logger';
import { TokenVerifier } from './tokenVerifier';

export interface JwtSettings {
  jwtSecret: string;
  jwtIssuer: string;
  tokenLifetimeSeconds: number;
}

function stringList(value: unknown): string[] {
  if (typeof value === 'string') return [value];
  if (Array.isArray(value)) return value.filter((entry): entry is string => typeof entry === 'string');
  return [];
}

/** HS256 tokens carrying the user name in `sub` and roles in `role`/`roles`. */
export class JwtTokenService implements TokenVerifier {
  constructor(
    private readonly settings: JwtSettings,
    private readonly log: Logger = logger,
  ) {}

  async verifyToken(token: string): Promise<AuthenticatedUser | null> {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.settings.jwtSecret, {
        algorithms: ['HS256'],
        issuer: this.settings.jwtIssuer,
      });
    } catch (err) {
      this.log.debug('Token rejected', { error: errorMessage(err) });
      return null;
    }
    if (typeof decoded === 'string') return null;

    const name = typeof decoded.name === 'string' ? decoded.name : decoded.sub;
    if (!name) return null;
    const roles = [...new Set([...stringList(decoded.role), ...stringList(decoded.roles)])];
    return { name, roles, claims: { ...decoded } };
  }

  issueToken(userName: string, roles: string[], extraClaims: Record<string, string> = {}): string {
    const options: SignOptions = {
      algorithm: 'HS256',
      issuer: this.settings.jwtIssuer,
      subject: userName,
      expiresIn: this.settings.tokenLifetimeSeconds,
    };
    return jwt.sign({ ...extraClaims, name: userName, roles }, this.settings.jwtSecret, options);
  }
}
