import { IncomingRequest, AuthenticatedUser } from '../entities/http';
import { Logger } from '../utils/logger';

/**
 * Request-scoped state handed to handlers that declare a context parameter.
 * Lives from route match until the response is written.
 */
export class HttpContext {
  user?: AuthenticatedUser;
  /** Headers a handler wants on its response; they win over the writer's defaults. */
  readonly responseHeaders: Record<string, string> = {};

  constructor(
    readonly request: IncomingRequest,
    readonly requestId: string,
    readonly clientIp: string,
    readonly logger: Logger,
    readonly routeParams: Readonly<Record<string, string>> = {},
  ) {}

  isInRole(role: string): boolean {
    return this.user?.roles.includes(role) ?? false;
  }
}
