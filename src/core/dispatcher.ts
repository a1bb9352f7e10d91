/**
 * Request Dispatcher
 *
 * Runs one parsed request through the pipeline and writes exactly one response:
 *
 *   rate limit (429) → body size (413) → CORS preflight (204)
 *   → controller lookup (404) → action match (404) → authorization (401/403)
 *   → parameter binding (400) → handler (500 on an unexpected error) → response
 *
 * @module core/dispatcher
 */
import { randomUUID } from 'crypto';
import { Socket } from 'net';
import { CorsSettings } from '../config/server.config';
import { AuthenticatedUser, IncomingRequest } from '../entities/http';
import { HttpError, errorMessage } from '../entities/errors';
import { TokenVerifier } from '../auth/tokenVerifier';
import { RateLimiter } from '../security/rateLimiter';
import { describeWindow } from '../security/rateLimitConfig';
import { Clock, systemClock } from '../utils/clock';
import { resolveClientIp } from '../utils/clientIp';
import { formatWireDate } from '../utils/dateFormatter';
import { getAuthorization, getHeader } from '../utils/httpHelpers';
import logger, { Logger } from '../utils/logger';
import { AuthorizeRequirement, ControllerRegistry, findAction } from './controllerRegistry';
import { HttpContext } from './httpContext';
import { preflightHeaders } from './middlewares/cors';
import { ParameterResolver } from './parameterResolver';
import { ResponseTarget, ResponseWriter } from './responseWriter';

const BYTES_PER_MB = 1024 * 1024;

export interface DispatcherOptions {
  registry: ControllerRegistry;
  writer: ResponseWriter;
  rateLimiter: RateLimiter;
  tokenVerifier: TokenVerifier;
  maxBodyBytes: number;
  trustProxyHeaders: boolean;
  cors: CorsSettings;
  resolver?: ParameterResolver;
  clock?: Clock;
  logger?: Logger;
}

export interface DispatchResult {
  status: number;
  /** False when the connection must be closed after this response. */
  keepAlive: boolean;
}

type AuthorizationOutcome =
  | { ok: true; user?: AuthenticatedUser }
  | { ok: false; status: 401 | 403; message: string };

function roundMb(bytes: number): number {
  return Math.round((bytes / BYTES_PER_MB) * 100) / 100;
}

/** 413 body, shared with the connection-level byte guard. */
export function payloadTooLargeBody(maxBodyBytes: number, receivedBytes: number): Record<string, unknown> {
  return {
    error: 'Request entity too large',
    maxAllowedSizeMB: roundMb(maxBodyBytes),
    receivedSizeMB: roundMb(receivedBytes),
    suggestion: `Send at most ${roundMb(maxBodyBytes)} MB per request, or split the upload into smaller parts`,
  };
}

function logRequestCompletion(log: Logger, startTime: [number, number], status: number): void {
  const [seconds, nanoseconds] = process.hrtime(startTime);
  const durationMs = seconds * 1000 + nanoseconds / 1000000;
  const meta = { status, durationMs };
  if (status >= 500) {
    log.error(`Request completed with status ${status}`, meta);
  } else if (status >= 400) {
    log.warn(`Request completed with status ${status}`, meta);
  } else {
    log.info(`Request completed with status ${status}`, meta);
  }
}

export class RequestDispatcher {
  private readonly resolver: ParameterResolver;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(private readonly options: DispatcherOptions) {
    this.resolver = options.resolver ?? new ParameterResolver();
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? logger;
  }

  async dispatch(req: IncomingRequest, socket: Socket): Promise<DispatchResult> {
    const startTime = process.hrtime();
    const requestId = getHeader(req, 'x-request-id') || randomUUID();
    const clientIp = resolveClientIp(req, socket.remoteAddress, this.options.trustProxyHeaders);
    const connectionHeader = (getHeader(req, 'connection') ?? '').toLowerCase();
    const keepAlive = !req.bodyTooLarge && connectionHeader !== 'close';
    const reqLogger = this.log.child({ requestId, method: req.method, path: req.path, ip: clientIp });
    reqLogger.http(`Request started: ${req.method} ${req.path}`);

    const target: ResponseTarget = { socket, path: req.path, requestId, keepAlive, logger: reqLogger };
    let status: number;
    try {
      status = await this.run(req, target, clientIp);
    } catch (err) {
      status = this.fail(target, err);
    }
    logRequestCompletion(reqLogger, startTime, status);
    return { status, keepAlive };
  }

  private async run(req: IncomingRequest, target: ResponseTarget, clientIp: string): Promise<number> {
    const { writer, registry } = this.options;

    const rejection = await this.checkRateLimit(req, target, clientIp);
    if (rejection !== undefined) return rejection;

    if (req.bodyTooLarge) {
      writer.writeJson(
        target,
        413,
        payloadTooLargeBody(this.options.maxBodyBytes, req.bodyTooLarge.receivedBytes),
      );
      return 413;
    }

    if (req.method === 'OPTIONS') {
      writer.writeEmpty(target, 204, preflightHeaders(this.options.cors, target.requestId));
      return 204;
    }

    const match = registry.findController(req.path);
    if (!match) {
      writer.writeJson(target, 404, {
        error: 'Controller not found',
        requestedPath: req.path,
        availableRoutes: registry.getRegisteredRoutes(),
      });
      return 404;
    }

    const found = findAction(match.controller, req.method, match.subPath);
    if (!found) {
      writer.writeJson(target, 404, { error: 'Route not found', subPath: match.subPath, method: req.method });
      return 404;
    }
    const { action, routeParams } = found;
    const ctx = new HttpContext(req, target.requestId, clientIp, target.logger, routeParams);

    const requirement = action.options.allowAnonymous
      ? undefined
      : action.options.authorize ?? match.controller.authorize;
    const authorization = await this.authorize(req, requirement, target.logger);
    if (!authorization.ok) {
      writer.writeJson(target, authorization.status, { error: authorization.message });
      return authorization.status;
    }
    ctx.user = authorization.user;

    // binding errors are ClientInputErrors and end up as 400 in fail()
    const snapshot = this.resolver.snapshot(ctx, action.plan);
    const invoke = action.prepare(this.resolver.createBinder(snapshot, ctx));

    target.logger.debug('Invoking handler', {
      controller: match.controller.name,
      template: action.template,
    });
    const outcome = await invoke();
    target.headers = ctx.responseHeaders;
    return writer.write(target, outcome);
  }

  /** @returns the status written when the request was rejected */
  private async checkRateLimit(
    req: IncomingRequest,
    target: ResponseTarget,
    clientIp: string,
  ): Promise<number | undefined> {
    const decision = await this.options.rateLimiter.check({
      ip: clientIp,
      path: req.path,
      userAgent: getHeader(req, 'user-agent'),
      token: getAuthorization(req)?.token,
    });
    if (decision.allowed) return undefined;

    const { limit, retryAfter } = decision;
    const headers: Record<string, string> = {};
    if (retryAfter) {
      const seconds = Math.max(1, Math.ceil((retryAfter.getTime() - this.clock.now()) / 1000));
      headers['Retry-After'] = String(seconds);
    }
    target.logger.warn('Request rejected by rate limiter', { reason: decision.reason });
    this.options.writer.writeJson(
      target,
      429,
      {
        error: 'Too many requests',
        message: decision.message,
        retryAfter: retryAfter ? formatWireDate(retryAfter) : null,
        limit: limit.maxRequests,
        window: describeWindow(limit.timeWindowMs),
      },
      headers,
    );
    return 429;
  }

  private async authorize(
    req: IncomingRequest,
    requirement: AuthorizeRequirement | undefined,
    log: Logger,
  ): Promise<AuthorizationOutcome> {
    if (!requirement) return { ok: true };

    const credentials = getAuthorization(req);
    if (credentials && credentials.scheme.toLowerCase() !== 'bearer') {
      return { ok: false, status: 401, message: 'Unauthorized: Unsupported authentication scheme' };
    }
    if (!credentials?.token) {
      return { ok: false, status: 401, message: 'Unauthorized: Missing or invalid token' };
    }

    let user: AuthenticatedUser | null;
    try {
      user = await this.options.tokenVerifier.verifyToken(credentials.token);
    } catch (err) {
      log.error('Token verification failed', { error: errorMessage(err) });
      user = null;
    }
    if (!user) {
      return { ok: false, status: 401, message: 'Unauthorized: Invalid token' };
    }

    const roles = requirement.roles ?? [];
    if (roles.length > 0 && !roles.some((role) => user?.roles.includes(role))) {
      log.warn('Caller lacks a required role', { user: user.name, required: roles });
      return { ok: false, status: 403, message: 'Forbidden: Insufficient role' };
    }
    return { ok: true, user };
  }

  private fail(target: ResponseTarget, err: unknown): number {
    if (err instanceof HttpError) {
      target.logger.warn('Request failed', { status: err.status, error: err.message });
      this.options.writer.writeJson(target, err.status, { error: err.message });
      return err.status;
    }
    target.logger.error('Unhandled error while processing request', {
      error: errorMessage(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    this.options.writer.writeJson(target, 500, { error: 'Internal server error' });
    return 500;
  }
}
