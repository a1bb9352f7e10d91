/**
 * Wires the pipeline together: registry, limiter, dispatcher and transport.
 *
 * @module app
 */
import { ServerConfig } from './config/server.config';
import { ControllerRegistry } from './core/controllerRegistry';
import { RequestDispatcher } from './core/dispatcher';
import { ResponseWriter } from './core/responseWriter';
import { HttpServer } from './core/server';
import { JwtTokenService } from './auth/jwtTokenService';
import { UserDirectory } from './auth/userDirectory';
import { BlockRecordStore, IpBlockList, JsonFileBlockRecordStore } from './security/ipBlockList';
import { RateLimiter } from './security/rateLimiter';
import { SecurityLogger, createSecurityLogger } from './security/securityLogger';
import { registerControllers } from './routes';
import { Clock, systemClock } from './utils/clock';
import logger, { Logger } from './utils/logger';

const BYTES_PER_MB = 1024 * 1024;

export interface AppOverrides {
  clock?: Clock;
  blockStore?: BlockRecordStore;
  security?: SecurityLogger;
  logger?: Logger;
}

export interface App {
  registry: ControllerRegistry;
  rateLimiter: RateLimiter;
  dispatcher: RequestDispatcher;
  tokens: JwtTokenService;
  server: HttpServer;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function createApp(config: ServerConfig, overrides: AppOverrides = {}): App {
  const log = overrides.logger ?? logger;
  const clock = overrides.clock ?? systemClock;
  const maxBodyBytes = config.maxBodySizeMb * BYTES_PER_MB;

  const security = overrides.security ?? createSecurityLogger(config.logging.logDir);
  const blockList = new IpBlockList(
    overrides.blockStore ?? new JsonFileBlockRecordStore(config.rateLimit.blockListFile, log),
    clock,
    log,
  );
  const rateLimiter = new RateLimiter(config.rateLimit, { blockList, security, clock, logger: log });

  const tokens = new JwtTokenService(config.auth, log);
  const registry = new ControllerRegistry();
  registerControllers(registry, {
    tokens,
    users: new UserDirectory(config.auth.users),
    tokenLifetimeSeconds: config.auth.tokenLifetimeSeconds,
    rateLimiter,
    security,
  });

  const dispatcher = new RequestDispatcher({
    registry,
    writer: new ResponseWriter({ cors: config.cors, securityHeadersEnabled: config.securityHeadersEnabled }),
    rateLimiter,
    tokenVerifier: tokens,
    maxBodyBytes,
    trustProxyHeaders: config.trustProxyHeaders,
    cors: config.cors,
    clock,
    logger: log,
  });

  const server = new HttpServer({
    port: config.port,
    host: config.host,
    headerTimeoutMs: config.headerTimeoutMs,
    bodyTimeoutMs: config.bodyTimeoutMs,
    maxBodyBytes,
    maxConnectionsPerIp: config.maxConnectionsPerIp,
    handler: dispatcher,
    logger: log,
  });

  return {
    registry,
    rateLimiter,
    dispatcher,
    tokens,
    server,
    async start() {
      await rateLimiter.start();
      await server.start();
    },
    async stop() {
      rateLimiter.stop();
      await server.stop();
      await security.close();
    },
  };
}
