/**
 * src/config/server.config.ts
 * This file contains the server configuration settings.
 */
import dotenv from 'dotenv';
import { join } from 'path';
import process from 'process';
import { loadEndpointLimits, EndpointLimit } from './rateLimits';

// Load environment variables from .env file
dotenv.config();

function intFromEnv(name: string, fallback: number, min = 0): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : Math.max(parsed, min);
}

function listFromEnv(name: string): string[] {
  return (process.env[name] ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export interface RateLimitSettings {
  defaultMaxRequests: number;
  defaultTimeWindowMs: number;
  blockDurationMinutes: number;
  maxViolationsBeforeBlock: number;
  endpointLimits: EndpointLimit[];
  whitelistedIps: string[];
  blacklistedIps: string[];
  blockListFile: string;
  clientSweepIntervalMs: number;
  clientIdleTtlMs: number;
  blockSweepIntervalMs: number;
  violationMemoryMs: number;
}

export interface CorsSettings {
  allowedOrigin: string;
  allowedMethods: string;
  allowedHeaders: string;
}

export const config = {
  port: intFromEnv('PORT', 8080),
  host: process.env.HOST || '0.0.0.0',
  headerTimeoutMs: intFromEnv('HEADER_TIMEOUT_MS', 10000),
  bodyTimeoutMs: intFromEnv('BODY_TIMEOUT_MS', 15000),
  /**
   * Largest accepted request body, in megabytes.
   */
  maxBodySizeMb: intFromEnv('MAX_BODY_SIZE_MB', 10, 1),
  maxConnectionsPerIp: intFromEnv('MAX_CONNECTIONS_PER_IP', 50, 1),
  /**
   * Honour CF-Connecting-IP, X-Forwarded-For and friends when resolving the client address.
   */
  trustProxyHeaders: process.env.TRUST_PROXY_HEADERS !== 'false',

  /**
   * Adds nosniff, frame-deny, HSTS, CSP and related headers to every response.
   */
  securityHeadersEnabled: process.env.SECURITY_HEADERS !== 'false',

  cors: {
    allowedOrigin: process.env.CORS_ALLOWED_ORIGIN || '*',
    allowedMethods: process.env.CORS_ALLOWED_METHODS || 'GET, POST, PUT, PATCH, DELETE, OPTIONS',
    allowedHeaders:
      process.env.CORS_ALLOWED_HEADERS || 'Content-Type, Authorization, X-Requested-With',
  } satisfies CorsSettings,

  auth: {
    jwtSecret: process.env.JWT_SECRET || 'change-me',
    jwtIssuer: process.env.JWT_ISSUER || 'gatehouse',
    tokenLifetimeSeconds: intFromEnv('JWT_LIFETIME_SECONDS', 3600, 60),
    /** Accounts accepted by the sample login endpoints. */
    users: [
      {
        username: 'admin',
        password: process.env.SAMPLE_ADMIN_PASSWORD || 'admin-password',
        roles: ['Admin', 'User'],
      },
      {
        username: 'user',
        password: process.env.SAMPLE_USER_PASSWORD || 'user-password',
        roles: ['User'],
      },
    ],
  },

  rateLimit: {
    defaultMaxRequests: intFromEnv('RATE_LIMIT_MAX_REQUESTS', 100, 1),
    defaultTimeWindowMs: intFromEnv('RATE_LIMIT_WINDOW_MS', 60_000, 1),
    blockDurationMinutes: intFromEnv('RATE_LIMIT_BLOCK_MINUTES', 15, 1),
    maxViolationsBeforeBlock: intFromEnv('RATE_LIMIT_MAX_VIOLATIONS', 3, 1),
    endpointLimits: loadEndpointLimits(),
    whitelistedIps: listFromEnv('RATE_LIMIT_WHITELIST'),
    blacklistedIps: listFromEnv('RATE_LIMIT_BLACKLIST'),
    blockListFile: process.env.BLOCK_LIST_FILE || join(process.cwd(), 'data', 'blocked_ips.json'),
    clientSweepIntervalMs: 10 * 60 * 1000,
    clientIdleTtlMs: 60 * 60 * 1000,
    blockSweepIntervalMs: 5 * 60 * 1000,
    violationMemoryMs: 24 * 60 * 60 * 1000,
  } satisfies RateLimitSettings,

  /**
   * Logging configuration
   */
  logging: {
    level: process.env.LOG_LEVEL || 'info',
    logDir: process.env.LOG_DIR || join(process.cwd(), 'logs'),
  },
};

export type ServerConfig = typeof config;
