/**
 * Rate Limiter
 *
 * Sliding-window request counting per client identity and endpoint limit,
 * with escalating temporary IP blocks for repeat offenders.
 *
 * Order of checks for every request:
 * 1. blacklisted IP → rejected
 * 2. whitelisted IP → accepted, nothing counted
 * 3. live temporary block → rejected (expired blocks are cleared on the spot)
 * 4. window purge and count; at the limit the request is a violation, and
 *    enough violations turn into a block
 *
 * Step 4 runs without yielding to the event loop, so concurrent requests of
 * one identity can never interleave inside it.
 *
 * @module security/rateLimiter
 */
import { createHash } from 'crypto';
import { RateLimitSettings } from '../config/server.config';
import { EndpointLimit } from '../config/rateLimits';
import { errorMessage } from '../entities/errors';
import { Clock, systemClock } from '../utils/clock';
import { formatWireDate } from '../utils/dateFormatter';
import logger, { Logger } from '../utils/logger';
import { BlockRecord, IpBlockList } from './ipBlockList';
import { RateLimitPolicy, describeWindow } from './rateLimitConfig';
import { SecurityLogger } from './securityLogger';

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;
const BLACKLIST_BLOCK_MS = 3650 * DAY;
const BLACKLIST_VIOLATIONS = 999;

export interface RateLimitRequest {
  ip: string;
  path: string;
  userAgent?: string;
  token?: string;
}

export type RateLimitDecision =
  | { allowed: true; whitelisted: boolean; limit: EndpointLimit; remaining: number }
  | {
      allowed: false;
      reason: 'blacklisted' | 'blocked' | 'rate_limited';
      message: string;
      limit: EndpointLimit;
      /** Block expiry, or when the oldest counted request leaves the window. */
      retryAfter?: Date;
    };

export interface RateLimitStatus {
  ip: string;
  allowed: boolean;
  whitelisted: boolean;
  blacklisted: boolean;
  blocked: boolean;
  currentRequests: number;
  maxRequests: number;
  remainingRequests: number;
  window: string;
  resetAt?: Date;
  blockedUntil?: Date;
  blockReason?: string;
  message: string;
}

export interface RateLimitStatistics {
  trackedClients: number;
  blockedIps: number;
  whitelistedIps: number;
  blacklistedIps: number;
  totalViolations: number;
}

interface ClientWindow {
  identity: string;
  ip: string;
  timestamps: number[];
  violationCount: number;
  lastRequestAt: number;
}

interface ViolationHistory {
  count: number;
  lastViolationAt: number;
}

export interface RateLimiterDependencies {
  blockList: IpBlockList;
  security: SecurityLogger;
  clock?: Clock;
  policy?: RateLimitPolicy;
  logger?: Logger;
}

/**
 * Bucket key finer than the IP: the same address with a different user agent
 * or bearer token counts separately.
 */
export function clientIdentity(ip: string, userAgent = '', token = ''): string {
  const agentHash = createHash('sha1').update(userAgent).digest('hex').slice(0, 8);
  return `${ip}_${agentHash}_${token.slice(0, 10)}`;
}

/** Block length for an IP with `cumulativeViolations` recent violations. */
export function blockDurationFor(cumulativeViolations: number, baseMs: number): number {
  if (cumulativeViolations <= 3) return baseMs;
  if (cumulativeViolations <= 5) return baseMs * 2;
  if (cumulativeViolations <= 10) return HOUR;
  if (cumulativeViolations <= 20) return 6 * HOUR;
  if (cumulativeViolations <= 40) return DAY;
  return 3 * DAY;
}

export class RateLimiter {
  private readonly windows = new Map<string, ClientWindow>();
  private readonly history = new Map<string, ViolationHistory>();
  private readonly whitelist: Set<string>;
  private readonly blacklist: Set<string>;
  private readonly blockList: IpBlockList;
  private readonly security: SecurityLogger;
  private readonly clock: Clock;
  private readonly policy: RateLimitPolicy;
  private readonly log: Logger;
  private clientSweepTimer?: NodeJS.Timeout;
  private blockSweepTimer?: NodeJS.Timeout;

  constructor(
    private readonly settings: RateLimitSettings,
    deps: RateLimiterDependencies,
  ) {
    this.blockList = deps.blockList;
    this.security = deps.security;
    this.clock = deps.clock ?? systemClock;
    this.policy = deps.policy ?? RateLimitPolicy.fromSettings(settings);
    this.log = deps.logger ?? logger;
    this.whitelist = new Set(settings.whitelistedIps);
    this.blacklist = new Set(settings.blacklistedIps);
  }

  /** Loads persisted blocks and starts the periodic sweeps. */
  async start(): Promise<void> {
    const records = await this.blockList.load();
    for (const record of records) {
      this.history.set(record.ip, {
        count: record.violationCount,
        lastViolationAt: record.blockedAt.getTime(),
      });
    }

    this.stop();
    this.clientSweepTimer = setInterval(() => {
      this.sweepInactiveClients();
    }, this.settings.clientSweepIntervalMs);
    this.clientSweepTimer.unref();
    this.blockSweepTimer = setInterval(() => {
      this.sweepExpiredBlocks().catch((err) =>
        this.log.error('Block sweep failed', { error: errorMessage(err) }),
      );
    }, this.settings.blockSweepIntervalMs);
    this.blockSweepTimer.unref();

    this.log.info('Rate limiter started', {
      restoredBlocks: records.length,
      whitelisted: this.whitelist.size,
      blacklisted: this.blacklist.size,
    });
  }

  stop(): void {
    if (this.clientSweepTimer) clearInterval(this.clientSweepTimer);
    if (this.blockSweepTimer) clearInterval(this.blockSweepTimer);
    this.clientSweepTimer = undefined;
    this.blockSweepTimer = undefined;
  }

  async check(request: RateLimitRequest): Promise<RateLimitDecision> {
    const limit = this.policy.limitFor(request.path);
    const { ip } = request;

    if (this.blacklist.has(ip)) {
      return {
        allowed: false,
        reason: 'blacklisted',
        message: 'Your IP address has been blacklisted',
        limit,
        retryAfter: this.blockList.get(ip)?.blockedUntil,
      };
    }
    if (this.whitelist.has(ip)) {
      return { allowed: true, whitelisted: true, limit, remaining: limit.maxRequests };
    }

    const block = await this.blockList.active(ip);
    if (block) {
      return {
        allowed: false,
        reason: 'blocked',
        message: `Your IP address is blocked until ${formatWireDate(block.blockedUntil)}`,
        limit,
        retryAfter: block.blockedUntil,
      };
    }

    const now = this.clock.now();
    const identity = clientIdentity(ip, request.userAgent, request.token);
    const key = `${identity}|${limit.pathPrefix}`;
    const window: ClientWindow = this.windows.get(key) ?? {
      identity,
      ip,
      timestamps: [],
      violationCount: 0,
      lastRequestAt: now,
    };
    this.windows.set(key, window);
    window.timestamps = window.timestamps.filter((at) => now - at <= limit.timeWindowMs);
    window.lastRequestAt = now;

    if (window.timestamps.length < limit.maxRequests) {
      window.timestamps.push(now);
      return {
        allowed: true,
        whitelisted: false,
        limit,
        remaining: limit.maxRequests - window.timestamps.length,
      };
    }

    window.violationCount++;
    const cumulative = this.recordViolation(ip, now);
    this.security.rateLimitViolation({
      identity,
      endpoint: request.path,
      ip,
      currentCount: window.timestamps.length,
      maxAllowed: limit.maxRequests,
    });

    if (window.violationCount >= this.settings.maxViolationsBeforeBlock) {
      const durationMs = blockDurationFor(cumulative, this.settings.blockDurationMinutes * MINUTE);
      const record: BlockRecord = {
        ip,
        blockedAt: new Date(now),
        blockedUntil: new Date(now + durationMs),
        reason: `Rate limit exceeded ${window.violationCount} times on ${limit.pathPrefix}`,
        violationCount: cumulative,
      };
      this.windows.delete(key);
      const persisted = this.blockList.block(record);
      this.security.ipBlocked(ip, record.reason, record.blockedUntil, cumulative);
      await persisted;
      return {
        allowed: false,
        reason: 'blocked',
        message: `Too many requests. Your IP address is blocked until ${formatWireDate(record.blockedUntil)}`,
        limit,
        retryAfter: record.blockedUntil,
      };
    }

    return {
      allowed: false,
      reason: 'rate_limited',
      message: `Rate limit of ${limit.maxRequests} requests per ${describeWindow(limit.timeWindowMs)} exceeded`,
      limit,
      retryAfter: new Date(window.timestamps[0] + limit.timeWindowMs),
    };
  }

  addToWhitelist(ip: string, performedBy = 'system'): Promise<void> {
    this.whitelist.add(ip);
    this.dropWindows(ip);
    this.security.whitelistAction(ip, 'added', performedBy);
    return this.lift(ip, 'whitelisted');
  }

  removeFromWhitelist(ip: string, performedBy = 'system'): boolean {
    const removed = this.whitelist.delete(ip);
    if (removed) this.security.whitelistAction(ip, 'removed', performedBy);
    return removed;
  }

  async addToBlacklist(ip: string, reason = 'Manually blacklisted', performedBy = 'system'): Promise<void> {
    const now = this.clock.now();
    this.blacklist.add(ip);
    this.dropWindows(ip);
    const record: BlockRecord = {
      ip,
      blockedAt: new Date(now),
      blockedUntil: new Date(now + BLACKLIST_BLOCK_MS),
      reason,
      violationCount: BLACKLIST_VIOLATIONS,
    };
    this.security.blacklistAction(ip, 'added', performedBy);
    this.security.ipBlocked(ip, reason, record.blockedUntil, BLACKLIST_VIOLATIONS);
    await this.blockList.block(record);
  }

  async removeFromBlacklist(ip: string, performedBy = 'system'): Promise<boolean> {
    const removed = this.blacklist.delete(ip);
    if (removed) this.security.blacklistAction(ip, 'removed', performedBy);
    await this.lift(ip, 'removed from blacklist');
    return removed;
  }

  /** Lifts a temporary block. The IP's violation history is kept for escalation. */
  async unblock(ip: string): Promise<boolean> {
    const lifted = await this.blockList.unblock(ip);
    this.dropWindows(ip);
    if (lifted) this.security.ipUnblocked(ip, 'manual');
    return lifted;
  }

  getStatus(ip: string, path: string, userAgent?: string, token?: string): RateLimitStatus {
    const now = this.clock.now();
    const limit = this.policy.limitFor(path);
    const window = describeWindow(limit.timeWindowMs);
    const base = {
      ip,
      whitelisted: this.whitelist.has(ip),
      blacklisted: this.blacklist.has(ip),
      maxRequests: limit.maxRequests,
      window,
    };

    if (base.whitelisted) {
      return {
        ...base,
        allowed: true,
        blocked: false,
        currentRequests: 0,
        remainingRequests: limit.maxRequests,
        message: 'IP is whitelisted',
      };
    }

    const block = this.blockList.get(ip);
    const liveBlock = block && block.blockedUntil.getTime() > now ? block : undefined;
    if (base.blacklisted || liveBlock) {
      return {
        ...base,
        allowed: false,
        blocked: liveBlock !== undefined,
        currentRequests: 0,
        remainingRequests: 0,
        blockedUntil: liveBlock?.blockedUntil,
        blockReason: liveBlock?.reason,
        message: base.blacklisted
          ? 'IP is permanently blacklisted'
          : `IP blocked until ${formatWireDate(liveBlock?.blockedUntil ?? now)}`,
      };
    }

    const key = `${clientIdentity(ip, userAgent, token)}|${limit.pathPrefix}`;
    const recent = (this.windows.get(key)?.timestamps ?? []).filter(
      (at) => now - at <= limit.timeWindowMs,
    );
    if (recent.length === 0) {
      return {
        ...base,
        allowed: true,
        blocked: false,
        currentRequests: 0,
        remainingRequests: limit.maxRequests,
        message: 'No recent requests',
      };
    }
    const remaining = Math.max(0, limit.maxRequests - recent.length);
    return {
      ...base,
      allowed: remaining > 0,
      blocked: false,
      currentRequests: recent.length,
      remainingRequests: remaining,
      resetAt: new Date(recent[0] + limit.timeWindowMs),
      message: `${recent.length}/${limit.maxRequests} requests used`,
    };
  }

  getStatistics(): RateLimitStatistics {
    let totalViolations = 0;
    for (const entry of this.history.values()) totalViolations += entry.count;
    return {
      trackedClients: this.windows.size,
      blockedIps: this.getBlockedIps().length,
      whitelistedIps: this.whitelist.size,
      blacklistedIps: this.blacklist.size,
      totalViolations,
    };
  }

  getBlockedIps(): BlockRecord[] {
    const now = this.clock.now();
    return this.blockList.list().filter((record) => record.blockedUntil.getTime() > now);
  }

  /**
   * Forgets windows idle for longer than the configured TTL and violation
   * histories older than the memory period.
   * @returns the number of windows removed
   */
  sweepInactiveClients(): number {
    const now = this.clock.now();
    const idle = [...this.windows.entries()]
      .filter(([, window]) => now - window.lastRequestAt > this.settings.clientIdleTtlMs)
      .map(([key]) => key);
    for (const key of idle) this.windows.delete(key);

    for (const [ip, entry] of [...this.history.entries()]) {
      if (now - entry.lastViolationAt > this.settings.violationMemoryMs) this.history.delete(ip);
    }
    if (idle.length > 0) this.log.debug('Swept inactive rate-limit windows', { removed: idle.length });
    return idle.length;
  }

  async sweepExpiredBlocks(): Promise<string[]> {
    const expired = await this.blockList.removeExpired();
    for (const ip of expired) this.security.ipUnblocked(ip, 'expired');
    return expired;
  }

  /** @returns the cumulative violation count for the IP after this one */
  private recordViolation(ip: string, now: number): number {
    const previous = this.history.get(ip);
    const remembered =
      previous !== undefined && now - previous.lastViolationAt <= this.settings.violationMemoryMs;
    const count = remembered ? previous.count + 1 : 1;
    this.history.set(ip, { count, lastViolationAt: now });
    return count;
  }

  private dropWindows(ip: string): void {
    for (const [key, window] of [...this.windows.entries()]) {
      if (window.ip === ip) this.windows.delete(key);
    }
  }

  private async lift(ip: string, reason: string): Promise<void> {
    if (await this.blockList.unblock(ip)) this.security.ipUnblocked(ip, reason);
  }
}
