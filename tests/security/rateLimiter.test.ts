import { RateLimitSettings } from '../../src/config/server.config';
import { InMemoryBlockRecordStore, IpBlockList } from '../../src/security/ipBlockList';
import {
  RateLimitDecision,
  RateLimiter,
  blockDurationFor,
  clientIdentity,
} from '../../src/security/rateLimiter';
import { SecurityLogger } from '../../src/security/securityLogger';
import { formatWireDate } from '../../src/utils/dateFormatter';
import logger from '../../src/utils/logger';

jest.mock('../../src/utils/logger');

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;
const START = Date.UTC(2024, 0, 15, 9, 0, 0);

function settingsWith(overrides: Partial<RateLimitSettings> = {}): RateLimitSettings {
  return {
    defaultMaxRequests: 3,
    defaultTimeWindowMs: MINUTE,
    blockDurationMinutes: 15,
    maxViolationsBeforeBlock: 3,
    endpointLimits: [
      { pathPrefix: '/api/login', maxRequests: 1, timeWindowMs: MINUTE, description: 'Login attempts' },
    ],
    whitelistedIps: ['10.0.0.9'],
    blacklistedIps: ['10.0.0.66'],
    blockListFile: 'unused.json',
    clientSweepIntervalMs: 10 * MINUTE,
    clientIdleTtlMs: HOUR,
    blockSweepIntervalMs: 5 * MINUTE,
    violationMemoryMs: DAY,
    ...overrides,
  };
}

describe('blockDurationFor', () => {
  const base = 15 * MINUTE;

  test('escalates with the cumulative violation count', () => {
    expect(blockDurationFor(1, base)).toBe(base);
    expect(blockDurationFor(3, base)).toBe(base);
    expect(blockDurationFor(4, base)).toBe(2 * base);
    expect(blockDurationFor(5, base)).toBe(2 * base);
    expect(blockDurationFor(6, base)).toBe(HOUR);
    expect(blockDurationFor(10, base)).toBe(HOUR);
    expect(blockDurationFor(11, base)).toBe(6 * HOUR);
    expect(blockDurationFor(20, base)).toBe(6 * HOUR);
    expect(blockDurationFor(21, base)).toBe(DAY);
    expect(blockDurationFor(40, base)).toBe(DAY);
    expect(blockDurationFor(41, base)).toBe(3 * DAY);
  });
});

describe('clientIdentity', () => {
  test('combines the IP, a user agent hash and the token prefix', () => {
    expect(clientIdentity('1.2.3.4')).toBe('1.2.3.4_da39a3ee_');
    expect(clientIdentity('1.2.3.4', '', 'abcdefghijklmnop')).toBe('1.2.3.4_da39a3ee_abcdefghij');
  });
});

describe('RateLimiter', () => {
  let now: number;
  let store: InMemoryBlockRecordStore;
  let limiter: RateLimiter;

  function createLimiter(settings: RateLimitSettings, initial: InMemoryBlockRecordStore = new InMemoryBlockRecordStore()) {
    const clock = { now: () => now };
    store = initial;
    const blockList = new IpBlockList(store, clock, logger);
    return new RateLimiter(settings, {
      blockList,
      security: new SecurityLogger(logger, logger),
      clock,
      logger,
    });
  }

  const request = { ip: '1.2.3.4', path: '/api/items', userAgent: 'jest' };
  const login = { ip: '1.2.3.4', path: '/api/login', userAgent: 'jest' };

  beforeEach(() => {
    jest.clearAllMocks();
    now = START;
    limiter = createLimiter(settingsWith());
  });

  afterEach(() => {
    limiter.stop();
  });

  test('allows up to the limit inside the window and rejects the next request', async () => {
    const remaining: number[] = [];
    for (let i = 0; i < 3; i++) {
      now = START + i * SECOND;
      const decision = await limiter.check(request);
      if (decision.allowed) remaining.push(decision.remaining);
    }
    expect(remaining).toEqual([2, 1, 0]);

    now = START + 3 * SECOND;
    const rejected = await limiter.check(request);
    expect(rejected).toEqual({
      allowed: false,
      reason: 'rate_limited',
      message: 'Rate limit of 3 requests per 1 minutes exceeded',
      limit: { pathPrefix: '*', maxRequests: 3, timeWindowMs: MINUTE, description: 'Default limit' },
      retryAfter: new Date(START + MINUTE),
    });

    now = START + 61 * SECOND;
    expect((await limiter.check(request)).allowed).toBe(true);
  });

  test('blocks the IP once a window collects enough violations', async () => {
    for (let i = 0; i < 5; i++) await limiter.check(request);
    const blocked = await limiter.check(request);

    const until = new Date(START + 15 * MINUTE);
    expect(blocked).toMatchObject({
      allowed: false,
      reason: 'blocked',
      message: `Too many requests. Your IP address is blocked until ${formatWireDate(until)}`,
      retryAfter: until,
    });
    expect(store.saved).toEqual([
      {
        ip: '1.2.3.4',
        blockedAt: new Date(START),
        blockedUntil: until,
        reason: 'Rate limit exceeded 3 times on *',
        violationCount: 3,
      },
    ]);
    expect(logger.log).toHaveBeenCalledWith(
      'error',
      `IP 1.2.3.4 blocked until ${formatWireDate(until)}`,
      expect.objectContaining({ event: 'IP_BLOCKED', violationCount: 3 }),
    );

    // any identity of the same IP is refused while the block lasts
    const again = await limiter.check({ ...request, userAgent: 'other' });
    expect(again).toMatchObject({
      allowed: false,
      reason: 'blocked',
      message: `Your IP address is blocked until ${formatWireDate(until)}`,
    });
  });

  test('lets the IP back in once the block has expired', async () => {
    for (let i = 0; i < 6; i++) await limiter.check(request);
    now = START + 15 * MINUTE + SECOND;
    expect((await limiter.check(request)).allowed).toBe(true);
    expect(store.saved).toEqual([]);
  });

  test('lengthens blocks for repeat offenders', async () => {
    limiter = createLimiter(settingsWith({ maxViolationsBeforeBlock: 1 }));
    let decision: RateLimitDecision | undefined;
    for (let cycle = 1; cycle <= 4; cycle++) {
      expect((await limiter.check(login)).allowed).toBe(true);
      decision = await limiter.check(login);
      if (cycle < 4) now += 15 * MINUTE + SECOND;
    }
    expect(decision).toMatchObject({ reason: 'blocked', retryAfter: new Date(now + 30 * MINUTE) });
    expect(store.saved[0].violationCount).toBe(4);
  });

  test('a manual unblock keeps the violation history', async () => {
    limiter = createLimiter(settingsWith({ maxViolationsBeforeBlock: 1 }));
    for (let cycle = 1; cycle <= 3; cycle++) {
      await limiter.check(login);
      await limiter.check(login);
      expect(await limiter.unblock('1.2.3.4')).toBe(true);
    }
    await limiter.check(login);
    const decision = await limiter.check(login);
    expect(decision).toMatchObject({ reason: 'blocked', retryAfter: new Date(START + 30 * MINUTE) });
  });

  test('counts user agents and endpoint limits separately', async () => {
    for (let i = 0; i < 3; i++) await limiter.check(request);
    expect((await limiter.check(request)).allowed).toBe(false);
    expect((await limiter.check({ ...request, userAgent: 'curl' })).allowed).toBe(true);
    expect((await limiter.check(login)).allowed).toBe(true);
  });

  test('never limits a whitelisted IP', async () => {
    for (let i = 0; i < 10; i++) {
      const decision = await limiter.check({ ...request, ip: '10.0.0.9' });
      expect(decision).toMatchObject({ allowed: true, whitelisted: true, remaining: 3 });
    }
    expect(store.saved).toEqual([]);
  });

  test('rejects a configured blacklisted IP outright', async () => {
    const decision = await limiter.check({ ...request, ip: '10.0.0.66' });
    expect(decision).toMatchObject({
      allowed: false,
      reason: 'blacklisted',
      message: 'Your IP address has been blacklisted',
      retryAfter: undefined,
    });
  });

  test('blacklisting at runtime records a long block until removed', async () => {
    await limiter.addToBlacklist('5.6.7.8', 'Scraping', 'root');
    expect(store.saved).toEqual([
      {
        ip: '5.6.7.8',
        blockedAt: new Date(START),
        blockedUntil: new Date(START + 3650 * DAY),
        reason: 'Scraping',
        violationCount: 999,
      },
    ]);
    expect(await limiter.check({ ...request, ip: '5.6.7.8' })).toMatchObject({
      reason: 'blacklisted',
      retryAfter: new Date(START + 3650 * DAY),
    });

    expect(await limiter.removeFromBlacklist('5.6.7.8', 'root')).toBe(true);
    expect(store.saved).toEqual([]);
    expect((await limiter.check({ ...request, ip: '5.6.7.8' })).allowed).toBe(true);
  });

  test('whitelisting lifts an existing block', async () => {
    for (let i = 0; i < 6; i++) await limiter.check(request);
    expect(store.saved).toHaveLength(1);

    await limiter.addToWhitelist('1.2.3.4', 'root');
    expect(store.saved).toEqual([]);
    expect(await limiter.check(request)).toMatchObject({ allowed: true, whitelisted: true });

    expect(limiter.removeFromWhitelist('1.2.3.4')).toBe(true);
    expect(limiter.removeFromWhitelist('1.2.3.4')).toBe(false);
  });

  test('reports status for a client', async () => {
    expect(limiter.getStatus('1.2.3.4', '/api/items', 'jest')).toMatchObject({
      allowed: true,
      currentRequests: 0,
      remainingRequests: 3,
      window: '1 minutes',
      message: 'No recent requests',
    });

    await limiter.check(request);
    now = START + 5 * SECOND;
    await limiter.check(request);
    expect(limiter.getStatus('1.2.3.4', '/api/items', 'jest')).toMatchObject({
      allowed: true,
      blocked: false,
      currentRequests: 2,
      maxRequests: 3,
      remainingRequests: 1,
      resetAt: new Date(START + MINUTE),
      message: '2/3 requests used',
    });
    expect(limiter.getStatus('10.0.0.9', '/')).toMatchObject({ whitelisted: true, message: 'IP is whitelisted' });
    expect(limiter.getStatus('10.0.0.66', '/')).toMatchObject({
      allowed: false,
      blacklisted: true,
      message: 'IP is permanently blacklisted',
    });
  });

  test('reports statistics', async () => {
    await limiter.check({ ...request, ip: '9.9.9.9' });
    for (let i = 0; i < 6; i++) await limiter.check(request);

    expect(limiter.getStatistics()).toEqual({
      trackedClients: 1,
      blockedIps: 1,
      whitelistedIps: 1,
      blacklistedIps: 1,
      totalViolations: 3,
    });
    expect(limiter.getBlockedIps().map((record) => record.ip)).toEqual(['1.2.3.4']);
  });

  test('sweeps idle windows and expired blocks', async () => {
    await limiter.check({ ...request, ip: '9.9.9.9' });
    for (let i = 0; i < 6; i++) await limiter.check(request);

    now = START + HOUR + SECOND;
    expect(limiter.sweepInactiveClients()).toBe(1);
    expect(await limiter.sweepExpiredBlocks()).toEqual(['1.2.3.4']);
    expect(limiter.getStatistics()).toMatchObject({ trackedClients: 0, blockedIps: 0, totalViolations: 3 });
  });

  test('start restores live blocks and their violation counts', async () => {
    const persisted = new InMemoryBlockRecordStore([
      {
        ip: '1.2.3.4',
        blockedAt: new Date(START - MINUTE),
        blockedUntil: new Date(START + MINUTE),
        reason: 'Rate limit exceeded 1 times on /api/login',
        violationCount: 10,
      },
      {
        ip: '8.8.8.8',
        blockedAt: new Date(START - DAY),
        blockedUntil: new Date(START - HOUR),
        reason: 'old',
        violationCount: 2,
      },
    ]);
    limiter = createLimiter(settingsWith({ maxViolationsBeforeBlock: 1 }), persisted);
    await limiter.start();

    expect((await limiter.check(login)).allowed).toBe(false);
    expect(limiter.getBlockedIps().map((record) => record.ip)).toEqual(['1.2.3.4']);

    now = START + 2 * MINUTE;
    await limiter.check(login);
    const decision = await limiter.check(login);
    expect(decision).toMatchObject({ reason: 'blocked', retryAfter: new Date(now + 6 * HOUR) });
  });
});
