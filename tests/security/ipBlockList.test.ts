import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import {
  BlockRecord,
  BlockRecordStore,
  InMemoryBlockRecordStore,
  IpBlockList,
  JsonFileBlockRecordStore,
} from '../../src/security/ipBlockList';
import logger from '../../src/utils/logger';

jest.mock('../../src/utils/logger');

const START = Date.UTC(2024, 0, 15, 9, 0, 0);
const MINUTE = 60_000;

function record(ip: string, untilOffsetMs: number, overrides: Partial<BlockRecord> = {}): BlockRecord {
  return {
    ip,
    blockedAt: new Date(START - MINUTE),
    blockedUntil: new Date(START + untilOffsetMs),
    reason: 'Rate limit exceeded 3 times on *',
    violationCount: 3,
    ...overrides,
  };
}

describe('JsonFileBlockRecordStore', () => {
  let dir: string;

  beforeEach(() => {
    jest.clearAllMocks();
    dir = mkdtempSync(path.join(os.tmpdir(), 'blocklist-test-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('a missing or empty file is an empty list', async () => {
    const file = path.join(dir, 'blocked.json');
    await expect(new JsonFileBlockRecordStore(file).load()).resolves.toEqual([]);
    writeFileSync(file, '  \n');
    await expect(new JsonFileBlockRecordStore(file).load()).resolves.toEqual([]);
  });

  test('invalid JSON is ignored with a warning', async () => {
    const file = path.join(dir, 'blocked.json');
    writeFileSync(file, '{not json');
    await expect(new JsonFileBlockRecordStore(file).load()).resolves.toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(
      'Block list file is not valid JSON, ignoring it',
      expect.objectContaining({ file }),
    );
  });

  test('a document that is not an array is ignored', async () => {
    const file = path.join(dir, 'blocked.json');
    writeFileSync(file, '{"ip":"1.2.3.4"}');
    await expect(new JsonFileBlockRecordStore(file).load()).resolves.toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith('Block list file does not hold an array, ignoring it', { file });
  });

  test('skips invalid entries and fills defaults', async () => {
    const file = path.join(dir, 'blocked.json');
    writeFileSync(
      file,
      JSON.stringify([
        { ip: '1.2.3.4', blockedAt: '2024-01-15T08:59:00.000Z', blockedUntil: '2024-01-15T09:15:00.000Z' },
        { ip: '', blockedAt: '2024-01-15T08:59:00.000Z', blockedUntil: '2024-01-15T09:15:00.000Z' },
      ]),
    );
    const records = await new JsonFileBlockRecordStore(file).load();
    expect(records).toEqual([
      {
        ip: '1.2.3.4',
        blockedAt: new Date('2024-01-15T08:59:00.000Z'),
        blockedUntil: new Date('2024-01-15T09:15:00.000Z'),
        reason: '',
        violationCount: 0,
      },
    ]);
    expect(logger.warn).toHaveBeenCalledWith('Skipping invalid block record', expect.objectContaining({ index: 1 }));
  });

  test('saves ISO timestamps and reads them back', async () => {
    const file = path.join(dir, 'nested', 'blocked.json');
    const store = new JsonFileBlockRecordStore(file);
    await store.save([record('1.2.3.4', 15 * MINUTE)]);

    const written: unknown = JSON.parse(readFileSync(file, 'utf8'));
    expect(written).toEqual([
      {
        ip: '1.2.3.4',
        blockedAt: '2024-01-15T08:59:00.000Z',
        blockedUntil: '2024-01-15T09:15:00.000Z',
        reason: 'Rate limit exceeded 3 times on *',
        violationCount: 3,
      },
    ]);
    await expect(store.load()).resolves.toEqual([record('1.2.3.4', 15 * MINUTE)]);
  });

  test('the last of several concurrent saves wins', async () => {
    const file = path.join(dir, 'blocked.json');
    const store = new JsonFileBlockRecordStore(file);
    await Promise.all([
      store.save([record('1.1.1.1', MINUTE)]),
      store.save([record('2.2.2.2', MINUTE)]),
    ]);
    const records = await store.load();
    expect(records.map((entry) => entry.ip)).toEqual(['2.2.2.2']);
  });
});

describe('IpBlockList', () => {
  let now: number;
  const clock = { now: () => now };

  beforeEach(() => {
    jest.clearAllMocks();
    now = START;
  });

  test('load keeps only live blocks', async () => {
    const store = new InMemoryBlockRecordStore([record('1.1.1.1', MINUTE), record('2.2.2.2', -MINUTE)]);
    const list = new IpBlockList(store, clock);
    const kept = await list.load();
    expect(kept.map((entry) => entry.ip)).toEqual(['1.1.1.1']);
    expect(list.size).toBe(1);
    expect(logger.info).toHaveBeenCalledWith('Block list loaded', { active: 1, expiredDropped: 1 });
  });

  test('active removes a block once it has expired', async () => {
    const store = new InMemoryBlockRecordStore();
    const list = new IpBlockList(store, clock);
    await list.block(record('1.1.1.1', MINUTE));
    expect(await list.active('1.1.1.1')).toEqual(record('1.1.1.1', MINUTE));

    now = START + MINUTE;
    expect(await list.active('1.1.1.1')).toBeUndefined();
    expect(list.get('1.1.1.1')).toBeUndefined();
    expect(store.saved).toEqual([]);
    expect(store.saveCount).toBe(2);
  });

  test('unblock reports whether anything was lifted', async () => {
    const store = new InMemoryBlockRecordStore();
    const list = new IpBlockList(store, clock);
    await list.block(record('1.1.1.1', MINUTE));
    await expect(list.unblock('1.1.1.1')).resolves.toBe(true);
    await expect(list.unblock('1.1.1.1')).resolves.toBe(false);
    expect(store.saveCount).toBe(2);
  });

  test('removeExpired returns the IPs it dropped', async () => {
    const store = new InMemoryBlockRecordStore();
    const list = new IpBlockList(store, clock);
    await list.block(record('1.1.1.1', MINUTE));
    await list.block(record('2.2.2.2', 10 * MINUTE));

    now = START + 5 * MINUTE;
    await expect(list.removeExpired()).resolves.toEqual(['1.1.1.1']);
    expect(store.saved.map((entry) => entry.ip)).toEqual(['2.2.2.2']);
    await expect(list.removeExpired()).resolves.toEqual([]);
    expect(store.saveCount).toBe(3);
  });

  test('a failed save is logged and the block still applies', async () => {
    const failing: BlockRecordStore = {
      load: () => Promise.resolve([]),
      save: () => Promise.reject(new Error('disk full')),
    };
    const list = new IpBlockList(failing, clock);
    await list.block(record('1.1.1.1', MINUTE));
    expect(list.get('1.1.1.1')?.ip).toBe('1.1.1.1');
    expect(logger.error).toHaveBeenCalledWith('Failed to persist block list', { error: 'disk full' });
  });
});
