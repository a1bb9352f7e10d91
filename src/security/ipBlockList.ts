/**
 * Temporary IP blocks, persisted so they survive a restart.
 *
 * The in-memory map is the source of truth while running. Every mutation
 * schedules a save of the whole list; saves go through a single-slot queue so
 * the file always ends up with the most recent snapshot.
 *
 * @module security/ipBlockList
 */
import { promises as fs } from 'fs';
import path from 'path';
import pLimit from 'p-limit';
import { z } from 'zod';
import logger, { Logger } from '../utils/logger';
import { errorMessage } from '../entities/errors';
import { Clock, systemClock } from '../utils/clock';

export interface BlockRecord {
  ip: string;
  blockedAt: Date;
  blockedUntil: Date;
  reason: string;
  violationCount: number;
}

export interface BlockRecordStore {
  load(): Promise<BlockRecord[]>;
  save(records: BlockRecord[]): Promise<void>;
}

const storedRecordSchema = z.object({
  ip: z.string().min(1),
  blockedAt: z.coerce.date(),
  blockedUntil: z.coerce.date(),
  reason: z.string().default(''),
  violationCount: z.number().int().nonnegative().default(0),
});

/**
 * JSON array of records with ISO timestamps. A missing file is an empty list;
 * entries that fail validation are skipped with a warning.
 */
export class JsonFileBlockRecordStore implements BlockRecordStore {
  private readonly writeQueue = pLimit(1);

  constructor(
    private readonly filePath: string,
    private readonly log: Logger = logger,
  ) {}

  async load(): Promise<BlockRecord[]> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      throw err;
    }
    if (text.trim() === '') return [];

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (err) {
      this.log.warn('Block list file is not valid JSON, ignoring it', {
        file: this.filePath,
        error: errorMessage(err),
      });
      return [];
    }
    if (!Array.isArray(data)) {
      this.log.warn('Block list file does not hold an array, ignoring it', { file: this.filePath });
      return [];
    }
    const records: BlockRecord[] = [];
    data.forEach((entry: unknown, index) => {
      const parsed = storedRecordSchema.safeParse(entry);
      if (parsed.success) {
        records.push(parsed.data);
      } else {
        this.log.warn('Skipping invalid block record', {
          file: this.filePath,
          index,
          issues: parsed.error.issues.map((issue) => issue.message),
        });
      }
    });
    return records;
  }

  save(records: BlockRecord[]): Promise<void> {
    const body = JSON.stringify(
      records.map((record) => ({
        ip: record.ip,
        blockedAt: record.blockedAt.toISOString(),
        blockedUntil: record.blockedUntil.toISOString(),
        reason: record.reason,
        violationCount: record.violationCount,
      })),
      null,
      2,
    );
    return this.writeQueue(async () => {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, body, 'utf8');
    });
  }
}

/** Keeps records in memory only; used when no file is configured and in tests. */
export class InMemoryBlockRecordStore implements BlockRecordStore {
  saved: BlockRecord[] = [];
  saveCount = 0;

  constructor(initial: BlockRecord[] = []) {
    this.saved = initial.map((record) => ({ ...record }));
  }

  async load(): Promise<BlockRecord[]> {
    return this.saved.map((record) => ({ ...record }));
  }

  async save(records: BlockRecord[]): Promise<void> {
    this.saveCount++;
    this.saved = records.map((record) => ({ ...record }));
  }
}

export class IpBlockList {
  private readonly records = new Map<string, BlockRecord>();

  constructor(
    private readonly store: BlockRecordStore,
    private readonly clock: Clock = systemClock,
    private readonly log: Logger = logger,
  ) {}

  /**
   * Replaces the in-memory list with the stored records that have not expired.
   * @returns the records kept
   */
  async load(): Promise<BlockRecord[]> {
    const now = this.clock.now();
    const stored = await this.store.load();
    this.records.clear();
    for (const record of stored) {
      if (record.blockedUntil.getTime() > now) this.records.set(record.ip, record);
    }
    const dropped = stored.length - this.records.size;
    this.log.info('Block list loaded', { active: this.records.size, expiredDropped: dropped });
    return this.list();
  }

  /**
   * The live block for an IP. An expired block is removed on the way out.
   */
  async active(ip: string): Promise<BlockRecord | undefined> {
    const record = this.records.get(ip);
    if (!record) return undefined;
    if (record.blockedUntil.getTime() > this.clock.now()) return record;
    this.records.delete(ip);
    await this.persist();
    return undefined;
  }

  get(ip: string): BlockRecord | undefined {
    return this.records.get(ip);
  }

  async block(record: BlockRecord): Promise<void> {
    this.records.set(record.ip, record);
    await this.persist();
  }

  /** @returns whether a block was lifted */
  async unblock(ip: string): Promise<boolean> {
    if (!this.records.delete(ip)) return false;
    await this.persist();
    return true;
  }

  /** @returns the IPs whose blocks had expired */
  async removeExpired(): Promise<string[]> {
    const now = this.clock.now();
    // copy first; the map may change while the save is pending
    const expired = [...this.records.values()]
      .filter((record) => record.blockedUntil.getTime() <= now)
      .map((record) => record.ip);
    if (expired.length === 0) return expired;
    for (const ip of expired) this.records.delete(ip);
    await this.persist();
    return expired;
  }

  list(): BlockRecord[] {
    return [...this.records.values()];
  }

  get size(): number {
    return this.records.size;
  }

  private async persist(): Promise<void> {
    try {
      await this.store.save(this.list());
    } catch (err) {
      this.log.error('Failed to persist block list', { error: errorMessage(err) });
    }
  }
}
