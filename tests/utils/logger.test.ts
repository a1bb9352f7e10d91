import { mkdtempSync, readFileSync, rmSync } from 'fs';
import os from 'os';
import path from 'path';
import {
  ConsoleTransport,
  FileTransport,
  JsonFormatter,
  LogEntry,
  Logger,
  PrettyFormatter,
  Transport,
} from '../../src/utils/logger';
import { formatDate } from '../../src/utils/dateFormatter';

jest.mock('../../src/utils/dateFormatter', () => ({
  formatDate: jest.fn(() => 'May 04, 2025 01:56:21 PM UTC'),
}));

const STAMP = 'May 04, 2025 01:56:21 PM UTC';
const testDate = new Date('2025-05-04T13:56:21.990Z');

class MemoryTransport implements Transport {
  readonly entries: LogEntry[] = [];
  formatter = new JsonFormatter();

  constructor(public level?: string) {}

  log(_formatted: string, entry: LogEntry): void {
    this.entries.push(entry);
  }
}

describe('Logger', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  test('drops entries above the configured level', () => {
    const transport = new MemoryTransport();
    const log = new Logger({ level: 'info', transports: [transport] });
    log.debug('hidden');
    log.info('shown');
    log.success('done');
    log.error('bad');
    expect(transport.entries.map((entry) => entry.level)).toEqual(['info', 'success', 'error']);
  });

  test('applies each transport threshold', () => {
    const everything = new MemoryTransport();
    const errorsOnly = new MemoryTransport('error');
    const log = new Logger({ level: 'debug', transports: [everything, errorsOnly] });
    log.debug('details');
    log.error('failure');
    expect(everything.entries.map((entry) => entry.message)).toEqual(['details', 'failure']);
    expect(errorsOnly.entries.map((entry) => entry.message)).toEqual(['failure']);
  });

  test('child loggers merge their metadata into every entry', () => {
    const transport = new MemoryTransport();
    const log = new Logger({ transports: [transport], metadata: { service: 'gateway' } });
    log.child({ requestId: 'req-1' }).warn('slow', { durationMs: 12 });
    expect(transport.entries[0].meta).toEqual({ service: 'gateway', requestId: 'req-1', durationMs: 12 });
  });

  test('reports an unknown level instead of logging it', () => {
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation();
    const transport = new MemoryTransport();
    new Logger({ transports: [transport] }).log('loud', 'nope');
    expect(warnSpy).toHaveBeenCalledWith('Attempted to log with unknown level: "loud"');
    expect(transport.entries).toEqual([]);
    warnSpy.mockRestore();
  });

  test('a failing transport does not stop the others', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation();
    const broken: Transport = {
      formatter: new JsonFormatter(),
      log: () => {
        throw new Error('disk full');
      },
    };
    const healthy = new MemoryTransport();
    new Logger({ transports: [broken, healthy] }).info('still here');
    expect(healthy.entries).toHaveLength(1);
    expect(errorSpy).toHaveBeenCalled();
    errorSpy.mockRestore();
  });
});

describe('JsonFormatter', () => {
  const formatter = new JsonFormatter();

  test('formats timestamps using the human-readable format', () => {
    const formatted = formatter.format({ level: 'info', message: 'Test message', timestamp: testDate, meta: { test: 'data' } });
    expect(formatDate).toHaveBeenCalledWith(testDate);
    expect(formatted).toBe(`{"level":"info","message":"Test message","timestamp":"${STAMP}","meta":{"test":"data"}}`);
  });

  test('omits empty metadata and writes bigints as strings', () => {
    expect(formatter.format({ level: 'info', message: 'x', timestamp: testDate, meta: {} })).toBe(
      `{"level":"info","message":"x","timestamp":"${STAMP}"}`,
    );
    expect(formatter.format({ level: 'info', message: 'x', timestamp: testDate, meta: { n: BigInt(5) } })).toContain(
      '"meta":{"n":"5"}',
    );
  });

  test('unpacks errors into message, name and stack', () => {
    const parsed = JSON.parse(formatter.format({ level: 'error', message: new Error('boom'), timestamp: testDate }));
    expect(parsed.message).toBe('boom');
    expect(parsed.meta.name).toBe('Error');
    expect(typeof parsed.meta.stack).toBe('string');
  });

  test('falls back when the entry cannot be serialized', () => {
    const circular: Record<string, unknown> = {};
    circular.self = circular;
    const parsed = JSON.parse(formatter.format({ level: 'error', message: circular, timestamp: testDate }));
    expect(parsed.level).toBe('error');
    expect(parsed.timestamp).toBe(STAMP);
    expect(parsed.message).toMatch(/^\[Unserializable Object: /);
  });
});

describe('PrettyFormatter', () => {
  test('renders level icon, name and message without colors', () => {
    const formatter = new PrettyFormatter({ useColors: false });
    expect(formatter.format({ level: 'warn', message: 'Careful', timestamp: testDate })).toBe('⚠ WARN Careful');
  });

  test('prefixes the human-readable timestamp when asked', () => {
    const formatter = new PrettyFormatter({ useColors: false, showTimestamp: true });
    expect(formatter.format({ level: 'info', message: 'Test message', timestamp: testDate })).toBe(
      `[${STAMP}] ℹ INFO Test message`,
    );
  });

  test('renders metadata as an indented block', () => {
    const formatter = new PrettyFormatter({ useColors: false });
    expect(formatter.format({ level: 'info', message: 'Started', timestamp: testDate, meta: { port: 80 } })).toBe(
      'ℹ INFO Started\n{\n    "port": 80\n  }',
    );
  });

  test('truncates long strings and long arrays', () => {
    const formatter = new PrettyFormatter({ useColors: false, stringLengthLimit: 5, arrayLengthLimit: 1 });
    const formatted = formatter.format({
      level: 'debug',
      message: 'm',
      timestamp: testDate,
      meta: { note: 'abcdefgh', list: [1, 2, 3] },
    });
    expect(formatted).toContain('"note": abcde...');
    expect(formatted).toContain('... 2 more item(s)');
  });
});

describe('transports', () => {
  test('ConsoleTransport writes errors and warnings to their own streams', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation();
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation();
    const logSpy = jest.spyOn(console, 'log').mockImplementation();
    const transport = new ConsoleTransport();

    transport.log('e', { level: 'error', message: 'e', timestamp: testDate });
    transport.log('w', { level: 'warn', message: 'w', timestamp: testDate });
    transport.log('i', { level: 'info', message: 'i', timestamp: testDate });

    expect(errorSpy).toHaveBeenCalledWith('e');
    expect(warnSpy).toHaveBeenCalledWith('w');
    expect(logSpy).toHaveBeenCalledWith('i');
    errorSpy.mockRestore();
    warnSpy.mockRestore();
    logSpy.mockRestore();
  });

  test('FileTransport creates the directory and appends lines', async () => {
    const dir = mkdtempSync(path.join(os.tmpdir(), 'logger-test-'));
    const filename = path.join(dir, 'nested', 'app.log');
    const transport = new FileTransport({ filename });

    transport.log('first');
    transport.log('second');
    await transport.close();

    expect(readFileSync(filename, 'utf8')).toBe('first\nsecond\n');
    rmSync(dir, { recursive: true, force: true });
  });
});
