// Manual Jest mock for src/utils/logger.ts
// Activated in a test file with: jest.mock('../../src/utils/logger')

import type { LogEntry, LogMeta } from '../logger';

type LogFn = jest.Mock<void, [string | object, LogMeta?]>;

export interface MockLogger {
  info: LogFn;
  error: LogFn;
  warn: LogFn;
  debug: LogFn;
  http: LogFn;
  verbose: LogFn;
  silly: LogFn;
  success: LogFn;
  log: jest.Mock<void, [string, string | object, LogMeta?]>;
  child: jest.Mock<MockLogger, [LogMeta]>;
  close: jest.Mock<Promise<void>, []>;
}

function createMockLogger(): MockLogger {
  const mock: MockLogger = {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
    http: jest.fn(),
    verbose: jest.fn(),
    silly: jest.fn(),
    success: jest.fn(),
    log: jest.fn(),
    child: jest.fn(),
    close: jest.fn(() => Promise.resolve()),
  };
  // child loggers chain back to the same instance so assertions see every call
  mock.child.mockImplementation(() => mock);
  return mock;
}

const mockLogger = createMockLogger();

export class Logger {
  info = mockLogger.info;
  error = mockLogger.error;
  warn = mockLogger.warn;
  debug = mockLogger.debug;
  http = mockLogger.http;
  verbose = mockLogger.verbose;
  silly = mockLogger.silly;
  success = mockLogger.success;
  log = mockLogger.log;
  child = mockLogger.child;
  close = mockLogger.close;
}

export class JsonFormatter {
  format = jest.fn((entry: LogEntry) => JSON.stringify({ level: entry.level }));
}

export class PrettyFormatter {
  format = jest.fn((entry: LogEntry) => `${entry.level}`);
}

export class ConsoleTransport {
  formatter = new PrettyFormatter();
  log = jest.fn();
  close = jest.fn(() => Promise.resolve());
}

export class FileTransport {
  formatter = new JsonFormatter();
  log = jest.fn();
  close = jest.fn(() => Promise.resolve());
}

export const standardLevels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  verbose: 4,
  debug: 5,
  silly: 6,
};

export default mockLogger;
