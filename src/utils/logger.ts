// logger.ts - modular, level-based logging with pluggable transports and formatters

import fs from 'fs';
import path from 'path';
import chalk from 'chalk';
import boxen from 'boxen';
import { Writable } from 'stream';
import { formatDate } from './dateFormatter';
import { config } from '../config/server.config';

// --- Configuration ---

const standardLevels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  verbose: 4,
  debug: 5,
  silly: 6,
};

export type LogLevel = keyof typeof standardLevels | 'success';
export type LogMeta = Record<string, unknown>;

// --- Interfaces ---

export interface LogEntry {
  level: string;
  message: string | object;
  meta?: LogMeta;
  timestamp: Date;
}

export interface Formatter {
  format(entry: LogEntry): string;
}

export interface Transport {
  log(formattedMessage: string, entry: LogEntry): void;
  level?: string;
  close?(): Promise<void>;
  formatter: Formatter;
}

// --- Formatters ---

export class JsonFormatter implements Formatter {
  format(entry: LogEntry): string {
    let messageValue: unknown = entry.message;
    let metaObj: LogMeta | undefined = entry.meta;
    if (entry.message instanceof Error) {
      messageValue = entry.message.message;
      metaObj = { ...entry.meta, name: entry.message.name, stack: entry.message.stack };
    }
    const logObject = {
      level: entry.level,
      message: messageValue,
      timestamp: formatDate(entry.timestamp),
      ...(metaObj && Object.keys(metaObj).length > 0 ? { meta: metaObj } : {}),
    };
    try {
      return JSON.stringify(logObject, (_key, value: unknown) =>
        typeof value === 'bigint' ? value.toString() : value,
      );
    } catch (error) {
      return JSON.stringify({
        level: entry.level,
        message: `[Unserializable Object: ${error instanceof Error ? error.message : String(error)}]`,
        timestamp: formatDate(entry.timestamp),
      });
    }
  }
}

type LevelStyle = { color: (s: string) => string; icon: string; colorName: string };

/**
 * PrettyFormatter renders entries as colored, optionally boxed text.
 *
 * @example
 * const formatter = new PrettyFormatter({ useBoxes: true, showTimestamp: true });
 * console.log(formatter.format({ level: 'error', message: 'Fatal', meta: {}, timestamp: new Date() }));
 *
 * @remarks
 * Options: useColors (default true), useBoxes (false), maxDepth (3), indent (2),
 * stringLengthLimit (150), arrayLengthLimit (5), objectKeysLimit (5), showTimestamp (false).
 */
export class PrettyFormatter implements Formatter {
  private readonly options: {
    useColors: boolean;
    useBoxes: boolean;
    maxDepth: number;
    indent: number;
    stringLengthLimit: number;
    arrayLengthLimit: number;
    objectKeysLimit: number;
    showTimestamp: boolean;
  };

  private static LEVEL_STYLES: Record<string, LevelStyle> = {
    error: { color: chalk.red, icon: '✖', colorName: 'red' },
    warn: { color: chalk.yellow, icon: '⚠', colorName: 'yellow' },
    info: { color: chalk.blueBright, icon: 'ℹ', colorName: 'blueBright' },
    success: { color: chalk.green, icon: '✔', colorName: 'green' },
    http: { color: chalk.magenta, icon: '↔', colorName: 'magenta' },
    verbose: { color: chalk.gray, icon: ' V ', colorName: 'gray' },
    debug: { color: chalk.cyan, icon: ' D ', colorName: 'cyan' },
    silly: { color: chalk.white, icon: ' S ', colorName: 'white' },
    default: { color: chalk.white, icon: ' ', colorName: 'white' },
  };

  constructor(options: Partial<PrettyFormatter['options']> = {}) {
    this.options = {
      useColors: options.useColors ?? true,
      useBoxes: options.useBoxes ?? false,
      maxDepth: options.maxDepth ?? 3,
      indent: options.indent ?? 2,
      stringLengthLimit: options.stringLengthLimit ?? 150,
      arrayLengthLimit: options.arrayLengthLimit ?? 5,
      objectKeysLimit: options.objectKeysLimit ?? 5,
      showTimestamp: options.showTimestamp ?? false,
    };
  }

  private highlightSemantics(str: string): string {
    if (!this.options.useColors) return str;
    return str
      .replace(/\b(error|exception|fail(?:ed)?|warn(?:ing)?|critical|fatal)\b/gi, chalk.bgRed.white('$1'))
      .replace(/\b(\d{1,3}(?:\.\d{1,3}){3})\b/g, chalk.underline.cyan('$1')) // IPv4 addresses
      .replace(/\b(GET|POST|PUT|PATCH|DELETE|OPTIONS|HEAD)\b/g, chalk.bold('$1'));
  }

  private formatValue(value: unknown, level = 0): string {
    const pad = ' '.repeat(this.options.indent * level);
    const colorize = this.options.useColors;
    const paint = (fn: (s: string) => string, s: string) => (colorize ? fn(s) : s);

    if (level > this.options.maxDepth) {
      if (Array.isArray(value)) return paint(chalk.gray, '[Array]');
      if (typeof value === 'object' && value !== null) return paint(chalk.gray, '[Object]');
      return paint(chalk.gray, '...');
    }

    if (value === null) return paint(chalk.gray, 'null');
    if (value === undefined) return paint(chalk.gray, 'undefined');
    if (typeof value === 'string') {
      const truncated =
        value.length > this.options.stringLengthLimit
          ? value.slice(0, this.options.stringLengthLimit) + '...'
          : value;
      return paint(chalk.yellowBright, this.highlightSemantics(JSON.stringify(truncated).slice(1, -1)));
    }
    if (typeof value === 'number' || typeof value === 'bigint') {
      return paint(chalk.green, typeof value === 'bigint' ? `${value}n` : value.toString());
    }
    if (typeof value === 'boolean') return paint(chalk.magenta, value.toString());
    if (typeof value === 'function') return paint(chalk.blueBright, '[Function]');
    if (value instanceof Date) return paint(chalk.greenBright, formatDate(value));
    if (value instanceof Error) {
      const stack = value.stack ? `\n${value.stack.split('\n').slice(1).join('\n')}` : '';
      return paint(chalk.redBright, `${value.name}: ${value.message}${stack}`);
    }

    if (Array.isArray(value)) {
      if (value.length === 0) return '[]';
      const max = this.options.arrayLengthLimit;
      const shown = value.slice(0, max).map((item) => pad + '  ' + this.formatValue(item, level + 1));
      if (value.length > max) {
        shown.push(pad + '  ' + paint(chalk.gray, `... ${value.length - max} more item(s)`));
      }
      return `[\n${shown.join(',\n')}\n${pad}]`;
    }

    if (typeof value === 'object') {
      const entries = Object.entries(value);
      if (entries.length === 0) return '{}';
      const max = this.options.objectKeysLimit;
      const shown = entries
        .slice(0, max)
        .map(
          ([key, item]) =>
            `${pad}  ${paint(chalk.cyanBright, `"${key}"`)}: ${this.formatValue(item, level + 1)}`,
        );
      if (entries.length > max) {
        shown.push(pad + '  ' + paint(chalk.gray, `... ${entries.length - max} more key(s)`));
      }
      return `{\n${shown.join(',\n')}\n${pad}}`;
    }

    return paint(chalk.white, String(value));
  }

  format(entry: LogEntry): string {
    const { level, message, meta, timestamp } = entry;
    const style = PrettyFormatter.LEVEL_STYLES[level] ?? PrettyFormatter.LEVEL_STYLES.default;
    let formattedMessage: string;
    if (typeof message === 'string') {
      formattedMessage = message;
    } else if (message instanceof Error) {
      formattedMessage = this.formatValue(message);
    } else {
      formattedMessage = JSON.stringify(message);
    }
    const metaBlock = meta && Object.keys(meta).length > 0 ? '\n' + this.formatValue(meta, 1) : '';
    const timestampStr = this.options.showTimestamp ? `[${formatDate(timestamp)}] ` : '';
    const finalMessage = `${timestampStr}${style.icon} ${level.toUpperCase()} ${formattedMessage}${metaBlock}`;
    if (this.options.useBoxes && this.options.useColors) {
      return boxen(finalMessage, {
        padding: 1,
        margin: { top: 0, bottom: 1, left: 0, right: 0 },
        borderColor: style.colorName,
      });
    }
    return this.options.useColors ? style.color(finalMessage) : finalMessage;
  }
}

// --- Transports ---

export class ConsoleTransport implements Transport {
  public formatter: Formatter;
  public level?: string;

  constructor(options: { formatter?: Formatter; level?: string } = {}) {
    this.formatter = options.formatter ?? new PrettyFormatter({ useColors: true, useBoxes: false });
    this.level = options.level;
  }

  log(formattedMessage: string, entry: LogEntry): void {
    if (entry.level === 'error') {
      console.error(formattedMessage);
    } else if (entry.level === 'warn') {
      console.warn(formattedMessage);
    } else {
      console.log(formattedMessage);
    }
  }
}

export class FileTransport implements Transport {
  public formatter: Formatter;
  public level?: string;
  private stream?: Writable;
  private readonly filename: string;

  constructor(options: { filename: string; formatter?: Formatter; level?: string }) {
    this.filename = options.filename;
    this.formatter = options.formatter ?? new JsonFormatter();
    this.level = options.level;
  }

  // opened on first write so that importing the logger never touches the disk
  private open(): Writable | undefined {
    if (this.stream) return this.stream;
    try {
      fs.mkdirSync(path.dirname(this.filename), { recursive: true });
      const stream = fs.createWriteStream(this.filename, { flags: 'a' });
      stream.on('error', (err) => {
        console.error(`Error writing to log file ${this.filename}:`, err);
      });
      this.stream = stream;
    } catch (err) {
      console.error(`Failed to create log stream for ${this.filename}:`, err);
    }
    return this.stream;
  }

  log(formattedMessage: string): void {
    this.open()?.write(formattedMessage + '\n');
  }

  close(): Promise<void> {
    const stream = this.stream;
    if (!stream) return Promise.resolve();
    this.stream = undefined;
    return new Promise<void>((resolve) => stream.end(() => resolve()));
  }
}

// --- Logger Core ---

export interface LoggerOptions {
  level?: string;
  transports?: Transport[];
  metadata?: LogMeta;
}

/**
 * Logger provides structured, level-based logging with support for multiple transports
 * and scoped child loggers.
 *
 * @example
 * ```ts
 * const log = new Logger({ level: 'debug' });
 * log.info('Server started', { port: 3000 });
 * const reqLog = log.child({ requestId });
 * reqLog.warn('Rate limit exceeded', { clientIp });
 * ```
 */
export class Logger {
  private readonly level: string;
  private readonly levels: Record<string, number> = { ...standardLevels, success: standardLevels.info };
  private readonly transports: Transport[];
  private readonly metadata: LogMeta;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.transports = options.transports ?? [
      new ConsoleTransport({ formatter: new PrettyFormatter({ useColors: true }) }),
    ];
    this.metadata = options.metadata ?? {};
  }

  error(message: string | object, meta?: LogMeta): void {
    this.log('error', message, meta);
  }

  warn(message: string | object, meta?: LogMeta): void {
    this.log('warn', message, meta);
  }

  info(message: string | object, meta?: LogMeta): void {
    this.log('info', message, meta);
  }

  http(message: string | object, meta?: LogMeta): void {
    this.log('http', message, meta);
  }

  verbose(message: string | object, meta?: LogMeta): void {
    this.log('verbose', message, meta);
  }

  debug(message: string | object, meta?: LogMeta): void {
    this.log('debug', message, meta);
  }

  silly(message: string | object, meta?: LogMeta): void {
    this.log('silly', message, meta);
  }

  success(message: string | object, meta?: LogMeta): void {
    this.log('success', message, meta);
  }

  /**
   * Emits a log entry at the given level, subject to logger and transport thresholds.
   * Unknown levels are reported on stderr and dropped.
   */
  log(level: string, message: string | object, meta?: LogMeta): void {
    const levelValue = this.levels[level];
    if (levelValue === undefined) {
      console.warn(`Attempted to log with unknown level: "${level}"`);
      return;
    }
    const configuredLevelValue = this.levels[this.level] ?? standardLevels.info;
    if (levelValue > configuredLevelValue) return;

    const entry: LogEntry = {
      level,
      message,
      meta: { ...this.metadata, ...meta },
      timestamp: new Date(),
    };

    for (const transport of this.transports) {
      const transportLevelValue =
        transport.level !== undefined ? this.levels[transport.level] ?? configuredLevelValue : configuredLevelValue;
      if (levelValue > transportLevelValue) continue;
      try {
        transport.log(transport.formatter.format(entry), entry);
      } catch (err) {
        console.error(`Error in transport ${transport.constructor.name}:`, err);
      }
    }
  }

  /**
   * Creates a child logger sharing this logger's transports, with extra metadata
   * merged into every entry.
   */
  child(metadata: LogMeta): Logger {
    return new Logger({
      level: this.level,
      transports: this.transports,
      metadata: { ...this.metadata, ...metadata },
    });
  }

  /**
   * Flushes and closes every transport.
   */
  async close(): Promise<void> {
    await Promise.all(this.transports.map((transport) => transport.close?.()));
  }
}

// --- Default Export ---

const sharedAppLogTransport = new FileTransport({
  filename: path.join(config.logging.logDir, 'app.log'),
  formatter: new PrettyFormatter({
    useColors: false,
    showTimestamp: true,
    maxDepth: 4,
    stringLengthLimit: 300,
    arrayLengthLimit: 15,
  }),
  level: 'silly',
});

const defaultLogger = new Logger({
  level: config.logging.level,
  transports: [
    new ConsoleTransport({
      formatter: new PrettyFormatter({ useColors: true, useBoxes: process.env.LOG_BOXES === 'true' }),
      level: process.env.CONSOLE_LOG_LEVEL || undefined,
    }),
    sharedAppLogTransport,
  ],
});

export default defaultLogger;
export { standardLevels };
