/**
 * Audit trail for access-control events. Entries are written as JSON lines to
 * `security.log` and echoed on the application logger.
 */
import path from 'path';
import defaultLogger, { FileTransport, JsonFormatter, LogMeta, Logger } from '../utils/logger';
import { formatWireDate } from '../utils/dateFormatter';

export type SecurityEvent =
  | 'RATE_LIMIT_VIOLATION'
  | 'IP_BLOCKED'
  | 'IP_UNBLOCKED'
  | 'FAILED_LOGIN'
  | 'SUCCESSFUL_LOGIN'
  | 'WHITELIST'
  | 'BLACKLIST';

export class SecurityLogger {
  constructor(
    private readonly sink: Logger,
    private readonly echo: Logger = defaultLogger,
  ) {}

  rateLimitViolation(details: {
    identity: string;
    endpoint: string;
    ip: string;
    currentCount: number;
    maxAllowed: number;
  }): void {
    this.emit('warn', 'RATE_LIMIT_VIOLATION', `Rate limit exceeded by ${details.ip}`, details);
  }

  ipBlocked(ip: string, reason: string, blockedUntil: Date, violationCount: number): void {
    this.emit('error', 'IP_BLOCKED', `IP ${ip} blocked until ${formatWireDate(blockedUntil)}`, {
      ip,
      reason,
      blockedUntil: blockedUntil.toISOString(),
      violationCount,
    });
  }

  ipUnblocked(ip: string, reason: string): void {
    this.emit('info', 'IP_UNBLOCKED', `IP ${ip} unblocked`, { ip, reason });
  }

  failedLogin(user: string, ip: string, endpoint: string): void {
    this.emit('warn', 'FAILED_LOGIN', `Failed login for ${user}`, { user, ip, endpoint });
  }

  successfulLogin(user: string, ip: string, endpoint: string): void {
    this.emit('info', 'SUCCESSFUL_LOGIN', `Login for ${user}`, { user, ip, endpoint });
  }

  whitelistAction(ip: string, action: 'added' | 'removed', performedBy = 'system'): void {
    this.emit('info', 'WHITELIST', `IP ${ip} ${action} (whitelist)`, { ip, action, performedBy });
  }

  blacklistAction(ip: string, action: 'added' | 'removed', performedBy = 'system'): void {
    this.emit('warn', 'BLACKLIST', `IP ${ip} ${action} (blacklist)`, { ip, action, performedBy });
  }

  close(): Promise<void> {
    return this.sink.close();
  }

  private emit(level: 'info' | 'warn' | 'error', event: SecurityEvent, message: string, meta: LogMeta): void {
    const entry = { event, ...meta };
    this.sink.log(level, message, entry);
    this.echo.log(level, `[security] ${message}`, entry);
  }
}

export function createSecurityLogger(logDir: string): SecurityLogger {
  const sink = new Logger({
    level: 'info',
    transports: [
      new FileTransport({ filename: path.join(logDir, 'security.log'), formatter: new JsonFormatter() }),
    ],
    metadata: { channel: 'security' },
  });
  return new SecurityLogger(sink);
}
