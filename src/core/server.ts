import { createServer, Socket, Server } from 'net';
import os from 'os';

import { HttpRequestParser, MAX_HEADER_BYTES } from './httpParser';
import { DispatchResult, payloadTooLargeBody } from './dispatcher';
import { IncomingRequest } from '../entities/http';
import { errorMessage } from '../entities/errors';
import { sendResponse } from '../entities/sendResponse';
import { toJson, JSON_CONTENT_TYPE } from './responseWriter';
import defaultLogger, { Logger } from '../utils/logger';

/** Anything that can answer one parsed request on a socket. */
export interface RequestHandler {
  dispatch(req: IncomingRequest, socket: Socket): Promise<DispatchResult>;
}

export interface ConnectionLimits {
  maxBodyBytes: number;
  headerTimeoutMs: number;
  bodyTimeoutMs: number;
}

export interface HttpServerOptions extends ConnectionLimits {
  port: number;
  host: string;
  maxConnectionsPerIp: number;
  handler: RequestHandler;
  logger?: Logger;
}

const CLOSE_TEXT_HEADERS = { 'Content-Type': 'text/plain', Connection: 'close' };

/**
 * One accepted TCP connection: feeds socket chunks to the parser, hands each
 * complete request to the handler in arrival order and enforces the header,
 * idle-body and raw byte limits.
 */
export class ClientConnection {
  private readonly parser: HttpRequestParser;
  private queue: Promise<void> = Promise.resolve();
  private bytesSinceRequest = 0;
  private closed = false;
  private headerTimer?: NodeJS.Timeout;
  private bodyTimer?: NodeJS.Timeout;

  constructor(
    private readonly socket: Socket,
    private readonly handler: RequestHandler,
    private readonly limits: ConnectionLimits,
    private readonly log: Logger = defaultLogger,
  ) {
    this.parser = new HttpRequestParser({ maxBodyBytes: limits.maxBodyBytes });
  }

  start(): void {
    this.headerTimer = setTimeout(() => this.onHeaderTimeout(), this.limits.headerTimeoutMs);
    this.headerTimer.unref();

    this.socket.on('data', (chunk: Buffer) => {
      this.receive(chunk).catch((err: unknown) => {
        this.log.error('Failed request:', {
          error: errorMessage(err),
          remoteAddress: this.socket.remoteAddress,
        });
        this.close();
      });
    });
    this.socket.once('close', () => this.clearTimers());
    this.socket.on('error', (err: NodeJS.ErrnoException) => {
      this.log.error('Socket error:', {
        error: err.message,
        code: err.code,
        remoteAddress: this.socket.remoteAddress,
      });
      // nothing can be written on a reset or broken pipe
      if (err.code !== 'ECONNRESET' && err.code !== 'EPIPE' && !this.socket.destroyed) {
        this.socket.end();
      }
    });
  }

  /** Chunks are processed one at a time, in the order they arrived. */
  receive(chunk: Buffer): Promise<void> {
    this.queue = this.queue.then(() => this.process(chunk));
    return this.queue;
  }

  private async process(chunk: Buffer): Promise<void> {
    if (this.closed || this.socket.destroyed) return;
    if (this.headerTimer) {
      clearTimeout(this.headerTimer);
      this.headerTimer = undefined;
    }

    this.bytesSinceRequest += chunk.length;
    // a request whose Content-Length under-reports its body is caught here
    if (this.bytesSinceRequest > this.limits.maxBodyBytes + MAX_HEADER_BYTES) {
      this.log.warn('Payload too large: closing connection', {
        remoteAddress: this.socket.remoteAddress,
        bytesReceived: this.bytesSinceRequest,
        maxAllowed: this.limits.maxBodyBytes,
      });
      sendResponse(
        this.socket,
        413,
        { 'Content-Type': JSON_CONTENT_TYPE, Connection: 'close' },
        toJson(payloadTooLargeBody(this.limits.maxBodyBytes, this.bytesSinceRequest)),
      );
      this.closed = true;
      this.clearTimers();
      return;
    }

    let req = this.parser.feed(chunk);
    while (req) {
      this.bytesSinceRequest = this.parser.getPendingBytes();
      this.clearBodyTimer();

      if (req.invalid) {
        this.log.warn('Rejecting malformed request', {
          error: req.error,
          remoteAddress: this.socket.remoteAddress,
        });
        sendResponse(this.socket, 400, CLOSE_TEXT_HEADERS, 'Bad Request');
        this.closed = true;
        return;
      }

      const result = await this.handler.dispatch(req, this.socket);
      if (!result.keepAlive) {
        this.close();
        return;
      }
      req = this.parser.feed(Buffer.alloc(0));
    }

    if (this.parser.getPendingBytes() > 0) this.refreshBodyTimer();
  }

  private onHeaderTimeout(): void {
    this.headerTimer = undefined;
    if (this.socket.destroyed) return;
    this.log.warn('Header timeout, closing socket', { remoteAddress: this.socket.remoteAddress });
    sendResponse(this.socket, 408, CLOSE_TEXT_HEADERS, 'Request Timeout');
    this.closed = true;
  }

  private refreshBodyTimer(): void {
    this.clearBodyTimer();
    this.bodyTimer = setTimeout(() => {
      this.log.warn('Closing idle socket (body timeout)', {
        remoteAddress: this.socket.remoteAddress,
        pendingBytes: this.parser.getPendingBytes(),
      });
      this.close();
    }, this.limits.bodyTimeoutMs);
    this.bodyTimer.unref();
  }

  private clearBodyTimer(): void {
    if (this.bodyTimer) clearTimeout(this.bodyTimer);
    this.bodyTimer = undefined;
  }

  private clearTimers(): void {
    if (this.headerTimer) clearTimeout(this.headerTimer);
    this.headerTimer = undefined;
    this.clearBodyTimer();
  }

  close(): void {
    this.closed = true;
    this.clearTimers();
    if (!this.socket.destroyed) this.socket.end();
  }
}

export class HttpServer {
  private readonly server: Server;
  // track connections per IP
  private readonly ipConnectionCounts = new Map<string, number>();
  private readonly connections = new Set<Socket>();
  private readonly log: Logger;

  constructor(private readonly options: HttpServerOptions) {
    this.log = options.logger ?? defaultLogger;
    this.server = createServer((socket) => this.handleConnection(socket));
    this.server.on('error', (err: NodeJS.ErrnoException) => {
      this.log.error('Server error:', { error: err.message, code: err.code, stack: err.stack });
    });
  }

  public get activeConnections(): number {
    return this.connections.size;
  }

  /** Accepts a socket, or answers 429 when its address already holds too many. */
  public handleConnection(socket: Socket): void {
    const ip = socket.remoteAddress ?? '';
    const current = this.ipConnectionCounts.get(ip) ?? 0;
    if (current >= this.options.maxConnectionsPerIp) {
      this.log.warn('Connection limit reached for address', { remoteAddress: ip, current });
      sendResponse(socket, 429, CLOSE_TEXT_HEADERS, 'Too Many Connections');
      return;
    }
    this.ipConnectionCounts.set(ip, current + 1);
    this.connections.add(socket);

    socket.once('close', () => {
      this.connections.delete(socket);
      const count = this.ipConnectionCounts.get(ip) ?? 1;
      if (count <= 1) this.ipConnectionCounts.delete(ip);
      else this.ipConnectionCounts.set(ip, count - 1);
      this.log.debug('Socket closed', {
        remoteAddress: ip,
        remainingConnections: this.connections.size,
      });
    });

    new ClientConnection(socket, this.options.handler, this.options, this.log).start();
    this.log.debug('New connection established.', {
      remoteAddress: ip,
      activeConnections: this.connections.size,
    });
  }

  private getNetworkUrls(): { local: string[]; network: string[] } {
    const { port } = this.options;
    const addresses: { local: string[]; network: string[] } = {
      local: [`http://localhost:${port}`],
      network: [],
    };
    const interfaces = os.networkInterfaces();
    for (const entries of Object.values(interfaces)) {
      for (const info of entries ?? []) {
        if (info.family === 'IPv4' && !info.internal) {
          addresses.network.push(`http://${info.address}:${port}`);
        }
      }
    }
    return addresses;
  }

  public start(): Promise<Server> {
    return new Promise((resolve, reject) => {
      this.server.once('listening', () => {
        const urls = this.getNetworkUrls();
        this.log.info(`🚀 Server started successfully on port ${this.options.port}`);
        this.log.info('Local URLs:');
        urls.local.forEach((url) => this.log.info(`  - \x1b[36m${url}\x1b[0m`));
        if (urls.network.length > 0) {
          this.log.info('Network URLs (for access from other devices):');
          urls.network.forEach((url) => this.log.info(`  - \x1b[36m${url}\x1b[0m`));
        } else {
          this.log.info('No network URLs available (not connected to any networks)');
        }
        resolve(this.server);
      });
      this.server.once('error', reject);
      this.server.listen(this.options.port, this.options.host);
    });
  }

  /**
   * Gracefully shuts down the server and every open TCP socket.
   */
  public async stop(): Promise<void> {
    this.log.info('🛑  Shutting down HTTP server');

    const socketClosePromises = Array.from(this.connections).map(
      (sock) =>
        new Promise<void>((resolve) => {
          sock.once('close', () => resolve());
          sock.destroy();
        }),
    );
    let timeoutId: NodeJS.Timeout | undefined;
    await Promise.race([
      Promise.all(socketClosePromises),
      new Promise<void>((resolve) => {
        timeoutId = setTimeout(resolve, 100);
      }),
    ]);
    if (timeoutId) clearTimeout(timeoutId);

    if (!this.server.listening) return;
    return new Promise<void>((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.log.warn('Server close operation timed out');
        resolve();
      }, 3000);
      this.server.close((err) => {
        clearTimeout(timeout);
        if (err) {
          this.log.error('Error closing server:', { error: err.message });
          reject(err);
        } else {
          this.log.info('Server closed successfully');
          resolve();
        }
      });
    });
  }
}
