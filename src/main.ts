/**
 * Main Entry Point
 *
 * Builds the application from server.config.ts, starts listening and installs
 * the shutdown and crash handlers.
 *
 * @module main
 */
import path from 'path';
import process from 'process';
import { config } from './config/server.config';
import { App, createApp } from './app';
import { Logger, ConsoleTransport, PrettyFormatter, FileTransport } from './utils/logger';

// console plus a startup log file
const logger = new Logger({
  transports: [
    new ConsoleTransport({
      formatter: new PrettyFormatter({
        useBoxes: false,
        useColors: true,
        showTimestamp: false,
        indent: 3,
        arrayLengthLimit: 15,
        objectKeysLimit: 10,
        maxDepth: 4,
        stringLengthLimit: 300,
      }),
    }),
    new FileTransport({
      filename: path.join(config.logging.logDir, 'startup.log'),
      formatter: new PrettyFormatter({
        useColors: false,
        useBoxes: false,
        showTimestamp: true,
      }),
    }),
  ],
});

async function startApplication(): Promise<void> {
  try {
    logger.info('Starting gateway server', {
      environment: process.env.NODE_ENV || 'development',
      timestamp: new Date().toISOString(),
      nodeVersion: process.version,
    });
    logger.info('Server configuration loaded', {
      port: config.port,
      host: config.host,
      maxBodySizeMb: config.maxBodySizeMb,
      trustProxyHeaders: config.trustProxyHeaders,
      endpointLimits: config.rateLimit.endpointLimits.length,
    });

    const app = createApp(config);
    logger.info('Routes registered', { routes: app.registry.getRegisteredRoutes() });

    await app.start();
    logger.success('Server started successfully', { port: config.port });

    setupGracefulShutdown(app);
  } catch (error) {
    logger.error('Failed to start server', {
      error: error instanceof Error ? { message: error.message, stack: error.stack } : String(error),
    });
    await logger.close();
    process.exit(1);
  }
}

function setupGracefulShutdown(app: App): void {
  let stopping = false;
  const shutdown = async (): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info('Shutting down server gracefully...');
    try {
      await app.stop();
      logger.info('Server stopped successfully');
      await logger.close();
      process.exit(0);
    } catch (error) {
      logger.error('Error during server shutdown', {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', {
      error: { message: error.message, stack: error.stack },
    });
    shutdown().catch(() => process.exit(1));
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled promise rejection', {
      reason: reason instanceof Error ? { message: reason.message, stack: reason.stack } : String(reason),
    });
  });
}

void startApplication();
