// Process-level error handlers and graceful shutdown

import type { Server } from 'http';
import { logger } from '@/services/logger';
import { errorMessage } from '@/utils/errors';

type CleanupTask = () => Promise<void>;

const SHUTDOWN_TIMEOUT_MS = 15000;

let serverInstance: Server | null = null;
const cleanupTasks: CleanupTask[] = [];
let shuttingDown = false;

export function setServerInstance(server: Server): void {
  serverInstance = server;
}

/** Runs on shutdown after the HTTP server stops accepting connections (Redis, pools). */
export function onShutdown(task: CleanupTask): void {
  cleanupTasks.push(task);
}

export function setupUnhandledRejectionHandler(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('process:unhandled_rejection', {
      error: errorMessage(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
    // Development exits for faster debugging; production logs and keeps serving.
    if (process.env.NODE_ENV !== 'production') {
      process.exit(1);
    }
  });
}

export function setupUncaughtExceptionHandler(): void {
  process.on('uncaughtException', (error: Error) => {
    logger.fatal('process:uncaught_exception', { error: error.message, stack: error.stack });
    void gracefulShutdown('uncaughtException', 1);
  });
}

export function setupGracefulShutdown(): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
  signals.forEach((signal) => {
    process.on(signal, () => {
      logger.info('process:signal', { signal });
      void gracefulShutdown(signal, 0);
    });
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve) => {
    server.close((err) => {
      if (err) logger.warn('http:close_failed', { error: err.message });
      else logger.info('http:closed');
      resolve();
    });
  });
}

async function gracefulShutdown(reason: string, exitCode: number): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info('process:shutdown', { reason });

  const forced = setTimeout(() => {
    logger.error('process:shutdown_timeout', { afterMs: SHUTDOWN_TIMEOUT_MS });
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  forced.unref();

  try {
    if (serverInstance) await closeServer(serverInstance);
    for (const task of cleanupTasks) await task();
    clearTimeout(forced);
    process.exit(exitCode);
  } catch (error) {
    logger.error('process:shutdown_failed', { error: errorMessage(error) });
    clearTimeout(forced);
    process.exit(1);
  }
}
