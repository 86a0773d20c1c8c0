// node/src/stability/errorHandlers.ts — process-level error handlers and graceful shutdown
import type { Server } from 'http';
import { logger } from '@/services/logger';
import { errorMessage } from '@/utils/errors';

const SHUTDOWN_GRACE_MS = 15_000;

type Cleanup = () => Promise<void>;

let serverInstance: Server | null = null;
let cleanup: Cleanup | null = null;
let shuttingDown = false;

export function setServerInstance(server: Server, onShutdown?: Cleanup): void {
  serverInstance = server;
  cleanup = onShutdown ?? null;
}

export function setupUnhandledRejectionHandler(nodeEnv: string): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('process:unhandled_rejection', {
      error: errorMessage(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
    // Production keeps serving; elsewhere fail fast
    if (nodeEnv !== 'production') {
      void gracefulShutdown('unhandledRejection', 1);
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
  for (const signal of signals) {
    process.on(signal, () => {
      void gracefulShutdown(signal, 0);
    });
  }
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

async function gracefulShutdown(reason: string, exitCode: number): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info('process:shutdown', { reason });

  const forced = setTimeout(() => {
    logger.error('process:shutdown_forced', { afterMs: SHUTDOWN_GRACE_MS });
    process.exit(1);
  }, SHUTDOWN_GRACE_MS);
  forced.unref();

  try {
    if (serverInstance) await closeServer(serverInstance);
    if (cleanup) await cleanup();
    logger.info('process:shutdown_complete');
    process.exit(exitCode);
  } catch (err) {
    logger.error('process:shutdown_failed', { error: errorMessage(err) });
    process.exit(1);
  }
}
