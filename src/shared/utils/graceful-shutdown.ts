import { logger } from './logger';

const shutdownLogger = logger.child('shutdown');

export interface GracefulShutdownOptions {
  timeoutMs?: number;
  signals?: NodeJS.Signals[];
  exit?: (code: number) => void;
}

/**
 * Runs `cleanup` once on the first termination signal, then exits. A second
 * signal or an expired timeout forces exit with status 1.
 *
 * Returns a function that removes the installed signal handlers.
 */
export function gracefulShutdown(cleanup: () => Promise<void>, options: GracefulShutdownOptions = {}): () => void {
  const timeoutMs = options.timeoutMs ?? 30000;
  const signals = options.signals ?? ['SIGTERM', 'SIGINT', 'SIGUSR2'];
  const exit = options.exit ?? ((code: number) => process.exit(code));
  let shuttingDown = false;

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      shutdownLogger.warn(`Received ${signal} during shutdown, forcing exit`);
      exit(1);
      return;
    }
    shuttingDown = true;
    shutdownLogger.info(`Received ${signal}, stopping`);

    const forceExit = setTimeout(() => {
      shutdownLogger.error(`Shutdown did not finish within ${timeoutMs}ms, forcing exit`);
      exit(1);
    }, timeoutMs);
    forceExit.unref();

    let code = 0;
    try {
      await cleanup();
      shutdownLogger.info('Shutdown completed');
    } catch (error) {
      shutdownLogger.error('Shutdown failed:', error);
      code = 1;
    } finally {
      clearTimeout(forceExit);
    }
    exit(code);
  };

  const handlers = new Map<NodeJS.Signals, () => void>();
  for (const signal of signals) {
    const handler = (): void => {
      void shutdown(signal);
    };
    handlers.set(signal, handler);
    process.on(signal, handler);
  }

  return () => {
    for (const [signal, handler] of handlers) {
      process.removeListener(signal, handler);
    }
  };
}
