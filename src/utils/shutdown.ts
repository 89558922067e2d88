import { FoundryRuntime } from '../runtime/FoundryRuntime.js';
import { createLogger, errorMessage } from '../common/logger.js';

const logger = createLogger('Shutdown');

const SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Shut the runtime down on SIGINT/SIGTERM
 * @returns A function that removes the hooks again
 */
export function registerShutdownHooks(runtime: FoundryRuntime): () => void {
  const cleanup = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, starting graceful shutdown`);
    try {
      await runtime.shutdown();
    } catch (error) {
      logger.warn('Error during runtime shutdown', { error: errorMessage(error) });
      process.exitCode = 1;
    } finally {
      // Process managers decide when to exit
      logger.info('Cleanup complete');
    }
  };

  const handler = (signal: NodeJS.Signals): void => {
    void cleanup(signal);
  };

  for (const signal of SIGNALS) {
    process.on(signal, handler);
  }

  return () => {
    for (const signal of SIGNALS) {
      process.off(signal, handler);
    }
  };
}
