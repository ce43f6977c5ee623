/**
 * Process Error Handlers and Cleanup Management
 *
 * Graceful shutdown on signals and fatal errors: stop accepting
 * connections, then close the document store.
 */

import { formatErrorForLog } from '../errors/index.js';
import { createComponentLogger } from '../integrations/utilities/logger.js';

const log = createComponentLogger('process');

// =============================================================================
// CLEANUP RESOURCES
// =============================================================================

export interface CleanupResources {
  server?: { close: (callback?: (err?: Error) => void) => unknown };
  store?: { close: () => Promise<void> };
}

let cleanupResources: CleanupResources = {};
let isCleaningUp = false;

function closeServer(server: NonNullable<CleanupResources['server']>): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

/**
 * Release every registered resource, server first.
 * Forces exit if cleanup takes longer than 5 seconds.
 */
export async function gracefulCleanup(reason: string): Promise<void> {
  if (isCleaningUp) {
    return;
  }
  isCleaningUp = true;

  log.info('Starting graceful cleanup', { reason });

  const forceExitTimeout = setTimeout(() => {
    log.error('Cleanup timeout reached, forcing exit');
    process.exit(1);
  }, 5000);

  try {
    if (cleanupResources.server) {
      try {
        await closeServer(cleanupResources.server);
      } catch (err) {
        log.error('Server cleanup error', { error: formatErrorForLog(err) });
      }
    }

    if (cleanupResources.store) {
      try {
        await cleanupResources.store.close();
      } catch (err) {
        log.error('Store cleanup error', { error: formatErrorForLog(err) });
      }
    }

    log.info('Cleanup completed');
  } finally {
    clearTimeout(forceExitTimeout);
  }
}

export function registerCleanupResource<K extends keyof CleanupResources>(
  key: K,
  resource: CleanupResources[K],
): void {
  cleanupResources[key] = resource;
}

/**
 * Reset cleanup state - useful for testing or re-initialization.
 */
export function resetCleanupState(): void {
  cleanupResources = {};
  isCleaningUp = false;
}

// =============================================================================
// PROCESS SIGNAL HANDLERS
// =============================================================================

/**
 * Install process-level handlers. Call once at startup.
 */
export function installProcessHandlers(): void {
  process.on('unhandledRejection', (reason) => {
    log.error('Unhandled promise rejection', { error: formatErrorForLog(reason) });
    void gracefulCleanup('unhandled rejection').finally(() => process.exit(1));
  });

  process.on('uncaughtException', (error, origin) => {
    log.error('Uncaught exception', { origin, error: formatErrorForLog(error) });
    void gracefulCleanup('uncaught exception').finally(() => process.exit(1));
  });

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      log.info('Received signal', { signal });
      void gracefulCleanup(signal).finally(() => process.exit(0));
    });
  }
}
