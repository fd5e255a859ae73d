/**
 * Wait for Services Utility
 *
 * Waits for the storage backend to accept connections before the
 * service starts writing or serving reads.
 */

import { logger } from '../core/logger.js';
import { HEALTH_CHECK } from '../core/constants.js';
import { BackendUnavailableError, toError } from '../errors/index.js';
import type { Backend } from '../db/backend.js';

export interface WaitOptions {
  maxRetries?: number;
  retryDelayMs?: number;
}

/**
 * Pings the backend until it answers
 *
 * @throws BackendUnavailableError after the last failed attempt
 */
export async function waitForBackend(backend: Backend, options: WaitOptions = {}): Promise<void> {
  const maxRetries = Math.max(1, options.maxRetries ?? HEALTH_CHECK.MAX_RETRIES);
  const retryDelayMs = options.retryDelayMs ?? HEALTH_CHECK.RETRY_DELAY_MS;

  logger.info({ backend: backend.kind }, 'Waiting for database to be ready...');

  for (let i = 0; i < maxRetries; i++) {
    try {
      await backend.ping();
      logger.info({ backend: backend.kind }, '✓ Database is ready');
      return;
    } catch (err) {
      if (i < maxRetries - 1) {
        logger.debug({ attempt: i + 1, maxRetries }, 'Database not ready, retrying...');
        await new Promise(resolve => setTimeout(resolve, retryDelayMs));
      } else {
        const error = toError(err);
        throw new BackendUnavailableError(
          `${backend.kind} failed to become ready after ${maxRetries} attempts: ${error.message}`,
          backend.kind,
          error
        );
      }
    }
  }
}
