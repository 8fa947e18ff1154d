import { logger } from '../shared/logger';
import { ConflictError } from '../middleware/error-handler';

export interface ClaimOptions {
  maxAttempts: number;
  /** Error code raised when every attempt lost its race. */
  conflictCode: string;
  conflictMessage: string;
}

/**
 * Bounded compare-and-swap loop.
 *
 * `claim` recomputes its target and tries to take it, resolving `null` when
 * another writer got there first. Errors thrown by `claim` propagate as-is.
 */
export async function claimWithRetry<T>(
  claim: (attempt: number) => Promise<T | null>,
  options: ClaimOptions,
): Promise<T> {
  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    const claimed = await claim(attempt);
    if (claimed !== null) return claimed;
    logger.warn({ attempt, maxAttempts: options.maxAttempts }, 'Claim lost to a concurrent writer');
  }
  throw new ConflictError(options.conflictMessage, options.conflictCode, { attempts: options.maxAttempts });
}
