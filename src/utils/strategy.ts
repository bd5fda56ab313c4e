import { logger } from './logger.js';
import { errorMessage } from './errors.js';

/**
 * One independent attempt in a strategy list. Resolves true on success.
 */
export interface StrategyAttempt {
  name: string;
  run: () => Promise<boolean>;
}

/**
 * Run attempts in order until one succeeds. A throwing attempt counts as a
 * miss and never stops the list. Returns the name of the winning attempt,
 * or null when none succeeded.
 */
export async function firstSuccessful(attempts: readonly StrategyAttempt[]): Promise<string | null> {
  for (const attempt of attempts) {
    try {
      if (await attempt.run()) {
        return attempt.name;
      }
    } catch (error) {
      logger.debug('Strategy attempt failed', {
        attempt: attempt.name,
        error: errorMessage(error),
      });
    }
  }
  return null;
}
