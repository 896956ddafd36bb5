import { delay } from './delay';
import { logger } from './logger';
import { errorMessage } from '../errors';

export async function withRetry<T>(
  fn: () => Promise<T>,
  label: string,
  maxRetries: number = 0,
  retryDelayMs: number = 5000,
  shouldRetry: (err: unknown) => boolean = () => true
): Promise<T> {
  let lastError: unknown;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (attempt < maxRetries && shouldRetry(err)) {
        logger.warn(`${label} failed (attempt ${attempt + 1}/${maxRetries + 1}): ${errorMessage(err)}. Retrying in ${retryDelayMs}ms...`);
        await delay(retryDelayMs);
      } else {
        break;
      }
    }
  }
  throw lastError;
}
