import { FetchError } from '../errors';
import { withRetry } from '../utils/retry';
import { logger } from '../utils/logger';

const USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36';

export type FetchOutcome =
  | { ok: true; url: string; status: number; html: string }
  | { ok: false; url: string; error: FetchError };

/** Anything that turns a URL into a page outcome. Tests inject an in-memory one. */
export type PageFetcher = (url: string) => Promise<FetchOutcome>;

export interface FetchOptions {
  timeoutMs: number;
  maxRetries?: number;
  retryDelayMs?: number;
}

function isAbort(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

async function requestOnce(url: string, timeoutMs: number): Promise<{ status: number; html: string }> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: { 'User-Agent': USER_AGENT },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    if (isAbort(err)) {
      throw new FetchError(`Timeout after ${timeoutMs}ms: ${url}`, 'timeout', url);
    }
    const cause = err instanceof Error && err.cause instanceof Error ? `: ${err.cause.message}` : '';
    const message = err instanceof Error ? err.message : String(err);
    throw new FetchError(`Network error for ${url}: ${message}${cause}`, 'network', url);
  }

  if (response.status < 200 || response.status >= 300) {
    // Release the connection; the body of an error page is never read.
    await response.body?.cancel();
    throw new FetchError(`HTTP ${response.status} for ${url}`, 'http', url, response.status);
  }

  try {
    return { status: response.status, html: await response.text() };
  } catch (err) {
    if (isAbort(err)) {
      throw new FetchError(`Timeout after ${timeoutMs}ms: ${url}`, 'timeout', url);
    }
    throw new FetchError(`Network error reading body of ${url}`, 'network', url);
  }
}

/**
 * Single GET of a page. Failures come back as an outcome, never as a throw,
 * so the caller has to decide what a missing page means for its step.
 */
export async function fetchPage(url: string, options: FetchOptions): Promise<FetchOutcome> {
  logger.debug(`GET ${url}`);
  try {
    const { status, html } = await withRetry(
      () => requestOnce(url, options.timeoutMs),
      `GET ${url}`,
      options.maxRetries ?? 0,
      options.retryDelayMs ?? 0,
      // 4xx will not change on a second attempt
      (err) => !(err instanceof FetchError && err.kind === 'http' && (err.status ?? 0) < 500)
    );
    return { ok: true, url, status, html };
  } catch (err) {
    if (err instanceof FetchError) {
      return { ok: false, url, error: err };
    }
    throw err;
  }
}

export function createFetcher(options: FetchOptions): PageFetcher {
  return (url) => fetchPage(url, options);
}
