/**
 * HTTP fetch with retries for the remote item sources.
 *
 * Retries on 429 (rate limit), 5xx (server errors), network errors and
 * per-attempt timeouts with exponential backoff. Respects Retry-After headers
 * and abort signals.
 */

export interface FetchRetryConfig {
  /** Maximum retry attempts (default: 2). */
  maxRetries?: number;
  /** Initial delay in ms before first retry (default: 1000). */
  initialDelayMs?: number;
  /** Backoff multiplier (default: 2). */
  backoffMultiplier?: number;
  /** Maximum delay cap in ms (default: 15000). */
  maxDelayMs?: number;
  /** Abort a single attempt after this many ms (default: 8000). */
  timeoutMs?: number;
}

const DEFAULT_CONFIG: Required<FetchRetryConfig> = {
  maxRetries: 2,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 15000,
  timeoutMs: 8000,
};

/**
 * Fetch with automatic retry on rate limits, server errors and timeouts.
 * Returns the successful Response or throws after all retries exhausted.
 */
export async function fetchWithRetry(
  url: string,
  init: RequestInit,
  config: FetchRetryConfig = {},
): Promise<Response> {
  const {
    maxRetries = DEFAULT_CONFIG.maxRetries,
    initialDelayMs = DEFAULT_CONFIG.initialDelayMs,
    backoffMultiplier = DEFAULT_CONFIG.backoffMultiplier,
    maxDelayMs = DEFAULT_CONFIG.maxDelayMs,
    timeoutMs = DEFAULT_CONFIG.timeoutMs,
  } = config;
  const signal = init.signal ?? undefined;

  const backoff = (attempt: number): number => {
    const baseDelay = initialDelayMs * Math.pow(backoffMultiplier, attempt);
    const jitter = baseDelay * 0.1 * Math.random();
    return Math.min(baseDelay + jitter, maxDelayMs);
  };

  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      const response = await fetchAttempt(url, init, signal, timeoutMs);

      // Don't retry on success or client errors (except 429)
      if (response.ok) {
        return response;
      }

      const status = response.status;
      const isRetryable = status === 429 || (status >= 500 && status <= 599);

      if (!isRetryable || attempt >= maxRetries) {
        throw new Error(
          `HTTP ${status} ${response.statusText}` +
          (status === 429 ? ' (rate limited)' : '') +
          ` for ${url}`,
        );
      }

      let delay = backoff(attempt);
      const retryAfter = response.headers.get('Retry-After');
      if (retryAfter) {
        const retryAfterSecs = parseInt(retryAfter, 10);
        if (!isNaN(retryAfterSecs)) {
          delay = Math.max(delay, retryAfterSecs * 1000);
        }
      }

      lastError = new Error(`HTTP ${status} ${response.statusText} for ${url}`);
      await sleep(delay, signal);
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw err;
      }

      lastError = err instanceof Error ? err : new Error(String(err));

      const isNetworkError = lastError.message.includes('fetch failed') ||
        lastError.message.includes('ECONNRESET') ||
        lastError.message.includes('ETIMEDOUT') ||
        lastError.message.includes('timed out');

      if (!isNetworkError || attempt >= maxRetries) {
        throw lastError;
      }

      await sleep(backoff(attempt), signal);
    }
  }

  throw lastError ?? new Error('Fetch retry failed');
}

async function fetchAttempt(
  url: string,
  init: RequestInit,
  signal: AbortSignal | undefined,
  timeoutMs: number,
): Promise<Response> {
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = () => controller.abort();

  if (signal?.aborted) {
    clearTimeout(timer);
    throw new DOMException('Aborted', 'AbortError');
  }
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } catch (err) {
    if (timedOut) {
      throw new Error(`Request timed out after ${timeoutMs}ms for ${url}`);
    }
    throw err;
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
  }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new DOMException('Aborted', 'AbortError'));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new DOMException('Aborted', 'AbortError'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
