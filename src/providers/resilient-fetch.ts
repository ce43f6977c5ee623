/**
 * Resilient Fetch Utility
 *
 * Network policy for the HTTP provider adapters:
 * - per-attempt timeout
 * - retry with exponential backoff for transient failures
 * - 429 handling with Retry-After parsing
 * - request cancellation through the pipeline's CancellationToken
 */

import { CancellationError, ErrorCategory, ProviderError } from '../errors/index.js';
import { sleep, type CancellationToken } from '../integrations/cancellation.js';

// =============================================================================
// TYPES
// =============================================================================

export interface NetworkConfig {
  /** Per-attempt timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Retries after the first attempt (default: 2) */
  maxRetries?: number;
  /** Base delay between retries in ms (default: 1000) */
  baseRetryDelay?: number;
  /** Maximum delay between retries in ms (default: 30000) */
  maxRetryDelay?: number;
  /** HTTP status codes that trigger retry */
  retryableStatusCodes?: number[];
  /** Extra retries granted to HTTP 429 */
  maxRetriesFor429?: number;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ResilientFetchOptions {
  url: string;
  init: RequestInit;
  /** Provider name for error messages */
  providerName: string;
  networkConfig?: NetworkConfig;
  cancellationToken?: CancellationToken;
  /** Callback for retry events */
  onRetry?: (attempt: number, delay: number, error: Error) => void;
  /** Defaults to the global fetch */
  fetchImpl?: FetchLike;
}

export interface ResilientFetchResult {
  response: Response;
  attempts: number;
  /** Total duration in milliseconds */
  duration: number;
}

// =============================================================================
// DEFAULT CONFIG
// =============================================================================

const DEFAULT_CONFIG: Required<NetworkConfig> = {
  timeout: 30000,
  maxRetries: 2,
  baseRetryDelay: 1000,
  maxRetryDelay: 30000,
  retryableStatusCodes: [429, 500, 502, 503, 504],
  maxRetriesFor429: 2,
};

// =============================================================================
// RESILIENT FETCH
// =============================================================================

/**
 * Fetch with timeout, retry and cancellation. Non-retryable HTTP errors are
 * returned to the caller as responses; exhausted retries throw ProviderError.
 */
export async function resilientFetch(options: ResilientFetchOptions): Promise<ResilientFetchResult> {
  const {
    url,
    init,
    providerName,
    networkConfig = {},
    cancellationToken,
    onRetry,
    fetchImpl = fetch,
  } = options;

  const config: Required<NetworkConfig> = { ...DEFAULT_CONFIG, ...networkConfig };
  const startTime = Date.now();
  let attempts = 0;

  for (;;) {
    attempts++;
    cancellationToken?.throwIfCancellationRequested();

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, config.timeout);
    const registration = cancellationToken?.register(() => controller.abort());

    let retryError: Error;
    let delay: number;
    let budget = config.maxRetries;

    try {
      const response = await fetchImpl(url, { ...init, signal: controller.signal });

      if (!config.retryableStatusCodes.includes(response.status)) {
        return { response, attempts, duration: Date.now() - startTime };
      }

      const is429 = response.status === 429;
      if (is429) budget += config.maxRetriesFor429;
      retryError = new Error(`HTTP ${response.status}: ${response.statusText}`);
      delay =
        parseRetryAfter(response.headers.get('Retry-After')) ??
        calculateBackoff(attempts, config, is429 ? 3 : 2);

      if (attempts > budget) {
        throw is429
          ? ProviderError.rateLimited(providerName)
          : ProviderError.serverError(providerName, response.status, `after ${attempts} attempts`);
      }
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      if (cancellationToken?.isCancellationRequested) {
        throw new CancellationError(cancellationToken.cancellationReason);
      }

      retryError = timedOut
        ? new Error(`Request timeout after ${config.timeout}ms`)
        : error instanceof Error
          ? error
          : new Error(String(error));
      delay = calculateBackoff(attempts, config, 2);

      if (attempts > budget) {
        throw new ProviderError(
          `${providerName} request failed after ${attempts} attempts: ${retryError.message}`,
          ErrorCategory.TRANSIENT,
          true,
          providerName,
          undefined,
          retryError,
        );
      }
    } finally {
      clearTimeout(timeoutId);
      registration?.dispose();
    }

    onRetry?.(attempts, delay, retryError);
    await sleep(delay, cancellationToken);
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Parse a Retry-After header: seconds or an HTTP-date.
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | null {
  if (!header) return null;

  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }

  const date = Date.parse(header);
  if (Number.isNaN(date)) return null;
  const delay = date - now;
  return delay > 0 ? delay : null;
}

/**
 * Exponential backoff with ±25% jitter. 429s use base 3 for a steeper curve.
 */
export function calculateBackoff(
  attempt: number,
  config: Pick<Required<NetworkConfig>, 'baseRetryDelay' | 'maxRetryDelay'>,
  base: number,
  random: () => number = Math.random,
): number {
  const exponentialDelay = config.baseRetryDelay * Math.pow(base, attempt - 1);
  const jitter = exponentialDelay * 0.25 * (random() * 2 - 1);
  return Math.min(exponentialDelay + jitter, config.maxRetryDelay);
}
