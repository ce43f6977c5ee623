/**
 * Pieces shared by the HTTP provider adapters: status-code mapping and
 * response-body validation.
 */

import type { z } from 'zod';
import { ErrorCategory, ProviderError, isCancellationError } from '../../errors/index.js';
import { createComponentLogger } from '../../integrations/utilities/logger.js';
import type { NetworkConfig } from '../resilient-fetch.js';
import type { HttpProviderConfig } from '../types.js';

const log = createComponentLogger('ProviderHttp');

export function networkConfigFrom(config: HttpProviderConfig, defaultTimeout: number): NetworkConfig {
  return {
    timeout: config.timeoutMs ?? defaultTimeout,
    maxRetries: config.maxRetries ?? 2,
    baseRetryDelay: 1000,
  };
}

export function logRetry(providerName: string) {
  return (attempt: number, delay: number, error: Error): void => {
    log.warn('Retrying provider request', {
      provider: providerName,
      attempt,
      delayMs: Math.round(delay),
      error: error.message,
    });
  };
}

/**
 * Map a non-OK HTTP response to a ProviderError.
 */
export function handleHttpError(providerName: string, status: number, body: string): ProviderError {
  if (status === 401 || status === 403) {
    return ProviderError.authenticationFailed(providerName, status);
  }
  if (status === 429) {
    return ProviderError.rateLimited(providerName);
  }
  if (status >= 500) {
    return ProviderError.serverError(providerName, status, body.slice(0, 200));
  }
  return new ProviderError(
    `${providerName} rejected the request (${status}): ${body.slice(0, 200)}`,
    ErrorCategory.PERMANENT,
    false,
    providerName,
    status,
  );
}

/**
 * Validate a JSON response body against the adapter's schema.
 */
export async function parseJsonBody<T>(
  providerName: string,
  response: Response,
  schema: z.ZodType<T>,
): Promise<T> {
  const raw: unknown = await response.json();
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ProviderError(
      `${providerName} returned an unexpected response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`,
      ErrorCategory.DEPENDENCY,
      false,
      providerName,
      response.status,
    );
  }
  return parsed.data;
}

export function wrapTransportError(providerName: string, error: unknown): Error {
  if (error instanceof ProviderError) return error;
  if (isCancellationError(error)) return error;
  const cause = error instanceof Error ? error : new Error(String(error));
  return new ProviderError(
    `${providerName} request failed: ${cause.message}`,
    ErrorCategory.TRANSIENT,
    true,
    providerName,
    undefined,
    cause,
  );
}
