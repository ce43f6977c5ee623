/**
 * Provider Factory
 *
 * Registry of provider adapters with environment-based auto-detection.
 * Adapters register themselves when imported (see providers/index.ts).
 */

import { ErrorCategory, ProviderError } from '../errors/index.js';
import type { ProviderSettings } from '../config/schema.js';
import { createComponentLogger } from '../integrations/utilities/logger.js';
import type { LLMProvider, ProviderConfig } from './types.js';

const log = createComponentLogger('ProviderFactory');

// =============================================================================
// PROVIDER REGISTRY
// =============================================================================

export interface ProviderRegistration {
  detect: (env: NodeJS.ProcessEnv) => boolean;
  create: (settings: Partial<ProviderSettings>, env: NodeJS.ProcessEnv) => Promise<LLMProvider>;
  /** Lower = higher priority */
  priority: number;
}

const providers: Map<string, ProviderRegistration> = new Map();

export function registerProvider(name: string, registration: ProviderRegistration): void {
  providers.set(name, registration);
}

// =============================================================================
// PROVIDER FACTORY
// =============================================================================

/**
 * Resolve a provider from settings.
 *
 * An explicit `type` must be configured (an API key in settings or the
 * environment). `auto` takes the first configured provider by priority:
 * anthropic, openai, then mock as the fallback that is always available.
 */
export async function getProvider(
  settings: Partial<ProviderSettings> = {},
  env: NodeJS.ProcessEnv = process.env,
): Promise<LLMProvider> {
  const preferred = settings.type && settings.type !== 'auto' ? settings.type : undefined;

  if (preferred) {
    const registration = providers.get(preferred);
    if (!registration) {
      throw new ProviderError(
        `Unknown provider "${preferred}"`,
        ErrorCategory.PERMANENT,
        false,
        preferred,
      );
    }
    if (settings.apiKey || registration.detect(env)) {
      return registration.create(settings, env);
    }
    throw ProviderError.notConfigured(preferred, 'API key');
  }

  const sorted = [...providers.entries()].sort((a, b) => a[1].priority - b[1].priority);

  for (const [name, registration] of sorted) {
    if (registration.detect(env)) {
      log.info(`Using provider: ${name}`);
      return registration.create(settings, env);
    }
  }

  throw ProviderError.notConfigured('provider', 'ANTHROPIC_API_KEY or OPENAI_API_KEY');
}

/**
 * Create a provider from explicit configuration, bypassing detection.
 */
export async function createProvider(config: ProviderConfig): Promise<LLMProvider> {
  switch (config.type) {
    case 'anthropic': {
      const { AnthropicProvider } = await import('./adapters/anthropic.js');
      return new AnthropicProvider(config.config);
    }
    case 'openai': {
      const { OpenAIProvider } = await import('./adapters/openai.js');
      return new OpenAIProvider(config.config);
    }
    case 'mock': {
      const { MockProvider } = await import('./adapters/mock.js');
      return new MockProvider(config.config);
    }
  }
}

export function listProviders(
  env: NodeJS.ProcessEnv = process.env,
): Array<{ name: string; configured: boolean; priority: number }> {
  return [...providers.entries()]
    .map(([name, registration]) => ({
      name,
      configured: registration.detect(env),
      priority: registration.priority,
    }))
    .sort((a, b) => a.priority - b.priority);
}

// =============================================================================
// HELPERS FOR ADAPTER REGISTRATION
// =============================================================================

/**
 * Check if an environment variable is set and non-empty.
 */
export function hasEnv(key: string, env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env[key];
  return value !== undefined && value.trim() !== '';
}

/**
 * Get environment variable or throw.
 */
export function requireEnv(key: string, env: NodeJS.ProcessEnv = process.env): string {
  const value = env[key];
  if (value === undefined || value.trim() === '') {
    throw ProviderError.notConfigured(key.split('_')[0].toLowerCase(), key);
  }
  return value;
}
