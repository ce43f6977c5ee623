/**
 * Provider entry point. Importing this module registers every adapter.
 */

import './adapters/anthropic.js';
import './adapters/openai.js';
import './adapters/mock.js';

import type { ProviderSettings } from '../config/schema.js';
import { getProvider } from './provider.js';
import { ProviderTextGenerator } from './text-generator.js';

export { getProvider, createProvider, listProviders, registerProvider, hasEnv, requireEnv } from './provider.js';
export { ProviderTextGenerator, FixedResponseGenerator } from './text-generator.js';
export type { FixedResponse, GenerateCall } from './text-generator.js';
export type * from './types.js';

/**
 * Resolve the configured provider and wrap it as a TextGenerator.
 */
export async function createTextGenerator(
  settings: Partial<ProviderSettings> = {},
  env: NodeJS.ProcessEnv = process.env,
): Promise<ProviderTextGenerator> {
  return new ProviderTextGenerator(await getProvider(settings, env));
}
