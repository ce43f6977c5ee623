/**
 * Zod schemas for chatrelay configuration.
 *
 * Validates `~/.config/chatrelay/config.json`, `.chatrelay/config.json` and
 * the environment overrides layered on top. Every field has a default, so an
 * empty object parses to a complete config.
 */

import { z } from 'zod';

// =============================================================================
// SECTION SCHEMAS
// =============================================================================

export const ServerConfigSchema = z
  .object({
    port: z.number().int().min(0).max(65535).default(8000),
    host: z.string().min(1).default('0.0.0.0'),
    /** Bearer token required on POST /chat/stream. Unset disables the check. */
    apiToken: z.string().min(1).optional(),
    corsOrigins: z.array(z.string()).default(['*']),
  })
  .strict();

export const StoreConfigSchema = z
  .object({
    /** SQLite file path, or ':memory:'. Defaults to the XDG data dir. */
    dbPath: z.string().min(1).optional(),
    /** Messages fetched per Executor data subtask */
    findLimit: z.number().int().positive().default(50),
  })
  .strict();

export const ProviderConfigSchema = z
  .object({
    type: z.enum(['auto', 'mock', 'openai', 'anthropic']).default('auto'),
    model: z.string().min(1).optional(),
    apiKey: z.string().min(1).optional(),
    baseUrl: z.string().url().optional(),
    timeoutMs: z.number().int().positive().default(60000),
    maxRetries: z.number().int().nonnegative().default(2),
  })
  .strict();

export const ContextConfigSchema = z
  .object({
    /** K: recent turns placed verbatim in the context */
    recentTurns: z.number().int().positive().default(10),
    /** Estimated-token threshold that triggers re-summarization */
    tokenBudget: z.number().int().positive().default(3000),
    summaryTargetTokens: z.number().int().positive().default(500),
    summarizer: z.enum(['heuristic', 'generative']).default('heuristic'),
  })
  .strict();

export const RelayConfigSchema = z
  .object({
    /** Pacing delay between token events */
    tokenDelayMs: z.number().int().nonnegative().default(50),
  })
  .strict();

export const LoggingConfigSchema = z
  .object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),
    /** Optional JSON-lines log file */
    file: z.string().min(1).optional(),
  })
  .strict();

// =============================================================================
// ROOT SCHEMA
// =============================================================================

export const CONFIG_SECTIONS = {
  server: ServerConfigSchema,
  store: StoreConfigSchema,
  provider: ProviderConfigSchema,
  context: ContextConfigSchema,
  relay: RelayConfigSchema,
  logging: LoggingConfigSchema,
} as const;

export type ConfigSectionName = keyof typeof CONFIG_SECTIONS;

export const CONFIG_SECTION_NAMES: readonly ConfigSectionName[] = [
  'server',
  'store',
  'provider',
  'context',
  'relay',
  'logging',
];

export const AppConfigSchema = z.object({
  server: ServerConfigSchema.default({}),
  store: StoreConfigSchema.default({}),
  provider: ProviderConfigSchema.default({}),
  context: ContextConfigSchema.default({}),
  relay: RelayConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type ProviderSettings = z.infer<typeof ProviderConfigSchema>;
export type ContextConfig = z.infer<typeof ContextConfigSchema>;
export type RelayConfig = z.infer<typeof RelayConfigSchema>;
