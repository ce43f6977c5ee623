/**
 * Unified Configuration Loader
 *
 * Loads, merges and validates configuration from the user-level
 * (~/.config/chatrelay/config.json) and project-level (.chatrelay/config.json)
 * files plus environment variables.
 *
 * Priority: defaults ← user ← project ← environment.
 */

import { existsSync, readFileSync } from 'node:fs';
import { getProjectConfigPath, getUserConfigPath } from '../paths.js';
import {
  AppConfigSchema,
  CONFIG_SECTIONS,
  CONFIG_SECTION_NAMES,
  type AppConfig,
  type ConfigSectionName,
} from './schema.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ConfigLoadOptions {
  /** Working directory for locating project config (defaults to process.cwd()) */
  cwd?: string;
  /** Environment to read overrides and XDG paths from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Skip user-level config loading */
  skipUser?: boolean;
  /** Skip project-level config loading */
  skipProject?: boolean;
}

export interface ConfigLoadResult {
  /** Merged and validated config */
  config: AppConfig;
  /** Sources that were checked */
  sources: Array<{ path: string; level: 'user' | 'project' | 'env'; loaded: boolean }>;
  /** Non-fatal validation warnings */
  warnings: string[];
}

type RawConfig = Record<string, unknown>;

// =============================================================================
// DEEP MERGE
// =============================================================================

function isPlainObject(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge two config objects: one level of nested object merge, arrays replace.
 */
export function deepMergeConfigs(base: RawConfig, override: RawConfig): RawConfig {
  const result: RawConfig = { ...base };

  for (const [key, value] of Object.entries(override)) {
    const baseValue = result[key];

    if (isPlainObject(value) && isPlainObject(baseValue)) {
      result[key] = { ...baseValue, ...value };
    } else {
      result[key] = value;
    }
  }

  return result;
}

// =============================================================================
// SOURCES
// =============================================================================

/**
 * Load a JSON config file, returning the parsed object or null.
 * Collects parse errors as warnings.
 */
function loadJsonFile(filePath: string, warnings: string[]): RawConfig | null {
  if (!existsSync(filePath)) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));

    if (!isPlainObject(parsed)) {
      warnings.push(
        `${filePath}: expected a JSON object, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`,
      );
      return null;
    }

    return parsed;
  } catch (err) {
    warnings.push(
      `${filePath}: failed to parse JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
    return null;
  }
}

function envNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

/**
 * Environment overrides, shaped like a config file. Unset variables are omitted.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): RawConfig {
  const sections: Record<ConfigSectionName, RawConfig> = {
    server: {
      port: envNumber(env.CHATRELAY_PORT ?? env.PORT),
      host: env.CHATRELAY_HOST,
      apiToken: env.CHATRELAY_API_TOKEN,
    },
    store: {
      dbPath: env.CHATRELAY_DB_PATH,
    },
    provider: {
      type: env.LLM_PROVIDER,
      model: env.LLM_MODEL,
    },
    context: {},
    relay: {
      tokenDelayMs: envNumber(env.CHATRELAY_TOKEN_DELAY_MS),
    },
    logging: {
      level: env.CHATRELAY_LOG_LEVEL,
      file: env.CHATRELAY_LOG_FILE,
    },
  };

  const result: RawConfig = {};
  for (const [name, section] of Object.entries(sections)) {
    const defined = Object.fromEntries(
      Object.entries(section).filter(([, value]) => value !== undefined),
    );
    if (Object.keys(defined).length > 0) {
      result[name] = defined;
    }
  }
  return result;
}

// =============================================================================
// LOADER
// =============================================================================

/**
 * Validate section by section. A section that fails validation is reported
 * and replaced by its defaults; the others are kept.
 */
export function validateConfig(raw: RawConfig, warnings: string[]): AppConfig {
  const accepted: RawConfig = {};

  for (const [key, value] of Object.entries(raw)) {
    if (!(key in CONFIG_SECTIONS)) {
      warnings.push(`config validation: unknown section "${key}" ignored`);
      continue;
    }
    accepted[key] = value;
  }

  for (const name of CONFIG_SECTION_NAMES) {
    if (!(name in accepted)) continue;
    const section = CONFIG_SECTIONS[name].safeParse(accepted[name]);
    if (!section.success) {
      for (const issue of section.error.issues) {
        const path = [name, ...issue.path].join('.');
        warnings.push(`config validation: ${path}: ${issue.message}`);
      }
      delete accepted[name];
    }
  }

  return AppConfigSchema.parse(accepted);
}

/**
 * Load configuration. Validation problems are collected as warnings and the
 * best-effort config is always returned.
 */
export function loadConfig(options: ConfigLoadOptions = {}): ConfigLoadResult {
  const { cwd, env = process.env, skipUser = false, skipProject = false } = options;
  const warnings: string[] = [];
  const sources: ConfigLoadResult['sources'] = [];

  let merged: RawConfig = {};

  if (!skipUser) {
    const userConfigPath = getUserConfigPath(env);
    const userRaw = loadJsonFile(userConfigPath, warnings);
    sources.push({ path: userConfigPath, level: 'user', loaded: userRaw !== null });
    if (userRaw) merged = deepMergeConfigs(merged, userRaw);
  }

  if (!skipProject) {
    const projectConfigPath = getProjectConfigPath(cwd);
    const projectRaw = loadJsonFile(projectConfigPath, warnings);
    sources.push({ path: projectConfigPath, level: 'project', loaded: projectRaw !== null });
    if (projectRaw) merged = deepMergeConfigs(merged, projectRaw);
  }

  const envRaw = configFromEnv(env);
  sources.push({ path: 'environment', level: 'env', loaded: Object.keys(envRaw).length > 0 });
  merged = deepMergeConfigs(merged, envRaw);

  return { config: validateConfig(merged, warnings), sources, warnings };
}
