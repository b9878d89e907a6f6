/**
 * CLI Configuration Management
 *
 * Loads configuration from .alpr-scoutrc (YAML) with environment variable
 * overrides and defaults, and folds it into the engine's SearchEngineConfig.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (ALPR_SCOUT_*)
 * 3. Config file (.alpr-scoutrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  createConfig,
  DEFAULT_CONFIG as ENGINE_DEFAULTS,
  type DeepPartial,
  type SearchEngineConfig,
} from '../../core/config.js';
import { ConfigurationError } from '../../core/errors.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface PathsConfig {
  /** Directory holding the signature files */
  readonly config: string;
  readonly cache: string;
  readonly output: string;
  /** Registry directory; null uses the bundled registry */
  readonly registry: string | null;
}

export interface CLIConfig {
  readonly version: number;
  readonly paths: PathsConfig;
  readonly engine: SearchEngineConfig;

  // Runtime overrides (from CLI flags)
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_PATHS: PathsConfig = {
  config: './config',
  cache: './data/cache',
  output: './output',
  registry: null,
};

/**
 * Config file structure (YAML or JSON)
 */
const ServiceFileSchema = z
  .object({
    base_url: z.string().url().optional(),
    timeout: z.number().int().positive().optional(),
  })
  .strict();

const ConfigFileSchema = z
  .object({
    version: z.number().int().optional(),
    paths: z
      .object({
        config: z.string().optional(),
        cache: z.string().optional(),
        output: z.string().optional(),
        registry: z.string().optional(),
      })
      .strict()
      .optional(),
    search: z
      .object({
        strategy: z.enum(['bbox', 'ssid-patterns']).optional(),
        seen_since: z.union([z.string(), z.number()]).transform(String).optional(),
        zip_radius_km: z.number().positive().optional(),
        max_unit_area_km2: z.number().positive().optional(),
        max_split_depth: z.number().int().nonnegative().optional(),
        page_size: z.number().int().positive().optional(),
        max_pages_per_unit: z.number().int().positive().optional(),
        concurrency: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
    rate_limit: z
      .object({
        requests_per_minute: z.number().positive().optional(),
        min_interval_ms: z.number().nonnegative().optional(),
      })
      .strict()
      .optional(),
    retry: z
      .object({
        max_attempts: z.number().int().positive().optional(),
        initial_delay_ms: z.number().nonnegative().optional(),
        max_delay_ms: z.number().nonnegative().optional(),
      })
      .strict()
      .optional(),
    cache: z
      .object({
        enabled: z.boolean().optional(),
        persist_results: z.boolean().optional(),
        boundary_ttl_days: z.number().nonnegative().optional(),
        result_ttl_minutes: z.number().nonnegative().optional(),
      })
      .strict()
      .optional(),
    services: z
      .object({
        wigle: ServiceFileSchema.optional(),
        overpass: ServiceFileSchema.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
export const CONFIG_FILE_NAMES = [
  '.alpr-scoutrc',
  '.alpr-scoutrc.yaml',
  '.alpr-scoutrc.yml',
  '.alpr-scoutrc.json',
];

/**
 * Find config file in a directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = resolve(dir, '..');
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse and validate a config file
 *
 * @throws ConfigurationError for unparsable content or unknown keys
 */
export function parseConfigFile(filePath: string): ConfigFile {
  const content = readFileSync(filePath, 'utf-8');

  let raw: unknown;
  try {
    // YAML is a superset of JSON, so one parser covers every extension
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigurationError(`Config file is not valid YAML: ${filePath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid config file: ${filePath}`,
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

type Env = Readonly<Record<string, string | undefined>>;

function getEnvVar(env: Env, name: string): string | undefined {
  const value = env[`ALPR_SCOUT_${name}`];
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

function getEnvBool(env: Env, name: string): boolean | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvNumber(env: Env, name: string): number | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  const num = parseInt(value, 10);
  return isNaN(num) ? undefined : num;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
    timeout?: number;
    concurrency?: number;
    cacheDir?: string;
    outputDir?: string;
    noCache?: boolean;
  };
  env?: Env;
  cwd?: string;
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigurationError for a missing explicit file or invalid values
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const overrides = options.overrides ?? {};

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicitPath = options.configPath ?? getEnvVar(env, 'CONFIG');
  if (explicitPath !== undefined) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath !== null) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const version = fileConfig.version ?? 1;
  if (version !== 1) {
    throw new ConfigurationError(`Unsupported config version: ${version}. Expected 1.`);
  }

  const search = fileConfig.search ?? {};
  const timeout = overrides.timeout ?? getEnvNumber(env, 'TIMEOUT') ?? fileConfig.services?.wigle?.timeout;
  const concurrency = overrides.concurrency ?? getEnvNumber(env, 'CONCURRENCY') ?? search.concurrency;
  const cacheEnabled =
    overrides.noCache === true ? false : getEnvBool(env, 'NO_CACHE') === true ? false : fileConfig.cache?.enabled;

  const engineOverrides: DeepPartial<SearchEngineConfig> = {
    resolver: {
      strategy: search.strategy,
      zipRadiusKm: search.zip_radius_km,
      maxUnitAreaKm2: search.max_unit_area_km2,
      maxSplitDepth: search.max_split_depth,
    },
    orchestrator: {
      seenSince: search.seen_since,
      pageSize: search.page_size,
      maxPagesPerUnit: search.max_pages_per_unit,
      concurrency,
    },
    rateLimit: {
      requestsPerMinute: fileConfig.rate_limit?.requests_per_minute,
      minIntervalMs: fileConfig.rate_limit?.min_interval_ms,
    },
    retry: {
      maxAttempts: fileConfig.retry?.max_attempts,
      initialDelayMs: fileConfig.retry?.initial_delay_ms,
      maxDelayMs: fileConfig.retry?.max_delay_ms,
    },
    cache: {
      enabled: cacheEnabled,
      persistResults: fileConfig.cache?.persist_results,
      boundaryTtlMs:
        fileConfig.cache?.boundary_ttl_days !== undefined
          ? fileConfig.cache.boundary_ttl_days * DAY_MS
          : undefined,
      resultTtlMs:
        fileConfig.cache?.result_ttl_minutes !== undefined
          ? fileConfig.cache.result_ttl_minutes * 60 * 1000
          : undefined,
    },
    wigle: {
      baseUrl: fileConfig.services?.wigle?.base_url,
      timeoutMs: timeout,
    },
    overpass: {
      baseUrl: fileConfig.services?.overpass?.base_url,
      timeoutMs: fileConfig.services?.overpass?.timeout,
    },
  };

  const basePath = configPath !== null ? resolve(configPath, '..') : cwd;
  const registryPath = fileConfig.paths?.registry;
  const paths: PathsConfig = {
    config: resolve(basePath, fileConfig.paths?.config ?? DEFAULT_PATHS.config),
    cache: resolve(
      cwd,
      overrides.cacheDir ?? getEnvVar(env, 'CACHE_DIR') ?? resolve(basePath, fileConfig.paths?.cache ?? DEFAULT_PATHS.cache)
    ),
    output: resolve(
      cwd,
      overrides.outputDir ?? getEnvVar(env, 'OUTPUT_DIR') ?? resolve(basePath, fileConfig.paths?.output ?? DEFAULT_PATHS.output)
    ),
    registry: registryPath !== undefined ? resolve(basePath, registryPath) : null,
  };

  const engine = createConfig(stripUndefined(engineOverrides));

  return {
    version,
    paths,
    engine: { ...engine, cache: { ...engine.cache, directory: paths.cache } },
    verbose: overrides.verbose ?? getEnvBool(env, 'VERBOSE') ?? false,
    json: overrides.json ?? getEnvBool(env, 'JSON') ?? false,
    configPath,
  };
}

/**
 * Drop undefined leaves so they do not override defaults in the per-group spread
 */
function stripUndefined(overrides: DeepPartial<SearchEngineConfig>): DeepPartial<SearchEngineConfig> {
  const groups = Object.keys(ENGINE_DEFAULTS).filter(isEngineGroup);
  const result: DeepPartial<SearchEngineConfig> = {};

  for (const group of groups) {
    const values = overrides[group];
    if (values === undefined) continue;
    const defined = Object.fromEntries(
      Object.entries(values).filter(([, value]) => value !== undefined)
    );
    Object.assign(result, { [group]: defined });
  }
  return result;
}

function isEngineGroup(key: string): key is keyof SearchEngineConfig {
  return key in ENGINE_DEFAULTS;
}
