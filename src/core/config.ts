/**
 * Search Engine Configuration
 *
 * Typed, immutable configuration for every component of the engine.
 * `createConfig` merges partial overrides onto DEFAULT_CONFIG per group.
 * Secrets are read from the environment by `loadEnvironment`, never from here.
 */

import { z } from 'zod';
import type { SearchStrategy } from './types/query.js';
import { ConfigurationError } from './errors.js';

export interface ResolverConfig {
  /** Largest geodesic box area sent as a single query */
  readonly maxUnitAreaKm2: number;
  /** Quadrant split depth limit for oversized areas */
  readonly maxSplitDepth: number;
  /** Half-width of the box built around each ZIP centroid */
  readonly zipRadiusKm: number;
  readonly strategy: SearchStrategy;
}

export interface OrchestratorConfig {
  /** Concurrent query units */
  readonly concurrency: number;
  readonly pageSize: number;
  readonly maxPagesPerUnit: number;
  /** Oldest last-update date to request, YYYYMMDD */
  readonly seenSince: string;
}

export interface RateLimitConfig {
  readonly requestsPerMinute: number;
  /** Minimum spacing between any two requests */
  readonly minIntervalMs: number;
}

export interface RetryPolicyConfig {
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  readonly backoffMultiplier: number;
  readonly jitterFactor: number;
}

export interface CacheConfig {
  readonly enabled: boolean;
  readonly directory: string;
  readonly boundaryTtlMs: number;
  readonly catalogTtlMs: number;
  readonly resultTtlMs: number;
  /** Persist per-unit results to disk as well as memory */
  readonly persistResults: boolean;
}

export interface ServiceEndpointConfig {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly userAgent: string;
}

export interface SearchEngineConfig {
  readonly resolver: ResolverConfig;
  readonly orchestrator: OrchestratorConfig;
  readonly rateLimit: RateLimitConfig;
  readonly retry: RetryPolicyConfig;
  readonly cache: CacheConfig;
  readonly wigle: ServiceEndpointConfig;
  readonly overpass: ServiceEndpointConfig;
}

const USER_AGENT = 'alpr-scout/0.1';

const SEEN_SINCE_PATTERN = /^\d{8}$/;

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

export const DEFAULT_CONFIG: SearchEngineConfig = {
  resolver: {
    maxUnitAreaKm2: 2500,
    maxSplitDepth: 8,
    zipRadiusKm: 5,
    strategy: 'bbox',
  },
  orchestrator: {
    concurrency: 2,
    pageSize: 100,
    maxPagesPerUnit: 50,
    seenSince: '20200101',
  },
  rateLimit: {
    requestsPerMinute: 30,
    minIntervalMs: 1000,
  },
  retry: {
    maxAttempts: 4,
    initialDelayMs: 2000,
    maxDelayMs: 60000,
    backoffMultiplier: 2,
    jitterFactor: 0.1,
  },
  cache: {
    enabled: true,
    directory: './data/cache',
    boundaryTtlMs: 30 * DAY_MS,
    catalogTtlMs: DAY_MS,
    resultTtlMs: 15 * MINUTE_MS,
    persistResults: false,
  },
  wigle: {
    baseUrl: 'https://api.wigle.net',
    timeoutMs: 30000,
    userAgent: USER_AGENT,
  },
  overpass: {
    baseUrl: 'https://overpass-api.de/api/interpreter',
    timeoutMs: 120000,
    userAgent: USER_AGENT,
  },
};

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

/**
 * Create configuration by merging overrides with defaults
 */
export function createConfig(
  overrides: DeepPartial<SearchEngineConfig> = {}
): SearchEngineConfig {
  const config: SearchEngineConfig = {
    resolver: { ...DEFAULT_CONFIG.resolver, ...overrides.resolver },
    orchestrator: { ...DEFAULT_CONFIG.orchestrator, ...overrides.orchestrator },
    rateLimit: { ...DEFAULT_CONFIG.rateLimit, ...overrides.rateLimit },
    retry: { ...DEFAULT_CONFIG.retry, ...overrides.retry },
    cache: { ...DEFAULT_CONFIG.cache, ...overrides.cache },
    wigle: { ...DEFAULT_CONFIG.wigle, ...overrides.wigle },
    overpass: { ...DEFAULT_CONFIG.overpass, ...overrides.overpass },
  };

  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new ConfigurationError('Invalid search engine configuration', errors);
  }
  return config;
}

/**
 * Validate numeric ranges and formats
 *
 * @returns error messages, empty when valid
 */
export function validateConfig(config: SearchEngineConfig): string[] {
  const errors: string[] = [];

  if (!(config.resolver.maxUnitAreaKm2 > 0)) {
    errors.push('resolver.maxUnitAreaKm2 must be positive');
  }
  if (!Number.isInteger(config.resolver.maxSplitDepth) || config.resolver.maxSplitDepth < 0) {
    errors.push('resolver.maxSplitDepth must be a non-negative integer');
  }
  if (!(config.resolver.zipRadiusKm > 0)) {
    errors.push('resolver.zipRadiusKm must be positive');
  }
  if (!Number.isInteger(config.orchestrator.concurrency) || config.orchestrator.concurrency < 1) {
    errors.push('orchestrator.concurrency must be an integer >= 1');
  }
  if (config.orchestrator.pageSize < 1 || config.orchestrator.pageSize > 1000) {
    errors.push('orchestrator.pageSize must be between 1 and 1000');
  }
  if (config.orchestrator.maxPagesPerUnit < 1) {
    errors.push('orchestrator.maxPagesPerUnit must be >= 1');
  }
  if (!SEEN_SINCE_PATTERN.test(config.orchestrator.seenSince)) {
    errors.push('orchestrator.seenSince must be YYYYMMDD');
  }
  if (!(config.rateLimit.requestsPerMinute > 0)) {
    errors.push('rateLimit.requestsPerMinute must be positive');
  }
  if (config.rateLimit.minIntervalMs < 0) {
    errors.push('rateLimit.minIntervalMs must be >= 0');
  }
  if (!Number.isInteger(config.retry.maxAttempts) || config.retry.maxAttempts < 1) {
    errors.push('retry.maxAttempts must be an integer >= 1');
  }
  if (config.retry.jitterFactor < 0 || config.retry.jitterFactor > 1) {
    errors.push('retry.jitterFactor must be between 0 and 1');
  }
  if (config.cache.boundaryTtlMs < 0 || config.cache.resultTtlMs < 0 || config.cache.catalogTtlMs < 0) {
    errors.push('cache TTLs must be >= 0');
  }

  return errors;
}

// ============================================================================
// Environment
// ============================================================================

// Blank assignments in .env files count as unset
const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const EnvironmentSchema = z
  .object({
    WIGLE_API_TOKEN: z.preprocess(blankToUndefined, z.string().optional()),
    WIGLE_API_NAME: z.preprocess(blankToUndefined, z.string().optional()),
    WIGLE_API_KEY: z.preprocess(blankToUndefined, z.string().optional()),
    LOG_LEVEL: z.preprocess(
      (value) => {
        const present = blankToUndefined(value);
        return typeof present === 'string' ? present.toLowerCase() : present;
      },
      z.enum(['debug', 'info', 'warn', 'error']).optional()
    ),
    NODE_ENV: z.string().optional(),
  })
  .refine(
    (env) => env.WIGLE_API_NAME === undefined || env.WIGLE_API_KEY !== undefined,
    { message: 'WIGLE_API_KEY is required when WIGLE_API_NAME is set', path: ['WIGLE_API_KEY'] }
  );

export interface EnvironmentConfig {
  /** Value for the HTTP Basic authorization header, or null when unset */
  readonly wigleAuthToken: string | null;
  readonly logLevel?: 'debug' | 'info' | 'warn' | 'error';
}

/**
 * Validate credentials from the environment
 *
 * The token is either WIGLE_API_TOKEN (already base64 of "name:key") or
 * built from WIGLE_API_NAME and WIGLE_API_KEY.
 *
 * @throws ConfigurationError when a variable is present but invalid
 */
export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const parsed = EnvironmentSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid environment',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  let wigleAuthToken: string | null = values.WIGLE_API_TOKEN ?? null;
  if (wigleAuthToken === null && values.WIGLE_API_NAME && values.WIGLE_API_KEY) {
    wigleAuthToken = Buffer.from(`${values.WIGLE_API_NAME}:${values.WIGLE_API_KEY}`).toString('base64');
  }

  return {
    wigleAuthToken,
    logLevel: values.LOG_LEVEL,
  };
}
