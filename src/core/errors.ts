/**
 * Search Engine Error Types
 *
 * Propagation:
 * - ConfigurationError and AreaNotFoundError abort before any querying.
 * - BoundaryFetchError aborts resolution of one area only.
 * - QueryUnitFailedError is recorded per unit and never aborts the search.
 * - RateLimitExceededError is transient and only surfaces as the cause of a
 *   QueryUnitFailedError once the retry budget is spent.
 *
 * Malformed upstream records are counted, never thrown.
 */

import type { BBox } from './types/geo.js';

export type SearchErrorCode =
  | 'CONFIGURATION'
  | 'AREA_NOT_FOUND'
  | 'BOUNDARY_FETCH'
  | 'QUERY_UNIT_FAILED'
  | 'RATE_LIMIT_EXCEEDED'
  | 'SOURCE_RESPONSE';

/**
 * Base class for engine errors
 */
export abstract class SearchEngineError extends Error {
  abstract readonly code: SearchErrorCode;
  /** Whether a retry may succeed */
  abstract readonly transient: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Invalid or missing configuration (signature files, area selection, env).
 * Always raised before any network activity.
 */
export class ConfigurationError extends SearchEngineError {
  public readonly name = 'ConfigurationError' as const;
  readonly code = 'CONFIGURATION' as const;
  readonly transient = false;

  constructor(
    message: string,
    public readonly details: readonly string[] = []
  ) {
    super(message);
  }
}

/**
 * Selected area identifier does not resolve
 */
export class AreaNotFoundError extends SearchEngineError {
  public readonly name = 'AreaNotFoundError' as const;
  readonly code = 'AREA_NOT_FOUND' as const;
  readonly transient = false;

  constructor(
    public readonly areaId: string,
    public readonly reason: string
  ) {
    super(`Area not found: ${areaId} (${reason})`);
  }
}

/**
 * Boundary lookup failed and no cached geometry exists
 */
export class BoundaryFetchError extends SearchEngineError {
  public readonly name = 'BoundaryFetchError' as const;
  readonly code = 'BOUNDARY_FETCH' as const;
  readonly transient = true;

  constructor(
    public readonly areaId: string,
    message: string,
    cause?: unknown
  ) {
    super(`Boundary fetch failed for ${areaId}: ${message}`, { cause });
  }
}

/**
 * A query unit exhausted its retry budget
 */
export class QueryUnitFailedError extends SearchEngineError {
  public readonly name = 'QueryUnitFailedError' as const;
  readonly code = 'QUERY_UNIT_FAILED' as const;
  readonly transient = false;

  constructor(
    public readonly unitId: string,
    public readonly areaId: string,
    public readonly bbox: BBox,
    public readonly attempts: number,
    public readonly lastError: Error
  ) {
    super(
      `Query unit ${unitId} failed after ${attempts} attempt(s): ${lastError.message}`,
      { cause: lastError }
    );
  }
}

/**
 * Upstream rejected a request for exceeding its request budget
 */
export class RateLimitExceededError extends SearchEngineError {
  public readonly name = 'RateLimitExceededError' as const;
  readonly code = 'RATE_LIMIT_EXCEEDED' as const;
  readonly transient = true;

  constructor(
    message: string,
    /** Upstream wait hint, when one was given */
    public readonly retryAfterMs: number | null = null
  ) {
    super(message);
  }
}

/**
 * Upstream answered with a body the engine cannot interpret
 */
export class SourceResponseError extends SearchEngineError {
  public readonly name = 'SourceResponseError' as const;
  readonly code = 'SOURCE_RESPONSE' as const;
  readonly transient = false;

  constructor(
    public readonly source: string,
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(`${source}: ${message}`);
  }
}

export function isSearchEngineError(error: unknown): error is SearchEngineError {
  return error instanceof SearchEngineError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function isAreaNotFoundError(error: unknown): error is AreaNotFoundError {
  return error instanceof AreaNotFoundError;
}

export function isBoundaryFetchError(error: unknown): error is BoundaryFetchError {
  return error instanceof BoundaryFetchError;
}

export function isQueryUnitFailedError(error: unknown): error is QueryUnitFailedError {
  return error instanceof QueryUnitFailedError;
}

export function isRateLimitExceededError(error: unknown): error is RateLimitExceededError {
  return error instanceof RateLimitExceededError;
}

/**
 * Normalize an unknown thrown value
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
