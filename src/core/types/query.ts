/**
 * Query Unit Types
 *
 * A QueryUnit is one bounded geographic query against the observation source.
 * Pagination state is held per unit by the orchestrator, never globally.
 */

import type { AreaGeometry, BBox } from './geo.js';
import type { Observation } from './observation.js';

export type SearchStrategy = 'bbox' | 'ssid-patterns';

export interface QueryUnit {
  /** Stable id derived from area id, box and SSID filter */
  readonly id: string;
  readonly bbox: BBox;
  /** Non-owning back-reference to the originating area */
  readonly areaId: string;
  readonly areaName: string;
  /** Exact outline for dynamic areas */
  readonly polygon?: AreaGeometry;
  /** Member ZIP codes for static areas */
  readonly postalCodes?: readonly string[];
  /** Upstream SSID filter (SQL LIKE syntax) for the ssid-patterns strategy */
  readonly ssidLike?: string;
}

/**
 * Per-unit pagination cursor
 */
export interface UnitCursor {
  readonly unitId: string;
  readonly cursor: string | null;
  readonly pagesFetched: number;
}

/**
 * Rate-limit hints reported alongside a page
 */
export interface RateLimitInfo {
  readonly remaining?: number;
  /** Epoch milliseconds at which the budget resets */
  readonly resetAt?: number;
  readonly retryAfterMs?: number;
}

/**
 * One page of observations from the source
 */
export interface ObservationPage {
  readonly observations: readonly Observation[];
  /** Records dropped for missing or invalid required fields */
  readonly malformed: number;
  readonly nextCursor: string | null;
  readonly totalResults?: number;
  readonly rateLimit?: RateLimitInfo;
}

export interface PageRequest {
  readonly bbox: BBox;
  readonly cursor: string | null;
  readonly ssidLike?: string;
  readonly seenSince: string;
  readonly pageSize: number;
}

/**
 * Paginated geo-query service for WiFi observations
 */
export interface ObservationSource {
  readonly name: string;
  searchPage(request: PageRequest): Promise<ObservationPage>;
}

/**
 * Completed unit with every page merged in cursor order
 */
export interface UnitResult {
  readonly unit: QueryUnit;
  readonly observations: readonly Observation[];
  readonly malformed: number;
  readonly pages: number;
  readonly fromCache: boolean;
}

export interface FailedUnit {
  readonly unitId: string;
  readonly areaId: string;
  readonly bbox: BBox;
  readonly attempts: number;
  readonly error: string;
  readonly errorName: string;
}

export interface SkippedUnit {
  readonly unitId: string;
  readonly areaId: string;
  readonly bbox: BBox;
  readonly reason: 'cancelled';
}

export interface OrchestrationResult {
  readonly completed: readonly UnitResult[];
  readonly failed: readonly FailedUnit[];
  readonly skipped: readonly SkippedUnit[];
  readonly warnings: readonly string[];
  readonly cancelled: boolean;
}
