/**
 * Search Result Types
 *
 * A SearchResultSet is built once per search and deep-frozen. Unit accounting
 * is always present so partial coverage is visible to the reader.
 */

import type { BBox } from './geo.js';
import type { CandidateDevice } from './observation.js';
import type { FailedUnit, SearchStrategy, SkippedUnit } from './query.js';

export interface AreaSummary {
  readonly id: string;
  readonly displayName: string;
  readonly kind: string;
  readonly source: 'dynamic-osm' | 'static-registry';
  readonly bbox: BBox | null;
  readonly units: number;
  readonly boundaryStale: boolean;
  readonly zipCodes?: readonly string[];
}

export interface FailedArea {
  readonly areaId: string;
  readonly error: string;
  readonly errorName: string;
}

export interface UnitAccounting {
  readonly requested: number;
  readonly completed: number;
  readonly failed: number;
  readonly skipped: number;
  readonly fromCache: number;
}

export interface ObservationCounts {
  /** Every record returned, including those later filtered out */
  readonly raw: number;
  readonly malformed: number;
  /** Classified against a signature, before boundary filtering */
  readonly matched: number;
  readonly outsideBoundary: number;
  readonly duplicatesCollapsed: number;
  /** Final device count */
  readonly deduplicated: number;
}

export interface SearchMetadata {
  readonly searchId: string;
  readonly startedAt: string;
  readonly completedAt: string;
  readonly durationMs: number;
  readonly strategy: SearchStrategy;
  readonly seenSince: string;
  readonly areasRequested: readonly string[];
  readonly areas: readonly AreaSummary[];
  readonly failedAreas: readonly FailedArea[];
  readonly units: UnitAccounting;
  readonly failedUnits: readonly FailedUnit[];
  readonly skippedUnits: readonly SkippedUnit[];
  readonly counts: ObservationCounts;
  /** deduplicated / raw, as a percentage with two decimals */
  readonly matchRate: number;
  readonly signatures: {
    readonly bssidPrefixes: number;
    readonly ssidPatterns: number;
  };
  readonly warnings: readonly string[];
  readonly cancelled: boolean;
}

export interface SearchResultSet {
  readonly devices: readonly CandidateDevice[];
  readonly metadata: SearchMetadata;
}
