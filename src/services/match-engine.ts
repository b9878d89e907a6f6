/**
 * Match & Dedup Engine
 *
 * Runs once, after every unit has completed or been skipped:
 *
 * 1. Classify each observation against the signature store (prefix first)
 * 2. Drop matches outside the unit's polygon, or whose reported postal code
 *    is outside the unit's ZIP set (counted as outsideBoundary)
 * 3. Collapse by BSSID: the most recent lastSeen wins, null counts as oldest,
 *    position is the key's first insertion
 */

import type { AreaGeometry } from '../core/types/geo.js';
import type { CandidateDevice, Observation, RawValue } from '../core/types/observation.js';
import type { QueryUnit, UnitResult } from '../core/types/query.js';
import type { ObservationCounts } from '../core/types/results.js';
import { createLogger } from '../core/utils/logger.js';
import type { SignatureStore } from '../signatures/signature-store.js';
import { PointInPolygonEngine } from './pip-engine.js';

const log = createLogger({ module: 'match-engine' });

export interface MatchOutput {
  readonly devices: readonly CandidateDevice[];
  readonly counts: ObservationCounts;
}

interface DedupSlot {
  device: CandidateDevice;
  sightings: number;
}

const defaultPip = new PointInPolygonEngine();

/**
 * Keep the points inside (or on the edge of) a polygon. Idempotent.
 */
export function filterByPolygon<T extends Pick<Observation, 'latitude' | 'longitude'>>(
  devices: readonly T[],
  polygon: AreaGeometry,
  pip: PointInPolygonEngine = defaultPip
): T[] {
  return devices.filter((device) =>
    pip.isPointInPolygon({ lat: device.latitude, lng: device.longitude }, polygon)
  );
}

/**
 * Five-digit ZIP from a reported postal code, or null when absent or unusable
 */
export function normalizePostalCode(value: RawValue | undefined): string | null {
  if (value === undefined || value === null || typeof value === 'boolean') {
    return null;
  }
  const match = /^(\d{5})(?:-\d{4})?$/.exec(String(value).trim());
  return match !== null ? match[1] : null;
}

/**
 * True when the most recent sighting of `candidate` is newer than `current`
 */
function isNewer(candidate: string | null, current: string | null): boolean {
  if (candidate === null) return false;
  if (current === null) return true;
  return candidate > current;
}

export class MatchEngine {
  constructor(
    private readonly signatures: SignatureStore,
    private readonly pip: PointInPolygonEngine = defaultPip
  ) {}

  process(results: readonly UnitResult[]): MatchOutput {
    let raw = 0;
    let malformed = 0;
    let matched = 0;
    let outsideBoundary = 0;
    let collapsed = 0;

    const slots = new Map<string, DedupSlot>();

    for (const result of results) {
      raw += result.observations.length;
      malformed += result.malformed;

      for (const observation of result.observations) {
        const device = this.classify(observation, result.unit);
        if (device === null) continue;
        matched++;

        if (!this.isInside(device, result.unit)) {
          outsideBoundary++;
          continue;
        }

        const key = device.bssid.toUpperCase();
        const slot = slots.get(key);
        if (slot === undefined) {
          slots.set(key, { device, sightings: 1 });
          continue;
        }

        collapsed++;
        slot.sightings++;
        if (isNewer(device.lastSeen, slot.device.lastSeen)) {
          slot.device = device;
        }
      }
    }

    const devices = [...slots.values()].map((slot) =>
      Object.freeze({ ...slot.device, sightings: slot.sightings })
    );

    log.info('Matching complete', {
      raw,
      matched,
      outsideBoundary,
      duplicatesCollapsed: collapsed,
      devices: devices.length,
    });

    return {
      devices,
      counts: {
        raw,
        malformed,
        matched,
        outsideBoundary,
        duplicatesCollapsed: collapsed,
        deduplicated: devices.length,
      },
    };
  }

  /**
   * Candidate for an observation, or null when no signature matches
   */
  classify(observation: Observation, unit: QueryUnit): CandidateDevice | null {
    const match = this.signatures.classify(observation.bssid, observation.ssid);
    if (match === null) {
      return null;
    }
    return {
      ...observation,
      matchReason: match.reason,
      matchedSignature: match.signature,
      unitId: unit.id,
      areaId: unit.areaId,
      areaName: unit.areaName,
      sightings: 1,
    };
  }

  private isInside(device: CandidateDevice, unit: QueryUnit): boolean {
    if (unit.polygon !== undefined) {
      return this.pip.isPointInPolygon({ lat: device.latitude, lng: device.longitude }, unit.polygon);
    }
    if (unit.postalCodes !== undefined) {
      const postalCode = normalizePostalCode(device.raw.postalcode);
      return postalCode === null || unit.postalCodes.includes(postalCode);
    }
    return true;
  }
}
