/**
 * Observation and Device Types
 */

/**
 * Primitive pass-through value from an upstream record
 */
export type RawValue = string | number | boolean | null;

/**
 * Opaque metadata bag carried alongside the fields the engine depends on
 */
export type RawFields = Readonly<Record<string, RawValue>>;

/**
 * A single WiFi network record as returned by the observation source.
 * Frozen once normalized.
 */
export interface Observation {
  /** Uppercase, colon-delimited MAC (e.g. "08:3A:88:11:22:33") */
  readonly bssid: string;
  readonly ssid: string | null;
  readonly latitude: number;
  readonly longitude: number;
  /** ISO-8601 UTC timestamp, or null when the source did not report one */
  readonly lastSeen: string | null;
  readonly firstSeen: string | null;
  readonly raw: RawFields;
}

export type MatchReason = 'bssid-prefix' | 'ssid-pattern';

/**
 * Deduplicated observation that matched a known device signature
 */
export interface CandidateDevice extends Observation {
  readonly matchReason: MatchReason;
  readonly matchedSignature: string;
  /** Unit that produced the winning observation */
  readonly unitId: string;
  readonly areaId: string;
  readonly areaName: string;
  /** Number of raw observations collapsed into this device */
  readonly sightings: number;
}
