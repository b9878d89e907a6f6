/**
 * Summary report: totals, distributions and unit accounting for one search
 *
 * @module output/summary
 */

import type { SearchResultSet, UnitAccounting } from '../core/types/results.js';
import { deviceCity } from './csv.js';

export interface SummaryReport {
  readonly summary: {
    readonly totalCameras: number;
    readonly uniqueCities: number;
    readonly uniqueSsids: number;
    readonly uniqueBssids: number;
    readonly searchId: string;
    readonly searchTimestamp: string;
    readonly areas: readonly string[];
  };
  readonly distribution: {
    /** Sorted by count, descending */
    readonly byCity: Readonly<Record<string, number>>;
    readonly byBssidPrefix: Readonly<Record<string, number>>;
    readonly byMatchReason: Readonly<Record<string, number>>;
  };
  readonly searchParameters: {
    readonly strategy: string;
    readonly seenSince: string;
    readonly bssidPrefixes: number;
    readonly ssidPatterns: number;
  };
  readonly efficiency: {
    readonly networksFound: number;
    readonly afterFiltering: number;
    /** Percentage of returned networks that survived matching and dedup */
    readonly filterEfficiency: number;
  };
  readonly units: UnitAccounting;
  readonly warnings: readonly string[];
}

function countBy<T>(items: readonly T[], keyOf: (item: T) => string | null): Record<string, number> {
  const counts = new Map<string, number>();
  for (const item of items) {
    const key = keyOf(item);
    if (key === null) continue;
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  // Stable sort keeps first-seen order among equal counts
  return Object.fromEntries([...counts.entries()].sort((a, b) => b[1] - a[1]));
}

export function buildSummaryReport(results: SearchResultSet): SummaryReport {
  const { devices, metadata } = results;

  return {
    summary: {
      totalCameras: devices.length,
      uniqueCities: new Set(devices.map(deviceCity)).size,
      uniqueSsids: new Set(devices.map((device) => device.ssid ?? 'Unknown')).size,
      uniqueBssids: new Set(devices.map((device) => device.bssid)).size,
      searchId: metadata.searchId,
      searchTimestamp: metadata.startedAt,
      areas: metadata.areas.map((area) => area.displayName),
    },
    distribution: {
      byCity: countBy(devices, deviceCity),
      byBssidPrefix: countBy(devices, (device) =>
        device.bssid.length >= 8 ? device.bssid.slice(0, 8) : null
      ),
      byMatchReason: countBy(devices, (device) => device.matchReason),
    },
    searchParameters: {
      strategy: metadata.strategy,
      seenSince: metadata.seenSince,
      bssidPrefixes: metadata.signatures.bssidPrefixes,
      ssidPatterns: metadata.signatures.ssidPatterns,
    },
    efficiency: {
      networksFound: metadata.counts.raw,
      afterFiltering: metadata.counts.deduplicated,
      filterEfficiency: metadata.matchRate,
    },
    units: metadata.units,
    warnings: metadata.warnings,
  };
}

/**
 * Plain-text rendering for the terminal
 */
export function formatSummaryText(report: SummaryReport): string {
  const rule = '='.repeat(60);
  const lines = [
    rule,
    'SEARCH SUMMARY',
    rule,
    `Search completed: ${report.summary.searchTimestamp}`,
    `Total networks found: ${report.efficiency.networksFound}`,
    `Final surveillance cameras: ${report.summary.totalCameras}`,
    `Units: ${report.units.requested} requested, ${report.units.completed} completed, ` +
      `${report.units.failed} failed, ${report.units.skipped} skipped (${report.units.fromCache} cached)`,
    '',
    'Search Parameters:',
    `  BSSID prefixes: ${report.searchParameters.bssidPrefixes}`,
    `  SSID patterns: ${report.searchParameters.ssidPatterns}`,
    `  Strategy: ${report.searchParameters.strategy}`,
    `  Areas: ${report.summary.areas.join(', ') || '-'}`,
  ];

  const cities = Object.entries(report.distribution.byCity);
  if (cities.length > 0) {
    lines.push('', 'Camera Locations by City:');
    for (const [city, count] of cities) {
      lines.push(`  ${city}: ${count} camera(s)`);
    }
  } else {
    lines.push('', 'No surveillance cameras found in the selected area.');
  }

  if (report.warnings.length > 0) {
    lines.push('', 'Warnings:');
    for (const warning of report.warnings) {
      lines.push(`  ${warning}`);
    }
  }

  lines.push(rule);
  return lines.join('\n');
}
