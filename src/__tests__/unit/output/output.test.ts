/**
 * Output Tests
 *
 * Tests:
 * - CSV rows, columns and quoting
 * - KML document structure and XML escaping
 * - Summary distributions and text rendering
 * - File naming and export to disk
 */

import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { CandidateDevice } from '../../../core/types/observation.js';
import type { SearchResultSet } from '../../../core/types/results.js';
import {
  buildSummaryReport,
  CSV_COLUMNS,
  escapeCSV,
  escapeXml,
  exportResults,
  fileTimestamp,
  formatCsv,
  formatKml,
  formatSummaryText,
  toJsonDocument,
} from '../../../output/index.js';

function device(overrides: Partial<CandidateDevice> = {}): CandidateDevice {
  return {
    bssid: '08:3A:88:11:22:33',
    ssid: 'Flock-ABC123',
    latitude: 33.02,
    longitude: -96.7,
    lastSeen: '2025-01-15T10:00:00.000Z',
    firstSeen: null,
    raw: { city: 'Plano' },
    matchReason: 'bssid-prefix',
    matchedSignature: '08:3A:88',
    unitId: 'zip:75024#unit',
    areaId: 'zip:75024',
    areaName: '75024 Plano, TX',
    sightings: 1,
    ...overrides,
  };
}

function resultSet(devices: CandidateDevice[]): SearchResultSet {
  return {
    devices,
    metadata: {
      searchId: 'search-1',
      startedAt: '2025-01-15T10:00:00.000Z',
      completedAt: '2025-01-15T10:01:00.000Z',
      durationMs: 60000,
      strategy: 'bbox',
      seenSince: '20200101',
      areasRequested: ['zip:75024'],
      areas: [
        {
          id: 'zip:75024',
          displayName: '75024 Plano, TX',
          kind: 'static-zip-set',
          source: 'static-registry',
          bbox: [-96.85, 33.03, -96.74, 33.12],
          units: 1,
          boundaryStale: false,
          zipCodes: ['75024'],
        },
      ],
      failedAreas: [],
      units: { requested: 1, completed: 1, failed: 0, skipped: 0, fromCache: 0 },
      failedUnits: [],
      skippedUnits: [],
      counts: {
        raw: 10,
        malformed: 0,
        matched: devices.length,
        outsideBoundary: 0,
        duplicatesCollapsed: 0,
        deduplicated: devices.length,
      },
      matchRate: devices.length * 10,
      signatures: { bssidPrefixes: 1, ssidPatterns: 1 },
      warnings: [],
      cancelled: false,
    },
  };
}

describe('CSV', () => {
  it('should quote values with commas, quotes or newlines', () => {
    expect(escapeCSV('plain')).toBe('plain');
    expect(escapeCSV('a,b')).toBe('"a,b"');
    expect(escapeCSV('Say "hi"')).toBe('"Say ""hi"""');
    expect(escapeCSV('two\nlines')).toBe('"two\nlines"');
  });

  it('should write a header and one row per device', () => {
    const lines = formatCsv(resultSet([device()])).split('\n');

    expect(lines[0]).toBe(CSV_COLUMNS.join(','));
    expect(lines[1]).toBe(
      'ALPR Camera - Plano,' +
        'ALPR Surveillance Camera - SSID: Flock-ABC123 - BSSID: 08:3A:88:11:22:33 - Location: Plano,' +
        'POINT(-96.7 33.02),Flock-ABC123,08:3A:88:11:22:33,bssid-prefix,08:3A:88,' +
        '"75024 Plano, TX",Plano,33.02,-96.7,,2025-01-15T10:00:00.000Z,' +
        'https://wigle.net/search?netid=08:3A:88:11:22:33,WiGLE.net'
    );
  });

  it('should fall back to Unknown for a missing city and SSID', () => {
    const lines = formatCsv(resultSet([device({ ssid: null, raw: {} })])).split('\n');

    expect(lines[1].startsWith('ALPR Camera - Unknown,')).toBe(true);
    expect(lines[1].split(',')[3]).toBe('Unknown');
  });

  it('should write only the header for an empty result', () => {
    expect(formatCsv(resultSet([]))).toBe(CSV_COLUMNS.join(','));
  });
});

describe('KML', () => {
  it('should escape XML special characters', () => {
    expect(escapeXml(`<a & "b" 'c'>`)).toBe('&lt;a &amp; &quot;b&quot; &apos;c&apos;&gt;');
  });

  it('should write one placemark per device with lon,lat coordinates', () => {
    const kml = formatKml(resultSet([device(), device({ bssid: '08:3A:88:00:00:02', ssid: '<x>' })]));
    const lines = kml.split('\n');

    expect(lines[0]).toBe('<?xml version="1.0" encoding="UTF-8"?>');
    expect(lines).toContain('    <name>ALPR Surveillance Cameras - 75024 Plano, TX</name>');
    expect(lines).toContain('      <name>ALPR Camera 1 - Plano</name>');
    expect(lines).toContain('      <name>ALPR Camera 2 - Plano</name>');
    expect(lines).toContain('        <coordinates>-96.7,33.02,0</coordinates>');
    expect(lines).toContain('        <b>SSID:</b> &lt;x&gt;<br/>');
    expect(lines.filter((line) => line === '    <Placemark>')).toHaveLength(2);
    expect(kml.endsWith('</kml>\n')).toBe(true);
  });
});

describe('summary', () => {
  const devices = [
    device(),
    device({ bssid: '08:3A:88:00:00:02', ssid: 'Flock-XYZ' }),
    device({
      bssid: 'AA:BB:CC:00:00:03',
      ssid: 'Flock-QRS',
      raw: {},
      matchReason: 'ssid-pattern',
      matchedSignature: 'Flock-*',
    }),
  ];

  it('should count devices by city, prefix and match reason', () => {
    const report = buildSummaryReport(resultSet(devices));

    expect(report.summary).toMatchObject({
      totalCameras: 3,
      uniqueCities: 2,
      uniqueSsids: 3,
      uniqueBssids: 3,
      searchId: 'search-1',
      areas: ['75024 Plano, TX'],
    });
    expect(Object.entries(report.distribution.byCity)).toEqual([
      ['Plano', 2],
      ['Unknown', 1],
    ]);
    expect(report.distribution.byBssidPrefix).toEqual({ '08:3A:88': 2, 'AA:BB:CC': 1 });
    expect(report.distribution.byMatchReason).toEqual({ 'bssid-prefix': 2, 'ssid-pattern': 1 });
    expect(report.efficiency).toEqual({ networksFound: 10, afterFiltering: 3, filterEfficiency: 30 });
  });

  it('should render unit accounting and cities as text', () => {
    const lines = formatSummaryText(buildSummaryReport(resultSet(devices))).split('\n');

    expect(lines).toContain('Units: 1 requested, 1 completed, 0 failed, 0 skipped (0 cached)');
    expect(lines).toContain('  Plano: 2 camera(s)');
    expect(lines).toContain('  Areas: 75024 Plano, TX');
  });

  it('should say so when nothing was found', () => {
    const lines = formatSummaryText(buildSummaryReport(resultSet([]))).split('\n');

    expect(lines).toContain('No surveillance cameras found in the selected area.');
  });
});

describe('export', () => {
  let directory: string | undefined;

  afterEach(async () => {
    if (directory !== undefined) {
      await rm(directory, { recursive: true, force: true });
      directory = undefined;
    }
  });

  it('should name files from the search start time', () => {
    expect(fileTimestamp('2026-03-01T12:34:56.789Z')).toBe('20260301_123456');
  });

  it('should add map links to the JSON document', () => {
    const document = toJsonDocument(resultSet([device()]));

    expect(document.area_info).toEqual({
      requested: ['zip:75024'],
      resolved: resultSet([]).metadata.areas,
      failed: [],
    });
    expect(document.devices).toEqual([
      { ...device(), wigleMapUrl: 'https://wigle.net/search?netid=08:3A:88:11:22:33' },
    ]);
  });

  it('should write each requested format once, in request order', async () => {
    directory = await mkdtemp(join(tmpdir(), 'export-test-'));
    const results = resultSet([device()]);

    const files = await exportResults(results, ['csv', 'json', 'csv'], directory);

    expect(files.map((file) => file.path)).toEqual([
      join(directory, 'alpr_export_20250115_100000.csv'),
      join(directory, 'alpr_results_20250115_100000.json'),
    ]);
    const csv = await readFile(files[0].path, 'utf-8');
    expect(csv).toBe(formatCsv(results));
    expect(files[0].bytes).toBe(Buffer.byteLength(csv, 'utf-8'));
  });

  it('should write KML and summary files', async () => {
    directory = await mkdtemp(join(tmpdir(), 'export-test-'));

    const files = await exportResults(resultSet([device()]), ['kml', 'summary'], directory);

    expect(files.map((file) => file.format)).toEqual(['kml', 'summary']);
    const summary: unknown = JSON.parse(await readFile(files[1].path, 'utf-8'));
    expect(summary).toMatchObject({ summary: { totalCameras: 1 } });
  });
});
