/**
 * CSV export with WKT point geometry, importable by most mapping tools
 * (Google My Maps, QGIS, ArcGIS).
 *
 * @module output/csv
 */

import type { CandidateDevice } from '../core/types/observation.js';
import type { SearchResultSet } from '../core/types/results.js';
import { wigleMapUrl } from '../providers/wigle-client.js';

export const CSV_COLUMNS = [
  'Name',
  'Description',
  'WKT',
  'SSID',
  'BSSID',
  'Match_Reason',
  'Matched_Signature',
  'Admin_Area',
  'City',
  'Latitude',
  'Longitude',
  'First_Seen',
  'Last_Seen',
  'WiGLE_URL',
  'Discovery_Source',
] as const;

export type CsvColumn = (typeof CSV_COLUMNS)[number];

export const DISCOVERY_SOURCE = 'WiGLE.net';

/**
 * Escape a value for CSV output (RFC 4180 quoting)
 */
export function escapeCSV(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * City reported by the source, or "Unknown"
 */
export function deviceCity(device: CandidateDevice): string {
  const city = device.raw.city;
  return typeof city === 'string' && city.trim() !== '' ? city.trim() : 'Unknown';
}

export function toCsvRow(device: CandidateDevice): Record<CsvColumn, string> {
  const city = deviceCity(device);
  const ssid = device.ssid ?? 'Unknown';

  return {
    Name: `ALPR Camera - ${city}`,
    Description: `ALPR Surveillance Camera - SSID: ${ssid} - BSSID: ${device.bssid} - Location: ${city}`,
    WKT: `POINT(${device.longitude} ${device.latitude})`,
    SSID: ssid,
    BSSID: device.bssid,
    Match_Reason: device.matchReason,
    Matched_Signature: device.matchedSignature,
    Admin_Area: device.areaName,
    City: city,
    Latitude: String(device.latitude),
    Longitude: String(device.longitude),
    First_Seen: device.firstSeen ?? '',
    Last_Seen: device.lastSeen ?? '',
    WiGLE_URL: wigleMapUrl(device.bssid),
    Discovery_Source: DISCOVERY_SOURCE,
  };
}

/**
 * One row per device, header first
 */
export function formatCsv(results: SearchResultSet): string {
  const headerRow = CSV_COLUMNS.join(',');
  const dataRows = results.devices.map((device) => {
    const row = toCsvRow(device);
    return CSV_COLUMNS.map((column) => escapeCSV(row[column])).join(',');
  });
  return [headerRow, ...dataRows].join('\n');
}
