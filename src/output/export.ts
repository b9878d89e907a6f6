/**
 * Result export
 *
 * Serializes a SearchResultSet to the requested formats and writes each file
 * atomically into the output directory. File names carry the search start
 * time (UTC) so repeated runs never overwrite each other.
 *
 * @module output/export
 */

import { Buffer } from 'node:buffer';
import { join } from 'node:path';
import type { SearchResultSet } from '../core/types/results.js';
import { atomicWriteFile } from '../core/utils/atomic-write.js';
import { createLogger } from '../core/utils/logger.js';
import { wigleMapUrl } from '../providers/wigle-client.js';
import { formatCsv } from './csv.js';
import { formatKml } from './kml.js';
import { buildSummaryReport } from './summary.js';

const log = createLogger({ module: 'export' });

export const EXPORT_FORMATS = ['json', 'csv', 'kml', 'summary'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

export interface ExportedFile {
  readonly format: ExportFormat;
  readonly path: string;
  readonly bytes: number;
}

/**
 * Full results document: search metadata, area details and devices
 */
export function toJsonDocument(results: SearchResultSet): Record<string, unknown> {
  const { metadata } = results;
  return {
    search_info: metadata,
    area_info: {
      requested: metadata.areasRequested,
      resolved: metadata.areas,
      failed: metadata.failedAreas,
    },
    devices: results.devices.map((device) => ({
      ...device,
      wigleMapUrl: wigleMapUrl(device.bssid),
    })),
  };
}

/**
 * "2026-03-01T12:34:56.789Z" -> "20260301_123456"
 */
export function fileTimestamp(iso: string): string {
  const digits = iso.replace(/[-:]/g, '');
  return `${digits.slice(0, 8)}_${digits.slice(9, 15)}`;
}

function fileNameFor(format: ExportFormat, stamp: string): string {
  switch (format) {
    case 'json':
      return `alpr_results_${stamp}.json`;
    case 'csv':
      return `alpr_export_${stamp}.csv`;
    case 'kml':
      return `alpr_locations_${stamp}.kml`;
    case 'summary':
      return `alpr_summary_${stamp}.json`;
  }
}

function render(format: ExportFormat, results: SearchResultSet): string {
  switch (format) {
    case 'json':
      return JSON.stringify(toJsonDocument(results), null, 2);
    case 'csv':
      return formatCsv(results);
    case 'kml':
      return formatKml(results);
    case 'summary':
      return JSON.stringify(buildSummaryReport(results), null, 2);
  }
}

/**
 * Write each requested format and return the files created, in request order
 */
export async function exportResults(
  results: SearchResultSet,
  formats: readonly ExportFormat[],
  outputDir: string
): Promise<ExportedFile[]> {
  const stamp = fileTimestamp(results.metadata.startedAt);
  const files: ExportedFile[] = [];

  for (const format of [...new Set(formats)]) {
    const content = render(format, results);
    const path = join(outputDir, fileNameFor(format, stamp));
    await atomicWriteFile(path, content);
    files.push({ format, path, bytes: Buffer.byteLength(content, 'utf-8') });
    log.info('Results written', { format, path, devices: results.devices.length });
  }

  return files;
}
