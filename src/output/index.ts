export { CSV_COLUMNS, escapeCSV, formatCsv, toCsvRow, deviceCity } from './csv.js';
export type { CsvColumn } from './csv.js';
export { escapeXml, formatKml } from './kml.js';
export { buildSummaryReport, formatSummaryText } from './summary.js';
export type { SummaryReport } from './summary.js';
export {
  EXPORT_FORMATS,
  exportResults,
  fileTimestamp,
  isExportFormat,
  toJsonDocument,
} from './export.js';
export type { ExportFormat, ExportedFile } from './export.js';
