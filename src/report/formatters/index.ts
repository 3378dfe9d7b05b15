export type { IReportFormatter } from './IReportFormatter.js';
export { UnsupportedFormatError } from './FormatterError.js';
export { ReportFormatterRegistry } from './FormatterRegistry.js';
export { JsonReportFormatter } from './JsonReportFormatter.js';
export { ScanReportTextFormatter } from './ScanReportTextFormatter.js';
export { DiagnosisTextFormatter } from './DiagnosisTextFormatter.js';

import { ActivityDiagnosis, ScanReport } from '../../types/index.js';
import { ReportFormatterRegistry } from './FormatterRegistry.js';
import { JsonReportFormatter } from './JsonReportFormatter.js';
import { ScanReportTextFormatter } from './ScanReportTextFormatter.js';
import { DiagnosisTextFormatter } from './DiagnosisTextFormatter.js';

/**
 * Formatters for scan reports: JSON first, then plain text
 */
export function createScanReportFormatters(): ReportFormatterRegistry<ScanReport> {
  const registry = new ReportFormatterRegistry<ScanReport>();
  registry.registerFormatter(new JsonReportFormatter<ScanReport>());
  registry.registerFormatter(new ScanReportTextFormatter());
  return registry;
}

export function createDiagnosisFormatters(): ReportFormatterRegistry<ActivityDiagnosis> {
  const registry = new ReportFormatterRegistry<ActivityDiagnosis>();
  registry.registerFormatter(new JsonReportFormatter<ActivityDiagnosis>());
  registry.registerFormatter(new DiagnosisTextFormatter());
  return registry;
}
