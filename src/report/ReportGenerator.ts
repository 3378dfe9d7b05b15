import {
  DispatchOutcome,
  FailedDetail,
  RecipientRef,
  ReportPaths,
  ScanReport
} from '../types/index.js';
import { createScanReportFormatters } from './formatters/index.js';
import { ReportFormatterRegistry } from './formatters/FormatterRegistry.js';
import { ReportWriter } from './ReportWriter.js';
import { fileTimestamp } from './timestamps.js';

export const SCAN_REPORT_PREFIX = 'scan_report';

/**
 * Everything about a cycle the outcomes alone do not carry
 */
export interface SummaryContext {
  start: Date;
  end: Date;
  thresholdDays: number;
  skipped?: RecipientRef[];
  deferred?: RecipientRef[];
  interrupted?: boolean;
  warnings?: string[];
}

/**
 * Aggregates a cycle's dispatch outcomes into a ScanReport and persists it
 */
export class ReportGenerator {
  private readonly writer: ReportWriter;

  constructor(
    reportDir: string,
    private readonly formatters: ReportFormatterRegistry<ScanReport> = createScanReportFormatters()
  ) {
    this.writer = new ReportWriter(reportDir);
  }

  /**
   * Pure fold over the outcomes. Every outcome counts exactly once,
   * so `sent + failed === total`.
   */
  summarize(cycleId: string, outcomes: readonly DispatchOutcome[], context: SummaryContext): ScanReport {
    let sent = 0;
    const failedDetails: FailedDetail[] = [];

    for (const outcome of outcomes) {
      if (outcome.status === 'sent') {
        sent++;
      } else {
        failedDetails.push({
          recipient: outcome.recipientId,
          email: outcome.recipientEmail,
          reason: outcome.reason,
          attempted_at: outcome.attemptedAt.toISOString()
        });
      }
    }

    return {
      cycle_id: cycleId,
      start: context.start.toISOString(),
      end: context.end.toISOString(),
      threshold_days: context.thresholdDays,
      total: outcomes.length,
      sent,
      failed: failedDetails.length,
      failed_details: failedDetails,
      skipped: [...(context.skipped ?? [])],
      deferred: [...(context.deferred ?? [])],
      interrupted: context.interrupted ?? false,
      warnings: [...(context.warnings ?? [])]
    };
  }

  /**
   * Write the report as JSON and plain text, keyed by its end time and cycle id
   * so successive runs never overwrite one another.
   * @throws ReportPersistError
   */
  async persist(report: ScanReport): Promise<ReportPaths> {
    return this.writer.write(ReportGenerator.reportBaseName(report), report, this.formatters);
  }

  static reportBaseName(report: ScanReport): string {
    return `${SCAN_REPORT_PREFIX}_${fileTimestamp(new Date(report.end))}_${report.cycle_id}`;
  }
}
