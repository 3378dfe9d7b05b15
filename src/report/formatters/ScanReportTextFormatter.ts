import { RecipientRef, ScanReport } from '../../types/index.js';
import { displayTimestamp } from '../timestamps.js';
import { IReportFormatter } from './IReportFormatter.js';

const RULE = '='.repeat(50);
const SECTION_RULE = '-'.repeat(20);

/**
 * Plain-text form of a scan report, for operators
 */
export class ScanReportTextFormatter implements IReportFormatter<ScanReport> {
  getFileExtension(): string {
    return 'txt';
  }

  getFormatName(): string {
    return 'Text';
  }

  format(report: ScanReport): string {
    const lines: string[] = [
      'LMS Inactivity Scan Report',
      `Cycle: ${report.cycle_id}`,
      `Started: ${displayTimestamp(new Date(report.start))} UTC`,
      `Finished: ${displayTimestamp(new Date(report.end))} UTC`,
      RULE,
      '',
      'SUMMARY',
      SECTION_RULE,
      `Inactivity threshold: ${report.threshold_days} days`,
      `Candidates: ${report.total}`,
      `Sent: ${report.sent}`,
      `Failed: ${report.failed}`,
      `Skipped: ${report.skipped.length}`,
      `Deferred: ${report.deferred.length}`,
      `Interrupted: ${report.interrupted ? 'yes' : 'no'}`,
      '',
      'FAILED RECIPIENTS',
      SECTION_RULE
    ];

    if (report.failed_details.length === 0) {
      lines.push('None');
    } else {
      for (const detail of report.failed_details) {
        lines.push(`${detail.recipient} <${detail.email}>: ${detail.reason}`);
      }
    }

    this.appendRecipients(lines, 'SKIPPED (ALREADY SENT THIS CYCLE)', report.skipped);
    this.appendRecipients(lines, 'DEFERRED BY SHUTDOWN', report.deferred);

    if (report.warnings.length > 0) {
      lines.push('', 'WARNINGS', SECTION_RULE);
      for (const warning of report.warnings) {
        lines.push(`- ${warning}`);
      }
    }

    return `${lines.join('\n')}\n`;
  }

  private appendRecipients(lines: string[], title: string, recipients: RecipientRef[]): void {
    if (recipients.length === 0) {
      return;
    }
    lines.push('', title, SECTION_RULE);
    for (const ref of recipients) {
      lines.push(`${ref.recipient} <${ref.email}>`);
    }
  }
}
