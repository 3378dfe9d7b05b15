import { ActivityDiagnosis, ActivityStatistics, ReportPaths } from '../types/index.js';
import { createDiagnosisFormatters } from '../report/formatters/index.js';
import { ReportFormatterRegistry } from '../report/formatters/FormatterRegistry.js';
import { ReportWriter } from '../report/ReportWriter.js';
import { fileTimestamp } from '../report/timestamps.js';
import { logger } from '../utils/logger.js';
import { ActivityStatisticsSource } from './UserActivityStore.js';

export const DIAGNOSIS_REPORT_PREFIX = 'activity_report';
const RECENT_ACTIVITY_SAMPLE_SIZE = 10;

export interface DiagnosisResult {
  diagnosis: ActivityDiagnosis;
  reportPaths: ReportPaths;
}

/**
 * Explains why a scan might find fewer inactive users than expected:
 * account counts, timestamp coverage and samples on both sides of the threshold.
 */
export class ActivityDiagnostics {
  private readonly writer: ReportWriter;

  constructor(
    private readonly source: ActivityStatisticsSource,
    reportDir: string,
    private readonly sampleSize: number = 5,
    private readonly formatters: ReportFormatterRegistry<ActivityDiagnosis> = createDiagnosisFormatters()
  ) {
    this.writer = new ReportWriter(reportDir);
  }

  async diagnose(now: Date, thresholdDays: number): Promise<ActivityDiagnosis> {
    logger.info('Running activity diagnosis', { thresholdDays });

    const [statistics, recentActivity, inactiveSamples] = await Promise.all([
      this.source.getActivityStatistics(now, thresholdDays),
      this.source.getRecentActivity(now, RECENT_ACTIVITY_SAMPLE_SIZE),
      this.source.getInactiveSamples(now, thresholdDays, this.sampleSize)
    ]);

    const { recent_notifications, ...userCounts } = statistics;
    const diagnosis: ActivityDiagnosis = {
      timestamp: now.toISOString(),
      user_counts: userCounts,
      notification_info: {
        recent_notifications,
        threshold_days: thresholdDays
      },
      samples: {
        recent_activity: recentActivity,
        inactive_samples: inactiveSamples
      },
      possible_issues: ActivityDiagnostics.findIssues(statistics, thresholdDays)
    };

    logger.info('Activity diagnosis summary', {
      ...userCounts,
      recent_notifications,
      possible_issues: diagnosis.possible_issues.length
    });

    return diagnosis;
  }

  /**
   * Diagnose and write `activity_report_<YYYYMMDD_HHMMSS>.json/.txt`
   */
  async run(now: Date, thresholdDays: number): Promise<DiagnosisResult> {
    const diagnosis = await this.diagnose(now, thresholdDays);
    const reportPaths = await this.writer.write(
      `${DIAGNOSIS_REPORT_PREFIX}_${fileTimestamp(now)}`,
      diagnosis,
      this.formatters
    );
    logger.info('Diagnosis complete', reportPaths);
    return { diagnosis, reportPaths };
  }

  static findIssues(statistics: ActivityStatistics, thresholdDays: number): string[] {
    const issues: string[] = [];
    const total = statistics.total_users;
    const missing = statistics.users_missing_last_active;

    if (total === 0) {
      issues.push('No users found in the database');
    }
    if (missing > 0) {
      const percentage = total > 0 ? (missing / total) * 100 : 0;
      issues.push(`${missing} users (${percentage.toFixed(1)}%) are missing last_active timestamps`);
    }
    if (statistics.potential_inactive_users === 0 && total > 0) {
      issues.push(`No users meet the inactivity threshold of ${thresholdDays} days`);
    }

    return issues;
  }
}
