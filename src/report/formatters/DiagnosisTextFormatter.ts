import { ActivityDiagnosis } from '../../types/index.js';
import { displayTimestamp } from '../timestamps.js';
import { IReportFormatter } from './IReportFormatter.js';

const RULE = '='.repeat(50);
const SECTION_RULE = '-'.repeat(20);

export class DiagnosisTextFormatter implements IReportFormatter<ActivityDiagnosis> {
  getFileExtension(): string {
    return 'txt';
  }

  getFormatName(): string {
    return 'Text';
  }

  format(diagnosis: ActivityDiagnosis): string {
    const counts = diagnosis.user_counts;
    const lines: string[] = [
      'LMS Activity Diagnosis Report',
      `Generated: ${displayTimestamp(new Date(diagnosis.timestamp))}`,
      RULE,
      '',
      'USER STATISTICS',
      SECTION_RULE,
      `Total users: ${counts.total_users}`,
      `Active users: ${counts.active_users}`,
      `Inactive users: ${counts.inactive_users}`,
      `Users missing last_active: ${counts.users_missing_last_active}`,
      `Potential inactive users: ${counts.potential_inactive_users}`,
      '',
      'NOTIFICATION SETTINGS',
      SECTION_RULE,
      `Inactivity threshold: ${diagnosis.notification_info.threshold_days} days`,
      `Recent notifications (7 days): ${diagnosis.notification_info.recent_notifications}`,
      ''
    ];

    const { inactive_samples, recent_activity } = diagnosis.samples;
    if (inactive_samples.length > 0) {
      lines.push('SAMPLE INACTIVE USERS', SECTION_RULE);
      for (const sample of inactive_samples) {
        lines.push(
          `User ${sample.user_id}: ${sample.days_inactive} days inactive, has email: ${sample.has_email ? 'yes' : 'no'}`
        );
      }
    } else {
      lines.push(
        'NO INACTIVE USERS FOUND',
        SECTION_RULE,
        'No users meet the criteria for inactivity notification.'
      );
    }

    if (recent_activity.length > 0) {
      lines.push('', 'RECENT USER ACTIVITY', SECTION_RULE);
      for (const sample of recent_activity) {
        lines.push(`User ${sample.user_id}: ${sample.days_since_active} days since last active`);
      }
    }

    lines.push('', 'POSSIBLE ISSUES', SECTION_RULE);
    if (diagnosis.possible_issues.length === 0) {
      lines.push('None detected');
    } else {
      for (const issue of diagnosis.possible_issues) {
        lines.push(`- ${issue}`);
      }
    }

    return `${lines.join('\n')}\n`;
  }
}
