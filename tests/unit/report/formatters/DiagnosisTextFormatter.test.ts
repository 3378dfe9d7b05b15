import { describe, it, expect } from '@jest/globals';
import { DiagnosisTextFormatter } from '../../../../src/report/formatters/DiagnosisTextFormatter.js';
import { ActivityDiagnosis } from '../../../../src/types/index.js';

const SECTION = '-'.repeat(20);

function diagnosis(overrides: Partial<ActivityDiagnosis> = {}): ActivityDiagnosis {
  return {
    timestamp: '2024-06-01T00:00:00.000Z',
    user_counts: {
      total_users: 5,
      active_users: 4,
      inactive_users: 1,
      users_missing_last_active: 1,
      potential_inactive_users: 1
    },
    notification_info: { recent_notifications: 2, threshold_days: 14 },
    samples: {
      recent_activity: [{ user_id: '2', days_since_active: 12, is_active_flag: true }],
      inactive_samples: [{ user_id: '1', days_inactive: 61, has_email: true }]
    },
    possible_issues: ['1 users (20.0%) are missing last_active timestamps'],
    ...overrides
  };
}

describe('DiagnosisTextFormatter', () => {
  const formatter = new DiagnosisTextFormatter();

  it('should format counts, samples and issues', () => {
    expect(formatter.format(diagnosis())).toBe(
      [
        'LMS Activity Diagnosis Report',
        'Generated: 2024-06-01 00:00:00',
        '='.repeat(50),
        '',
        'USER STATISTICS',
        SECTION,
        'Total users: 5',
        'Active users: 4',
        'Inactive users: 1',
        'Users missing last_active: 1',
        'Potential inactive users: 1',
        '',
        'NOTIFICATION SETTINGS',
        SECTION,
        'Inactivity threshold: 14 days',
        'Recent notifications (7 days): 2',
        '',
        'SAMPLE INACTIVE USERS',
        SECTION,
        'User 1: 61 days inactive, has email: yes',
        '',
        'RECENT USER ACTIVITY',
        SECTION,
        'User 2: 12 days since last active',
        '',
        'POSSIBLE ISSUES',
        SECTION,
        '- 1 users (20.0%) are missing last_active timestamps',
        ''
      ].join('\n')
    );
  });

  it('should say so when nobody is inactive', () => {
    const text = formatter.format(
      diagnosis({ samples: { recent_activity: [], inactive_samples: [] }, possible_issues: [] })
    );

    expect(text.split('\n').slice(17)).toEqual([
      'NO INACTIVE USERS FOUND',
      SECTION,
      'No users meet the criteria for inactivity notification.',
      '',
      'POSSIBLE ISSUES',
      SECTION,
      'None detected',
      ''
    ]);
  });
});
