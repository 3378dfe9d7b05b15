import { describe, it, expect } from '@jest/globals';
import { ScanReportTextFormatter } from '../../../../src/report/formatters/ScanReportTextFormatter.js';
import { ScanReport } from '../../../../src/types/index.js';

const RULE = '='.repeat(50);
const SECTION = '-'.repeat(20);

function report(overrides: Partial<ScanReport> = {}): ScanReport {
  return {
    cycle_id: 'cycle_test',
    start: '2024-06-01T02:00:00.000Z',
    end: '2024-06-01T02:00:03.500Z',
    threshold_days: 14,
    total: 2,
    sent: 2,
    failed: 0,
    failed_details: [],
    skipped: [],
    deferred: [],
    interrupted: false,
    warnings: [],
    ...overrides
  };
}

describe('ScanReportTextFormatter', () => {
  const formatter = new ScanReportTextFormatter();

  it('should format a clean cycle', () => {
    expect(formatter.format(report())).toBe(
      [
        'LMS Inactivity Scan Report',
        'Cycle: cycle_test',
        'Started: 2024-06-01 02:00:00 UTC',
        'Finished: 2024-06-01 02:00:03 UTC',
        RULE,
        '',
        'SUMMARY',
        SECTION,
        'Inactivity threshold: 14 days',
        'Candidates: 2',
        'Sent: 2',
        'Failed: 0',
        'Skipped: 0',
        'Deferred: 0',
        'Interrupted: no',
        '',
        'FAILED RECIPIENTS',
        SECTION,
        'None',
        ''
      ].join('\n')
    );
  });

  it('should list failures, skipped, deferred and warnings', () => {
    const text = formatter.format(
      report({
        total: 1,
        sent: 0,
        failed: 1,
        failed_details: [
          { recipient: '1', email: 'alice@example.edu', reason: 'mailbox full', attempted_at: '2024-06-01T02:00:01.000Z' }
        ],
        skipped: [{ recipient: '3', email: 'carol@example.edu' }],
        deferred: [{ recipient: '5', email: 'erin@example.edu' }],
        interrupted: true,
        warnings: ['Duplicate user id 2 ignored']
      })
    );

    expect(text.split('\n').slice(14)).toEqual([
      'Interrupted: yes',
      '',
      'FAILED RECIPIENTS',
      SECTION,
      '1 <alice@example.edu>: mailbox full',
      '',
      'SKIPPED (ALREADY SENT THIS CYCLE)',
      SECTION,
      '3 <carol@example.edu>',
      '',
      'DEFERRED BY SHUTDOWN',
      SECTION,
      '5 <erin@example.edu>',
      '',
      'WARNINGS',
      SECTION,
      '- Duplicate user id 2 ignored',
      ''
    ]);
  });
});
