import { describe, it, expect, beforeEach } from '@jest/globals';
import { ActivityClassifier, DAY_MS } from '../../../src/activity/ActivityClassifier.js';
import { InactivityThreshold, UserActivityRecord } from '../../../src/types/index.js';
import {
  SCAN_TIME,
  mockInactiveStudent,
  mockInstructor,
  mockNeverActiveStudent,
  mockRecentStudent
} from '../../fixtures/mockData.js';

describe('ActivityClassifier', () => {
  let classifier: ActivityClassifier;
  const thirtyDays: InactivityThreshold = { days: 30 };

  beforeEach(() => {
    classifier = new ActivityClassifier();
  });

  describe('classify', () => {
    it('should return an elapsed candidate for a user past the threshold', () => {
      const candidate = classifier.classify(mockInactiveStudent, thirtyDays, SCAN_TIME);

      expect(candidate).toEqual({
        record: mockInactiveStudent,
        inactivity: { kind: 'elapsed', elapsedMs: 61 * DAY_MS, days: 61 }
      });
    });

    it('should return null for a user inside the threshold', () => {
      expect(classifier.classify(mockRecentStudent, thirtyDays, SCAN_TIME)).toBeNull();
    });

    it('should treat a user who never engaged as inactive whatever the threshold', () => {
      const candidate = classifier.classify(mockNeverActiveStudent, { days: 10_000 }, SCAN_TIME);

      expect(candidate).toEqual({
        record: mockNeverActiveStudent,
        inactivity: { kind: 'never_active' }
      });
    });

    it('should include the exact threshold instant', () => {
      const record: UserActivityRecord = {
        ...mockRecentStudent,
        lastActive: new Date(SCAN_TIME.getTime() - 30 * DAY_MS)
      };

      const candidate = classifier.classify(record, thirtyDays, SCAN_TIME);

      expect(candidate?.inactivity).toEqual({ kind: 'elapsed', elapsedMs: 30 * DAY_MS, days: 30 });
    });

    it('should exclude one millisecond before the threshold', () => {
      const record: UserActivityRecord = {
        ...mockRecentStudent,
        lastActive: new Date(SCAN_TIME.getTime() - 30 * DAY_MS + 1)
      };

      expect(classifier.classify(record, thirtyDays, SCAN_TIME)).toBeNull();
    });

    it('should floor partial days', () => {
      const record: UserActivityRecord = {
        ...mockRecentStudent,
        lastActive: new Date(SCAN_TIME.getTime() - 31 * DAY_MS - 12 * 60 * 60 * 1000)
      };

      const candidate = classifier.classify(record, thirtyDays, SCAN_TIME);

      expect(candidate?.inactivity).toEqual({
        kind: 'elapsed',
        elapsedMs: 31 * DAY_MS + 12 * 60 * 60 * 1000,
        days: 31
      });
    });

    it('should never classify a future last-active time as inactive', () => {
      const record: UserActivityRecord = {
        ...mockRecentStudent,
        lastActive: new Date(SCAN_TIME.getTime() + DAY_MS)
      };

      expect(classifier.classify(record, { days: 0 }, SCAN_TIME)).toBeNull();
    });

    it('should ignore the role of the record', () => {
      const candidate = classifier.classify(mockInstructor, thirtyDays, SCAN_TIME);

      expect(candidate?.inactivity).toEqual({ kind: 'never_active' });
    });
  });

  describe('classifyAll', () => {
    it('should return the inactive users in input order', () => {
      const candidates = classifier.classifyAll(
        [mockInactiveStudent, mockRecentStudent, mockNeverActiveStudent],
        thirtyDays,
        SCAN_TIME
      );

      expect(candidates.map((c) => c.record.id)).toEqual(['1', '3']);
      expect(candidates).toHaveLength(2);
    });

    it('should return an empty list when nobody is inactive', () => {
      expect(classifier.classifyAll([mockRecentStudent], thirtyDays, SCAN_TIME)).toEqual([]);
    });
  });

  describe('isFutureActivity', () => {
    it('should flag last-active times after now', () => {
      const record = { ...mockRecentStudent, lastActive: new Date(SCAN_TIME.getTime() + 1) };
      expect(classifier.isFutureActivity(record, SCAN_TIME)).toBe(true);
    });

    it('should not flag past or missing last-active times', () => {
      expect(classifier.isFutureActivity(mockRecentStudent, SCAN_TIME)).toBe(false);
      expect(classifier.isFutureActivity(mockNeverActiveStudent, SCAN_TIME)).toBe(false);
    });
  });
});
