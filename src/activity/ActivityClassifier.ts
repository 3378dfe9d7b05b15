import {
  InactiveCandidate,
  InactivityMeasure,
  InactivityThreshold,
  UserActivityRecord
} from '../types/index.js';

export const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Decides whether a user counts as inactive at a given instant.
 *
 * Users who never engaged are always inactive. Otherwise a user is inactive once
 * the time since their last activity reaches the threshold (inclusive). The
 * classifier has no notion of roles; callers filter ineligible users first.
 */
export class ActivityClassifier {
  classify(
    record: UserActivityRecord,
    threshold: InactivityThreshold,
    now: Date
  ): InactiveCandidate | null {
    const inactivity = this.measure(record, now);
    if (inactivity.kind === 'never_active') {
      return { record, inactivity };
    }

    // Future timestamps give a negative elapsed time and never qualify
    if (inactivity.elapsedMs >= threshold.days * DAY_MS) {
      return { record, inactivity };
    }

    return null;
  }

  /**
   * Classify a batch, keeping input order
   */
  classifyAll(
    records: readonly UserActivityRecord[],
    threshold: InactivityThreshold,
    now: Date
  ): InactiveCandidate[] {
    const candidates: InactiveCandidate[] = [];
    for (const record of records) {
      const candidate = this.classify(record, threshold, now);
      if (candidate) {
        candidates.push(candidate);
      }
    }
    return candidates;
  }

  isFutureActivity(record: UserActivityRecord, now: Date): boolean {
    return record.lastActive !== null && record.lastActive.getTime() > now.getTime();
  }

  private measure(record: UserActivityRecord, now: Date): InactivityMeasure {
    if (record.lastActive === null) {
      return { kind: 'never_active' };
    }

    const elapsedMs = now.getTime() - record.lastActive.getTime();
    return {
      kind: 'elapsed',
      elapsedMs,
      days: Math.floor(elapsedMs / DAY_MS)
    };
  }
}
