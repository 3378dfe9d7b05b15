import type { Logger } from 'winston';
import { ActivityClassifier } from '../activity/ActivityClassifier.js';
import { NotificationSink, UserActivityStore } from '../activity/UserActivityStore.js';
import { AuditLog, sentRecipients } from '../audit/AuditLog.js';
import {
  describeError,
  describeRootCause,
  ErrorFormatter,
  MonitorError,
  toError
} from '../errors/MonitorError.js';
import { NotificationDispatcher } from '../notification/EmailDispatcher.js';
import { notificationRecordMessage } from '../notification/templates.js';
import { ReportGenerator } from '../report/ReportGenerator.js';
import {
  CyclePhase,
  CycleResult,
  DispatchOutcome,
  InactiveCandidate,
  InactivityThreshold,
  RecipientRef,
  ReportPaths,
  UserActivityRecord,
  UserFetchResult,
  UserRole
} from '../types/index.js';
import { getCycleLogger } from '../utils/logger.js';
import { runBounded } from './boundedPool.js';
import { Clock, systemClock } from './Clock.js';

export interface ScanCycleDeps {
  store: UserActivityStore;
  dispatcher: NotificationDispatcher;
  auditLog: AuditLog;
  reportGenerator: ReportGenerator;
  notificationSink?: NotificationSink;
  classifier?: ActivityClassifier;
  clock?: Clock;
  /** Roles that receive inactivity notices (default: students only) */
  eligibleRoles?: readonly UserRole[];
  /** Maximum sends in flight (default 5) */
  concurrency?: number;
  idGenerator?: () => string;
}

interface CandidateResult {
  outcome: DispatchOutcome;
  warnings: string[];
}

const DEFAULT_CONCURRENCY = 5;

export function generateCycleId(): string {
  return `cycle_${Date.now()}_${Math.random().toString(36).slice(2, 10)}`;
}

function toRef(candidate: InactiveCandidate): RecipientRef {
  return { recipient: candidate.record.id, email: candidate.record.email };
}

/**
 * One scan: fetch, classify, dispatch, report.
 *
 * START → FETCHING → CLASSIFYING → DISPATCHING → REPORTING → DONE. Only a
 * failure to read the store ends in FAILED; everything after that degrades
 * to per-recipient failures or warnings. An instance runs once.
 */
export class ScanCycle {
  readonly cycleId: string;

  private phase: CyclePhase = CyclePhase.START;
  private started = false;
  private shutdownRequested = false;

  private readonly threshold: InactivityThreshold;
  private readonly classifier: ActivityClassifier;
  private readonly clock: Clock;
  private readonly eligibleRoles: readonly UserRole[];
  private readonly concurrency: number;
  private readonly log: Logger;

  constructor(private readonly deps: ScanCycleDeps, threshold: InactivityThreshold) {
    this.cycleId = (deps.idGenerator ?? generateCycleId)();
    this.threshold = Object.freeze({ days: threshold.days });
    this.classifier = deps.classifier ?? new ActivityClassifier();
    this.clock = deps.clock ?? systemClock;
    this.eligibleRoles = deps.eligibleRoles ?? [UserRole.STUDENT];
    this.concurrency = deps.concurrency ?? DEFAULT_CONCURRENCY;
    this.log = getCycleLogger(this.cycleId);
  }

  getPhase(): CyclePhase {
    return this.phase;
  }

  /**
   * Stop starting new sends. In-flight sends finish and are audited;
   * candidates not yet started are reported as deferred.
   */
  requestShutdown(): void {
    if (!this.shutdownRequested) {
      this.shutdownRequested = true;
      this.log.info('Shutdown requested; no new notifications will start');
    }
  }

  /**
   * @param now Reference time for classification; defaults to the clock at fetch time
   */
  async run(now?: Date): Promise<CycleResult> {
    if (this.started) {
      throw new MonitorError('CYCLE_ALREADY_RUN', `Scan cycle ${this.cycleId} has already run`);
    }
    this.started = true;

    this.transition(CyclePhase.FETCHING);
    const startedAt = this.clock.now();
    const reference = now ?? startedAt;

    let fetched: UserFetchResult;
    try {
      fetched = await this.deps.store.fetchStudents();
    } catch (error) {
      this.transition(CyclePhase.FAILED);
      this.log.error('Scan cycle failed: activity store unavailable', {
        error: ErrorFormatter.formatErrorForLogs(error)
      });
      return { status: 'failed', cycleId: this.cycleId, phase: 'FETCHING', error: toError(error), startedAt };
    }

    this.transition(CyclePhase.CLASSIFYING);
    const warnings: string[] = fetched.skipped.map(
      (row) => `Invalid user row ${row.id} skipped: ${row.issues.join('; ')}`
    );
    const candidates = this.selectCandidates(fetched.records, reference, warnings);

    this.transition(CyclePhase.DISPATCHING);
    const alreadySent = await this.loadAlreadySent(warnings);
    const skipped: RecipientRef[] = [];
    const pending = candidates.filter((candidate) => {
      if (alreadySent.has(candidate.record.id)) {
        skipped.push(toRef(candidate));
        return false;
      }
      return true;
    });
    if (skipped.length > 0) {
      this.log.warn(`Skipping ${skipped.length} recipients already notified in this cycle`);
    }

    const results = await runBounded(
      pending,
      this.concurrency,
      (candidate) => this.processCandidate(candidate),
      () => !this.shutdownRequested
    );

    const outcomes: DispatchOutcome[] = [];
    const deferred: RecipientRef[] = [];
    results.forEach((result, index) => {
      if (result === undefined) {
        deferred.push(toRef(pending[index]));
      } else {
        outcomes.push(result.outcome);
        warnings.push(...result.warnings);
      }
    });
    if (deferred.length > 0) {
      this.log.warn(`Shutdown deferred ${deferred.length} notifications to the next cycle`);
    }

    this.transition(CyclePhase.REPORTING);
    const report = this.deps.reportGenerator.summarize(this.cycleId, outcomes, {
      start: startedAt,
      end: this.clock.now(),
      thresholdDays: this.threshold.days,
      skipped,
      deferred,
      interrupted: deferred.length > 0,
      warnings
    });

    const resultWarnings = [...report.warnings];
    let reportPaths: ReportPaths | null = null;
    try {
      reportPaths = await this.deps.reportGenerator.persist(report);
    } catch (error) {
      this.log.warn('Scan report could not be persisted', { error: ErrorFormatter.formatErrorForLogs(error) });
      resultWarnings.push(`Report not persisted: ${describeError(error)}`);
    }

    this.transition(CyclePhase.DONE);
    this.log.info('Scan cycle completed', {
      total: report.total,
      sent: report.sent,
      failed: report.failed,
      skipped: skipped.length,
      deferred: deferred.length
    });

    return { status: 'completed', report, reportPaths, warnings: resultWarnings };
  }

  private selectCandidates(
    records: UserActivityRecord[],
    reference: Date,
    warnings: string[]
  ): InactiveCandidate[] {
    const seen = new Set<string>();
    const eligible: UserActivityRecord[] = [];

    for (const record of records) {
      if (!this.eligibleRoles.includes(record.role)) {
        continue;
      }
      if (seen.has(record.id)) {
        warnings.push(`Duplicate user id ${record.id} ignored`);
        continue;
      }
      seen.add(record.id);

      if (this.classifier.isFutureActivity(record, reference)) {
        warnings.push(`User ${record.id} has last activity in the future (${record.lastActive?.toISOString()})`);
      }
      eligible.push(record);
    }

    const candidates = this.classifier.classifyAll(eligible, this.threshold, reference);
    this.log.info(`Classified ${eligible.length} users: ${candidates.length} inactive`, {
      thresholdDays: this.threshold.days,
      fetched: records.length
    });
    return candidates;
  }

  private async loadAlreadySent(warnings: string[]): Promise<Set<string>> {
    try {
      return await sentRecipients(this.deps.auditLog, this.cycleId);
    } catch (error) {
      this.log.warn('Could not read audit entries for this cycle', {
        error: ErrorFormatter.formatErrorForLogs(error)
      });
      warnings.push(`Duplicate-send guard unavailable: ${describeError(error)}`);
      return new Set();
    }
  }

  private async processCandidate(candidate: InactiveCandidate): Promise<CandidateResult> {
    const { record } = candidate;
    const warnings: string[] = [];

    let outcome: DispatchOutcome;
    try {
      outcome = await this.deps.dispatcher.dispatch(candidate);
    } catch (error) {
      // Dispatchers report failure as an outcome; this covers one that throws anyway
      outcome = Object.freeze({
        status: 'failed',
        recipientId: record.id,
        recipientEmail: record.email,
        attemptedAt: this.clock.now(),
        reason: describeError(error)
      });
    }

    try {
      await this.deps.auditLog.record(this.cycleId, outcome);
    } catch (error) {
      const cause = describeRootCause(error);
      warnings.push(`Audit write failed for ${record.id}: ${cause}`);
      if (outcome.status === 'sent') {
        return {
          outcome: Object.freeze({
            status: 'failed',
            recipientId: outcome.recipientId,
            recipientEmail: outcome.recipientEmail,
            attemptedAt: outcome.attemptedAt,
            reason: `delivered but audit write failed: ${cause}`
          }),
          warnings
        };
      }
      return { outcome, warnings };
    }

    if (outcome.status === 'sent' && this.deps.notificationSink) {
      try {
        await this.deps.notificationSink.recordNotification(
          record.id,
          notificationRecordMessage(outcome.attemptedAt),
          outcome.attemptedAt
        );
      } catch (error) {
        warnings.push(`Notification record failed for ${record.id}: ${describeError(error)}`);
      }
    }

    return { outcome, warnings };
  }

  private transition(next: CyclePhase): void {
    this.log.debug(`Cycle phase ${this.phase} -> ${next}`);
    this.phase = next;
  }
}

/**
 * Run one fresh scan cycle
 */
export function runCycle(
  deps: ScanCycleDeps,
  threshold: InactivityThreshold,
  now?: Date
): Promise<CycleResult> {
  return new ScanCycle(deps, threshold).run(now);
}
