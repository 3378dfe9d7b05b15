export const UserRole = {
  STUDENT: 'student',
  INSTRUCTOR: 'instructor',
  ADMIN: 'admin'
} as const;
export type UserRole = typeof UserRole[keyof typeof UserRole];

/**
 * Read-only view of a user's activity state, as handed to the monitor by the
 * user store. `lastActive` is null for users who never engaged.
 */
export interface UserActivityRecord {
  id: string;
  email: string;
  name: string;
  role: UserRole;
  lastActive: Date | null;
}

/** A store row that could not be turned into a record */
export interface SkippedUserRow {
  id: string;
  issues: string[];
}

export interface UserFetchResult {
  records: UserActivityRecord[];
  skipped: SkippedUserRow[];
}

export interface InactivityThreshold {
  readonly days: number;
}

export type InactivityMeasure =
  | { kind: 'never_active' }
  | { kind: 'elapsed'; elapsedMs: number; days: number };

export interface InactiveCandidate {
  record: UserActivityRecord;
  inactivity: InactivityMeasure;
}

export const DispatchStatus = {
  SENT: 'sent',
  FAILED: 'failed'
} as const;
export type DispatchStatus = typeof DispatchStatus[keyof typeof DispatchStatus];

interface DispatchOutcomeBase {
  recipientId: string;
  recipientEmail: string;
  attemptedAt: Date;
}

export interface SentOutcome extends DispatchOutcomeBase {
  status: 'sent';
}

export interface FailedOutcome extends DispatchOutcomeBase {
  status: 'failed';
  reason: string;
}

export type DispatchOutcome = SentOutcome | FailedOutcome;

export interface AuditEntry {
  id?: number;
  cycle_id: string;
  recipient: string;
  recipient_email: string;
  timestamp: Date;
  status: DispatchStatus;
  reason?: string;
}

export interface FailedDetail {
  recipient: string;
  email: string;
  reason: string;
  attempted_at: string;
}

export interface RecipientRef {
  recipient: string;
  email: string;
}

export interface ScanReport {
  cycle_id: string;
  start: string;
  end: string;
  threshold_days: number;
  total: number;
  sent: number;
  failed: number;
  failed_details: FailedDetail[];
  skipped: RecipientRef[];
  deferred: RecipientRef[];
  interrupted: boolean;
  warnings: string[];
}

export interface ReportPaths {
  jsonPath: string;
  textPath: string;
}

export const CyclePhase = {
  START: 'START',
  FETCHING: 'FETCHING',
  CLASSIFYING: 'CLASSIFYING',
  DISPATCHING: 'DISPATCHING',
  REPORTING: 'REPORTING',
  DONE: 'DONE',
  FAILED: 'FAILED'
} as const;
export type CyclePhase = typeof CyclePhase[keyof typeof CyclePhase];

export interface CompletedCycle {
  status: 'completed';
  report: ScanReport;
  reportPaths: ReportPaths | null;
  warnings: string[];
}

export interface FailedCycle {
  status: 'failed';
  cycleId: string;
  phase: 'FETCHING';
  error: Error;
  startedAt: Date;
}

export type CycleResult = CompletedCycle | FailedCycle;

export type ScheduleType = 'daily' | 'weekly' | 'interval';

export interface ActivityStatistics {
  total_users: number;
  active_users: number;
  inactive_users: number;
  users_missing_last_active: number;
  potential_inactive_users: number;
  recent_notifications: number;
}

export interface RecentActivitySample {
  user_id: string;
  days_since_active: number;
  is_active_flag: boolean;
}

export interface InactiveSample {
  user_id: string;
  days_inactive: number;
  has_email: boolean;
}

export interface ActivityDiagnosis {
  timestamp: string;
  user_counts: Omit<ActivityStatistics, 'recent_notifications'>;
  notification_info: {
    recent_notifications: number;
    threshold_days: number;
  };
  samples: {
    recent_activity: RecentActivitySample[];
    inactive_samples: InactiveSample[];
  };
  possible_issues: string[];
}
