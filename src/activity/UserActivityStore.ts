import { z } from 'zod';
import { DatabaseManager } from '../database/DatabaseManager.js';
import { StoreUnavailableError, toError } from '../errors/MonitorError.js';
import {
  ActivityStatistics,
  InactiveSample,
  RecentActivitySample,
  SkippedUserRow,
  UserActivityRecord,
  UserFetchResult,
  UserRole
} from '../types/index.js';
import { logger } from '../utils/logger.js';
import { DAY_MS } from './ActivityClassifier.js';

/**
 * Read side of the user store, as seen by the scan cycle
 */
export interface UserActivityStore {
  /**
   * Every active account eligible for monitoring, plus the rows that failed
   * validation. Rejects with StoreUnavailableError when the store cannot be read.
   */
  fetchStudents(): Promise<UserFetchResult>;
}

/**
 * Write side: remembers that a user was notified
 */
export interface NotificationSink {
  recordNotification(userId: string, message: string, sentAt: Date): Promise<void>;
}

export interface ActivityStatisticsSource {
  getActivityStatistics(now: Date, thresholdDays: number): Promise<ActivityStatistics>;
  getRecentActivity(now: Date, limit: number): Promise<RecentActivitySample[]>;
  getInactiveSamples(now: Date, thresholdDays: number, limit: number): Promise<InactiveSample[]>;
}

const RECENT_NOTIFICATION_WINDOW_DAYS = 7;

// Local parts and hosts are left to the mail server; campus hosts often have no TLD
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+$/;

const userRowSchema = z.object({
  id: z.number().int(),
  name: z.string().min(1),
  email: z.string().regex(EMAIL_PATTERN, 'invalid email address'),
  role: z.enum([UserRole.STUDENT, UserRole.INSTRUCTOR, UserRole.ADMIN]),
  last_active: z.number().nullable()
});

const rowIdSchema = z.object({ id: z.union([z.number(), z.string()]) });

const countRowSchema = z.object({ count: z.number() });

const recentRowSchema = z.object({
  id: z.number().int(),
  last_active: z.number(),
  is_active: z.number()
});

const inactiveRowSchema = z.object({
  id: z.number().int(),
  last_active: z.number(),
  email: z.string().nullable()
});

function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

function daysBetween(now: Date, epochSeconds: number): number {
  return Math.floor((now.getTime() - epochSeconds * 1000) / DAY_MS);
}

function placeholders(count: number): string {
  return new Array(count).fill('?').join(', ');
}

/**
 * sqlite-backed user store. Timestamps are stored as epoch seconds.
 */
export class SqliteUserActivityStore implements UserActivityStore, NotificationSink, ActivityStatisticsSource {
  private readonly roles: readonly UserRole[];

  constructor(
    private readonly dbManager: DatabaseManager,
    roles: readonly UserRole[] = [UserRole.STUDENT]
  ) {
    this.roles = [...roles];
  }

  async fetchStudents(): Promise<UserFetchResult> {
    let rows: unknown[];
    try {
      rows = await this.dbManager.queryAll(
        `SELECT id, name, email, role, last_active FROM users
         WHERE is_active = 1 AND role IN (${placeholders(this.roles.length)})
         ORDER BY id`,
        [...this.roles]
      );
    } catch (error) {
      logger.error('Failed to fetch users from the activity store:', error);
      throw new StoreUnavailableError('Activity store could not be read', toError(error));
    }

    const records: UserActivityRecord[] = [];
    const skipped: SkippedUserRow[] = [];
    for (const row of rows) {
      const parsed = userRowSchema.safeParse(row);
      if (!parsed.success) {
        const rowId = rowIdSchema.safeParse(row);
        const entry: SkippedUserRow = {
          id: rowId.success ? String(rowId.data.id) : 'unknown',
          issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        };
        logger.warn(`Skipping malformed user row ${entry.id}`, { issues: entry.issues });
        skipped.push(entry);
        continue;
      }

      const { id, name, email, role, last_active } = parsed.data;
      records.push({
        id: String(id),
        name,
        email,
        role,
        lastActive: last_active === null ? null : new Date(last_active * 1000)
      });
    }

    logger.debug(`Fetched ${records.length} monitored users`, { skipped: skipped.length });
    return { records, skipped };
  }

  async recordNotification(userId: string, message: string, sentAt: Date): Promise<void> {
    const sentAtSeconds = toEpochSeconds(sentAt);
    try {
      await this.dbManager.execute(
        'INSERT INTO notifications (user_id, message, sent_at) VALUES (?, ?, ?)',
        [Number(userId), message, sentAtSeconds]
      );
      await this.dbManager.execute(
        'UPDATE users SET last_notification = ? WHERE id = ?',
        [sentAtSeconds, Number(userId)]
      );
    } catch (error) {
      logger.error(`Failed to record notification for user ${userId}:`, error);
      throw error;
    }
  }

  async getActivityStatistics(now: Date, thresholdDays: number): Promise<ActivityStatistics> {
    const cutoff = toEpochSeconds(now) - thresholdDays * 86400;
    const weekAgo = toEpochSeconds(now) - RECENT_NOTIFICATION_WINDOW_DAYS * 86400;

    const [total, active, inactive, missing, potential, notifications] = await Promise.all([
      this.count('SELECT COUNT(*) AS count FROM users'),
      this.count('SELECT COUNT(*) AS count FROM users WHERE is_active = 1'),
      this.count('SELECT COUNT(*) AS count FROM users WHERE is_active = 0'),
      this.count('SELECT COUNT(*) AS count FROM users WHERE last_active IS NULL'),
      this.count(
        `SELECT COUNT(*) AS count FROM users
         WHERE last_active <= ? AND is_active = 1 AND role IN (${placeholders(this.roles.length)})`,
        [cutoff, ...this.roles]
      ),
      this.count('SELECT COUNT(*) AS count FROM notifications WHERE sent_at >= ?', [weekAgo])
    ]);

    return {
      total_users: total,
      active_users: active,
      inactive_users: inactive,
      users_missing_last_active: missing,
      potential_inactive_users: potential,
      recent_notifications: notifications
    };
  }

  async getRecentActivity(now: Date, limit: number): Promise<RecentActivitySample[]> {
    const rows = await this.dbManager.queryAll(
      `SELECT id, last_active, is_active FROM users
       WHERE last_active IS NOT NULL
       ORDER BY last_active DESC, id
       LIMIT ?`,
      [limit]
    );

    return rows.map((row) => {
      const { id, last_active, is_active } = recentRowSchema.parse(row);
      return {
        user_id: String(id),
        days_since_active: daysBetween(now, last_active),
        is_active_flag: is_active === 1
      };
    });
  }

  async getInactiveSamples(now: Date, thresholdDays: number, limit: number): Promise<InactiveSample[]> {
    const cutoff = toEpochSeconds(now) - thresholdDays * 86400;
    const rows = await this.dbManager.queryAll(
      `SELECT id, last_active, email FROM users
       WHERE last_active <= ? AND is_active = 1 AND role IN (${placeholders(this.roles.length)})
       ORDER BY id
       LIMIT ?`,
      [cutoff, ...this.roles, limit]
    );

    return rows.map((row) => {
      const { id, last_active, email } = inactiveRowSchema.parse(row);
      return {
        user_id: String(id),
        days_inactive: daysBetween(now, last_active),
        has_email: Boolean(email)
      };
    });
  }

  private async count(sql: string, params: Array<string | number> = []): Promise<number> {
    const row = await this.dbManager.query(sql, params);
    return countRowSchema.parse(row).count;
  }
}
