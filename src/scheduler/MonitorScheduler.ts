import { ConfigurationError } from "../errors/MonitorError.js";
import { Clock, systemClock } from "../scan/Clock.js";
import { ScheduleType } from "../types/index.js";
import { logger } from "../utils/logger.js";

export type { ScheduleType } from "../types/index.js";

/**
 * When the monitor runs. Times are local to the host.
 *
 * - daily: "HH:MM"
 * - weekly: "monday:HH:MM" or "1:HH:MM" (0=Sunday)
 * - interval: milliseconds, at least 60000
 */
export interface MonitorSchedule {
  type: ScheduleType;
  expression: string;
}

export type ScheduledTask = () => Promise<void>;

const CHECK_INTERVAL_MS = 60 * 1000;
const MIN_INTERVAL_MS = 60 * 1000;
const DAY_NAMES = [
  "sunday",
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
];

/**
 * Triggers the scan task on a schedule. A tick that comes due while the
 * previous run is still going is skipped, so runs never overlap.
 */
export class MonitorScheduler {
  private timer: NodeJS.Timeout | null = null;
  private nextRun: Date;
  private running: Promise<void> | null = null;

  constructor(
    private readonly schedule: MonitorSchedule,
    private readonly task: ScheduledTask,
    private readonly clock: Clock = systemClock
  ) {
    MonitorScheduler.validateSchedule(schedule);
    this.nextRun = MonitorScheduler.calculateNextRun(schedule, this.clock.now());
  }

  /**
   * Start the scheduler
   */
  start(): void {
    if (this.timer) {
      logger.warn("MonitorScheduler already running");
      return;
    }

    // Every schedule is checked once a minute; tick() decides whether a run is due
    this.timer = setInterval(() => {
      this.tick().catch((error: unknown) => {
        logger.error("Scheduler tick failed:", error);
      });
    }, CHECK_INTERVAL_MS);

    logger.info("MonitorScheduler started", {
      type: this.schedule.type,
      expression: this.schedule.expression,
      next_run: this.nextRun.toISOString(),
    });
  }

  /**
   * Stop scheduling and wait for a run in progress to finish
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.running) {
      logger.info("Waiting for the running scan cycle to finish");
      await this.running;
    }
    logger.info("MonitorScheduler stopped");
  }

  /**
   * Run the task if it is due. Resolves true when a run started (and has finished).
   */
  async tick(): Promise<boolean> {
    const now = this.clock.now();
    if (now < this.nextRun) {
      return false;
    }

    this.nextRun = MonitorScheduler.calculateNextRun(this.schedule, now);

    if (this.running) {
      logger.warn("Previous scan cycle still running; skipping this run", {
        next_run: this.nextRun.toISOString(),
      });
      return false;
    }

    logger.info("Executing scheduled scan", { actual_time: now.toISOString() });
    this.running = this.execute();
    await this.running;
    return true;
  }

  private async execute(): Promise<void> {
    try {
      await this.task();
    } catch (error) {
      logger.error("Scheduled scan failed:", error);
    } finally {
      this.running = null;
    }
  }

  /**
   * Calculate the next run time strictly after `fromTime`
   */
  static calculateNextRun(schedule: MonitorSchedule, fromTime: Date): Date {
    switch (schedule.type) {
      case "daily":
        return MonitorScheduler.calculateDailyNextRun(schedule.expression, fromTime);
      case "weekly":
        return MonitorScheduler.calculateWeeklyNextRun(schedule.expression, fromTime);
      case "interval":
        return new Date(fromTime.getTime() + parseInt(schedule.expression, 10));
    }
  }

  private static calculateDailyNextRun(timeExpression: string, fromTime: Date): Date {
    const [hours, minutes] = timeExpression.split(":").map(Number);
    const nextRun = new Date(fromTime);

    nextRun.setHours(hours, minutes, 0, 0);

    // If time has passed today, schedule for tomorrow
    if (nextRun <= fromTime) {
      nextRun.setDate(nextRun.getDate() + 1);
    }

    return nextRun;
  }

  private static calculateWeeklyNextRun(dayTimeExpression: string, fromTime: Date): Date {
    const [dayPart, hours, minutes] = dayTimeExpression.split(":");
    const targetDay = isNaN(Number(dayPart))
      ? DAY_NAMES.indexOf(dayPart.toLowerCase())
      : Number(dayPart);

    const nextRun = new Date(fromTime);
    let daysToAdd = targetDay - nextRun.getDay();
    if (daysToAdd < 0) {
      daysToAdd += 7;
    } else if (daysToAdd === 0) {
      // Same day - check if time has passed
      nextRun.setHours(Number(hours), Number(minutes), 0, 0);
      if (nextRun <= fromTime) {
        daysToAdd = 7;
      }
    }

    nextRun.setDate(nextRun.getDate() + daysToAdd);
    nextRun.setHours(Number(hours), Number(minutes), 0, 0);

    return nextRun;
  }

  /**
   * @throws ConfigurationError
   */
  static validateSchedule(schedule: MonitorSchedule): void {
    const expression = schedule.expression.trim();
    if (!expression) {
      throw new ConfigurationError(["Schedule expression is required"]);
    }

    switch (schedule.type) {
      case "daily": {
        const match = /^(\d{1,2}):(\d{2})$/.exec(expression);
        if (!match || Number(match[1]) > 23 || Number(match[2]) > 59) {
          throw new ConfigurationError(["Daily schedule expression must be in HH:MM format"]);
        }
        break;
      }

      case "weekly": {
        const match =
          /^(monday|tuesday|wednesday|thursday|friday|saturday|sunday|[0-6]):(\d{1,2}):(\d{2})$/i.exec(
            expression
          );
        if (!match || Number(match[2]) > 23 || Number(match[3]) > 59) {
          throw new ConfigurationError(["Weekly schedule expression must be in day:HH:MM format"]);
        }
        break;
      }

      case "interval": {
        const interval = Number(expression);
        if (!Number.isInteger(interval) || interval < MIN_INTERVAL_MS) {
          throw new ConfigurationError([
            `Interval expression must be a number >= ${MIN_INTERVAL_MS} (milliseconds)`,
          ]);
        }
        break;
      }

      default:
        throw new ConfigurationError([`Unsupported schedule type: ${String(schedule.type)}`]);
    }
  }
}
