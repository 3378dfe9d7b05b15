import { ActivityDiagnostics, DiagnosisResult } from "../activity/ActivityDiagnostics.js";
import { SqliteUserActivityStore } from "../activity/UserActivityStore.js";
import { SqliteAuditLog } from "../audit/AuditLog.js";
import { MonitorConfig } from "../config/MonitorConfig.js";
import { DatabaseManager } from "../database/DatabaseManager.js";
import { EmailDispatcher } from "../notification/EmailDispatcher.js";
import { createMailTransport, MailTransport } from "../notification/MailTransport.js";
import { ReportGenerator } from "../report/ReportGenerator.js";
import { Clock, systemClock } from "../scan/Clock.js";
import { ScanCycle } from "../scan/ScanCycle.js";
import { MonitorScheduler } from "../scheduler/MonitorScheduler.js";
import { CycleResult } from "../types/index.js";
import { logger } from "../utils/logger.js";

export interface MonitorDaemonOptions {
  dbManager?: DatabaseManager;
  transport?: MailTransport;
  clock?: Clock;
}

/**
 * Wires the monitor together and owns its resources: the database, the mail
 * transport, the scheduler and whichever cycle is in flight.
 */
export class MonitorDaemon {
  private readonly dbManager: DatabaseManager;
  private readonly store: SqliteUserActivityStore;
  private readonly auditLog: SqliteAuditLog;
  private readonly transport: MailTransport;
  private readonly reportGenerator: ReportGenerator;
  private readonly diagnostics: ActivityDiagnostics;
  private readonly clock: Clock;

  private scheduler: MonitorScheduler | null = null;
  private activeCycle: ScanCycle | null = null;
  private activeRun: Promise<CycleResult> | null = null;
  private shuttingDown = false;

  constructor(private readonly config: MonitorConfig, options: MonitorDaemonOptions = {}) {
    this.dbManager = options.dbManager ?? new DatabaseManager(config.storage.databasePath);
    this.clock = options.clock ?? systemClock;
    this.store = new SqliteUserActivityStore(this.dbManager, config.monitoring.eligibleRoles);
    this.auditLog = new SqliteAuditLog(this.dbManager);
    this.transport = options.transport ?? createMailTransport(config);
    this.reportGenerator = new ReportGenerator(config.storage.reportDir);
    this.diagnostics = new ActivityDiagnostics(
      this.store,
      config.storage.reportDir,
      config.diagnostics.sampleSize
    );
  }

  async initialize(): Promise<void> {
    await this.dbManager.initialize();
  }

  /**
   * Run one scan cycle, followed by diagnostics when they are enabled or
   * when nothing was sent
   */
  async runOnce(): Promise<CycleResult> {
    const run = this.runCycleAndDiagnose();
    this.activeRun = run;
    try {
      return await run;
    } finally {
      this.activeRun = null;
    }
  }

  private async runCycleAndDiagnose(): Promise<CycleResult> {
    const cycle = new ScanCycle(
      {
        store: this.store,
        dispatcher: new EmailDispatcher(this.transport, { subject: this.config.dispatch.subject }, this.clock),
        auditLog: this.auditLog,
        reportGenerator: this.reportGenerator,
        notificationSink: this.store,
        clock: this.clock,
        eligibleRoles: this.config.monitoring.eligibleRoles,
        concurrency: this.config.dispatch.concurrency,
      },
      { days: this.config.monitoring.thresholdDays }
    );

    this.activeCycle = cycle;
    let result: CycleResult;
    try {
      result = await cycle.run();
    } finally {
      this.activeCycle = null;
    }

    if (result.status === "failed") {
      logger.error(`Scan cycle ${result.cycleId} failed: ${result.error.message}`);
      return result;
    }

    logger.info(
      `Scan cycle ${result.report.cycle_id} notified ${result.report.sent} of ${result.report.total} inactive user(s)`
    );

    if (!this.shuttingDown && (this.config.diagnostics.enabled || result.report.sent === 0)) {
      try {
        await this.diagnose();
      } catch (error) {
        logger.warn("Activity diagnostics failed", { error: String(error) });
      }
    }

    return result;
  }

  async diagnose(): Promise<DiagnosisResult> {
    return this.diagnostics.run(this.clock.now(), this.config.monitoring.thresholdDays);
  }

  /**
   * Run cycles on the configured schedule until shutdown()
   */
  startScheduled(): void {
    this.scheduler = new MonitorScheduler(
      { type: this.config.schedule.type, expression: this.config.schedule.expression },
      async () => {
        await this.runOnce();
      },
      this.clock
    );
    this.scheduler.start();
  }

  /**
   * Stop starting work, let in-flight sends finish, then release resources
   */
  async shutdown(): Promise<void> {
    if (this.shuttingDown) {
      return;
    }
    this.shuttingDown = true;
    logger.info("Shutting down inactivity monitor");

    this.activeCycle?.requestShutdown();
    if (this.scheduler) {
      await this.scheduler.stop();
    }
    if (this.activeRun) {
      await this.activeRun.catch((error: unknown) => {
        logger.error("Scan cycle ended with an error during shutdown:", error);
      });
    }
    await this.auditLog.flush();
    await this.transport.close();
    await this.dbManager.close();
  }
}
