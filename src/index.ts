#!/usr/bin/env node
import dotenv from "dotenv";
import path from "path";
import { loadMonitorConfigFromEnv, MonitorConfig } from "./config/MonitorConfig.js";
import { MonitorDaemon } from "./daemon/MonitorDaemon.js";
import { ConfigurationError, MonitorError } from "./errors/MonitorError.js";
import { ReportStore, ReportView } from "./report/ReportStore.js";
import { displayTimestamp } from "./report/timestamps.js";
import { logger } from "./utils/logger.js";

const USAGE = `Usage: lms-inactivity-monitor <command>

Commands:
  run            Run one scan cycle (exit status 1 if the cycle fails)
  diagnose       Write an activity diagnosis report
  reports [n]    List reports, or print report number n (1 = newest)
  daemon         Run scan cycles on the configured schedule`;

function print(line: string = ""): void {
  process.stdout.write(`${line}\n`);
}

/**
 * Ask the daemon to wind down on SIGINT/SIGTERM
 */
function onShutdownSignal(daemon: MonitorDaemon, done: () => void = () => undefined): void {
  const handler = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}`);
    daemon
      .shutdown()
      .catch((error: unknown) => {
        logger.error("Shutdown failed:", error);
      })
      .finally(done);
  };
  process.once("SIGINT", handler);
  process.once("SIGTERM", handler);
}

async function runCommand(config: MonitorConfig): Promise<number> {
  const daemon = new MonitorDaemon(config);
  await daemon.initialize();
  onShutdownSignal(daemon);

  const result = await daemon.runOnce();
  await daemon.shutdown();

  if (result.status === "failed") {
    print(`Scan cycle ${result.cycleId} failed: ${result.error.message}`);
    return 1;
  }

  const { report } = result;
  print(`Scan cycle ${report.cycle_id}: ${report.sent} sent, ${report.failed} failed of ${report.total}`);
  if (result.reportPaths) {
    print(`Report: ${result.reportPaths.textPath}`);
  }
  for (const warning of result.warnings) {
    print(`Warning: ${warning}`);
  }
  return 0;
}

async function diagnoseCommand(config: MonitorConfig): Promise<number> {
  const daemon = new MonitorDaemon(config);
  await daemon.initialize();
  try {
    const { diagnosis, reportPaths } = await daemon.diagnose();
    print(`Potential inactive users: ${diagnosis.user_counts.potential_inactive_users}`);
    for (const issue of diagnosis.possible_issues) {
      print(`- ${issue}`);
    }
    print(`Report: ${reportPaths.textPath}`);
    return 0;
  } finally {
    await daemon.shutdown();
  }
}

async function reportsCommand(config: MonitorConfig, arg: string | undefined): Promise<number> {
  const store = new ReportStore(config.storage.reportDir);

  if (arg === undefined) {
    const reports = await store.list();
    if (reports.length === 0) {
      print("No reports found.");
      return 0;
    }
    print(`Available reports (${reports.length} found):`);
    print("-".repeat(50));
    for (const report of reports) {
      const when = report.generatedAt ? displayTimestamp(report.generatedAt) : "Unknown Timestamp";
      print(`${report.index}. ${report.fileName} (${when})`);
    }
    print("-".repeat(50));
    print("To view a specific report: reports <n>");
    return 0;
  }

  const reportNumber = Number(arg);
  if (!Number.isInteger(reportNumber)) {
    print(`Invalid argument: ${arg}`);
    return 2;
  }

  let view: ReportView;
  try {
    view = await store.view(reportNumber);
  } catch (error) {
    if (error instanceof MonitorError && error.code === "REPORT_NOT_FOUND") {
      print(error.message);
      return 2;
    }
    throw error;
  }

  const { listing, content } = view;
  print("=".repeat(70));
  print(`REPORT: ${listing.fileName}`);
  print("=".repeat(70));
  print();
  print(content);
  print("=".repeat(70));
  print(`End of report: ${listing.path}`);
  return 0;
}

async function daemonCommand(config: MonitorConfig): Promise<number> {
  const daemon = new MonitorDaemon(config);
  await daemon.initialize();
  daemon.startScheduled();
  await new Promise<void>((resolve) => onShutdownSignal(daemon, resolve));
  return 0;
}

async function main(argv: string[]): Promise<number> {
  dotenv.config({ path: path.join(__dirname, "../../.env") });

  const [command = "run", arg] = argv;
  if (command === "help" || command === "--help") {
    print(USAGE);
    return 0;
  }

  const config = loadMonitorConfigFromEnv(process.env);

  switch (command) {
    case "run":
      return runCommand(config);
    case "diagnose":
      return diagnoseCommand(config);
    case "reports":
      return reportsCommand(config, arg);
    case "daemon":
      return daemonCommand(config);
    default:
      print(USAGE);
      return 2;
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof ConfigurationError) {
      process.stderr.write(`${error.message}\n`);
    } else {
      logger.error("Inactivity monitor failed:", error);
      process.stderr.write(`Inactivity monitor failed: ${String(error)}\n`);
    }
    process.exitCode = 1;
  });
