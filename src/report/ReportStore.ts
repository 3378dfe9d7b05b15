import fs from 'fs/promises';
import path from 'path';
import { MonitorError } from '../errors/MonitorError.js';
import { logger } from '../utils/logger.js';
import { parseFileTimestamp } from './timestamps.js';

export interface ReportListing {
  /** 1-based position, newest first */
  index: number;
  fileName: string;
  path: string;
  generatedAt: Date | null;
}

export interface ReportView {
  listing: ReportListing;
  content: string;
}

const TIMESTAMP_IN_NAME = /_(\d{8}_\d{6})(?:_|\.txt$)/;

function isMissingDirectory(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read side of the report directory: lists persisted text reports and
 * opens them by number
 */
export class ReportStore {
  constructor(private readonly reportDir: string) {}

  async list(): Promise<ReportListing[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.reportDir);
    } catch (error) {
      if (isMissingDirectory(error)) {
        logger.debug(`Report directory not found: ${this.reportDir}`);
        return [];
      }
      logger.error(`Failed to list reports in ${this.reportDir}:`, error);
      throw error;
    }

    const reports = names
      .filter((name) => name.endsWith('.txt'))
      .map((fileName) => {
        const match = TIMESTAMP_IN_NAME.exec(fileName);
        return { fileName, generatedAt: match ? parseFileTimestamp(match[1]) : null };
      });

    reports.sort((a, b) => {
      const byTime = (b.generatedAt?.getTime() ?? 0) - (a.generatedAt?.getTime() ?? 0);
      return byTime !== 0 ? byTime : b.fileName.localeCompare(a.fileName);
    });

    return reports.map((report, i) => ({
      index: i + 1,
      fileName: report.fileName,
      path: path.join(this.reportDir, report.fileName),
      generatedAt: report.generatedAt
    }));
  }

  /**
   * @param reportNumber 1-based, as shown by list(); 1 is the newest
   */
  async view(reportNumber: number = 1): Promise<ReportView> {
    const reports = await this.list();
    if (reports.length === 0) {
      throw new MonitorError('REPORT_NOT_FOUND', 'No reports found');
    }

    const listing = reports[reportNumber - 1];
    if (!Number.isInteger(reportNumber) || listing === undefined) {
      throw new MonitorError('REPORT_NOT_FOUND', `Invalid report number: ${reportNumber}`);
    }

    const content = await fs.readFile(listing.path, 'utf8');
    return { listing, content };
  }
}
