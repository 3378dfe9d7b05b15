import fs from 'fs/promises';
import path from 'path';
import { ReportPersistError, toError } from '../errors/MonitorError.js';
import { ReportPaths } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { IReportFormatter } from './formatters/IReportFormatter.js';
import { ReportFormatterRegistry } from './formatters/FormatterRegistry.js';

/**
 * Writes a report in its machine-readable and human-readable forms
 * side by side in one directory.
 */
export class ReportWriter {
  constructor(private readonly reportDir: string) {}

  /**
   * Both forms are written or neither is left behind.
   *
   * @throws ReportPersistError naming the file that could not be written
   */
  async write<T>(baseName: string, report: T, registry: ReportFormatterRegistry<T>): Promise<ReportPaths> {
    try {
      await fs.mkdir(this.reportDir, { recursive: true });
    } catch (error) {
      throw new ReportPersistError(this.reportDir, toError(error));
    }

    const jsonPath = await this.writeOne(baseName, report, registry.getFormatter('json'));
    let textPath: string;
    try {
      textPath = await this.writeOne(baseName, report, registry.getFormatter('txt'));
    } catch (error) {
      await fs.rm(jsonPath, { force: true }).catch((cleanupError: unknown) => {
        logger.warn(`Could not remove partial report ${jsonPath}`, { error: String(cleanupError) });
      });
      throw error;
    }

    logger.info('Report written', { jsonPath, textPath });
    return { jsonPath, textPath };
  }

  private async writeOne<T>(baseName: string, report: T, formatter: IReportFormatter<T>): Promise<string> {
    const target = path.join(this.reportDir, `${baseName}.${formatter.getFileExtension()}`);
    // Write beside the target and rename so a reader never sees a partial file
    const staging = `${target}.tmp`;
    try {
      await fs.writeFile(staging, formatter.format(report), 'utf8');
      await fs.rename(staging, target);
      return target;
    } catch (error) {
      logger.error(`Failed to write report ${target}:`, error);
      await fs.rm(staging, { force: true }).catch((cleanupError: unknown) => {
        logger.warn(`Could not remove staging file ${staging}`, { error: String(cleanupError) });
      });
      throw new ReportPersistError(target, toError(error));
    }
  }
}
