import { IReportFormatter } from './IReportFormatter.js';
import { UnsupportedFormatError } from './FormatterError.js';
import { logger } from '../../utils/logger.js';

/**
 * Registry for report formatters
 *
 * Manages the formats a report type can be written in and retrieves them by
 * extension or name
 */
export class ReportFormatterRegistry<T> {
  /** Map of file extensions to formatter instances */
  private formatters: Map<string, IReportFormatter<T>> = new Map();

  /**
   * Register a formatter. A later formatter for the same extension replaces the earlier one.
   */
  registerFormatter(formatter: IReportFormatter<T>): void {
    const format = formatter.getFileExtension().toLowerCase();
    this.formatters.set(format, formatter);
    logger.debug(`Registered formatter for ${formatter.getFormatName()} format`);
  }

  /**
   * Get a formatter for a specific format
   * @param format The format name or file extension, with or without the dot
   * @throws UnsupportedFormatError if no formatter is found for the format
   */
  getFormatter(format: string): IReportFormatter<T> {
    const normalizedFormat = format.toLowerCase().replace(/^\./, '');
    const formatter = this.formatters.get(normalizedFormat);
    if (formatter) {
      return formatter;
    }

    const matchByName = Array.from(this.formatters.values())
      .find(f => f.getFormatName().toLowerCase() === normalizedFormat);
    if (matchByName) {
      return matchByName;
    }

    throw new UnsupportedFormatError(format);
  }
}
