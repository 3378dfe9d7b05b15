/**
 * Interface for report formatters
 *
 * Each formatter renders one report type into one file format.
 */
export interface IReportFormatter<T> {
  /**
   * Returns the file extension this formatter handles (without the dot)
   */
  getFileExtension(): string;

  /**
   * Returns a human-readable name for this format
   */
  getFormatName(): string;

  /**
   * Renders the report. Output ends with a newline.
   */
  format(report: T): string;
}
