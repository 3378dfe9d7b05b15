import { IReportFormatter } from './IReportFormatter.js';

/**
 * Machine-readable form of any report
 */
export class JsonReportFormatter<T> implements IReportFormatter<T> {
  private readonly defaultFormat: string = 'json';
  private readonly formatName: string = 'JSON';

  /**
   * @param indentLevel Indentation level for pretty printing (default: 2)
   */
  constructor(private readonly indentLevel: number = 2) {}

  /** @inheritdoc */
  getFileExtension(): string {
    return this.defaultFormat;
  }

  /** @inheritdoc */
  getFormatName(): string {
    return this.formatName;
  }

  /** @inheritdoc */
  format(report: T): string {
    return `${JSON.stringify(report, null, this.indentLevel)}\n`;
  }
}
