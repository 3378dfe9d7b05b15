import { MonitorError } from '../../errors/MonitorError.js';

/**
 * Error thrown when an unsupported format is requested
 */
export class UnsupportedFormatError extends MonitorError {
  constructor(format: string) {
    super('UNSUPPORTED_FORMAT', `Unsupported format: ${format}`);
    this.name = 'UnsupportedFormatError';
  }
}
