import { describe, it, expect, beforeEach } from '@jest/globals';
import { UnsupportedFormatError } from '../../../../src/report/formatters/FormatterError.js';
import { ReportFormatterRegistry } from '../../../../src/report/formatters/FormatterRegistry.js';
import { JsonReportFormatter } from '../../../../src/report/formatters/JsonReportFormatter.js';
import { ScanReportTextFormatter } from '../../../../src/report/formatters/ScanReportTextFormatter.js';
import { createScanReportFormatters } from '../../../../src/report/formatters/index.js';
import { ScanReport } from '../../../../src/types/index.js';

describe('ReportFormatterRegistry', () => {
  let registry: ReportFormatterRegistry<ScanReport>;

  beforeEach(() => {
    registry = new ReportFormatterRegistry<ScanReport>();
  });

  it('should find formatters by extension, dotted extension or name', () => {
    const json = new JsonReportFormatter<ScanReport>();
    registry.registerFormatter(json);

    expect(registry.getFormatter('json')).toBe(json);
    expect(registry.getFormatter('.JSON')).toBe(json);
    expect(registry.getFormatter('Json')).toBe(json);
  });

  it('should throw UnsupportedFormatError for an unknown format', () => {
    registry.registerFormatter(new JsonReportFormatter<ScanReport>());

    expect(() => registry.getFormatter('csv')).toThrow(UnsupportedFormatError);
    expect(() => registry.getFormatter('csv')).toThrow('Unsupported format: csv');
  });

  it('should throw when nothing is registered', () => {
    expect(() => registry.getFormatter('json')).toThrow(UnsupportedFormatError);
  });

  it('should replace a formatter registered for the same extension', () => {
    const first = new JsonReportFormatter<ScanReport>();
    const second = new JsonReportFormatter<ScanReport>(4);
    registry.registerFormatter(first);
    registry.registerFormatter(second);

    expect(registry.getFormatter('json')).toBe(second);
  });

  it('should register JSON then text for scan reports', () => {
    const formatters = createScanReportFormatters();

    expect(formatters.getFormatter('json')).toBeInstanceOf(JsonReportFormatter);
    expect(formatters.getFormatter('txt')).toBeInstanceOf(ScanReportTextFormatter);
  });
});

describe('JsonReportFormatter', () => {
  it('should pretty-print with a trailing newline', () => {
    expect(new JsonReportFormatter<{ a: number }>().format({ a: 1 })).toBe('{\n  "a": 1\n}\n');
  });
});
