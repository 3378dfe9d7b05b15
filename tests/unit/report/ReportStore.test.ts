import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'fs/promises';
import path from 'path';
import { MonitorError } from '../../../src/errors/MonitorError.js';
import { ReportStore } from '../../../src/report/ReportStore.js';
import { createTempDir, removeTempDir } from '../../utils/testHelpers.js';

describe('ReportStore', () => {
  let reportDir: string;

  beforeEach(async () => {
    reportDir = await createTempDir();
    await fs.writeFile(path.join(reportDir, 'scan_report_20240601_020000_cycle_a.txt'), 'first scan\n');
    await fs.writeFile(path.join(reportDir, 'scan_report_20240601_020000_cycle_a.json'), '{}\n');
    await fs.writeFile(path.join(reportDir, 'scan_report_20240602_020000_cycle_b.txt'), 'second scan\n');
    await fs.writeFile(path.join(reportDir, 'activity_report_20240601_030000.txt'), 'diagnosis\n');
  });

  afterEach(async () => {
    await removeTempDir(reportDir);
  });

  it('should list text reports newest first', async () => {
    const listings = await new ReportStore(reportDir).list();

    expect(listings).toEqual([
      {
        index: 1,
        fileName: 'scan_report_20240602_020000_cycle_b.txt',
        path: path.join(reportDir, 'scan_report_20240602_020000_cycle_b.txt'),
        generatedAt: new Date('2024-06-02T02:00:00.000Z')
      },
      {
        index: 2,
        fileName: 'activity_report_20240601_030000.txt',
        path: path.join(reportDir, 'activity_report_20240601_030000.txt'),
        generatedAt: new Date('2024-06-01T03:00:00.000Z')
      },
      {
        index: 3,
        fileName: 'scan_report_20240601_020000_cycle_a.txt',
        path: path.join(reportDir, 'scan_report_20240601_020000_cycle_a.txt'),
        generatedAt: new Date('2024-06-01T02:00:00.000Z')
      }
    ]);
  });

  it('should list files without a timestamp last', async () => {
    await fs.writeFile(path.join(reportDir, 'notes.txt'), 'hand written\n');

    const listings = await new ReportStore(reportDir).list();

    expect(listings[3]).toEqual({
      index: 4,
      fileName: 'notes.txt',
      path: path.join(reportDir, 'notes.txt'),
      generatedAt: null
    });
  });

  it('should list nothing when the directory does not exist', async () => {
    expect(await new ReportStore(path.join(reportDir, 'missing')).list()).toEqual([]);
  });

  it('should open the newest report by default', async () => {
    const { listing, content } = await new ReportStore(reportDir).view();

    expect(listing.fileName).toBe('scan_report_20240602_020000_cycle_b.txt');
    expect(content).toBe('second scan\n');
  });

  it('should open a report by number', async () => {
    const { content } = await new ReportStore(reportDir).view(3);

    expect(content).toBe('first scan\n');
  });

  it('should reject an out-of-range report number', async () => {
    const store = new ReportStore(reportDir);

    await expect(store.view(4)).rejects.toThrow('Invalid report number: 4');
    await expect(store.view(0)).rejects.toThrow('Invalid report number: 0');
  });

  it('should reject when there are no reports', async () => {
    const error = await new ReportStore(path.join(reportDir, 'missing')).view().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MonitorError);
    expect(error instanceof MonitorError && error.code).toBe('REPORT_NOT_FOUND');
    expect(error instanceof MonitorError && error.message).toBe('No reports found');
  });
});
