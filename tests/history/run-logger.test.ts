import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { tmpdir } from 'node:os';
import { mkdtemp, rm, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { RunLogger, formatTimestamp, fileStamp } from '../../src/history/run-logger.js';

let tmpDir: string;
const at = new Date(2024, 0, 2, 3, 4, 5);

beforeEach(async () => {
  tmpDir = await mkdtemp(join(tmpdir(), 'docsync-logger-test-'));
});

afterEach(async () => {
  await rm(tmpDir, { recursive: true, force: true });
});

describe('timestamps', () => {
  it('formats log and file stamps in local time', () => {
    expect(formatTimestamp(at)).toBe('2024-01-02 03:04:05');
    expect(fileStamp(at)).toBe('20240102_030405');
  });
});

describe('RunLogger', () => {
  it('prefixes lines with time and level', () => {
    const logger = new RunLogger({ logsDir: tmpDir, sink: () => {}, clock: () => at });
    logger.info('hello');
    logger.success('done');
    expect(logger.logLines).toEqual([
      '[2024-01-02 03:04:05] [INFO] hello',
      '[2024-01-02 03:04:05] [SUCCESS] done',
    ]);
  });

  it('collects warnings and errors in the report', () => {
    const logger = new RunLogger({ logsDir: tmpDir, sink: () => {}, clock: () => at });
    logger.warning('slow');
    logger.error('broken');
    expect(logger.report.warnings).toEqual(['slow']);
    expect(logger.report.errors).toEqual(['broken']);
  });

  it('writes sections and subsections to the log', () => {
    const logger = new RunLogger({ logsDir: tmpDir, sink: () => {}, clock: () => at });
    logger.section('TITLE');
    logger.subsection('Step 1');
    expect(logger.logLines).toEqual(['', '='.repeat(60), '  TITLE', '='.repeat(60), '', '--- Step 1 ---']);
  });

  it('saves the log and the JSON report', async () => {
    const logger = new RunLogger({ logsDir: join(tmpDir, 'logs'), prefix: 'download', sink: () => {}, clock: () => at });
    logger.info('hello');
    logger.addFileReport({ filename: 'a.md', chunksCount: 2, status: 'uploaded' });
    logger.report.status = 'completed';

    const { logFile, reportFile } = await logger.save();
    expect(logFile).toBe(join(tmpDir, 'logs', 'download_20240102_030405.log'));
    expect(reportFile).toBe(join(tmpDir, 'logs', 'report_20240102_030405.json'));
    expect(await readFile(logFile, 'utf-8')).toBe('[2024-01-02 03:04:05] [INFO] hello\n');

    const report = JSON.parse(await readFile(reportFile, 'utf-8'));
    expect(report).toEqual({
      timestamp: at.toISOString(),
      status: 'completed',
      filesProcessed: [{ filename: 'a.md', chunksCount: 2, status: 'uploaded', timestamp: at.toISOString() }],
      chunksCreated: 0,
      chunksUploaded: 0,
      orphansDeleted: 0,
      errors: [],
      warnings: [],
    });
  });
});
