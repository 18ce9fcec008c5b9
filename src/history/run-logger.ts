import chalk from 'chalk';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { FileReport, RunReport } from '../types.js';

export type LogLevel = 'INFO' | 'SUCCESS' | 'WARNING' | 'ERROR';

export type LogSink = (line: string) => void;

const SEPARATOR = '='.repeat(60);

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

export function formatTimestamp(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

export function fileStamp(d: Date): string {
  return `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}_${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`;
}

function colorize(level: LogLevel, message: string): string {
  switch (level) {
    case 'SUCCESS':
      return chalk.green(message);
    case 'WARNING':
      return chalk.yellow(message);
    case 'ERROR':
      return chalk.red(message);
    default:
      return message;
  }
}

export interface RunLoggerOptions {
  logsDir: string;
  prefix?: string;
  sink?: LogSink;
  clock?: () => Date;
}

/**
 * Console logger for one pipeline run. Keeps an uncoloured copy of every line
 * and a JSON report; `save()` writes both to the logs directory.
 */
export class RunLogger {
  readonly report: RunReport;
  private readonly lines: string[] = [];
  private readonly logsDir: string;
  private readonly prefix: string;
  private readonly sink: LogSink;
  private readonly clock: () => Date;
  private readonly startedAt: Date;

  constructor(options: RunLoggerOptions) {
    this.logsDir = options.logsDir;
    this.prefix = options.prefix ?? 'upload';
    this.sink = options.sink ?? ((line) => console.log(line));
    this.clock = options.clock ?? (() => new Date());
    this.startedAt = this.clock();
    this.report = {
      timestamp: this.startedAt.toISOString(),
      status: 'started',
      filesProcessed: [],
      chunksCreated: 0,
      chunksUploaded: 0,
      orphansDeleted: 0,
      errors: [],
      warnings: [],
    };
  }

  get logLines(): readonly string[] {
    return this.lines;
  }

  log(message: string, level: LogLevel = 'INFO'): void {
    const line = `[${formatTimestamp(this.clock())}] [${level}] ${message}`;
    this.lines.push(line);
    this.sink(colorize(level, line));
  }

  info(message: string): void {
    this.log(message, 'INFO');
  }

  success(message: string): void {
    this.log(message, 'SUCCESS');
  }

  warning(message: string): void {
    this.log(message, 'WARNING');
    this.report.warnings.push(message);
  }

  error(message: string): void {
    this.log(message, 'ERROR');
    this.report.errors.push(message);
  }

  section(title: string): void {
    this.lines.push('', SEPARATOR, `  ${title}`, SEPARATOR);
    this.sink('');
    this.sink(chalk.dim(SEPARATOR));
    this.sink(chalk.bold(`  ${title}`));
    this.sink(chalk.dim(SEPARATOR));
  }

  subsection(title: string): void {
    this.lines.push('', `--- ${title} ---`);
    this.sink('');
    this.sink(chalk.bold(`--- ${title} ---`));
  }

  addFileReport(report: Omit<FileReport, 'timestamp'>): void {
    this.report.filesProcessed.push({ ...report, timestamp: this.clock().toISOString() });
  }

  async save(): Promise<{ logFile: string; reportFile: string }> {
    await mkdir(this.logsDir, { recursive: true });
    const stamp = fileStamp(this.startedAt);
    const logFile = join(this.logsDir, `${this.prefix}_${stamp}.log`);
    const reportFile = join(this.logsDir, `report_${stamp}.json`);
    await writeFile(logFile, this.lines.join('\n') + '\n', 'utf-8');
    await writeFile(reportFile, JSON.stringify(this.report, null, 2) + '\n', 'utf-8');
    return { logFile, reportFile };
  }
}
