export { HistoryDB } from './history.js';
export type { HistoryEntry, HistoryQuery } from './history.js';
export { RunLogger, formatTimestamp, fileStamp } from './run-logger.js';
export type { LogLevel, LogSink, RunLoggerOptions } from './run-logger.js';
