import Database from 'better-sqlite3';
import type { HistoryAction } from '../types.js';

export interface HistoryEntry {
  id: number;
  action: HistoryAction;
  path: string;
  timestamp: number;
  details: string | null;
}

export interface HistoryQuery {
  action?: string;
  path?: string;
  since?: number;
  limit?: number;
  offset?: number;
}

/** Activity history across runs: what was uploaded, deleted, archived and when. */
export class HistoryDB {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.createSchema();
  }

  private createSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS history (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        action TEXT NOT NULL,
        path TEXT NOT NULL,
        timestamp INTEGER NOT NULL,
        details TEXT
      );

      CREATE INDEX IF NOT EXISTS history_timestamp ON history (timestamp);
    `);
  }

  addEntry(action: HistoryAction, path: string, details?: string, timestamp: number = Date.now()): void {
    this.db.prepare(
      'INSERT INTO history (action, path, timestamp, details) VALUES (?, ?, ?, ?)',
    ).run(action, path, timestamp, details ?? null);
  }

  getEntries(options: HistoryQuery = {}): HistoryEntry[] {
    const conditions: string[] = [];
    const params: (string | number)[] = [];

    if (options.action) {
      conditions.push('action = ?');
      params.push(options.action);
    }
    if (options.path) {
      conditions.push('path LIKE ?');
      params.push(options.path + '%');
    }
    if (options.since) {
      conditions.push('timestamp >= ?');
      params.push(options.since);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const limit = options.limit ?? 50;
    const offset = options.offset ?? 0;

    return this.db.prepare(
      `SELECT id, action, path, timestamp, details FROM history ${where} ORDER BY timestamp DESC, id DESC LIMIT ? OFFSET ?`,
    ).all(...params, limit, offset) as HistoryEntry[];
  }

  close(): void {
    this.db.close();
  }
}
