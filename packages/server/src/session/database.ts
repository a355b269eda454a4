import BetterSqlite3 from 'better-sqlite3';
import type { SessionRecord } from '@flowscribe/shared';
import { logger } from '@flowscribe/shared';

const log = logger('db');

/**
 * Durable storage for sessions, one record per session key.
 *
 * The session store only talks to this interface, so tests and
 * alternative backends can swap the SQLite implementation out.
 */
export interface SessionRepository {
  load(key: string): SessionRecord | null;
  save(record: SessionRecord): void;
  delete(key: string): void;
  count(): number;
}

interface SessionRow {
  key: string;
  graph_text: string;
  history: string;
  template_name: string | null;
  created_at: number;
  updated_at: number;
}

/**
 * Open (or create) the SQLite database and ensure the `sessions` table exists.
 *
 * WAL journal mode is enabled for concurrent read performance. The
 * `sessions` table stores the canonical DOT text of each session's graph
 * next to its JSON-encoded instruction history.
 *
 * @param dbPath - File path, or `':memory:'` for tests.
 * @returns An open `better-sqlite3` `Database` handle. The caller is
 *   responsible for closing it during shutdown.
 *
 * @example
 * const db = setupDatabase(config.dbPath);
 * // later, during graceful shutdown:
 * db.close();
 */
export function setupDatabase(dbPath: string): BetterSqlite3.Database {
  const db = new BetterSqlite3(dbPath);
  db.pragma('journal_mode = WAL');
  db.exec(`
    CREATE TABLE IF NOT EXISTS sessions (
      key TEXT PRIMARY KEY,
      graph_text TEXT NOT NULL,
      history TEXT NOT NULL DEFAULT '[]',
      template_name TEXT,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    )
  `);

  log.info('SQLite database initialized', { path: dbPath });
  return db;
}

function parseHistory(raw: string, key: string): string[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed) || !parsed.every((entry): entry is string => typeof entry === 'string')) {
    throw new Error(`Session "${key}" has a malformed history column`);
  }
  return parsed;
}

function rowToRecord(row: SessionRow): SessionRecord {
  return {
    key: row.key,
    graphText: row.graph_text,
    history: parseHistory(row.history, row.key),
    templateName: row.template_name,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/** {@link SessionRepository} backed by a `better-sqlite3` handle. */
export class SqliteSessionRepository implements SessionRepository {
  constructor(private readonly db: BetterSqlite3.Database) {}

  load(key: string): SessionRecord | null {
    const row = this.db
      .prepare<[string], SessionRow>(
        'SELECT key, graph_text, history, template_name, created_at, updated_at FROM sessions WHERE key = ?',
      )
      .get(key);
    if (!row) return null;
    return rowToRecord(row);
  }

  /** Insert-or-replace the record for `record.key`. */
  save(record: SessionRecord): void {
    this.db
      .prepare(
        'INSERT OR REPLACE INTO sessions (key, graph_text, history, template_name, created_at, updated_at) VALUES (?, ?, ?, ?, ?, ?)',
      )
      .run(
        record.key,
        record.graphText,
        JSON.stringify(record.history),
        record.templateName,
        record.createdAt,
        record.updatedAt,
      );
  }

  delete(key: string): void {
    this.db.prepare('DELETE FROM sessions WHERE key = ?').run(key);
  }

  count(): number {
    const row = this.db.prepare<[], { cnt: number }>('SELECT count(*) AS cnt FROM sessions').get();
    return row?.cnt ?? 0;
  }
}
