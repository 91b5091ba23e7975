/**
 * ============================================================================
 * DATABASE - SQLite via sql.js
 * ============================================================================
 *
 * Local store for every record the CLI tracks (sessions, projects, flashcards,
 * bookmarks, courses).
 *
 * TECHNOLOGY:
 * - sql.js: SQLite compiled to WebAssembly (runs in Node.js, no native build)
 * - File-based persistence: $STUDYTRACK_HOME/data/studytrack.db
 * - In-memory databases (path = null) for tests
 * - Synchronous API once opened: all statements are blocking
 *
 * API WRAPPER:
 * - db.prepare(sql).run(...params) - INSERT/UPDATE/DELETE, returns { changes, lastInsertRowid }
 * - db.prepare(sql).get(...params) - single row or null
 * - db.prepare(sql).all(...params) - all rows
 * - db.exec(sql) - raw SQL (schema changes, multiple statements)
 *
 * PERSISTENCE:
 * - Every write calls save() so the file on disk is always current
 * - One statement per write; no transaction spans two service calls
 */

import initSqlJs, { type Database, type SqlJsStatic } from 'sql.js';
import { dirname } from 'path';
import { mkdirSync, existsSync, readFileSync, writeFileSync } from 'fs';
import { PersistenceError } from './errors.js';

export type SqlParam = string | number | null;
export type Row = Record<string, unknown>;

export interface RunResult {
  changes: number;
  lastInsertRowid: number;
}

export interface PreparedStatement {
  run: (...params: SqlParam[]) => RunResult;
  get: (...params: SqlParam[]) => Row | null;
  all: (...params: SqlParam[]) => Row[];
}

export interface DbWrapper {
  /** Database file, or null for an in-memory database */
  readonly path: string | null;
  prepare: (sql: string) => PreparedStatement;
  exec: (sql: string) => void;
  save: () => void;
  /** Re-read the database file from disk (after a restore) */
  reload: () => void;
  close: () => void;
}

export interface OpenDatabaseOptions {
  path: string | null;
}

let sqlJs: Promise<SqlJsStatic> | null = null;

function loadSqlJs(): Promise<SqlJsStatic> {
  // sql.js is CommonJS and sets module.exports.default to itself
  sqlJs ??= initSqlJs.default();
  return sqlJs;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Open (or create) the database and make sure every table exists.
 *
 * Process:
 * 1. Initialize the sql.js WebAssembly module (once per process)
 * 2. Load the existing file if there is one, otherwise start empty
 * 3. Enable foreign key constraints
 * 4. Create tables and indexes
 */
export async function openDatabase({ path }: OpenDatabaseOptions): Promise<DbWrapper> {
  const SQL = await loadSqlJs();

  const load = (): Database => {
    if (path && existsSync(path)) {
      return new SQL.Database(readFileSync(path));
    }
    return new SQL.Database();
  };

  let db: Database;
  try {
    db = load();
  } catch (error) {
    throw new PersistenceError(`Could not open database ${path ?? ':memory:'}: ${describe(error)}`, error);
  }

  const isNew = path !== null && !existsSync(path);
  if (path) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const applyPragmas = () => {
    db.run('PRAGMA foreign_keys = ON');
  };
  applyPragmas();

  const save = () => {
    if (!path) return;
    try {
      const data = db.export();
      // export() closes and reopens the connection, which resets pragmas
      applyPragmas();
      writeFileSync(path, data);
    } catch (error) {
      throw new PersistenceError(`Could not write database ${path}: ${describe(error)}`, error);
    }
  };

  const lastInsertRowid = (): number => {
    const [result] = db.exec('SELECT last_insert_rowid() AS id');
    const value = result?.values[0]?.[0];
    return typeof value === 'number' ? value : 0;
  };

  const wrapper: DbWrapper = {
    path,
    prepare: (sql: string) => ({
      run: (...params: SqlParam[]) => {
        try {
          db.run(sql, params);
          // Read both counters before save(): they do not survive export()
          const result = { changes: db.getRowsModified(), lastInsertRowid: lastInsertRowid() };
          save();
          return result;
        } catch (error) {
          if (error instanceof PersistenceError) throw error;
          throw new PersistenceError(`Update failed: ${describe(error)}`, error);
        }
      },
      get: (...params: SqlParam[]) => {
        try {
          const stmt = db.prepare(sql);
          try {
            stmt.bind(params);
            return stmt.step() ? stmt.getAsObject() : null;
          } finally {
            stmt.free();
          }
        } catch (error) {
          throw new PersistenceError(`Query failed: ${describe(error)}`, error);
        }
      },
      all: (...params: SqlParam[]) => {
        try {
          const stmt = db.prepare(sql);
          const results: Row[] = [];
          try {
            stmt.bind(params);
            while (stmt.step()) {
              results.push(stmt.getAsObject());
            }
          } finally {
            stmt.free();
          }
          return results;
        } catch (error) {
          throw new PersistenceError(`Query failed: ${describe(error)}`, error);
        }
      },
    }),
    exec: (sql: string) => {
      try {
        db.exec(sql);
      } catch (error) {
        throw new PersistenceError(`Statement failed: ${describe(error)}`, error);
      }
      save();
    },
    save,
    reload: () => {
      db.close();
      db = load();
      applyPragmas();
    },
    close: () => {
      db.close();
    },
  };

  initializeSchema(wrapper);
  if (isNew) {
    console.log(`📝 Created new database at ${path}`);
  }

  return wrapper;
}

/**
 * ============================================================================
 * DATABASE SCHEMA
 * ============================================================================
 *
 * Creates all tables if they don't exist. Timestamps are ISO-8601 UTC strings,
 * calendar dates are YYYY-MM-DD, tag sets are JSON arrays, booleans are 0/1.
 */
export function initializeSchema(db: DbWrapper): void {
  /**
   * PROJECTS TABLE
   * Academic, personal or work projects with optional deadline and scaffold path
   */
  db.exec(`
    CREATE TABLE IF NOT EXISTS projects (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      description TEXT,
      project_type TEXT NOT NULL CHECK(project_type IN ('academic', 'personal', 'work')),
      language TEXT,
      path TEXT,
      git_repo TEXT,
      deadline TEXT,
      status TEXT NOT NULL DEFAULT 'active' CHECK(status IN ('active', 'completed', 'paused', 'cancelled')),
      priority INTEGER NOT NULL DEFAULT 3 CHECK(priority BETWEEN 1 AND 5),
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )
  `);

  /**
   * SESSIONS TABLE
   * One timed block of study, break or project work.
   * end_time/duration stay NULL until the session is stopped or completes.
   */
  db.exec(`
    CREATE TABLE IF NOT EXISTS sessions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      session_type TEXT NOT NULL CHECK(session_type IN ('study', 'break', 'project')),
      project_id INTEGER,
      subject TEXT,
      start_time TEXT NOT NULL,
      end_time TEXT,
      duration INTEGER,
      notes TEXT,
      productivity_rating INTEGER CHECK(productivity_rating BETWEEN 1 AND 5),
      created_at TEXT NOT NULL,
      FOREIGN KEY (project_id) REFERENCES projects(id) ON DELETE SET NULL
    )
  `);

  /**
   * FLASHCARDS TABLE
   * Question/answer pairs under spaced repetition.
   * difficulty: 1 (easiest, longest intervals) .. 5 (hardest)
   */
  db.exec(`
    CREATE TABLE IF NOT EXISTS flashcards (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      question TEXT NOT NULL,
      answer TEXT NOT NULL,
      subject TEXT NOT NULL,
      difficulty INTEGER NOT NULL DEFAULT 3 CHECK(difficulty BETWEEN 1 AND 5),
      last_reviewed TEXT,
      next_review TEXT NOT NULL,
      review_count INTEGER NOT NULL DEFAULT 0,
      correct_streak INTEGER NOT NULL DEFAULT 0,
      tags TEXT,
      created_at TEXT NOT NULL
    )
  `);

  /**
   * BOOKMARKS TABLE
   * Saved resources; is_read and accessed_at are only set together
   */
  db.exec(`
    CREATE TABLE IF NOT EXISTS bookmarks (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      title TEXT NOT NULL,
      url TEXT NOT NULL UNIQUE,
      description TEXT,
      category TEXT NOT NULL,
      tags TEXT,
      is_read INTEGER NOT NULL DEFAULT 0,
      rating INTEGER CHECK(rating BETWEEN 1 AND 5),
      created_at TEXT NOT NULL,
      accessed_at TEXT
    )
  `);

  /**
   * COURSES TABLE
   * Progress through an external course.
   * progress_percentage and status are derived from the lesson counts.
   */
  db.exec(`
    CREATE TABLE IF NOT EXISTS courses (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      title TEXT NOT NULL,
      platform TEXT,
      instructor TEXT,
      url TEXT,
      total_lessons INTEGER,
      completed_lessons INTEGER NOT NULL DEFAULT 0,
      progress_percentage REAL NOT NULL DEFAULT 0,
      status TEXT NOT NULL DEFAULT 'enrolled' CHECK(status IN ('enrolled', 'in_progress', 'completed', 'paused')),
      start_date TEXT,
      target_completion_date TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )
  `);

  // Indexes for common queries
  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_sessions_start_time ON sessions(start_time);
    CREATE INDEX IF NOT EXISTS idx_sessions_project ON sessions(project_id);
    CREATE INDEX IF NOT EXISTS idx_flashcards_next_review ON flashcards(next_review);
    CREATE INDEX IF NOT EXISTS idx_projects_status ON projects(status);
  `);
}

export const TABLES = ['sessions', 'projects', 'flashcards', 'bookmarks', 'courses'] as const;
export type TableName = (typeof TABLES)[number];

export interface DatabaseStats {
  counts: Record<TableName, number>;
  totalStudySeconds: number;
  totalStudyHours: number;
  studyDays: number;
}

/** Numeric column of a loosely typed row, or null */
export function numberColumn(row: Row | null, column: string): number | null {
  const value = row?.[column];
  return typeof value === 'number' ? value : null;
}

export function stringColumn(row: Row | null, column: string): string | null {
  const value = row?.[column];
  return typeof value === 'string' ? value : null;
}

function countOf(row: Row | null, column: string): number {
  return numberColumn(row, column) ?? 0;
}

/**
 * Record counts per table plus total finished study time
 */
export function getDatabaseStats(db: DbWrapper): DatabaseStats {
  const counts: Record<TableName, number> = {
    sessions: 0,
    projects: 0,
    flashcards: 0,
    bookmarks: 0,
    courses: 0,
  };
  for (const table of TABLES) {
    counts[table] = countOf(db.prepare(`SELECT COUNT(*) AS cnt FROM ${table}`).get(), 'cnt');
  }

  const study = db.prepare(`
    SELECT COALESCE(SUM(duration), 0) AS total, COUNT(DISTINCT substr(start_time, 1, 10)) AS days
    FROM sessions
    WHERE session_type = 'study' AND end_time IS NOT NULL
  `).get();

  const totalStudySeconds = countOf(study, 'total');
  return {
    counts,
    totalStudySeconds,
    totalStudyHours: Math.round((totalStudySeconds / 3600) * 100) / 100,
    studyDays: countOf(study, 'days'),
  };
}
