/**
 * ============================================================================
 * BACKUP, RESTORE & EXPORT
 * ============================================================================
 *
 * BACKUP LAYOUT (data/backups/backup_yyyyMMdd_HHmmss/):
 *   studytrack.db     - copy of the database file
 *   config.json       - configuration document (unless --no-config)
 *   templates/        - project templates
 *   manifest.json     - { createdAt, includesConfig, databaseSizeMb, version }
 *
 * RESTORE:
 * 1. Check the backup directory and its manifest
 * 2. Back up the current data first (a safety copy)
 * 3. Copy database, configuration and templates back, reload the database
 *
 * EXPORT:
 * - json: one document keyed by collection
 * - csv:  one file per collection (papaparse), tag lists as JSON text
 */

import { z } from 'zod';
import Papa from 'papaparse';
import { format } from 'date-fns';
import { join, resolve } from 'path';
import { cpSync, copyFileSync, existsSync, mkdirSync, readdirSync, readFileSync, rmSync, statSync, writeFileSync } from 'fs';
import { TABLES, type DbWrapper, type Row, type TableName } from '../db.js';
import type { Paths } from '../config.js';
import { NotFoundError, PersistenceError, ValidationError } from '../errors.js';
import { round } from '../lib/format.js';
import { systemClock, type Clock } from '../lib/timer.js';
import {
  bookmarkRowSchema,
  courseRowSchema,
  decodeRows,
  flashcardRowSchema,
  projectRowSchema,
  sessionRowSchema,
} from '../rows.js';

export const manifestSchema = z.object({
  createdAt: z.string(),
  includesConfig: z.boolean(),
  databaseSizeMb: z.number(),
  version: z.string(),
});

export type BackupManifest = z.infer<typeof manifestSchema>;

export interface BackupResult {
  path: string;
  manifest: BackupManifest;
}

export const EXPORT_FORMATS = ['json', 'csv'] as const;
export const EXPORT_TYPES = ['all', ...TABLES] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];
export type ExportType = (typeof EXPORT_TYPES)[number];

export interface ExportResult {
  files: string[];
  counts: Partial<Record<TableName, number>>;
}

const DATABASE_FILE = 'studytrack.db';
const CONFIG_FILE = 'config.json';
const MANIFEST_FILE = 'manifest.json';
const TEMPLATES_DIR = 'templates';

const decoders: Record<TableName, (rows: Row[]) => object[]> = {
  sessions: (rows) => decodeRows(sessionRowSchema, rows, 'session'),
  projects: (rows) => decodeRows(projectRowSchema, rows, 'project'),
  flashcards: (rows) => decodeRows(flashcardRowSchema, rows, 'flashcard'),
  bookmarks: (rows) => decodeRows(bookmarkRowSchema, rows, 'bookmark'),
  courses: (rows) => decodeRows(courseRowSchema, rows, 'course'),
};

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** CSV cells: lists become JSON text, null becomes empty */
function toCsvRecord(record: object): Record<string, string | number | boolean> {
  const cells: Record<string, string | number | boolean> = {};
  for (const [key, value] of Object.entries(record)) {
    const cell: unknown = value;
    if (cell === null || cell === undefined) cells[key] = '';
    else if (typeof cell === 'string' || typeof cell === 'number' || typeof cell === 'boolean') cells[key] = cell;
    else cells[key] = JSON.stringify(cell);
  }
  return cells;
}

export class BackupService {
  private readonly db: DbWrapper;
  private readonly paths: Paths;
  private readonly version: string;
  private readonly clock: Clock;

  constructor(db: DbWrapper, paths: Paths, options: { version: string; clock?: Clock }) {
    this.db = db;
    this.paths = paths;
    this.version = options.version;
    this.clock = options.clock ?? systemClock;
  }

  private stamp(): string {
    return format(new Date(this.clock.now()), 'yyyyMMdd_HHmmss');
  }

  /** Name not taken yet: base, base_1, base_2 ... */
  private freshPath(base: string): string {
    let candidate = base;
    for (let n = 1; existsSync(candidate); n++) {
      candidate = `${base}_${n}`;
    }
    return candidate;
  }

  createBackup(options: { includeConfig?: boolean; destination?: string } = {}): BackupResult {
    const includeConfig = options.includeConfig ?? true;
    const dbPath = this.db.path;
    if (!dbPath) {
      throw new PersistenceError('Cannot back up an in-memory database');
    }

    const target = options.destination
      ? resolve(options.destination)
      : this.freshPath(join(this.paths.backupsDir, `backup_${this.stamp()}`));

    try {
      mkdirSync(target, { recursive: true });

      this.db.save();
      copyFileSync(dbPath, join(target, DATABASE_FILE));

      const configIncluded = includeConfig && existsSync(this.paths.configFile);
      if (configIncluded) {
        copyFileSync(this.paths.configFile, join(target, CONFIG_FILE));
      }
      if (existsSync(this.paths.templatesDir)) {
        cpSync(this.paths.templatesDir, join(target, TEMPLATES_DIR), { recursive: true });
      }

      const manifest: BackupManifest = {
        createdAt: new Date(this.clock.now()).toISOString(),
        includesConfig: configIncluded,
        databaseSizeMb: round(statSync(dbPath).size / (1024 * 1024)),
        version: this.version,
      };
      writeFileSync(join(target, MANIFEST_FILE), JSON.stringify(manifest, null, 2) + '\n');

      return { path: target, manifest };
    } catch (error) {
      throw new PersistenceError(`Backup failed: ${describe(error)}`, error);
    }
  }

  /** Backup directories under data/backups, newest first */
  listBackups(): string[] {
    if (!existsSync(this.paths.backupsDir)) return [];
    return readdirSync(this.paths.backupsDir)
      .filter((name) => name.startsWith('backup_'))
      .sort()
      .reverse()
      .map((name) => join(this.paths.backupsDir, name));
  }

  /** Delete all but the newest `keep` backups; returns the removed paths */
  pruneBackups(keep: number): string[] {
    if (!Number.isInteger(keep) || keep < 1) {
      throw new ValidationError(`keep_backups must be a positive whole number (got ${keep})`);
    }
    const removed = this.listBackups().slice(keep);
    for (const dir of removed) {
      rmSync(dir, { recursive: true, force: true });
    }
    return removed;
  }

  readManifest(dir: string): BackupManifest {
    const file = join(dir, MANIFEST_FILE);
    if (!existsSync(file)) {
      throw new ValidationError(`Not a backup directory (no ${MANIFEST_FILE}): ${dir}`);
    }
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(file, 'utf-8'));
    } catch (error) {
      throw new ValidationError(`Unreadable backup manifest: ${describe(error)}`);
    }
    const result = manifestSchema.safeParse(raw);
    if (!result.success) {
      throw new ValidationError('Invalid backup manifest', result.error.issues);
    }
    return result.data;
  }

  /**
   * Replace current data with a backup. The current state is saved as a
   * backup first; its path is returned as `safetyBackup`. A detached timer
   * handle refers to the replaced sessions, so it is discarded.
   */
  restoreBackup(dir: string): { manifest: BackupManifest; safetyBackup: string; discardedActiveSession: boolean } {
    const source = resolve(dir);
    if (!existsSync(source)) {
      throw new NotFoundError('Backup', source);
    }
    const manifest = this.readManifest(source);
    const dbPath = this.db.path;
    if (!dbPath) {
      throw new PersistenceError('Cannot restore into an in-memory database');
    }

    const safety = this.createBackup();

    try {
      const backupDb = join(source, DATABASE_FILE);
      if (existsSync(backupDb)) {
        copyFileSync(backupDb, dbPath);
        this.db.reload();
      }
      const backupConfig = join(source, CONFIG_FILE);
      if (manifest.includesConfig && existsSync(backupConfig)) {
        copyFileSync(backupConfig, this.paths.configFile);
      }
      const backupTemplates = join(source, TEMPLATES_DIR);
      if (existsSync(backupTemplates)) {
        cpSync(backupTemplates, this.paths.templatesDir, { recursive: true });
      }
    } catch (error) {
      throw new PersistenceError(`Restore failed (current data saved in ${safety.path}): ${describe(error)}`, error);
    }

    const discardedActiveSession = existsSync(this.paths.activeSessionFile);
    rmSync(this.paths.activeSessionFile, { force: true });

    return { manifest, safetyBackup: safety.path, discardedActiveSession };
  }

  /**
   * Export collections. JSON writes one file at `output`; CSV writes
   * `<collection>.csv` files into the `output` directory.
   */
  exportData(options: { format: ExportFormat; dataType?: ExportType; output?: string }): ExportResult {
    const dataType = options.dataType ?? 'all';
    const tables: readonly TableName[] = dataType === 'all' ? TABLES : [dataType];
    const stamp = this.stamp();

    const collections: Partial<Record<TableName, object[]>> = {};
    const counts: Partial<Record<TableName, number>> = {};
    for (const table of tables) {
      const records = decoders[table](this.db.prepare(`SELECT * FROM ${table} ORDER BY id`).all());
      collections[table] = records;
      counts[table] = records.length;
    }

    try {
      if (options.format === 'json') {
        const file = resolve(options.output ?? `studytrack_export_${stamp}.json`);
        const document = {
          exportedAt: new Date(this.clock.now()).toISOString(),
          version: this.version,
          data: collections,
        };
        writeFileSync(file, JSON.stringify(document, null, 2) + '\n');
        return { files: [file], counts };
      }

      const dir = resolve(options.output ?? `studytrack_export_${stamp}`);
      mkdirSync(dir, { recursive: true });
      const files: string[] = [];
      for (const table of tables) {
        const file = join(dir, `${table}.csv`);
        writeFileSync(file, Papa.unparse((collections[table] ?? []).map(toCsvRecord)));
        files.push(file);
      }
      return { files, counts };
    } catch (error) {
      throw new PersistenceError(`Export failed: ${describe(error)}`, error);
    }
  }
}
