/**
 * ============================================================================
 * COMMAND PLUMBING
 * ============================================================================
 *
 * Every command action goes through runAction():
 * - expected failures (AppError) print "❌ <message>", plus one line per
 *   zod issue for validation errors
 * - anything else is logged as "<Command> error:" with the error object
 * - either way process.exitCode is set to 1; nothing is thrown past here
 *
 * withServices() opens the database and wires the services for one command,
 * closing the database afterwards.
 */

import { InvalidArgumentError } from 'commander';
import { ensureDirectories, loadConfig, resolvePaths, resolveSettings, type ConfigDocument, type Paths, type Settings } from '../config.js';
import { openDatabase, type DbWrapper } from '../db.js';
import { isAppError, ValidationError } from '../errors.js';
import { systemClock, type Clock } from '../lib/timer.js';
import { ActiveSessionFile } from '../services/active-session.js';
import { BackupService } from '../services/backup.js';
import { BookmarkService } from '../services/bookmarks.js';
import { CourseService } from '../services/courses.js';
import { FlashcardService } from '../services/flashcards.js';
import { ProjectService } from '../services/projects.js';
import { ReportService } from '../services/reports.js';
import { SessionService } from '../services/sessions.js';
import { TemplateStore } from '../services/templates.js';
import { VERSION } from '../version.js';

export interface AppContext {
  paths: Paths;
  config: ConfigDocument;
  settings: Settings;
}

export interface Services extends AppContext {
  db: DbWrapper;
  clock: Clock;
  activeSession: ActiveSessionFile;
  templates: TemplateStore;
  sessions: SessionService;
  projects: ProjectService;
  flashcards: FlashcardService;
  bookmarks: BookmarkService;
  courses: CourseService;
  reports: ReportService;
  backups: BackupService;
}

export function loadContext(env: NodeJS.ProcessEnv = process.env): AppContext {
  const paths = resolvePaths(env);
  const config = loadConfig(paths.configFile);
  return { paths, config, settings: resolveSettings(config) };
}

export async function withServices<T>(action: (services: Services) => Promise<T> | T): Promise<T> {
  const context = loadContext();
  ensureDirectories(context.paths);

  const db = await openDatabase({ path: context.paths.databaseFile });
  const clock = systemClock;
  const templates = new TemplateStore(context.paths.templatesDir);
  const sessions = new SessionService(db, clock);
  const projects = new ProjectService(db, {
    templates,
    author: context.settings.author,
    gitInit: context.settings.defaultGitInit,
    autoReadme: context.settings.autoReadme,
    clock,
  });
  const flashcards = new FlashcardService(db, clock);

  try {
    return await action({
      ...context,
      db,
      clock,
      activeSession: new ActiveSessionFile(context.paths.activeSessionFile),
      templates,
      sessions,
      projects,
      flashcards,
      bookmarks: new BookmarkService(db, clock),
      courses: new CourseService(db, clock),
      reports: new ReportService(db, { sessions, projects, flashcards }, clock),
      backups: new BackupService(db, context.paths, { version: VERSION, clock }),
    });
  } finally {
    db.close();
  }
}

export function reportError(label: string, error: unknown): void {
  if (error instanceof ValidationError) {
    console.error(`❌ ${error.message}`);
    for (const issue of error.issues) {
      const where = issue.path.length > 0 ? issue.path.join('.') : 'value';
      console.error(`   • ${where}: ${issue.message}`);
    }
  } else if (isAppError(error)) {
    console.error(`❌ ${error.message}`);
  } else {
    console.error(`${label} error:`, error);
  }
  process.exitCode = 1;
}

/**
 * Wrap a commander action so every failure is reported and sets the exit code
 */
export function runAction<A extends unknown[]>(
  label: string,
  action: (...args: A) => Promise<void> | void,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (error) {
      reportError(label, error);
    }
  };
}

// ============================================================================
// OPTION PARSERS
// ============================================================================

/** Whole-number option value, rejected by commander before the action runs */
export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!/^-?\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Not a whole number.');
  }
  return parsed;
}

/** Positional id argument */
export function parseId(value: string): number {
  const id = parseInteger(value);
  if (id < 1) {
    throw new InvalidArgumentError('Not a valid id.');
  }
  return id;
}

/** Comma-separated list, e.g. --tags "sql,db" */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/** Repeatable option collecting every value */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}
