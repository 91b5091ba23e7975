/**
 * ============================================================================
 * CONFIGURATION
 * ============================================================================
 *
 * Two layers:
 * - Environment (.env, loaded by dotenv in index.ts): where things live
 *   STUDYTRACK_HOME     - root directory (default ~/.studytrack)
 *   STUDYTRACK_DB_PATH  - database file (default <home>/data/studytrack.db)
 * - config.json under the home directory: user preferences, snake_case keys
 *   grouped in sections (user, session, project, study, ui, data)
 *
 * The document is validated with zod; keys this version does not know about
 * are kept as they are. Code reads a typed Settings struct resolved once at
 * load time. The dotted-key accessors exist for the `config` command only.
 */

import { z } from 'zod';
import { homedir } from 'os';
import { dirname, join } from 'path';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { PersistenceError, ValidationError } from './errors.js';

// ============================================================================
// PATHS
// ============================================================================

export interface Paths {
  home: string;
  configFile: string;
  dataDir: string;
  databaseFile: string;
  templatesDir: string; // data/templates/projects
  backupsDir: string;
  activeSessionFile: string; // Handle of a detached timer
}

export function resolvePaths(env: NodeJS.ProcessEnv = process.env): Paths {
  const home = env.STUDYTRACK_HOME || join(homedir(), '.studytrack');
  const dataDir = join(home, 'data');
  return {
    home,
    configFile: join(home, 'config.json'),
    dataDir,
    databaseFile: env.STUDYTRACK_DB_PATH || join(dataDir, 'studytrack.db'),
    templatesDir: join(dataDir, 'templates', 'projects'),
    backupsDir: join(dataDir, 'backups'),
    activeSessionFile: join(dataDir, 'active-session.json'),
  };
}

export function ensureDirectories(paths: Paths): void {
  for (const dir of [paths.home, paths.dataDir, paths.templatesDir, paths.backupsDir]) {
    mkdirSync(dir, { recursive: true });
  }
}

// ============================================================================
// DOCUMENT SCHEMA
// ============================================================================

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export const DEFAULT_BOOKMARK_CATEGORIES = [
  'Programming',
  'Mathematics',
  'Science',
  'Documentation',
  'Tutorials',
  'Research',
];

const configSchema = z
  .object({
    user: z
      .object({
        name: z.string().default(''),
        timezone: z.string().default('UTC'),
        preferred_editor: z.string().default('nano'),
      })
      .passthrough()
      .default({}),
    session: z
      .object({
        pomodoro_duration: z.number().int().positive().default(25), // minutes
        short_break: z.number().int().positive().default(5),
        long_break: z.number().int().positive().default(15),
        long_break_after: z.number().int().positive().default(4), // sessions
        auto_start_breaks: z.boolean().default(false),
        notification_sound: z.boolean().default(true),
      })
      .passthrough()
      .default({}),
    project: z
      .object({
        default_git_init: z.boolean().default(true),
        auto_readme: z.boolean().default(true),
        default_license: z.string().default('MIT'),
      })
      .passthrough()
      .default({}),
    study: z
      .object({
        review_limit: z.number().int().positive().default(10),
        bookmark_categories: z.array(z.string()).default(() => [...DEFAULT_BOOKMARK_CATEGORIES]),
        course_progress_tracking: z.boolean().default(true),
      })
      .passthrough()
      .default({}),
    ui: z
      .object({
        show_progress_bars: z.boolean().default(true),
        compact_mode: z.boolean().default(false),
      })
      .passthrough()
      .default({}),
    data: z
      .object({
        auto_backup: z.boolean().default(true),
        keep_backups: z.number().int().nonnegative().default(30),
        export_format: z.enum(['json', 'csv']).default('json'),
      })
      .passthrough()
      .default({}),
  })
  .passthrough();

export type ConfigDocument = z.output<typeof configSchema>;

export function defaultConfig(): ConfigDocument {
  return configSchema.parse({});
}

export function parseConfig(input: unknown): ConfigDocument {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError('Invalid configuration', result.error.issues);
  }
  return result.data;
}

/**
 * Read config.json. A missing file means defaults; an unreadable or invalid
 * one is reported and also falls back to defaults.
 */
export function loadConfig(file: string): ConfigDocument {
  if (!existsSync(file)) {
    return defaultConfig();
  }
  try {
    return parseConfig(JSON.parse(readFileSync(file, 'utf-8')));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.warn(`⚠️  Warning: Could not load config file: ${reason}`);
    console.warn('Using default configuration...');
    return defaultConfig();
  }
}

export function saveConfig(file: string, doc: ConfigDocument): void {
  try {
    mkdirSync(dirname(file), { recursive: true });
    writeFileSync(file, JSON.stringify(doc, null, 4) + '\n');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PersistenceError(`Could not save config ${file}: ${reason}`, error);
  }
}

export function resetConfig(file: string): ConfigDocument {
  const doc = defaultConfig();
  saveConfig(file, doc);
  return doc;
}

// ============================================================================
// DOTTED-KEY ACCESS (config show / set)
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Look up a value by dotted path, e.g. "session.pomodoro_duration".
 * Returns undefined when any segment is missing.
 */
export function getConfigValue(doc: ConfigDocument, key: string): unknown {
  let current: unknown = doc;
  for (const part of key.split('.')) {
    if (!isRecord(current) || !(part in current)) return undefined;
    current = current[part];
  }
  return current;
}

/**
 * Return a copy of the document with one value replaced. Missing
 * intermediate sections are created. The result is validated as a whole,
 * so a wrong type for a known key is rejected before anything is saved.
 */
export function setConfigValue(doc: ConfigDocument, key: string, value: JsonValue): ConfigDocument {
  const parts = key.split('.');
  const last = parts.pop();
  if (!last || parts.some((part) => part === '')) {
    throw new ValidationError(`Invalid configuration key: "${key}"`);
  }

  const copy = structuredClone(doc);
  let current: Record<string, unknown> = copy;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;

  const result = configSchema.safeParse(copy);
  if (!result.success) {
    throw new ValidationError(`Invalid value for ${key}`, result.error.issues);
  }
  return result.data;
}

/**
 * Interpret a value typed on the command line:
 * "true"/"false" -> boolean, digits -> number, anything else stays a string.
 */
export function coerceValue(raw: string): JsonValue {
  const lowered = raw.toLowerCase();
  if (lowered === 'true' || lowered === 'false') return lowered === 'true';
  if (/^\d+$/.test(raw)) return Number.parseInt(raw, 10);
  if (/^\d+\.\d+$/.test(raw)) return Number.parseFloat(raw);
  return raw;
}

// ============================================================================
// TYPED SETTINGS
// ============================================================================

/** What the code reads. Other document keys are stored and shown but unused. */
export interface Settings {
  author: string;
  pomodoroMinutes: number;
  shortBreakMinutes: number;
  longBreakMinutes: number;
  notificationSound: boolean;
  defaultGitInit: boolean;
  autoReadme: boolean;
  reviewLimit: number;
  bookmarkCategories: string[];
  showProgressBars: boolean;
  keepBackups: number;
  exportFormat: 'json' | 'csv';
}

export function resolveSettings(doc: ConfigDocument): Settings {
  return {
    author: doc.user.name,
    pomodoroMinutes: doc.session.pomodoro_duration,
    shortBreakMinutes: doc.session.short_break,
    longBreakMinutes: doc.session.long_break,
    notificationSound: doc.session.notification_sound,
    defaultGitInit: doc.project.default_git_init,
    autoReadme: doc.project.auto_readme,
    reviewLimit: doc.study.review_limit,
    bookmarkCategories: doc.study.bookmark_categories,
    showProgressBars: doc.ui.show_progress_bars,
    keepBackups: doc.data.keep_backups,
    exportFormat: doc.data.export_format,
  };
}
