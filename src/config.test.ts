import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  coerceValue,
  defaultConfig,
  getConfigValue,
  loadConfig,
  resetConfig,
  resolvePaths,
  resolveSettings,
  saveConfig,
  setConfigValue,
} from './config.js';
import { ValidationError } from './errors.js';

describe('resolvePaths', () => {
  it('places everything under STUDYTRACK_HOME', () => {
    const paths = resolvePaths({ STUDYTRACK_HOME: '/tmp/st' });
    expect(paths.configFile).toBe('/tmp/st/config.json');
    expect(paths.databaseFile).toBe('/tmp/st/data/studytrack.db');
    expect(paths.templatesDir).toBe('/tmp/st/data/templates/projects');
    expect(paths.activeSessionFile).toBe('/tmp/st/data/active-session.json');
  });

  it('lets STUDYTRACK_DB_PATH override the database file', () => {
    const paths = resolvePaths({ STUDYTRACK_HOME: '/tmp/st', STUDYTRACK_DB_PATH: '/var/db/other.db' });
    expect(paths.databaseFile).toBe('/var/db/other.db');
  });
});

describe('config document', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'studytrack-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('fills every section with defaults', () => {
    const doc = defaultConfig();
    expect(doc.session.pomodoro_duration).toBe(25);
    expect(doc.session.notification_sound).toBe(true);
    expect(doc.project.default_git_init).toBe(true);
    expect(doc.study.review_limit).toBe(10);
    expect(doc.data.export_format).toBe('json');
  });

  it('returns defaults when the file does not exist', () => {
    expect(loadConfig(join(dir, 'missing.json'))).toEqual(defaultConfig());
  });

  it('falls back to defaults with a warning on malformed JSON', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const file = join(dir, 'config.json');
    writeFileSync(file, '{ not json');

    expect(loadConfig(file)).toEqual(defaultConfig());
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it('keeps partial documents and unknown keys', () => {
    const file = join(dir, 'config.json');
    writeFileSync(file, JSON.stringify({ session: { pomodoro_duration: 50 }, extra: { keep: 'me' } }));

    const doc = loadConfig(file);
    expect(doc.session.pomodoro_duration).toBe(50);
    expect(doc.session.short_break).toBe(5);
    expect(getConfigValue(doc, 'extra.keep')).toBe('me');
  });

  it('saves and reloads the same document', () => {
    const file = join(dir, 'nested', 'config.json');
    const doc = setConfigValue(defaultConfig(), 'user.name', 'Test User');
    saveConfig(file, doc);

    expect(JSON.parse(readFileSync(file, 'utf-8')).user.name).toBe('Test User');
    expect(loadConfig(file).user.name).toBe('Test User');
  });

  it('reset writes the defaults back', () => {
    const file = join(dir, 'config.json');
    saveConfig(file, setConfigValue(defaultConfig(), 'session.pomodoro_duration', 45));

    resetConfig(file);
    expect(loadConfig(file).session.pomodoro_duration).toBe(25);
  });
});

describe('dotted keys', () => {
  it('reads nested values and undefined for missing paths', () => {
    const doc = defaultConfig();
    expect(getConfigValue(doc, 'session.long_break')).toBe(15);
    expect(getConfigValue(doc, 'session.nope')).toBeUndefined();
    expect(getConfigValue(doc, 'session.long_break.deeper')).toBeUndefined();
  });

  it('sets values without touching the original', () => {
    const doc = defaultConfig();
    const updated = setConfigValue(doc, 'session.pomodoro_duration', 30);

    expect(updated.session.pomodoro_duration).toBe(30);
    expect(doc.session.pomodoro_duration).toBe(25);
  });

  it('creates missing sections for unknown keys', () => {
    const updated = setConfigValue(defaultConfig(), 'plugins.timer.color', 'blue');
    expect(getConfigValue(updated, 'plugins.timer.color')).toBe('blue');
  });

  it('rejects a value of the wrong type', () => {
    expect(() => setConfigValue(defaultConfig(), 'session.pomodoro_duration', 'long')).toThrow(ValidationError);
    expect(() => setConfigValue(defaultConfig(), 'session.pomodoro_duration', 0)).toThrow(ValidationError);
  });

  it('rejects empty key segments', () => {
    expect(() => setConfigValue(defaultConfig(), 'session..x', 1)).toThrow(ValidationError);
  });
});

describe('coerceValue', () => {
  it('converts booleans and numbers', () => {
    expect(coerceValue('true')).toBe(true);
    expect(coerceValue('False')).toBe(false);
    expect(coerceValue('42')).toBe(42);
    expect(coerceValue('2.5')).toBe(2.5);
  });

  it('leaves other text alone', () => {
    expect(coerceValue('vim')).toBe('vim');
    expect(coerceValue('-3')).toBe('-3');
  });
});

describe('resolveSettings', () => {
  it('maps the document to camelCase fields', () => {
    const doc = setConfigValue(defaultConfig(), 'user.name', 'Test User');
    const settings = resolveSettings(doc);

    expect(settings.author).toBe('Test User');
    expect(settings.pomodoroMinutes).toBe(25);
    expect(settings.defaultGitInit).toBe(true);
    expect(settings.reviewLimit).toBe(10);
  });
});
