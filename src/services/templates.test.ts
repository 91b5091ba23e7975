import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { TemplateError, ValidationError } from '../errors.js';
import { renderPlaceholders, TemplateStore } from './templates.js';

describe('renderPlaceholders', () => {
  it('fills every placeholder', () => {
    const text = renderPlaceholders('{{PROJECT_NAME}} ({{LANGUAGE}}) {{DATE}} by {{AUTHOR}}, {{PROJECT_NAME}}', {
      projectName: 'calc',
      language: 'go',
      author: 'Test User',
      date: new Date(2024, 2, 9),
    });
    expect(text).toBe('calc (go) 2024-03-09 by Test User, calc');
  });
});

describe('TemplateStore', () => {
  let dir: string;
  let store: TemplateStore;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'studytrack-templates-'));
    store = new TemplateStore(join(dir, 'templates'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('copies the bundled templates on first use', () => {
    expect(store.list()).toEqual(['javascript', 'python', 'typescript']);
    expect(store.load('typescript').files['src/index.ts']).toContain('{{PROJECT_NAME}}');
  });

  it('creates custom templates', () => {
    store.create({ name: 'notes', language: 'markdown', files: { 'notes.md': '# {{PROJECT_NAME}}' } });

    expect(store.list()).toContain('notes');
    expect(store.load('notes')).toMatchObject({
      language: 'markdown',
      description: 'Custom template for markdown projects',
      dependencies: [],
    });
  });

  it('rejects bad names and empty templates', () => {
    expect(() => store.create({ name: '../evil', language: 'x', files: { a: 'b' } })).toThrow(ValidationError);
    expect(() => store.create({ name: 'empty', language: 'x', files: {} })).toThrow(TemplateError);
  });

  it('applies files into nested directories', () => {
    store.create({ name: 'nested', language: 'text', files: { 'docs/readme.txt': '{{PROJECT_NAME}} docs' } });
    const project = join(dir, 'project');

    expect(store.apply('nested', project, { projectName: 'p', language: 'text', author: '', date: new Date() })).toEqual([
      'docs/readme.txt',
    ]);
    expect(readFileSync(join(project, 'docs', 'readme.txt'), 'utf-8')).toBe('p docs');
  });

  it('refuses paths that escape the project', () => {
    store.ensureDefaults();
    writeFileSync(join(store.dir, 'escape.json'), JSON.stringify({ name: 'escape', language: 'x', files: { '../out.txt': 'x' } }));

    expect(() => store.apply('escape', join(dir, 'project'), { projectName: 'p', language: '', author: '', date: new Date() })).toThrow(
      TemplateError,
    );
  });

  it('reports missing and malformed templates', () => {
    store.ensureDefaults();
    writeFileSync(join(store.dir, 'broken.json'), '{');

    expect(() => store.load('nope')).toThrow("Template 'nope' not found");
    expect(() => store.load('broken')).toThrow(TemplateError);
  });
});
