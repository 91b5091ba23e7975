/**
 * Project templates: JSON documents under data/templates/projects/.
 *
 * A template maps relative file paths to contents with placeholders:
 *   {{PROJECT_NAME}}  {{LANGUAGE}}  {{DATE}}  {{AUTHOR}}
 *
 * The bundled python, javascript and typescript templates ship in
 * templates/projects/ next to the package and are copied into the data
 * directory the first time templates are needed. Copies there can be edited.
 */

import { z } from 'zod';
import { format } from 'date-fns';
import { fileURLToPath } from 'url';
import { basename, dirname, join, resolve, sep } from 'path';
import { copyFileSync, existsSync, mkdirSync, readdirSync, readFileSync, writeFileSync } from 'fs';
import { TemplateError, validate } from '../errors.js';
import type { ProjectTemplate } from '../types/index.js';

export const BUNDLED_TEMPLATES_DIR = fileURLToPath(new URL('../../templates/projects/', import.meta.url));

const templateName = z
  .string()
  .trim()
  .min(1, 'Template name is required')
  .regex(/^[\w.-]+$/, 'Template names may only use letters, digits, dots, dashes and underscores');

export const templateSchema = z.object({
  name: z.string(),
  language: z.string(),
  description: z.string().default(''),
  files: z.record(z.string()),
  dependencies: z.array(z.string()).default([]),
  createdAt: z.string().optional(),
});

export interface PlaceholderValues {
  projectName: string;
  language: string;
  author: string;
  date: Date;
}

export function renderPlaceholders(content: string, values: PlaceholderValues): string {
  return content
    .replaceAll('{{PROJECT_NAME}}', values.projectName)
    .replaceAll('{{LANGUAGE}}', values.language)
    .replaceAll('{{DATE}}', format(values.date, 'yyyy-MM-dd'))
    .replaceAll('{{AUTHOR}}', values.author);
}

export class TemplateStore {
  readonly dir: string;
  private readonly bundledDir: string;

  constructor(dir: string, bundledDir: string = BUNDLED_TEMPLATES_DIR) {
    this.dir = dir;
    this.bundledDir = bundledDir;
  }

  /** Copy bundled templates that are not in the data directory yet */
  ensureDefaults(): void {
    mkdirSync(this.dir, { recursive: true });
    if (!existsSync(this.bundledDir)) return;
    for (const file of readdirSync(this.bundledDir)) {
      if (!file.endsWith('.json')) continue;
      const target = join(this.dir, file);
      if (!existsSync(target)) {
        copyFileSync(join(this.bundledDir, file), target);
      }
    }
  }

  list(): string[] {
    this.ensureDefaults();
    return readdirSync(this.dir)
      .filter((file) => file.endsWith('.json'))
      .map((file) => basename(file, '.json'))
      .sort();
  }

  load(name: string): ProjectTemplate {
    this.ensureDefaults();
    const file = join(this.dir, `${name}.json`);
    if (!existsSync(file)) {
      throw new TemplateError(`Template '${name}' not found`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(file, 'utf-8'));
    } catch (error) {
      throw new TemplateError(`Template '${name}' is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
    const result = templateSchema.safeParse(raw);
    if (!result.success) {
      throw new TemplateError(`Template '${name}' is malformed: ${result.error.issues[0]?.message ?? 'unknown error'}`);
    }
    return result.data;
  }

  create(input: { name: string; language: string; files: Record<string, string>; dependencies?: string[]; description?: string }): ProjectTemplate {
    const name = validate(templateName, input.name, 'Invalid template name');
    if (Object.keys(input.files).length === 0) {
      throw new TemplateError('A template needs at least one file');
    }

    const template: ProjectTemplate = {
      name,
      language: input.language,
      description: input.description ?? `Custom template for ${input.language} projects`,
      files: input.files,
      dependencies: input.dependencies ?? [],
      createdAt: new Date().toISOString(),
    };

    mkdirSync(this.dir, { recursive: true });
    writeFileSync(join(this.dir, `${name}.json`), JSON.stringify(template, null, 4) + '\n');
    return template;
  }

  /**
   * Write every template file into `projectDir` with placeholders filled in.
   * Returns the relative paths written.
   */
  apply(name: string, projectDir: string, values: PlaceholderValues): string[] {
    const template = this.load(name);
    const root = resolve(projectDir);
    const written: string[] = [];

    for (const [relativePath, content] of Object.entries(template.files)) {
      const target = resolve(root, relativePath);
      if (!target.startsWith(root + sep)) {
        throw new TemplateError(`Template '${name}' writes outside the project: ${relativePath}`);
      }
      try {
        mkdirSync(dirname(target), { recursive: true });
        writeFileSync(target, renderPlaceholders(content, values));
      } catch (error) {
        throw new TemplateError(`Failed to write ${relativePath}: ${error instanceof Error ? error.message : String(error)}`);
      }
      written.push(relativePath);
    }
    return written;
  }
}
