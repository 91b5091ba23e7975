/**
 * ============================================================================
 * PROJECTS
 * ============================================================================
 *
 * Academic, personal and work projects with deadlines and an optional
 * scaffold directory on disk.
 *
 * CREATION:
 * 1. Validate input (name, type, YYYY-MM-DD deadline, priority 1-5)
 * 2. Reject a duplicate name
 * 3. Create the directory (default ./<name_in_snake_case>)
 * 4. Apply the template named by --template, or by --language; without
 *    one, write a README.md when project.auto_readme is on
 * 5. Initialize a git repository when project.default_git_init is on
 * 6. Insert the record
 *
 * Steps 3-5 are best effort: the database record and the files on disk are
 * not linked transactionally, so their failures come back as warnings and
 * the project is still created.
 */

import { z } from 'zod';
import { execFile } from 'child_process';
import { promisify } from 'util';
import { homedir } from 'os';
import { existsSync, mkdirSync, readdirSync, rmSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import { addDays, differenceInCalendarDays, isValid, parse, parseISO } from 'date-fns';
import type { DbWrapper } from '../db.js';
import { NotFoundError, StateConflictError, ValidationError, validate } from '../errors.js';
import { QueryBuilder } from '../lib/query-builder.js';
import { toDateString } from '../lib/scheduler.js';
import { systemClock, type Clock } from '../lib/timer.js';
import { decodeRow, decodeRows, projectRowSchema } from '../rows.js';
import { PROJECT_STATUSES, PROJECT_TYPES, type Project, type Urgency } from '../types/index.js';
import type { TemplateStore } from './templates.js';

const execFileAsync = promisify(execFile);

export const PROJECT_SORT_FIELDS = ['name', 'deadline', 'priority', 'created_at', 'updated_at'] as const;
export type ProjectSortField = (typeof PROJECT_SORT_FIELDS)[number];

const PROJECT_COLUMNS = [
  'name',
  'description',
  'project_type',
  'language',
  'git_repo',
  'deadline',
  'status',
  'priority',
  'created_at',
  'updated_at',
] as const;

// ============================================================================
// INPUT VALIDATION
// ============================================================================

export const dateString = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Use YYYY-MM-DD')
  .refine((value) => isValid(parse(value, 'yyyy-MM-dd', new Date())), 'Not a valid calendar date');

const priority = z.number().int().min(1, 'Priority must be 1-5').max(5, 'Priority must be 1-5');

const createProjectSchema = z.object({
  name: z.string().trim().min(1, 'Project name is required'),
  type: z.enum(PROJECT_TYPES).default('academic'),
  language: z.string().trim().min(1).optional(),
  template: z.string().trim().min(1).optional(),
  deadline: dateString.optional(),
  description: z.string().optional(),
  path: z.string().trim().min(1).optional(),
  priority: priority.default(3),
});

const projectChangesSchema = z
  .object({
    name: z.string().trim().min(1, 'Project name is required'),
    description: z.string().nullable(),
    type: z.enum(PROJECT_TYPES),
    language: z.string().nullable(),
    deadline: dateString.nullable(),
    status: z.enum(PROJECT_STATUSES),
    priority,
    gitRepo: z.string().nullable(),
  })
  .partial()
  .strict();

export type CreateProjectInput = z.input<typeof createProjectSchema>;
export type ProjectChanges = z.input<typeof projectChangesSchema>;

// ============================================================================
// COLLABORATORS
// ============================================================================

/** Initializes version control in a freshly scaffolded directory */
export interface RepositoryInitializer {
  init(dir: string): Promise<void>;
}

export const gitInitializer: RepositoryInitializer = {
  async init(dir: string) {
    await execFileAsync('git', ['init'], { cwd: dir });
    if (readdirSync(dir).some((entry) => entry !== '.git')) {
      await execFileAsync('git', ['add', '.'], { cwd: dir });
      await execFileAsync('git', ['commit', '-m', 'Initial commit'], { cwd: dir });
    }
  },
};

export interface ProjectServiceOptions {
  templates: TemplateStore;
  author: string;
  gitInit: boolean;
  autoReadme?: boolean;
  git?: RepositoryInitializer;
  clock?: Clock;
  cwd?: string;
}

export interface CreateProjectResult {
  project: Project;
  templateApplied: string | null;
  gitInitialized: boolean;
  warnings: string[];
}

export type ProjectListing = Project & { daysUntilDeadline: number | null };

export interface DeadlineEntry {
  id: number;
  name: string;
  deadline: string;
  daysLeft: number;
  status: Project['status'];
  priority: number;
  urgency: Urgency;
}

/**
 * Urgency bucket for days left until a deadline
 *
 * @example
 * urgencyFor(-2) // => "overdue"
 * urgencyFor(1)  // => "urgent"
 * urgencyFor(3)  // => "soon"
 * urgencyFor(6)  // => "upcoming"
 */
export function urgencyFor(daysLeft: number): Urgency {
  if (daysLeft < 0) return 'overdue';
  if (daysLeft <= 1) return 'urgent';
  if (daysLeft <= 3) return 'soon';
  return 'upcoming';
}

function expandHome(path: string): string {
  return path === '~' || path.startsWith('~/') ? join(homedir(), path.slice(1)) : path;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ProjectService {
  private readonly db: DbWrapper;
  private readonly templates: TemplateStore;
  private readonly author: string;
  private readonly gitInit: boolean;
  private readonly autoReadme: boolean;
  private readonly git: RepositoryInitializer;
  private readonly clock: Clock;
  private readonly cwd: string;

  constructor(db: DbWrapper, options: ProjectServiceOptions) {
    this.db = db;
    this.templates = options.templates;
    this.author = options.author;
    this.gitInit = options.gitInit;
    this.autoReadme = options.autoReadme ?? false;
    this.git = options.git ?? gitInitializer;
    this.clock = options.clock ?? systemClock;
    this.cwd = options.cwd ?? process.cwd();
  }

  async createProject(input: CreateProjectInput): Promise<CreateProjectResult> {
    const data = validate(createProjectSchema, input, 'Invalid project');

    if (this.findByName(data.name)) {
      throw new StateConflictError(`Project '${data.name}' already exists`);
    }

    const warnings: string[] = [];
    const now = new Date(this.clock.now());
    let projectPath: string | null = data.path
      ? resolve(this.cwd, expandHome(data.path))
      : resolve(this.cwd, data.name.replace(/ /g, '_').toLowerCase());

    try {
      mkdirSync(projectPath, { recursive: true });
    } catch (error) {
      warnings.push(`Failed to create directory ${projectPath}: ${describe(error)}`);
      projectPath = null;
    }

    let templateApplied: string | null = null;
    const templateName = data.template ?? data.language;
    if (projectPath && templateName) {
      try {
        this.templates.apply(templateName, projectPath, {
          projectName: data.name,
          language: data.language ?? '',
          author: this.author,
          date: now,
        });
        templateApplied = templateName;
      } catch (error) {
        warnings.push(describe(error));
      }
    }

    const readme = projectPath ? join(projectPath, 'README.md') : null;
    if (readme && !templateApplied && this.autoReadme && !existsSync(readme)) {
      try {
        writeFileSync(readme, `# ${data.name}\n\n${data.description ?? ''}\n`);
      } catch (error) {
        warnings.push(`Failed to write README.md: ${describe(error)}`);
      }
    }

    let gitRepo: string | null = null;
    if (projectPath && this.gitInit) {
      try {
        await this.git.init(projectPath);
        gitRepo = projectPath;
      } catch (error) {
        warnings.push(`Git initialization failed - continuing without Git (${describe(error)})`);
      }
    }

    const timestamp = now.toISOString();
    const { lastInsertRowid } = this.db.prepare(`
      INSERT INTO projects (
        name, description, project_type, language, path,
        git_repo, deadline, status, priority, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, 'active', ?, ?, ?)
    `).run(
      data.name,
      data.description ?? null,
      data.type,
      data.language ?? null,
      projectPath,
      gitRepo,
      data.deadline ?? null,
      data.priority,
      timestamp,
      timestamp,
    );

    return {
      project: this.getProject(lastInsertRowid),
      templateApplied,
      gitInitialized: gitRepo !== null,
      warnings,
    };
  }

  getProject(id: number): Project {
    const row = this.db.prepare('SELECT * FROM projects WHERE id = ?').get(id);
    if (!row) {
      throw new NotFoundError('Project', id);
    }
    return decodeRow(projectRowSchema, row, 'project');
  }

  findByName(name: string): Project | null {
    const row = this.db.prepare('SELECT * FROM projects WHERE name = ?').get(name);
    return row ? decodeRow(projectRowSchema, row, 'project') : null;
  }

  /**
   * Filtered, sorted project list. Names and deadlines sort ascending,
   * everything else newest / highest first.
   */
  listProjects(filters: { status?: string; type?: string; sortBy?: string } = {}): ProjectListing[] {
    const query = new QueryBuilder('projects', PROJECT_COLUMNS);

    if (filters.status && filters.status !== 'all') {
      query.where('status', '=', validate(z.enum(PROJECT_STATUSES), filters.status, 'Invalid status'));
    }
    if (filters.type && filters.type !== 'all') {
      query.where('project_type', '=', validate(z.enum(PROJECT_TYPES), filters.type, 'Invalid project type'));
    }

    const sortBy = validate(z.enum(PROJECT_SORT_FIELDS), filters.sortBy ?? 'updated_at', 'Invalid sort field');
    query.orderBy(sortBy, sortBy === 'name' || sortBy === 'deadline' ? 'ASC' : 'DESC');
    if (sortBy === 'deadline') {
      query.orderBy('priority', 'DESC');
    }

    const { sql, params } = query.select();
    const today = new Date(this.clock.now());
    return decodeRows(projectRowSchema, this.db.prepare(sql).all(...params), 'project').map((project) => ({
      ...project,
      daysUntilDeadline: project.deadline ? differenceInCalendarDays(parseISO(project.deadline), today) : null,
    }));
  }

  updateProject(id: number, changes: ProjectChanges): Project {
    const data = validate(projectChangesSchema, changes, 'Invalid project update');
    if (Object.keys(data).length === 0) {
      throw new ValidationError('No updates provided');
    }
    const current = this.getProject(id);

    if (data.name && data.name !== current.name && this.findByName(data.name)) {
      throw new StateConflictError(`Project '${data.name}' already exists`);
    }

    const { type, ...rest } = data;
    const built = new QueryBuilder('projects', PROJECT_COLUMNS).update(id, {
      ...rest,
      projectType: type,
      updatedAt: new Date(this.clock.now()).toISOString(),
    });
    if (built) {
      this.db.prepare(built.sql).run(...built.params);
    }
    return this.getProject(id);
  }

  /**
   * Delete the record; files go only with removeFiles AND a yes from confirm
   */
  async deleteProject(
    id: number,
    options: { removeFiles?: boolean; confirm?: (path: string) => Promise<boolean> } = {},
  ): Promise<{ project: Project; filesRemoved: boolean; warnings: string[] }> {
    const project = this.getProject(id);
    const warnings: string[] = [];
    let filesRemoved = false;

    if (options.removeFiles && project.path && existsSync(project.path)) {
      const agreed = options.confirm ? await options.confirm(project.path) : false;
      if (agreed) {
        try {
          rmSync(project.path, { recursive: true, force: true });
          filesRemoved = true;
        } catch (error) {
          warnings.push(`Failed to delete files: ${describe(error)}`);
        }
      }
    }

    this.db.prepare('DELETE FROM projects WHERE id = ?').run(id);
    return { project, filesRemoved, warnings };
  }

  /**
   * Open projects (not completed or cancelled) due within `daysAhead` days,
   * overdue ones included, soonest first
   */
  upcomingDeadlines(daysAhead = 7): DeadlineEntry[] {
    const today = new Date(this.clock.now());
    const horizon = toDateString(addDays(today, daysAhead));

    const rows = this.db.prepare(`
      SELECT * FROM projects
      WHERE deadline IS NOT NULL
        AND deadline <= ?
        AND status NOT IN ('completed', 'cancelled')
      ORDER BY deadline ASC, priority DESC
    `).all(horizon);

    return decodeRows(projectRowSchema, rows, 'project').flatMap((project) => {
      if (!project.deadline) return [];
      const daysLeft = differenceInCalendarDays(parseISO(project.deadline), today);
      return [
        {
          id: project.id,
          name: project.name,
          deadline: project.deadline,
          daysLeft,
          status: project.status,
          priority: project.priority,
          urgency: urgencyFor(daysLeft),
        },
      ];
    });
  }

  listTemplates(): string[] {
    return this.templates.list();
  }
}
