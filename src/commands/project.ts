/**
 * `studytrack project ...` - projects, deadlines and templates
 */

import { Command, Option } from 'commander';
import { readFileSync } from 'fs';
import { ValidationError } from '../errors.js';
import { renderTable } from '../lib/format.js';
import { PROJECT_SORT_FIELDS, type ProjectChanges } from '../services/projects.js';
import { PROJECT_STATUSES, PROJECT_TYPES, type ProjectStatus, type ProjectType } from '../types/index.js';
import { confirm } from './prompts.js';
import { collect, parseId, parseInteger, runAction, withServices } from './shared.js';

const URGENCY_ICONS = { overdue: '🚨', urgent: '🔴', soon: '🟡', upcoming: '🟢' } as const;

/** "path=content" or "path=@file" pairs from --file */
function parseTemplateFiles(entries: string[]): Record<string, string> {
  const files: Record<string, string> = {};
  for (const entry of entries) {
    const separator = entry.indexOf('=');
    if (separator <= 0) {
      throw new ValidationError(`Invalid --file "${entry}". Use path=content or path=@source-file`);
    }
    const path = entry.slice(0, separator);
    const value = entry.slice(separator + 1);
    files[path] = value.startsWith('@') ? readFileSync(value.slice(1), 'utf-8') : value;
  }
  return files;
}

const project = new Command('project').description('Projects, deadlines and templates');

project
  .command('new')
  .description('Create a project (directory, template, git repository)')
  .argument('<name>', 'project name')
  .addOption(new Option('-t, --type <type>', 'project type').choices(PROJECT_TYPES).default('academic'))
  .option('-l, --language <language>', 'programming language (also picks the template)')
  .option('--template <template>', 'template name')
  .option('--deadline <date>', 'deadline (YYYY-MM-DD)')
  .option('--description <text>', 'description')
  .option('--path <dir>', 'project directory (default ./<name>)')
  .option('--priority <1-5>', 'priority', parseInteger, 3)
  .action(
    runAction(
      'Project create',
      (
        name: string,
        options: { type: ProjectType; language?: string; template?: string; deadline?: string; description?: string; path?: string; priority: number },
      ) =>
        withServices(async (services) => {
          const result = await services.projects.createProject({ name, ...options });
          for (const warning of result.warnings) {
            console.warn(`⚠️  ${warning}`);
          }
          console.log(`✅ Created project '${result.project.name}' (ID ${result.project.id})`);
          if (result.project.path) console.log(`   📁 ${result.project.path}`);
          if (result.templateApplied) console.log(`   📄 Template: ${result.templateApplied}`);
          if (result.gitInitialized) console.log('   🔧 Git repository initialized');
        }),
    ),
  );

project
  .command('list')
  .description('List projects')
  .addOption(new Option('--status <status>', 'filter by status').choices(['all', ...PROJECT_STATUSES]).default('all'))
  .addOption(new Option('--type <type>', 'filter by type').choices(['all', ...PROJECT_TYPES]).default('all'))
  .addOption(new Option('--sort <field>', 'sort field').choices(PROJECT_SORT_FIELDS).default('updated_at'))
  .action(
    runAction('Project list', (options: { status: string; type: string; sort: string }) =>
      withServices((services) => {
        const projects = services.projects.listProjects({ status: options.status, type: options.type, sortBy: options.sort });
        if (projects.length === 0) {
          console.log('No projects found.');
          return;
        }
        console.log(
          renderTable(
            ['ID', 'Name', 'Type', 'Status', 'Priority', 'Deadline', 'Days left'],
            projects.map((p) => [p.id, p.name, p.projectType, p.status, p.priority, p.deadline, p.daysUntilDeadline]),
          ),
        );
      }),
    ),
  );

project
  .command('update')
  .description('Change project fields')
  .argument('<id>', 'project id', parseId)
  .option('--name <name>', 'new name')
  .option('--description <text>', 'description')
  .addOption(new Option('--type <type>', 'project type').choices(PROJECT_TYPES))
  .option('--language <language>', 'language')
  .option('--deadline <date>', 'deadline (YYYY-MM-DD)')
  .addOption(new Option('--status <status>', 'status').choices(PROJECT_STATUSES))
  .option('--priority <1-5>', 'priority', parseInteger)
  .option('--git-repo <path>', 'repository path or URL')
  .action(
    runAction(
      'Project update',
      (
        id: number,
        options: {
          name?: string;
          description?: string;
          type?: ProjectType;
          language?: string;
          deadline?: string;
          status?: ProjectStatus;
          priority?: number;
          gitRepo?: string;
        },
      ) =>
        withServices((services) => {
          const changes: ProjectChanges = {};
          if (options.name !== undefined) changes.name = options.name;
          if (options.description !== undefined) changes.description = options.description;
          if (options.type !== undefined) changes.type = options.type;
          if (options.language !== undefined) changes.language = options.language;
          if (options.deadline !== undefined) changes.deadline = options.deadline;
          if (options.status !== undefined) changes.status = options.status;
          if (options.priority !== undefined) changes.priority = options.priority;
          if (options.gitRepo !== undefined) changes.gitRepo = options.gitRepo;

          const updated = services.projects.updateProject(id, changes);
          console.log(`✅ Updated project '${updated.name}'`);
        }),
    ),
  );

project
  .command('delete')
  .description('Delete a project record')
  .argument('<id>', 'project id', parseId)
  .option('--remove-files', 'also delete the project directory (asks first)')
  .action(
    runAction('Project delete', (id: number, options: { removeFiles?: boolean }) =>
      withServices(async (services) => {
        const result = await services.projects.deleteProject(id, {
          removeFiles: options.removeFiles ?? false,
          confirm: (path) => confirm(`Delete ${path} and everything in it?`),
        });
        for (const warning of result.warnings) {
          console.warn(`⚠️  ${warning}`);
        }
        console.log(`🗑️  Deleted project '${result.project.name}'${result.filesRemoved ? ' and its files' : ''}`);
      }),
    ),
  );

project
  .command('deadlines')
  .description('Upcoming and overdue deadlines')
  .option('--days <n>', 'days ahead', parseInteger, 7)
  .action(
    runAction('Project deadlines', (options: { days: number }) =>
      withServices((services) => {
        const deadlines = services.projects.upcomingDeadlines(options.days);
        if (deadlines.length === 0) {
          console.log(`No deadlines in the next ${options.days} days.`);
          return;
        }
        for (const entry of deadlines) {
          const when = entry.daysLeft < 0 ? `${-entry.daysLeft} days overdue` : entry.daysLeft === 0 ? 'today' : `in ${entry.daysLeft} days`;
          console.log(`${URGENCY_ICONS[entry.urgency]} ${entry.name} - ${entry.deadline} (${when})`);
        }
      }),
    ),
  );

project
  .command('stats')
  .description('Time spent on a project')
  .argument('<id>', 'project id', parseId)
  .action(
    runAction('Project stats', (id: number) =>
      withServices((services) => {
        const stats = services.reports.projectSessionStats(id);
        console.log(`📊 ${stats.projectName}`);
        console.log(`   Sessions: ${stats.totalSessions}`);
        console.log(`   Hours: ${stats.totalHours}`);
        console.log(`   Average rating: ${stats.averageRating}`);
        console.log(`   Last session: ${stats.lastSession ?? '-'}`);
      }),
    ),
  );

const template = project.command('template').description('Project templates');

template
  .command('list')
  .description('Available templates')
  .action(
    runAction('Template list', () =>
      withServices((services) => {
        for (const name of services.projects.listTemplates()) {
          const loaded = services.templates.load(name);
          console.log(`📄 ${name} (${loaded.language})${loaded.description ? ` - ${loaded.description}` : ''}`);
        }
      }),
    ),
  );

template
  .command('create')
  .description('Save a custom template')
  .argument('<name>', 'template name')
  .requiredOption('-l, --language <language>', 'language')
  .option('-f, --file <path=content>', 'file in the template (repeatable; path=@source reads a file)', collect, [])
  .option('--description <text>', 'description')
  .option('--dependency <name>', 'dependency (repeatable)', collect, [])
  .action(
    runAction('Template create', (name: string, options: { language: string; file: string[]; description?: string; dependency: string[] }) =>
      withServices((services) => {
        const created = services.templates.create({
          name,
          language: options.language,
          files: parseTemplateFiles(options.file),
          dependencies: options.dependency,
          description: options.description,
        });
        console.log(`✅ Saved template '${created.name}' with ${Object.keys(created.files).length} file(s)`);
      }),
    ),
  );

export default project;
