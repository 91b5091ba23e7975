/**
 * Top-level commands: setup, status, backups, configuration, export and
 * reports.
 */

import { Command, Option } from 'commander';
import { existsSync } from 'fs';
import { format, parseISO } from 'date-fns';
import {
  coerceValue,
  ensureDirectories,
  getConfigValue,
  resetConfig,
  saveConfig,
  setConfigValue,
} from '../config.js';
import { getDatabaseStats } from '../db.js';
import { NotFoundError } from '../errors.js';
import type { ProductivityReport } from '../lib/analytics.js';
import { formatDuration, renderTable } from '../lib/format.js';
import { SessionTimer } from '../lib/timer.js';
import { staleHandleMessage } from '../services/active-session.js';
import { EXPORT_FORMATS, EXPORT_TYPES, type ExportFormat, type ExportType } from '../services/backup.js';
import { PACKAGE, VERSION } from '../version.js';
import { confirm } from './prompts.js';
import { loadContext, parseInteger, runAction, withServices } from './shared.js';

function printReport(report: ProductivityReport): void {
  const { sessions, projects, study, score } = report;
  console.log(`📊 Productivity report, ${report.period.start} to ${report.period.end} (${report.period.days} days)`);
  console.log(`   Score: ${score.overall}/5 (${score.level})`);
  console.log(
    `   Factors: study time ${score.factors.studyTime}, flashcards ${score.factors.flashcardMastery}, ` +
      `projects ${score.factors.projectCompletion}, ratings ${score.factors.sessionRating}`,
  );

  console.log('\n⏱️  Sessions');
  console.log(`   ${sessions.totalSessions} sessions, ${sessions.totalHours} h, average ${sessions.averageMinutes} min, rating ${sessions.averageRating}`);
  const subjects = Object.entries(sessions.bySubject);
  if (subjects.length > 0) {
    console.log(renderTable(['Subject', 'Sessions', 'Hours'], subjects.map(([subject, b]) => [subject, b.sessions, b.durationHours])));
  }

  console.log('\n📁 Projects');
  console.log(`   ${projects.total} total, ${projects.active} active, ${projects.completed} completed, ${projects.overdue} overdue`);

  console.log('\n📚 Study');
  console.log(`   Flashcards: ${study.flashcards.total}, ${study.flashcards.totalReviews} reviews, mastery ${study.flashcards.masteryRate}%`);
  console.log(`   Bookmarks: ${study.bookmarks.total}, ${study.bookmarks.read} read (${study.bookmarks.readRate}%)`);
  console.log(`   Courses: ${study.courses.total}, ${study.courses.inProgress} in progress, average progress ${study.courses.averageProgress}%`);

  const effectiveness = Object.entries(report.subjectEffectiveness);
  if (effectiveness.length > 0) {
    console.log('\n🎯 Subject effectiveness');
    console.log(
      renderTable(
        ['Subject', 'Study h', 'Mastery %', 'Reviews', 'Effectiveness'],
        effectiveness.map(([subject, e]) => [subject, e.studyHours, e.masteryRate, e.reviews, e.effectiveness]),
      ),
    );
  }
}

const init = new Command('init').description('Create the data directory, configuration and bundled templates').action(
  runAction('Init', () =>
    withServices((services) => {
      if (!existsSync(services.paths.configFile)) {
        saveConfig(services.paths.configFile, services.config);
        console.log(`✅ Wrote default configuration to ${services.paths.configFile}`);
      }
      services.templates.ensureDefaults();
      console.log(`🗄️  Database ready at ${services.paths.databaseFile}`);
      console.log(`📄 Templates: ${services.templates.list().join(', ') || '(none)'}`);
    }),
  ),
);

const status = new Command('status').description('Record counts, study time and the active session').action(
  runAction('Status', () =>
    withServices((services) => {
      const stats = getDatabaseStats(services.db);
      console.log(`🗄️  ${services.paths.databaseFile}`);
      console.log(renderTable(['Collection', 'Records'], Object.entries(stats.counts)));
      console.log(`\nStudy time: ${stats.totalStudyHours} h over ${stats.studyDays} day(s)`);

      const active = services.activeSession.resolve(services.sessions);
      if (active.kind === 'stale') {
        console.warn(`⚠️  ${staleHandleMessage(active)}`);
      }
      if (active.kind === 'open') {
        const snapshot = SessionTimer.fromHandle(active.handle, services.sessions, { clock: services.clock }).tick();
        console.log(`⏱️  Active ${snapshot.kind} session ${snapshot.sessionId} (${snapshot.status}), ${formatDuration(snapshot.remainingSeconds)} left`);
      }
    }),
  ),
);

const backup = new Command('backup')
  .description('Back up the database, configuration and templates')
  .option('--no-config', 'leave config.json out')
  .action(
    runAction('Backup', (options: { config: boolean }) =>
      withServices((services) => {
        const result = services.backups.createBackup({ includeConfig: options.config });
        console.log(`✅ Backup created: ${result.path} (${result.manifest.databaseSizeMb} MB)`);

        const keep = services.settings.keepBackups;
        if (keep > 0) {
          const removed = services.backups.pruneBackups(keep);
          if (removed.length > 0) console.log(`🗑️  Removed ${removed.length} old backup(s)`);
        }
      }),
    ),
  );

const restore = new Command('restore')
  .description('Replace current data with a backup (current data is backed up first)')
  .argument('<path>', 'backup directory')
  .option('-y, --yes', 'skip the confirmation')
  .action(
    runAction('Restore', (path: string, options: { yes?: boolean }) =>
      withServices(async (services) => {
        const manifest = services.backups.readManifest(path);
        console.log(`Backup from ${manifest.createdAt} (version ${manifest.version})`);
        if (!options.yes && !(await confirm('Replace all current data with this backup?'))) {
          console.log('Restore cancelled.');
          return;
        }
        const result = services.backups.restoreBackup(path);
        console.log(`✅ Restored. Previous data saved in ${result.safetyBackup}`);
        if (result.discardedActiveSession) {
          console.warn('⚠️  The background timer belonged to the replaced data and was discarded');
        }
      }),
    ),
  );

const config = new Command('config').description('Show or change configuration');

config
  .command('show')
  .description('Print the configuration, or one dotted key')
  .argument('[key]', 'dotted key, e.g. session.pomodoro_duration')
  .action(
    runAction('Config show', (key?: string) => {
      const context = loadContext();
      if (!key) {
        console.log(JSON.stringify(context.config, null, 2));
        return;
      }
      const value = getConfigValue(context.config, key);
      if (value === undefined) {
        throw new NotFoundError('Configuration key', key);
      }
      console.log(typeof value === 'object' ? JSON.stringify(value, null, 2) : String(value));
    }),
  );

config
  .command('set')
  .description('Set a dotted key (true/false and numbers are converted)')
  .argument('<key>', 'dotted key')
  .argument('<value>', 'new value')
  .action(
    runAction('Config set', (key: string, value: string) => {
      const context = loadContext();
      const updated = setConfigValue(context.config, key, coerceValue(value));
      saveConfig(context.paths.configFile, updated);
      console.log(`✅ ${key} = ${JSON.stringify(getConfigValue(updated, key))}`);
    }),
  );

config
  .command('reset')
  .description('Restore the default configuration')
  .action(
    runAction('Config reset', () => {
      const context = loadContext();
      ensureDirectories(context.paths);
      resetConfig(context.paths.configFile);
      console.log('✅ Configuration reset to defaults');
    }),
  );

const exportCommand = new Command('export')
  .description('Export records as JSON or CSV')
  .addOption(new Option('-f, --format <format>', 'output format (default from config)').choices(EXPORT_FORMATS))
  .addOption(new Option('-t, --type <type>', 'what to export').choices(EXPORT_TYPES).default('all'))
  .option('-o, --output <path>', 'output file (JSON) or directory (CSV)')
  .action(
    runAction('Export', (options: { format?: ExportFormat; type: ExportType; output?: string }) =>
      withServices((services) => {
        const result = services.backups.exportData({
          format: options.format ?? services.settings.exportFormat,
          dataType: options.type,
          output: options.output,
        });
        const counts = Object.entries(result.counts).map(([table, n]) => `${n} ${table}`);
        console.log(`✅ Exported ${counts.join(', ')}`);
        for (const file of result.files) {
          console.log(`   📄 ${file}`);
        }
      }),
    ),
  );

const dashboard = new Command('dashboard').description('This week at a glance').action(
  runAction('Dashboard', () =>
    withServices((services) => {
      const board = services.reports.buildDashboard();
      const { sessions, score } = board.report;
      console.log(`📊 Last 7 days: ${sessions.totalSessions} sessions, ${sessions.totalHours} h, score ${score.overall}/5 (${score.level})`);
      console.log(`🔥 Streak: ${board.streakDays} day(s)`);

      console.log(`\n🧠 Cards due: ${board.dueCards.length}`);
      for (const card of board.dueCards) {
        console.log(`   [${card.subject}] ${card.question}`);
      }

      console.log(`\n📅 Deadlines this week: ${board.deadlines.length}`);
      for (const entry of board.deadlines) {
        console.log(`   ${entry.name} - ${entry.deadline} (${entry.daysLeft} days, ${entry.urgency})`);
      }

      if (board.recentSessions.length > 0) {
        console.log('\n⏱️  Recent sessions');
        console.log(
          renderTable(
            ['Start', 'Type', 'Subject', 'Project', 'Duration'],
            board.recentSessions.map((s) => [
              format(parseISO(s.startTime), 'yyyy-MM-dd HH:mm'),
              s.sessionType,
              s.subject,
              s.projectName,
              formatDuration(s.duration),
            ]),
          ),
        );
      }
    }),
  ),
);

const report = new Command('report')
  .description('Productivity report')
  .option('-d, --days <n>', 'window in days', parseInteger, 30)
  .action(
    runAction('Report', (options: { days: number }) =>
      withServices((services) => {
        printReport(services.reports.buildReport(options.days));
      }),
    ),
  );

const version = new Command('version').description('Print the version').action(() => {
  console.log(`${PACKAGE.name} ${VERSION}`);
});

export default [init, status, backup, restore, config, exportCommand, dashboard, report, version];
