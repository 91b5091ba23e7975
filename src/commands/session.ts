/**
 * `studytrack session ...` - Pomodoro timer and session records
 *
 * A foreground `start` runs the live countdown. With --detach (or q during
 * the countdown) the timer handle is written to data/active-session.json and
 * later invocations pick it up.
 */

import { Command, Option } from 'commander';
import { format, parseISO } from 'date-fns';
import { AlreadyRunningError, NotRunningError } from '../errors.js';
import { formatClock, formatDuration, progressBar, renderTable, stars } from '../lib/format.js';
import { SessionTimer, type FinishResult, type TimerHandle } from '../lib/timer.js';
import { staleHandleMessage } from '../services/active-session.js';
import { STATS_PERIODS, type StatsPeriod } from '../services/sessions.js';
import { SESSION_TYPES, type SessionType } from '../types/index.js';
import { runLiveTimer } from './live-timer.js';
import { askRating } from './prompts.js';
import { parseInteger, runAction, withServices, type Services } from './shared.js';

function printFinished(result: FinishResult): void {
  console.log(`✅ Session ${result.sessionId} saved: ${formatDuration(result.durationSeconds)} of ${result.kind}` +
    `${result.subject ? ` (${result.subject})` : ''}, rated ${stars(result.rating)}`);
  for (const achievement of result.achievements) {
    console.log(`${achievement.icon} ${achievement.title} ${achievement.description}`);
  }
}

/** Handle of the detached timer if its session is still open; a stale one is reported and dropped */
function openHandle(services: Services): TimerHandle | null {
  const active = services.activeSession.resolve(services.sessions);
  if (active.kind === 'stale') {
    console.warn(`⚠️  ${staleHandleMessage(active)}`);
  }
  return active.kind === 'open' ? active.handle : null;
}

/** The detached timer, or NotRunningError naming the attempted action */
function detachedTimer(services: Services, action: string): SessionTimer {
  const handle = openHandle(services);
  if (!handle) {
    throw new NotRunningError(action);
  }
  return SessionTimer.fromHandle(handle, services.sessions, { clock: services.clock });
}

function defaultDuration(services: Services, kind: SessionType, longBreak: boolean): number {
  if (kind !== 'break') return services.settings.pomodoroMinutes;
  return longBreak ? services.settings.longBreakMinutes : services.settings.shortBreakMinutes;
}

const session = new Command('session').description('Pomodoro timer and session history');

session
  .command('start')
  .description('Start a timed session')
  .addOption(new Option('-t, --type <type>', 'session type').choices(SESSION_TYPES).default('study'))
  .option('-d, --duration <minutes>', 'length in minutes (default from config)', parseInteger)
  .option('-s, --subject <subject>', 'subject studied')
  .option('-p, --project <name>', 'link to a project by name')
  .option('--long', 'use the long break length for a break')
  .option('--detach', 'keep the timer running in the background')
  .action(
    runAction('Session start', (options: { type: SessionType; duration?: number; subject?: string; project?: string; long?: boolean; detach?: boolean }) =>
      withServices(async (services) => {
        if (openHandle(services)) {
          throw new AlreadyRunningError();
        }

        const timer = new SessionTimer(services.sessions, { clock: services.clock });
        const durationMinutes = options.duration ?? defaultDuration(services, options.type, options.long ?? false);
        const started = timer.start({
          kind: options.type,
          durationMinutes,
          subject: options.subject,
          projectName: options.project,
        });
        for (const warning of started.warnings) {
          console.warn(`⚠️  ${warning}`);
        }
        console.log(`🍅 Started ${durationMinutes}-minute ${options.type} session ${started.sessionId}` +
          `${options.subject ? ` on ${options.subject}` : ''}`);

        const handle = timer.toHandle();
        if (options.detach && handle) {
          services.activeSession.save(handle);
          console.log('Running in the background. Use `session status|pause|resume|stop`.');
          return;
        }

        const outcome = await runLiveTimer(timer, {
          sound: services.settings.notificationSound,
          showProgress: services.settings.showProgressBars,
          askRating: () => askRating(),
        });
        if (outcome.kind === 'detached') {
          services.activeSession.save(outcome.handle);
          console.log('Running in the background. Use `session status|pause|resume|stop`.');
          return;
        }
        printFinished(outcome.result);
      }),
    ),
  );

session
  .command('pause')
  .description('Pause the background session')
  .action(
    runAction('Session pause', () =>
      withServices((services) => {
        const timer = detachedTimer(services, 'pause');
        timer.pause();
        const handle = timer.toHandle();
        if (handle) services.activeSession.save(handle);
        console.log(`⏸️  Paused with ${formatClock(timer.tick().remainingSeconds)} remaining`);
      }),
    ),
  );

session
  .command('resume')
  .description('Resume the paused background session')
  .action(
    runAction('Session resume', () =>
      withServices((services) => {
        const timer = detachedTimer(services, 'resume');
        timer.resume();
        const handle = timer.toHandle();
        if (handle) services.activeSession.save(handle);
        console.log(`▶️  Resumed, ${formatClock(timer.tick().remainingSeconds)} remaining`);
      }),
    ),
  );

session
  .command('stop')
  .description('End the background session (completes it if the time is up)')
  .option('-r, --rating <1-5>', 'productivity rating', parseInteger)
  .option('-n, --notes <text>', 'session notes')
  .action(
    runAction('Session stop', (options: { rating?: number; notes?: string }) =>
      withServices(async (services) => {
        const timer = detachedTimer(services, 'stop');
        const rating = options.rating ?? (await askRating());
        const result = timer.isExpired() ? timer.complete(rating) : timer.stop(rating, options.notes);
        services.activeSession.clear();
        printFinished(result);
      }),
    ),
  );

session
  .command('status')
  .description('Show the background session')
  .action(
    runAction('Session status', () =>
      withServices((services) => {
        const handle = openHandle(services);
        if (!handle) {
          console.log('No active session.');
          return;
        }
        const snapshot = SessionTimer.fromHandle(handle, services.sessions, { clock: services.clock }).tick();
        console.log(`Session ${snapshot.sessionId}: ${snapshot.kind}${snapshot.subject ? ` (${snapshot.subject})` : ''}, ${snapshot.status}`);
        console.log(`Elapsed ${formatClock(snapshot.elapsedSeconds)}, remaining ${formatClock(snapshot.remainingSeconds)}`);
        if (services.settings.showProgressBars) {
          console.log(progressBar(snapshot.progressPercent));
        }
        if (snapshot.status === 'running' && snapshot.remainingSeconds === 0) {
          console.log("🎉 Time's up! Run `session stop` to record it.");
        }
      }),
    ),
  );

session
  .command('stats')
  .description('Totals and breakdowns for a period')
  .addOption(new Option('--period <period>', 'time period').choices(STATS_PERIODS).default('today'))
  .action(
    runAction('Session stats', (options: { period: StatsPeriod }) =>
      withServices((services) => {
        const stats = services.sessions.getStats(options.period);
        console.log(`📊 Sessions (${stats.period}): ${stats.totalSessions}, ${stats.totalHours} h, average rating ${stats.averageRating}`);
        if (stats.totalSessions === 0) return;

        console.log('\nBy subject');
        console.log(
          renderTable(
            ['Subject', 'Sessions', 'Hours', 'Rating'],
            Object.entries(stats.bySubject).map(([subject, b]) => [subject, b.sessions, b.durationHours, b.averageRating]),
          ),
        );
        console.log('\nBy type');
        console.log(
          renderTable(['Type', 'Sessions', 'Hours'], Object.entries(stats.byType).map(([type, b]) => [type, b.sessions, b.durationHours])),
        );
        console.log('\nBy day');
        console.log(
          renderTable(['Day', 'Sessions', 'Hours'], Object.entries(stats.byDay).map(([day, b]) => [day, b.sessions, b.durationHours])),
        );
      }),
    ),
  );

session
  .command('history')
  .description('Most recent sessions')
  .option('-l, --limit <n>', 'number of sessions', parseInteger, 10)
  .action(
    runAction('Session history', (options: { limit: number }) =>
      withServices((services) => {
        const history = services.sessions.getHistory(options.limit);
        if (history.length === 0) {
          console.log('No sessions recorded yet.');
          return;
        }
        console.log(
          renderTable(
            ['ID', 'Start', 'Type', 'Subject', 'Project', 'Minutes', 'Rating', 'Status'],
            history.map((entry) => [
              entry.id,
              format(parseISO(entry.startTime), 'yyyy-MM-dd HH:mm'),
              entry.sessionType,
              entry.subject,
              entry.projectName,
              entry.durationMinutes,
              entry.rating,
              entry.status,
            ]),
          ),
        );
      }),
    ),
  );

export default session;
