/**
 * ============================================================================
 * REPORTS
 * ============================================================================
 *
 * Loads the records for a trailing window and hands them to the pure
 * aggregation in lib/analytics.ts.
 *
 * WINDOW:
 * - Starts at local midnight `windowDays` days before today
 * - Sessions: finished, started inside the window
 * - Projects, courses: created or updated inside the window
 * - Flashcards: created or reviewed inside the window
 * - Bookmarks: created or opened inside the window
 *
 * Any failing read fails the whole report; there is no partial result.
 */

import { format, parseISO, startOfDay, subDays } from 'date-fns';
import { numberColumn, type DbWrapper } from '../db.js';
import { ValidationError } from '../errors.js';
import { buildProductivityReport, type ProductivityReport, type SessionWithProject } from '../lib/analytics.js';
import { round, toHours } from '../lib/format.js';
import { QueryBuilder } from '../lib/query-builder.js';
import { systemClock, type Clock } from '../lib/timer.js';
import { bookmarkRowSchema, courseRowSchema, decodeRows, flashcardRowSchema, projectRowSchema } from '../rows.js';
import type { Flashcard } from '../types/index.js';
import type { FlashcardService, FlashcardStats } from './flashcards.js';
import type { DeadlineEntry, ProjectService } from './projects.js';
import type { SessionService } from './sessions.js';

export interface Dashboard {
  report: ProductivityReport;
  dueCards: Flashcard[];
  deadlines: DeadlineEntry[];
  streakDays: number;
  recentSessions: SessionWithProject[];
}

export interface SubjectTimeTracking {
  subject: string;
  totalSessions: number;
  totalHours: number;
  averageMinutes: number;
  averageRating: number;
  byDay: Record<string, number>; // YYYY-MM-DD -> hours
  flashcards: FlashcardStats;
}

export interface ProjectSessionStats {
  projectId: number;
  projectName: string;
  totalSessions: number;
  totalHours: number;
  averageRating: number;
  lastSession: string | null;
}

export interface ReviewSummary {
  dueFlashcards: number;
  unreadBookmarks: number;
  inProgressCourses: number;
}

function averageRating(sessions: SessionWithProject[]): number {
  const ratings = sessions.flatMap((s) => (s.productivityRating === null ? [] : [s.productivityRating]));
  return ratings.length ? round(ratings.reduce((a, b) => a + b, 0) / ratings.length) : 0;
}

export class ReportService {
  private readonly db: DbWrapper;
  private readonly sessions: SessionService;
  private readonly projects: ProjectService;
  private readonly flashcards: FlashcardService;
  private readonly clock: Clock;

  constructor(
    db: DbWrapper,
    services: { sessions: SessionService; projects: ProjectService; flashcards: FlashcardService },
    clock: Clock = systemClock,
  ) {
    this.db = db;
    this.sessions = services.sessions;
    this.projects = services.projects;
    this.flashcards = services.flashcards;
    this.clock = clock;
  }

  buildReport(windowDays = 30): ProductivityReport {
    if (!Number.isInteger(windowDays) || windowDays < 1) {
      throw new ValidationError(`Days must be a positive whole number (got ${windowDays})`);
    }

    const now = new Date(this.clock.now());
    const windowStart = startOfDay(subDays(now, windowDays));
    const since = windowStart.toISOString();

    const projects = new QueryBuilder('projects', ['created_at', 'updated_at'] as const)
      .whereAny([
        { column: 'updated_at', op: '>=', value: since },
        { column: 'created_at', op: '>=', value: since },
      ])
      .orderBy('updated_at', 'DESC')
      .select();

    const flashcards = new QueryBuilder('flashcards', ['created_at', 'last_reviewed'] as const)
      .whereAny([
        { column: 'created_at', op: '>=', value: since },
        { column: 'last_reviewed', op: '>=', value: since },
      ])
      .select();

    const bookmarks = new QueryBuilder('bookmarks', ['created_at', 'accessed_at'] as const)
      .whereAny([
        { column: 'created_at', op: '>=', value: since },
        { column: 'accessed_at', op: '>=', value: since },
      ])
      .select();

    const courses = new QueryBuilder('courses', ['created_at', 'updated_at'] as const)
      .whereAny([
        { column: 'created_at', op: '>=', value: since },
        { column: 'updated_at', op: '>=', value: since },
      ])
      .select();

    const records = {
      sessions: this.sessions.finishedSince(windowStart),
      projects: decodeRows(projectRowSchema, this.db.prepare(projects.sql).all(...projects.params), 'project'),
      flashcards: decodeRows(flashcardRowSchema, this.db.prepare(flashcards.sql).all(...flashcards.params), 'flashcard'),
      bookmarks: decodeRows(bookmarkRowSchema, this.db.prepare(bookmarks.sql).all(...bookmarks.params), 'bookmark'),
      courses: decodeRows(courseRowSchema, this.db.prepare(courses.sql).all(...courses.params), 'course'),
    };

    return buildProductivityReport(records, windowDays, windowStart, now);
  }

  /** Last 7 days at a glance */
  buildDashboard(): Dashboard {
    const today = format(new Date(this.clock.now()), 'yyyy-MM-dd');
    return {
      report: this.buildReport(7),
      dueCards: this.flashcards.getDueCards(undefined, 5),
      deadlines: this.projects.upcomingDeadlines(7),
      streakDays: this.sessions.currentStreak(today),
      recentSessions: this.sessions.recentFinished(5),
    };
  }

  /** Everything recorded for one subject, all time */
  subjectTimeTracking(subject: string): SubjectTimeTracking {
    const sessions = this.sessions.finishedSince(null).filter((s) => s.subject === subject);
    const totalSeconds = sessions.reduce((sum, s) => sum + (s.duration ?? 0), 0);

    const secondsByDay: Record<string, number> = {};
    for (const session of sessions) {
      const day = format(parseISO(session.startTime), 'yyyy-MM-dd');
      secondsByDay[day] = (secondsByDay[day] ?? 0) + (session.duration ?? 0);
    }
    const byDay: Record<string, number> = {};
    for (const [day, seconds] of Object.entries(secondsByDay)) {
      byDay[day] = toHours(seconds);
    }

    return {
      subject,
      totalSessions: sessions.length,
      totalHours: toHours(totalSeconds),
      averageMinutes: sessions.length ? round(totalSeconds / sessions.length / 60, 1) : 0,
      averageRating: averageRating(sessions),
      byDay,
      flashcards: this.flashcards.getStats(subject),
    };
  }

  projectSessionStats(projectId: number): ProjectSessionStats {
    const project = this.projects.getProject(projectId);
    const sessions = this.sessions.finishedSince(null).filter((s) => s.projectId === projectId);
    const totalSeconds = sessions.reduce((sum, s) => sum + (s.duration ?? 0), 0);

    return {
      projectId,
      projectName: project.name,
      totalSessions: sessions.length,
      totalHours: toHours(totalSeconds),
      averageRating: averageRating(sessions),
      lastSession: sessions.length ? sessions[sessions.length - 1].startTime : null,
    };
  }

  /** What is waiting: due cards, unread bookmarks, courses underway */
  reviewSummary(): ReviewSummary {
    const unread = this.db.prepare('SELECT COUNT(*) AS cnt FROM bookmarks WHERE is_read = 0').get();
    const courses = this.db.prepare("SELECT COUNT(*) AS cnt FROM courses WHERE status = 'in_progress'").get();

    return {
      dueFlashcards: this.flashcards.getStats().dueForReview,
      unreadBookmarks: numberColumn(unread, 'cnt') ?? 0,
      inProgressCourses: numberColumn(courses, 'cnt') ?? 0,
    };
  }
}
