/**
 * ============================================================================
 * SESSION RECORDS
 * ============================================================================
 *
 * Persistence behind the session timer plus the read side used by
 * `session stats`, `session history` and the dashboard.
 *
 * A session row is inserted when the timer starts (end_time NULL) and
 * finalized exactly once when it is stopped or completes. Only finalized
 * sessions count in statistics.
 */

import { format, parseISO, startOfDay, subDays } from 'date-fns';
import { numberColumn, stringColumn, type DbWrapper, type Row } from '../db.js';
import { NotFoundError, StateConflictError, ValidationError } from '../errors.js';
import { decodeRow, sessionRowSchema } from '../rows.js';
import { countStreak } from '../lib/achievements.js';
import { analyzeSessions, type Breakdown, type SessionWithProject } from '../lib/analytics.js';
import { round } from '../lib/format.js';
import { systemClock, type Clock, type SessionStore } from '../lib/timer.js';
import type { Session, SessionType } from '../types/index.js';

export const STATS_PERIODS = ['today', 'week', 'month', 'all'] as const;
export type StatsPeriod = (typeof STATS_PERIODS)[number];

export type SessionState = 'open' | 'finished' | 'missing';

export interface SessionStats {
  period: StatsPeriod;
  totalSessions: number;
  totalSeconds: number;
  totalHours: number;
  averageRating: number;
  bySubject: Record<string, Breakdown & { averageRating: number }>;
  byType: Record<string, Breakdown>;
  byDay: Record<string, Breakdown>;
}

export interface HistoryEntry {
  id: number;
  sessionType: SessionType;
  subject: string | null;
  projectName: string | null;
  startTime: string;
  endTime: string | null;
  durationMinutes: number;
  rating: number | null;
  status: 'completed' | 'incomplete';
}

export function decodeSessionWithProject(row: Row): SessionWithProject {
  return { ...decodeRow(sessionRowSchema, row, 'session'), projectName: stringColumn(row, 'project_name') };
}

export class SessionService implements SessionStore {
  private readonly db: DbWrapper;
  private readonly clock: Clock;

  constructor(db: DbWrapper, clock: Clock = systemClock) {
    this.db = db;
    this.clock = clock;
  }

  createSession(input: {
    sessionType: SessionType;
    subject: string | null;
    projectId: number | null;
    startTime: string;
  }): number {
    const result = this.db.prepare(`
      INSERT INTO sessions (session_type, project_id, subject, start_time, created_at)
      VALUES (?, ?, ?, ?, ?)
    `).run(input.sessionType, input.projectId, input.subject, input.startTime, new Date(this.clock.now()).toISOString());
    return result.lastInsertRowid;
  }

  finalizeSession(
    id: number,
    result: { endTime: string; duration: number; rating: number; notes: string | null },
  ): void {
    const { changes } = this.db.prepare(`
      UPDATE sessions
      SET end_time = ?, duration = ?, productivity_rating = ?, notes = COALESCE(?, notes)
      WHERE id = ? AND end_time IS NULL
    `).run(result.endTime, result.duration, result.rating, result.notes, id);

    if (changes === 0) {
      if (this.sessionState(id) === 'finished') {
        throw new StateConflictError(`Session ${id} is already finished`);
      }
      throw new NotFoundError('Session', id);
    }
  }

  /** Whether a row can still be finalized */
  sessionState(id: number): SessionState {
    const row = this.db.prepare('SELECT end_time FROM sessions WHERE id = ?').get(id);
    if (!row) return 'missing';
    return stringColumn(row, 'end_time') === null ? 'open' : 'finished';
  }

  getSession(id: number): Session {
    const row = this.db.prepare('SELECT * FROM sessions WHERE id = ?').get(id);
    if (!row) {
      throw new NotFoundError('Session', id);
    }
    return decodeRow(sessionRowSchema, row, 'session');
  }

  findProjectIdByName(name: string): number | null {
    return numberColumn(this.db.prepare('SELECT id FROM projects WHERE name = ?').get(name), 'id');
  }

  /**
   * Totals and breakdowns for finished sessions in a period
   *
   * Periods: today (since local midnight), week (last 7 days),
   * month (last 30 days), all.
   */
  getStats(period: StatsPeriod = 'today'): SessionStats {
    const sessions = this.finishedSince(this.periodStart(period));
    const summary = analyzeSessions(sessions);
    const totalSeconds = sessions.reduce((sum, s) => sum + (s.duration ?? 0), 0);

    const bySubject: SessionStats['bySubject'] = {};
    for (const [subject, breakdown] of Object.entries(summary.bySubject)) {
      const ratings = sessions.flatMap((s) =>
        s.subject === subject && s.productivityRating !== null ? [s.productivityRating] : [],
      );
      const averageRating = ratings.length ? round(ratings.reduce((a, b) => a + b, 0) / ratings.length) : 0;
      bySubject[subject] = { ...breakdown, averageRating };
    }

    return {
      period,
      totalSessions: summary.totalSessions,
      totalSeconds,
      totalHours: summary.totalHours,
      averageRating: summary.averageRating,
      bySubject,
      byType: summary.byType,
      byDay: summary.byDay,
    };
  }

  /**
   * Most recent sessions first, finished or not
   */
  getHistory(limit = 10): HistoryEntry[] {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError(`Limit must be a positive whole number (got ${limit})`);
    }

    const rows = this.db.prepare(`
      SELECT s.*, p.name AS project_name
      FROM sessions s
      LEFT JOIN projects p ON s.project_id = p.id
      ORDER BY s.start_time DESC, s.id DESC
      LIMIT ?
    `).all(limit);

    return rows.map((row) => {
      const session = decodeSessionWithProject(row);
      return {
        id: session.id,
        sessionType: session.sessionType,
        subject: session.subject,
        projectName: session.projectName,
        startTime: session.startTime,
        endTime: session.endTime,
        durationMinutes: session.duration ? Math.round(session.duration / 60) : 0,
        rating: session.productivityRating,
        status: session.endTime ? 'completed' : 'incomplete',
      };
    });
  }

  /** Finished sessions, newest first */
  recentFinished(limit: number): SessionWithProject[] {
    const rows = this.db.prepare(`
      SELECT s.*, p.name AS project_name
      FROM sessions s
      LEFT JOIN projects p ON s.project_id = p.id
      WHERE s.end_time IS NOT NULL
      ORDER BY s.start_time DESC, s.id DESC
      LIMIT ?
    `).all(limit);
    return rows.map(decodeSessionWithProject);
  }

  /**
   * Consecutive local days, ending today, with at least one finished session
   */
  currentStreak(today: string): number {
    const rows = this.db.prepare('SELECT start_time FROM sessions WHERE end_time IS NOT NULL').all();
    const days = rows.flatMap((row) => {
      const startTime = stringColumn(row, 'start_time');
      return startTime ? [format(parseISO(startTime), 'yyyy-MM-dd')] : [];
    });
    return countStreak(days, today, (day) => format(subDays(parseISO(day), 1), 'yyyy-MM-dd'));
  }

  countCompleted(): number {
    return numberColumn(this.db.prepare('SELECT COUNT(*) AS cnt FROM sessions WHERE end_time IS NOT NULL').get(), 'cnt') ?? 0;
  }

  finishedSince(start: Date | null): SessionWithProject[] {
    const rows = this.db.prepare(`
      SELECT s.*, p.name AS project_name
      FROM sessions s
      LEFT JOIN projects p ON s.project_id = p.id
      WHERE s.end_time IS NOT NULL AND s.start_time >= ?
      ORDER BY s.start_time ASC
    `).all(start ? start.toISOString() : '');
    return rows.map(decodeSessionWithProject);
  }

  private periodStart(period: StatsPeriod): Date | null {
    const now = new Date(this.clock.now());
    switch (period) {
      case 'today':
        return startOfDay(now);
      case 'week':
        return subDays(now, 7);
      case 'month':
        return subDays(now, 30);
      case 'all':
        return null;
    }
  }
}
