/**
 * ============================================================================
 * SESSION TIMER - Pomodoro State Machine
 * ============================================================================
 *
 * One timed block of study, break or project work.
 *
 * STATES:
 *   idle --start--> running --pause--> paused --resume--> running
 *   running --(time expires) complete--> completed --> idle
 *   running|paused --stop--> stopped --> idle
 *
 * RULES:
 * - At most one session per timer; start() outside idle is rejected
 * - Elapsed time excludes every paused interval, so pausing really stops
 *   the countdown
 * - complete() records the planned length, not the raw elapsed time, when
 *   it is finalized after expiry; stop() records elapsed time as is
 * - The session row is written before in-memory state changes; a failed
 *   write leaves the timer exactly as it was
 * - An operator interrupt (Ctrl+C) pauses a running timer, nothing more
 *
 * The command layer owns the timer. A detached timer survives between CLI
 * invocations as a TimerHandle saved to data/active-session.json.
 */

import { z } from 'zod';
import { format } from 'date-fns';
import { AlreadyRunningError, NotPausedError, NotRunningError, StateConflictError, ValidationError } from '../errors.js';
import { SESSION_TYPES, type SessionType } from '../types/index.js';
import { evaluateAchievements, type Achievement } from './achievements.js';

export type TimerStatus = 'idle' | 'running' | 'paused' | 'completed' | 'stopped';

export interface Clock {
  now(): number; // Milliseconds since epoch
}

export const systemClock: Clock = { now: () => Date.now() };

/**
 * What the timer needs from the session records
 */
export interface SessionStore {
  createSession(input: {
    sessionType: SessionType;
    subject: string | null;
    projectId: number | null;
    startTime: string;
  }): number;
  finalizeSession(
    id: number,
    result: { endTime: string; duration: number; rating: number; notes: string | null },
  ): void;
  findProjectIdByName(name: string): number | null;
  currentStreak(today: string): number;
  countCompleted(): number;
}

export interface StartOptions {
  kind: SessionType;
  durationMinutes: number;
  subject?: string;
  projectName?: string;
}

export interface StartResult {
  sessionId: number;
  projectId: number | null;
  warnings: string[];
}

export interface TimerSnapshot {
  status: TimerStatus;
  sessionId: number | null;
  kind: SessionType | null;
  subject: string | null;
  elapsedSeconds: number;
  remainingSeconds: number;
  totalSeconds: number;
  progressPercent: number; // 0-100
}

export interface FinishResult {
  sessionId: number;
  kind: SessionType;
  subject: string | null;
  durationSeconds: number;
  rating: number;
  achievements: Achievement[]; // Only filled by complete()
}

export const timerHandleSchema = z.object({
  sessionId: z.number().int(),
  kind: z.enum(SESSION_TYPES),
  subject: z.string().nullable(),
  projectId: z.number().int().nullable(),
  startedAt: z.number(), // ms
  totalSeconds: z.number().int().positive(),
  pausedMs: z.number().nonnegative(), // Sum of finished pauses
  pausedAt: z.number().nullable(), // Start of the current pause
});

export type TimerHandle = z.infer<typeof timerHandleSchema>;

export interface SessionTimerOptions {
  clock?: Clock;
  onTransition?: (from: TimerStatus, to: TimerStatus) => void;
}

const ratingSchema = z.number().int().min(1).max(5);

function validateRating(rating: number): number {
  const result = ratingSchema.safeParse(rating);
  if (!result.success) {
    throw new ValidationError('Rating must be a whole number from 1 to 5', result.error.issues);
  }
  return result.data;
}

export class SessionTimer {
  private readonly store: SessionStore;
  private readonly clock: Clock;
  private readonly onTransition?: (from: TimerStatus, to: TimerStatus) => void;
  private status: TimerStatus = 'idle';
  private active: TimerHandle | null = null;

  constructor(store: SessionStore, options: SessionTimerOptions = {}) {
    this.store = store;
    this.clock = options.clock ?? systemClock;
    this.onTransition = options.onTransition;
  }

  /**
   * Rebuild a timer from a saved handle (detached session)
   */
  static fromHandle(handle: TimerHandle, store: SessionStore, options: SessionTimerOptions = {}): SessionTimer {
    const timer = new SessionTimer(store, options);
    timer.active = { ...handle };
    timer.status = handle.pausedAt === null ? 'running' : 'paused';
    return timer;
  }

  toHandle(): TimerHandle | null {
    return this.active ? { ...this.active } : null;
  }

  get state(): TimerStatus {
    return this.status;
  }

  /**
   * Create the session record and start counting down
   *
   * An unknown project name does not block the session: it is recorded
   * without a project and reported in `warnings`.
   */
  start(options: StartOptions): StartResult {
    if (this.status !== 'idle') {
      throw new AlreadyRunningError();
    }
    if (!Number.isInteger(options.durationMinutes) || options.durationMinutes <= 0) {
      throw new ValidationError(`Duration must be a positive number of minutes (got ${options.durationMinutes})`);
    }

    const warnings: string[] = [];
    let projectId: number | null = null;
    if (options.projectName) {
      projectId = this.store.findProjectIdByName(options.projectName);
      if (projectId === null) {
        warnings.push(`Project '${options.projectName}' not found. Session will be created without project link.`);
      }
    }

    const now = this.clock.now();
    const subject = options.subject ?? null;
    const sessionId = this.store.createSession({
      sessionType: options.kind,
      subject,
      projectId,
      startTime: new Date(now).toISOString(),
    });

    this.active = {
      sessionId,
      kind: options.kind,
      subject,
      projectId,
      startedAt: now,
      totalSeconds: options.durationMinutes * 60,
      pausedMs: 0,
      pausedAt: null,
    };
    this.transition('running');
    return { sessionId, projectId, warnings };
  }

  pause(): void {
    if (this.status !== 'running' || !this.active) {
      throw new NotRunningError('pause');
    }
    this.active.pausedAt = this.clock.now();
    this.transition('paused');
  }

  resume(): void {
    if (this.status !== 'paused' || !this.active || this.active.pausedAt === null) {
      throw new NotPausedError();
    }
    this.active.pausedMs += this.clock.now() - this.active.pausedAt;
    this.active.pausedAt = null;
    this.transition('running');
  }

  /**
   * Pause on Ctrl+C; any state other than running is left alone
   */
  interrupt(): TimerStatus {
    if (this.status === 'running') {
      this.pause();
    }
    return this.status;
  }

  /**
   * Current countdown values. Calling it has no side effects.
   *
   * @example
   * // 25-minute session, 10 minutes in, paused for 2 of them
   * timer.tick() // => { elapsedSeconds: 480, remainingSeconds: 1020, progressPercent: 32, ... }
   */
  tick(): TimerSnapshot {
    if (!this.active) {
      return {
        status: this.status,
        sessionId: null,
        kind: null,
        subject: null,
        elapsedSeconds: 0,
        remainingSeconds: 0,
        totalSeconds: 0,
        progressPercent: 0,
      };
    }

    const { sessionId, kind, subject, totalSeconds } = this.active;
    const elapsedSeconds = this.elapsedSeconds();
    const remainingSeconds = Math.max(0, totalSeconds - elapsedSeconds);
    return {
      status: this.status,
      sessionId,
      kind,
      subject,
      elapsedSeconds,
      remainingSeconds,
      totalSeconds,
      progressPercent: Math.min(100, (elapsedSeconds / totalSeconds) * 100),
    };
  }

  isExpired(): boolean {
    return this.status === 'running' && this.tick().remainingSeconds === 0;
  }

  /**
   * Finish a session whose time ran out, then check for milestones
   */
  complete(rating: number): FinishResult {
    if (!this.active) {
      throw new NotRunningError('complete');
    }
    if (!this.isExpired()) {
      throw new StateConflictError('Session still has time remaining. Use stop to end it early.');
    }
    // Capped at the planned length rather than raw elapsed: time past expiry
    // (waiting for the rating, a late `session stop`) is not study time
    const duration = Math.min(this.elapsedSeconds(), this.active.totalSeconds);
    const result = this.finish('completed', validateRating(rating), null, duration);

    const today = format(this.clock.now(), 'yyyy-MM-dd');
    result.achievements = evaluateAchievements({
      streakDays: this.store.currentStreak(today),
      completedSessions: this.store.countCompleted(),
    });
    return result;
  }

  /**
   * End the session early, from running or paused
   */
  stop(rating = 3, notes?: string): FinishResult {
    if (!this.active) {
      throw new NotRunningError('stop');
    }
    return this.finish('stopped', validateRating(rating), notes ?? null, this.elapsedSeconds());
  }

  private elapsedSeconds(): number {
    if (!this.active) return 0;
    const { startedAt, pausedMs, pausedAt } = this.active;
    const until = pausedAt ?? this.clock.now();
    return Math.max(0, Math.floor((until - startedAt - pausedMs) / 1000));
  }

  private finish(terminal: 'completed' | 'stopped', rating: number, notes: string | null, durationSeconds: number): FinishResult {
    if (!this.active) {
      throw new NotRunningError();
    }
    const { sessionId, kind, subject } = this.active;

    this.store.finalizeSession(sessionId, {
      endTime: new Date(this.clock.now()).toISOString(),
      duration: durationSeconds,
      rating,
      notes,
    });

    this.active = null;
    this.transition(terminal);
    this.transition('idle');
    return { sessionId, kind, subject, durationSeconds, rating, achievements: [] };
  }

  private transition(to: TimerStatus): void {
    const from = this.status;
    this.status = to;
    this.onTransition?.(from, to);
  }
}
