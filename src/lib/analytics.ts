/**
 * ============================================================================
 * ANALYTICS - Productivity Report Aggregation
 * ============================================================================
 *
 * Pure functions over records already loaded for a trailing window
 * (ReportService does the loading). Nothing here touches the database.
 *
 * REPORT SECTIONS:
 * - sessions: totals, mean duration and rating, breakdowns by subject,
 *   project, calendar day and session type
 * - projects: status counts, deadlines, overdue, breakdowns, recent five
 * - study: flashcard mastery, bookmark reading, course progress
 * - score: four factors on a 0-5 scale, averaged into one level
 * - cross-module: study hours vs. flashcard mastery per subject,
 *   time spent per project
 *
 * SCORE FACTORS (each 0-5, equal weight):
 * 1. Study time:         min(5, hoursPerDay * 5/3)  (3 h/day = full marks)
 * 2. Flashcard mastery:  masteryRate / 20           (100% = full marks)
 * 3. Project completion: completed / (active + completed) * 5, or 0
 * 4. Session rating:     mean rating as-is
 */

import { format, parseISO } from 'date-fns';
import type { Bookmark, Course, Flashcard, Project, Session } from '../types/index.js';
import { round, toHours } from './format.js';

export type SessionWithProject = Session & { projectName: string | null };

export interface ReportRecords {
  sessions: SessionWithProject[]; // Finished sessions only
  projects: Project[]; // Most recently updated first
  flashcards: Flashcard[];
  bookmarks: Bookmark[];
  courses: Course[];
}

export interface Breakdown {
  sessions: number;
  durationSeconds: number;
  durationHours: number;
}

export interface SessionAnalytics {
  totalSessions: number;
  totalHours: number;
  averageMinutes: number;
  averageRating: number; // 0 when no session was rated
  bySubject: Record<string, Breakdown>;
  byProject: Record<string, Breakdown>;
  byDay: Record<string, Breakdown>;
  byType: Record<string, Breakdown>;
}

export interface ProjectAnalytics {
  total: number;
  active: number;
  completed: number;
  withDeadlines: number;
  overdue: number;
  byType: Record<string, number>;
  byLanguage: Record<string, number>;
  byStatus: Record<string, number>;
  recent: Array<Pick<Project, 'id' | 'name' | 'projectType' | 'status' | 'updatedAt'>>;
}

export interface FlashcardAnalytics {
  total: number;
  totalReviews: number;
  averageStreak: number;
  masteryRate: number; // % of cards with streak >= 3
  bySubject: Record<string, { cards: number; reviews: number; averageStreak: number; masteryRate: number }>;
}

export interface BookmarkAnalytics {
  total: number;
  read: number;
  readRate: number; // %
  averageRating: number;
  byCategory: Record<string, { total: number; read: number }>;
}

export interface CourseAnalytics {
  total: number;
  inProgress: number;
  completed: number;
  averageProgress: number;
  byPlatform: Record<string, { total: number; completed: number; inProgress: number }>;
}

export type ProductivityLevel = 'Exceptional' | 'Excellent' | 'Good' | 'Fair' | 'Needs Improvement';

export interface ScoreFactors {
  studyTime: number;
  flashcardMastery: number;
  projectCompletion: number;
  sessionRating: number;
}

export interface ProductivityScore {
  overall: number; // 0-5, two decimals
  level: ProductivityLevel;
  factors: ScoreFactors;
}

export interface ProductivityReport {
  period: { days: number; start: string; end: string };
  sessions: SessionAnalytics;
  projects: ProjectAnalytics;
  study: { flashcards: FlashcardAnalytics; bookmarks: BookmarkAnalytics; courses: CourseAnalytics };
  score: ProductivityScore;
  subjectEffectiveness: Record<string, { studyHours: number; masteryRate: number; reviews: number; effectiveness: number }>;
  projectProductivity: Record<string, { hours: number; sessions: number }>;
}

const MASTERY_STREAK = 3;

function mean(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
}

function percent(part: number, whole: number): number {
  return whole === 0 ? 0 : round((part / whole) * 100);
}

function count(target: Record<string, number>, key: string): void {
  target[key] = (target[key] ?? 0) + 1;
}

function groupSessions(sessions: SessionWithProject[], keyOf: (s: SessionWithProject) => string | null): Record<string, Breakdown> {
  const groups: Record<string, Breakdown> = {};
  for (const session of sessions) {
    const key = keyOf(session);
    if (key === null) continue;
    const group = (groups[key] ??= { sessions: 0, durationSeconds: 0, durationHours: 0 });
    group.sessions += 1;
    group.durationSeconds += session.duration ?? 0;
  }
  for (const group of Object.values(groups)) {
    group.durationHours = toHours(group.durationSeconds);
  }
  return groups;
}

export function analyzeSessions(sessions: SessionWithProject[]): SessionAnalytics {
  const totalSeconds = sessions.reduce((sum, s) => sum + (s.duration ?? 0), 0);
  const ratings = sessions.flatMap((s) => (s.productivityRating === null ? [] : [s.productivityRating]));

  return {
    totalSessions: sessions.length,
    totalHours: toHours(totalSeconds),
    averageMinutes: sessions.length === 0 ? 0 : round(totalSeconds / sessions.length / 60),
    averageRating: round(mean(ratings)),
    bySubject: groupSessions(sessions, (s) => s.subject || null),
    byProject: groupSessions(sessions, (s) => (s.projectId === null ? null : s.projectName ?? `Project ${s.projectId}`)),
    byDay: groupSessions(sessions, (s) => format(parseISO(s.startTime), 'yyyy-MM-dd')),
    byType: groupSessions(sessions, (s) => s.sessionType),
  };
}

/**
 * @param projects Most recently updated first; the first five become `recent`
 * @param today YYYY-MM-DD, deadlines before it are overdue
 */
export function analyzeProjects(projects: Project[], today: string): ProjectAnalytics {
  const byType: Record<string, number> = {};
  const byLanguage: Record<string, number> = {};
  const byStatus: Record<string, number> = {};
  for (const project of projects) {
    count(byType, project.projectType);
    if (project.language) count(byLanguage, project.language);
    count(byStatus, project.status);
  }

  return {
    total: projects.length,
    active: projects.filter((p) => p.status === 'active').length,
    completed: projects.filter((p) => p.status === 'completed').length,
    withDeadlines: projects.filter((p) => p.deadline).length,
    overdue: projects.filter((p) => p.deadline !== null && p.deadline < today && p.status !== 'completed').length,
    byType,
    byLanguage,
    byStatus,
    recent: projects.slice(0, 5).map(({ id, name, projectType, status, updatedAt }) => ({
      id,
      name,
      projectType,
      status,
      updatedAt,
    })),
  };
}

export function analyzeFlashcards(cards: Flashcard[]): FlashcardAnalytics {
  const streaksBySubject: Record<string, { reviews: number; streaks: number[] }> = {};
  for (const card of cards) {
    const entry = (streaksBySubject[card.subject] ??= { reviews: 0, streaks: [] });
    entry.reviews += card.reviewCount;
    entry.streaks.push(card.correctStreak);
  }

  const bySubject: FlashcardAnalytics['bySubject'] = {};
  for (const [subject, { reviews, streaks }] of Object.entries(streaksBySubject)) {
    bySubject[subject] = {
      cards: streaks.length,
      reviews,
      averageStreak: round(mean(streaks)),
      masteryRate: percent(streaks.filter((s) => s >= MASTERY_STREAK).length, streaks.length),
    };
  }

  const streaks = cards.map((c) => c.correctStreak);
  return {
    total: cards.length,
    totalReviews: cards.reduce((sum, c) => sum + c.reviewCount, 0),
    averageStreak: round(mean(streaks)),
    masteryRate: percent(streaks.filter((s) => s >= MASTERY_STREAK).length, cards.length),
    bySubject,
  };
}

export function analyzeBookmarks(bookmarks: Bookmark[]): BookmarkAnalytics {
  const byCategory: BookmarkAnalytics['byCategory'] = {};
  for (const bookmark of bookmarks) {
    const entry = (byCategory[bookmark.category] ??= { total: 0, read: 0 });
    entry.total += 1;
    if (bookmark.isRead) entry.read += 1;
  }

  const read = bookmarks.filter((b) => b.isRead).length;
  const ratings = bookmarks.flatMap((b) => (b.rating === null ? [] : [b.rating]));
  return {
    total: bookmarks.length,
    read,
    readRate: percent(read, bookmarks.length),
    averageRating: round(mean(ratings)),
    byCategory,
  };
}

export function analyzeCourses(courses: Course[]): CourseAnalytics {
  const byPlatform: CourseAnalytics['byPlatform'] = {};
  for (const course of courses) {
    const entry = (byPlatform[course.platform || 'Unknown'] ??= { total: 0, completed: 0, inProgress: 0 });
    entry.total += 1;
    if (course.status === 'completed') entry.completed += 1;
    else if (course.status === 'in_progress') entry.inProgress += 1;
  }

  return {
    total: courses.length,
    inProgress: courses.filter((c) => c.status === 'in_progress').length,
    completed: courses.filter((c) => c.status === 'completed').length,
    averageProgress: round(mean(courses.map((c) => c.progressPercentage))),
    byPlatform,
  };
}

/**
 * Qualitative level for an overall score
 *
 * @example
 * productivityLevel(2.5)  // => "Good"
 * productivityLevel(2.49) // => "Fair"
 */
export function productivityLevel(score: number): ProductivityLevel {
  if (score >= 4.5) return 'Exceptional';
  if (score >= 3.5) return 'Excellent';
  if (score >= 2.5) return 'Good';
  if (score >= 1.5) return 'Fair';
  return 'Needs Improvement';
}

/**
 * Combine the four factors into one 0-5 score
 *
 * @example
 * // Nothing studied, one of two projects completed
 * productivityScore({ totalHours: 0, windowDays: 30, masteryRate: 0, active: 1, completed: 1, averageRating: 0 })
 * // => { overall: 0.62, level: "Needs Improvement", ... }  (mean 0.625, tie rounded to even)
 */
export function productivityScore(input: {
  totalHours: number;
  windowDays: number;
  masteryRate: number;
  active: number;
  completed: number;
  averageRating: number;
}): ProductivityScore {
  const hoursPerDay = input.windowDays > 0 ? input.totalHours / input.windowDays : 0;
  const finished = input.active + input.completed;

  const factors: ScoreFactors = {
    studyTime: Math.min(5, (hoursPerDay * 5) / 3),
    flashcardMastery: input.masteryRate / 20,
    projectCompletion: finished > 0 ? (input.completed / finished) * 5 : 0,
    sessionRating: input.averageRating,
  };

  const raw = mean(Object.values(factors));
  const overall = Math.min(5, Math.max(0, round(Number.isFinite(raw) ? raw : 0)));

  return {
    overall,
    level: productivityLevel(overall),
    factors: {
      studyTime: round(factors.studyTime),
      flashcardMastery: round(factors.flashcardMastery),
      projectCompletion: round(factors.projectCompletion),
      sessionRating: round(factors.sessionRating),
    },
  };
}

/**
 * Build the full report
 *
 * @param records Records already restricted to the window
 * @param windowDays Length of the window, used for hours per day
 * @param windowStart First instant of the window
 * @param now Reference instant; the window ends on its calendar day
 */
export function buildProductivityReport(records: ReportRecords, windowDays: number, windowStart: Date, now: Date): ProductivityReport {
  const today = format(now, 'yyyy-MM-dd');
  const sessions = analyzeSessions(records.sessions);
  const projects = analyzeProjects(records.projects, today);
  const flashcards = analyzeFlashcards(records.flashcards);

  const subjectEffectiveness: ProductivityReport['subjectEffectiveness'] = {};
  for (const [subject, time] of Object.entries(sessions.bySubject)) {
    const cards = flashcards.bySubject[subject];
    if (!cards) continue;
    subjectEffectiveness[subject] = {
      studyHours: time.durationHours,
      masteryRate: cards.masteryRate,
      reviews: cards.reviews,
      effectiveness: time.durationHours > 0 ? round(cards.masteryRate / time.durationHours) : 0,
    };
  }

  const projectProductivity: ProductivityReport['projectProductivity'] = {};
  for (const [name, time] of Object.entries(sessions.byProject)) {
    projectProductivity[name] = { hours: time.durationHours, sessions: time.sessions };
  }

  return {
    period: { days: windowDays, start: format(windowStart, 'yyyy-MM-dd'), end: today },
    sessions,
    projects,
    study: {
      flashcards,
      bookmarks: analyzeBookmarks(records.bookmarks),
      courses: analyzeCourses(records.courses),
    },
    score: productivityScore({
      totalHours: sessions.totalHours,
      windowDays,
      masteryRate: flashcards.masteryRate,
      active: projects.active,
      completed: projects.completed,
      averageRating: sessions.averageRating,
    }),
    subjectEffectiveness,
    projectProductivity,
  };
}
