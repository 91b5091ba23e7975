import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { openDatabase, type DbWrapper } from '../db.js';
import { NotFoundError, ValidationError } from '../errors.js';
import type { Clock } from '../lib/timer.js';
import { BookmarkService } from './bookmarks.js';
import { CourseService } from './courses.js';
import { FlashcardService } from './flashcards.js';
import { ProjectService } from './projects.js';
import { ReportService } from './reports.js';
import { SessionService } from './sessions.js';
import { TemplateStore } from './templates.js';

const clock: Clock = { now: () => Date.UTC(2024, 2, 9, 12, 0, 0) };

describe('ReportService', () => {
  let db: DbWrapper;
  let workdir: string;
  let sessions: SessionService;
  let projects: ProjectService;
  let flashcards: FlashcardService;
  let reports: ReportService;

  const record = (startTime: string, seconds: number, extra: { subject?: string; projectId?: number; rating?: number } = {}) => {
    const id = sessions.createSession({
      sessionType: 'study',
      subject: extra.subject ?? null,
      projectId: extra.projectId ?? null,
      startTime,
    });
    const end = new Date(Date.parse(startTime) + seconds * 1000).toISOString();
    sessions.finalizeSession(id, { endTime: end, duration: seconds, rating: extra.rating ?? 3, notes: null });
    return id;
  };

  beforeEach(async () => {
    db = await openDatabase({ path: null });
    workdir = mkdtempSync(join(tmpdir(), 'studytrack-reports-'));
    sessions = new SessionService(db, clock);
    projects = new ProjectService(db, {
      templates: new TemplateStore(join(workdir, 'templates')),
      author: '',
      gitInit: false,
      clock,
      cwd: workdir,
    });
    flashcards = new FlashcardService(db, clock);
    reports = new ReportService(db, { sessions, projects, flashcards }, clock);
  });

  afterEach(() => {
    db.close();
    rmSync(workdir, { recursive: true, force: true });
  });

  it('reports only records inside the window', async () => {
    const { project } = await projects.createProject({ name: 'thesis' });
    db.prepare(`
      INSERT INTO projects (name, project_type, status, priority, created_at, updated_at)
      VALUES ('old', 'work', 'completed', 3, '2023-01-01T00:00:00.000Z', '2023-01-02T00:00:00.000Z')
    `).run();

    record('2024-03-08T10:00:00.000Z', 3600, { subject: 'math', projectId: project.id, rating: 4 });
    record('2024-02-07T23:00:00.000Z', 7200, { subject: 'math' });
    sessions.createSession({ sessionType: 'study', subject: 'math', projectId: null, startTime: '2024-03-09T11:00:00.000Z' });

    const report = reports.buildReport(30);

    expect(report.period).toEqual({ days: 30, start: '2024-02-08', end: '2024-03-09' });
    expect(report.sessions.totalSessions).toBe(1);
    expect(report.sessions.totalHours).toBe(1);
    expect(report.sessions.averageRating).toBe(4);
    expect(report.projects.total).toBe(1);
    expect(report.projects.recent.map((p) => p.name)).toEqual(['thesis']);
    expect(report.projectProductivity).toEqual({ thesis: { hours: 1, sessions: 1 } });
  });

  it('rejects a non-positive window', () => {
    expect(() => reports.buildReport(0)).toThrow(ValidationError);
  });

  it('tracks one subject across sessions and cards', () => {
    record('2024-03-07T10:00:00.000Z', 1800, { subject: 'bio', rating: 2 });
    record('2024-03-08T10:00:00.000Z', 5400, { subject: 'bio', rating: 5 });
    record('2024-03-08T12:00:00.000Z', 600, { subject: 'math' });
    flashcards.addFlashcard({ question: 'q', answer: 'a', subject: 'bio' });

    expect(reports.subjectTimeTracking('bio')).toEqual({
      subject: 'bio',
      totalSessions: 2,
      totalHours: 2,
      averageMinutes: 60,
      averageRating: 3.5,
      byDay: { '2024-03-07': 0.5, '2024-03-08': 1.5 },
      flashcards: { totalCards: 1, dueForReview: 0, averageStreak: 0, masteryRate: 0 },
    });
  });

  it('sums linked sessions per project', async () => {
    const { project } = await projects.createProject({ name: 'app' });
    record('2024-03-01T10:00:00.000Z', 1800, { projectId: project.id, rating: 4 });
    record('2024-03-05T10:00:00.000Z', 1800, { projectId: project.id, rating: 2 });
    record('2024-03-06T10:00:00.000Z', 1800);

    expect(reports.projectSessionStats(project.id)).toEqual({
      projectId: project.id,
      projectName: 'app',
      totalSessions: 2,
      totalHours: 1,
      averageRating: 3,
      lastSession: '2024-03-05T10:00:00.000Z',
    });
    expect(() => reports.projectSessionStats(404)).toThrow(NotFoundError);
  });

  it('summarizes what is waiting for review', () => {
    const bookmarks = new BookmarkService(db, clock);
    const courses = new CourseService(db, clock);
    const card = flashcards.addFlashcard({ question: 'q', answer: 'a', subject: 'bio' });
    db.prepare('UPDATE flashcards SET next_review = ? WHERE id = ?').run('2024-03-09', card.id);
    bookmarks.addBookmark({ title: 'a', url: 'https://example.com/a' });
    const read = bookmarks.addBookmark({ title: 'b', url: 'https://example.com/b' });
    bookmarks.accessBookmark(read.id);
    const course = courses.addCourse({ title: 'c', totalLessons: 10 });
    courses.updateProgress(course.id, 3);

    expect(reports.reviewSummary()).toEqual({ dueFlashcards: 1, unreadBookmarks: 1, inProgressCourses: 1 });
  });

  it('builds the dashboard from the last week', async () => {
    await projects.createProject({ name: 'due', deadline: '2024-03-11' });
    record('2024-03-08T10:00:00.000Z', 600);
    record('2024-03-09T08:00:00.000Z', 600);

    const dashboard = reports.buildDashboard();
    expect(dashboard.report.period.days).toBe(7);
    expect(dashboard.streakDays).toBe(2);
    expect(dashboard.deadlines.map((d) => [d.name, d.urgency])).toEqual([['due', 'soon']]);
    expect(dashboard.recentSessions.map((s) => s.startTime)).toEqual(['2024-03-09T08:00:00.000Z', '2024-03-08T10:00:00.000Z']);
    expect(dashboard.dueCards).toEqual([]);
  });
});
