import { describe, expect, it } from 'vitest';
import {
  analyzeBookmarks,
  analyzeCourses,
  analyzeFlashcards,
  analyzeProjects,
  analyzeSessions,
  buildProductivityReport,
  productivityLevel,
  productivityScore,
  type SessionWithProject,
} from './analytics.js';
import type { Bookmark, Course, Flashcard, Project } from '../types/index.js';

const NOW = new Date(2024, 2, 9, 12, 0, 0);
const WINDOW_START = new Date(2024, 1, 8);

function session(overrides: Partial<SessionWithProject>): SessionWithProject {
  return {
    id: 1,
    sessionType: 'study',
    projectId: null,
    projectName: null,
    subject: null,
    startTime: '2024-03-09T09:00:00.000Z',
    endTime: '2024-03-09T09:25:00.000Z',
    duration: 1500,
    notes: null,
    productivityRating: null,
    createdAt: '2024-03-09T09:00:00.000Z',
    ...overrides,
  };
}

function project(overrides: Partial<Project>): Project {
  return {
    id: 1,
    name: 'p',
    description: null,
    projectType: 'academic',
    language: null,
    path: null,
    gitRepo: null,
    deadline: null,
    status: 'active',
    priority: 3,
    createdAt: '2024-03-01T00:00:00.000Z',
    updatedAt: '2024-03-01T00:00:00.000Z',
    ...overrides,
  };
}

function card(overrides: Partial<Flashcard>): Flashcard {
  return {
    id: 1,
    question: 'q',
    answer: 'a',
    subject: 'Math',
    difficulty: 3,
    lastReviewed: null,
    nextReview: '2024-03-10',
    reviewCount: 0,
    correctStreak: 0,
    tags: [],
    createdAt: '2024-03-01T00:00:00.000Z',
    ...overrides,
  };
}

function bookmark(overrides: Partial<Bookmark>): Bookmark {
  return {
    id: 1,
    title: 't',
    url: 'https://example.com',
    description: null,
    category: 'General',
    tags: [],
    isRead: false,
    rating: null,
    createdAt: '2024-03-01T00:00:00.000Z',
    accessedAt: null,
    ...overrides,
  };
}

function course(overrides: Partial<Course>): Course {
  return {
    id: 1,
    title: 'c',
    platform: null,
    instructor: null,
    url: null,
    totalLessons: 10,
    completedLessons: 0,
    progressPercentage: 0,
    status: 'enrolled',
    startDate: null,
    targetCompletionDate: null,
    createdAt: '2024-03-01T00:00:00.000Z',
    updatedAt: '2024-03-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('productivityLevel', () => {
  it('maps exact boundaries', () => {
    expect(productivityLevel(5)).toBe('Exceptional');
    expect(productivityLevel(4.5)).toBe('Exceptional');
    expect(productivityLevel(4.49)).toBe('Excellent');
    expect(productivityLevel(3.5)).toBe('Excellent');
    expect(productivityLevel(2.5)).toBe('Good');
    expect(productivityLevel(2.49)).toBe('Fair');
    expect(productivityLevel(1.5)).toBe('Fair');
    expect(productivityLevel(1.49)).toBe('Needs Improvement');
    expect(productivityLevel(0)).toBe('Needs Improvement');
  });
});

describe('productivityScore', () => {
  it('scores one of two projects completed and nothing else', () => {
    const score = productivityScore({ totalHours: 0, windowDays: 30, masteryRate: 0, active: 1, completed: 1, averageRating: 0 });

    expect(score.factors).toEqual({ studyTime: 0, flashcardMastery: 0, projectCompletion: 2.5, sessionRating: 0 });
    expect(score.overall).toBe(0.62);
    expect(score.level).toBe('Needs Improvement');
  });

  it('caps the study-time factor at 3 hours per day', () => {
    const score = productivityScore({ totalHours: 300, windowDays: 30, masteryRate: 100, active: 0, completed: 2, averageRating: 5 });

    expect(score.factors.studyTime).toBe(5);
    expect(score.overall).toBe(5);
    expect(score.level).toBe('Exceptional');
  });

  it('stays within 0..5 for extreme inputs', () => {
    const inputs = [
      { totalHours: 0, windowDays: 0, masteryRate: 0, active: 0, completed: 0, averageRating: 0 },
      { totalHours: 1e9, windowDays: 1, masteryRate: 100, active: 0, completed: 1e6, averageRating: 5 },
      { totalHours: 45, windowDays: 30, masteryRate: 50, active: 3, completed: 1, averageRating: 3.5 },
    ];
    for (const input of inputs) {
      const { overall } = productivityScore(input);
      expect(overall).toBeGreaterThanOrEqual(0);
      expect(overall).toBeLessThanOrEqual(5);
    }
  });

  it('averages the four factors', () => {
    // 1.5 h/day -> 2.5; 50% mastery -> 2.5; 1 of 4 completed -> 1.25; rating 3.5
    const score = productivityScore({ totalHours: 45, windowDays: 30, masteryRate: 50, active: 3, completed: 1, averageRating: 3.5 });
    expect(score.overall).toBe(2.44);
    expect(score.level).toBe('Fair');
  });
});

describe('analyzeSessions', () => {
  it('returns zeros without sessions', () => {
    expect(analyzeSessions([])).toEqual({
      totalSessions: 0,
      totalHours: 0,
      averageMinutes: 0,
      averageRating: 0,
      bySubject: {},
      byProject: {},
      byDay: {},
      byType: {},
    });
  });

  it('groups by subject, project, day and type', () => {
    const stats = analyzeSessions([
      session({ id: 1, subject: 'Math', duration: 1800, productivityRating: 4 }),
      session({ id: 2, subject: 'Math', duration: 1800, productivityRating: null, startTime: '2024-03-08T10:00:00.000Z' }),
      session({ id: 3, sessionType: 'project', projectId: 2, projectName: 'Thesis', duration: 3600, productivityRating: 5 }),
      session({ id: 4, sessionType: 'project', projectId: 9, projectName: null, duration: 600 }),
    ]);

    expect(stats.totalSessions).toBe(4);
    expect(stats.totalHours).toBe(2.17);
    expect(stats.averageMinutes).toBe(32.5);
    expect(stats.averageRating).toBe(4.5);
    expect(stats.bySubject).toEqual({ Math: { sessions: 2, durationSeconds: 3600, durationHours: 1 } });
    expect(Object.keys(stats.byProject)).toEqual(['Thesis', 'Project 9']);
    expect(stats.byDay['2024-03-08']).toEqual({ sessions: 1, durationSeconds: 1800, durationHours: 0.5 });
    expect(stats.byType.project.sessions).toBe(2);
  });
});

describe('analyzeProjects', () => {
  it('counts statuses, deadlines and overdue projects', () => {
    const stats = analyzeProjects(
      [
        project({ id: 1, status: 'active', deadline: '2024-03-01', language: 'python' }),
        project({ id: 2, status: 'completed', deadline: '2024-03-01' }),
        project({ id: 3, status: 'paused', deadline: '2024-04-01', language: 'python' }),
        project({ id: 4, status: 'active', projectType: 'work' }),
      ],
      '2024-03-09',
    );

    expect(stats).toMatchObject({ total: 4, active: 2, completed: 1, withDeadlines: 3, overdue: 1 });
    expect(stats.byType).toEqual({ academic: 3, work: 1 });
    expect(stats.byLanguage).toEqual({ python: 2 });
    expect(stats.recent.map((p) => p.id)).toEqual([1, 2, 3, 4]);
  });
});

describe('study material analytics', () => {
  it('computes mastery as the share of cards with streak >= 3', () => {
    const stats = analyzeFlashcards([
      card({ id: 1, correctStreak: 3, reviewCount: 3 }),
      card({ id: 2, correctStreak: 1, reviewCount: 4 }),
      card({ id: 3, subject: 'Biology', correctStreak: 0, reviewCount: 1 }),
    ]);

    expect(stats).toMatchObject({ total: 3, totalReviews: 8, averageStreak: 1.33, masteryRate: 33.33 });
    expect(stats.bySubject.Math).toEqual({ cards: 2, reviews: 7, averageStreak: 2, masteryRate: 50 });
  });

  it('summarizes bookmarks by category', () => {
    const stats = analyzeBookmarks([
      bookmark({ id: 1, isRead: true, rating: 4, category: 'Docs' }),
      bookmark({ id: 2, category: 'Docs' }),
      bookmark({ id: 3, rating: 5 }),
      bookmark({ id: 4 }),
    ]);

    expect(stats).toMatchObject({ total: 4, read: 1, readRate: 25, averageRating: 4.5 });
    expect(stats.byCategory).toEqual({ Docs: { total: 2, read: 1 }, General: { total: 2, read: 0 } });
  });

  it('groups courses without a platform under Unknown', () => {
    const stats = analyzeCourses([
      course({ id: 1, status: 'completed', progressPercentage: 100, platform: 'Coursera' }),
      course({ id: 2, status: 'in_progress', progressPercentage: 40 }),
      course({ id: 3 }),
    ]);

    expect(stats).toMatchObject({ total: 3, inProgress: 1, completed: 1, averageProgress: 46.67 });
    expect(stats.byPlatform.Unknown).toEqual({ total: 2, completed: 0, inProgress: 1 });
  });
});

describe('buildProductivityReport', () => {
  it('scores two projects with no other activity', () => {
    const report = buildProductivityReport(
      {
        sessions: [],
        projects: [project({ id: 1, status: 'active' }), project({ id: 2, status: 'completed' })],
        flashcards: [],
        bookmarks: [],
        courses: [],
      },
      30,
      WINDOW_START,
      NOW,
    );

    expect(report.period).toEqual({ days: 30, start: '2024-02-08', end: '2024-03-09' });
    expect(report.score.overall).toBe(0.62);
    expect(report.score.level).toBe('Needs Improvement');
  });

  it('relates study hours to mastery for shared subjects', () => {
    const report = buildProductivityReport(
      {
        sessions: [
          session({ id: 1, subject: 'Math', duration: 7200 }),
          session({ id: 2, subject: 'History', duration: 3600 }),
          session({ id: 3, subject: 'Art', duration: 0 }),
          session({ id: 4, sessionType: 'project', projectId: 5, projectName: 'Thesis', duration: 1800 }),
        ],
        projects: [],
        flashcards: [
          card({ id: 1, subject: 'Math', correctStreak: 4 }),
          card({ id: 2, subject: 'Math', correctStreak: 0 }),
          card({ id: 3, subject: 'Art', correctStreak: 5 }),
        ],
        bookmarks: [],
        courses: [],
      },
      30,
      WINDOW_START,
      NOW,
    );

    expect(report.subjectEffectiveness).toEqual({
      Math: { studyHours: 2, masteryRate: 50, reviews: 0, effectiveness: 25 },
      Art: { studyHours: 0, masteryRate: 100, reviews: 0, effectiveness: 0 },
    });
    expect(report.projectProductivity).toEqual({ Thesis: { hours: 0.5, sessions: 1 } });
  });
});
