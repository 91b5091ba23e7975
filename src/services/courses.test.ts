import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { openDatabase, type DbWrapper } from '../db.js';
import { NotFoundError, ValidationError } from '../errors.js';
import type { Clock } from '../lib/timer.js';
import { CourseService, deriveProgress } from './courses.js';

describe('deriveProgress', () => {
  it('derives status from lesson counts', () => {
    expect(deriveProgress(0, 10)).toEqual({ progressPercentage: 0, status: 'enrolled' });
    expect(deriveProgress(4, 10)).toEqual({ progressPercentage: 40, status: 'in_progress' });
    expect(deriveProgress(10, 10)).toEqual({ progressPercentage: 100, status: 'completed' });
    expect(deriveProgress(12, 10)).toEqual({ progressPercentage: 100, status: 'completed' });
    expect(deriveProgress(3, null)).toEqual({ progressPercentage: 0, status: 'enrolled' });
  });
});

describe('CourseService', () => {
  let db: DbWrapper;
  let courses: CourseService;
  const clock: Clock = { now: () => Date.UTC(2024, 2, 9, 10, 0, 0) };

  beforeEach(async () => {
    db = await openDatabase({ path: null });
    courses = new CourseService(db, clock);
  });

  afterEach(() => {
    db.close();
  });

  it('adds an enrolled course', () => {
    const course = courses.addCourse({ title: 'Algorithms', platform: 'Coursera', totalLessons: 20 });

    expect(course).toMatchObject({
      title: 'Algorithms',
      platform: 'Coursera',
      totalLessons: 20,
      completedLessons: 0,
      progressPercentage: 0,
      status: 'enrolled',
    });
    expect(() => courses.addCourse({ title: 'x', startDate: '2024-13-01' })).toThrow(ValidationError);
  });

  it('writes progress and status together', () => {
    const course = courses.addCourse({ title: 'Algorithms', totalLessons: 8 });

    expect(courses.updateProgress(course.id, 2)).toMatchObject({ completedLessons: 2, progressPercentage: 25, status: 'in_progress' });
    expect(courses.updateProgress(course.id, 9)).toMatchObject({ completedLessons: 9, progressPercentage: 100, status: 'completed' });
    expect(() => courses.updateProgress(course.id, -1)).toThrow(ValidationError);
    expect(() => courses.updateProgress(99, 1)).toThrow(NotFoundError);
  });

  it('lists by status and summarizes', () => {
    const a = courses.addCourse({ title: 'A', totalLessons: 4 });
    const b = courses.addCourse({ title: 'B', totalLessons: 4 });
    courses.addCourse({ title: 'C' });
    courses.updateProgress(a.id, 1);
    courses.updateProgress(b.id, 4);

    expect(courses.listCourses('in_progress').map((c) => c.title)).toEqual(['A']);
    expect(courses.listCourses('all')).toHaveLength(3);
    expect(() => courses.listCourses('finished')).toThrow(ValidationError);
    expect(courses.getStats()).toEqual({ totalCourses: 3, completed: 1, inProgress: 1, averageProgress: 41.7 });
  });
});
