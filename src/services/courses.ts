/**
 * Course progress. progress_percentage and status are derived from the
 * lesson counts and written together with completed_lessons.
 */

import { z } from 'zod';
import { numberColumn, type DbWrapper } from '../db.js';
import { NotFoundError, ValidationError, validate } from '../errors.js';
import { round } from '../lib/format.js';
import { systemClock, type Clock } from '../lib/timer.js';
import { courseRowSchema, decodeRow, decodeRows } from '../rows.js';
import { COURSE_STATUSES, type Course, type CourseStatus } from '../types/index.js';
import { urlString } from './bookmarks.js';
import { dateString } from './projects.js';

const addCourseSchema = z.object({
  title: z.string().trim().min(1, 'Title is required'),
  platform: z.string().trim().min(1).optional(),
  instructor: z.string().trim().min(1).optional(),
  url: urlString.optional(),
  totalLessons: z.number().int().positive('Total lessons must be positive').optional(),
  startDate: dateString.optional(),
  targetCompletionDate: dateString.optional(),
});

export type AddCourseInput = z.input<typeof addCourseSchema>;

export interface CourseStats {
  totalCourses: number;
  completed: number;
  inProgress: number;
  averageProgress: number;
}

/**
 * Progress and status from lesson counts
 *
 * @example
 * deriveProgress(0, 10)  // => { progressPercentage: 0, status: "enrolled" }
 * deriveProgress(4, 10)  // => { progressPercentage: 40, status: "in_progress" }
 * deriveProgress(12, 10) // => { progressPercentage: 100, status: "completed" }
 * deriveProgress(3, null) // => { progressPercentage: 0, status: "enrolled" }
 */
export function deriveProgress(
  completedLessons: number,
  totalLessons: number | null,
): { progressPercentage: number; status: CourseStatus } {
  const progressPercentage = totalLessons && totalLessons > 0 ? Math.min(100, (completedLessons / totalLessons) * 100) : 0;
  const status: CourseStatus = progressPercentage >= 100 ? 'completed' : progressPercentage > 0 ? 'in_progress' : 'enrolled';
  return { progressPercentage, status };
}

export class CourseService {
  private readonly db: DbWrapper;
  private readonly clock: Clock;

  constructor(db: DbWrapper, clock: Clock = systemClock) {
    this.db = db;
    this.clock = clock;
  }

  addCourse(input: AddCourseInput): Course {
    const data = validate(addCourseSchema, input, 'Invalid course');
    const timestamp = new Date(this.clock.now()).toISOString();

    const { lastInsertRowid } = this.db.prepare(`
      INSERT INTO courses (
        title, platform, instructor, url, total_lessons,
        start_date, target_completion_date, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      data.title,
      data.platform ?? null,
      data.instructor ?? null,
      data.url ?? null,
      data.totalLessons ?? null,
      data.startDate ?? null,
      data.targetCompletionDate ?? null,
      timestamp,
      timestamp,
    );
    return this.getCourse(lastInsertRowid);
  }

  getCourse(id: number): Course {
    const row = this.db.prepare('SELECT * FROM courses WHERE id = ?').get(id);
    if (!row) {
      throw new NotFoundError('Course', id);
    }
    return decodeRow(courseRowSchema, row, 'course');
  }

  updateProgress(id: number, completedLessons: number): Course {
    if (!Number.isInteger(completedLessons) || completedLessons < 0) {
      throw new ValidationError(`Completed lessons must be a whole number >= 0 (got ${completedLessons})`);
    }
    const course = this.getCourse(id);
    const { progressPercentage, status } = deriveProgress(completedLessons, course.totalLessons);

    this.db.prepare(`
      UPDATE courses
      SET completed_lessons = ?, progress_percentage = ?, status = ?, updated_at = ?
      WHERE id = ?
    `).run(completedLessons, progressPercentage, status, new Date(this.clock.now()).toISOString(), id);

    return this.getCourse(id);
  }

  listCourses(status?: string): Course[] {
    if (status && status !== 'all') {
      const valid = validate(z.enum(COURSE_STATUSES), status, 'Invalid course status');
      return decodeRows(
        courseRowSchema,
        this.db.prepare('SELECT * FROM courses WHERE status = ? ORDER BY updated_at DESC, id DESC').all(valid),
        'course',
      );
    }
    return decodeRows(courseRowSchema, this.db.prepare('SELECT * FROM courses ORDER BY updated_at DESC, id DESC').all(), 'course');
  }

  getStats(): CourseStats {
    const row = this.db.prepare(`
      SELECT
        COUNT(*) AS total,
        COALESCE(SUM(CASE WHEN status = 'completed' THEN 1 ELSE 0 END), 0) AS completed,
        COALESCE(SUM(CASE WHEN status = 'in_progress' THEN 1 ELSE 0 END), 0) AS in_progress,
        COALESCE(AVG(progress_percentage), 0) AS avg_progress
      FROM courses
    `).get();

    return {
      totalCourses: numberColumn(row, 'total') ?? 0,
      completed: numberColumn(row, 'completed') ?? 0,
      inProgress: numberColumn(row, 'in_progress') ?? 0,
      averageProgress: round(numberColumn(row, 'avg_progress') ?? 0, 1),
    };
  }
}
