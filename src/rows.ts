/**
 * Row decoding: snake_case SQLite rows -> camelCase entities.
 *
 * sql.js hands back loosely typed objects; every row goes through one of these
 * schemas so services never cast. A row that does not decode means the file
 * was edited or corrupted, which surfaces as a PersistenceError.
 */

import { z } from 'zod';
import type { Row } from './db.js';
import { PersistenceError } from './errors.js';
import {
  COURSE_STATUSES,
  PROJECT_STATUSES,
  PROJECT_TYPES,
  SESSION_TYPES,
  type Bookmark,
  type Course,
  type Flashcard,
  type Project,
  type Session,
} from './types/index.js';

const text = z.string();
const optionalText = z.string().nullable();
const optionalNumber = z.number().nullable();

/**
 * Decode a JSON tag column. Anything that is not an array of strings
 * reads as no tags.
 */
export function parseTags(raw: string | null): string[] {
  if (!raw) return [];
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return [];
  }
  const result = z.array(z.string()).safeParse(value);
  return result.success ? result.data : [];
}

const tags = optionalText.transform(parseTags);

export const sessionRowSchema = z
  .object({
    id: z.number(),
    session_type: z.enum(SESSION_TYPES),
    project_id: optionalNumber,
    subject: optionalText,
    start_time: text,
    end_time: optionalText,
    duration: optionalNumber,
    notes: optionalText,
    productivity_rating: optionalNumber,
    created_at: text,
  })
  .transform((row): Session => ({
    id: row.id,
    sessionType: row.session_type,
    projectId: row.project_id,
    subject: row.subject,
    startTime: row.start_time,
    endTime: row.end_time,
    duration: row.duration,
    notes: row.notes,
    productivityRating: row.productivity_rating,
    createdAt: row.created_at,
  }));

export const projectRowSchema = z
  .object({
    id: z.number(),
    name: text,
    description: optionalText,
    project_type: z.enum(PROJECT_TYPES),
    language: optionalText,
    path: optionalText,
    git_repo: optionalText,
    deadline: optionalText,
    status: z.enum(PROJECT_STATUSES),
    priority: z.number(),
    created_at: text,
    updated_at: text,
  })
  .transform((row): Project => ({
    id: row.id,
    name: row.name,
    description: row.description,
    projectType: row.project_type,
    language: row.language,
    path: row.path,
    gitRepo: row.git_repo,
    deadline: row.deadline,
    status: row.status,
    priority: row.priority,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }));

export const flashcardRowSchema = z
  .object({
    id: z.number(),
    question: text,
    answer: text,
    subject: text,
    difficulty: z.number(),
    last_reviewed: optionalText,
    next_review: text,
    review_count: z.number(),
    correct_streak: z.number(),
    tags,
    created_at: text,
  })
  .transform((row): Flashcard => ({
    id: row.id,
    question: row.question,
    answer: row.answer,
    subject: row.subject,
    difficulty: row.difficulty,
    lastReviewed: row.last_reviewed,
    nextReview: row.next_review,
    reviewCount: row.review_count,
    correctStreak: row.correct_streak,
    tags: row.tags,
    createdAt: row.created_at,
  }));

export const bookmarkRowSchema = z
  .object({
    id: z.number(),
    title: text,
    url: text,
    description: optionalText,
    category: text,
    tags,
    is_read: z.number().transform((value) => value !== 0),
    rating: optionalNumber,
    created_at: text,
    accessed_at: optionalText,
  })
  .transform((row): Bookmark => ({
    id: row.id,
    title: row.title,
    url: row.url,
    description: row.description,
    category: row.category,
    tags: row.tags,
    isRead: row.is_read,
    rating: row.rating,
    createdAt: row.created_at,
    accessedAt: row.accessed_at,
  }));

export const courseRowSchema = z
  .object({
    id: z.number(),
    title: text,
    platform: optionalText,
    instructor: optionalText,
    url: optionalText,
    total_lessons: optionalNumber,
    completed_lessons: z.number(),
    progress_percentage: z.number(),
    status: z.enum(COURSE_STATUSES),
    start_date: optionalText,
    target_completion_date: optionalText,
    created_at: text,
    updated_at: text,
  })
  .transform((row): Course => ({
    id: row.id,
    title: row.title,
    platform: row.platform,
    instructor: row.instructor,
    url: row.url,
    totalLessons: row.total_lessons,
    completedLessons: row.completed_lessons,
    progressPercentage: row.progress_percentage,
    status: row.status,
    startDate: row.start_date,
    targetCompletionDate: row.target_completion_date,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }));

export function decodeRow<S extends z.ZodTypeAny>(schema: S, row: Row, entity: string): z.output<S> {
  const result = schema.safeParse(row);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown field';
    throw new PersistenceError(`Corrupt ${entity} row (${where})`, result.error);
  }
  return result.data;
}

export function decodeRows<S extends z.ZodTypeAny>(schema: S, rows: Row[], entity: string): z.output<S>[] {
  return rows.map((row) => decodeRow(schema, row, entity));
}
