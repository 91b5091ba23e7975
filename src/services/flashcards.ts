/**
 * ============================================================================
 * FLASHCARDS
 * ============================================================================
 *
 * Card storage plus the review engine behind `study review`.
 *
 * REVIEW:
 * 1. Due cards: next_review <= today (local date), oldest first
 * 2. Each answer updates review_count, correct_streak, last_reviewed and
 *    next_review in a single UPDATE
 * 3. The next interval comes from computeNextInterval() using the streak
 *    AFTER this answer
 *
 * Reading due cards never writes; asking twice on the same day gives the
 * same cards.
 */

import { z } from 'zod';
import Papa from 'papaparse';
import { addDays } from 'date-fns';
import { numberColumn, stringColumn, type DbWrapper, type SqlParam } from '../db.js';
import { NotFoundError, ValidationError, validate } from '../errors.js';
import { round } from '../lib/format.js';
import type { ReviewEngine, ReviewOutcome } from '../lib/review-loop.js';
import { computeNextInterval, nextReviewDate, toDateString } from '../lib/scheduler.js';
import { systemClock, type Clock } from '../lib/timer.js';
import { decodeRow, decodeRows, flashcardRowSchema } from '../rows.js';
import type { Flashcard } from '../types/index.js';

const addFlashcardSchema = z.object({
  question: z.string().trim().min(1, 'Question is required'),
  answer: z.string().trim().min(1, 'Answer is required'),
  subject: z.string().trim().min(1, 'Subject is required'),
  difficulty: z.number().int().min(1, 'Difficulty must be 1-5').max(5, 'Difficulty must be 1-5').default(3),
  tags: z.array(z.string().trim().min(1)).default([]),
});

export type AddFlashcardInput = z.input<typeof addFlashcardSchema>;

export interface FlashcardStats {
  totalCards: number;
  dueForReview: number;
  averageStreak: number;
  masteryRate: number; // averageStreak / 5 * 100
}

export interface ImportResult {
  imported: number;
  skipped: number;
}

export class FlashcardService implements ReviewEngine {
  private readonly db: DbWrapper;
  private readonly clock: Clock;

  constructor(db: DbWrapper, clock: Clock = systemClock) {
    this.db = db;
    this.clock = clock;
  }

  private today(): string {
    return toDateString(new Date(this.clock.now()));
  }

  /** New cards are first due tomorrow */
  addFlashcard(input: AddFlashcardInput): Flashcard {
    const data = validate(addFlashcardSchema, input, 'Invalid flashcard');
    const now = new Date(this.clock.now());

    const { lastInsertRowid } = this.db.prepare(`
      INSERT INTO flashcards (question, answer, subject, difficulty, next_review, tags, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `).run(
      data.question,
      data.answer,
      data.subject,
      data.difficulty,
      toDateString(addDays(now, 1)),
      JSON.stringify(data.tags),
      now.toISOString(),
    );
    return this.getFlashcard(lastInsertRowid);
  }

  getFlashcard(id: number): Flashcard {
    const row = this.db.prepare('SELECT * FROM flashcards WHERE id = ?').get(id);
    if (!row) {
      throw new NotFoundError('Flashcard', id);
    }
    return decodeRow(flashcardRowSchema, row, 'flashcard');
  }

  listFlashcards(subject?: string): Flashcard[] {
    const rows = subject
      ? this.db.prepare('SELECT * FROM flashcards WHERE subject = ? ORDER BY id').all(subject)
      : this.db.prepare('SELECT * FROM flashcards ORDER BY subject, id').all();
    return decodeRows(flashcardRowSchema, rows, 'flashcard');
  }

  getDueCards(subject?: string, limit = 10): Flashcard[] {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError(`Limit must be a positive whole number (got ${limit})`);
    }

    const params: SqlParam[] = [this.today()];
    let sql = 'SELECT * FROM flashcards WHERE next_review <= ?';
    if (subject) {
      sql += ' AND subject = ?';
      params.push(subject);
    }
    sql += ' ORDER BY next_review ASC, id ASC LIMIT ?';
    params.push(limit);

    return decodeRows(flashcardRowSchema, this.db.prepare(sql).all(...params), 'flashcard');
  }

  /**
   * Record one answer and schedule the next review
   *
   * @example
   * // difficulty 3, three correct answers in a row from a fresh card
   * reviewCard(id, true) // => { nextReviewDays: 1, newStreak: 1, ... }
   * reviewCard(id, true) // => { nextReviewDays: 3, newStreak: 2, ... }
   * reviewCard(id, true) // => { nextReviewDays: 7, newStreak: 3, ... }
   */
  reviewCard(cardId: number, wasCorrect: boolean): ReviewOutcome {
    const card = this.getFlashcard(cardId);
    const now = new Date(this.clock.now());

    const newStreak = wasCorrect ? card.correctStreak + 1 : 0;
    const nextReviewDays = computeNextInterval(card.difficulty, newStreak, wasCorrect);
    const nextReview = nextReviewDate(now, nextReviewDays);

    this.db.prepare(`
      UPDATE flashcards
      SET review_count = review_count + 1,
          correct_streak = ?,
          last_reviewed = ?,
          next_review = ?
      WHERE id = ?
    `).run(newStreak, now.toISOString(), nextReview, cardId);

    return { nextReviewDays, newStreak, nextReview };
  }

  listSubjects(): string[] {
    return this.db
      .prepare('SELECT DISTINCT subject FROM flashcards ORDER BY subject')
      .all()
      .flatMap((row) => {
        const subject = stringColumn(row, 'subject');
        return subject ? [subject] : [];
      });
  }

  getStats(subject?: string): FlashcardStats {
    const filter = subject ? ' WHERE subject = ?' : '';
    const params: SqlParam[] = subject ? [subject] : [];

    const totals = this.db.prepare(`
      SELECT COUNT(*) AS total, COALESCE(AVG(correct_streak), 0) AS avg_streak
      FROM flashcards${filter}
    `).get(...params);

    const due = this.db.prepare(`
      SELECT COUNT(*) AS due FROM flashcards
      WHERE next_review <= ?${subject ? ' AND subject = ?' : ''}
    `).get(this.today(), ...params);

    const averageStreak = numberColumn(totals, 'avg_streak') ?? 0;
    return {
      totalCards: numberColumn(totals, 'total') ?? 0,
      dueForReview: numberColumn(due, 'due') ?? 0,
      averageStreak: round(averageStreak),
      masteryRate: averageStreak > 0 ? round((averageStreak / 5) * 100, 1) : 0,
    };
  }

  deleteFlashcard(id: number): Flashcard {
    const card = this.getFlashcard(id);
    this.db.prepare('DELETE FROM flashcards WHERE id = ?').run(id);
    return card;
  }

  /**
   * Import cards from CSV text with Question and Answer columns
   * (header names are case-insensitive). Rows missing either are skipped.
   */
  importCsv(text: string, subject: string, difficulty = 3): ImportResult {
    const parsed = Papa.parse<Record<string, string>>(text, {
      header: true,
      skipEmptyLines: true,
      transformHeader: (header) => header.trim().toLowerCase(),
    });

    const fields = parsed.meta.fields ?? [];
    if (!fields.includes('question') || !fields.includes('answer')) {
      throw new ValidationError('CSV needs Question and Answer columns');
    }

    let imported = 0;
    let skipped = 0;
    for (const record of parsed.data) {
      const question = record.question?.trim();
      const answer = record.answer?.trim();
      if (!question || !answer) {
        skipped++;
        continue;
      }
      this.addFlashcard({ question, answer, subject, difficulty });
      imported++;
    }
    return { imported, skipped };
  }
}
