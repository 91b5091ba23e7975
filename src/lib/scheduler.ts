/**
 * ============================================================================
 * SCHEDULER - Spaced-Repetition Intervals
 * ============================================================================
 *
 * Decides how many days a flashcard waits before it is due again.
 *
 * Core Algorithm (computeNextInterval):
 * - Any wrong answer: back to daily review
 * - First two correct answers in a row: 1 day, then 3 days
 * - From the third correct answer on: 7 days scaled by streak and difficulty
 * - Always between 1 and 365 days
 *
 * DIFFICULTY CONVENTION:
 * - 1 = easiest card, reviewed least often (longest intervals)
 * - 5 = hardest card, reviewed most often (shortest intervals)
 * The factor is (6 - difficulty) / 5, so difficulty 1 keeps the full
 * interval and difficulty 5 keeps a fifth of it.
 *
 * Use Cases:
 * - Flashcard review (reviewCard writes next_review = today + interval)
 * - New cards are due tomorrow
 */

import { addDays, format } from 'date-fns';

const BASE_INTERVAL_DAYS = 7;
const MAX_INTERVAL_DAYS = 365;
const MIN_INTERVAL_DAYS = 1;

/**
 * Days until the next review of a card
 *
 * The streak passed in is the one AFTER this review was applied: 0 after
 * a wrong answer, previous + 1 after a correct one.
 *
 * FORMULA (streak >= 3):
 *   floor(7 * (1.5 + streak * 0.1) * ((6 - difficulty) / 5))
 *
 * Difficulty must be validated (1-5) by the caller. Values outside the
 * range never throw; anything that is not a finite number yields 1.
 *
 * @param difficulty 1 (easiest) .. 5 (hardest)
 * @param correctStreak Consecutive correct answers including this one
 * @param wasCorrect Outcome of this review
 * @returns Whole days in [1, 365]
 *
 * @example
 * computeNextInterval(3, 0, false) // => 1  (lapse)
 * computeNextInterval(3, 1, true)  // => 1
 * computeNextInterval(3, 2, true)  // => 3
 * computeNextInterval(3, 3, true)  // => 7  (floor(7 * 1.8 * 0.6) = floor(7.56))
 * computeNextInterval(1, 3, true)  // => 12 (floor(7 * 1.8 * 1.0) = floor(12.6))
 */
export function computeNextInterval(difficulty: number, correctStreak: number, wasCorrect: boolean): number {
  if (!wasCorrect) return MIN_INTERVAL_DAYS;
  if (correctStreak <= 1) return MIN_INTERVAL_DAYS;
  if (correctStreak === 2) return 3;

  const multiplier = 1.5 + correctStreak * 0.1;
  const difficultyFactor = (6 - difficulty) / 5;
  const interval = Math.floor(BASE_INTERVAL_DAYS * multiplier * difficultyFactor);

  // NaN, Infinity or a non-positive factor all collapse to daily review
  if (!Number.isFinite(interval)) return MIN_INTERVAL_DAYS;
  return Math.min(MAX_INTERVAL_DAYS, Math.max(MIN_INTERVAL_DAYS, interval));
}

/**
 * Local calendar date as stored in next_review / deadline columns
 *
 * @example
 * toDateString(new Date(2024, 2, 9)) // => "2024-03-09"
 */
export function toDateString(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

/**
 * Calendar date `days` after `today`
 *
 * @example
 * nextReviewDate(new Date(2024, 0, 30), 3) // => "2024-02-02"
 */
export function nextReviewDate(today: Date, days: number): string {
  return toDateString(addDays(today, days));
}

/**
 * A card is due on its next_review date and every day after.
 * Dates are compared as YYYY-MM-DD strings.
 */
export function isDue(card: { nextReview: string }, today: string): boolean {
  return card.nextReview <= today;
}
