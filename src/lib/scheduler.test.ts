import { describe, expect, it } from 'vitest';
import { computeNextInterval, isDue, nextReviewDate, toDateString } from './scheduler.js';

const DIFFICULTIES = [1, 2, 3, 4, 5];

describe('computeNextInterval', () => {
  it('returns 1 after any wrong answer', () => {
    for (const difficulty of DIFFICULTIES) {
      for (const streak of [0, 1, 2, 5, 40, 1000]) {
        expect(computeNextInterval(difficulty, streak, false)).toBe(1);
      }
    }
  });

  it('uses fixed steps for the first two correct answers', () => {
    expect(computeNextInterval(3, 1, true)).toBe(1);
    expect(computeNextInterval(3, 2, true)).toBe(3);
    expect(computeNextInterval(5, 2, true)).toBe(3);
  });

  it('scales by streak and difficulty from the third answer', () => {
    expect(computeNextInterval(3, 3, true)).toBe(7);
    expect(computeNextInterval(1, 3, true)).toBe(12);
    expect(computeNextInterval(5, 3, true)).toBe(2);
    expect(computeNextInterval(1, 10, true)).toBe(17);
  });

  it('gives easier cards longer intervals', () => {
    expect(computeNextInterval(1, 6, true)).toBeGreaterThan(computeNextInterval(5, 6, true));
  });

  it('never decreases as the streak grows', () => {
    for (const difficulty of DIFFICULTIES) {
      let previous = computeNextInterval(difficulty, 3, true);
      for (let streak = 4; streak <= 2000; streak++) {
        const next = computeNextInterval(difficulty, streak, true);
        expect(next).toBeGreaterThanOrEqual(previous);
        previous = next;
      }
    }
  });

  it('stays within 1..365 for any input', () => {
    const inputs = [-10, -1, 0, 1, 3, 6, 7, 100, 1e6, Number.NaN, Number.POSITIVE_INFINITY];
    for (const difficulty of inputs) {
      for (const streak of inputs) {
        for (const wasCorrect of [true, false]) {
          const days = computeNextInterval(difficulty, streak, wasCorrect);
          expect(days).toBeGreaterThanOrEqual(1);
          expect(days).toBeLessThanOrEqual(365);
        }
      }
    }
  });

  it('caps long streaks at 365 days', () => {
    expect(computeNextInterval(1, 1000, true)).toBe(365);
  });
});

describe('dates', () => {
  it('formats local calendar dates', () => {
    expect(toDateString(new Date(2024, 2, 9, 23, 30))).toBe('2024-03-09');
  });

  it('adds days across month boundaries', () => {
    expect(nextReviewDate(new Date(2024, 0, 30), 3)).toBe('2024-02-02');
  });

  it('treats today and past dates as due', () => {
    expect(isDue({ nextReview: '2024-03-09' }, '2024-03-09')).toBe(true);
    expect(isDue({ nextReview: '2024-03-01' }, '2024-03-09')).toBe(true);
    expect(isDue({ nextReview: '2024-03-10' }, '2024-03-09')).toBe(false);
  });
});
