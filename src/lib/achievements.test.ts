import { describe, expect, it } from 'vitest';
import { countStreak, evaluateAchievements } from './achievements.js';

const previousDay = (day: string): string => {
  const date = new Date(`${day}T00:00:00Z`);
  date.setUTCDate(date.getUTCDate() - 1);
  return date.toISOString().slice(0, 10);
};

describe('evaluateAchievements', () => {
  it('fires on exact streak milestones', () => {
    expect(evaluateAchievements({ streakDays: 3, completedSessions: 4 }).map((a) => a.title)).toEqual([
      'Three Day Streak!',
    ]);
    expect(evaluateAchievements({ streakDays: 4, completedSessions: 4 })).toEqual([]);
  });

  it('can unlock a streak and a session milestone together', () => {
    const titles = evaluateAchievements({ streakDays: 7, completedSessions: 50 }).map((a) => a.title);
    expect(titles).toEqual(['One Week Warrior!', 'Study Champion!']);
  });

  it('ignores counts between milestones', () => {
    expect(evaluateAchievements({ streakDays: 0, completedSessions: 11 })).toEqual([]);
  });
});

describe('countStreak', () => {
  it('counts consecutive days ending today', () => {
    expect(countStreak(['2024-03-09', '2024-03-08', '2024-03-06'], '2024-03-09', previousDay)).toBe(2);
  });

  it('is zero without a session today', () => {
    expect(countStreak(['2024-03-08', '2024-03-07'], '2024-03-09', previousDay)).toBe(0);
  });

  it('crosses month boundaries', () => {
    expect(countStreak(['2024-03-01', '2024-02-29', '2024-02-28'], '2024-03-01', previousDay)).toBe(3);
  });
});
