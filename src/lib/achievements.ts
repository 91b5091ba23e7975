/**
 * Milestones announced when a session completes.
 *
 * A milestone fires only on the exact count (the third consecutive day,
 * the tenth finished session), so each one is shown once.
 */

export interface Achievement {
  title: string;
  description: string;
  icon: string;
}

export interface AchievementProgress {
  streakDays: number; // Consecutive days with a finished session, ending today
  completedSessions: number; // Finished sessions of any type
}

const STREAK_MILESTONES: Record<number, Achievement> = {
  3: { title: 'Three Day Streak!', description: "You've studied for 3 consecutive days. Great start!", icon: '🔥' },
  7: { title: 'One Week Warrior!', description: "Seven days straight! You're building amazing habits!", icon: '⭐' },
  30: { title: 'Monthly Master!', description: "30 days of consistent study! You're unstoppable!", icon: '👑' },
};

const SESSION_MILESTONES: Record<number, Achievement> = {
  10: { title: 'Session Starter!', description: "You've completed 10 study sessions!", icon: '📚' },
  50: { title: 'Study Champion!', description: "50 sessions completed! You're a productivity machine!", icon: '🏆' },
  100: { title: 'Century Club!', description: "100 study sessions! You've truly mastered consistency!", icon: '💎' },
};

export function evaluateAchievements({ streakDays, completedSessions }: AchievementProgress): Achievement[] {
  const unlocked: Achievement[] = [];
  const streak = STREAK_MILESTONES[streakDays];
  if (streak) unlocked.push(streak);
  const sessions = SESSION_MILESTONES[completedSessions];
  if (sessions) unlocked.push(sessions);
  return unlocked;
}

/**
 * Length of the run of consecutive days ending at `today`.
 * `days` are YYYY-MM-DD strings in any order; `previousDay` steps back one day.
 *
 * @example
 * countStreak(['2024-03-09', '2024-03-08', '2024-03-06'], '2024-03-09', prev) // => 2
 */
export function countStreak(days: Iterable<string>, today: string, previousDay: (day: string) => string): number {
  const seen = new Set(days);
  let streak = 0;
  let day = today;
  while (seen.has(day)) {
    streak++;
    day = previousDay(day);
  }
  return streak;
}
