// Core data types for the study tracking CLI

export const SESSION_TYPES = ['study', 'break', 'project'] as const;
export type SessionType = (typeof SESSION_TYPES)[number];

export const PROJECT_TYPES = ['academic', 'personal', 'work'] as const;
export type ProjectType = (typeof PROJECT_TYPES)[number];

export const PROJECT_STATUSES = ['active', 'completed', 'paused', 'cancelled'] as const;
export type ProjectStatus = (typeof PROJECT_STATUSES)[number];

export const COURSE_STATUSES = ['enrolled', 'in_progress', 'completed', 'paused'] as const;
export type CourseStatus = (typeof COURSE_STATUSES)[number];

export interface Session {
  id: number;
  sessionType: SessionType;
  projectId: number | null;
  subject: string | null;
  startTime: string; // ISO timestamp
  endTime: string | null; // Set only once stopped or completed
  duration: number | null; // Seconds, set together with endTime
  notes: string | null;
  productivityRating: number | null; // 1-5
  createdAt: string;
}

export interface Project {
  id: number;
  name: string; // Unique across projects
  description: string | null;
  projectType: ProjectType;
  language: string | null;
  path: string | null; // Scaffold directory on disk
  gitRepo: string | null;
  deadline: string | null; // YYYY-MM-DD
  status: ProjectStatus;
  priority: number; // 1-5
  createdAt: string;
  updatedAt: string;
}

export interface Flashcard {
  id: number;
  question: string;
  answer: string;
  subject: string;
  difficulty: number; // 1 = easiest (longest intervals) .. 5 = hardest
  lastReviewed: string | null; // ISO timestamp
  nextReview: string; // YYYY-MM-DD
  reviewCount: number;
  correctStreak: number; // Reset to 0 on any incorrect review
  tags: string[];
  createdAt: string;
}

export interface Bookmark {
  id: number;
  title: string;
  url: string; // Unique across bookmarks
  description: string | null;
  category: string;
  tags: string[];
  isRead: boolean;
  rating: number | null; // 1-5
  createdAt: string;
  accessedAt: string | null; // Set together with isRead
}

export interface Course {
  id: number;
  title: string;
  platform: string | null;
  instructor: string | null;
  url: string | null;
  totalLessons: number | null;
  completedLessons: number;
  progressPercentage: number; // Derived: min(100, completed / total * 100)
  status: CourseStatus; // Derived from progress
  startDate: string | null;
  targetCompletionDate: string | null;
  createdAt: string;
  updatedAt: string;
}

export type Urgency = 'overdue' | 'urgent' | 'soon' | 'upcoming';

export interface ProjectTemplate {
  name: string;
  language: string;
  description: string;
  files: Record<string, string>; // Relative path -> content with {{PLACEHOLDERS}}
  dependencies: string[];
  createdAt?: string;
}
