/**
 * Interactive flashcard review.
 *
 * For each due card: show the question, wait, show the answer, ask whether
 * it was answered correctly, record the outcome. Recording is the only
 * write; everything else goes through the prompter, so the loop runs the
 * same against a terminal or a scripted stand-in.
 */

import type { Flashcard } from '../types/index.js';

export interface ReviewOutcome {
  nextReviewDays: number;
  newStreak: number;
  nextReview: string; // YYYY-MM-DD
}

export interface ReviewEngine {
  reviewCard(cardId: number, wasCorrect: boolean): ReviewOutcome;
}

export interface ReviewPrompter {
  /** Show the question and resolve once the operator wants the answer */
  showQuestion(card: Flashcard, position: number, total: number): Promise<void>;
  showAnswer(card: Flashcard): void;
  askCorrect(card: Flashcard): Promise<boolean>;
  showOutcome(card: Flashcard, outcome: ReviewOutcome, wasCorrect: boolean): void;
}

export interface ReviewSummary {
  reviewed: number;
  correct: number;
}

export async function runReviewLoop(
  cards: Flashcard[],
  engine: ReviewEngine,
  prompter: ReviewPrompter,
): Promise<ReviewSummary> {
  let correct = 0;

  for (const [index, card] of cards.entries()) {
    await prompter.showQuestion(card, index + 1, cards.length);
    prompter.showAnswer(card);
    const wasCorrect = await prompter.askCorrect(card);

    const outcome = engine.reviewCard(card.id, wasCorrect);
    if (wasCorrect) correct++;
    prompter.showOutcome(card, outcome, wasCorrect);
  }

  return { reviewed: cards.length, correct };
}
