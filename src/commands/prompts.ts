/**
 * Interactive prompts on stdin/stdout. Each prompt opens and closes its own
 * readline interface so raw-mode key handling can run in between.
 */

import { createInterface } from 'readline/promises';

export async function ask(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return (await rl.question(question)).trim();
  } finally {
    rl.close();
  }
}

export async function confirm(question: string, defaultYes = false): Promise<boolean> {
  const answer = (await ask(`${question} ${defaultYes ? '[Y/n]' : '[y/N]'} `)).toLowerCase();
  if (answer === '') return defaultYes;
  return answer === 'y' || answer === 'yes';
}

/** 1-5, asked again until valid; empty input takes the fallback */
export async function askRating(question = 'Rate your productivity (1-5)', fallback = 3): Promise<number> {
  for (;;) {
    const answer = await ask(`${question} [${fallback}]: `);
    if (answer === '') return fallback;
    const rating = Number(answer);
    if (Number.isInteger(rating) && rating >= 1 && rating <= 5) return rating;
    console.log('⚠️  Please enter a whole number from 1 to 5');
  }
}
