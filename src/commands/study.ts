/**
 * `studytrack study ...` - bookmarks, flashcards, courses and reviews
 */

import { Command, Option } from 'commander';
import { readFileSync } from 'fs';
import { formatDuration, progressBar, renderTable, stars } from '../lib/format.js';
import { runReviewLoop, type ReviewPrompter } from '../lib/review-loop.js';
import { COURSE_STATUSES } from '../types/index.js';
import type { BookmarkChanges } from '../services/bookmarks.js';
import { ask, confirm } from './prompts.js';
import { parseId, parseInteger, parseList, runAction, withServices } from './shared.js';

const terminalPrompter: ReviewPrompter = {
  async showQuestion(card, position, total) {
    console.log(`\n📝 Card ${position}/${total} [${card.subject}]`);
    console.log(`Q: ${card.question}`);
    await ask('Press Enter to show the answer...');
  },
  showAnswer(card) {
    console.log(`A: ${card.answer}`);
  },
  askCorrect() {
    return confirm('Did you get it right?');
  },
  showOutcome(_card, outcome, wasCorrect) {
    console.log(`${wasCorrect ? '✅' : '❌'} Next review in ${outcome.nextReviewDays} day(s) (${outcome.nextReview}), streak ${outcome.newStreak}`);
  },
};

const study = new Command('study').description('Bookmarks, flashcards, courses and reviews');

// ============================================================================
// BOOKMARKS
// ============================================================================

const bookmark = study.command('bookmark').description('Saved learning resources');

bookmark
  .command('add')
  .description('Save a URL')
  .argument('<title>', 'title')
  .argument('<url>', 'URL')
  .option('-c, --category <category>', 'category', 'general')
  .option('--tags <tags>', 'comma-separated tags', parseList)
  .option('-d, --description <text>', 'description')
  .option('-r, --rating <1-5>', 'rating', parseInteger)
  .action(
    runAction('Bookmark add', (title: string, url: string, options: { category: string; tags?: string[]; description?: string; rating?: number }) =>
      withServices((services) => {
        const added = services.bookmarks.addBookmark({ title, url, ...options });
        console.log(`✅ Bookmarked '${added.title}' (ID ${added.id})`);
      }),
    ),
  );

bookmark
  .command('list')
  .description('List bookmarks')
  .option('-c, --category <category>', 'category')
  .option('--tags <tags>', 'any of these comma-separated tags', parseList)
  .option('-s, --search <text>', 'search title, description and URL')
  .option('--unread', 'only unread bookmarks')
  .option('--read', 'only read bookmarks')
  .action(
    runAction('Bookmark list', (options: { category?: string; tags?: string[]; search?: string; unread?: boolean; read?: boolean }) =>
      withServices((services) => {
        const isRead = options.read ? true : options.unread ? false : undefined;
        const bookmarks = services.bookmarks.listBookmarks({ category: options.category, tags: options.tags, search: options.search, isRead });
        if (bookmarks.length === 0) {
          console.log('No bookmarks found.');
          return;
        }
        console.log(
          renderTable(
            ['ID', 'Title', 'Category', 'Tags', 'Read', 'Rating', 'URL'],
            bookmarks.map((b) => [b.id, b.title, b.category, b.tags.join(', '), b.isRead ? '✓' : '', stars(b.rating), b.url]),
          ),
        );
      }),
    ),
  );

bookmark
  .command('open')
  .description('Show a bookmark URL and mark it read')
  .argument('<id>', 'bookmark id', parseId)
  .action(
    runAction('Bookmark open', (id: number) =>
      withServices((services) => {
        const opened = services.bookmarks.accessBookmark(id);
        console.log(`🔗 ${opened.url}`);
      }),
    ),
  );

bookmark
  .command('update')
  .description('Change bookmark fields')
  .argument('<id>', 'bookmark id', parseId)
  .option('--title <title>', 'title')
  .option('-d, --description <text>', 'description')
  .option('-c, --category <category>', 'category')
  .option('-r, --rating <1-5>', 'rating', parseInteger)
  .option('--tags <tags>', 'comma-separated tags (replaces the current ones)', parseList)
  .action(
    runAction('Bookmark update', (id: number, options: { title?: string; description?: string; category?: string; rating?: number; tags?: string[] }) =>
      withServices((services) => {
        const changes: BookmarkChanges = {};
        if (options.title !== undefined) changes.title = options.title;
        if (options.description !== undefined) changes.description = options.description;
        if (options.category !== undefined) changes.category = options.category;
        if (options.rating !== undefined) changes.rating = options.rating;
        if (options.tags !== undefined) changes.tags = options.tags;

        const updated = services.bookmarks.updateBookmark(id, changes);
        console.log(`✅ Updated bookmark '${updated.title}'`);
      }),
    ),
  );

bookmark
  .command('delete')
  .description('Delete a bookmark')
  .argument('<id>', 'bookmark id', parseId)
  .action(
    runAction('Bookmark delete', (id: number) =>
      withServices((services) => {
        const deleted = services.bookmarks.deleteBookmark(id);
        console.log(`🗑️  Deleted bookmark '${deleted.title}'`);
      }),
    ),
  );

bookmark
  .command('categories')
  .description('Configured categories and how many bookmarks use each')
  .action(
    runAction('Bookmark categories', () =>
      withServices((services) => {
        const counts = new Map(services.bookmarks.listCategories().map(({ category, count }) => [category, count]));
        const names = [...new Set([...services.settings.bookmarkCategories, ...counts.keys()])];
        console.log(renderTable(['Category', 'Bookmarks'], names.map((name) => [name, counts.get(name) ?? 0])));
      }),
    ),
  );

// ============================================================================
// FLASHCARDS
// ============================================================================

const flashcard = study.command('flashcard').description('Spaced-repetition flashcards');

flashcard
  .command('add')
  .description('Add a card (first due tomorrow)')
  .argument('<question>', 'question')
  .argument('<answer>', 'answer')
  .requiredOption('-s, --subject <subject>', 'subject')
  .option('-d, --difficulty <1-5>', 'difficulty, 1 easiest', parseInteger, 3)
  .option('--tags <tags>', 'comma-separated tags', parseList)
  .action(
    runAction('Flashcard add', (question: string, answer: string, options: { subject: string; difficulty: number; tags?: string[] }) =>
      withServices((services) => {
        const card = services.flashcards.addFlashcard({ question, answer, ...options });
        console.log(`✅ Added flashcard ${card.id} to ${card.subject}, first review ${card.nextReview}`);
      }),
    ),
  );

flashcard
  .command('list')
  .description('List cards')
  .option('-s, --subject <subject>', 'only this subject')
  .action(
    runAction('Flashcard list', (options: { subject?: string }) =>
      withServices((services) => {
        const cards = services.flashcards.listFlashcards(options.subject);
        if (cards.length === 0) {
          console.log('No flashcards found.');
          return;
        }
        console.log(
          renderTable(
            ['ID', 'Subject', 'Question', 'Difficulty', 'Streak', 'Reviews', 'Next review'],
            cards.map((c) => [c.id, c.subject, c.question, c.difficulty, c.correctStreak, c.reviewCount, c.nextReview]),
          ),
        );
      }),
    ),
  );

flashcard
  .command('stats')
  .description('Card counts and mastery')
  .option('-s, --subject <subject>', 'only this subject')
  .action(
    runAction('Flashcard stats', (options: { subject?: string }) =>
      withServices((services) => {
        const stats = services.flashcards.getStats(options.subject);
        console.log(`🧠 Flashcards${options.subject ? ` (${options.subject})` : ''}`);
        console.log(`   Total: ${stats.totalCards}`);
        console.log(`   Due for review: ${stats.dueForReview}`);
        console.log(`   Average streak: ${stats.averageStreak}`);
        console.log(`   Mastery: ${services.settings.showProgressBars ? progressBar(stats.masteryRate) : `${stats.masteryRate}%`}`);
        const subjects = services.flashcards.listSubjects();
        if (!options.subject && subjects.length > 0) {
          console.log(`   Subjects: ${subjects.join(', ')}`);
        }
      }),
    ),
  );

flashcard
  .command('delete')
  .description('Delete a card')
  .argument('<id>', 'card id', parseId)
  .action(
    runAction('Flashcard delete', (id: number) =>
      withServices((services) => {
        const deleted = services.flashcards.deleteFlashcard(id);
        console.log(`🗑️  Deleted flashcard ${deleted.id}`);
      }),
    ),
  );

flashcard
  .command('import')
  .description('Import cards from a CSV file with Question and Answer columns')
  .argument('<file>', 'CSV file')
  .requiredOption('-s, --subject <subject>', 'subject for every imported card')
  .option('-d, --difficulty <1-5>', 'difficulty, 1 easiest', parseInteger, 3)
  .action(
    runAction('Flashcard import', (file: string, options: { subject: string; difficulty: number }) =>
      withServices((services) => {
        const result = services.flashcards.importCsv(readFileSync(file, 'utf-8'), options.subject, options.difficulty);
        console.log(`✅ Imported ${result.imported} card(s)${result.skipped ? `, skipped ${result.skipped} incomplete row(s)` : ''}`);
      }),
    ),
  );

// ============================================================================
// COURSES
// ============================================================================

const course = study.command('course').description('Course progress');

course
  .command('add')
  .description('Track a course')
  .argument('<title>', 'title')
  .option('-p, --platform <platform>', 'platform')
  .option('-i, --instructor <name>', 'instructor')
  .option('--url <url>', 'course URL')
  .option('-l, --lessons <n>', 'total lessons', parseInteger)
  .option('--start <date>', 'start date (YYYY-MM-DD)')
  .option('--target <date>', 'target completion date (YYYY-MM-DD)')
  .action(
    runAction(
      'Course add',
      (title: string, options: { platform?: string; instructor?: string; url?: string; lessons?: number; start?: string; target?: string }) =>
        withServices((services) => {
          const added = services.courses.addCourse({
            title,
            platform: options.platform,
            instructor: options.instructor,
            url: options.url,
            totalLessons: options.lessons,
            startDate: options.start,
            targetCompletionDate: options.target,
          });
          console.log(`✅ Added course '${added.title}' (ID ${added.id})`);
        }),
    ),
  );

course
  .command('progress')
  .description('Record completed lessons')
  .argument('<id>', 'course id', parseId)
  .argument('<completed>', 'lessons completed so far', parseInteger)
  .action(
    runAction('Course progress', (id: number, completed: number) =>
      withServices((services) => {
        const updated = services.courses.updateProgress(id, completed);
        console.log(`📈 ${updated.title}: ${progressBar(updated.progressPercentage)} (${updated.status})`);
        if (updated.status === 'completed') console.log('🎓 Course completed!');
      }),
    ),
  );

course
  .command('list')
  .description('List courses')
  .addOption(new Option('--status <status>', 'filter by status').choices(['all', ...COURSE_STATUSES]).default('all'))
  .action(
    runAction('Course list', (options: { status: string }) =>
      withServices((services) => {
        const courses = services.courses.listCourses(options.status);
        if (courses.length === 0) {
          console.log('No courses found.');
          return;
        }
        console.log(
          renderTable(
            ['ID', 'Title', 'Platform', 'Lessons', 'Progress', 'Status'],
            courses.map((c) => [
              c.id,
              c.title,
              c.platform,
              `${c.completedLessons}/${c.totalLessons ?? '?'}`,
              `${c.progressPercentage.toFixed(1)}%`,
              c.status,
            ]),
          ),
        );
      }),
    ),
  );

course
  .command('stats')
  .description('Course totals')
  .action(
    runAction('Course stats', () =>
      withServices((services) => {
        const stats = services.courses.getStats();
        console.log(`🎓 Courses: ${stats.totalCourses} (${stats.inProgress} in progress, ${stats.completed} completed)`);
        console.log(`   Average progress: ${stats.averageProgress}%`);
      }),
    ),
  );

// ============================================================================
// REVIEW & SUMMARIES
// ============================================================================

study
  .command('review')
  .description('Review due flashcards')
  .option('-s, --subject <subject>', 'only this subject')
  .option('-l, --limit <n>', 'cards to review (default from config)', parseInteger)
  .action(
    runAction('Review', (options: { subject?: string; limit?: number }) =>
      withServices(async (services) => {
        const cards = services.flashcards.getDueCards(options.subject, options.limit ?? services.settings.reviewLimit);
        if (cards.length === 0) {
          console.log('🎉 No cards due for review.');
          return;
        }
        const summary = await runReviewLoop(cards, services.flashcards, terminalPrompter);
        const rate = Math.round((summary.correct / summary.reviewed) * 100);
        console.log(`\n✅ Reviewed ${summary.reviewed} card(s), ${summary.correct} correct (${rate}%)`);
      }),
    ),
  );

study
  .command('summary')
  .description('What is waiting for you')
  .action(
    runAction('Study summary', () =>
      withServices((services) => {
        const summary = services.reports.reviewSummary();
        console.log('📚 Study summary');
        console.log(`   Flashcards due: ${summary.dueFlashcards}`);
        console.log(`   Unread bookmarks: ${summary.unreadBookmarks}`);
        console.log(`   Courses in progress: ${summary.inProgressCourses}`);
      }),
    ),
  );

study
  .command('subject')
  .description('Time and cards for one subject')
  .argument('<name>', 'subject')
  .action(
    runAction('Subject tracking', (name: string) =>
      withServices((services) => {
        const tracking = services.reports.subjectTimeTracking(name);
        console.log(`📊 ${tracking.subject}`);
        console.log(`   Sessions: ${tracking.totalSessions}, ${tracking.totalHours} h (average ${formatDuration(tracking.averageMinutes * 60)})`);
        console.log(`   Average rating: ${tracking.averageRating}`);
        console.log(`   Flashcards: ${tracking.flashcards.totalCards} (${tracking.flashcards.dueForReview} due, mastery ${tracking.flashcards.masteryRate}%)`);
        const days = Object.entries(tracking.byDay);
        if (days.length > 0) {
          console.log(renderTable(['Day', 'Hours'], days));
        }
      }),
    ),
  );

export default study;
