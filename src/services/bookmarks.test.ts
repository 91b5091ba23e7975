import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { openDatabase, type DbWrapper } from '../db.js';
import { NotFoundError, StateConflictError, ValidationError } from '../errors.js';
import type { Clock } from '../lib/timer.js';
import { BookmarkService } from './bookmarks.js';

/** Every reading is one minute after the previous one */
class SteppingClock implements Clock {
  private ms = Date.UTC(2024, 2, 9, 10, 0, 0);
  now(): number {
    this.ms += 60_000;
    return this.ms;
  }
}

describe('BookmarkService', () => {
  let db: DbWrapper;
  let bookmarks: BookmarkService;

  beforeEach(async () => {
    db = await openDatabase({ path: null });
    bookmarks = new BookmarkService(db, new SteppingClock());
  });

  afterEach(() => {
    db.close();
  });

  it('adds a bookmark unread', () => {
    const bookmark = bookmarks.addBookmark({
      title: 'SQLite docs',
      url: 'https://sqlite.org/docs.html',
      category: 'documentation',
      tags: ['sql', 'db'],
    });

    expect(bookmark).toMatchObject({
      title: 'SQLite docs',
      category: 'documentation',
      tags: ['sql', 'db'],
      isRead: false,
      accessedAt: null,
      rating: null,
      createdAt: '2024-03-09T10:01:00.000Z',
    });
  });

  it('refuses a URL it already has without inserting', () => {
    const first = bookmarks.addBookmark({ title: 'One', url: 'https://example.com/a' });

    expect(() => bookmarks.addBookmark({ title: 'Two', url: 'https://example.com/a' })).toThrow(
      new StateConflictError(`Bookmark already exists with ID: ${first.id}`),
    );
    expect(bookmarks.listBookmarks()).toHaveLength(1);
  });

  it('validates URL and rating', () => {
    expect(() => bookmarks.addBookmark({ title: 'x', url: 'not a url' })).toThrow(ValidationError);
    expect(() => bookmarks.addBookmark({ title: 'x', url: 'https://example.com', rating: 0 })).toThrow(ValidationError);
  });

  it('filters by category, read state, tags and search', () => {
    const a = bookmarks.addBookmark({ title: 'Vitest guide', url: 'https://example.com/vitest', category: 'tutorial', tags: ['testing'] });
    bookmarks.addBookmark({ title: 'Zod', url: 'https://example.com/zod', category: 'documentation', tags: ['validation'] });
    bookmarks.addBookmark({ title: 'Notes', url: 'https://example.com/n', description: 'testing tips', category: 'article' });
    bookmarks.accessBookmark(a.id);

    expect(bookmarks.listBookmarks().map((b) => b.title)).toEqual(['Notes', 'Zod', 'Vitest guide']);
    expect(bookmarks.listBookmarks({ category: 'documentation' }).map((b) => b.title)).toEqual(['Zod']);
    expect(bookmarks.listBookmarks({ isRead: true }).map((b) => b.title)).toEqual(['Vitest guide']);
    expect(bookmarks.listBookmarks({ isRead: false }).map((b) => b.title)).toEqual(['Notes', 'Zod']);
    expect(bookmarks.listBookmarks({ tags: ['validation', 'testing'] }).map((b) => b.title)).toEqual(['Zod', 'Vitest guide']);
    expect(bookmarks.listBookmarks({ search: 'testing' }).map((b) => b.title)).toEqual(['Notes']);
  });

  it('sets read flag and access time together', () => {
    const bookmark = bookmarks.addBookmark({ title: 'One', url: 'https://example.com/a' });
    const accessed = bookmarks.accessBookmark(bookmark.id);

    expect(accessed.isRead).toBe(true);
    expect(accessed.accessedAt).toBe('2024-03-09T10:02:00.000Z');
    expect(() => bookmarks.accessBookmark(99)).toThrow(NotFoundError);
  });

  it('updates only editable fields', () => {
    const bookmark = bookmarks.addBookmark({ title: 'One', url: 'https://example.com/a' });
    const updated = bookmarks.updateBookmark(bookmark.id, { rating: 4, tags: ['x'], title: 'Uno' });

    expect(updated).toMatchObject({ title: 'Uno', rating: 4, tags: ['x'], isRead: false });
    expect(() => bookmarks.updateBookmark(bookmark.id, {})).toThrow('No updates provided');
    expect(() => bookmarks.updateBookmark(bookmark.id, { rating: 9 })).toThrow(ValidationError);
    expect(() => bookmarks.updateBookmark(99, { rating: 2 })).toThrow(NotFoundError);
  });

  it('counts categories and deletes', () => {
    const a = bookmarks.addBookmark({ title: 'A', url: 'https://example.com/a', category: 'video' });
    bookmarks.addBookmark({ title: 'B', url: 'https://example.com/b', category: 'video' });
    bookmarks.addBookmark({ title: 'C', url: 'https://example.com/c' });

    expect(bookmarks.listCategories()).toEqual([
      { category: 'general', count: 1 },
      { category: 'video', count: 2 },
    ]);
    expect(bookmarks.deleteBookmark(a.id).title).toBe('A');
    expect(bookmarks.listCategories()[1]).toEqual({ category: 'video', count: 1 });
  });
});
