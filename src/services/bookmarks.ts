/**
 * ============================================================================
 * BOOKMARKS
 * ============================================================================
 *
 * Saved learning resources.
 *
 * - One row per URL; adding a URL twice is a conflict, nothing is inserted
 * - is_read and accessed_at only change together, through accessBookmark()
 */

import { z } from 'zod';
import { numberColumn, stringColumn, type DbWrapper } from '../db.js';
import { NotFoundError, StateConflictError, ValidationError, validate } from '../errors.js';
import { QueryBuilder } from '../lib/query-builder.js';
import { systemClock, type Clock } from '../lib/timer.js';
import { bookmarkRowSchema, decodeRow, decodeRows } from '../rows.js';
import type { Bookmark } from '../types/index.js';

const rating = z.number().int().min(1, 'Rating must be 1-5').max(5, 'Rating must be 1-5');
const tagList = z.array(z.string().trim().min(1));

export const urlString = z
  .string()
  .trim()
  .refine((value) => URL.canParse(value), 'Not a valid URL');

const addBookmarkSchema = z.object({
  title: z.string().trim().min(1, 'Title is required'),
  url: urlString,
  description: z.string().optional(),
  category: z.string().trim().min(1).default('general'),
  tags: tagList.default([]),
  rating: rating.optional(),
});

const bookmarkChangesSchema = z
  .object({
    title: z.string().trim().min(1, 'Title is required'),
    description: z.string().nullable(),
    category: z.string().trim().min(1),
    rating: rating.nullable(),
    tags: tagList,
  })
  .partial()
  .strict();

export type AddBookmarkInput = z.input<typeof addBookmarkSchema>;
export type BookmarkChanges = z.input<typeof bookmarkChangesSchema>;

export interface BookmarkFilters {
  category?: string;
  tags?: string[];
  search?: string;
  isRead?: boolean;
}

const BOOKMARK_COLUMNS = ['title', 'url', 'description', 'category', 'tags', 'is_read', 'rating', 'created_at', 'accessed_at'] as const;

export class BookmarkService {
  private readonly db: DbWrapper;
  private readonly clock: Clock;

  constructor(db: DbWrapper, clock: Clock = systemClock) {
    this.db = db;
    this.clock = clock;
  }

  addBookmark(input: AddBookmarkInput): Bookmark {
    const data = validate(addBookmarkSchema, input, 'Invalid bookmark');

    const existing = this.db.prepare('SELECT id FROM bookmarks WHERE url = ?').get(data.url);
    if (existing) {
      throw new StateConflictError(`Bookmark already exists with ID: ${numberColumn(existing, 'id') ?? '?'}`);
    }

    const { lastInsertRowid } = this.db.prepare(`
      INSERT INTO bookmarks (title, url, description, category, tags, rating, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `).run(
      data.title,
      data.url,
      data.description ?? null,
      data.category,
      JSON.stringify(data.tags),
      data.rating ?? null,
      new Date(this.clock.now()).toISOString(),
    );
    return this.getBookmark(lastInsertRowid);
  }

  getBookmark(id: number): Bookmark {
    const row = this.db.prepare('SELECT * FROM bookmarks WHERE id = ?').get(id);
    if (!row) {
      throw new NotFoundError('Bookmark', id);
    }
    return decodeRow(bookmarkRowSchema, row, 'bookmark');
  }

  /**
   * Newest first. Tags match when the bookmark carries ANY of them; search
   * looks at title, description and URL.
   */
  listBookmarks(filters: BookmarkFilters = {}): Bookmark[] {
    const query = new QueryBuilder('bookmarks', BOOKMARK_COLUMNS);

    if (filters.category) {
      query.where('category', '=', filters.category);
    }
    if (filters.isRead !== undefined) {
      query.where('is_read', '=', filters.isRead ? 1 : 0);
    }
    if (filters.search) {
      const pattern = `%${filters.search}%`;
      query.whereAny([
        { column: 'title', op: 'LIKE', value: pattern },
        { column: 'description', op: 'LIKE', value: pattern },
        { column: 'url', op: 'LIKE', value: pattern },
      ]);
    }
    query.orderBy('created_at', 'DESC');

    const { sql, params } = query.select();
    const bookmarks = decodeRows(bookmarkRowSchema, this.db.prepare(sql).all(...params), 'bookmark');

    const wanted = filters.tags ?? [];
    if (wanted.length === 0) return bookmarks;
    return bookmarks.filter((bookmark) => bookmark.tags.some((tag) => wanted.includes(tag)));
  }

  updateBookmark(id: number, changes: BookmarkChanges): Bookmark {
    const data = validate(bookmarkChangesSchema, changes, 'Invalid bookmark update');
    if (Object.keys(data).length === 0) {
      throw new ValidationError('No updates provided');
    }
    this.getBookmark(id);

    const { tags, ...rest } = data;
    const built = new QueryBuilder('bookmarks', BOOKMARK_COLUMNS).update(id, {
      ...rest,
      tags: tags ? JSON.stringify(tags) : undefined,
    });
    if (built) {
      this.db.prepare(built.sql).run(...built.params);
    }
    return this.getBookmark(id);
  }

  /** Mark as read and stamp the access time */
  accessBookmark(id: number): Bookmark {
    const { changes } = this.db
      .prepare('UPDATE bookmarks SET is_read = 1, accessed_at = ? WHERE id = ?')
      .run(new Date(this.clock.now()).toISOString(), id);
    if (changes === 0) {
      throw new NotFoundError('Bookmark', id);
    }
    return this.getBookmark(id);
  }

  deleteBookmark(id: number): Bookmark {
    const bookmark = this.getBookmark(id);
    this.db.prepare('DELETE FROM bookmarks WHERE id = ?').run(id);
    return bookmark;
  }

  /** Categories in use with their bookmark counts */
  listCategories(): Array<{ category: string; count: number }> {
    return this.db
      .prepare('SELECT category, COUNT(*) AS cnt FROM bookmarks GROUP BY category ORDER BY category')
      .all()
      .flatMap((row) => {
        const category = stringColumn(row, 'category');
        return category ? [{ category, count: numberColumn(row, 'cnt') ?? 0 }] : [];
      });
  }
}
