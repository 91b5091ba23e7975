import { describe, expect, it } from 'vitest';
import { QueryBuilder, toColumnName } from './query-builder.js';
import { ValidationError } from '../errors.js';

const COLUMNS = ['name', 'status', 'deadline', 'priority', 'created_at', 'updated_at', 'git_repo'] as const;

const projects = () => new QueryBuilder('projects', COLUMNS);

describe('toColumnName', () => {
  it('converts camelCase to snake_case', () => {
    expect(toColumnName('gitRepo')).toBe('git_repo');
    expect(toColumnName('name')).toBe('name');
  });
});

describe('QueryBuilder.select', () => {
  it('builds a plain select', () => {
    expect(projects().select()).toEqual({ sql: 'SELECT * FROM projects', params: [] });
  });

  it('joins conditions, ordering and limit', () => {
    const query = projects()
      .where('status', '=', 'active')
      .whereNull('deadline', false)
      .orderBy('priority', 'DESC')
      .orderBy('name')
      .limit(5)
      .select();

    expect(query.sql).toBe(
      'SELECT * FROM projects WHERE status = ? AND deadline IS NOT NULL ORDER BY priority DESC, name ASC LIMIT ?',
    );
    expect(query.params).toEqual(['active', 5]);
  });

  it('groups OR conditions in parentheses', () => {
    const query = projects()
      .whereAny([
        { column: 'created_at', op: '>=', value: '2024-01-01' },
        { column: 'updated_at', op: '>=', value: '2024-01-01' },
      ])
      .select();

    expect(query.sql).toBe('SELECT * FROM projects WHERE (created_at >= ? OR updated_at >= ?)');
    expect(query.params).toEqual(['2024-01-01', '2024-01-01']);
  });

  it('rejects a column outside the allow-list', () => {
    expect(() => projects().column('name; DROP TABLE projects')).toThrow(ValidationError);
    expect(projects().column('deadline')).toBe('deadline');
  });

  it('rejects a negative limit', () => {
    expect(() => projects().limit(-1)).toThrow(ValidationError);
  });
});

describe('QueryBuilder.update', () => {
  it('sets only defined fields and appends the id', () => {
    const query = projects().update(7, { name: 'renamed', gitRepo: null, priority: undefined });

    expect(query).toEqual({ sql: 'UPDATE projects SET name = ?, git_repo = ? WHERE id = ?', params: ['renamed', null, 7] });
  });

  it('returns null when nothing changes', () => {
    expect(projects().update(1, { name: undefined })).toBeNull();
  });

  it('maps camelCase timestamps to their columns', () => {
    const query = projects().update(2, { status: 'completed', updatedAt: '2024-03-09T00:00:00.000Z' });

    expect(query?.sql).toBe('UPDATE projects SET status = ?, updated_at = ? WHERE id = ?');
    expect(query?.params).toEqual(['completed', '2024-03-09T00:00:00.000Z', 2]);
  });

  it('rejects fields outside the allow-list', () => {
    expect(() => projects().update(1, { createdBy: 'x' })).toThrow(ValidationError);
  });
});
