/**
 * Small SQL builder for the list and update operations.
 *
 * Column names only ever come from an allow-list fixed in code; values are
 * always bound as parameters. Anything outside the allow-list is rejected
 * with a ValidationError before a statement is built.
 */

import type { SqlParam } from '../db.js';
import { ValidationError } from '../errors.js';

export type Operator = '=' | '!=' | '<' | '<=' | '>' | '>=' | 'LIKE';
export type Direction = 'ASC' | 'DESC';

export interface Condition<C extends string> {
  column: C;
  op: Operator;
  value: SqlParam;
}

export interface BuiltQuery {
  sql: string;
  params: SqlParam[];
}

/** camelCase -> snake_case, e.g. gitRepo -> git_repo */
export function toColumnName(field: string): string {
  return field.replace(/([A-Z])/g, '_$1').toLowerCase();
}

export class QueryBuilder<C extends string> {
  private readonly table: string;
  private readonly columns: readonly C[];
  private readonly clauses: string[] = [];
  private readonly params: SqlParam[] = [];
  private readonly ordering: string[] = [];
  private maxRows: number | null = null;

  constructor(table: string, columns: readonly C[]) {
    this.table = table;
    this.columns = columns;
  }

  isColumn(name: string): name is C {
    return this.columns.some((column) => column === name);
  }

  /** Validate a column name that came from outside (a CLI flag) */
  column(name: string): C {
    if (!this.isColumn(name)) {
      throw new ValidationError(`Invalid field "${name}". Valid fields: ${this.columns.join(', ')}`);
    }
    return name;
  }

  where(column: C, op: Operator, value: SqlParam): this {
    this.clauses.push(`${this.column(column)} ${op} ?`);
    this.params.push(value);
    return this;
  }

  whereNull(column: C, isNull = true): this {
    this.clauses.push(`${this.column(column)} IS ${isNull ? '' : 'NOT '}NULL`);
    return this;
  }

  /** OR-joined group, e.g. (created_at >= ? OR updated_at >= ?) */
  whereAny(conditions: Condition<C>[]): this {
    if (conditions.length === 0) return this;
    const parts = conditions.map(({ column, op, value }) => {
      this.params.push(value);
      return `${this.column(column)} ${op} ?`;
    });
    this.clauses.push(`(${parts.join(' OR ')})`);
    return this;
  }

  orderBy(column: C, direction: Direction = 'ASC'): this {
    this.ordering.push(`${this.column(column)} ${direction}`);
    return this;
  }

  limit(rows: number): this {
    if (!Number.isInteger(rows) || rows < 0) {
      throw new ValidationError(`Invalid limit: ${rows}`);
    }
    this.maxRows = rows;
    return this;
  }

  select(): BuiltQuery {
    let sql = `SELECT * FROM ${this.table}`;
    if (this.clauses.length > 0) sql += ` WHERE ${this.clauses.join(' AND ')}`;
    if (this.ordering.length > 0) sql += ` ORDER BY ${this.ordering.join(', ')}`;
    const params = [...this.params];
    if (this.maxRows !== null) {
      sql += ' LIMIT ?';
      params.push(this.maxRows);
    }
    return { sql, params };
  }

  /**
   * UPDATE ... SET for the defined entries of `changes` (camelCase keys),
   * restricted to the allow-list. Returns null when nothing would change.
   */
  update(id: number, changes: Record<string, SqlParam | undefined>): BuiltQuery | null {
    const updates: string[] = [];
    const values: SqlParam[] = [];

    for (const [field, value] of Object.entries(changes)) {
      if (value === undefined) continue;
      updates.push(`${this.column(toColumnName(field))} = ?`);
      values.push(value);
    }
    if (updates.length === 0) return null;

    values.push(id);
    return { sql: `UPDATE ${this.table} SET ${updates.join(', ')} WHERE id = ?`, params: values };
  }
}
