import { type Repository } from '@contacts/domain';
import { type Queryable } from './client';

export function toDate(value: unknown): Date {
  if (value instanceof Date) return value;
  if (typeof value === 'string' || typeof value === 'number') {
    const date = new Date(value);
    if (!Number.isNaN(date.getTime())) return date;
  }
  throw new TypeError(`Expected a timestamp, got ${String(value)}`);
}

export function toNullableDate(value: unknown): Date | null {
  return value === null || value === undefined ? null : toDate(value);
}

export function toNullableString(value: unknown): string | null {
  return value === null || value === undefined ? null : String(value);
}

/**
 * `SET` clause for the defined entries of `values`, numbering parameters
 * from `startIndex`. Keys are column names and are trusted.
 */
export function buildAssignments(
  values: Record<string, unknown>,
  startIndex = 1,
): { sql: string; params: unknown[] } {
  const parts: string[] = [];
  const params: unknown[] = [];
  for (const [column, value] of Object.entries(values)) {
    if (value === undefined) continue;
    params.push(value);
    parts.push(`${column} = $${startIndex + params.length - 1}`);
  }
  return { sql: parts.join(', '), params };
}

/**
 * Table-backed repository over raw SQL. Subclasses provide the table, the
 * select list and the row mapping; each call runs as its own statement.
 */
export abstract class PgRepository<TEntity, TCreate> implements Repository<TEntity, TCreate> {
  protected abstract readonly table: string;
  protected abstract readonly columns: string;
  protected readonly hasUpdatedAt: boolean = false;

  constructor(protected readonly db: Queryable) {}

  protected abstract mapRow(row: Record<string, unknown>): TEntity;
  protected abstract toRow(input: TCreate): Record<string, unknown>;

  async create(input: TCreate): Promise<TEntity> {
    const row = this.toRow(input);
    const names = Object.keys(row);
    const placeholders = names.map((_, i) => `$${i + 1}`);
    const result = await this.db.query(
      `INSERT INTO ${this.table} (${names.join(', ')})
       VALUES (${placeholders.join(', ')})
       RETURNING ${this.columns}`,
      names.map((name) => row[name]),
    );
    return this.mapRow(result.rows[0]);
  }

  async findAll(): Promise<TEntity[]> {
    const result = await this.db.query(`SELECT ${this.columns} FROM ${this.table} ORDER BY id`);
    return result.rows.map((row) => this.mapRow(row));
  }

  async findById(id: string): Promise<TEntity | null> {
    return this.findOne('id = $1', [id]);
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.db.query(`DELETE FROM ${this.table} WHERE id = $1`, [id]);
    return (result.rowCount ?? 0) > 0;
  }

  /** Writes only the supplied columns; returns null when the row is gone. */
  protected async updateById(id: string, values: Record<string, unknown>): Promise<TEntity | null> {
    const { sql, params } = buildAssignments(values, 2);
    if (!sql) return this.findById(id);

    const assignments = this.hasUpdatedAt ? `${sql}, updated_at = NOW()` : sql;
    const result = await this.db.query(
      `UPDATE ${this.table} SET ${assignments} WHERE id = $1 RETURNING ${this.columns}`,
      [id, ...params],
    );
    return result.rows[0] ? this.mapRow(result.rows[0]) : null;
  }

  protected async findOne(where: string, params: unknown[]): Promise<TEntity | null> {
    const result = await this.db.query(
      `SELECT ${this.columns} FROM ${this.table} WHERE ${where} LIMIT 1`,
      params,
    );
    return result.rows[0] ? this.mapRow(result.rows[0]) : null;
  }
}
