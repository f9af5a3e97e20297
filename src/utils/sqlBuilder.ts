/**
 * Type-Safe SQL Update Builder
 *
 * Builds partial UPDATE statements from an allowlist of column names, so that
 * request-derived keys can never reach the SQL text.
 */

import { ValidationError, DatabaseError, ErrorCode } from '../errors/index.js';
import { SqlParam } from '../types/database.js';

export interface UpdateBuilderResult {
  query: string;
  values: SqlParam[];
}

export interface UpdateQueryOptions {
  /** Column set to CURRENT_TIMESTAMP whenever anything else changes */
  touchColumn?: string;
}

/**
 * Builds a partial UPDATE query. Columns whose value is `undefined` are left
 * unchanged; `null` is written as NULL.
 *
 * @example
 * ```typescript
 * const result = buildUpdateQuery(
 *   'lists',
 *   ['name', 'is_public'],
 *   { name: 'Favorites', is_public: undefined },
 *   'id = ?',
 *   [12],
 *   { touchColumn: 'updated_at' }
 * );
 * // result.query: "UPDATE lists SET name = ?, updated_at = CURRENT_TIMESTAMP WHERE id = ?"
 * // result.values: ['Favorites', 12]
 * ```
 */
export function buildUpdateQuery<C extends string>(
  table: string,
  allowedColumns: readonly C[],
  updates: Partial<Record<C, SqlParam>>,
  whereClause: string,
  whereValues: SqlParam[],
  options: UpdateQueryOptions = {}
): UpdateBuilderResult {
  const updateColumns: string[] = [];
  const updateValues: SqlParam[] = [];

  for (const column of allowedColumns) {
    const value = updates[column];
    if (value === undefined) {
      continue;
    }
    updateColumns.push(`${column} = ?`);
    updateValues.push(value);
  }

  if (updateColumns.length === 0) {
    throw new ValidationError('No fields to update', {
      service: 'sqlBuilder',
      operation: 'buildUpdateQuery',
      metadata: { table, allowedColumns: [...allowedColumns] },
    });
  }

  if (!whereClause.includes('?')) {
    throw new DatabaseError(
      'WHERE clause must use parameterized placeholders (?)',
      ErrorCode.DATABASE_QUERY_FAILED,
      false,
      {
        service: 'sqlBuilder',
        operation: 'buildUpdateQuery',
        metadata: { table, whereClause },
      }
    );
  }

  if (options.touchColumn) {
    updateColumns.push(`${options.touchColumn} = CURRENT_TIMESTAMP`);
  }

  const query = `UPDATE ${table} SET ${updateColumns.join(', ')} WHERE ${whereClause}`;

  return { query, values: [...updateValues, ...whereValues] };
}
