import { validate as isUuid } from 'uuid';
import type { Row } from '../rows';
import type { Statement, TableMeta } from '../sql';
import { insertSql, updateSql } from '../sql';

/** A bound query runner: pool for reads, a checked-out client inside a transaction */
export type Query = (text: string, values?: unknown[]) => Promise<Row[]>;

/** Keys bound to uuid columns; a malformed one can match no row */
export function wellFormed(...keys: (string | null)[]): boolean {
  return keys.every((key) => key === null || isUuid(key));
}

export async function one<T>(query: Query, statement: Statement, map: (row: Row) => T): Promise<T> {
  const rows = await query(statement.text, statement.values);
  if (rows.length === 0) throw new Error(`Statement returned no row: ${statement.text.slice(0, 60)}`);
  return map(rows[0]);
}

export async function maybeOne<T>(
  query: Query,
  text: string,
  values: unknown[],
  map: (row: Row) => T
): Promise<T | null> {
  const rows = await query(text, values);
  return rows.length > 0 ? map(rows[0]) : null;
}

export async function many<T>(
  query: Query,
  text: string,
  values: unknown[],
  map: (row: Row) => T
): Promise<T[]> {
  const rows = await query(text, values);
  return rows.map(map);
}

export function insertOne<T>(query: Query, meta: TableMeta, entity: object, map: (row: Row) => T): Promise<T> {
  return one(query, insertSql(meta, entity), map);
}

export function updateOne<T>(
  query: Query,
  meta: TableMeta,
  id: string,
  patch: object,
  map: (row: Row) => T
): Promise<T> {
  return one(query, updateSql(meta, id, patch), map);
}
