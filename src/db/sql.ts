// =============================================================================
// RAMPART — SQL statement builders
//
// Column lists come from fixed per-table maps, never from caller input, so
// only values travel as parameters.
// =============================================================================

export interface TableMeta {
  table: string;
  /** entity field -> column */
  columns: Readonly<Record<string, string>>;
  /** Fields stored as JSONB */
  json?: readonly string[];
}

export interface Statement {
  text: string;
  values: unknown[];
}

const BASE_COLUMNS = {
  id: 'id',
  createdAt: 'created_at',
  updatedAt: 'updated_at',
  isDeleted: 'is_deleted',
  deletedAt: 'deleted_at',
  metadata: 'metadata',
} as const;

export function table(
  name: string,
  columns: Record<string, string>,
  json: readonly string[] = []
): TableMeta {
  return { table: name, columns: { ...BASE_COLUMNS, ...columns }, json: ['metadata', ...json] };
}

function toParam(meta: TableMeta, field: string, value: unknown): unknown {
  if (value === undefined || value === null) return null;
  if (meta.json?.includes(field)) return JSON.stringify(value);
  return value;
}

export function insertSql(meta: TableMeta, entity: object): Statement {
  const columns: string[] = [];
  const values: unknown[] = [];
  for (const [field, value] of Object.entries(entity)) {
    const column = meta.columns[field];
    if (!column) continue;
    columns.push(column);
    values.push(toParam(meta, field, value));
  }
  const placeholders = values.map((_, i) => `$${i + 1}`).join(', ');
  return {
    text: `INSERT INTO ${meta.table} (${columns.join(', ')}) VALUES (${placeholders}) RETURNING *`,
    values,
  };
}

export function updateSql(meta: TableMeta, id: string, patch: object): Statement {
  const sets: string[] = [];
  const values: unknown[] = [id];
  for (const [field, value] of Object.entries(patch)) {
    const column = meta.columns[field];
    if (!column || field === 'id' || value === undefined) continue;
    values.push(toParam(meta, field, value));
    sets.push(`${column} = $${values.length}`);
  }
  if (sets.length === 0) {
    return { text: `SELECT * FROM ${meta.table} WHERE id = $1`, values };
  }
  return {
    text: `UPDATE ${meta.table} SET ${sets.join(', ')} WHERE id = $1 RETURNING *`,
    values,
  };
}
