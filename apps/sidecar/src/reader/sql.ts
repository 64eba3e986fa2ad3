import { z } from 'zod';
import { ldbTableName, type KeyArg, type ReadContext, type Reader, type Row, type RowCursor } from './types.js';

export interface SqlCursor {
  read(maxRows: number): Promise<Row[]>;
  close(): Promise<void>;
}

/** The slice of a SQL connection pool the replica reader needs. */
export interface SqlSource {
  query(text: string, values?: unknown[]): Promise<Row[]>;
  cursor(text: string, values?: unknown[]): Promise<SqlCursor>;
}

export type DBColumnInfo = {
  tableName: string;
  index: number;
  columnName: string;
  dataType: string;
  isPrimaryKey: boolean;
  keyIndex: number | null;
};

export const COLUMN_INFO_SQL =
  'SELECT c.table_name, c.ordinal_position, c.column_name, c.data_type, kcu.ordinal_position AS key_position ' +
  'FROM information_schema.columns c ' +
  'LEFT JOIN information_schema.table_constraints tc ' +
  "ON tc.table_schema = c.table_schema AND tc.table_name = c.table_name AND tc.constraint_type = 'PRIMARY KEY' " +
  'LEFT JOIN information_schema.key_column_usage kcu ' +
  'ON kcu.constraint_schema = tc.constraint_schema AND kcu.constraint_name = tc.constraint_name ' +
  'AND kcu.table_name = c.table_name AND kcu.column_name = c.column_name ' +
  'WHERE c.table_name = ANY($1) AND c.table_schema = current_schema() ' +
  'ORDER BY c.table_name, c.ordinal_position ASC';

export const LEDGER_LATENCY_SQL = 'SELECT "timestamp" FROM "_ldb_last_update" WHERE "name" = $1';

const LDB_UPDATE_NAME = 'ldb';

const columnInfoRowSchema = z.object({
  table_name: z.string(),
  ordinal_position: z.coerce.number().int(),
  column_name: z.string(),
  data_type: z.string(),
  key_position: z.coerce.number().int().nullable(),
});

const lastUpdateRowSchema = z.object({
  timestamp: z.coerce.date(),
});

const NAME_RE = /^[a-z][a-z0-9_]*$/;

export async function getColumnInfo(source: SqlSource, tableNames: string[]): Promise<DBColumnInfo[]> {
  if (tableNames.length === 0) return [];

  const rows = await source.query(COLUMN_INFO_SQL, [tableNames]);
  return rows.map((raw) => {
    const row = columnInfoRowSchema.parse(raw);
    return {
      tableName: row.table_name,
      index: row.ordinal_position,
      columnName: row.column_name,
      dataType: row.data_type,
      isPrimaryKey: row.key_position !== null,
      keyIndex: row.key_position,
    };
  });
}

export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function assertName(kind: 'family' | 'table', value: string): void {
  if (!NAME_RE.test(value)) throw new Error(`invalid ${kind} name "${value}"`);
}

function keyPredicate(columns: string[]): string {
  return columns.map((column, i) => `${quoteIdent(column)} = $${i + 1}`).join(' AND ');
}

function toSqlValue(value: KeyArg): unknown {
  if (value instanceof Uint8Array && !Buffer.isBuffer(value)) {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength);
  }
  return value;
}

function keyLengthError(table: string, got: number, want: number): Error {
  return new Error(`key has ${got} segments, ${table} has ${want} primary key columns`);
}

export type SqlReaderOptions = {
  scanBatchSize?: number;
  now?: () => number;
};

/** Reader over a SQL replica, where each family/table lives in a `family___table` table. */
export function createSqlReader(source: SqlSource, opts: SqlReaderOptions = {}): Reader {
  const scanBatchSize = opts.scanBatchSize ?? 100;
  const now = opts.now ?? Date.now;
  const keyColumnsByTable = new Map<string, Promise<string[]>>();

  async function loadKeyColumns(table: string): Promise<string[]> {
    const info = await getColumnInfo(source, [table]);
    if (info.length === 0) throw new Error(`table not found: ${table}`);

    const keys = info
      .filter((c) => c.isPrimaryKey)
      .sort((a, b) => (a.keyIndex ?? 0) - (b.keyIndex ?? 0))
      .map((c) => c.columnName);
    if (keys.length === 0) throw new Error(`table has no primary key: ${table}`);
    return keys;
  }

  function keyColumns(table: string): Promise<string[]> {
    const cached = keyColumnsByTable.get(table);
    if (cached) return cached;

    const pending = loadKeyColumns(table);
    keyColumnsByTable.set(table, pending);
    // Failed lookups are retried on the next request.
    void pending.catch(() => keyColumnsByTable.delete(table));
    return pending;
  }

  async function resolveTable(ctx: ReadContext, family: string, table: string) {
    assertName('family', family);
    assertName('table', table);
    ctx.signal.throwIfAborted();
    const name = ldbTableName(family, table);
    return { name, keys: await keyColumns(name) };
  }

  return {
    async lookupByKey(ctx, family, table, ...key) {
      const { name, keys } = await resolveTable(ctx, family, table);
      if (key.length !== keys.length) throw keyLengthError(name, key.length, keys.length);

      ctx.signal.throwIfAborted();
      const rows = await source.query(
        `SELECT * FROM ${quoteIdent(name)} WHERE ${keyPredicate(keys)} LIMIT 1`,
        key.map(toSqlValue),
      );
      return rows[0];
    },

    async scanByKeyPrefix(ctx, family, table, ...key) {
      const { name, keys } = await resolveTable(ctx, family, table);
      if (key.length > keys.length) throw keyLengthError(name, key.length, keys.length);

      const where = key.length > 0 ? ` WHERE ${keyPredicate(keys.slice(0, key.length))}` : '';
      const orderBy = keys.map(quoteIdent).join(', ');

      ctx.signal.throwIfAborted();
      const cursor = await source.cursor(
        `SELECT * FROM ${quoteIdent(name)}${where} ORDER BY ${orderBy}`,
        key.map(toSqlValue),
      );
      return batchedCursor(ctx, cursor, scanBatchSize);
    },

    async ledgerLatency(ctx) {
      ctx.signal.throwIfAborted();
      const rows = await source.query(LEDGER_LATENCY_SQL, [LDB_UPDATE_NAME]);
      const [first] = rows;
      if (!first) throw new Error('no ledger updates have been received yet');
      const { timestamp } = lastUpdateRowSchema.parse(first);
      return now() - timestamp.getTime();
    },
  };
}

function batchedCursor(ctx: ReadContext, cursor: SqlCursor, batchSize: number): RowCursor {
  let buffered: Row[] = [];
  let exhausted = false;
  let closed = false;

  return {
    async next() {
      if (closed) throw new Error('cursor is closed');
      if (buffered.length === 0 && !exhausted) {
        ctx.signal.throwIfAborted();
        buffered = await cursor.read(batchSize);
        if (buffered.length < batchSize) exhausted = true;
      }
      return buffered.shift();
    },
    async close() {
      if (closed) return;
      closed = true;
      await cursor.close();
    },
  };
}
