export type Row = Record<string, unknown>;

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** One positional primary-key value, as passed to the reader. */
export type KeyArg = Uint8Array | JsonValue;

export type ReadContext = {
  signal: AbortSignal;
};

/**
 * Lazy, forward-only sequence of rows from a prefix scan.
 *
 * `next()` resolves `undefined` once the scan is exhausted. The consumer owns the
 * cursor and must `close()` it exactly once; see {@link withRowCursor}.
 */
export interface RowCursor {
  next(): Promise<Row | undefined>;
  close(): Promise<void>;
}

/**
 * Read capability over the replicated control store.
 *
 * Implementations are shared across concurrent requests and must tolerate
 * concurrent calls.
 */
export interface Reader {
  lookupByKey(ctx: ReadContext, family: string, table: string, ...key: KeyArg[]): Promise<Row | undefined>;
  scanByKeyPrefix(ctx: ReadContext, family: string, table: string, ...key: KeyArg[]): Promise<RowCursor>;
  /** Replication lag of the local replica, in milliseconds. */
  ledgerLatency(ctx: ReadContext): Promise<number>;
}

export async function withRowCursor<T>(cursor: RowCursor, fn: (cursor: RowCursor) => Promise<T>): Promise<T> {
  try {
    return await fn(cursor);
  } finally {
    await cursor.close();
  }
}

export function ldbTableName(family: string, table: string): string {
  return `${family}___${table}`;
}
