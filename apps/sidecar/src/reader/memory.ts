import { isDeepStrictEqual } from 'node:util';
import { ldbTableName, type KeyArg, type ReadContext, type Reader, type Row, type RowCursor } from './types.js';

export type MemoryTable = {
  keyColumns: string[];
  rows: Row[];
};

function keyValueEquals(a: unknown, b: unknown): boolean {
  if (a instanceof Uint8Array && b instanceof Uint8Array) return Buffer.compare(a, b) === 0;
  return isDeepStrictEqual(a, b);
}

function compareKeyValues(a: unknown, b: unknown): number {
  if (a instanceof Uint8Array && b instanceof Uint8Array) return Buffer.compare(a, b);
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const sa = String(a);
  const sb = String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

function matchesPrefix(row: Row, keyColumns: string[], key: KeyArg[]): boolean {
  return key.every((value, i) => {
    const column = keyColumns[i];
    return column !== undefined && keyValueEquals(row[column], value);
  });
}

/**
 * Reader over tables held in memory. Used by tests and for running the sidecar
 * without a replica.
 */
export class MemoryReader implements Reader {
  private readonly tables = new Map<string, MemoryTable>();
  private latency: number | Error = 0;
  private open = 0;

  constructor(opts: { ledgerLatencyMs?: number } = {}) {
    this.latency = opts.ledgerLatencyMs ?? 0;
  }

  putTable(family: string, table: string, def: MemoryTable): void {
    this.tables.set(ldbTableName(family, table), def);
  }

  /** Sets the value (ms) or failure the next latency queries report. */
  setLedgerLatency(value: number | Error): void {
    this.latency = value;
  }

  /** Cursors handed out and not yet closed. */
  get openCursors(): number {
    return this.open;
  }

  async lookupByKey(ctx: ReadContext, family: string, table: string, ...key: KeyArg[]): Promise<Row | undefined> {
    ctx.signal.throwIfAborted();
    const def = this.table(family, table);
    if (key.length !== def.keyColumns.length) {
      throw new Error(
        `key has ${key.length} segments, ${ldbTableName(family, table)} has ${def.keyColumns.length} primary key columns`,
      );
    }
    const row = def.rows.find((r) => matchesPrefix(r, def.keyColumns, key));
    return row ? { ...row } : undefined;
  }

  async scanByKeyPrefix(ctx: ReadContext, family: string, table: string, ...key: KeyArg[]): Promise<RowCursor> {
    ctx.signal.throwIfAborted();
    const def = this.table(family, table);
    if (key.length > def.keyColumns.length) {
      throw new Error(
        `key has ${key.length} segments, ${ldbTableName(family, table)} has ${def.keyColumns.length} primary key columns`,
      );
    }

    const rows = def.rows
      .filter((r) => matchesPrefix(r, def.keyColumns, key))
      .sort((a, b) => {
        for (const column of def.keyColumns) {
          const c = compareKeyValues(a[column], b[column]);
          if (c !== 0) return c;
        }
        return 0;
      });

    this.open++;
    let index = 0;
    let closed = false;
    return {
      next: async () => {
        if (closed) throw new Error('cursor is closed');
        ctx.signal.throwIfAborted();
        const row = rows[index++];
        return row ? { ...row } : undefined;
      },
      close: async () => {
        if (closed) return;
        closed = true;
        this.open--;
      },
    };
  }

  async ledgerLatency(ctx: ReadContext): Promise<number> {
    ctx.signal.throwIfAborted();
    if (this.latency instanceof Error) throw this.latency;
    return this.latency;
  }

  private table(family: string, table: string): MemoryTable {
    const name = ldbTableName(family, table);
    const def = this.tables.get(name);
    if (!def) throw new Error(`table not found: ${name}`);
    return def;
  }
}
