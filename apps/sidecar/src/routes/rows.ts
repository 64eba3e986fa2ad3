import type { FastifyInstance } from 'fastify';
import { RowLimitExceededError, wrapReaderError } from '../errors.js';
import { decodeReadRequest, toPositionalArgs, toWireRow } from '../keys.js';
import { withRowCursor, type Reader, type Row, type RowCursor } from '../reader/types.js';
import { callReader, readContext, type TableParams } from './context.js';

// Set on lookup misses so callers can tell them apart from an unknown route.
export const NOT_FOUND_HEADER = 'x-control-store';
export const NOT_FOUND_VALUE = 'Not Found';

export type RowRoutesOptions = {
  reader: Reader;
  /** 0 means unbounded. */
  maxRows: number;
};

/**
 * Drains the cursor into wire rows. The ceiling is checked after each append,
 * so a scan over the limit reads exactly one row past it before failing.
 */
export async function collectRows(cursor: RowCursor, maxRows: number): Promise<Row[]> {
  const rows: Row[] = [];
  for (;;) {
    let row: Row | undefined;
    try {
      row = await cursor.next();
    } catch (e) {
      throw wrapReaderError(null, e);
    }
    if (!row) return rows;

    rows.push(toWireRow(row));
    if (maxRows > 0 && rows.length > maxRows) {
      throw new RowLimitExceededError(maxRows);
    }
  }
}

export async function registerRowRoutes(app: FastifyInstance, opts: RowRoutesOptions) {
  const { reader, maxRows } = opts;

  app.post<{ Params: TableParams }>(
    '/get-row-by-key/:family/:table',
    { config: { op: 'get-row-by-key' } },
    async (req, reply) => {
      const { family, table } = req.params;
      const key = toPositionalArgs(decodeReadRequest(req.body));

      const row = await callReader(() => reader.lookupByKey(readContext(reply), family, table, ...key));
      if (!row) {
        return reply.header(NOT_FOUND_HEADER, NOT_FOUND_VALUE).status(404).send();
      }

      return reply.status(200).send(toWireRow(row));
    },
  );

  app.post<{ Params: TableParams }>(
    '/get-rows-by-key-prefix/:family/:table',
    { config: { op: 'get-rows-by-key-prefix' } },
    async (req, reply) => {
      const { family, table } = req.params;
      const key = toPositionalArgs(decodeReadRequest(req.body));

      const cursor = await callReader(() => reader.scanByKeyPrefix(readContext(reply), family, table, ...key));
      const rows = await withRowCursor(cursor, (c) => collectRows(c, maxRows));

      return reply.status(200).send(rows);
    },
  );
}
