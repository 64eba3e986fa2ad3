import { describe, expect, it, vi } from 'vitest';
import { buildApp } from '../app.js';
import { MemoryReader } from '../reader/memory.js';
import type { Reader, Row, RowCursor } from '../reader/types.js';
import { RowLimitExceededError } from '../errors.js';
import { collectRows, NOT_FOUND_HEADER } from './rows.js';

function stubReader(parts: Partial<Reader> = {}) {
  return {
    lookupByKey: vi.fn<Reader['lookupByKey']>(parts.lookupByKey),
    scanByKeyPrefix: vi.fn<Reader['scanByKeyPrefix']>(parts.scanByKeyPrefix),
    ledgerLatency: vi.fn<Reader['ledgerLatency']>(parts.ledgerLatency),
  };
}

function cursorOf(rows: Row[], opts: { failAt?: number } = {}) {
  let index = 0;
  const next = vi.fn(async (): Promise<Row | undefined> => {
    if (opts.failAt === index) throw new Error('replica connection reset');
    return rows[index++];
  });
  const close = vi.fn(async () => undefined);
  const cursor: RowCursor = { next, close };
  return { cursor, next, close };
}

function post(url: string, payload: string) {
  return { method: 'POST' as const, url, payload, headers: { 'content-type': 'application/json' } };
}

describe('POST /get-row-by-key/:family/:table', () => {
  it('returns 500 for a malformed body without calling the reader', async () => {
    const reader = stubReader();
    const app = await buildApp({ reader }, { logger: false });

    const res = await app.inject(post('/get-row-by-key/users/accounts', '{"Key": ['));

    expect(res.statusCode).toBe(500);
    expect(res.body).toMatch(/^decode body: /);
    expect(reader.lookupByKey).not.toHaveBeenCalled();
    await app.close();
  });

  it('returns 404 with the marker header and an empty body on a miss', async () => {
    const reader = stubReader({ lookupByKey: async () => undefined });
    const app = await buildApp({ reader }, { logger: false });

    const res = await app.inject(post('/get-row-by-key/users/accounts', '{"Key":[{"Value":7}]}'));

    expect(res.statusCode).toBe(404);
    expect(res.headers[NOT_FOUND_HEADER]).toBe('Not Found');
    expect(res.body).toBe('');
    await app.close();
  });

  it('returns the row as JSON when found', async () => {
    const reader = stubReader({ lookupByKey: async () => ({ id: 42, name: 'Bob' }) });
    const app = await buildApp({ reader }, { logger: false });

    const res = await app.inject(post('/get-row-by-key/users/accounts', '{"Key":[{"Value":42}]}'));

    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toContain('application/json');
    expect(res.body).toBe('{"id":42,"name":"Bob"}');
    await app.close();
  });

  it('passes family, table and key segments to the reader in order', async () => {
    const reader = stubReader({ lookupByKey: async () => undefined });
    const app = await buildApp({ reader }, { logger: false });

    await app.inject(
      post('/get-row-by-key/users/accounts', '{"Key":[{"Value":"tenant-1"},{"Value":5},{"Value":"x","Binary":"AQID"}]}'),
    );

    expect(reader.lookupByKey).toHaveBeenCalledTimes(1);
    expect(reader.lookupByKey).toHaveBeenCalledWith(
      expect.objectContaining({ signal: expect.any(AbortSignal) }),
      'users',
      'accounts',
      'tenant-1',
      5,
      Buffer.from([1, 2, 3]),
    );
    await app.close();
  });

  it('returns 500 with the reader message verbatim when the lookup fails', async () => {
    const reader = stubReader({
      lookupByKey: async () => {
        throw new Error('table not found: users___missing');
      },
    });
    const app = await buildApp({ reader }, { logger: false });

    const res = await app.inject(post('/get-row-by-key/users/missing', '{"Key":[]}'));

    expect(res.statusCode).toBe(500);
    expect(res.headers['content-type']).toBe('text/plain; charset=utf-8');
    expect(res.body).toBe('table not found: users___missing');
    expect(res.headers[NOT_FOUND_HEADER]).toBeUndefined();
    await app.close();
  });

  it('encodes binary column values as base64', async () => {
    const reader = new MemoryReader();
    reader.putTable('files', 'blobs', {
      keyColumns: ['id'],
      rows: [{ id: 'a', data: Buffer.from('hi') }],
    });
    const app = await buildApp({ reader }, { logger: false });

    const res = await app.inject(post('/get-row-by-key/files/blobs', '{"Key":[{"Value":"a"}]}'));

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ id: 'a', data: 'aGk=' });
    await app.close();
  });
});

describe('POST /get-rows-by-key-prefix/:family/:table', () => {
  it('returns 500 for a malformed body without calling the reader', async () => {
    const reader = stubReader();
    const app = await buildApp({ reader }, { logger: false });

    const res = await app.inject(post('/get-rows-by-key-prefix/users/accounts', 'not json'));

    expect(res.statusCode).toBe(500);
    expect(reader.scanByKeyPrefix).not.toHaveBeenCalled();
    await app.close();
  });

  it('returns 500 when the row ceiling is exceeded and sends no rows', async () => {
    const { cursor, next, close } = cursorOf([
      { id: 1, name: 'first-row' },
      { id: 2, name: 'second-row' },
      { id: 3, name: 'third-row' },
    ]);
    const reader = stubReader({ scanByKeyPrefix: async () => cursor });
    const app = await buildApp({ reader, maxRows: 2 }, { logger: false });

    const res = await app.inject(post('/get-rows-by-key-prefix/users/accounts', '{"Key":[]}'));

    expect(res.statusCode).toBe(500);
    expect(res.body).toBe('max row count (2) exceeded');
    expect(res.body).not.toContain('-row');
    // The row past the ceiling is read before the scan is rejected.
    expect(next).toHaveBeenCalledTimes(3);
    expect(close).toHaveBeenCalledTimes(1);
    await app.close();
  });

  it('returns every row in cursor order when the ceiling is not exceeded', async () => {
    const { cursor, close } = cursorOf([
      { id: 2, name: 'b' },
      { id: 1, name: 'a' },
    ]);
    const reader = stubReader({ scanByKeyPrefix: async () => cursor });
    const app = await buildApp({ reader, maxRows: 2 }, { logger: false });

    const res = await app.inject(post('/get-rows-by-key-prefix/users/accounts', '{"Key":[]}'));

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual([
      { id: 2, name: 'b' },
      { id: 1, name: 'a' },
    ]);
    expect(close).toHaveBeenCalledTimes(1);
    await app.close();
  });

  it('returns an empty array when nothing matches', async () => {
    const { cursor, close } = cursorOf([]);
    const reader = stubReader({ scanByKeyPrefix: async () => cursor });
    const app = await buildApp({ reader }, { logger: false });

    const res = await app.inject(post('/get-rows-by-key-prefix/users/accounts', '{"Key":[{"Value":"none"}]}'));

    expect(res.statusCode).toBe(200);
    expect(res.body).toBe('[]');
    expect(close).toHaveBeenCalledTimes(1);
    await app.close();
  });

  it('closes the cursor once when iteration fails midway', async () => {
    const { cursor, close } = cursorOf([{ id: 1 }, { id: 2 }], { failAt: 1 });
    const reader = stubReader({ scanByKeyPrefix: async () => cursor });
    const app = await buildApp({ reader }, { logger: false });

    const res = await app.inject(post('/get-rows-by-key-prefix/users/accounts', '{"Key":[]}'));

    expect(res.statusCode).toBe(500);
    expect(res.body).toBe('replica connection reset');
    expect(close).toHaveBeenCalledTimes(1);
    await app.close();
  });

  it('returns 500 with the reader message when the scan cannot start', async () => {
    const reader = stubReader({
      scanByKeyPrefix: async () => {
        throw new Error('key has 3 segments, users___accounts has 2 primary key columns');
      },
    });
    const app = await buildApp({ reader }, { logger: false });

    const res = await app.inject(
      post('/get-rows-by-key-prefix/users/accounts', '{"Key":[{"Value":1},{"Value":2},{"Value":3}]}'),
    );

    expect(res.statusCode).toBe(500);
    expect(res.body).toBe('key has 3 segments, users___accounts has 2 primary key columns');
    await app.close();
  });

  it('scans the in-memory reader by key prefix and leaves no cursor open', async () => {
    const reader = new MemoryReader();
    reader.putTable('users', 'accounts', {
      keyColumns: ['tenant', 'id'],
      rows: [
        { tenant: 't1', id: 2, name: 'carol' },
        { tenant: 't2', id: 1, name: 'dave' },
        { tenant: 't1', id: 1, name: 'alice' },
      ],
    });
    const app = await buildApp({ reader, maxRows: 10 }, { logger: false });

    const res = await app.inject(post('/get-rows-by-key-prefix/users/accounts', '{"Key":[{"Value":"t1"}]}'));

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual([
      { tenant: 't1', id: 1, name: 'alice' },
      { tenant: 't1', id: 2, name: 'carol' },
    ]);
    expect(reader.openCursors).toBe(0);
    await app.close();
  });
});

describe('collectRows', () => {
  it('reports the configured ceiling on the limit error', async () => {
    const { cursor } = cursorOf([{ id: 1 }, { id: 2 }]);

    const err = await collectRows(cursor, 1).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RowLimitExceededError);
    expect(err).toMatchObject({ limit: 1, message: 'max row count (1) exceeded' });
  });

  it('passes iteration failures through with the reader message unchanged', async () => {
    const { cursor } = cursorOf([{ id: 1 }], { failAt: 0 });

    await expect(collectRows(cursor, 0)).rejects.toThrow(/^replica connection reset$/);
  });
});
