import { Pool } from 'pg';
import Cursor from 'pg-cursor';
import type { SqlSource } from './sql.js';
import type { Row } from './types.js';

export function createPgPool(connectionString: string): Pool {
  const schemaFromUrl = (() => {
    try {
      return new URL(connectionString).searchParams.get('schema');
    } catch {
      return null;
    }
  })();

  // `?schema=` is not understood by the pg driver itself; map it onto search_path.
  return new Pool({
    connectionString,
    options: schemaFromUrl ? `-c search_path=${schemaFromUrl}` : undefined,
  });
}

/**
 * Adapts a pg pool to {@link SqlSource}. Each cursor holds one pooled client
 * until it is closed.
 */
export function pgSqlSource(pool: Pool): SqlSource {
  return {
    async query(text, values) {
      const result = await pool.query<Row>(text, values);
      return result.rows;
    },

    async cursor(text, values) {
      const client = await pool.connect();
      const cursor = client.query(new Cursor<Row>(text, values));
      let released = false;

      return {
        read: (maxRows) => cursor.read(maxRows),
        async close() {
          if (released) return;
          released = true;
          try {
            await cursor.close();
            client.release();
          } catch (e) {
            // A client whose cursor failed to close is not safe to reuse.
            client.release(e instanceof Error ? e : true);
            throw e;
          }
        },
      };
    },
  };
}
