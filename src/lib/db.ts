import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';

/** Anything that can run a parameterised statement: the pool or a client inside a transaction. */
export interface Queryable {
  query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export interface Database extends Queryable {
  transaction<T>(work: (tx: Queryable) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

function clientQueryable(client: PoolClient): Queryable {
  return {
    query: <R extends QueryResultRow>(text: string, values: unknown[] = []) => client.query<R>(text, values),
  };
}

export function createDatabase(options: { url: string; ssl: boolean }): Database {
  const pool = new Pool({
    connectionString: options.url,
    // Azure PostgreSQL requires TLS without a pinned CA
    ssl: options.ssl ? { rejectUnauthorized: false } : undefined,
  });

  return {
    query: <R extends QueryResultRow>(text: string, values: unknown[] = []) => pool.query<R>(text, values),

    async transaction<T>(work: (tx: Queryable) => Promise<T>): Promise<T> {
      const client = await pool.connect();
      try {
        await client.query('BEGIN');
        const result = await work(clientQueryable(client));
        await client.query('COMMIT');
        return result;
      } catch (err) {
        await client.query('ROLLBACK');
        throw err;
      } finally {
        client.release();
      }
    },

    close: () => pool.end(),
  };
}
