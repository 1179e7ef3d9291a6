import { Pool, QueryResult, QueryResultRow } from 'pg';
import { AppConfig } from './environment';

export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<QueryResult<R>>;
}

/**
 * Persistence context handed to every service function.
 *
 * `transaction` checks a client out of the pool and runs `work` between
 * BEGIN and COMMIT, rolling back if it throws.
 */
export interface Database extends Queryable {
  transaction<T>(work: (client: Queryable) => Promise<T>): Promise<T>;
}

export const createPool = (config: AppConfig): Pool => {
  const { database } = config;

  const pool = new Pool(
    database.connectionString
      ? { connectionString: database.connectionString, max: database.poolMax }
      : {
          host: database.host,
          port: database.port,
          database: database.name,
          user: database.user,
          password: database.password,
          max: database.poolMax
        }
  );

  pool.on('error', (error) => {
    console.error('Unexpected database pool error:', error);
  });

  return pool;
};

export const createDatabase = (pool: Pool): Database => ({
  query: <R extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]) =>
    pool.query<R>(text, params),

  transaction: async <T>(work: (client: Queryable) => Promise<T>): Promise<T> => {
    const client = await pool.connect();

    try {
      await client.query('BEGIN');
      const result = await work({
        query: <R extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]) =>
          client.query<R>(text, params)
      });
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }
});
