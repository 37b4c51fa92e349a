import pg from 'pg';

export type SqlRow = Record<string, unknown>;

export interface SqlResult {
  rows: SqlRow[];
  rowCount: number | null;
}

export interface SqlClient {
  query(sql: string, values?: unknown[]): Promise<SqlResult>;
  // passing an error destroys the connection instead of returning it to the pool
  release(error?: Error): void;
}

// the slice of pg.Pool the store needs; tests substitute an in-process fake
export interface SqlPool {
  connect(): Promise<SqlClient>;
  end(): Promise<void>;
}

export interface PgPoolConfig {
  connectionString: string;
  maxConnections: number;
  timeoutMs: number;
}

export function createPgPool(config: PgPoolConfig): SqlPool {
  const pool = new pg.Pool({
    connectionString: config.connectionString,
    max: config.maxConnections,
    connectionTimeoutMillis: config.timeoutMs,
    query_timeout: config.timeoutMs,
    statement_timeout: config.timeoutMs,
  });

  return {
    async connect() {
      const client = await pool.connect();
      return {
        async query(sql, values) {
          const result = await client.query(sql, values);
          return { rows: result.rows, rowCount: result.rowCount };
        },
        release(error) {
          client.release(error);
        },
      };
    },
    end() {
      return pool.end();
    },
  };
}
