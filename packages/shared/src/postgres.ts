import { Pool, type PoolClient, type PoolConfig } from 'pg';

export type PostgresErrorLogger = (err: Error, message: string) => void;

export interface PostgresPoolOptions extends PoolConfig {
  onError?: PostgresErrorLogger;
}

export interface PostgresHelpers {
  withConnection<T>(fn: (client: PoolClient) => Promise<T>): Promise<T>;
  closePool(): Promise<void>;
}

export function createPostgresPool(options: PostgresPoolOptions = {}): PostgresHelpers {
  const { onError, ...poolConfig } = options;
  const report: PostgresErrorLogger =
    onError ??
    ((err, message) => {
      console.error(`[postgres] ${message}`, err);
    });
  const pool = new Pool(poolConfig);
  let closing: Promise<void> | null = null;

  pool.on('error', (err: Error) => {
    report(err, 'unexpected error on idle client');
  });

  async function withConnection<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await pool.connect();
    try {
      return await fn(client);
    } finally {
      client.release();
    }
  }

  // pg rejects a second end(); repeated shutdown hooks share the first call.
  function closePool(): Promise<void> {
    if (!closing) {
      closing = pool.end();
    }
    return closing;
  }

  return {
    withConnection,
    closePool
  };
}
