import { Pool } from 'pg';
import config from './config';
import logger from './logger';

/** Minimal query surface shared by `pg.Pool`, `pg.PoolClient` and test fakes. */
export interface Queryable {
  query(text: string, params?: unknown[]): Promise<{ rows: unknown[] }>;
}

export interface PoolLike extends Queryable {
  connect(): Promise<Queryable & { release(): void }>;
  end(): Promise<void>;
}

function createPool(): Pool {
  return new Pool({
    host: config.db.host,
    port: config.db.port,
    user: config.db.user,
    password: config.db.password,
    database: config.db.database,
  });
}

let pool: Pool | null = null;

export function getPool(): Pool {
  if (!pool) {
    pool = createPool();
  }
  return pool;
}

export async function query(
  text: string,
  params?: unknown[],
  client: Queryable = getPool(),
): Promise<{ rows: unknown[] }> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new Error('DB query timed out'));
    }, config.db.queryTimeoutMs);
  });

  try {
    const result = await Promise.race([client.query(text, params), timeout]);
    return { rows: result.rows };
  } catch (err) {
    logger.error({ err }, '[db] query failed');
    throw err;
  } finally {
    clearTimeout(timer);
  }
}
