import fs from 'fs';
import path from 'path';
import type { PoolLike, Queryable } from './db';
import logger from './logger';

type Direction = 'up' | 'down';

interface RunMigrationsOptions {
  direction?: Direction;
  to?: string | null;
  client: Queryable | PoolLike;
  searchPath?: string;
  migrationsDir?: string;
}

interface MigrationFile {
  version: string;
  upPath: string;
  downPath: string;
}

export interface MigrationState {
  ok: boolean;
  applied: string[];
  pending: string[];
}

function resolveMigrationsDir() {
  const distPath = path.join(__dirname, '..', 'migrations');
  if (fs.existsSync(distPath)) return distPath;
  const rootPath = path.join(__dirname, '..', '..', 'migrations');
  if (fs.existsSync(rootPath)) return rootPath;
  throw new Error('[migrations] migrations directory not found');
}

function loadMigrations(dir = resolveMigrationsDir()): MigrationFile[] {
  const migrationNames = fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql') && !f.endsWith('.down.sql'))
    .map((f) => f.replace(/\.sql$/, ''))
    .sort();

  return migrationNames.map((version) => ({
    version,
    upPath: path.join(dir, `${version}.sql`),
    downPath: path.join(dir, `${version}.down.sql`),
  }));
}

function isPool(client: Queryable | PoolLike): client is PoolLike {
  return 'connect' in client && typeof client.connect === 'function';
}

async function withClient<T>(
  provided: Queryable | PoolLike,
  fn: (client: Queryable) => Promise<T>,
): Promise<T> {
  if (!isPool(provided)) {
    return fn(provided);
  }
  const client = await provided.connect();
  try {
    return await fn(client);
  } finally {
    client.release();
  }
}

function versionOf(row: unknown): string | null {
  if (typeof row === 'object' && row !== null && 'version' in row && typeof row.version === 'string') {
    return row.version;
  }
  return null;
}

async function appliedVersions(client: Queryable): Promise<string[]> {
  const result = await client.query(
    'SELECT version FROM schema_migrations ORDER BY applied_at DESC, version DESC',
  );
  return result.rows.map(versionOf).filter((v): v is string => v !== null);
}

async function ensureMigrationsTable(client: Queryable) {
  await client.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);
}

async function inTransaction(client: Queryable, searchPath: string | undefined, fn: () => Promise<void>) {
  await client.query('BEGIN');
  try {
    if (searchPath) {
      await client.query(`SET LOCAL search_path TO ${searchPath}`);
    }
    await fn();
    await client.query('COMMIT');
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  }
}

export async function getMigrationState(
  options: Pick<RunMigrationsOptions, 'client' | 'migrationsDir'>,
): Promise<MigrationState> {
  const migrations = loadMigrations(options.migrationsDir);
  return withClient(options.client, async (client) => {
    await ensureMigrationsTable(client);
    const applied = new Set(await appliedVersions(client));
    return {
      ok: migrations.every((m) => applied.has(m.version)),
      applied: migrations.filter((m) => applied.has(m.version)).map((m) => m.version),
      pending: migrations.filter((m) => !applied.has(m.version)).map((m) => m.version),
    };
  });
}

export async function runMigrations(options: RunMigrationsOptions): Promise<void> {
  const direction: Direction = options.direction ?? 'up';
  const to = options.to ?? null;
  const migrations = loadMigrations(options.migrationsDir);

  await withClient(options.client, async (client) => {
    if (options.searchPath) {
      await client.query(`SET search_path TO ${options.searchPath}`);
    }
    await ensureMigrationsTable(client);

    if (direction === 'up') {
      for (const migration of migrations) {
        const applied = await client.query(
          'SELECT version FROM schema_migrations WHERE version = $1',
          [migration.version],
        );
        if (applied.rows.length > 0) continue;

        const sql = fs.readFileSync(migration.upPath, 'utf-8');
        await inTransaction(client, options.searchPath, async () => {
          await client.query(sql);
          await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [migration.version]);
        });
        logger.info('[migrations] applied', { migration: migration.version });
      }
      return;
    }

    const appliedSet = new Set(await appliedVersions(client));
    const toRollback = migrations
      .filter((m) => appliedSet.has(m.version))
      .sort((a, b) => b.version.localeCompare(a.version));

    for (const migration of toRollback) {
      if (to && migration.version <= to) {
        break;
      }
      if (!fs.existsSync(migration.downPath)) {
        throw new Error(`[migrations] missing down script for ${migration.version}`);
      }
      const sql = fs.readFileSync(migration.downPath, 'utf-8');
      await inTransaction(client, options.searchPath, async () => {
        await client.query(sql);
        await client.query('DELETE FROM schema_migrations WHERE version = $1', [migration.version]);
      });
      logger.warn('[migrations] rolled back', { migration: migration.version });

      if (!to) {
        // Default rollback only the latest migration
        break;
      }
    }
  });
}
