import { getPool, PoolLike, query, Queryable } from '../db';
import { runMigrations } from '../migrations';
import { ArchiveQuery, ArchiveStore } from '../recorder/archiveStore';
import { ArchiveRecord } from '../types/wecs';

const ARCHIVE_COLUMNS = [
  'run_id',
  'seq',
  'time_s',
  'ts',
  'entity_id',
  'wind_speed_ms',
  'active_power_kw',
  'power_cap_kw',
] as const;

export function buildArchiveInsert(records: readonly ArchiveRecord[]): { text: string; params: unknown[] } {
  const params: unknown[] = [];
  const tuples = records.map((r) => {
    const base = params.length;
    params.push(
      r.runId,
      r.seq,
      r.time,
      r.timestamp,
      r.entityId,
      r.windSpeed,
      r.activePowerKw,
      r.powerCapKw,
    );
    const placeholders = ARCHIVE_COLUMNS.map((_, idx) => `$${base + idx + 1}`);
    return `(${placeholders.join(', ')})`;
  });
  return {
    text: `INSERT INTO wecs_archive (${ARCHIVE_COLUMNS.join(', ')}) VALUES ${tuples.join(', ')}`,
    params,
  };
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return null;
}

export function mapArchiveRow(row: unknown): ArchiveRecord {
  if (typeof row !== 'object' || row === null) {
    throw new Error('[archiveRepo] unexpected row shape');
  }
  const get = (key: string): unknown => (key in row ? Reflect.get(row, key) : undefined);
  const runId = get('run_id');
  const entityId = get('entity_id');
  const ts = get('ts');
  const seq = toNumber(get('seq'));
  const time = toNumber(get('time_s'));
  const windSpeed = toNumber(get('wind_speed_ms'));
  const activePowerKw = toNumber(get('active_power_kw'));
  const rawCap = get('power_cap_kw');
  const powerCapKw = rawCap === null ? null : toNumber(rawCap);
  const timestamp = ts instanceof Date ? ts.toISOString() : ts;

  if (
    typeof runId !== 'string' ||
    typeof entityId !== 'string' ||
    typeof timestamp !== 'string' ||
    seq === null ||
    time === null ||
    windSpeed === null ||
    activePowerKw === null ||
    (rawCap !== null && powerCapKw === null)
  ) {
    throw new Error('[archiveRepo] unexpected row shape');
  }
  return { runId, seq, time, timestamp, entityId, windSpeed, activePowerKw, powerCapKw };
}

/** Archive in PostgreSQL, one transaction per appended batch. */
export class PgArchiveStore implements ArchiveStore {
  readonly kind = 'postgres';

  constructor(private readonly pool: PoolLike = getPool()) {}

  async init(): Promise<void> {
    await runMigrations({ client: this.pool });
  }

  async append(records: readonly ArchiveRecord[]): Promise<void> {
    if (records.length === 0) return;
    const { text, params } = buildArchiveInsert(records);
    const client = await this.pool.connect();
    try {
      await query('BEGIN', [], client);
      try {
        await query(text, params, client);
        await query('COMMIT', [], client);
      } catch (err) {
        await query('ROLLBACK', [], client);
        throw err;
      }
    } finally {
      client.release();
    }
  }

  async read(filter: ArchiveQuery = {}): Promise<ArchiveRecord[]> {
    const clauses: string[] = [];
    const params: unknown[] = [];
    if (filter.runId !== undefined) {
      params.push(filter.runId);
      clauses.push(`run_id = $${params.length}`);
    }
    if (filter.entityId !== undefined) {
      params.push(filter.entityId);
      clauses.push(`entity_id = $${params.length}`);
    }
    const where = clauses.length ? `WHERE ${clauses.join(' AND ')}` : '';
    // id is a BIGSERIAL, so it follows append order across runs
    const base = `SELECT id, ${ARCHIVE_COLUMNS.join(', ')} FROM wecs_archive ${where}`;

    let text = `${base} ORDER BY id`;
    if (filter.limit !== undefined) {
      params.push(filter.limit);
      text = `SELECT * FROM (${base} ORDER BY id DESC LIMIT $${params.length}) recent ORDER BY id`;
    }
    const client: Queryable = this.pool;
    const result = await query(text, params, client);
    return result.rows.map(mapArchiveRow);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
