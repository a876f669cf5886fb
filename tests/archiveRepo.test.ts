import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { buildArchiveInsert, mapArchiveRow, PgArchiveStore } from '../src/repositories/archiveRepo';
import { ArchiveRecord } from '../src/types/wecs';

const records: ArchiveRecord[] = [
  {
    runId: 'run-1',
    seq: 1,
    time: 0,
    timestamp: '2015-12-31T23:00:00.000Z',
    entityId: 'wecs-0',
    windSpeed: 5,
    activePowerKw: 1.25,
    powerCapKw: null,
  },
  {
    runId: 'run-1',
    seq: 2,
    time: 0,
    timestamp: '2015-12-31T23:00:00.000Z',
    entityId: 'wecs-1',
    windSpeed: 10,
    activePowerKw: 5,
    powerCapKw: 5,
  },
];

/** Keeps committed rows in memory the way the wecs_archive table would. */
class FakeClient {
  statements: { text: string; params: unknown[] }[] = [];
  rows: Record<string, unknown>[] = [];
  private staged: Record<string, unknown>[] = [];
  failInsert = false;
  private nextId = 0;
  released = 0;

  release() {
    this.released += 1;
  }

  async query(text: string, params: unknown[] = []) {
    this.statements.push({ text, params });
    if (text === 'BEGIN') {
      this.staged = [];
    } else if (text === 'COMMIT') {
      for (const row of this.staged) {
        this.nextId += 1;
        this.rows.push({ id: this.nextId, ...row });
      }
      this.staged = [];
    } else if (text === 'ROLLBACK') {
      this.staged = [];
    } else if (text.startsWith('INSERT INTO wecs_archive')) {
      if (this.failInsert) throw new Error('connection reset');
      for (let i = 0; i < params.length; i += 8) {
        this.staged.push({
          run_id: params[i],
          seq: params[i + 1],
          time_s: params[i + 2],
          ts: new Date(String(params[i + 3])),
          entity_id: params[i + 4],
          wind_speed_ms: params[i + 5],
          active_power_kw: params[i + 6],
          power_cap_kw: params[i + 7],
        });
      }
    } else if (text.startsWith('SELECT')) {
      // Honors the run filter, id ordering and the DESC LIMIT subquery; nothing else.
      const runId = text.includes('run_id = $1') ? params[0] : undefined;
      let rows = this.rows
        .filter((r) => runId === undefined || r.run_id === runId)
        .sort((a, b) => Number(a.id) - Number(b.id));
      const limit = text.includes('DESC LIMIT') ? Number(params[params.length - 1]) : undefined;
      if (limit !== undefined) rows = rows.slice(-limit);
      return { rows };
    }
    return { rows: [] };
  }
}

class FakePool {
  ended = false;
  constructor(readonly client: FakeClient) {}
  async connect() {
    return this.client;
  }
  async query(text: string, params?: unknown[]) {
    return this.client.query(text, params);
  }
  async end() {
    this.ended = true;
  }
}

describe('PgArchiveStore', () => {
  it('builds one multi-row insert with numbered placeholders', () => {
    const { text, params } = buildArchiveInsert(records);
    assert.equal(
      text,
      'INSERT INTO wecs_archive (run_id, seq, time_s, ts, entity_id, wind_speed_ms, active_power_kw, power_cap_kw) ' +
        'VALUES ($1, $2, $3, $4, $5, $6, $7, $8), ($9, $10, $11, $12, $13, $14, $15, $16)',
    );
    assert.equal(params.length, 16);
    assert.equal(params[7], null);
    assert.equal(params[15], 5);
  });

  it('appends a batch inside a transaction and reads it back in order', async () => {
    const client = new FakeClient();
    const store = new PgArchiveStore(new FakePool(client));

    await store.append(records);

    assert.deepEqual(
      client.statements.map((s) => s.text.split(' ')[0]),
      ['BEGIN', 'INSERT', 'COMMIT'],
    );
    assert.equal(client.released, 1);
    assert.deepEqual(await store.read({ runId: 'run-1' }), records);
    const select = client.statements[client.statements.length - 1];
    assert.match(select.text, /WHERE run_id = \$1 ORDER BY id$/);
  });

  it('reads records across runs in the order they were appended', async () => {
    const client = new FakeClient();
    const store = new PgArchiveStore(new FakePool(client));
    const later = 'f0000000-0000-4000-8000-000000000000';
    const earlier = '00000000-0000-4000-8000-000000000000';
    const first = records.map((r) => ({ ...r, runId: later }));
    const second = records.map((r) => ({ ...r, runId: earlier }));

    await store.append(first);
    await store.append(second);

    assert.deepEqual(await store.read(), [...first, ...second]);
    assert.deepEqual(await store.read({ limit: 2 }), second);
    const select = client.statements[client.statements.length - 1];
    assert.equal(
      select.text,
      'SELECT * FROM (SELECT id, run_id, seq, time_s, ts, entity_id, wind_speed_ms, active_power_kw, power_cap_kw ' +
        'FROM wecs_archive  ORDER BY id DESC LIMIT $1) recent ORDER BY id',
    );
  });

  it('rolls back and rethrows when the insert fails', async () => {
    const client = new FakeClient();
    client.failInsert = true;
    const store = new PgArchiveStore(new FakePool(client));

    await assert.rejects(store.append(records), /connection reset/);
    assert.deepEqual(
      client.statements.map((s) => s.text.split(' ')[0]),
      ['BEGIN', 'INSERT', 'ROLLBACK'],
    );
    assert.equal(client.rows.length, 0);
    assert.equal(client.released, 1);
  });

  it('skips empty batches', async () => {
    const client = new FakeClient();
    await new PgArchiveStore(new FakePool(client)).append([]);
    assert.equal(client.statements.length, 0);
  });

  it('ends the pool on close', async () => {
    const pool = new FakePool(new FakeClient());
    await new PgArchiveStore(pool).close();
    assert.equal(pool.ended, true);
  });
});

describe('mapArchiveRow', () => {
  it('accepts numeric strings as returned for NUMERIC columns', () => {
    assert.deepEqual(
      mapArchiveRow({
        run_id: 'r',
        seq: '3',
        time_s: 900,
        ts: '2016-01-01T00:00:00.000Z',
        entity_id: 'wecs-2',
        wind_speed_ms: '7.5',
        active_power_kw: 12,
        power_cap_kw: null,
      }),
      {
        runId: 'r',
        seq: 3,
        time: 900,
        timestamp: '2016-01-01T00:00:00.000Z',
        entityId: 'wecs-2',
        windSpeed: 7.5,
        activePowerKw: 12,
        powerCapKw: null,
      },
    );
  });

  it('rejects rows with missing columns', () => {
    assert.throws(() => mapArchiveRow({ run_id: 'r' }), /unexpected row shape/);
  });
});
