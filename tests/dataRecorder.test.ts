import { after, before, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { getCounterValue, resetMetricsForTest } from '../src/observability/metrics';
import { ArchiveQuery, ArchiveStore } from '../src/recorder/archiveStore';
import { ArchiveWriteError, DataRecorder } from '../src/recorder/dataRecorder';
import { JsonlArchiveStore } from '../src/recorder/jsonlArchiveStore';
import { MemoryArchiveStore } from '../src/recorder/memoryArchiveStore';
import { getReadiness } from '../src/state/readiness';
import { OutputData } from '../src/types/simulator';
import { ArchiveRecord } from '../src/types/wecs';

const startDate = '2016-01-01T00:00:00+01:00';

function outputs(step: number): OutputData {
  return {
    'wecs-0': { P: step, v: step / 10, P_max: null },
    'wecs-1': { P: step * 2, v: step / 5, P_max: step % 2 === 0 ? step : null },
  };
}

class BrokenStore implements ArchiveStore {
  readonly kind = 'memory';
  async init() {}
  async append(_records: readonly ArchiveRecord[]): Promise<void> {
    throw new Error('disk full');
  }
  async read(_query?: ArchiveQuery): Promise<ArchiveRecord[]> {
    return [];
  }
  async close() {}
}

describe('DataRecorder', () => {
  let dir: string;

  before(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'archive-'));
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  beforeEach(() => resetMetricsForTest());

  it('archives exactly what the simulator produced over 100 steps', async () => {
    const store = new JsonlArchiveStore(path.join(dir, 'nested', 'archive.jsonl'));
    const recorder = new DataRecorder(store, { runId: 'run-a', startDate, recordIntervalSeconds: 900 });
    recorder.connect(['wecs-0', 'wecs-1']);
    await recorder.init();
    assert.equal(getReadiness().archiveReady, true);

    let expectedSum = 0;
    for (let step = 0; step < 100; step += 1) {
      const data = outputs(step);
      expectedSum += step + step * 2;
      assert.equal(await recorder.step(step * 900, data), 2);
    }

    const archived = await store.read();
    assert.equal(archived.length, 200);
    assert.equal(recorder.rowsWritten, 200);
    assert.deepEqual(
      archived.map((r) => r.seq),
      Array.from({ length: 200 }, (_, i) => i + 1),
    );
    assert.equal(archived.reduce((sum, r) => sum + r.activePowerKw, 0), expectedSum);
    assert.deepEqual(archived[3], {
      runId: 'run-a',
      seq: 4,
      time: 900,
      timestamp: '2015-12-31T23:15:00.000Z',
      entityId: 'wecs-1',
      windSpeed: 0.2,
      activePowerKw: 2,
      powerCapKw: null,
    });
    assert.equal(archived[5].powerCapKw, 2);
    assert.equal(getCounterValue('windpark_archive_rows_total'), 200);

    const lines = (await readFile(store.filePath, 'utf-8')).trim().split('\n');
    assert.equal(lines.length, 200);
  });

  it('samples on its own interval', async () => {
    const store = new MemoryArchiveStore();
    const recorder = new DataRecorder(store, { runId: 'run-b', startDate, recordIntervalSeconds: 1800 });
    recorder.connect(['wecs-0']);
    await recorder.init();

    for (let step = 0; step < 5; step += 1) {
      await recorder.step(step * 900, outputs(step));
    }

    assert.deepEqual(
      (await store.read()).map((r) => r.time),
      [0, 1800, 3600],
    );
  });

  it('filters by entity and keeps the newest records under a limit', async () => {
    const store = new MemoryArchiveStore();
    const recorder = new DataRecorder(store, { runId: 'run-c', startDate, recordIntervalSeconds: 900 });
    recorder.connect(['wecs-0', 'wecs-1']);
    for (let step = 0; step < 4; step += 1) {
      await recorder.step(step * 900, outputs(step));
    }

    const latest = await store.read({ entityId: 'wecs-1', limit: 2 });
    assert.deepEqual(latest.map((r) => [r.time, r.activePowerKw]), [[1800, 4], [2700, 6]]);
  });

  it('rejects a step with a missing attribute', async () => {
    const recorder = new DataRecorder(new MemoryArchiveStore(), {
      runId: 'run-d',
      startDate,
      recordIntervalSeconds: 900,
    });
    recorder.connect(['wecs-0']);
    await assert.rejects(recorder.step(0, { 'wecs-0': { P: 1, v: 2 } }), /P_max missing for wecs-0/);
    await assert.rejects(recorder.step(0, { 'wecs-0': { P: null, v: 2, P_max: null } }), ArchiveWriteError);
    await assert.rejects(recorder.step(0, {}), /no data for wecs-0 at t=0/);
  });

  it('wraps store failures in ArchiveWriteError', async () => {
    const recorder = new DataRecorder(new BrokenStore(), {
      runId: 'run-e',
      startDate,
      recordIntervalSeconds: 900,
    });
    recorder.connect(['wecs-0']);
    await assert.rejects(recorder.step(0, outputs(1)), (err: unknown) =>
      err instanceof ArchiveWriteError && err.cause instanceof Error && err.cause.message === 'disk full',
    );
    assert.equal(getCounterValue('windpark_archive_write_errors_total'), 1);
    assert.equal(getReadiness().archiveReason, 'write_failed');
  });

  it('refuses to connect an entity twice', () => {
    const recorder = new DataRecorder(new MemoryArchiveStore(), {
      runId: 'run-f',
      startDate,
      recordIntervalSeconds: 900,
    });
    recorder.connect(['wecs-0']);
    assert.throws(() => recorder.connect(['wecs-0']), ArchiveWriteError);
  });
});
