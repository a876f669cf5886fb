import { beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  getRunState,
  markRunDone,
  markRunFailed,
  markRunStart,
  markStepComplete,
  resetRunStateForTest,
} from '../src/state/runMonitor';

describe('run monitor', () => {
  beforeEach(() => resetRunStateForTest());

  it('starts idle', () => {
    assert.equal(getRunState().status, 'idle');
    assert.equal(getRunState().runId, null);
  });

  it('tracks steps of a successful run', () => {
    markRunStart('run-1', 1800, Date.UTC(2024, 0, 1));
    markStepComplete(0, 12);
    markStepComplete(900, 8);
    markRunDone(Date.UTC(2024, 0, 1, 0, 0, 5));

    assert.deepEqual(getRunState(), {
      status: 'done',
      runId: 'run-1',
      startedAtIso: '2024-01-01T00:00:00.000Z',
      finishedAtIso: '2024-01-01T00:00:05.000Z',
      simTimeSeconds: 900,
      durationSeconds: 1800,
      stepsCompleted: 2,
      lastStepDurationMs: 8,
      lastError: null,
    });
  });

  it('records the error of a failed run', () => {
    markRunStart('run-2', 900);
    markRunFailed('socket closed');
    assert.equal(getRunState().status, 'failed');
    assert.deepEqual(getRunState().lastError, { name: 'Error', message: 'socket closed' });
  });

  it('resets progress when a new run starts', () => {
    markRunStart('run-3', 900);
    markStepComplete(0, 1);
    markRunFailed(new RangeError('bad step'));
    markRunStart('run-4', 900);

    const state = getRunState();
    assert.equal(state.runId, 'run-4');
    assert.equal(state.stepsCompleted, 0);
    assert.equal(state.lastError, null);
  });
});
