export type RunStatus = 'idle' | 'running' | 'done' | 'failed';

export interface RunStateSnapshot {
  status: RunStatus;
  runId: string | null;
  startedAtIso: string | null;
  finishedAtIso: string | null;
  simTimeSeconds: number | null;
  durationSeconds: number | null;
  stepsCompleted: number;
  lastStepDurationMs: number | null;
  lastError: { name: string; message: string } | null;
}

const initialState = (): RunStateSnapshot => ({
  status: 'idle',
  runId: null,
  startedAtIso: null,
  finishedAtIso: null,
  simTimeSeconds: null,
  durationSeconds: null,
  stepsCompleted: 0,
  lastStepDurationMs: null,
  lastError: null,
});

let state: RunStateSnapshot = initialState();

export function markRunStart(runId: string, durationSeconds: number, atMs = Date.now()): void {
  state = {
    ...initialState(),
    status: 'running',
    runId,
    durationSeconds,
    startedAtIso: new Date(atMs).toISOString(),
  };
}

export function markStepComplete(simTimeSeconds: number, stepDurationMs: number): void {
  state.simTimeSeconds = simTimeSeconds;
  state.stepsCompleted += 1;
  state.lastStepDurationMs = stepDurationMs;
}

export function markRunDone(atMs = Date.now()): void {
  state.status = 'done';
  state.finishedAtIso = new Date(atMs).toISOString();
}

export function markRunFailed(err: unknown, atMs = Date.now()): void {
  state.status = 'failed';
  state.finishedAtIso = new Date(atMs).toISOString();
  state.lastError = err instanceof Error
    ? { name: err.name, message: err.message }
    : { name: 'Error', message: String(err) };
}

export function getRunState(): RunStateSnapshot {
  return { ...state, lastError: state.lastError ? { ...state.lastError } : null };
}

export function resetRunStateForTest(): void {
  state = initialState();
}
