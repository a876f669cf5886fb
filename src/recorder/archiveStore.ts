import { ArchiveRecord } from '../types/wecs';

export interface ArchiveQuery {
  runId?: string;
  entityId?: string;
  /** Keep only the newest `limit` records. */
  limit?: number;
}

/**
 * Append-only sink for archive records. `read()` returns exactly what was
 * appended, in append order.
 */
export interface ArchiveStore {
  readonly kind: 'memory' | 'jsonl' | 'postgres';
  init(): Promise<void>;
  append(records: readonly ArchiveRecord[]): Promise<void>;
  read(query?: ArchiveQuery): Promise<ArchiveRecord[]>;
  close(): Promise<void>;
}

export function applyArchiveQuery(
  records: readonly ArchiveRecord[],
  query: ArchiveQuery = {},
): ArchiveRecord[] {
  const filtered = records.filter(
    (r) =>
      (query.runId === undefined || r.runId === query.runId) &&
      (query.entityId === undefined || r.entityId === query.entityId),
  );
  const limited =
    query.limit !== undefined && query.limit < filtered.length
      ? filtered.slice(filtered.length - query.limit)
      : filtered;
  return limited.map((r) => ({ ...r }));
}

function isRecordObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Narrow a decoded JSON value to an {@link ArchiveRecord}; `null` when it is not one. */
export function toArchiveRecord(value: unknown): ArchiveRecord | null {
  if (!isRecordObject(value)) return null;
  const { runId, seq, time, timestamp, entityId, windSpeed, activePowerKw, powerCapKw } = value;
  if (
    typeof runId !== 'string' ||
    typeof seq !== 'number' ||
    typeof time !== 'number' ||
    typeof timestamp !== 'string' ||
    typeof entityId !== 'string' ||
    typeof windSpeed !== 'number' ||
    typeof activePowerKw !== 'number' ||
    (powerCapKw !== null && typeof powerCapKw !== 'number')
  ) {
    return null;
  }
  return { runId, seq, time, timestamp, entityId, windSpeed, activePowerKw, powerCapKw };
}
