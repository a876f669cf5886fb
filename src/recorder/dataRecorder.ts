import logger from '../logger';
import { incrementCounter, observeHistogram } from '../observability/metrics';
import { setArchiveReady } from '../state/readiness';
import { AttrValue, OutputData } from '../types/simulator';
import { ArchiveRecord } from '../types/wecs';
import { simTimeToIso } from '../utils/time';
import { ArchiveStore } from './archiveStore';

export class ArchiveWriteError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ArchiveWriteError';
  }
}

export const RECORDED_ATTRS = ['P', 'v', 'P_max'] as const;

export interface DataRecorderOptions {
  runId: string;
  startDate: string;
  recordIntervalSeconds: number;
}

/**
 * Samples the physical simulator every `recordIntervalSeconds` and appends
 * one record per connected entity to the archive store.
 */
export class DataRecorder {
  private readonly entityIds: string[] = [];
  private nextRecord = 0;
  private seq = 0;
  private rows = 0;

  constructor(private readonly store: ArchiveStore, private readonly options: DataRecorderOptions) {
    if (!Number.isInteger(options.recordIntervalSeconds) || options.recordIntervalSeconds <= 0) {
      throw new ArchiveWriteError('recordIntervalSeconds must be a positive integer');
    }
  }

  get rowsWritten(): number {
    return this.rows;
  }

  get runId(): string {
    return this.options.runId;
  }

  async init(): Promise<void> {
    try {
      await this.store.init();
      setArchiveReady(true);
    } catch (err) {
      setArchiveReady(false, err instanceof Error ? err.message : String(err));
      throw new ArchiveWriteError(`archive store "${this.store.kind}" failed to initialize`, { cause: err });
    }
  }

  connect(entityIds: readonly string[]): void {
    for (const eid of entityIds) {
      if (this.entityIds.includes(eid)) {
        throw new ArchiveWriteError(`entity ${eid} is already connected to the recorder`);
      }
      this.entityIds.push(eid);
    }
  }

  /** Archive `data` if a sample is due at `time`; returns the number of records written. */
  async step(time: number, data: OutputData): Promise<number> {
    if (time < this.nextRecord) return 0;

    const timestamp = simTimeToIso(this.options.startDate, time);
    const batch: ArchiveRecord[] = this.entityIds.map((entityId) => {
      const attrs = data[entityId];
      if (!attrs) {
        throw new ArchiveWriteError(`no data for ${entityId} at t=${time}`);
      }
      const activePowerKw = this.requireNumber(attrs.P, entityId, 'P', time);
      const windSpeed = this.requireNumber(attrs.v, entityId, 'v', time);
      const cap = attrs.P_max;
      if (cap === undefined) {
        throw new ArchiveWriteError(`attribute P_max missing for ${entityId} at t=${time}`);
      }
      this.seq += 1;
      return {
        runId: this.options.runId,
        seq: this.seq,
        time,
        timestamp,
        entityId,
        windSpeed,
        activePowerKw,
        powerCapKw: cap,
      };
    });

    const startedAt = Date.now();
    try {
      await this.store.append(batch);
    } catch (err) {
      incrementCounter('windpark_archive_write_errors_total');
      setArchiveReady(false, 'write_failed');
      logger.error({ err, time }, '[recorder] archive write failed');
      throw new ArchiveWriteError(`archive write at t=${time} failed`, { cause: err });
    }

    for (const record of batch) {
      observeHistogram('windpark_entity_power_kw', record.activePowerKw);
    }
    incrementCounter('windpark_archive_rows_total', {}, batch.length);
    this.rows += batch.length;
    while (this.nextRecord <= time) {
      this.nextRecord += this.options.recordIntervalSeconds;
    }
    logger.debug('[recorder] archived step', {
      time,
      records: batch.length,
      durationMs: Date.now() - startedAt,
    });
    return batch.length;
  }

  private requireNumber(value: AttrValue | undefined, entityId: string, attr: string, time: number): number {
    if (typeof value !== 'number') {
      throw new ArchiveWriteError(`attribute ${attr} missing for ${entityId} at t=${time}`);
    }
    return value;
  }

  async close(): Promise<void> {
    await this.store.close();
  }
}
