import { ArchiveRecord } from '../types/wecs';
import { ArchiveQuery, ArchiveStore, applyArchiveQuery } from './archiveStore';

export class MemoryArchiveStore implements ArchiveStore {
  readonly kind = 'memory';
  private readonly records: ArchiveRecord[] = [];

  async init(): Promise<void> {}

  async append(records: readonly ArchiveRecord[]): Promise<void> {
    this.records.push(...records.map((r) => ({ ...r })));
  }

  async read(query?: ArchiveQuery): Promise<ArchiveRecord[]> {
    return applyArchiveQuery(this.records, query);
  }

  async close(): Promise<void> {}
}
