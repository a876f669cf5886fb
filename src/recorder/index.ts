import config, { ArchiveBackend } from '../config';
import { PgArchiveStore } from '../repositories/archiveRepo';
import { ArchiveStore } from './archiveStore';
import { JsonlArchiveStore } from './jsonlArchiveStore';
import { MemoryArchiveStore } from './memoryArchiveStore';

export type { ArchiveQuery, ArchiveStore } from './archiveStore';
export { ArchiveWriteError, DataRecorder } from './dataRecorder';
export { JsonlArchiveStore, MemoryArchiveStore };

export function createArchiveStore(
  backend: ArchiveBackend = config.archive.backend,
  filePath: string = config.archive.path,
): ArchiveStore {
  switch (backend) {
    case 'memory':
      return new MemoryArchiveStore();
    case 'jsonl':
      return new JsonlArchiveStore(filePath);
    case 'postgres':
      return new PgArchiveStore();
  }
}
