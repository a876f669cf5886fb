import fs from 'fs';
import { appendFile, mkdir } from 'fs/promises';
import path from 'path';
import readline from 'readline';
import { ArchiveRecord } from '../types/wecs';
import { ArchiveQuery, ArchiveStore, applyArchiveQuery, toArchiveRecord } from './archiveStore';

/**
 * Newline-delimited JSON archive. Each batch is appended with a single write;
 * earlier runs stay in the file and are told apart by `runId`.
 */
export class JsonlArchiveStore implements ArchiveStore {
  readonly kind = 'jsonl';

  constructor(readonly filePath: string) {}

  async init(): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await appendFile(this.filePath, '');
  }

  async append(records: readonly ArchiveRecord[]): Promise<void> {
    if (records.length === 0) return;
    const text = records.map((r) => `${JSON.stringify(r)}\n`).join('');
    await appendFile(this.filePath, text, 'utf-8');
  }

  async read(query?: ArchiveQuery): Promise<ArchiveRecord[]> {
    const records: ArchiveRecord[] = [];
    const stream = fs.createReadStream(this.filePath, { encoding: 'utf-8' });
    const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });
    let lineNo = 0;
    try {
      for await (const line of lines) {
        lineNo += 1;
        if (line.trim() === '') continue;
        const record = toArchiveRecord(JSON.parse(line));
        if (!record) {
          throw new Error(`${this.filePath}:${lineNo} is not an archive record`);
        }
        records.push(record);
      }
    } finally {
      lines.close();
      stream.destroy();
    }
    return applyArchiveQuery(records, query);
  }

  async close(): Promise<void> {}
}
