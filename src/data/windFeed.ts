import fs from 'fs';
import readline from 'readline';
import zlib from 'zlib';

/**
 * Wind speed time series in m/s.
 *
 * Files hold one row per time step and one or more comma separated series per
 * row, e.g. three series over one hour at 15 min resolution:
 *
 *     3.5, 0.0, 2.3
 *     3.5, 0.1, 2.2
 *     3.6, 0.3, 2.3
 *     3.9, 0.5, 2.5
 *
 * Files ending in `.gz` are gunzipped while reading. Blank lines and lines
 * starting with `#` are skipped.
 */

export interface WindSample {
  time: number;
  speeds: number[];
}

export type WindFeed = AsyncGenerator<WindSample, void, undefined>;

export class WindFeedFormatError extends Error {
  constructor(message: string, public readonly line?: number) {
    super(message);
    this.name = 'WindFeedFormatError';
  }
}

export class WindFeedExhaustedError extends Error {
  constructor(time: number) {
    super(`wind feed has no sample left for t=${time}`);
    this.name = 'WindFeedExhaustedError';
  }
}

export function parseWindRow(raw: string, line?: number): number[] {
  const cells = raw.split(',').map((cell) => cell.trim());
  return cells.map((cell, idx) => {
    const value = cell === '' ? NaN : Number(cell);
    if (!Number.isFinite(value)) {
      throw new WindFeedFormatError(
        `line ${line ?? '?'}: column ${idx + 1} is not a number (${JSON.stringify(cell)})`,
        line,
      );
    }
    return value;
  });
}

function isDataLine(raw: string): boolean {
  const trimmed = raw.trim();
  return trimmed !== '' && !trimmed.startsWith('#');
}

async function* readSamples(filePath: string, resolutionSeconds: number): WindFeed {
  const source = fs.createReadStream(filePath);
  const input = filePath.endsWith('.gz') ? source.pipe(zlib.createGunzip()) : source;
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  let lineNo = 0;
  let index = 0;
  let width: number | null = null;

  try {
    for await (const raw of rl) {
      lineNo += 1;
      if (!isDataLine(raw)) continue;
      const speeds = parseWindRow(raw, lineNo);
      if (width === null) {
        width = speeds.length;
      } else if (speeds.length !== width) {
        throw new WindFeedFormatError(
          `line ${lineNo}: expected ${width} columns, got ${speeds.length}`,
          lineNo,
        );
      }
      yield { time: index * resolutionSeconds, speeds };
      index += 1;
    }
  } finally {
    rl.close();
    source.destroy();
  }
}

/** Open a wind file lazily; a missing or unreadable file fails here, not mid-run. */
export async function openWindFeed(filePath: string, resolutionSeconds: number): Promise<WindFeed> {
  try {
    await fs.promises.access(filePath, fs.constants.R_OK);
  } catch (err) {
    throw new WindFeedFormatError(
      `wind file ${filePath} is not readable: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return readSamples(filePath, resolutionSeconds);
}

export async function* windFeedFromRows(
  rows: readonly number[][],
  resolutionSeconds: number,
): WindFeed {
  for (const [index, speeds] of rows.entries()) {
    yield { time: index * resolutionSeconds, speeds: [...speeds] };
  }
}

/** Spread `width` series over `count` entities, reusing series round-robin. */
export function expandSeries(speeds: readonly number[], count: number): number[] {
  if (speeds.length === 0) {
    throw new WindFeedFormatError('wind sample has no series');
  }
  return Array.from({ length: count }, (_, idx) => speeds[idx % speeds.length] ?? 0);
}
