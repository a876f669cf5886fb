export function parseStartDate(raw: string): number {
  const ms = Date.parse(raw);
  if (Number.isNaN(ms)) {
    throw new RangeError(`start date ${JSON.stringify(raw)} is not an ISO 8601 date-time`);
  }
  return ms;
}

/** Wall-clock timestamp of simulation time `time` (seconds since `startDate`). */
export function simTimeToIso(startDate: string, time: number): string {
  return new Date(parseStartDate(startDate) + time * 1000).toISOString();
}
