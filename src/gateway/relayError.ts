/**
 * Raised when a value on the simulator <-> agent path is lost, duplicated or
 * late. A relay error ends the run; the step is not interpolated.
 */
export class RelayError extends Error {
  constructor(message: string, public readonly details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'RelayError';
  }
}

export function singleSourceValue<T>(
  sources: Record<string, T>,
  context: { eid: string; attr: string },
): T {
  const entries = Object.entries(sources);
  if (entries.length !== 1) {
    throw new RelayError(
      `${context.eid}.${context.attr} expects exactly one source, got ${entries.length}`,
      { ...context, sources: entries.map(([src]) => src) },
    );
  }
  return entries[0][1];
}
