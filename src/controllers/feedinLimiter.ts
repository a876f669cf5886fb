import { PowerCap } from '../types/wecs';

export class FeedinInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FeedinInvariantError';
  }
}

export const FEEDIN_TOLERANCE_KW = 0.01;

export type FeedinCorrection =
  | { action: 'hold'; totalKw: number }
  | { action: 'release'; totalKw: number; caps: PowerCap[] }
  | { action: 'curtail'; totalKw: number; factor: number; caps: number[] };

/**
 * Proportional curtailment: when the park exceeds its ceiling every WECS is
 * throttled by the same fraction so the capped outputs add up to the ceiling.
 * An idle park keeps whatever caps are in place.
 */
export function computeFeedinCorrection(
  outputsKw: readonly number[],
  ceilingKw: number,
): FeedinCorrection {
  const totalKw = outputsKw.reduce((sum, p) => sum + p, 0);

  if (totalKw === 0) {
    return { action: 'hold', totalKw };
  }

  if (totalKw <= ceilingKw) {
    return { action: 'release', totalKw, caps: outputsKw.map(() => null) };
  }

  const factor = ceilingKw / totalKw;
  const caps = outputsKw.map((p) => p * factor);
  const capped = caps.reduce((sum, p) => sum + p, 0);
  if (Math.abs(capped - ceilingKw) >= FEEDIN_TOLERANCE_KW) {
    throw new FeedinInvariantError(
      `curtailed feed-in ${capped} kW deviates from ceiling ${ceilingKw} kW`,
    );
  }

  return { action: 'curtail', totalKw, factor, caps };
}
