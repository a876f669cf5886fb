import { PowerCap, WecsParams } from '../types/wecs';

/**
 * Wind energy conversion system model.
 *
 * A WECS reaches its rated power `pRatedKw` at `vRated` m/s. Below `vMin` it
 * is idle, above `vMax` (when set) it shuts down to protect the mechanics.
 * Between `vMin` and `vRated` the output follows the cubic power law
 * normalised by `vRated`:
 *
 *     P = pRatedKw * (v / vRated) ** 3
 *
 * Turbine inertia and the flattening of the curve near `vRated` are ignored,
 * so the model is only plausible at coarse step sizes (15 min and up).
 */

export class WecsConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WecsConfigError';
  }
}

export class WindSpeedValidationError extends Error {
  constructor(message: string, public readonly entityIndex?: number) {
    super(message);
    this.name = 'WindSpeedValidationError';
  }
}

export class PowerCapValidationError extends Error {
  constructor(message: string, public readonly entityIndex?: number) {
    super(message);
    this.name = 'PowerCapValidationError';
  }
}

export function validateWecsParams(params: WecsParams, label = 'wecs'): WecsParams {
  const { pRatedKw, vRated, vMin, vMax } = params;
  const numbers: [string, number | undefined][] = [
    ['pRatedKw', pRatedKw],
    ['vRated', vRated],
    ['vMin', vMin],
    ['vMax', vMax],
  ];
  for (const [name, value] of numbers) {
    if (value !== undefined && !Number.isFinite(value)) {
      throw new WecsConfigError(`${label}.${name} must be a finite number`);
    }
  }
  if (pRatedKw <= 0) {
    throw new WecsConfigError(`${label}.pRatedKw must be > 0`);
  }
  if (vMin < 0) {
    throw new WecsConfigError(`${label}.vMin must be >= 0`);
  }
  if (vMin >= vRated) {
    throw new WecsConfigError(`${label}.vMin must be lower than vRated`);
  }
  if (vMax !== undefined && vRated >= vMax) {
    throw new WecsConfigError(`${label}.vRated must be lower than vMax`);
  }
  return params;
}

export function computeActivePower(v: number, params: WecsParams, cap: PowerCap = null): number {
  if (!Number.isFinite(v) || v < 0) {
    throw new WindSpeedValidationError(`wind speed must be a finite number >= 0, got ${v}`);
  }

  let power: number;
  if (v < params.vMin || (params.vMax !== undefined && v > params.vMax)) {
    power = 0;
  } else if (v >= params.vRated) {
    power = params.pRatedKw;
  } else {
    power = Math.min(params.pRatedKw * (v / params.vRated) ** 3, params.pRatedKw);
  }

  return cap === null ? power : Math.min(power, cap);
}

/**
 * All simulated WECS of one simulator, stored as parallel vectors indexed by
 * entity position.
 */
export class WecsFleet {
  readonly count: number;
  private readonly params: readonly WecsParams[];
  private caps: PowerCap[];
  private power: number[] | null = null;
  private windSpeeds: number[] | null = null;

  constructor(params: WecsParams[]) {
    this.params = params.map((p, idx) => Object.freeze({ ...validateWecsParams(p, `wecs[${idx}]`) }));
    this.count = params.length;
    this.caps = params.map(() => null);
  }

  getParams(idx: number): WecsParams {
    const params = this.params[idx];
    if (!params) {
      throw new RangeError(`no WECS at index ${idx}`);
    }
    return params;
  }

  /** Active power per entity after the last step, `null` before the first. */
  get activePower(): readonly number[] | null {
    return this.power;
  }

  get windSpeed(): readonly number[] | null {
    return this.windSpeeds;
  }

  get powerCaps(): readonly PowerCap[] {
    return this.caps;
  }

  setPowerCaps(caps: PowerCap[]): void {
    if (caps.length !== this.count) {
      throw new PowerCapValidationError(
        `expected ${this.count} power caps, got ${caps.length}`,
      );
    }
    caps.forEach((cap, idx) => {
      if (cap === null) return;
      const { pRatedKw } = this.getParams(idx);
      if (!Number.isFinite(cap) || cap < 0 || cap > pRatedKw) {
        throw new PowerCapValidationError(
          `power cap for wecs[${idx}] must be within [0, ${pRatedKw}], got ${cap}`,
          idx,
        );
      }
    });
    this.caps = [...caps];
  }

  step(windSpeeds: number[]): readonly number[] {
    if (windSpeeds.length !== this.count) {
      throw new WindSpeedValidationError(
        `expected ${this.count} wind speeds, got ${windSpeeds.length}`,
      );
    }

    const next = windSpeeds.map((v, idx) => {
      try {
        return computeActivePower(v, this.getParams(idx), this.caps[idx] ?? null);
      } catch (err) {
        if (err instanceof WindSpeedValidationError) {
          throw new WindSpeedValidationError(`wecs[${idx}]: ${err.message}`, idx);
        }
        throw err;
      }
    });

    this.windSpeeds = [...windSpeeds];
    this.power = next;
    return next;
  }
}
