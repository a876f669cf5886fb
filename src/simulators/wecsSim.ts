import { WecsFleet } from '../models/wecs';
import {
  expandSeries,
  WindFeed,
  WindFeedExhaustedError,
  WindFeedFormatError,
} from '../data/windFeed';
import { singleSourceValue } from '../gateway/relayError';
import logger from '../logger';
import {
  AttrValue,
  EntityDescriptor,
  OutputData,
  OutputRequest,
  SimulatorMeta,
  StepInputs,
} from '../types/simulator';
import { PowerCap, WecsParams } from '../types/wecs';

export const WECS_MODEL = 'WECS';

export const WECS_META: SimulatorMeta = {
  apiVersion: '2.2',
  models: {
    [WECS_MODEL]: {
      public: true,
      params: ['pRatedKw', 'vRated', 'vMin', 'vMax'],
      attrs: [
        'P_max', // input, set by the agents; output for the archive
        'P',
        'v',
      ],
    },
  },
};

export type WecsAttr = 'P_max' | 'P' | 'v';

export class SimulatorApiError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SimulatorApiError';
  }
}

export interface WecsSimInitParams {
  windFeed: WindFeed;
  stepSizeSeconds: number;
}

function isWecsAttr(attr: string): attr is WecsAttr {
  return attr === 'P_max' || attr === 'P' || attr === 'v';
}

function assertCap(value: AttrValue, eid: string): PowerCap {
  if (value === null || typeof value === 'number') return value;
  throw new SimulatorApiError(`P_max for ${eid} must be a number or null`);
}

/**
 * Simulator facade over a {@link WecsFleet}. Entities may be created in
 * several batches; the fleet is built once in {@link setupDone}.
 */
export class WecsSim {
  readonly meta = WECS_META;
  private sid: string | null = null;
  private windFeed: WindFeed | null = null;
  private stepSizeSeconds = 0;
  private readonly entities = new Map<string, number>();
  private readonly wecsConfig: WecsParams[] = [];
  private fleet: WecsFleet | null = null;

  init(sid: string, params: WecsSimInitParams): SimulatorMeta {
    if (!Number.isInteger(params.stepSizeSeconds) || params.stepSizeSeconds <= 0) {
      throw new SimulatorApiError('stepSizeSeconds must be a positive integer');
    }
    this.sid = sid;
    this.windFeed = params.windFeed;
    this.stepSizeSeconds = params.stepSizeSeconds;
    return this.meta;
  }

  get entityIds(): string[] {
    return [...this.entities.keys()];
  }

  get entityCount(): number {
    return this.entities.size;
  }

  create(num: number, model: string, params: WecsParams): EntityDescriptor[] {
    if (model !== WECS_MODEL) {
      throw new SimulatorApiError(`unknown model ${model}`);
    }
    if (this.fleet) {
      throw new SimulatorApiError('cannot create entities after setup is done');
    }

    const entities: EntityDescriptor[] = [];
    const offset = this.wecsConfig.length;
    for (let idx = offset; idx < offset + num; idx += 1) {
      const eid = `wecs-${idx}`;
      this.entities.set(eid, idx);
      this.wecsConfig.push({ ...params });
      entities.push({ eid, type: model });
    }
    return entities;
  }

  setupDone(): void {
    this.fleet = new WecsFleet(this.wecsConfig);
    logger.debug('[wecsSim] setup done', { sid: this.sid, entities: this.entities.size });
  }

  private requireFleet(): WecsFleet {
    if (!this.fleet) {
      throw new SimulatorApiError('simulator is not set up');
    }
    return this.fleet;
  }

  private indexOf(eid: string): number {
    const idx = this.entities.get(eid);
    if (idx === undefined) {
      throw new SimulatorApiError(`unknown entity ID "${eid}"`);
    }
    return idx;
  }

  /** Apply the caps in `inputs`, step every WECS, return the next step time. */
  async step(time: number, inputs: StepInputs): Promise<number> {
    const fleet = this.requireFleet();
    if (!this.windFeed) {
      throw new SimulatorApiError('simulator is not initialized');
    }

    // Caps are only valid for the step they arrive with; no input means uncapped.
    const caps: PowerCap[] = Array.from({ length: fleet.count }, () => null);
    for (const [eid, attrs] of Object.entries(inputs)) {
      const idx = this.indexOf(eid);
      for (const [attr, sources] of Object.entries(attrs)) {
        if (attr !== 'P_max') {
          throw new SimulatorApiError(`attribute "${attr}" is not an input`);
        }
        caps[idx] = assertCap(singleSourceValue(sources, { eid, attr }), eid);
      }
    }
    fleet.setPowerCaps(caps);

    const sample = await this.windFeed.next();
    if (sample.done) {
      throw new WindFeedExhaustedError(time);
    }
    if (sample.value.time !== time) {
      throw new WindFeedFormatError(
        `wind sample for t=${sample.value.time} does not match step t=${time}`,
      );
    }
    fleet.step(expandSeries(sample.value.speeds, fleet.count));

    return time + this.stepSizeSeconds;
  }

  getData(outputs: OutputRequest): OutputData {
    const fleet = this.requireFleet();
    const power = fleet.activePower;
    const wind = fleet.windSpeed;
    if (!power || !wind) {
      throw new SimulatorApiError('no data available before the first step');
    }

    const data: OutputData = {};
    for (const [eid, attrs] of Object.entries(outputs)) {
      const idx = this.indexOf(eid);
      const values: Record<string, AttrValue> = {};
      for (const attr of attrs) {
        if (!isWecsAttr(attr)) {
          throw new SimulatorApiError(`attribute "${attr}" not available`);
        }
        if (attr === 'P') values[attr] = power[idx];
        else if (attr === 'v') values[attr] = wind[idx];
        else values[attr] = fleet.powerCaps[idx] ?? null;
      }
      data[eid] = values;
    }
    return data;
  }

  async finalize(): Promise<void> {
    await this.windFeed?.return(undefined);
    this.windFeed = null;
  }
}
