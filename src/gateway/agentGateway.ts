import { AgentContainer, AgentProxy } from '../agents/container';
import { ControllerAgent } from '../agents/controller';
import { WecsAgent } from '../agents/wecsAgent';
import logger from '../logger';
import type { CapPublisher, PublishedCap } from '../messaging/capPublisher';
import { incrementCounter } from '../observability/metrics';
import { EntityDescriptor, SetData, SimulatorMeta, StepInputs } from '../types/simulator';
import { PowerCap, WecsParams } from '../types/wecs';
import { simTimeToIso } from '../utils/time';
import { RelayError, singleSourceValue } from './relayError';

export const WECS_AGENT_MODEL = 'WecsAgent';

export const GATEWAY_META: SimulatorMeta = {
  apiVersion: '2.2',
  models: {
    [WECS_AGENT_MODEL]: {
      public: true,
      params: ['pRatedKw', 'vRated', 'vMin', 'vMax'],
      attrs: ['P', 'P_max'],
    },
  },
};

export interface AgentGatewayInitParams {
  startDate: string;
  controller: ControllerAgent;
  containerCount: number;
  stepSizeSeconds: number;
  stepTimeoutMs: number;
  capPublisher?: CapPublisher | null;
}

export interface GatewayStepResult {
  nextTime: number;
  setData: SetData;
}

interface AgentBinding {
  proxy: AgentProxy;
  entityId: string | null;
}

/**
 * Bridge between the lockstep co-simulation and the agent system. The
 * gateway looks like a simulator to the driver: every step it forwards the
 * simulated power outputs to the WECS agents, lets the controller run and
 * hands the resulting caps back as set-data for the physical simulator.
 */
export class AgentGateway {
  readonly meta = GATEWAY_META;
  private sid: string | null = null;
  private options: AgentGatewayInitParams | null = null;
  private containers: AgentContainer[] = [];
  private readonly agents = new Map<string, AgentBinding>();
  private ready = false;

  init(sid: string, params: AgentGatewayInitParams): SimulatorMeta {
    if (!Number.isInteger(params.containerCount) || params.containerCount <= 0) {
      throw new RelayError('containerCount must be a positive integer', {
        containerCount: params.containerCount,
      });
    }
    if (!Number.isInteger(params.stepSizeSeconds) || params.stepSizeSeconds <= 0) {
      throw new RelayError('stepSizeSeconds must be a positive integer', {
        stepSizeSeconds: params.stepSizeSeconds,
      });
    }
    this.sid = sid;
    this.options = params;
    this.containers = Array.from({ length: params.containerCount }, (_, idx) => new AgentContainer(idx));
    logger.info('[gateway] agent containers started', {
      sid,
      containers: this.containers.map((c) => c.addr),
    });
    return this.meta;
  }

  private requireOptions(): AgentGatewayInitParams {
    if (!this.options) {
      throw new RelayError('gateway is not initialized');
    }
    return this.options;
  }

  get agentIds(): string[] {
    return [...this.agents.keys()];
  }

  get controller(): ControllerAgent {
    return this.requireOptions().controller;
  }

  /** Spawn `num` WECS agents, spread round-robin over the containers. */
  create(num: number, model: string, params: WecsParams): EntityDescriptor[] {
    const options = this.requireOptions();
    if (model !== WECS_AGENT_MODEL) {
      throw new RelayError(`unknown model ${model}`);
    }
    if (this.ready) {
      throw new RelayError('cannot create agents after setup is done');
    }

    const entities: EntityDescriptor[] = [];
    for (let i = 0; i < num; i += 1) {
      const idx = this.agents.size;
      const aid = `agent-${idx}`;
      const container = this.containers[idx % this.containers.length];
      const proxy = WecsAgent.create(container, aid, options.controller, params);
      this.agents.set(aid, { proxy, entityId: null });
      entities.push({ eid: aid, type: model });
    }
    return entities;
  }

  /** Record which physical entity each agent is connected to (`agent id -> entity id`). */
  setupDone(relations: Record<string, string>): void {
    for (const [aid, eid] of Object.entries(relations)) {
      const binding = this.agents.get(aid);
      if (!binding) {
        throw new RelayError(`relation names unknown agent ${aid}`, { aid, eid });
      }
      binding.entityId = eid;
    }
    const unbound = [...this.agents.entries()].filter(([, b]) => b.entityId === null);
    if (unbound.length > 0) {
      throw new RelayError('some agents are not connected to an entity', {
        agents: unbound.map(([aid]) => aid),
      });
    }
    this.ready = true;
    logger.debug('[gateway] setup done', { sid: this.sid, agents: this.agents.size });
  }

  async step(time: number, inputs: StepInputs): Promise<GatewayStepResult> {
    const options = this.requireOptions();
    if (!this.ready) {
      throw new RelayError('gateway setup is not done');
    }

    for (const container of this.containers) {
      container.setTime(time);
    }

    for (const aid of Object.keys(inputs)) {
      if (!this.agents.has(aid)) {
        incrementCounter('windpark_relay_errors_total', { stage: 'inputs' });
        throw new RelayError(`input for unknown agent ${aid}`, { aid, time });
      }
    }

    const updates = [...this.agents.entries()].map(([aid, binding]) => {
      const value = this.powerInput(inputs, aid, time);
      return binding.proxy.updateState(time, value);
    });
    await Promise.all(updates);

    await this.runController(time, options.stepTimeoutMs);

    const setData: SetData = {};
    const published: PublishedCap[] = [];
    const caps = await Promise.all(
      [...this.agents.values()].map((binding) => binding.proxy.getPMax()),
    );
    [...this.agents.entries()].forEach(([aid, binding], idx) => {
      const entityId = binding.entityId ?? '';
      const pMax: PowerCap = caps[idx] ?? null;
      setData[aid] = { [entityId]: { P_max: pMax } };
      published.push({ entityId, pMaxKw: pMax });
    });

    if (options.capPublisher) {
      await options.capPublisher.publishCaps(simTimeToIso(options.startDate, time), published);
    }

    return { nextTime: time + options.stepSizeSeconds, setData };
  }

  private powerInput(inputs: StepInputs, aid: string, time: number): number {
    const attrs = inputs[aid];
    const sources = attrs?.P;
    if (!sources) {
      incrementCounter('windpark_relay_errors_total', { stage: 'inputs' });
      throw new RelayError(`no P input for ${aid} at t=${time}`, { aid, time });
    }
    const value = singleSourceValue(sources, { eid: aid, attr: 'P' });
    if (value === null) {
      incrementCounter('windpark_relay_errors_total', { stage: 'inputs' });
      throw new RelayError(`P input for ${aid} at t=${time} is empty`, { aid, time });
    }
    return value;
  }

  private async runController(time: number, timeoutMs: number): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        incrementCounter('windpark_relay_errors_total', { stage: 'timeout' });
        reject(new RelayError(`controller did not finish within ${timeoutMs} ms`, { time }));
      }, timeoutMs);
    });
    try {
      await Promise.race([this.controller.step(time), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  async finalize(): Promise<void> {
    const options = this.options;
    if (options) {
      await options.controller.stop();
    }
    await Promise.all(this.containers.map((c) => c.shutdown()));
    logger.debug('[gateway] agent containers stopped', { sid: this.sid });
  }
}
