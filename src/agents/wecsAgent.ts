import { PowerCapValidationError } from '../models/wecs';
import { RelayError } from '../gateway/relayError';
import { PowerCap, WecsParams } from '../types/wecs';
import { AgentContainer, AgentProxy } from './container';
import { Agent, AgentReply, AgentRequest, PowerReport } from './messages';

export interface AgentRegistry {
  register(proxy: AgentProxy): void;
}

/**
 * Agent side mirror of one simulated WECS. It keeps the last reported power
 * output and the cap the controller decided for the unit.
 */
export class WecsAgent implements Agent {
  private report: PowerReport | null = null;
  private newPMax: PowerCap = null;

  private constructor(
    readonly aid: string,
    private readonly container: AgentContainer,
    readonly params: WecsParams,
  ) {}

  /** Spawn the agent in `container` and register it with the controller. */
  static create(
    container: AgentContainer,
    aid: string,
    controller: AgentRegistry,
    params: WecsParams,
  ): AgentProxy {
    const agent = new WecsAgent(aid, container, { ...params });
    const proxy = container.register(agent);
    controller.register(proxy);
    return proxy;
  }

  async handle(request: AgentRequest): Promise<AgentReply> {
    switch (request.kind) {
      case 'update_state':
        this.updateState(request.time, request.state.P);
        return { kind: 'ack' };
      case 'get_p':
        return { kind: 'power', report: this.getP() };
      case 'set_p_max':
        this.setPMax(request.pMax);
        return { kind: 'ack' };
      case 'get_p_max':
        return { kind: 'cap', pMax: this.newPMax };
    }
  }

  private updateState(time: number, powerKw: number): void {
    const now = this.container.now;
    if (now !== time) {
      throw new RelayError(`${this.aid} got state for t=${time} but its clock is at t=${now}`, {
        aid: this.aid,
      });
    }
    if (!Number.isFinite(powerKw)) {
      throw new RelayError(`${this.aid} got a non-numeric power value`, { aid: this.aid, time });
    }
    this.report = { time, powerKw };
  }

  private getP(): PowerReport {
    if (!this.report) {
      throw new RelayError(`${this.aid} has no power report yet`, { aid: this.aid });
    }
    return { ...this.report };
  }

  private setPMax(pMax: PowerCap): void {
    if (pMax !== null && (!Number.isFinite(pMax) || pMax < 0 || pMax > this.params.pRatedKw)) {
      throw new PowerCapValidationError(
        `${this.aid}: cap must be within [0, ${this.params.pRatedKw}], got ${pMax}`,
      );
    }
    this.newPMax = pMax;
  }
}
