import { setImmediate as nextTurn } from 'timers/promises';
import { RelayError } from '../gateway/relayError';
import { PowerCap } from '../types/wecs';
import { Agent, AgentReply, AgentRequest, PowerReport } from './messages';

/**
 * In-process agent container. Agents only talk to each other through
 * {@link AgentContainer.send}, which delivers every request on a later turn of
 * the event loop, so agents never share mutable state or re-enter each other.
 *
 * The container clock is external: the gateway sets it once per step and it
 * never moves backwards.
 */
export class AgentContainer {
  readonly addr: string;
  private readonly agents = new Map<string, Agent>();
  private time: number | null = null;
  private stopped = false;

  constructor(readonly index: number) {
    this.addr = `container-${index}`;
  }

  get now(): number | null {
    return this.time;
  }

  get agentCount(): number {
    return this.agents.size;
  }

  setTime(time: number): void {
    if (this.time !== null && time < this.time) {
      throw new RangeError(`${this.addr}: clock cannot move back from ${this.time} to ${time}`);
    }
    this.time = time;
  }

  register(agent: Agent): AgentProxy {
    if (this.stopped) {
      throw new RelayError(`${this.addr} is shut down`, { aid: agent.aid });
    }
    if (this.agents.has(agent.aid)) {
      throw new RelayError(`${this.addr} already hosts ${agent.aid}`, { aid: agent.aid });
    }
    this.agents.set(agent.aid, agent);
    return new AgentProxy(this, agent.aid);
  }

  async send(aid: string, request: AgentRequest): Promise<AgentReply> {
    if (this.stopped) {
      throw new RelayError(`${this.addr} is shut down`, { aid, request: request.kind });
    }
    const agent = this.agents.get(aid);
    if (!agent) {
      throw new RelayError(`${this.addr} does not host ${aid}`, { aid, request: request.kind });
    }
    await nextTurn();
    return agent.handle(request);
  }

  async shutdown(): Promise<void> {
    this.stopped = true;
    this.agents.clear();
  }
}

/** Typed client handle for one agent living in a container. */
export class AgentProxy {
  constructor(private readonly container: AgentContainer, readonly aid: string) {}

  get containerAddr(): string {
    return this.container.addr;
  }

  private unexpected(reply: AgentReply, expected: string): RelayError {
    return new RelayError(`${this.aid} answered ${reply.kind}, expected ${expected}`, {
      aid: this.aid,
    });
  }

  async updateState(time: number, powerKw: number): Promise<void> {
    const reply = await this.container.send(this.aid, {
      kind: 'update_state',
      time,
      state: { P: powerKw },
    });
    if (reply.kind !== 'ack') throw this.unexpected(reply, 'ack');
  }

  async getP(): Promise<PowerReport> {
    const reply = await this.container.send(this.aid, { kind: 'get_p' });
    if (reply.kind !== 'power') throw this.unexpected(reply, 'power');
    return reply.report;
  }

  async setPMax(pMax: PowerCap): Promise<void> {
    const reply = await this.container.send(this.aid, { kind: 'set_p_max', pMax });
    if (reply.kind !== 'ack') throw this.unexpected(reply, 'ack');
  }

  async getPMax(): Promise<PowerCap> {
    const reply = await this.container.send(this.aid, { kind: 'get_p_max' });
    if (reply.kind !== 'cap') throw this.unexpected(reply, 'cap');
    return reply.pMax;
  }
}
