import { PowerCap } from '../types/wecs';

export interface PowerReport {
  time: number;
  powerKw: number;
}

export type AgentRequest =
  | { kind: 'update_state'; time: number; state: { P: number } }
  | { kind: 'get_p' }
  | { kind: 'set_p_max'; pMax: PowerCap }
  | { kind: 'get_p_max' };

export type AgentReply =
  | { kind: 'ack' }
  | { kind: 'power'; report: PowerReport }
  | { kind: 'cap'; pMax: PowerCap };

export interface Agent {
  readonly aid: string;
  handle(request: AgentRequest): Promise<AgentReply>;
}
