import { randomUUID } from 'crypto';
import config from '../config';
import logger from '../logger';
import { PowerCap } from '../types/wecs';

export type AgentDecisionRecord = {
  agentId: string;
  powerKw: number;
  capKw: PowerCap;
};

export type DecisionRecord = {
  cycleId: string;
  simTime: number;
  timestamp: string;
  startedAtMs: number;
  finishedAtMs: number;
  durationMs: number;
  ceilingKw: number;
  totalKw: number;
  action: 'hold' | 'release' | 'curtail';
  factor: number | null;
  agents: AgentDecisionRecord[];
};

export class DecisionRecordBuilder {
  private readonly record: DecisionRecord;

  constructor(
    startedAtMs: number,
    init: { simTime: number; timestamp: string; ceilingKw: number },
    cycleId?: string,
  ) {
    this.record = {
      cycleId: cycleId ?? randomUUID(),
      simTime: init.simTime,
      timestamp: init.timestamp,
      startedAtMs,
      finishedAtMs: startedAtMs,
      durationMs: 0,
      ceilingKw: init.ceilingKw,
      totalKw: 0,
      action: 'hold',
      factor: null,
      agents: [],
    };
  }

  setOutcome(outcome: { action: DecisionRecord['action']; totalKw: number; factor?: number | null }) {
    this.record.action = outcome.action;
    this.record.totalKw = outcome.totalKw;
    this.record.factor = outcome.factor ?? null;
  }

  addAgent(agent: AgentDecisionRecord) {
    this.record.agents.push(agent);
  }

  finalize(finishedAtMs: number): DecisionRecord {
    this.record.finishedAtMs = finishedAtMs;
    this.record.durationMs = Math.max(0, finishedAtMs - this.record.startedAtMs);
    return this.record;
  }

  log(record: DecisionRecord = this.record) {
    const meta: Record<string, unknown> = { ...record };
    if (config.observability.decisionLogLevel === 'debug') {
      logger.debug('[decision] controller cycle', meta);
    } else {
      logger.info('[decision] controller cycle', meta);
    }
  }
}

/** Most recent decision records, oldest first. */
export class DecisionHistory {
  private readonly records: DecisionRecord[] = [];

  constructor(private readonly capacity = config.observability.decisionHistorySize) {}

  push(record: DecisionRecord): void {
    this.records.push(record);
    while (this.records.length > this.capacity) {
      this.records.shift();
    }
  }

  list(limit?: number): DecisionRecord[] {
    const items = limit !== undefined && limit < this.records.length
      ? this.records.slice(this.records.length - limit)
      : this.records;
    return items.map((r) => ({ ...r, agents: r.agents.map((a) => ({ ...a })) }));
  }

  latest(): DecisionRecord | null {
    return this.records[this.records.length - 1] ?? null;
  }

  clear(): void {
    this.records.length = 0;
  }
}
