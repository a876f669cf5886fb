import { computeFeedinCorrection } from '../controllers/feedinLimiter';
import { RelayError } from '../gateway/relayError';
import logger from '../logger';
import {
  DecisionHistory,
  DecisionRecord,
  DecisionRecordBuilder,
} from '../observability/decisionRecord';
import {
  incrementCounter,
  observeHistogram,
  setGaugeValue,
} from '../observability/metrics';
import { ControllerConfig } from '../types/wecs';
import { simTimeToIso } from '../utils/time';
import { AgentProxy } from './container';

export interface ControllerAgentOptions extends ControllerConfig {
  startDate: string;
  history?: DecisionHistory;
}

/**
 * Knows every WecsAgent of the wind park. Every `checkIntervalSeconds` it
 * collects the current output of all units and curtails them proportionally
 * when the park exceeds `maxWindparkFeedinKw`.
 */
export class ControllerAgent {
  private readonly wecs: AgentProxy[] = [];
  private readonly ceilingKw: number;
  private readonly checkIntervalSeconds: number;
  private readonly startDate: string;
  private readonly history: DecisionHistory;
  private nextCheck = 0;
  private stopped = false;

  constructor(options: ControllerAgentOptions) {
    this.ceilingKw = options.maxWindparkFeedinKw;
    this.checkIntervalSeconds = options.checkIntervalSeconds;
    this.startDate = options.startDate;
    this.history = options.history ?? new DecisionHistory();
    setGaugeValue('windpark_feedin_ceiling_kw', this.ceilingKw);
  }

  register(proxy: AgentProxy): void {
    if (this.wecs.some((p) => p.aid === proxy.aid)) {
      throw new RelayError(`${proxy.aid} is already registered with the controller`, {
        aid: proxy.aid,
      });
    }
    this.wecs.push(proxy);
    setGaugeValue('windpark_registered_agents', this.wecs.length);
  }

  get agents(): readonly AgentProxy[] {
    return this.wecs;
  }

  get decisions(): DecisionHistory {
    return this.history;
  }

  isDue(time: number): boolean {
    return !this.stopped && time >= this.nextCheck;
  }

  /** Run the feed-in check if one is due at `time`; `null` when not due. */
  async step(time: number): Promise<DecisionRecord | null> {
    if (!this.isDue(time)) return null;

    const startedAt = Date.now();
    const builder = new DecisionRecordBuilder(startedAt, {
      simTime: time,
      timestamp: simTimeToIso(this.startDate, time),
      ceilingKw: this.ceilingKw,
    });

    const reports = await Promise.all(this.wecs.map((w) => w.getP()));
    reports.forEach((report, idx) => {
      if (report.time !== time) {
        incrementCounter('windpark_relay_errors_total', { stage: 'reports' });
        throw new RelayError(
          `${this.wecs[idx].aid} reported for t=${report.time}, controller runs at t=${time}`,
          { aid: this.wecs[idx].aid, time },
        );
      }
    });
    const outputs = reports.map((r) => r.powerKw);
    const correction = computeFeedinCorrection(outputs, this.ceilingKw);

    if (correction.action !== 'hold') {
      const caps = correction.caps;
      await Promise.all(this.wecs.map((w, idx) => w.setPMax(caps[idx] ?? null)));
    }
    const currentCaps = await Promise.all(this.wecs.map((w) => w.getPMax()));

    builder.setOutcome({
      action: correction.action,
      totalKw: correction.totalKw,
      factor: correction.action === 'curtail' ? correction.factor : null,
    });
    this.wecs.forEach((w, idx) => {
      builder.addAgent({ agentId: w.aid, powerKw: outputs[idx], capKw: currentCaps[idx] });
    });

    while (this.nextCheck <= time) {
      this.nextCheck += this.checkIntervalSeconds;
    }

    const record = builder.finalize(Date.now());
    this.history.push(record);
    builder.log(record);

    incrementCounter('windpark_controller_activations_total', { action: correction.action });
    observeHistogram('windpark_controller_cycle_duration_seconds', record.durationMs / 1000);
    setGaugeValue('windpark_feedin_kw', correction.totalKw);
    if (correction.action === 'curtail') {
      setGaugeValue('windpark_curtailment_factor', correction.factor);
    } else if (correction.action === 'release') {
      setGaugeValue('windpark_curtailment_factor', 1);
    }
    setGaugeValue('windpark_capped_entities', currentCaps.filter((c) => c !== null).length);

    if (correction.action === 'curtail') {
      logger.debug('[controller] curtailing wind park', {
        time,
        totalKw: correction.totalKw,
        factor: correction.factor,
      });
    }
    return record;
  }

  async stop(): Promise<void> {
    this.stopped = true;
  }
}
