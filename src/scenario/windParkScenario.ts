import { randomUUID } from 'crypto';
import { ControllerAgent } from '../agents/controller';
import config from '../config';
import { openWindFeed, WindFeed } from '../data/windFeed';
import { AgentGateway, WECS_AGENT_MODEL } from '../gateway/agentGateway';
import logger from '../logger';
import type { CapPublisher } from '../messaging/capPublisher';
import { DecisionHistory } from '../observability/decisionRecord';
import {
  incrementCounter,
  observeHistogram,
  setGaugeValue,
} from '../observability/metrics';
import { ArchiveStore } from '../recorder/archiveStore';
import { DataRecorder, RECORDED_ATTRS } from '../recorder/dataRecorder';
import { WECS_MODEL, WecsSim } from '../simulators/wecsSim';
import {
  markRunDone,
  markRunFailed,
  markRunStart,
  markStepComplete,
} from '../state/runMonitor';
import { OutputData, OutputRequest, SetData, StepInputs } from '../types/simulator';
import { ScenarioConfig } from '../types/wecs';

export interface ScenarioDeps {
  store: ArchiveStore;
  /** Defaults to the scenario's wind file. */
  windFeed?: WindFeed;
  capPublisher?: CapPublisher | null;
  containerCount?: number;
  stepTimeoutMs?: number;
  runId?: string;
  history?: DecisionHistory;
}

export interface ScenarioResult {
  runId: string;
  steps: number;
  recordsWritten: number;
  finalTime: number;
}

/** Route the gateway's caps (`agent -> entity -> P_max`) to the simulator's inputs. */
export function capsToSimInputs(setData: SetData): StepInputs {
  const inputs: StepInputs = {};
  for (const [aid, targets] of Object.entries(setData)) {
    for (const [eid, attrs] of Object.entries(targets)) {
      for (const [attr, value] of Object.entries(attrs)) {
        const entity = inputs[eid] ?? {};
        const sources = entity[attr] ?? {};
        sources[aid] = value;
        entity[attr] = sources;
        inputs[eid] = entity;
      }
    }
  }
  return inputs;
}

/** Route each entity's `P` to the agent it is paired with. */
export function outputsToAgentInputs(data: OutputData, relations: Record<string, string>): StepInputs {
  const inputs: StepInputs = {};
  for (const [aid, eid] of Object.entries(relations)) {
    const value = data[eid]?.P;
    if (value === undefined) continue;
    inputs[aid] = { P: { [eid]: value } };
  }
  return inputs;
}

/**
 * One co-simulation run: the physical WECS simulator, the agent gateway and
 * the data recorder advance in lockstep until `durationSeconds`. Caps the
 * controller decides at `t` reach the simulator at the next step.
 */
export class WindParkScenario {
  readonly runId: string;
  readonly controller: ControllerAgent;
  readonly simulator = new WecsSim();
  readonly gateway = new AgentGateway();
  readonly recorder: DataRecorder;
  private readonly relations: Record<string, string> = {};

  constructor(private readonly scenario: ScenarioConfig, private readonly deps: ScenarioDeps) {
    this.runId = deps.runId ?? randomUUID();
    this.controller = new ControllerAgent({
      ...scenario.controller,
      startDate: scenario.startDate,
      history: deps.history,
    });
    this.recorder = new DataRecorder(deps.store, {
      runId: this.runId,
      startDate: scenario.startDate,
      recordIntervalSeconds: scenario.recordIntervalSeconds,
    });
  }

  private async setup(): Promise<void> {
    const { scenario, deps } = this;
    const windFeed =
      deps.windFeed ?? (await openWindFeed(scenario.windFile, scenario.stepSizeSeconds));

    this.simulator.init('WecsSim-0', { windFeed, stepSizeSeconds: scenario.stepSizeSeconds });
    this.gateway.init('WindParkAgents-0', {
      startDate: scenario.startDate,
      controller: this.controller,
      containerCount: deps.containerCount ?? config.mas.containerCount,
      stepSizeSeconds: scenario.stepSizeSeconds,
      stepTimeoutMs: deps.stepTimeoutMs ?? config.mas.stepTimeoutMs,
      capPublisher: deps.capPublisher ?? null,
    });

    // One (WECS, agent) pair at a time so that wecs-<n> pairs with agent-<n>.
    for (const group of scenario.wecs) {
      for (let i = 0; i < group.count; i += 1) {
        const [entity] = this.simulator.create(1, WECS_MODEL, group.params);
        const [agent] = this.gateway.create(1, WECS_AGENT_MODEL, group.params);
        this.relations[agent.eid] = entity.eid;
      }
    }

    this.simulator.setupDone();
    this.gateway.setupDone(this.relations);
    this.recorder.connect(this.simulator.entityIds);
    await this.recorder.init();

    logger.info('[scenario] setup done', {
      runId: this.runId,
      entities: this.simulator.entityCount,
      ceilingKw: scenario.controller.maxWindparkFeedinKw,
    });
  }

  async run(): Promise<ScenarioResult> {
    const { scenario } = this;
    markRunStart(this.runId, scenario.durationSeconds);
    let time = 0;
    let steps = 0;

    try {
      await this.setup();
      const outputs: OutputRequest = {};
      for (const eid of this.simulator.entityIds) {
        outputs[eid] = [...RECORDED_ATTRS];
      }

      let pendingCaps: StepInputs = {};
      while (time < scenario.durationSeconds) {
        const startedAt = Date.now();

        const simNext = await this.simulator.step(time, pendingCaps);
        const data = this.simulator.getData(outputs);
        await this.recorder.step(time, data);

        const { nextTime, setData } = await this.gateway.step(
          time,
          outputsToAgentInputs(data, this.relations),
        );
        pendingCaps = capsToSimInputs(setData);

        const durationMs = Date.now() - startedAt;
        steps += 1;
        markStepComplete(time, durationMs);
        incrementCounter('windpark_steps_total');
        observeHistogram('windpark_step_duration_seconds', durationMs / 1000);
        setGaugeValue('windpark_sim_time_seconds', time);

        time = Math.min(simNext, nextTime);
      }

      markRunDone();
      logger.info('[scenario] run finished', {
        runId: this.runId,
        steps,
        records: this.recorder.rowsWritten,
      });
      return {
        runId: this.runId,
        steps,
        recordsWritten: this.recorder.rowsWritten,
        finalTime: time,
      };
    } catch (err) {
      markRunFailed(err);
      incrementCounter('windpark_run_errors_total', {
        error: err instanceof Error ? err.name : 'Error',
      });
      logger.error({ err, runId: this.runId, time }, '[scenario] run failed');
      throw err;
    } finally {
      await this.simulator.finalize();
      await this.gateway.finalize();
    }
  }
}

export async function runScenario(scenario: ScenarioConfig, deps: ScenarioDeps): Promise<ScenarioResult> {
  return new WindParkScenario(scenario, deps).run();
}
