import { beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { AgentContainer, AgentProxy } from '../src/agents/container';
import { ControllerAgent } from '../src/agents/controller';
import { WecsAgent } from '../src/agents/wecsAgent';
import { RelayError } from '../src/gateway/relayError';
import { DecisionHistory } from '../src/observability/decisionRecord';
import { getCounterValue, resetMetricsForTest } from '../src/observability/metrics';

const params = { pRatedKw: 100, vRated: 10, vMin: 1 };

function setUp(ceilingKw = 200, checkIntervalSeconds = 900) {
  const containers = [new AgentContainer(0), new AgentContainer(1)];
  const controller = new ControllerAgent({
    maxWindparkFeedinKw: ceilingKw,
    checkIntervalSeconds,
    startDate: '2016-01-01T00:00:00+01:00',
    history: new DecisionHistory(10),
  });
  const proxies = [0, 1, 2].map((idx) =>
    WecsAgent.create(containers[idx % 2], `agent-${idx}`, controller, params),
  );
  return { containers, controller, proxies };
}

async function report(
  containers: AgentContainer[],
  proxies: AgentProxy[],
  time: number,
  values: number[],
) {
  containers.forEach((c) => c.setTime(time));
  await Promise.all(proxies.map((p, idx) => p.updateState(time, values[idx])));
}

function caps(proxies: AgentProxy[]) {
  return Promise.all(proxies.map((p) => p.getPMax()));
}

describe('ControllerAgent', () => {
  beforeEach(() => resetMetricsForTest());

  it('curtails proportionally when the park exceeds the ceiling', async () => {
    const { containers, controller, proxies } = setUp();
    await report(containers, proxies, 0, [80, 90, 95]);

    const record = await controller.step(0);

    const factor = 200 / 265;
    assert.ok(record);
    assert.equal(record.action, 'curtail');
    assert.equal(record.totalKw, 265);
    assert.equal(record.factor, factor);
    assert.equal(record.timestamp, '2015-12-31T23:00:00.000Z');
    assert.deepEqual(await caps(proxies), [80 * factor, 90 * factor, 95 * factor]);
    assert.deepEqual(
      record.agents.map((a) => [a.agentId, a.powerKw]),
      [['agent-0', 80], ['agent-1', 90], ['agent-2', 95]],
    );
    assert.equal(getCounterValue('windpark_controller_activations_total', { action: 'curtail' }), 1);
  });

  it('only runs every check interval', async () => {
    const { containers, controller, proxies } = setUp(200, 1800);
    await report(containers, proxies, 0, [10, 10, 10]);
    assert.ok(await controller.step(0));

    await report(containers, proxies, 900, [10, 10, 10]);
    assert.equal(await controller.step(900), null);

    await report(containers, proxies, 1800, [10, 10, 10]);
    assert.ok(await controller.step(1800));
    assert.equal(controller.decisions.list().length, 2);
  });

  it('releases the caps once the park is back under the ceiling', async () => {
    const { containers, controller, proxies } = setUp();
    await report(containers, proxies, 0, [100, 100, 100]);
    await controller.step(0);
    const capped = 100 * (200 / 300);
    assert.deepEqual(await caps(proxies), [capped, capped, capped]);

    await report(containers, proxies, 900, [60, 60, 60]);
    const record = await controller.step(900);

    assert.equal(record?.action, 'release');
    assert.deepEqual(await caps(proxies), [null, null, null]);
  });

  it('keeps the caps in place when the park produces nothing', async () => {
    const { containers, controller, proxies } = setUp();
    await report(containers, proxies, 0, [100, 100, 100]);
    await controller.step(0);
    const before = await caps(proxies);

    await report(containers, proxies, 900, [0, 0, 0]);
    const record = await controller.step(900);

    assert.equal(record?.action, 'hold');
    assert.equal(record?.factor, null);
    assert.deepEqual(await caps(proxies), before);
  });

  it('fails the cycle when a report is stale', async () => {
    const { containers, controller, proxies } = setUp();
    await report(containers, proxies, 0, [1, 1, 1]);
    await controller.step(0);

    containers.forEach((c) => c.setTime(900));
    await proxies[0].updateState(900, 1);
    await proxies[1].updateState(900, 1);

    await assert.rejects(controller.step(900), (err: unknown) =>
      err instanceof RelayError && /agent-2 reported for t=0/.test(err.message),
    );
    assert.equal(getCounterValue('windpark_relay_errors_total', { stage: 'reports' }), 1);
  });

  it('rejects a second registration of the same agent', () => {
    const { controller, proxies } = setUp();
    assert.throws(() => controller.register(proxies[0]), /already registered/);
    assert.equal(controller.agents.length, 3);
  });

  it('does nothing after stop', async () => {
    const { containers, controller, proxies } = setUp();
    await report(containers, proxies, 0, [1, 1, 1]);
    await controller.stop();
    assert.equal(await controller.step(0), null);
  });
});
