import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { WindFeedExhaustedError, windFeedFromRows } from '../src/data/windFeed';
import { SimulatorApiError, WECS_META, WECS_MODEL, WecsSim } from '../src/simulators/wecsSim';
import { WecsParams } from '../src/types/wecs';

const base: Omit<WecsParams, 'pRatedKw'> = { vRated: 10, vMin: 1, vMax: 15 };

function setUp(): WecsSim {
  const sim = new WecsSim();
  const meta = sim.init('WecsSim-0', {
    windFeed: windFeedFromRows([[5, 10], [10, 10]], 900),
    stepSizeSeconds: 900,
  });
  assert.deepEqual(meta, WECS_META);

  const first = sim.create(2, WECS_MODEL, { ...base, pRatedKw: 10 });
  const second = sim.create(1, WECS_MODEL, { ...base, pRatedKw: 20 });
  assert.deepEqual(first, [
    { eid: 'wecs-0', type: WECS_MODEL },
    { eid: 'wecs-1', type: WECS_MODEL },
  ]);
  assert.deepEqual(second, [{ eid: 'wecs-2', type: WECS_MODEL }]);
  sim.setupDone();
  return sim;
}

const allOutputs = {
  'wecs-0': ['P', 'P_max'],
  'wecs-1': ['P', 'P_max'],
  'wecs-2': ['P', 'P_max'],
};

describe('WecsSim', () => {
  it('steps the fleet, applies caps and runs out of wind', async () => {
    const sim = setUp();

    assert.equal(await sim.step(0, {}), 900);
    assert.deepEqual(sim.getData(allOutputs), {
      'wecs-0': { P: 1.25, P_max: null },
      'wecs-1': { P: 10, P_max: null },
      'wecs-2': { P: 2.5, P_max: null },
    });

    const next = await sim.step(900, {
      'wecs-1': { P_max: { 'agent-1': 5 } },
      'wecs-2': { P_max: { 'agent-2': 12 } },
    });
    assert.equal(next, 1800);
    assert.deepEqual(sim.getData(allOutputs), {
      'wecs-0': { P: 10, P_max: null },
      'wecs-1': { P: 5, P_max: 5 },
      'wecs-2': { P: 12, P_max: 12 },
    });

    await assert.rejects(sim.step(1800, {}), WindFeedExhaustedError);
  });

  it('treats caps as valid for one step only', async () => {
    const sim = setUp();
    await sim.step(0, { 'wecs-1': { P_max: { 'agent-1': 5 } } });
    assert.deepEqual(sim.getData({ 'wecs-1': ['P', 'P_max'] }), { 'wecs-1': { P: 5, P_max: 5 } });

    await sim.step(900, {});
    assert.deepEqual(sim.getData({ 'wecs-1': ['P', 'P_max'] }), { 'wecs-1': { P: 10, P_max: null } });
  });

  it('reports wind speed per entity using the series round-robin', async () => {
    const sim = setUp();
    await sim.step(0, {});
    assert.deepEqual(sim.getData({ 'wecs-0': ['v'], 'wecs-1': ['v'], 'wecs-2': ['v'] }), {
      'wecs-0': { v: 5 },
      'wecs-1': { v: 10 },
      'wecs-2': { v: 5 },
    });
  });

  it('rejects caps from more than one source', async () => {
    const sim = setUp();
    await assert.rejects(
      sim.step(0, { 'wecs-0': { P_max: { 'agent-0': 1, 'agent-9': 2 } } }),
      /expects exactly one source/,
    );
  });

  it('rejects unknown entities, attributes and early reads', async () => {
    const sim = setUp();
    assert.throws(() => sim.getData({ 'wecs-0': ['P'] }), /before the first step/);
    await assert.rejects(sim.step(0, { 'wecs-0': { P: { x: 1 } } }), SimulatorApiError);
    await assert.rejects(sim.step(0, { 'wecs-9': { P_max: { x: 1 } } }), /unknown entity ID "wecs-9"/);
  });

  it('rejects unknown models and late creation', () => {
    const sim = setUp();
    assert.throws(() => sim.create(1, WECS_MODEL, { ...base, pRatedKw: 1 }), /after setup is done/);
    assert.throws(() => new WecsSim().create(1, 'PV', { ...base, pRatedKw: 1 }), /unknown model PV/);
  });
});
