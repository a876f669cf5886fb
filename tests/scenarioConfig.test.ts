import { after, before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { loadScenario, parseScenario, ScenarioConfigError } from '../src/scenario/scenarioConfig';

function scenarioDoc(): Record<string, unknown> {
  return {
    startDate: '2016-01-01T00:00:00+01:00',
    durationSeconds: 86400,
    stepSizeSeconds: 900,
    recordIntervalSeconds: 900,
    windFile: 'wind.csv',
    wecs: [
      { count: 2, params: { pRatedKw: 2000, vRated: 12, vMin: 2, vMax: 25 } },
      { count: 1, params: { pRatedKw: 5000, vRated: 13, vMin: 3.5 } },
    ],
    controller: { maxWindparkFeedinKw: 7000, checkIntervalSeconds: 900 },
  };
}

function detailsOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    assert.ok(err instanceof ScenarioConfigError);
    return err.details;
  }
  assert.fail('expected a ScenarioConfigError');
}

describe('scenario configuration', () => {
  let dir: string;

  before(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'scenario-'));
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('accepts a consistent scenario', () => {
    const scenario = parseScenario(scenarioDoc());
    assert.equal(scenario.wecs.length, 2);
    assert.equal(scenario.wecs[1].params.vMax, undefined);
  });

  it('reports schema violations with their paths', () => {
    const doc = scenarioDoc();
    doc.stepSizeSeconds = 0;
    delete doc.controller;
    assert.deepEqual(detailsOf(() => parseScenario(doc)), [
      'root.controller is required',
      'root.stepSizeSeconds must be >= 1',
    ]);
  });

  it('rejects unknown keys', () => {
    const doc = { ...scenarioDoc(), seed: 42 };
    assert.deepEqual(detailsOf(() => parseScenario(doc)), ['root.seed is not allowed']);
  });

  it('rejects intervals shorter than a step and inconsistent WECS params', () => {
    const doc = {
      ...scenarioDoc(),
      recordIntervalSeconds: 60,
      controller: { maxWindparkFeedinKw: 7000, checkIntervalSeconds: 300 },
      wecs: [{ count: 1, params: { pRatedKw: 10, vRated: 5, vMin: 6 } }],
    };
    assert.deepEqual(detailsOf(() => parseScenario(doc)), [
      'controller.checkIntervalSeconds must be >= stepSizeSeconds',
      'recordIntervalSeconds must be >= stepSizeSeconds',
      'wecs[0].params.vMin must be lower than vRated',
    ]);
  });

  it('rejects a malformed start date', () => {
    const doc = { ...scenarioDoc(), startDate: 'yesterday' };
    assert.deepEqual(detailsOf(() => parseScenario(doc)), ['root.startDate must be an ISO 8601 date-time']);
  });

  it('loads a file and resolves the wind file next to it', async () => {
    const file = path.join(dir, 'scenario.json');
    await writeFile(file, JSON.stringify(scenarioDoc()));

    const scenario = await loadScenario(file);

    assert.equal(scenario.windFile, path.join(dir, 'wind.csv'));
  });

  it('fails on unreadable or invalid JSON files', async () => {
    const file = path.join(dir, 'broken.json');
    await writeFile(file, '{ "startDate": ');
    await assert.rejects(loadScenario(file), /is not valid JSON/);
    await assert.rejects(loadScenario(path.join(dir, 'missing.json')), ScenarioConfigError);
  });
});
