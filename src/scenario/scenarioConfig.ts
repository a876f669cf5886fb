import { readFile } from 'fs/promises';
import path from 'path';
import { ContractValidationError, validateScenarioDocument } from '../contracts';
import { validateWecsParams } from '../models/wecs';
import { ScenarioConfig } from '../types/wecs';
import { parseStartDate } from '../utils/time';

export class ScenarioConfigError extends Error {
  constructor(message: string, public readonly details: string[] = []) {
    super(message);
    this.name = 'ScenarioConfigError';
  }
}

/**
 * Validate a decoded scenario document. Shape errors come from the JSON
 * schema, the rest are cross-field checks the schema cannot express.
 */
export function parseScenario(value: unknown): ScenarioConfig {
  let scenario: ScenarioConfig;
  try {
    scenario = validateScenarioDocument(value);
  } catch (err) {
    if (err instanceof ContractValidationError) {
      throw new ScenarioConfigError('scenario does not match the schema', err.details ?? []);
    }
    throw err;
  }

  const problems: string[] = [];
  try {
    parseStartDate(scenario.startDate);
  } catch (err) {
    problems.push(err instanceof Error ? err.message : String(err));
  }

  const step = scenario.stepSizeSeconds;
  if (scenario.controller.checkIntervalSeconds < step) {
    problems.push('controller.checkIntervalSeconds must be >= stepSizeSeconds');
  }
  if (scenario.recordIntervalSeconds < step) {
    problems.push('recordIntervalSeconds must be >= stepSizeSeconds');
  }
  if (scenario.durationSeconds < step) {
    problems.push('durationSeconds must cover at least one step');
  }

  scenario.wecs.forEach((group, idx) => {
    try {
      validateWecsParams(group.params, `wecs[${idx}].params`);
    } catch (err) {
      problems.push(err instanceof Error ? err.message : String(err));
    }
  });

  if (problems.length > 0) {
    throw new ScenarioConfigError('scenario is inconsistent', problems);
  }
  return scenario;
}

/** Load a scenario file; a relative `windFile` is resolved against the scenario's directory. */
export async function loadScenario(filePath: string): Promise<ScenarioConfig> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new ScenarioConfigError(
      `scenario file ${filePath} is not readable: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (err) {
    throw new ScenarioConfigError(
      `scenario file ${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const scenario = parseScenario(doc);
  return {
    ...scenario,
    windFile: path.resolve(path.dirname(filePath), scenario.windFile),
  };
}
