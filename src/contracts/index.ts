import { JsonSchema, validateWithSchema } from './schemaValidator';
import { contractVersion, envelopeSchema, isSupportedVersion, MessageEnvelope } from './envelope';
import {
  PowerCapMessageV1,
  PowerCapPayloadV1,
  powerCapMessageSchemaV1,
  powerCapPayloadSchemaV1,
} from './powerCap.v1';
import { scenarioSchemaV1, wecsParamsSchemaV1 } from './scenario.v1';
import { ScenarioConfig } from '../types/wecs';

export {
  contractVersion,
  envelopeSchema,
  isSupportedVersion,
  powerCapMessageSchemaV1,
  powerCapPayloadSchemaV1,
  scenarioSchemaV1,
  wecsParamsSchemaV1,
};

export type { MessageEnvelope, PowerCapMessageV1, PowerCapPayloadV1 };

export class ContractValidationError extends Error {
  constructor(message: string, public details?: string[]) {
    super(message);
    this.name = 'ContractValidationError';
  }
}

function validateOrThrow<T>(schema: JsonSchema, value: unknown, label: string, lenient: boolean): T {
  const res = validateWithSchema<T>(schema, value, lenient);
  if (!res.success || res.value === undefined) {
    throw new ContractValidationError(`${label} validation failed`, res.errors);
  }
  return res.value;
}

function assertVersion(message: MessageEnvelope): void {
  if (!isSupportedVersion(message.v)) {
    throw new ContractValidationError('Unsupported message version', [`v=${message.v}`]);
  }
}

export function validateEnvelope(value: unknown, lenient = false): MessageEnvelope {
  const envelope = validateOrThrow<MessageEnvelope>(envelopeSchema, value, 'Envelope', lenient);
  assertVersion(envelope);
  return envelope;
}

export function validatePowerCapMessage(value: unknown, lenient = false): PowerCapMessageV1 {
  const message = validateOrThrow<PowerCapMessageV1>(
    powerCapMessageSchemaV1,
    value,
    'Power cap',
    lenient,
  );
  assertVersion(message);
  return message;
}

export function validatePowerCapPayload(value: unknown, lenient = false): PowerCapPayloadV1 {
  return validateOrThrow<PowerCapPayloadV1>(
    powerCapPayloadSchemaV1,
    value,
    'Power cap payload',
    lenient,
  );
}

/** Shape check only; semantic checks live in the scenario loader. */
export function validateScenarioDocument(value: unknown): ScenarioConfig {
  return validateOrThrow<ScenarioConfig>(scenarioSchemaV1, value, 'Scenario', false);
}
