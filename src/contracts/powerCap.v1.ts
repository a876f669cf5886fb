import { DeviceType, envelopeProperties, envelopeRequired, MessageEnvelope } from './envelope';
import { JsonSchema } from './schemaValidator';

export interface PowerCapPayloadV1 {
  /** `null` lifts the cap. */
  pMaxKw: number | null;
  simTimestamp: string;
  runId?: string;
}

export interface PowerCapMessageV1 extends MessageEnvelope {
  messageType: 'power_cap';
  deviceType: DeviceType;
  payload: PowerCapPayloadV1;
}

export const powerCapPayloadSchemaV1: JsonSchema = {
  type: 'object',
  required: ['pMaxKw', 'simTimestamp'],
  additionalProperties: false,
  properties: {
    pMaxKw: { type: 'number', minimum: 0, nullable: true },
    simTimestamp: { type: 'string', format: 'date-time' },
    runId: { type: 'string', minLength: 1 },
  },
};

export const powerCapMessageSchemaV1: JsonSchema = {
  type: 'object',
  required: [...envelopeRequired, 'payload'],
  additionalProperties: false,
  properties: {
    ...envelopeProperties,
    messageType: { type: 'string', enum: ['power_cap'] },
    payload: powerCapPayloadSchemaV1,
  },
};
