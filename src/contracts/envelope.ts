import { JsonSchema } from './schemaValidator';

export const contractVersion = 1;

export type MessageSource = 'controller' | 'simulator' | 'unknown';
export type DeviceType = 'wecs';
export type MessageType = 'power_cap';

export interface MessageEnvelope {
  v: number;
  messageType: MessageType;
  messageId: string;
  deviceId: string;
  deviceType: DeviceType;
  timestampMs: number;
  sentAtMs?: number;
  correlationId?: string;
  source?: MessageSource;
}

export const envelopeProperties: Record<string, JsonSchema> = {
  v: { type: 'integer', minimum: 1 },
  messageType: { type: 'string', enum: ['power_cap'] },
  messageId: { type: 'string', format: 'uuid' },
  deviceId: { type: 'string', minLength: 1 },
  deviceType: { type: 'string', enum: ['wecs'] },
  timestampMs: { type: 'integer', minimum: 0 },
  sentAtMs: { type: 'integer', minimum: 0 },
  correlationId: { type: 'string', minLength: 1 },
  source: { type: 'string', enum: ['controller', 'simulator', 'unknown'] },
};

export const envelopeRequired = ['v', 'messageType', 'messageId', 'deviceId', 'deviceType', 'timestampMs'];

export const envelopeSchema: JsonSchema = {
  type: 'object',
  required: envelopeRequired,
  additionalProperties: false,
  properties: envelopeProperties,
};

export function isSupportedVersion(version: number): boolean {
  return version === contractVersion;
}
