import { JsonSchema } from './schemaValidator';

export const wecsParamsSchemaV1: JsonSchema = {
  type: 'object',
  required: ['pRatedKw', 'vRated', 'vMin'],
  additionalProperties: false,
  properties: {
    pRatedKw: { type: 'number', minimum: 0 },
    vRated: { type: 'number', minimum: 0 },
    vMin: { type: 'number', minimum: 0 },
    vMax: { type: 'number', minimum: 0 },
  },
};

export const scenarioSchemaV1: JsonSchema = {
  type: 'object',
  required: [
    'startDate',
    'durationSeconds',
    'stepSizeSeconds',
    'recordIntervalSeconds',
    'windFile',
    'wecs',
    'controller',
  ],
  additionalProperties: false,
  properties: {
    startDate: { type: 'string', format: 'date-time' },
    durationSeconds: { type: 'integer', minimum: 1 },
    stepSizeSeconds: { type: 'integer', minimum: 1 },
    recordIntervalSeconds: { type: 'integer', minimum: 1 },
    windFile: { type: 'string', minLength: 1 },
    wecs: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        required: ['count', 'params'],
        additionalProperties: false,
        properties: {
          count: { type: 'integer', minimum: 1 },
          params: wecsParamsSchemaV1,
        },
      },
    },
    controller: {
      type: 'object',
      required: ['maxWindparkFeedinKw', 'checkIntervalSeconds'],
      additionalProperties: false,
      properties: {
        maxWindparkFeedinKw: { type: 'number', minimum: 0 },
        checkIntervalSeconds: { type: 'integer', minimum: 1 },
      },
    },
  },
};
