const nullableNumber = { type: 'number', nullable: true };

const decisionSchema = {
  type: 'object',
  properties: {
    cycleId: { type: 'string', format: 'uuid' },
    simTime: { type: 'number' },
    timestamp: { type: 'string', format: 'date-time' },
    durationMs: { type: 'number' },
    ceilingKw: { type: 'number' },
    totalKw: { type: 'number' },
    action: { type: 'string', enum: ['hold', 'release', 'curtail'] },
    factor: nullableNumber,
    agents: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          agentId: { type: 'string', example: 'agent-0' },
          powerKw: { type: 'number' },
          capKw: nullableNumber,
        },
      },
    },
  },
};

export const openApiSpec = {
  openapi: '3.0.0',
  info: {
    title: 'Wind Park Co-Simulation API',
    version: '1.0.0',
    description:
      'Read-only status API of a wind park co-simulation run: run progress, controller decisions and archived WECS data.',
  },
  servers: [{ url: 'http://localhost:3001' }],
  paths: {
    '/api/health': {
      get: {
        summary: 'Health check',
        responses: {
          200: {
            description: 'Archive, MQTT and run state',
            content: {
              'application/json': {
                schema: {
                  type: 'object',
                  properties: {
                    status: { type: 'string', enum: ['ok', 'degraded'] },
                    archive: {
                      type: 'object',
                      properties: {
                        backend: { type: 'string', enum: ['memory', 'jsonl', 'postgres'] },
                        ready: { type: 'boolean' },
                        reason: { type: 'string', nullable: true },
                      },
                    },
                    mqtt: {
                      type: 'object',
                      properties: {
                        enabled: { type: 'boolean' },
                        host: { type: 'string' },
                        port: { type: 'number' },
                        connected: { type: 'boolean' },
                        lastError: { type: 'string', nullable: true },
                      },
                    },
                    run: {
                      type: 'object',
                      properties: {
                        status: { type: 'string', enum: ['idle', 'running', 'done', 'failed'] },
                        runId: { type: 'string', nullable: true },
                      },
                    },
                  },
                },
              },
            },
          },
        },
      },
    },
    '/api/run': {
      get: {
        summary: 'State of the current or last run',
        responses: {
          200: {
            description: 'Run snapshot with the latest controller decision',
            content: {
              'application/json': {
                schema: {
                  type: 'object',
                  properties: {
                    status: { type: 'string', enum: ['idle', 'running', 'done', 'failed'] },
                    runId: { type: 'string', nullable: true },
                    startedAtIso: { type: 'string', format: 'date-time', nullable: true },
                    finishedAtIso: { type: 'string', format: 'date-time', nullable: true },
                    simTimeSeconds: nullableNumber,
                    durationSeconds: nullableNumber,
                    stepsCompleted: { type: 'number' },
                    lastStepDurationMs: nullableNumber,
                    progress: { type: 'number', minimum: 0, maximum: 1 },
                    lastError: {
                      type: 'object',
                      nullable: true,
                      properties: { name: { type: 'string' }, message: { type: 'string' } },
                    },
                    lastDecision: { ...decisionSchema, nullable: true },
                  },
                },
              },
            },
          },
        },
      },
    },
    '/api/run/decisions': {
      get: {
        summary: 'Recent controller decisions, oldest first',
        parameters: [
          { name: 'limit', in: 'query', required: false, schema: { type: 'integer', minimum: 1 } },
        ],
        responses: {
          200: {
            description: 'Decision records',
            content: {
              'application/json': { schema: { type: 'array', items: decisionSchema } },
            },
          },
          400: { description: 'Malformed limit' },
        },
      },
    },
    '/api/archive': {
      get: {
        summary: 'Archived WECS records, newest last',
        parameters: [
          { name: 'entityId', in: 'query', required: false, schema: { type: 'string' } },
          { name: 'runId', in: 'query', required: false, schema: { type: 'string' } },
          { name: 'limit', in: 'query', required: false, schema: { type: 'integer', minimum: 1 } },
        ],
        responses: {
          200: {
            description: 'Archive records; an uncapped entity reports powerCapKw "uncapped"',
            content: {
              'application/json': {
                schema: {
                  type: 'object',
                  properties: {
                    backend: { type: 'string' },
                    count: { type: 'number' },
                    records: {
                      type: 'array',
                      items: {
                        type: 'object',
                        properties: {
                          runId: { type: 'string' },
                          seq: { type: 'integer' },
                          time: { type: 'integer' },
                          timestamp: { type: 'string', format: 'date-time' },
                          entityId: { type: 'string', example: 'wecs-0' },
                          windSpeed: { type: 'number' },
                          activePowerKw: { type: 'number' },
                          powerCapKw: {
                            oneOf: [{ type: 'number' }, { type: 'string', enum: ['uncapped'] }],
                          },
                        },
                      },
                    },
                  },
                },
              },
            },
          },
          400: { description: 'Malformed query' },
        },
      },
    },
  },
};
