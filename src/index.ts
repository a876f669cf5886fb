import { randomUUID } from 'crypto';
import config from './config';
import logger from './logger';
import { startMqttClient, stopMqttClient } from './mqttClient';
import { DecisionHistory } from './observability/decisionRecord';
import { createArchiveStore } from './recorder';
import { loadScenario } from './scenario/scenarioConfig';
import { WindParkScenario } from './scenario/windParkScenario';
import { startServer, StartedServer } from './server';

async function main(): Promise<void> {
  const scenario = await loadScenario(config.scenarioFile);
  const store = createArchiveStore();
  const decisions = new DecisionHistory();

  let server: StartedServer | null = null;
  if (config.serverEnabled) {
    server = await startServer({ store, decisions });
  }

  const runId = randomUUID();
  const capPublisher = startMqttClient(runId);

  const shutdown = async () => {
    await stopMqttClient();
    await server?.stop();
    await store.close();
  };

  try {
    const result = await new WindParkScenario(scenario, {
      store,
      history: decisions,
      runId,
      capPublisher,
    }).run();
    logger.info('[startup] scenario complete', { ...result });
  } finally {
    await stopMqttClient();
  }

  if (!server) {
    await shutdown();
    return;
  }

  logger.info('[startup] run finished; status API stays up until SIGINT/SIGTERM');
  const onSignal = () => {
    shutdown()
      .then(() => process.exit(0))
      .catch((err) => {
        logger.error({ err }, '[startup] shutdown failed');
        process.exit(1);
      });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
}

main().catch((err) => {
  logger.error({ err }, '[startup] failed to run scenario');
  process.exit(1);
});
