/**
 * MQTT publishing client.
 *
 * Power caps decided by the controller are published retained at QoS 1 to
 * `<topicPrefix>/wecs/<entityId>/power-cap` so a device that reconnects gets
 * the latest cap. The broker is optional: with MQTT disabled no client is
 * created and the run proceeds on the in-process relay path alone.
 */
import fs from 'fs';
import { connect, type IClientOptions, type MqttClient } from 'mqtt';
import config, { MqttConfig } from './config';
import logger from './logger';
import { MqttCapPublisher } from './messaging/capPublisher';
import { incrementCounter } from './observability/metrics';
import { setMqttReady } from './state/readiness';

export let mqttClient: MqttClient | null = null;
let lastError: string | null = null;

export function buildMqttOptions(mqttConfig: MqttConfig = config.mqtt): IClientOptions {
  const protocol = mqttConfig.tls.enabled ? 'mqtts' : 'mqtt';

  const tlsOptions: IClientOptions = mqttConfig.tls.enabled
    ? {
        protocol,
        ca: mqttConfig.tls.caPath ? fs.readFileSync(mqttConfig.tls.caPath) : undefined,
        cert: mqttConfig.tls.certPath ? fs.readFileSync(mqttConfig.tls.certPath) : undefined,
        key: mqttConfig.tls.keyPath ? fs.readFileSync(mqttConfig.tls.keyPath) : undefined,
        rejectUnauthorized: mqttConfig.tls.rejectUnauthorized,
      }
    : { protocol };

  const authOptions: IClientOptions = mqttConfig.auth.username
    ? { username: mqttConfig.auth.username, password: mqttConfig.auth.password }
    : {};

  return {
    host: mqttConfig.host,
    port: mqttConfig.port,
    ...tlsOptions,
    ...authOptions,
  };
}

/**
 * Create the MQTT client and a cap publisher on top of it.
 *
 * NOTE: This function returns immediately; it does NOT wait for the broker
 * connection. Publishes issued while offline are queued by the client and
 * fall back to the publisher's timeout.
 */
export function startMqttClient(runId?: string): MqttCapPublisher | null {
  if (!config.mqtt.enabled) {
    setMqttReady(false, 'disabled');
    return null;
  }

  setMqttReady(false, 'connecting');
  const client = connect(buildMqttOptions());
  mqttClient = client;

  client.on('connect', () => {
    lastError = null;
    setMqttReady(true);
    logger.info('[mqttClient] connected to MQTT broker', {
      host: config.mqtt.host,
      port: config.mqtt.port,
    });
  });

  client.on('error', (err: Error) => {
    lastError = err.message;
    setMqttReady(false, err.message);
    logger.error({ err }, '[mqttClient] connection error');
    incrementCounter('windpark_cap_publish_total', { result: 'connection_error' });
  });

  client.on('reconnect', () => {
    setMqttReady(false, 'reconnecting');
    logger.warn('[mqttClient] reconnecting to broker...');
  });

  client.on('offline', () => {
    setMqttReady(false, 'offline');
    logger.warn('[mqttClient] broker offline or unreachable');
  });

  return new MqttCapPublisher(client, {
    topicPrefix: config.mqtt.topicPrefix,
    retries: config.mqtt.publishRetries,
    timeoutMs: config.mqtt.publishTimeoutMs,
    runId,
  });
}

export function getMqttStatus() {
  return {
    enabled: config.mqtt.enabled,
    host: config.mqtt.host,
    port: config.mqtt.port,
    connected: Boolean(mqttClient?.connected),
    lastError,
  };
}

export async function stopMqttClient(): Promise<void> {
  const client = mqttClient;
  if (!client) return;

  await client.endAsync(false);
  mqttClient = null;
  setMqttReady(false, 'stopped');
}
