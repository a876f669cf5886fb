import { randomUUID } from 'crypto';
import { validatePowerCapMessage } from '../contracts';
import type { PowerCapMessageV1 } from '../contracts';
import logger from '../logger';
import { incrementCounter, observeHistogram } from '../observability/metrics';
import { PowerCap } from '../types/wecs';

export interface PublishedCap {
  entityId: string;
  pMaxKw: PowerCap;
}

export interface CapPublisher {
  publishCaps(simTimestamp: string, caps: PublishedCap[]): Promise<void>;
}

/** The slice of an MQTT client the publisher needs. */
export interface PublishTarget {
  publish(
    topic: string,
    message: string,
    opts: { qos: 1; retain: boolean },
    callback: (error?: Error) => void,
  ): unknown;
}

export interface MqttCapPublisherOptions {
  topicPrefix: string;
  retries: number;
  timeoutMs: number;
  runId?: string;
  now?: () => number;
}

export function powerCapTopic(topicPrefix: string, entityId: string): string {
  return `${topicPrefix}/wecs/${entityId}/power-cap`;
}

export function buildPowerCapMessage(
  cap: PublishedCap,
  simTimestamp: string,
  nowMs: number,
  runId?: string,
): PowerCapMessageV1 {
  const message: PowerCapMessageV1 = {
    v: 1,
    messageType: 'power_cap',
    messageId: randomUUID(),
    deviceId: cap.entityId,
    deviceType: 'wecs',
    timestampMs: Date.parse(simTimestamp),
    sentAtMs: nowMs,
    source: 'controller',
    payload: {
      pMaxKw: cap.pMaxKw,
      simTimestamp,
      ...(runId ? { runId } : {}),
    },
  };
  return validatePowerCapMessage(message);
}

/**
 * Mirrors the caps sent to the simulator onto MQTT (QoS 1, retained) so field
 * devices and dashboards see the latest decision. A failed publish is logged
 * and counted; it never stops the run.
 */
export class MqttCapPublisher implements CapPublisher {
  private readonly now: () => number;

  constructor(
    private readonly client: PublishTarget,
    private readonly options: MqttCapPublisherOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  async publishCaps(simTimestamp: string, caps: PublishedCap[]): Promise<void> {
    await Promise.all(caps.map((cap) => this.publishOne(simTimestamp, cap)));
  }

  private async publishOne(simTimestamp: string, cap: PublishedCap): Promise<void> {
    const topic = powerCapTopic(this.options.topicPrefix, cap.entityId);
    const payload = JSON.stringify(
      buildPowerCapMessage(cap, simTimestamp, this.now(), this.options.runId),
    );
    const startedAt = this.now();

    for (let attempt = 1; attempt <= this.options.retries; attempt += 1) {
      try {
        await this.publishWithTimeout(topic, payload);
        observeHistogram('windpark_cap_publish_latency_ms', this.now() - startedAt);
        incrementCounter('windpark_cap_publish_total', { result: 'ok' });
        return;
      } catch (err) {
        logger.warn('[capPublisher] publish attempt failed', {
          topic,
          attempt,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    incrementCounter('windpark_cap_publish_total', { result: 'failed' });
    logger.error({ topic, retries: this.options.retries }, '[capPublisher] giving up on power cap publish');
  }

  private publishWithTimeout(topic: string, payload: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new Error('mqtt_publish_timeout'));
      }, this.options.timeoutMs);
      this.client.publish(topic, payload, { qos: 1, retain: true }, (error) => {
        clearTimeout(timer);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }
}
