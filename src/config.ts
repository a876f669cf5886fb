import os from 'os';
import dotenv from 'dotenv';

dotenv.config();

export type ArchiveBackend = 'memory' | 'jsonl' | 'postgres';

export interface DbConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  queryTimeoutMs: number;
}

export interface MqttTlsConfig {
  enabled: boolean;
  caPath?: string;
  certPath?: string;
  keyPath?: string;
  rejectUnauthorized: boolean;
}

export interface MqttAuthConfig {
  username?: string;
  password?: string;
}

export interface MqttConfig {
  enabled: boolean;
  host: string;
  port: number;
  topicPrefix: string;
  tls: MqttTlsConfig;
  auth: MqttAuthConfig;
  publishRetries: number;
  publishTimeoutMs: number;
}

export interface Config {
  port: number;
  serverEnabled: boolean;
  logLevel: string;
  logPretty: boolean;
  ingress: {
    corsAllowedOrigins: string[];
  };
  db: DbConfig;
  mqtt: MqttConfig;
  archive: {
    backend: ArchiveBackend;
    path: string;
  };
  mas: {
    containerCount: number;
    stepTimeoutMs: number;
  };
  scenarioFile: string;
  observability: {
    prometheusEnabled: boolean;
    prometheusPath: string;
    decisionLogLevel: 'info' | 'debug';
    decisionHistorySize: number;
  };
}

function parsePositiveInt(raw: string | undefined, fallback: number, label: string): number {
  const parsed = Number(raw ?? fallback);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`[config] ${label} must be a positive integer`);
  }
  return parsed;
}

function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') return fallback;
  return raw.trim().toLowerCase() === 'true';
}

export function parseArchiveBackend(raw = process.env.ARCHIVE_BACKEND): ArchiveBackend {
  const value = (raw ?? 'jsonl').trim().toLowerCase();
  if (value === 'memory' || value === 'jsonl' || value === 'postgres') {
    return value;
  }
  throw new Error('[config] ARCHIVE_BACKEND must be memory, jsonl, or postgres');
}

const config: Config = {
  port: Number(process.env.PORT ?? 3001),
  serverEnabled: parseBoolean(process.env.SERVER_ENABLED, true),
  logLevel: process.env.LOG_LEVEL ?? 'info',
  logPretty: parseBoolean(process.env.LOG_PRETTY, true),
  ingress: {
    corsAllowedOrigins: (process.env.CORS_ALLOWED_ORIGINS ?? 'http://localhost:3000')
      .split(',')
      .map((o) => o.trim())
      .filter(Boolean),
  },
  db: {
    host: process.env.DB_HOST ?? 'localhost',
    port: Number(process.env.DB_PORT ?? 5432),
    user: process.env.DB_USER ?? 'postgres',
    password: process.env.DB_PASSWORD ?? 'postgres',
    database: process.env.DB_NAME ?? 'windpark_cosim',
    queryTimeoutMs: parsePositiveInt(process.env.DB_QUERY_TIMEOUT_MS, 5_000, 'DB_QUERY_TIMEOUT_MS'),
  },
  mqtt: {
    enabled: parseBoolean(process.env.MQTT_ENABLED, false),
    host: process.env.MQTT_HOST ?? 'localhost',
    port: Number(process.env.MQTT_PORT ?? 1883),
    topicPrefix: (process.env.MQTT_TOPIC_PREFIX ?? 'windpark').replace(/\/+$/, ''),
    tls: {
      enabled: parseBoolean(process.env.MQTT_TLS_ENABLED, false),
      caPath: process.env.MQTT_TLS_CA_PATH,
      certPath: process.env.MQTT_TLS_CERT_PATH,
      keyPath: process.env.MQTT_TLS_KEY_PATH,
      rejectUnauthorized: parseBoolean(process.env.MQTT_TLS_REJECT_UNAUTHORIZED, true),
    },
    auth: {
      username: process.env.MQTT_USERNAME,
      password: process.env.MQTT_PASSWORD,
    },
    publishRetries: parsePositiveInt(process.env.MQTT_PUBLISH_RETRIES, 3, 'MQTT_PUBLISH_RETRIES'),
    publishTimeoutMs: parsePositiveInt(
      process.env.MQTT_PUBLISH_TIMEOUT_MS,
      2_000,
      'MQTT_PUBLISH_TIMEOUT_MS',
    ),
  },
  archive: {
    backend: parseArchiveBackend(),
    path: process.env.ARCHIVE_PATH ?? 'data/archive.jsonl',
  },
  mas: {
    containerCount: parsePositiveInt(
      process.env.MAS_CONTAINERS,
      Math.max(os.cpus().length, 1),
      'MAS_CONTAINERS',
    ),
    stepTimeoutMs: parsePositiveInt(process.env.STEP_TIMEOUT_MS, 10_000, 'STEP_TIMEOUT_MS'),
  },
  scenarioFile: process.env.SCENARIO_FILE ?? 'scenario.json',
  observability: {
    prometheusEnabled: parseBoolean(process.env.PROMETHEUS_ENABLED, true),
    prometheusPath: process.env.PROMETHEUS_PATH ?? '/metrics',
    decisionLogLevel: (process.env.DECISION_LOG_LEVEL ?? 'info').toLowerCase() === 'debug'
      ? 'debug'
      : 'info',
    decisionHistorySize: parsePositiveInt(
      process.env.DECISION_HISTORY_SIZE,
      96,
      'DECISION_HISTORY_SIZE',
    ),
  },
};

export default config;
