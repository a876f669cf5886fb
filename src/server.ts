import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors, { type CorsOptions } from 'cors';
import http from 'http';
import config from './config';
import logger from './logger';
import { getMqttStatus } from './mqttClient';
import { DecisionHistory } from './observability/decisionRecord';
import { prometheusPath, shouldExposePrometheus } from './observability/metrics';
import { openApiSpec } from './openapi';
import { ArchiveStore } from './recorder/archiveStore';
import { createArchiveRouter } from './routes/archive';
import metricsRouter from './routes/metrics';
import { createRunRouter } from './routes/run';
import { getReadiness } from './state/readiness';
import { getRunState } from './state/runMonitor';

export interface AppDeps {
  store: ArchiveStore;
  decisions: DecisionHistory;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  const allowedOrigins = new Set(config.ingress.corsAllowedOrigins);
  const corsOptions: CorsOptions = {
    origin(origin, callback) {
      if (!origin) return callback(null, true);
      if (allowedOrigins.has(origin)) return callback(null, true);
      return callback(null, false);
    },
    optionsSuccessStatus: 204,
  };

  app.use(cors(corsOptions));
  app.options('*', cors(corsOptions));

  app.get('/api/health', (_req, res) => {
    const readiness = getReadiness();
    const run = getRunState();
    const mqtt = getMqttStatus();
    const mqttOk = !mqtt.enabled || readiness.mqttReady;
    const overallStatus =
      readiness.archiveReady && mqttOk && run.status !== 'failed' ? 'ok' : 'degraded';

    res.json({
      status: overallStatus,
      archive: {
        backend: deps.store.kind,
        ready: readiness.archiveReady,
        reason: readiness.archiveReason,
      },
      mqtt,
      run: { status: run.status, runId: run.runId },
    });
  });

  app.get('/api/openapi.json', (_req, res) => {
    res.json(openApiSpec);
  });

  app.use('/api/run', createRunRouter(deps.decisions));
  app.use('/api/archive', createArchiveRouter(deps.store));

  if (shouldExposePrometheus()) {
    app.use(prometheusPath(), metricsRouter);
  }

  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error({ err }, '[server] request failed');
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

export interface StartServerOptions {
  port?: number;
}

export interface StartedServer {
  app: Express;
  server: http.Server;
  port: number;
  stop: () => Promise<void>;
}

export async function startServer(
  deps: AppDeps,
  options: StartServerOptions = {},
): Promise<StartedServer> {
  const app = createApp(deps);
  const server = http.createServer(app);
  const desiredPort = options.port ?? config.port;

  const actualPort = await new Promise<number>((resolve, reject) => {
    server.once('error', reject);
    server.listen(desiredPort, () => {
      const address = server.address();
      const port = typeof address === 'object' && address ? address.port : desiredPort;
      logger.info(`wind park status API listening on http://localhost:${port}`);
      resolve(port);
    });
  });

  const stop = async () => {
    await new Promise<void>((resolve, reject) =>
      server.close((err) => (err ? reject(err) : resolve())),
    );
  };

  return { app, server, port: actualPort, stop };
}
