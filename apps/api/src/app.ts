import 'dotenv/config';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { createServer } from 'http';
import type { LoggerPort } from '@agri-telemetry/domain';

import { createTractorRouter } from './controllers/tractor.controller.js';
import { WsGateway } from './ws/ws-gateway.js';
import { errorHandler } from './middleware/error-handler.js';
import type { TelemetryCore } from './services/core/telemetry-core.js';

export interface AppOptions {
  readonly corsOrigin?: string;
  /** Request logging; off in tests. */
  readonly requestLog?: boolean;
}

export function buildApp(core: TelemetryCore, options: AppOptions = {}): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: options.corsOrigin ?? '*' }));
  if (options.requestLog ?? true) app.use(morgan('combined'));
  app.use(express.json({ limit: '64kb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/tractor', createTractorRouter(core));

  app.get('/healthz', (_req, res) => {
    res.json({
      status: 'ok',
      ts: new Date().toISOString(),
      tractor: core.state,
    });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}

export function buildHttpServer(
  app: ReturnType<typeof express>,
  core: TelemetryCore,
  logger: LoggerPort,
) {
  const httpServer = createServer(app);
  const wsGateway = new WsGateway(httpServer, logger.child('ws-gateway'));
  wsGateway.attach(core);
  return { httpServer, wsGateway };
}
