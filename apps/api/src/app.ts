import 'dotenv/config';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { createServer } from 'http';

import { sessionsRouter } from './controllers/sessions.controller.js';
import { scenariosRouter } from './controllers/scenarios.controller.js';
import { WsGateway } from './ws/ws-gateway.js';
import { errorHandler } from './middleware/error-handler.js';
import { SessionRegistry, requireRegistry } from './services/session-registry.js';
import { apiConfigFromEnv, sessionDefaultsFromEnv } from './config/simulator-config.js';

export function buildApp(): ReturnType<typeof express> {
  const app = express();
  const config = apiConfigFromEnv();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: config.corsOrigin }));
  if (process.env['NODE_ENV'] !== 'test') app.use(morgan('combined'));
  app.use(express.json({ limit: '1mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/scenarios', scenariosRouter);
  app.use('/api/sessions', sessionsRouter);

  app.get('/healthz', (_req, res) => {
    res.json({
      status: 'ok',
      ts: new Date().toISOString(),
      sessions: requireRegistry().size,
    });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}

export function buildHttpServer(app: ReturnType<typeof express>) {
  const httpServer = createServer(app);
  const wsGateway = new WsGateway(httpServer);
  SessionRegistry.init(sessionDefaultsFromEnv(), wsGateway, apiConfigFromEnv().maxFinishedSessions);
  return { httpServer, wsGateway };
}
