import 'dotenv/config';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { PgMessageRepository, PgRoutePlanRepository } from '@relief-router/adapters';
import type { MessageRepositoryPort, RoutePlanRepositoryPort } from '@relief-router/domain';

import { createMessagesRouter } from './controllers/messages.controller.js';
import { createNodesRouter } from './controllers/nodes.controller.js';
import { createRoutesRouter } from './controllers/routes.controller.js';
import { errorHandler, HttpError } from './middleware/error-handler.js';
import { RoutePlanningService } from './services/route-planning.service.js';
import { loadConfig } from './config/env.js';
import type { AppConfig } from './config/env.js';

export const SERVICE_NAME = 'relief-router-api';
export const SERVICE_VERSION = '1.0.0';

export interface AppDeps {
  messages: MessageRepositoryPort;
  routePlans: RoutePlanRepositoryPort;
}

export function defaultDeps(): AppDeps {
  return {
    messages: new PgMessageRepository(),
    routePlans: new PgRoutePlanRepository(),
  };
}

export function buildApp(
  deps: AppDeps = defaultDeps(),
  config: AppConfig = loadConfig(),
): ReturnType<typeof express> {
  const app = express();
  const planning = new RoutePlanningService(deps.messages, deps.routePlans);

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: config.CORS_ORIGIN }));
  if (config.NODE_ENV !== 'test') {
    app.use(morgan('combined'));
  }
  app.use(express.json({ limit: '1mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.get('/', (_req, res) => {
    res.json({
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      status: 'operational',
      endpoints: {
        messages: '/api/messages',
        urgent: '/api/messages/urgent',
        nodes: '/api/nodes',
        routes: '/api/routes',
        health: '/healthz',
      },
    });
  });

  app.use('/api/messages', createMessagesRouter(deps.messages));
  app.use('/api/nodes', createNodesRouter(deps.messages));
  app.use('/api/routes', createRoutesRouter(planning));

  app.get('/healthz', async (_req, res) => {
    try {
      const stats = await deps.messages.stats();
      res.json({
        status: 'ok',
        ts: new Date().toISOString(),
        db_ok: true,
        total_messages: stats.totalMessages,
        last_message_timestamp: stats.lastMessageTimestamp,
      });
    } catch (err) {
      console.error('[healthz] message store check failed', err);
      res.status(503).json({
        status: 'degraded',
        ts: new Date().toISOString(),
        db_ok: false,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  });

  app.use((req, _res, next) => {
    next(new HttpError(404, `no route for ${req.method} ${req.path}`));
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
