import express, { type Express } from 'express';
import type { ChannelConnection } from './channel/connection.js';
import { errorHandler, registerBotRoutes, requireToken } from './routes.js';
import type { BotSearchService } from './service.js';

export interface AppDeps {
  service: BotSearchService;
  connection: ChannelConnection;
  authToken: string;
}

export function createApp({ service, connection, authToken }: AppDeps): Express {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => res.json({ status: 'ok', channel: connection.state }));

  app.use(requireToken(authToken));
  registerBotRoutes(app, service);
  app.use(errorHandler);

  return app;
}
