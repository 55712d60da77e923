import express, { type Express } from 'express';
import cors from 'cors';
import morgan from 'morgan';
import type { BridgeCommands } from './commands.js';
import { API_VERSION } from './config.js';
import { errorHandler, notFound } from './errors.js';
import { brokerRouter } from './routes/broker.js';
import { clientsRouter } from './routes/clients.js';
import { messagesRouter } from './routes/messages.js';
import { topicsRouter } from './routes/topics.js';
import type { BrokerState } from './state.js';

export interface AppDeps {
  state: BrokerState;
  commands: Pick<BridgeCommands, 'publish'>;
  corsOrigins: string | string[];
  /** Access log; off in tests. */
  accessLog?: boolean;
}

export function createApp({ state, commands, corsOrigins, accessLog = true }: AppDeps): Express {
  const app = express();
  app.disable('x-powered-by');
  if (accessLog) app.use(morgan('combined'));
  app.use('/api', cors({ origin: corsOrigins }));
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'healthy', service: 'mqtt-dashboard' });
  });

  app.get('/api', (_req, res) => {
    res.json({
      service: 'mqtt-dashboard',
      version: API_VERSION,
      endpoints: {
        broker: ['/api/broker/status', '/api/broker/stats', '/api/broker/stats/summary', '/api/broker/version'],
        clients: ['/api/clients', '/api/clients/count', '/api/clients/active', '/api/clients/stats'],
        topics: ['/api/topics', '/api/topics/count', '/api/topics/summary', '/api/topics/<topic>'],
        messages: ['/api/messages/publish'],
        websocket: '/api/ws',
      },
    });
  });

  app.use('/api/broker', brokerRouter(state));
  app.use('/api/clients', clientsRouter(state));
  app.use('/api/topics', topicsRouter(state));
  app.use('/api/messages', messagesRouter(state, commands));

  app.use(notFound);
  app.use(errorHandler);
  return app;
}
