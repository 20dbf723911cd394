/**
 * Optional HTTP side of the desk: the click tracker and a health probe.
 */

import express from 'express';
import helmet from 'helmet';
import type { Server } from 'http';
import type { SignalStore } from './db/signalStore';
import { logger } from './lib/logger';
import { errorHandler } from './middleware/errorHandler';
import { createTrackRouter } from './routes/track';

export function createTrackerApp(store: SignalStore): express.Express {
  const app = express();
  const startedAt = Date.now();

  app.use(helmet({
    hsts: { maxAge: 31536000, includeSubDomains: true },
  }));

  app.get('/health', (_req: express.Request, res: express.Response) => {
    res.json({
      ok: true,
      signals: store.allSignals().length,
      uptimeSec: Math.floor((Date.now() - startedAt) / 1000)
    });
  });

  app.use('/track', createTrackRouter(store));

  app.use(errorHandler);
  return app;
}

export function startTrackerServer(app: express.Express, port: number, host = '0.0.0.0'): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info('Tracker', `Click tracker: http://${host}:${port}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}
