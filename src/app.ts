import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import type { JobOfferStore } from './db';
import { createOffersRouter } from './routes/offers';

export function createApp(store: JobOfferStore): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  app.use((req, _res, next) => {
    console.log(`[${new Date().toISOString()}] ${req.method} ${req.path}`);
    next();
  });

  // Routes
  app.use('/api', createOffersRouter(store));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString(), service: 'job-radar' });
  });

  // Error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error('[Error]', err);
    res.status(500).json({ success: false, error: 'Internal server error' });
  });

  return app;
}
