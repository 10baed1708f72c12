import { Router } from 'express';
import type { Request, Response } from 'express';
import type { JobOfferStore } from '../db';
import { dayRange, parseDay } from '../utils/dates';

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function createOffersRouter(store: JobOfferStore): Router {
  const router = Router();

  // GET /api/offers/stats
  router.get('/offers/stats', (_req: Request, res: Response) => {
    try {
      res.json({ success: true, ...store.stats() });
    } catch (error) {
      console.error('[API] Stats error:', error);
      res.status(500).json({ success: false, error: 'Failed to get stats' });
    }
  });

  // GET /api/offers?from=YYYY-MM-DD&to=YYYY-MM-DD - offers added in those days
  router.get('/offers', (req: Request, res: Response) => {
    try {
      const fromRaw = queryString(req.query.from);
      const toRaw = queryString(req.query.to);
      const from = fromRaw ? parseDay(fromRaw) : new Date();
      const to = toRaw ? parseDay(toRaw) : from;
      if (!from || !to) {
        res.status(400).json({ success: false, error: 'from and to must be YYYY-MM-DD dates' });
        return;
      }
      if (to.getTime() < from.getTime()) {
        res.status(400).json({ success: false, error: 'to must not be before from' });
        return;
      }

      const { start, end } = dayRange(from, to);
      const offers = store.selectByDateRange(start, end);
      res.json({ success: true, total: offers.length, offers });
    } catch (error) {
      console.error('[API] Offers list error:', error);
      res.status(500).json({ success: false, error: 'Failed to list offers' });
    }
  });

  // GET /api/scrape-runs - recent scrape history
  router.get('/scrape-runs', (req: Request, res: Response) => {
    try {
      const limitRaw = queryString(req.query.limit);
      const limit = limitRaw ? Number.parseInt(limitRaw, 10) : 20;
      if (!Number.isInteger(limit) || limit < 1) {
        res.status(400).json({ success: false, error: 'limit must be a positive integer' });
        return;
      }
      res.json({ success: true, runs: store.listScrapeRuns(limit) });
    } catch (error) {
      console.error('[API] Scrape runs error:', error);
      res.status(500).json({ success: false, error: 'Failed to get scrape runs' });
    }
  });

  return router;
}
