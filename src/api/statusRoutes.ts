import express, { Router, type Express } from 'express';
import type { BatchScheduler } from '../reconcile/BatchScheduler.js';

interface StatusContext {
  scheduler: BatchScheduler;
  startedAt: number;
}

function iso(ms: number | null): string | null {
  return ms === null ? null : new Date(ms).toISOString();
}

export function createStatusRoutes(ctx: StatusContext): Router {
  const router = Router();

  // ─── Scheduler status ───

  router.get('/status', (_req, res) => {
    const status = ctx.scheduler.status();
    res.json({
      state: status.state,
      startedAt: iso(ctx.startedAt),
      cycles: status.cycles,
      nextCycleAt: iso(status.nextCycleAt),
      lastCycle: status.lastReport && {
        ...status.lastReport,
        startedAt: iso(status.lastReport.startedAt),
        nextCycleAt: iso(status.lastReport.nextCycleAt),
      },
      patterns: status.patterns,
    });
  });

  // ─── Last board ───

  router.get('/snapshot', (_req, res) => {
    const snapshot = ctx.scheduler.getLastSnapshot();
    if (!snapshot) {
      res.status(404).json({ error: 'No board fetched yet' });
      return;
    }
    res.json({
      width: snapshot.width,
      height: snapshot.height,
      fetchedAt: iso(snapshot.fetchedAt),
      colors: snapshot.palette.size,
    });
  });

  return router;
}

export function createStatusApp(ctx: StatusContext): Express {
  const app = express();
  app.use('/api', createStatusRoutes(ctx));
  return app;
}
