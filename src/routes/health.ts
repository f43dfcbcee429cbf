import { Router } from 'express';
import type { IDatabaseProbe } from '../services/db';

export function createHealthRouter(probe: IDatabaseProbe): Router {
  const router: Router = Router();

  router.get('/health', async (_req, res, next) => {
    try {
      const report = await probe.check();
      res.status(report.status === 'healthy' ? 200 : 503).json(report);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
