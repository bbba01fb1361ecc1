import express, { type Request, type Response, type Router } from 'express';
import type { ActiveSession } from '@deployer/core';

const startTime = Date.now();

export function createHealthRoutes(session: ActiveSession): Router {
  const router: Router = express.Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      status: 'success',
      healthy: true,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      network: session.getConnection()?.name ?? null,
      accountActive: session.getIdentity() !== undefined,
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
