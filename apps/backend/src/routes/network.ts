import express, { type NextFunction, type Request, type Response, type Router } from 'express';
import { z } from 'zod';
import { NoActiveNetworkError, type ActiveSession } from '@deployer/core';
import { sendError } from '../utils/responses.js';

const setNetworkQuery = z.object({
  network_name: z.string().min(1),
});

export function createNetworkRoutes(session: ActiveSession): Router {
  const router: Router = express.Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({ status: 'success', networks: session.networks() });
  });

  router.get('/active', (_req: Request, res: Response) => {
    const connection = session.getConnection();
    if (!connection) {
      sendError(res, new NoActiveNetworkError());
      return;
    }
    res.json({ status: 'success', network: connection.name, chainId: connection.chainId });
  });

  /**
   * GET /network/set?network_name=
   * Disconnects from the current network first; on failure no network stays active.
   */
  router.get('/set', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const query = setNetworkQuery.parse(req.query);
      const connection = await session.setConnection(query.network_name);
      res.json({ status: 'success', network: connection.name, chainId: connection.chainId });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
