/**
 * Account Routes
 * Keystore listing and generation, and the session's active signing account
 */

import express, { type NextFunction, type Request, type Response, type Router } from 'express';
import { z } from 'zod';
import { AccountError, type ActiveSession, type Wallet } from '@deployer/core';
import { logger } from '../utils/logger.js';

const credentialsQuery = z.object({
  account_name: z.string().min(1),
  account_pass: z.string(),
});

const generateQuery = z.object({
  account_name: z.string().min(1),
  account_pass: z.string().optional(),
  private_key: z.string().min(1).optional(),
});

export function createAccountRoutes(wallet: Wallet, session: ActiveSession): Router {
  const router: Router = express.Router();

  router.get('/', async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      res.json({ status: 'success', accounts: await wallet.list() });
    } catch (error) {
      next(error);
    }
  });

  router.get('/active', (_req: Request, res: Response) => {
    const identity = session.getIdentity();
    if (!identity) {
      res.json({ status: 'success', active: false });
      return;
    }
    res.json({ status: 'success', active: true, account: { name: identity.name, address: identity.address } });
  });

  /**
   * POST /accounts/set_active?account_name=&account_pass=
   */
  router.post('/set_active', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const query = credentialsQuery.parse(req.query);
      const identity = await wallet.load(query.account_name, query.account_pass);
      await session.setIdentity(identity);

      logger.info('Active account changed', { account: identity.name, address: identity.address });
      res.json({ status: 'success', active: true, account: { name: identity.name, address: identity.address } });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /accounts/generate?account_name=&account_pass=&private_key=
   * Saves a keystore only when a passphrase is given. The private key is
   * returned to the caller.
   */
  router.get('/generate', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const query = generateQuery.parse(req.query);
      const { identity, saved } = await wallet.generate(query.account_name, query.account_pass, query.private_key);

      res.json({
        status: 'success',
        saved,
        account: { name: identity.name, address: identity.address },
        privateKey: identity.privateKey,
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /accounts/delete?account_name=&account_pass=
   * Answers 404 when the keystore cannot be unlocked.
   */
  router.delete('/delete', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const query = credentialsQuery.parse(req.query);
      try {
        await wallet.remove(query.account_name, query.account_pass);
      } catch (error) {
        if (error instanceof AccountError) {
          res.status(404).json({
            status: 'error',
            code: error.code,
            message: `No account found locally with name "${query.account_name}". ${error.message}`,
          });
          return;
        }
        throw error;
      }

      if (session.getIdentity()?.name === query.account_name) {
        await session.clearIdentity();
      }
      res.json({ status: 'success', deleted: query.account_name });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
