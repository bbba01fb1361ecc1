/**
 * Template Routes
 * CRUD over the template directory
 */

import express, { type NextFunction, type Request, type Response, type Router } from 'express';
import { z } from 'zod';
import { findPlaceholders, validateTemplateName, type TemplateStore } from '@deployer/core';
import { logger } from '../utils/logger.js';

const templateQuery = z.object({
  template_name: z.string().min(1),
});

const templateSource = z.string({ invalid_type_error: 'body must be the template source as text' }).min(1);

export function createTemplateRoutes(templates: TemplateStore): Router {
  const router: Router = express.Router();

  router.get('/', async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      res.json({ status: 'success', templates: await templates.list() });
    } catch (error) {
      next(error);
    }
  });

  router.get('/code', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const templateName = validateTemplateName(templateQuery.parse(req.query).template_name);
      const templateCode = await templates.read(templateName);

      res.json({ status: 'success', templateName, templateCode, placeholders: findPlaceholders(templateCode) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /templates/add?template_name=
   * Body: the Solidity source, sent as text/plain.
   */
  router.post('/add', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const templateName = validateTemplateName(templateQuery.parse(req.query).template_name);
      const source = templateSource.parse(req.body);
      await templates.add(templateName, source);

      logger.info('Template added', { template: templateName, placeholders: findPlaceholders(source) });
      res.json({ status: 'success', templateName });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/delete', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const templateName = validateTemplateName(templateQuery.parse(req.query).template_name);
      await templates.remove(templateName);

      logger.info('Template deleted', { template: templateName });
      res.json({ status: 'success', templateName });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
