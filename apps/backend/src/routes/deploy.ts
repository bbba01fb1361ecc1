/**
 * Deployment Routes
 * POST /deploy/template renders a template and deploys the result
 */

import express, { type NextFunction, type Request, type Response, type Router } from 'express';
import { z } from 'zod';
import type { DeploymentWorkflow } from '@deployer/core';
import { sendError } from '../utils/responses.js';
import { QueryBoolean, bodyOrDefault } from '../utils/request.js';

const deployQuery = z.object({
  template_name: z.string().min(1),
  contract_name: z.string().min(1),
  publish_source: QueryBoolean.default('false'),
});

// Scalars are accepted for convenience and substituted as their text form
const templateParams = z.record(z.union([z.string(), z.number(), z.boolean()]).transform(String));

export function createDeployRoutes(deployment: DeploymentWorkflow): Router {
  const router: Router = express.Router();

  /**
   * POST /deploy/template?template_name=&contract_name=&publish_source=
   * Body: JSON object mapping placeholder names to values.
   *
   * publish_source defaults to false: publication needs an explorer API on the
   * network and EXPLORER_API_KEY, so it is opt-in.
   */
  router.post('/template', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const query = deployQuery.parse(req.query);
      const params = templateParams.parse(bodyOrDefault(req.body, {}));

      const result = await deployment.deploy({
        templateName: query.template_name,
        contractName: query.contract_name,
        params,
        publishSource: query.publish_source,
      });

      if (result.status === 'error') {
        sendError(res, result.error);
        return;
      }
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
