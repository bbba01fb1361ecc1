/**
 * Contract Routes
 * Listing compiled contracts and calling methods on deployed ones
 */

import express, { type NextFunction, type Request, type Response, type Router } from 'express';
import { z } from 'zod';
import {
  InvalidArgumentsError,
  MethodArgumentsSchema,
  withProject,
  type InteractionWorkflow,
  type ProjectLoader,
} from '@deployer/core';
import { sendError } from '../utils/responses.js';
import { bodyOrDefault } from '../utils/request.js';

const interactQuery = z.object({
  contract_name: z.string().min(1),
  contract_address: z.string().min(1),
  contract_method: z.string().min(1),
});

export function createContractRoutes(projects: ProjectLoader, interaction: InteractionWorkflow): Router {
  const router: Router = express.Router();

  router.get('/', async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const listing = await withProject(projects, async (project) => ({
        contracts: project.names(),
        failedSources: project.failedSources(),
      }));
      res.json({ status: 'success', ...listing });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /contracts/interact?contract_name=&contract_address=&contract_method=
   * Body: JSON array of tagged arguments, e.g. [{ "type": "int", "value": "5" }].
   */
  router.post('/interact', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const query = interactQuery.parse(req.query);
      const args = MethodArgumentsSchema.safeParse(bodyOrDefault(req.body, []));
      if (!args.success) {
        const reason = args.error.errors
          .map((issue) => `${issue.path.length > 0 ? `[${issue.path.join('.')}] ` : ''}${issue.message}`)
          .join('; ');
        sendError(res, new InvalidArgumentsError(`Method arguments are malformed: ${reason}`, query.contract_method));
        return;
      }

      const result = await interaction.interact({
        contractName: query.contract_name,
        contractAddress: query.contract_address,
        method: query.contract_method,
        args: args.data,
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
