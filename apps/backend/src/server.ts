/**
 * Express API Server
 * Builds the application from injected dependencies so tests can swap the
 * toolchain for in-process fakes
 */

import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import type {
  ActiveSession,
  ContractStore,
  DeploymentWorkflow,
  InteractionWorkflow,
  ProjectLoader,
  TemplateStore,
  Wallet,
} from '@deployer/core';
import { parseCorsOrigins, type BackendEnv } from './env.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';
import { createHealthRoutes } from './routes/health.js';
import { createAccountRoutes } from './routes/accounts.js';
import { createNetworkRoutes } from './routes/network.js';
import { createTemplateRoutes } from './routes/templates.js';
import { createDeployRoutes } from './routes/deploy.js';
import { createContractRoutes } from './routes/contracts.js';

export interface AppDependencies {
  session: ActiveSession;
  wallet: Wallet;
  templates: TemplateStore;
  contracts: ContractStore;
  projects: ProjectLoader;
  deployment: DeploymentWorkflow;
  interaction: InteractionWorkflow;
}

export type AppConfig = Pick<BackendEnv, 'ENABLE_CORS' | 'CORS_ORIGINS' | 'RATE_LIMIT_MAX'>;

export function createApp(deps: AppDependencies, config: AppConfig): Express {
  const app = express();

  // ============================================
  // Security Middleware
  // ============================================
  app.use(helmet());
  app.use(requestIdMiddleware);

  if (config.ENABLE_CORS) {
    const origins = parseCorsOrigins(config.CORS_ORIGINS);
    app.use(
      cors({
        origin: origins,
        credentials: origins !== '*',
        methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'X-Request-Id'],
      })
    );
  }

  app.use(
    rateLimit({
      windowMs: 60 * 1000,
      max: config.RATE_LIMIT_MAX,
      message: { status: 'error', code: 'RATE_LIMITED', message: 'Too many requests, please try again later.' },
      standardHeaders: true,
      legacyHeaders: false,
    })
  );

  // ============================================
  // Request Parsing
  // ============================================
  app.use(express.json({ limit: '1mb' }));
  app.use(express.text({ type: ['text/*', 'application/octet-stream'], limit: '1mb' }));

  // ============================================
  // API Routes
  // ============================================
  app.use('/health', createHealthRoutes(deps.session));
  app.use('/accounts', createAccountRoutes(deps.wallet, deps.session));
  app.use('/network', createNetworkRoutes(deps.session));
  app.use('/templates', createTemplateRoutes(deps.templates));
  app.use('/deploy', createDeployRoutes(deps.deployment));
  app.use('/contracts', createContractRoutes(deps.projects, deps.interaction));

  // ============================================
  // Error Handling Middleware
  // ============================================
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

export default createApp;
