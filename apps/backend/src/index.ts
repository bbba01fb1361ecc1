/**
 * Composition root: reads the environment, wires the toolchain into the
 * session and workflows, and starts the HTTP server
 */

// Loaded before anything else so module-level loggers see LOG_LEVEL from .env
import 'dotenv/config';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import type { Server } from 'node:http';
import { ActiveSession, DeploymentWorkflow, InteractionWorkflow, errorMessage } from '@deployer/core';
import {
  FileContractStore,
  FileTemplateStore,
  KeystoreWallet,
  SolcProjectLoader,
  ViemChainToolkit,
  ViemNetworkConnector,
  loadNetworks,
} from '@deployer/toolchain';
import { getBackendEnv, type BackendEnv } from './env.js';
import { createApp, type AppDependencies } from './server.js';
import { logger } from './utils/logger.js';

export async function buildDependencies(env: BackendEnv): Promise<AppDependencies> {
  const networks = await loadNetworks(path.resolve(env.NETWORKS_FILE));

  const session = new ActiveSession(new ViemNetworkConnector(networks));
  const templates = new FileTemplateStore(path.resolve(env.TEMPLATES_DIR));
  const contracts = new FileContractStore(path.resolve(env.CONTRACTS_DIR));
  const projects = new SolcProjectLoader({ contractsDir: env.CONTRACTS_DIR });
  const toolkit = new ViemChainToolkit({ receiptTimeoutMs: env.CHAIN_TIMEOUT_MS, explorerApiKey: env.EXPLORER_API_KEY });

  return {
    session,
    wallet: new KeystoreWallet(path.resolve(env.KEYSTORE_DIR)),
    templates,
    contracts,
    projects,
    deployment: new DeploymentWorkflow({
      templates,
      contracts,
      projects,
      toolkit,
      session,
      timeoutMs: env.CHAIN_TIMEOUT_MS,
      publicationTimeoutMs: env.PUBLICATION_TIMEOUT_MS,
      strictTemplates: env.STRICT_TEMPLATES,
    }),
    interaction: new InteractionWorkflow({ projects, toolkit, session, timeoutMs: env.CHAIN_TIMEOUT_MS }),
  };
}

export async function startServer(): Promise<Server> {
  const env = getBackendEnv();
  const deps = await buildDependencies(env);
  const app = createApp(deps, env);

  const server = app.listen(env.PORT, () => {
    logger.info(`Server running on http://localhost:${env.PORT}`, {
      port: env.PORT,
      environment: env.NODE_ENV,
      networks: deps.session.networks(),
    });
  });

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    logger.info('Shutting down', { signal });
    try {
      await deps.session.disconnect();
    } catch (error) {
      logger.warn('Disconnect during shutdown failed', { error: errorMessage(error) });
    } finally {
      server.close(() => process.exit(0));
    }
  };
  const onSignal = (signal: NodeJS.Signals): void => {
    void shutdown(signal);
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  return server;
}

// Start server if this is the main module
if (process.argv[1] && import.meta.url === pathToFileURL(path.resolve(process.argv[1])).href) {
  startServer().catch((error: unknown) => {
    logger.fatal('Failed to start server', { error: errorMessage(error) });
    process.exit(1);
  });
}
