import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import type { Abi } from 'viem';
import { ActiveSession, DeploymentWorkflow, InteractionWorkflow } from '@deployer/core';
import {
  FakeChainToolkit,
  FakeNetworkConnector,
  FakeProjectLoader,
  InMemoryContractStore,
  InMemoryTemplateStore,
  InMemoryWallet,
} from '@deployer/core/testing';
import { createApp, type AppConfig } from '../server.js';

export interface TestAppOptions {
  templates?: Record<string, string>;
  abis?: Record<string, Abi>;
  config?: Partial<AppConfig>;
}

export interface TestApp {
  session: ActiveSession;
  wallet: InMemoryWallet;
  templates: InMemoryTemplateStore;
  contracts: InMemoryContractStore;
  projects: FakeProjectLoader;
  toolkit: FakeChainToolkit;
  connector: FakeNetworkConnector;
  request(path: string, init?: RequestInit): Promise<{ status: number; headers: Headers; body: unknown }>;
  close(): Promise<void>;
}

/** Runs the real express app on an ephemeral port over in-process fakes. */
export async function startTestApp(options: TestAppOptions = {}): Promise<TestApp> {
  const templates = new InMemoryTemplateStore(options.templates);
  const contracts = new InMemoryContractStore();
  const projects = new FakeProjectLoader(contracts, { abis: options.abis });
  const toolkit = new FakeChainToolkit();
  const connector = new FakeNetworkConnector({ development: 1337, sepolia: 11155111 });
  const session = new ActiveSession(connector);
  const wallet = new InMemoryWallet();

  const app = createApp(
    {
      session,
      wallet,
      templates,
      contracts,
      projects,
      deployment: new DeploymentWorkflow({ templates, contracts, projects, toolkit, session, timeoutMs: 5000 }),
      interaction: new InteractionWorkflow({ projects, toolkit, session, timeoutMs: 5000 }),
    },
    { ENABLE_CORS: false, CORS_ORIGINS: '*', RATE_LIMIT_MAX: 1000, ...options.config }
  );

  const server: Server = await new Promise((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('test server is not listening on a TCP port');
  }
  const { port }: AddressInfo = address;

  return {
    session,
    wallet,
    templates,
    contracts,
    projects,
    toolkit,
    connector,
    async request(path, init) {
      const response = await fetch(`http://127.0.0.1:${port}${path}`, init);
      const text = await response.text();
      const body: unknown = text.length > 0 ? JSON.parse(text) : undefined;
      return { status: response.status, headers: response.headers, body };
    },
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

export function jsonBody(value: unknown): RequestInit {
  return { method: 'POST', headers: { 'content-type': 'application/json' }, body: JSON.stringify(value) };
}
