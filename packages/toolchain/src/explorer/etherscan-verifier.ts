import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { setTimeout as sleep } from 'node:timers/promises';
import { z } from 'zod';
import { pino } from 'pino';
import type { Address } from 'viem';
import type { ContractArtifact } from '@deployer/core';

const logger = pino({ name: 'etherscan-verifier', level: process.env.LOG_LEVEL || 'info' });

const ExplorerResponseSchema = z.object({
  status: z.string(),
  message: z.string(),
  result: z.string(),
});

export interface VerificationRequest {
  address: Address;
  chainId: number;
  artifact: ContractArtifact;
}

export type VerificationStatus =
  | { state: 'pending' }
  | { state: 'verified'; message: string }
  | { state: 'failed'; message: string };

export interface VerificationOutcome {
  guid: string;
  verified: boolean;
  message: string;
}

export interface SourceVerifier {
  verify(request: VerificationRequest): Promise<VerificationOutcome>;
}

export interface EtherscanVerifierOptions {
  apiUrl: string;
  apiKey: string;
  pollIntervalMs?: number;
  maxAttempts?: number;
  requestTimeoutMs?: number;
  /** Replaces the HTTP layer; tests pass an in-process adapter. */
  adapter?: AxiosAdapter;
}

const PENDING_RESULTS = ['Pending in queue', 'In progress'];

/** `0.8.26+commit.8a97fa7a.Emscripten.clang` → `v0.8.26+commit.8a97fa7a` */
export function explorerCompilerVersion(version: string): string {
  const match = /^(\d+\.\d+\.\d+\+commit\.[0-9a-f]+)/.exec(version);
  return `v${match ? match[1] : version}`;
}

/**
 * Publishes standard-JSON sources through an Etherscan-compatible API and
 * polls until the explorer settles the verification.
 */
export class EtherscanVerifier implements SourceVerifier {
  private readonly client: AxiosInstance;
  private readonly pollIntervalMs: number;
  private readonly maxAttempts: number;

  constructor(private readonly options: EtherscanVerifierOptions) {
    this.client = axios.create({
      baseURL: options.apiUrl,
      timeout: options.requestTimeoutMs ?? 30_000,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
    this.pollIntervalMs = options.pollIntervalMs ?? 5_000;
    this.maxAttempts = options.maxAttempts ?? 10;
  }

  async verify(request: VerificationRequest): Promise<VerificationOutcome> {
    const guid = await this.submit(request);
    logger.info({ address: request.address, guid }, 'Source submitted for verification');

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      await sleep(this.pollIntervalMs);
      const status = await this.checkStatus(guid, request.chainId);
      if (status.state !== 'pending') {
        logger.info({ guid, state: status.state }, 'Verification settled');
        return { guid, verified: status.state === 'verified', message: status.message };
      }
    }

    return { guid, verified: false, message: `Verification still pending after ${this.maxAttempts} checks` };
  }

  async submit({ address, chainId, artifact }: VerificationRequest): Promise<string> {
    const form = new URLSearchParams({
      apikey: this.options.apiKey,
      module: 'contract',
      action: 'verifysourcecode',
      contractaddress: address,
      sourceCode: artifact.compiler.input,
      codeformat: 'solidity-standard-json-input',
      contractname: `${artifact.sourceName}:${artifact.name}`,
      compilerversion: explorerCompilerVersion(artifact.compiler.version),
    });

    const response = await this.client.post('', form, { params: { chainid: chainId } });
    const body = ExplorerResponseSchema.parse(response.data);
    if (body.status !== '1') {
      throw new Error(`Explorer rejected the submission: ${body.result}`);
    }
    return body.result;
  }

  async checkStatus(guid: string, chainId: number): Promise<VerificationStatus> {
    const response = await this.client.get('', {
      params: { chainid: chainId, apikey: this.options.apiKey, module: 'contract', action: 'checkverifystatus', guid },
    });
    const body = ExplorerResponseSchema.parse(response.data);

    if (body.status === '1') {
      return { state: 'verified', message: body.result };
    }
    if (PENDING_RESULTS.some((pending) => body.result.startsWith(pending))) {
      return { state: 'pending' };
    }
    return { state: 'failed', message: body.result };
  }
}
