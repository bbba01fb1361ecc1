import { describe, it, expect, beforeEach } from 'vitest';
import type { AxiosAdapter, InternalAxiosRequestConfig } from 'axios';
import type { ContractArtifact } from '@deployer/core';
import { TEST_CONTRACT_ADDRESS } from '@deployer/core/testing';
import { EtherscanVerifier, explorerCompilerVersion } from './etherscan-verifier.js';

const artifact: ContractArtifact = {
  name: 'Box',
  sourceName: 'Box.sol',
  abi: [],
  bytecode: '0x6080',
  compiler: { version: '0.8.26+commit.8a97fa7a.Emscripten.clang', input: '{"language":"Solidity"}' },
};

const request = { address: TEST_CONTRACT_ADDRESS, chainId: 11155111, artifact };

describe('EtherscanVerifier', () => {
  let calls: InternalAxiosRequestConfig[];

  const replying =
    (...bodies: Array<{ status: string; message: string; result: string }>): AxiosAdapter =>
    async (config) => {
      calls.push(config);
      const data = bodies[Math.min(calls.length, bodies.length) - 1];
      return { data, status: 200, statusText: 'OK', headers: {}, config };
    };

  const verifier = (adapter: AxiosAdapter, maxAttempts = 5) =>
    new EtherscanVerifier({
      apiUrl: 'https://api.example.org/api',
      apiKey: 'test-key',
      pollIntervalMs: 0,
      maxAttempts,
      adapter,
    });

  beforeEach(() => {
    calls = [];
  });

  it('should submit the standard JSON input and poll until verified', async () => {
    const outcome = await verifier(
      replying(
        { status: '1', message: 'OK', result: 'guid-1' },
        { status: '0', message: 'NOTOK', result: 'Pending in queue' },
        { status: '1', message: 'OK', result: 'Pass - Verified' }
      )
    ).verify(request);

    expect(outcome).toEqual({ guid: 'guid-1', verified: true, message: 'Pass - Verified' });
    expect(calls).toHaveLength(3);

    const form = new URLSearchParams(String(calls[0].data));
    expect(calls[0].method).toBe('post');
    expect(calls[0].params).toEqual({ chainid: 11155111 });
    expect(form.get('action')).toBe('verifysourcecode');
    expect(form.get('contractaddress')).toBe(TEST_CONTRACT_ADDRESS);
    expect(form.get('contractname')).toBe('Box.sol:Box');
    expect(form.get('compilerversion')).toBe('v0.8.26+commit.8a97fa7a');
    expect(form.get('codeformat')).toBe('solidity-standard-json-input');
    expect(form.get('sourceCode')).toBe('{"language":"Solidity"}');

    expect(calls[2].method).toBe('get');
    expect(calls[2].params).toMatchObject({ action: 'checkverifystatus', guid: 'guid-1', chainid: 11155111 });
  });

  it('should surface a rejected submission', async () => {
    await expect(
      verifier(replying({ status: '0', message: 'NOTOK', result: 'Invalid API Key' })).verify(request)
    ).rejects.toThrow('Explorer rejected the submission: Invalid API Key');
    expect(calls).toHaveLength(1);
  });

  it('should report a failed verification', async () => {
    const outcome = await verifier(
      replying(
        { status: '1', message: 'OK', result: 'guid-2' },
        { status: '0', message: 'NOTOK', result: 'Fail - Unable to verify' }
      )
    ).verify(request);

    expect(outcome).toEqual({ guid: 'guid-2', verified: false, message: 'Fail - Unable to verify' });
  });

  it('should give up after the configured number of checks', async () => {
    const outcome = await verifier(
      replying(
        { status: '1', message: 'OK', result: 'guid-3' },
        { status: '0', message: 'NOTOK', result: 'Pending in queue' }
      ),
      2
    ).verify(request);

    expect(outcome).toEqual({ guid: 'guid-3', verified: false, message: 'Verification still pending after 2 checks' });
    expect(calls).toHaveLength(3);
  });
});

describe('explorerCompilerVersion', () => {
  it('should keep the version and commit only', () => {
    expect(explorerCompilerVersion('0.8.26+commit.8a97fa7a.Emscripten.clang')).toBe('v0.8.26+commit.8a97fa7a');
  });

  it('should prefix versions it does not recognise', () => {
    expect(explorerCompilerVersion('0.8.26')).toBe('v0.8.26');
  });
});
