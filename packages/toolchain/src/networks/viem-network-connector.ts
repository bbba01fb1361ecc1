import { createPublicClient, http } from 'viem';
import { pino } from 'pino';
import { ConnectionError, type NetworkConnection, type NetworkConnector } from '@deployer/core';
import { describeChainError } from '../chain/chain-errors.js';
import type { NetworksConfig } from './networks-config.js';

const logger = pino({ name: 'network-connector', level: process.env.LOG_LEVEL || 'info' });

export interface ViemNetworkConnectorOptions {
  /** Per-request RPC timeout while probing the endpoint. */
  timeoutMs?: number;
}

/**
 * Connecting means probing the configured RPC endpoint and checking that it
 * serves the expected chain. HTTP transports hold no socket, so disconnecting
 * only drops the connection record.
 */
export class ViemNetworkConnector implements NetworkConnector {
  constructor(
    private readonly networksConfig: NetworksConfig,
    private readonly options: ViemNetworkConnectorOptions = {}
  ) {}

  networks(): string[] {
    return Object.keys(this.networksConfig).sort();
  }

  async connect(name: string): Promise<NetworkConnection> {
    const network = this.networksConfig[name];
    if (!network) {
      throw new ConnectionError(name, { reason: 'network is not configured' });
    }

    const client = createPublicClient({
      transport: http(network.rpcUrl, { timeout: this.options.timeoutMs ?? 10_000, retryCount: 0 }),
    });

    let chainId: number;
    try {
      chainId = await client.getChainId();
    } catch (error) {
      throw new ConnectionError(name, { reason: describeChainError(error), cause: error });
    }
    if (chainId !== network.chainId) {
      throw new ConnectionError(name, {
        reason: `RPC endpoint serves chain ${chainId}, expected ${network.chainId}`,
      });
    }

    logger.info({ network: name, chainId }, 'Connected to network');
    return {
      name,
      chainId,
      rpcUrl: network.rpcUrl,
      ...(network.explorerApiUrl ? { explorerApiUrl: network.explorerApiUrl } : {}),
      connected: true,
    };
  }

  async disconnect(connection: NetworkConnection): Promise<void> {
    logger.info({ network: connection.name }, 'Disconnected from network');
  }
}
