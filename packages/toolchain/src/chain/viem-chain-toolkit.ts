import {
  createPublicClient,
  createWalletClient,
  defineChain,
  http,
  type Abi,
  type Chain,
  type Hex,
} from 'viem';
import { privateKeyToAccount } from 'viem/accounts';
import { pino } from 'pino';
import {
  DeploymentSubmissionError,
  errorMessage,
  type ChainToolkit,
  type DeployReceipt,
  type DeployRequest,
  type NetworkConnection,
  type PublishRequest,
  type SigningIdentity,
  type SourcePublication,
  type TransactReceipt,
  type TransactRequest,
} from '@deployer/core';
import { EtherscanVerifier, type SourceVerifier } from '../explorer/etherscan-verifier.js';
import { describeChainError } from './chain-errors.js';

const logger = pino({ name: 'chain-toolkit', level: process.env.LOG_LEVEL || 'info' });

export interface ViemChainToolkitOptions {
  /** How long to wait for a receipt before giving up. */
  receiptTimeoutMs?: number;
  pollingIntervalMs?: number;
  explorerApiKey?: string;
  createVerifier?: (apiUrl: string, apiKey: string) => SourceVerifier;
}

function toChain(connection: NetworkConnection): Chain {
  return defineChain({
    id: connection.chainId,
    name: connection.name,
    nativeCurrency: { name: 'Ether', symbol: 'ETH', decimals: 18 },
    rpcUrls: { default: { http: [connection.rpcUrl] } },
  });
}

/**
 * Deploys artifacts and submits method calls with viem, signing locally with
 * the session identity.
 */
export class ViemChainToolkit implements ChainToolkit {
  constructor(private readonly options: ViemChainToolkitOptions = {}) {}

  checkPublication(connection: NetworkConnection): void {
    this.verifierFor(connection);
  }

  async deploy({ artifact, identity, connection }: DeployRequest): Promise<DeployReceipt> {
    const { publicClient, walletClient } = this.clientsFor(connection, identity);

    const hash = await this.submit(() =>
      walletClient.deployContract({ abi: artifact.abi, bytecode: artifact.bytecode })
    );
    logger.info({ contract: artifact.name, network: connection.name, txHash: hash }, 'Deployment transaction sent');

    const receipt = await publicClient.waitForTransactionReceipt({
      hash,
      timeout: this.options.receiptTimeoutMs,
      pollingInterval: this.options.pollingIntervalMs,
    });
    if (receipt.status !== 'success' || !receipt.contractAddress) {
      throw new DeploymentSubmissionError(`Deployment transaction ${hash} reverted`, {
        context: { transactionHash: hash, blockNumber: receipt.blockNumber.toString() },
      });
    }

    const contractAddress = receipt.contractAddress;
    const deployedBytecode: Hex = (await publicClient.getCode({ address: contractAddress })) ?? '0x';
    return { contractAddress, transactionHash: hash, deployedBytecode };
  }

  async publishSource({ artifact, address, connection }: PublishRequest): Promise<SourcePublication> {
    try {
      const verifier = this.verifierFor(connection);
      const outcome = await verifier.verify({ address, chainId: connection.chainId, artifact });
      return { requested: true, published: outcome.verified, guid: outcome.guid, message: outcome.message };
    } catch (error) {
      logger.warn({ address, network: connection.name, error: errorMessage(error) }, 'Source publication failed');
      return { requested: true, published: false, message: errorMessage(error) };
    }
  }

  async transact({ address, method, args, identity, connection }: TransactRequest): Promise<TransactReceipt> {
    const { publicClient, walletClient } = this.clientsFor(connection, identity);
    const abi: Abi = [method];

    const hash = await this.submit(() =>
      walletClient.writeContract({ address, abi, functionName: method.name, args })
    );
    logger.info({ address, method: method.name, network: connection.name, txHash: hash }, 'Transaction sent');

    const receipt = await publicClient.waitForTransactionReceipt({
      hash,
      timeout: this.options.receiptTimeoutMs,
      pollingInterval: this.options.pollingIntervalMs,
    });
    return { transactionHash: hash, status: receipt.status, blockNumber: receipt.blockNumber };
  }

  private verifierFor(connection: NetworkConnection): SourceVerifier {
    if (!connection.explorerApiUrl) {
      throw new DeploymentSubmissionError(
        `Source publication requested but network "${connection.name}" has no explorer API configured`
      );
    }
    if (!this.options.explorerApiKey) {
      throw new DeploymentSubmissionError('Source publication requested but EXPLORER_API_KEY is not set');
    }
    const create =
      this.options.createVerifier ?? ((apiUrl: string, apiKey: string) => new EtherscanVerifier({ apiUrl, apiKey }));
    return create(connection.explorerApiUrl, this.options.explorerApiKey);
  }

  private clientsFor(connection: NetworkConnection, identity: SigningIdentity) {
    const chain = toChain(connection);
    const transport = http(connection.rpcUrl);
    return {
      publicClient: createPublicClient({ chain, transport }),
      walletClient: createWalletClient({ account: privateKeyToAccount(identity.privateKey), chain, transport }),
    };
  }

  private async submit(send: () => Promise<Hex>): Promise<Hex> {
    try {
      return await send();
    } catch (error) {
      throw new Error(describeChainError(error), { cause: error });
    }
  }
}
