import type { Abi, Address, Hash, Hex } from 'viem';
import type { DeployerError } from './errors/index.js';

/**
 * Signing credential loaded by the wallet. The private key never leaves the
 * process except through the account generation route.
 */
export interface SigningIdentity {
  name: string;
  address: Address;
  privateKey: Hex;
}

export interface NetworkConnection {
  name: string;
  chainId: number;
  rpcUrl: string;
  explorerApiUrl?: string;
  connected: boolean;
}

export type TemplateParams = Readonly<Record<string, string>>;

export interface RenderedContractSource {
  contractName: string;
  source: string;
}

export interface CompilerInfo {
  version: string;
  /** Standard JSON input the artifact was compiled from. */
  input: string;
}

export interface ContractArtifact {
  name: string;
  sourceName: string;
  abi: Abi;
  bytecode: Hex;
  compiler: CompilerInfo;
}

export interface SourcePublication {
  requested: boolean;
  published: boolean;
  guid?: string;
  message?: string;
}

export interface DeploymentSuccess {
  status: 'success';
  contractName: string;
  abi: Abi;
  bytecode: Hex;
  deployedBytecode: Hex;
  contractAddress: Address;
  deployerAddress: Address;
  network: string;
  transactionHash: Hash;
  sourceCode: string;
  params: TemplateParams;
  sourcePublication: SourcePublication;
}

export interface WorkflowFailure {
  status: 'error';
  error: DeployerError;
}

export type DeploymentResult = DeploymentSuccess | WorkflowFailure;

export interface InteractionSuccess {
  status: 'success';
  transactionHash: Hash;
  transactionStatus: 'success' | 'reverted';
  blockNumber: string;
  contractName: string;
  contractAddress: Address;
  method: string;
  from: Address;
}

export type InteractionResult = InteractionSuccess | WorkflowFailure;

/**
 * Method arguments arrive as tagged values and are checked against the ABI
 * before anything is submitted.
 */
export type MethodArgument =
  | { type: 'int'; value: string | number }
  | { type: 'string'; value: string }
  | { type: 'address'; value: string }
  | { type: 'bool'; value: boolean }
  | { type: 'bytes'; value: string }
  | { type: 'array'; value: MethodArgument[] };

export type EncodedArgument = bigint | string | boolean | Address | Hex | readonly EncodedArgument[];
