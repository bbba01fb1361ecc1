import type { AbiFunction, Address, Hash, Hex } from 'viem';
import type {
  ContractArtifact,
  EncodedArgument,
  NetworkConnection,
  SigningIdentity,
  SourcePublication,
} from './types.js';

export interface TemplateStore {
  list(): Promise<string[]>;
  exists(name: string): Promise<boolean>;
  read(name: string): Promise<string>;
  add(name: string, source: string): Promise<void>;
  remove(name: string): Promise<void>;
}

export interface ContractStore {
  write(name: string, source: string): Promise<void>;
  list(): Promise<string[]>;
}

/**
 * Compiled view of every source in the contract directory. Must be closed
 * once the caller is done with it.
 *
 * A source that fails to compile does not hide the others: lookups that land
 * on it throw its `CompilationError`.
 */
export interface CompiledProject {
  names(): string[];
  /** Throws when no compiled contract matches and `<contractName>.sol` failed. */
  get(contractName: string): ContractArtifact | undefined;
  /** Contracts declared in one source file, by its store name (no extension). */
  declaredIn(sourceName: string): ContractArtifact[];
  /** Store names of the sources that failed to compile. */
  failedSources(): string[];
  close(): Promise<void>;
}

export interface ProjectLoader {
  load(): Promise<CompiledProject>;
}

export interface DeployRequest {
  artifact: ContractArtifact;
  identity: SigningIdentity;
  connection: NetworkConnection;
}

export interface DeployReceipt {
  contractAddress: Address;
  transactionHash: Hash;
  deployedBytecode: Hex;
}

export interface PublishRequest {
  artifact: ContractArtifact;
  address: Address;
  connection: NetworkConnection;
}

export interface TransactRequest {
  address: Address;
  method: AbiFunction;
  args: readonly EncodedArgument[];
  identity: SigningIdentity;
  connection: NetworkConnection;
}

export interface TransactReceipt {
  transactionHash: Hash;
  status: 'success' | 'reverted';
  blockNumber: bigint;
}

export interface ChainToolkit {
  /** Throws a `DeploymentSubmissionError` when `connection` cannot take source publication. */
  checkPublication(connection: NetworkConnection): void;
  /** Sends the deployment and resolves once its receipt and code are in. */
  deploy(request: DeployRequest): Promise<DeployReceipt>;
  /** Publishes an already deployed contract's source; failures come back in the result. */
  publishSource(request: PublishRequest): Promise<SourcePublication>;
  transact(request: TransactRequest): Promise<TransactReceipt>;
}

export interface NetworkConnector {
  networks(): string[];
  connect(name: string): Promise<NetworkConnection>;
  disconnect(connection: NetworkConnection): Promise<void>;
}

export interface GeneratedAccount {
  identity: SigningIdentity;
  saved: boolean;
}

export interface Wallet {
  list(): Promise<string[]>;
  load(name: string, passphrase: string): Promise<SigningIdentity>;
  generate(name: string, passphrase?: string, privateKey?: string): Promise<GeneratedAccount>;
  remove(name: string, passphrase: string): Promise<void>;
}
