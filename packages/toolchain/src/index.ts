export { FileTemplateStore } from './stores/file-template-store.js';
export { FileContractStore } from './stores/file-contract-store.js';
export { SolcProjectLoader, type SolcProjectLoaderOptions } from './compiler/solc-project-loader.js';
export {
  loadNetworks,
  parseNetworks,
  NetworkConfigSchema,
  NetworksConfigSchema,
  type NetworkConfig,
  type NetworksConfig,
} from './networks/networks-config.js';
export { ViemNetworkConnector, type ViemNetworkConnectorOptions } from './networks/viem-network-connector.js';
export { ViemChainToolkit, type ViemChainToolkitOptions } from './chain/viem-chain-toolkit.js';
export {
  EtherscanVerifier,
  explorerCompilerVersion,
  type EtherscanVerifierOptions,
  type SourceVerifier,
  type VerificationOutcome,
  type VerificationRequest,
  type VerificationStatus,
} from './explorer/etherscan-verifier.js';
export { KeystoreWallet, type KeystoreWalletOptions } from './wallet/keystore-wallet.js';
