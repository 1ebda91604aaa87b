import { prepareChainConfig, type ChainConfig } from "./chain-config";
import type { CertificateBundle } from "./certificates";
import { MAINNET_CHAIN_ID, MAINNET_WETH, SEPOLIA_CHAIN_ID, SEPOLIA_WETH } from "./constants";
import type { ResolvedDeployConfig } from "./deploy-config";
import type { Repository } from "./repository";
import type { RollupContracts, RollupDeployResult } from "./rollup";
import { encodeBase64, isZeroAddress } from "./utils";

export const ARTIFACT_TYPES = {
  chainInfo: "chain_info",
  nodeConfig: "node_config",
  validatorNodeConfig: "validator_node_config",
  coreContracts: "core_contracts",
  clientCert: "client_cert",
  clientKey: "client_key",
  caCert: "ca_cert",
} as const;

// Placeholders substituted by whoever runs the node
const L1_RPC_PLACEHOLDER = "${L1_RPC_URL}";
const SIGNER_URL_PLACEHOLDER = "${SIGNER_MTLS_URL}";
const CELESTIA_RPC_PLACEHOLDER = "${CELESTIA_RPC_URL}";
const SEQUENCER_URL_PLACEHOLDER = "${SEQUENCER_URL}";

export interface ChainInfoEntry {
  "chain-id": number;
  "parent-chain-id": number;
  "chain-name": string;
  "chain-config": ChainConfig;
  rollup: {
    bridge: string;
    inbox: string;
    "sequencer-inbox": string;
    rollup: string;
    "validator-wallet-creator": string;
    "deployed-at": number;
    "stake-token": string;
    "native-token": string;
  };
}

export interface ExternalSignerConfig {
  url: string;
  method: string;
  "client-cert": string;
  "client-private-key": string;
}

export interface NodeConfig {
  "parent-chain": { connection: { url: string } };
  chain: { id: number; "info-files": string };
  http: { addr: string; port: number; vhosts: string; corsdomain: string; api: string[] };
  ws: { addr: string; port: number; api: string[] };
  node: {
    sequencer: { enable: boolean };
    "batch-poster": { enable: boolean; "data-poster": { "external-signer": ExternalSignerConfig } };
    staker: { enable: boolean; strategy: string; "data-poster": { "external-signer": ExternalSignerConfig } };
    "data-availability"?: {
      enable: boolean;
      "sequencer-inbox-address": string;
      celestia: { enable: boolean; "rpc-url": string };
    };
    "delayed-sequencer": { enable: boolean };
  };
  execution?: { "forwarding-target": string };
  metrics: { server: { addr: string; port: number } };
}

export interface CoreContractsDocument extends RollupContracts {
  transactionHash: string;
}

export interface TextArtifact {
  _type: "base64";
  data: string;
}

interface SuccessfulDeployment {
  contracts: RollupContracts;
  transactionHash: string;
}

function requireSuccess(result: RollupDeployResult, what: string): SuccessfulDeployment {
  if (!result.success) {
    throw new Error(`cannot generate ${what} without successful deployment`);
  }
  if (!result.contracts || !result.transactionHash) {
    throw new Error(`deployment result missing core contracts`);
  }
  return { contracts: result.contracts, transactionHash: result.transactionHash };
}

// BOLD needs a stake token; a deployment without one stakes in the parent chain's WETH
export function resolveStakeToken(stakeToken: string, parentChainId: number): string {
  if (!isZeroAddress(stakeToken)) {
    return stakeToken;
  }
  if (parentChainId === SEPOLIA_CHAIN_ID) {
    return SEPOLIA_WETH;
  }
  if (parentChainId === MAINNET_CHAIN_ID) {
    return MAINNET_WETH;
  }
  return stakeToken;
}

export function generateChainInfo(config: ResolvedDeployConfig, result: RollupDeployResult): ChainInfoEntry[] {
  const { contracts } = requireSuccess(result, "chain info");
  return [
    {
      "chain-id": config.chainId,
      "parent-chain-id": config.parentChainId,
      "chain-name": config.chainName,
      "chain-config": result.chainConfig ?? prepareChainConfig(config),
      rollup: {
        bridge: contracts.bridge,
        inbox: contracts.inbox,
        "sequencer-inbox": contracts.sequencerInbox,
        rollup: contracts.rollup,
        "validator-wallet-creator": contracts.validatorWalletCreator,
        "deployed-at": contracts.deployedAtBlockNumber,
        "stake-token": resolveStakeToken(config.stakeToken, config.parentChainId),
        "native-token": contracts.nativeToken,
      },
    },
  ];
}

export function generateNodeConfig(config: ResolvedDeployConfig, result: RollupDeployResult): NodeConfig {
  const { contracts } = requireSuccess(result, "node config");
  const externalSigner: ExternalSignerConfig = {
    url: SIGNER_URL_PLACEHOLDER,
    method: "eth_signTransaction",
    "client-cert": "/certs/client.crt",
    "client-private-key": "/certs/client.key",
  };

  const nodeConfig: NodeConfig = {
    "parent-chain": { connection: { url: L1_RPC_PLACEHOLDER } },
    chain: { id: config.chainId, "info-files": "/config/chain-info.json" },
    http: {
      addr: "0.0.0.0",
      port: 8547,
      vhosts: "*",
      corsdomain: "*",
      api: ["eth", "net", "web3", "arb", "debug"],
    },
    ws: { addr: "0.0.0.0", port: 8548, api: ["eth", "net", "web3"] },
    node: {
      sequencer: { enable: true },
      "batch-poster": { enable: true, "data-poster": { "external-signer": { ...externalSigner } } },
      staker: { enable: true, strategy: "MakeNodes", "data-poster": { "external-signer": { ...externalSigner } } },
      "delayed-sequencer": { enable: true },
    },
    metrics: { server: { addr: "0.0.0.0", port: 9642 } },
  };

  if (config.dataAvailability !== "rollup") {
    nodeConfig.node["data-availability"] = {
      enable: true,
      "sequencer-inbox-address": contracts.sequencerInbox,
      celestia: { enable: true, "rpc-url": CELESTIA_RPC_PLACEHOLDER },
    };
  }
  return nodeConfig;
}

export function generateValidatorNodeConfig(config: ResolvedDeployConfig, result: RollupDeployResult): NodeConfig {
  const nodeConfig = generateNodeConfig(config, result);
  nodeConfig.node.sequencer.enable = false;
  nodeConfig.node["batch-poster"].enable = false;
  nodeConfig.node["delayed-sequencer"].enable = false;
  nodeConfig.node.staker.enable = true;
  nodeConfig.execution = { "forwarding-target": SEQUENCER_URL_PLACEHOLDER };
  return nodeConfig;
}

export function generateCoreContracts(result: RollupDeployResult): CoreContractsDocument {
  const { contracts, transactionHash } = requireSuccess(result, "core contracts");
  return { ...contracts, transactionHash };
}

export function wrapTextArtifact(content: string): TextArtifact {
  return { _type: "base64", data: encodeBase64(content) };
}

export class ArtifactGenerator {
  constructor(private readonly repository: Repository) {}

  /** Persists every output document of a successful deployment; returns the saved artifact types. */
  async generate(
    deploymentId: string,
    config: ResolvedDeployConfig,
    result: RollupDeployResult,
    credentials?: CertificateBundle
  ): Promise<string[]> {
    const documents: [string, unknown][] = [
      [ARTIFACT_TYPES.chainInfo, generateChainInfo(config, result)],
      [ARTIFACT_TYPES.nodeConfig, generateNodeConfig(config, result)],
      [ARTIFACT_TYPES.validatorNodeConfig, generateValidatorNodeConfig(config, result)],
      [ARTIFACT_TYPES.coreContracts, generateCoreContracts(result)],
    ];
    if (credentials?.clientCert) {
      documents.push([ARTIFACT_TYPES.clientCert, wrapTextArtifact(credentials.clientCert)]);
    }
    if (credentials?.clientKey) {
      documents.push([ARTIFACT_TYPES.clientKey, wrapTextArtifact(credentials.clientKey)]);
    }
    if (credentials?.caCert) {
      documents.push([ARTIFACT_TYPES.caCert, wrapTextArtifact(credentials.caCert)]);
    }

    const saved: string[] = [];
    for (const [artifactType, document] of documents) {
      await this.repository.saveArtifact({
        deploymentId,
        artifactType,
        content: JSON.stringify(document, null, 2),
      });
      saved.push(artifactType);
    }
    return saved;
  }
}
