import { ethers } from "ethers";

import type { ArtifactBundle, ContractArtifact } from "./artifacts";
import {
  jsonRpcChainClientFactory,
  waitForReceipt,
  type ChainClientFactory,
  type ChainReceipt,
  type ParentChainClient,
  type ReceiptWaitOptions,
} from "./chain-client";
import {
  ADDRESS_ZERO,
  ARB_SYS_ADDRESS,
  DEFAULT_MAX_DATA_SIZE,
  INFRA_DEFAULT_GAS_LIMIT,
  TARGET_CONTRACT_VERSION,
  type ContractName,
} from "./constants";
import { NotFoundError, OnChainError, errorMessage, isAbortError, wrapError } from "./errors";
import type { InfrastructureRecord, InfrastructureRepository } from "./repository";
import type { SignedTransaction, TransactionSigner } from "./signer";
import { applyGasBuffer, boostGasPrice, isVersionCompatible, logWarning, makeLogger, throwIfAborted, type LogFn } from "./utils";

export interface WellKnownInfrastructure {
  rollupCreatorAddress: string;
  version: string;
}

// Public RollupCreator deployments. All predate the target version, so today they are only
// ever reported and skipped.
export const WELL_KNOWN_ROLLUP_CREATORS: Readonly<Record<number, WellKnownInfrastructure>> = {
  1: { rollupCreatorAddress: "0x90D68B056c411015eaE3EC0b98AD94E2C91419F1", version: "v3.1.0" },
  11155111: { rollupCreatorAddress: "0xfb774ea8A92ae528A596c8D90CBCF1BdBc4Cee79", version: "v3.1.0" },
  42161: { rollupCreatorAddress: "0x79607f00e61E6d7C0E6330bd7451f73136042a5C", version: "v3.1.0" },
  421614: { rollupCreatorAddress: "0xd2Ec8376B1dF436fAb18120E416d3F2BeC61275b", version: "v3.1.0" },
};

export function getWellKnownRollupCreator(
  parentChainId: number,
  table: Readonly<Record<number, WellKnownInfrastructure>> = WELL_KNOWN_ROLLUP_CREATORS
): WellKnownInfrastructure | undefined {
  return table[parentChainId];
}

interface ProverContracts {
  prover0: string;
  proverMemory: string;
  proverMath: string;
  proverHostIo: string;
}

interface TemplateContracts {
  bridge: string;
  erc20Bridge: string;
  outbox: string;
  rollupEventInbox: string;
  challengeManager: string;
  rollupAdminLogic: string;
  rollupUserLogic: string;
  upgradeExecutor: string;
  validatorWalletCreator: string;
  deployHelper: string;
}

interface InboxContracts {
  reader4844: string;
  ethSequencerInbox: string;
  erc20SequencerInbox: string;
  inbox: string;
  erc20Inbox: string;
}

export interface InfrastructureAddresses extends ProverContracts, TemplateContracts, InboxContracts {
  oneStepProofEntry: string;
  bridgeCreator: string;
  rollupCreator: string;
}

export interface DeployedContract {
  name: string;
  address: string;
  txHash: string;
}

export type InfrastructureSource = "repository" | "well-known" | "deployed";

export interface InfrastructureResult {
  rollupCreatorAddress: string;
  bridgeCreatorAddress?: string;
  version: string;
  source: InfrastructureSource;
  alreadyDeployed: boolean;
  // Last submitted transaction of a fresh deployment
  deploymentTxHash?: string;
  addresses?: Record<string, string>;
  deployments: DeployedContract[];
}

export interface InfrastructureDeployerConfig {
  artifacts: ArtifactBundle;
  signer: TransactionSigner;
  repository?: InfrastructureRepository;
  chainClientFactory?: ChainClientFactory;
  targetVersion?: string;
  maxDataSize?: number;
  // Constructor argument of OneStepProverHostIo
  daValidator?: string;
  wellKnown?: Readonly<Record<number, WellKnownInfrastructure>>;
  receipts?: Omit<ReceiptWaitOptions, "signal">;
  // Awaited for each contract as soon as its receipt is in
  onContractDeployed?: (deployed: DeployedContract) => Promise<void> | void;
  verbose?: boolean;
}

export function encodeDeployData(artifact: ContractArtifact, args: readonly unknown[] = []): string {
  if (ethers.utils.hexDataLength(artifact.bytecode) === 0) {
    throw new Error(`artifact ${artifact.name} has no bytecode`);
  }
  return ethers.utils.hexConcat([artifact.bytecode, artifact.abi.encodeDeploy(args)]);
}

/**
 * Makes sure a RollupCreator and the shared contract graph behind it exist on a parent chain.
 * A compatible persisted record wins, then the well-known table, and only then a fresh
 * sequential deployment of every template, prover and factory.
 */
export class InfrastructureDeployer {
  private readonly clientFactory: ChainClientFactory;
  private readonly targetVersion: string;
  private readonly wellKnown: Readonly<Record<number, WellKnownInfrastructure>>;
  private readonly log: LogFn;

  constructor(private readonly config: InfrastructureDeployerConfig) {
    this.clientFactory = config.chainClientFactory ?? jsonRpcChainClientFactory;
    this.targetVersion = config.targetVersion ?? TARGET_CONTRACT_VERSION;
    this.wellKnown = config.wellKnown ?? WELL_KNOWN_ROLLUP_CREATORS;
    this.log = makeLogger(config.verbose ?? false);
  }

  async ensure(parentChainId: number, parentChainRpc: string, signal?: AbortSignal): Promise<InfrastructureResult> {
    const existing = await this.findExisting(parentChainId);
    if (existing) {
      return existing;
    }

    const client = this.clientFactory(parentChainRpc);
    let chainId: number;
    try {
      chainId = await client.getChainId();
    } catch (e) {
      throw wrapError("get chain ID", e);
    }
    if (chainId !== parentChainId) {
      throw new Error(`chain ID mismatch: expected ${parentChainId}, got ${chainId}`);
    }

    const result = await new GraphDeployment(this.config, client, this.log, signal).run();
    await this.persist(parentChainId, result);
    return result;
  }

  async getRollupCreator(parentChainId: number): Promise<string> {
    const record = this.config.repository ? await this.config.repository.getInfrastructure(parentChainId) : null;
    if (!record) {
      throw new NotFoundError(`no infrastructure deployed on chain ${parentChainId}`);
    }
    return record.rollupCreatorAddress;
  }

  private async findExisting(parentChainId: number): Promise<InfrastructureResult | undefined> {
    let record: InfrastructureRecord | null = null;
    if (this.config.repository) {
      try {
        record = await this.config.repository.getInfrastructure(parentChainId);
      } catch (e) {
        logWarning(`Failed to read infrastructure record for chain ${parentChainId}: ${errorMessage(e)}`);
      }
    }

    if (record) {
      if (isVersionCompatible(record.version, this.targetVersion)) {
        this.log(`Reusing RollupCreator ${record.rollupCreatorAddress} (${record.version}) on chain ${parentChainId}`);
        return {
          rollupCreatorAddress: record.rollupCreatorAddress,
          bridgeCreatorAddress: record.bridgeCreatorAddress,
          version: record.version,
          source: "repository",
          alreadyDeployed: true,
          deploymentTxHash: record.deploymentTxHash,
          addresses: record.addresses,
          deployments: [],
        };
      }
      logWarning(
        `Infrastructure on chain ${parentChainId} is ${record.version}, below ${this.targetVersion}; deploying a replacement`
      );
    }

    const known = getWellKnownRollupCreator(parentChainId, this.wellKnown);
    if (known) {
      if (isVersionCompatible(known.version, this.targetVersion)) {
        this.log(`Using well-known RollupCreator ${known.rollupCreatorAddress} (${known.version})`);
        return {
          rollupCreatorAddress: known.rollupCreatorAddress,
          version: known.version,
          source: "well-known",
          alreadyDeployed: true,
          deployments: [],
        };
      }
      logWarning(
        `Skipping well-known RollupCreator ${known.rollupCreatorAddress} on chain ${parentChainId}: ${known.version} is below ${this.targetVersion}`
      );
    }

    return undefined;
  }

  private async persist(parentChainId: number, result: InfrastructureResult) {
    if (!this.config.repository) {
      return;
    }
    try {
      await this.config.repository.upsertInfrastructure({
        parentChainId,
        rollupCreatorAddress: result.rollupCreatorAddress,
        bridgeCreatorAddress: result.bridgeCreatorAddress,
        version: result.version,
        deploymentTxHash: result.deploymentTxHash,
        deployedBy: this.config.signer.address(),
        addresses: result.addresses,
      });
    } catch (e) {
      logWarning(`Failed to persist infrastructure record for chain ${parentChainId}: ${errorMessage(e)}`);
    }
  }
}

/** One fresh run of the dependency-ordered graph. Strictly sequential, one nonce lookup per contract. */
class GraphDeployment {
  private readonly deployments: DeployedContract[] = [];
  private gasPrice?: ethers.BigNumber;

  constructor(
    private readonly config: InfrastructureDeployerConfig,
    private readonly client: ParentChainClient,
    private readonly log: LogFn,
    private readonly signal?: AbortSignal
  ) {}

  async run(): Promise<InfrastructureResult> {
    try {
      this.gasPrice = boostGasPrice(await this.client.getGasPrice());
    } catch (e) {
      throw wrapError("get gas price", e);
    }

    this.log("Phase 1: contracts without constructor arguments");
    const prover0 = await this.deploy("OneStepProver0");
    const proverMemory = await this.deploy("OneStepProverMemory");
    const proverMath = await this.deploy("OneStepProverMath");
    const templates = await this.deployTemplates();

    this.log("Phase 1b: provers and inboxes");
    const proverHostIo = await this.deploy("OneStepProverHostIo", [this.config.daValidator ?? ADDRESS_ZERO]);
    const inboxes = await this.deployInboxes();

    this.log("Phase 2: proof entry and bridge creator");
    const oneStepProofEntry = await this.deploy("OneStepProofEntry", [prover0, proverMemory, proverMath, proverHostIo]);
    const bridgeCreator = await this.deploy("BridgeCreator", [
      [templates.bridge, inboxes.ethSequencerInbox, inboxes.inbox, templates.rollupEventInbox, templates.outbox],
      [templates.erc20Bridge, inboxes.erc20SequencerInbox, inboxes.erc20Inbox, templates.rollupEventInbox, templates.outbox],
    ]);

    this.log("Phase 3: rollup creator");
    const rollupCreator = await this.deploy("RollupCreator", [
      this.config.signer.address(),
      bridgeCreator,
      oneStepProofEntry,
      templates.challengeManager,
      templates.rollupAdminLogic,
      templates.rollupUserLogic,
      templates.upgradeExecutor,
      templates.validatorWalletCreator,
      templates.deployHelper,
    ]);

    const addresses: InfrastructureAddresses = {
      ...templates,
      ...inboxes,
      prover0,
      proverMemory,
      proverMath,
      proverHostIo,
      oneStepProofEntry,
      bridgeCreator,
      rollupCreator,
    };
    this.log(`Infrastructure deployed: RollupCreator at ${rollupCreator}`);

    return {
      rollupCreatorAddress: rollupCreator,
      bridgeCreatorAddress: bridgeCreator,
      version: this.config.artifacts.version,
      source: "deployed",
      alreadyDeployed: false,
      deploymentTxHash: this.deployments[this.deployments.length - 1]?.txHash,
      addresses: { ...addresses },
      deployments: [...this.deployments],
    };
  }

  private async deployTemplates(): Promise<TemplateContracts> {
    return {
      bridge: await this.deploy("Bridge"),
      erc20Bridge: await this.deploy("ERC20Bridge"),
      outbox: await this.deploy("Outbox"),
      rollupEventInbox: await this.deploy("RollupEventInbox"),
      challengeManager: await this.deploy("EdgeChallengeManager"),
      rollupAdminLogic: await this.deploy("RollupAdminLogic"),
      rollupUserLogic: await this.deploy("RollupUserLogic"),
      upgradeExecutor: await this.deploy("UpgradeExecutor"),
      validatorWalletCreator: await this.deploy("ValidatorWalletCreator"),
      deployHelper: await this.deploy("DeployHelper"),
    };
  }

  private async deployInboxes(): Promise<InboxContracts> {
    const maxDataSize = this.config.maxDataSize ?? DEFAULT_MAX_DATA_SIZE;
    const reader4844 = await this.deployBlobReader();
    return {
      reader4844,
      ethSequencerInbox: await this.deploy("SequencerInbox", [maxDataSize, reader4844, false, false], "SequencerInbox (ETH)"),
      erc20SequencerInbox: await this.deploy("SequencerInbox", [maxDataSize, reader4844, true, false], "SequencerInbox (ERC20)"),
      inbox: await this.deploy("Inbox", [maxDataSize]),
      erc20Inbox: await this.deploy("ERC20Inbox", [maxDataSize]),
    };
  }

  // An Arbitrum parent has no blob opcode, so the reader must stay unset there
  private async deployBlobReader(): Promise<string> {
    let code: string;
    try {
      code = await this.client.getCode(ARB_SYS_ADDRESS);
    } catch (e) {
      throw wrapError("probe ArbSys precompile", e);
    }
    if (ethers.utils.hexDataLength(code) > 0) {
      this.log("Parent chain is an Arbitrum chain, skipping Reader4844");
      return ADDRESS_ZERO;
    }
    return this.deploy("Reader4844");
  }

  private async deploy(name: ContractName, args: readonly unknown[] = [], label: string = name): Promise<string> {
    throwIfAborted(this.signal);
    try {
      const deployed = await this.submit(name, args, label);
      this.deployments.push(deployed);
      await this.config.onContractDeployed?.(deployed);
      this.log(`  ${label}: ${deployed.address}`);
      return deployed.address;
    } catch (e) {
      throw wrapError(`deploy ${label}`, e);
    }
  }

  private async submit(name: ContractName, args: readonly unknown[], label: string): Promise<DeployedContract> {
    const signer = this.config.signer;
    const from = signer.address();
    const data = encodeDeployData(this.config.artifacts.get(name), args);
    const gasPrice = this.gasPrice ?? boostGasPrice(await this.client.getGasPrice());

    let nonce: number;
    try {
      nonce = await this.client.getTransactionCount(from);
    } catch (e) {
      throw wrapError("get nonce", e);
    }

    let gasLimit: ethers.BigNumber;
    try {
      gasLimit = await this.client.estimateGas({ from, data, gasPrice });
    } catch (e) {
      if (isAbortError(e)) {
        throw e;
      }
      logWarning(`Gas estimation failed for ${label}, using ${INFRA_DEFAULT_GAS_LIMIT}: ${errorMessage(e)}`);
      gasLimit = ethers.BigNumber.from(INFRA_DEFAULT_GAS_LIMIT);
    }

    let signed: SignedTransaction;
    try {
      signed = await signer.signTransaction(
        { nonce, gasLimit: applyGasBuffer(gasLimit), gasPrice, data, value: ethers.constants.Zero, chainId: signer.chainId() },
        this.signal
      );
    } catch (e) {
      throw wrapError("sign transaction", e);
    }

    try {
      await this.client.sendRawTransaction(signed.raw);
    } catch (e) {
      throw wrapError("send transaction", e);
    }

    let receipt: ChainReceipt;
    try {
      receipt = await waitForReceipt(this.client, signed.hash, { ...this.config.receipts, signal: this.signal });
    } catch (e) {
      throw wrapError("wait for receipt", e);
    }
    if (receipt.status !== 1) {
      throw new OnChainError("contract deployment reverted", signed.hash, receipt.blockNumber);
    }
    if (!receipt.contractAddress) {
      throw new OnChainError("receipt has no contract address", signed.hash, receipt.blockNumber);
    }

    return { name: label, address: ethers.utils.getAddress(receipt.contractAddress), txHash: signed.hash };
  }
}
