import { ethers } from "ethers";

import {
  ROLLUP_CREATED_MIN_DATA_BYTES,
  ROLLUP_CREATED_TOPIC,
  rollupCreatedInterface,
  wethInterface,
} from "./abi";
import type { ArtifactBundle } from "./artifacts";
import { prepareChainConfig, type ChainConfig } from "./chain-config";
import {
  jsonRpcChainClientFactory,
  waitForReceipt,
  type ChainClientFactory,
  type ChainLog,
  type ChainReceipt,
  type ParentChainClient,
  type ReceiptWaitOptions,
} from "./chain-client";
import {
  ADDRESS_ZERO,
  BATCH_POSTER_DEFAULT_GAS_LIMIT,
  BOLD_DEFAULTS,
  CREATE_ROLLUP_DEFAULT_GAS_LIMIT,
  DEFAULT_MAX_FEE_PER_GAS_FOR_RETRYABLES,
  MAX_GAS_LIMIT,
  REQUIRED_STAKE_TOKEN_BALANCE,
  WRAP_DEFAULT_GAS_LIMIT,
} from "./constants";
import { validateDeployConfig, withDeployDefaults, type DeployConfig, type ResolvedDeployConfig } from "./deploy-config";
import { OnChainError, errorMessage, isAbortError, wrapError } from "./errors";
import type { SignedTransaction, TransactionSigner } from "./signer";
import { applyGasBuffer, boostGasPrice, isZeroAddress, logWarning, makeLogger, throwIfAborted, type LogFn } from "./utils";

export interface RollupContracts {
  rollup: string;
  inbox: string;
  outbox: string;
  bridge: string;
  sequencerInbox: string;
  rollupEventInbox: string;
  challengeManager: string;
  adminProxy: string;
  upgradeExecutor: string;
  validatorWalletCreator: string;
  nativeToken: string;
  deployedAtBlockNumber: number;
}

export type CreatedRollupAddresses = Omit<RollupContracts, "deployedAtBlockNumber">;

export interface PostDeployTransaction {
  description: string;
  txHash: string;
}

export interface RollupDeployResult {
  success: boolean;
  contracts?: RollupContracts;
  transactionHash?: string;
  blockNumber?: number;
  chainConfig?: ChainConfig;
  postDeployTransactions: PostDeployTransaction[];
  error?: string;
}

export interface RollupDeployerConfig {
  artifacts: ArtifactBundle;
  signer: TransactionSigner;
  chainClientFactory?: ChainClientFactory;
  receipts?: Omit<ReceiptWaitOptions, "signal">;
  verbose?: boolean;
}

// Genesis machine status of a finished assertion
const MACHINE_STATUS_FINISHED = 1;

/**
 * Arguments of `RollupCreator.createRollup`, keyed by the struct member names so the
 * bundle's ABI coder can encode them as tuples.
 */
export function buildCreateRollupParams(config: ResolvedDeployConfig, chainConfig: ChainConfig) {
  const owner = ethers.utils.getAddress(config.owner);
  const baseStake = ethers.BigNumber.from(config.baseStake);
  return {
    config: {
      confirmPeriodBlocks: config.confirmPeriodBlocks,
      stakeToken: config.stakeToken,
      baseStake,
      wasmModuleRoot: config.wasmModuleRoot,
      owner,
      loserStakeEscrow: owner,
      chainId: config.chainId,
      chainConfig: JSON.stringify(chainConfig),
      minimumAssertionPeriod: BOLD_DEFAULTS.minimumAssertionPeriod,
      validatorAfkBlocks: BOLD_DEFAULTS.validatorAfkBlocks,
      // One entry per challenge level: block, each big step level, small step
      miniStakeValues: Array.from({ length: BOLD_DEFAULTS.numBigStepLevel + 2 }, () => baseStake),
      sequencerInboxMaxTimeVariation: { ...BOLD_DEFAULTS.maxTimeVariation },
      layerZeroBlockEdgeHeight: BOLD_DEFAULTS.layerZeroBlockEdgeHeight,
      layerZeroBigStepEdgeHeight: BOLD_DEFAULTS.layerZeroBigStepEdgeHeight,
      layerZeroSmallStepEdgeHeight: BOLD_DEFAULTS.layerZeroSmallStepEdgeHeight,
      genesisAssertionState: {
        globalState: {
          bytes32Vals: [ethers.constants.HashZero, ethers.constants.HashZero],
          u64Vals: [0, 0],
        },
        machineStatus: MACHINE_STATUS_FINISHED,
        endHistoryRoot: ethers.constants.HashZero,
      },
      genesisInboxCount: 0,
      anyTrustFastConfirmer: ADDRESS_ZERO,
      numBigStepLevel: BOLD_DEFAULTS.numBigStepLevel,
      challengeGracePeriodBlocks: BOLD_DEFAULTS.challengeGracePeriodBlocks + config.extraChallengeTimeBlocks,
      bufferConfig: { threshold: 0, max: 0, replenishRateInBasis: 0 },
    },
    validators: config.validators,
    maxDataSize: config.maxDataSize,
    nativeToken: config.nativeToken,
    deployFactoriesToL2: config.deployFactoriesToL2,
    maxFeePerGasForRetryables: DEFAULT_MAX_FEE_PER_GAS_FOR_RETRYABLES,
    batchPosters: config.batchPosters,
    batchPosterManager: owner,
    feeTokenPricer: ADDRESS_ZERO,
  };
}

export function isRollupCreatedLog(log: ChainLog): boolean {
  return (
    log.topics.length >= 3 &&
    log.topics[0].toLowerCase() === ROLLUP_CREATED_TOPIC &&
    ethers.utils.hexDataLength(log.data) >= ROLLUP_CREATED_MIN_DATA_BYTES
  );
}

/** Recovers the created contracts from the first qualifying `RollupCreated` log. */
export function parseRollupCreatedLogs(logs: readonly ChainLog[], log: LogFn = () => {}): CreatedRollupAddresses {
  for (const entry of logs) {
    if (!isRollupCreatedLog(entry)) {
      continue;
    }
    let parsed: ethers.utils.LogDescription;
    try {
      parsed = rollupCreatedInterface.parseLog({ topics: entry.topics, data: entry.data });
    } catch (e) {
      log(`Skipping undecodable RollupCreated log from ${entry.address}: ${errorMessage(e)}`);
      continue;
    }
    const args = parsed.args;
    return {
      rollup: String(args.rollupAddress),
      nativeToken: String(args.nativeToken),
      inbox: String(args.inboxAddress),
      outbox: String(args.outbox),
      rollupEventInbox: String(args.rollupEventInbox),
      challengeManager: String(args.challengeManager),
      adminProxy: String(args.adminProxy),
      sequencerInbox: String(args.sequencerInbox),
      bridge: String(args.bridge),
      upgradeExecutor: String(args.upgradeExecutor),
      validatorWalletCreator: String(args.validatorWalletCreator),
    };
  }

  for (const entry of logs) {
    log(`  observed log ${entry.address} topic0=${entry.topics[0] ?? "(none)"}`);
  }
  throw new Error(`RollupCreated event not found in logs (checked ${logs.length} logs)`);
}

export class RollupDeployer {
  private readonly clientFactory: ChainClientFactory;
  private readonly log: LogFn;

  constructor(private readonly config: RollupDeployerConfig) {
    this.clientFactory = config.chainClientFactory ?? jsonRpcChainClientFactory;
    this.log = makeLogger(config.verbose ?? false);
  }

  /**
   * Creates the rollup through `rollupCreatorAddress` and runs the best-effort follow-ups.
   * Failures come back as `success: false` with whatever hash and block are already known.
   */
  async deploy(deployConfig: DeployConfig, rollupCreatorAddress: string, signal?: AbortSignal): Promise<RollupDeployResult> {
    let config: ResolvedDeployConfig;
    try {
      validateDeployConfig(deployConfig);
      config = withDeployDefaults(deployConfig);
    } catch (e) {
      return failed(e);
    }
    this.log(`Deploying rollup ${config.chainName} (${config.chainId}) on parent chain ${config.parentChainId}`);

    const client = this.clientFactory(config.parentChainRpc);
    const from = this.config.signer.address();

    let chainConfig: ChainConfig;
    let data: string;
    let gasPrice: ethers.BigNumber;
    let signed: SignedTransaction;
    try {
      await this.checkPreconditions(client, config.parentChainId, from);

      chainConfig = prepareChainConfig(config);
      try {
        const rollupCreator = this.config.artifacts.get("RollupCreator");
        data = rollupCreator.abi.encodeFunctionData("createRollup", [buildCreateRollupParams(config, chainConfig)]);
      } catch (e) {
        throw wrapError("encode createRollup", e);
      }

      try {
        gasPrice = boostGasPrice(await client.getGasPrice());
      } catch (e) {
        throw wrapError("get gas price", e);
      }
      const gasLimit = await this.createRollupGasLimit(client, { from, to: rollupCreatorAddress, data, gasPrice });

      this.log(`Sending createRollup to ${rollupCreatorAddress} (gas limit ${gasLimit}, gas price ${gasPrice})`);
      signed = await this.signAndSend(client, { to: rollupCreatorAddress, data, gasLimit, gasPrice }, signal);
    } catch (e) {
      return failed(e);
    }

    let receipt: ChainReceipt;
    try {
      receipt = await waitForReceipt(client, signed.hash, { ...this.config.receipts, signal });
    } catch (e) {
      return failed(wrapError("wait for receipt", e), signed.hash);
    }
    if (receipt.status !== 1) {
      return {
        success: false,
        transactionHash: signed.hash,
        blockNumber: receipt.blockNumber,
        error: "transaction reverted",
        postDeployTransactions: [],
      };
    }
    this.log(`createRollup confirmed in block ${receipt.blockNumber}`);

    let contracts: RollupContracts;
    try {
      contracts = { ...parseRollupCreatedLogs(receipt.logs, this.log), deployedAtBlockNumber: receipt.blockNumber };
    } catch (e) {
      return { ...failed(wrapError("parse deployment logs", e), signed.hash), blockNumber: receipt.blockNumber };
    }
    this.log(`Rollup deployed at ${contracts.rollup}, sequencer inbox ${contracts.sequencerInbox}`);

    const postDeployTransactions: PostDeployTransaction[] = [];
    const post = { client, gasPrice, signal, transactions: postDeployTransactions };

    try {
      if (config.batchPosters.length > 0) {
        await this.whitelistBatchPosters(post, contracts, config.batchPosters);
      }
      if (!isZeroAddress(config.stakeToken)) {
        await this.ensureStakeTokenBalance(post, config.stakeToken, REQUIRED_STAKE_TOKEN_BALANCE);
      }
    } catch (e) {
      if (isAbortError(e)) {
        return { ...failed(e, signed.hash), blockNumber: receipt.blockNumber, postDeployTransactions };
      }
      logWarning(`Post-deployment step failed: ${errorMessage(e)}`);
    }

    return {
      success: true,
      contracts,
      transactionHash: signed.hash,
      blockNumber: receipt.blockNumber,
      chainConfig,
      postDeployTransactions,
    };
  }

  private async checkPreconditions(client: ParentChainClient, parentChainId: number, from: string) {
    let chainId: number;
    try {
      chainId = await client.getChainId();
    } catch (e) {
      throw wrapError("get chain ID", e);
    }
    if (chainId !== parentChainId) {
      throw new Error(`chain ID mismatch: expected ${parentChainId}, got ${chainId}`);
    }

    let balance: ethers.BigNumber;
    try {
      balance = await client.getBalance(from);
    } catch (e) {
      throw wrapError("get balance", e);
    }
    this.log(`Deployer ${from} balance: ${ethers.utils.formatEther(balance)} ETH`);
    if (balance.isZero()) {
      throw new Error("deployer address has no ETH balance");
    }
  }

  private async createRollupGasLimit(
    client: ParentChainClient,
    request: { from: string; to: string; data: string; gasPrice: ethers.BigNumber }
  ): Promise<ethers.BigNumber> {
    let estimate: ethers.BigNumber;
    try {
      estimate = await client.estimateGas({ ...request, value: 0 });
    } catch (e) {
      logWarning(`Gas estimation failed for createRollup, using ${CREATE_ROLLUP_DEFAULT_GAS_LIMIT}: ${errorMessage(e)}`);
      estimate = ethers.BigNumber.from(CREATE_ROLLUP_DEFAULT_GAS_LIMIT);
    }
    const buffered = applyGasBuffer(estimate);
    // Stay under the parent chain's block gas limit
    if (buffered.gt(MAX_GAS_LIMIT)) {
      logWarning(`Gas limit ${buffered} capped to ${MAX_GAS_LIMIT}`);
      return ethers.BigNumber.from(MAX_GAS_LIMIT);
    }
    return buffered;
  }

  private async signAndSend(
    client: ParentChainClient,
    tx: { to: string; data: string; gasLimit: ethers.BigNumber; gasPrice: ethers.BigNumber; value?: ethers.BigNumber },
    signal?: AbortSignal
  ): Promise<SignedTransaction> {
    const signer = this.config.signer;
    throwIfAborted(signal);

    let nonce: number;
    try {
      nonce = await client.getTransactionCount(signer.address());
    } catch (e) {
      throw wrapError("get nonce", e);
    }

    let signed: SignedTransaction;
    try {
      signed = await signer.signTransaction(
        { ...tx, nonce, value: tx.value ?? ethers.constants.Zero, chainId: signer.chainId() },
        signal
      );
    } catch (e) {
      throw wrapError("sign transaction", e);
    }

    try {
      await client.sendRawTransaction(signed.raw);
    } catch (e) {
      throw wrapError("send transaction", e);
    }
    return signed;
  }

  // Sends a follow-up call and waits for it; returns its hash
  private async submitCall(
    post: PostDeployContext,
    description: string,
    to: string,
    data: string,
    fallbackGasLimit: number,
    value: ethers.BigNumber = ethers.constants.Zero
  ): Promise<string> {
    const from = this.config.signer.address();
    let gasLimit: ethers.BigNumber;
    try {
      gasLimit = await post.client.estimateGas({ from, to, data, value, gasPrice: post.gasPrice });
    } catch (e) {
      this.log(`Gas estimation failed for ${description}, using ${fallbackGasLimit}: ${errorMessage(e)}`);
      gasLimit = ethers.BigNumber.from(fallbackGasLimit);
    }

    const signed = await this.signAndSend(
      post.client,
      { to, data, value, gasLimit: applyGasBuffer(gasLimit), gasPrice: post.gasPrice },
      post.signal
    );
    post.transactions.push({ description, txHash: signed.hash });

    let receipt: ChainReceipt;
    try {
      receipt = await waitForReceipt(post.client, signed.hash, { ...this.config.receipts, signal: post.signal });
    } catch (e) {
      throw wrapError("wait for receipt", e);
    }
    if (receipt.status !== 1) {
      throw new OnChainError(`${description} reverted`, signed.hash, receipt.blockNumber);
    }
    return signed.hash;
  }

  private async isBatchPoster(post: PostDeployContext, sequencerInbox: string, poster: string): Promise<boolean> {
    const sequencerInboxAbi = this.config.artifacts.get("SequencerInbox").abi;
    const result = await post.client.call({
      to: sequencerInbox,
      data: sequencerInboxAbi.encodeFunctionData("isBatchPoster", [poster]),
    });
    const [isPoster] = sequencerInboxAbi.decodeFunctionResult("isBatchPoster", result);
    return Boolean(isPoster);
  }

  private async whitelistBatchPosters(post: PostDeployContext, contracts: RollupContracts, posters: string[]) {
    const sequencerInboxAbi = this.config.artifacts.get("SequencerInbox").abi;
    const upgradeExecutorAbi = this.config.artifacts.get("UpgradeExecutor").abi;

    for (const poster of posters) {
      try {
        if (await this.isBatchPoster(post, contracts.sequencerInbox, poster)) {
          this.log(`Batch poster ${poster} already whitelisted`);
          continue;
        }

        // The sequencer inbox is owned by the upgrade executor, so the call is routed through it
        const upgradeCallData = sequencerInboxAbi.encodeFunctionData("setIsBatchPoster", [poster, true]);
        const data = upgradeExecutorAbi.encodeFunctionData("executeCall", [contracts.sequencerInbox, upgradeCallData]);
        const txHash = await this.submitCall(
          post,
          `whitelist batch poster ${poster}`,
          contracts.upgradeExecutor,
          data,
          BATCH_POSTER_DEFAULT_GAS_LIMIT
        );
        this.log(`Batch poster ${poster} whitelisted in ${txHash}`);

        if (!(await this.isBatchPoster(post, contracts.sequencerInbox, poster))) {
          logWarning(`Batch poster ${poster} is still not whitelisted after ${txHash}`);
        }
      } catch (e) {
        if (isAbortError(e)) {
          throw e;
        }
        logWarning(`Failed to whitelist batch poster ${poster}: ${errorMessage(e)}`);
      }
    }
  }

  private async ensureStakeTokenBalance(post: PostDeployContext, token: string, required: ethers.BigNumber) {
    const owner = this.config.signer.address();
    let balance: ethers.BigNumber;
    try {
      const result = await post.client.call({ to: token, data: wethInterface.encodeFunctionData("balanceOf", [owner]) });
      balance = ethers.BigNumber.from(wethInterface.decodeFunctionResult("balanceOf", result)[0]);
    } catch (e) {
      throw wrapError("read stake token balance", e);
    }

    if (balance.gte(required)) {
      this.log(`Stake token balance ${ethers.utils.formatEther(balance)} is sufficient`);
      return;
    }

    const shortfall = required.sub(balance);
    this.log(`Wrapping ${ethers.utils.formatEther(shortfall)} ETH into stake token ${token}`);
    await this.submitCall(
      post,
      "wrap stake token",
      token,
      wethInterface.encodeFunctionData("deposit"),
      WRAP_DEFAULT_GAS_LIMIT,
      shortfall
    );
  }
}

interface PostDeployContext {
  client: ParentChainClient;
  gasPrice: ethers.BigNumber;
  signal?: AbortSignal;
  transactions: PostDeployTransaction[];
}

function failed(error: unknown, transactionHash?: string): RollupDeployResult {
  return { success: false, transactionHash, error: errorMessage(error), postDeployTransactions: [] };
}
