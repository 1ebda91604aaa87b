import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import archiver from "archiver";
import { ethers } from "ethers";
import type { Transaction } from "ethers";
import { Response } from "node-fetch";
import type { RequestInit } from "node-fetch";

import { rollupCreatedInterface, wethInterface } from "../../src.ts/abi";
import { loadFromDirectory, type ArtifactBundle, type FetchFn } from "../../src.ts/artifacts";
import type { CallRequest, ChainLog, ChainReceipt, ParentChainClient } from "../../src.ts/chain-client";
import type { CreatedRollupAddresses } from "../../src.ts/rollup";
import { LocalSigner } from "../../src.ts/signer";

export const FIXTURES_DIR = path.join(__dirname, "..", "fixtures", "contracts");
export const FIXTURE_VERSION = "v3.2.0";

export const TEST_PRIVATE_KEY = ethers.utils.id("test-secret");
export const TEST_ADDRESS = new ethers.Wallet(TEST_PRIVATE_KEY).address;
export const PARENT_CHAIN_ID = 11155111;
export const PARENT_CHAIN_RPC = "http://parent-chain.test:8545";
export const FAST_RECEIPTS = { pollIntervalMs: 1, timeoutMs: 200 };

// Digits only, so checksumming leaves them unchanged
export const CREATED_ROLLUP: CreatedRollupAddresses = {
  rollup: "0x0000000000000000000000000000000000001001",
  nativeToken: "0x0000000000000000000000000000000000000000",
  inbox: "0x0000000000000000000000000000000000001002",
  outbox: "0x0000000000000000000000000000000000001003",
  rollupEventInbox: "0x0000000000000000000000000000000000001004",
  challengeManager: "0x0000000000000000000000000000000000001005",
  adminProxy: "0x0000000000000000000000000000000000001006",
  sequencerInbox: "0x0000000000000000000000000000000000001007",
  bridge: "0x0000000000000000000000000000000000001008",
  upgradeExecutor: "0x0000000000000000000000000000000000001009",
  validatorWalletCreator: "0x0000000000000000000000000000000000001010",
};

export function loadFixtureBundle(): ArtifactBundle {
  return loadFromDirectory(FIXTURES_DIR, FIXTURE_VERSION);
}

export function testSigner(chainId: number = PARENT_CHAIN_ID): LocalSigner {
  return new LocalSigner(TEST_PRIVATE_KEY, chainId);
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}

export interface FakeTransactionOutcome {
  status?: number;
  logs?: ChainLog[];
}

export type TransactionHandler = (tx: Transaction) => FakeTransactionOutcome | void;
export type CallHandler = (request: CallRequest) => string;

function selectorOf(data: string | undefined): string {
  return (data ?? "0x").slice(0, 10).toLowerCase();
}

/**
 * Parent chain kept in process memory. Contract creations get the usual CREATE address;
 * calls and transactions to existing contracts are answered by handlers keyed by selector.
 */
export class FakeChain implements ParentChainClient {
  readonly sent: Transaction[] = [];
  readonly code = new Map<string, string>();
  balance = ethers.utils.parseEther("10");
  gasPrice = ethers.utils.parseUnits("1", "gwei");
  gasEstimate = ethers.BigNumber.from(1_000_000);
  estimateGasError?: string;
  // When false, receipts only appear after mine()
  autoMine = true;

  private readonly nonces = new Map<string, number>();
  private readonly receipts = new Map<string, ChainReceipt>();
  private readonly pending: ChainReceipt[] = [];
  private readonly transactionHandlers = new Map<string, TransactionHandler>();
  private readonly callHandlers = new Map<string, CallHandler>();
  private blockNumber = 100;

  constructor(public chainId: number = PARENT_CHAIN_ID) {}

  onTransaction(selector: string, handler: TransactionHandler) {
    this.transactionHandlers.set(selector.toLowerCase(), handler);
  }

  onCall(selector: string, handler: CallHandler) {
    this.callHandlers.set(selector.toLowerCase(), handler);
  }

  mine() {
    for (const receipt of this.pending.splice(0)) {
      this.receipts.set(receipt.transactionHash, receipt);
    }
  }

  async getChainId(): Promise<number> {
    return this.chainId;
  }

  async getTransactionCount(address: string): Promise<number> {
    return this.nonces.get(address.toLowerCase()) ?? 0;
  }

  async getGasPrice(): Promise<ethers.BigNumber> {
    return this.gasPrice;
  }

  async getBalance(): Promise<ethers.BigNumber> {
    return this.balance;
  }

  async getCode(address: string): Promise<string> {
    return this.code.get(address.toLowerCase()) ?? "0x";
  }

  async estimateGas(): Promise<ethers.BigNumber> {
    if (this.estimateGasError) {
      throw new Error(this.estimateGasError);
    }
    return this.gasEstimate;
  }

  async call(request: CallRequest): Promise<string> {
    const handler = this.callHandlers.get(selectorOf(request.data));
    if (!handler) {
      throw new Error(`execution reverted: no handler for ${selectorOf(request.data)}`);
    }
    return handler(request);
  }

  async sendRawTransaction(signedTransaction: string): Promise<string> {
    const tx = ethers.utils.parseTransaction(signedTransaction);
    if (!tx.hash || !tx.from) {
      throw new Error("transaction is not signed");
    }
    if (tx.chainId !== this.chainId) {
      throw new Error(`invalid chain id ${tx.chainId}`);
    }
    const from = tx.from.toLowerCase();
    const expectedNonce = this.nonces.get(from) ?? 0;
    if (tx.nonce !== expectedNonce) {
      throw new Error(`nonce mismatch: expected ${expectedNonce}, got ${tx.nonce}`);
    }
    this.nonces.set(from, expectedNonce + 1);
    this.sent.push(tx);

    let outcome: FakeTransactionOutcome = {};
    let contractAddress: string | null = null;
    if (tx.to) {
      outcome = this.transactionHandlers.get(selectorOf(tx.data))?.(tx) ?? {};
    } else {
      contractAddress = ethers.utils.getContractAddress({ from: tx.from, nonce: tx.nonce });
      this.code.set(contractAddress.toLowerCase(), "0x6080604052");
    }

    this.blockNumber++;
    const receipt: ChainReceipt = {
      transactionHash: tx.hash,
      blockNumber: this.blockNumber,
      status: outcome.status ?? 1,
      contractAddress,
      logs: outcome.logs ?? [],
    };
    if (this.autoMine) {
      this.receipts.set(tx.hash, receipt);
    } else {
      this.pending.push(receipt);
    }
    return tx.hash;
  }

  async getTransactionReceipt(txHash: string): Promise<ChainReceipt | null> {
    return this.receipts.get(txHash) ?? null;
  }
}

export function rollupCreatedLog(emitter: string, created: CreatedRollupAddresses = CREATED_ROLLUP): ChainLog {
  const encoded = rollupCreatedInterface.encodeEventLog(rollupCreatedInterface.getEvent("RollupCreated"), [
    created.rollup,
    created.nativeToken,
    created.inbox,
    created.outbox,
    created.rollupEventInbox,
    created.challengeManager,
    created.adminProxy,
    created.sequencerInbox,
    created.bridge,
    created.upgradeExecutor,
    created.validatorWalletCreator,
  ]);
  return { address: emitter, topics: encoded.topics, data: encoded.data };
}

/** Answers `createRollup` with a RollupCreated event for `created`. */
export function installRollupCreator(
  chain: FakeChain,
  bundle: ArtifactBundle,
  created: CreatedRollupAddresses = CREATED_ROLLUP
) {
  const selector = bundle.get("RollupCreator").abi.getSighash("createRollup");
  chain.onTransaction(selector, (tx) => ({ logs: [rollupCreatedLog(tx.to ?? "", created)] }));
}

/** Tracks batch posters set through `UpgradeExecutor.executeCall(setIsBatchPoster)`. */
export function installSequencerInbox(chain: FakeChain, bundle: ArtifactBundle): Set<string> {
  const sequencerInbox = bundle.get("SequencerInbox").abi;
  const upgradeExecutor = bundle.get("UpgradeExecutor").abi;
  const posters = new Set<string>();

  chain.onCall(sequencerInbox.getSighash("isBatchPoster"), (request) => {
    const [poster] = sequencerInbox.decodeFunctionData("isBatchPoster", request.data ?? "0x");
    return sequencerInbox.encodeFunctionResult("isBatchPoster", [posters.has(String(poster).toLowerCase())]);
  });
  chain.onTransaction(upgradeExecutor.getSighash("executeCall"), (tx) => {
    const [, callData] = upgradeExecutor.decodeFunctionData("executeCall", tx.data);
    const [poster, allowed] = sequencerInbox.decodeFunctionData("setIsBatchPoster", String(callData));
    if (allowed) {
      posters.add(String(poster).toLowerCase());
    }
  });
  return posters;
}

/** A WETH-style stake token whose balance grows by the value of every deposit. */
export function installStakeToken(chain: FakeChain, initialBalance: ethers.BigNumber) {
  const state = { balance: initialBalance };
  chain.onCall(wethInterface.getSighash("balanceOf"), () =>
    wethInterface.encodeFunctionResult("balanceOf", [state.balance])
  );
  chain.onTransaction(wethInterface.getSighash("deposit"), (tx) => {
    state.balance = state.balance.add(tx.value);
  });
  return state;
}

export interface RecordedRequest {
  url: string;
  init?: RequestInit;
}

export interface FakeResponse {
  status: number;
  body: string | Buffer;
}

/** node-fetch stand-in replaying `responses` in order; the last one repeats. */
export function fakeFetch(responses: FakeResponse[]): { fetch: FetchFn; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const fetch: FetchFn = async (url, init) => {
    requests.push({ url, init });
    const next = responses[Math.min(requests.length - 1, responses.length - 1)];
    return new Response(next.body, { status: next.status });
  };
  return { fetch, requests };
}

export async function zipFiles(files: Record<string, string>): Promise<Buffer> {
  const archive = archiver("zip");
  const chunks: Buffer[] = [];
  archive.on("data", (chunk: Buffer) => chunks.push(chunk));
  const finished = new Promise<void>((resolve, reject) => {
    archive.on("end", () => resolve());
    archive.on("error", reject);
  });
  for (const [name, content] of Object.entries(files)) {
    archive.append(content, { name });
  }
  await archive.finalize();
  await finished;
  return Buffer.concat(chunks);
}

/** Fixture contracts keyed by their path inside an artifact zip. */
export function fixtureZipEntries(prefix: string = "contracts/", skip: string[] = []): Record<string, string> {
  const entries: Record<string, string> = {};
  for (const file of fs.readdirSync(FIXTURES_DIR)) {
    if (skip.includes(path.basename(file, ".json"))) {
      continue;
    }
    entries[`${prefix}${file}`] = fs.readFileSync(path.join(FIXTURES_DIR, file), "utf-8");
  }
  return entries;
}

export function deploymentConfigJson(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    chain_id: 42170,
    chain_name: "test-rollup",
    l1_chain_id: PARENT_CHAIN_ID,
    l1_rpc: PARENT_CHAIN_RPC,
    deployer_address: TEST_ADDRESS,
    data_availability: "celestia",
    api_key: "test-secret",
    ...overrides,
  });
}

/** Collects what `console.log` prints while `fn` runs. */
export async function captureConsoleLog(fn: () => Promise<unknown>): Promise<string[]> {
  const lines: string[] = [];
  const original = console.log;
  console.log = (...args: unknown[]) => void lines.push(args.map(String).join(" "));
  try {
    await fn();
  } finally {
    console.log = original;
  }
  return lines;
}

export async function rejectionOf(promise: Promise<unknown>): Promise<Error> {
  try {
    await promise;
  } catch (e) {
    if (e instanceof Error) {
      return e;
    }
    throw new Error(`rejected with a non-error value: ${String(e)}`);
  }
  throw new Error("expected promise to reject");
}
