import { ethers } from "ethers";

import { RECEIPT_POLL_INTERVAL_MS, RECEIPT_TIMEOUT_MS } from "./constants";
import { OnChainError, isAbortError } from "./errors";
import { sleep, throwIfAborted } from "./utils";

export interface ChainLog {
  address: string;
  topics: string[];
  data: string;
}

export interface ChainReceipt {
  transactionHash: string;
  blockNumber: number;
  // 1 = success, 0 = reverted
  status: number;
  contractAddress: string | null;
  logs: ChainLog[];
}

export interface CallRequest {
  from?: string;
  to?: string;
  data?: string;
  value?: ethers.BigNumberish;
  gasPrice?: ethers.BigNumberish;
}

/**
 * The subset of parent chain RPC the deployers rely on. Kept narrow so deployments can be
 * exercised against an in-process chain.
 */
export interface ParentChainClient {
  getChainId(): Promise<number>;
  getTransactionCount(address: string): Promise<number>;
  getGasPrice(): Promise<ethers.BigNumber>;
  getBalance(address: string): Promise<ethers.BigNumber>;
  getCode(address: string): Promise<string>;
  estimateGas(request: CallRequest): Promise<ethers.BigNumber>;
  call(request: CallRequest): Promise<string>;
  sendRawTransaction(signedTransaction: string): Promise<string>;
  getTransactionReceipt(txHash: string): Promise<ChainReceipt | null>;
}

export type ChainClientFactory = (rpcUrl: string) => ParentChainClient;

export class JsonRpcChainClient implements ParentChainClient {
  private readonly provider: ethers.providers.StaticJsonRpcProvider;

  constructor(rpcUrl: string) {
    this.provider = new ethers.providers.StaticJsonRpcProvider(rpcUrl);
  }

  async getChainId(): Promise<number> {
    const chainId = await this.provider.send("eth_chainId", []);
    return ethers.BigNumber.from(chainId).toNumber();
  }

  async getTransactionCount(address: string): Promise<number> {
    return this.provider.getTransactionCount(address, "pending");
  }

  async getGasPrice(): Promise<ethers.BigNumber> {
    return this.provider.getGasPrice();
  }

  async getBalance(address: string): Promise<ethers.BigNumber> {
    return this.provider.getBalance(address);
  }

  async getCode(address: string): Promise<string> {
    return this.provider.getCode(address);
  }

  async estimateGas(request: CallRequest): Promise<ethers.BigNumber> {
    return this.provider.estimateGas(request);
  }

  async call(request: CallRequest): Promise<string> {
    return this.provider.call(request);
  }

  async sendRawTransaction(signedTransaction: string): Promise<string> {
    const hash = await this.provider.send("eth_sendRawTransaction", [signedTransaction]);
    return String(hash);
  }

  async getTransactionReceipt(txHash: string): Promise<ChainReceipt | null> {
    const receipt = await this.provider.getTransactionReceipt(txHash);
    if (!receipt) {
      return null;
    }
    return {
      transactionHash: receipt.transactionHash,
      blockNumber: receipt.blockNumber,
      status: receipt.status ?? 0,
      contractAddress: receipt.contractAddress ?? null,
      logs: receipt.logs.map((log) => ({ address: log.address, topics: log.topics, data: log.data })),
    };
  }
}

export const jsonRpcChainClientFactory: ChainClientFactory = (rpcUrl) => new JsonRpcChainClient(rpcUrl);

export interface ReceiptWaitOptions {
  pollIntervalMs?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Polls for a receipt until it appears or the timeout elapses. Lookup errors are treated
 * as "not yet mined".
 */
export async function waitForReceipt(
  client: ParentChainClient,
  txHash: string,
  options: ReceiptWaitOptions = {}
): Promise<ChainReceipt> {
  const pollIntervalMs = options.pollIntervalMs ?? RECEIPT_POLL_INTERVAL_MS;
  const timeoutMs = options.timeoutMs ?? RECEIPT_TIMEOUT_MS;
  const deadline = Date.now() + timeoutMs;

  for (;;) {
    throwIfAborted(options.signal);
    try {
      const receipt = await client.getTransactionReceipt(txHash);
      if (receipt) {
        return receipt;
      }
    } catch (e) {
      if (isAbortError(e)) {
        throw e;
      }
    }
    if (Date.now() >= deadline) {
      throw new OnChainError(`timeout waiting for transaction ${txHash}`, txHash);
    }
    await sleep(Math.min(pollIntervalMs, Math.max(deadline - Date.now(), 0)), options.signal);
  }
}
