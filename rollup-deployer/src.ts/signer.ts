import * as https from "https";
import { ethers } from "ethers";
import type { Transaction } from "ethers";
import fetch from "node-fetch";
import type { RequestInit, Response } from "node-fetch";

import type { FetchFn } from "./artifacts";
import {
  ConfigurationError,
  RetryableSignerError,
  SignerResponseError,
  errorMessage,
  isAbortError,
} from "./errors";
import { makeLogger, sleep, throwIfAborted, type LogFn } from "./utils";

export interface UnsignedTx {
  // Absent for contract creation
  to?: string;
  nonce: number;
  gasLimit: ethers.BigNumber;
  gasPrice?: ethers.BigNumber;
  maxFeePerGas?: ethers.BigNumber;
  maxPriorityFeePerGas?: ethers.BigNumber;
  value?: ethers.BigNumber;
  data?: string;
  chainId: number;
}

export interface SignedTransaction {
  raw: string;
  hash: string;
  transaction: Transaction;
}

export interface TransactionSigner {
  address(): string;
  chainId(): number;
  signTransaction(tx: UnsignedTx, signal?: AbortSignal): Promise<SignedTransaction>;
}

export function isDynamicFeeTx(tx: UnsignedTx): boolean {
  return tx.maxFeePerGas !== undefined;
}

export function decodeSignedTransaction(signedHex: string): SignedTransaction {
  const raw = signedHex.startsWith("0x") ? signedHex : `0x${signedHex}`;
  const transaction = ethers.utils.parseTransaction(raw);
  if (!transaction.hash || !transaction.from) {
    throw new Error("transaction is not signed");
  }
  return { raw, hash: transaction.hash, transaction };
}

export class LocalSigner implements TransactionSigner {
  private readonly wallet: ethers.Wallet;

  constructor(
    privateKey: string,
    private readonly chain: number
  ) {
    this.wallet = new ethers.Wallet(privateKey);
  }

  address(): string {
    return this.wallet.address;
  }

  chainId(): number {
    return this.chain;
  }

  async signTransaction(tx: UnsignedTx, signal?: AbortSignal): Promise<SignedTransaction> {
    throwIfAborted(signal);
    const request: ethers.providers.TransactionRequest = {
      to: tx.to,
      nonce: tx.nonce,
      gasLimit: tx.gasLimit,
      value: tx.value ?? 0,
      data: tx.data ?? "0x",
      chainId: tx.chainId,
    };
    if (isDynamicFeeTx(tx)) {
      request.type = 2;
      request.maxFeePerGas = tx.maxFeePerGas;
      request.maxPriorityFeePerGas = tx.maxPriorityFeePerGas;
    } else {
      request.type = 0;
      request.gasPrice = tx.gasPrice;
    }
    return decodeSignedTransaction(await this.wallet.signTransaction(request));
  }
}

export interface RemoteSignerConfig {
  endpoint: string;
  address: string;
  chainId: number;
  apiKey?: string;
  clientCert?: string;
  clientKey?: string;
  caCert?: string;
  // Total attempts, including the first one
  maxRetries?: number;
  initialBackoffMs?: number;
  maxBackoffMs?: number;
  timeoutMs?: number;
  fetch?: FetchFn;
  verbose?: boolean;
}

export interface SignTransactionArgs {
  from: string;
  to?: string;
  gas: string;
  gasPrice?: string;
  maxFeePerGas?: string;
  maxPriorityFeePerGas?: string;
  value: string;
  nonce: string;
  data?: string;
  chainId: string;
}

interface RpcRequest {
  jsonrpc: "2.0";
  method: string;
  params: SignTransactionArgs[];
  id: number;
}

export const DEFAULT_SIGNER_RETRIES = 3;
export const DEFAULT_SIGNER_INITIAL_BACKOFF_MS = 1_000;
export const DEFAULT_SIGNER_MAX_BACKOFF_MS = 10_000;
export const DEFAULT_SIGNER_TIMEOUT_MS = 30_000;

export function isRetryableRpcErrorCode(code: number): boolean {
  // Implementation-defined server errors
  return code >= -32099 && code <= -32000;
}

function hexQuantity(value: ethers.BigNumberish): string {
  return ethers.utils.hexValue(ethers.BigNumber.from(value));
}

export function buildTransactionArgs(from: string, chainId: number, tx: UnsignedTx): SignTransactionArgs {
  const args: SignTransactionArgs = {
    from: ethers.utils.getAddress(from),
    gas: hexQuantity(tx.gasLimit),
    value: hexQuantity(tx.value ?? 0),
    nonce: hexQuantity(tx.nonce),
    chainId: hexQuantity(chainId),
  };
  if (tx.to) {
    args.to = ethers.utils.getAddress(tx.to);
  }
  if (tx.data && tx.data !== "0x") {
    args.data = tx.data;
  }
  if (isDynamicFeeTx(tx)) {
    args.maxFeePerGas = hexQuantity(tx.maxFeePerGas ?? 0);
    args.maxPriorityFeePerGas = hexQuantity(tx.maxPriorityFeePerGas ?? 0);
  } else {
    args.gasPrice = hexQuantity(tx.gasPrice ?? 0);
  }
  return args;
}

/**
 * Delegates signing to an external service speaking `eth_signTransaction`. Authenticates
 * with a client certificate when one is configured, otherwise with a bearer API key.
 */
export class RemoteSigner implements TransactionSigner {
  private readonly fetchFn: FetchFn;
  private readonly agent?: https.Agent;
  private readonly headers: Record<string, string>;
  private readonly maxRetries: number;
  private readonly initialBackoffMs: number;
  private readonly maxBackoffMs: number;
  private readonly timeoutMs: number;
  private readonly log: LogFn;

  constructor(private readonly config: RemoteSignerConfig) {
    if (!ethers.utils.isAddress(config.address)) {
      throw new ConfigurationError(`invalid signer address: ${config.address}`, "address");
    }
    this.headers = { "Content-Type": "application/json" };
    if (config.clientCert && config.clientKey) {
      this.agent = new https.Agent({
        cert: config.clientCert,
        key: config.clientKey,
        ca: config.caCert || undefined,
        minVersion: "TLSv1.2",
      });
    } else if (config.apiKey) {
      this.headers["Authorization"] = `Bearer ${config.apiKey}`;
    } else {
      throw new ConfigurationError("either apiKey or clientCert/clientKey must be provided", "credentials");
    }

    this.fetchFn = config.fetch ?? fetch;
    this.maxRetries = config.maxRetries ?? DEFAULT_SIGNER_RETRIES;
    this.initialBackoffMs = config.initialBackoffMs ?? DEFAULT_SIGNER_INITIAL_BACKOFF_MS;
    this.maxBackoffMs = config.maxBackoffMs ?? DEFAULT_SIGNER_MAX_BACKOFF_MS;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_SIGNER_TIMEOUT_MS;
    this.log = makeLogger(config.verbose ?? false);
  }

  address(): string {
    return ethers.utils.getAddress(this.config.address);
  }

  chainId(): number {
    return this.config.chainId;
  }

  usesMutualTls(): boolean {
    return this.agent !== undefined;
  }

  async signTransaction(tx: UnsignedTx, signal?: AbortSignal): Promise<SignedTransaction> {
    const request: RpcRequest = {
      jsonrpc: "2.0",
      method: "eth_signTransaction",
      params: [buildTransactionArgs(this.config.address, this.config.chainId, tx)],
      id: 1,
    };

    let lastError: Error | undefined;
    let backoff = this.initialBackoffMs;

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      if (attempt > 0) {
        await sleep(backoff, signal);
        backoff = Math.min(backoff * 2, this.maxBackoffMs);
      }

      let signedHex: string;
      try {
        signedHex = await this.rpcCall(request, signal);
      } catch (e) {
        if (isAbortError(e)) {
          throw e;
        }
        if (!(e instanceof RetryableSignerError)) {
          throw new Error(`signing failed: ${errorMessage(e)}`);
        }
        lastError = e;
        this.log(`Signer attempt ${attempt + 1}/${this.maxRetries} failed: ${e.message}`);
        continue;
      }

      try {
        return decodeSignedTransaction(signedHex);
      } catch (e) {
        throw new SignerResponseError(`failed to decode signed transaction: ${errorMessage(e)}`);
      }
    }

    throw new Error(`signing failed after ${this.maxRetries} attempts: ${lastError?.message ?? "no attempts made"}`);
  }

  private async rpcCall(request: RpcRequest, signal?: AbortSignal): Promise<string> {
    throwIfAborted(signal);
    const init: RequestInit = {
      method: "POST",
      headers: this.headers,
      body: JSON.stringify(request),
      agent: this.agent,
      timeout: this.timeoutMs,
      signal,
    };

    let response: Response;
    try {
      response = await this.fetchFn(this.config.endpoint, init);
    } catch (e) {
      if (isAbortError(e)) {
        throw e;
      }
      throw new RetryableSignerError(`http request failed: ${errorMessage(e)}`);
    }

    let body: string;
    try {
      body = await response.text();
    } catch (e) {
      if (isAbortError(e)) {
        throw e;
      }
      throw new RetryableSignerError(`read response: ${errorMessage(e)}`);
    }

    if (response.status >= 500) {
      throw new RetryableSignerError(`server error: ${response.status} ${body}`);
    }
    if (response.status >= 400) {
      throw new Error(`client error: ${response.status} ${body}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (e) {
      throw new Error(`unmarshal response: ${errorMessage(e)}`);
    }
    if (typeof parsed !== "object" || parsed === null) {
      throw new Error("unmarshal response: expected a JSON object");
    }

    if ("error" in parsed && typeof parsed.error === "object" && parsed.error !== null) {
      const rpcError = parsed.error;
      const code = "code" in rpcError && typeof rpcError.code === "number" ? rpcError.code : 0;
      const message = "message" in rpcError ? String(rpcError.message) : "unknown error";
      const text = `JSON-RPC error ${code}: ${message}`;
      if (isRetryableRpcErrorCode(code)) {
        throw new RetryableSignerError(text);
      }
      throw new Error(text);
    }

    const result = "result" in parsed ? parsed.result : undefined;
    if (typeof result !== "string") {
      throw new Error("unmarshal result: expected a signed transaction hex string");
    }
    return result;
  }
}
