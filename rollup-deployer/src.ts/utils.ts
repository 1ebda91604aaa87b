import chalk from "chalk";
import { ethers } from "ethers";
import { setTimeout as delay } from "timers/promises";

import { GAS_LIMIT_BUFFER_PERCENT, GAS_PRICE_BOOST_PERCENT, MIN_GAS_PRICE } from "./constants";
import { abortError } from "./errors";

export const warning = chalk.bold.yellow;
export const failure = chalk.red;
export const header = chalk.bold;

export type LogFn = (msg: string) => void;

export function makeLogger(verbose: boolean): LogFn {
  return (msg: string) => {
    if (verbose) {
      console.log(msg);
    }
  };
}

export function logWarning(msg: string) {
  console.log(warning(msg));
}

export function logError(msg: string) {
  console.error(failure(msg));
}

export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (e) {
    throw abortError(signal?.aborted ? "operation aborted" : String(e));
  }
}

export function throwIfAborted(signal?: AbortSignal) {
  if (signal?.aborted) {
    throw abortError();
  }
}

export function parseVersion(version: string): [number, number, number] {
  const stripped = version.startsWith("v") ? version.slice(1) : version;
  // Pre-release suffixes such as -beta.0 or -rc1 are ignored
  const match = /^(\d+)(?:\.(\d+))?(?:\.(\d+))?/.exec(stripped);
  if (!match) {
    return [0, 0, 0];
  }
  return [parseInt(match[1]), parseInt(match[2] ?? "0"), parseInt(match[3] ?? "0")];
}

/** True when `available` is the same as or newer than `target` (major.minor.patch). */
export function isVersionCompatible(available: string, target: string): boolean {
  const [availMajor, availMinor, availPatch] = parseVersion(available);
  const [targMajor, targMinor, targPatch] = parseVersion(target);

  if (availMajor != targMajor) {
    return availMajor > targMajor;
  }
  if (availMinor != targMinor) {
    return availMinor > targMinor;
  }
  return availPatch >= targPatch;
}

export function applyGasBuffer(gasLimit: ethers.BigNumberish): ethers.BigNumber {
  return ethers.BigNumber.from(gasLimit).mul(GAS_LIMIT_BUFFER_PERCENT).div(100);
}

export function boostGasPrice(suggested: ethers.BigNumberish): ethers.BigNumber {
  const boosted = ethers.BigNumber.from(suggested).mul(GAS_PRICE_BOOST_PERCENT).div(100);
  return boosted.lt(MIN_GAS_PRICE) ? MIN_GAS_PRICE : boosted;
}

export function isZeroAddress(address: string): boolean {
  return ethers.utils.isAddress(address) && ethers.BigNumber.from(address).isZero();
}

export function encodeBase64(text: string): string {
  return Buffer.from(text, "utf-8").toString("base64");
}
