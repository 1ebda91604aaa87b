import * as os from "os";
import * as path from "path";

import {
  DEFAULT_ARTIFACT_BASE_URL,
  DEFAULT_ARTIFACT_VERSION,
  DEFAULT_SIGNER_ENDPOINT,
  DEFAULT_STALE_TIMEOUT_MINUTES,
  RECEIPT_TIMEOUT_MS,
} from "./constants";
import { ConfigurationError } from "./errors";

export interface EnvironmentConfig {
  signerEndpoint: string;
  artifactBaseUrl: string;
  artifactVersion: string;
  artifactCacheDir: string;
  skipChecksumVerification: boolean;
  stateDir: string;
  certificatesDir?: string;
  staleTimeoutMinutes: number;
  receiptTimeoutSeconds: number;
}

export type Environment = Record<string, string | undefined>;

function readPositiveInteger(env: Environment, name: string, fallback: number): number {
  const value = env[name]?.trim();
  if (!value) {
    return fallback;
  }
  if (!/^\d+$/.test(value) || parseInt(value) <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${value}"`, name);
  }
  return parseInt(value);
}

function readString(env: Environment, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

export function loadEnvironmentConfig(env: Environment = process.env): EnvironmentConfig {
  return {
    signerEndpoint: readString(env, "ROLLUP_SIGNER_ENDPOINT") ?? DEFAULT_SIGNER_ENDPOINT,
    artifactBaseUrl: readString(env, "ARTIFACT_BASE_URL") ?? DEFAULT_ARTIFACT_BASE_URL,
    artifactVersion: readString(env, "ARTIFACT_VERSION") ?? DEFAULT_ARTIFACT_VERSION,
    artifactCacheDir: readString(env, "ARTIFACT_CACHE_DIR") ?? path.join(os.tmpdir(), "rollup-deployer-artifacts"),
    skipChecksumVerification: env.ARTIFACT_SKIP_CHECKSUM === "true",
    stateDir: readString(env, "DEPLOYER_STATE_DIR") ?? path.join(process.cwd(), ".rollup-deployer"),
    certificatesDir: readString(env, "CERTIFICATES_DIR"),
    staleTimeoutMinutes: readPositiveInteger(env, "STALE_TIMEOUT_MINUTES", DEFAULT_STALE_TIMEOUT_MINUTES),
    receiptTimeoutSeconds: readPositiveInteger(env, "RECEIPT_TIMEOUT_SECONDS", RECEIPT_TIMEOUT_MS / 1000),
  };
}
