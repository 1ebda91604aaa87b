import { ethers } from "ethers";

import {
  ADDRESS_ZERO,
  DA_MODES,
  DEFAULT_BASE_STAKE,
  DEFAULT_CONFIRM_PERIOD_BLOCKS,
  DEFAULT_DA_MODE,
  DEFAULT_MAX_DATA_SIZE,
  DEFAULT_WASM_MODULE_ROOT,
  type DataAvailabilityMode,
} from "./constants";
import { ConfigurationError, errorMessage } from "./errors";

/**
 * Deployment request as stored with the deployment record. Both the short form names
 * (`l1_*`, `da`) and the explicit names (`parent_chain_*`, `data_availability`) are accepted.
 */
export interface RawDeploymentConfig {
  org_id?: string;
  chain_id?: number;
  chain_name?: string;
  l1_chain_id?: number;
  l1_rpc?: string;
  parent_chain_id?: number;
  parent_chain_rpc?: string;
  deployer_address?: string;
  batch_posters?: string[];
  validators?: string[];
  stake_token?: string;
  base_stake?: string;
  data_availability?: string;
  da?: string;
  native_token?: string;
  confirm_period_blocks?: number;
  extra_challenge_time_blocks?: number;
  max_data_size?: number;
  deploy_factories_to_l2?: boolean;
  wasm_module_root?: string;
  signer_endpoint?: string;
  api_key?: string;
  client_cert?: string;
  client_key?: string;
  ca_cert?: string;
}

export interface DeployConfig {
  chainId: number;
  chainName: string;
  parentChainId: number;
  parentChainRpc: string;
  owner: string;
  batchPosters?: string[];
  validators?: string[];
  stakeToken?: string;
  baseStake?: string;
  dataAvailability?: DataAvailabilityMode;
  nativeToken?: string;
  confirmPeriodBlocks?: number;
  extraChallengeTimeBlocks?: number;
  maxDataSize?: number;
  deployFactoriesToL2?: boolean;
  wasmModuleRoot?: string;
  signerEndpoint?: string;
  apiKey?: string;
  clientCert?: string;
  clientKey?: string;
  caCert?: string;
}

export type ResolvedDeployConfig = DeployConfig &
  Required<
    Pick<
      DeployConfig,
      | "batchPosters"
      | "validators"
      | "stakeToken"
      | "baseStake"
      | "dataAvailability"
      | "nativeToken"
      | "confirmPeriodBlocks"
      | "extraChallengeTimeBlocks"
      | "maxDataSize"
      | "deployFactoriesToL2"
      | "wasmModuleRoot"
    >
  >;

const STRING_KEYS = [
  "org_id",
  "chain_name",
  "l1_rpc",
  "parent_chain_rpc",
  "deployer_address",
  "stake_token",
  "data_availability",
  "da",
  "native_token",
  "wasm_module_root",
  "signer_endpoint",
  "api_key",
  "client_cert",
  "client_key",
  "ca_cert",
] as const;

const INTEGER_KEYS = [
  "chain_id",
  "l1_chain_id",
  "parent_chain_id",
  "confirm_period_blocks",
  "extra_challenge_time_blocks",
  "max_data_size",
] as const;

const ADDRESS_LIST_KEYS = ["batch_posters", "validators"] as const;

function isIntegerString(value: string): boolean {
  return /^\d+$/.test(value);
}

function parseInteger(key: string, value: unknown): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === "number" && Number.isInteger(value)) {
    return value;
  }
  // Forms submit numbers as strings
  if (typeof value === "string" && isIntegerString(value)) {
    return parseInt(value, 10);
  }
  throw new ConfigurationError(`${key} must be an integer`, key);
}

function parseStringList(key: string, value: unknown): string[] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((item) => typeof item === "string")) {
    throw new ConfigurationError(`${key} must be an array of addresses`, key);
  }
  return value.filter((item): item is string => typeof item === "string");
}

export function parseRawDeploymentConfig(json: string): RawDeploymentConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (e) {
    throw new ConfigurationError(`failed to parse config: ${errorMessage(e)}`, "config");
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError("failed to parse config: expected a JSON object", "config");
  }
  const source = new Map<string, unknown>(Object.entries(parsed));
  const raw: RawDeploymentConfig = {};

  for (const key of STRING_KEYS) {
    const value = source.get(key);
    if (value === undefined || value === null) {
      continue;
    }
    if (typeof value !== "string") {
      throw new ConfigurationError(`${key} must be a string`, key);
    }
    raw[key] = value;
  }
  for (const key of INTEGER_KEYS) {
    const value = parseInteger(key, source.get(key));
    if (value !== undefined) {
      raw[key] = value;
    }
  }
  for (const key of ADDRESS_LIST_KEYS) {
    const value = parseStringList(key, source.get(key));
    if (value !== undefined) {
      raw[key] = value;
    }
  }

  const baseStake = source.get("base_stake");
  if (typeof baseStake === "number" && Number.isSafeInteger(baseStake)) {
    raw.base_stake = baseStake.toString();
  } else if (typeof baseStake === "string") {
    raw.base_stake = baseStake;
  } else if (baseStake !== undefined && baseStake !== null) {
    throw new ConfigurationError("base_stake must be an integer string", "base_stake");
  }

  const deployFactories = source.get("deploy_factories_to_l2");
  if (typeof deployFactories === "boolean") {
    raw.deploy_factories_to_l2 = deployFactories;
  } else if (deployFactories !== undefined && deployFactories !== null) {
    throw new ConfigurationError("deploy_factories_to_l2 must be a boolean", "deploy_factories_to_l2");
  }

  return raw;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.length > 0 ? value : undefined;
}

function nonZero(value: number | undefined): number | undefined {
  return value !== undefined && value !== 0 ? value : undefined;
}

export function isDataAvailabilityMode(value: string): value is DataAvailabilityMode {
  return DA_MODES.some((mode) => mode === value);
}

/**
 * Resolves aliases (`l1_*` over `parent_chain_*`, `da` over `data_availability`) and maps
 * the stored form onto a validated DeployConfig. `fallbackChainId` comes from the
 * deployment record when the config omits `chain_id`.
 */
export function normalizeDeployConfig(raw: RawDeploymentConfig, fallbackChainId?: number): DeployConfig {
  const parentChainRpc = nonEmpty(raw.l1_rpc) ?? nonEmpty(raw.parent_chain_rpc);
  if (!parentChainRpc) {
    throw new ConfigurationError("parent chain RPC URL is required (l1_rpc or parent_chain_rpc)", "parent_chain_rpc");
  }
  const parentChainId = nonZero(raw.l1_chain_id) ?? nonZero(raw.parent_chain_id);
  if (parentChainId === undefined) {
    throw new ConfigurationError("parent chain ID is required (l1_chain_id or parent_chain_id)", "parent_chain_id");
  }
  const owner = nonEmpty(raw.deployer_address);
  if (!owner) {
    throw new ConfigurationError("deployer_address is required", "deployer_address");
  }

  const da = nonEmpty(raw.da) ?? nonEmpty(raw.data_availability) ?? DEFAULT_DA_MODE;
  if (!isDataAvailabilityMode(da)) {
    throw new ConfigurationError(`data_availability must be one of ${DA_MODES.join(", ")}, got ${da}`, "data_availability");
  }

  const chainId = raw.chain_id ?? fallbackChainId ?? 0;
  const config: DeployConfig = {
    chainId,
    chainName: nonEmpty(raw.chain_name) ?? `rollup-${chainId}`,
    parentChainId,
    parentChainRpc,
    owner,
    batchPosters: raw.batch_posters && raw.batch_posters.length > 0 ? raw.batch_posters : undefined,
    validators: raw.validators && raw.validators.length > 0 ? raw.validators : undefined,
    stakeToken: nonEmpty(raw.stake_token),
    baseStake: nonEmpty(raw.base_stake),
    dataAvailability: da,
    nativeToken: nonEmpty(raw.native_token),
    confirmPeriodBlocks: nonZero(raw.confirm_period_blocks),
    extraChallengeTimeBlocks: raw.extra_challenge_time_blocks,
    maxDataSize: nonZero(raw.max_data_size),
    deployFactoriesToL2: raw.deploy_factories_to_l2,
    wasmModuleRoot: nonEmpty(raw.wasm_module_root),
    signerEndpoint: nonEmpty(raw.signer_endpoint),
    apiKey: nonEmpty(raw.api_key),
    clientCert: nonEmpty(raw.client_cert),
    clientKey: nonEmpty(raw.client_key),
    caCert: nonEmpty(raw.ca_cert),
  };
  validateDeployConfig(config);
  return config;
}

function assertAddress(field: string, value: string) {
  if (!ethers.utils.isAddress(value)) {
    throw new ConfigurationError(`${field} is not a valid address: ${value}`, field);
  }
}

export function validateDeployConfig(config: DeployConfig) {
  if (!Number.isInteger(config.chainId) || config.chainId <= 0) {
    throw new ConfigurationError("chainId must be positive", "chainId");
  }
  if (!Number.isInteger(config.parentChainId) || config.parentChainId <= 0) {
    throw new ConfigurationError("parentChainId must be positive", "parentChainId");
  }
  if (!config.parentChainRpc) {
    throw new ConfigurationError("parentChainRpc is required", "parentChainRpc");
  }
  if (!config.owner) {
    throw new ConfigurationError("owner is required", "owner");
  }
  assertAddress("owner", config.owner);
  for (const poster of config.batchPosters ?? []) {
    assertAddress("batchPosters", poster);
  }
  for (const validator of config.validators ?? []) {
    assertAddress("validators", validator);
  }
  if (config.stakeToken) {
    assertAddress("stakeToken", config.stakeToken);
  }
  if (config.nativeToken) {
    assertAddress("nativeToken", config.nativeToken);
  }
  if (config.baseStake !== undefined) {
    if (!isIntegerString(config.baseStake)) {
      throw new ConfigurationError("baseStake must be a valid integer string", "baseStake");
    }
    if (ethers.BigNumber.from(config.baseStake).isZero()) {
      throw new ConfigurationError("baseStake must be positive", "baseStake");
    }
  }
  if (config.dataAvailability !== undefined && !isDataAvailabilityMode(config.dataAvailability)) {
    throw new ConfigurationError(`dataAvailability must be one of ${DA_MODES.join(", ")}`, "dataAvailability");
  }
  if (config.signerEndpoint && !config.signerEndpoint.startsWith("https://")) {
    throw new ConfigurationError("signerEndpoint must use https://", "signerEndpoint");
  }
  if (config.wasmModuleRoot && !ethers.utils.isHexString(config.wasmModuleRoot, 32)) {
    throw new ConfigurationError("wasmModuleRoot must be a 32-byte hex string", "wasmModuleRoot");
  }
  for (const [field, value] of [
    ["confirmPeriodBlocks", config.confirmPeriodBlocks],
    ["extraChallengeTimeBlocks", config.extraChallengeTimeBlocks],
    ["maxDataSize", config.maxDataSize],
  ] as const) {
    if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
      throw new ConfigurationError(`${field} must be a non-negative integer`, field);
    }
  }
}

export function withDeployDefaults(config: DeployConfig): ResolvedDeployConfig {
  return {
    ...config,
    batchPosters: config.batchPosters && config.batchPosters.length > 0 ? config.batchPosters : [config.owner],
    validators: config.validators && config.validators.length > 0 ? config.validators : [config.owner],
    stakeToken: config.stakeToken || ADDRESS_ZERO,
    baseStake: config.baseStake || DEFAULT_BASE_STAKE,
    dataAvailability: config.dataAvailability ?? DEFAULT_DA_MODE,
    nativeToken: config.nativeToken || ADDRESS_ZERO,
    confirmPeriodBlocks: config.confirmPeriodBlocks || DEFAULT_CONFIRM_PERIOD_BLOCKS,
    extraChallengeTimeBlocks: config.extraChallengeTimeBlocks ?? 0,
    maxDataSize: config.maxDataSize || DEFAULT_MAX_DATA_SIZE,
    deployFactoriesToL2: config.deployFactoriesToL2 ?? false,
    wasmModuleRoot: config.wasmModuleRoot || DEFAULT_WASM_MODULE_ROOT,
  };
}
