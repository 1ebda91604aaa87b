import { ethers } from "ethers";

export const ADDRESS_ZERO = ethers.constants.AddressZero;

// Artifact registry
export const DEFAULT_ARTIFACT_BASE_URL = "https://nitro-contracts.s3.nl-ams.scw.cloud";
export const DEFAULT_ARTIFACT_VERSION = "v3.2.0-beta.0";
export const TARGET_CONTRACT_VERSION = "v3.2.0";

// Must be updated whenever a new artifact version is published.
export const ARTIFACT_CHECKSUMS: Record<string, string> = {
  "v3.2.0-beta.0": "sha256:10f1c0eade0e1d9c51ddc9df04d96bca108f6794dc132139c3a1ae1024608b9c",
};

export const REQUIRED_CONTRACTS = [
  "RollupCreator",
  "BridgeCreator",
  "SequencerInbox",
  "Bridge",
  "Inbox",
  "Outbox",
  "RollupEventInbox",
  "RollupCore",
  "RollupAdminLogic",
  "RollupUserLogic",
  "ERC20Bridge",
  "ERC20Inbox",
  "EdgeChallengeManager",
  "OneStepProofEntry",
  "OneStepProver0",
  "OneStepProverMemory",
  "OneStepProverMath",
  "OneStepProverHostIo",
  "UpgradeExecutor",
  "ValidatorWalletCreator",
  "DeployHelper",
  "Reader4844",
] as const;

export type ContractName = (typeof REQUIRED_CONTRACTS)[number];

// Rollup defaults
export const DEFAULT_CONFIRM_PERIOD_BLOCKS = 45818; // ~1 week of L1 blocks
export const DEFAULT_MAX_DATA_SIZE = 117964;
export const DEFAULT_BASE_STAKE = "100000000000000000";
export const DEFAULT_WASM_MODULE_ROOT = "0xda4e3ad5e7feacb817c21c8d0220da7650fe9051ece68a3f0b1c5d38bbb27b21";
export const DEFAULT_MAX_FEE_PER_GAS_FOR_RETRYABLES = 100_000_000; // 0.1 gwei
export const INITIAL_ARBOS_VERSION = 51;

export const DA_MODES = ["celestia", "rollup", "anytrust"] as const;
export type DataAvailabilityMode = (typeof DA_MODES)[number];
export const DEFAULT_DA_MODE: DataAvailabilityMode = "celestia";

// Challenge protocol defaults used when building the rollup config struct
export const BOLD_DEFAULTS = {
  minimumAssertionPeriod: 75,
  validatorAfkBlocks: 201600,
  layerZeroBlockEdgeHeight: 2 ** 26,
  layerZeroBigStepEdgeHeight: 2 ** 19,
  layerZeroSmallStepEdgeHeight: 2 ** 23,
  numBigStepLevel: 1,
  challengeGracePeriodBlocks: 14400,
  maxTimeVariation: {
    delayBlocks: 5760,
    futureBlocks: 48,
    delaySeconds: 86400,
    futureSeconds: 3600,
  },
};

// Gas policy
export const INFRA_DEFAULT_GAS_LIMIT = 10_000_000;
export const CREATE_ROLLUP_DEFAULT_GAS_LIMIT = 15_000_000;
export const MAX_GAS_LIMIT = 15_000_000;
export const BATCH_POSTER_DEFAULT_GAS_LIMIT = 500_000;
export const WRAP_DEFAULT_GAS_LIMIT = 100_000;
export const GAS_LIMIT_BUFFER_PERCENT = 120;
export const GAS_PRICE_BOOST_PERCENT = 150;
export const MIN_GAS_PRICE = ethers.utils.parseUnits("2", "gwei");

// 0.1 of the wrapped native token covers every stake level
export const REQUIRED_STAKE_TOKEN_BALANCE = ethers.BigNumber.from("100000000000000000");

export const RECEIPT_POLL_INTERVAL_MS = 2_000;
export const RECEIPT_TIMEOUT_MS = 5 * 60 * 1000;

// Code at this precompile means the parent chain is itself an Arbitrum chain
export const ARB_SYS_ADDRESS = "0x0000000000000000000000000000000000000064";

export const SEPOLIA_CHAIN_ID = 11155111;
export const MAINNET_CHAIN_ID = 1;
export const SEPOLIA_WETH = "0x7b79995e5f793A07Bc00c21412e50Ecae098E7f9";
export const MAINNET_WETH = "0xC02aaA39b223FE8D0A0e5C4F27eAD9083C756Cc2";

export const DEFAULT_SIGNER_ENDPOINT = "https://signer.localhost:8546";
export const DEFAULT_STALE_TIMEOUT_MINUTES = 30;
