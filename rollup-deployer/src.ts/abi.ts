import { ethers } from "ethers";

export const ROLLUP_CREATED_EVENT =
  "event RollupCreated(address indexed rollupAddress, address indexed nativeToken, address inboxAddress, address outbox, address rollupEventInbox, address challengeManager, address adminProxy, address sequencerInbox, address bridge, address upgradeExecutor, address validatorWalletCreator)";

export const ROLLUP_CREATED_TOPIC = "0xd9bfd3bb3012f0caa103d1ba172692464d2de5c7b75877ce255c72147086a79d";

// Nine non-indexed address words
export const ROLLUP_CREATED_MIN_DATA_BYTES = 9 * 32;

export const rollupCreatedInterface = new ethers.utils.Interface([ROLLUP_CREATED_EVENT]);

// The stake token is expected to be a WETH-style wrapper of the parent chain's native asset
export const wethInterface = new ethers.utils.Interface([
  "function balanceOf(address owner) view returns (uint256)",
  "function deposit() payable",
]);
