import { expect } from "chai";

import {
  ARTIFACT_TYPES,
  ArtifactGenerator,
  generateChainInfo,
  generateCoreContracts,
  generateNodeConfig,
  generateValidatorNodeConfig,
  resolveStakeToken,
  wrapTextArtifact,
} from "../../src.ts/artifact-generator";
import { prepareChainConfig } from "../../src.ts/chain-config";
import { MAINNET_WETH, SEPOLIA_WETH } from "../../src.ts/constants";
import {
  normalizeDeployConfig,
  parseRawDeploymentConfig,
  withDeployDefaults,
  type ResolvedDeployConfig,
} from "../../src.ts/deploy-config";
import { InMemoryRepository } from "../../src.ts/repository";
import type { RollupDeployResult } from "../../src.ts/rollup";
import { CREATED_ROLLUP, PARENT_CHAIN_ID, TEST_ADDRESS, deploymentConfigJson } from "./utils";

const TX_HASH = "0x" + "12".repeat(32);

function resolvedConfig(overrides: Record<string, unknown> = {}): ResolvedDeployConfig {
  return withDeployDefaults(normalizeDeployConfig(parseRawDeploymentConfig(deploymentConfigJson(overrides))));
}

function successfulResult(config: ResolvedDeployConfig): RollupDeployResult {
  return {
    success: true,
    contracts: { ...CREATED_ROLLUP, deployedAtBlockNumber: 101 },
    transactionHash: TX_HASH,
    blockNumber: 101,
    chainConfig: prepareChainConfig(config),
    postDeployTransactions: [],
  };
}

async function repositoryWithDeployment() {
  const repository = new InMemoryRepository();
  const { id } = await repository.createDeployment({
    orgId: "org-1",
    chainId: 42170,
    stack: "nitro",
    config: deploymentConfigJson(),
  });
  return { repository, id };
}

describe("Artifact generator tests", function () {
  describe("chain info", function () {
    it("describes the deployed rollup", async () => {
      const config = resolvedConfig();

      const [entry] = generateChainInfo(config, successfulResult(config));

      expect(entry["chain-id"]).to.equal(42170);
      expect(entry["parent-chain-id"]).to.equal(PARENT_CHAIN_ID);
      expect(entry["chain-name"]).to.equal("test-rollup");
      expect(entry["chain-config"].arbitrum.InitialChainOwner).to.equal(TEST_ADDRESS);
      expect(entry.rollup).to.deep.equal({
        bridge: CREATED_ROLLUP.bridge,
        inbox: CREATED_ROLLUP.inbox,
        "sequencer-inbox": CREATED_ROLLUP.sequencerInbox,
        rollup: CREATED_ROLLUP.rollup,
        "validator-wallet-creator": CREATED_ROLLUP.validatorWalletCreator,
        "deployed-at": 101,
        "stake-token": SEPOLIA_WETH,
        "native-token": CREATED_ROLLUP.nativeToken,
      });
    });

    it("keeps an explicit stake token", async () => {
      const stakeToken = "0x0000000000000000000000000000000000002001";
      const config = resolvedConfig({ stake_token: stakeToken });

      const [entry] = generateChainInfo(config, successfulResult(config));

      expect(entry.rollup["stake-token"]).to.equal(stakeToken);
    });

    it("falls back to the parent chain's WETH", async () => {
      const zero = "0x0000000000000000000000000000000000000000";
      expect(resolveStakeToken(zero, 1)).to.equal(MAINNET_WETH);
      expect(resolveStakeToken(zero, 11155111)).to.equal(SEPOLIA_WETH);
      expect(resolveStakeToken(zero, 17000)).to.equal(zero);
    });

    it("refuses a failed deployment", async () => {
      const config = resolvedConfig();
      const failed: RollupDeployResult = { success: false, error: "transaction reverted", postDeployTransactions: [] };

      expect(() => generateChainInfo(config, failed)).to.throw("cannot generate chain info without successful deployment");
      expect(() => generateCoreContracts(failed)).to.throw("cannot generate core contracts without successful deployment");
    });
  });

  describe("node configs", function () {
    it("enables Celestia data availability", async () => {
      const config = resolvedConfig();

      const nodeConfig = generateNodeConfig(config, successfulResult(config));

      expect(nodeConfig.chain).to.deep.equal({ id: 42170, "info-files": "/config/chain-info.json" });
      expect(nodeConfig.node["data-availability"]).to.deep.equal({
        enable: true,
        "sequencer-inbox-address": CREATED_ROLLUP.sequencerInbox,
        celestia: { enable: true, "rpc-url": "${CELESTIA_RPC_URL}" },
      });
      expect(nodeConfig.node.sequencer.enable).to.equal(true);
      expect(nodeConfig.node["batch-poster"]["data-poster"]["external-signer"].method).to.equal("eth_signTransaction");
      expect(nodeConfig.execution).to.equal(undefined);
    });

    it("leaves out data availability in rollup mode", async () => {
      const config = resolvedConfig({ data_availability: "rollup" });

      const nodeConfig = generateNodeConfig(config, successfulResult(config));

      expect(nodeConfig.node["data-availability"]).to.equal(undefined);
    });

    it("turns the validator config into a forwarding staker", async () => {
      const config = resolvedConfig();

      const validator = generateValidatorNodeConfig(config, successfulResult(config));

      expect(validator.node.sequencer.enable).to.equal(false);
      expect(validator.node["batch-poster"].enable).to.equal(false);
      expect(validator.node["delayed-sequencer"].enable).to.equal(false);
      expect(validator.node.staker).to.include({ enable: true, strategy: "MakeNodes" });
      expect(validator.execution).to.deep.equal({ "forwarding-target": "${SEQUENCER_URL}" });
    });
  });

  describe("core contracts", function () {
    it("adds the deployment transaction", async () => {
      const config = resolvedConfig();

      expect(generateCoreContracts(successfulResult(config))).to.deep.equal({
        ...CREATED_ROLLUP,
        deployedAtBlockNumber: 101,
        transactionHash: TX_HASH,
      });
    });

    it("wraps text files as base64", async () => {
      expect(wrapTextArtifact("hello")).to.deep.equal({ _type: "base64", data: "aGVsbG8=" });
    });
  });

  describe("persistence", function () {
    it("saves the four documents without credentials", async () => {
      const { repository, id } = await repositoryWithDeployment();
      const config = resolvedConfig();

      const saved = await new ArtifactGenerator(repository).generate(id, config, successfulResult(config));

      expect(saved).to.deep.equal(["chain_info", "node_config", "validator_node_config", "core_contracts"]);
      const stored = await repository.getArtifact(id, ARTIFACT_TYPES.coreContracts);
      expect(JSON.parse(stored?.content ?? "{}").transactionHash).to.equal(TX_HASH);
    });

    it("adds the credentials that are present", async () => {
      const { repository, id } = await repositoryWithDeployment();
      const config = resolvedConfig();

      const saved = await new ArtifactGenerator(repository).generate(id, config, successfulResult(config), {
        clientCert: "test-cert",
        clientKey: "test-key",
        caCert: "",
      });

      expect(saved.slice(4)).to.deep.equal(["client_cert", "client_key"]);
      const cert = await repository.getArtifact(id, ARTIFACT_TYPES.clientCert);
      expect(JSON.parse(cert?.content ?? "{}")).to.deep.equal({ _type: "base64", data: "dGVzdC1jZXJ0" });
    });
  });
});
