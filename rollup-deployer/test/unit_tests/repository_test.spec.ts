import * as fs from "fs";
import * as path from "path";
import { expect } from "chai";

import { DirectoryCertificateProvider, hasCredentials } from "../../src.ts/certificates";
import { ConfigurationError, InvalidTransitionError, NotFoundError } from "../../src.ts/errors";
import { FileRepository } from "../../src.ts/file-repository";
import { InMemoryRepository, STALE_DEPLOYMENT_MESSAGE, canTransition, emptyState } from "../../src.ts/repository";
import { deploymentConfigJson, makeTempDir, rejectionOf } from "./utils";

class TestClock {
  constructor(public time: number = Date.parse("2026-01-01T00:00:00.000Z")) {}

  now = (): Date => new Date(this.time);

  advanceMinutes(minutes: number) {
    this.time += minutes * 60 * 1000;
  }
}

function newDeployment(chainId: number = 42170) {
  return { orgId: "org-1", chainId, stack: "nitro" as const, config: deploymentConfigJson({ chain_id: chainId }) };
}

describe("Repository tests", function () {
  describe("status transitions", function () {
    it("never allows pending to completed", async () => {
      expect(canTransition("pending", "completed")).to.equal(false);
    });

    it("allows the lifecycle edges", async () => {
      expect(canTransition("pending", "running")).to.equal(true);
      expect(canTransition("running", "paused")).to.equal(true);
      expect(canTransition("paused", "running")).to.equal(true);
      expect(canTransition("failed", "running")).to.equal(true);
      expect(canTransition("running", "completed")).to.equal(true);
    });

    it("treats completed as terminal", async () => {
      expect(canTransition("completed", "running")).to.equal(false);
      expect(canTransition("completed", "failed")).to.equal(false);
    });

    it("enforces transitions on update", async () => {
      const repository = new InMemoryRepository();
      const deployment = await repository.createDeployment(newDeployment());

      const error = await rejectionOf(repository.updateDeploymentStatus(deployment.id, "completed"));

      expect(error).to.be.instanceOf(InvalidTransitionError);
      expect(error.message).to.equal("invalid status transition: pending -> completed");
      expect((await repository.getDeployment(deployment.id))?.status).to.equal("pending");
    });

    it("clears the error when a deployment runs again", async () => {
      const repository = new InMemoryRepository();
      const { id } = await repository.createDeployment(newDeployment());
      await repository.updateDeploymentStatus(id, "running", "init");
      await repository.setDeploymentError(id, "deploy rollup: transaction reverted");
      await repository.updateDeploymentStatus(id, "failed");

      await repository.updateDeploymentStatus(id, "running", "init");

      const deployment = await repository.getDeployment(id);
      expect(deployment?.status).to.equal("running");
      expect(deployment?.errorMessage).to.equal(undefined);
    });
  });

  describe("deployments", function () {
    it("keeps chain ids unique per organization", async () => {
      const repository = new InMemoryRepository();
      await repository.createDeployment(newDeployment());

      const error = await rejectionOf(repository.createDeployment(newDeployment()));

      expect(error).to.be.instanceOf(ConfigurationError);
      expect(error.message).to.equal("deployment for chain 42170 already exists in organization org-1");
      await repository.createDeployment({ ...newDeployment(), orgId: "org-2" });
      expect((await repository.listAllDeployments()).length).to.equal(2);
    });

    it("looks deployments up by organization and chain id", async () => {
      const repository = new InMemoryRepository();
      const created = await repository.createDeployment(newDeployment(412346));

      expect((await repository.getDeploymentByChainId("org-1", 412346))?.id).to.equal(created.id);
      expect(await repository.getDeploymentByChainId("org-2", 412346)).to.equal(null);
    });

    it("returns copies", async () => {
      const repository = new InMemoryRepository();
      const created = await repository.createDeployment(newDeployment());
      created.status = "completed";

      expect((await repository.getDeployment(created.id))?.status).to.equal("pending");
    });

    it("reports unknown deployments", async () => {
      const repository = new InMemoryRepository();
      const error = await rejectionOf(repository.updateDeploymentStatus("missing", "running"));
      expect(error).to.be.instanceOf(NotFoundError);
      expect(error.message).to.equal("deployment not found: missing");
    });
  });

  describe("stale sweep", function () {
    it("only fails old running deployments", async () => {
      const clock = new TestClock();
      const repository = new InMemoryRepository(emptyState(), clock.now);
      const stale = await repository.createDeployment(newDeployment(1001));
      const fresh = await repository.createDeployment(newDeployment(1002));
      const pending = await repository.createDeployment(newDeployment(1003));
      const paused = await repository.createDeployment(newDeployment(1004));

      await repository.updateDeploymentStatus(stale.id, "running", "rollup");
      await repository.updateDeploymentStatus(paused.id, "running", "rollup");
      await repository.updateDeploymentStatus(paused.id, "paused");
      clock.advanceMinutes(20);
      await repository.updateDeploymentStatus(fresh.id, "running", "rollup");
      clock.advanceMinutes(15);

      const count = await repository.markStaleDeploymentsFailed(30 * 60 * 1000);

      expect(count).to.equal(1);
      const failed = await repository.getDeployment(stale.id);
      expect(failed?.status).to.equal("failed");
      expect(failed?.errorMessage).to.equal(STALE_DEPLOYMENT_MESSAGE);
      expect((await repository.getDeployment(fresh.id))?.status).to.equal("running");
      expect((await repository.getDeployment(pending.id))?.status).to.equal("pending");
      expect((await repository.getDeployment(paused.id))?.status).to.equal("paused");
    });
  });

  describe("transactions and artifacts", function () {
    it("records a transaction hash once per deployment", async () => {
      const repository = new InMemoryRepository();
      const { id } = await repository.createDeployment(newDeployment());
      const hash = "0x" + "ab".repeat(32);

      const first = await repository.recordTransaction({ deploymentId: id, stage: "rollup", txHash: hash });
      const second = await repository.recordTransaction({
        deploymentId: id,
        stage: "post_deploy",
        txHash: hash.toUpperCase().replace("0X", "0x"),
      });

      expect(second.id).to.equal(first.id);
      expect(second.stage).to.equal("rollup");
      expect((await repository.getTransactionsByDeployment(id)).length).to.equal(1);
      expect((await repository.getTransactionByHash(hash))?.id).to.equal(first.id);
    });

    it("upserts artifacts by type", async () => {
      const repository = new InMemoryRepository();
      const { id } = await repository.createDeployment(newDeployment());

      const first = await repository.saveArtifact({ deploymentId: id, artifactType: "chain_info", content: "[]" });
      const second = await repository.saveArtifact({ deploymentId: id, artifactType: "chain_info", content: "[{}]" });

      expect(second.id).to.equal(first.id);
      expect((await repository.getArtifact(id, "chain_info"))?.content).to.equal("[{}]");
      expect((await repository.getAllArtifacts(id)).length).to.equal(1);
      expect(await repository.getArtifact(id, "node_config")).to.equal(null);
    });

    it("keeps one infrastructure record per parent chain", async () => {
      const repository = new InMemoryRepository();
      await repository.upsertInfrastructure({
        parentChainId: 11155111,
        rollupCreatorAddress: "0x0000000000000000000000000000000000003001",
        version: "v3.1.0",
      });
      await repository.upsertInfrastructure({
        parentChainId: 11155111,
        rollupCreatorAddress: "0x0000000000000000000000000000000000003002",
        version: "v3.2.0",
      });

      const record = await repository.getInfrastructure(11155111);
      expect(record?.rollupCreatorAddress).to.equal("0x0000000000000000000000000000000000003002");
      expect(record?.version).to.equal("v3.2.0");
      expect(await repository.getInfrastructure(1)).to.equal(null);
    });
  });

  describe("file repository", function () {
    let stateDir: string;

    beforeEach(() => {
      stateDir = path.join(makeTempDir("repository"), "state");
    });

    afterEach(() => {
      fs.rmSync(path.dirname(stateDir), { recursive: true, force: true });
    });

    it("survives a reload", async () => {
      const repository = new FileRepository(stateDir);
      const { id } = await repository.createDeployment(newDeployment());
      await repository.updateDeploymentStatus(id, "running", "rollup");
      await repository.recordTransaction({ deploymentId: id, stage: "rollup", txHash: "0x01", description: "createRollup" });
      await repository.saveArtifact({ deploymentId: id, artifactType: "core_contracts", content: "{}" });
      await repository.upsertInfrastructure({
        parentChainId: 11155111,
        rollupCreatorAddress: "0x0000000000000000000000000000000000003001",
        version: "v3.2.0",
        addresses: { bridgeCreator: "0x0000000000000000000000000000000000003002" },
      });

      const reloaded = new FileRepository(stateDir);

      const deployment = await reloaded.getDeployment(id);
      expect(deployment?.status).to.equal("running");
      expect(deployment?.currentStage).to.equal("rollup");
      expect((await reloaded.getTransactionsByDeployment(id)).map((t) => t.description)).to.deep.equal(["createRollup"]);
      expect((await reloaded.getArtifact(id, "core_contracts"))?.content).to.equal("{}");
      expect((await reloaded.getInfrastructure(11155111))?.addresses).to.deep.equal({
        bridgeCreator: "0x0000000000000000000000000000000000003002",
      });
      expect(fs.readdirSync(stateDir).sort()).to.deep.equal([
        "artifacts.json",
        "deployments.json",
        "infrastructure.json",
        "transactions.json",
      ]);
    });

    it("starts empty without a state directory", async () => {
      const repository = new FileRepository(stateDir);
      expect(await repository.listAllDeployments()).to.deep.equal([]);
    });

    it("rejects a malformed state file", async () => {
      fs.mkdirSync(stateDir, { recursive: true });
      fs.writeFileSync(path.join(stateDir, "deployments.json"), JSON.stringify([{ id: "x" }]));

      expect(() => new FileRepository(stateDir)).to.throw(
        `read state file ${path.join(stateDir, "deployments.json")}: malformed entry at index 0`
      );
    });
  });

  describe("certificate provider", function () {
    let baseDir: string;

    beforeEach(() => {
      baseDir = makeTempDir("certificates");
    });

    afterEach(() => {
      fs.rmSync(baseDir, { recursive: true, force: true });
    });

    it("reads an organization's bundle", async () => {
      fs.mkdirSync(path.join(baseDir, "org-1"));
      fs.writeFileSync(path.join(baseDir, "org-1", "client.crt"), "test-cert");
      fs.writeFileSync(path.join(baseDir, "org-1", "client.key"), "test-key");

      const bundle = await new DirectoryCertificateProvider(baseDir).getCertificates("org-1");

      expect(bundle.clientCert).to.equal("test-cert");
      expect(bundle.clientKey).to.equal("test-key");
      expect(hasCredentials(bundle)).to.equal(true);
    });

    it("returns empty credentials for an unknown organization", async () => {
      const bundle = await new DirectoryCertificateProvider(baseDir).getCertificates("org-2");
      expect(hasCredentials(bundle)).to.equal(false);
    });

    it("refuses organization ids that escape the base directory", async () => {
      const error = await rejectionOf(new DirectoryCertificateProvider(baseDir).getCertificates("../etc"));
      expect(error).to.be.instanceOf(ConfigurationError);
      expect(error.message).to.equal("invalid organization id: ../etc");
    });
  });
});
