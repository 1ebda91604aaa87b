import * as fs from "fs";
import * as path from "path";
import { expect } from "chai";

import { runCli, type CliContext } from "../../scripts/deploy-rollup";
import { loadEnvironmentConfig } from "../../src.ts/config";
import { InMemoryRepository } from "../../src.ts/repository";
import { header } from "../../src.ts/utils";
import {
  CREATED_ROLLUP,
  FAST_RECEIPTS,
  FakeChain,
  deploymentConfigJson,
  installRollupCreator,
  installSequencerInbox,
  loadFixtureBundle,
  makeTempDir,
  testSigner,
} from "./utils";

describe("Deploy rollup CLI tests", function () {
  const bundle = loadFixtureBundle();
  let chain: FakeChain;
  let repository: InMemoryRepository;
  let workDir: string;
  let configFile: string;
  let output: string[];
  let errors: string[];

  function context(): CliContext {
    return {
      env: loadEnvironmentConfig({}),
      openRepository: () => repository,
      orchestratorOverrides: {
        loadArtifacts: async () => bundle,
        signerFactory: (options) => testSigner(options.chainId),
        chainClientFactory: () => chain,
        receipts: FAST_RECEIPTS,
      },
      print: (line) => void output.push(line),
      printError: (line) => void errors.push(line),
    };
  }

  async function createDeployment(): Promise<string> {
    const code = await runCli(["create", "--config", configFile, "--org", "org-1"], context());
    expect(code).to.equal(0);
    const [pending] = await repository.listDeploymentsByStatus("pending");
    return pending.id;
  }

  beforeEach(() => {
    chain = new FakeChain();
    installRollupCreator(chain, bundle);
    installSequencerInbox(chain, bundle);
    repository = new InMemoryRepository();
    workDir = makeTempDir("deploy-rollup-cli");
    configFile = path.join(workDir, "rollup.json");
    fs.writeFileSync(configFile, deploymentConfigJson());
    output = [];
    errors = [];
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it("creates a pending deployment from a config file", async () => {
    const id = await createDeployment();

    expect(output).to.deep.equal([`Created deployment ${id} for chain 42170 (pending)`]);
    const deployment = await repository.getDeployment(id);
    expect(deployment?.orgId).to.equal("org-1");
    expect(deployment?.stack).to.equal("nitro");
    expect(deployment?.config).to.equal(deploymentConfigJson());
  });

  it("prints the status of a created deployment", async () => {
    const id = await createDeployment();
    output = [];

    const code = await runCli(["status", id], context());

    expect(code).to.equal(0);
    expect(output.slice(0, 6)).to.deep.equal([
      header(`Deployment ${id}`),
      "  organization: org-1",
      "  chain id:     42170",
      "  stack:        nitro",
      "  status:       pending",
      "  stage:        -",
    ]);
    expect(output.slice(7)).to.deep.equal([header("Transactions (0)"), header("Artifacts (0)")]);
    expect(errors).to.deep.equal([]);
  });

  it("deploys a created deployment", async () => {
    const id = await createDeployment();
    const interruptListeners = process.listenerCount("SIGINT");
    output = [];

    const code = await runCli(["deploy", id], context());

    expect(code).to.equal(0);
    expect(output[0]).to.equal("[  0%] init: Starting deployment");
    expect(output.slice(-2)).to.deep.equal([
      header(`Rollup deployed at ${CREATED_ROLLUP.rollup}`),
      `Transaction: ${chain.sent[22].hash}`,
    ]);
    expect((await repository.getDeployment(id))?.status).to.equal("completed");
    expect(process.listenerCount("SIGINT")).to.equal(interruptListeners);
  });

  it("exits with 1 when deploying an unknown deployment", async () => {
    const code = await runCli(["deploy", "missing"], context());

    expect(code).to.equal(1);
    expect(errors).to.deep.equal(["Error: deployment not found: missing"]);
    expect(chain.sent.length).to.equal(0);
  });

  it("exits with 1 for the status of an unknown deployment", async () => {
    const code = await runCli(["status", "missing"], context());

    expect(code).to.equal(1);
    expect(errors).to.deep.equal(["Error: deployment not found: missing"]);
  });

  it("rejects an unknown stack", async () => {
    const code = await runCli(["create", "--config", configFile, "--org", "org-1", "--stack", "solana"], context());

    expect(code).to.equal(1);
    expect(errors).to.deep.equal(["Error: unsupported stack: solana"]);
    expect(await repository.listDeploymentsByStatus("pending")).to.deep.equal([]);
  });

  it("requires the organization", async () => {
    const code = await runCli(["create", "--config", configFile], context());

    expect(code).to.equal(1);
    expect(errors).to.deep.equal(["error: required option '--org <id>' not specified"]);
  });

  it("runs pending deployments on resume", async () => {
    const id = await createDeployment();
    output = [];

    const code = await runCli(["resume"], context());

    expect(code).to.equal(0);
    expect(output).to.include("Marked 0 stale deployment(s) failed, started 1 pending deployment(s)");
    expect((await repository.getDeployment(id))?.status).to.equal("completed");
  });
});
