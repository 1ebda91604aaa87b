import * as fs from "fs";
import { Command, CommanderError } from "commander";
import * as dotenv from "dotenv";

import { ArtifactStore } from "../src.ts/artifacts";
import { DirectoryCertificateProvider } from "../src.ts/certificates";
import { loadEnvironmentConfig, type EnvironmentConfig } from "../src.ts/config";
import { normalizeDeployConfig, parseRawDeploymentConfig } from "../src.ts/deploy-config";
import { DeploymentRunner } from "../src.ts/deployment-runner";
import { ConfigurationError, NotFoundError, errorMessage } from "../src.ts/errors";
import { FileRepository } from "../src.ts/file-repository";
import { Orchestrator, type OrchestratorDeps } from "../src.ts/orchestrator";
import { isStack, type InfrastructureRepository, type Repository } from "../src.ts/repository";
import { header, warning } from "../src.ts/utils";

export type CliRepository = Repository & InfrastructureRepository;

export interface CliContext {
  env: EnvironmentConfig;
  openRepository?: (stateDir: string) => CliRepository;
  // Replaces parts of the orchestrator wiring, e.g. the parent chain client
  orchestratorOverrides?: Partial<OrchestratorDeps>;
  print?: (line: string) => void;
  printError?: (line: string) => void;
}

function buildOrchestrator(context: CliContext, repository: CliRepository, verbose: boolean) {
  const env = context.env;
  const artifactStore = new ArtifactStore({
    baseUrl: env.artifactBaseUrl,
    cacheDir: env.artifactCacheDir,
    skipChecksumVerification: env.skipChecksumVerification,
    verbose,
  });
  return new Orchestrator({
    repository,
    infrastructureRepository: repository,
    loadArtifacts: (signal) => artifactStore.load(env.artifactBaseUrl, env.artifactVersion, signal),
    certificateProvider: env.certificatesDir ? new DirectoryCertificateProvider(env.certificatesDir) : undefined,
    signerEndpoint: env.signerEndpoint,
    receipts: { timeoutMs: env.receiptTimeoutSeconds * 1000 },
    verbose,
    ...context.orchestratorOverrides,
  });
}

/** Runs `fn` with SIGINT handled by `onInterrupt` instead of killing the process. */
async function withInterrupt<T>(onInterrupt: () => void, fn: () => Promise<T>): Promise<T> {
  process.once("SIGINT", onInterrupt);
  try {
    return await fn();
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}

export function buildProgram(context: CliContext): Command {
  const env = context.env;
  const print = context.print ?? ((line: string) => console.log(line));
  const printError = context.printError ?? ((line: string) => console.error(line));
  const program = new Command();

  program
    .name("rollup-deployer")
    .description("Deploys rollup infrastructure and rollups on a parent chain")
    .option("--state-dir <dir>", "Directory of the deployment records", env.stateDir)
    .option("-v, --verbose", "Print every deployment step", false)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => print(str.trimEnd()),
      writeErr: (str) => printError(str.trimEnd()),
    });

  const openRepository = (): CliRepository => {
    const stateDir: string = program.opts().stateDir;
    return context.openRepository ? context.openRepository(stateDir) : new FileRepository(stateDir);
  };
  const isVerbose = (): boolean => program.opts().verbose === true;
  const printProgress = (stage: string, progress: number, message: string) =>
    print(`[${String(Math.round(progress * 100)).padStart(3)}%] ${stage}: ${message}`);

  program
    .command("create")
    .description("Create a pending deployment from a JSON config file")
    .requiredOption("--config <file>", "Deployment config JSON")
    .requiredOption("--org <id>", "Organization id")
    .option("--chain-id <chain-id>", "Chain id, when the config does not carry one")
    .option("--stack <stack>", "Rollup stack", "nitro")
    .action(async (cmd) => {
      const configJson = fs.readFileSync(cmd.config, "utf-8");
      const fallbackChainId = cmd.chainId ? parseInt(cmd.chainId) : undefined;
      const config = normalizeDeployConfig(parseRawDeploymentConfig(configJson), fallbackChainId);
      if (!isStack(cmd.stack)) {
        throw new ConfigurationError(`unsupported stack: ${cmd.stack}`, "stack");
      }

      const repository = openRepository();
      const deployment = await repository.createDeployment({
        orgId: cmd.org,
        chainId: config.chainId,
        stack: cmd.stack,
        config: configJson,
      });
      print(`Created deployment ${deployment.id} for chain ${deployment.chainId} (${deployment.status})`);
    });

  program
    .command("deploy <id>")
    .description("Run a deployment to completion")
    .action(async (id: string) => {
      const repository = openRepository();
      const orchestrator = buildOrchestrator(context, repository, isVerbose());

      const controller = new AbortController();
      const result = await withInterrupt(
        () => {
          print(warning("Interrupted, pausing deployment..."));
          controller.abort();
        },
        () => orchestrator.deploy(id, printProgress, controller.signal)
      );
      print(header(`Rollup deployed at ${result.contracts?.rollup}`));
      print(`Transaction: ${result.transactionHash}`);
    });

  program
    .command("resume")
    .description("Fail stale deployments, then run every pending one")
    .action(async () => {
      const repository = openRepository();
      const runner = new DeploymentRunner({
        orchestrator: buildOrchestrator(context, repository, isVerbose()),
        repository,
        staleTimeoutMs: env.staleTimeoutMinutes * 60 * 1000,
        onProgress: (deploymentId, stage, progress, message) =>
          printProgress(stage, progress, `${deploymentId} ${message}`),
        verbose: isVerbose(),
      });

      await withInterrupt(
        () => {
          print(warning("Interrupted, pausing deployments..."));
          runner.shutdown().catch((e) => printError(errorMessage(e)));
        },
        async () => {
          const stale = await runner.sweepStale();
          const started = await runner.processPending();
          print(`Marked ${stale} stale deployment(s) failed, started ${started.length} pending deployment(s)`);
          await runner.waitForAll();
        }
      );
    });

  program
    .command("status <id>")
    .description("Print a deployment, its transactions and its artifacts")
    .action(async (id: string) => {
      const repository = openRepository();
      const deployment = await repository.getDeployment(id);
      if (!deployment) {
        throw new NotFoundError(`deployment not found: ${id}`);
      }
      print(header(`Deployment ${deployment.id}`));
      print(`  organization: ${deployment.orgId}`);
      print(`  chain id:     ${deployment.chainId}`);
      print(`  stack:        ${deployment.stack}`);
      print(`  status:       ${deployment.status}`);
      print(`  stage:        ${deployment.currentStage ?? "-"}`);
      print(`  updated:      ${deployment.updatedAt}`);
      if (deployment.errorMessage) {
        print(warning(`  error:        ${deployment.errorMessage}`));
      }

      const transactions = await repository.getTransactionsByDeployment(id);
      print(header(`Transactions (${transactions.length})`));
      for (const tx of transactions) {
        print(`  [${tx.stage}] ${tx.txHash} ${tx.description ?? ""}`);
      }

      const artifacts = await repository.getAllArtifacts(id);
      print(header(`Artifacts (${artifacts.length})`));
      for (const artifact of artifacts) {
        print(`  ${artifact.artifactType}`);
      }
    });

  program
    .command("artifacts")
    .description("Download and verify a contract artifact bundle")
    .option("--version <version>", "Artifact version", env.artifactVersion)
    .option("--source <source>", "Registry URL or local directory", env.artifactBaseUrl)
    .action(async (cmd) => {
      const store = new ArtifactStore({
        baseUrl: env.artifactBaseUrl,
        cacheDir: env.artifactCacheDir,
        skipChecksumVerification: env.skipChecksumVerification,
        verbose: isVerbose(),
      });
      const bundle = await store.load(cmd.source, cmd.version);
      print(header(`Artifact bundle ${bundle.version} (${bundle.sourceURL})`));
      for (const name of bundle.names().sort()) {
        print(`  ${name}`);
      }
    });

  return program;
}

/** Parses `argv` (without the node and script paths) and returns the process exit code. */
export async function runCli(argv: readonly string[], context: CliContext): Promise<number> {
  const program = buildProgram(context);
  try {
    await program.parseAsync([...argv], { from: "user" });
    return 0;
  } catch (e) {
    if (e instanceof CommanderError) {
      // commander has already printed its message
      return e.exitCode;
    }
    (context.printError ?? ((line: string) => console.error(line)))(`Error: ${errorMessage(e)}`);
    return 1;
  }
}

async function main(): Promise<number> {
  dotenv.config();
  return runCli(process.argv.slice(2), { env: loadEnvironmentConfig(process.env) });
}

if (require.main === module) {
  main()
    .then((code) => process.exit(code))
    .catch((err) => {
      console.error("Error:", err instanceof Error ? err.message : err);
      process.exit(1);
    });
}
