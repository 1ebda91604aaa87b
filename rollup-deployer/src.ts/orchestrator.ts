import { ArtifactGenerator } from "./artifact-generator";
import { ArtifactStore, type ArtifactBundle } from "./artifacts";
import { hasCredentials, type CertificateBundle, type CertificateProvider } from "./certificates";
import { jsonRpcChainClientFactory, type ChainClientFactory, type ReceiptWaitOptions } from "./chain-client";
import { DEFAULT_SIGNER_ENDPOINT } from "./constants";
import {
  normalizeDeployConfig,
  parseRawDeploymentConfig,
  withDeployDefaults,
  type RawDeploymentConfig,
  type ResolvedDeployConfig,
} from "./deploy-config";
import {
  ConfigurationError,
  InvalidTransitionError,
  NotFoundError,
  OnChainError,
  abortError,
  errorMessage,
  isAbortError,
  wrapError,
} from "./errors";
import { InfrastructureDeployer } from "./infrastructure";
import type { Deployment, InfrastructureRepository, Repository } from "./repository";
import { RollupDeployer, type RollupDeployResult } from "./rollup";
import { RemoteSigner, type TransactionSigner } from "./signer";
import { logWarning, makeLogger, throwIfAborted, type LogFn } from "./utils";

export type DeploymentStage = "init" | "artifacts" | "signer" | "infrastructure" | "rollup" | "outputs" | "completed";

export type ProgressCallback = (stage: DeploymentStage, progress: number, message: string) => void;

export type SignerCredentials =
  | { kind: "mtls"; certificates: CertificateBundle }
  | { kind: "api-key"; apiKey: string };

export interface SignerOptions {
  endpoint: string;
  address: string;
  chainId: number;
  credentials: SignerCredentials;
  verbose: boolean;
}

export type SignerFactory = (options: SignerOptions) => TransactionSigner;

export const remoteSignerFactory: SignerFactory = (options) => {
  const { credentials } = options;
  return new RemoteSigner({
    endpoint: options.endpoint,
    address: options.address,
    chainId: options.chainId,
    verbose: options.verbose,
    ...(credentials.kind === "mtls"
      ? {
          clientCert: credentials.certificates.clientCert,
          clientKey: credentials.certificates.clientKey,
          caCert: credentials.certificates.caCert,
        }
      : { apiKey: credentials.apiKey }),
  });
};

export interface OrchestratorDeps {
  repository: Repository;
  infrastructureRepository?: InfrastructureRepository;
  artifactStore?: ArtifactStore;
  // Overrides the artifact store, e.g. for a local build
  loadArtifacts?: (signal?: AbortSignal) => Promise<ArtifactBundle>;
  certificateProvider?: CertificateProvider;
  signerFactory?: SignerFactory;
  chainClientFactory?: ChainClientFactory;
  signerEndpoint?: string;
  receipts?: Omit<ReceiptWaitOptions, "signal">;
  verbose?: boolean;
}

// Fixed points of the overall progress scale
const PROGRESS = {
  start: 0.0,
  configParsed: 0.05,
  credentials: 0.1,
  artifacts: 0.15,
  signer: 0.2,
  infrastructureStart: 0.25,
  infrastructureDone: 0.33,
  rollupStart: 0.4,
  rollupDone: 0.85,
  outputs: 0.9,
  completed: 1.0,
} as const;

export const STAGE_INFRASTRUCTURE = "infrastructure";
export const STAGE_ROLLUP = "rollup";
export const STAGE_POST_DEPLOY = "post_deploy";

/**
 * Drives one persisted deployment from its stored request to a completed rollup with its
 * output documents. The only writer of deployment status besides the runner's pause.
 */
export class Orchestrator {
  private readonly repository: Repository;
  private readonly signerFactory: SignerFactory;
  private readonly chainClientFactory: ChainClientFactory;
  private readonly log: LogFn;

  constructor(private readonly deps: OrchestratorDeps) {
    this.repository = deps.repository;
    this.signerFactory = deps.signerFactory ?? remoteSignerFactory;
    this.chainClientFactory = deps.chainClientFactory ?? jsonRpcChainClientFactory;
    this.log = makeLogger(deps.verbose ?? false);
  }

  async deploy(deploymentId: string, onProgress?: ProgressCallback, signal?: AbortSignal): Promise<RollupDeployResult> {
    const deployment = await this.repository.getDeployment(deploymentId);
    if (!deployment) {
      throw new NotFoundError(`deployment not found: ${deploymentId}`);
    }
    if (deployment.status === "completed") {
      throw new InvalidTransitionError("completed", "running");
    }

    await this.repository.updateDeploymentStatus(deploymentId, "running", "init");

    const report = async (stage: DeploymentStage, progress: number, message: string) => {
      this.log(`[${deploymentId}] ${stage} ${Math.round(progress * 100)}%: ${message}`);
      if (stage !== "completed") {
        await this.repository.updateDeploymentStatus(deploymentId, "running", stage);
      }
      onProgress?.(stage, progress, message);
    };

    try {
      return await this.run(deployment, report, signal);
    } catch (e) {
      await this.handleFailure(deploymentId, e, signal);
      throw e;
    }
  }

  private async run(
    deployment: Deployment,
    report: (stage: DeploymentStage, progress: number, message: string) => Promise<void>,
    signal?: AbortSignal
  ): Promise<RollupDeployResult> {
    const id = deployment.id;
    await report("init", PROGRESS.start, "Starting deployment");

    const raw = parseRawDeploymentConfig(deployment.config);
    if (deployment.stack !== "nitro") {
      throw new ConfigurationError(`unsupported stack: ${deployment.stack}`, "stack");
    }
    await report("init", PROGRESS.configParsed, "Configuration parsed");

    const credentials = await this.resolveCredentials(raw, raw.org_id || deployment.orgId);
    await report("init", PROGRESS.credentials, "Signer credentials resolved");

    const config = withDeployDefaults(normalizeDeployConfig(raw, deployment.chainId));
    throwIfAborted(signal);

    await report("artifacts", PROGRESS.artifacts, "Loading contract artifacts");
    const artifacts = await this.loadArtifacts(signal);
    this.log(`Using contract artifacts ${artifacts.version} from ${artifacts.sourceURL}`);

    await report("signer", PROGRESS.signer, "Connecting to transaction signer");
    const signer = this.signerFactory({
      endpoint: config.signerEndpoint ?? this.deps.signerEndpoint ?? DEFAULT_SIGNER_ENDPOINT,
      address: config.owner,
      chainId: config.parentChainId,
      credentials,
      verbose: this.deps.verbose ?? false,
    });

    await report("infrastructure", PROGRESS.infrastructureStart, "Ensuring rollup infrastructure");
    const infrastructure = await new InfrastructureDeployer({
      artifacts,
      signer,
      repository: this.deps.infrastructureRepository,
      chainClientFactory: this.chainClientFactory,
      maxDataSize: config.maxDataSize,
      receipts: this.deps.receipts,
      verbose: this.deps.verbose,
      onContractDeployed: async (deployed) => {
        await this.repository.recordTransaction({
          deploymentId: id,
          stage: STAGE_INFRASTRUCTURE,
          txHash: deployed.txHash,
          description: deployed.name,
        });
      },
    }).ensure(config.parentChainId, config.parentChainRpc, signal);
    await report(
      "infrastructure",
      PROGRESS.infrastructureDone,
      `RollupCreator ${infrastructure.rollupCreatorAddress} (${infrastructure.source})`
    );

    await report("rollup", PROGRESS.rollupStart, "Creating rollup");
    const result = await new RollupDeployer({
      artifacts,
      signer,
      chainClientFactory: this.chainClientFactory,
      receipts: this.deps.receipts,
      verbose: this.deps.verbose,
    }).deploy(config, infrastructure.rollupCreatorAddress, signal);
    await this.recordRollupTransactions(id, result);

    if (!result.success) {
      if (signal?.aborted) {
        throw abortError(result.error);
      }
      throw new OnChainError(`deploy rollup: ${result.error ?? "unknown error"}`, result.transactionHash, result.blockNumber);
    }
    await report("rollup", PROGRESS.rollupDone, `Rollup created at ${result.contracts?.rollup}`);

    await report("outputs", PROGRESS.outputs, "Generating output documents");
    await this.saveOutputs(id, config, result, credentials);

    await this.repository.updateDeploymentStatus(id, "completed", "completed");
    await report("completed", PROGRESS.completed, "Deployment completed");
    return result;
  }

  private async resolveCredentials(raw: RawDeploymentConfig, orgId: string): Promise<SignerCredentials> {
    const provider = this.deps.certificateProvider;
    if (provider) {
      let certificates: CertificateBundle;
      try {
        certificates = await provider.getCertificates(orgId);
      } catch (e) {
        throw wrapError("load certificates", e);
      }
      if (hasCredentials(certificates)) {
        return { kind: "mtls", certificates };
      }
      if (raw.api_key) {
        return { kind: "api-key", apiKey: raw.api_key };
      }
      throw new ConfigurationError(
        "mTLS certificates not available: certificate provider returned empty credentials",
        "client_cert"
      );
    }

    const embedded: CertificateBundle = {
      clientCert: raw.client_cert ?? "",
      clientKey: raw.client_key ?? "",
      caCert: raw.ca_cert,
    };
    if (hasCredentials(embedded)) {
      return { kind: "mtls", certificates: embedded };
    }
    if (raw.api_key) {
      return { kind: "api-key", apiKey: raw.api_key };
    }
    throw new ConfigurationError(
      "mTLS certificates not available: no certificate provider configured and none embedded in config",
      "client_cert"
    );
  }

  private async loadArtifacts(signal?: AbortSignal): Promise<ArtifactBundle> {
    try {
      if (this.deps.loadArtifacts) {
        return await this.deps.loadArtifacts(signal);
      }
      const store = this.deps.artifactStore ?? new ArtifactStore({ verbose: this.deps.verbose });
      return await store.loadDefault(signal);
    } catch (e) {
      throw wrapError("load artifacts", e);
    }
  }

  private async recordRollupTransactions(deploymentId: string, result: RollupDeployResult) {
    if (result.transactionHash) {
      await this.repository.recordTransaction({
        deploymentId,
        stage: STAGE_ROLLUP,
        txHash: result.transactionHash,
        description: "createRollup",
      });
    }
    for (const tx of result.postDeployTransactions) {
      await this.repository.recordTransaction({
        deploymentId,
        stage: STAGE_POST_DEPLOY,
        txHash: tx.txHash,
        description: tx.description,
      });
    }
  }

  private async saveOutputs(
    deploymentId: string,
    config: ResolvedDeployConfig,
    result: RollupDeployResult,
    credentials: SignerCredentials
  ) {
    const generator = new ArtifactGenerator(this.repository);
    try {
      const saved = await generator.generate(
        deploymentId,
        config,
        result,
        credentials.kind === "mtls" ? credentials.certificates : undefined
      );
      this.log(`Saved artifacts: ${saved.join(", ")}`);
    } catch (e) {
      throw wrapError("generate artifacts", e);
    }
  }

  private async handleFailure(deploymentId: string, error: unknown, signal?: AbortSignal) {
    try {
      const current = await this.repository.getDeployment(deploymentId);
      if (!current) {
        return;
      }

      if (error instanceof OnChainError && error.txHash) {
        await this.repository.recordTransaction({
          deploymentId,
          stage: current.currentStage ?? "unknown",
          txHash: error.txHash,
          description: "failed transaction",
        });
      }

      if (isAbortError(error) || signal?.aborted) {
        // Cancelled: leave the record resumable
        if (current.status === "running") {
          await this.repository.updateDeploymentStatus(deploymentId, "paused");
        }
        return;
      }

      await this.repository.setDeploymentError(deploymentId, errorMessage(error));
      if (current.status !== "failed") {
        await this.repository.updateDeploymentStatus(deploymentId, "failed");
      }
    } catch (e) {
      logWarning(`Failed to record failure of deployment ${deploymentId}: ${errorMessage(e)}`);
    }
  }
}
