import { DEFAULT_STALE_TIMEOUT_MINUTES } from "./constants";
import { ConfigurationError, NotFoundError, errorMessage, isAbortError } from "./errors";
import type { DeploymentStage, Orchestrator } from "./orchestrator";
import type { Repository } from "./repository";
import { logError, logWarning, makeLogger, type LogFn } from "./utils";

interface RunningJob {
  controller: AbortController;
  // Settles once the orchestrator is done with the deployment; never rejects
  done: Promise<void>;
}

/** Table of in-process jobs. All access goes through these methods. */
export class JobRegistry {
  private readonly jobs = new Map<string, RunningJob>();

  add(deploymentId: string, job: RunningJob) {
    if (this.jobs.has(deploymentId)) {
      throw new ConfigurationError(`deployment already running: ${deploymentId}`, "deploymentId");
    }
    this.jobs.set(deploymentId, job);
  }

  get(deploymentId: string): RunningJob | undefined {
    return this.jobs.get(deploymentId);
  }

  has(deploymentId: string): boolean {
    return this.jobs.has(deploymentId);
  }

  remove(deploymentId: string) {
    this.jobs.delete(deploymentId);
  }

  ids(): string[] {
    return [...this.jobs.keys()];
  }

  all(): RunningJob[] {
    return [...this.jobs.values()];
  }
}

export type RunnerProgressCallback = (
  deploymentId: string,
  stage: DeploymentStage,
  progress: number,
  message: string
) => void;

export interface DeploymentRunnerConfig {
  orchestrator: Orchestrator;
  repository: Repository;
  staleTimeoutMs?: number;
  onProgress?: RunnerProgressCallback;
  verbose?: boolean;
}

export class DeploymentRunner {
  private readonly registry = new JobRegistry();
  private readonly staleTimeoutMs: number;
  private readonly log: LogFn;

  constructor(private readonly config: DeploymentRunnerConfig) {
    this.staleTimeoutMs = config.staleTimeoutMs ?? DEFAULT_STALE_TIMEOUT_MINUTES * 60 * 1000;
    this.log = makeLogger(config.verbose ?? false);
  }

  /** Starts a deployment in the background. The returned promise settles when the job ends. */
  start(deploymentId: string): Promise<void> {
    if (this.registry.has(deploymentId)) {
      throw new ConfigurationError(`deployment already running: ${deploymentId}`, "deploymentId");
    }
    const controller = new AbortController();
    const onProgress = this.config.onProgress;
    const done = this.config.orchestrator
      .deploy(
        deploymentId,
        onProgress ? (stage, progress, message) => onProgress(deploymentId, stage, progress, message) : undefined,
        controller.signal
      )
      .then(
        () => this.log(`Deployment ${deploymentId} completed`),
        (e: unknown) => {
          if (isAbortError(e) || controller.signal.aborted) {
            this.log(`Deployment ${deploymentId} paused`);
            return;
          }
          logError(`Deployment ${deploymentId} failed: ${errorMessage(e)}`);
        }
      )
      .finally(() => this.registry.remove(deploymentId));

    this.registry.add(deploymentId, { controller, done });
    return done;
  }

  /** Cancels a running job and leaves its record paused. */
  async stop(deploymentId: string): Promise<void> {
    const job = this.registry.get(deploymentId);
    if (!job) {
      throw new NotFoundError(`deployment not running: ${deploymentId}`);
    }
    job.controller.abort();
    await job.done;

    const deployment = await this.config.repository.getDeployment(deploymentId);
    if (deployment?.status === "running") {
      await this.config.repository.updateDeploymentStatus(deploymentId, "paused");
    }
  }

  isRunning(deploymentId: string): boolean {
    return this.registry.has(deploymentId);
  }

  runningDeployments(): string[] {
    return this.registry.ids();
  }

  /** Starts every pending deployment not already running here; returns their ids. */
  async processPending(): Promise<string[]> {
    const pending = await this.config.repository.listDeploymentsByStatus("pending");
    const started: string[] = [];
    for (const deployment of pending) {
      if (this.registry.has(deployment.id)) {
        continue;
      }
      this.log(`Resuming pending deployment ${deployment.id} (chain ${deployment.chainId})`);
      void this.start(deployment.id);
      started.push(deployment.id);
    }
    return started;
  }

  async sweepStale(timeoutMs: number = this.staleTimeoutMs): Promise<number> {
    const count = await this.config.repository.markStaleDeploymentsFailed(timeoutMs);
    if (count > 0) {
      logWarning(`Marked ${count} stale deployment(s) as failed`);
    }
    return count;
  }

  async waitForAll(): Promise<void> {
    await Promise.all(this.registry.all().map((job) => job.done));
  }

  async shutdown(): Promise<void> {
    for (const job of this.registry.all()) {
      job.controller.abort();
    }
    await this.waitForAll();
  }
}
