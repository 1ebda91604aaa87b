import { randomUUID } from "crypto";

import { ConfigurationError, InvalidTransitionError, NotFoundError } from "./errors";

export const DEPLOYMENT_STATUSES = ["pending", "running", "paused", "completed", "failed"] as const;
export type DeploymentStatus = (typeof DEPLOYMENT_STATUSES)[number];

export const STACKS = ["nitro", "opstack", "bundle"] as const;
export type Stack = (typeof STACKS)[number];

export const STALE_DEPLOYMENT_MESSAGE =
  "Deployment timed out - worker may have crashed. Resume the deployment to retry.";

export interface Deployment {
  id: string;
  orgId: string;
  chainId: number;
  stack: Stack;
  status: DeploymentStatus;
  currentStage?: string;
  // Raw JSON as submitted; parsed by the orchestrator on every run
  config: string;
  errorMessage?: string;
  createdAt: string;
  updatedAt: string;
}

export interface NewDeployment {
  orgId: string;
  chainId: number;
  stack: Stack;
  config: string;
}

export interface DeploymentTransaction {
  id: string;
  deploymentId: string;
  stage: string;
  txHash: string;
  description?: string;
  createdAt: string;
}

export interface NewDeploymentTransaction {
  deploymentId: string;
  stage: string;
  txHash: string;
  description?: string;
}

export interface DeploymentArtifact {
  id: string;
  deploymentId: string;
  artifactType: string;
  // JSON text
  content: string;
  createdAt: string;
}

export interface NewDeploymentArtifact {
  deploymentId: string;
  artifactType: string;
  content: string;
}

export interface InfrastructureRecord {
  parentChainId: number;
  rollupCreatorAddress: string;
  bridgeCreatorAddress?: string;
  version: string;
  deploymentTxHash?: string;
  deployedBy?: string;
  addresses?: Record<string, string>;
  createdAt: string;
  updatedAt: string;
}

export type NewInfrastructureRecord = Omit<InfrastructureRecord, "createdAt" | "updatedAt">;

export interface Repository {
  createDeployment(input: NewDeployment): Promise<Deployment>;
  getDeployment(id: string): Promise<Deployment | null>;
  getDeploymentByChainId(orgId: string, chainId: number): Promise<Deployment | null>;
  updateDeploymentStatus(id: string, status: DeploymentStatus, stage?: string): Promise<void>;
  updateDeploymentConfig(id: string, config: string): Promise<void>;
  setDeploymentError(id: string, message: string): Promise<void>;
  listDeploymentsByStatus(status: DeploymentStatus): Promise<Deployment[]>;
  listAllDeployments(): Promise<Deployment[]>;
  // Moves `running` deployments not updated within `timeoutMs` to `failed`; returns how many
  markStaleDeploymentsFailed(timeoutMs: number): Promise<number>;

  recordTransaction(input: NewDeploymentTransaction): Promise<DeploymentTransaction>;
  getTransactionsByDeployment(deploymentId: string): Promise<DeploymentTransaction[]>;
  getTransactionByHash(txHash: string): Promise<DeploymentTransaction | null>;

  saveArtifact(input: NewDeploymentArtifact): Promise<DeploymentArtifact>;
  getArtifact(deploymentId: string, artifactType: string): Promise<DeploymentArtifact | null>;
  getAllArtifacts(deploymentId: string): Promise<DeploymentArtifact[]>;
}

export interface InfrastructureRepository {
  getInfrastructure(parentChainId: number): Promise<InfrastructureRecord | null>;
  upsertInfrastructure(record: NewInfrastructureRecord): Promise<InfrastructureRecord>;
}

const ALLOWED_TRANSITIONS: Record<DeploymentStatus, readonly DeploymentStatus[]> = {
  pending: ["running", "failed"],
  // running -> running records a stage change
  running: ["running", "paused", "completed", "failed"],
  paused: ["running", "failed"],
  failed: ["running"],
  completed: [],
};

export function canTransition(from: DeploymentStatus, to: DeploymentStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function assertStatusTransition(from: DeploymentStatus, to: DeploymentStatus) {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}

export function isStack(value: unknown): value is Stack {
  return STACKS.some((stack) => stack === value);
}

export interface RepositoryState {
  deployments: Deployment[];
  transactions: DeploymentTransaction[];
  artifacts: DeploymentArtifact[];
  infrastructure: InfrastructureRecord[];
}

export function emptyState(): RepositoryState {
  return { deployments: [], transactions: [], artifacts: [], infrastructure: [] };
}

/**
 * Keeps every record in process memory. Also the base for the file-backed repository,
 * which only adds loading and persisting of the same state.
 */
export class InMemoryRepository implements Repository, InfrastructureRepository {
  protected state: RepositoryState;

  constructor(
    initialState: RepositoryState = emptyState(),
    private readonly now: () => Date = () => new Date()
  ) {
    this.state = initialState;
  }

  // Called after every mutation
  protected persist(): void {}

  private timestamp(): string {
    return this.now().toISOString();
  }

  private findDeployment(id: string): Deployment {
    const deployment = this.state.deployments.find((d) => d.id === id);
    if (!deployment) {
      throw new NotFoundError(`deployment not found: ${id}`);
    }
    return deployment;
  }

  async createDeployment(input: NewDeployment): Promise<Deployment> {
    if (this.state.deployments.some((d) => d.orgId === input.orgId && d.chainId === input.chainId)) {
      throw new ConfigurationError(
        `deployment for chain ${input.chainId} already exists in organization ${input.orgId}`,
        "chainId"
      );
    }
    const now = this.timestamp();
    const deployment: Deployment = {
      id: randomUUID(),
      orgId: input.orgId,
      chainId: input.chainId,
      stack: input.stack,
      status: "pending",
      config: input.config,
      createdAt: now,
      updatedAt: now,
    };
    this.state.deployments.push(deployment);
    this.persist();
    return { ...deployment };
  }

  async getDeployment(id: string): Promise<Deployment | null> {
    const deployment = this.state.deployments.find((d) => d.id === id);
    return deployment ? { ...deployment } : null;
  }

  async getDeploymentByChainId(orgId: string, chainId: number): Promise<Deployment | null> {
    const deployment = this.state.deployments.find((d) => d.orgId === orgId && d.chainId === chainId);
    return deployment ? { ...deployment } : null;
  }

  async updateDeploymentStatus(id: string, status: DeploymentStatus, stage?: string): Promise<void> {
    const deployment = this.findDeployment(id);
    assertStatusTransition(deployment.status, status);
    deployment.status = status;
    if (stage !== undefined) {
      deployment.currentStage = stage;
    }
    if (status === "running") {
      deployment.errorMessage = undefined;
    }
    deployment.updatedAt = this.timestamp();
    this.persist();
  }

  async updateDeploymentConfig(id: string, config: string): Promise<void> {
    const deployment = this.findDeployment(id);
    deployment.config = config;
    deployment.updatedAt = this.timestamp();
    this.persist();
  }

  async setDeploymentError(id: string, message: string): Promise<void> {
    const deployment = this.findDeployment(id);
    deployment.errorMessage = message;
    deployment.updatedAt = this.timestamp();
    this.persist();
  }

  async listDeploymentsByStatus(status: DeploymentStatus): Promise<Deployment[]> {
    return this.state.deployments.filter((d) => d.status === status).map((d) => ({ ...d }));
  }

  async listAllDeployments(): Promise<Deployment[]> {
    return this.state.deployments.map((d) => ({ ...d }));
  }

  async markStaleDeploymentsFailed(timeoutMs: number): Promise<number> {
    const cutoff = this.now().getTime() - timeoutMs;
    const now = this.timestamp();
    let count = 0;
    for (const deployment of this.state.deployments) {
      if (deployment.status === "running" && Date.parse(deployment.updatedAt) < cutoff) {
        deployment.status = "failed";
        deployment.errorMessage = STALE_DEPLOYMENT_MESSAGE;
        deployment.updatedAt = now;
        count++;
      }
    }
    if (count > 0) {
      this.persist();
    }
    return count;
  }

  async recordTransaction(input: NewDeploymentTransaction): Promise<DeploymentTransaction> {
    this.findDeployment(input.deploymentId);
    const existing = this.state.transactions.find(
      (t) => t.deploymentId === input.deploymentId && t.txHash.toLowerCase() === input.txHash.toLowerCase()
    );
    if (existing) {
      return { ...existing };
    }
    const transaction: DeploymentTransaction = {
      id: randomUUID(),
      deploymentId: input.deploymentId,
      stage: input.stage,
      txHash: input.txHash,
      description: input.description,
      createdAt: this.timestamp(),
    };
    this.state.transactions.push(transaction);
    this.persist();
    return { ...transaction };
  }

  async getTransactionsByDeployment(deploymentId: string): Promise<DeploymentTransaction[]> {
    return this.state.transactions.filter((t) => t.deploymentId === deploymentId).map((t) => ({ ...t }));
  }

  async getTransactionByHash(txHash: string): Promise<DeploymentTransaction | null> {
    const transaction = this.state.transactions.find((t) => t.txHash.toLowerCase() === txHash.toLowerCase());
    return transaction ? { ...transaction } : null;
  }

  async saveArtifact(input: NewDeploymentArtifact): Promise<DeploymentArtifact> {
    this.findDeployment(input.deploymentId);
    const existing = this.state.artifacts.find(
      (a) => a.deploymentId === input.deploymentId && a.artifactType === input.artifactType
    );
    if (existing) {
      existing.content = input.content;
      this.persist();
      return { ...existing };
    }
    const artifact: DeploymentArtifact = {
      id: randomUUID(),
      deploymentId: input.deploymentId,
      artifactType: input.artifactType,
      content: input.content,
      createdAt: this.timestamp(),
    };
    this.state.artifacts.push(artifact);
    this.persist();
    return { ...artifact };
  }

  async getArtifact(deploymentId: string, artifactType: string): Promise<DeploymentArtifact | null> {
    const artifact = this.state.artifacts.find(
      (a) => a.deploymentId === deploymentId && a.artifactType === artifactType
    );
    return artifact ? { ...artifact } : null;
  }

  async getAllArtifacts(deploymentId: string): Promise<DeploymentArtifact[]> {
    return this.state.artifacts.filter((a) => a.deploymentId === deploymentId).map((a) => ({ ...a }));
  }

  async getInfrastructure(parentChainId: number): Promise<InfrastructureRecord | null> {
    const record = this.state.infrastructure.find((r) => r.parentChainId === parentChainId);
    return record ? { ...record } : null;
  }

  async upsertInfrastructure(record: NewInfrastructureRecord): Promise<InfrastructureRecord> {
    const now = this.timestamp();
    const index = this.state.infrastructure.findIndex((r) => r.parentChainId === record.parentChainId);
    const stored: InfrastructureRecord = {
      ...record,
      createdAt: index >= 0 ? this.state.infrastructure[index].createdAt : now,
      updatedAt: now,
    };
    if (index >= 0) {
      this.state.infrastructure[index] = stored;
    } else {
      this.state.infrastructure.push(stored);
    }
    this.persist();
    return { ...stored };
  }
}
