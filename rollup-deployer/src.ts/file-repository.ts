import * as fs from "fs";
import * as path from "path";

import { errorMessage } from "./errors";
import {
  DEPLOYMENT_STATUSES,
  InMemoryRepository,
  isStack,
  type Deployment,
  type DeploymentArtifact,
  type DeploymentTransaction,
  type InfrastructureRecord,
  type RepositoryState,
} from "./repository";

const COLLECTIONS = ["deployments", "transactions", "artifacts", "infrastructure"] as const;

function stateFile(stateDir: string, collection: (typeof COLLECTIONS)[number]): string {
  return path.join(stateDir, `${collection}.json`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isDeploymentStatus(value: unknown): boolean {
  return DEPLOYMENT_STATUSES.some((status) => status === value);
}

function isDeployment(value: unknown): value is Deployment {
  return (
    isRecord(value) &&
    typeof value.id === "string" &&
    typeof value.orgId === "string" &&
    typeof value.chainId === "number" &&
    isStack(value.stack) &&
    isDeploymentStatus(value.status) &&
    typeof value.config === "string" &&
    typeof value.createdAt === "string" &&
    typeof value.updatedAt === "string"
  );
}

function isTransaction(value: unknown): value is DeploymentTransaction {
  return (
    isRecord(value) &&
    typeof value.id === "string" &&
    typeof value.deploymentId === "string" &&
    typeof value.stage === "string" &&
    typeof value.txHash === "string" &&
    typeof value.createdAt === "string"
  );
}

function isArtifact(value: unknown): value is DeploymentArtifact {
  return (
    isRecord(value) &&
    typeof value.id === "string" &&
    typeof value.deploymentId === "string" &&
    typeof value.artifactType === "string" &&
    typeof value.content === "string" &&
    typeof value.createdAt === "string"
  );
}

function isInfrastructureRecord(value: unknown): value is InfrastructureRecord {
  return (
    isRecord(value) &&
    typeof value.parentChainId === "number" &&
    typeof value.rollupCreatorAddress === "string" &&
    typeof value.version === "string" &&
    typeof value.createdAt === "string" &&
    typeof value.updatedAt === "string"
  );
}

function readStateFile<T>(filePath: string, guard: (value: unknown) => value is T): T[] {
  if (!fs.existsSync(filePath)) {
    return [];
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (e) {
    throw new Error(`read state file ${filePath}: ${errorMessage(e)}`);
  }
  if (!Array.isArray(parsed)) {
    throw new Error(`read state file ${filePath}: expected a JSON array`);
  }
  const invalid = parsed.findIndex((item) => !guard(item));
  if (invalid >= 0) {
    throw new Error(`read state file ${filePath}: malformed entry at index ${invalid}`);
  }
  return parsed.filter(guard);
}

export function loadRepositoryState(stateDir: string): RepositoryState {
  return {
    deployments: readStateFile(stateFile(stateDir, "deployments"), isDeployment),
    transactions: readStateFile(stateFile(stateDir, "transactions"), isTransaction),
    artifacts: readStateFile(stateFile(stateDir, "artifacts"), isArtifact),
    infrastructure: readStateFile(stateFile(stateDir, "infrastructure"), isInfrastructureRecord),
  };
}

/**
 * Repository persisted as one JSON file per collection under `stateDir`. Every mutation
 * rewrites the collections, so a later process picks up exactly what the last one saw.
 */
export class FileRepository extends InMemoryRepository {
  constructor(
    public readonly stateDir: string,
    now?: () => Date
  ) {
    super(loadRepositoryState(stateDir), now);
  }

  protected persist(): void {
    if (!fs.existsSync(this.stateDir)) {
      fs.mkdirSync(this.stateDir, { recursive: true });
    }
    for (const collection of COLLECTIONS) {
      const filePath = stateFile(this.stateDir, collection);
      const tmpPath = `${filePath}.tmp`;
      fs.writeFileSync(tmpPath, JSON.stringify(this.state[collection], null, 2));
      fs.renameSync(tmpPath, filePath);
    }
  }
}
