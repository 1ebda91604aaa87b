import { createHash, randomBytes } from "crypto";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ethers } from "ethers";
import fetch from "node-fetch";
import type { RequestInit, Response } from "node-fetch";
import * as unzipper from "unzipper";

import {
  ARTIFACT_CHECKSUMS,
  DEFAULT_ARTIFACT_BASE_URL,
  DEFAULT_ARTIFACT_VERSION,
  REQUIRED_CONTRACTS,
  type ContractName,
} from "./constants";
import { NotFoundError, SecurityError, errorMessage, wrapError } from "./errors";
import { makeLogger, throwIfAborted, type LogFn } from "./utils";

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface ContractArtifact {
  readonly name: ContractName;
  readonly abi: ethers.utils.Interface;
  readonly bytecode: string;
  readonly deployedBytecode: string;
}

export class ArtifactBundle {
  constructor(
    public readonly version: string,
    public readonly sourceURL: string,
    private readonly contracts: ReadonlyMap<ContractName, ContractArtifact>,
    public readonly loadedAt: Date = new Date()
  ) {
    const missing = missingContracts(contracts);
    if (missing.length > 0) {
      throw new Error(`missing required contracts: [${missing.join(", ")}]`);
    }
  }

  get(name: ContractName): ContractArtifact {
    const artifact = this.contracts.get(name);
    if (!artifact) {
      throw new NotFoundError(`contract ${name} not present in artifact bundle ${this.version}`);
    }
    return artifact;
  }

  names(): ContractName[] {
    return [...this.contracts.keys()];
  }
}

export interface ArtifactStoreConfig {
  baseUrl?: string;
  cacheDir?: string;
  checksums?: Record<string, string>;
  // Only for test environments
  skipChecksumVerification?: boolean;
  fetch?: FetchFn;
  verbose?: boolean;
}

export class ArtifactStore {
  public readonly baseUrl: string;
  private readonly cacheDir: string;
  private readonly checksums: Record<string, string>;
  private readonly skipChecksumVerification: boolean;
  private readonly fetchFn: FetchFn;
  private readonly log: LogFn;
  private readonly loaded = new Map<string, ArtifactBundle>();

  constructor(config: ArtifactStoreConfig = {}) {
    this.baseUrl = config.baseUrl ?? DEFAULT_ARTIFACT_BASE_URL;
    this.cacheDir = config.cacheDir ?? path.join(os.tmpdir(), "rollup-deployer-artifacts");
    this.checksums = config.checksums ?? ARTIFACT_CHECKSUMS;
    this.skipChecksumVerification = config.skipChecksumVerification ?? false;
    this.fetchFn = config.fetch ?? fetch;
    this.log = makeLogger(config.verbose ?? false);
  }

  async loadDefault(signal?: AbortSignal): Promise<ArtifactBundle> {
    return this.load(this.baseUrl, DEFAULT_ARTIFACT_VERSION, signal);
  }

  /**
   * Loads the required contract set either from a remote registry (`http(s)://` source,
   * fetched as `{source}/{version}.zip`) or from a local directory of `<Name>.json` files.
   */
  async load(source: string, version: string, signal?: AbortSignal): Promise<ArtifactBundle> {
    const key = `${source}@${version}`;
    const cached = this.loaded.get(key);
    if (cached) {
      return cached;
    }

    const bundle = isRemoteSource(source)
      ? await this.loadFromRemote(source, version, signal)
      : loadFromDirectory(source, version);

    this.loaded.set(key, bundle);
    return bundle;
  }

  private async loadFromRemote(baseUrl: string, version: string, signal?: AbortSignal): Promise<ArtifactBundle> {
    const expected = this.checksums[version];
    if (!expected && !this.skipChecksumVerification) {
      throw new SecurityError(
        `SECURITY: no checksum registered for artifact version ${version} - refusing to use unverified artifacts`
      );
    }

    const url = `${baseUrl.replace(/\/+$/, "")}/${version}.zip`;
    const zipPath = await this.download(url, version, expected, signal);
    try {
      const contracts = await extractContracts(zipPath);
      this.log(`Loaded ${contracts.size} contracts from ${url}`);
      return new ArtifactBundle(version, url, contracts);
    } finally {
      fs.rmSync(zipPath, { force: true });
    }
  }

  private async download(url: string, version: string, expected: string | undefined, signal?: AbortSignal) {
    fs.mkdirSync(this.cacheDir, { recursive: true });
    const tmpPath = path.join(this.cacheDir, `${version}.${randomBytes(6).toString("hex")}.zip.tmp`);

    this.log(`Downloading contract artifacts ${version} from ${url}`);
    let response: Response;
    try {
      response = await this.fetchFn(url, { signal });
    } catch (e) {
      throw wrapError("download artifacts", e);
    }
    if (!response.ok) {
      throw new Error(`download artifacts: ${url} returned HTTP ${response.status}`);
    }
    let body: Buffer;
    try {
      body = await response.buffer();
    } catch (e) {
      throw wrapError("download artifacts", e);
    }
    throwIfAborted(signal);
    fs.writeFileSync(tmpPath, body);

    if (expected && !this.skipChecksumVerification) {
      const actual = `sha256:${sha256File(tmpPath)}`;
      if (actual.toLowerCase() !== expected.toLowerCase()) {
        fs.rmSync(tmpPath, { force: true });
        throw new SecurityError(`SECURITY: checksum mismatch for ${version} - expected ${expected}, got ${actual}`);
      }
      this.log(`Checksum verified for ${version}`);
    }

    // Readers only ever see a complete file
    const finalPath = path.join(this.cacheDir, `nitro-contracts-${version}-${Date.now()}-${randomBytes(3).toString("hex")}.zip`);
    fs.renameSync(tmpPath, finalPath);
    return finalPath;
  }
}

export function isRemoteSource(source: string): boolean {
  return source.startsWith("http://") || source.startsWith("https://");
}

export function sha256File(filePath: string): string {
  return createHash("sha256").update(fs.readFileSync(filePath)).digest("hex");
}

// `version` labels a local build when it is known; otherwise the bundle reports "local"
export function loadFromDirectory(dir: string, version: string = "local"): ArtifactBundle {
  const contracts = new Map<ContractName, ContractArtifact>();
  for (const name of REQUIRED_CONTRACTS) {
    const filePath = path.join(dir, `${name}.json`);
    if (!fs.existsSync(filePath)) {
      continue;
    }
    contracts.set(name, parseContractArtifact(name, fs.readFileSync(filePath, "utf-8")));
  }
  return new ArtifactBundle(version, `file://${dir}`, contracts);
}

async function extractContracts(zipPath: string): Promise<Map<ContractName, ContractArtifact>> {
  const directory = await unzipper.Open.file(zipPath);
  const contracts = new Map<ContractName, ContractArtifact>();

  for (const entry of directory.files) {
    if (entry.type !== "File" || path.extname(entry.path) !== ".json") {
      continue;
    }
    const name = requiredContractName(path.basename(entry.path, ".json"));
    if (!name || contracts.has(name)) {
      continue;
    }
    const content = await entry.buffer();
    contracts.set(name, parseContractArtifact(name, content.toString("utf-8")));
  }

  return contracts;
}

function requiredContractName(candidate: string): ContractName | undefined {
  return REQUIRED_CONTRACTS.find((name) => name === candidate);
}

export function missingContracts(contracts: ReadonlyMap<ContractName, ContractArtifact>): ContractName[] {
  return REQUIRED_CONTRACTS.filter((name) => !contracts.has(name));
}

export function parseContractArtifact(name: ContractName, json: string): ContractArtifact {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (e) {
    throw new Error(`parse artifact ${name}: ${errorMessage(e)}`);
  }
  if (typeof parsed !== "object" || parsed === null) {
    throw new Error(`parse artifact ${name}: expected a JSON object`);
  }

  const abi = "abi" in parsed ? parsed.abi : undefined;
  if (!Array.isArray(abi)) {
    throw new Error(`parse artifact ${name}: abi must be an array`);
  }

  let contractInterface: ethers.utils.Interface;
  try {
    contractInterface = new ethers.utils.Interface(JSON.stringify(abi));
  } catch (e) {
    throw new Error(`parse artifact ${name}: invalid abi: ${errorMessage(e)}`);
  }

  return {
    name,
    abi: contractInterface,
    bytecode: normalizeBytecode(name, "bytecode" in parsed ? parsed.bytecode : undefined),
    deployedBytecode: normalizeBytecode(name, "deployedBytecode" in parsed ? parsed.deployedBytecode : undefined),
  };
}

// Compilers emit either a bare hex string or `{ object: "0x..." }`
export function normalizeBytecode(name: string, value: unknown): string {
  let raw: unknown = value;
  if (typeof value === "object" && value !== null && "object" in value) {
    raw = value.object;
  }
  if (raw === undefined || raw === null || raw === "") {
    return "0x";
  }
  if (typeof raw !== "string") {
    throw new Error(`parse artifact ${name}: bytecode must be a hex string`);
  }
  const hex = raw.startsWith("0x") ? raw : `0x${raw}`;
  if (!ethers.utils.isHexString(hex) || hex.length % 2 !== 0) {
    throw new Error(`parse artifact ${name}: bytecode is not valid hex`);
  }
  return hex.toLowerCase();
}
