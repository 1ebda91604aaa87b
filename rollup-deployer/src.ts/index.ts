export * from "./abi";
export * from "./artifact-generator";
export * from "./artifacts";
export * from "./certificates";
export * from "./chain-client";
export * from "./chain-config";
export * from "./config";
export * from "./constants";
export * from "./deploy-config";
export * from "./deployment-runner";
export * from "./errors";
export * from "./file-repository";
export * from "./infrastructure";
export * from "./orchestrator";
export * from "./repository";
export * from "./rollup";
export * from "./signer";
export * from "./utils";
