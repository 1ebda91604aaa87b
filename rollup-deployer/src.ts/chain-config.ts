import { ethers } from "ethers";

import { INITIAL_ARBOS_VERSION, type DataAvailabilityMode } from "./constants";

export interface ArbitrumChainParams {
  EnableArbOS: boolean;
  AllowDebugPrecompiles: boolean;
  DataAvailabilityCommittee: boolean;
  InitialArbOSVersion: number;
  InitialChainOwner: string;
  GenesisBlockNum: number;
}

export interface ChainConfig {
  chainId: number;
  homesteadBlock: number;
  daoForkBlock: null;
  daoForkSupport: boolean;
  eip150Block: number;
  eip150Hash: string;
  eip155Block: number;
  eip158Block: number;
  byzantiumBlock: number;
  constantinopleBlock: number;
  petersburgBlock: number;
  istanbulBlock: number;
  muirGlacierBlock: number;
  berlinBlock: number;
  londonBlock: number;
  clique: { period: number; epoch: number };
  arbitrum: ArbitrumChainParams;
}

export interface ChainConfigParams {
  chainId: number;
  owner: string;
  dataAvailability: DataAvailabilityMode;
}

// Celestia batches are posted through the committee path, so only plain rollup mode disables it
export function usesDataAvailabilityCommittee(mode: DataAvailabilityMode): boolean {
  return mode !== "rollup";
}

export function prepareChainConfig(params: ChainConfigParams): ChainConfig {
  return {
    chainId: params.chainId,
    homesteadBlock: 0,
    daoForkBlock: null,
    daoForkSupport: true,
    eip150Block: 0,
    eip150Hash: ethers.constants.HashZero,
    eip155Block: 0,
    eip158Block: 0,
    byzantiumBlock: 0,
    constantinopleBlock: 0,
    petersburgBlock: 0,
    istanbulBlock: 0,
    muirGlacierBlock: 0,
    berlinBlock: 0,
    londonBlock: 0,
    clique: { period: 0, epoch: 0 },
    arbitrum: {
      EnableArbOS: true,
      AllowDebugPrecompiles: false,
      DataAvailabilityCommittee: usesDataAvailabilityCommittee(params.dataAvailability),
      InitialArbOSVersion: INITIAL_ARBOS_VERSION,
      InitialChainOwner: ethers.utils.getAddress(params.owner),
      GenesisBlockNum: 0,
    },
  };
}
