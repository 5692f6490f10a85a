import { type Address, getAddress } from "viem";
import type { ChainName } from "../types.js";

/**
 * GMX v2 synthetics deployment used by the order pipeline
 */
export interface ContractAddresses {
  exchangeRouter: Address;
  syntheticsRouter: Address; // Spender for token approvals
  orderVault: Address;
  dataStore: Address;
  reader: Address;
  wrappedNativeToken: Address; // Collateral paid as native value instead of an ERC-20 transfer
}

const DEPLOYMENTS: Record<ChainName, Record<keyof ContractAddresses, string>> = {
  arbitrum: {
    exchangeRouter: "0x7c68c7866a64fa2160f78eeae12217ffbf871fa8",
    syntheticsRouter: "0x7452c558d45f8afc8c83dae62c3f8a5be19c71f6",
    orderVault: "0x31ef83a530fde1b38ee9a18093a333d8bbbc40d5",
    dataStore: "0xfd70de6b91282d8017aa4e741e9ae325cab992d8",
    reader: "0xf60becbba223eea9495da3f606753867ec10d139",
    wrappedNativeToken: "0x82af49447d8a07e3bd95bd0d56f35241523fbab1", // WETH
  },
  avalanche: {
    exchangeRouter: "0x11e590f6092d557bf71baded50d81521674f8275",
    syntheticsRouter: "0x820f5ffc5b525cd4d88cd91acf2c28f16530cc68",
    orderVault: "0xd3d60d22d415ad43b7e64b510d86a30f19b1b12c",
    dataStore: "0x2f0b22339414aded7d5f06f9d604c7ff5b2fe3f6",
    reader: "0x73ba021acf4bb6741e82690ddb821e7936050f8c",
    wrappedNativeToken: "0xb31f66aa3c1e785363f0875a1b74e27b85fd66c7", // WAVAX
  },
};

/**
 * Checksummed contract addresses for a chain
 */
export function getContracts(chain: ChainName): ContractAddresses {
  const raw = DEPLOYMENTS[chain];
  return {
    exchangeRouter: getAddress(raw.exchangeRouter),
    syntheticsRouter: getAddress(raw.syntheticsRouter),
    orderVault: getAddress(raw.orderVault),
    dataStore: getAddress(raw.dataStore),
    reader: getAddress(raw.reader),
    wrappedNativeToken: getAddress(raw.wrappedNativeToken),
  };
}
