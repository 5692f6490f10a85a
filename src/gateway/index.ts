export { ViemLedgerGateway, createLedgerClient } from "./client.js";
export type { LedgerClient } from "./client.js";
export { LocalKeySigner } from "./signer.js";
export type {
  ContractCall,
  KeySigner,
  LedgerGateway,
  SignedSerialized,
  UnsignedTransaction,
} from "./types.js";
