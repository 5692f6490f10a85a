export * from "./abis.js";
export * from "./contracts.js";
export * from "./gas-limits.js";
export { GmxApiClient } from "./http.js";
export * from "./markets.js";
export * from "./oracle.js";
export * from "./tokens.js";
export type * from "./types.js";
