import { getAddress, isAddress } from "viem";
import type { TokenInfo } from "../types.js";
import { logger } from "../utils/logger.js";
import { type GmxApiClient, isRecord } from "./http.js";
import type { TokenRegistry } from "./types.js";

const log = logger.child("tokens");

function parseToken(entry: unknown): TokenInfo | undefined {
  if (!isRecord(entry)) {
    return undefined;
  }
  const { symbol, address, decimals, synthetic } = entry;
  if (
    typeof symbol !== "string" ||
    typeof address !== "string" ||
    !isAddress(address, { strict: false }) ||
    typeof decimals !== "number" ||
    !Number.isInteger(decimals)
  ) {
    return undefined;
  }
  return {
    symbol,
    address: getAddress(address),
    decimals,
    ...(synthetic === true ? { synthetic: true } : {}),
  };
}

/**
 * Token registry backed by `GET /tokens`
 */
export class GmxTokenRegistry implements TokenRegistry {
  constructor(private readonly api: GmxApiClient) {}

  async getTokens(): Promise<TokenInfo[]> {
    const body = await this.api.get("/tokens");
    if (!isRecord(body) || !Array.isArray(body.tokens)) {
      throw new Error("GMX API /tokens returned an unexpected payload");
    }

    const tokens: TokenInfo[] = [];
    for (const entry of body.tokens) {
      const token = parseToken(entry);
      if (token) {
        tokens.push(token);
      } else {
        log.warn("Skipping malformed token entry", entry);
      }
    }

    log.debug(`Loaded ${tokens.length} tokens`);
    return tokens;
  }
}
