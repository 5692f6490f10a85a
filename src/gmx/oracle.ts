import { type Address, getAddress, isAddress } from "viem";
import type { PriceQuote } from "../types.js";
import { PriceUnavailableError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import { type GmxApiClient, isRecord } from "./http.js";
import type { PriceOracleFeed } from "./types.js";

const log = logger.child("oracle");

const RAW_PRICE = /^\d+$/;

/**
 * Oracle feed backed by `GET /signed_prices/latest`.
 * minPriceFull is the bid, maxPriceFull the ask.
 */
export class GmxOracleFeed implements PriceOracleFeed {
  constructor(private readonly api: GmxApiClient) {}

  async getSnapshot(): Promise<ReadonlyMap<Address, PriceQuote>> {
    const body = await this.api.get("/signed_prices/latest");
    if (!isRecord(body) || !Array.isArray(body.signedPrices)) {
      throw new PriceUnavailableError(undefined, "unexpected /signed_prices/latest payload");
    }

    const snapshot = new Map<Address, PriceQuote>();
    for (const entry of body.signedPrices) {
      if (!isRecord(entry)) {
        continue;
      }
      const { tokenAddress, minPriceFull, maxPriceFull } = entry;
      if (
        typeof tokenAddress !== "string" ||
        !isAddress(tokenAddress, { strict: false }) ||
        typeof minPriceFull !== "string" ||
        typeof maxPriceFull !== "string" ||
        !RAW_PRICE.test(minPriceFull) ||
        !RAW_PRICE.test(maxPriceFull)
      ) {
        log.warn("Skipping malformed price entry", entry);
        continue;
      }
      const address = getAddress(tokenAddress);
      snapshot.set(address, { tokenAddress: address, bid: minPriceFull, ask: maxPriceFull });
    }

    log.debug(`Oracle snapshot with ${snapshot.size} prices`);
    return snapshot;
  }
}
