import { logger } from "../utils/logger.js";

const log = logger.child("gmx-api");

/**
 * GMX API Client
 * HTTP client for the GMX infra REST API (tokens, signed oracle prices)
 */
export class GmxApiClient {
  private readonly baseUrl: string;

  /**
   * Create a new GMX API client
   * @param baseUrl - Base URL for the chain's API (e.g., https://arbitrum-api.gmxinfra.io)
   */
  constructor(baseUrl: string) {
    if (!baseUrl) {
      throw new Error("GMX API base URL is required");
    }
    this.baseUrl = baseUrl;
    log.info(`GmxApiClient initialized with base URL: ${this.baseUrl}`);
  }

  /**
   * Make a GET request to the GMX API
   * @param endpoint - API endpoint path (e.g., /tokens)
   * @returns Parsed JSON body; callers validate its shape
   */
  async get(endpoint: string): Promise<unknown> {
    const url = new URL(endpoint, this.baseUrl);

    log.debug(`GET ${url.toString()}`);

    try {
      const response = await fetch(url.toString(), {
        method: "GET",
        headers: {
          Accept: "application/json",
        },
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(
          `GMX API GET ${endpoint} failed: ${response.status} ${response.statusText} - ${errorText}`
        );
      }

      return await response.json();
    } catch (error) {
      log.error(`GMX API GET ${endpoint} error:`, error);
      throw error;
    }
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
