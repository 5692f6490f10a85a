import { mergeConfig } from "../src/config.js";
import { createOrderPipeline } from "../src/index.js";
import type { OrderRequest } from "../src/types.js";
import { describeError } from "../src/utils/errors.js";

/**
 * Dry-run an order: resolve, price, budget and sign it without broadcasting.
 *
 * Usage: tsx scripts/simulate-order.ts <long|short> <indexSymbol> <sizeUsd> <leverage> [collateralSymbol]
 * Reads GMX_* variables for the connection (see src/config.ts).
 */
async function main() {
  const [direction = "long", indexTokenSymbol = "ETH", size = "10", leverage = "2", collateral] =
    process.argv.slice(2);

  const config = mergeConfig("arbitrum", { mode: "simulate" });
  const pipeline = await createOrderPipeline(config);

  const request: OrderRequest = {
    kind: "increase",
    chain: config.chain,
    indexTokenSymbol,
    isLong: direction !== "short",
    sizeDeltaUsd: Number(size),
    leverage: Number(leverage),
    ...(collateral ? { collateralTokenSymbol: collateral } : {}),
  };

  const result = await pipeline.submitOrder(request, "simulate");

  console.log(`Stage:            ${result.stage}`);
  console.log(`Market:           ${result.order.kind === "swap" ? "-" : result.order.marketKey}`);
  console.log(`Acceptable price: ${result.price.acceptablePriceUsd.toString()} USD`);
  console.log(`Gas limit:        ${result.gas.gasLimit}`);
  console.log(`Max fee per gas:  ${result.gas.maxFeePerGas}`);
  console.log(`Execution fee:    ${result.gas.executionFee}`);
  console.log(`Value:            ${result.envelope.value}`);
  console.log(`Nonce:            ${result.envelope.nonce}`);
  console.log(`Tx hash (unsent): ${result.signed.hash}`);
}

main().catch((error: unknown) => {
  console.error(describeError(error));
  process.exitCode = 1;
});
