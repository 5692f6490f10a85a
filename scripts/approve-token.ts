import { getAddress, isAddress } from "viem";
import { mergeConfig } from "../src/config.js";
import { createOrderPipeline } from "../src/index.js";
import { getContracts } from "../src/gmx/contracts.js";
import { describeError } from "../src/utils/errors.js";
import { scaleToUnits } from "../src/utils/units.js";

/**
 * Raise the router allowance for a token to an exact amount.
 *
 * Usage: tsx scripts/approve-token.ts <tokenAddress> <amount> <decimals>
 */
async function main() {
  const [token, amount, decimals] = process.argv.slice(2);
  if (!token || !isAddress(token, { strict: false }) || !amount || !decimals) {
    throw new Error("Usage: approve-token.ts <tokenAddress> <amount> <decimals>");
  }

  const config = mergeConfig("arbitrum", { autoApprove: true });
  const pipeline = await createOrderPipeline(config);
  const contracts = getContracts(config.chain);

  const outcome = await pipeline.ensureAllowance({
    owner: config.walletAddress,
    spender: contracts.syntheticsRouter,
    token: getAddress(token),
    requiredAmount: scaleToUnits(amount, Number.parseInt(decimals, 10)),
    maxFeePerGas: await pipeline.resolveMaxFeePerGas(),
    autoApprove: true,
  });

  if (outcome.status === "approved") {
    console.log(`Approval submitted: ${outcome.txHash}`);
  } else {
    console.log(`Allowance already sufficient: ${outcome.allowance}`);
  }
}

main().catch((error: unknown) => {
  console.error(describeError(error));
  process.exitCode = 1;
});
