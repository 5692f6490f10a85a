// Order pipeline components
export { AllowanceManager, APPROVAL_GAS_LIMIT } from "./allowance.js";
export type { AllowanceManagerOptions, AllowanceOutcome, EnsureAllowanceParams } from "./allowance.js";
export { OrderBuilder, StageTracker } from "./builder.js";
export type { OrderBuilderOptions } from "./builder.js";
export { GasBudgeter, computeExecutionFee } from "./gas-budget.js";
export type { ExecutionFeeInput, GasBudgetConfig } from "./gas-budget.js";
export { computeExecutionPrice, estimateSwapOutput, medianOf, quoteFor } from "./pricing.js";
export type { ExecutionPriceInput, SwapOutputInput } from "./pricing.js";
export {
  DEFAULT_SLIPPAGE,
  MIN_COLLATERAL_USD,
  OrderResolver,
  REQUIRED_FIELDS,
  findSwapPath,
} from "./resolver.js";
export type { OrderResolverOptions, RegistrySnapshot } from "./resolver.js";
