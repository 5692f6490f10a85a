import type { PipelineConfig } from "../config.js";
import type { LedgerGateway } from "../gateway/types.js";
import type { GasLimitTable } from "../gmx/types.js";
import { type GasPlan, ORDER_KINDS, type OrderKind } from "../types.js";
import { mapWithConcurrency } from "../utils/fan-out.js";
import { logger } from "../utils/logger.js";
import { USD_DECIMALS, shiftDecimals, toBigInt, toDecimal } from "../utils/units.js";

const log = logger.child("gas");

/** Fee cap over the current base fee, as a percentage */
const BASE_FEE_HEADROOM_PERCENT = 135n;

export type GasBudgetConfig = Pick<
  PipelineConfig,
  "maxFeePerGas" | "executionBuffer" | "readConcurrency"
>;

export interface ExecutionFeeInput {
  baseGasLimit: bigint;
  estimatedGasLimit: bigint;
  multiplierFactor: bigint; // 30-decimal fixed point
  gasPrice: bigint;
  executionBuffer: number;
}

/**
 * Keeper execution fee:
 * floor((base + estimate × multiplier / 10^30) × gasPrice × buffer)
 */
export function computeExecutionFee(input: ExecutionFeeInput): bigint {
  const adjustedGas = toDecimal(input.baseGasLimit.toString()).plus(
    shiftDecimals(
      toDecimal(input.estimatedGasLimit.toString()).times(input.multiplierFactor.toString()),
      -USD_DECIMALS
    )
  );
  return toBigInt(
    adjustedGas.times(input.gasPrice.toString()).times(input.executionBuffer)
  );
}

/**
 * Per-kind gas plan: call-gas ceiling, fee caps and keeper execution fee
 */
export class GasBudgeter {
  constructor(
    private readonly gateway: LedgerGateway,
    private readonly gasLimits: GasLimitTable,
    private readonly config: GasBudgetConfig
  ) {}

  /**
   * Fee cap: explicit override, else 1.35 × current base fee
   */
  async resolveMaxFeePerGas(): Promise<bigint> {
    if (this.config.maxFeePerGas !== undefined) {
      return this.config.maxFeePerGas;
    }
    const baseFee = await this.gateway.getBaseFee();
    return (baseFee * BASE_FEE_HEADROOM_PERCENT) / 100n;
  }

  async budget(kind: OrderKind): Promise<GasPlan> {
    const { gasLimitKey } = ORDER_KINDS[kind];

    const reads: Array<() => Promise<bigint>> = [
      () => this.gasLimits.getLimit(gasLimitKey),
      () => this.gasLimits.getLimit("estimated_fee_base_gas_limit"),
      () => this.gasLimits.getLimit("estimated_fee_multiplier_factor"),
      () => this.resolveMaxFeePerGas(),
      () => this.gateway.getGasPrice(),
    ];
    const [baseEstimate, baseGasLimit, multiplierFactor, maxFeePerGas, gasPrice] =
      await mapWithConcurrency(reads, this.config.readConcurrency, (read) => read());

    if (baseEstimate <= 0n) {
      throw new RangeError(`Gas limit for ${gasLimitKey} must be positive, got ${baseEstimate}`);
    }

    const plan: GasPlan = {
      orderKind: kind,
      gasLimitKey,
      baseEstimate,
      gasLimit: baseEstimate * 2n,
      maxFeePerGas,
      maxPriorityFeePerGas: 0n,
      executionFee: computeExecutionFee({
        baseGasLimit,
        estimatedGasLimit: baseEstimate,
        multiplierFactor,
        gasPrice,
        executionBuffer: this.config.executionBuffer,
      }),
    };

    log.debug(`Gas plan for ${kind}`, plan);
    return plan;
  }
}
