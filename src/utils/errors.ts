/**
 * Error taxonomy for the order pipeline.
 *
 * Every rejection names the field or threshold that failed and carries the
 * observed and required values in `context`. Nothing here is retried by the
 * pipeline; callers decide whether to start a fresh run.
 */

import type { Address } from "viem";

export enum ErrorCategory {
  VALIDATION = "ERROR_VALIDATION", // Request incomplete or inconsistent
  PREFLIGHT = "ERROR_PREFLIGHT", // Balance / allowance checks
  BUSINESS_RULE = "ERROR_BUSINESS_RULE", // Collateral floor, leverage cap
  ORACLE = "ERROR_ORACLE",
  SUBMISSION = "ERROR_SUBMISSION",
  CONFIGURATION = "ERROR_CONFIGURATION",
}

/**
 * Base error class with category and context
 */
export class OrderPipelineError extends Error {
  public readonly category: ErrorCategory;
  public readonly context: Record<string, unknown>;
  public readonly timestamp: number;

  constructor(
    message: string,
    category: ErrorCategory,
    context: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.category = category;
    this.context = context;
    this.timestamp = Date.now();
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      category: this.category,
      context: this.context,
      timestamp: this.timestamp,
    };
  }
}

export interface MissingFieldDetail {
  field: string;
  reason: string;
}

export class MissingFieldError extends OrderPipelineError {
  public readonly fields: readonly MissingFieldDetail[];

  constructor(fields: readonly MissingFieldDetail[]) {
    const summary = fields.map((f) => `${f.field} (${f.reason})`).join("; ");
    super(`Missing order fields: ${summary}`, ErrorCategory.VALIDATION, {
      fields: fields.map((f) => f.field),
    });
    this.fields = fields;
  }

  get fieldNames(): string[] {
    return this.fields.map((f) => f.field);
  }
}

export class InsufficientBalanceError extends OrderPipelineError {
  constructor(
    public readonly token: Address,
    public readonly owner: Address,
    public readonly observed: bigint,
    public readonly required: bigint
  ) {
    super(
      `Insufficient balance of ${token} for ${owner}: have ${observed}, need ${required}`,
      ErrorCategory.PREFLIGHT,
      { token, owner, observed: observed.toString(), required: required.toString() }
    );
  }
}

export class AllowanceTooLowError extends OrderPipelineError {
  constructor(
    public readonly token: Address,
    public readonly spender: Address,
    public readonly observed: bigint,
    public readonly required: bigint
  ) {
    super(
      `Allowance of ${token} for spender ${spender} is ${observed}, need ${required}; approve it first`,
      ErrorCategory.PREFLIGHT,
      { token, spender, observed: observed.toString(), required: required.toString() }
    );
  }
}

export class CollateralTooLowError extends OrderPipelineError {
  constructor(
    public readonly observedUsd: number,
    public readonly requiredUsd: number
  ) {
    super(
      `Collateral worth $${observedUsd} is below the $${requiredUsd} minimum`,
      ErrorCategory.BUSINESS_RULE,
      { field: "initialCollateralDelta", observedUsd, requiredUsd }
    );
  }
}

export class LeverageExceededError extends OrderPipelineError {
  constructor(
    public readonly observed: number,
    public readonly maximum: number
  ) {
    super(`Leverage ${observed}x exceeds the ${maximum}x maximum`, ErrorCategory.BUSINESS_RULE, {
      field: "leverage",
      observed,
      maximum,
    });
  }
}

export class PriceUnavailableError extends OrderPipelineError {
  constructor(
    public readonly token: Address | undefined,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(
      token ? `No oracle price for ${token}: ${detail}` : `Oracle prices unavailable: ${detail}`,
      ErrorCategory.ORACLE,
      { token },
      options
    );
  }
}

export class SubmissionFailedError extends OrderPipelineError {
  constructor(
    public readonly nonce: number,
    cause: unknown
  ) {
    const reason = describeError(cause);
    super(
      `Gateway rejected transaction with nonce ${nonce}: ${reason}`,
      ErrorCategory.SUBMISSION,
      { nonce, reason },
      { cause }
    );
  }
}

export class ConfigurationError extends OrderPipelineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCategory.CONFIGURATION, context);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
