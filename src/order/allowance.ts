import {
  type Address,
  type Hash,
  encodeFunctionData,
  erc20Abi,
  getAddress,
  isAddressEqual,
} from "viem";
import type { KeySigner, LedgerGateway } from "../gateway/types.js";
import {
  AllowanceTooLowError,
  ConfigurationError,
  InsufficientBalanceError,
  SubmissionFailedError,
} from "../utils/errors.js";
import { logger } from "../utils/logger.js";

const log = logger.child("allowance");

/** Fixed gas limit for approval transactions */
export const APPROVAL_GAS_LIMIT = 4_000_000n;

/**
 * Token addresses that must be queried under a different contract.
 * The synthetic BTC index token's allowance and balance live on WBTC.b.
 */
const LEGACY_TOKEN_ALIASES: ReadonlyMap<Address, Address> = new Map([
  [
    getAddress("0x47904963fc8b2340414262125af798b9655e58cd"),
    getAddress("0x2f2a2543b76a4166549f7aab2e75bef0aefc5b0f"),
  ],
]);

export interface EnsureAllowanceParams {
  owner: Address;
  spender: Address;
  token: Address;
  requiredAmount: bigint;
  maxFeePerGas: bigint;
  autoApprove: boolean;
}

export type AllowanceOutcome =
  | { status: "sufficient"; token: Address; allowance: bigint }
  | { status: "approved"; token: Address; txHash: Hash };

export interface AllowanceManagerOptions {
  gateway: LedgerGateway;
  signer: KeySigner;
  wrappedNativeToken: Address;
}

/**
 * Verifies balance and spending allowance, raising the allowance with an
 * exact-amount approval when permitted
 */
export class AllowanceManager {
  private readonly gateway: LedgerGateway;
  private readonly signer: KeySigner;
  private readonly wrappedNativeToken: Address;

  constructor(options: AllowanceManagerOptions) {
    this.gateway = options.gateway;
    this.signer = options.signer;
    this.wrappedNativeToken = options.wrappedNativeToken;
  }

  async ensureAllowance(params: EnsureAllowanceParams): Promise<AllowanceOutcome> {
    const { owner, spender, requiredAmount, maxFeePerGas, autoApprove } = params;
    const token = LEGACY_TOKEN_ALIASES.get(getAddress(params.token)) ?? getAddress(params.token);

    // 1. Balance: wrapped native is funded from the native balance
    const balance = isAddressEqual(token, this.wrappedNativeToken)
      ? await this.gateway.getNativeBalance(owner)
      : await this.gateway.getTokenBalance(token, owner);
    if (balance < requiredAmount) {
      throw new InsufficientBalanceError(token, owner, balance, requiredAmount);
    }

    // 2. Allowance
    const allowance = await this.gateway.getAllowance(token, owner, spender);
    if (allowance >= requiredAmount) {
      log.debug(`Allowance of ${token} sufficient: ${allowance} >= ${requiredAmount}`);
      return { status: "sufficient", token, allowance };
    }

    if (!autoApprove) {
      throw new AllowanceTooLowError(token, spender, allowance, requiredAmount);
    }

    // 3. Approve exactly the required amount
    if (!isAddressEqual(owner, this.signer.address)) {
      throw new ConfigurationError(`Signer ${this.signer.address} cannot approve for ${owner}`, {
        owner,
        signer: this.signer.address,
      });
    }

    const nonce = await this.gateway.getNonce(owner);
    const serialized = await this.signer.signTransaction({
      type: "eip1559",
      chainId: this.gateway.chainId,
      to: token,
      data: encodeFunctionData({
        abi: erc20Abi,
        functionName: "approve",
        args: [spender, requiredAmount],
      }),
      value: 0n,
      gas: APPROVAL_GAS_LIMIT,
      maxFeePerGas,
      maxPriorityFeePerGas: 0n,
      nonce,
    });

    log.info(`Approving ${requiredAmount} of ${token} for ${spender} (nonce ${nonce})`);
    let txHash: Hash;
    try {
      txHash = await this.gateway.submit(serialized);
    } catch (error) {
      throw new SubmissionFailedError(nonce, error);
    }

    log.info(`Approval submitted: ${txHash}`);
    return { status: "approved", token, txHash };
  }
}
