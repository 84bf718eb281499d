/**
 * Caller contract that settles pool callbacks by moving tokens out of a
 * payer's account. The pool never trusts it: balances are checked after every
 * callback.
 */
import { liquidityForAmounts } from "./liquidity_math";
import type { SingleRangePool } from "./pool";
import type {
  Address,
  AmountPair,
  MintCallbackHandler,
  SwapCallbackHandler,
  TokenLedger,
} from "./types";

export type PoolTokens = Pick<SingleRangePool, "address" | "token0" | "token1">;

export interface PaymentData {
  pool: PoolTokens;
  payer: Address;
}

export class PaymentRouter
  implements
    MintCallbackHandler<PaymentData>,
    SwapCallbackHandler<PaymentData>
{
  readonly address: Address;
  private readonly ledger: TokenLedger;

  constructor(address: Address, ledger: TokenLedger) {
    this.address = address;
    this.ledger = ledger;
  }

  onMint(amount0Owed: bigint, amount1Owed: bigint, data: PaymentData): void {
    this.pay(data, data.pool.token0, amount0Owed);
    this.pay(data, data.pool.token1, amount1Owed);
  }

  // only the positive delta is owed to the pool
  onSwap(amount0Delta: bigint, amount1Delta: bigint, data: PaymentData): void {
    if (amount0Delta > 0n) {
      this.pay(data, data.pool.token0, amount0Delta);
    } else if (amount1Delta > 0n) {
      this.pay(data, data.pool.token1, amount1Delta);
    }
  }

  mint(
    pool: SingleRangePool,
    payer: Address,
    recipient: Address,
    amount: bigint
  ): AmountPair {
    return pool.mint(this, recipient, amount, { pool, payer });
  }

  /**
   * Mints the most liquidity both budgets cover at the current price.
   */
  mintForAmounts(
    pool: SingleRangePool,
    payer: Address,
    recipient: Address,
    amount0Desired: bigint,
    amount1Desired: bigint
  ): AmountPair & { liquidity: bigint } {
    const liquidity = liquidityForAmounts(
      pool.sqrtPriceX96,
      pool.sqrtPriceLowerX96,
      pool.sqrtPriceUpperX96,
      amount0Desired,
      amount1Desired
    );
    return { liquidity, ...this.mint(pool, payer, recipient, liquidity) };
  }

  swap(
    pool: SingleRangePool,
    payer: Address,
    recipient: Address,
    zeroForOne: boolean,
    amountSpecified: bigint,
    sqrtPriceLimitX96: bigint
  ): AmountPair {
    return pool.swap(
      this,
      recipient,
      zeroForOne,
      amountSpecified,
      sqrtPriceLimitX96,
      { pool, payer }
    );
  }

  private pay(data: PaymentData, token: Address, amount: bigint): void {
    if (amount <= 0n) return;
    this.ledger.transfer(token, data.payer, data.pool.address, amount);
  }
}
