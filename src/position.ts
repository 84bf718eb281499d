/**
 * Per-owner liquidity and fee bookkeeping.
 *
 * Fees owed = liquidity * (feeGrowthInside_now - feeGrowthInside_last) / 2^128
 */
import { PoolError } from "./errors";
import { mulDiv, toUint128 } from "./full_math";
import { addLiquidityDelta } from "./liquidity_math";
import { Q128, type Address, type AmountPair } from "./types";

export interface PositionInfo {
  liquidity: bigint;
  feeGrowthInside0LastX128: bigint;
  feeGrowthInside1LastX128: bigint;
  tokensOwed0: bigint;
  tokensOwed1: bigint;
}

export interface FeeGrowthInside {
  feeGrowthInside0X128: bigint;
  feeGrowthInside1X128: bigint;
}

/**
 * Answers how much fee each unit of liquidity in [tickLower, tickUpper) has
 * earned. A pool with one range returns its global accumulators; a
 * multi-range pool would subtract the growth outside both bounds.
 */
export interface FeeGrowthSource {
  feeGrowthInside(tickLower: number, tickUpper: number): FeeGrowthInside;
}

export const EMPTY_POSITION: Readonly<PositionInfo> = Object.freeze({
  liquidity: 0n,
  feeGrowthInside0LastX128: 0n,
  feeGrowthInside1LastX128: 0n,
  tokensOwed0: 0n,
  tokensOwed1: 0n,
});

/**
 * Credits fees earned since the last snapshot, moves the snapshot forward,
 * then applies `liquidityDelta`. Returns the updated record.
 */
export function settlePosition(
  position: PositionInfo,
  liquidityDelta: bigint,
  feeGrowthInside0X128: bigint,
  feeGrowthInside1X128: bigint
): PositionInfo {
  const liquidity = addLiquidityDelta(position.liquidity, liquidityDelta);

  const growth0 = feeGrowthInside0X128 - position.feeGrowthInside0LastX128;
  const growth1 = feeGrowthInside1X128 - position.feeGrowthInside1LastX128;
  if (growth0 < 0n || growth1 < 0n) {
    throw new PoolError("Overflow", "fee growth moved backwards", {
      growth0: growth0.toString(),
      growth1: growth1.toString(),
    });
  }

  const fees0 = mulDiv(growth0, position.liquidity, Q128);
  const fees1 = mulDiv(growth1, position.liquidity, Q128);

  return {
    liquidity,
    feeGrowthInside0LastX128: feeGrowthInside0X128,
    feeGrowthInside1LastX128: feeGrowthInside1X128,
    tokensOwed0: toUint128(position.tokensOwed0 + fees0),
    tokensOwed1: toUint128(position.tokensOwed1 + fees1),
  };
}

/**
 * Adds burned principal to what the owner can withdraw.
 */
export function creditOwed(
  position: PositionInfo,
  amounts: AmountPair
): PositionInfo {
  if (amounts.amount0 < 0n || amounts.amount1 < 0n) {
    throw new PoolError("InvalidAmount", "owed credit must be non-negative");
  }
  return {
    ...position,
    tokensOwed0: toUint128(position.tokensOwed0 + amounts.amount0),
    tokensOwed1: toUint128(position.tokensOwed1 + amounts.amount1),
  };
}

/**
 * Splits a position into what can be paid now (capped by the request) and
 * the record left behind.
 */
export function takeOwed(
  position: PositionInfo,
  amount0Requested: bigint,
  amount1Requested: bigint
): { paid: AmountPair; position: PositionInfo } {
  if (amount0Requested < 0n || amount1Requested < 0n) {
    throw new PoolError("InvalidAmount", "requested amount is negative");
  }
  const amount0 =
    amount0Requested > position.tokensOwed0
      ? position.tokensOwed0
      : amount0Requested;
  const amount1 =
    amount1Requested > position.tokensOwed1
      ? position.tokensOwed1
      : amount1Requested;
  return {
    paid: { amount0, amount1 },
    position: {
      ...position,
      tokensOwed0: position.tokensOwed0 - amount0,
      tokensOwed1: position.tokensOwed1 - amount1,
    },
  };
}

/**
 * Positions keyed by owner. Reads of an unknown owner see an empty position;
 * records are never deleted.
 */
export class PositionTable {
  private positions: Map<Address, PositionInfo> = new Map();

  get(owner: Address): PositionInfo {
    return this.positions.get(owner) ?? { ...EMPTY_POSITION };
  }

  set(owner: Address, position: PositionInfo): void {
    this.positions.set(owner, { ...position });
  }

  has(owner: Address): boolean {
    return this.positions.has(owner);
  }

  entries(): Array<[Address, PositionInfo]> {
    return Array.from(this.positions.entries(), ([owner, position]) => [
      owner,
      { ...position },
    ]);
  }

  snapshot(): Map<Address, PositionInfo> {
    return new Map(this.positions);
  }

  restore(snapshot: Map<Address, PositionInfo>): void {
    this.positions = new Map(snapshot);
  }
}
