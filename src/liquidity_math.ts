import { PoolError } from "./errors";
import { MAX_UINT128, mulDiv, toUint128 } from "./full_math";
import { Q96 } from "./types";

/**
 * x + y for an unsigned 128-bit liquidity and a signed delta.
 */
export function addLiquidityDelta(x: bigint, y: bigint): bigint {
  const z = x + y;
  if (z < 0n) {
    throw new PoolError("InsufficientLiquidity", "liquidity underflow", {
      liquidity: x.toString(),
      delta: y.toString(),
    });
  }
  if (z > MAX_UINT128) {
    throw new PoolError("Overflow", "liquidity overflow", {
      liquidity: x.toString(),
      delta: y.toString(),
    });
  }
  return z;
}

// L = amount0 * sqrtA * sqrtB / (sqrtB - sqrtA)
export function liquidityForAmount0(
  sqrtRatioAX96: bigint,
  sqrtRatioBX96: bigint,
  amount0: bigint
): bigint {
  const [lower, upper] =
    sqrtRatioAX96 > sqrtRatioBX96
      ? [sqrtRatioBX96, sqrtRatioAX96]
      : [sqrtRatioAX96, sqrtRatioBX96];
  const intermediate = mulDiv(lower, upper, Q96);
  return toUint128(mulDiv(amount0, intermediate, upper - lower));
}

// L = amount1 / (sqrtB - sqrtA)
export function liquidityForAmount1(
  sqrtRatioAX96: bigint,
  sqrtRatioBX96: bigint,
  amount1: bigint
): bigint {
  const [lower, upper] =
    sqrtRatioAX96 > sqrtRatioBX96
      ? [sqrtRatioBX96, sqrtRatioAX96]
      : [sqrtRatioAX96, sqrtRatioBX96];
  return toUint128(mulDiv(amount1, Q96, upper - lower));
}

/**
 * Largest liquidity that both token budgets can fund at the current price.
 */
export function liquidityForAmounts(
  sqrtPriceX96: bigint,
  sqrtRatioAX96: bigint,
  sqrtRatioBX96: bigint,
  amount0: bigint,
  amount1: bigint
): bigint {
  const [lower, upper] =
    sqrtRatioAX96 > sqrtRatioBX96
      ? [sqrtRatioBX96, sqrtRatioAX96]
      : [sqrtRatioAX96, sqrtRatioBX96];
  if (lower === upper) {
    throw new PoolError("InvalidParameters", "empty price range");
  }

  if (sqrtPriceX96 <= lower) {
    return liquidityForAmount0(lower, upper, amount0);
  }
  if (sqrtPriceX96 < upper) {
    const liquidity0 = liquidityForAmount0(sqrtPriceX96, upper, amount0);
    const liquidity1 = liquidityForAmount1(lower, sqrtPriceX96, amount1);
    return liquidity0 < liquidity1 ? liquidity0 : liquidity1;
  }
  return liquidityForAmount1(lower, upper, amount1);
}
