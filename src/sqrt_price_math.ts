/**
 * Token amounts for a liquidity change over a sqrt-price interval, and the
 * next sqrt price after adding/removing an amount at a given liquidity.
 *
 * Rounding always favours the pool: amounts owed to the pool round up,
 * amounts paid out round down, and the price moves no further than the
 * amount actually covers.
 */
import { PoolError } from "./errors";
import {
  MAX_UINT256,
  divRoundingUp,
  mulDiv,
  mulDivRoundingUp,
  toInt256,
  toUint160,
} from "./full_math";
import { Q96 } from "./types";

function sortBounds(a: bigint, b: bigint): [bigint, bigint] {
  return a > b ? [b, a] : [a, b];
}

/**
 * amount0 = L * (sqrtB - sqrtA) / (sqrtA * sqrtB)
 */
export function amount0Delta(
  sqrtRatioAX96: bigint,
  sqrtRatioBX96: bigint,
  liquidity: bigint,
  roundUp: boolean
): bigint {
  const [lower, upper] = sortBounds(sqrtRatioAX96, sqrtRatioBX96);
  if (lower <= 0n) {
    throw new PoolError("Overflow", "sqrt price must be positive");
  }

  const numerator1 = liquidity << 96n;
  const numerator2 = upper - lower;

  return roundUp
    ? divRoundingUp(mulDivRoundingUp(numerator1, numerator2, upper), lower)
    : mulDiv(numerator1, numerator2, upper) / lower;
}

/**
 * amount1 = L * (sqrtB - sqrtA)
 */
export function amount1Delta(
  sqrtRatioAX96: bigint,
  sqrtRatioBX96: bigint,
  liquidity: bigint,
  roundUp: boolean
): bigint {
  const [lower, upper] = sortBounds(sqrtRatioAX96, sqrtRatioBX96);
  return roundUp
    ? mulDivRoundingUp(liquidity, upper - lower, Q96)
    : mulDiv(liquidity, upper - lower, Q96);
}

/**
 * Signed token0 amount for a liquidity delta: positive when the pool is owed
 * (rounded up), negative when the pool pays (magnitude rounded down).
 */
export function signedAmount0Delta(
  sqrtRatioAX96: bigint,
  sqrtRatioBX96: bigint,
  liquidityDelta: bigint
): bigint {
  if (liquidityDelta < 0n) {
    return -toInt256(
      amount0Delta(sqrtRatioAX96, sqrtRatioBX96, -liquidityDelta, false)
    );
  }
  return toInt256(
    amount0Delta(sqrtRatioAX96, sqrtRatioBX96, liquidityDelta, true)
  );
}

export function signedAmount1Delta(
  sqrtRatioAX96: bigint,
  sqrtRatioBX96: bigint,
  liquidityDelta: bigint
): bigint {
  if (liquidityDelta < 0n) {
    return -toInt256(
      amount1Delta(sqrtRatioAX96, sqrtRatioBX96, -liquidityDelta, false)
    );
  }
  return toInt256(
    amount1Delta(sqrtRatioAX96, sqrtRatioBX96, liquidityDelta, true)
  );
}

/**
 * Next sqrt price after adding (price falls) or removing (price rises)
 * `amount` of token0. Rounded up so the price never overshoots.
 */
export function nextSqrtPriceFromAmount0RoundingUp(
  sqrtPriceX96: bigint,
  liquidity: bigint,
  amount: bigint,
  add: boolean
): bigint {
  if (amount === 0n) return sqrtPriceX96;
  const numerator1 = liquidity << 96n;
  const product = amount * sqrtPriceX96;

  if (add) {
    if (product <= MAX_UINT256) {
      const denominator = numerator1 + product;
      if (denominator <= MAX_UINT256) {
        return mulDivRoundingUp(numerator1, sqrtPriceX96, denominator);
      }
    }
    return divRoundingUp(numerator1, numerator1 / sqrtPriceX96 + amount);
  }

  if (product > MAX_UINT256 || numerator1 <= product) {
    throw new PoolError("Overflow", "token0 output exceeds reserves", {
      amount: amount.toString(),
    });
  }
  return toUint160(
    mulDivRoundingUp(numerator1, sqrtPriceX96, numerator1 - product)
  );
}

/**
 * Next sqrt price after adding (price rises) or removing (price falls)
 * `amount` of token1. Rounded down so the price never overshoots.
 */
export function nextSqrtPriceFromAmount1RoundingDown(
  sqrtPriceX96: bigint,
  liquidity: bigint,
  amount: bigint,
  add: boolean
): bigint {
  if (add) {
    return toUint160(sqrtPriceX96 + mulDiv(amount, Q96, liquidity));
  }

  const quotient = mulDivRoundingUp(amount, Q96, liquidity);
  if (sqrtPriceX96 <= quotient) {
    throw new PoolError("Overflow", "token1 output exceeds reserves", {
      amount: amount.toString(),
    });
  }
  return sqrtPriceX96 - quotient;
}

function assertPriceAndLiquidity(sqrtPriceX96: bigint, liquidity: bigint) {
  if (sqrtPriceX96 <= 0n) {
    throw new PoolError("Overflow", "sqrt price must be positive");
  }
  if (liquidity <= 0n) {
    throw new PoolError("InsufficientLiquidity", "no liquidity to trade");
  }
}

export function nextSqrtPriceFromInput(
  sqrtPriceX96: bigint,
  liquidity: bigint,
  amountIn: bigint,
  zeroForOne: boolean
): bigint {
  assertPriceAndLiquidity(sqrtPriceX96, liquidity);
  return zeroForOne
    ? nextSqrtPriceFromAmount0RoundingUp(
        sqrtPriceX96,
        liquidity,
        amountIn,
        true
      )
    : nextSqrtPriceFromAmount1RoundingDown(
        sqrtPriceX96,
        liquidity,
        amountIn,
        true
      );
}

export function nextSqrtPriceFromOutput(
  sqrtPriceX96: bigint,
  liquidity: bigint,
  amountOut: bigint,
  zeroForOne: boolean
): bigint {
  assertPriceAndLiquidity(sqrtPriceX96, liquidity);
  return zeroForOne
    ? nextSqrtPriceFromAmount1RoundingDown(
        sqrtPriceX96,
        liquidity,
        amountOut,
        false
      )
    : nextSqrtPriceFromAmount0RoundingUp(
        sqrtPriceX96,
        liquidity,
        amountOut,
        false
      );
}
