/**
 * One step of a swap inside a single liquidity interval.
 */
import { mulDiv, mulDivRoundingUp } from "./full_math";
import {
  amount0Delta,
  amount1Delta,
  nextSqrtPriceFromInput,
  nextSqrtPriceFromOutput,
} from "./sqrt_price_math";
import { PPM } from "./types";

export interface SwapStep {
  sqrtPriceNextX96: bigint;
  amountIn: bigint; // excludes fee
  amountOut: bigint;
  feeAmount: bigint;
}

const FEE_DENOMINATOR = BigInt(PPM);

/**
 * Moves the price from `sqrtPriceCurrentX96` toward `sqrtPriceTargetX96`,
 * spending at most `amountRemaining` (exact input when positive, exact
 * output when negative). The direction is implied by the two prices.
 *
 * The uncapped move is tried first; if it would pass the target, the step
 * stops on the target and amounts are recomputed for that bound.
 */
export function computeSwapStep(
  sqrtPriceCurrentX96: bigint,
  sqrtPriceTargetX96: bigint,
  liquidity: bigint,
  amountRemaining: bigint,
  feePips: number
): SwapStep {
  const fee = BigInt(feePips);
  const zeroForOne = sqrtPriceCurrentX96 >= sqrtPriceTargetX96;
  const exactIn = amountRemaining >= 0n;

  let sqrtPriceNextX96: bigint;
  let amountIn = 0n;
  let amountOut = 0n;

  if (exactIn) {
    const amountRemainingLessFee = mulDiv(
      amountRemaining,
      FEE_DENOMINATOR - fee,
      FEE_DENOMINATOR
    );
    amountIn = zeroForOne
      ? amount0Delta(sqrtPriceTargetX96, sqrtPriceCurrentX96, liquidity, true)
      : amount1Delta(sqrtPriceCurrentX96, sqrtPriceTargetX96, liquidity, true);
    sqrtPriceNextX96 =
      amountRemainingLessFee >= amountIn
        ? sqrtPriceTargetX96
        : nextSqrtPriceFromInput(
            sqrtPriceCurrentX96,
            liquidity,
            amountRemainingLessFee,
            zeroForOne
          );
  } else {
    amountOut = zeroForOne
      ? amount1Delta(sqrtPriceTargetX96, sqrtPriceCurrentX96, liquidity, false)
      : amount0Delta(sqrtPriceCurrentX96, sqrtPriceTargetX96, liquidity, false);
    sqrtPriceNextX96 =
      -amountRemaining >= amountOut
        ? sqrtPriceTargetX96
        : nextSqrtPriceFromOutput(
            sqrtPriceCurrentX96,
            liquidity,
            -amountRemaining,
            zeroForOne
          );
  }

  const reachedTarget = sqrtPriceTargetX96 === sqrtPriceNextX96;

  if (zeroForOne) {
    if (!(reachedTarget && exactIn)) {
      amountIn = amount0Delta(
        sqrtPriceNextX96,
        sqrtPriceCurrentX96,
        liquidity,
        true
      );
    }
    if (!(reachedTarget && !exactIn)) {
      amountOut = amount1Delta(
        sqrtPriceNextX96,
        sqrtPriceCurrentX96,
        liquidity,
        false
      );
    }
  } else {
    if (!(reachedTarget && exactIn)) {
      amountIn = amount1Delta(
        sqrtPriceCurrentX96,
        sqrtPriceNextX96,
        liquidity,
        true
      );
    }
    if (!(reachedTarget && !exactIn)) {
      amountOut = amount0Delta(
        sqrtPriceCurrentX96,
        sqrtPriceNextX96,
        liquidity,
        false
      );
    }
  }

  // never hand out more than was asked for
  if (!exactIn && amountOut > -amountRemaining) {
    amountOut = -amountRemaining;
  }

  const feeAmount =
    exactIn && sqrtPriceNextX96 !== sqrtPriceTargetX96
      ? amountRemaining - amountIn
      : mulDivRoundingUp(amountIn, fee, FEE_DENOMINATOR - fee);

  return { sqrtPriceNextX96, amountIn, amountOut, feeAmount };
}
