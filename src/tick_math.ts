/**
 * Tick <-> square-root price conversions in Q64.96.
 *
 * A tick is a power of 1.0001: price(tick) = 1.0001^tick, and the pool
 * stores sqrt(price) * 2^96.
 */
import { PoolError } from "./errors";
import { MAX_UINT256 } from "./full_math";

export const MIN_TICK = -887272;
export const MAX_TICK = 887272;
export const MIN_SQRT_RATIO = 4295128739n;
export const MAX_SQRT_RATIO =
  1461446703485210103287273052203988822378723970342n;

const MSB_STEPS: ReadonlyArray<readonly [bigint, bigint]> = [
  [128n, 0xffffffffffffffffffffffffffffffffn],
  [64n, 0xffffffffffffffffn],
  [32n, 0xffffffffn],
  [16n, 0xffffn],
  [8n, 0xffn],
  [4n, 0xfn],
  [2n, 0x3n],
];

/**
 * sqrt(1.0001^tick) * 2^96, rounded up.
 *
 * Multiplies precomputed sqrt(1.0001^-(2^i)) factors (Q128) for every set bit
 * of |tick|, inverts for positive ticks, then drops 32 bits to reach Q96.
 */
export function sqrtPriceAtTick(tick: number): bigint {
  if (!Number.isInteger(tick) || tick < MIN_TICK || tick > MAX_TICK) {
    throw new PoolError("OutOfBounds", `tick ${tick} out of range`, {
      tick,
      minTick: MIN_TICK,
      maxTick: MAX_TICK,
    });
  }

  const absTick = tick < 0 ? -tick : tick;

  let ratio =
    absTick & 0x1
      ? 0xfffcb933bd6fad37aa2d162d1a594001n
      : 0x100000000000000000000000000000000n;
  if (absTick & 0x2)
    ratio = (ratio * 0xfff97272373d413259a46990580e213an) >> 128n;
  if (absTick & 0x4)
    ratio = (ratio * 0xfff2e50f5f656932ef12357cf3c7fdccn) >> 128n;
  if (absTick & 0x8)
    ratio = (ratio * 0xffe5caca7e10e4e61c3624eaa0941cd0n) >> 128n;
  if (absTick & 0x10)
    ratio = (ratio * 0xffcb9843d60f6159c9db58835c926644n) >> 128n;
  if (absTick & 0x20)
    ratio = (ratio * 0xff973b41fa98c081472e6896dfb254c0n) >> 128n;
  if (absTick & 0x40)
    ratio = (ratio * 0xff2ea16466c96a3843ec78b326b52861n) >> 128n;
  if (absTick & 0x80)
    ratio = (ratio * 0xfe5dee046a99a2a811c461f1969c3053n) >> 128n;
  if (absTick & 0x100)
    ratio = (ratio * 0xfcbe86c7900a88aedcffc83b479aa3a4n) >> 128n;
  if (absTick & 0x200)
    ratio = (ratio * 0xf987a7253ac413176f2b074cf7815e54n) >> 128n;
  if (absTick & 0x400)
    ratio = (ratio * 0xf3392b0822b70005940c7a398e4b70f3n) >> 128n;
  if (absTick & 0x800)
    ratio = (ratio * 0xe7159475a2c29b7443b29c7fa6e889d9n) >> 128n;
  if (absTick & 0x1000)
    ratio = (ratio * 0xd097f3bdfd2022b8845ad8f792aa5825n) >> 128n;
  if (absTick & 0x2000)
    ratio = (ratio * 0xa9f746462d870fdf8a65dc1f90e061e5n) >> 128n;
  if (absTick & 0x4000)
    ratio = (ratio * 0x70d869a156d2a1b890bb3df62baf32f7n) >> 128n;
  if (absTick & 0x8000)
    ratio = (ratio * 0x31be135f97d08fd981231505542fcfa6n) >> 128n;
  if (absTick & 0x10000)
    ratio = (ratio * 0x9aa508b5b7a84e1c677de54f3e99bc9n) >> 128n;
  if (absTick & 0x20000)
    ratio = (ratio * 0x5d6af8dedb81196699c329225ee604n) >> 128n;
  if (absTick & 0x40000)
    ratio = (ratio * 0x2216e584f5fa1ea926041bedfe98n) >> 128n;
  if (absTick & 0x80000) ratio = (ratio * 0x48a170391f7dc42444e8fa2n) >> 128n;

  if (tick > 0) ratio = MAX_UINT256 / ratio;

  // Q128.128 -> Q64.96, rounding up so tickAtSqrtPrice stays consistent
  return (ratio >> 32n) + (ratio % (1n << 32n) === 0n ? 0n : 1n);
}

/**
 * Greatest tick whose sqrt price does not exceed `sqrtPriceX96`.
 *
 * Accepts [MIN_SQRT_RATIO, MAX_SQRT_RATIO]; the upper bound maps to MAX_TICK.
 */
export function tickAtSqrtPrice(sqrtPriceX96: bigint): number {
  if (sqrtPriceX96 < MIN_SQRT_RATIO || sqrtPriceX96 > MAX_SQRT_RATIO) {
    throw new PoolError("OutOfBounds", "sqrt price out of range", {
      sqrtPriceX96: sqrtPriceX96.toString(),
    });
  }
  if (sqrtPriceX96 === MAX_SQRT_RATIO) return MAX_TICK;

  const ratio = sqrtPriceX96 << 32n;

  // most significant bit of ratio
  let r = ratio;
  let msb = 0n;
  for (const [bits, threshold] of MSB_STEPS) {
    const f = r > threshold ? bits : 0n;
    msb |= f;
    r >>= f;
  }
  if (r > 1n) msb |= 1n;

  r = msb >= 128n ? ratio >> (msb - 127n) : ratio << (127n - msb);

  // log2(ratio) in Q64.64, 14 fractional bits refined by squaring
  let log2 = (msb - 128n) << 64n;
  for (let shift = 63n; shift >= 50n; shift--) {
    r = (r * r) >> 127n;
    const f = r >> 128n;
    log2 |= f << shift;
    r >>= f;
  }

  const logSqrt10001 = log2 * 255738958999603826347141n;

  const tickLow = Number(
    (logSqrt10001 - 3402992956809132418596140100660247210n) >> 128n
  );
  const tickHigh = Number(
    (logSqrt10001 + 291339464771989622907027621153398088495n) >> 128n
  );

  if (tickLow === tickHigh) return tickLow;
  return sqrtPriceAtTick(tickHigh) <= sqrtPriceX96 ? tickHigh : tickLow;
}
