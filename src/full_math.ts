/**
 * Checked fixed-point arithmetic on bigint.
 *
 * bigint never wraps, so every helper enforces the width of the value it
 * produces and fails with `Overflow` instead of silently growing past it.
 */
import { PoolError } from "./errors";

export const MAX_UINT128 = (1n << 128n) - 1n;
export const MAX_UINT160 = (1n << 160n) - 1n;
export const MAX_UINT256 = (1n << 256n) - 1n;
export const MAX_INT256 = (1n << 255n) - 1n;
export const MIN_INT256 = -(1n << 255n);

function assertUint256(value: bigint, label: string): void {
  if (value < 0n || value > MAX_UINT256) {
    throw new PoolError("Overflow", `${label} is not a uint256`, {
      value: value.toString(),
    });
  }
}

/**
 * floor(a * b / denominator), with the full 512-bit intermediate product.
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  assertUint256(a, "mulDiv operand a");
  assertUint256(b, "mulDiv operand b");
  if (denominator <= 0n || denominator > MAX_UINT256) {
    throw new PoolError("Overflow", "mulDiv denominator out of range", {
      denominator: denominator.toString(),
    });
  }
  const result = (a * b) / denominator;
  assertUint256(result, "mulDiv result");
  return result;
}

/**
 * ceil(a * b / denominator)
 */
export function mulDivRoundingUp(
  a: bigint,
  b: bigint,
  denominator: bigint
): bigint {
  const result = mulDiv(a, b, denominator);
  if ((a * b) % denominator > 0n) {
    assertUint256(result + 1n, "mulDivRoundingUp result");
    return result + 1n;
  }
  return result;
}

export function divRoundingUp(x: bigint, denominator: bigint): bigint {
  assertUint256(x, "divRoundingUp operand");
  if (denominator <= 0n) {
    throw new PoolError("Overflow", "division by zero");
  }
  return x / denominator + (x % denominator > 0n ? 1n : 0n);
}

export function toUint160(value: bigint): bigint {
  if (value < 0n || value > MAX_UINT160) {
    throw new PoolError("Overflow", "value does not fit in uint160", {
      value: value.toString(),
    });
  }
  return value;
}

export function toUint128(value: bigint): bigint {
  if (value < 0n || value > MAX_UINT128) {
    throw new PoolError("Overflow", "value does not fit in uint128", {
      value: value.toString(),
    });
  }
  return value;
}

export function toInt256(value: bigint): bigint {
  if (value < MIN_INT256 || value > MAX_INT256) {
    throw new PoolError("Overflow", "value does not fit in int256", {
      value: value.toString(),
    });
  }
  return value;
}

export function addUint256(a: bigint, b: bigint): bigint {
  const sum = a + b;
  assertUint256(sum, "uint256 sum");
  return sum;
}
