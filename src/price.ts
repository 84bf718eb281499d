/**
 * Human-readable price <-> Q64.96 conversions. Prices are token1 per token0.
 */
import Decimal from "decimal.js";
import { PoolError } from "./errors";
import { sqrtPriceAtTick } from "./tick_math";
import { Q96 } from "./types";

const PriceDecimal = Decimal.clone({
  precision: 80,
  rounding: Decimal.ROUND_HALF_UP,
});

const D = (x: Decimal.Value) => new PriceDecimal(x);

const Q96_DECIMAL = D(Q96.toString());

export function encodeSqrtPriceX96(price: Decimal.Value): bigint {
  const p = D(price);
  if (!p.isFinite() || p.lte(0)) {
    throw new PoolError("InvalidParameters", "price must be positive", {
      price: p.toString(),
    });
  }
  return BigInt(p.sqrt().mul(Q96_DECIMAL).floor().toFixed(0));
}

export function sqrtPriceX96ToPrice(sqrtPriceX96: bigint): Decimal {
  return D(sqrtPriceX96.toString()).div(Q96_DECIMAL).pow(2);
}

export function tickToPrice(tick: number): Decimal {
  return sqrtPriceX96ToPrice(sqrtPriceAtTick(tick));
}
