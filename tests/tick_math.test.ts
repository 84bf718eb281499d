import { describe, it, expect } from "vitest";
import {
  MAX_SQRT_RATIO,
  MAX_TICK,
  MIN_SQRT_RATIO,
  MIN_TICK,
  sqrtPriceAtTick,
  tickAtSqrtPrice,
} from "../src/tick_math";

const Q96 = 1n << 96n;

describe("sqrtPriceAtTick", () => {
  it("returns 2^96 at tick 0", () => {
    expect(sqrtPriceAtTick(0)).toBe(Q96);
  });

  it("matches the bounds exactly", () => {
    expect(sqrtPriceAtTick(MIN_TICK)).toBe(MIN_SQRT_RATIO);
    expect(sqrtPriceAtTick(MAX_TICK)).toBe(MAX_SQRT_RATIO);
  });

  it("computes ticks near zero", () => {
    expect(sqrtPriceAtTick(1)).toBe(79232123823359799118286999568n);
    expect(sqrtPriceAtTick(-1)).toBe(79224201403219477170569942574n);
    expect(sqrtPriceAtTick(100)).toBe(79625275426524748796330556128n);
    expect(sqrtPriceAtTick(-100)).toBe(78833030112140176575862854579n);
  });

  it("is strictly increasing", () => {
    let previous = sqrtPriceAtTick(-1000);
    for (let tick = -999; tick <= 1000; tick += 7) {
      const current = sqrtPriceAtTick(tick);
      expect(current > previous).toBe(true);
      previous = current;
    }
  });

  it("rejects ticks outside the range or not integral", () => {
    expect(() => sqrtPriceAtTick(MIN_TICK - 1)).toThrow("OutOfBounds:");
    expect(() => sqrtPriceAtTick(MAX_TICK + 1)).toThrow("OutOfBounds:");
    expect(() => sqrtPriceAtTick(1.5)).toThrow("OutOfBounds:");
  });
});

describe("tickAtSqrtPrice", () => {
  it("inverts sqrtPriceAtTick", () => {
    for (const tick of [MIN_TICK, -50000, -100, -1, 0, 1, 100, 50000]) {
      expect(tickAtSqrtPrice(sqrtPriceAtTick(tick))).toBe(tick);
    }
  });

  it("inverts sqrtPriceAtTick across the whole tick range", () => {
    for (let tick = MIN_TICK; tick < MAX_TICK; tick += 97) {
      const sqrtPriceX96 = sqrtPriceAtTick(tick);
      expect(tickAtSqrtPrice(sqrtPriceX96)).toBe(tick);
      expect(tickAtSqrtPrice(sqrtPriceAtTick(tick + 1) - 1n)).toBe(tick);
    }
  });

  it("returns the floor tick between two tick prices", () => {
    expect(tickAtSqrtPrice(sqrtPriceAtTick(100) - 1n)).toBe(99);
    expect(tickAtSqrtPrice(sqrtPriceAtTick(-100) + 1n)).toBe(-100);
    expect(tickAtSqrtPrice(Q96 * 2n)).toBe(13863);
    expect(tickAtSqrtPrice(Q96 / 2n)).toBe(-13864);
  });

  it("handles the ends of the domain", () => {
    expect(tickAtSqrtPrice(MIN_SQRT_RATIO)).toBe(MIN_TICK);
    expect(tickAtSqrtPrice(MAX_SQRT_RATIO - 1n)).toBe(MAX_TICK - 1);
    expect(tickAtSqrtPrice(MAX_SQRT_RATIO)).toBe(MAX_TICK);
  });

  it("rejects prices outside the domain", () => {
    expect(() => tickAtSqrtPrice(MIN_SQRT_RATIO - 1n)).toThrow("OutOfBounds:");
    expect(() => tickAtSqrtPrice(MAX_SQRT_RATIO + 1n)).toThrow("OutOfBounds:");
  });
});
