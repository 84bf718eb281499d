import { describe, it, expect } from "vitest";
import {
  encodeSqrtPriceX96,
  sqrtPriceX96ToPrice,
  tickToPrice,
} from "../src/price";

const Q96 = 1n << 96n;

describe("price helpers", () => {
  it("encodes exact squares exactly", () => {
    expect(encodeSqrtPriceX96(1)).toBe(Q96);
    expect(encodeSqrtPriceX96("4")).toBe(2n * Q96);
    expect(encodeSqrtPriceX96("0.25")).toBe(Q96 / 2n);
  });

  it("decodes back to a decimal price", () => {
    expect(sqrtPriceX96ToPrice(2n * Q96).toString()).toBe("4");
    expect(sqrtPriceX96ToPrice(Q96 / 2n).toString()).toBe("0.25");
  });

  it("prices ticks", () => {
    expect(tickToPrice(0).toString()).toBe("1");
    expect(tickToPrice(-100).toSignificantDigits(10).toString()).toBe(
      "0.9900503287"
    );
  });

  it("rejects non-positive prices", () => {
    expect(() => encodeSqrtPriceX96(0)).toThrow("InvalidParameters:");
    expect(() => encodeSqrtPriceX96("-1")).toThrow("InvalidParameters:");
  });
});
