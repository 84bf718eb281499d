import { describe, it, expect } from "vitest";
import { SingleRangePool } from "../src/pool";
import {
  PoolDeployer,
  computePoolAddress,
  type PoolKey,
} from "../src/pool_deployer";
import { TokenBank } from "../src/token_bank";

const KEY: PoolKey = {
  token0: "TKA",
  token1: "TKB",
  fee: 3000,
  tickLower: -100,
  tickUpper: 100,
};

describe("PoolDeployer", () => {
  it("exposes parameters only while a pool is being built", () => {
    const deployer = new PoolDeployer("factory");
    expect(deployer.parameters).toBeNull();

    const pool = deployer.deploy(KEY, new TokenBank());

    expect(deployer.parameters).toBeNull();
    expect(pool.factory).toBe("factory");
    expect(pool.token0).toBe("TKA");
    expect(pool.token1).toBe("TKB");
    expect(pool.fee).toBe(3000);
    expect(pool.tickLower).toBe(-100);
    expect(pool.tickUpper).toBe(100);
    expect(pool.initialized).toBe(false);
  });

  it("derives the address from deployer and parameters", () => {
    const deployer = new PoolDeployer("factory");
    const pool = deployer.deploy(KEY, new TokenBank());

    expect(pool.address).toBe(computePoolAddress("factory", KEY));
    expect(pool.address).toMatch(/^0x[0-9a-f]{40}$/);
    expect(computePoolAddress("factory", KEY)).toBe(pool.address);
    expect(computePoolAddress("other", KEY)).not.toBe(pool.address);
    expect(computePoolAddress("factory", { ...KEY, fee: 500 })).not.toBe(
      pool.address
    );
  });

  it("refuses to deploy the same pool twice", () => {
    const deployer = new PoolDeployer("factory");
    const pool = deployer.deploy(KEY, new TokenBank());

    expect(() => deployer.deploy(KEY, new TokenBank())).toThrow(
      "InvalidParameters:"
    );
    expect(deployer.getPool(KEY)).toBe(pool);
    expect(deployer.getPool({ ...KEY, fee: 500 })).toBeUndefined();
  });

  it("validates the parameter tuple", () => {
    const deployer = new PoolDeployer("factory");
    const bank = new TokenBank();
    const bad: PoolKey[] = [
      { ...KEY, token0: "TKB", token1: "TKA" },
      { ...KEY, token0: "TKA", token1: "TKA" },
      { ...KEY, tickLower: 100, tickUpper: 100 },
      { ...KEY, tickLower: -887273 },
      { ...KEY, tickUpper: 887273 },
      { ...KEY, tickLower: 0.5 },
      { ...KEY, fee: 0 },
      { ...KEY, fee: 1_000_000 },
    ];
    for (const key of bad) {
      expect(() => deployer.deploy(key, bank)).toThrow("InvalidParameters:");
    }
  });

  it("leaves a pool unconstructible without parameters", () => {
    const deployer = new PoolDeployer("factory");
    expect(
      () => new SingleRangePool("0xpool", deployer, new TokenBank())
    ).toThrow(
      "InvalidParameters:"
    );
  });

  it("accepts any parameter source", () => {
    const source = { parameters: { factory: "custom", ...KEY } };
    const pool = new SingleRangePool("0xpool", source, new TokenBank());
    expect(pool.address).toBe("0xpool");
    expect(pool.factory).toBe("custom");
  });
});
