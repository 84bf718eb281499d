import dotenv from "dotenv";
import type { PoolKey } from "../pool_deployer";
import { encodeSqrtPriceX96 } from "../price";

export interface PoolConfig extends PoolKey {
  initialPrice: string; // token1 per token0
  sqrtPriceX96: bigint;
}

type Env = Record<string, string | undefined>;

let loaded = false;

// Load .env once; values already present in the environment win
export function loadEnv(): Env {
  if (!loaded) {
    dotenv.config();
    loaded = true;
  }
  return process.env;
}

function required(env: Env, name: string): string {
  const value = env[name]?.trim();
  if (!value) throw new Error(`Missing required setting ${name}`);
  return value;
}

function integer(env: Env, name: string, fallback?: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    if (fallback === undefined) {
      throw new Error(`Missing required setting ${name}`);
    }
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

/**
 * Reads the pool to deploy from POOL_* variables. Pool invariants (token
 * order, tick bounds, fee range) are checked by the deployer.
 */
export function loadPoolConfig(env: Env = loadEnv()): PoolConfig {
  const initialPrice = required(env, "POOL_INITIAL_PRICE");
  let sqrtPriceX96: bigint;
  try {
    sqrtPriceX96 = encodeSqrtPriceX96(initialPrice);
  } catch (err) {
    throw new Error(
      `POOL_INITIAL_PRICE must be a positive decimal, got "${initialPrice}"`,
      { cause: err }
    );
  }

  return {
    token0: required(env, "POOL_TOKEN0"),
    token1: required(env, "POOL_TOKEN1"),
    fee: integer(env, "POOL_FEE_PPM", 3000),
    tickLower: integer(env, "POOL_TICK_LOWER"),
    tickUpper: integer(env, "POOL_TICK_UPPER"),
    initialPrice,
    sqrtPriceX96,
  };
}
