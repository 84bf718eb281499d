/**
 * Deploys single-range pools and hands each one its immutable parameters
 * out-of-band, for the duration of its constructor only.
 */
import { createHash } from "node:crypto";
import { PoolError } from "./errors";
import { SingleRangePool, type PoolOptions } from "./pool";
import { MAX_TICK, MIN_TICK } from "./tick_math";
import {
  PPM,
  type Address,
  type JournaledLedger,
  type ParameterSource,
  type PoolParameters,
} from "./types";

export type PoolKey = Omit<PoolParameters, "factory">;

const POOL_CODE_HASH = createHash("sha256")
  .update("SingleRangePool")
  .digest("hex");

function sha256Hex(...parts: string[]): string {
  const hash = createHash("sha256");
  for (const part of parts) hash.update(part).update("\u0000");
  return hash.digest("hex");
}

export function poolSalt(key: PoolKey): string {
  return sha256Hex(
    key.token0,
    key.token1,
    String(key.fee),
    String(key.tickLower),
    String(key.tickUpper)
  );
}

/**
 * Address of the pool for `key`, a function of the deployer, the salt and the
 * pool code hash only.
 */
export function computePoolAddress(deployer: Address, key: PoolKey): Address {
  return `0x${sha256Hex(deployer, poolSalt(key), POOL_CODE_HASH).slice(-40)}`;
}

export function validatePoolKey(key: PoolKey): void {
  if (!(key.token0 < key.token1)) {
    throw new PoolError("InvalidParameters", "token0 must sort before token1", {
      token0: key.token0,
      token1: key.token1,
    });
  }
  if (
    !Number.isInteger(key.tickLower) ||
    !Number.isInteger(key.tickUpper) ||
    key.tickLower >= key.tickUpper ||
    key.tickLower < MIN_TICK ||
    key.tickUpper > MAX_TICK
  ) {
    throw new PoolError("InvalidParameters", "invalid tick range", {
      tickLower: key.tickLower,
      tickUpper: key.tickUpper,
    });
  }
  if (!Number.isInteger(key.fee) || key.fee <= 0 || key.fee >= PPM) {
    throw new PoolError("InvalidParameters", "fee must be in (0, 1e6) ppm", {
      fee: key.fee,
    });
  }
}

export class PoolDeployer implements ParameterSource {
  readonly address: Address;
  private pending: PoolParameters | null = null;
  private readonly pools: Map<string, SingleRangePool> = new Map();

  constructor(address: Address) {
    this.address = address;
  }

  get parameters(): PoolParameters | null {
    return this.pending ? { ...this.pending } : null;
  }

  deploy(
    key: PoolKey,
    ledger: JournaledLedger,
    options: PoolOptions = {}
  ): SingleRangePool {
    validatePoolKey(key);
    if (this.getPool(key)) {
      throw new PoolError("InvalidParameters", "pool already deployed", {
        token0: key.token0,
        token1: key.token1,
        fee: key.fee,
      });
    }

    this.pending = { factory: this.address, ...key };
    try {
      const pool = new SingleRangePool(
        computePoolAddress(this.address, key),
        this,
        ledger,
        options
      );
      this.pools.set(poolSalt(key), pool);
      options.logger?.info?.(
        `[PoolDeployer] deployed ${pool.address} ${key.token0}/${key.token1} fee=${key.fee} range=[${key.tickLower}, ${key.tickUpper})`
      );
      return pool;
    } finally {
      this.pending = null;
    }
  }

  getPool(key: PoolKey): SingleRangePool | undefined {
    return this.pools.get(poolSalt(key));
  }
}
