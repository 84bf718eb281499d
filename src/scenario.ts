/**
 * Scripted replays: seed accounts, deploy one pool, run a list of operations
 * against it and report what each one did. A failing operation is recorded
 * and the replay moves on; the pool has already undone its effects.
 */
import type { PoolConfig } from "./config/config";
import { isPoolError } from "./errors";
import { PaymentRouter } from "./payment_router";
import type { SingleRangePool } from "./pool";
import { PoolDeployer } from "./pool_deployer";
import { encodeSqrtPriceX96, sqrtPriceX96ToPrice, tickToPrice } from "./price";
import { MAX_SQRT_RATIO, MIN_SQRT_RATIO } from "./tick_math";
import { TokenBank } from "./token_bank";
import type { Address, AmountPair, PoolEventListener } from "./types";

export type ScenarioOperation =
  | {
      op: "mint";
      payer: Address;
      recipient: Address;
      liquidity: bigint | { amount0: bigint; amount1: bigint };
    }
  | { op: "burn"; owner: Address; liquidity: bigint }
  | {
      op: "collect";
      owner: Address;
      recipient: Address;
      amount0?: bigint;
      amount1?: bigint;
    }
  | {
      op: "swap";
      payer: Address;
      recipient: Address;
      zeroForOne: boolean;
      amount: bigint; // > 0 exact input, < 0 exact output
      sqrtPriceLimitX96?: bigint;
    };

export interface Scenario {
  pool?: PoolConfig;
  accounts: Record<Address, Record<Address, bigint>>;
  operations: ScenarioOperation[];
}

type OperationOutcome =
  | ({ ok: true } & AmountPair)
  | { ok: false; error: string }; // error code, or message for non-pool errors

export type OperationResult = {
  index: number;
  op: ScenarioOperation["op"];
} & OperationOutcome;

export interface ScenarioReport {
  pool: ReturnType<SingleRangePool["stateToJSON"]>;
  // token1 per token0, 10 significant digits
  prices: { current: string; lower: string; upper: string };
  results: OperationResult[];
  balances: Record<Address, Record<Address, bigint>>;
}

export interface RunOptions {
  logger?: Partial<Console>;
  listeners?: PoolEventListener[];
}

export const DEPLOYER_ADDRESS = "deployer";
export const ROUTER_ADDRESS = "router";

/***************** Parsing *****************/
type Json = Record<string, unknown>;

function isObject(value: unknown): value is Json {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function str(obj: Json, key: string, where: string): string {
  const value = obj[key];
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`${where}.${key} must be a non-empty string`);
  }
  return value;
}

function bigintField(obj: Json, key: string, where: string): bigint {
  const value = obj[key];
  if (typeof value === "number" && Number.isSafeInteger(value)) {
    return BigInt(value);
  }
  if (typeof value === "string" && /^-?\d+$/.test(value)) {
    return BigInt(value);
  }
  throw new Error(`${where}.${key} must be an integer or integer string`);
}

function optionalBigint(
  obj: Json,
  key: string,
  where: string
): bigint | undefined {
  return obj[key] === undefined ? undefined : bigintField(obj, key, where);
}

function integerField(obj: Json, key: string, where: string): number {
  const value = obj[key];
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new Error(`${where}.${key} must be an integer`);
  }
  return value;
}

function parsePool(raw: unknown): PoolConfig {
  if (!isObject(raw)) throw new Error("pool must be an object");
  const priceValue = raw.initialPrice;
  const initialPrice =
    typeof priceValue === "number" ? String(priceValue) : priceValue;
  if (typeof initialPrice !== "string") {
    throw new Error("pool.initialPrice must be a decimal string");
  }
  let sqrtPriceX96: bigint;
  try {
    sqrtPriceX96 = encodeSqrtPriceX96(initialPrice);
  } catch (err) {
    throw new Error(
      `pool.initialPrice must be a positive decimal, got "${initialPrice}"`,
      { cause: err }
    );
  }
  return {
    token0: str(raw, "token0", "pool"),
    token1: str(raw, "token1", "pool"),
    fee: raw.fee === undefined ? 3000 : integerField(raw, "fee", "pool"),
    tickLower: integerField(raw, "tickLower", "pool"),
    tickUpper: integerField(raw, "tickUpper", "pool"),
    initialPrice,
    sqrtPriceX96,
  };
}

function parseOperation(raw: unknown, index: number): ScenarioOperation {
  const where = `operations[${index}]`;
  if (!isObject(raw)) throw new Error(`${where} must be an object`);
  switch (raw.op) {
    case "mint":
      return {
        op: "mint",
        payer: str(raw, "payer", where),
        recipient: str(raw, "recipient", where),
        // either a liquidity amount or a token budget
        liquidity:
          raw.liquidity === undefined
            ? {
                amount0: bigintField(raw, "amount0", where),
                amount1: bigintField(raw, "amount1", where),
              }
            : bigintField(raw, "liquidity", where),
      };
    case "burn":
      return {
        op: "burn",
        owner: str(raw, "owner", where),
        liquidity: bigintField(raw, "liquidity", where),
      };
    case "collect":
      return {
        op: "collect",
        owner: str(raw, "owner", where),
        recipient: str(raw, "recipient", where),
        amount0: optionalBigint(raw, "amount0", where),
        amount1: optionalBigint(raw, "amount1", where),
      };
    case "swap": {
      if (typeof raw.zeroForOne !== "boolean") {
        throw new Error(`${where}.zeroForOne must be a boolean`);
      }
      return {
        op: "swap",
        payer: str(raw, "payer", where),
        recipient: str(raw, "recipient", where),
        zeroForOne: raw.zeroForOne,
        amount: bigintField(raw, "amount", where),
        sqrtPriceLimitX96: optionalBigint(raw, "sqrtPriceLimitX96", where),
      };
    }
    default:
      throw new Error(`${where}.op must be one of mint, burn, collect, swap`);
  }
}

export function parseScenario(raw: unknown): Scenario {
  if (!isObject(raw)) throw new Error("scenario must be a JSON object");

  const accounts: Scenario["accounts"] = {};
  const rawAccounts = raw.accounts ?? {};
  if (!isObject(rawAccounts)) throw new Error("accounts must be an object");
  for (const [account, holdings] of Object.entries(rawAccounts)) {
    if (!isObject(holdings)) {
      throw new Error(`accounts.${account} must be an object`);
    }
    const balances: Record<Address, bigint> = {};
    for (const token of Object.keys(holdings)) {
      balances[token] = bigintField(holdings, token, `accounts.${account}`);
    }
    accounts[account] = balances;
  }

  if (!Array.isArray(raw.operations)) {
    throw new Error("operations must be an array");
  }
  const operations = raw.operations.map((op, i) => parseOperation(op, i));

  return {
    pool: raw.pool === undefined ? undefined : parsePool(raw.pool),
    accounts,
    operations,
  };
}

/***************** Replay *****************/
function describeError(err: unknown): string {
  if (isPoolError(err)) return err.code;
  return err instanceof Error ? err.message : String(err);
}

export function runScenario(
  scenario: Scenario,
  config: PoolConfig,
  options: RunOptions = {}
): ScenarioReport {
  const { logger } = options;
  const bank = new TokenBank();
  for (const [account, holdings] of Object.entries(scenario.accounts)) {
    for (const [token, amount] of Object.entries(holdings)) {
      bank.mint(token, account, amount);
    }
  }

  const deployer = new PoolDeployer(DEPLOYER_ADDRESS);
  const pool = deployer.deploy(
    {
      token0: config.token0,
      token1: config.token1,
      fee: config.fee,
      tickLower: config.tickLower,
      tickUpper: config.tickUpper,
    },
    bank,
    { logger }
  );
  for (const listener of options.listeners ?? []) pool.addListener(listener);
  pool.initialize(config.sqrtPriceX96);

  const router = new PaymentRouter(ROUTER_ADDRESS, bank);
  const results: OperationResult[] = [];

  const execute = (operation: ScenarioOperation): AmountPair => {
    switch (operation.op) {
      case "mint": {
        const { payer, recipient, liquidity } = operation;
        if (typeof liquidity === "bigint") {
          return router.mint(pool, payer, recipient, liquidity);
        }
        const { amount0, amount1 } = router.mintForAmounts(
          pool,
          payer,
          recipient,
          liquidity.amount0,
          liquidity.amount1
        );
        return { amount0, amount1 };
      }
      case "burn":
        return pool.burn(operation.owner, operation.liquidity);
      case "collect":
        return pool.collect(
          operation.owner,
          operation.recipient,
          operation.amount0,
          operation.amount1
        );
      case "swap":
        return router.swap(
          pool,
          operation.payer,
          operation.recipient,
          operation.zeroForOne,
          operation.amount,
          operation.sqrtPriceLimitX96 ??
            (operation.zeroForOne ? MIN_SQRT_RATIO + 1n : MAX_SQRT_RATIO - 1n)
        );
    }
  };

  scenario.operations.forEach((operation, index) => {
    try {
      const amounts = execute(operation);
      results.push({ index, op: operation.op, ok: true, ...amounts });
    } catch (err) {
      const error = describeError(err);
      logger?.warn?.(
        `[scenario] operation ${index} (${operation.op}) failed: ${error}`
      );
      results.push({ index, op: operation.op, ok: false, error });
    }
  });

  const balances: ScenarioReport["balances"] = {};
  const accounts = new Set([...Object.keys(scenario.accounts), pool.address]);
  for (const account of accounts) {
    balances[account] = {
      [pool.token0]: bank.balanceOf(pool.token0, account),
      [pool.token1]: bank.balanceOf(pool.token1, account),
    };
  }

  const prices = {
    current: sqrtPriceX96ToPrice(pool.sqrtPriceX96),
    lower: tickToPrice(pool.tickLower),
    upper: tickToPrice(pool.tickUpper),
  };
  return {
    pool: pool.stateToJSON(),
    prices: {
      current: prices.current.toSignificantDigits(10).toString(),
      lower: prices.lower.toSignificantDigits(10).toString(),
      upper: prices.upper.toSignificantDigits(10).toString(),
    },
    results,
    balances,
  };
}
