import { describe, it, expect } from "vitest";
import { readFile } from "node:fs/promises";
import { computePoolAddress } from "../src/pool_deployer";
import { toJSON } from "../src/replay_runner";
import { DEPLOYER_ADDRESS, parseScenario, runScenario } from "../src/scenario";
import {
  InMemoryPoolEventRepository,
  PoolEventRecorder,
} from "../src/services/pool_event_repository";

async function loadBasicScenario() {
  const text = await readFile(
    new URL("../scenarios/basic.json", import.meta.url),
    "utf8"
  );
  return parseScenario(JSON.parse(text));
}

describe("parseScenario", () => {
  it("reads accounts, pool and operations", async () => {
    const scenario = await loadBasicScenario();

    expect(scenario.accounts.bob).toEqual({ TKA: 1_000_000n, TKB: 1_000_000n });
    expect(scenario.pool?.sqrtPriceX96).toBe(1n << 96n);
    expect(scenario.operations).toHaveLength(6);
    expect(scenario.operations[2]).toEqual({
      op: "swap",
      payer: "bob",
      recipient: "bob",
      zeroForOne: false,
      amount: -300n,
      sqrtPriceLimitX96: undefined,
    });
  });

  it("names the offending field", () => {
    expect(() =>
      parseScenario({ accounts: {}, operations: [{ op: "flash" }] })
    ).toThrow("operations[0].op must be one of mint, burn, collect, swap");
    expect(() =>
      parseScenario({
        operations: [{ op: "swap", payer: "a", recipient: "a", amount: "1" }],
      })
    ).toThrow("operations[0].zeroForOne must be a boolean");
    expect(() =>
      parseScenario({
        operations: [{ op: "burn", owner: "a", liquidity: "1.5" }],
      })
    ).toThrow("operations[0].liquidity must be an integer or integer string");
    expect(() => parseScenario({ operations: {} })).toThrow(
      "operations must be an array"
    );
    for (const initialPrice of ["cheap", "0", "-2"]) {
      expect(() =>
        parseScenario({
          pool: {
            token0: "TKA",
            token1: "TKB",
            tickLower: -100,
            tickUpper: 100,
            initialPrice,
          },
          operations: [],
        })
      ).toThrow(
        `pool.initialPrice must be a positive decimal, got "${initialPrice}"`
      );
    }
  });
});

describe("runScenario", () => {
  it("replays the basic scenario", async () => {
    const scenario = await loadBasicScenario();
    if (!scenario.pool) throw new Error("basic scenario declares its pool");

    const report = runScenario(scenario, scenario.pool);

    expect(report.results).toEqual([
      { index: 0, op: "mint", ok: true, amount0: 4988n, amount1: 4988n },
      { index: 1, op: "swap", ok: true, amount0: 500n, amount1: -497n },
      { index: 2, op: "swap", ok: true, amount0: -300n, amount1: 301n },
      { index: 3, op: "burn", ok: false, error: "InsufficientLiquidity" },
      { index: 4, op: "burn", ok: true, amount0: 2074n, amount1: 1915n },
      { index: 5, op: "collect", ok: true, amount0: 2075n, amount1: 1915n },
    ]);

    const poolAddress = computePoolAddress(DEPLOYER_ADDRESS, {
      token0: "TKA",
      token1: "TKB",
      fee: 3000,
      tickLower: -100,
      tickUpper: 100,
    });
    expect(report.pool.address).toBe(poolAddress);
    expect(report.pool.tick).toBe(-4);
    expect(report.pool.sqrtPriceX96).toBe("79212478443532518154949270382");
    expect(report.pool.liquidity).toBe("600000");
    expect(report.prices).toEqual({
      current: "0.9996041176",
      lower: "0.9900503287",
      upper: "1.010049662",
    });
    expect(report.balances).toEqual({
      alice: { TKA: 9_997_087n, TKB: 9_996_927n },
      bob: { TKA: 999_800n, TKB: 1_000_196n },
      [poolAddress]: { TKA: 3113n, TKB: 2877n },
    });
  });

  it("feeds committed events to listeners", async () => {
    const scenario = await loadBasicScenario();
    if (!scenario.pool) throw new Error("basic scenario declares its pool");
    const repository = new InMemoryPoolEventRepository();
    const recorder = new PoolEventRecorder(repository);

    const report = runScenario(scenario, scenario.pool, {
      listeners: [recorder],
    });
    expect(await recorder.flush()).toBe(6);

    const stored = await repository.list(report.pool.address);
    expect(stored.map(({ seq, event }) => [seq, event.type])).toEqual([
      [0, "Initialize"],
      [1, "Mint"],
      [2, "Swap"],
      [3, "Swap"],
      [4, "Burn"],
      [5, "Collect"],
    ]);
  });

  it("appends a second replay of the same pool to its stored events", async () => {
    const scenario = await loadBasicScenario();
    if (!scenario.pool) throw new Error("basic scenario declares its pool");
    const repository = new InMemoryPoolEventRepository();

    for (let run = 0; run < 2; run++) {
      const recorder = new PoolEventRecorder(repository);
      runScenario(scenario, scenario.pool, { listeners: [recorder] });
      expect(await recorder.flush()).toBe(6);
    }

    const poolAddress = computePoolAddress(DEPLOYER_ADDRESS, {
      token0: "TKA",
      token1: "TKB",
      fee: 3000,
      tickLower: -100,
      tickUpper: 100,
    });
    const stored = await repository.list(poolAddress);
    expect(stored.map(({ seq }) => seq)).toEqual([
      0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11,
    ]);
    expect(stored[6]?.event.type).toBe("Initialize");
  });

  it("mints by token budget", () => {
    const scenario = parseScenario({
      pool: {
        token0: "TKA",
        token1: "TKB",
        tickLower: -100,
        tickUpper: 100,
        initialPrice: "1",
      },
      accounts: { carol: { TKA: "5000", TKB: "4000" } },
      operations: [
        {
          op: "mint",
          payer: "carol",
          recipient: "carol",
          amount0: "5000",
          amount1: "4000",
        },
      ],
    });
    if (!scenario.pool) throw new Error("scenario declares its pool");

    const report = runScenario(scenario, scenario.pool);

    expect(report.results).toEqual([
      { index: 0, op: "mint", ok: true, amount0: 4000n, amount1: 4000n },
    ]);
    expect(report.pool.liquidity).toBe("802041");
    expect(report.balances.carol).toEqual({ TKA: 1000n, TKB: 0n });
  });

  it("prints bigints as strings", () => {
    expect(toJSON({ amount: 10n, ok: true })).toBe(
      '{\n  "amount": "10",\n  "ok": true\n}'
    );
  });
});
