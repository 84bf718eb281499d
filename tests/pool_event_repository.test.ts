import { describe, it, expect, vi } from "vitest";
import {
  InMemoryPoolEventRepository,
  PoolEventRecorder,
  decodeEvent,
  encodeEvent,
  type PoolEventRepository,
} from "../src/services/pool_event_repository";
import type { SwapEvent } from "../src/types";

const SWAP: SwapEvent = {
  type: "Swap",
  sender: "router",
  recipient: "bob",
  amount0: 500n,
  amount1: -497n,
  sqrtPriceX96: 79188726528453167915921821270n,
  liquidity: 1_000_000n,
  tick: -10,
};

describe("event encoding", () => {
  it("stores bigints as decimal strings", () => {
    expect(encodeEvent(SWAP)).toEqual({
      sender: "router",
      recipient: "bob",
      amount0: "500",
      amount1: "-497",
      sqrtPriceX96: "79188726528453167915921821270",
      liquidity: "1000000",
      tick: -10,
    });
    expect(decodeEvent("Swap", encodeEvent(SWAP))).toEqual(SWAP);
  });

  it("rejects unknown names and missing fields", () => {
    expect(() => decodeEvent("Flash", {})).toThrow(
      'unknown pool event "Flash"'
    );
    expect(() => decodeEvent("Burn", { owner: "alice" })).toThrow(
      'event data is missing "amount"'
    );
  });
});

describe("PoolEventRecorder", () => {
  it("numbers events per pool", async () => {
    const repository = new InMemoryPoolEventRepository();
    const recorder = new PoolEventRecorder(repository);
    recorder.onPoolEvent("0xa", SWAP);
    recorder.onPoolEvent("0xb", SWAP);
    recorder.onPoolEvent("0xa", {
      type: "Initialize",
      sqrtPriceX96: 1n,
      tick: 0,
    });

    expect(recorder.pending).toBe(3);
    expect(await recorder.flush()).toBe(3);
    expect(recorder.pending).toBe(0);

    expect((await repository.list("0xa")).map((e) => e.seq)).toEqual([0, 1]);
    expect((await repository.list("0xb")).map((e) => e.seq)).toEqual([0]);
  });

  it("continues after the sequence numbers already stored", async () => {
    const repository = new InMemoryPoolEventRepository();
    await repository.insert("0xa", [
      { seq: 0, event: SWAP },
      { seq: 1, event: SWAP },
    ]);
    const recorder = new PoolEventRecorder(repository);
    recorder.onPoolEvent("0xa", SWAP);
    recorder.onPoolEvent("0xb", SWAP);

    expect(await recorder.flush()).toBe(2);
    recorder.onPoolEvent("0xa", SWAP);
    expect(await recorder.flush()).toBe(1);

    expect((await repository.list("0xa")).map((e) => e.seq)).toEqual([
      0, 1, 2, 3,
    ]);
    expect((await repository.list("0xb")).map((e) => e.seq)).toEqual([0]);
    expect(await repository.lastSeq("0xc")).toBeNull();
  });

  it("keeps the buffer when the repository fails", async () => {
    const repository: PoolEventRepository = {
      insert: vi.fn().mockRejectedValue(new Error("connection refused")),
      list: vi.fn().mockResolvedValue([]),
      lastSeq: vi.fn().mockResolvedValue(null),
      close: vi.fn().mockResolvedValue(undefined),
    };
    const recorder = new PoolEventRecorder(repository);
    recorder.onPoolEvent("0xa", SWAP);

    await expect(recorder.flush()).rejects.toThrow("connection refused");
    expect(recorder.pending).toBe(1);
  });

  it("refuses to store a sequence number twice", async () => {
    const repository = new InMemoryPoolEventRepository();
    await repository.insert("0xa", [{ seq: 0, event: SWAP }]);
    await expect(
      repository.insert("0xa", [{ seq: 0, event: SWAP }])
    ).rejects.toThrow("duplicate event 0 for pool 0xa");
  });
});
