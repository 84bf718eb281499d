import { describe, it, expect, beforeEach } from "vitest";
import { TokenBank } from "../src/token_bank";

describe("TokenBank", () => {
  let bank: TokenBank;

  beforeEach(() => {
    bank = new TokenBank();
    bank.mint("TKA", "alice", 100n);
  });

  it("moves balances between accounts", () => {
    bank.transfer("TKA", "alice", "bob", 30n);
    expect(bank.balanceOf("TKA", "alice")).toBe(70n);
    expect(bank.balanceOf("TKA", "bob")).toBe(30n);
    expect(bank.balanceOf("TKB", "alice")).toBe(0n);
  });

  it("refuses to overdraw and changes nothing", () => {
    expect(() => bank.transfer("TKA", "alice", "bob", 101n)).toThrow(
      "InsufficientBalance:"
    );
    expect(bank.balanceOf("TKA", "alice")).toBe(100n);
    expect(bank.balanceOf("TKA", "bob")).toBe(0n);
  });

  it("rejects negative amounts", () => {
    expect(() => bank.transfer("TKA", "alice", "bob", -1n)).toThrow(
      "InvalidAmount:"
    );
    expect(() => bank.mint("TKA", "alice", -1n)).toThrow("InvalidAmount:");
  });

  it("rolls back everything since a checkpoint", () => {
    const checkpoint = bank.checkpoint();
    bank.transfer("TKA", "alice", "bob", 30n);
    bank.mint("TKB", "bob", 5n);
    bank.rollback(checkpoint);

    expect(bank.balanceOf("TKA", "alice")).toBe(100n);
    expect(bank.balanceOf("TKA", "bob")).toBe(0n);
    expect(bank.balanceOf("TKB", "bob")).toBe(0n);
  });

  it("keeps outer effects when an inner checkpoint rolls back", () => {
    const outer = bank.checkpoint();
    bank.transfer("TKA", "alice", "bob", 10n);
    const inner = bank.checkpoint();
    bank.transfer("TKA", "alice", "bob", 20n);
    bank.rollback(inner);
    bank.release(outer);

    expect(bank.balanceOf("TKA", "alice")).toBe(90n);
    expect(bank.balanceOf("TKA", "bob")).toBe(10n);
  });

  it("undoes released inner effects when the outer checkpoint rolls back", () => {
    const outer = bank.checkpoint();
    const inner = bank.checkpoint();
    bank.transfer("TKA", "alice", "bob", 20n);
    bank.release(inner);
    bank.rollback(outer);

    expect(bank.balanceOf("TKA", "alice")).toBe(100n);
    expect(bank.balanceOf("TKA", "bob")).toBe(0n);
  });

  it("only closes the innermost checkpoint", () => {
    const outer = bank.checkpoint();
    bank.checkpoint();
    expect(() => bank.release(outer)).toThrow(/innermost/);
  });
});
