/**
 * In-process token ledger with a journal, so a failed pool call can put every
 * balance back the way it was.
 */
import { PoolError } from "./errors";
import type { Address, JournaledLedger } from "./types";

type JournalEntry = {
  token: Address;
  account: Address;
  previous: bigint;
};

export class TokenBank implements JournaledLedger {
  private balances: Map<string, bigint> = new Map();
  private journal: JournalEntry[] = [];
  private openCheckpoints: number[] = [];

  private static key(token: Address, account: Address): string {
    return `${token}:${account}`;
  }

  balanceOf(token: Address, account: Address): bigint {
    return this.balances.get(TokenBank.key(token, account)) ?? 0n;
  }

  /**
   * Creates `amount` out of thin air. Only meant for seeding accounts.
   */
  mint(token: Address, account: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new PoolError("InvalidAmount", "cannot mint a negative amount");
    }
    this.write(token, account, this.balanceOf(token, account) + amount);
  }

  transfer(token: Address, from: Address, to: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new PoolError("InvalidAmount", "negative transfer amount", {
        token,
        amount: amount.toString(),
      });
    }
    const fromBalance = this.balanceOf(token, from);
    if (fromBalance < amount) {
      throw new PoolError("InsufficientBalance", `${from} cannot pay`, {
        token,
        account: from,
        balance: fromBalance.toString(),
        amount: amount.toString(),
      });
    }
    if (amount === 0n || from === to) return;
    this.write(token, from, fromBalance - amount);
    this.write(token, to, this.balanceOf(token, to) + amount);
  }

  checkpoint(): number {
    const id = this.journal.length;
    this.openCheckpoints.push(id);
    return id;
  }

  rollback(checkpoint: number): void {
    this.closeCheckpoint(checkpoint);
    while (this.journal.length > checkpoint) {
      const entry = this.journal.pop();
      if (!entry) break;
      const key = TokenBank.key(entry.token, entry.account);
      this.balances.set(key, entry.previous);
    }
    this.trimJournal();
  }

  release(checkpoint: number): void {
    this.closeCheckpoint(checkpoint);
    this.trimJournal();
  }

  private closeCheckpoint(checkpoint: number): void {
    const last = this.openCheckpoints[this.openCheckpoints.length - 1];
    if (last !== checkpoint) {
      throw new Error(
        `checkpoint ${checkpoint} is not the innermost open checkpoint`
      );
    }
    this.openCheckpoints.pop();
  }

  // nothing can roll back past the outermost checkpoint, so its history goes
  private trimJournal(): void {
    if (this.openCheckpoints.length === 0) this.journal = [];
  }

  private write(token: Address, account: Address, value: bigint): void {
    const key = TokenBank.key(token, account);
    if (this.openCheckpoints.length > 0) {
      const previous = this.balances.get(key) ?? 0n;
      this.journal.push({ token, account, previous });
    }
    this.balances.set(key, value);
  }
}
