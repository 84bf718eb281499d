export type Address = string;

/**
 * Immutable identity of a pool, handed over by the deployer while the pool
 * is being constructed.
 */
export interface PoolParameters {
  factory: Address;
  token0: Address;
  token1: Address;
  fee: number; // hundredths of a bip, 3000 = 0.3%
  tickLower: number;
  tickUpper: number;
}

export interface ParameterSource {
  readonly parameters: PoolParameters | null;
}

/**
 * Balance query + transfer capability over fungible tokens.
 * Transfers move the full amount or throw without moving anything.
 */
export interface TokenLedger {
  balanceOf(token: Address, account: Address): bigint;
  transfer(token: Address, from: Address, to: Address, amount: bigint): void;
}

/**
 * A ledger that can undo its own effects. Checkpoints nest; `release` keeps
 * the effects, `rollback` undoes everything recorded since the checkpoint.
 */
export interface JournaledLedger extends TokenLedger {
  checkpoint(): number;
  rollback(checkpoint: number): void;
  release(checkpoint: number): void;
}

export interface MintCallbackHandler<T = unknown> {
  readonly address: Address;
  onMint(amount0Owed: bigint, amount1Owed: bigint, data: T): void;
}

export interface SwapCallbackHandler<T = unknown> {
  readonly address: Address;
  onSwap(amount0Delta: bigint, amount1Delta: bigint, data: T): void;
}

export interface InitializeEvent {
  type: "Initialize";
  sqrtPriceX96: bigint;
  tick: number;
}

export interface MintEvent {
  type: "Mint";
  sender: Address;
  recipient: Address;
  amount: bigint;
  amount0: bigint;
  amount1: bigint;
}

export interface BurnEvent {
  type: "Burn";
  owner: Address;
  amount: bigint;
  amount0: bigint;
  amount1: bigint;
}

export interface CollectEvent {
  type: "Collect";
  owner: Address;
  recipient: Address;
  amount0: bigint;
  amount1: bigint;
}

export interface SwapEvent {
  type: "Swap";
  sender: Address;
  recipient: Address;
  amount0: bigint;
  amount1: bigint;
  sqrtPriceX96: bigint;
  liquidity: bigint;
  tick: number;
}

export type PoolEvent =
  | InitializeEvent
  | MintEvent
  | BurnEvent
  | CollectEvent
  | SwapEvent;

export interface PoolEventListener {
  onPoolEvent(poolAddress: Address, event: PoolEvent): void;
}

export interface AmountPair {
  amount0: bigint;
  amount1: bigint;
}

export const Q96 = 1n << 96n;
export const Q128 = 1n << 128n;
export const PPM = 1_000_000;
