// pool.ts
import { PoolError } from "./errors";
import { MAX_UINT128, addUint256, mulDiv, toInt256 } from "./full_math";
import { addLiquidityDelta } from "./liquidity_math";
import {
  PositionTable,
  creditOwed,
  settlePosition,
  takeOwed,
  type FeeGrowthInside,
  type FeeGrowthSource,
  type PositionInfo,
} from "./position";
import {
  signedAmount0Delta,
  signedAmount1Delta,
} from "./sqrt_price_math";
import { computeSwapStep } from "./swap_math";
import {
  MAX_SQRT_RATIO,
  MIN_SQRT_RATIO,
  sqrtPriceAtTick,
  tickAtSqrtPrice,
} from "./tick_math";
import {
  Q128,
  type Address,
  type AmountPair,
  type JournaledLedger,
  type MintCallbackHandler,
  type ParameterSource,
  type PoolEvent,
  type PoolEventListener,
  type SwapCallbackHandler,
} from "./types";

export interface PoolOptions {
  logger?: Partial<Console>;
}

type PoolState = {
  initialized: boolean;
  sqrtPriceX96: bigint;
  tick: number;
  liquidity: bigint; // active, zero while the price sits outside the range
  rangeLiquidity: bigint; // sum of all positions
  feeGrowthGlobal0X128: bigint;
  feeGrowthGlobal1X128: bigint;
  // net balance change the pool has already explained: verified payments
  // minus payouts, so a nested call's flows are not counted twice
  accounted0: bigint;
  accounted1: bigint;
};

type TokenSide = 0 | 1;

type BalanceMark = {
  balance: bigint;
  accounted: bigint;
};

type PoolSnapshot = {
  state: PoolState;
  positions: Map<Address, PositionInfo>;
  eventCount: number;
};

export interface SwapQuote extends AmountPair {
  sqrtPriceX96: bigint;
  tick: number;
  liquidity: bigint;
  feeGrowthGlobalX128: bigint; // accumulator of the input token after the swap
  feeAmount: bigint;
  amountSpecifiedRemaining: bigint;
  steps: number;
}

/**
 * Concentrated-liquidity pool with exactly one price range and one position
 * per owner.
 *
 * Every public mutation runs as one atomic transition: state is updated
 * before any callback runs, balances are verified after it returns, and a
 * throw anywhere restores the pool and rolls the ledger back to where the
 * call started.
 */
export class SingleRangePool implements FeeGrowthSource {
  readonly address: Address;
  readonly factory: Address;
  readonly token0: Address;
  readonly token1: Address;
  readonly fee: number;
  readonly tickLower: number;
  readonly tickUpper: number;
  readonly sqrtPriceLowerX96: bigint;
  readonly sqrtPriceUpperX96: bigint;

  private state: PoolState = {
    initialized: false,
    sqrtPriceX96: 0n,
    tick: 0,
    liquidity: 0n,
    rangeLiquidity: 0n,
    feeGrowthGlobal0X128: 0n,
    feeGrowthGlobal1X128: 0n,
    accounted0: 0n,
    accounted1: 0n,
  };
  private readonly positions = new PositionTable();
  private eventLog: PoolEvent[] = [];
  private readonly listeners: PoolEventListener[] = [];
  private depth = 0;

  private readonly ledger: JournaledLedger;
  private readonly logger?: Partial<Console>;

  constructor(
    address: Address,
    deployer: ParameterSource,
    ledger: JournaledLedger,
    options: PoolOptions = {}
  ) {
    const params = deployer.parameters;
    if (!params) {
      throw new PoolError(
        "InvalidParameters",
        "pool parameters are only available during deployment"
      );
    }
    this.address = address;
    this.factory = params.factory;
    this.token0 = params.token0;
    this.token1 = params.token1;
    this.fee = params.fee;
    this.tickLower = params.tickLower;
    this.tickUpper = params.tickUpper;
    this.sqrtPriceLowerX96 = sqrtPriceAtTick(params.tickLower);
    this.sqrtPriceUpperX96 = sqrtPriceAtTick(params.tickUpper);

    this.ledger = ledger;
    this.logger = options.logger;
  }

  get initialized(): boolean {
    return this.state.initialized;
  }

  get sqrtPriceX96(): bigint {
    return this.state.sqrtPriceX96;
  }

  get tick(): number {
    return this.state.tick;
  }

  get liquidity(): bigint {
    return this.state.liquidity;
  }

  get feeGrowthGlobal0X128(): bigint {
    return this.state.feeGrowthGlobal0X128;
  }

  get feeGrowthGlobal1X128(): bigint {
    return this.state.feeGrowthGlobal1X128;
  }

  get events(): readonly PoolEvent[] {
    return [...this.eventLog];
  }

  get inRange(): boolean {
    return (
      this.state.tick >= this.tickLower && this.state.tick < this.tickUpper
    );
  }

  position(owner: Address): PositionInfo {
    return this.positions.get(owner);
  }

  positionEntries(): Array<[Address, PositionInfo]> {
    return this.positions.entries();
  }

  addListener(listener: PoolEventListener): void {
    this.listeners.push(listener);
  }

  feeGrowthInside(tickLower: number, tickUpper: number): FeeGrowthInside {
    if (tickLower !== this.tickLower || tickUpper !== this.tickUpper) {
      throw new PoolError("InvalidParameters", "unknown range", {
        tickLower,
        tickUpper,
      });
    }
    return {
      feeGrowthInside0X128: this.state.feeGrowthGlobal0X128,
      feeGrowthInside1X128: this.state.feeGrowthGlobal1X128,
    };
  }

  // ----- Initialize -----
  initialize(sqrtPriceX96: bigint): void {
    this.atomically("initialize", () => {
      if (this.state.initialized) {
        throw new PoolError("AlreadyInitialized", "price is already set", {
          sqrtPriceX96: this.state.sqrtPriceX96.toString(),
        });
      }
      if (sqrtPriceX96 >= MAX_SQRT_RATIO) {
        throw new PoolError("OutOfBounds", "initial price too high", {
          sqrtPriceX96: sqrtPriceX96.toString(),
        });
      }
      const tick = tickAtSqrtPrice(sqrtPriceX96);

      this.state = { ...this.state, initialized: true, sqrtPriceX96, tick };
      this.emit({ type: "Initialize", sqrtPriceX96, tick });
      this.logger?.debug?.(
        `[SingleRangePool] initialize ${this.address} sqrtPriceX96=${sqrtPriceX96} tick=${tick}`
      );
    });
  }

  // ----- Mint -----
  mint<T>(
    caller: MintCallbackHandler<T>,
    recipient: Address,
    amount: bigint,
    data: T
  ): AmountPair {
    return this.atomically("mint", () => {
      this.requireInitialized();
      if (amount <= 0n) {
        throw new PoolError("InvalidAmount", "mint amount must be positive", {
          amount: amount.toString(),
        });
      }

      const { amount0, amount1 } = this.modifyPosition(recipient, amount);

      const before0 = this.mark(0);
      const before1 = this.mark(1);
      caller.onMint(amount0, amount1, data);
      if (amount0 > 0n) {
        this.verifyPaid("InsufficientPayment", 0, before0, amount0);
      }
      if (amount1 > 0n) {
        this.verifyPaid("InsufficientPayment", 1, before1, amount1);
      }

      this.emit({
        type: "Mint",
        sender: caller.address,
        recipient,
        amount,
        amount0,
        amount1,
      });
      this.logger?.debug?.(
        `[SingleRangePool] mint recipient=${recipient} L=${amount} amount0=${amount0} amount1=${amount1}`
      );
      return { amount0, amount1 };
    });
  }

  // ----- Burn -----
  /**
   * Removes liquidity and credits the released tokens (plus settled fees) as
   * owed; nothing is transferred until `collect`. Burning zero settles fees.
   */
  burn(owner: Address, amount: bigint): AmountPair {
    return this.atomically("burn", () => {
      this.requireInitialized();
      if (amount < 0n) {
        throw new PoolError("InvalidAmount", "negative burn amount", {
          amount: amount.toString(),
        });
      }
      const existing = this.positions.get(owner);
      if (amount > existing.liquidity) {
        throw new PoolError("InsufficientLiquidity", "burn exceeds position", {
          owner,
          requested: amount.toString(),
          available: existing.liquidity.toString(),
        });
      }
      if (amount === 0n && existing.liquidity === 0n) {
        throw new PoolError("InsufficientLiquidity", "no position to poke", {
          owner,
        });
      }

      const delta = this.modifyPosition(owner, -amount);
      const owed = { amount0: -delta.amount0, amount1: -delta.amount1 };
      if (owed.amount0 > 0n || owed.amount1 > 0n) {
        this.positions.set(owner, creditOwed(this.positions.get(owner), owed));
      }

      this.emit({ type: "Burn", owner, amount, ...owed });
      this.logger?.debug?.(
        `[SingleRangePool] burn owner=${owner} L=${amount} amount0=${owed.amount0} amount1=${owed.amount1}`
      );
      return owed;
    });
  }

  // ----- Collect -----
  collect(
    owner: Address,
    recipient: Address,
    amount0Requested: bigint = MAX_UINT128,
    amount1Requested: bigint = MAX_UINT128
  ): AmountPair {
    return this.atomically("collect", () => {
      this.requireInitialized();

      let paid: AmountPair = { amount0: 0n, amount1: 0n };
      if (this.positions.has(owner)) {
        const { feeGrowthInside0X128, feeGrowthInside1X128 } =
          this.feeGrowthInside(this.tickLower, this.tickUpper);
        const settled = settlePosition(
          this.positions.get(owner),
          0n,
          feeGrowthInside0X128,
          feeGrowthInside1X128
        );
        const taken = takeOwed(settled, amount0Requested, amount1Requested);
        this.positions.set(owner, taken.position);
        paid = taken.paid;
      } else if (amount0Requested < 0n || amount1Requested < 0n) {
        throw new PoolError("InvalidAmount", "requested amount is negative");
      }

      if (paid.amount0 > 0n) this.payOut(0, recipient, paid.amount0);
      if (paid.amount1 > 0n) this.payOut(1, recipient, paid.amount1);

      this.emit({ type: "Collect", owner, recipient, ...paid });
      this.logger?.debug?.(
        `[SingleRangePool] collect owner=${owner} recipient=${recipient} amount0=${paid.amount0} amount1=${paid.amount1}`
      );
      return paid;
    });
  }

  // ----- Swap -----
  /**
   * Runs the swap loop without touching any state.
   */
  quoteSwap(
    zeroForOne: boolean,
    amountSpecified: bigint,
    sqrtPriceLimitX96: bigint
  ): SwapQuote {
    this.requireInitialized();
    if (amountSpecified === 0n) {
      throw new PoolError("InvalidAmount", "swap amount must not be zero");
    }
    toInt256(amountSpecified);

    const sqrtPriceX96 = this.state.sqrtPriceX96;
    const validLimit = zeroForOne
      ? sqrtPriceLimitX96 < sqrtPriceX96 && sqrtPriceLimitX96 > MIN_SQRT_RATIO
      : sqrtPriceLimitX96 > sqrtPriceX96 && sqrtPriceLimitX96 < MAX_SQRT_RATIO;
    if (!validLimit) {
      throw new PoolError("InvalidPriceLimit", "limit on the wrong side", {
        zeroForOne,
        sqrtPriceX96: sqrtPriceX96.toString(),
        sqrtPriceLimitX96: sqrtPriceLimitX96.toString(),
      });
    }

    return this.computeSwap(zeroForOne, amountSpecified, sqrtPriceLimitX96);
  }

  swap<T>(
    caller: SwapCallbackHandler<T>,
    recipient: Address,
    zeroForOne: boolean,
    amountSpecified: bigint,
    sqrtPriceLimitX96: bigint,
    data: T
  ): AmountPair {
    return this.atomically("swap", () => {
      const quote = this.quoteSwap(
        zeroForOne,
        amountSpecified,
        sqrtPriceLimitX96
      );
      const { amount0, amount1 } = quote;

      this.state = {
        ...this.state,
        sqrtPriceX96: quote.sqrtPriceX96,
        tick: quote.tick,
        liquidity: quote.liquidity,
        ...(zeroForOne
          ? { feeGrowthGlobal0X128: quote.feeGrowthGlobalX128 }
          : { feeGrowthGlobal1X128: quote.feeGrowthGlobalX128 }),
      };

      // pay out first, then pull the input through the callback
      const [inSide, outSide]: [TokenSide, TokenSide] = zeroForOne
        ? [0, 1]
        : [1, 0];
      const [amountIn, amountOut] = zeroForOne
        ? [amount0, amount1]
        : [amount1, amount0];
      if (amountOut < 0n) this.payOut(outSide, recipient, -amountOut);

      const before = this.mark(inSide);
      caller.onSwap(amount0, amount1, data);
      this.verifyPaid("InsufficientInput", inSide, before, amountIn);

      this.emit({
        type: "Swap",
        sender: caller.address,
        recipient,
        amount0,
        amount1,
        sqrtPriceX96: quote.sqrtPriceX96,
        liquidity: quote.liquidity,
        tick: quote.tick,
      });
      if (quote.amountSpecifiedRemaining !== 0n) {
        this.logger?.info?.(
          `[SingleRangePool] swap partially filled, remaining=${quote.amountSpecifiedRemaining} tick=${quote.tick}`
        );
      }
      this.logger?.debug?.(
        `[SingleRangePool] swap zeroForOne=${zeroForOne} amount0=${amount0} amount1=${amount1} fee=${quote.feeAmount} steps=${quote.steps}`
      );
      return { amount0, amount1 };
    });
  }

  /***************** Private internals *****************/
  private computeSwap(
    zeroForOne: boolean,
    amountSpecified: bigint,
    sqrtPriceLimitX96: bigint
  ): SwapQuote {
    const exactInput = amountSpecified > 0n;

    let amountSpecifiedRemaining = amountSpecified;
    let amountCalculated = 0n;
    let sqrtPriceX96 = this.state.sqrtPriceX96;
    let tick = this.state.tick;
    let liquidity = this.state.liquidity;
    let feeGrowthGlobalX128 = zeroForOne
      ? this.state.feeGrowthGlobal0X128
      : this.state.feeGrowthGlobal1X128;
    let feeAmount = 0n;
    let steps = 0;

    while (
      amountSpecifiedRemaining !== 0n &&
      sqrtPriceX96 !== sqrtPriceLimitX96
    ) {
      // the only boundary the price can meet next in this direction
      let boundaryTick: number;
      if (zeroForOne) {
        if (tick < this.tickLower) break;
        boundaryTick = tick >= this.tickUpper ? this.tickUpper : this.tickLower;
      } else {
        if (tick >= this.tickUpper) break;
        boundaryTick = tick < this.tickLower ? this.tickLower : this.tickUpper;
      }
      const sqrtBoundaryX96 =
        boundaryTick === this.tickLower
          ? this.sqrtPriceLowerX96
          : this.sqrtPriceUpperX96;

      if (liquidity === 0n) {
        // outside the range nothing can fill; only a price sitting exactly
        // on the boundary may step back in
        if (sqrtPriceX96 !== sqrtBoundaryX96) break;
        ({ tick, liquidity } = this.crossBoundary(boundaryTick, zeroForOne));
        continue;
      }

      const sqrtTargetX96 = zeroForOne
        ? sqrtPriceLimitX96 > sqrtBoundaryX96
          ? sqrtPriceLimitX96
          : sqrtBoundaryX96
        : sqrtPriceLimitX96 < sqrtBoundaryX96
        ? sqrtPriceLimitX96
        : sqrtBoundaryX96;

      const step = computeSwapStep(
        sqrtPriceX96,
        sqrtTargetX96,
        liquidity,
        amountSpecifiedRemaining,
        this.fee
      );
      steps++;

      if (exactInput) {
        amountSpecifiedRemaining -= step.amountIn + step.feeAmount;
        amountCalculated -= step.amountOut;
      } else {
        amountSpecifiedRemaining += step.amountOut;
        amountCalculated += step.amountIn + step.feeAmount;
      }

      feeAmount += step.feeAmount;
      feeGrowthGlobalX128 = addUint256(
        feeGrowthGlobalX128,
        mulDiv(step.feeAmount, Q128, liquidity)
      );

      if (step.sqrtPriceNextX96 === sqrtBoundaryX96) {
        ({ tick, liquidity } = this.crossBoundary(boundaryTick, zeroForOne));
      } else if (step.sqrtPriceNextX96 !== sqrtPriceX96) {
        tick = tickAtSqrtPrice(step.sqrtPriceNextX96);
      }
      sqrtPriceX96 = step.sqrtPriceNextX96;
    }

    const [amount0, amount1] =
      zeroForOne === exactInput
        ? [amountSpecified - amountSpecifiedRemaining, amountCalculated]
        : [amountCalculated, amountSpecified - amountSpecifiedRemaining];

    return {
      amount0,
      amount1,
      sqrtPriceX96,
      tick,
      liquidity,
      feeGrowthGlobalX128,
      feeAmount,
      amountSpecifiedRemaining,
      steps,
    };
  }

  /**
   * Tick and active liquidity just after the price passes `boundaryTick`.
   * Moving down across tickLower or up across tickUpper leaves the range.
   */
  private crossBoundary(
    boundaryTick: number,
    zeroForOne: boolean
  ): { tick: number; liquidity: bigint } {
    const leaving =
      (zeroForOne && boundaryTick === this.tickLower) ||
      (!zeroForOne && boundaryTick === this.tickUpper);
    return {
      tick: zeroForOne ? boundaryTick - 1 : boundaryTick,
      liquidity: leaving ? 0n : this.state.rangeLiquidity,
    };
  }

  /**
   * Settles the owner's fees, applies the liquidity delta to the position,
   * the range and (when in range) the active liquidity, and returns the
   * signed token amounts the change is worth at the current price.
   */
  private modifyPosition(owner: Address, liquidityDelta: bigint): AmountPair {
    const { feeGrowthInside0X128, feeGrowthInside1X128 } =
      this.feeGrowthInside(this.tickLower, this.tickUpper);
    const position = settlePosition(
      this.positions.get(owner),
      liquidityDelta,
      feeGrowthInside0X128,
      feeGrowthInside1X128
    );

    const { sqrtPriceX96, tick } = this.state;
    let amount0 = 0n;
    let amount1 = 0n;
    let liquidity = this.state.liquidity;

    if (tick < this.tickLower) {
      amount0 = signedAmount0Delta(
        this.sqrtPriceLowerX96,
        this.sqrtPriceUpperX96,
        liquidityDelta
      );
    } else if (tick < this.tickUpper) {
      amount0 = signedAmount0Delta(
        sqrtPriceX96,
        this.sqrtPriceUpperX96,
        liquidityDelta
      );
      amount1 = signedAmount1Delta(
        this.sqrtPriceLowerX96,
        sqrtPriceX96,
        liquidityDelta
      );
      liquidity = addLiquidityDelta(liquidity, liquidityDelta);
    } else {
      amount1 = signedAmount1Delta(
        this.sqrtPriceLowerX96,
        this.sqrtPriceUpperX96,
        liquidityDelta
      );
    }

    const rangeLiquidity = addLiquidityDelta(
      this.state.rangeLiquidity,
      liquidityDelta
    );

    this.positions.set(owner, position);
    this.state = { ...this.state, liquidity, rangeLiquidity };
    return { amount0, amount1 };
  }

  private tokenOf(side: TokenSide): Address {
    return side === 0 ? this.token0 : this.token1;
  }

  private mark(side: TokenSide): BalanceMark {
    return {
      balance: this.ledger.balanceOf(this.tokenOf(side), this.address),
      accounted: side === 0 ? this.state.accounted0 : this.state.accounted1,
    };
  }

  private account(side: TokenSide, delta: bigint): void {
    this.state =
      side === 0
        ? { ...this.state, accounted0: this.state.accounted0 + delta }
        : { ...this.state, accounted1: this.state.accounted1 + delta };
  }

  private payOut(side: TokenSide, recipient: Address, amount: bigint): void {
    this.ledger.transfer(this.tokenOf(side), this.address, recipient, amount);
    this.account(side, -amount);
  }

  /**
   * Checks that the callback itself delivered `amountOwed`. Flows of calls
   * nested inside the callback are already accounted for and do not count.
   */
  private verifyPaid(
    code: "InsufficientPayment" | "InsufficientInput",
    side: TokenSide,
    before: BalanceMark,
    amountOwed: bigint
  ): void {
    const after = this.mark(side);
    const received =
      after.balance - before.balance - (after.accounted - before.accounted);
    if (received < amountOwed) {
      const token = this.tokenOf(side);
      throw new PoolError(code, `pool did not receive ${token}`, {
        token,
        expected: amountOwed.toString(),
        received: received.toString(),
      });
    }
    this.account(side, amountOwed);
  }

  private requireInitialized(): void {
    if (!this.state.initialized) {
      throw new PoolError("NotInitialized", "pool has no price yet");
    }
  }

  private emit(event: PoolEvent): void {
    this.eventLog.push(event);
  }

  private snapshot(): PoolSnapshot {
    return {
      state: { ...this.state },
      positions: this.positions.snapshot(),
      eventCount: this.eventLog.length,
    };
  }

  private restore(snapshot: PoolSnapshot): void {
    this.state = { ...snapshot.state };
    this.positions.restore(snapshot.positions);
    this.eventLog = this.eventLog.slice(0, snapshot.eventCount);
  }

  /**
   * Runs `body` as one all-or-nothing transition. Nested (reentrant) calls
   * get their own checkpoint; listeners hear about events once the outermost
   * call has committed.
   */
  private atomically<R>(operation: string, body: () => R): R {
    const snapshot = this.snapshot();
    const checkpoint = this.ledger.checkpoint();
    this.depth++;

    let result: R;
    try {
      result = body();
    } catch (err) {
      this.depth--;
      this.restore(snapshot);
      this.ledger.rollback(checkpoint);
      this.logger?.debug?.(
        `[SingleRangePool] ${operation} reverted: ${err instanceof Error ? err.message : String(err)}`
      );
      throw err;
    }

    this.depth--;
    this.ledger.release(checkpoint);
    if (this.depth === 0) {
      this.notify(this.eventLog.slice(snapshot.eventCount));
    }
    return result;
  }

  private notify(events: PoolEvent[]): void {
    for (const event of events) {
      for (const listener of this.listeners) {
        try {
          listener.onPoolEvent(this.address, event);
        } catch (err) {
          this.logger?.error?.(
            `[SingleRangePool] listener failed on ${event.type}:`,
            err
          );
        }
      }
    }
  }

  /***************** Inspection helpers *****************/
  stateToJSON() {
    return {
      address: this.address,
      token0: this.token0,
      token1: this.token1,
      fee: this.fee,
      tickLower: this.tickLower,
      tickUpper: this.tickUpper,
      initialized: this.state.initialized,
      sqrtPriceX96: this.state.sqrtPriceX96.toString(),
      tick: this.state.tick,
      liquidity: this.state.liquidity.toString(),
      rangeLiquidity: this.state.rangeLiquidity.toString(),
      feeGrowthGlobal0X128: this.state.feeGrowthGlobal0X128.toString(),
      feeGrowthGlobal1X128: this.state.feeGrowthGlobal1X128.toString(),
      positions: this.positions.entries().map(([owner, p]) => ({
        owner,
        liquidity: p.liquidity.toString(),
        owed0: p.tokensOwed0.toString(),
        owed1: p.tokensOwed1.toString(),
      })),
    };
  }
}

export default SingleRangePool;
