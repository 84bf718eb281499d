import { readFile } from "node:fs/promises";
import type { Sql } from "../config/database";
import type { Address, PoolEvent, PoolEventListener } from "../types";

export type EventData = Record<string, string | number>;

export interface SequencedEvent {
  seq: number;
  event: PoolEvent;
}

export interface PoolEventRepository {
  insert(poolAddress: Address, events: SequencedEvent[]): Promise<void>;
  list(poolAddress: Address): Promise<SequencedEvent[]>;
  /** Highest stored sequence number for the pool, or null if it has none. */
  lastSeq(poolAddress: Address): Promise<number | null>;
  close(): Promise<void>;
}

const EVENT_NAMES = ["Initialize", "Mint", "Burn", "Collect", "Swap"] as const;
type EventName = (typeof EVENT_NAMES)[number];

function isEventName(name: string): name is EventName {
  return EVENT_NAMES.some((n) => n === name);
}

/**
 * Flattens an event into a JSON-safe record; bigints become decimal strings.
 */
export function encodeEvent(event: PoolEvent): EventData {
  const data: EventData = {};
  for (const [key, value] of Object.entries(event)) {
    if (key === "type") continue;
    if (typeof value === "bigint") data[key] = value.toString();
    else if (typeof value === "string" || typeof value === "number") {
      data[key] = value;
    }
  }
  return data;
}

function field(data: EventData, key: string): string {
  const value = data[key];
  if (value === undefined) throw new Error(`event data is missing "${key}"`);
  return String(value);
}

function big(data: EventData, key: string): bigint {
  return BigInt(field(data, key));
}

function int(data: EventData, key: string): number {
  const value = Number(field(data, key));
  if (!Number.isInteger(value)) {
    throw new Error(`event field "${key}" is not an integer`);
  }
  return value;
}

export function decodeEvent(name: string, data: EventData): PoolEvent {
  if (!isEventName(name)) throw new Error(`unknown pool event "${name}"`);
  switch (name) {
    case "Initialize":
      return {
        type: name,
        sqrtPriceX96: big(data, "sqrtPriceX96"),
        tick: int(data, "tick"),
      };
    case "Mint":
      return {
        type: name,
        sender: field(data, "sender"),
        recipient: field(data, "recipient"),
        amount: big(data, "amount"),
        amount0: big(data, "amount0"),
        amount1: big(data, "amount1"),
      };
    case "Burn":
      return {
        type: name,
        owner: field(data, "owner"),
        amount: big(data, "amount"),
        amount0: big(data, "amount0"),
        amount1: big(data, "amount1"),
      };
    case "Collect":
      return {
        type: name,
        owner: field(data, "owner"),
        recipient: field(data, "recipient"),
        amount0: big(data, "amount0"),
        amount1: big(data, "amount1"),
      };
    case "Swap":
      return {
        type: name,
        sender: field(data, "sender"),
        recipient: field(data, "recipient"),
        amount0: big(data, "amount0"),
        amount1: big(data, "amount1"),
        sqrtPriceX96: big(data, "sqrtPriceX96"),
        liquidity: big(data, "liquidity"),
        tick: int(data, "tick"),
      };
  }
}

type StoredRow = { seq: number; name: string; data: EventData };

type EventRow = {
  seq: number;
  event_name: string;
  data: EventData;
};

export class PostgresPoolEventRepository implements PoolEventRepository {
  private readonly sql: Sql;

  constructor(sql: Sql) {
    this.sql = sql;
  }

  /**
   * Creates the pool_events table if it does not exist yet.
   */
  async ensureSchema(): Promise<void> {
    const ddl = await readFile(
      new URL("../../sql/pool_events.sql", import.meta.url),
      "utf8"
    );
    await this.sql.unsafe(ddl);
  }

  async insert(poolAddress: Address, events: SequencedEvent[]): Promise<void> {
    if (events.length === 0) return;
    await this.sql.begin(async (tx) => {
      for (const { seq, event } of events) {
        await tx.unsafe(
          `INSERT INTO pool_events (pool_address, seq, event_name, data) VALUES ($1, $2, $3, $4::jsonb)`,
          [poolAddress, seq, event.type, JSON.stringify(encodeEvent(event))]
        );
      }
    });
  }

  async list(poolAddress: Address): Promise<SequencedEvent[]> {
    const rows = await this.sql.unsafe<EventRow[]>(
      `SELECT seq, event_name, data FROM pool_events WHERE pool_address = $1 ORDER BY seq ASC`,
      [poolAddress]
    );
    return rows.map((row) => ({
      seq: row.seq,
      event: decodeEvent(row.event_name, row.data),
    }));
  }

  async lastSeq(poolAddress: Address): Promise<number | null> {
    const rows = await this.sql.unsafe<Array<{ seq: number | null }>>(
      `SELECT MAX(seq) AS seq FROM pool_events WHERE pool_address = $1`,
      [poolAddress]
    );
    return rows[0]?.seq ?? null;
  }

  async close(): Promise<void> {
    await this.sql.end();
  }
}

export class InMemoryPoolEventRepository implements PoolEventRepository {
  private readonly rows: Map<Address, StoredRow[]> = new Map();

  async insert(poolAddress: Address, events: SequencedEvent[]): Promise<void> {
    const existing = this.rows.get(poolAddress) ?? [];
    const seen = new Set(existing.map((row) => row.seq));
    for (const { seq } of events) {
      if (seen.has(seq)) {
        throw new Error(`duplicate event ${seq} for pool ${poolAddress}`);
      }
      seen.add(seq);
    }
    const added = events.map(({ seq, event }) => ({
      seq,
      name: event.type,
      data: encodeEvent(event),
    }));
    this.rows.set(poolAddress, [...existing, ...added]);
  }

  async list(poolAddress: Address): Promise<SequencedEvent[]> {
    const rows = this.rows.get(poolAddress) ?? [];
    return [...rows]
      .sort((a, b) => a.seq - b.seq)
      .map((row) => ({ seq: row.seq, event: decodeEvent(row.name, row.data) }));
  }

  async lastSeq(poolAddress: Address): Promise<number | null> {
    const rows = this.rows.get(poolAddress) ?? [];
    if (rows.length === 0) return null;
    return Math.max(...rows.map((row) => row.seq));
  }

  async close(): Promise<void> {
    this.rows.clear();
  }
}

/**
 * Listener that buffers committed events until `flush` writes them out. Each
 * pool's numbering continues after the highest sequence number the
 * repository already holds. A failed flush keeps the buffer for a retry.
 */
export class PoolEventRecorder implements PoolEventListener {
  private readonly repository: PoolEventRepository;
  private readonly logger?: Partial<Console>;
  private buffer: Array<{ poolAddress: Address; event: PoolEvent }> = [];
  private readonly nextSeq: Map<Address, number> = new Map();

  constructor(repository: PoolEventRepository, logger?: Partial<Console>) {
    this.repository = repository;
    this.logger = logger;
  }

  get pending(): number {
    return this.buffer.length;
  }

  onPoolEvent(poolAddress: Address, event: PoolEvent): void {
    this.buffer.push({ poolAddress, event });
  }

  async flush(): Promise<number> {
    const byPool = new Map<Address, PoolEvent[]>();
    for (const { poolAddress, event } of this.buffer) {
      const list = byPool.get(poolAddress) ?? [];
      list.push(event);
      byPool.set(poolAddress, list);
    }

    let written = 0;
    for (const [poolAddress, events] of byPool) {
      const first = await this.firstFreeSeq(poolAddress);
      await this.repository.insert(
        poolAddress,
        events.map((event, i) => ({ seq: first + i, event }))
      );
      this.nextSeq.set(poolAddress, first + events.length);
      written += events.length;
      this.buffer = this.buffer.filter((e) => e.poolAddress !== poolAddress);
      this.logger?.info?.(
        `[PoolEventRecorder] stored ${events.length} events for ${poolAddress} from seq ${first}`
      );
    }
    return written;
  }

  private async firstFreeSeq(poolAddress: Address): Promise<number> {
    const known = this.nextSeq.get(poolAddress);
    if (known !== undefined) return known;
    const last = await this.repository.lastSeq(poolAddress);
    return last === null ? 0 : last + 1;
  }
}
