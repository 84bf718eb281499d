/**
 * Error kinds raised by the pool engine.
 *
 * Every failed pool call aborts with one of these and leaves no partial state
 * behind; callers tell "bad input" apart from "payment not received" or
 * "math overflow" through `code`.
 */
export type PoolErrorCode =
  | "InvalidAmount"
  | "InvalidPriceLimit"
  | "AlreadyInitialized"
  | "NotInitialized"
  | "InsufficientLiquidity"
  | "InsufficientPayment"
  | "InsufficientInput"
  | "InsufficientBalance"
  | "InvalidParameters"
  | "Overflow"
  | "OutOfBounds";

export type PoolErrorDetails = Record<string, string | number | boolean>;

export class PoolError extends Error {
  readonly code: PoolErrorCode;
  readonly details: PoolErrorDetails;

  constructor(
    code: PoolErrorCode,
    message: string,
    details: PoolErrorDetails = {}
  ) {
    super(`${code}: ${message}`);
    this.name = "PoolError";
    this.code = code;
    this.details = details;
  }
}

export function isPoolError(
  err: unknown,
  code?: PoolErrorCode
): err is PoolError {
  if (!(err instanceof PoolError)) return false;
  return code === undefined || err.code === code;
}
