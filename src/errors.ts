/**
 * Pair Errors
 *
 * Every failure raised by the pricing engine is a `PairError`. The `code`
 * field is a string literal so callers can switch on it without importing
 * the subclasses; `instanceof` works as well.
 */

export type PairErrorCode =
  | "ARITHMETIC_OVERFLOW"
  | "ARITHMETIC_UNDERFLOW"
  | "INVALID_ASSET"
  | "INVALID_FEE"
  | "INVALID_DECIMAL"
  | "SLIPPAGE_EXCEEDED"
  | "SPREAD_EXCEEDED"
  | "RETURN_BELOW_EXPECTED"
  | "DEGENERATE_STATE";

export class PairError extends Error {
  readonly code: PairErrorCode;

  constructor(code: PairErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = "PairError";
  }
}

export type ArithmeticErrorKind = "overflow" | "underflow";

/**
 * A checked operation could not produce an exact in-range result
 */
export class ArithmeticError extends PairError {
  readonly kind: ArithmeticErrorKind;

  constructor(kind: ArithmeticErrorKind, message: string) {
    super(kind === "overflow" ? "ARITHMETIC_OVERFLOW" : "ARITHMETIC_UNDERFLOW", message);
    this.kind = kind;
    this.name = "ArithmeticError";
  }
}

export class InvalidAssetError extends PairError {
  constructor(message: string) {
    super("INVALID_ASSET", message);
    this.name = "InvalidAssetError";
  }
}

export class InvalidFeeError extends PairError {
  constructor(nom: bigint, denom: bigint) {
    super("INVALID_FEE", `Invalid fee rate ${nom}/${denom}: nominator must not exceed denominator`);
    this.name = "InvalidFeeError";
  }
}

export class InvalidDecimalError extends PairError {
  constructor(input: string) {
    super("INVALID_DECIMAL", `Invalid decimal: "${input}"`);
    this.name = "InvalidDecimalError";
  }
}

/**
 * Zero supply on withdrawal, zero reserve on swap, or any division by zero
 */
export class DegenerateStateError extends PairError {
  constructor(message: string) {
    super("DEGENERATE_STATE", message);
    this.name = "DegenerateStateError";
  }
}

export class SlippageExceededError extends PairError {
  constructor() {
    super("SLIPPAGE_EXCEEDED", "Operation exceeds max slippage tolerance");
    this.name = "SlippageExceededError";
  }
}

export class SpreadExceededError extends PairError {
  /** True when the check was made against a caller-supplied belief price */
  readonly withBeliefPrice: boolean;

  constructor(withBeliefPrice: boolean) {
    super(
      "SPREAD_EXCEEDED",
      withBeliefPrice
        ? "Operation exceeds max spread limit with belief_price"
        : "Operation exceeds max spread limit"
    );
    this.withBeliefPrice = withBeliefPrice;
    this.name = "SpreadExceededError";
  }
}

export class ReturnBelowExpectedError extends PairError {
  readonly expectedReturn: bigint;
  readonly returnAmount: bigint;

  constructor(expectedReturn: bigint, returnAmount: bigint) {
    super(
      "RETURN_BELOW_EXPECTED",
      `Operation fell short of expected_return: expected ${expectedReturn}, got ${returnAmount}`
    );
    this.expectedReturn = expectedReturn;
    this.returnAmount = returnAmount;
    this.name = "ReturnBelowExpectedError";
  }
}

/**
 * Type guard for engine failures, optionally narrowed to one code
 */
export function isPairError(value: unknown, code?: PairErrorCode): value is PairError {
  if (!(value instanceof PairError)) return false;
  return code === undefined || value.code === code;
}
