/**
 * Wide-Integer Arithmetic
 *
 * Checked unsigned 256-bit operations on native bigints. Each operation
 * returns `undefined` instead of wrapping, so intermediate values can be
 * nested the way the formula reads and the first failure propagates:
 *
 * ```typescript
 * const share = div(mul(deposit, totalShare), pool); // bigint | undefined
 * ```
 *
 * Call sites turn an absent result into an `ArithmeticError` with
 * `expectValue`, naming the formula and its operands.
 */

import { ArithmeticError } from "./errors";

// Bounds
export const U64_MAX = (1n << 64n) - 1n;
export const U128_MAX = (1n << 128n) - 1n;
export const U256_MAX = (1n << 256n) - 1n;

export type MaybeUint = bigint | undefined;

function inRange(value: bigint): boolean {
  return value >= 0n && value <= U256_MAX;
}

function checked(value: bigint): MaybeUint {
  return inRange(value) ? value : undefined;
}

export function add(a: MaybeUint, b: MaybeUint): MaybeUint {
  if (a === undefined || b === undefined || !inRange(a) || !inRange(b)) return undefined;
  return checked(a + b);
}

export function sub(a: MaybeUint, b: MaybeUint): MaybeUint {
  if (a === undefined || b === undefined || !inRange(a) || !inRange(b)) return undefined;
  return checked(a - b);
}

export function mul(a: MaybeUint, b: MaybeUint): MaybeUint {
  if (a === undefined || b === undefined || !inRange(a) || !inRange(b)) return undefined;
  return checked(a * b);
}

/**
 * Floor division; absent when the divisor is zero
 */
export function div(a: MaybeUint, b: MaybeUint): MaybeUint {
  if (a === undefined || b === undefined || !inRange(a) || !inRange(b)) return undefined;
  if (b === 0n) return undefined;
  return a / b;
}

/**
 * Ceiling division; absent when the divisor is zero
 */
export function divCeil(a: MaybeUint, b: MaybeUint): MaybeUint {
  const quotient = div(a, b);
  if (quotient === undefined || a === undefined || b === undefined) return undefined;
  return quotient * b === a ? quotient : quotient + 1n;
}

/**
 * Integer square root (floor) using Newton's method
 *
 * @param x - Value in [0, U256_MAX]
 * @returns floor(sqrt(x)), or undefined when x is absent or out of range
 */
export function sqrt(x: MaybeUint): MaybeUint {
  if (x === undefined || !inRange(x)) return undefined;
  if (x < 2n) return x;

  // Iterates downwards from x and stops at floor(sqrt(x))
  let z = x;
  let y = (x + 1n) / 2n;
  while (y < z) {
    z = y;
    y = (x / y + y) / 2n;
  }
  return z;
}

export function saturatingSub(a: bigint, b: bigint): bigint {
  return a > b ? a - b : 0n;
}

export function min(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

/**
 * Unwrap a checked result or fail with an ArithmeticError
 *
 * @param value - Result of a checked operation
 * @param describe - Renders the failed formula with its operands
 * @param kind - Failure kind reported when the value is absent
 */
export function expectValue(
  value: MaybeUint,
  describe: () => string,
  kind: "overflow" | "underflow" = "overflow"
): bigint {
  if (value === undefined) {
    throw new ArithmeticError(kind, `Cannot calculate ${describe()}`);
  }
  return value;
}

/**
 * Narrow a 256-bit intermediate to the native 128-bit amount size.
 * Values that do not fit fail; they are never truncated to their low bits.
 */
export function toUint128(value: bigint, label: string): bigint {
  if (value < 0n) {
    throw new ArithmeticError("underflow", `${label} ${value} is negative`);
  }
  if (value > U128_MAX) {
    throw new ArithmeticError("overflow", `${label} ${value} does not fit in 128 bits`);
  }
  return value;
}

/**
 * Validate a caller-supplied amount
 */
export function assertUint128(value: bigint, label: string): void {
  toUint128(value, label);
}
