/**
 * Fixed-Point Decimal
 *
 * Immutable ratio type with 18 fractional digits, stored as
 * `atomics = value * 10^18`. Used for fee rates, slippage tolerances and
 * belief prices. Reserve-scale swap math never goes through here; it uses
 * the checked integer operations in `./uint`.
 *
 * All operations round toward zero.
 */

import { ArithmeticError, DegenerateStateError, InvalidDecimalError } from "./errors";

export const DECIMAL_PLACES = 18;
export const DECIMAL_FRACTIONAL = 10n ** 18n;

export class Decimal {
  /** value * 10^18 */
  readonly atomics: bigint;

  private constructor(atomics: bigint) {
    this.atomics = atomics;
  }

  static zero(): Decimal {
    return new Decimal(0n);
  }

  static one(): Decimal {
    return new Decimal(DECIMAL_FRACTIONAL);
  }

  static fromAtomics(atomics: bigint): Decimal {
    if (atomics < 0n) {
      throw new ArithmeticError("underflow", `Decimal atomics ${atomics} is negative`);
    }
    return new Decimal(atomics);
  }

  /**
   * n / d
   * @throws DegenerateStateError when d is zero
   */
  static fromRatio(numerator: bigint, denominator: bigint): Decimal {
    if (denominator === 0n) {
      throw new DegenerateStateError(`Cannot build ratio ${numerator}/0`);
    }
    if (numerator < 0n || denominator < 0n) {
      throw new ArithmeticError("underflow", `Ratio ${numerator}/${denominator} is negative`);
    }
    return new Decimal((numerator * DECIMAL_FRACTIONAL) / denominator);
  }

  /**
   * Parse decimal text such as "0.005" or "1"
   */
  static parse(input: string): Decimal {
    const match = /^(\d+)(?:\.(\d{1,18}))?$/.exec(input.trim());
    if (match === null) {
      throw new InvalidDecimalError(input);
    }
    const whole = BigInt(match[1]);
    const fraction = BigInt((match[2] ?? "").padEnd(DECIMAL_PLACES, "0"));
    return new Decimal(whole * DECIMAL_FRACTIONAL + fraction);
  }

  mul(other: Decimal): Decimal {
    return new Decimal((this.atomics * other.atomics) / DECIMAL_FRACTIONAL);
  }

  /**
   * @throws ArithmeticError when other is larger than this
   */
  sub(other: Decimal): Decimal {
    if (other.atomics > this.atomics) {
      throw new ArithmeticError("underflow", `Cannot subtract ${other} from ${this}`);
    }
    return new Decimal(this.atomics - other.atomics);
  }

  /**
   * 1 / this
   * @throws DegenerateStateError when this is zero
   */
  reverse(): Decimal {
    if (this.atomics === 0n) {
      throw new DegenerateStateError("Cannot reverse a zero decimal");
    }
    return new Decimal((DECIMAL_FRACTIONAL * DECIMAL_FRACTIONAL) / this.atomics);
  }

  /**
   * amount * this, floored to an integer amount
   */
  mulUint(amount: bigint): bigint {
    return (amount * this.atomics) / DECIMAL_FRACTIONAL;
  }

  isZero(): boolean {
    return this.atomics === 0n;
  }

  eq(other: Decimal): boolean {
    return this.atomics === other.atomics;
  }

  gt(other: Decimal): boolean {
    return this.atomics > other.atomics;
  }

  lt(other: Decimal): boolean {
    return this.atomics < other.atomics;
  }

  toString(): string {
    const whole = this.atomics / DECIMAL_FRACTIONAL;
    const fraction = this.atomics % DECIMAL_FRACTIONAL;
    if (fraction === 0n) return whole.toString();
    const digits = fraction.toString().padStart(DECIMAL_PLACES, "0").replace(/0+$/, "");
    return `${whole}.${digits}`;
  }
}
