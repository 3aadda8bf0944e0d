import { describe, it, expect } from "vitest";
import { Decimal, DECIMAL_FRACTIONAL } from "./decimal";
import { ArithmeticError, DegenerateStateError, InvalidDecimalError } from "./errors";

describe("Decimal", () => {
  describe("construction", () => {
    it("should build ratios with 18 fractional digits", () => {
      expect(Decimal.fromRatio(3n, 1000n).atomics).toBe(3n * 10n ** 15n);
      expect(Decimal.fromRatio(1n, 3n).atomics).toBe(333333333333333333n);
      expect(Decimal.one().atomics).toBe(DECIMAL_FRACTIONAL);
      expect(Decimal.zero().isZero()).toBe(true);
    });

    it("should reject a zero denominator", () => {
      expect(() => Decimal.fromRatio(1n, 0n)).toThrow(DegenerateStateError);
    });

    it("should reject negative atomics", () => {
      expect(() => Decimal.fromAtomics(-1n)).toThrow(ArithmeticError);
    });
  });

  describe("parse", () => {
    it("should parse integer and fractional text", () => {
      expect(Decimal.parse("0.005").atomics).toBe(5n * 10n ** 15n);
      expect(Decimal.parse("1").eq(Decimal.one())).toBe(true);
      expect(Decimal.parse(" 2.5 ").atomics).toBe(25n * 10n ** 17n);
    });

    it("should reject invalid text", () => {
      expect(() => Decimal.parse("abc")).toThrow(InvalidDecimalError);
      expect(() => Decimal.parse("-0.1")).toThrow(InvalidDecimalError);
      expect(() => Decimal.parse("0.1234567890123456789")).toThrow(InvalidDecimalError);
    });
  });

  describe("arithmetic", () => {
    it("should multiply with truncation", () => {
      expect(Decimal.parse("0.5").mul(Decimal.parse("0.5")).toString()).toBe("0.25");
      expect(Decimal.fromRatio(1n, 3n).mul(Decimal.parse("3")).toString()).toBe(
        "0.999999999999999999"
      );
    });

    it("should subtract", () => {
      expect(Decimal.one().sub(Decimal.parse("0.003")).toString()).toBe("0.997");
    });

    it("should fail when subtraction would go negative", () => {
      expect(() => Decimal.parse("0.5").sub(Decimal.parse("0.6"))).toThrow(ArithmeticError);
    });

    it("should reverse", () => {
      expect(Decimal.parse("0.5").reverse().toString()).toBe("2");
      expect(Decimal.parse("3").reverse().toString()).toBe("0.333333333333333333");
    });

    it("should fail to reverse zero", () => {
      expect(() => Decimal.zero().reverse()).toThrow(DegenerateStateError);
    });

    it("should scale integer amounts with floor", () => {
      expect(Decimal.parse("1.5").mulUint(1001n)).toBe(1501n);
      expect(Decimal.fromRatio(3n, 1000n).mulUint(999n)).toBe(2n);
    });
  });

  describe("comparison", () => {
    it("should order by value", () => {
      const small = Decimal.parse("0.01");
      const large = Decimal.parse("0.1");
      expect(large.gt(small)).toBe(true);
      expect(small.lt(large)).toBe(true);
      expect(small.gt(small)).toBe(false);
      expect(Decimal.fromRatio(1n, 10n).eq(large)).toBe(true);
    });
  });
});
