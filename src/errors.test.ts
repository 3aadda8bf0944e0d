import { describe, it, expect } from "vitest";
import {
  ArithmeticError,
  InvalidAssetError,
  PairError,
  SpreadExceededError,
  isPairError,
} from "./errors";
import { computeSwap } from "./swap";

describe("Pair Errors", () => {
  describe("isPairError", () => {
    it("should accept every engine failure without a code", () => {
      expect(isPairError(new InvalidAssetError("unknown asset"))).toBe(true);
      expect(isPairError(new ArithmeticError("overflow", "too big"))).toBe(true);
      expect(isPairError(new SpreadExceededError(false))).toBe(true);
    });

    it("should reject values that are not engine failures", () => {
      expect(isPairError(new Error("plain"))).toBe(false);
      expect(isPairError({ code: "INVALID_ASSET", message: "look-alike" })).toBe(false);
      expect(isPairError(undefined)).toBe(false);
    });

    it("should match only the given code", () => {
      const underflow = new ArithmeticError("underflow", "too small");
      expect(isPairError(underflow, "ARITHMETIC_UNDERFLOW")).toBe(true);
      expect(isPairError(underflow, "ARITHMETIC_OVERFLOW")).toBe(false);
      expect(isPairError(new SpreadExceededError(true), "SPREAD_EXCEEDED")).toBe(true);
    });

    it("should narrow a caught failure to its code", () => {
      let caught: unknown;
      try {
        computeSwap(1000n, 1000n, 10n, 4n, 3n);
      } catch (error) {
        caught = error;
      }

      expect(isPairError(caught, "INVALID_FEE")).toBe(true);
      if (isPairError(caught)) {
        expect(caught).toBeInstanceOf(PairError);
        expect(caught.code).toBe("INVALID_FEE");
      }
    });
  });
});
