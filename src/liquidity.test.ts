import { describe, it, expect } from "vitest";
import {
  computeInitialShares,
  computeAdditionalShares,
  computeShares,
  computeWithdrawal,
  computeRefundAssets,
} from "./liquidity";
import type { Asset } from "./asset";
import { ArithmeticError, DegenerateStateError } from "./errors";

describe("Liquidity Math", () => {
  describe("computeInitialShares", () => {
    it("should mint the geometric mean", () => {
      expect(computeInitialShares(100n, 400n)).toBe(200n);
      expect(computeInitialShares(100n, 101n)).toBe(100n);
      expect(computeInitialShares(10n ** 18n, 10n ** 18n)).toBe(10n ** 18n);
    });

    it("should mint nothing for a one-sided deposit", () => {
      expect(computeInitialShares(0n, 1000n)).toBe(0n);
    });

    it("should fail when the product overflows", () => {
      expect(() => computeInitialShares(1n << 200n, 1n << 100n)).toThrow(ArithmeticError);
    });
  });

  describe("computeAdditionalShares", () => {
    it("should mint pro-rata to the deposit", () => {
      expect(computeAdditionalShares(10n, 40n, 100n, 400n, 200n)).toBe(20n);
    });

    it("should mint the smaller claim for lopsided deposits", () => {
      expect(computeAdditionalShares(10n, 80n, 100n, 400n, 200n)).toBe(20n);
      expect(computeAdditionalShares(50n, 40n, 100n, 400n, 200n)).toBe(20n);
    });

    it("should be non-decreasing in each deposit", () => {
      let previous = 0n;
      for (let deposit0 = 0n; deposit0 <= 60n; deposit0 += 3n) {
        const shares = computeAdditionalShares(deposit0, 40n, 100n, 400n, 200n);
        expect(shares).toBeGreaterThanOrEqual(previous);
        previous = shares;
      }

      previous = 0n;
      for (let deposit1 = 0n; deposit1 <= 240n; deposit1 += 7n) {
        const shares = computeAdditionalShares(10n, deposit1, 100n, 400n, 200n);
        expect(shares).toBeGreaterThanOrEqual(previous);
        previous = shares;
      }
    });

    it("should fail against an empty reserve", () => {
      expect(() => computeAdditionalShares(10n, 10n, 0n, 400n, 200n)).toThrow(DegenerateStateError);
      expect(() => computeAdditionalShares(10n, 10n, 100n, 0n, 200n)).toThrow(DegenerateStateError);
    });
  });

  describe("computeShares", () => {
    it("should use initial issuance for an empty supply", () => {
      expect(computeShares([100n, 400n], [0n, 0n], 0n)).toBe(200n);
    });

    it("should use pro-rata issuance otherwise", () => {
      expect(computeShares([10n, 40n], [100n, 400n], 200n)).toBe(20n);
    });
  });

  describe("computeWithdrawal", () => {
    it("should return the pro-rata reserve", () => {
      expect(computeWithdrawal(1000n, 50n, 200n)).toBe(250n);
      expect(computeWithdrawal(1000n, 200n, 200n)).toBe(1000n);
    });

    it("should never return more than the reserve", () => {
      const reserve = 987_654_321n;
      const totalShare = 123_457n;
      for (let burn = 0n; burn <= totalShare; burn += 4_321n) {
        expect(computeWithdrawal(reserve, burn, totalShare)).toBeLessThanOrEqual(reserve);
      }
      expect(computeWithdrawal(reserve, totalShare, totalShare)).toBe(reserve);
    });

    it("should fail with a zero total share", () => {
      expect(() => computeWithdrawal(1000n, 10n, 0n)).toThrow(DegenerateStateError);
    });
  });

  describe("withdraw and re-deposit", () => {
    const roundTrip = (pools: [bigint, bigint], burn: bigint) => {
      const totalShare = computeInitialShares(pools[0], pools[1]);
      const out0 = computeWithdrawal(pools[0], burn, totalShare);
      const out1 = computeWithdrawal(pools[1], burn, totalShare);

      const minted = computeShares(
        [out0, out1],
        [pools[0] - out0, pools[1] - out1],
        totalShare - burn
      );
      return { minted, totalShare };
    };

    it("should not mint more than was burned in a balanced pool", () => {
      const { minted } = roundTrip([1_000_000n, 1_000_000n], 12_345n);
      expect(minted).toBeLessThanOrEqual(12_345n);
    });

    it("should not mint more than was burned in a skewed pool", () => {
      const { minted, totalShare } = roundTrip([1_000n, 100_000n], 333n);
      expect(totalShare).toBe(10_000n);
      expect(minted).toBe(329n);
    });

    it("should not mint more than was burned in a near-empty pool", () => {
      const { minted } = roundTrip([1n, 1n], 1n);
      expect(minted).toBeLessThanOrEqual(1n);
    });
  });

  describe("computeRefundAssets", () => {
    it("should refund both sides with their asset infos", () => {
      const pools: [Asset, Asset] = [
        { info: { kind: "native", denom: "uscrt" }, amount: 1000n },
        { info: { kind: "token", contractAddr: "secret1token" }, amount: 4000n },
      ];
      expect(computeRefundAssets(pools, 500n, 2000n)).toEqual([
        { info: { kind: "native", denom: "uscrt" }, amount: 250n },
        { info: { kind: "token", contractAddr: "secret1token" }, amount: 1000n },
      ]);
    });
  });
});
