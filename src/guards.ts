/**
 * Guard Rails
 *
 * Checks that reject economically unsafe swaps and deposits before they are
 * committed.
 */

import { Decimal } from "./decimal";
import {
  DegenerateStateError,
  ReturnBelowExpectedError,
  SlippageExceededError,
  SpreadExceededError,
} from "./errors";
import { saturatingSub } from "./uint";

/**
 * Optional bounds a trader attaches to a swap
 */
export interface SpreadBounds {
  expectedReturn?: bigint;
  beliefPrice?: Decimal;
  maxSpread?: Decimal;
}

export interface SwapOutcome {
  offerAmount: bigint;
  returnAmount: bigint;
  commissionAmount: bigint;
  spreadAmount: bigint;
}

/**
 * The check that applies to a set of bounds. At most one runs.
 */
export type SpreadCheck =
  | { kind: "expectedReturn"; expectedReturn: bigint }
  | { kind: "beliefPrice"; beliefPrice: Decimal; maxSpread: Decimal }
  | { kind: "maxSpread"; maxSpread: Decimal }
  | { kind: "none" };

/**
 * Priority: expected return, then belief price with max spread, then max spread alone
 */
export function resolveSpreadCheck(bounds: SpreadBounds): SpreadCheck {
  const { expectedReturn, beliefPrice, maxSpread } = bounds;
  if (expectedReturn !== undefined) {
    return { kind: "expectedReturn", expectedReturn };
  }
  if (beliefPrice !== undefined && maxSpread !== undefined) {
    return { kind: "beliefPrice", beliefPrice, maxSpread };
  }
  if (maxSpread !== undefined) {
    return { kind: "maxSpread", maxSpread };
  }
  return { kind: "none" };
}

/**
 * Reject a swap whose outcome violates the trader's bounds
 *
 * @throws ReturnBelowExpectedError if returnAmount < expectedReturn
 * @throws SpreadExceededError if the spread ratio exceeds maxSpread
 * @throws DegenerateStateError if only maxSpread is given and the swap moves nothing
 */
export function assertMaxSpread(bounds: SpreadBounds, outcome: SwapOutcome): void {
  const check = resolveSpreadCheck(bounds);

  switch (check.kind) {
    case "expectedReturn": {
      if (outcome.returnAmount < check.expectedReturn) {
        throw new ReturnBelowExpectedError(check.expectedReturn, outcome.returnAmount);
      }
      return;
    }
    case "beliefPrice": {
      const grossReturn = outcome.returnAmount + outcome.commissionAmount;
      const expectedReturn = check.beliefPrice.reverse().mulUint(outcome.offerAmount);
      const shortfall = saturatingSub(expectedReturn, grossReturn);

      if (
        grossReturn < expectedReturn &&
        Decimal.fromRatio(shortfall, expectedReturn).gt(check.maxSpread)
      ) {
        throw new SpreadExceededError(true);
      }
      return;
    }
    case "maxSpread": {
      const grossReturn = outcome.returnAmount + outcome.commissionAmount;
      const total = grossReturn + outcome.spreadAmount;
      if (total === 0n) {
        throw new DegenerateStateError("Cannot check max spread of a swap with no return or spread");
      }
      const spreadRatio = Decimal.fromRatio(outcome.spreadAmount, total);
      if (spreadRatio.gt(check.maxSpread)) {
        throw new SpreadExceededError(false);
      }
      return;
    }
    case "none":
      return;
  }
}

/**
 * Reject a deposit whose price deviates from the pool's by more than the tolerance,
 * in either direction
 *
 * @param tolerance - Accepted deviation; no-op when absent
 * @param deposits - Deposit amounts in pool order
 * @param pools - Reserves in pool order, excluding the deposit
 */
export function assertSlippageTolerance(
  tolerance: Decimal | undefined,
  deposits: [bigint, bigint],
  pools: [bigint, bigint]
): void {
  if (tolerance === undefined) return;

  const oneMinusTolerance = Decimal.one().sub(tolerance);

  if (
    Decimal.fromRatio(deposits[0], deposits[1]).mul(oneMinusTolerance).gt(
      Decimal.fromRatio(pools[0], pools[1])
    ) ||
    Decimal.fromRatio(deposits[1], deposits[0]).mul(oneMinusTolerance).gt(
      Decimal.fromRatio(pools[1], pools[0])
    )
  ) {
    throw new SlippageExceededError();
  }
}
