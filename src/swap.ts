/**
 * Constant-Product Swap Math
 *
 * Exact swap quotes for a two-asset x * y = k pair. The commission is taken
 * from the gross output and stays in the pool, so k never decreases.
 *
 * All reserve-scale arithmetic is done on checked 256-bit integers and the
 * results are narrowed to 128-bit amounts.
 */

import { Decimal } from "./decimal";
import { DegenerateStateError, InvalidFeeError } from "./errors";
import { add, div, divCeil, expectValue, mul, saturatingSub, sub, toUint128 } from "./uint";

/**
 * Commission rate as nominator / denominator
 */
export interface FeeRate {
  nom: bigint;
  denom: bigint;
}

export interface SwapResult {
  /** Amount the trader receives, commission already deducted */
  returnAmount: bigint;
  /** Shortfall against the pre-trade marginal price */
  spreadAmount: bigint;
  /** Amount retained by the pool */
  commissionAmount: bigint;
}

export interface OfferResult {
  /** Amount the trader must offer */
  offerAmount: bigint;
  spreadAmount: bigint;
  commissionAmount: bigint;
}

/**
 * @throws DegenerateStateError when denom is zero
 * @throws InvalidFeeError when nom exceeds denom
 */
export function assertFeeRate(nom: bigint, denom: bigint): void {
  if (denom === 0n) {
    throw new DegenerateStateError("Fee denominator is zero");
  }
  if (nom < 0n || denom < 0n || nom > denom) {
    throw new InvalidFeeError(nom, denom);
  }
}

function assertReserves(offerPool: bigint, askPool: bigint): void {
  if (offerPool <= 0n || askPool <= 0n) {
    throw new DegenerateStateError(
      `Swap requires non-empty reserves (offer_pool ${offerPool}, ask_pool ${askPool})`
    );
  }
}

/**
 * Calculate the output of a swap (offer => ask)
 *
 * return_amount = ask_pool - ceil(cp / (offer_pool + offer_amount))
 * spread_amount = offer_amount * ask_pool / offer_pool - return_amount (floored at 0)
 * commission_amount = return_amount * fee_nom / fee_denom
 *
 * @param offerPool - Offer-side reserve, excluding the offered amount
 * @param askPool - Ask-side reserve
 * @param offerAmount - Amount being swapped in
 * @param feeNom - Commission rate nominator
 * @param feeDenom - Commission rate denominator
 * @returns Net return, spread and commission
 */
export function computeSwap(
  offerPool: bigint,
  askPool: bigint,
  offerAmount: bigint,
  feeNom: bigint,
  feeDenom: bigint
): SwapResult {
  assertReserves(offerPool, askPool);
  assertFeeRate(feeNom, feeDenom);

  // cp = offer_pool * ask_pool
  const cp = expectValue(
    mul(offerPool, askPool),
    () => `cp = offer_pool ${offerPool} * ask_pool ${askPool}`
  );

  // Rounded up: the ask side keeps ceil(cp / new_offer_pool) and k never decreases
  const grossReturn = expectValue(
    sub(askPool, divCeil(cp, add(offerPool, offerAmount))),
    () =>
      `return_amount = (ask_pool ${askPool} - cp ${cp} / (offer_pool ${offerPool} + offer_amount ${offerAmount}))`
  );

  const marginalReturn = expectValue(
    div(mul(offerAmount, askPool), offerPool),
    () => `offer_amount ${offerAmount} * ask_pool ${askPool} / offer_pool ${offerPool}`
  );
  const spreadAmount = saturatingSub(marginalReturn, grossReturn);

  const commissionAmount = expectValue(
    div(mul(grossReturn, feeNom), feeDenom),
    () =>
      `return_amount ${grossReturn} * commission_rate_nom ${feeNom} / commission_rate_denom ${feeDenom}`
  );

  // Commission is absorbed by the pool
  const returnAmount = expectValue(
    sub(grossReturn, commissionAmount),
    () => `return_amount ${grossReturn} - commission_amount ${commissionAmount}`,
    "underflow"
  );

  return {
    returnAmount: toUint128(returnAmount, "return_amount"),
    spreadAmount: toUint128(spreadAmount, "spread_amount"),
    commissionAmount: toUint128(commissionAmount, "commission_amount"),
  };
}

/**
 * Calculate the input needed for a desired output (ask => offer)
 *
 * offer_amount = cp / (ask_pool - ask_amount / (1 - commission_rate)) - offer_pool
 *
 * Quoting only: the fee back-calculation goes through Decimal and is an
 * approximation of the inverse of computeSwap.
 *
 * @param offerPool - Offer-side reserve
 * @param askPool - Ask-side reserve
 * @param askAmount - Desired net output
 * @param feeNom - Commission rate nominator
 * @param feeDenom - Commission rate denominator
 * @returns Required offer, spread and commission
 * @throws DegenerateStateError if the gross ask amount would exhaust the ask pool
 */
export function computeOfferAmount(
  offerPool: bigint,
  askPool: bigint,
  askAmount: bigint,
  feeNom: bigint,
  feeDenom: bigint
): OfferResult {
  assertReserves(offerPool, askPool);
  assertFeeRate(feeNom, feeDenom);

  const cp = expectValue(
    mul(offerPool, askPool),
    () => `cp = offer_pool ${offerPool} * ask_pool ${askPool}`
  );

  const commissionRate = Decimal.fromRatio(feeNom, feeDenom);
  const oneMinusCommission = Decimal.one().sub(commissionRate);
  const beforeCommissionDeduction = oneMinusCommission.reverse().mulUint(askAmount);

  if (beforeCommissionDeduction >= askPool) {
    throw new DegenerateStateError(
      `Ask amount ${askAmount} (${beforeCommissionDeduction} before commission) would exhaust ask_pool ${askPool}`
    );
  }

  const offerAmount = expectValue(
    sub(div(cp, sub(askPool, beforeCommissionDeduction)), offerPool),
    () =>
      `offer_amount = cp ${cp} / (ask_pool ${askPool} - ${beforeCommissionDeduction}) - offer_pool ${offerPool}`,
    "underflow"
  );

  const spreadAmount = saturatingSub(
    Decimal.fromRatio(askPool, offerPool).mulUint(offerAmount),
    beforeCommissionDeduction
  );
  const commissionAmount = commissionRate.mulUint(beforeCommissionDeduction);

  return {
    offerAmount: toUint128(offerAmount, "offer_amount"),
    spreadAmount: toUint128(spreadAmount, "spread_amount"),
    commissionAmount: toUint128(commissionAmount, "commission_amount"),
  };
}
