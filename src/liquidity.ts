/**
 * Liquidity Share Math
 *
 * Shares are minted pro-rata to the deposit and burned pro-rata to the
 * reserves. The first deposit mints the geometric mean of both sides.
 */

import type { Asset } from "./asset";
import { DegenerateStateError } from "./errors";
import { div, expectValue, min, mul, sqrt, toUint128 } from "./uint";

/**
 * Shares for the first deposit into an empty pool
 *
 * @returns floor(sqrt(deposit0 * deposit1))
 */
export function computeInitialShares(deposit0: bigint, deposit1: bigint): bigint {
  const shares = expectValue(
    sqrt(mul(deposit0, deposit1)),
    () => `sqrt(deposit_0 ${deposit0} * deposit_1 ${deposit1})`
  );
  return toUint128(shares, "share");
}

/**
 * Shares for a deposit into a pool with outstanding supply
 *
 * The smaller of the two pro-rata claims is minted, so a lopsided deposit
 * cannot dilute existing holders.
 *
 * @param deposit0 - Deposit of asset 0
 * @param deposit1 - Deposit of asset 1
 * @param pool0 - Reserve of asset 0 before the deposit
 * @param pool1 - Reserve of asset 1 before the deposit
 * @param totalShare - Outstanding share supply
 * @returns min(deposit0 * totalShare / pool0, deposit1 * totalShare / pool1)
 */
export function computeAdditionalShares(
  deposit0: bigint,
  deposit1: bigint,
  pool0: bigint,
  pool1: bigint,
  totalShare: bigint
): bigint {
  if (pool0 === 0n || pool1 === 0n) {
    throw new DegenerateStateError(
      `Cannot mint shares against an empty reserve (pools[0] ${pool0}, pools[1] ${pool1})`
    );
  }

  const share0 = expectValue(
    div(mul(deposit0, totalShare), pool0),
    () => `deposits[0] ${deposit0} * total_share ${totalShare} / pools[0].amount ${pool0}`
  );
  const share1 = expectValue(
    div(mul(deposit1, totalShare), pool1),
    () => `deposits[1] ${deposit1} * total_share ${totalShare} / pools[1].amount ${pool1}`
  );

  return toUint128(min(share0, share1), "share");
}

/**
 * Shares for a deposit, choosing initial or pro-rata issuance by supply
 */
export function computeShares(
  deposits: [bigint, bigint],
  pools: [bigint, bigint],
  totalShare: bigint
): bigint {
  if (totalShare === 0n) {
    return computeInitialShares(deposits[0], deposits[1]);
  }
  return computeAdditionalShares(deposits[0], deposits[1], pools[0], pools[1], totalShare);
}

/**
 * Amount of one reserve returned for burning shares
 *
 * The caller guarantees burnAmount <= totalShare.
 *
 * @returns reserve * burnAmount / totalShare
 */
export function computeWithdrawal(reserve: bigint, burnAmount: bigint, totalShare: bigint): bigint {
  if (totalShare === 0n) {
    throw new DegenerateStateError("Cannot withdraw from a pool with zero total share");
  }

  const amount = expectValue(
    div(mul(reserve, burnAmount), totalShare),
    () =>
      `current_pool_amount ${reserve} * withdrawn_share_amount ${burnAmount} / total_share ${totalShare}`
  );
  return toUint128(amount, "withdrawn_asset_amount");
}

/**
 * Both sides of a withdrawal
 */
export function computeRefundAssets(
  pools: [Asset, Asset],
  burnAmount: bigint,
  totalShare: bigint
): [Asset, Asset] {
  return [
    { info: pools[0].info, amount: computeWithdrawal(pools[0].amount, burnAmount, totalShare) },
    { info: pools[1].info, amount: computeWithdrawal(pools[1].amount, burnAmount, totalShare) },
  ];
}
