/**
 * constant-product-pair
 *
 * Pricing and liquidity accounting for a two-asset constant-product (x * y = k) pair.
 * Exact checked-integer math for state-changing actions, obfuscated figures for
 * read-only observers.
 *
 * @example Swap and liquidity math
 * ```typescript
 * import { swap, liquidity } from 'constant-product-pair';
 *
 * // Quote 1,000 units of asset 0 against a 1M/1M pool at 0.3%
 * const { returnAmount, spreadAmount, commissionAmount } = swap.computeSwap(
 *   1_000_000n, 1_000_000n, 1_000n, 3n, 1000n
 * );
 *
 * // Shares for the first deposit
 * const initial = liquidity.computeInitialShares(100n, 400n); // 200n
 *
 * // Shares for a later deposit
 * const shares = liquidity.computeAdditionalShares(10n, 40n, 100n, 400n, 200n); // 20n
 * ```
 *
 * @example Guard rails
 * ```typescript
 * import { guards, Decimal } from 'constant-product-pair';
 *
 * guards.assertMaxSpread(
 *   { maxSpread: Decimal.parse('0.01') },
 *   { offerAmount, returnAmount, commissionAmount, spreadAmount }
 * );
 * guards.assertSlippageTolerance(Decimal.parse('0.005'), [d0, d1], [p0, p1]);
 * ```
 *
 * @example Pair facade
 * ```typescript
 * import { Pair, obfuscation } from 'constant-product-pair';
 *
 * const pair = new Pair({ assetInfos, ledger, settings, entropy: obfuscation.createCryptoEntropySource() });
 * const quote = pair.simulate(offerAsset);   // obfuscated reserves
 * const plan = pair.swap({ sender, offerAsset, expectedReturn }); // true reserves
 * ```
 *
 * @packageDocumentation
 */

// Checked 256-bit integer operations
export * as uint from "./uint";

// 18-digit ratio decimal
export * as decimal from "./decimal";
export { Decimal } from "./decimal";

// Swap, liquidity and guard math
export * as swap from "./swap";
export type { FeeRate, SwapResult, OfferResult } from "./swap";
export * as liquidity from "./liquidity";
export * as guards from "./guards";
export type { SpreadBounds, SpreadCheck, SwapOutcome } from "./guards";

// Reported-reserve obfuscation
export * as obfuscation from "./obfuscation";
export type { EntropySource, NoiseRatio, ObfuscatedPool } from "./obfuscation";

// Assets
export {
  assetId,
  assetInfoEquals,
  compareAssetInfos,
  formatAsset,
  isNative,
  sortAssetInfos,
} from "./asset";
export type { Asset, AssetInfo, NativeAssetInfo, TokenAssetInfo } from "./asset";

// Pair facade
export { Pair } from "./pair";
export type {
  PairInfo,
  PairLedger,
  PairOptions,
  PairSettings,
  PoolResponse,
  ProvideLiquidityPlan,
  ProvideLiquidityRequest,
  ReverseSimulationResponse,
  SimulationResponse,
  SwapPlan,
  SwapRequest,
  WithdrawLiquidityPlan,
  WithdrawLiquidityRequest,
} from "./pair";

// Errors
export {
  ArithmeticError,
  DegenerateStateError,
  InvalidAssetError,
  InvalidDecimalError,
  InvalidFeeError,
  PairError,
  ReturnBelowExpectedError,
  SlippageExceededError,
  SpreadExceededError,
  isPairError,
} from "./errors";
export type { ArithmeticErrorKind, PairErrorCode } from "./errors";

// Logging
export { Logger, logger, resolveLogLevel } from "./logger";
export type { LogLevel } from "./logger";

// Re-export commonly used constants
export { U64_MAX, U128_MAX, U256_MAX } from "./uint";
export { DECIMAL_FRACTIONAL } from "./decimal";
export { OBFUSCATION_DENOMINATOR, OBFUSCATION_NOISE_MODULUS } from "./obfuscation";
