/**
 * Pair
 *
 * Wires the pricing engine to the collaborators that hold a pair's state.
 * Actions (swap, provide, withdraw) read the true balances and return exact
 * plans for the caller to commit; queries (pool, simulation, reverse
 * simulation) report obfuscated figures and never feed back into actions.
 *
 * @example
 * ```typescript
 * const pair = new Pair({
 *   assetInfos: [
 *     { kind: "native", denom: "uscrt" },
 *     { kind: "token", contractAddr: "secret1token" },
 *   ],
 *   ledger,
 *   settings,
 *   entropy: createCryptoEntropySource(),
 * });
 *
 * const plan = pair.swap({
 *   sender: "secret1trader",
 *   offerAsset: { info: { kind: "native", denom: "uscrt" }, amount: 1_000_000n },
 *   expectedReturn: 990_000n,
 * });
 * ```
 */

import {
  assetId,
  assetInfoEquals,
  formatAsset,
  isNative,
  sortAssetInfos,
  type Asset,
  type AssetInfo,
} from "./asset";
import type { Decimal } from "./decimal";
import { InvalidAssetError } from "./errors";
import { assertMaxSpread, assertSlippageTolerance } from "./guards";
import { computeRefundAssets, computeShares } from "./liquidity";
import { logger as rootLogger, type Logger } from "./logger";
import {
  noiseRatio,
  obfuscate,
  scaleReserves,
  type EntropySource,
} from "./obfuscation";
import { computeOfferAmount, computeSwap, type FeeRate } from "./swap";
import { assertUint128, expectValue, sub } from "./uint";

/**
 * Balances and share supply as held by the external ledger
 */
export interface PairLedger {
  /** Current balance of the pair in one asset, including amounts received with the current action */
  queryBalance(info: AssetInfo): bigint;
  /** Outstanding liquidity share supply */
  querySupply(): bigint;
}

export interface PairSettings {
  querySwapFee(): FeeRate;
}

export interface PairOptions {
  assetInfos: [AssetInfo, AssetInfo];
  ledger: PairLedger;
  settings: PairSettings;
  entropy: EntropySource;
  logger?: Logger;
}

export interface PairInfo {
  assetInfos: [AssetInfo, AssetInfo];
}

export interface PoolResponse {
  assets: [Asset, Asset];
  totalShare: bigint;
}

export interface SimulationResponse {
  returnAmount: bigint;
  spreadAmount: bigint;
  commissionAmount: bigint;
}

export interface ReverseSimulationResponse {
  offerAmount: bigint;
  spreadAmount: bigint;
  commissionAmount: bigint;
}

export interface SwapRequest {
  sender: string;
  offerAsset: Asset;
  expectedReturn?: bigint;
  beliefPrice?: Decimal;
  maxSpread?: Decimal;
  /** Recipient of the returned asset; defaults to the sender */
  to?: string;
}

export interface SwapPlan {
  offerAsset: Asset;
  returnAsset: Asset;
  spreadAmount: bigint;
  commissionAmount: bigint;
  recipient: string;
  /** Pool side whose traded volume grows by the offer amount */
  offerIndex: 0 | 1;
}

export interface ProvideLiquidityRequest {
  sender: string;
  assets: [Asset, Asset];
  slippageTolerance?: Decimal;
}

export interface ProvideLiquidityPlan {
  /** Deposits in pool order */
  deposits: [Asset, Asset];
  /** Shares to mint to the sender */
  share: bigint;
  /** Token deposits still to be collected from the sender */
  pullFrom: Asset[];
  /** Receiver of the minted shares */
  recipient: string;
}

export interface WithdrawLiquidityRequest {
  sender: string;
  /** Shares being burned */
  amount: bigint;
}

export interface WithdrawLiquidityPlan {
  refundAssets: [Asset, Asset];
  burnAmount: bigint;
  /** Receiver of the refunds, whose shares are burned */
  recipient: string;
}

interface PoolSides {
  offerPool: Asset;
  askPool: Asset;
  offerIndex: 0 | 1;
}

export class Pair {
  readonly assetInfos: [AssetInfo, AssetInfo];
  private readonly ledger: PairLedger;
  private readonly settings: PairSettings;
  private readonly entropy: EntropySource;
  private readonly log: Logger;

  constructor(options: PairOptions) {
    this.assetInfos = sortAssetInfos(options.assetInfos);
    if (assetInfoEquals(this.assetInfos[0], this.assetInfos[1])) {
      throw new InvalidAssetError(`Pair assets must differ: ${assetId(this.assetInfos[0])}`);
    }
    this.ledger = options.ledger;
    this.settings = options.settings;
    this.entropy = options.entropy;
    this.log = (options.logger ?? rootLogger).child(
      `${assetId(this.assetInfos[0])}-${assetId(this.assetInfos[1])}`
    );
  }

  pairInfo(): PairInfo {
    return { assetInfos: [this.assetInfos[0], this.assetInfos[1]] };
  }

  // ========== QUERIES (obfuscated) ==========

  queryPool(): PoolResponse {
    const { reserves, totalShare } = obfuscate(
      this.queryPools(),
      this.ledger.querySupply(),
      this.entropy
    );
    this.log.debug("query pool");
    return { assets: reserves, totalShare };
  }

  simulate(offerAsset: Asset): SimulationResponse {
    assertUint128(offerAsset.amount, "offer_amount");
    const pools = scaleReserves(this.queryPools(), noiseRatio(this.entropy.nextU64()));
    const { offerPool, askPool } = this.sidesFor(offerAsset.info, pools, "offer");
    const fee = this.settings.querySwapFee();

    const result = computeSwap(
      offerPool.amount,
      askPool.amount,
      offerAsset.amount,
      fee.nom,
      fee.denom
    );
    this.log.debug(`simulation offer=${formatAsset(offerAsset)}`);
    return result;
  }

  reverseSimulate(askAsset: Asset): ReverseSimulationResponse {
    assertUint128(askAsset.amount, "ask_amount");
    const pools = scaleReserves(this.queryPools(), noiseRatio(this.entropy.nextU64()));
    const { offerPool, askPool } = this.sidesFor(askAsset.info, pools, "ask");
    const fee = this.settings.querySwapFee();

    const result = computeOfferAmount(
      offerPool.amount,
      askPool.amount,
      askAsset.amount,
      fee.nom,
      fee.denom
    );
    this.log.debug(`reverse simulation ask=${formatAsset(askAsset)}`);
    return result;
  }

  // ========== ACTIONS (exact) ==========

  /**
   * Price a swap against the true reserves
   *
   * The ledger already holds the offered amount, so it is taken back out of
   * the offer side before pricing.
   */
  swap(request: SwapRequest): SwapPlan {
    const { offerAsset } = request;
    assertUint128(offerAsset.amount, "offer_amount");

    const sides = this.sidesFor(offerAsset.info, this.queryPools(), "offer");
    const offerPoolAmount = expectValue(
      sub(sides.offerPool.amount, offerAsset.amount),
      () =>
        `offer_pool = pool_amount ${sides.offerPool.amount} - offer_amount ${offerAsset.amount}`,
      "underflow"
    );

    const fee = this.settings.querySwapFee();
    const { returnAmount, spreadAmount, commissionAmount } = computeSwap(
      offerPoolAmount,
      sides.askPool.amount,
      offerAsset.amount,
      fee.nom,
      fee.denom
    );

    assertMaxSpread(
      {
        expectedReturn: request.expectedReturn,
        beliefPrice: request.beliefPrice,
        maxSpread: request.maxSpread,
      },
      { offerAmount: offerAsset.amount, returnAmount, commissionAmount, spreadAmount }
    );

    const returnAsset: Asset = { info: sides.askPool.info, amount: returnAmount };
    const recipient = request.to ?? request.sender;

    this.log.info(
      `swap offer=${formatAsset(offerAsset)} return=${formatAsset(returnAsset)} spread=${spreadAmount} commission=${commissionAmount}`
    );

    return {
      offerAsset,
      returnAsset,
      spreadAmount,
      commissionAmount,
      recipient,
      offerIndex: sides.offerIndex,
    };
  }

  /**
   * Price a deposit against the true reserves
   *
   * Native deposits arrive with the action and are already in the ledger's
   * balance; token deposits are pulled afterwards.
   */
  provideLiquidity(request: ProvideLiquidityRequest): ProvideLiquidityPlan {
    const pools = this.queryPools();
    const deposits: [Asset, Asset] = [
      this.depositFor(pools[0].info, request.assets),
      this.depositFor(pools[1].info, request.assets),
    ];

    const poolAmounts: [bigint, bigint] = [
      this.excludeDeposit(pools[0], deposits[0]),
      this.excludeDeposit(pools[1], deposits[1]),
    ];
    const depositAmounts: [bigint, bigint] = [deposits[0].amount, deposits[1].amount];

    assertSlippageTolerance(request.slippageTolerance, depositAmounts, poolAmounts);

    const totalShare = this.ledger.querySupply();
    const share = computeShares(depositAmounts, poolAmounts, totalShare);
    const pullFrom = deposits.filter((deposit) => !isNative(deposit.info));

    this.log.info(
      `provide_liquidity sender=${request.sender} assets=${formatAsset(deposits[0])}, ${formatAsset(deposits[1])} share=${share}`
    );

    return { deposits, share, pullFrom, recipient: request.sender };
  }

  withdrawLiquidity(request: WithdrawLiquidityRequest): WithdrawLiquidityPlan {
    assertUint128(request.amount, "withdrawn_share");

    const totalShare = this.ledger.querySupply();
    const refundAssets = computeRefundAssets(this.queryPools(), request.amount, totalShare);

    this.log.info(
      `withdraw_liquidity sender=${request.sender} withdrawn_share=${request.amount} refund_assets=${formatAsset(refundAssets[0])}, ${formatAsset(refundAssets[1])}`
    );

    return { refundAssets, burnAmount: request.amount, recipient: request.sender };
  }

  // ========== HELPERS ==========

  private queryPools(): [Asset, Asset] {
    return [
      { info: this.assetInfos[0], amount: this.ledger.queryBalance(this.assetInfos[0]) },
      { info: this.assetInfos[1], amount: this.ledger.queryBalance(this.assetInfos[1]) },
    ];
  }

  private sidesFor(info: AssetInfo, pools: [Asset, Asset], role: "offer" | "ask"): PoolSides {
    const index = this.indexOf(info);
    if (index === undefined) {
      throw new InvalidAssetError(`Given ${role} asset ${assetId(info)} does not belong to the pair`);
    }
    const other = index === 0 ? 1 : 0;
    const offerIndex = role === "offer" ? index : other;
    const askIndex = offerIndex === 0 ? 1 : 0;
    return { offerPool: pools[offerIndex], askPool: pools[askIndex], offerIndex };
  }

  private indexOf(info: AssetInfo): 0 | 1 | undefined {
    if (assetInfoEquals(info, this.assetInfos[0])) return 0;
    if (assetInfoEquals(info, this.assetInfos[1])) return 1;
    return undefined;
  }

  private depositFor(info: AssetInfo, assets: [Asset, Asset]): Asset {
    const deposit = assets.find((asset) => assetInfoEquals(asset.info, info));
    if (deposit === undefined) {
      throw new InvalidAssetError(`Missing deposit for ${assetId(info)}`);
    }
    assertUint128(deposit.amount, "deposit");
    return { info, amount: deposit.amount };
  }

  private excludeDeposit(pool: Asset, deposit: Asset): bigint {
    if (!isNative(pool.info)) return pool.amount;
    return expectValue(
      sub(pool.amount, deposit.amount),
      () => `pool_amount ${pool.amount} - deposit ${deposit.amount}`,
      "underflow"
    );
  }
}
