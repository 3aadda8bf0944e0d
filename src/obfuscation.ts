/**
 * Reserve Obfuscation
 *
 * Read-only queries report reserves and share supply scaled by a random
 * factor within +/-0.99%, so observers cannot read the exact pool state.
 * Committed swaps and liquidity changes always use the true figures.
 */

import { randomBytes } from "crypto";
import type { Asset } from "./asset";
import { ArithmeticError } from "./errors";
import { div, expectValue, mul, toUint128, U64_MAX } from "./uint";

export const OBFUSCATION_DENOMINATOR = 10_000n;
export const OBFUSCATION_NOISE_MODULUS = 100n;

/**
 * Source of one unsigned 64-bit draw per call
 */
export interface EntropySource {
  nextU64(): bigint;
}

export interface NoiseRatio {
  nom: bigint;
  denom: bigint;
}

export interface ObfuscatedPool {
  reserves: [Asset, Asset];
  totalShare: bigint;
}

/**
 * Derive the scaling ratio from a draw
 *
 * Even draws scale up, odd draws scale down, by (draw % 100) / 10000.
 *
 * @param draw - Unsigned 64-bit value
 */
export function noiseRatio(draw: bigint): NoiseRatio {
  if (draw < 0n || draw > U64_MAX) {
    throw new ArithmeticError(draw < 0n ? "underflow" : "overflow", `Entropy draw ${draw} is not a u64`);
  }

  const denom = OBFUSCATION_DENOMINATOR;
  const noise = draw % OBFUSCATION_NOISE_MODULUS;
  const nom = draw % 2n === 0n ? denom + noise : denom - noise;

  return { nom, denom };
}

/**
 * amount * nom / denom, truncated
 */
export function scaleAmount(amount: bigint, ratio: NoiseRatio): bigint {
  const scaled = expectValue(
    div(mul(amount, ratio.nom), ratio.denom),
    () => `amount ${amount} * nom ${ratio.nom} / denom ${ratio.denom}`
  );
  return toUint128(scaled, "obfuscated amount");
}

export function scaleReserves(reserves: [Asset, Asset], ratio: NoiseRatio): [Asset, Asset] {
  return [
    { info: reserves[0].info, amount: scaleAmount(reserves[0].amount, ratio) },
    { info: reserves[1].info, amount: scaleAmount(reserves[1].amount, ratio) },
  ];
}

/**
 * Scale reported reserves and share supply with a single draw
 *
 * Returns new values; the inputs are left untouched.
 */
export function obfuscate(
  reserves: [Asset, Asset],
  totalShare: bigint,
  entropy: EntropySource
): ObfuscatedPool {
  const ratio = noiseRatio(entropy.nextU64());

  return {
    reserves: scaleReserves(reserves, ratio),
    totalShare: scaleAmount(totalShare, ratio),
  };
}

/**
 * Entropy from the platform CSPRNG
 */
export function createCryptoEntropySource(): EntropySource {
  return {
    nextU64: () => randomBytes(8).readBigUInt64BE(0),
  };
}
