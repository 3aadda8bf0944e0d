/**
 * Assets held by a pair: the chain's native currency or a fungible token contract
 */

export interface NativeAssetInfo {
  kind: "native";
  denom: string;
}

export interface TokenAssetInfo {
  kind: "token";
  contractAddr: string;
  /** Code hash of the token contract; not part of the asset's identity */
  tokenCodeHash?: string;
}

export type AssetInfo = NativeAssetInfo | TokenAssetInfo;

export interface Asset {
  info: AssetInfo;
  /** Amount in the asset's smallest unit */
  amount: bigint;
}

export function assetId(info: AssetInfo): string {
  return info.kind === "native" ? info.denom : info.contractAddr;
}

export function assetInfoEquals(a: AssetInfo, b: AssetInfo): boolean {
  return a.kind === b.kind && assetId(a) === assetId(b);
}

export function isNative(info: AssetInfo): info is NativeAssetInfo {
  return info.kind === "native";
}

/**
 * Canonical ordering: native assets first, then by identifier
 */
export function compareAssetInfos(a: AssetInfo, b: AssetInfo): number {
  if (a.kind !== b.kind) return a.kind === "native" ? -1 : 1;
  const idA = assetId(a);
  const idB = assetId(b);
  if (idA === idB) return 0;
  return idA < idB ? -1 : 1;
}

export function sortAssetInfos(infos: [AssetInfo, AssetInfo]): [AssetInfo, AssetInfo] {
  return compareAssetInfos(infos[0], infos[1]) <= 0 ? [infos[0], infos[1]] : [infos[1], infos[0]];
}

export function formatAsset(asset: Asset): string {
  return `${asset.amount}${assetId(asset.info)}`;
}
