export type PoolState = {
  totalAssets: bigint;
  totalShares: bigint;

  /** Extra decimals of share precision; fixed when the vault is created. */
  decimalsOffset: number;
};
