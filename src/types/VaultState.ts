import type { PublicKey } from '@solana/web3.js';
import type { PoolState } from './PoolState.js';

export type VaultState = PoolState & {
  vaultId: PublicKey;
  assetMint: PublicKey;

  lastUpdatedTs?: number;
};
