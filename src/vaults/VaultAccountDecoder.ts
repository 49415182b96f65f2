import { PublicKey } from '@solana/web3.js';
import BN from 'bn.js';

import { VaultError } from '../errors/VaultError.js';
import type { VaultState } from '../types/VaultState.js';

export type VaultAccountDecoder = (raw: unknown, vaultId: PublicKey) => VaultState;

function isRecord(raw: unknown): raw is Record<string, unknown> {
  return typeof raw === 'object' && raw !== null;
}

function toBigInt(v: unknown, field: string): bigint {
  if (typeof v === 'bigint' && v >= 0n) return v;
  if (typeof v === 'number' && Number.isSafeInteger(v) && v >= 0) return BigInt(v);
  if (BN.isBN(v) && !v.isNeg()) return BigInt(v.toString(10));
  throw new VaultError('AccountParseError', `vault.${field} missing or invalid`);
}

/**
 * Maps an Anchor-decoded vault account with the common field names
 * (`assetMint`, `totalAssets`, `totalShares`, `decimalsOffset`).
 * Provide a custom decoder if the on-chain schema differs.
 */
export const defaultVaultDecoder: VaultAccountDecoder = (raw, vaultId) => {
  if (!isRecord(raw)) {
    throw new VaultError('AccountParseError', 'vault account is not an object');
  }

  const assetMint = raw['assetMint'];
  if (!(assetMint instanceof PublicKey)) {
    throw new VaultError('AccountParseError', 'vault.assetMint missing or invalid');
  }

  const offset = raw['decimalsOffset'] ?? 0;
  if (typeof offset !== 'number' || !Number.isInteger(offset) || offset < 0) {
    throw new VaultError('AccountParseError', 'vault.decimalsOffset invalid');
  }

  const parsed: VaultState = {
    vaultId,
    assetMint,
    totalAssets: toBigInt(raw['totalAssets'], 'totalAssets'),
    totalShares: toBigInt(raw['totalShares'], 'totalShares'),
    decimalsOffset: offset
  };

  const ts = raw['lastUpdatedTs'];
  if (typeof ts === 'number') parsed.lastUpdatedTs = ts;
  else if (BN.isBN(ts)) {
    if (ts.isNeg() || ts.bitLength() > 53) {
      throw new VaultError('AccountParseError', 'vault.lastUpdatedTs out of range');
    }
    parsed.lastUpdatedTs = ts.toNumber();
  }

  return parsed;
};
