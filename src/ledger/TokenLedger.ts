import type { PublicKey } from '@solana/web3.js';
import { U64_MAX } from '../utils/math.js';

/** Allowance value that is never decremented when spent. */
export const MAX_ALLOWANCE = U64_MAX;

/**
 * Balances and allowances for every mint the vaults touch, both the underlying
 * assets and the share tokens. Implementations throw `VaultError` with
 * `InsufficientBalance`, `InsufficientAllowance`, `ZeroAddress` or `UnknownMint`.
 */
export interface TokenLedger {
  decimals(mint: PublicKey): number;
  totalSupply(mint: PublicKey): bigint;
  balanceOf(mint: PublicKey, account: PublicKey): bigint;
  allowance(mint: PublicKey, owner: PublicKey, spender: PublicKey): bigint;

  approve(mint: PublicKey, owner: PublicKey, spender: PublicKey, amount: bigint): void;
  transfer(mint: PublicKey, from: PublicKey, to: PublicKey, amount: bigint): void;
  transferFrom(mint: PublicKey, spender: PublicKey, from: PublicKey, to: PublicKey, amount: bigint): void;
  spendAllowance(mint: PublicKey, owner: PublicKey, spender: PublicKey, amount: bigint): void;

  createMint(mint: PublicKey, decimals: number): void;
  hasMint(mint: PublicKey): boolean;
  mint(mint: PublicKey, to: PublicKey, amount: bigint): void;
  burn(mint: PublicKey, from: PublicKey, amount: bigint): void;
}
