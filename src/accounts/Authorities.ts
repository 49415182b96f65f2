import type { PublicKey } from '@solana/web3.js';
import { getAssociatedTokenAddressSync } from '@solana/spl-token';
import { PDA } from './PDA.js';

export type VaultAddresses = {
  vault: PublicKey;
  vaultAuthority: PublicKey;
  shareMint: PublicKey;
  /** Associated token account of the vault authority holding the pooled asset. */
  custody: PublicKey;
};

export function deriveVaultAddresses(programId: PublicKey, assetMint: PublicKey, index: number): VaultAddresses {
  const vault = PDA.vault(programId, assetMint, index).publicKey;
  const vaultAuthority = PDA.vaultAuthority(programId, vault).publicKey;
  const shareMint = PDA.shareMint(programId, vault).publicKey;
  const custody = getAssociatedTokenAddressSync(assetMint, vaultAuthority, true);
  return { vault, vaultAuthority, shareMint, custody };
}
