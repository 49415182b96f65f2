import { PublicKey } from '@solana/web3.js';
import { u32LeBytes, utf8Bytes } from '../utils/encoding.js';
import { Seeds } from './Seeds.js';

export type DerivedPda = { publicKey: PublicKey; bump: number };

function find(programId: PublicKey, seeds: Array<Buffer | Uint8Array>): DerivedPda {
  const [publicKey, bump] = PublicKey.findProgramAddressSync(seeds, programId);
  return { publicKey, bump };
}

export const PDA = {
  /** `index` is the vault's position in the factory registry. */
  vault(programId: PublicKey, assetMint: PublicKey, index: number): DerivedPda {
    return find(programId, [utf8Bytes(Seeds.Vault), assetMint.toBuffer(), u32LeBytes(index)]);
  },

  vaultAuthority(programId: PublicKey, vaultId: PublicKey): DerivedPda {
    return find(programId, [utf8Bytes(Seeds.VaultAuthority), vaultId.toBuffer()]);
  },

  shareMint(programId: PublicKey, vaultId: PublicKey): DerivedPda {
    return find(programId, [utf8Bytes(Seeds.ShareMint), vaultId.toBuffer()]);
  }
} as const;
