import { Connection, Keypair, type PublicKey } from '@solana/web3.js';
import BN from 'bn.js';
import { describe, expect, it } from 'vitest';

import { VaultError } from '../errors/VaultError.js';
import { defaultVaultDecoder } from '../vaults/VaultAccountDecoder.js';
import { VaultReadonlyClient } from './VaultReadonlyClient.js';

const connection = new Connection('http://127.0.0.1:8899');
const programId = Keypair.generate().publicKey;
const assetMint = Keypair.generate().publicKey;

function clientFor(accounts: Map<string, unknown>): VaultReadonlyClient {
  return new VaultReadonlyClient({
    connection,
    programId,
    fetchVaultAccount: async (vaultId: PublicKey) => accounts.get(vaultId.toBase58())
  });
}

describe('defaultVaultDecoder', () => {
  it('decodes BN and number fields', () => {
    const vaultId = Keypair.generate().publicKey;
    const state = defaultVaultDecoder(
      {
        assetMint,
        totalAssets: new BN('150'),
        totalShares: 100,
        decimalsOffset: 2,
        lastUpdatedTs: new BN(1_700_000_000)
      },
      vaultId
    );

    expect(state.totalAssets).toBe(150n);
    expect(state.totalShares).toBe(100n);
    expect(state.decimalsOffset).toBe(2);
    expect(state.lastUpdatedTs).toBe(1_700_000_000);
    expect(state.assetMint.equals(assetMint)).toBe(true);
  });

  it('rejects a timestamp wider than a safe integer', () => {
    const raw = { assetMint, totalAssets: 1n, totalShares: 1n, lastUpdatedTs: new BN(2).pow(new BN(60)) };
    let code: string | undefined;
    try {
      defaultVaultDecoder(raw, programId);
    } catch (err) {
      if (err instanceof VaultError) code = err.code;
    }
    expect(code).toBe('AccountParseError');
  });

  it('defaults a missing decimals offset to zero', () => {
    const state = defaultVaultDecoder({ assetMint, totalAssets: 1n, totalShares: 1n }, programId);
    expect(state.decimalsOffset).toBe(0);
  });

  it.each([
    ['missing asset mint', { totalAssets: 1n, totalShares: 1n }],
    ['negative total', { assetMint, totalAssets: new BN(-5), totalShares: 1n }],
    ['string total', { assetMint, totalAssets: '10', totalShares: 1n }],
    ['not an object', null]
  ])('rejects %s', (_name, raw) => {
    expect(() => defaultVaultDecoder(raw, programId)).toThrow(VaultError);
  });
});

describe('VaultReadonlyClient', () => {
  it('previews against the fetched vault totals', async () => {
    const vaultId = Keypair.generate().publicKey;
    const client = clientFor(
      new Map([[vaultId.toBase58(), { assetMint, totalAssets: new BN(150), totalShares: new BN(100) }]])
    );

    expect(await client.getVaultTVL(vaultId)).toBe(150n);
    expect(await client.previewDeposit({ vaultId, assets: 151n })).toEqual({ sharesOut: 101n });
    expect(await client.previewMint({ vaultId, shares: 10n })).toEqual({ assetsIn: 15n });
    expect(await client.previewWithdraw({ vaultId, assets: '4' })).toEqual({ sharesIn: 3n });
    expect(await client.previewRedeem({ vaultId, shares: 100 })).toEqual({ assetsOut: 149n });
  });

  it('surfaces decoding failures', async () => {
    const client = clientFor(new Map());
    await expect(client.getVaultState(Keypair.generate().publicKey)).rejects.toThrow('vault account is not an object');
  });

  it('requires a program, idl or fetcher', () => {
    expect(() => new VaultReadonlyClient({ connection, programId })).toThrow(
      'Provide `program`, `idl` or `fetchVaultAccount` to VaultReadonlyClient'
    );
  });
});
