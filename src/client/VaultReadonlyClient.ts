import type { Connection, PublicKey } from '@solana/web3.js';
import { Keypair } from '@solana/web3.js';
import * as anchor from '@coral-xyz/anchor';
import type { Idl, Program } from '@coral-xyz/anchor';

import { VaultError } from '../errors/VaultError.js';
import type { VaultState } from '../types/VaultState.js';
import { toBigIntAmount } from '../utils/math.js';
import { ConversionEngine } from '../vaults/ConversionEngine.js';
import { defaultVaultDecoder, type VaultAccountDecoder } from '../vaults/VaultAccountDecoder.js';

export type VaultAccountFetcher = (vaultId: PublicKey) => Promise<unknown>;

export type VaultReadonlyClientConfig = {
  connection: Connection;
  programId: PublicKey;

  /**
   * Provide an initialized Anchor `program`, an `idl` to construct it, or a raw
   * `fetchVaultAccount` (e.g. a cache or indexer).
   */
  program?: Program<Idl>;
  idl?: Idl;
  fetchVaultAccount?: VaultAccountFetcher;

  decodeVaultState?: VaultAccountDecoder;
  /** Anchor account namespace key of the vault account; defaults to `vault`. */
  vaultAccountName?: string;
};

type AmountInput = bigint | number | string;

/** Reads deployed vault accounts and previews conversions against their live totals. */
export class VaultReadonlyClient {
  readonly connection: Connection;
  readonly programId: PublicKey;

  private readonly fetchVaultAccount: VaultAccountFetcher;
  private readonly decode: VaultAccountDecoder;

  constructor(readonly config: VaultReadonlyClientConfig) {
    this.connection = config.connection;
    this.programId = config.programId;
    this.decode = config.decodeVaultState ?? defaultVaultDecoder;
    this.fetchVaultAccount = config.fetchVaultAccount ?? this.programFetcher(config);
  }

  private programFetcher(cfg: VaultReadonlyClientConfig): VaultAccountFetcher {
    const program = cfg.program ?? this.buildReadonlyProgram(cfg);
    const accountName = cfg.vaultAccountName ?? 'vault';

    const accountsNs = program.account as unknown as Record<
      string,
      { fetch: (pk: PublicKey) => Promise<unknown> }
    >;
    const vaultAccount = accountsNs[accountName];
    if (!vaultAccount) {
      throw new VaultError('ProgramNotConfigured', 'Vault account type not found on program', {
        details: { accountType: accountName }
      });
    }
    return (vaultId) => vaultAccount.fetch(vaultId);
  }

  private buildReadonlyProgram(cfg: VaultReadonlyClientConfig): Program<Idl> {
    if (!cfg.idl) {
      throw new VaultError(
        'ProgramNotConfigured',
        'Provide `program`, `idl` or `fetchVaultAccount` to VaultReadonlyClient'
      );
    }

    // Anchor requires a wallet in the provider; we supply a non-signing wallet.
    const provider = new anchor.AnchorProvider(
      cfg.connection,
      new anchor.Wallet(Keypair.generate()),
      anchor.AnchorProvider.defaultOptions()
    );

    return new anchor.Program(cfg.idl, provider);
  }

  async getVaultState(vaultId: PublicKey): Promise<VaultState> {
    const raw = await this.fetchVaultAccount(vaultId);
    return this.decode(raw, vaultId);
  }

  async getVaultTVL(vaultId: PublicKey): Promise<bigint> {
    const state = await this.getVaultState(vaultId);
    return state.totalAssets;
  }

  async previewDeposit(params: { vaultId: PublicKey; assets: AmountInput }): Promise<{ sharesOut: bigint }> {
    const state = await this.getVaultState(params.vaultId);
    return { sharesOut: ConversionEngine.previewDeposit(state, toBigIntAmount(params.assets)) };
  }

  async previewMint(params: { vaultId: PublicKey; shares: AmountInput }): Promise<{ assetsIn: bigint }> {
    const state = await this.getVaultState(params.vaultId);
    return { assetsIn: ConversionEngine.previewMint(state, toBigIntAmount(params.shares)) };
  }

  async previewWithdraw(params: { vaultId: PublicKey; assets: AmountInput }): Promise<{ sharesIn: bigint }> {
    const state = await this.getVaultState(params.vaultId);
    return { sharesIn: ConversionEngine.previewWithdraw(state, toBigIntAmount(params.assets)) };
  }

  async previewRedeem(params: { vaultId: PublicKey; shares: AmountInput }): Promise<{ assetsOut: bigint }> {
    const state = await this.getVaultState(params.vaultId);
    return { assetsOut: ConversionEngine.previewRedeem(state, toBigIntAmount(params.shares)) };
  }
}
