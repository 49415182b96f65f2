import type { PublicKey } from '@solana/web3.js';

import { AdminGate, type AccessGate } from '../access/AccessGate.js';
import { deriveVaultAddresses } from '../accounts/Authorities.js';
import { parseFactoryConfig, type VaultFactoryConfig, type VaultFactoryConfigInput } from '../config/VaultConfig.js';
import type { EventSink } from '../events/EventLog.js';
import { VaultError } from '../errors/VaultError.js';
import type { TokenLedger } from '../ledger/TokenLedger.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { SingleAssetVault } from './SingleAssetVault.js';

export type VaultFactoryDeps = {
  ledger: TokenLedger;
  events: EventSink;
  /** Defaults to an `AdminGate` on `config.admin`. */
  gate?: AccessGate;
  logger?: Logger;
};

/**
 * Deploys one `SingleAssetVault` per call and keeps them in an append-only registry.
 * Only the administrator may create vaults.
 */
export class VaultFactory {
  readonly config: VaultFactoryConfig;

  private readonly ledger: TokenLedger;
  private readonly events: EventSink;
  private readonly gate: AccessGate;
  private readonly logger: Logger;
  private readonly registry: SingleAssetVault[] = [];

  constructor(config: VaultFactoryConfigInput, deps: VaultFactoryDeps) {
    this.config = parseFactoryConfig(config);
    this.ledger = deps.ledger;
    this.events = deps.events;
    this.gate = deps.gate ?? new AdminGate(this.config.admin);
    this.logger = deps.logger ?? createLogger({ level: this.config.logLevel });
  }

  createVault(caller: PublicKey, asset: PublicKey): SingleAssetVault {
    if (!this.gate.isAuthorized(caller)) {
      this.logger.warn({ caller: caller.toBase58(), asset: asset.toBase58() }, 'createVault rejected');
      throw new VaultError('Unauthorized', 'caller may not create vaults', {
        details: { caller: caller.toBase58() }
      });
    }
    if (!this.ledger.hasMint(asset)) {
      throw new VaultError('UnknownMint', 'asset mint not registered on ledger', {
        details: { asset: asset.toBase58() }
      });
    }

    const index = this.registry.length;
    const addresses = deriveVaultAddresses(this.config.programId, asset, index);

    this.ledger.createMint(addresses.shareMint, this.ledger.decimals(asset) + this.config.decimalsOffset);

    const vault = new SingleAssetVault({
      vaultId: addresses.vault,
      assetMint: asset,
      shareMint: addresses.shareMint,
      custody: addresses.custody,
      decimalsOffset: this.config.decimalsOffset,
      ledger: this.ledger,
      events: this.events,
      logger: this.logger
    });

    this.registry.push(vault);
    this.events.emit({ type: 'VaultCreated', vault: vault.vaultId, asset });
    this.logger.debug({ vault: vault.vaultId.toBase58(), asset: asset.toBase58(), index }, 'vault created');

    return vault;
  }

  totalVaults(): number {
    return this.registry.length;
  }

  getVault(index: number): SingleAssetVault {
    const vault = this.registry[index];
    if (!vault) {
      throw new VaultError('InvalidArgument', 'vault index out of range', {
        details: { index, totalVaults: this.registry.length }
      });
    }
    return vault;
  }

  allVaults(): readonly SingleAssetVault[] {
    return [...this.registry];
  }

  vaultsForAsset(asset: PublicKey): SingleAssetVault[] {
    return this.registry.filter((v) => v.assetMint.equals(asset));
  }
}
