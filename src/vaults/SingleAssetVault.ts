import type { PublicKey } from '@solana/web3.js';

import type { EventSink } from '../events/EventLog.js';
import { VaultError } from '../errors/VaultError.js';
import { MAX_ALLOWANCE, type TokenLedger } from '../ledger/TokenLedger.js';
import type { PoolState } from '../types/PoolState.js';
import { assertNotZeroAddress } from '../utils/encoding.js';
import { assertNonNull, invariant } from '../utils/invariant.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { toBigIntAmount, U64_MAX } from '../utils/math.js';
import { ConversionEngine } from './ConversionEngine.js';

export type Amount = bigint | number | string;

type PoolTotals = { totalAssets: bigint; totalShares: bigint };

export type SingleAssetVaultConfig = {
  vaultId: PublicKey;
  assetMint: PublicKey;
  shareMint: PublicKey;
  /** Token account holding the pooled asset. */
  custody: PublicKey;
  decimalsOffset: number;

  ledger: TokenLedger;
  events: EventSink;
  logger?: Logger;
};

export type DepositParams = { caller: PublicKey; assets: Amount; receiver: PublicKey };
export type MintParams = { caller: PublicKey; shares: Amount; receiver: PublicKey };
export type WithdrawParams = { caller: PublicKey; assets: Amount; receiver: PublicKey; owner: PublicKey };
export type RedeemParams = { caller: PublicKey; shares: Amount; receiver: PublicKey; owner: PublicKey };

function requirePositive(value: Amount, field: string): bigint {
  const amount = toBigIntAmount(value);
  if (amount === 0n) {
    throw new VaultError('ZeroAmount', `${field} must be > 0`);
  }
  return amount;
}

/**
 * Deposit vault over a single asset mint. While idle, assets are the custody
 * account's ledger balance and shares are the share mint's supply, so tokens sent
 * straight to custody accrue to every holder pro rata.
 *
 * While an operation is in flight the totals are frozen at the values read when the
 * outermost call began, and each call applies its own deltas once, after all of its
 * ledger effects. Code re-entering from a transfer hook never sees assets pulled but
 * not yet minted against, or shares burned but not yet paid out.
 */
export class SingleAssetVault {
  readonly vaultId: PublicKey;
  readonly assetMint: PublicKey;
  readonly shareMint: PublicKey;
  readonly custody: PublicKey;
  readonly decimalsOffset: number;

  private readonly ledger: TokenLedger;
  private readonly events: EventSink;
  private readonly logger: Logger;
  private inflight: PoolTotals | null = null;

  constructor(cfg: SingleAssetVaultConfig) {
    invariant(
      Number.isInteger(cfg.decimalsOffset) && cfg.decimalsOffset >= 0,
      'decimalsOffset must be a non-negative integer'
    );
    assertNotZeroAddress(cfg.custody, 'custody');

    this.vaultId = cfg.vaultId;
    this.assetMint = cfg.assetMint;
    this.shareMint = cfg.shareMint;
    this.custody = cfg.custody;
    this.decimalsOffset = cfg.decimalsOffset;
    this.ledger = cfg.ledger;
    this.events = cfg.events;
    this.logger = (cfg.logger ?? createLogger()).child({ vault: cfg.vaultId.toBase58() });
  }

  totalAssets(): bigint {
    return this.poolState().totalAssets;
  }

  totalShares(): bigint {
    return this.poolState().totalShares;
  }

  poolState(): PoolState {
    const totals = this.inflight ?? this.ledgerTotals();
    return {
      totalAssets: totals.totalAssets,
      totalShares: totals.totalShares,
      decimalsOffset: this.decimalsOffset
    };
  }

  private ledgerTotals(): PoolTotals {
    return {
      totalAssets: this.ledger.balanceOf(this.assetMint, this.custody),
      totalShares: this.ledger.totalSupply(this.shareMint)
    };
  }

  /** Share token decimals: the asset's plus the offset. */
  decimals(): number {
    return this.ledger.decimals(this.assetMint) + this.decimalsOffset;
  }

  balanceOf(owner: PublicKey): bigint {
    return this.ledger.balanceOf(this.shareMint, owner);
  }

  allowance(owner: PublicKey, spender: PublicKey): bigint {
    return this.ledger.allowance(this.shareMint, owner, spender);
  }

  approve(owner: PublicKey, spender: PublicKey, shares: Amount): void {
    this.ledger.approve(this.shareMint, owner, spender, toBigIntAmount(shares));
  }

  transferShares(from: PublicKey, to: PublicKey, shares: Amount): void {
    this.ledger.transfer(this.shareMint, from, to, toBigIntAmount(shares));
  }

  convertToShares(assets: Amount): bigint {
    return ConversionEngine.convertToShares(this.poolState(), toBigIntAmount(assets));
  }

  convertToAssets(shares: Amount): bigint {
    return ConversionEngine.convertToAssets(this.poolState(), toBigIntAmount(shares));
  }

  previewDeposit(assets: Amount): bigint {
    return ConversionEngine.previewDeposit(this.poolState(), toBigIntAmount(assets));
  }

  previewMint(shares: Amount): bigint {
    return ConversionEngine.previewMint(this.poolState(), toBigIntAmount(shares));
  }

  previewWithdraw(assets: Amount): bigint {
    return ConversionEngine.previewWithdraw(this.poolState(), toBigIntAmount(assets));
  }

  previewRedeem(shares: Amount): bigint {
    return ConversionEngine.previewRedeem(this.poolState(), toBigIntAmount(shares));
  }

  maxDeposit(_receiver: PublicKey): bigint {
    return U64_MAX;
  }

  maxMint(_receiver: PublicKey): bigint {
    return U64_MAX;
  }

  maxWithdraw(owner: PublicKey): bigint {
    return this.previewRedeem(this.balanceOf(owner));
  }

  maxRedeem(owner: PublicKey): bigint {
    return this.balanceOf(owner);
  }

  deposit(params: DepositParams): bigint {
    const assets = requirePositive(params.assets, 'deposit assets');
    return this.atomically((totals) => {
      const shares = this.previewDeposit(assets);
      this.enter(params.caller, params.receiver, assets, shares);
      totals.totalAssets += assets;
      totals.totalShares += shares;
      return shares;
    });
  }

  mint(params: MintParams): bigint {
    const shares = requirePositive(params.shares, 'mint shares');
    return this.atomically((totals) => {
      const assets = this.previewMint(shares);
      this.enter(params.caller, params.receiver, assets, shares);
      totals.totalAssets += assets;
      totals.totalShares += shares;
      return assets;
    });
  }

  withdraw(params: WithdrawParams): bigint {
    const assets = requirePositive(params.assets, 'withdraw assets');
    return this.atomically((totals) => {
      const shares = this.previewWithdraw(assets);
      this.exit(params.caller, params.receiver, params.owner, assets, shares);
      totals.totalAssets -= assets;
      totals.totalShares -= shares;
      return shares;
    });
  }

  redeem(params: RedeemParams): bigint {
    const shares = requirePositive(params.shares, 'redeem shares');
    return this.atomically((totals) => {
      const assets = this.previewRedeem(shares);
      this.exit(params.caller, params.receiver, params.owner, assets, shares);
      totals.totalAssets -= assets;
      totals.totalShares -= shares;
      return assets;
    });
  }

  // The outermost call snapshots the ledger; nested calls share and update the snapshot.
  private atomically<T>(op: (totals: PoolTotals) => T): T {
    const outermost = this.inflight === null;
    if (outermost) this.inflight = this.ledgerTotals();
    const totals = assertNonNull(this.inflight, 'pool totals not initialised');
    try {
      return op(totals);
    } finally {
      if (outermost) this.inflight = null;
    }
  }

  // Undo completed effects newest-first, then surface the original failure.
  private rollback(err: unknown, undo: Array<() => void>): never {
    for (const step of undo.reverse()) {
      try {
        step();
      } catch (cause) {
        throw new VaultError('InvariantViolation', 'failed to restore state after an aborted operation', {
          cause,
          details: { original: err instanceof Error ? err.message : String(err) }
        });
      }
    }
    throw err;
  }

  // Assets are pulled into custody before any share exists.
  private enter(caller: PublicKey, receiver: PublicKey, assets: bigint, shares: bigint): void {
    assertNotZeroAddress(caller, 'caller');
    assertNotZeroAddress(receiver, 'receiver');

    const undo: Array<() => void> = [];
    try {
      this.ledger.transfer(this.assetMint, caller, this.custody, assets);
      undo.push(() => this.ledger.transfer(this.assetMint, this.custody, caller, assets));
      this.ledger.mint(this.shareMint, receiver, shares);
      undo.push(() => this.ledger.burn(this.shareMint, receiver, shares));

      this.events.emit({ type: 'Deposit', vault: this.vaultId, caller, receiver, assets, shares });
    } catch (err) {
      this.rollback(err, undo);
    }
    this.logger.debug(
      {
        caller: caller.toBase58(),
        receiver: receiver.toBase58(),
        assets: assets.toString(),
        shares: shares.toString()
      },
      'deposit'
    );
  }

  // Shares are burned before assets leave custody; every check runs before the first effect.
  private exit(caller: PublicKey, receiver: PublicKey, owner: PublicKey, assets: bigint, shares: bigint): void {
    assertNotZeroAddress(caller, 'caller');
    assertNotZeroAddress(receiver, 'receiver');
    assertNotZeroAddress(owner, 'owner');

    const balance = this.balanceOf(owner);
    if (shares > balance) {
      throw new VaultError('InsufficientBalance', 'share burn exceeds owner balance', {
        details: { owner: owner.toBase58(), balance: balance.toString(), shares: shares.toString() }
      });
    }

    const delegated = !caller.equals(owner);
    const allowed = delegated ? this.allowance(owner, caller) : MAX_ALLOWANCE;
    if (allowed !== MAX_ALLOWANCE && allowed < shares) {
      throw new VaultError('InsufficientAllowance', 'share burn exceeds caller allowance', {
        details: { allowance: allowed.toString(), shares: shares.toString() }
      });
    }

    const undo: Array<() => void> = [];
    try {
      if (allowed !== MAX_ALLOWANCE) {
        this.ledger.spendAllowance(this.shareMint, owner, caller, shares);
        undo.push(() =>
          this.ledger.approve(this.shareMint, owner, caller, this.allowance(owner, caller) + shares)
        );
      }
      this.ledger.burn(this.shareMint, owner, shares);
      undo.push(() => this.ledger.mint(this.shareMint, owner, shares));
      this.ledger.transfer(this.assetMint, this.custody, receiver, assets);
      undo.push(() => this.ledger.transfer(this.assetMint, receiver, this.custody, assets));

      this.events.emit({ type: 'Withdraw', vault: this.vaultId, caller, receiver, owner, assets, shares });
    } catch (err) {
      this.rollback(err, undo);
    }
    this.logger.debug(
      {
        caller: caller.toBase58(),
        receiver: receiver.toBase58(),
        owner: owner.toBase58(),
        assets: assets.toString(),
        shares: shares.toString()
      },
      'withdraw'
    );
  }
}
