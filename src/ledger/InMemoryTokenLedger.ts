import type { PublicKey } from '@solana/web3.js';

import { VaultError } from '../errors/VaultError.js';
import { assertNotZeroAddress } from '../utils/encoding.js';
import type { Logger } from '../utils/logger.js';
import { MAX_ALLOWANCE, type TokenLedger } from './TokenLedger.js';

export type TransferHook = (mint: PublicKey, from: PublicKey, to: PublicKey, amount: bigint) => void;

export type InMemoryTokenLedgerOptions = {
  /** Runs before balances move, like a token's send hook. */
  beforeTransfer?: TransferHook;
  /** Runs after balances move, like a token's receive hook; throwing reverts the transfer. */
  afterTransfer?: TransferHook;
  logger?: Logger;
};

type MintAccount = {
  decimals: number;
  supply: bigint;
  balances: Map<string, bigint>;
  allowances: Map<string, bigint>;
};

function allowanceKey(owner: PublicKey, spender: PublicKey): string {
  return `${owner.toBase58()}:${spender.toBase58()}`;
}

export class InMemoryTokenLedger implements TokenLedger {
  private readonly mints = new Map<string, MintAccount>();

  constructor(private readonly options: InMemoryTokenLedgerOptions = {}) {}

  createMint(mint: PublicKey, decimals: number): void {
    if (!Number.isInteger(decimals) || decimals < 0 || decimals > 255) {
      throw new VaultError('InvalidArgument', 'mint decimals must be an integer in [0, 255]');
    }
    const key = mint.toBase58();
    if (this.mints.has(key)) {
      throw new VaultError('InvalidArgument', 'mint already exists', { details: { mint: key } });
    }
    this.mints.set(key, { decimals, supply: 0n, balances: new Map(), allowances: new Map() });
  }

  hasMint(mint: PublicKey): boolean {
    return this.mints.has(mint.toBase58());
  }

  decimals(mint: PublicKey): number {
    return this.account(mint).decimals;
  }

  totalSupply(mint: PublicKey): bigint {
    return this.account(mint).supply;
  }

  balanceOf(mint: PublicKey, account: PublicKey): bigint {
    return this.account(mint).balances.get(account.toBase58()) ?? 0n;
  }

  allowance(mint: PublicKey, owner: PublicKey, spender: PublicKey): bigint {
    return this.account(mint).allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  approve(mint: PublicKey, owner: PublicKey, spender: PublicKey, amount: bigint): void {
    assertNotZeroAddress(owner, 'owner');
    assertNotZeroAddress(spender, 'spender');
    this.assertAmount(amount);
    this.account(mint).allowances.set(allowanceKey(owner, spender), amount);
  }

  transfer(mint: PublicKey, from: PublicKey, to: PublicKey, amount: bigint): void {
    assertNotZeroAddress(from, 'from');
    assertNotZeroAddress(to, 'to');
    this.assertAmount(amount);
    const acc = this.account(mint);
    this.requireBalance(acc, from, amount);

    this.options.beforeTransfer?.(mint, from, to, amount);

    // The hook may have moved funds; re-check against the current balance.
    this.requireBalance(acc, from, amount);
    this.move(acc, from, to, amount);

    this.options.logger?.trace(
      { mint: mint.toBase58(), from: from.toBase58(), to: to.toBase58(), amount: amount.toString() },
      'ledger transfer'
    );

    try {
      this.options.afterTransfer?.(mint, from, to, amount);
    } catch (err) {
      // A rejected receive aborts the whole transfer.
      this.requireBalance(acc, to, amount);
      this.move(acc, to, from, amount);
      throw err;
    }
  }

  transferFrom(mint: PublicKey, spender: PublicKey, from: PublicKey, to: PublicKey, amount: bigint): void {
    this.requireBalance(this.account(mint), from, amount);
    const before = this.allowance(mint, from, spender);
    this.spendAllowance(mint, from, spender, amount);
    try {
      this.transfer(mint, from, to, amount);
    } catch (err) {
      if (before !== MAX_ALLOWANCE) {
        const acc = this.account(mint);
        const key = allowanceKey(from, spender);
        acc.allowances.set(key, (acc.allowances.get(key) ?? 0n) + amount);
      }
      throw err;
    }
  }

  spendAllowance(mint: PublicKey, owner: PublicKey, spender: PublicKey, amount: bigint): void {
    this.assertAmount(amount);
    const acc = this.account(mint);
    const key = allowanceKey(owner, spender);
    const current = acc.allowances.get(key) ?? 0n;
    if (current === MAX_ALLOWANCE) return;
    if (current < amount) {
      throw new VaultError('InsufficientAllowance', 'allowance exceeded', {
        details: { allowance: current.toString(), requested: amount.toString() }
      });
    }
    acc.allowances.set(key, current - amount);
  }

  mint(mint: PublicKey, to: PublicKey, amount: bigint): void {
    assertNotZeroAddress(to, 'to');
    this.assertAmount(amount);
    const acc = this.account(mint);
    acc.supply += amount;
    acc.balances.set(to.toBase58(), (acc.balances.get(to.toBase58()) ?? 0n) + amount);
  }

  burn(mint: PublicKey, from: PublicKey, amount: bigint): void {
    assertNotZeroAddress(from, 'from');
    this.assertAmount(amount);
    const acc = this.account(mint);
    const balance = this.requireBalance(acc, from, amount);
    acc.balances.set(from.toBase58(), balance - amount);
    acc.supply -= amount;
  }

  private account(mint: PublicKey): MintAccount {
    const acc = this.mints.get(mint.toBase58());
    if (!acc) {
      throw new VaultError('UnknownMint', 'mint not registered on ledger', { details: { mint: mint.toBase58() } });
    }
    return acc;
  }

  private move(acc: MintAccount, from: PublicKey, to: PublicKey, amount: bigint): void {
    acc.balances.set(from.toBase58(), (acc.balances.get(from.toBase58()) ?? 0n) - amount);
    acc.balances.set(to.toBase58(), (acc.balances.get(to.toBase58()) ?? 0n) + amount);
  }

  private requireBalance(acc: MintAccount, holder: PublicKey, amount: bigint): bigint {
    const balance = acc.balances.get(holder.toBase58()) ?? 0n;
    if (balance < amount) {
      throw new VaultError('InsufficientBalance', 'balance exceeded', {
        details: { holder: holder.toBase58(), balance: balance.toString(), requested: amount.toString() }
      });
    }
    return balance;
  }

  private assertAmount(amount: bigint): void {
    if (amount < 0n) throw new VaultError('InvalidArgument', 'amount must be non-negative');
  }
}
