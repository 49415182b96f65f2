import { Keypair, type PublicKey } from '@solana/web3.js';
import { describe, expect, it } from 'vitest';

import { InMemoryEventLog } from '../events/EventLog.js';
import { VaultError } from '../errors/VaultError.js';
import { InMemoryTokenLedger, type TransferHook } from '../ledger/InMemoryTokenLedger.js';
import { SingleAssetVault } from './SingleAssetVault.js';

/**
 * A token whose send/receive hooks hand control to the attacker mid-transfer.
 */
function hostileSetup() {
  const hooks: { before?: TransferHook | undefined; after?: TransferHook | undefined } = {};
  const ledger = new InMemoryTokenLedger({
    beforeTransfer: (...args) => hooks.before?.(...args),
    afterTransfer: (...args) => hooks.after?.(...args)
  });
  const events = new InMemoryEventLog();

  const asset = Keypair.generate().publicKey;
  const shareMint = Keypair.generate().publicKey;
  ledger.createMint(asset, 9);
  ledger.createMint(shareMint, 9);

  const vault = new SingleAssetVault({
    vaultId: Keypair.generate().publicKey,
    assetMint: asset,
    shareMint,
    custody: Keypair.generate().publicKey,
    decimalsOffset: 0,
    ledger,
    events
  });

  const alice = Keypair.generate().publicKey;
  const attacker = Keypair.generate().publicKey;
  ledger.mint(asset, alice, 10_000n);
  ledger.mint(asset, attacker, 10_000n);

  return { hooks, ledger, events, asset, shareMint, vault, alice, attacker };
}

function setupWithAliceDeposit() {
  const ctx = hostileSetup();
  ctx.vault.deposit({ caller: ctx.alice, assets: 1_000n, receiver: ctx.alice });
  return ctx;
}

function setupWithTwoHolders() {
  const ctx = setupWithAliceDeposit();
  ctx.vault.deposit({ caller: ctx.attacker, assets: 1_000n, receiver: ctx.attacker });
  return ctx;
}

function once(fn: TransferHook): TransferHook {
  let fired = false;
  return (...args) => {
    if (fired) return;
    fired = true;
    fn(...args);
  };
}

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected the call to throw');
}

describe('SingleAssetVault reentrancy', () => {
  it('shows the pre-deposit pool to hooks on both sides of the pull', () => {
    const { hooks, asset, vault, alice } = setupWithAliceDeposit();
    const seen: Array<{ assets: bigint; shares: bigint }> = [];
    const record: TransferHook = (mint) => {
      if (mint.equals(asset)) seen.push({ assets: vault.totalAssets(), shares: vault.totalShares() });
    };
    hooks.before = record;
    hooks.after = record;

    vault.deposit({ caller: alice, assets: 500n, receiver: alice });

    expect(seen).toEqual([
      { assets: 1_000n, shares: 1_000n },
      { assets: 1_000n, shares: 1_000n }
    ]);
    expect(vault.totalAssets()).toBe(1_500n);
    expect(vault.totalShares()).toBe(1_500n);
  });

  it('shows the pre-withdraw pool to the receive hook', () => {
    const { hooks, asset, vault, alice } = setupWithAliceDeposit();
    const seen: Array<{ assets: bigint; shares: bigint }> = [];

    hooks.after = (mint, _from, to) => {
      if (mint.equals(asset) && to.equals(alice)) {
        seen.push({ assets: vault.totalAssets(), shares: vault.totalShares() });
      }
    };

    vault.withdraw({ caller: alice, assets: 400n, receiver: alice, owner: alice });

    expect(seen).toEqual([{ assets: 1_000n, shares: 1_000n }]);
    expect(vault.totalAssets()).toBe(600n);
    expect(vault.totalShares()).toBe(600n);
  });

  it('gives a depositor re-entering from its own send hook a fair share', () => {
    const { hooks, asset, vault, alice, attacker } = setupWithAliceDeposit();

    hooks.before = once((mint, from) => {
      if (mint.equals(asset) && from.equals(attacker)) {
        vault.deposit({ caller: attacker, assets: 100n, receiver: attacker });
      }
    });

    vault.deposit({ caller: attacker, assets: 100n, receiver: attacker });

    expect(vault.totalAssets()).toBe(1_200n);
    expect(vault.totalShares()).toBe(1_200n);
    expect(vault.balanceOf(attacker)).toBe(200n);
    expect(vault.maxWithdraw(attacker)).toBe(200n);
    expect(vault.maxWithdraw(alice)).toBe(1_000n);
  });

  it('gives a redeemer re-entering from its receive hook a fair share', () => {
    const { hooks, ledger, asset, vault, alice, attacker } = setupWithTwoHolders();

    hooks.after = once((mint, _from, to) => {
      if (mint.equals(asset) && to.equals(attacker)) {
        vault.redeem({ caller: attacker, shares: 500n, receiver: attacker, owner: attacker });
      }
    });

    expect(vault.redeem({ caller: attacker, shares: 500n, receiver: attacker, owner: attacker })).toBe(500n);

    expect(vault.balanceOf(attacker)).toBe(0n);
    expect(ledger.balanceOf(asset, attacker)).toBe(10_000n);
    expect(vault.totalAssets()).toBe(1_000n);
    expect(vault.maxWithdraw(alice)).toBe(1_000n);
  });

  it('pays a fair price to a redeemer re-entering from the receive hook of a deposit', () => {
    const { hooks, ledger, asset, vault, alice, attacker } = setupWithTwoHolders();
    let redeemed: bigint | undefined;

    hooks.after = once((mint, from) => {
      if (mint.equals(asset) && from.equals(alice)) {
        redeemed = vault.redeem({ caller: attacker, shares: 1_000n, receiver: attacker, owner: attacker });
      }
    });

    expect(vault.deposit({ caller: alice, assets: 2_000n, receiver: alice })).toBe(2_000n);

    expect(redeemed).toBe(1_000n);
    expect(ledger.balanceOf(asset, attacker)).toBe(10_000n);
    expect(vault.balanceOf(alice)).toBe(3_000n);
    expect(vault.maxWithdraw(alice)).toBe(3_000n);
    expect(vault.totalAssets()).toBe(3_000n);
    expect(vault.totalShares()).toBe(3_000n);
  });

  it('pays a fair price to a redeemer re-entering from the send hook of a withdraw', () => {
    const { hooks, ledger, asset, vault, alice, attacker } = setupWithTwoHolders();
    let redeemed: bigint | undefined;

    hooks.before = once((mint, from, to) => {
      if (mint.equals(asset) && from.equals(vault.custody) && to.equals(alice)) {
        redeemed = vault.redeem({ caller: attacker, shares: 1_000n, receiver: attacker, owner: attacker });
      }
    });

    expect(vault.withdraw({ caller: alice, assets: 1_000n, receiver: alice, owner: alice })).toBe(1_000n);

    expect(redeemed).toBe(1_000n);
    expect(ledger.balanceOf(asset, attacker)).toBe(10_000n);
    expect(ledger.balanceOf(asset, alice)).toBe(10_000n);
    expect(vault.balanceOf(alice)).toBe(0n);
    expect(vault.totalAssets()).toBe(0n);
    expect(vault.totalShares()).toBe(0n);
  });

  it('prices a deposit re-entering from the send hook of a redeem at the pre-redeem rate', () => {
    const { hooks, ledger, asset, vault, alice, attacker } = setupWithTwoHolders();

    hooks.before = once((mint, from) => {
      if (mint.equals(asset) && from.equals(vault.custody)) {
        vault.deposit({ caller: attacker, assets: 500n, receiver: attacker });
      }
    });

    expect(vault.redeem({ caller: alice, shares: 500n, receiver: alice, owner: alice })).toBe(500n);

    expect(vault.balanceOf(attacker)).toBe(1_500n);
    expect(vault.maxWithdraw(attacker)).toBe(1_500n);
    expect(vault.maxWithdraw(alice)).toBe(500n);
    expect(ledger.balanceOf(asset, alice)).toBe(9_500n);
    expect(vault.totalAssets()).toBe(2_000n);
    expect(vault.totalShares()).toBe(2_000n);
  });

  it('restores shares and allowance when the receiver rejects the payout', () => {
    const { hooks, ledger, events, asset, shareMint, vault, alice } = setupWithAliceDeposit();
    const bob = Keypair.generate().publicKey;
    vault.approve(alice, bob, 500n);

    hooks.after = (mint, _from, to) => {
      if (mint.equals(asset) && to.equals(bob)) throw new Error('receiver rejected');
    };

    expect(() => vault.withdraw({ caller: bob, assets: 100n, receiver: bob, owner: alice })).toThrow(
      'receiver rejected'
    );

    expect(vault.balanceOf(alice)).toBe(1_000n);
    expect(vault.allowance(alice, bob)).toBe(500n);
    expect(ledger.totalSupply(shareMint)).toBe(1_000n);
    expect(vault.totalShares()).toBe(1_000n);
    expect(vault.totalAssets()).toBe(1_000n);
    expect(ledger.balanceOf(asset, bob)).toBe(0n);
    expect(vault.maxWithdraw(alice)).toBe(1_000n);
    expect(events.ofType('Withdraw')).toHaveLength(0);

    hooks.after = undefined;
    expect(vault.redeem({ caller: alice, shares: 100n, receiver: alice, owner: alice })).toBe(100n);
  });

  it('restores burned shares when custody is drained before the payout', () => {
    const { hooks, ledger, asset, shareMint, vault, alice } = setupWithTwoHolders();
    const sink: PublicKey = Keypair.generate().publicKey;

    hooks.before = once((mint, from) => {
      if (mint.equals(asset) && from.equals(vault.custody)) {
        ledger.transfer(asset, vault.custody, sink, 1_500n);
      }
    });

    const err = catchError(() => vault.withdraw({ caller: alice, assets: 1_000n, receiver: alice, owner: alice }));

    expect(err instanceof VaultError && err.code).toBe('InsufficientBalance');
    expect(vault.balanceOf(alice)).toBe(1_000n);
    expect(ledger.totalSupply(shareMint)).toBe(2_000n);
    expect(ledger.balanceOf(asset, alice)).toBe(9_000n);
    expect(vault.totalAssets()).toBe(500n);
  });

  it('leaves no shares behind when custody rejects a deposit', () => {
    const { hooks, ledger, events, asset, vault, alice } = setupWithAliceDeposit();

    hooks.after = (mint, _from, to) => {
      if (mint.equals(asset) && to.equals(vault.custody)) throw new Error('custody rejected');
    };

    expect(() => vault.deposit({ caller: alice, assets: 300n, receiver: alice })).toThrow('custody rejected');

    expect(ledger.balanceOf(asset, alice)).toBe(9_000n);
    expect(vault.balanceOf(alice)).toBe(1_000n);
    expect(vault.totalAssets()).toBe(1_000n);
    expect(vault.totalShares()).toBe(1_000n);
    expect(events.ofType('Deposit')).toHaveLength(1);
  });

  it('undoes the pull and the mint when a deposit listener throws', () => {
    const { ledger, events, asset, vault, alice } = setupWithAliceDeposit();
    events.subscribe((event) => {
      if (event.type === 'Deposit') throw new Error('listener failed');
    });

    expect(() => vault.deposit({ caller: alice, assets: 300n, receiver: alice })).toThrow('listener failed');

    expect(ledger.balanceOf(asset, alice)).toBe(9_000n);
    expect(vault.balanceOf(alice)).toBe(1_000n);
    expect(vault.totalAssets()).toBe(1_000n);
    expect(vault.totalShares()).toBe(1_000n);
    expect(events.ofType('Deposit')).toHaveLength(1);
  });

  it('aborts the outer deposit when the hook drains the caller', () => {
    const { hooks, ledger, asset, vault, attacker } = setupWithAliceDeposit();
    const sink: PublicKey = Keypair.generate().publicKey;

    hooks.before = once((mint, from) => {
      if (mint.equals(asset) && from.equals(attacker)) {
        ledger.transfer(asset, attacker, sink, 9_950n);
      }
    });

    expect(() => vault.deposit({ caller: attacker, assets: 100n, receiver: attacker })).toThrow('balance exceeded');
    expect(vault.balanceOf(attacker)).toBe(0n);
    expect(vault.totalShares()).toBe(1_000n);
  });
});
