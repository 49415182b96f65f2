import type { PublicKey } from '@solana/web3.js';

export type VaultCreatedEvent = {
  type: 'VaultCreated';
  vault: PublicKey;
  asset: PublicKey;
};

export type DepositEvent = {
  type: 'Deposit';
  vault: PublicKey;
  caller: PublicKey;
  receiver: PublicKey;
  assets: bigint;
  shares: bigint;
};

export type WithdrawEvent = {
  type: 'Withdraw';
  vault: PublicKey;
  caller: PublicKey;
  receiver: PublicKey;
  owner: PublicKey;
  assets: bigint;
  shares: bigint;
};

export type VaultEvent = VaultCreatedEvent | DepositEvent | WithdrawEvent;

export type VaultEventType = VaultEvent['type'];
