import { PublicKey } from '@solana/web3.js';
import { VaultError } from '../errors/VaultError.js';

export function utf8Bytes(text: string): Buffer {
  return Buffer.from(text, 'utf8');
}

export function u32LeBytes(value: number): Buffer {
  if (!Number.isInteger(value) || value < 0 || value > 0xffff_ffff) {
    throw new VaultError('InvalidArgument', 'u32 out of range', { details: { value } });
  }
  const buf = Buffer.alloc(4);
  buf.writeUInt32LE(value, 0);
  return buf;
}

/** The all-zero key stands in for the null account. */
export function isZeroAddress(key: PublicKey): boolean {
  return key.equals(PublicKey.default);
}

export function assertNotZeroAddress(key: PublicKey, fieldName: string): void {
  if (isZeroAddress(key)) {
    throw new VaultError('ZeroAddress', `${fieldName} is the zero address`);
  }
}
