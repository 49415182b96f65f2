import { VaultError } from '../errors/VaultError.js';

export type RoundingMode = 'down' | 'up';

/** Largest SPL token amount; doubles as the unlimited-allowance sentinel. */
export const U64_MAX = (1n << 64n) - 1n;

export function toBigIntAmount(value: bigint | number | string): bigint {
  if (typeof value === 'bigint') {
    if (value < 0n) throw new VaultError('InvalidArgument', 'Amount must be non-negative');
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || !Number.isInteger(value) || value < 0) {
      throw new VaultError('InvalidArgument', 'Amount must be a non-negative integer');
    }
    return BigInt(value);
  }
  if (!/^[0-9]+$/.test(value)) {
    throw new VaultError('InvalidArgument', 'Amount string must be base-10 integer');
  }
  return BigInt(value);
}

export function pow10(exp: number): bigint {
  if (!Number.isInteger(exp) || exp < 0) {
    throw new VaultError('InvalidArgument', 'pow10 exponent must be a non-negative integer');
  }
  let result = 1n;
  for (let i = 0; i < exp; i++) result *= 10n;
  return result;
}

export function mulDiv(
  a: bigint,
  b: bigint,
  denom: bigint,
  rounding: RoundingMode = 'down'
): bigint {
  if (denom === 0n) throw new VaultError('InvalidArgument', 'Division by zero');
  const product = a * b;
  if (rounding === 'down') return product / denom;
  const q = product / denom;
  const r = product % denom;
  return r === 0n ? q : q + 1n;
}
