import { VaultError } from '../errors/VaultError.js';

export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new VaultError('InvariantViolation', message);
  }
}

export function assertNonNull<T>(value: T | null | undefined, message: string): T {
  if (value === null || value === undefined) {
    throw new VaultError('InvariantViolation', message);
  }
  return value;
}
