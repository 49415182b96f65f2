export type VaultErrorCode =
  | 'ZeroAmount'
  | 'InsufficientBalance'
  | 'InsufficientAllowance'
  | 'Unauthorized'
  | 'ZeroAddress'
  | 'UnknownMint'
  | 'InvalidArgument'
  | 'InvariantViolation'
  | 'ProgramNotConfigured'
  | 'AccountParseError'
  | 'ConfigError';

export class VaultError extends Error {
  readonly code: VaultErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: VaultErrorCode,
    message: string,
    options?: { cause?: unknown; details?: Record<string, unknown> }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'VaultError';
    this.code = code;
    if (options?.details !== undefined) {
      this.details = options.details;
    }
  }
}
