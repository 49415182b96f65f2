/**
 * Factory configuration.
 *
 * Deployment parameters are validated once with zod and frozen; the decimals offset
 * and administrator cannot change for the lifetime of the factory or its vaults.
 */

import { PublicKey } from '@solana/web3.js';
import { z } from 'zod';

import { VaultError } from '../errors/VaultError.js';

export const MAX_DECIMALS_OFFSET = 18;

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const DecimalsOffsetSchema = z.number().int().min(0).max(MAX_DECIMALS_OFFSET);

export const VaultFactoryConfigSchema = z.object({
  programId: z.instanceof(PublicKey),
  admin: z.instanceof(PublicKey),
  decimalsOffset: DecimalsOffsetSchema.default(0),
  logLevel: LogLevelSchema.default('silent')
});

export type VaultFactoryConfigInput = z.input<typeof VaultFactoryConfigSchema>;
export type VaultFactoryConfig = Readonly<z.output<typeof VaultFactoryConfigSchema>>;

export const EnvConfigSchema = z.object({
  SHARE_VAULT_LOG_LEVEL: LogLevelSchema.default('silent'),
  SHARE_VAULT_DECIMALS_OFFSET: z.coerce.number().pipe(DecimalsOffsetSchema).default(0)
});

export type EnvConfig = {
  logLevel: z.infer<typeof LogLevelSchema>;
  decimalsOffset: number;
};

function fail(message: string, error: z.ZodError): never {
  throw new VaultError('ConfigError', message, {
    cause: error,
    details: { issues: error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) }
  });
}

export function parseFactoryConfig(input: VaultFactoryConfigInput): VaultFactoryConfig {
  const result = VaultFactoryConfigSchema.safeParse(input);
  if (!result.success) fail('Invalid vault factory config', result.error);
  return Object.freeze(result.data);
}

export function loadEnvConfig(env: Record<string, string | undefined> = process.env): EnvConfig {
  const result = EnvConfigSchema.safeParse(env);
  if (!result.success) fail('Invalid environment config', result.error);
  return {
    logLevel: result.data.SHARE_VAULT_LOG_LEVEL,
    decimalsOffset: result.data.SHARE_VAULT_DECIMALS_OFFSET
  };
}
