export const Seeds = {
  Vault: 'sharevault:v1:vault',
  VaultAuthority: 'sharevault:v1:vault_authority',
  ShareMint: 'sharevault:v1:share_mint'
} as const;
