export const Seeds = {
  GlobalState: 'global_state',
  VaultAuthority: 'vault_authority',
  UserState: 'user_state'
} as const;

export type SeedName = keyof typeof Seeds;
