export type VaultAmmErrorCode =
  | 'DecodeError'
  | 'InsufficientReserve'
  | 'MissingAccount'
  | 'UnknownVault'
  | 'UnsupportedMint'
  | 'InvalidArgument'
  | 'InvariantViolation';

export type VaultAmmErrorOptions = {
  cause?: unknown;
  /** Structured context for logs; values are kept JSON-friendly (bigints as strings). */
  details?: Record<string, unknown>;
};

/** The single error type thrown by the adapter; callers branch on `code`. */
export class VaultAmmError extends Error {
  override readonly name = 'VaultAmmError';
  readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(
    readonly code: VaultAmmErrorCode,
    message: string,
    { cause, details }: VaultAmmErrorOptions = {}
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.details = details;
  }
}

export function isVaultAmmError(value: unknown, code?: VaultAmmErrorCode): value is VaultAmmError {
  return value instanceof VaultAmmError && (code === undefined || value.code === code);
}
