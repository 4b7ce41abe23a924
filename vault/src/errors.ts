export type VaultErrorCode =
  | "InvalidKeyFormat"
  | "PolicyViolation"
  | "NoRecordFound"
  | "WrongPassword"
  | "SigningUnavailable"
  | "UnsupportedVaultVersion"
  | "CorruptRecord"
  | "AuthenticationFailed"
  | "KeyNotSet"
  | "InvalidDigest";

const RETRIABLE_CODES: ReadonlySet<VaultErrorCode> = new Set(["WrongPassword", "NoRecordFound"]);

export class VaultError extends Error {
  readonly retriable: boolean;

  constructor(
    public readonly code: VaultErrorCode,
    message: string
  ) {
    super(message);
    this.name = "VaultError";
    this.retriable = RETRIABLE_CODES.has(code);
  }
}

export const isVaultError = (error: unknown, code?: VaultErrorCode): error is VaultError =>
  error instanceof VaultError && (code === undefined || error.code === code);
