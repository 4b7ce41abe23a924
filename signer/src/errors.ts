export type SignerErrorCode =
  | "DecryptionFailed"
  | "UnsupportedMethod"
  | "UnknownRequest"
  | "UnknownSession"
  | "Expired"
  | "Rejected"
  | "InvalidParams"
  | "InvalidConnectUri"
  | "SessionClosed";

export class SignerError extends Error {
  constructor(
    public readonly code: SignerErrorCode,
    message: string
  ) {
    super(message);
    this.name = "SignerError";
  }
}

export const isSignerError = (error: unknown, code?: SignerErrorCode): error is SignerError =>
  error instanceof SignerError && (code === undefined || error.code === code);

/** `code` and message of anything thrown, for error responses and logs. */
export const describeFailure = (error: unknown): { code: string; message: string } => {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return { code: error.code, message: error.message };
  }
  return { code: "InternalError", message: error instanceof Error ? error.message : String(error) };
};
