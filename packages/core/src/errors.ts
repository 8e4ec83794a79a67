/**
 * Error taxonomy shared by every layer.
 *
 * Fatal kinds abort a whole request. Step kinds are reported inline in the
 * step's CommandResult and never abort the rest of a batch.
 */

export const ERROR_KINDS = [
  "ProviderUnavailable",
  "InvalidClient",
  "AuthorizationDenied",
  "AuthorizationExpired",
  "NotAuthenticated",
  "NotInitialized",
  "UnknownCommand",
  "MissingParameter",
  "InvalidParameter",
  "DecodeError",
  "CollaboratorError",
  "ConcurrentBatchRejected",
  "SessionNotFound",
  "Cancelled",
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

/** Kinds that can appear in a single step's result. */
export type StepErrorKind = Extract<
  ErrorKind,
  | "UnknownCommand"
  | "MissingParameter"
  | "InvalidParameter"
  | "DecodeError"
  | "CollaboratorError"
  | "Cancelled"
>;

export class RelayError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RelayError";
    this.kind = kind;
  }
}

export function isRelayError(error: unknown): error is RelayError {
  return error instanceof RelayError;
}
