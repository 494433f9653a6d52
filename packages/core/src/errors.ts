export enum RpsErrorCode {
  InvalidStage = "InvalidStage",
  Locked = "Locked",
  NotLocked = "NotLocked",
  DuplicatePlayer = "DuplicatePlayer",
  InsufficientFunds = "InsufficientFunds",
  UnknownPlayer = "UnknownPlayer",
  InvalidChoice = "InvalidChoice",
  InvalidCommitment = "InvalidCommitment",
  TransferFailed = "TransferFailed",
  DistributeFailed = "DistributeFailed",
  InvalidSnapshot = "InvalidSnapshot",
  Unauthorized = "Unauthorized",
  InvalidArgument = "InvalidArgument",
}

/**
 * Every rejected operation throws one of these. A thrown RpsError means the
 * operation changed nothing.
 */
export class RpsError extends Error {
  readonly code: RpsErrorCode;

  constructor(code: RpsErrorCode, message: string, options?: { cause?: unknown }) {
    super(`${code}: ${message}`, options);
    this.name = "RpsError";
    this.code = code;
  }
}

/** Thrown by a host when it refuses a transfer batch. */
export class TransferRejectedError extends Error {
  readonly recipient: string;

  constructor(recipient: string, reason: string) {
    super(`Transfer to ${recipient} rejected: ${reason}`);
    this.name = "TransferRejectedError";
    this.recipient = recipient;
  }
}

export function isRpsError(err: unknown, code?: RpsErrorCode): err is RpsError {
  return err instanceof RpsError && (code === undefined || err.code === code);
}
