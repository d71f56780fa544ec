// Copyright (c) 2025 [Your Name]
// SPDX-License-Identifier: MIT

/**
 * Error taxonomy for the evidence pipeline.
 *
 * Every stage throws a ForensicError subclass. The orchestrator reads `kind`
 * to build the failure descriptor and `retryable` to decide on a retry.
 */

export type ErrorKind =
  | "IOError"
  | "TruncatedReadError"
  | "UnsupportedFormatError"
  | "ProbeUnavailableError"
  | "DecodeError"
  | "PartialExtractionError"
  | "UnsupportedImageError"
  | "TimeoutError"
  | "CancelledError"
  | "IntegrityError"
  | "ConfigError";

export abstract class ForensicError extends Error {
  abstract readonly kind: ErrorKind;
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class IOError extends ForensicError {
  readonly kind = "IOError";
}

export class TruncatedReadError extends ForensicError {
  readonly kind = "TruncatedReadError";

  constructor(
    readonly expectedBytes: number,
    readonly observedBytes: number
  ) {
    super(`Read ${observedBytes} bytes, expected ${expectedBytes} (file changed during hashing?)`);
  }
}

export class UnsupportedFormatError extends ForensicError {
  readonly kind = "UnsupportedFormatError";
}

export class ProbeUnavailableError extends ForensicError {
  readonly kind = "ProbeUnavailableError";
  override readonly retryable = true;
}

export class DecodeError extends ForensicError {
  readonly kind = "DecodeError";
}

export class PartialExtractionError extends ForensicError {
  readonly kind = "PartialExtractionError";

  constructor(
    readonly framesExtracted: number,
    options?: { cause?: unknown }
  ) {
    super(`Decoding stopped after ${framesExtracted} frame(s)`, options);
  }
}

export class UnsupportedImageError extends ForensicError {
  readonly kind = "UnsupportedImageError";
}

export class TimeoutError extends ForensicError {
  readonly kind = "TimeoutError";
  override readonly retryable = true;

  constructor(
    readonly operation: string,
    readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
  }
}

export class CancelledError extends ForensicError {
  readonly kind = "CancelledError";
}

export class IntegrityError extends ForensicError {
  readonly kind = "IntegrityError";
}

export class ConfigError extends ForensicError {
  readonly kind = "ConfigError";
}

export function isForensicError(err: unknown): err is ForensicError {
  return err instanceof ForensicError;
}

/**
 * Normalise anything thrown by a stage. Foreign errors become IOError with the
 * original kept as `cause`.
 */
export function toForensicError(err: unknown): ForensicError {
  if (isForensicError(err)) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new IOError(message, { cause: err });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** `code` of a Node system error ("ENOENT", ...), else the message. */
export function describeSystemError(err: unknown): string {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return errorMessage(err);
}
