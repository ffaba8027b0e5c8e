/**
 * OneDrive Error Types
 *
 * Error class hierarchy for session, connection and transfer failures.
 */

import type { ZodIssue } from "zod";

/**
 * Base OneDrive error class.
 */
export class OneDriveError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: { retryable?: boolean; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "OneDriveError";
    this.code = code;
    this.retryable = options?.retryable ?? false;
    Object.setPrototypeOf(this, OneDriveError.prototype);
  }
}

/**
 * Configuration error - missing or mistyped setting. Never retried.
 */
export class ConfigurationError extends OneDriveError {
  public readonly issues: readonly ZodIssue[];

  constructor(
    message: string,
    code: "MissingRequired" | "InvalidValue" | "InvalidFile" = "InvalidValue",
    options?: { issues?: readonly ZodIssue[]; cause?: unknown }
  ) {
    super(message, `Configuration.${code}`, { cause: options?.cause });
    this.name = "ConfigurationError";
    this.issues = options?.issues ?? [];
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Token exchange failure.
 */
export class AuthError extends OneDriveError {
  public readonly status?: number;

  constructor(
    message: string,
    code: "RefreshFailed" | "InvalidResponse" | "NetworkFailure",
    options?: { status?: number; cause?: unknown }
  ) {
    super(message, `Auth.${code}`, { cause: options?.cause });
    this.name = "AuthError";
    this.status = options?.status;
    Object.setPrototypeOf(this, AuthError.prototype);
  }
}

/**
 * The identity probe kept failing after every allowed attempt.
 */
export class ConnectionError extends OneDriveError {
  public readonly attempts: number;

  constructor(message: string, attempts: number) {
    super(message, "Connection.Unreachable");
    this.name = "ConnectionError";
    this.attempts = attempts;
    Object.setPrototypeOf(this, ConnectionError.prototype);
  }
}

/**
 * A single remote request failed.
 */
export class RemoteOperationError extends OneDriveError {
  public readonly status?: number;
  public readonly remoteCode?: string;

  constructor(
    message: string,
    code: "RemoteError" | "HttpStatus" | "Transport" | "NotFound" | "InvalidResponse",
    options?: { status?: number; remoteCode?: string; cause?: unknown }
  ) {
    super(message, `Remote.${code}`, {
      retryable: code === "Transport",
      cause: options?.cause,
    });
    this.name = "RemoteOperationError";
    this.status = options?.status;
    this.remoteCode = options?.remoteCode;
    Object.setPrototypeOf(this, RemoteOperationError.prototype);
  }
}

/**
 * Per-item failures of one batch, drained into a single error.
 */
export class AggregatedError extends OneDriveError {
  public readonly messages: readonly string[];

  constructor(message: string, messages: readonly string[]) {
    super(message, "Transfer.Aggregated");
    this.name = "AggregatedError";
    this.messages = messages;
    Object.setPrototypeOf(this, AggregatedError.prototype);
  }
}

/**
 * Network/transport error raised by the HTTP layer.
 */
export class NetworkError extends OneDriveError {
  constructor(
    message: string,
    code: "ConnectionFailed" | "Timeout" | "DnsResolutionFailed" | "TlsError",
    options?: { cause?: unknown }
  ) {
    super(message, `Network.${code}`, {
      retryable: code !== "TlsError",
      cause: options?.cause,
    });
    this.name = "NetworkError";
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

/**
 * Get a printable message for any thrown value.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
