import { formatDuration } from "./utils/duration.js";

/**
 * Error codes surfaced to callers of the publication check.
 */
export type RegistryErrorCode =
  | "EIO" // transport or index refresh failure
  | "EPARSE" // undecodable or malformed index record
  | "ETIMEOUT" // lookup or polling bound exceeded
  | "EAUTH" // token rejected or not usable as a header value
  | "ECARGO"; // cargo could not be started

export interface RegistryErrorContext {
  readonly package?: string;
  readonly version?: string;
  readonly registry?: string;
  readonly durationMs?: number;
}

export interface RegistryErrorJSON {
  readonly name: string;
  readonly code: RegistryErrorCode;
  readonly message: string;
  readonly context?: RegistryErrorContext;
  readonly cause?: string;
}

/**
 * Base error class for registry observation failures.
 */
export class RegistryError extends Error {
  readonly code: RegistryErrorCode;
  readonly context?: RegistryErrorContext;

  constructor(code: RegistryErrorCode, message: string, context?: RegistryErrorContext, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "RegistryError";
    this.code = code;
    this.context = context;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): RegistryErrorJSON {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause === undefined ? undefined : getErrorMessage(this.cause)
    };
  }
}

export class RegistryIoError extends RegistryError {
  constructor(message: string, context?: RegistryErrorContext, cause?: unknown) {
    super("EIO", message, context, cause);
    this.name = "RegistryIoError";
  }
}

export class ParseError extends RegistryError {
  constructor(message: string, context?: RegistryErrorContext, cause?: unknown) {
    super("EPARSE", message, context, cause);
    this.name = "ParseError";
  }
}

/**
 * Raised when either the per-lookup bound or the total polling bound elapses.
 */
export class PublishTimeoutError extends RegistryError {
  readonly durationMs: number;

  constructor(message: string, packageName: string, version: string, durationMs: number) {
    super("ETIMEOUT", message, { package: packageName, version, durationMs });
    this.name = "PublishTimeoutError";
    this.durationMs = durationMs;
  }

  static lookup(packageName: string, version: string, durationMs: number): PublishTimeoutError {
    return new PublishTimeoutError(
      `timeout of ${formatDuration(durationMs)} elapsed while checking whether ${packageName} ${version} is published. ` +
        "You can increase this timeout with --lookup-timeout or the CPW_LOOKUP_TIMEOUT environment variable",
      packageName,
      version,
      durationMs
    );
  }

  static publish(packageName: string, version: string, durationMs: number): PublishTimeoutError {
    return new PublishTimeoutError(
      `timeout of ${formatDuration(durationMs)} elapsed while waiting for the package ${packageName} ${version} to be published. ` +
        "You can increase this timeout with --timeout or the CPW_PUBLISH_TIMEOUT environment variable",
      packageName,
      version,
      durationMs
    );
  }
}

export class AuthError extends RegistryError {
  constructor(message: string, context?: RegistryErrorContext, cause?: unknown) {
    super("EAUTH", message, context, cause);
    this.name = "AuthError";
  }
}

export class CargoCommandError extends RegistryError {
  constructor(message: string, cause?: unknown) {
    super("ECARGO", message, undefined, cause);
    this.name = "CargoCommandError";
  }
}

/**
 * Flat classification of a failed HTTP exchange, decided once by the transport.
 */
export type TransportFailureReason = "ConnectFailed" | "ProtocolRejected" | "Other";

export class TransportError extends Error {
  readonly reason: TransportFailureReason;
  readonly errorCode?: string;

  constructor(reason: TransportFailureReason, message: string, errorCode?: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "TransportError";
    this.reason = reason;
    this.errorCode = errorCode;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Extract error message from unknown error.
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
