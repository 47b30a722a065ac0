/**
 * Service error definitions with JSON serialization.
 *
 * Errors carry a severity:
 * - "fatal" errors abort a resolution and reach the host
 * - "advisory" errors are reported (logged, returned as values) but never thrown
 *   out of a resolution
 */

import type { FileSystemErrorCode } from "./platform/filesystem";

export type ErrorSeverity = "fatal" | "advisory";

/**
 * Stage of an installation at which a failure occurred.
 */
export type InstallStage = "create-directory" | "download" | "make-executable";

/**
 * Serialized error format, used by the command-line entry point.
 */
export interface SerializedError {
  readonly type: "unsupported-platform" | "install" | "local-state" | "filesystem" | "config";
  readonly severity: ErrorSeverity;
  readonly message: string;
  readonly code?: string;
  readonly path?: string;
  readonly url?: string;
}

/**
 * Base class for all service errors.
 */
export abstract class ServiceError extends Error {
  abstract readonly type: SerializedError["type"];
  abstract readonly severity: ErrorSeverity;
  readonly code: string | undefined;

  constructor(message: string, code?: string, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.code = code ?? undefined;
    // Fix prototype chain for instanceof to work
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): SerializedError {
    const result: SerializedError = {
      type: this.type,
      severity: this.severity,
      message: this.message,
    };
    if (this.code !== undefined) {
      return { ...result, code: this.code };
    }
    return result;
  }
}

/**
 * The host's OS/architecture pair has no prebuilt adapter.
 * The message tells the user how to proceed with a self-built binary.
 */
export class UnsupportedPlatformError extends ServiceError {
  readonly type = "unsupported-platform" as const;
  readonly severity = "fatal" as const;

  constructor(
    readonly os: string,
    readonly arch: string,
    artifactName: string,
    pathOverrideKey: string
  ) {
    super(
      `Unsupported platform (${os} / ${arch}). ` +
        `Build ${artifactName} from source and set ${pathOverrideKey}.`,
      "UNSUPPORTED_PLATFORM"
    );
    this.name = "UnsupportedPlatformError";
  }
}

/**
 * Installing the adapter failed. Carries the failing stage, the download URL
 * and the destination path; the underlying error is available as `cause`.
 */
export class InstallError extends ServiceError {
  readonly type = "install" as const;
  readonly severity = "fatal" as const;

  constructor(
    readonly stage: InstallStage,
    readonly url: string,
    readonly path: string,
    message: string,
    cause?: unknown
  ) {
    super(message, stage, { cause });
    this.name = "InstallError";
  }

  override toJSON(): SerializedError {
    return {
      ...super.toJSON(),
      path: this.path,
      url: this.url,
    };
  }
}

/**
 * A best-effort write of local state (version marker, cache) failed.
 * Returned as a value, never thrown.
 */
export class LocalStateWriteError extends ServiceError {
  readonly type = "local-state" as const;
  readonly severity = "advisory" as const;

  constructor(
    readonly path: string,
    message: string,
    cause?: unknown
  ) {
    super(message, "WRITE_FAILED", { cause });
    this.name = "LocalStateWriteError";
  }

  override toJSON(): SerializedError {
    return { ...super.toJSON(), path: this.path };
  }
}

/**
 * Provisioner configuration failed validation.
 */
export class ConfigError extends ServiceError {
  readonly type = "config" as const;
  readonly severity = "fatal" as const;

  constructor(
    message: string,
    readonly issues: readonly string[] = []
  ) {
    super(message, "INVALID_CONFIG");
    this.name = "ConfigError";
  }
}

/**
 * Error from filesystem operations.
 */
export class FileSystemError extends ServiceError {
  readonly type = "filesystem" as const;
  readonly severity = "fatal" as const;

  constructor(
    /** Mapped error code */
    readonly fsCode: FileSystemErrorCode,
    /** Path that caused the error */
    readonly path: string,
    message: string,
    cause?: Error,
    /** Original Node.js error code (e.g., "EMFILE", "ENOSPC") */
    readonly originalCode?: string
  ) {
    super(message, fsCode, { cause });
    this.name = "FileSystemError";
  }

  override toJSON(): SerializedError {
    return {
      type: this.type,
      severity: this.severity,
      message: this.message,
      path: this.path,
      code: this.fsCode,
    };
  }
}

/**
 * Type guard to check if an error is a ServiceError.
 */
export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError;
}

export { getErrorMessage } from "../shared/error-utils";
