/**
 * Error types for repository migration.
 *
 * Configuration and input errors abort the batch before any job runs; the
 * other three are caught at the job boundary and recorded in the result.
 */

import { redactCredentials } from "./migration/remote-url.js";

export type MigrationErrorCode =
  | "CONFIGURATION"
  | "INPUT_READ"
  | "NEGOTIATION"
  | "NAME_CONFLICT_EXHAUSTED"
  | "FETCH"
  | "PUBLISH";

export class MigrationError extends Error {
  constructor(
    message: string,
    public readonly code: MigrationErrorCode,
    options?: { cause?: unknown }
  ) {
    super(redactCredentials(message), options);
    this.name = "MigrationError";
  }
}

export class ConfigurationError extends MigrationError {
  constructor(public readonly missing: string[], detail?: string) {
    super(
      detail ?? `Missing required environment variables: ${missing.join(", ")}`,
      "CONFIGURATION"
    );
    this.name = "ConfigurationError";
  }
}

export class InputReadError extends MigrationError {
  constructor(public readonly path: string, cause: unknown) {
    super(`Failed to read repository list from ${path}: ${errorMessage(cause)}`, "INPUT_READ", {
      cause,
    });
    this.name = "InputReadError";
  }
}

export class NegotiationError extends MigrationError {
  constructor(message: string, cause?: unknown, code: MigrationErrorCode = "NEGOTIATION") {
    super(message, code, { cause });
    this.name = "NegotiationError";
  }
}

export class NameConflictExhaustedError extends NegotiationError {
  constructor(
    public readonly desiredName: string,
    public readonly attempts: number
  ) {
    super(
      `No free repository name for '${desiredName}' after ${attempts} attempts`,
      undefined,
      "NAME_CONFLICT_EXHAUSTED"
    );
    this.name = "NameConflictExhaustedError";
  }
}

export class FetchError extends MigrationError {
  constructor(message: string, cause?: unknown) {
    super(message, "FETCH", { cause });
    this.name = "FetchError";
  }
}

export class PublishError extends MigrationError {
  constructor(message: string, cause?: unknown) {
    super(message, "PUBLISH", { cause });
    this.name = "PublishError";
  }
}

export function errorMessage(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return redactCredentials(message.trim());
}
