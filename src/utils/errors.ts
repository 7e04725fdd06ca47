/**
 * Error taxonomy for the retagging pipeline.
 *
 * Only ConfigError is fatal; every other kind is contained to the file that
 * raised it and surfaces in its Proposal issues or ApplyResult.
 */

import type { ApplyError, ApplyStage } from "../apply/types.js";

export type ErrorKind =
  | "SourceUnavailable"
  | "LowConfidence"
  | "NormalizationSchemaViolation"
  | "DuplicateAtDestination"
  | "FilesystemError"
  | "ConfigError";

export class RetagError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = kind;
  }
}

/** Malformed configuration or naming rules. Halts the run before any file. */
export class ConfigError extends RetagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ConfigError", message, options);
  }
}

/** One evidence source failed; the collector degrades to zero candidates from it. */
export class SourceUnavailableError extends RetagError {
  constructor(
    public readonly source: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super("SourceUnavailable", `${source}: ${message}`, options);
  }
}

/** The normalization collaborator returned output that failed validation. */
export class NormalizationSchemaViolation extends RetagError {
  constructor(public readonly violations: string[]) {
    super(
      "NormalizationSchemaViolation",
      `Normalizer output rejected: ${violations.join("; ")}`
    );
  }
}

/** Raised when a network call or collaborator exceeds its time budget. */
export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = "TimeoutError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Extract the errno code (EACCES, ENOENT, ENOSPC, ...) if the error carries one. */
export function errorCode(e: unknown): string | undefined {
  if (e instanceof Error && "code" in e) {
    return typeof e.code === "string" ? e.code : undefined;
  }
  return undefined;
}

/** Wrap a failure at one Apply Gate stage, keeping the errno code when present. */
export function toApplyError(stage: ApplyStage, e: unknown): ApplyError {
  return {
    stage,
    code: errorCode(e) ?? (e instanceof RetagError ? e.kind : "Error"),
    message: errorMessage(e),
  };
}
