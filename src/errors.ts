/**
 * Confinement failures
 *
 * Every stage of the pipeline reports failure through the closed
 * `ConfinementFailure` union so callers can switch on `kind` exhaustively.
 * `ConfinementError` wraps a failure for APIs that throw.
 */

/**
 * Why a raw path was rejected before any filesystem access.
 */
export type InvalidPathReason =
  | "null_byte"
  | "too_long"
  | "segment_too_long"
  | "invalid_encoding"
  | "drive_prefix"
  | "reserved_character";

/**
 * Stage of the pipeline that detected an escape.
 */
export type EscapeStage = "containment" | "real_path" | "open";

export interface InvalidPathFailure {
  kind: "invalid_path";
  reason: InvalidPathReason;
}

export interface PathEscapeFailure {
  kind: "path_escape";
  stage: EscapeStage;
}

export interface NotFoundFailure {
  kind: "not_found";
  /** errno code from the host (ENOENT, ENOTDIR, ELOOP, ...) */
  code?: string;
}

export interface UnknownTenantFailure {
  kind: "unknown_tenant";
}

export type ConfinementFailure =
  | InvalidPathFailure
  | PathEscapeFailure
  | NotFoundFailure
  | UnknownTenantFailure;

export type ConfinementFailureKind = ConfinementFailure["kind"];

export type Result<T, E = ConfinementFailure> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

const INVALID_PATH_MESSAGES: Record<InvalidPathReason, string> = {
  null_byte: "path contains null byte",
  too_long: "path is too long",
  segment_too_long: "path segment is too long",
  invalid_encoding: "path is not valid unicode",
  drive_prefix: "drive and UNC prefixes are not allowed",
  reserved_character: "path segment contains a reserved character",
};

/**
 * Caller-safe description of a failure. Escapes get a generic denial that
 * does not reveal where, or how far outside, the path would have landed.
 */
export function describeFailure(failure: ConfinementFailure): string {
  switch (failure.kind) {
    case "invalid_path":
      return `EINVAL: invalid path, ${INVALID_PATH_MESSAGES[failure.reason]}`;
    case "path_escape":
      return "EACCES: permission denied";
    case "not_found":
      return failure.code && failure.code !== "ENOENT"
        ? `ENOENT: no such file or directory (${failure.code})`
        : "ENOENT: no such file or directory";
    case "unknown_tenant":
      return "unknown tenant";
    default:
      return assertNever(failure);
  }
}

/**
 * Thrown by the convenience API when confinement fails.
 */
export class ConfinementError extends Error {
  constructor(public readonly failure: ConfinementFailure) {
    super(describeFailure(failure));
    this.name = "ConfinementError";
  }

  get kind(): ConfinementFailureKind {
    return this.failure.kind;
  }
}

export function isConfinementError(e: unknown): e is ConfinementError {
  return e instanceof ConfinementError;
}

/**
 * Unwrap a result, throwing `ConfinementError` on failure.
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new ConfinementError(result.error);
  }
  return result.value;
}

/**
 * Sanitize an error message to strip real OS filesystem paths and stack traces.
 *
 * - Replaces common OS path prefixes (/Users/, /home/, /private/, C:\, etc.)
 *   with `<path>`.
 * - Strips stack trace lines (`\n    at ...`).
 * - Keeps error codes (ENOENT, EACCES, etc.) and tenant-relative paths.
 */
export function sanitizeErrorMessage(message: string): string {
  if (!message) return message;

  let sanitized = message.replace(/\n\s+at\s.*/g, "");

  sanitized = sanitized.replace(
    /(?:\/(?:Users|home|private|var|opt|Library|System|usr|etc|tmp|nix|snap|srv|mnt|root))\b[^\s'",)}\]:]*/g,
    "<path>",
  );

  sanitized = sanitized.replace(/[A-Z]:\\[^\s'",)}\]:]+/g, "<path>");

  return sanitized;
}
