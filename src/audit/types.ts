/**
 * Audit types for rejected confinement attempts.
 *
 * Audit records are internal: they may carry the raw path a client sent,
 * which caller-facing errors never do.
 */

import type { EscapeStage, InvalidPathReason } from "../errors.js";

export type ConfinementViolation =
  | {
      kind: "path_escape";
      /** Timestamp in milliseconds since epoch */
      timestamp: number;
      tenantId: string;
      /** Raw path exactly as the client supplied it */
      rawPath: string;
      stage: EscapeStage;
    }
  | {
      kind: "invalid_path";
      timestamp: number;
      tenantId: string;
      rawPath: string;
      reason: InvalidPathReason;
    };

export type ConfinementViolationKind = ConfinementViolation["kind"];

export type ViolationCallback = (violation: ConfinementViolation) => void;

/**
 * Logger interface for confinement tracing.
 */
export interface ConfinementLogger {
  /** Log informational messages (rejections) */
  info(message: string, data?: Record<string, unknown>): void;
  /** Log debug messages (successful resolutions) */
  debug(message: string, data?: Record<string, unknown>): void;
}
