/**
 * Confinement pipeline
 *
 *   raw string -> normalize -> resolveContainment -> verifyRealPath -> handle
 *
 * The first failing stage ends the pipeline. Nothing tries to repair an
 * unsafe path; the caller has to submit a new one.
 */

import type {
  ConfinementLogger,
  ConfinementViolation,
  ViolationCallback,
} from "./audit/types.js";
import { type ConfinementFailure, fail, type Result } from "./errors.js";
import type { TenantFileHandle } from "./handle.js";
import { resolveContainment } from "./path/containment.js";
import { normalize } from "./path/normalize.js";
import { type AccessIntent, verifyRealPath } from "./path/real-path.js";
import {
  type ConfinementPolicy,
  type ResolvedPolicy,
  resolvePolicy,
} from "./policy.js";
import type { TenantRootProvider } from "./tenant/provider.js";
import type { TenantRoot } from "./tenant/tenant-root.js";

export interface ConfineOptions {
  intent?: AccessIntent;
  policy?: ConfinementPolicy | ResolvedPolicy;
  logger?: ConfinementLogger;
  /** Receives escape and invalid-path attempts, including the raw path */
  onViolation?: ViolationCallback;
}

function report(
  failure: ConfinementFailure,
  tenantId: string,
  rawPath: string,
  options: ConfineOptions,
): void {
  options.logger?.info("confine rejected", { tenantId, kind: failure.kind });

  let violation: ConfinementViolation | null = null;
  if (failure.kind === "path_escape") {
    violation = {
      kind: "path_escape",
      timestamp: Date.now(),
      tenantId,
      rawPath,
      stage: failure.stage,
    };
  } else if (failure.kind === "invalid_path") {
    violation = {
      kind: "invalid_path",
      timestamp: Date.now(),
      tenantId,
      rawPath,
      reason: failure.reason,
    };
  }
  if (violation) {
    options.onViolation?.(violation);
  }
}

/**
 * Run the path pipeline against an already-provisioned root.
 */
export function confinePath(
  root: TenantRoot,
  rawPath: string,
  options: ConfineOptions = {},
): Result<TenantFileHandle> {
  const policy = resolvePolicy(options.policy);

  const normalized = normalize(rawPath, policy);
  if (!normalized.ok) {
    report(normalized.error, root.tenantId, rawPath, options);
    return normalized;
  }

  const confined = resolveContainment(root, normalized.value);
  if (!confined.ok) {
    report(confined.error, root.tenantId, rawPath, options);
    return confined;
  }

  const verified = verifyRealPath(root, confined.value, {
    intent: options.intent,
    symlinks: policy.symlinks,
    flavor: policy.flavor,
    maxSymlinkHops: policy.maxSymlinkHops,
  });
  if (!verified.ok) {
    report(verified.error, root.tenantId, rawPath, options);
    return verified;
  }

  options.logger?.debug("confine", {
    tenantId: root.tenantId,
    path: rawPath,
    intent: options.intent ?? "read",
    exists: verified.value.exists(),
  });
  return verified;
}

/**
 * Look up the tenant's root and run the path pipeline. An unknown tenant
 * fails before any path logic runs.
 */
export function confine(
  provider: TenantRootProvider,
  tenantId: string,
  rawPath: string,
  options: ConfineOptions = {},
): Result<TenantFileHandle> {
  const root = provider.getTenantRoot(tenantId);
  if (!root.ok) {
    options.logger?.info("confine rejected", {
      tenantId,
      kind: root.error.kind,
    });
    return fail(root.error);
  }
  return confinePath(root.value, rawPath, options);
}
