/**
 * Confinement Policy Configuration
 *
 * Centralized configuration for the limits and host-family switches used by
 * the path pipeline. Every field is optional; undefined values use defaults.
 */

import { z } from "zod";
import type { PathFlavorName } from "./path/normalize.js";

export type SymlinkPolicy = "follow" | "reject";

export interface ConfinementPolicy {
  /** Maximum raw path length in UTF-8 bytes (default: 4096) */
  maxPathBytes?: number;

  /** Maximum length of a single segment in UTF-8 bytes (default: 255) */
  maxSegmentBytes?: number;

  /**
   * Path syntax and comparison rules of the host family (default: "posix").
   * "win32" also splits on backslashes, rejects drive/UNC prefixes and
   * compares real paths case-insensitively.
   */
  flavor?: PathFlavorName;

  /**
   * "follow" (default) resolves symlinks and accepts them when their target
   * stays inside the tenant root. "reject" refuses any path that traverses
   * a symlink below the root.
   */
  symlinks?: SymlinkPolicy;

  /** Maximum dangling-symlink hops followed for write targets (default: 40) */
  maxSymlinkHops?: number;
}

export type ResolvedPolicy = Readonly<Required<ConfinementPolicy>>;

const DEFAULT_POLICY: ResolvedPolicy = Object.freeze({
  maxPathBytes: 4096,
  maxSegmentBytes: 255,
  flavor: "posix",
  symlinks: "follow",
  maxSymlinkHops: 40,
});

/**
 * Resolve a policy by merging user-provided settings with defaults.
 */
export function resolvePolicy(userPolicy?: ConfinementPolicy): ResolvedPolicy {
  if (!userPolicy) {
    return DEFAULT_POLICY;
  }
  return Object.freeze({
    maxPathBytes: userPolicy.maxPathBytes ?? DEFAULT_POLICY.maxPathBytes,
    maxSegmentBytes:
      userPolicy.maxSegmentBytes ?? DEFAULT_POLICY.maxSegmentBytes,
    flavor: userPolicy.flavor ?? DEFAULT_POLICY.flavor,
    symlinks: userPolicy.symlinks ?? DEFAULT_POLICY.symlinks,
    maxSymlinkHops: userPolicy.maxSymlinkHops ?? DEFAULT_POLICY.maxSymlinkHops,
  });
}

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  TENANT_VFS_MAX_PATH_BYTES: positiveInt.optional(),
  TENANT_VFS_MAX_SEGMENT_BYTES: positiveInt.optional(),
  TENANT_VFS_PATH_FLAVOR: z.enum(["posix", "win32"]).optional(),
  TENANT_VFS_SYMLINKS: z.enum(["follow", "reject"]).optional(),
  TENANT_VFS_MAX_SYMLINK_HOPS: positiveInt.optional(),
});

/**
 * Read policy overrides from environment variables.
 * Throws naming the offending variable when a value is malformed.
 */
export function policyFromEnv(
  env: Record<string, string | undefined> = process.env,
): ResolvedPolicy {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join(".") ?? "environment";
    throw new Error(
      `Invalid confinement policy: ${variable}: ${issue?.message ?? "invalid value"}`,
    );
  }
  const vars = parsed.data;
  return resolvePolicy({
    maxPathBytes: vars.TENANT_VFS_MAX_PATH_BYTES,
    maxSegmentBytes: vars.TENANT_VFS_MAX_SEGMENT_BYTES,
    flavor: vars.TENANT_VFS_PATH_FLAVOR,
    symlinks: vars.TENANT_VFS_SYMLINKS,
    maxSymlinkHops: vars.TENANT_VFS_MAX_SYMLINK_HOPS,
  });
}
