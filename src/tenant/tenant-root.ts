import * as fs from "node:fs";
import * as nodePath from "node:path";
import { z } from "zod";

/**
 * One tenant's storage boundary. `realPath` is absolute, canonical
 * (symlink-resolved) and never changes once the root is created.
 */
export interface TenantRoot {
  readonly tenantId: string;
  readonly realPath: string;
}

export const tenantIdSchema = z
  .string()
  .regex(
    /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/,
    "tenant id must be 1-128 characters of [A-Za-z0-9._-]",
  )
  .refine((id) => id !== "." && id !== "..", "tenant id must not be a dot path");

export function isValidTenantId(tenantId: string): boolean {
  return tenantIdSchema.safeParse(tenantId).success;
}

/**
 * Validate that a root directory exists and is actually a directory.
 * Does NOT include the real path in the error message.
 */
export function validateRootDirectory(root: string, tenantId: string): void {
  if (!fs.existsSync(root)) {
    throw new Error(`Tenant root for '${tenantId}' does not exist`);
  }
  const stat = fs.statSync(root);
  if (!stat.isDirectory()) {
    throw new Error(`Tenant root for '${tenantId}' is not a directory`);
  }
}

/**
 * Build an immutable TenantRoot from a provisioned directory.
 * Resolves symlinks in the directory itself (e.g. /var -> /private/var on
 * macOS) so all later comparisons run against the canonical location.
 */
export function createTenantRoot(tenantId: string, dir: string): TenantRoot {
  const parsed = tenantIdSchema.safeParse(tenantId);
  if (!parsed.success) {
    throw new Error(
      `Invalid tenant id: ${parsed.error.issues[0]?.message ?? "rejected"}`,
    );
  }
  const absolute = nodePath.resolve(dir);
  validateRootDirectory(absolute, tenantId);
  return Object.freeze({
    tenantId,
    realPath: fs.realpathSync(absolute),
  });
}
