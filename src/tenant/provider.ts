/**
 * Tenant root providers
 *
 * The confinement pipeline never builds a TenantRoot from request input;
 * it asks an injected provider. Providers hand out frozen value objects and
 * keep no cache that a request could mutate.
 */

import * as fs from "node:fs";
import * as nodePath from "node:path";
import { z } from "zod";
import {
  fail,
  ok,
  type Result,
  type UnknownTenantFailure,
} from "../errors.js";
import { isPathWithinRoot } from "../path/real-path.js";
import {
  createTenantRoot,
  isValidTenantId,
  type TenantRoot,
  tenantIdSchema,
} from "./tenant-root.js";

export interface TenantRootProvider {
  getTenantRoot(tenantId: string): Result<TenantRoot, UnknownTenantFailure>;
}

const UNKNOWN_TENANT: UnknownTenantFailure = Object.freeze({
  kind: "unknown_tenant",
});

/**
 * Fixed set of tenants, built once at startup.
 */
export class StaticTenantRootProvider implements TenantRootProvider {
  private readonly roots: ReadonlyMap<string, TenantRoot>;

  constructor(roots: Iterable<TenantRoot>) {
    const byId = new Map<string, TenantRoot>();
    for (const root of roots) {
      if (byId.has(root.tenantId)) {
        throw new Error(`Duplicate tenant id '${root.tenantId}'`);
      }
      byId.set(root.tenantId, Object.freeze({ ...root }));
    }
    this.roots = byId;
  }

  /**
   * Create a provider from a `{ tenantId: directory }` map.
   */
  static fromDirectories(
    directories: Record<string, string>,
  ): StaticTenantRootProvider {
    return new StaticTenantRootProvider(
      Object.entries(directories).map(([tenantId, dir]) =>
        createTenantRoot(tenantId, dir),
      ),
    );
  }

  getTenantRoot(tenantId: string): Result<TenantRoot, UnknownTenantFailure> {
    const root = this.roots.get(tenantId);
    return root ? ok(root) : fail(UNKNOWN_TENANT);
  }

  tenantIds(): string[] {
    return Array.from(this.roots.keys()).sort();
  }
}

/**
 * One subdirectory per tenant under a shared base directory:
 * `<base>/<tenantId>`. A tenant is known when its directory exists.
 */
export class DirectoryTenantRootProvider implements TenantRootProvider {
  private readonly baseRealPath: string;

  constructor(baseDir: string) {
    const absolute = nodePath.resolve(baseDir);
    if (!fs.existsSync(absolute) || !fs.statSync(absolute).isDirectory()) {
      throw new Error("Tenant base directory does not exist");
    }
    this.baseRealPath = fs.realpathSync(absolute);
  }

  getTenantRoot(tenantId: string): Result<TenantRoot, UnknownTenantFailure> {
    if (!isValidTenantId(tenantId)) {
      return fail(UNKNOWN_TENANT);
    }
    let root: TenantRoot;
    try {
      root = createTenantRoot(
        tenantId,
        nodePath.join(this.baseRealPath, tenantId),
      );
    } catch {
      return fail(UNKNOWN_TENANT);
    }
    // A tenant directory that is itself a symlink out of the base is not
    // a provisioned tenant.
    if (
      root.realPath === this.baseRealPath ||
      !isPathWithinRoot(root.realPath, this.baseRealPath)
    ) {
      return fail(UNKNOWN_TENANT);
    }
    return ok(root);
  }
}

const manifestSchema = z.object({
  tenants: z.record(tenantIdSchema, z.string().min(1)),
});

export type TenantManifest = z.infer<typeof manifestSchema>;

/**
 * Parse and validate a tenant manifest object.
 */
export function parseTenantManifest(input: unknown): TenantManifest {
  const parsed = manifestSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(
      `Invalid tenant manifest: ${issue?.path.join(".") || "<root>"}: ${issue?.message ?? "invalid"}`,
    );
  }
  return parsed.data;
}

/**
 * Load `{ "tenants": { "<id>": "<dir>" } }` from a JSON file. Relative
 * directories resolve against the manifest's own directory.
 */
export function loadTenantManifest(file: string): StaticTenantRootProvider {
  const raw: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
  const manifest = parseTenantManifest(raw);
  const baseDir = nodePath.dirname(nodePath.resolve(file));
  const directories: Record<string, string> = {};
  for (const [tenantId, dir] of Object.entries(manifest.tenants)) {
    directories[tenantId] = nodePath.resolve(baseDir, dir);
  }
  return StaticTenantRootProvider.fromDirectories(directories);
}
