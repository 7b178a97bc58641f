/**
 * Real-path verification
 *
 * Resolves a confined candidate through the host filesystem and proves the
 * result still lies inside the tenant root's real path. This is the stage
 * that catches symlinks inside a tenant tree pointing at /etc or at a
 * sibling tenant.
 *
 * Only metadata calls are made here (realpath, lstat, readlink); file
 * content is never opened.
 */

import * as fs from "node:fs";
import * as nodePath from "node:path";
import {
  fail,
  type NotFoundFailure,
  ok,
  type PathEscapeFailure,
  type Result,
} from "../errors.js";
import { mintHandle, type TenantFileHandle } from "../handle.js";
import type { SymlinkPolicy } from "../policy.js";
import type { TenantRoot } from "../tenant/tenant-root.js";
import type { ConfinedPath } from "./containment.js";
import {
  getPathFlavor,
  type PathFlavor,
  type PathFlavorName,
} from "./normalize.js";

export type AccessIntent = "read" | "write";

export interface VerifyOptions {
  /**
   * "read" (default) requires the final path to exist. "write" accepts
   * missing trailing components as long as their deepest existing
   * ancestor is inside the root.
   */
  intent?: AccessIntent;
  symlinks?: SymlinkPolicy;
  flavor?: PathFlavorName;
  maxSymlinkHops?: number;
}

type VerifyFailure = PathEscapeFailure | NotFoundFailure;

const ESCAPE: PathEscapeFailure = Object.freeze({
  kind: "path_escape",
  stage: "real_path",
});

export function errnoCode(e: unknown): string | undefined {
  return e instanceof Error && "code" in e && typeof e.code === "string"
    ? e.code
    : undefined;
}

/**
 * Check whether `resolved` is equal to, or a child of, `canonicalRoot`.
 * Uses a boundary-safe prefix check (appends the separator) so that
 * `/data` does not match `/datastore`.
 */
export function isPathWithinRoot(
  resolved: string,
  canonicalRoot: string,
  flavor: PathFlavor = getPathFlavor("posix"),
): boolean {
  const path = flavor.comparisonKey(resolved);
  const root = flavor.comparisonKey(canonicalRoot);
  if (path === root) return true;
  const prefix = root.endsWith(nodePath.sep) ? root : `${root}${nodePath.sep}`;
  return path.startsWith(prefix);
}

interface Canonical {
  realPath: string;
  exists: boolean;
}

interface CanonicalizeContext {
  root: TenantRoot;
  flavor: PathFlavor;
  symlinks: SymlinkPolicy;
}

/**
 * Resolve `target` to its canonical form. When it does not exist, walk up
 * to the nearest existing ancestor, validate that, and re-append the
 * missing components. A dangling symlink at the first missing component is
 * followed (or rejected) explicitly, since writing through it would create
 * its target.
 */
function canonicalize(
  target: string,
  ctx: CanonicalizeContext,
  hopsLeft: number,
): Result<Canonical, VerifyFailure> {
  const missing: string[] = [];
  let current = target;
  let existing: string;

  for (;;) {
    try {
      existing = fs.realpathSync(current);
      break;
    } catch (e) {
      const code = errnoCode(e);
      if (code !== "ENOENT") {
        return classifyResolveError(current, code ?? "EIO", ctx);
      }
      const parent = nodePath.dirname(current);
      if (parent === current || current === ctx.root.realPath) {
        return fail({ kind: "not_found", code: "ENOENT" });
      }
      missing.unshift(nodePath.basename(current));
      current = parent;
    }
  }

  if (!isPathWithinRoot(existing, ctx.root.realPath, ctx.flavor)) {
    return fail(ESCAPE);
  }
  if (missing.length === 0) {
    return ok({ realPath: existing, exists: true });
  }

  const firstMissing = nodePath.join(existing, missing[0]);
  let stat: fs.Stats;
  try {
    stat = fs.lstatSync(firstMissing);
  } catch (e) {
    const code = errnoCode(e);
    if (code === "ENOENT") {
      return ok({
        realPath: nodePath.join(existing, ...missing),
        exists: false,
      });
    }
    return fail({ kind: "not_found", code: code ?? "EIO" });
  }

  if (!stat.isSymbolicLink()) {
    // Appeared between realpath and lstat; treat as a lost race.
    return fail({ kind: "not_found", code: "EAGAIN" });
  }
  if (ctx.symlinks === "reject") {
    return fail(ESCAPE);
  }
  if (hopsLeft <= 0) {
    return fail({ kind: "not_found", code: "ELOOP" });
  }

  let linkTarget: string;
  try {
    linkTarget = fs.readlinkSync(firstMissing);
  } catch (e) {
    return fail({ kind: "not_found", code: errnoCode(e) ?? "EIO" });
  }
  const resolvedTarget = nodePath.resolve(existing, linkTarget);
  if (!isPathWithinRoot(resolvedTarget, ctx.root.realPath, ctx.flavor)) {
    return fail(ESCAPE);
  }
  return canonicalize(
    nodePath.join(resolvedTarget, ...missing.slice(1)),
    ctx,
    hopsLeft - 1,
  );
}

function realpathOrNull(target: string): string | null {
  try {
    return fs.realpathSync(target);
  } catch {
    return null;
  }
}

function linkTargetOrNull(target: string): string | null {
  try {
    return fs.lstatSync(target).isSymbolicLink()
      ? fs.readlinkSync(target)
      : null;
  } catch {
    return null;
  }
}

/**
 * A path that fails to resolve for a reason other than ENOENT (EACCES,
 * ENOTDIR, ELOOP) is still an escape when the deepest resolvable ancestor,
 * or the symlink directly below it, points outside the root.
 */
function classifyResolveError(
  target: string,
  code: string,
  ctx: CanonicalizeContext,
): Result<never, VerifyFailure> {
  let child = target;
  let ancestor = nodePath.dirname(target);
  let ancestorReal = realpathOrNull(ancestor);
  while (ancestorReal === null) {
    const parent = nodePath.dirname(ancestor);
    if (parent === ancestor) {
      return fail({ kind: "not_found", code });
    }
    child = ancestor;
    ancestor = parent;
    ancestorReal = realpathOrNull(ancestor);
  }

  if (!isPathWithinRoot(ancestorReal, ctx.root.realPath, ctx.flavor)) {
    return fail(ESCAPE);
  }
  const link = linkTargetOrNull(child);
  if (
    link !== null &&
    !isPathWithinRoot(
      nodePath.resolve(ancestorReal, link),
      ctx.root.realPath,
      ctx.flavor,
    )
  ) {
    return fail(ESCAPE);
  }
  return fail({ kind: "not_found", code });
}

export function verifyRealPath(
  root: TenantRoot,
  candidate: ConfinedPath,
  options: VerifyOptions = {},
): Result<TenantFileHandle, VerifyFailure> {
  const ctx: CanonicalizeContext = {
    root,
    flavor: getPathFlavor(options.flavor ?? "posix"),
    symlinks: options.symlinks ?? "follow",
  };

  if (candidate.root.realPath !== root.realPath) {
    return fail(ESCAPE);
  }

  const resolved = canonicalize(
    candidate.candidate,
    ctx,
    options.maxSymlinkHops ?? 40,
  );
  if (!resolved.ok) {
    return resolved;
  }
  const { realPath, exists } = resolved.value;

  // Any difference between the lexical candidate and the canonical result
  // means a symlink was traversed somewhere below the root.
  if (
    ctx.symlinks === "reject" &&
    ctx.flavor.comparisonKey(realPath) !==
      ctx.flavor.comparisonKey(candidate.candidate)
  ) {
    return fail(ESCAPE);
  }

  if (!exists && (options.intent ?? "read") === "read") {
    return fail({ kind: "not_found", code: "ENOENT" });
  }

  return ok(
    mintHandle({
      root,
      realPath,
      segments: candidate.segments,
      exists,
    }),
  );
}
