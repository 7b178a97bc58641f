/**
 * Containment resolution
 *
 * Walks normalized segments against a tenant root, resolving `..` on an
 * explicit stack. Ascending above the root fails with `path_escape`; the
 * walk never clamps to the root, so `../../x` cannot alias another
 * tenant's `x`.
 *
 * Purely syntactic: symlinks are invisible here and are handled by the
 * real-path stage.
 */

import * as nodePath from "node:path";
import {
  fail,
  ok,
  type PathEscapeFailure,
  type Result,
} from "../errors.js";
import type { TenantRoot } from "../tenant/tenant-root.js";
import type { NormalizedPath } from "./normalize.js";

/**
 * A path proven never to ascend above its root at any prefix of the walk.
 */
export interface ConfinedPath {
  readonly root: TenantRoot;
  /** Accepted segments, never containing "..". Empty for the root itself. */
  readonly segments: readonly string[];
  /** `root.realPath` joined with `segments` */
  readonly candidate: string;
}

export function resolveContainment(
  root: TenantRoot,
  path: NormalizedPath,
): Result<ConfinedPath, PathEscapeFailure> {
  const stack: string[] = [];
  const { segments } = path;

  for (let i = 0; i < segments.length; i++) {
    const segment = segments[i];
    if (segment === "..") {
      if (stack.length === 0) {
        return fail({ kind: "path_escape", stage: "containment" });
      }
      stack.pop();
    } else {
      stack.push(segment);
    }
  }

  return ok(
    Object.freeze({
      root,
      segments: Object.freeze(stack),
      candidate:
        stack.length === 0
          ? root.realPath
          : nodePath.join(root.realPath, ...stack),
    }),
  );
}
