/**
 * Path normalization
 *
 * Turns an untrusted tenant-relative string into an ordered list of
 * segments. Pure function, no I/O. `..` segments are kept: resolving them
 * against a boundary is the containment stage's job.
 *
 * All host-family differences (separators, drive prefixes, case rules) live
 * in the `PathFlavor` table below. No other stage branches on platform.
 */

import { Buffer } from "node:buffer";
import {
  fail,
  type InvalidPathFailure,
  type InvalidPathReason,
  ok,
  type Result,
} from "../errors.js";

export type PathFlavorName = "posix" | "win32";

export interface PathFlavor {
  readonly name: PathFlavorName;
  /** Characters accepted as segment separators in raw input */
  readonly separators: RegExp;
  /** Rejects prefixes that would re-anchor the path elsewhere */
  checkPrefix(raw: string): InvalidPathReason | null;
  /** Rejects segments the host would reinterpret */
  checkSegment(segment: string): InvalidPathReason | null;
  /** Key used when comparing real paths for containment */
  comparisonKey(realPath: string): string;
}

const POSIX: PathFlavor = {
  name: "posix",
  separators: /\//,
  checkPrefix: () => null,
  checkSegment: () => null,
  comparisonKey: (realPath) => realPath,
};

// Win32 silently strips trailing dots and spaces from names, so "..." or
// ".. " may reach the filesystem as "..".
const WIN32: PathFlavor = {
  name: "win32",
  separators: /[\\/]/,
  checkPrefix(raw) {
    if (/^[A-Za-z]:/.test(raw)) return "drive_prefix";
    if (/^[\\/]{2}/.test(raw)) return "drive_prefix";
    return null;
  },
  checkSegment(segment) {
    if (segment.includes(":")) return "reserved_character";
    if (segment !== ".." && /[. ]$/.test(segment)) {
      return "reserved_character";
    }
    return null;
  },
  comparisonKey: (realPath) => realPath.toLowerCase(),
};

const FLAVORS: Record<PathFlavorName, PathFlavor> = {
  posix: POSIX,
  win32: WIN32,
};

export function getPathFlavor(name: PathFlavorName): PathFlavor {
  return FLAVORS[name];
}

/**
 * Segments of a normalized path. Never contains "" or "."; may contain "..".
 */
export interface NormalizedPath {
  readonly segments: readonly string[];
}

export interface NormalizeOptions {
  maxPathBytes?: number;
  maxSegmentBytes?: number;
  flavor?: PathFlavorName;
}

const LONE_SURROGATE =
  /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

function invalid(reason: InvalidPathReason): {
  ok: false;
  error: InvalidPathFailure;
} {
  return fail({ kind: "invalid_path", reason });
}

export function normalize(
  raw: string,
  options: NormalizeOptions = {},
): Result<NormalizedPath, InvalidPathFailure> {
  const maxPathBytes = options.maxPathBytes ?? 4096;
  const maxSegmentBytes = options.maxSegmentBytes ?? 255;
  const flavor = getPathFlavor(options.flavor ?? "posix");

  if (raw.includes("\0")) return invalid("null_byte");
  if (Buffer.byteLength(raw, "utf8") > maxPathBytes) {
    return invalid("too_long");
  }
  if (LONE_SURROGATE.test(raw)) return invalid("invalid_encoding");

  const prefixProblem = flavor.checkPrefix(raw);
  if (prefixProblem) return invalid(prefixProblem);

  const segments: string[] = [];
  for (const segment of raw.split(flavor.separators)) {
    if (segment === "" || segment === ".") continue;
    if (Buffer.byteLength(segment, "utf8") > maxSegmentBytes) {
      return invalid("segment_too_long");
    }
    const segmentProblem = flavor.checkSegment(segment);
    if (segmentProblem) return invalid(segmentProblem);
    segments.push(segment);
  }

  return ok(Object.freeze({ segments: Object.freeze(segments) }));
}

/**
 * Join normalized segments back into a `/`-separated relative path.
 * The root itself formats as "".
 */
export function formatNormalizedPath(path: NormalizedPath): string {
  return path.segments.join("/");
}
