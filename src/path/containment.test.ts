import * as nodePath from "node:path";
import fc from "fast-check";
import { describe, expect, it } from "vitest";
import type { TenantRoot } from "../tenant/tenant-root.js";
import { resolveContainment } from "./containment.js";

const root: TenantRoot = Object.freeze({
  tenantId: "acme",
  realPath: nodePath.join(nodePath.sep, "tenants", "acme"),
});

function walk(...segments: string[]) {
  return resolveContainment(root, { segments });
}

describe("resolveContainment", () => {
  it("joins plain segments onto the root", () => {
    const result = walk("docs", "report.txt");
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.segments).toEqual(["docs", "report.txt"]);
    expect(result.value.candidate).toBe(
      nodePath.join(root.realPath, "docs", "report.txt"),
    );
    expect(result.value.root).toBe(root);
  });

  it("allows net-zero traversal within bounds", () => {
    const direct = walk("docs", "report.txt");
    const roundTrip = walk("docs", "..", "docs", "report.txt");
    expect(roundTrip).toEqual(direct);
  });

  it("resolves the empty path to the root itself", () => {
    const result = walk();
    expect(result.ok && result.value.candidate).toBe(root.realPath);
    expect(result.ok && result.value.segments).toEqual([]);
  });

  it("rejects .. at the root instead of clamping", () => {
    expect(walk("..")).toEqual({
      ok: false,
      error: { kind: "path_escape", stage: "containment" },
    });
  });

  it("rejects more .. segments than the accepted depth", () => {
    expect(walk("..", "..", "..", "etc", "passwd")).toEqual({
      ok: false,
      error: { kind: "path_escape", stage: "containment" },
    });
  });

  it("rejects when any prefix of the walk goes above the root", () => {
    // Ends at depth 1, but dips to -1 on the way
    expect(walk("a", "..", "..", "acme", "docs")).toEqual({
      ok: false,
      error: { kind: "path_escape", stage: "containment" },
    });
  });

  it("pops only what was pushed", () => {
    const result = walk("a", "b", "..", "..", "c");
    expect(result.ok && result.value.segments).toEqual(["c"]);
  });

  it("handles long inputs without recursion", () => {
    const segments = Array.from({ length: 2000 }, (_, i) =>
      i % 2 === 0 ? "d" : "..",
    );
    const result = walk(...segments);
    expect(result.ok && result.value.candidate).toBe(root.realPath);
  });

  it("fails exactly when the running depth goes negative", () => {
    fc.assert(
      fc.property(
        fc.array(fc.constantFrom("a", "b", ".."), { maxLength: 30 }),
        (segments) => {
          let depth = 0;
          let escapes = false;
          for (const segment of segments) {
            depth += segment === ".." ? -1 : 1;
            if (depth < 0) {
              escapes = true;
              break;
            }
          }

          const result = walk(...segments);
          expect(result.ok).toBe(!escapes);
          if (result.ok) {
            expect(result.value.segments).toHaveLength(depth);
            expect(result.value.segments).not.toContain("..");
            const { candidate } = result.value;
            expect(
              candidate === root.realPath ||
                candidate.startsWith(`${root.realPath}${nodePath.sep}`),
            ).toBe(true);
          }
        },
      ),
      { numRuns: 500 },
    );
  });
});
