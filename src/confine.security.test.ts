/**
 * Security tests for the confinement pipeline
 *
 * Every path below is hostile. None may produce a handle outside the
 * tenant root, whatever the filesystem layout underneath looks like.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import fc from "fast-check";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { confine } from "./confine.js";
import type { ConfinementFailure } from "./errors.js";
import { isPathWithinRoot } from "./path/real-path.js";
import { StaticTenantRootProvider } from "./tenant/provider.js";

const CONTAINMENT_ESCAPE: ConfinementFailure = {
  kind: "path_escape",
  stage: "containment",
};
const REAL_PATH_ESCAPE: ConfinementFailure = {
  kind: "path_escape",
  stage: "real_path",
};
const MISSING: ConfinementFailure = { kind: "not_found", code: "ENOENT" };

const ATTACKS: Array<[name: string, raw: string, expected: ConfinementFailure]> =
  [
    ["parent of root", "..", CONTAINMENT_ESCAPE],
    ["classic traversal", "../../../../etc/passwd", CONTAINMENT_ESCAPE],
    ["traversal into a sibling", "../globex/file.txt", CONTAINMENT_ESCAPE],
    ["traversal after descent", "docs/../../x", CONTAINMENT_ESCAPE],
    ["dot padding", "docs/./.././../x", CONTAINMENT_ESCAPE],
    ["deep traversal", `${"../".repeat(1000)}etc`, CONTAINMENT_ESCAPE],
    ["symlink to outside", "link-out/secret.txt", REAL_PATH_ESCAPE],
    ["symlink itself", "link-out", REAL_PATH_ESCAPE],
    ["symlink to sibling", "link-sibling/file.txt", REAL_PATH_ESCAPE],
    ["null byte", "docs\0/../../etc", { kind: "invalid_path", reason: "null_byte" }],
    ["oversized", "a/".repeat(3000), { kind: "invalid_path", reason: "too_long" }],
    ["absolute path", "/etc/passwd", MISSING],
    ["encoded traversal", "..%2f..%2fetc%2fpasswd", MISSING],
    ["double-encoded traversal", "%252e%252e/etc", MISSING],
    ["four dots", "..../etc", MISSING],
    ["backslash traversal", "..\\..\\etc", MISSING],
    ["unicode two-dot leader", "‥/etc", MISSING],
    ["fullwidth solidus", "..／..／etc", MISSING],
  ];

describe("confinement security", () => {
  let baseDir: string;
  let tenantDir: string;
  let outsideDir: string;
  let provider: StaticTenantRootProvider;

  beforeEach(() => {
    baseDir = fs.realpathSync(
      fs.mkdtempSync(path.join(os.tmpdir(), "tenant-vfs-attack-")),
    );
    tenantDir = path.join(baseDir, "acme");
    outsideDir = path.join(baseDir, "outside");
    const siblingDir = path.join(baseDir, "globex");

    fs.mkdirSync(path.join(tenantDir, "docs", "sub"), { recursive: true });
    fs.writeFileSync(path.join(tenantDir, "docs", "report.txt"), "q3");
    fs.mkdirSync(outsideDir);
    fs.writeFileSync(path.join(outsideDir, "secret.txt"), "TOP SECRET");
    fs.mkdirSync(siblingDir);
    fs.writeFileSync(path.join(siblingDir, "file.txt"), "globex");

    fs.symlinkSync(outsideDir, path.join(tenantDir, "link-out"));
    fs.symlinkSync(siblingDir, path.join(tenantDir, "link-sibling"));
    fs.symlinkSync("docs", path.join(tenantDir, "link-in"));
    fs.symlinkSync(
      path.join(outsideDir, "planted"),
      path.join(tenantDir, "dangling-out"),
    );

    provider = StaticTenantRootProvider.fromDirectories({
      acme: tenantDir,
      globex: siblingDir,
    });
  });

  afterEach(() => {
    fs.rmSync(baseDir, { recursive: true, force: true });
  });

  describe("known attack paths", () => {
    for (const [name, raw, expected] of ATTACKS) {
      it(`should reject ${name}`, () => {
        expect(confine(provider, "acme", raw)).toEqual({
          ok: false,
          error: expected,
        });
      });
    }

    it("should reject writes through a dangling link to outside", () => {
      expect(
        confine(provider, "acme", "dangling-out", { intent: "write" }),
      ).toEqual({ ok: false, error: REAL_PATH_ESCAPE });
      expect(
        confine(provider, "acme", "dangling-out/x.txt", { intent: "write" }),
      ).toEqual({ ok: false, error: REAL_PATH_ESCAPE });
    });

    it("should reject writes below a link to outside", () => {
      expect(
        confine(provider, "acme", "link-out/new.txt", { intent: "write" }),
      ).toEqual({ ok: false, error: REAL_PATH_ESCAPE });
    });
  });

  describe("invariants", () => {
    const segment = fc.constantFrom(
      "",
      ".",
      "..",
      "docs",
      "sub",
      "report.txt",
      "link-out",
      "link-in",
      "link-sibling",
      "dangling-out",
      "new",
    );
    const rawPath = fc
      .tuple(fc.boolean(), fc.array(segment, { maxLength: 12 }))
      .map(([absolute, parts]) => (absolute ? "/" : "") + parts.join("/"));

    it("should never return a handle outside the tenant root", () => {
      const acme = provider.getTenantRoot("acme");
      if (!acme.ok) throw new Error("acme missing");
      const rootPath = acme.value.realPath;

      fc.assert(
        fc.property(
          rawPath,
          fc.constantFrom("read" as const, "write" as const),
          fc.constantFrom("follow" as const, "reject" as const),
          (raw, intent, symlinks) => {
            const result = confine(provider, "acme", raw, {
              intent,
              policy: { symlinks },
            });
            if (result.ok) {
              expect(isPathWithinRoot(result.value.realPath(), rootPath)).toBe(
                true,
              );
              expect(result.value.tenantId()).toBe("acme");
            }
          },
        ),
        { numRuns: 1000 },
      );
    });

    it("should never resolve a path through link-out", () => {
      fc.assert(
        fc.property(fc.array(segment, { maxLength: 6 }), (parts) => {
          const raw = ["link-out", ...parts].join("/");
          const result = confine(provider, "acme", raw, { intent: "write" });
          if (result.ok) {
            // Only reachable when the walk pops back out of the link
            expect(result.value.realPath().startsWith(outsideDir)).toBe(false);
          }
        }),
        { numRuns: 300 },
      );
    });

    it("should leave outside files untouched", () => {
      expect(fs.readFileSync(path.join(outsideDir, "secret.txt"), "utf8")).toBe(
        "TOP SECRET",
      );
      expect(fs.existsSync(path.join(outsideDir, "planted"))).toBe(false);
    });
  });
});
