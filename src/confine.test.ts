import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { confine, confinePath } from "./confine.js";
import { StaticTenantRootProvider } from "./tenant/provider.js";
import type { TenantRoot } from "./tenant/tenant-root.js";

describe("confine", () => {
  let tempDir: string;
  let provider: StaticTenantRootProvider;
  let root: TenantRoot;

  beforeEach(() => {
    tempDir = fs.realpathSync(
      fs.mkdtempSync(path.join(os.tmpdir(), "tenant-vfs-confine-")),
    );
    fs.mkdirSync(path.join(tempDir, "acme", "docs"), { recursive: true });
    fs.mkdirSync(path.join(tempDir, "acme", "new"));
    fs.writeFileSync(path.join(tempDir, "acme", "docs", "report.txt"), "q3");
    fs.mkdirSync(path.join(tempDir, "globex"));

    provider = StaticTenantRootProvider.fromDirectories({
      acme: path.join(tempDir, "acme"),
      globex: path.join(tempDir, "globex"),
    });
    const lookup = provider.getTenantRoot("acme");
    if (!lookup.ok) throw new Error("acme missing");
    root = lookup.value;
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe("happy path", () => {
    it("should resolve an existing file", () => {
      const result = confine(provider, "acme", "docs/report.txt");
      expect(result.ok && result.value.realPath()).toBe(
        path.join(tempDir, "acme", "docs", "report.txt"),
      );
    });

    it("should resolve net-zero traversal", () => {
      const result = confine(provider, "acme", "docs/../docs/report.txt");
      expect(result.ok && result.value.realPath()).toBe(
        path.join(tempDir, "acme", "docs", "report.txt"),
      );
    });

    it("should resolve the empty path to the root", () => {
      const result = confine(provider, "acme", "");
      expect(result.ok && result.value.realPath()).toBe(root.realPath);
    });

    it("should accept a missing file for writes", () => {
      const result = confine(provider, "acme", "new/file.txt", {
        intent: "write",
      });
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.realPath()).toBe(
        path.join(tempDir, "acme", "new", "file.txt"),
      );
      expect(result.value.exists()).toBe(false);
    });

    it("should report a missing file for reads", () => {
      expect(confine(provider, "acme", "new/file.txt")).toEqual({
        ok: false,
        error: { kind: "not_found", code: "ENOENT" },
      });
    });
  });

  describe("failures", () => {
    it("should reject escapes instead of clamping", () => {
      expect(confine(provider, "acme", "../../etc/passwd")).toEqual({
        ok: false,
        error: { kind: "path_escape", stage: "containment" },
      });
      expect(confine(provider, "acme", "..")).toEqual({
        ok: false,
        error: { kind: "path_escape", stage: "containment" },
      });
    });

    it("should not let one tenant reach another by traversal", () => {
      expect(confine(provider, "acme", "../globex")).toEqual({
        ok: false,
        error: { kind: "path_escape", stage: "containment" },
      });
    });

    it("should check the tenant before the path", () => {
      expect(confine(provider, "initech", "a\0b")).toEqual({
        ok: false,
        error: { kind: "unknown_tenant" },
      });
      expect(confine(provider, "initech", "docs/report.txt")).toEqual({
        ok: false,
        error: { kind: "unknown_tenant" },
      });
    });

    it("should stop at the first failing stage", () => {
      expect(confine(provider, "acme", "../\0")).toEqual({
        ok: false,
        error: { kind: "invalid_path", reason: "null_byte" },
      });
    });
  });

  describe("policy", () => {
    it("should apply a custom path limit", () => {
      expect(
        confine(provider, "acme", "docs/report.txt", {
          policy: { maxPathBytes: 8 },
        }),
      ).toEqual({ ok: false, error: { kind: "invalid_path", reason: "too_long" } });
    });

    it("should reject internal symlinks under the reject policy", () => {
      fs.symlinkSync("docs", path.join(tempDir, "acme", "alias"));

      const followed = confine(provider, "acme", "alias/report.txt");
      expect(followed.ok).toBe(true);
      expect(
        confine(provider, "acme", "alias/report.txt", {
          policy: { symlinks: "reject" },
        }),
      ).toEqual({ ok: false, error: { kind: "path_escape", stage: "real_path" } });
    });

    it("should apply the win32 flavor", () => {
      expect(
        confine(provider, "acme", "C:\\Windows", { policy: { flavor: "win32" } }),
      ).toEqual({
        ok: false,
        error: { kind: "invalid_path", reason: "drive_prefix" },
      });
      const result = confine(provider, "acme", "docs\\report.txt", {
        policy: { flavor: "win32" },
      });
      expect(result.ok && result.value.realPath()).toBe(
        path.join(tempDir, "acme", "docs", "report.txt"),
      );
    });
  });

  describe("logging and audit", () => {
    it("should log successful resolutions at debug", () => {
      const logger = { info: vi.fn(), debug: vi.fn() };
      confinePath(root, "docs/report.txt", { logger });

      expect(logger.debug).toHaveBeenCalledWith("confine", {
        tenantId: "acme",
        path: "docs/report.txt",
        intent: "read",
        exists: true,
      });
      expect(logger.info).not.toHaveBeenCalled();
    });

    it("should log rejections at info without the raw path", () => {
      const logger = { info: vi.fn(), debug: vi.fn() };
      confine(provider, "acme", "../secret", { logger });
      confine(provider, "initech", "x", { logger });

      expect(logger.info.mock.calls).toEqual([
        ["confine rejected", { tenantId: "acme", kind: "path_escape" }],
        ["confine rejected", { tenantId: "initech", kind: "unknown_tenant" }],
      ]);
    });

    it("should report escapes and invalid paths to onViolation", () => {
      const onViolation = vi.fn();
      confine(provider, "acme", "../../etc/passwd", { onViolation });
      confine(provider, "acme", "a\0b", { onViolation });

      expect(onViolation.mock.calls).toEqual([
        [
          {
            kind: "path_escape",
            timestamp: expect.any(Number),
            tenantId: "acme",
            rawPath: "../../etc/passwd",
            stage: "containment",
          },
        ],
        [
          {
            kind: "invalid_path",
            timestamp: expect.any(Number),
            tenantId: "acme",
            rawPath: "a\0b",
            reason: "null_byte",
          },
        ],
      ]);
    });

    it("should not report missing files or unknown tenants as violations", () => {
      const onViolation = vi.fn();
      confine(provider, "acme", "missing.txt", { onViolation });
      confine(provider, "initech", "../x", { onViolation });

      expect(onViolation).not.toHaveBeenCalled();
    });
  });
});
