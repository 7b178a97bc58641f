/**
 * TenantFs - file I/O bound to one tenant root
 *
 * Every operation takes a TenantFileHandle or a raw tenant-relative path.
 * Raw paths go through the confinement pipeline first; after that only the
 * handle's verified real path is used, never the raw string.
 *
 * Files are opened with O_NOFOLLOW and the open descriptor is checked again
 * (inode identity, and the /proc/self/fd link on Linux) so a rename or
 * symlink swap between verification and open is caught. Writes never
 * truncate before that check passes, and a file the open created outside
 * the root is removed again.
 * New methods must go through handleFor() or entryFor(). Never touch the
 * real FS with a path that did not come from a handle.
 */

import { Buffer } from "node:buffer";
import * as fs from "node:fs";
import type { FileHandle } from "node:fs/promises";
import * as nodePath from "node:path";
import type { ConfinementLogger, ViolationCallback } from "../../audit/types.js";
import { confinePath } from "../../confine.js";
import {
  ConfinementError,
  type ConfinementFailure,
  unwrap,
} from "../../errors.js";
import {
  type HandleRecord,
  inspectHandle,
  isTenantFileHandle,
  type TenantFileHandle,
} from "../../handle.js";
import { resolveContainment } from "../../path/containment.js";
import {
  getPathFlavor,
  normalize,
  type PathFlavor,
} from "../../path/normalize.js";
import {
  type AccessIntent,
  errnoCode,
  isPathWithinRoot,
} from "../../path/real-path.js";
import {
  type ConfinementPolicy,
  type ResolvedPolicy,
  resolvePolicy,
} from "../../policy.js";
import type { TenantRootProvider } from "../../tenant/provider.js";
import type { TenantRoot } from "../../tenant/tenant-root.js";

export type FsTarget = TenantFileHandle | string;

export interface TenantFsOptions {
  root: TenantRoot;

  policy?: ConfinementPolicy;

  /**
   * Maximum file size in bytes that can be read.
   * Files larger than this throw an EFBIG error.
   * Defaults to 10MB (10485760).
   */
  maxFileReadSize?: number;

  logger?: ConfinementLogger;

  onViolation?: ViolationCallback;
}

export interface FsStat {
  isFile: boolean;
  isDirectory: boolean;
  mode: number;
  size: number;
  mtime: Date;
}

export interface DirentEntry {
  name: string;
  isFile: boolean;
  isDirectory: boolean;
  isSymbolicLink: boolean;
}

export interface WalkEntry {
  /** Tenant-relative, `/`-joined path of the file */
  path: string;
  handle: TenantFileHandle;
}

/**
 * I/O failure on a confined path. The message only ever names the
 * tenant-relative path.
 */
export class TenantFsError extends Error {
  constructor(
    public readonly code: string,
    public readonly operation: string,
    public readonly path: string,
    detail?: string,
  ) {
    super(
      detail
        ? `${code}: ${detail}, ${operation} '${path}'`
        : `${code}: ${operation} '${path}'`,
    );
    this.name = "TenantFsError";
  }
}

const ERRNO_DETAILS: Record<string, string> = {
  ENOENT: "no such file or directory",
  EISDIR: "illegal operation on a directory",
  ENOTDIR: "not a directory",
  EEXIST: "file already exists",
  ENOTEMPTY: "directory not empty",
  EACCES: "permission denied",
  EPERM: "operation not permitted",
  ELOOP: "too many levels of symbolic links",
  EINVAL: "invalid argument",
  EXDEV: "cross-device link not permitted",
  EBUSY: "resource busy or locked",
  ENAMETOOLONG: "name too long",
  EMFILE: "too many open files",
  ENOSPC: "no space left on device",
  EROFS: "read-only file system",
  EIO: "i/o error",
};

function labelOf(record: HandleRecord): string {
  return record.segments.length === 0 ? "/" : record.segments.join("/");
}

export class TenantFs {
  private readonly root: TenantRoot;
  private readonly policy: ResolvedPolicy;
  private readonly maxFileReadSize: number;
  private readonly logger?: ConfinementLogger;
  private readonly onViolation?: ViolationCallback;

  constructor(options: TenantFsOptions) {
    this.root = options.root;
    this.policy = resolvePolicy(options.policy);
    this.maxFileReadSize = options.maxFileReadSize ?? 10485760;
    this.logger = options.logger;
    this.onViolation = options.onViolation;
  }

  /**
   * Bind to the root the provider has for `tenantId`.
   * Throws ConfinementError (unknown_tenant) when there is none.
   */
  static forTenant(
    provider: TenantRootProvider,
    tenantId: string,
    options: Omit<TenantFsOptions, "root"> = {},
  ): TenantFs {
    const root = provider.getTenantRoot(tenantId);
    if (!root.ok) {
      options.logger?.info("confine rejected", {
        tenantId,
        kind: root.error.kind,
      });
      throw new ConfinementError(root.error);
    }
    return new TenantFs({ ...options, root: root.value });
  }

  get tenantId(): string {
    return this.root.tenantId;
  }

  /**
   * Confine a raw path. Throws ConfinementError on rejection.
   */
  resolve(rawPath: string, intent: AccessIntent = "read"): TenantFileHandle {
    return unwrap(
      confinePath(this.root, rawPath, {
        intent,
        policy: this.policy,
        logger: this.logger,
        onViolation: this.onViolation,
      }),
    );
  }

  /**
   * The single gate between callers and the real FS.
   */
  private handleFor(target: FsTarget, intent: AccessIntent): HandleRecord {
    if (typeof target === "string") {
      return inspectHandle(this.resolve(target, intent));
    }
    if (!isTenantFileHandle(target)) {
      throw new TypeError("Expected a TenantFileHandle or a path string");
    }
    const record = inspectHandle(target);
    if (
      record.root.tenantId !== this.root.tenantId ||
      record.root.realPath !== this.root.realPath
    ) {
      this.deny({ kind: "path_escape", stage: "open" }, labelOf(record));
    }
    return record;
  }

  /**
   * Resolve the parent through the pipeline and append the final name
   * unresolved, for operations that act on a directory entry itself
   * (rm, mv) rather than on what a symlink points to.
   */
  private async entryFor(
    target: FsTarget,
    createParent: boolean,
  ): Promise<{ label: string; entry: string }> {
    const segments =
      typeof target === "string"
        ? this.segmentsFor(target)
        : this.handleFor(target, "write").segments;
    if (segments.length === 0) {
      throw new TenantFsError(
        "EPERM",
        "modify",
        "/",
        ERRNO_DETAILS.EPERM,
      );
    }
    const name = segments[segments.length - 1];
    const parent = this.handleFor(
      segments.slice(0, -1).join("/"),
      createParent ? "write" : "read",
    );
    const label = segments.join("/");
    if (createParent) {
      await this.ensureDirectory(parent.realPath, label);
    }
    return { label, entry: nodePath.join(parent.realPath, name) };
  }

  /**
   * Syntactic stages only: the final component is left unresolved.
   */
  private segmentsFor(rawPath: string): readonly string[] {
    const normalized = normalize(rawPath, this.policy);
    if (!normalized.ok) {
      this.deny(normalized.error, rawPath);
    }
    const confined = resolveContainment(this.root, normalized.value);
    if (!confined.ok) {
      this.deny(confined.error, rawPath);
    }
    return confined.value.segments;
  }

  private deny(failure: ConfinementFailure, path: string): never {
    this.logger?.info("io rejected", {
      tenantId: this.root.tenantId,
      kind: failure.kind,
    });
    if (failure.kind === "path_escape") {
      this.onViolation?.({
        kind: "path_escape",
        timestamp: Date.now(),
        tenantId: this.root.tenantId,
        rawPath: path,
        stage: failure.stage,
      });
    } else if (failure.kind === "invalid_path") {
      this.onViolation?.({
        kind: "invalid_path",
        timestamp: Date.now(),
        tenantId: this.root.tenantId,
        rawPath: path,
        reason: failure.reason,
      });
    }
    throw new ConfinementError(failure);
  }

  /**
   * Replace host errors with ones naming only the tenant-relative path.
   * The host message is dropped: it carries real paths.
   */
  private rethrow(e: unknown, label: string, operation: string): never {
    if (e instanceof ConfinementError || e instanceof TenantFsError) {
      throw e;
    }
    const code = errnoCode(e) ?? "EIO";
    throw new TenantFsError(
      code,
      operation,
      label,
      ERRNO_DETAILS[code] ?? "operation failed",
    );
  }

  private cleanupFailed(e: unknown): void {
    this.logger?.info("cleanup failed", {
      tenantId: this.root.tenantId,
      code: errnoCode(e) ?? "EIO",
    });
  }

  /**
   * Confirm an open descriptor still refers to a file inside the root.
   */
  private async assertDescriptorConfined(
    file: FileHandle,
    record: HandleRecord,
  ): Promise<void> {
    const flavor = getPathFlavor(this.policy.flavor);
    const label = labelOf(record);

    const fdPath = await descriptorPath(file.fd);
    if (
      fdPath !== null &&
      !isPathWithinRoot(fdPath, this.root.realPath, flavor)
    ) {
      this.deny({ kind: "path_escape", stage: "open" }, label);
    }

    // Without /proc this identity check is all we have; a swap completed
    // and reverted between open() and here goes unnoticed.
    let current: string;
    try {
      current = await fs.promises.realpath(record.realPath);
    } catch {
      this.deny({ kind: "path_escape", stage: "open" }, label);
    }
    if (!isPathWithinRoot(current, this.root.realPath, flavor)) {
      this.deny({ kind: "path_escape", stage: "open" }, label);
    }
    let fdStat: fs.Stats;
    let pathStat: fs.Stats;
    try {
      [fdStat, pathStat] = await Promise.all([
        file.stat(),
        fs.promises.stat(current),
      ]);
    } catch (e) {
      this.rethrow(e, label, "open");
    }
    if (fdStat.dev !== pathStat.dev || fdStat.ino !== pathStat.ino) {
      this.deny({ kind: "path_escape", stage: "open" }, label);
    }
  }

  private async openNoFollow(
    record: HandleRecord,
    flags: number,
    operation: string,
  ): Promise<FileHandle> {
    try {
      return await fs.promises.open(
        record.realPath,
        flags | fs.constants.O_NOFOLLOW,
        0o666,
      );
    } catch (e) {
      if (errnoCode(e) === "ELOOP") {
        // Last component became a symlink after verification.
        this.deny({ kind: "path_escape", stage: "open" }, labelOf(record));
      }
      this.rethrow(e, labelOf(record), operation);
    }
  }

  private async openVerified(
    record: HandleRecord,
    flags: number,
    operation: string,
  ): Promise<FileHandle> {
    const file = await this.openNoFollow(record, flags, operation);
    try {
      await this.assertDescriptorConfined(file, record);
      return file;
    } catch (e) {
      await file.close();
      throw e;
    }
  }

  /**
   * Open for writing without truncating. A missing file is created with
   * O_EXCL so that, if the descriptor check then fails, the file is known
   * to be ours and is unlinked.
   */
  private async openForWrite(
    record: HandleRecord,
    append: boolean,
    operation: string,
  ): Promise<FileHandle> {
    const flags =
      fs.constants.O_WRONLY | (append ? fs.constants.O_APPEND : 0);
    let created = true;
    let file: FileHandle;
    try {
      file = await this.openNoFollow(
        record,
        flags | fs.constants.O_CREAT | fs.constants.O_EXCL,
        operation,
      );
    } catch (e) {
      if (!(e instanceof TenantFsError && e.code === "EEXIST")) {
        throw e;
      }
      created = false;
      file = await this.openNoFollow(record, flags, operation);
    }

    try {
      await this.assertDescriptorConfined(file, record);
      return file;
    } catch (e) {
      if (created) {
        await this.removeStrayFile(file, record);
      }
      await file.close();
      throw e;
    }
  }

  /**
   * Unlink a file this instance just created, wherever it landed. The path
   * is only unlinked while it still names the open descriptor's inode.
   */
  private async removeStrayFile(
    file: FileHandle,
    record: HandleRecord,
  ): Promise<void> {
    try {
      const located =
        (await descriptorPath(file.fd)) ??
        (await fs.promises.realpath(record.realPath));
      const [fdStat, pathStat] = await Promise.all([
        file.stat(),
        fs.promises.lstat(located),
      ]);
      if (fdStat.dev === pathStat.dev && fdStat.ino === pathStat.ino) {
        await fs.promises.unlink(located);
      }
    } catch (e) {
      this.cleanupFailed(e);
    }
  }

  /**
   * Create a directory and its missing parents one level at a time,
   * confirming each level resolves inside the root before descending.
   * A level created outside (its parent was swapped) is removed again.
   */
  private async ensureDirectory(dir: string, label: string): Promise<void> {
    const flavor = getPathFlavor(this.policy.flavor);
    if (!isPathWithinRoot(dir, this.root.realPath, flavor)) {
      this.deny({ kind: "path_escape", stage: "open" }, label);
    }
    const relative = nodePath.relative(this.root.realPath, dir);
    const names = relative === "" ? [] : relative.split(nodePath.sep);

    let current = this.root.realPath;
    for (const name of names) {
      current = nodePath.join(current, name);
      let created = true;
      try {
        await fs.promises.mkdir(current);
      } catch (e) {
        if (errnoCode(e) !== "EEXIST") {
          this.rethrow(e, label, "mkdir");
        }
        created = false;
      }

      let real: string;
      try {
        real = await fs.promises.realpath(current);
      } catch (e) {
        this.rethrow(e, label, "mkdir");
      }
      if (!isPathWithinRoot(real, this.root.realPath, flavor)) {
        if (created) {
          await fs.promises.rmdir(real).catch((e: unknown) => {
            this.cleanupFailed(e);
          });
        }
        this.deny({ kind: "path_escape", stage: "open" }, label);
      }
    }
  }

  async readFile(
    target: FsTarget,
    encoding: BufferEncoding = "utf8",
  ): Promise<string> {
    const buffer = await this.readFileBuffer(target);
    return Buffer.from(buffer).toString(encoding);
  }

  async readFileBuffer(target: FsTarget): Promise<Uint8Array> {
    const record = this.handleFor(target, "read");
    const label = labelOf(record);
    const file = await this.openVerified(record, fs.constants.O_RDONLY, "open");
    try {
      const stat = await file.stat();
      if (stat.isDirectory()) {
        throw new TenantFsError("EISDIR", "read", label, ERRNO_DETAILS.EISDIR);
      }
      if (this.maxFileReadSize > 0 && stat.size > this.maxFileReadSize) {
        throw new TenantFsError(
          "EFBIG",
          "read",
          label,
          `file too large (${stat.size} bytes, max ${this.maxFileReadSize})`,
        );
      }
      return new Uint8Array(await file.readFile());
    } catch (e) {
      this.rethrow(e, label, "read");
    } finally {
      await file.close();
    }
  }

  async writeFile(
    target: FsTarget,
    content: string | Uint8Array,
    encoding: BufferEncoding = "utf8",
  ): Promise<void> {
    await this.writeWith(target, content, encoding, false, "write");
  }

  async appendFile(
    target: FsTarget,
    content: string | Uint8Array,
    encoding: BufferEncoding = "utf8",
  ): Promise<void> {
    await this.writeWith(target, content, encoding, true, "append");
  }

  private async writeWith(
    target: FsTarget,
    content: string | Uint8Array,
    encoding: BufferEncoding,
    append: boolean,
    operation: string,
  ): Promise<void> {
    const record = this.handleFor(target, "write");
    const label = labelOf(record);
    const data =
      typeof content === "string" ? Buffer.from(content, encoding) : content;

    await this.ensureDirectory(nodePath.dirname(record.realPath), label);
    const file = await this.openForWrite(record, append, operation);
    try {
      if (!append) {
        await file.truncate(0);
      }
      await file.writeFile(data);
    } catch (e) {
      this.rethrow(e, label, operation);
    } finally {
      await file.close();
    }
  }

  /**
   * False for missing paths and for paths that are rejected outright.
   */
  async exists(target: FsTarget): Promise<boolean> {
    let record: HandleRecord;
    try {
      record = this.handleFor(target, "read");
    } catch (e) {
      if (e instanceof ConfinementError) return false;
      throw e;
    }
    try {
      await fs.promises.access(record.realPath);
      return true;
    } catch {
      return false;
    }
  }

  async stat(target: FsTarget): Promise<FsStat> {
    const record = this.handleFor(target, "read");
    try {
      const stat = await fs.promises.stat(record.realPath);
      return {
        isFile: stat.isFile(),
        isDirectory: stat.isDirectory(),
        mode: stat.mode,
        size: stat.size,
        mtime: stat.mtime,
      };
    } catch (e) {
      this.rethrow(e, labelOf(record), "stat");
    }
  }

  async mkdir(
    target: FsTarget,
    options: { recursive?: boolean } = {},
  ): Promise<void> {
    const record = this.handleFor(target, "write");
    if (options.recursive) {
      await this.ensureDirectory(record.realPath, labelOf(record));
    }
    try {
      await fs.promises.mkdir(record.realPath, {
        recursive: options.recursive ?? false,
      });
    } catch (e) {
      this.rethrow(e, labelOf(record), "mkdir");
    }
  }

  async readdir(target: FsTarget = ""): Promise<string[]> {
    const entries = await this.readdirWithFileTypes(target);
    return entries.map((e) => e.name);
  }

  async readdirWithFileTypes(target: FsTarget = ""): Promise<DirentEntry[]> {
    const record = this.handleFor(target, "read");
    try {
      const entries = await fs.promises.readdir(record.realPath, {
        withFileTypes: true,
      });
      return entries
        .map((dirent) => ({
          name: dirent.name,
          isFile: dirent.isFile(),
          isDirectory: dirent.isDirectory(),
          isSymbolicLink: dirent.isSymbolicLink(),
        }))
        .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    } catch (e) {
      this.rethrow(e, labelOf(record), "scandir");
    }
  }

  /**
   * Remove a file, symlink or directory entry. A symlink is removed
   * itself; its target is left alone.
   */
  async rm(
    target: FsTarget,
    options: { recursive?: boolean; force?: boolean } = {},
  ): Promise<void> {
    let resolved: { label: string; entry: string };
    try {
      resolved = await this.entryFor(target, false);
    } catch (e) {
      if (
        options.force &&
        e instanceof ConfinementError &&
        e.failure.kind === "not_found"
      ) {
        return;
      }
      throw e;
    }
    try {
      await fs.promises.rm(resolved.entry, {
        recursive: options.recursive ?? false,
        force: options.force ?? false,
      });
    } catch (e) {
      this.rethrow(e, resolved.label, "rm");
    }
  }

  /**
   * Rename within the tenant root, e.g. to move a staged upload into
   * place. Refuses moves that would leave a symlink pointing outside the
   * root.
   */
  async mv(src: FsTarget, dest: FsTarget): Promise<void> {
    const source = await this.entryFor(src, false);
    const destination = await this.entryFor(dest, true);
    const flavor = getPathFlavor(this.policy.flavor);

    let srcStat: fs.Stats;
    try {
      srcStat = await fs.promises.lstat(source.entry);
    } catch (e) {
      this.rethrow(e, source.label, "mv");
    }

    // A relative symlink target is re-read from the new location.
    if (srcStat.isSymbolicLink()) {
      let linkTarget: string;
      try {
        linkTarget = await fs.promises.readlink(source.entry);
      } catch (e) {
        this.rethrow(e, source.label, "mv");
      }
      const resolvedTarget = nodePath.resolve(
        nodePath.dirname(destination.entry),
        linkTarget,
      );
      const canonicalTarget = await fs.promises
        .realpath(resolvedTarget)
        .catch(() => resolvedTarget);
      if (!isPathWithinRoot(canonicalTarget, this.root.realPath, flavor)) {
        this.deny({ kind: "path_escape", stage: "open" }, source.label);
      }
    }

    try {
      await fs.promises.rename(source.entry, destination.entry);
    } catch (e) {
      this.rethrow(e, source.label, "mv");
    }

    if (srcStat.isDirectory()) {
      let escaping: number;
      try {
        escaping = await findEscapingSymlinks(
          destination.entry,
          this.root.realPath,
          flavor,
        );
      } catch (e) {
        // An unreadable subtree cannot be cleared; treat it as escaping.
        this.cleanupFailed(e);
        escaping = 1;
      }
      if (escaping > 0) {
        try {
          await fs.promises.rename(destination.entry, source.entry);
        } catch (e) {
          this.rethrow(e, destination.label, "mv");
        }
        this.deny({ kind: "path_escape", stage: "open" }, source.label);
      }
    }
  }

  /**
   * Yield every file below a directory. Each entry is confined on its own,
   * so symlinks are followed only while they stay inside the root; the
   * rest are skipped (and reported to onViolation).
   */
  async *walk(target: FsTarget = ""): AsyncGenerator<WalkEntry> {
    const start = this.handleFor(target, "read");
    const visited = new Set<string>([start.realPath]);
    const queue: Array<{ dir: HandleRecord; prefix: string }> = [
      {
        dir: start,
        prefix: start.segments.join("/"),
      },
    ];

    while (queue.length > 0) {
      const next = queue.shift();
      if (!next) break;
      let entries: fs.Dirent[];
      try {
        entries = await fs.promises.readdir(next.dir.realPath, {
          withFileTypes: true,
        });
      } catch (e) {
        this.rethrow(e, labelOf(next.dir), "scandir");
      }
      entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

      for (const dirent of entries) {
        const path = next.prefix ? `${next.prefix}/${dirent.name}` : dirent.name;
        const confined = confinePath(this.root, path, {
          policy: this.policy,
          logger: this.logger,
          onViolation: this.onViolation,
        });
        if (!confined.ok) continue;

        const handle = confined.value;
        const record = inspectHandle(handle);
        let stat: fs.Stats;
        try {
          stat = await fs.promises.stat(record.realPath);
        } catch {
          // Removed while walking
          continue;
        }
        if (stat.isDirectory()) {
          if (!visited.has(record.realPath)) {
            visited.add(record.realPath);
            queue.push({ dir: record, prefix: path });
          }
        } else {
          yield { path, handle };
        }
      }
    }
  }
}

async function descriptorPath(fd: number): Promise<string | null> {
  if (process.platform !== "linux") return null;
  try {
    return await fs.promises.readlink(`/proc/self/fd/${fd}`);
  } catch {
    return null;
  }
}

/**
 * Count symlinks below `dir` whose targets resolve outside the root.
 */
async function findEscapingSymlinks(
  dir: string,
  canonicalRoot: string,
  flavor: PathFlavor,
): Promise<number> {
  let escaping = 0;
  const pending = [dir];
  while (pending.length > 0) {
    const current = pending.pop();
    if (current === undefined) break;
    const entries = await fs.promises.readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      const entryPath = nodePath.join(current, entry.name);
      if (entry.isSymbolicLink()) {
        const target = await fs.promises.readlink(entryPath);
        const resolvedTarget = nodePath.resolve(current, target);
        const canonicalTarget = await fs.promises
          .realpath(resolvedTarget)
          .catch(() => resolvedTarget);
        if (!isPathWithinRoot(canonicalTarget, canonicalRoot, flavor)) {
          escaping++;
        }
      } else if (entry.isDirectory()) {
        pending.push(entryPath);
      }
    }
  }
  return escaping;
}
