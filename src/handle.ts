/**
 * TenantFileHandle - the capability that file I/O requires.
 *
 * Handles are minted only by the real-path verifier after a path has been
 * proven to stay inside its tenant root. The class has no usable
 * constructor, and `isTenantFileHandle` checks an internal registry so a
 * structurally identical object cannot stand in for a real handle.
 */

import type { TenantRoot } from "./tenant/tenant-root.js";

export interface HandleRecord {
  readonly root: TenantRoot;
  readonly realPath: string;
  /** Confined tenant-relative segments the handle was requested as */
  readonly segments: readonly string[];
  readonly exists: boolean;
}

const records = new WeakMap<TenantFileHandle, HandleRecord>();

let mint: (record: HandleRecord) => TenantFileHandle;

export class TenantFileHandle {
  static {
    mint = (record) => {
      const handle = new TenantFileHandle();
      records.set(handle, Object.freeze({ ...record }));
      return Object.freeze(handle);
    };
  }

  private constructor() {}

  /** Verified, canonical host path */
  realPath(): string {
    return recordOf(this).realPath;
  }

  tenantId(): string {
    return recordOf(this).root.tenantId;
  }

  /** Whether the path existed when it was verified */
  exists(): boolean {
    return recordOf(this).exists;
  }

  // Keep real host paths out of logs and serialized output.
  toString(): string {
    return `TenantFileHandle(${this.tenantId()})`;
  }

  toJSON(): { tenantId: string } {
    return { tenantId: this.tenantId() };
  }
}

function recordOf(handle: TenantFileHandle): HandleRecord {
  const record = records.get(handle);
  if (!record) {
    throw new TypeError("Not a verified TenantFileHandle");
  }
  return record;
}

/** @internal */
export function mintHandle(record: HandleRecord): TenantFileHandle {
  return mint(record);
}

export function isTenantFileHandle(value: unknown): value is TenantFileHandle {
  return value instanceof TenantFileHandle && records.has(value);
}

/** @internal */
export function inspectHandle(handle: TenantFileHandle): HandleRecord {
  return recordOf(handle);
}
