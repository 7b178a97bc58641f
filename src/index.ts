export {
  ConfinementAuditLogger,
  type ConfinementAuditLoggerOptions,
  createConsoleAuditCallback,
  type TenantViolationSummary,
} from "./audit/confinement-audit-logger.js";
export type {
  ConfinementLogger,
  ConfinementViolation,
  ConfinementViolationKind,
  ViolationCallback,
} from "./audit/types.js";
export { type ConfineOptions, confine, confinePath } from "./confine.js";
export {
  assertNever,
  type ConfinementFailure,
  type ConfinementFailureKind,
  ConfinementError,
  describeFailure,
  type EscapeStage,
  type InvalidPathFailure,
  type InvalidPathReason,
  isConfinementError,
  type NotFoundFailure,
  type PathEscapeFailure,
  type Result,
  sanitizeErrorMessage,
  type UnknownTenantFailure,
  unwrap,
} from "./errors.js";
export {
  type DirentEntry,
  type FsStat,
  type FsTarget,
  TenantFs,
  TenantFsError,
  type TenantFsOptions,
  type WalkEntry,
} from "./fs/tenant-fs/tenant-fs.js";
// Handles are minted by verifyRealPath only; the class is exported for
// type checks and instanceof, not construction.
export { isTenantFileHandle, TenantFileHandle } from "./handle.js";
export { type ConfinedPath, resolveContainment } from "./path/containment.js";
export {
  formatNormalizedPath,
  getPathFlavor,
  type NormalizedPath,
  type NormalizeOptions,
  normalize,
  type PathFlavor,
  type PathFlavorName,
} from "./path/normalize.js";
export {
  type AccessIntent,
  isPathWithinRoot,
  type VerifyOptions,
  verifyRealPath,
} from "./path/real-path.js";
export {
  type ConfinementPolicy,
  policyFromEnv,
  type ResolvedPolicy,
  resolvePolicy,
  type SymlinkPolicy,
} from "./policy.js";
export {
  DirectoryTenantRootProvider,
  loadTenantManifest,
  parseTenantManifest,
  StaticTenantRootProvider,
  type TenantManifest,
  type TenantRootProvider,
} from "./tenant/provider.js";
export {
  createTenantRoot,
  isValidTenantId,
  type TenantRoot,
} from "./tenant/tenant-root.js";
