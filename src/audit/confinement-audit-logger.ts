/**
 * Confinement Audit Logger
 *
 * Collects rejected path attempts per tenant so repeated probing of the
 * tenant boundary can be spotted. Pass `createCallback()` as the
 * `onViolation` option of the confinement pipeline.
 */

import type {
  ConfinementViolation,
  ConfinementViolationKind,
  ViolationCallback,
} from "./types.js";

export interface ConfinementAuditLoggerOptions {
  /**
   * Maximum number of violations kept across all tenants. The oldest are
   * dropped first; totals in `getSummary()` keep counting.
   * Default: 1000
   */
  maxViolations?: number;

  /**
   * Maximum number of violations stored per tenant.
   * Default: 100
   */
  maxViolationsPerTenant?: number;

  /**
   * Also record invalid_path rejections, not just escapes.
   * Default: false
   */
  includeInvalidPaths?: boolean;

  /**
   * Custom handler called for each recorded violation.
   */
  onViolation?: ViolationCallback;

  /**
   * Whether to log violations to console.
   * Default: false
   */
  logToConsole?: boolean;
}

export interface TenantViolationSummary {
  tenantId: string;
  /** Every violation recorded for the tenant, including dropped ones */
  count: number;
  escapes: number;
  firstSeen: number;
  lastSeen: number;
  /** Distinct raw paths among the stored violations */
  rawPaths: string[];
}

interface TenantTotals {
  count: number;
  escapes: number;
  firstSeen: number;
  lastSeen: number;
}

export class ConfinementAuditLogger {
  private violations: ConfinementViolation[] = [];
  private violationsByTenant: Map<string, ConfinementViolation[]> = new Map();
  private totalsByTenant: Map<string, TenantTotals> = new Map();
  private totalCount = 0;
  private options: Required<ConfinementAuditLoggerOptions>;

  constructor(options: ConfinementAuditLoggerOptions = {}) {
    this.options = {
      maxViolations: options.maxViolations ?? 1000,
      maxViolationsPerTenant: options.maxViolationsPerTenant ?? 100,
      includeInvalidPaths: options.includeInvalidPaths ?? false,
      onViolation: options.onViolation ?? (() => {}),
      logToConsole: options.logToConsole ?? false,
    };
  }

  /**
   * Record a violation. Invalid-path rejections are dropped unless
   * `includeInvalidPaths` is set.
   */
  record(violation: ConfinementViolation): void {
    if (violation.kind === "invalid_path" && !this.options.includeInvalidPaths) {
      return;
    }

    // Most recent first
    this.violations.unshift(violation);
    if (this.violations.length > this.options.maxViolations) {
      this.violations.pop();
    }
    this.totalCount++;

    const totals = this.totalsByTenant.get(violation.tenantId);
    const escape = violation.kind === "path_escape" ? 1 : 0;
    if (totals) {
      totals.count++;
      totals.escapes += escape;
      totals.firstSeen = Math.min(totals.firstSeen, violation.timestamp);
      totals.lastSeen = Math.max(totals.lastSeen, violation.timestamp);
    } else {
      this.totalsByTenant.set(violation.tenantId, {
        count: 1,
        escapes: escape,
        firstSeen: violation.timestamp,
        lastSeen: violation.timestamp,
      });
    }

    let tenantList = this.violationsByTenant.get(violation.tenantId);
    if (!tenantList) {
      tenantList = [];
      this.violationsByTenant.set(violation.tenantId, tenantList);
    }
    if (tenantList.length < this.options.maxViolationsPerTenant) {
      tenantList.push(violation);
    }

    if (this.options.logToConsole) {
      console.warn(
        `[ConfinementViolation] ${violation.kind} tenant=${violation.tenantId}`,
        JSON.stringify(violation.rawPath),
      );
    }

    this.options.onViolation(violation);
  }

  getViolations(): ConfinementViolation[] {
    return [...this.violations];
  }

  getViolationsForTenant(tenantId: string): ConfinementViolation[] {
    return [...(this.violationsByTenant.get(tenantId) ?? [])];
  }

  getViolationsByKind(kind: ConfinementViolationKind): ConfinementViolation[] {
    return this.violations.filter((v) => v.kind === kind);
  }

  /**
   * Per-tenant summary, noisiest tenant first.
   */
  getSummary(): TenantViolationSummary[] {
    const summaries: TenantViolationSummary[] = [];

    for (const [tenantId, totals] of this.totalsByTenant) {
      const rawPaths = new Set<string>();
      for (const v of this.violationsByTenant.get(tenantId) ?? []) {
        rawPaths.add(v.rawPath);
      }

      summaries.push({
        tenantId,
        ...totals,
        rawPaths: Array.from(rawPaths),
      });
    }

    summaries.sort((a, b) => b.count - a.count);

    return summaries;
  }

  /**
   * Number of violations recorded since the last clear, including ones no
   * longer stored.
   */
  getTotalCount(): number {
    return this.totalCount;
  }

  hasViolations(): boolean {
    return this.totalCount > 0;
  }

  clear(): void {
    this.violations = [];
    this.violationsByTenant.clear();
    this.totalsByTenant.clear();
    this.totalCount = 0;
  }

  /**
   * Create a callback suitable for the pipeline's `onViolation` option.
   */
  createCallback(): ViolationCallback {
    return (violation) => this.record(violation);
  }
}

/**
 * Create a simple violation callback that logs to console.
 */
export function createConsoleAuditCallback(): ViolationCallback {
  return (violation) => {
    const detail =
      violation.kind === "path_escape"
        ? `\n  Stage: ${violation.stage}`
        : `\n  Reason: ${violation.reason}`;
    console.warn(
      `[TenantVfs] Confinement violation detected:`,
      `\n  Kind: ${violation.kind}`,
      `\n  Tenant: ${violation.tenantId}`,
      `\n  Path: ${JSON.stringify(violation.rawPath)}`,
      detail,
    );
  };
}
