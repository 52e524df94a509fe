/**
 * Append-only audit log for recording who-did-what-when.
 *
 * The service appends one entry per state-changing review or posting
 * action. Shared by all tenants; queries filter by tenant. In-memory
 * only, it lives as long as the process.
 */

// =============================================================================
// Types
// =============================================================================

export type AuditAction =
  | "post"
  | "void"
  | "accept"
  | "reject"
  | "batch_accept"
  | "batch_reject"
  | "resolve"
  | "book_transfer";

export type AuditResourceType = "entry" | "match" | "check";

export interface AuditLogEntry {
  readonly sequence: number;
  readonly timestamp: string;
  readonly tenantId: string;
  readonly action: AuditAction;
  readonly resourceType: AuditResourceType;
  readonly resourceId: string;
  readonly actor: string;
  readonly detail?: string | undefined;
}

export interface AuditLogQuery {
  readonly tenantId?: string | undefined;
  readonly action?: string | undefined;
  readonly resourceType?: string | undefined;
  readonly resourceId?: string | undefined;
  readonly limit?: number | undefined;
}

// =============================================================================
// AuditLog
// =============================================================================

export class AuditLog {
  private readonly _entries: AuditLogEntry[] = [];
  private readonly _clock: () => string;

  constructor(clock: () => string = () => new Date().toISOString()) {
    this._clock = clock;
  }

  append(entry: Omit<AuditLogEntry, "timestamp" | "sequence">): AuditLogEntry {
    const recorded: AuditLogEntry = {
      ...entry,
      sequence: this._entries.length + 1,
      timestamp: this._clock(),
    };
    this._entries.push(recorded);
    return recorded;
  }

  /**
   * Query entries with optional filters, newest first.
   */
  query(filter: AuditLogQuery = {}): readonly AuditLogEntry[] {
    const results = this._entries
      .filter(
        (e) =>
          (filter.tenantId === undefined || e.tenantId === filter.tenantId) &&
          (filter.action === undefined || e.action === filter.action) &&
          (filter.resourceType === undefined || e.resourceType === filter.resourceType) &&
          (filter.resourceId === undefined || e.resourceId === filter.resourceId),
      )
      .reverse();

    if (filter.limit !== undefined && filter.limit > 0) {
      return results.slice(0, filter.limit);
    }
    return results;
  }

  get size(): number {
    return this._entries.length;
  }
}
