/**
 * Consistency check storage. Checks are keyed by id and looked up by
 * fingerprint so an identical finding is stored once.
 */

import { severityAtLeast } from "./config.js";
import { ReconcilerError } from "./errors.js";
import type { CheckFilter, ConsistencyCheck } from "./types.js";

export interface CheckStore {
  insert(check: ConsistencyCheck): void;
  get(id: string): ConsistencyCheck | undefined;
  findByFingerprint(fingerprint: string): ConsistencyCheck | undefined;
  list(filter?: CheckFilter): readonly ConsistencyCheck[];
  replace(check: ConsistencyCheck): void;
}

export class InMemoryCheckStore implements CheckStore {
  private readonly _checks = new Map<string, ConsistencyCheck>();
  private readonly _byFingerprint = new Map<string, string>();

  insert(check: ConsistencyCheck): void {
    if (this._byFingerprint.has(check.fingerprint)) {
      throw new ReconcilerError("INVALID_ACTION", `Check already recorded: "${check.fingerprint}"`);
    }
    this._checks.set(check.id, check);
    this._byFingerprint.set(check.fingerprint, check.id);
  }

  get(id: string): ConsistencyCheck | undefined {
    return this._checks.get(id);
  }

  findByFingerprint(fingerprint: string): ConsistencyCheck | undefined {
    const id = this._byFingerprint.get(fingerprint);
    return id === undefined ? undefined : this._checks.get(id);
  }

  list(filter: CheckFilter = {}): readonly ConsistencyCheck[] {
    return [...this._checks.values()].filter((c) => {
      if (filter.statuses !== undefined && !filter.statuses.includes(c.status)) return false;
      if (filter.checkTypes !== undefined && !filter.checkTypes.includes(c.checkType)) return false;
      if (filter.minSeverity !== undefined && !severityAtLeast(c.severity, filter.minSeverity)) return false;
      return true;
    });
  }

  replace(check: ConsistencyCheck): void {
    if (!this._checks.has(check.id)) {
      throw new ReconcilerError("CHECK_NOT_FOUND", `Unknown check: "${check.id}"`, { checkId: check.id });
    }
    this._checks.set(check.id, check);
  }
}
