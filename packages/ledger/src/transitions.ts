/**
 * @tallybook/ledger — Entry lifecycle.
 *
 *   draft ──► posted ──► reconciled
 *     │         │
 *     └─► void ◄┘   (posted entries are voided by a reversing entry)
 */

import type { EntryStatus, JournalEntry } from "@tallybook/types";
import { LedgerError } from "./types.js";

export const ENTRY_TRANSITIONS: Readonly<Record<EntryStatus, readonly EntryStatus[]>> = {
  draft: ["posted", "void"],
  posted: ["reconciled", "void"],
  reconciled: [],
  void: [],
} as const;

function canTransition(from: EntryStatus, to: EntryStatus): boolean {
  switch (from) {
    case "draft":
    case "posted":
    case "reconciled":
    case "void":
      return ENTRY_TRANSITIONS[from].includes(to);
    default: {
      const unreachable: never = from;
      throw new LedgerError("INVALID_TRANSITION", `Unknown entry status: "${String(unreachable)}"`);
    }
  }
}

/**
 * Status as seen by the lifecycle. A posted entry that has been
 * reversed keeps `status: "posted"` in storage but is void.
 */
export function lifecycleStatus(entry: JournalEntry): EntryStatus {
  if (entry.status === "posted" && entry.reversedBy !== undefined) {
    return "void";
  }
  return entry.status;
}

export function assertTransition(entry: JournalEntry, to: EntryStatus): void {
  const from = lifecycleStatus(entry);
  if (!canTransition(from, to)) {
    throw new LedgerError(
      "INVALID_TRANSITION",
      `Entry "${entry.id}" cannot move from ${from} to ${to}`,
      { entryId: entry.id, from, to },
    );
  }
}
