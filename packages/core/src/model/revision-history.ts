import type { RevisionInfo } from "./revision.js";

/**
 * Problem found in a revision history.
 */
export interface RevisionHistoryViolation {
  /** Position in the newest-first history */
  index: number;
  revisionId: string;
  reason: string;
}

/**
 * Check the linear-history invariants of a newest-first revision list:
 *
 * - revision ids are unique
 * - every entry's parent is the next (older) entry
 * - the oldest entry has no parent
 * - creation times never increase towards the tail
 *
 * @returns The first violation, or undefined when the history is well formed
 */
export function verifyRevisionHistory(
  history: readonly RevisionInfo[],
): RevisionHistoryViolation | undefined {
  const seen = new Set<string>();

  for (let index = 0; index < history.length; index++) {
    const entry = history[index];
    if (seen.has(entry.revisionId)) {
      return { index, revisionId: entry.revisionId, reason: "duplicate revision id" };
    }
    seen.add(entry.revisionId);

    const older = history[index + 1];
    if (older === undefined) {
      if (entry.parentRevisionId !== undefined) {
        return {
          index,
          revisionId: entry.revisionId,
          reason: `oldest revision has parent ${entry.parentRevisionId}`,
        };
      }
      continue;
    }

    if (entry.parentRevisionId !== older.revisionId) {
      return {
        index,
        revisionId: entry.revisionId,
        reason: `parent is ${entry.parentRevisionId ?? "(none)"}, expected ${older.revisionId}`,
      };
    }
    if (entry.createdAt.getTime() < older.createdAt.getTime()) {
      return { index, revisionId: entry.revisionId, reason: "created before its parent" };
    }
  }

  return undefined;
}
