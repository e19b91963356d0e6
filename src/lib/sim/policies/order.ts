import { compareIds } from "@/lib/sim/processStore";
import type { ReadyEntry } from "@/lib/sim/policies/types";

export type EntryComparator = (a: ReadyEntry, b: ReadyEntry) => number;

export const byReadySinceThenId: EntryComparator = (a, b) => {
  if (a.readySince !== b.readySince) return a.readySince - b.readySince;
  return compareIds(a.id, b.id);
};

export const byRemainingTime: EntryComparator = (a, b) => {
  if (a.remainingTime !== b.remainingTime) return a.remainingTime - b.remainingTime;
  return byReadySinceThenId(a, b);
};

export const byPriority: EntryComparator = (a, b) => {
  if (a.priority !== b.priority) return a.priority - b.priority;
  return byReadySinceThenId(a, b);
};

export function pickMin<T extends ReadyEntry>(entries: readonly T[], compare: EntryComparator): T | null {
  let best: T | null = null;
  for (const entry of entries) {
    if (best === null || compare(entry, best) < 0) best = entry;
  }
  return best;
}

/** The least urgent entry under `compare`. */
export function pickMax<T extends ReadyEntry>(entries: readonly T[], compare: EntryComparator): T | null {
  return pickMin(entries, (a, b) => compare(b, a));
}
