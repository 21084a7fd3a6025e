// services/diffService.ts
import { isDeepStrictEqual } from "util";
import type { RawSnapshot } from "../types.js";

export type ChangeSummary =
  | { kind: "initial" }
  | { kind: "unreadable"; error: string }
  | { kind: "reprocess" }
  | { kind: "update"; updated: string[]; added: string[]; removed: string[] };

export interface DiffResult {
  changed: boolean;
  summary: ChangeSummary;
}

// Result of reading the previous cycle's snapshot from the store.
export type PriorSnapshotState =
  | { status: "missing" }
  | { status: "unreadable"; error: string }
  | { status: "loaded"; snapshot: RawSnapshot };

/**
 * Locale-level comparison of two fetch cycles. Lists are sorted so the
 * changelog is reproducible.
 */
export function diffSnapshots(next: RawSnapshot, previous?: RawSnapshot): DiffResult {
  if (!previous) {
    return { changed: true, summary: { kind: "initial" } };
  }
  const prior = previous;

  const added = Object.keys(next).filter(key => !Object.hasOwn(prior, key)).sort();
  const removed = Object.keys(prior).filter(key => !Object.hasOwn(next, key)).sort();
  const updated = Object.keys(next)
    .filter(key => Object.hasOwn(prior, key) && !isDeepStrictEqual(next[key], prior[key]))
    .sort();

  return {
    changed: added.length > 0 || removed.length > 0 || updated.length > 0,
    summary: { kind: "update", updated, added, removed }
  };
}

// An unreadable prior snapshot never lets a run be skipped.
export function compareWithPrior(next: RawSnapshot, prior: PriorSnapshotState): DiffResult {
  switch (prior.status) {
    case "missing":
      return diffSnapshots(next);
    case "unreadable":
      return { changed: true, summary: { kind: "unreadable", error: prior.error } };
    case "loaded":
      return diffSnapshots(next, prior.snapshot);
  }
}
