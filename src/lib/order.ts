/**
 * Presentation order, visibility filtering and cursor movement.
 * The order is a permutation of the item ids fixed for the session; the
 * cursor indexes the visible subsequence of it, never the raw order.
 */

import { isJudged, type Judgments } from "./types";

export type Random = () => number;

/** Seeded pseudo-random using simple hash */
export function seededRandom(seed: string): Random {
  let h = 0;
  for (let i = 0; i < seed.length; i++) {
    h = ((h << 5) - h + seed.charCodeAt(i)) | 0;
  }
  return () => {
    h = (h * 1664525 + 1013904223) | 0;
    return (h >>> 0) / 4294967296;
  };
}

export function shuffle<T>(arr: readonly T[], rng: Random = Math.random): T[] {
  const result = [...arr];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

/** True when candidate holds exactly the ids, each once. */
export function isPermutationOf(
  candidate: readonly string[],
  ids: readonly string[]
): boolean {
  if (candidate.length !== ids.length) return false;
  const expected = new Set(ids);
  if (expected.size !== ids.length) return false;
  const seen = new Set<string>();
  for (const id of candidate) {
    if (!expected.has(id) || seen.has(id)) return false;
    seen.add(id);
  }
  return true;
}

/**
 * Keep a restored or cached order when it still matches the live ids,
 * otherwise draw a fresh permutation.
 */
export function resolveOrder(
  ids: readonly string[],
  candidate?: readonly string[] | null,
  rng: Random = Math.random
): string[] {
  if (candidate && isPermutationOf(candidate, ids)) return [...candidate];
  return shuffle(ids, rng);
}

export interface VisibilityFilter {
  hideCompleted: boolean;
  /** Most recently judged item, kept on screen despite hideCompleted */
  stickyId: string | null;
}

export function isVisible(
  id: string,
  judgments: Judgments,
  filter: VisibilityFilter
): boolean {
  return !filter.hideCompleted || !isJudged(judgments, id) || id === filter.stickyId;
}

export function visibleIds(
  order: readonly string[],
  judgments: Judgments,
  filter: VisibilityFilter
): string[] {
  return order.filter((id) => isVisible(id, judgments, filter));
}

export function clampCursor(cursor: number, visibleCount: number): number {
  if (visibleCount <= 0) return 0;
  return Math.min(Math.max(0, Math.trunc(cursor)), visibleCount - 1);
}

/** Move by delta; stepping past either end leaves the cursor where it was. */
export function stepCursor(
  cursor: number,
  delta: number,
  visibleCount: number
): number {
  const current = clampCursor(cursor, visibleCount);
  const target = current + delta;
  if (target < 0 || target >= visibleCount) return current;
  return target;
}
