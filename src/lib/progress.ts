/**
 * Judgment bookkeeping: record, merge a prior session in, find where to resume.
 */

import { InvalidValueError } from "./errors";
import {
  coerceJudgment,
  hasOwn,
  isJudged,
  type JudgmentRecord,
  type Judgments,
  type JudgmentScale,
} from "./types";

export function recordJudgment(
  judgments: Judgments,
  scale: JudgmentScale,
  itemId: string,
  value: unknown,
  now: Date = new Date()
): Judgments {
  const accepted = scale.values.find((v) => v === value);
  if (accepted === undefined) {
    throw new InvalidValueError(itemId, value, scale.values);
  }

  // Same value again: keep the original timestamp so repeats are no-ops.
  if (hasOwn(judgments, itemId) && judgments[itemId].value === accepted) {
    return judgments;
  }

  return {
    ...judgments,
    [itemId]: { value: accepted, timestamp: now.toISOString() },
  };
}

export interface PriorJudgment {
  /** Exact id in the prior session, null when it had none */
  id: string | null;
  /** Id-independent identity, e.g. a pair's side tuple */
  signature?: string;
  value: unknown;
  timestamp?: string | null;
}

export interface MergeTarget {
  id: string;
  signature?: string;
}

/**
 * Match prior judgments to the current items: by exact id first, then by
 * signature. Invalid values and judgments with no matching item are dropped.
 * Later prior entries win over earlier ones for the same key.
 */
export function mergeJudgments(
  scale: JudgmentScale,
  prior: readonly PriorJudgment[],
  targets: readonly MergeTarget[]
): Judgments {
  const byId = new Map<string, PriorJudgment>();
  const bySignature = new Map<string, PriorJudgment>();
  for (const entry of prior) {
    if (entry.id !== null) byId.set(entry.id, entry);
    if (entry.signature !== undefined) bySignature.set(entry.signature, entry);
  }

  const merged: Array<[string, JudgmentRecord]> = [];
  for (const target of targets) {
    let match = byId.get(target.id);
    if (!match && target.signature !== undefined) {
      match = bySignature.get(target.signature);
    }
    if (!match) continue;

    const value = coerceJudgment(scale, match.value);
    if (value === undefined) continue;
    merged.push([target.id, { value, timestamp: match.timestamp || null }]);
  }
  return Object.fromEntries(merged);
}

/** Position of the first unjudged id, or order.length when all are judged. */
export function firstUnjudged(
  order: readonly string[],
  judgments: Judgments
): number {
  const idx = order.findIndex((id) => !isJudged(judgments, id));
  return idx === -1 ? order.length : idx;
}

export function countJudged(
  ids: readonly string[],
  judgments: Judgments
): number {
  return ids.filter((id) => isJudged(judgments, id)).length;
}
