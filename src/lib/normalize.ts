/**
 * Item normalization.
 * Turns whatever JSON the operator loads (a plain list, a keyed mapping or a
 * prior export) into ids, payloads and prefilled judgments.
 */

import {
  coerceJudgment,
  isJsonObject,
  isScalar,
  toPayload,
  type JsonObject,
  type JsonValue,
  type JudgmentRecord,
  type Judgments,
  type JudgmentScale,
  type Payload,
  type Scalar,
} from "./types";

export const JUDGMENT_KEYS = ["judgments_by_id", "judgments", "scores"] as const;
export const PAYLOAD_KEYS = ["item_payloads", "items_payloads"] as const;

export interface NormalizedItems {
  ids: string[];
  payloads: Map<string, Payload>;
  prefilled: Judgments;
  /** Presentation order carried by a prior export, unvalidated */
  restoredOrder: string[] | null;
}

function firstObjectAt(
  input: JsonObject,
  keys: readonly string[]
): JsonObject | undefined {
  for (const key of keys) {
    const value = input[key];
    if (isJsonObject(value)) return value;
  }
  return undefined;
}

function stringArray(value: JsonValue | undefined): string[] | null {
  if (!Array.isArray(value)) return null;
  const out: string[] = [];
  for (const entry of value) {
    if (typeof entry !== "string") return null;
    out.push(entry);
  }
  return out;
}

function readOrder(input: JsonObject): string[] | null {
  const direct = stringArray(input.order);
  if (direct) return direct;
  for (const key of ["metadata", "meta"]) {
    const block = input[key];
    if (isJsonObject(block)) {
      const nested = stringArray(block.order);
      if (nested) return nested;
    }
  }
  return null;
}

function fromPriorExport(
  input: JsonObject,
  judgmentMap: JsonObject,
  scale: JudgmentScale
): NormalizedItems {
  const judgedAt = new Map(
    Object.entries(isJsonObject(input.judged_at) ? input.judged_at : {})
  );

  const prefilled: Judgments = Object.fromEntries(
    Object.entries(judgmentMap).flatMap(([id, raw]): Array<[string, JudgmentRecord]> => {
      const value = coerceJudgment(scale, raw);
      if (value === undefined) return [];
      const stamp = judgedAt.get(id);
      return [[id, { value, timestamp: typeof stamp === "string" && stamp ? stamp : null }]];
    })
  );

  const payloads = new Map<string, Payload>();
  const embedded = firstObjectAt(input, PAYLOAD_KEYS);
  if (embedded) {
    for (const [id, value] of Object.entries(embedded)) {
      payloads.set(id, toPayload(value));
    }
  } else {
    for (const id of Object.keys(judgmentMap)) {
      payloads.set(id, { kind: "scalar", value: id });
    }
  }

  return {
    ids: [...payloads.keys()],
    payloads,
    prefilled,
    restoredOrder: readOrder(input),
  };
}

function fromMapping(input: JsonObject): NormalizedItems {
  const payloads = new Map<string, Payload>();
  for (const [id, value] of Object.entries(input)) {
    payloads.set(id, toPayload(value ?? id));
  }
  return { ids: [...payloads.keys()], payloads, prefilled: {}, restoredOrder: null };
}

function fromScalars(input: Scalar[]): NormalizedItems {
  const payloads = new Map<string, Payload>();
  for (const value of input) {
    // Map.set keeps the first position and takes the last value.
    payloads.set(String(value), { kind: "scalar", value });
  }
  return { ids: [...payloads.keys()], payloads, prefilled: {}, restoredOrder: null };
}

function fromSequence(input: JsonValue[]): NormalizedItems {
  const payloads = new Map<string, Payload>();
  input.forEach((value, i) => {
    payloads.set(`item_${i}`, toPayload(value));
  });
  return { ids: [...payloads.keys()], payloads, prefilled: {}, restoredOrder: null };
}

export function normalizeItems(
  input: JsonValue,
  scale: JudgmentScale
): NormalizedItems {
  if (isJsonObject(input)) {
    const judgmentMap = firstObjectAt(input, JUDGMENT_KEYS);
    if (judgmentMap) return fromPriorExport(input, judgmentMap, scale);
    return fromMapping(input);
  }

  if (Array.isArray(input)) {
    if (input.every(isScalar)) return fromScalars(input);
    return fromSequence(input);
  }

  const payloads = new Map<string, Payload>([["item_0", toPayload(input)]]);
  return { ids: ["item_0"], payloads, prefilled: {}, restoredOrder: null };
}
