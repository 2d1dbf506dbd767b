/**
 * Shared shapes for items, payloads and judgments.
 */

export type Scalar = string | number | boolean | null;

export type JsonValue = Scalar | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** Item content, opaque beyond display. */
export type Payload =
  | { kind: "scalar"; value: Scalar }
  | { kind: "sequence"; values: JsonValue[] }
  | { kind: "mapping"; entries: JsonObject };

export type JudgmentValue = number | string;

export interface JudgmentRecord {
  value: JudgmentValue;
  /** ISO 8601, null when a resumed export carried no timestamp */
  timestamp: string | null;
}

/** item id -> judgment; absent ids are unjudged */
export type Judgments = Record<string, JudgmentRecord>;

export interface JudgmentScale {
  name: "score" | "choice";
  values: readonly JudgmentValue[];
}

export const SCORE_SCALE: JudgmentScale = {
  name: "score",
  values: [0, 0.5, 1],
};

export const CHOICE_SCALE: JudgmentScale = {
  name: "choice",
  values: ["A", "B"],
};

export function scaleFor(name: JudgmentScale["name"]): JudgmentScale {
  return name === "choice" ? CHOICE_SCALE : SCORE_SCALE;
}

export function isScalar(value: unknown): value is Scalar {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function hasOwn<T extends object>(record: T, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key);
}

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Coerce a raw value onto the scale, or undefined when it is not a member.
 * Plain decimal strings are accepted on a numeric scale ("1.0" -> 1); hex,
 * exponent and bare-fraction forms are not.
 */
export function coerceJudgment(
  scale: JudgmentScale,
  raw: unknown
): JudgmentValue | undefined {
  let candidate: unknown = raw;
  if (typeof raw === "string" && scale.values.every((v) => typeof v === "number")) {
    const trimmed = raw.trim();
    candidate = DECIMAL_PATTERN.test(trimmed) ? Number(trimmed) : raw;
  }
  return scale.values.find((v) => v === candidate);
}

export function isJudged(judgments: Judgments, id: string): boolean {
  return hasOwn(judgments, id);
}

export function toPayload(value: JsonValue): Payload {
  if (Array.isArray(value)) return { kind: "sequence", values: value };
  if (isJsonObject(value)) return { kind: "mapping", entries: value };
  return { kind: "scalar", value };
}

export function fromPayload(payload: Payload): JsonValue {
  switch (payload.kind) {
    case "scalar":
      return payload.value;
    case "sequence":
      return payload.values;
    case "mapping":
      return payload.entries;
  }
}
