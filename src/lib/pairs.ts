/**
 * Pairwise comparison loading for the A/B chooser.
 *
 * Comparisons come either as free text with repeated
 * `RANDOMIZED ORDER: A: model[3], B: model[7]` lines, or as a CSV with one
 * row per pair. Each side is resolved to display text through a prompt table
 * keyed by (model, index).
 */

import Papa, { type ParseError as CsvError } from "papaparse";
import { ParseError, UnresolvedReferenceError } from "./errors";
import type { MergeTarget, PriorJudgment } from "./progress";
import type { JsonObject, Judgments, Payload } from "./types";

export interface PairRef {
  model: string;
  index: number;
}

export interface Pair {
  /** 0-based position in the parsed comparisons */
  pairId: number;
  a: PairRef;
  b: PairRef;
  aSummary?: string;
  bSummary?: string;
}

export type PairText =
  | { kind: "resolved"; text: string }
  | { kind: "missing"; ref: PairRef };

export interface ResolvedPair extends Pair {
  aText: PairText;
  bText: PairText;
}

/** `model[index]` -> summary text */
export type PromptTable = Map<string, string>;

export interface ProgressRow {
  pairId: number | null;
  a: PairRef;
  b: PairRef;
  choice: string;
  timestamp: string;
}

export const PROGRESS_FIELDS = [
  "pair_id",
  "a_model",
  "a_index",
  "b_model",
  "b_index",
  "choice",
  "timestamp",
  "a_prompt",
  "b_prompt",
] as const;

const PAIR_PATTERN =
  /RANDOMIZED ORDER:\s*A:\s*(?<aModel>[A-Za-z0-9_\-]+)\[(?<aIdx>\d+)\]\s*,\s*B:\s*(?<bModel>[A-Za-z0-9_\-]+)\[(?<bIdx>\d+)\]/gi;

const MODEL_INDEX_PATTERN = /^([^[]+)\[(\d+)\]/;

const INTEGER_PATTERN = /^[+-]?\d+$/;

export const normalizeHeader = (value: string) =>
  value.trim().toLowerCase().replace(/[\s_-]+/g, "");

export function refKey(ref: PairRef): string {
  return `${ref.model}[${ref.index}]`;
}

export function pairSignature(a: PairRef, b: PairRef): string {
  return JSON.stringify([a.model, a.index, b.model, b.index]);
}

function parseInteger(value: string): number | null {
  const trimmed = value.trim();
  return INTEGER_PATTERN.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
}

export function parseModelIndex(value: string): PairRef | null {
  const match = MODEL_INDEX_PATTERN.exec(value.trim());
  if (!match) return null;
  return { model: match[1], index: Number.parseInt(match[2], 10) };
}

/**
 * An unbalanced quote makes Papa fold the rest of the file into one field,
 * so quote errors fail the load. Ragged rows (FieldMismatch) are tolerated.
 */
function assertBalancedQuotes(errors: CsvError[], what: string): void {
  const quoteError = errors.find((e) => e.type === "Quotes");
  if (quoteError) {
    throw new ParseError(
      `${what}: ${quoteError.message} (row ${(quoteError.row ?? 0) + 1})`
    );
  }
}

export function loadPromptTable(text: string): PromptTable {
  const parsed = Papa.parse<string[]>(text, {
    delimiter: ",",
    skipEmptyLines: true,
  });
  assertBalancedQuotes(parsed.errors, "Prompts CSV");
  const rows = parsed.data;
  if (rows.length === 0) {
    throw new ParseError("Prompts CSV is empty.");
  }

  const first = (rows[0][0] ?? "").trim();
  const hasHeader =
    !first || !/^\d+$/.test(first) || normalizeHeader(first).includes("index");

  const table: PromptTable = new Map();
  for (const row of hasHeader ? rows.slice(1) : rows) {
    // index, model, prompt, summary: the summary is what gets shown
    if (row.length < 4) continue;
    const index = parseInteger(row[0]);
    if (index === null) continue;
    table.set(refKey({ model: row[1].trim(), index }), row[3]);
  }
  return table;
}

export function parsePairsText(text: string): Pair[] {
  const pairs: Pair[] = [];
  for (const match of text.matchAll(PAIR_PATTERN)) {
    const groups = match.groups;
    if (!groups) continue;
    pairs.push({
      pairId: pairs.length,
      a: { model: groups.aModel, index: Number.parseInt(groups.aIdx, 10) },
      b: { model: groups.bModel, index: Number.parseInt(groups.bIdx, 10) },
    });
  }
  return pairs;
}

export function parsePairsCsv(text: string): Pair[] {
  const parsed = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    delimiter: ",",
    skipEmptyLines: true,
  });
  assertBalancedQuotes(parsed.errors, "Comparisons CSV");
  const fields = parsed.meta.fields;
  if (!fields || fields.length === 0) {
    throw new ParseError("Comparisons CSV missing header row.");
  }

  const headerMap = new Map<string, string>();
  for (const field of fields) headerMap.set(normalizeHeader(field), field);

  // First matching column wins, even when its cell is blank.
  const get = (row: Record<string, string | undefined>, options: string[]) => {
    for (const option of options) {
      const header = headerMap.get(normalizeHeader(option));
      if (header !== undefined) return (row[header] ?? "").trim();
    }
    return "";
  };

  const pairs: Pair[] = [];
  for (const row of parsed.data) {
    const itemA = get(row, ["item_a"]);
    const itemB = get(row, ["item_b"]);

    if (itemA && itemB) {
      const a = parseModelIndex(itemA);
      const b = parseModelIndex(itemB);
      if (!a || !b) continue;
      const pair: Pair = { pairId: pairs.length, a, b };
      const summaryA = get(row, ["summary_a"]);
      const summaryB = get(row, ["summary_b"]);
      if (summaryA) pair.aSummary = summaryA;
      if (summaryB) pair.bSummary = summaryB;
      pairs.push(pair);
      continue;
    }

    const aModel = get(row, ["a_model", "a", "a_model_name"]);
    const bModel = get(row, ["b_model", "b", "b_model_name"]);
    const aIdx = parseInteger(get(row, ["a_index", "a_idx"]));
    const bIdx = parseInteger(get(row, ["b_index", "b_idx"]));
    if (!aModel || !bModel || aIdx === null || bIdx === null) continue;

    pairs.push({
      pairId: pairs.length,
      a: { model: aModel, index: aIdx },
      b: { model: bModel, index: bIdx },
    });
  }
  return pairs;
}

/**
 * Parse a comparisons file. A `.csv` name tries the table layout first; the
 * RANDOMIZED ORDER pattern and the table layout are then tried in turn.
 */
export function loadComparisons(text: string, fileName: string): Pair[] {
  let pairs: Pair[] = [];
  if (fileName.toLowerCase().endsWith(".csv")) {
    try {
      pairs = parsePairsCsv(text);
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
    }
  }
  if (pairs.length === 0) {
    pairs = parsePairsText(text);
  }
  if (pairs.length === 0) {
    pairs = parsePairsCsv(text);
  }
  if (pairs.length === 0) {
    throw new ParseError("No pairs found in comparisons file.", fileName);
  }
  return pairs;
}

function resolveSide(
  ref: PairRef,
  inline: string | undefined,
  table: PromptTable
): PairText {
  if (inline) return { kind: "resolved", text: inline };
  const text = table.get(refKey(ref));
  return text === undefined ? { kind: "missing", ref } : { kind: "resolved", text };
}

export function attachPrompts(pairs: Pair[], table: PromptTable): ResolvedPair[] {
  return pairs.map((p) => ({
    ...p,
    aText: resolveSide(p.a, p.aSummary, table),
    bText: resolveSide(p.b, p.bSummary, table),
  }));
}

export function unresolvedReferences(pair: ResolvedPair): UnresolvedReferenceError[] {
  const errors: UnresolvedReferenceError[] = [];
  for (const side of [pair.aText, pair.bText]) {
    if (side.kind === "missing") {
      errors.push(new UnresolvedReferenceError(side.ref.model, side.ref.index));
    }
  }
  return errors;
}

export function textOf(side: PairText): string | null {
  return side.kind === "resolved" ? side.text : null;
}

export function pairItemId(pair: Pair): string {
  return String(pair.pairId);
}

export function pairPayload(pair: ResolvedPair): JsonObject {
  return {
    pair_id: pair.pairId,
    a_model: pair.a.model,
    a_index: pair.a.index,
    b_model: pair.b.model,
    b_index: pair.b.index,
    a_text: textOf(pair.aText),
    b_text: textOf(pair.bText),
  };
}

export function loadProgressCsv(text: string): ProgressRow[] {
  const parsed = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    delimiter: ",",
    skipEmptyLines: true,
  });
  assertBalancedQuotes(parsed.errors, "Progress CSV");

  return parsed.data.map((row, i) => {
    const field = (name: string) => (row[name] ?? "").trim();
    const index = (name: string) => {
      const raw = field(name);
      if (!raw) return 0;
      const value = parseInteger(raw);
      if (value === null) {
        throw new ParseError(`row ${i + 1}: ${name} is not an integer (${raw})`);
      }
      return value;
    };

    return {
      pairId: parseInteger(field("pair_id")),
      a: { model: field("a_model"), index: index("a_index") },
      b: { model: field("b_model"), index: index("b_index") },
      choice: field("choice"),
      timestamp: field("timestamp"),
    };
  });
}

export function progressToPrior(rows: readonly ProgressRow[]): PriorJudgment[] {
  return rows.map((r) => ({
    id: r.pairId === null ? null : String(r.pairId),
    signature: pairSignature(r.a, r.b),
    value: r.choice,
    timestamp: r.timestamp || null,
  }));
}

export function pairTargets(pairs: readonly Pair[]): MergeTarget[] {
  return pairs.map((p) => ({
    id: pairItemId(p),
    signature: pairSignature(p.a, p.b),
  }));
}

export function exportProgressCsv(
  pairs: readonly ResolvedPair[],
  judgments: Judgments
): string {
  const data = pairs.map((p) => {
    const judgment = judgments[pairItemId(p)];
    return [
      p.pairId,
      p.a.model,
      p.a.index,
      p.b.model,
      p.b.index,
      judgment?.value ?? "",
      judgment?.timestamp ?? "",
      textOf(p.aText) ?? "",
      textOf(p.bText) ?? "",
    ];
  });
  return Papa.unparse({ fields: [...PROGRESS_FIELDS], data });
}

/** Signature of a pair payload from an exported session, if it carries one. */
export function pairSignatureFromPayload(payload: Payload): string | undefined {
  if (payload.kind !== "mapping") return undefined;
  const { a_model, a_index, b_model, b_index } = payload.entries;
  if (
    typeof a_model !== "string" ||
    typeof a_index !== "number" ||
    typeof b_model !== "string" ||
    typeof b_index !== "number"
  ) {
    return undefined;
  }
  return pairSignature(
    { model: a_model, index: a_index },
    { model: b_model, index: b_index }
  );
}
