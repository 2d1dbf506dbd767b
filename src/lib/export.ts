/**
 * Session exports: the resumable JSON document and the flat CSVs used for
 * downstream analysis.
 */

import Papa from "papaparse";
import { normalizeItems } from "./normalize";
import { exportProgressCsv } from "./pairs";
import { sessionScale, type SessionState } from "./session";
import {
  fromPayload,
  hasOwn,
  SCORE_SCALE,
  type JsonObject,
  type JsonValue,
  type JudgmentValue,
} from "./types";

export type ExportDocument = {
  judgments_by_id: Record<string, JudgmentValue>;
  judged_at: Record<string, string>;
  order: string[];
  item_payloads: Record<string, JsonValue>;
  metadata: {
    generated_at: string;
    count: number;
    judged: number;
    scale: string;
    valid_values: JudgmentValue[];
  };
};

export const SCORE_FIELDS = ["item", "id", "content", "score"] as const;

/**
 * Everything needed to resume exactly: order, payloads and judgments, with no
 * reference back to the original input file.
 */
export function buildExportDocument(
  state: SessionState,
  now: Date = new Date()
): ExportDocument {
  // Ids may be "__proto__", so no plain assignment into object literals.
  const judged = state.order.filter((id) => hasOwn(state.judgments, id));
  const judgmentsById: Record<string, JudgmentValue> = Object.fromEntries(
    judged.map((id): [string, JudgmentValue] => [id, state.judgments[id].value])
  );
  const judgedAt: Record<string, string> = Object.fromEntries(
    judged.flatMap((id): Array<[string, string]> => {
      const stamp = state.judgments[id].timestamp;
      return stamp ? [[id, stamp]] : [];
    })
  );
  const itemPayloads: Record<string, JsonValue> = Object.fromEntries(
    state.order.map((id): [string, JsonValue] => [id, fromPayload(state.payloads[id])])
  );

  const scale = sessionScale(state);
  return {
    judgments_by_id: judgmentsById,
    judged_at: judgedAt,
    order: [...state.order],
    item_payloads: itemPayloads,
    metadata: {
      generated_at: now.toISOString(),
      count: state.order.length,
      judged: judged.length,
      scale: scale.name,
      valid_values: [...scale.values],
    },
  };
}

function cell(value: JsonValue | undefined): string {
  if (value === undefined || value === null) return "";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

/** Whole scores keep one decimal place: "1.0", "0.0". */
export function formatScore(value: JudgmentValue): string {
  if (typeof value === "number" && Number.isInteger(value)) return value.toFixed(1);
  return String(value);
}

/**
 * Flatten a score export into `item,id,content,score` rows, every field
 * quoted. Rows follow the exported order when there is one.
 */
export function flattenScoresCsv(exported: JsonValue): string {
  const normalized = normalizeItems(exported, SCORE_SCALE);
  const items = normalized.restoredOrder ?? normalized.ids;

  const data = items.map((item) => {
    const payload = normalized.payloads.get(item);
    const entries: JsonObject = payload?.kind === "mapping" ? payload.entries : {};
    const score = hasOwn(normalized.prefilled, item)
      ? formatScore(normalized.prefilled[item].value)
      : "";
    return [item, cell(entries.id), cell(entries.content), score];
  });

  return Papa.unparse({ fields: [...SCORE_FIELDS], data }, { quotes: true });
}

/** Pairwise sessions export their progress CSV, scoring sessions the score CSV. */
export function exportSessionCsv(state: SessionState, now: Date = new Date()): string {
  if (state.pairs) return exportProgressCsv(state.pairs, state.judgments);
  return flattenScoresCsv(buildExportDocument(state, now));
}
