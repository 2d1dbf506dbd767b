import { describe, expect, it } from "vitest";
import { normalizeItems } from "./normalize";
import { SCORE_SCALE } from "./types";

describe("normalizeItems", () => {
  it("reads a prior export with embedded payloads and order", () => {
    const result = normalizeItems(
      {
        judgments: { item_0: 1, item_1: 0.7, item_2: "0.5" },
        judged_at: { item_0: "2024-03-01T09:00:00.000Z" },
        item_payloads: { item_0: { content: "a" }, item_1: "b", item_2: null },
        order: ["item_2", "item_0", "item_1"],
      },
      SCORE_SCALE
    );

    expect(result.ids).toEqual(["item_0", "item_1", "item_2"]);
    expect(result.prefilled).toEqual({
      item_0: { value: 1, timestamp: "2024-03-01T09:00:00.000Z" },
      item_2: { value: 0.5, timestamp: null },
    });
    expect(result.restoredOrder).toEqual(["item_2", "item_0", "item_1"]);
    expect(result.payloads.get("item_0")).toEqual({
      kind: "mapping",
      entries: { content: "a" },
    });
    expect(result.payloads.get("item_2")).toEqual({ kind: "scalar", value: null });
  });

  it("falls back to judgment keys when no payload map is embedded", () => {
    const result = normalizeItems(
      { scores: { x: 1, y: 0 }, meta: { order: ["y", "x"] } },
      SCORE_SCALE
    );

    expect(result.ids).toEqual(["x", "y"]);
    expect(result.payloads.get("x")).toEqual({ kind: "scalar", value: "x" });
    expect(result.restoredOrder).toEqual(["y", "x"]);
    expect(result.prefilled.y).toEqual({ value: 0, timestamp: null });
  });

  it("ignores an order that is not a list of strings", () => {
    const result = normalizeItems({ scores: { x: 1 }, order: ["x", 2] }, SCORE_SCALE);
    expect(result.restoredOrder).toBeNull();
  });

  it("treats a judgment key holding a list as an ordinary mapping key", () => {
    const result = normalizeItems({ scores: [1, 2] }, SCORE_SCALE);

    expect(result.ids).toEqual(["scores"]);
    expect(result.payloads.get("scores")).toEqual({ kind: "sequence", values: [1, 2] });
    expect(result.prefilled).toEqual({});
  });

  it("uses mapping keys as ids and the key itself for null values", () => {
    const result = normalizeItems({ a: "text", b: null, c: [1, 2] }, SCORE_SCALE);

    expect(result.ids).toEqual(["a", "b", "c"]);
    expect(result.payloads.get("a")).toEqual({ kind: "scalar", value: "text" });
    expect(result.payloads.get("b")).toEqual({ kind: "scalar", value: "b" });
    expect(result.payloads.get("c")).toEqual({ kind: "sequence", values: [1, 2] });
  });

  it("collapses duplicate scalars, keeping first position and last value", () => {
    const result = normalizeItems(["x", 1, "1", "x"], SCORE_SCALE);

    expect(result.ids).toEqual(["x", "1"]);
    expect(result.payloads.get("1")).toEqual({ kind: "scalar", value: "1" });
  });

  it("synthesizes positional ids for lists with non-scalar entries", () => {
    const result = normalizeItems([1, { q: 2 }], SCORE_SCALE);

    expect(result.ids).toEqual(["item_0", "item_1"]);
    expect(result.payloads.get("item_0")).toEqual({ kind: "scalar", value: 1 });
    expect(result.payloads.get("item_1")).toEqual({ kind: "mapping", entries: { q: 2 } });
  });

  it("wraps a lone scalar as item_0", () => {
    const result = normalizeItems("hello", SCORE_SCALE);

    expect(result.ids).toEqual(["item_0"]);
    expect(result.payloads.get("item_0")).toEqual({ kind: "scalar", value: "hello" });
  });

  it("returns no items for an empty list", () => {
    expect(normalizeItems([], SCORE_SCALE).ids).toEqual([]);
  });
});
