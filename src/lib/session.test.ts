import { describe, expect, it } from "vitest";
import { InvalidValueError, UnknownItemError, UnsupportedEventError } from "./errors";
import { buildExportDocument } from "./export";
import { seededRandom } from "./order";
import {
  createPairwiseSession,
  createScoringSession,
  currentItemId,
  handleEvent,
  viewSession,
  type SessionState,
} from "./session";

const now = new Date("2024-05-01T10:00:00.000Z");

function scoring(hideCompleted = false): SessionState {
  return createScoringSession(["a", "b", "c"], {
    id: "s1",
    ordering: "source",
    hideCompleted,
  });
}

function record(state: SessionState, itemId: string, value: unknown): SessionState {
  return handleEvent(state, { type: "record", itemId, value }, { now });
}

describe("createScoringSession", () => {
  it("starts at the first item of a shuffled order", () => {
    const state = createScoringSession(["a", "b", "c", "d"], {
      random: seededRandom("start"),
    });

    expect([...state.order].sort()).toEqual(["a", "b", "c", "d"]);
    expect(state.cursor).toBe(0);
    expect(currentItemId(state)).toBe(state.order[0]);
  });

  it("shuffles reproducibly from a seed", () => {
    const ids = ["a", "b", "c", "d", "e", "f"];
    const seeded = createScoringSession(ids, { seed: "batch-7" });

    expect(seeded.order).toEqual(
      createScoringSession(ids, { random: seededRandom("batch-7") }).order
    );
    expect(createScoringSession(ids, { seed: "batch-7" }).order).toEqual(seeded.order);
    expect([...seeded.order].sort()).toEqual(ids);
  });

  it("resumes at the first unjudged item of a prior export", () => {
    const state = createScoringSession(
      {
        scores: { b: 1, a: 0 },
        items_payloads: { a: "A", b: "B", c: "C" },
        meta: { order: ["b", "a", "c"] },
      },
      { ordering: "shuffled" }
    );

    expect(state.order).toEqual(["b", "a", "c"]);
    expect(currentItemId(state)).toBe("c");
    expect(state.notices).toEqual([
      { level: "info", message: "Loaded prior progress (file): 2" },
    ]);
  });
});

describe("record", () => {
  it("keeps the cursor on the judged item", () => {
    const state = record(scoring(), "a", 1);

    expect(state.judgments.a).toEqual({ value: 1, timestamp: "2024-05-01T10:00:00.000Z" });
    expect(currentItemId(state)).toBe("a");
    expect(state.filter.stickyId).toBe("a");
  });

  it("returns the same state when the same value is recorded again", () => {
    const once = record(scoring(), "a", 1);
    expect(record(once, "a", 1)).toBe(once);
  });

  it("rejects invalid values and unknown items", () => {
    const state = scoring();
    expect(() => record(state, "a", 2)).toThrow(InvalidValueError);
    expect(() => record(state, "zzz", 1)).toThrow(UnknownItemError);
  });
});

describe("navigation", () => {
  it("is a no-op at either end", () => {
    const start = scoring();
    expect(handleEvent(start, { type: "prev" })).toBe(start);

    const end = handleEvent(handleEvent(start, { type: "next" }), { type: "next" });
    expect(currentItemId(end)).toBe("c");
    expect(handleEvent(end, { type: "next" })).toBe(end);
  });

  it("keeps a just-judged item visible until the operator moves on", () => {
    const judged = record(scoring(true), "a", 0.5);
    expect(viewSession(judged).visibleCount).toBe(3);
    expect(currentItemId(judged)).toBe("a");

    const moved = handleEvent(judged, { type: "next" });
    expect(currentItemId(moved)).toBe("b");
    expect(moved.filter.stickyId).toBeNull();
    expect(viewSession(moved).visibleCount).toBe(2);
    expect(moved.cursor).toBe(0);
  });

  it("jumps to the first unjudged item on resume", () => {
    const state = record(record(scoring(), "a", 1), "b", 0);
    const resumed = handleEvent(state, { type: "resume" });

    expect(currentItemId(resumed)).toBe("c");
  });

  it("reports completion when resume finds nothing left", () => {
    const state = record(record(record(scoring(), "a", 1), "b", 0), "c", 0);
    const resumed = handleEvent(state, { type: "resume" });

    expect(resumed.notices).toEqual([{ level: "info", message: "All items completed." }]);
    expect(viewSession(resumed).done).toBe(true);
  });
});

describe("setHideCompleted", () => {
  it("clears the sticky item and re-derives the visible items", () => {
    const judged = record(scoring(), "a", 1);
    const hidden = handleEvent(judged, { type: "setHideCompleted", hideCompleted: true });

    expect(hidden.filter).toEqual({ hideCompleted: true, stickyId: null });
    expect(viewSession(hidden).visibleCount).toBe(2);
    expect(currentItemId(hidden)).toBe("b");
  });

  it("stays on the current item when it remains visible", () => {
    const atC = handleEvent(handleEvent(scoring(), { type: "next" }), { type: "next" });
    const hidden = handleEvent(atC, { type: "setHideCompleted", hideCompleted: true });

    expect(currentItemId(hidden)).toBe("c");
  });

  it("ignores a toggle to the current setting", () => {
    const state = scoring();
    expect(handleEvent(state, { type: "setHideCompleted", hideCompleted: false })).toBe(state);
  });
});

describe("upload", () => {
  const upload = (content: string) =>
    ({ type: "upload", fileName: "progress.json", content }) as const;

  it("merges an uploaded export once per distinct content", () => {
    const content = JSON.stringify({ judgments_by_id: { b: 1, zzz: 0 } });
    const first = handleEvent(scoring(), upload(content));

    expect(first.judgments).toEqual({ b: { value: 1, timestamp: null } });
    expect(first.notices).toEqual([
      { level: "info", message: "Loaded prior progress (uploaded): 1" },
    ]);
    expect(currentItemId(first)).toBe("a");
    expect(handleEvent(first, upload(content))).toBe(first);
  });

  it("keeps judgments made in the session over uploaded ones", () => {
    const state = record(scoring(), "b", 0);
    const merged = handleEvent(state, upload(JSON.stringify({ scores: { b: 1, c: 0.5 } })));

    expect(merged.judgments.b.value).toBe(0);
    expect(merged.judgments.c).toEqual({ value: 0.5, timestamp: null });
  });

  it("reports unreadable uploads without touching judgments", () => {
    const state = record(scoring(), "a", 1);
    const next = handleEvent(state, upload("{not json"));

    expect(next.judgments).toBe(state.judgments);
    expect(next.processedUploads).toHaveLength(1);
    expect(next.notices[0].level).toBe("warning");
    expect(next.notices[0].message).toMatch(/^Could not read uploaded progress: progress\.json: not valid JSON/);
  });
});

describe("load", () => {
  it("keeps the order and judgments of items that survive", () => {
    const state = record(scoring(), "b", 1);
    const reloaded = handleEvent(state, { type: "load", input: ["c", "b", "a"] });

    expect(reloaded.order).toEqual(["a", "b", "c"]);
    expect(reloaded.judgments.b.value).toBe(1);
    expect(currentItemId(reloaded)).toBe("b");
  });

  it("regenerates the order when the id set changes", () => {
    const reloaded = handleEvent(
      scoring(),
      { type: "load", input: ["a", "d"] },
      { random: seededRandom("reload") }
    );

    expect([...reloaded.order].sort()).toEqual(["a", "d"]);
    expect(reloaded.ids).toEqual(["a", "d"]);
  });
});

describe("round trip", () => {
  it("restores ids, order, payloads and judgments from an export", () => {
    const original = createScoringSession(
      [
        { id: "A-1", content: "first" },
        { id: "A-2", content: "second" },
        { id: "A-3", content: "third" },
      ],
      { random: seededRandom("round-trip") }
    );
    const judged = record(record(original, "item_1", 0.5), "item_2", 1);

    const exported = buildExportDocument(judged, now);
    const restored = createScoringSession(exported);

    expect(restored.order).toEqual(judged.order);
    expect(restored.payloads).toEqual(judged.payloads);
    expect(new Set(restored.ids)).toEqual(new Set(judged.ids));
    expect(restored.judgments).toEqual(judged.judgments);
  });

  it("keeps an item whose id is __proto__", () => {
    const judged = record(
      createScoringSession(["__proto__", "b"], { ordering: "source" }),
      "__proto__",
      1
    );

    const exported = JSON.parse(JSON.stringify(buildExportDocument(judged, now)));
    const restored = createScoringSession(exported);

    expect(restored.ids).toEqual(["__proto__", "b"]);
    expect(Object.keys(restored.judgments)).toEqual(["__proto__"]);
    expect(restored.judgments["__proto__"]).toEqual({
      value: 1,
      timestamp: "2024-05-01T10:00:00.000Z",
    });
    expect(currentItemId(restored)).toBe("b");
  });
});

describe("pairwise sessions", () => {
  const sources = {
    promptsText: '3,gptX,"p3","summary three"\n7,llamaY,"p7","summary seven"',
    comparisonsText:
      "RANDOMIZED ORDER: A: gptX[3], B: llamaY[7]\nRANDOMIZED ORDER: A: gptX[9], B: llamaY[2]",
    comparisonsName: "comparisons.txt",
  };

  it("presents pairs in source order and flags missing prompts", () => {
    const state = createPairwiseSession(sources, { id: "p1" });

    expect(state.order).toEqual(["0", "1"]);
    expect(state.notices).toEqual([
      { level: "warning", message: "1 pair(s) reference prompts missing from the prompt table" },
    ]);

    const view = viewSession(state);
    expect(view.current?.payload).toEqual({
      pair_id: 0,
      a_model: "gptX",
      a_index: 3,
      b_model: "llamaY",
      b_index: 7,
      a_text: "summary three",
      b_text: "summary seven",
    });
    expect(view.validValues).toEqual(["A", "B"]);

    const second = viewSession(handleEvent(state, { type: "next" }));
    expect(second.current?.unresolved).toEqual([
      "Prompt not found for gptX[9] in CSV.",
      "Prompt not found for llamaY[2] in CSV.",
    ]);
  });

  it("merges a progress file and resumes after it", () => {
    const state = createPairwiseSession({
      ...sources,
      progressText: "pair_id,a_model,a_index,b_model,b_index,choice,timestamp\n0,gptX,3,llamaY,7,B,t0\n",
    });

    expect(state.judgments).toEqual({ "0": { value: "B", timestamp: "t0" } });
    expect(currentItemId(state)).toBe("1");
  });

  it("reads an uploaded progress CSV by signature", () => {
    const state = createPairwiseSession(sources);
    const next = handleEvent(state, {
      type: "upload",
      fileName: "progress.csv",
      content: "pair_id,a_model,a_index,b_model,b_index,choice\n,gptX,9,llamaY,2,A\n",
    });

    expect(next.judgments["1"].value).toBe("A");
    expect(currentItemId(next)).toBe("0");
  });

  it("keeps its judgments when an uploaded CSV has an unterminated quote", () => {
    const state = record(createPairwiseSession(sources), "1", "B");
    const next = handleEvent(state, {
      type: "upload",
      fileName: "progress.csv",
      content: [
        "pair_id,a_model,a_index,b_model,b_index,choice,timestamp",
        '0,gptX,3,llamaY,7,B,"t0',
        "1,gptX,9,llamaY,2,A,t1",
      ].join("\n"),
    });

    expect(next.judgments).toBe(state.judgments);
    expect(next.notices).toHaveLength(1);
    expect(next.notices[0].level).toBe("warning");
    expect(next.notices[0].message).toMatch(
      /^Could not read uploaded progress: Progress CSV: /
    );
  });

  it("rejects a score on a choice session", () => {
    const state = createPairwiseSession(sources);
    expect(() => record(state, "0", 1)).toThrow(InvalidValueError);
  });

  it("does not accept a new item source", () => {
    const state = createPairwiseSession(sources);
    expect(() => handleEvent(state, { type: "load", input: ["x"] })).toThrow(
      UnsupportedEventError
    );
  });
});
