/**
 * Annotation session state and its event reducer.
 *
 * Every operator action becomes one event; handleEvent returns the next
 * state without touching the previous one. The state is plain JSON so it can
 * be stored between requests.
 *
 * Navigation: recording a judgment never moves the cursor. The judged item
 * becomes sticky and stays on screen under hideCompleted until the operator
 * moves away with next/prev, or jumps with resume.
 */

import { createHash } from "node:crypto";
import { v4 as uuidv4 } from "uuid";
import { ParseError, UnknownItemError, UnsupportedEventError } from "./errors";
import { normalizeItems, type NormalizedItems } from "./normalize";
import {
  clampCursor,
  isPermutationOf,
  resolveOrder,
  seededRandom,
  stepCursor,
  visibleIds,
  type Random,
  type VisibilityFilter,
} from "./order";
import {
  attachPrompts,
  loadComparisons,
  loadProgressCsv,
  loadPromptTable,
  pairItemId,
  pairPayload,
  pairSignatureFromPayload,
  pairTargets,
  progressToPrior,
  unresolvedReferences,
  type ResolvedPair,
} from "./pairs";
import {
  countJudged,
  firstUnjudged,
  mergeJudgments,
  recordJudgment,
  type MergeTarget,
  type PriorJudgment,
} from "./progress";
import {
  fromPayload,
  hasOwn,
  scaleFor,
  toPayload,
  CHOICE_SCALE,
  SCORE_SCALE,
  type JsonValue,
  type JudgmentRecord,
  type Judgments,
  type JudgmentScale,
  type JudgmentValue,
  type Payload,
} from "./types";

export type Ordering = "shuffled" | "source";

export interface Notice {
  level: "info" | "warning";
  message: string;
}

export interface SessionState {
  id: string;
  scale: JudgmentScale["name"];
  ordering: Ordering;
  ids: string[];
  payloads: Record<string, Payload>;
  /** Resolved pairs, choice sessions only */
  pairs: ResolvedPair[] | null;
  order: string[];
  judgments: Judgments;
  filter: VisibilityFilter;
  /** Index into the visible subsequence of order */
  cursor: number;
  /** sha256 of every upload already merged */
  processedUploads: string[];
  /** Messages produced by the last event */
  notices: Notice[];
}

export type SessionEvent =
  | { type: "load"; input: JsonValue }
  | { type: "upload"; fileName: string; content: string }
  | { type: "record"; itemId: string; value: unknown }
  | { type: "next" }
  | { type: "prev" }
  | { type: "resume" }
  | { type: "setHideCompleted"; hideCompleted: boolean };

export interface SessionOptions {
  id?: string;
  ordering?: Ordering;
  hideCompleted?: boolean;
  /** Reproducible shuffle; ignored when random is given */
  seed?: string;
  random?: Random;
}

export interface EventContext {
  now?: Date;
  random?: Random;
}

export interface PairwiseSources {
  promptsText: string;
  comparisonsText: string;
  comparisonsName: string;
  /** Prior progress CSV merged at creation, e.g. from PROGRESS_PATH */
  progressText?: string;
}

function randomFor(options: SessionOptions): Random | undefined {
  if (options.random) return options.random;
  return options.seed !== undefined ? seededRandom(options.seed) : undefined;
}

export function sessionScale(state: SessionState): JudgmentScale {
  return scaleFor(state.scale);
}

function orderFor(
  ids: readonly string[],
  candidates: ReadonlyArray<readonly string[] | null>,
  ordering: Ordering,
  random: Random | undefined
): string[] {
  for (const candidate of candidates) {
    if (candidate && isPermutationOf(candidate, ids)) return [...candidate];
  }
  return ordering === "source" ? [...ids] : resolveOrder(ids, null, random);
}

/** Cursor pointing at id when it is visible, otherwise fallback clamped. */
function anchorCursor(
  order: readonly string[],
  judgments: Judgments,
  filter: VisibilityFilter,
  id: string | null,
  fallback: number
): number {
  const visible = visibleIds(order, judgments, filter);
  const idx = id === null ? -1 : visible.indexOf(id);
  return idx >= 0 ? idx : clampCursor(fallback, visible.length);
}

function resumeCursor(
  order: readonly string[],
  judgments: Judgments,
  filter: VisibilityFilter
): number {
  const idx = firstUnjudged(order, judgments);
  return anchorCursor(order, judgments, filter, order[idx] ?? null, idx);
}

export function currentItemId(state: SessionState): string | null {
  const visible = visibleIds(state.order, state.judgments, state.filter);
  if (visible.length === 0) return null;
  return visible[clampCursor(state.cursor, visible.length)];
}

function targetsOf(state: Pick<SessionState, "ids" | "payloads">): MergeTarget[] {
  return state.ids.map((id) => ({
    id,
    signature: pairSignatureFromPayload(state.payloads[id]),
  }));
}

function priorFromNormalized(normalized: NormalizedItems): PriorJudgment[] {
  return Object.entries(normalized.prefilled).map(([id, record]) => {
    const payload = normalized.payloads.get(id);
    return {
      id,
      signature: payload ? pairSignatureFromPayload(payload) : undefined,
      value: record.value,
      timestamp: record.timestamp,
    };
  });
}

function progressNotice(source: string, count: number): Notice {
  return { level: "info", message: `Loaded prior progress (${source}): ${count}` };
}

export function createScoringSession(
  input: JsonValue,
  options: SessionOptions = {}
): SessionState {
  const normalized = normalizeItems(input, SCORE_SCALE);
  const ordering = options.ordering ?? "shuffled";
  const ids = normalized.ids;
  const payloads = Object.fromEntries(normalized.payloads);
  const order = orderFor(ids, [normalized.restoredOrder], ordering, randomFor(options));
  const judgments = mergeJudgments(
    SCORE_SCALE,
    priorFromNormalized(normalized),
    targetsOf({ ids, payloads })
  );
  const filter: VisibilityFilter = {
    hideCompleted: options.hideCompleted ?? false,
    stickyId: null,
  };

  const judged = countJudged(ids, judgments);
  return {
    id: options.id ?? uuidv4(),
    scale: "score",
    ordering,
    ids,
    payloads,
    pairs: null,
    order,
    judgments,
    filter,
    cursor: resumeCursor(order, judgments, filter),
    processedUploads: [],
    notices: judged > 0 ? [progressNotice("file", judged)] : [],
  };
}

export function createPairwiseSession(
  sources: PairwiseSources,
  options: SessionOptions = {}
): SessionState {
  const table = loadPromptTable(sources.promptsText);
  const pairs = attachPrompts(
    loadComparisons(sources.comparisonsText, sources.comparisonsName),
    table
  );
  const ordering = options.ordering ?? "source";
  const ids = pairs.map(pairItemId);
  const payloads: Record<string, Payload> = Object.fromEntries(
    pairs.map((p): [string, Payload] => [pairItemId(p), toPayload(pairPayload(p))])
  );
  const order = orderFor(ids, [], ordering, randomFor(options));
  const notices: Notice[] = [];

  let judgments: Judgments = {};
  if (sources.progressText !== undefined) {
    try {
      const rows = loadProgressCsv(sources.progressText);
      judgments = mergeJudgments(CHOICE_SCALE, progressToPrior(rows), pairTargets(pairs));
      notices.push(progressNotice("file", countJudged(ids, judgments)));
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      notices.push({ level: "warning", message: `Could not read progress file: ${err.message}` });
    }
  }

  const unresolved = pairs.filter((p) => unresolvedReferences(p).length > 0).length;
  if (unresolved > 0) {
    notices.push({
      level: "warning",
      message: `${unresolved} pair(s) reference prompts missing from the prompt table`,
    });
  }

  const filter: VisibilityFilter = {
    hideCompleted: options.hideCompleted ?? false,
    stickyId: null,
  };
  return {
    id: options.id ?? uuidv4(),
    scale: "choice",
    ordering,
    ids,
    payloads,
    pairs,
    order,
    judgments,
    filter,
    cursor: resumeCursor(order, judgments, filter),
    processedUploads: [],
    notices,
  };
}

function handleRecord(
  state: SessionState,
  itemId: string,
  value: unknown,
  now: Date
): SessionState {
  if (!hasOwn(state.payloads, itemId)) throw new UnknownItemError(itemId);

  const judgments = recordJudgment(state.judgments, sessionScale(state), itemId, value, now);
  const filter = { ...state.filter, stickyId: itemId };
  const cursor = anchorCursor(state.order, judgments, filter, itemId, state.cursor);

  if (
    judgments === state.judgments &&
    state.filter.stickyId === itemId &&
    cursor === state.cursor
  ) {
    return state;
  }
  return { ...state, judgments, filter, cursor, notices: [] };
}

function handleStep(state: SessionState, delta: number): SessionState {
  const visible = visibleIds(state.order, state.judgments, state.filter);
  const from = clampCursor(state.cursor, visible.length);
  const to = stepCursor(from, delta, visible.length);
  if (to === from) return state;

  const targetId = visible[to];
  const filter = {
    ...state.filter,
    stickyId: targetId === state.filter.stickyId ? targetId : null,
  };
  const cursor = anchorCursor(state.order, state.judgments, filter, targetId, to);
  return { ...state, filter, cursor, notices: [] };
}

function handleResume(state: SessionState): SessionState {
  const idx = firstUnjudged(state.order, state.judgments);
  if (idx === state.order.length) {
    return {
      ...state,
      notices: [{ level: "info", message: "All items completed." }],
    };
  }
  const filter = { ...state.filter, stickyId: null };
  return {
    ...state,
    filter,
    cursor: resumeCursor(state.order, state.judgments, filter),
    notices: [],
  };
}

function handleHideCompleted(state: SessionState, hideCompleted: boolean): SessionState {
  if (state.filter.hideCompleted === hideCompleted) return state;
  const filter: VisibilityFilter = { hideCompleted, stickyId: null };
  const cursor = anchorCursor(
    state.order,
    state.judgments,
    filter,
    currentItemId(state),
    state.cursor
  );
  return { ...state, filter, cursor, notices: [] };
}

function handleLoad(
  state: SessionState,
  input: JsonValue,
  random: Random | undefined
): SessionState {
  if (state.scale !== "score") {
    throw new UnsupportedEventError("load", state.scale);
  }
  const normalized = normalizeItems(input, SCORE_SCALE);
  const ids = normalized.ids;
  const payloads = Object.fromEntries(normalized.payloads);
  const order = orderFor(
    ids,
    [normalized.restoredOrder, state.order],
    state.ordering,
    random
  );

  const prefilled = mergeJudgments(
    SCORE_SCALE,
    priorFromNormalized(normalized),
    targetsOf({ ids, payloads })
  );
  // Judgments made in this session win over the loaded ones.
  const kept: Judgments = Object.fromEntries(
    ids
      .filter((id) => hasOwn(state.judgments, id))
      .map((id): [string, JudgmentRecord] => [id, state.judgments[id]])
  );
  const judgments = { ...prefilled, ...kept };

  const filter = { ...state.filter, stickyId: null };
  const previous = currentItemId(state);
  const cursor =
    previous !== null && hasOwn(payloads, previous)
      ? anchorCursor(order, judgments, filter, previous, 0)
      : resumeCursor(order, judgments, filter);

  return {
    ...state,
    ids,
    payloads,
    order,
    judgments,
    filter,
    cursor,
    notices: [{ level: "info", message: `Loaded ${ids.length} items` }],
  };
}

export function uploadHash(content: string): string {
  return createHash("sha256").update(content).digest("hex");
}

function readUpload(
  state: SessionState,
  fileName: string,
  content: string
): { prior: PriorJudgment[]; restoredOrder: string[] | null } {
  const scale = sessionScale(state);
  const csvFirst = state.scale === "choice" && fileName.toLowerCase().endsWith(".csv");

  if (!csvFirst) {
    let data: JsonValue | undefined;
    try {
      data = JSON.parse(content);
    } catch (err) {
      if (state.scale !== "choice") {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ParseError(`not valid JSON (${reason})`, fileName);
      }
    }
    if (data !== undefined) {
      const normalized = normalizeItems(data, scale);
      return {
        prior: priorFromNormalized(normalized),
        restoredOrder: normalized.restoredOrder,
      };
    }
  }

  return { prior: progressToPrior(loadProgressCsv(content)), restoredOrder: null };
}

function handleUpload(
  state: SessionState,
  fileName: string,
  content: string
): SessionState {
  const hash = uploadHash(content);
  if (state.processedUploads.includes(hash)) return state;
  const processedUploads = [...state.processedUploads, hash];

  let upload: ReturnType<typeof readUpload>;
  try {
    upload = readUpload(state, fileName, content);
  } catch (err) {
    if (!(err instanceof ParseError)) throw err;
    return {
      ...state,
      processedUploads,
      notices: [{ level: "warning", message: `Could not read uploaded progress: ${err.message}` }],
    };
  }

  const merged = mergeJudgments(sessionScale(state), upload.prior, targetsOf(state));
  const judgments = { ...merged, ...state.judgments };
  const order =
    upload.restoredOrder && isPermutationOf(upload.restoredOrder, state.ids)
      ? [...upload.restoredOrder]
      : state.order;
  const filter = { ...state.filter, stickyId: null };

  return {
    ...state,
    order,
    judgments,
    filter,
    cursor: resumeCursor(order, judgments, filter),
    processedUploads,
    notices: [progressNotice("uploaded", Object.keys(merged).length)],
  };
}

export function handleEvent(
  state: SessionState,
  event: SessionEvent,
  context: EventContext = {}
): SessionState {
  switch (event.type) {
    case "record":
      return handleRecord(state, event.itemId, event.value, context.now ?? new Date());
    case "next":
      return handleStep(state, 1);
    case "prev":
      return handleStep(state, -1);
    case "resume":
      return handleResume(state);
    case "setHideCompleted":
      return handleHideCompleted(state, event.hideCompleted);
    case "load":
      return handleLoad(state, event.input, context.random);
    case "upload":
      return handleUpload(state, event.fileName, event.content);
  }
}

export interface SessionView {
  sessionId: string;
  scale: JudgmentScale["name"];
  validValues: JudgmentValue[];
  total: number;
  judged: number;
  remaining: number;
  done: boolean;
  hideCompleted: boolean;
  visibleCount: number;
  cursor: number;
  current: {
    id: string;
    payload: JsonValue;
    judgment: JudgmentRecord | null;
    /** Banner messages for sides with no prompt text */
    unresolved: string[];
  } | null;
  notices: Notice[];
}

export function viewSession(state: SessionState): SessionView {
  const visible = visibleIds(state.order, state.judgments, state.filter);
  const cursor = clampCursor(state.cursor, visible.length);
  const judged = countJudged(state.ids, state.judgments);
  const id = visible.length > 0 ? visible[cursor] : null;

  let current: SessionView["current"] = null;
  if (id !== null) {
    const pair = state.pairs?.find((p) => pairItemId(p) === id);
    current = {
      id,
      payload: fromPayload(state.payloads[id]),
      judgment: hasOwn(state.judgments, id) ? state.judgments[id] : null,
      unresolved: pair ? unresolvedReferences(pair).map((e) => e.message) : [],
    };
  }

  return {
    sessionId: state.id,
    scale: state.scale,
    validValues: [...sessionScale(state).values],
    total: state.ids.length,
    judged,
    remaining: state.ids.length - judged,
    done: firstUnjudged(state.order, state.judgments) === state.order.length,
    hideCompleted: state.filter.hideCompleted,
    visibleCount: visible.length,
    cursor,
    current,
    notices: state.notices,
  };
}
