/**
 * Sentence-level annotation: split texts, rate each sentence, append the
 * result to a JSON array file.
 */

import fs from "fs";
import path from "path";
import { z } from "zod";
import { RatingCountError } from "./errors";
import { readJsonFile } from "./files";
import { isJsonObject, type JsonValue } from "./types";

export interface TextEntry {
  id: string;
  text: string;
}

export const RATING_DIMENSIONS = ["novelty", "feasibility", "relevance", "interest"] as const;

const rating = z.number().int().min(1).max(5);

export const sentenceRatingsSchema = z.object({
  novelty: rating,
  feasibility: rating,
  relevance: rating,
  interest: rating,
});

export type SentenceRatings = z.infer<typeof sentenceRatingsSchema>;

export type SentenceAnnotation = {
  text_id: string;
  text: string;
  timestamp: string;
  sentences: Array<{ index: number; text: string; labels: SentenceRatings }>;
  feedback: string;
  categories_available: string[];
  allow_multi_category: boolean;
};

// Split on whitespace after . ? ! unless the period follows a single-letter initial.
const SENTENCE_BOUNDARY = /(?<!\b[A-Z]\.)(?<=[.?!])\s+/;

export function splitSentences(text: string): string[] {
  const trimmed = text.trim();
  if (!trimmed) return [];
  return trimmed
    .split(SENTENCE_BOUNDARY)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/** Accepts a list of strings and `{ id?, text }` objects; anything else is skipped. */
export function parseTextEntries(data: JsonValue): TextEntry[] {
  if (!Array.isArray(data)) return [];
  const entries: TextEntry[] = [];
  data.forEach((entry, i) => {
    if (typeof entry === "string") {
      entries.push({ id: String(i), text: entry });
    } else if (isJsonObject(entry) && typeof entry.text === "string") {
      const id = entry.id;
      entries.push({
        id: typeof id === "string" || typeof id === "number" ? String(id) : String(i),
        text: entry.text,
      });
    }
  });
  return entries;
}

/** A missing file means nothing to annotate; malformed JSON throws ParseError. */
export function loadTextEntries(filePath: string): TextEntry[] {
  if (!fs.existsSync(filePath)) return [];
  return parseTextEntries(readJsonFile(filePath));
}

export function buildSentenceAnnotation(
  entry: TextEntry,
  ratings: unknown[],
  feedback: string,
  categories: string[],
  now: Date = new Date()
): SentenceAnnotation {
  const sentences = splitSentences(entry.text);
  if (ratings.length !== sentences.length) {
    throw new RatingCountError(sentences.length, ratings.length);
  }
  return {
    text_id: entry.id,
    text: entry.text,
    timestamp: now.toISOString(),
    sentences: sentences.map((text, index) => ({
      index,
      text,
      labels: sentenceRatingsSchema.parse(ratings[index]),
    })),
    feedback: feedback.trim(),
    categories_available: categories,
    allow_multi_category: true,
  };
}

/** Append to a JSON array on disk; a missing or non-array file starts a new array. */
export function appendAnnotation(filePath: string, record: SentenceAnnotation): number {
  let existing: JsonValue[] = [];
  if (fs.existsSync(filePath)) {
    try {
      const parsed: JsonValue = JSON.parse(fs.readFileSync(filePath, "utf-8"));
      if (Array.isArray(parsed)) existing = parsed;
    } catch (err) {
      console.warn(`Replacing unreadable annotations file ${filePath}:`, err);
    }
  }

  const next: JsonValue[] = [...existing, record];
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(next, null, 2), "utf-8");
  return next.length;
}
