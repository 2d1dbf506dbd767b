/**
 * Runtime configuration from environment variables.
 */

import path from "path";
import { z } from "zod";

export const DEFAULT_CATEGORIES = [
  "Factual claim",
  "Opinion",
  "Emotion",
  "Actionable instruction",
  "Other",
];

export interface AppConfig {
  databasePath: string;
  itemsPath: string;
  promptsPath: string; // index, model, prompt, summary
  comparisonsPath: string; // RANDOMIZED ORDER text, or a CSV of pairs
  progressPath: string | null;
  autosavePath: string | null;
  textsPath: string;
  annotationsPath: string;
  categories: string[];
}

const categoriesSchema = z.array(z.string().min(1)).min(1);

function parseCategories(raw: string | undefined): string[] {
  if (!raw) return DEFAULT_CATEGORIES;
  try {
    const parsed = categoriesSchema.safeParse(JSON.parse(raw));
    if (parsed.success) return parsed.data;
    console.warn("CATEGORIES must be a JSON array of labels, using defaults");
  } catch (err) {
    console.warn("CATEGORIES is not valid JSON, using defaults:", err);
  }
  return DEFAULT_CATEGORIES;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const root = process.cwd();
  return {
    databasePath: env.DATABASE_PATH || path.join(root, "data", "judgment-desk.db"),
    itemsPath: env.ITEMS_PATH || path.join(root, "data", "items.json"),
    promptsPath: env.PROMPTS_PATH || path.join(root, "data", "original.csv"),
    comparisonsPath:
      env.COMPARISONS_PATH || path.join(root, "data", "llama_outputs_summary.csv"),
    progressPath: env.PROGRESS_PATH || null,
    autosavePath: env.AUTOSAVE_PATH || null,
    textsPath: env.TEXTS_PATH || path.join(root, "data", "input_texts.json"),
    annotationsPath: env.ANNOTATIONS_PATH || path.join(root, "data", "annotations.json"),
    categories: parseCategories(env.CATEGORIES),
  };
}
