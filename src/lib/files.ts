import fs from "fs";
import path from "path";
import { InputNotFoundError, ParseError } from "./errors";
import type { JsonValue } from "./types";

export function readTextFile(filePath: string): string {
  if (!fs.existsSync(filePath)) {
    throw new InputNotFoundError(filePath);
  }
  return fs.readFileSync(filePath, "utf-8");
}

export function readJsonFile(filePath: string): JsonValue {
  const text = readTextFile(filePath);
  try {
    const data: JsonValue = JSON.parse(text);
    return data;
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ParseError(`invalid JSON (${reason})`, path.basename(filePath));
  }
}
