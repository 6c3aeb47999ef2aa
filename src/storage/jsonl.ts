import fs from "node:fs/promises";
import path from "node:path";
import type { JsonObject } from "../core/types.js";
import { PersistenceError } from "../utils/errors.js";

export interface AppendOptions {
  /** Start the entry on a fresh line, for when the file may end mid-line. */
  leadingNewline?: boolean;
}

/**
 * Append a JSON object as a single line to a JSONL file and sync it to disk.
 * Creates parent directories if they don't exist.
 */
export async function appendJsonl(
  filePath: string,
  entry: JsonObject,
  options: AppendOptions = {},
): Promise<void> {
  const line = (options.leadingNewline ? "\n" : "") + JSON.stringify(entry) + "\n";
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const handle = await fs.open(filePath, "a");
    try {
      await handle.appendFile(line, "utf-8");
      await handle.datasync();
    } finally {
      await handle.close();
    }
  } catch (err) {
    throw new PersistenceError(`Failed to append to ${filePath}`, err);
  }
}

export interface JsonlLine {
  /** 1-based */
  lineNumber: number;
  text: string;
}

export interface JsonlContents {
  lines: JsonlLine[];
  /** False when the file is non-empty and its last line has no newline. */
  terminated: boolean;
}

/**
 * Read the raw, non-blank lines of a JSONL file without parsing them.
 * Returns no lines if the file doesn't exist.
 */
export async function readJsonlLines(filePath: string): Promise<JsonlContents> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      return { lines: [], terminated: true };
    }
    throw new PersistenceError(`Failed to read ${filePath}`, err);
  }

  const lines = content
    .split("\n")
    .map((text, i) => ({ lineNumber: i + 1, text }))
    .filter((line) => line.text.trim().length > 0);

  return { lines, terminated: content.length === 0 || content.endsWith("\n") };
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
