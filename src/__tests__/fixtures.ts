import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { CallRecord } from "../core/types.js";
import { encodeCallRecord } from "../storage/call-codec.js";

/** 2024-01-01T00:00Z plus n minutes */
export function minutes(n: number): string {
  return new Date(Date.UTC(2024, 0, 1, 0, n)).toISOString();
}

export function makeRecord(sequenceId: number, overrides: Partial<CallRecord> = {}): CallRecord {
  return Object.freeze({
    sequenceId,
    toolName: "read_file",
    category: "filesystem",
    arguments: { path: `file-${sequenceId}.txt` },
    output: { ok: true },
    succeeded: true,
    timestamp: minutes(sequenceId),
    sessionId: "session-1",
    ...overrides,
  });
}

export function makeRecords(count: number, overrides: Partial<CallRecord> = {}): CallRecord[] {
  return Array.from({ length: count }, (_, i) => makeRecord(i + 1, overrides));
}

/** Write records as a history log, optionally followed by raw text. */
export async function writeLog(filePath: string, records: CallRecord[], trailing = ""): Promise<void> {
  const body = records.map((record) => JSON.stringify(encodeCallRecord(record)) + "\n").join("");
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, body + trailing, "utf-8");
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "calltrail-"));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}
