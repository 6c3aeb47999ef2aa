import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { runCli } from "../cli.js";
import { makeRecord, makeRecords, makeTempDir, removeDir, writeLog } from "./fixtures.js";

describe("runCli", () => {
  let dir: string;
  let out: string[];
  let err: string[];

  beforeEach(async () => {
    dir = await makeTempDir();
    out = [];
    err = [];
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  function run(...argv: string[]): Promise<number> {
    return runCli(argv, {
      env: { CALLTRAIL_CONFIG_DIR: dir, CALLTRAIL_SESSION_ID: "cli" },
      out: (line) => out.push(line),
      err: (line) => err.push(line),
    });
  }

  it("prints the history log location", async () => {
    expect(await run("path")).toBe(0);
    expect(out).toEqual([path.join(dir, "tool-history.jsonl")]);
  });

  it("lists the last N calls for a negative offset", async () => {
    await writeLog(path.join(dir, "tool-history.jsonl"), makeRecords(5));

    expect(await run("calls", "--offset=-2")).toBe(0);
    expect(out).toEqual([
      "Tool Call History\nCalls: 2 of 5 · Latest: read_file",
      '  #4 2024-01-01T00:04:00.000Z ok   read_file {"path":"file-4.txt"}',
      '  #5 2024-01-01T00:05:00.000Z ok   read_file {"path":"file-5.txt"}',
    ]);
  });

  it("prints nothing but the page as JSON with --json", async () => {
    await writeLog(path.join(dir, "tool-history.jsonl"), [
      ...makeRecords(3),
      makeRecord(4, { toolName: "bash", category: "terminal", succeeded: false }),
    ]);

    expect(await run("calls", "--offset=-2", "--max", "1", "--json")).toBe(0);

    const view = JSON.parse(out.join("\n"));
    expect(view.calls.map((call: { sequence_id: number }) => call.sequence_id)).toEqual([3]);
    expect(view.count).toBe(1);
    expect(view.total_matches).toBe(4);
    expect(view.has_more).toBe(true);
    expect(view.offset).toBe(-2);
    expect(view.max_results).toBe(1);
    expect(view.total_in_memory).toBe(4);
  });

  it("filters by tool name", async () => {
    await writeLog(path.join(dir, "tool-history.jsonl"), [
      makeRecord(1),
      makeRecord(2, { toolName: "bash", category: "terminal", succeeded: false }),
    ]);

    expect(await run("calls", "--tool", "bash")).toBe(0);
    expect(out).toEqual([
      "Tool Call History\nCalls: 1 of 1 · Latest: bash",
      '  #2 2024-01-01T00:02:00.000Z FAIL bash {"path":"file-2.txt"}',
    ]);
  });

  it("prints usage statistics as a summary and JSON", async () => {
    await writeLog(path.join(dir, "tool-history.jsonl"), [
      makeRecord(1),
      makeRecord(2, { toolName: "bash", category: "terminal", succeeded: false }),
    ]);

    expect(await run("stats")).toBe(0);
    expect(out[0]).toBe("Usage Statistics\nTotal: 2 · Success: 1 · Failed: 1 · Rate: 50.0%");
    const stats = JSON.parse(out[1] ?? "");
    expect(stats.total_calls).toBe(2);
    expect(stats.tools_used).toBe(2);
    expect(stats.by_category).toEqual({ filesystem: 1, terminal: 1 });
    expect(out).toHaveLength(2);
  });

  it("reports invalid flags with exit code 1", async () => {
    expect(await run("calls", "--max=-1")).toBe(1);
    expect(out).toEqual([]);
    expect(err).toHaveLength(1);
    expect(err[0]).toMatch(/^ValidationError: Invalid query parameters: max_results: /);
  });
});
