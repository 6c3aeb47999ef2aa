import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { makeTempDir, removeDir } from "../../__tests__/fixtures.js";
import { PersistenceError } from "../../utils/errors.js";
import { appendJsonl, readJsonlLines } from "../jsonl.js";

describe("jsonl", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("appends one line per entry, creating directories", async () => {
    const file = path.join(dir, "a", "b", "log.jsonl");

    await appendJsonl(file, { n: 1 });
    await appendJsonl(file, { n: 2 });

    expect(await fs.readFile(file, "utf-8")).toBe('{"n":1}\n{"n":2}\n');
  });

  it("can start an entry on a fresh line", async () => {
    const file = path.join(dir, "log.jsonl");
    await fs.writeFile(file, '{"n":1');

    await appendJsonl(file, { n: 2 }, { leadingNewline: true });

    expect(await fs.readFile(file, "utf-8")).toBe('{"n":1\n{"n":2}\n');
  });

  it("returns non-blank lines with their line numbers", async () => {
    const file = path.join(dir, "log.jsonl");
    await fs.writeFile(file, 'first\n\n  \nsecond\n');

    expect(await readJsonlLines(file)).toEqual({
      lines: [
        { lineNumber: 1, text: "first" },
        { lineNumber: 4, text: "second" },
      ],
      terminated: true,
    });
  });

  it("notices a missing final newline", async () => {
    const file = path.join(dir, "log.jsonl");
    await fs.writeFile(file, "first\nsecond");

    expect((await readJsonlLines(file)).terminated).toBe(false);
  });

  it("treats a missing file as empty", async () => {
    expect(await readJsonlLines(path.join(dir, "none.jsonl"))).toEqual({ lines: [], terminated: true });
  });

  it("wraps write failures in PersistenceError", async () => {
    const blocker = path.join(dir, "file");
    await fs.writeFile(blocker, "");

    await expect(appendJsonl(path.join(blocker, "log.jsonl"), { n: 1 })).rejects.toBeInstanceOf(PersistenceError);
  });
});
