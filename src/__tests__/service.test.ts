import path from "node:path";
import type { AgentTool } from "@mariozechner/pi-agent-core";
import { Type } from "@sinclair/typebox";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { CalltrailConfig } from "../config.js";
import { IntrospectionService, PersistenceError } from "../lib.js";
import { makeRecords, makeTempDir, removeDir, writeLog } from "./fixtures.js";

const EchoParams = Type.Object({ text: Type.String() });

const echo: AgentTool<typeof EchoParams> = {
  name: "echo",
  label: "Echo",
  description: "Echo the input",
  parameters: EchoParams,
  execute: async (_toolCallId, params) => ({
    content: [{ type: "text", text: params.text }],
    details: {},
  }),
};

describe("IntrospectionService", () => {
  let dir: string;
  let config: CalltrailConfig;

  beforeEach(async () => {
    dir = await makeTempDir();
    config = {
      configDir: dir,
      historyFile: path.join(dir, "tool-history.jsonl"),
      historyCapacity: 5,
      maxPageSize: 2,
      sessionId: "session-a",
    };
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("loads the log on start and reports what it kept", async () => {
    await writeLog(config.historyFile, makeRecords(8));
    const service = new IntrospectionService(config);

    const report = await service.start();

    expect(report).toEqual({ loaded: 8, retained: 5, skipped: [] });
    expect(service.isRunning()).toBe(true);
    await service.stop();
    expect(service.isRunning()).toBe(false);
  });

  it("refuses to start twice", async () => {
    const service = new IntrospectionService(config);
    await service.start();

    await expect(service.start()).rejects.toBeInstanceOf(PersistenceError);
    await service.stop();
  });

  it("records wrapped tools and answers queries about them", async () => {
    const service = new IntrospectionService(config);
    await service.start();

    const tools = [...service.recordTools([echo]), ...service.introspectionTools()];
    const byName = new Map(tools.map((tool) => [tool.name, tool]));

    await byName.get("echo")?.execute("1", { text: "one" });
    await byName.get("echo")?.execute("2", { text: "two" });
    await byName.get("echo")?.execute("3", { text: "three" });
    const calls = await byName.get("inspect_tool_calls")?.execute("4", {});
    const stats = await byName.get("inspect_usage_stats")?.execute("5", {});

    expect(calls?.details.count).toBe(2);
    expect(calls?.details.total_matches).toBe(3);
    expect(calls?.details.has_more).toBe(true);
    expect(calls?.details.calls.map((c: { arguments: unknown }) => c.arguments)).toEqual([
      { text: "one" },
      { text: "two" },
    ]);
    expect(stats?.details.total_calls).toBe(3);
    expect(stats?.details.session_ids).toEqual(["session-a"]);
    expect(stats?.details.by_category).toEqual({ other: 3 });

    await service.stop();
    expect(service.store.snapshot()).toHaveLength(3);
  });
});
