import type { AgentTool, AgentToolResult } from "@mariozechner/pi-agent-core";
import type { TSchema } from "@sinclair/typebox";
import { createChildLogger } from "../utils/logger.js";
import type { HistoryStore } from "./history-store.js";
import { toJsonValue } from "./json.js";
import type { JsonValue } from "./types.js";

const log = createChildLogger("recorder");

/** Tools that query the history are never recorded into it. */
export const INTROSPECTION_TOOL_NAMES: readonly string[] = [
  "inspect_tool_calls",
  "inspect_usage_stats",
];

export interface RecorderOptions {
  store: HistoryStore;
  sessionId: string;
  /** Tool names to pass through unrecorded, in addition to the introspection tools */
  exclude?: Iterable<string>;
  /** Override the category derived from the tool name */
  categorize?: (toolName: string) => string | undefined;
  now?: () => number;
}

/**
 * Wrap a tool so each completed execution lands in the history store.
 *
 * A thrown error is recorded as a failure and rethrown. A result whose details
 * carry `error: true` is recorded as a failure and returned as is. If the
 * history write itself fails, the tool's outcome is still returned to the
 * agent and the write failure is only logged.
 */
export function withRecording<TParameters extends TSchema>(
  tool: AgentTool<TParameters>,
  options: RecorderOptions,
): AgentTool<TParameters> {
  const excluded = new Set([...INTROSPECTION_TOOL_NAMES, ...(options.exclude ?? [])]);
  if (excluded.has(tool.name)) return tool;

  const now = options.now ?? Date.now;

  const record = async (args: unknown, output: JsonValue, succeeded: boolean, startedAt: number) => {
    try {
      await options.store.append({
        toolName: tool.name,
        category: options.categorize?.(tool.name),
        arguments: args,
        output,
        succeeded,
        timestamp: new Date(startedAt),
        sessionId: options.sessionId,
        durationMs: Math.max(0, now() - startedAt),
      });
    } catch (err) {
      log.error({ err, tool: tool.name }, "Failed to record tool call");
    }
  };

  return {
    ...tool,
    execute: async (...args: Parameters<AgentTool<TParameters>["execute"]>) => {
      const params = args[1];
      const startedAt = now();
      let result: AgentToolResult<unknown>;
      try {
        result = await tool.execute(...args);
      } catch (err) {
        await record(params, { error: toJsonValue(err) }, false, startedAt);
        throw err;
      }
      await record(
        params,
        { content: toJsonValue(result.content), details: toJsonValue(result.details) },
        !isErrorResult(result),
        startedAt,
      );
      return result;
    },
  };
}

/** Wrap every tool in a set; see {@link withRecording}. */
// biome-ignore lint/suspicious/noExplicitAny: AgentTool generic must be erased for heterogeneous array
export function recordTools(tools: AgentTool<any>[], options: RecorderOptions): AgentTool<any>[] {
  return tools.map((tool) => withRecording(tool, options));
}

function isErrorResult(result: AgentToolResult<unknown>): boolean {
  const details: unknown = result.details;
  return typeof details === "object" && details !== null && "error" in details && details.error === true;
}
