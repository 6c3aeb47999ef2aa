import type { AgentTool, AgentToolResult } from "@mariozechner/pi-agent-core";
import { Type } from "@sinclair/typebox";
import type { HistoryStore } from "../core/history-store.js";
import { type CallQuery, MAX_PAGE_SIZE, parseCallQuery, queryCalls } from "../core/query.js";
import type { CallRecord, JsonValue, UsageSnapshot } from "../core/types.js";
import { aggregateUsage } from "../core/usage.js";

// --- Views (snake_case, as returned to the agent) ---

export interface CallView {
  sequence_id: number;
  tool_name: string;
  category: string;
  arguments: JsonValue;
  output: JsonValue;
  succeeded: boolean;
  timestamp: string;
  session_id: string;
  duration_ms?: number;
}

export interface CallsView {
  calls: CallView[];
  count: number;
  total_matches: number;
  has_more: boolean;
  total_in_memory: number;
  offset: number;
  max_results: number;
  filter_tool_name?: string;
  filter_since?: string;
}

export interface UsageView {
  total_calls: number;
  successes: number;
  failures: number;
  success_rate: number;
  by_category: Record<string, number>;
  by_tool: Record<string, number>;
  session_ids: string[];
  time_span: { earliest: string; latest: string } | null;
  /** Distinct tools in the window */
  tools_used: number;
  tool_usage: Array<{
    tool_name: string;
    call_count: number;
    total_duration_ms: number;
    avg_duration_ms: number;
  }>;
  session_duration_ms: number;
}

export function toCallView(record: CallRecord): CallView {
  return {
    sequence_id: record.sequenceId,
    tool_name: record.toolName,
    category: record.category,
    arguments: record.arguments,
    output: record.output,
    succeeded: record.succeeded,
    timestamp: record.timestamp,
    session_id: record.sessionId,
    ...(record.durationMs !== undefined ? { duration_ms: record.durationMs } : {}),
  };
}

export function toUsageView(usage: UsageSnapshot): UsageView {
  return {
    total_calls: usage.totalCalls,
    successes: usage.successes,
    failures: usage.failures,
    success_rate: usage.successRate,
    by_category: usage.byCategory,
    by_tool: usage.byTool,
    session_ids: usage.sessionIds,
    time_span: usage.timeSpan ?? null,
    tools_used: usage.toolUsage.length,
    tool_usage: usage.toolUsage.map((tool) => ({
      tool_name: tool.toolName,
      call_count: tool.callCount,
      total_duration_ms: tool.totalDurationMs,
      avg_duration_ms: tool.avgDurationMs,
    })),
    session_duration_ms: usage.sessionDurationMs,
  };
}

export function formatUsageSummary(usage: UsageSnapshot): string {
  const rate = (usage.successRate * 100).toFixed(1);
  return (
    "Usage Statistics\n" +
    `Total: ${usage.totalCalls} · Success: ${usage.successes} · Failed: ${usage.failures} · Rate: ${rate}%`
  );
}

export function formatCallsSummary(view: CallsView): string {
  if (view.count === 0) {
    return `Tool Call History\nCalls: 0 of ${view.total_matches} · No calls matching criteria`;
  }
  const latest = view.calls[view.calls.length - 1]?.tool_name ?? "unknown";
  const more = view.has_more ? " · More available" : "";
  return `Tool Call History\nCalls: ${view.count} of ${view.total_matches} · Latest: ${latest}${more}`;
}

/** Run a validated query against the store's current window. */
export function inspectCalls(store: HistoryStore, query: CallQuery, pageLimit: number = MAX_PAGE_SIZE): CallsView {
  const snapshot = store.snapshot();
  const page = queryCalls(snapshot, query, pageLimit);
  return {
    calls: page.calls.map(toCallView),
    count: page.calls.length,
    total_matches: page.totalMatches,
    has_more: page.hasMore,
    total_in_memory: snapshot.length,
    offset: query.offset,
    max_results: page.maxResults,
    ...(query.toolName !== undefined ? { filter_tool_name: query.toolName } : {}),
    ...(query.since !== undefined ? { filter_since: query.since.toISOString() } : {}),
  };
}

// --- Inspect Tool Calls ---

export const InspectToolCallsParams = Type.Object({
  tool_name: Type.Optional(Type.String({ description: "Only return calls to this tool (exact match)" })),
  since: Type.Optional(
    Type.String({
      format: "date-time",
      description: "Only return calls at or after this ISO-8601 timestamp",
    }),
  ),
  offset: Type.Optional(
    Type.Integer({
      description: "Start position, 0 = oldest match. Negative counts back from the newest, e.g. -20 for the last 20",
      default: 0,
    }),
  ),
  max_results: Type.Optional(
    Type.Integer({
      minimum: 0,
      description: `Page size (default 50, at most ${MAX_PAGE_SIZE})`,
      default: 50,
    }),
  ),
});

export interface InspectToolCallsOptions {
  /** Page ceiling; defaults to MAX_PAGE_SIZE */
  maxPageSize?: number;
}

export function createInspectToolCallsTool(
  store: HistoryStore,
  options: InspectToolCallsOptions = {},
): AgentTool<typeof InspectToolCallsParams> {
  const pageLimit = options.maxPageSize ?? MAX_PAGE_SIZE;
  return {
    name: "inspect_tool_calls",
    label: "Inspect Tool Calls",
    description:
      "Get recent tool call history with arguments and outputs, oldest first. " +
      "Supports filtering by tool name and timestamp, and pagination via offset " +
      "(negative offset returns the most recent calls). Useful for recovering " +
      "context about work already done and for debugging tool call sequences. " +
      "Does not include calls to the introspection tools themselves.",
    parameters: InspectToolCallsParams,
    execute: async (_toolCallId: string, params: unknown): Promise<AgentToolResult<CallsView>> => {
      const view = inspectCalls(store, parseCallQuery(params), pageLimit);
      return {
        content: [{ type: "text", text: formatCallsSummary(view) }],
        details: view,
      };
    },
  };
}

// --- Inspect Usage Stats ---

export const InspectUsageStatsParams = Type.Object({});

export function createInspectUsageStatsTool(
  store: HistoryStore,
): AgentTool<typeof InspectUsageStatsParams> {
  return {
    name: "inspect_usage_stats",
    label: "Inspect Usage Stats",
    description:
      "Get aggregated usage statistics for tool calls in the retained history: " +
      "total calls, successes, failures, success rate, per-category and per-tool " +
      "counts, sessions seen and the time span covered.",
    parameters: InspectUsageStatsParams,
    execute: async (): Promise<AgentToolResult<UsageView>> => {
      const usage = aggregateUsage(store.snapshot());
      return {
        content: [{ type: "text", text: formatUsageSummary(usage) }],
        details: toUsageView(usage),
      };
    },
  };
}
