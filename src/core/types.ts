/** Core domain types */

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type ToolCategory =
  | "filesystem"
  | "terminal"
  | "edit"
  | "search"
  | "network"
  | "memory"
  | "introspection"
  | "other";

/** One completed tool invocation. Frozen once appended. */
export interface CallRecord {
  readonly sequenceId: number;
  readonly toolName: string;
  /** Usually a {@link ToolCategory}, but callers may supply their own label. */
  readonly category: string;
  readonly arguments: JsonValue;
  readonly output: JsonValue;
  readonly succeeded: boolean;
  /** ISO-8601 */
  readonly timestamp: string;
  readonly sessionId: string;
  readonly durationMs?: number;
}

/** What a caller hands to the store; the store assigns the sequence id. */
export interface NewCallRecord {
  toolName: string;
  category?: string;
  arguments: unknown;
  output: unknown;
  succeeded: boolean;
  timestamp?: Date | string;
  sessionId: string;
  durationMs?: number;
}

export type HistorySnapshot = readonly CallRecord[];

export interface ToolUsage {
  toolName: string;
  callCount: number;
  totalDurationMs: number;
  avgDurationMs: number;
}

export interface UsageSnapshot {
  totalCalls: number;
  successes: number;
  failures: number;
  successRate: number;
  byCategory: Record<string, number>;
  byTool: Record<string, number>;
  sessionIds: string[];
  timeSpan?: { earliest: string; latest: string };
  toolUsage: ToolUsage[];
  sessionDurationMs: number;
}
