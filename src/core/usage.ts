import type { HistorySnapshot, ToolUsage, UsageSnapshot } from "./types.js";

/**
 * Summarize a snapshot. Pure: the same snapshot always yields the same result,
 * and every count can be re-derived by walking the records.
 */
export function aggregateUsage(snapshot: HistorySnapshot): UsageSnapshot {
  let successes = 0;
  const byCategory = new Map<string, number>();
  const byTool = new Map<string, { calls: number; timed: number; durationMs: number }>();
  const sessions = new Set<string>();
  let earliest: { ms: number; iso: string } | undefined;
  let latest: { ms: number; iso: string } | undefined;

  for (const record of snapshot) {
    if (record.succeeded) successes++;
    byCategory.set(record.category, (byCategory.get(record.category) ?? 0) + 1);

    const tool = byTool.get(record.toolName) ?? { calls: 0, timed: 0, durationMs: 0 };
    tool.calls++;
    if (record.durationMs !== undefined) {
      tool.timed++;
      tool.durationMs += record.durationMs;
    }
    byTool.set(record.toolName, tool);

    sessions.add(record.sessionId);

    // Timestamps can arrive out of order; only sequence ids are monotonic.
    const ms = Date.parse(record.timestamp);
    if (!earliest || ms < earliest.ms) earliest = { ms, iso: record.timestamp };
    if (!latest || ms > latest.ms) latest = { ms, iso: record.timestamp };
  }

  const totalCalls = snapshot.length;
  const toolUsage: ToolUsage[] = [...byTool.entries()]
    .map(([toolName, { calls, timed, durationMs }]) => ({
      toolName,
      callCount: calls,
      totalDurationMs: durationMs,
      // Averaged over the calls that were timed.
      avgDurationMs: timed === 0 ? 0 : Math.round(durationMs / timed),
    }))
    .sort((a, b) => b.callCount - a.callCount || a.toolName.localeCompare(b.toolName));

  return {
    totalCalls,
    successes,
    failures: totalCalls - successes,
    successRate: totalCalls === 0 ? 0 : successes / totalCalls,
    byCategory: Object.fromEntries(byCategory),
    byTool: Object.fromEntries([...byTool].map(([name, { calls }]) => [name, calls])),
    sessionIds: [...sessions],
    timeSpan: earliest && latest ? { earliest: earliest.iso, latest: latest.iso } : undefined,
    toolUsage,
    sessionDurationMs: earliest && latest ? latest.ms - earliest.ms : 0,
  };
}
