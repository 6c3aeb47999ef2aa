import { z } from "zod";
import { isJsonValue } from "../core/json.js";
import type { CallRecord, JsonObject, JsonValue } from "../core/types.js";
import { CorruptHistoryError } from "../utils/errors.js";

// Checked in place rather than rebuilt, so payload keys such as "__proto__"
// come back exactly as they were written.
const JsonValueSchema = z.custom<JsonValue>(isJsonValue, { message: "Expected a JSON value" });

/** One line of tool-history.jsonl */
const StoredCallSchema = z.object({
  sequence_id: z.number().int().positive(),
  tool_name: z.string().min(1),
  category: z.string().min(1),
  arguments: JsonValueSchema,
  output: JsonValueSchema,
  succeeded: z.boolean(),
  timestamp: z.string().datetime({ offset: true }),
  session_id: z.string(),
  duration_ms: z.number().nonnegative().optional(),
});

export function encodeCallRecord(record: CallRecord): JsonObject {
  const line: JsonObject = {
    sequence_id: record.sequenceId,
    tool_name: record.toolName,
    category: record.category,
    arguments: record.arguments,
    output: record.output,
    succeeded: record.succeeded,
    timestamp: record.timestamp,
    session_id: record.sessionId,
  };
  if (record.durationMs !== undefined) {
    line.duration_ms = record.durationMs;
  }
  return line;
}

/**
 * Decode one log line.
 * @throws {CorruptHistoryError} if the line is not JSON or not a call record
 */
export function decodeCallLine(text: string, lineNumber: number): CallRecord {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new CorruptHistoryError(`Line ${lineNumber} is not valid JSON`, lineNumber, err);
  }

  const parsed = StoredCallSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new CorruptHistoryError(
      `Line ${lineNumber} is not a call record (${detail})`,
      lineNumber,
      parsed.error,
    );
  }

  const stored = parsed.data;
  return Object.freeze({
    sequenceId: stored.sequence_id,
    toolName: stored.tool_name,
    category: stored.category,
    arguments: stored.arguments,
    output: stored.output,
    succeeded: stored.succeeded,
    timestamp: stored.timestamp,
    sessionId: stored.session_id,
    ...(stored.duration_ms !== undefined ? { durationMs: stored.duration_ms } : {}),
  });
}
