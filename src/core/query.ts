import { z } from "zod";
import { ValidationError } from "../utils/errors.js";
import type { CallRecord, HistorySnapshot } from "./types.js";

export const DEFAULT_MAX_RESULTS = 50;
/** Hard ceiling on a single page unless the caller passes its own. */
export const MAX_PAGE_SIZE = 200;

export interface CallQuery {
  /** Exact match */
  toolName?: string;
  /** Inclusive lower bound on the call timestamp */
  since?: Date;
  /** Start index; negative counts back from the newest match */
  offset: number;
  maxResults: number;
}

export interface CallPage {
  calls: CallRecord[];
  totalMatches: number;
  hasMore: boolean;
  startIndex: number;
  /** Page size actually applied, after the ceiling */
  maxResults: number;
}

/**
 * Filter a snapshot and cut one page out of the matches, oldest first.
 *
 * A negative offset selects from the tail: `-20` starts 20 matches before the
 * end, or at the first match if there are fewer.
 */
export function queryCalls(
  snapshot: HistorySnapshot,
  query: CallQuery,
  pageLimit: number = MAX_PAGE_SIZE,
): CallPage {
  const sinceMs = query.since?.getTime();
  const matches = snapshot.filter(
    (record) =>
      (query.toolName === undefined || record.toolName === query.toolName) &&
      (sinceMs === undefined || Date.parse(record.timestamp) >= sinceMs),
  );

  const total = matches.length;
  const startIndex = query.offset < 0 ? Math.max(0, total + query.offset) : query.offset;
  const maxResults = Math.max(0, Math.min(query.maxResults, pageLimit));
  const calls = startIndex >= total ? [] : matches.slice(startIndex, startIndex + maxResults);

  return {
    calls,
    totalMatches: total,
    hasMore: startIndex + calls.length < total,
    startIndex,
    maxResults,
  };
}

const IntegerParam = z.union([
  z.number().int(),
  z
    .string()
    .trim()
    .regex(/^-?\d+$/, "Expected an integer")
    .transform(Number),
]);

const CallQueryParamsSchema = z.object({
  tool_name: z.string().min(1, "tool_name must not be empty").optional(),
  since: z
    .string()
    .datetime({ offset: true, message: "since must be an ISO-8601 date-time" })
    .optional(),
  offset: IntegerParam.optional(),
  max_results: IntegerParam.pipe(z.number().nonnegative("max_results must not be negative")).optional(),
});

export type CallQueryParams = z.input<typeof CallQueryParamsSchema>;

/**
 * Validate loosely typed `inspect_tool_calls` parameters and apply defaults.
 * Unknown keys are ignored; `null` counts as absent.
 *
 * @throws {ValidationError} listing every rejected field
 */
export function parseCallQuery(raw: unknown): CallQuery {
  const input = raw === undefined || raw === null ? {} : raw;
  const parsed = CallQueryParamsSchema.safeParse(
    typeof input === "object" && input !== null && !Array.isArray(input) ? dropNulls(input) : input,
  );
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new ValidationError(`Invalid query parameters: ${issues.join("; ")}`, issues);
  }

  const params = parsed.data;
  return {
    toolName: params.tool_name,
    since: params.since === undefined ? undefined : new Date(params.since),
    offset: params.offset ?? 0,
    maxResults: params.max_results ?? DEFAULT_MAX_RESULTS,
  };
}

function dropNulls(input: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== null));
}
