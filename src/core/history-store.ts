import { z } from "zod";
import { decodeCallLine, encodeCallRecord } from "../storage/call-codec.js";
import { appendJsonl, readJsonlLines } from "../storage/jsonl.js";
import { CorruptHistoryError, PersistenceError, ValidationError } from "../utils/errors.js";
import { createChildLogger, type Logger } from "../utils/logger.js";
import { categorizeTool } from "./categories.js";
import { toJsonValue } from "./json.js";
import type { CallRecord, HistorySnapshot, NewCallRecord } from "./types.js";
import { WriteQueue } from "./write-queue.js";

export const DEFAULT_HISTORY_CAPACITY = 1000;

export interface HistoryStoreOptions {
  /** Path of the append-only JSONL log */
  filePath: string;
  /** Most recent records kept queryable (default 1000) */
  capacity?: number;
  logger?: Logger;
  /** Clock used when a record arrives without a timestamp */
  now?: () => Date;
}

export interface LoadReport {
  /** Valid records found in the log */
  loaded: number;
  /** Records kept in memory after applying the capacity */
  retained: number;
  skipped: CorruptHistoryError[];
}

const NewCallRecordSchema = z.object({
  toolName: z.string().min(1),
  category: z.string().min(1).optional(),
  succeeded: z.boolean(),
  timestamp: z
    .union([z.date(), z.string()])
    .optional()
    .refine((value) => value === undefined || !Number.isNaN(new Date(value).getTime()), {
      message: "Invalid timestamp",
    }),
  sessionId: z.string().min(1),
  durationMs: z.number().finite().nonnegative().optional(),
});

/**
 * Append-only, bounded history of tool calls.
 *
 * Every record is written to the JSONL log before it becomes visible. The log
 * keeps everything ever appended; only the in-memory window is capped, and the
 * oldest records fall out of it first. Appends are serialized through a single
 * write queue. Readers take whatever frozen array is current and never wait
 * on the queue.
 */
export class HistoryStore {
  readonly filePath: string;
  readonly capacity: number;

  private records: HistorySnapshot = Object.freeze([]);
  private nextSequenceId = 1;
  /** Set when the log may end without a newline */
  private openLine = false;
  private closed = false;
  private readonly writes = new WriteQueue();
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(options: HistoryStoreOptions) {
    const capacity = options.capacity ?? DEFAULT_HISTORY_CAPACITY;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ValidationError(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.filePath = options.filePath;
    this.capacity = capacity;
    this.log = options.logger ?? createChildLogger("history-store");
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Rebuild the in-memory window from the log.
   *
   * Corrupt lines are logged, reported and skipped; everything valid around
   * them is kept. Sequence numbering resumes after the highest id in the file,
   * including records outside the retained window.
   *
   * @throws {PersistenceError} if the log exists but cannot be read
   */
  async load(): Promise<LoadReport> {
    const contents = await readJsonlLines(this.filePath);
    const skipped: CorruptHistoryError[] = [];
    const valid: CallRecord[] = [];
    let highest = 0;

    for (const line of contents.lines) {
      let record: CallRecord;
      try {
        record = decodeCallLine(line.text, line.lineNumber);
      } catch (err) {
        if (!(err instanceof CorruptHistoryError)) throw err;
        skipped.push(err);
        continue;
      }
      if (record.sequenceId <= highest) {
        skipped.push(
          new CorruptHistoryError(
            `Line ${line.lineNumber} repeats or reorders sequence id ${record.sequenceId}`,
            line.lineNumber,
          ),
        );
        continue;
      }
      highest = record.sequenceId;
      valid.push(record);
    }

    for (const err of skipped) {
      this.log.warn({ lineNumber: err.lineNumber, file: this.filePath }, err.message);
    }

    this.records = Object.freeze(valid.slice(-this.capacity));
    this.nextSequenceId = highest + 1;
    this.openLine = !contents.terminated;

    const report: LoadReport = {
      loaded: valid.length,
      retained: this.records.length,
      skipped,
    };
    this.log.info(
      { file: this.filePath, ...report, skipped: skipped.length, nextSequenceId: this.nextSequenceId },
      "History loaded",
    );
    return report;
  }

  /**
   * Persist a call and admit it to the queryable window.
   *
   * Resolves with the committed record once its line is synced to disk. On
   * rejection nothing was committed and the sequence id is not consumed.
   *
   * @throws {ValidationError} if the input is malformed
   * @throws {PersistenceError} if the log write fails or the store is closed
   */
  async append(input: NewCallRecord): Promise<CallRecord> {
    const checked = NewCallRecordSchema.safeParse(input);
    if (!checked.success) {
      const issues = checked.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
      );
      throw new ValidationError(`Invalid call record: ${issues.join("; ")}`, issues);
    }
    const timestamp =
      input.timestamp === undefined ? this.now() : new Date(input.timestamp);
    const args = toJsonValue(input.arguments);
    const output = toJsonValue(input.output);

    return this.writes.run(async () => {
      if (this.closed) {
        throw new PersistenceError("History store is closed");
      }

      const record: CallRecord = Object.freeze({
        sequenceId: this.nextSequenceId,
        toolName: input.toolName,
        category: input.category ?? categorizeTool(input.toolName),
        arguments: args,
        output,
        succeeded: input.succeeded,
        timestamp: timestamp.toISOString(),
        sessionId: input.sessionId,
        ...(input.durationMs !== undefined ? { durationMs: input.durationMs } : {}),
      });

      try {
        await appendJsonl(this.filePath, encodeCallRecord(record), {
          leadingNewline: this.openLine,
        });
      } catch (err) {
        // A partial line may have reached the disk.
        this.openLine = true;
        this.log.error(
          { err, sequenceId: record.sequenceId, tool: record.toolName },
          "Failed to persist tool call",
        );
        throw err;
      }
      this.openLine = false;
      this.nextSequenceId++;
      this.admit(record);
      return record;
    });
  }

  /** The current window, oldest first. Never mutated after it is returned. */
  snapshot(): HistorySnapshot {
    return this.records;
  }

  get size(): number {
    return this.records.length;
  }

  /** Wait for queued appends to settle, then refuse new ones. */
  async close(): Promise<void> {
    if (this.closed) return;
    await this.writes.drain();
    this.closed = true;
    this.log.info({ file: this.filePath, retained: this.records.length }, "History closed");
  }

  private admit(record: CallRecord): void {
    const current = this.records;
    const overflow = Math.max(0, current.length + 1 - this.capacity);
    if (overflow > 0) {
      this.log.debug(
        { evicted: overflow, oldestRemaining: current[overflow]?.sequenceId ?? record.sequenceId },
        "History window full, evicting oldest",
      );
    }
    this.records = Object.freeze([...current.slice(overflow), record]);
  }
}
