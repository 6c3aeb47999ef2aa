export class CalltrailError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "CalltrailError";
  }
}

export class ConfigError extends CalltrailError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", cause);
    this.name = "ConfigError";
  }
}

/** Malformed query or record input. Nothing was read from or written to the store. */
export class ValidationError extends CalltrailError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }
}

/** A durable write or read of the history log failed. */
export class PersistenceError extends CalltrailError {
  constructor(message: string, cause?: unknown) {
    super(message, "PERSISTENCE_ERROR", cause);
    this.name = "PersistenceError";
  }
}

/** A line of the history log could not be decoded into a call record. */
export class CorruptHistoryError extends CalltrailError {
  constructor(
    message: string,
    public readonly lineNumber: number,
    cause?: unknown,
  ) {
    super(message, "CORRUPT_HISTORY", cause);
    this.name = "CorruptHistoryError";
  }
}
