import { pino, type Logger } from "pino";

export type { Logger };

// Logs go to stderr so CLI output on stdout stays machine-readable.
const options = {
  name: "calltrail",
  level: process.env.LOG_LEVEL || "info",
};

export const logger: Logger =
  process.env.NODE_ENV !== "production"
    ? pino({ ...options, transport: { target: "pino/file", options: { destination: 2 } } })
    : pino(options, process.stderr);

export function createChildLogger(name: string): Logger {
  return logger.child({ component: name });
}
