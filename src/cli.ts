import { parseArgs } from "node:util";
import { loadConfig } from "./config.js";
import { parseCallQuery } from "./core/query.js";
import { aggregateUsage } from "./core/usage.js";
import { IntrospectionService } from "./service.js";
import {
  formatCallsSummary,
  formatUsageSummary,
  inspectCalls,
  toUsageView,
} from "./tools/introspection.js";
import { CalltrailError } from "./utils/errors.js";

export interface CliIo {
  env?: NodeJS.ProcessEnv;
  /** One call per output line */
  out?: (line: string) => void;
  err?: (line: string) => void;
}

/**
 * Run one CLI command and resolve with its exit code.
 * Errors other than {@link CalltrailError} propagate.
 */
export async function runCli(argv: string[], io: CliIo = {}): Promise<number> {
  const env = io.env ?? process.env;
  const out = io.out ?? ((line: string) => console.log(line));
  const err = io.err ?? ((line: string) => console.error(line));
  const [command, ...rest] = argv;

  try {
    switch (command) {
      case "calls":
        await runCalls(rest, env, out);
        break;
      case "stats":
        await runStats(env, out);
        break;
      case "path":
        out(loadConfig(undefined, env).historyFile);
        break;
      default:
        out(USAGE);
        break;
    }
    return 0;
  } catch (error) {
    if (error instanceof CalltrailError) {
      err(`${error.name}: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

async function runCalls(
  argv: string[],
  env: NodeJS.ProcessEnv,
  out: (line: string) => void,
): Promise<void> {
  const { values } = parseArgs({
    args: argv,
    options: {
      tool: { type: "string" },
      since: { type: "string" },
      offset: { type: "string" },
      max: { type: "string" },
      json: { type: "boolean", default: false },
    },
  });
  const query = parseCallQuery({
    tool_name: values.tool,
    since: values.since,
    offset: values.offset,
    max_results: values.max,
  });

  const config = loadConfig(undefined, env);
  const service = new IntrospectionService(config);
  await service.start();
  try {
    const view = inspectCalls(service.store, query, config.maxPageSize);

    if (values.json) {
      out(JSON.stringify(view, null, 2));
      return;
    }
    out(formatCallsSummary(view));
    for (const call of view.calls) {
      const status = call.succeeded ? "ok  " : "FAIL";
      out(`  #${call.sequence_id} ${call.timestamp} ${status} ${call.tool_name} ${JSON.stringify(call.arguments)}`);
    }
  } finally {
    await service.stop();
  }
}

async function runStats(env: NodeJS.ProcessEnv, out: (line: string) => void): Promise<void> {
  const config = loadConfig(undefined, env);
  const service = new IntrospectionService(config);
  await service.start();
  try {
    const usage = aggregateUsage(service.store.snapshot());
    out(formatUsageSummary(usage));
    out(JSON.stringify(toUsageView(usage), null, 2));
  } finally {
    await service.stop();
  }
}

const USAGE = `
calltrail - tool-call history for agents

Usage:
  calltrail calls [--tool NAME] [--since ISO] [--offset N] [--max N] [--json]
                              List recorded calls, oldest first
                              (--offset=-N lists the last N)
  calltrail stats             Show usage statistics for the retained history
  calltrail path              Print the history log location

Environment:
  CALLTRAIL_CONFIG_DIR        Config directory (default ~/.config/calltrail)
  CALLTRAIL_HISTORY_CAPACITY  Calls kept queryable (default 1000)
  CALLTRAIL_MAX_PAGE_SIZE     Largest page returned (default 200)
  LOG_LEVEL                   pino log level (default info)
`;
