import { randomUUID } from "node:crypto";
import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import "dotenv/config";
import { z } from "zod";
import { DEFAULT_HISTORY_CAPACITY } from "./core/history-store.js";
import { MAX_PAGE_SIZE } from "./core/query.js";
import { ConfigPaths, DEFAULT_CONFIG_DIR } from "./storage/paths.js";
import { ConfigError } from "./utils/errors.js";

const ConfigSchema = z.object({
  config_dir: z.string().min(1),
  /** Defaults to <config_dir>/tool-history.jsonl */
  history_file: z.string().min(1).optional(),
  history: z.object({
    capacity: z.number().int().positive(),
    max_page_size: z.number().int().positive(),
  }),
  /** Identifies this process's calls in the shared log */
  session_id: z.string().min(1).optional(),
});

type RawConfig = z.infer<typeof ConfigSchema>;

export interface CalltrailConfig {
  configDir: string;
  historyFile: string;
  historyCapacity: number;
  maxPageSize: number;
  sessionId: string;
}

const DEFAULTS: RawConfig = {
  config_dir: DEFAULT_CONFIG_DIR,
  history: {
    capacity: DEFAULT_HISTORY_CAPACITY,
    max_page_size: MAX_PAGE_SIZE,
  },
};

/**
 * Defaults, then the JSON config file, then environment variables.
 *
 * The file is CALLTRAIL_CONFIG if set, otherwise config.json in the config
 * directory. A missing file is fine; an unreadable or invalid one is not.
 */
export function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): CalltrailConfig {
  const configDir = env.CALLTRAIL_CONFIG_DIR ?? DEFAULTS.config_dir;
  const resolved = path.resolve(configPath ?? env.CALLTRAIL_CONFIG ?? new ConfigPaths(configDir).configFile);

  let fileConfig: Record<string, unknown> = {};
  if (existsSync(resolved)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(resolved, "utf-8"));
    } catch (err) {
      throw new ConfigError(`Failed to read config file ${resolved}`, err);
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`Config file ${resolved} must contain a JSON object`);
    }
    fileConfig = parsed;
  }

  const merged = deepMerge({ ...DEFAULTS }, fileConfig);

  // Override with env vars where available
  if (env.CALLTRAIL_CONFIG_DIR) {
    merged.config_dir = env.CALLTRAIL_CONFIG_DIR;
  }
  const history: Record<string, unknown> = isPlainObject(merged.history) ? { ...merged.history } : {};
  if (env.CALLTRAIL_HISTORY_CAPACITY) {
    history.capacity = Number(env.CALLTRAIL_HISTORY_CAPACITY);
  }
  if (env.CALLTRAIL_MAX_PAGE_SIZE) {
    history.max_page_size = Number(env.CALLTRAIL_MAX_PAGE_SIZE);
  }
  merged.history = history;
  if (env.CALLTRAIL_SESSION_ID) {
    merged.session_id = env.CALLTRAIL_SESSION_ID;
  }

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${detail}`, result.error);
  }

  const config = result.data;
  const paths = new ConfigPaths(config.config_dir);
  return {
    configDir: paths.root,
    historyFile: config.history_file ? path.resolve(config.history_file) : paths.historyFile,
    historyCapacity: config.history.capacity,
    maxPageSize: config.history.max_page_size,
    sessionId: config.session_id ?? randomUUID(),
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sv = source[key];
    const tv = target[key];
    if (isPlainObject(sv) && isPlainObject(tv)) {
      result[key] = deepMerge(tv, sv);
    } else {
      result[key] = sv;
    }
  }
  return result;
}
