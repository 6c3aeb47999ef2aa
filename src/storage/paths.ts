import os from "node:os";
import path from "node:path";

export const DEFAULT_CONFIG_DIR = path.join(os.homedir(), ".config", "calltrail");

/**
 * Resolve the well-known files under the configuration directory.
 */
export class ConfigPaths {
  constructor(private readonly configDir: string = DEFAULT_CONFIG_DIR) {}

  get root(): string {
    return path.resolve(this.configDir);
  }

  /** Optional JSON settings file */
  get configFile(): string {
    return path.join(this.root, "config.json");
  }

  /** Append-only call log */
  get historyFile(): string {
    return path.join(this.root, "tool-history.jsonl");
  }
}
