import type { AgentTool } from "@mariozechner/pi-agent-core";
import type { CalltrailConfig } from "./config.js";
import { HistoryStore, type LoadReport } from "./core/history-store.js";
import { recordTools } from "./core/recorder.js";
import { createInspectToolCallsTool, createInspectUsageStatsTool } from "./tools/introspection.js";
import { PersistenceError } from "./utils/errors.js";
import { createChildLogger } from "./utils/logger.js";

const log = createChildLogger("service");

/**
 * Owns the one history store of a process and hands it to everything that
 * reads or writes it: the recorder around the agent's tools and the two
 * introspection tools.
 */
export class IntrospectionService {
  readonly store: HistoryStore;
  private running = false;

  constructor(private readonly config: CalltrailConfig) {
    this.store = new HistoryStore({
      filePath: config.historyFile,
      capacity: config.historyCapacity,
    });
  }

  async start(): Promise<LoadReport> {
    if (this.running) {
      throw new PersistenceError("Introspection service already started");
    }
    const report = await this.store.load();
    this.running = true;
    log.info(
      { file: this.config.historyFile, sessionId: this.config.sessionId, retained: report.retained },
      "Introspection service started",
    );
    return report;
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    await this.store.close();
    this.running = false;
    log.info("Introspection service stopped");
  }

  isRunning(): boolean {
    return this.running;
  }

  /** inspect_tool_calls and inspect_usage_stats, bound to this store */
  // biome-ignore lint/suspicious/noExplicitAny: AgentTool generic must be erased for heterogeneous array
  introspectionTools(): AgentTool<any>[] {
    return [
      createInspectToolCallsTool(this.store, { maxPageSize: this.config.maxPageSize }),
      createInspectUsageStatsTool(this.store),
    ];
  }

  /**
   * Wrap the agent's own tools so their calls are recorded under this
   * process's session id.
   */
  // biome-ignore lint/suspicious/noExplicitAny: AgentTool generic must be erased for heterogeneous array
  recordTools(tools: AgentTool<any>[]): AgentTool<any>[] {
    return recordTools(tools, { store: this.store, sessionId: this.config.sessionId });
  }
}
