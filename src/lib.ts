export { loadConfig, type CalltrailConfig } from "./config.js";
export { categorizeTool } from "./core/categories.js";
export { DEFAULT_HISTORY_CAPACITY, HistoryStore, type HistoryStoreOptions, type LoadReport } from "./core/history-store.js";
export {
  DEFAULT_MAX_RESULTS,
  MAX_PAGE_SIZE,
  parseCallQuery,
  queryCalls,
  type CallPage,
  type CallQuery,
} from "./core/query.js";
export { INTROSPECTION_TOOL_NAMES, recordTools, withRecording, type RecorderOptions } from "./core/recorder.js";
export type {
  CallRecord,
  HistorySnapshot,
  JsonValue,
  NewCallRecord,
  ToolCategory,
  ToolUsage,
  UsageSnapshot,
} from "./core/types.js";
export { aggregateUsage } from "./core/usage.js";
export { IntrospectionService } from "./service.js";
export {
  createInspectToolCallsTool,
  createInspectUsageStatsTool,
  type CallsView,
  type CallView,
  type UsageView,
} from "./tools/introspection.js";
export {
  CalltrailError,
  ConfigError,
  CorruptHistoryError,
  PersistenceError,
  ValidationError,
} from "./utils/errors.js";
