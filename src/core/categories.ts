import type { ToolCategory } from "./types.js";

const EXACT = new Map<string, ToolCategory>(Object.entries({
  read_file: "filesystem",
  read_multiple_files: "filesystem",
  write_file: "filesystem",
  append_file: "filesystem",
  list_files: "filesystem",
  list_directory: "filesystem",
  create_directory: "filesystem",
  move_file: "filesystem",
  delete_file: "filesystem",
  get_file_info: "filesystem",
  edit_file: "edit",
  edit_block: "edit",
  bash: "terminal",
  start_process: "terminal",
  read_process_output: "terminal",
  kill_process: "terminal",
  search_files: "search",
  grep: "search",
  web_fetch: "network",
  http_request: "network",
  inspect_tool_calls: "introspection",
  inspect_usage_stats: "introspection",
} satisfies Record<string, ToolCategory>));

// Checked in order after the exact table misses.
const PREFIXES: Array<[string, ToolCategory]> = [
  ["fs_", "filesystem"],
  ["terminal_", "terminal"],
  ["process_", "terminal"],
  ["edit_", "edit"],
  ["search_", "search"],
  ["http_", "network"],
  ["browser_", "network"],
  ["memory_", "memory"],
  ["inspect_", "introspection"],
];

/** Derive a category from a tool name. Unknown tools land in "other". */
export function categorizeTool(toolName: string): ToolCategory {
  const exact = EXACT.get(toolName);
  if (exact) return exact;
  for (const [prefix, category] of PREFIXES) {
    if (toolName.startsWith(prefix)) return category;
  }
  return "other";
}
