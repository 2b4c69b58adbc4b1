// Tool System Initialization
// Builds the fixed tool catalog once at startup

import { ToolRegistry } from './registry.js';
import { createWebSearchTool, type SearchFn } from './web-search-tool.js';
import { createWebFetchTool, type FetchPageFn } from './web-fetch-tool.js';

export { ToolRegistry } from './registry.js';
export { ToolError, type ToolErrorKind, type ToolErrorInfo } from './errors.js';
export { serializeToolResult } from './types.js';
export type { ToolDefinition, ToolResult, ToolParameter, ToolArgs } from './types.js';
export { WEB_SEARCH_TOOL_NAME, type SearchFn } from './web-search-tool.js';
export { WEB_FETCH_TOOL_NAME, type FetchPageFn } from './web-fetch-tool.js';

export interface ToolOverrides {
  search?: SearchFn;
  fetchPage?: FetchPageFn;
}

/**
 * Registers the search and fetch tools and freezes the registry.
 * Overrides replace the network-backed implementations (used by tests).
 */
export function initializeTools(overrides: ToolOverrides = {}): ToolRegistry {
  const registry = new ToolRegistry();
  registry.register(createWebSearchTool(overrides.search));
  registry.register(createWebFetchTool(overrides.fetchPage));
  return registry.freeze();
}
