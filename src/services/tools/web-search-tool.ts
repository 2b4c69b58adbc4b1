// Web Search Tool
// Wraps the DuckDuckGo search service as `duckduckgo_search`

import type { ToolDefinition } from './types.js';
import { ToolError } from './errors.js';
import { clampInteger, readIntegerArg, readStringArg } from './params.js';
import { MAX_SEARCH_RESULTS, searchWeb, type SearchRecord } from '../web-search.js';

export const WEB_SEARCH_TOOL_NAME = 'duckduckgo_search';

export type SearchFn = (query: string, maxResults: number) => Promise<SearchRecord[]>;

export interface WebSearchPayload {
  query: string;
  results: SearchRecord[];
}

export function createWebSearchTool(search: SearchFn = searchWeb): ToolDefinition<WebSearchPayload> {
  return {
    name: WEB_SEARCH_TOOL_NAME,
    description: 'Search the web with DuckDuckGo. Use this when the user asks for recent information, facts or news that need a web search. Returns titles, URLs and snippets in relevance order.',
    parameters: [
      {
        name: 'query',
        type: 'string',
        description: 'The search query; keep it clear and specific',
        required: true,
      },
      {
        name: 'max_results',
        type: 'integer',
        description: 'Maximum number of results to return (1-10, default: 5)',
        required: false,
        default: 5,
        minimum: 1,
        maximum: MAX_SEARCH_RESULTS,
      },
    ],
    execute: async (args) => {
      const query = readStringArg(args, 'query').trim();
      if (!query) {
        throw ToolError.invalidArgument('Query must not be empty');
      }

      const maxResults = clampInteger(readIntegerArg(args, 'max_results', 5), 1, MAX_SEARCH_RESULTS);
      const results = await search(query, maxResults);

      return {
        query,
        results: results.slice(0, maxResults),
      };
    },
  };
}

