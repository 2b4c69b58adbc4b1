// Web Fetch Tool
// Wraps the page fetcher as `fetch_and_parse_url`

import type { ToolDefinition } from './types.js';
import { clampInteger, readIntegerArg, readStringArg } from './params.js';
import { DEFAULT_MAX_LENGTH, fetchPage, MAX_CONTENT_LENGTH, type PageExtract } from '../web-fetch.js';

export const WEB_FETCH_TOOL_NAME = 'fetch_and_parse_url';

export type FetchPageFn = (url: string, maxLength: number) => Promise<PageExtract>;

export function createWebFetchTool(fetcher: FetchPageFn = fetchPage): ToolDefinition<PageExtract> {
  return {
    name: WEB_FETCH_TOOL_NAME,
    description: 'Fetch a web page and extract its title, main text and key links. Use this when the user shares a URL or asks you to read, summarize or analyze a page.',
    parameters: [
      {
        name: 'url',
        type: 'string',
        description: 'Full URL to fetch, including http:// or https://',
        required: true,
      },
      {
        name: 'max_length',
        type: 'integer',
        description: 'Maximum number of characters of page text to return (1-10000, default: 5000)',
        required: false,
        default: DEFAULT_MAX_LENGTH,
        minimum: 1,
        maximum: MAX_CONTENT_LENGTH,
      },
    ],
    execute: async (args) => {
      const url = readStringArg(args, 'url');
      const maxLength = clampInteger(
        readIntegerArg(args, 'max_length', DEFAULT_MAX_LENGTH),
        1,
        MAX_CONTENT_LENGTH,
      );
      return fetcher(url, maxLength);
    },
  };
}

