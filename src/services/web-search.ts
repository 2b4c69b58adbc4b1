import { parse, type HTMLElement } from 'node-html-parser';
import { env } from '../env.js';
import { discardBody, readTextCapped } from '../utils/http.js';
import { classifyFetchError, ToolError } from './tools/errors.js';

export interface SearchRecord {
  title: string;
  url: string;
  snippet: string;
}

export const MAX_SEARCH_RESULTS = 10;

function normalizeText(value: unknown): string {
  return String(value ?? '').replace(/\s+/g, ' ').trim();
}

// Result links point at a DuckDuckGo redirect (`//duckduckgo.com/l/?uddg=<target>`)
export function resolveResultHref(href: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(href, 'https://duckduckgo.com');
  } catch {
    return null;
  }

  const target = parsed.pathname === '/l/' ? parsed.searchParams.get('uddg') : parsed.toString();
  if (!target || !/^https?:\/\//i.test(target)) return null;
  return target;
}

export function parseSearchResults(html: string, limit: number): SearchRecord[] {
  return collectResults(parse(html), limit);
}

// A results page carries `.result` blocks, or `.no-results` when the query matched nothing
function isResultsPage(root: HTMLElement): boolean {
  return root.querySelector('.result') !== null || root.querySelector('.no-results') !== null;
}

function collectResults(root: HTMLElement, limit: number): SearchRecord[] {
  const records: SearchRecord[] = [];

  for (const block of root.querySelectorAll('.result')) {
    if (records.length >= limit) break;
    if (block.classList.contains('result--ad')) continue;

    const anchor = block.querySelector('a.result__a');
    if (!anchor) continue;

    const url = resolveResultHref(anchor.getAttribute('href') ?? '');
    const title = normalizeText(anchor.text);
    if (!url || !title) continue;

    records.push({
      title,
      url,
      snippet: normalizeText(block.querySelector('.result__snippet')?.text),
    });
  }

  return records;
}

/**
 * Queries DuckDuckGo's HTML endpoint. Records keep the provider's ranking;
 * failures surface as ToolError so the tool can hand them to the model.
 */
export async function searchWeb(query: string, count = 5): Promise<SearchRecord[]> {
  const q = normalizeText(query);
  if (!q) {
    throw ToolError.invalidArgument('Search query must not be empty');
  }

  const limit = Math.max(1, Math.min(count, MAX_SEARCH_RESULTS));
  const endpoint = new URL(env.SEARCH_ENDPOINT);
  endpoint.searchParams.set('q', q);

  let html: string;
  let status: number;
  try {
    const response = await fetch(endpoint.toString(), {
      method: 'GET',
      headers: {
        Accept: 'text/html,application/xhtml+xml',
        'User-Agent': env.FETCH_USER_AGENT,
      },
      signal: AbortSignal.timeout(env.SEARCH_TIMEOUT_MS),
    });

    status = response.status;
    if (!response.ok) {
      await discardBody(response);
      throw ToolError.execution(`DuckDuckGo search error (${status})`);
    }

    html = await readTextCapped(response);
  } catch (error) {
    throw classifyFetchError(error, endpoint.origin);
  }

  // Rate-limit and bot-check pages come back as 2xx without any result markup
  const root = parse(html);
  if (!isResultsPage(root)) {
    throw ToolError.execution(`DuckDuckGo returned an unrecognized page (${status})`);
  }

  return collectResults(root, limit);
}
