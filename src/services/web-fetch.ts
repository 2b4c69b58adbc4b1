// Page fetcher
// URL check, one GET with a bounded timeout, then content extraction

import { env } from '../env.js';
import { discardBody, readTextCapped } from '../utils/http.js';
import { normalizeUrl, validateUrl } from '../utils/url.js';
import { extractContent, type ExtractedLink } from './content-extractor.js';
import { classifyFetchError, ToolError } from './tools/errors.js';

export interface PageExtract {
  url: string;
  title: string;
  content: string;
  links: ExtractedLink[];
  status_code: number;
}

export const DEFAULT_MAX_LENGTH = 5000;
export const MAX_CONTENT_LENGTH = 10000;
export const TRUNCATION_MARKER = '...';

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

export function truncateContent(content: string, maxLength: number): string {
  if (content.length <= maxLength) return content;
  // Never end on the first half of a surrogate pair
  const end = isHighSurrogate(content.charCodeAt(maxLength - 1)) ? maxLength - 1 : maxLength;
  return content.slice(0, end) + TRUNCATION_MARKER;
}

function isHtml(contentType: string): boolean {
  // Missing content-type is treated as HTML
  return !contentType || contentType.includes('html');
}

function isPlainText(contentType: string): boolean {
  return contentType.startsWith('text/') || contentType.includes('json') || contentType.includes('xml');
}

export async function fetchPage(rawUrl: string, maxLength = DEFAULT_MAX_LENGTH): Promise<PageExtract> {
  const url = normalizeUrl(rawUrl);
  if (!validateUrl(url)) {
    throw ToolError.invalidUrl(rawUrl);
  }

  const limit = Math.max(1, Math.min(maxLength, MAX_CONTENT_LENGTH));

  let response: Response;
  let contentType: string;
  let body = '';
  try {
    response = await fetch(url, {
      method: 'GET',
      headers: {
        'User-Agent': env.FETCH_USER_AGENT,
        Accept: 'text/html,application/xhtml+xml,text/plain;q=0.9,*/*;q=0.8',
      },
      redirect: 'follow',
      signal: AbortSignal.timeout(env.FETCH_TIMEOUT_MS),
    });
    contentType = (response.headers.get('content-type') ?? '').toLowerCase();
    if (isHtml(contentType) || isPlainText(contentType)) {
      body = await readTextCapped(response);
    } else {
      await discardBody(response);
    }
  } catch (error) {
    throw classifyFetchError(error, url);
  }

  // 4xx/5xx pages are still returned; only transport failures are errors
  const finalUrl = response.url || url;

  let title = '';
  let content = '';
  let links: ExtractedLink[] = [];

  if (isHtml(contentType)) {
    ({ title, content, links } = extractContent(body, finalUrl));
  } else if (isPlainText(contentType)) {
    content = body.replace(/\s+/g, ' ').trim();
  }

  return {
    url: finalUrl,
    title,
    content: truncateContent(content, limit),
    links,
    status_code: response.status,
  };
}
