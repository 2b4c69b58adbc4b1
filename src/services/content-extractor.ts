/**
 * Content Extractor
 * Pulls a title, the primary body text and a few outbound links out of arbitrary HTML.
 *
 * Body text comes from the first strategy that yields anything:
 *   A. semantic containers (`main`, `article`, `[role=main]`)
 *   B. elements whose id or class mentions "content" or "main"
 *   C. every paragraph and heading, in document order
 * Boilerplate regions are removed before any strategy runs.
 */

import { parse, HTMLElement, TextNode, type Node } from 'node-html-parser';
import { resolveUrl } from '../utils/url.js';

export interface ExtractedLink {
  text: string;
  url: string;
}

export interface ExtractedContent {
  title: string;
  content: string;
  links: ExtractedLink[];
}

export const MAX_LINKS = 5;
const MAX_LINK_TEXT = 100;

const BOILERPLATE_SELECTOR = [
  'script',
  'style',
  'noscript',
  'template',
  'nav',
  'footer',
  'header',
  'aside',
  '[role="navigation"]',
  '[role="banner"]',
  '[role="contentinfo"]',
  '[role="complementary"]',
].join(', ');

const SEMANTIC_SELECTOR = 'main, article, [role="main"]';
const TEXT_BLOCK_SELECTOR = 'p, h1, h2, h3, h4, h5, h6';
const CONTENT_HINT = /content|main/i;
const SKIPPED_HREF = /^(#|javascript:|mailto:|tel:|data:)/i;

// `pre` is left out so markup inside code blocks is parsed rather than kept as raw text
const RAW_TEXT_ELEMENTS = { script: true, noscript: true, style: true };

type Strategy = (root: HTMLElement) => string | null;

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

function collectText(node: Node, parts: string[]): void {
  if (node instanceof TextNode) {
    parts.push(node.text);
    return;
  }
  for (const child of node.childNodes) {
    collectText(child, parts);
  }
}

/** Text of an element with a space between every text node. */
function elementText(element: HTMLElement): string {
  const parts: string[] = [];
  collectText(element, parts);
  return collapseWhitespace(parts.join(' '));
}

// Drops matches nested inside another match so their text is not counted twice
function outermost(elements: HTMLElement[]): HTMLElement[] {
  const matched = new Set(elements);
  return elements.filter(element => {
    let parent = element.parentNode;
    while (parent) {
      if (matched.has(parent)) return false;
      parent = parent.parentNode;
    }
    return true;
  });
}

function joinText(elements: HTMLElement[]): string | null {
  const text = elements
    .map(elementText)
    .filter(Boolean)
    .join(' ');
  return text || null;
}

const semanticContainers: Strategy = root =>
  joinText(outermost(root.querySelectorAll(SEMANTIC_SELECTOR)));

const hintedContainers: Strategy = root => {
  const candidates = root.querySelectorAll('[id], [class]').filter(element => {
    const id = element.getAttribute('id') ?? '';
    const className = element.getAttribute('class') ?? '';
    return CONTENT_HINT.test(id) || CONTENT_HINT.test(className);
  });
  return joinText(outermost(candidates));
};

const textBlocks: Strategy = root => joinText(root.querySelectorAll(TEXT_BLOCK_SELECTOR));

const BODY_STRATEGIES: Strategy[] = [semanticContainers, hintedContainers, textBlocks];

function extractTitle(root: HTMLElement): string {
  const title = root.querySelector('title');
  if (title) {
    const text = collapseWhitespace(title.text);
    if (text) return text;
  }
  const heading = root.querySelector('h1');
  return heading ? elementText(heading) : '';
}

function extractLinks(root: HTMLElement, baseUrl: string): ExtractedLink[] {
  const links: ExtractedLink[] = [];

  for (const anchor of root.querySelectorAll('a[href]')) {
    if (links.length >= MAX_LINKS) break;

    const href = (anchor.getAttribute('href') ?? '').trim();
    const text = elementText(anchor);
    if (!href || !text || SKIPPED_HREF.test(href)) continue;

    const url = resolveUrl(href, baseUrl);
    if (!url) continue;

    links.push({ text: text.slice(0, MAX_LINK_TEXT), url });
  }

  return links;
}

export function extractContent(html: string, baseUrl: string): ExtractedContent {
  const root = parse(html, { blockTextElements: RAW_TEXT_ELEMENTS });

  // Title is read before boilerplate removal; it often lives in <head> or <header>
  const title = extractTitle(root);

  for (const element of root.querySelectorAll(BOILERPLATE_SELECTOR)) {
    element.remove();
  }

  let content = '';
  for (const strategy of BODY_STRATEGIES) {
    const text = strategy(root);
    if (text) {
      content = text;
      break;
    }
  }

  return {
    title,
    content,
    links: extractLinks(root, baseUrl),
  };
}
