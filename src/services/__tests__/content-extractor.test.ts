import { describe, it, expect } from 'vitest';
import { extractContent } from '../content-extractor.js';

const BASE_URL = 'https://example.com/docs/page.html';

describe('Content Extractor', () => {
  it('keeps main content and drops scripts and page chrome', () => {
    const html = [
      '<html><head><title> Example  Page </title><script>var secret = "tracking-code";</script></head>',
      '<body><header><h1>Site Header</h1><a href="/home">Home</a></header>',
      '<nav><a href="/nav">Nav link</a></nav>',
      '<main><h2>Article heading</h2><p>Main body text.</p><script>console.log("inline-script")</script></main>',
      '<footer><p>Footer text</p></footer></body></html>',
    ].join('');

    const result = extractContent(html, BASE_URL);

    expect(result.title).toBe('Example Page');
    expect(result.content).toBe('Article heading Main body text.');
    expect(result.content).not.toContain('tracking-code');
    expect(result.content).not.toContain('inline-script');
    expect(result.links).toEqual([]);
  });

  it('falls back to the first h1 for the title', () => {
    const result = extractContent('<body><h1>Only  Heading</h1><p>Text</p></body>', BASE_URL);

    expect(result.title).toBe('Only Heading');
    expect(result.content).toBe('Only Heading Text');
  });

  it('prefers semantic containers over hinted ones', () => {
    const html = '<div class="content"><p>Hinted</p></div><article><p>Semantic</p></article>';

    expect(extractContent(html, BASE_URL).content).toBe('Semantic');
  });

  it('does not repeat text of nested containers', () => {
    const html = '<main><article><p>Once</p></article></main>';

    expect(extractContent(html, BASE_URL).content).toBe('Once');
  });

  it('uses containers whose class or id mentions content', () => {
    const html = [
      '<div class="page">',
      '<div class="post-content"><p>Hello <b>there</b></p></div>',
      '<div class="comments"><p>Comment</p></div>',
      '</div>',
    ].join('');

    expect(extractContent(html, BASE_URL).content).toBe('Hello there');
  });

  it('matches ids as well as classes', () => {
    const html = '<div id="main-column"><span>Column text</span></div><p>Stray paragraph</p>';

    expect(extractContent(html, BASE_URL).content).toBe('Column text');
  });

  it('falls through to paragraphs and headings when nothing is marked up', () => {
    const html = '<body><div><h2>Section</h2><p>First</p><span>ignored</span><p>Second</p></div></body>';

    expect(extractContent(html, BASE_URL).content).toBe('Section First Second');
  });

  it('returns an empty extract instead of failing on structureless input', () => {
    expect(extractContent('<div>just text</div>', BASE_URL)).toEqual({
      title: '',
      content: '',
      links: [],
    });
    expect(extractContent('', BASE_URL)).toEqual({ title: '', content: '', links: [] });
  });

  it('strips sidebars and navigation roles', () => {
    const html = [
      '<aside><p>Sidebar</p></aside>',
      '<div role="navigation"><p>Menu</p></div>',
      '<p>Body</p>',
    ].join('');

    expect(extractContent(html, BASE_URL).content).toBe('Body');
  });

  it('decodes entities', () => {
    expect(extractContent('<p>Fish &amp; Chips</p>', BASE_URL).content).toBe('Fish & Chips');
  });

  it('parses markup inside code blocks', () => {
    const html = '<main><pre><b>bold</b> &lt;x&gt;</pre></main>';

    expect(extractContent(html, BASE_URL).content).toBe('bold <x>');
  });

  it('survives malformed markup', () => {
    const result = extractContent('<p>Unclosed <b>bold<p>Next', BASE_URL);

    expect(result.content).toContain('Unclosed');
  });

  it('collects at most five absolute links in document order', () => {
    const html = [
      '<body><p>x</p>',
      '<a href="/a">A</a>',
      '<a href="b.html">B</a>',
      '<a href="#top">Top</a>',
      '<a href="javascript:void(0)">JS</a>',
      '<a href="https://other.org/c">C</a>',
      '<a href="/empty"></a>',
      '<a href="/d">D</a>',
      '<a href="/e">E</a>',
      '<a href="/f">F</a>',
      '</body>',
    ].join('');

    expect(extractContent(html, BASE_URL).links).toEqual([
      { text: 'A', url: 'https://example.com/a' },
      { text: 'B', url: 'https://example.com/docs/b.html' },
      { text: 'C', url: 'https://other.org/c' },
      { text: 'D', url: 'https://example.com/d' },
      { text: 'E', url: 'https://example.com/e' },
    ]);
  });

  it('truncates long link text', () => {
    const html = `<p>x</p><a href="/long">${'x'.repeat(150)}</a>`;
    const [link] = extractContent(html, BASE_URL).links;

    expect(link.text).toHaveLength(100);
    expect(link.url).toBe('https://example.com/long');
  });
});
