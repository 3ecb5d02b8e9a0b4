/**
 * HTML cleaning for channel message bodies
 *
 * Links survive as `[text](url)`; every other tag is reduced to its text.
 */

import { parse, HTMLElement, TextNode, type Node } from 'node-html-parser';

const BLOCK_TAGS = new Set([
  'p',
  'div',
  'li',
  'ul',
  'ol',
  'tr',
  'table',
  'blockquote',
  'pre',
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
]);

const DROPPED_TAGS = new Set(['script', 'style', 'noscript', 'template']);

const TAG_MARKUP = /<\/?[a-zA-Z][^<>]*>/;

function collapseInline(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function renderNode(node: Node): string {
  if (node instanceof TextNode) {
    return node.text;
  }

  if (!(node instanceof HTMLElement)) {
    return '';
  }

  const tag = node.rawTagName ? node.rawTagName.toLowerCase() : '';

  if (tag === 'br') return '\n';
  if (DROPPED_TAGS.has(tag)) return '';

  if (tag === 'a') {
    const href = node.getAttribute('href')?.trim();
    const inner = collapseInline(node.childNodes.map(renderNode).join(''));
    return href ? `[${inner}](${href})` : inner;
  }

  const inner = node.childNodes.map(renderNode).join('');
  return BLOCK_TAGS.has(tag) ? `\n${inner}\n` : inner;
}

/**
 * Normalize whitespace while keeping paragraph breaks
 */
export function normalizeWhitespace(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/\u00a0/g, ' ')
    .replace(/[ \t\f\v]+/g, ' ')
    .split('\n')
    .map(line => line.trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

function render(html: string): string {
  // <pre> is parsed like any other element so its markup is stripped too
  const root = parse(html, {
    comment: false,
    blockTextElements: { script: true, noscript: true, style: true },
  });
  return normalizeWhitespace(renderNode(root));
}

/**
 * Convert an HTML message body to plain text
 *
 * Markup that only appears once entities are decoded (`&lt;b&gt;`) is
 * rendered a second time.
 */
export function cleanHtml(content: string | null | undefined): string {
  if (!content) return '';

  const text = render(content);
  return TAG_MARKUP.test(text) ? render(text) : text;
}
