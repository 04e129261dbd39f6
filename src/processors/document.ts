/**
 * HTML document loading and text cleaning
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';

/**
 * Elements whose text never counts as page content
 */
const NON_CONTENT_TAGS = ['script', 'style', 'noscript', 'head', 'title', 'meta', 'template'];

/**
 * Parse an HTML string into a queryable document
 */
export function loadDocument(html: string): CheerioAPI {
  return cheerio.load(html);
}

/**
 * Visible text of the document with whitespace collapsed.
 * Works on a copy, so the caller's document is left intact.
 */
export function extractCleanText($: CheerioAPI): string {
  const copy = cheerio.load($.html());
  copy(NON_CONTENT_TAGS.join(', ')).remove();

  return copy
    .root()
    .text()
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Collapse runs of whitespace to single spaces
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
