/**
 * Structured metadata extraction from HTML documents
 */

import type { CheerioAPI } from 'cheerio';
import { collapseWhitespace, extractCleanText } from './document.js';
import { resolveUrl } from '../utils/url.js';
import type { ExtractedMetadata, ImageMetadata, LinkMetadata } from '../types.js';

/**
 * One extraction rule: returns a value or nothing
 */
export type FieldSelector<T> = ($: CheerioAPI) => T | undefined;

const MAX_TITLE_LENGTH = 500;
const MAX_DESCRIPTION_LENGTH = 1000;
const MAX_AUTHOR_LENGTH = 200;
const MAX_LANGUAGE_LENGTH = 10;
const MAX_LINK_TEXT_LENGTH = 200;
const MAX_KEYWORDS = 20;
const MAX_IMAGES = 50;
const MAX_LINKS = 100;
/** Images smaller than this in either dimension are decorative */
const MIN_IMAGE_DIMENSION = 50;

/**
 * Content attribute of the first match, else its text
 */
function firstValue(selector: string): FieldSelector<string> {
  return $ => {
    const element = $(selector).first();
    if (element.length === 0) {
      return undefined;
    }
    const value = element.attr('content') ?? element.text();
    const cleaned = collapseWhitespace(value);
    return cleaned || undefined;
  };
}

/**
 * Text of the first match, ignoring attributes
 */
function firstText(selector: string): FieldSelector<string> {
  return $ => collapseWhitespace($(selector).first().text()) || undefined;
}

/**
 * Evaluate selectors in order; the first non-empty result wins
 */
export function firstOf<T>($: CheerioAPI, chain: ReadonlyArray<FieldSelector<T>>): T | undefined {
  for (const select of chain) {
    const value = select($);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

const TITLE_CHAIN: FieldSelector<string>[] = [
  firstText('title'),
  firstText('h1'),
  firstValue('meta[property="og:title"]'),
  firstValue('meta[name="twitter:title"]'),
  firstValue('[itemprop="name"]'),
];

const DESCRIPTION_CHAIN: FieldSelector<string>[] = [
  firstValue('meta[name="description"]'),
  firstValue('meta[property="og:description"]'),
  firstValue('meta[name="twitter:description"]'),
  firstValue('[itemprop="description"]'),
  firstText('p'),
];

const AUTHOR_CHAIN: FieldSelector<string>[] = [
  firstValue('meta[name="author"]'),
  firstValue('meta[property="article:author"]'),
  firstValue('meta[name="twitter:creator"]'),
  firstValue('[itemprop="author"]'),
  firstText('[rel="author"]'),
];

const DATE_SELECTORS = [
  '[itemprop="datePublished"]',
  'meta[property="article:published_time"]',
  'meta[name="publication_date"]',
  'meta[name="date"]',
  'time[datetime]',
];

/**
 * Parse a date leniently; unparsable input yields nothing
 */
export function parseDate(value: string): Date | undefined {
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

const PUBLISHED_DATE_CHAIN: FieldSelector<Date>[] = DATE_SELECTORS.map(
  (selector): FieldSelector<Date> =>
    $ => {
      const element = $(selector).first();
      if (element.length === 0) {
        return undefined;
      }
      const raw = element.attr('content') ?? element.attr('datetime') ?? element.text();
      const value = raw.trim();
      return value ? parseDate(value) : undefined;
    }
);

function canonicalChain(baseUrl: string): FieldSelector<string>[] {
  return [
    $ => {
      const href = $('link[rel="canonical"]').first().attr('href');
      return href ? resolveUrl(href.trim(), baseUrl) : undefined;
    },
    $ => {
      const content = $('meta[property="og:url"]').first().attr('content');
      return content ? resolveUrl(content.trim(), baseUrl) : undefined;
    },
  ];
}

const LANGUAGE_CHAIN: FieldSelector<string>[] = [
  $ => $('html').first().attr('lang')?.trim() || undefined,
  $ => {
    let language: string | undefined;
    $('meta[http-equiv]').each((_, element) => {
      const meta = $(element);
      if (language === undefined && meta.attr('http-equiv')?.toLowerCase() === 'content-language') {
        language = meta.attr('content')?.trim() || undefined;
      }
    });
    return language;
  },
];

/**
 * Keywords from meta tags and tag links, deduplicated in first-seen order
 */
export function extractKeywords($: CheerioAPI): string[] {
  const keywords: string[] = [];

  $('meta[name="keywords"]').each((_, element) => {
    const content = $(element).attr('content') ?? '';
    keywords.push(...content.split(/[,;]/));
  });
  $('meta[property="article:tag"]').each((_, element) => {
    keywords.push($(element).attr('content') ?? '');
  });
  $('[rel="tag"]').each((_, element) => {
    const tag = $(element);
    keywords.push(tag.attr('content') ?? tag.text());
  });

  const unique = new Set<string>();
  for (const keyword of keywords) {
    const cleaned = collapseWhitespace(keyword);
    if (cleaned) {
      unique.add(cleaned);
    }
  }
  return Array.from(unique).slice(0, MAX_KEYWORDS);
}

/**
 * Dimension attribute as a whole number of pixels
 */
function parseDimension(value: string | undefined): number | undefined {
  if (!value || !/^\s*\d+\s*$/.test(value)) {
    return undefined;
  }
  return parseInt(value, 10);
}

export function extractImages($: CheerioAPI, baseUrl: string): ImageMetadata[] {
  const images: ImageMetadata[] = [];

  $('img[src]').each((_, element) => {
    if (images.length >= MAX_IMAGES) {
      return false;
    }

    const img = $(element);
    const src = img.attr('src')?.trim();
    if (!src || src.startsWith('data:')) {
      return undefined;
    }

    const url = resolveUrl(src, baseUrl);
    if (!url || url.startsWith('data:')) {
      return undefined;
    }

    const width = parseDimension(img.attr('width'));
    const height = parseDimension(img.attr('height'));
    if (
      width !== undefined &&
      height !== undefined &&
      (width < MIN_IMAGE_DIMENSION || height < MIN_IMAGE_DIMENSION)
    ) {
      return undefined;
    }

    const image: ImageMetadata = { url };
    const alt = img.attr('alt')?.trim();
    const title = img.attr('title')?.trim();
    if (alt) image.alt = alt;
    if (title) image.title = title;
    if (width !== undefined) image.width = width;
    if (height !== undefined) image.height = height;
    images.push(image);
    return undefined;
  });

  return images;
}

export function extractLinks($: CheerioAPI, baseUrl: string): LinkMetadata[] {
  const links: LinkMetadata[] = [];

  $('a[href]').each((_, element) => {
    if (links.length >= MAX_LINKS) {
      return false;
    }

    const anchor = $(element);
    const href = anchor.attr('href')?.trim();
    if (!href || href.startsWith('#') || href.toLowerCase().startsWith('javascript:')) {
      return undefined;
    }

    const url = resolveUrl(href, baseUrl);
    if (!url) {
      return undefined;
    }

    const link: LinkMetadata = { url };
    const text = collapseWhitespace(anchor.text()).slice(0, MAX_LINK_TEXT_LENGTH);
    const title = anchor.attr('title')?.trim();
    const rel = anchor.attr('rel')?.trim().split(/\s+/)[0];
    if (text) link.text = text;
    if (title) link.title = title;
    if (rel) link.rel = rel;
    links.push(link);
    return undefined;
  });

  return links;
}

/**
 * Number of word tokens in the visible text
 */
export function countWords($: CheerioAPI): number {
  return extractCleanText($).match(/[\p{L}\p{N}_]+/gu)?.length ?? 0;
}

/**
 * Derive page metadata from a parsed document.
 * Pure: reads the document and base URL only, and never mutates the document.
 */
export function extractMetadata($: CheerioAPI, baseUrl: string): ExtractedMetadata {
  const metadata: ExtractedMetadata = {
    url: baseUrl,
    keywords: extractKeywords($),
    contentType: 'text/html',
    wordCount: countWords($),
    images: extractImages($, baseUrl),
    links: extractLinks($, baseUrl),
  };

  const title = firstOf($, TITLE_CHAIN);
  if (title) metadata.title = title.slice(0, MAX_TITLE_LENGTH);

  const description = firstOf($, DESCRIPTION_CHAIN);
  if (description) metadata.description = description.slice(0, MAX_DESCRIPTION_LENGTH);

  const author = firstOf($, AUTHOR_CHAIN);
  if (author) metadata.author = author.slice(0, MAX_AUTHOR_LENGTH);

  const publishedDate = firstOf($, PUBLISHED_DATE_CHAIN);
  if (publishedDate) metadata.publishedDate = publishedDate;

  const canonicalUrl = firstOf($, canonicalChain(baseUrl));
  if (canonicalUrl) metadata.canonicalUrl = canonicalUrl;

  const language = firstOf($, LANGUAGE_CHAIN);
  if (language) metadata.language = language.slice(0, MAX_LANGUAGE_LENGTH);

  return metadata;
}
