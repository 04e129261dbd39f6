/**
 * Keyword-table topic classification
 */

import fs from 'fs';
import type { CheerioAPI } from 'cheerio';
import { z } from 'zod';
import { extractCleanText } from './document.js';
import type { ClassificationConfig, ExtractedMetadata, TopicClassification } from '../types.js';

/** Topic name to the terms (or URL fragments) that indicate it */
export type TopicTable = Readonly<Record<string, readonly string[]>>;

const topicTableSchema = z.record(z.string(), z.array(z.string().min(1)).min(1));

const MAX_BODY_CHARS = 10000;
const URL_TOPIC_CONFIDENCE = 0.7;
const URL_MATCH_BOOST = 0.2;
const MAX_TOPIC_KEYWORDS = 5;

/**
 * Read and validate a topic table from a JSON file
 */
export function loadTopicTable(file: URL | string): TopicTable {
  const parsed = topicTableSchema.safeParse(JSON.parse(fs.readFileSync(file, 'utf-8')));
  if (!parsed.success) {
    throw new Error(`Invalid topic table ${String(file)}: ${parsed.error.message}`);
  }
  return parsed.data;
}

let defaultTables: { keywords: TopicTable; urlPatterns: TopicTable } | undefined;

function getDefaultTables(): { keywords: TopicTable; urlPatterns: TopicTable } {
  if (!defaultTables) {
    defaultTables = {
      keywords: loadTopicTable(new URL('../../data/topic-keywords.json', import.meta.url)),
      urlPatterns: loadTopicTable(new URL('../../data/url-topic-patterns.json', import.meta.url)),
    };
  }
  return defaultTables;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function clamp(confidence: number): number {
  return Math.min(Math.max(confidence, 0), 1);
}

export type ClassifierOptions = Pick<ClassificationConfig, 'minConfidence' | 'maxTopics'>;

export interface ClassifierTables {
  keywords?: TopicTable;
  urlPatterns?: TopicTable;
}

interface TopicMatcher {
  topic: string;
  termCount: number;
  pattern: RegExp;
}

/**
 * Scores pages against a static topic table.
 *
 * For each topic with matches in the lower-cased text:
 *   score = unique / |terms| + min(total / words * 100, 0.5) + min(unique / 10, 0.3)
 * Results below `minConfidence` are dropped, the rest clamped to 1, sorted by
 * confidence (stable, so ties keep table order) and capped at `maxTopics`.
 */
export class TopicClassifier {
  private options: ClassifierOptions;
  private matchers: TopicMatcher[];
  private urlPatterns: TopicTable;

  constructor(options: ClassifierOptions, tables: ClassifierTables = {}) {
    this.options = options;
    const keywords = tables.keywords ?? getDefaultTables().keywords;
    this.urlPatterns = tables.urlPatterns ?? getDefaultTables().urlPatterns;

    this.matchers = Object.entries(keywords).map(([topic, terms]) => ({
      topic,
      termCount: terms.length,
      pattern: new RegExp(
        `\\b(?:${terms.map(term => escapeRegExp(term.toLowerCase())).join('|')})\\b`,
        'g'
      ),
    }));
  }

  /**
   * Topics for a document, merged with topics implied by its URL
   */
  classify(
    $: CheerioAPI,
    metadata: Pick<ExtractedMetadata, 'url' | 'title' | 'description' | 'keywords'>
  ): TopicClassification[] {
    const text = [
      metadata.title ?? '',
      metadata.description ?? '',
      metadata.keywords.join(' '),
      extractCleanText($).slice(0, MAX_BODY_CHARS),
    ]
      .filter(part => part.length > 0)
      .join(' ');

    return this.enhance(this.classifyText(text), metadata.url);
  }

  classifyText(text: string): TopicClassification[] {
    const lower = text.toLowerCase();
    const wordCount = lower.split(/\s+/).filter(word => word.length > 0).length;
    if (wordCount === 0) {
      return [];
    }

    const results: TopicClassification[] = [];
    for (const matcher of this.matchers) {
      const matches = lower.match(matcher.pattern);
      if (!matches) {
        continue;
      }

      const unique = new Set(matches).size;
      const score =
        unique / matcher.termCount +
        Math.min((matches.length / wordCount) * 100, 0.5) +
        Math.min(unique / 10, 0.3);

      if (score >= this.options.minConfidence) {
        results.push({
          topic: matcher.topic,
          confidence: clamp(score),
          keywords: topKeywords(matches),
        });
      }
    }

    return this.rank(results);
  }

  /**
   * Topics whose URL fragments appear in the URL, at a flat confidence
   */
  classifyByUrl(url: string): TopicClassification[] {
    const lower = url.toLowerCase();
    const results: TopicClassification[] = [];

    for (const [topic, patterns] of Object.entries(this.urlPatterns)) {
      const hit = patterns.find(pattern => lower.includes(pattern.toLowerCase()));
      if (hit !== undefined) {
        results.push({
          topic,
          confidence: URL_TOPIC_CONFIDENCE,
          keywords: [hit.replace(/^\/+|\/+$/g, '')],
        });
      }
    }

    return results;
  }

  /**
   * Boost text topics confirmed by the URL and append URL-only topics
   */
  enhance(topics: TopicClassification[], url: string): TopicClassification[] {
    const merged = new Map<string, TopicClassification>();
    for (const topic of topics) {
      merged.set(topic.topic, { ...topic, keywords: [...topic.keywords] });
    }

    for (const fromUrl of this.classifyByUrl(url)) {
      const existing = merged.get(fromUrl.topic);
      if (existing) {
        existing.confidence = clamp(existing.confidence + URL_MATCH_BOOST);
      } else {
        merged.set(fromUrl.topic, fromUrl);
      }
    }

    return this.rank(Array.from(merged.values()));
  }

  /**
   * Most frequent table terms for a topic found in the text
   */
  extractTopicKeywords(text: string, topic: string): string[] {
    const matcher = this.matchers.find(m => m.topic === topic);
    if (!matcher) {
      return [];
    }
    const matches = text.toLowerCase().match(matcher.pattern);
    return matches ? topKeywords(matches) : [];
  }

  private rank(topics: TopicClassification[]): TopicClassification[] {
    return [...topics]
      .sort((a, b) => b.confidence - a.confidence)
      .slice(0, this.options.maxTopics);
  }
}

/**
 * Top terms by frequency; ties keep first-seen order
 */
function topKeywords(matches: string[]): string[] {
  const counts = new Map<string, number>();
  for (const match of matches) {
    counts.set(match, (counts.get(match) ?? 0) + 1);
  }
  return Array.from(counts.entries())
    .sort((a, b) => b[1] - a[1])
    .slice(0, MAX_TOPIC_KEYWORDS)
    .map(([keyword]) => keyword);
}
