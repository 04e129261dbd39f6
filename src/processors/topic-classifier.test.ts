import { describe, expect, it } from 'vitest';
import { loadDocument } from './document.js';
import { extractMetadata } from './metadata-extractor.js';
import { TopicClassifier, type TopicTable } from './topic-classifier.js';

const SHOP_TERMS = [
  'buy', 'cart', 'checkout', 'shop', 'purchase', 'product', 'payment', 'shipping',
  'delivery', 'order', 'price', 'discount', 'sale', 'retail', 'store', 'marketplace',
  'coupon', 'basket', 'wishlist', 'refund',
];

const keywords: TopicTable = { ecommerce: SHOP_TERMS };
const urlPatterns: TopicTable = { ecommerce: ['/shop'], news: ['/news'] };

function words(...parts: string[]): string {
  return parts.join(' ');
}

function filler(count: number): string {
  return Array.from({ length: count }, () => 'lorem').join(' ');
}

describe('TopicClassifier', () => {
  const classifier = new TopicClassifier({ minConfidence: 0.5, maxTopics: 10 }, { keywords, urlPatterns });

  it('scores coverage, frequency and diversity', () => {
    const text = words('buy buy buy cart cart', filler(45));

    const topics = classifier.classifyText(text);

    expect(topics).toHaveLength(1);
    expect(topics[0]?.topic).toBe('ecommerce');
    expect(topics[0]?.confidence).toBeCloseTo(0.8);
    expect(topics[0]?.keywords).toEqual(['buy', 'cart']);
  });

  it('drops topics below the minimum confidence', () => {
    expect(classifier.classifyText(words('buy', filler(999)))).toEqual([]);
  });

  it('matches whole words only', () => {
    expect(classifier.classifyText('cartoon shopping buyer')).toEqual([]);
  });

  it('returns nothing for empty text', () => {
    expect(classifier.classifyText('   ')).toEqual([]);
  });

  it('clamps confidence to one', () => {
    const topics = classifier.classifyText('buy cart checkout shop order');

    expect(topics[0]?.confidence).toBe(1);
  });

  it('orders ties by table order and caps the topic count', () => {
    const tied = new TopicClassifier(
      { minConfidence: 0.5, maxTopics: 10 },
      { keywords: { alpha: ['one', 'two'], beta: ['one', 'two'] }, urlPatterns: {} }
    );
    const capped = new TopicClassifier(
      { minConfidence: 0.5, maxTopics: 1 },
      { keywords: { alpha: ['one', 'two'], beta: ['one', 'two'] }, urlPatterns: {} }
    );

    expect(tied.classifyText('one two').map(t => t.topic)).toEqual(['alpha', 'beta']);
    expect(capped.classifyText('one two').map(t => t.topic)).toEqual(['alpha']);
  });

  it('gives the same answer every time', () => {
    const text = words('buy cart order', filler(20));

    expect(classifier.classifyText(text)).toEqual(classifier.classifyText(text));
  });

  describe('URL hints', () => {
    it('derives topics from URL fragments', () => {
      expect(classifier.classifyByUrl('https://example.com/news/today')).toEqual([
        { topic: 'news', confidence: 0.7, keywords: ['news'] },
      ]);
    });

    it('boosts confirmed topics without exceeding one', () => {
      const enhanced = classifier.enhance(
        [{ topic: 'ecommerce', confidence: 0.9, keywords: ['buy'] }],
        'https://example.com/shop/toasters'
      );

      expect(enhanced).toEqual([{ topic: 'ecommerce', confidence: 1, keywords: ['buy'] }]);
    });

    it('appends URL-only topics after stronger text topics', () => {
      const enhanced = classifier.enhance(
        [{ topic: 'ecommerce', confidence: 0.8, keywords: ['buy'] }],
        'https://example.com/news/1'
      );

      expect(enhanced.map(t => [t.topic, t.confidence])).toEqual([
        ['ecommerce', 0.8],
        ['news', 0.7],
      ]);
    });
  });

  it('classifies a parsed page with its metadata and URL', () => {
    const $ = loadDocument(
      '<title>Toaster sale</title><body>\n<p>Buy the toaster and add it to your cart.</p>\n</body>'
    );
    const metadata = extractMetadata($, 'https://example.com/shop/toaster');

    const topics = classifier.classify($, metadata);

    expect(topics.map(t => t.topic)).toEqual(['ecommerce']);
    expect(topics[0]?.confidence).toBe(1);
    expect(topics[0]?.keywords).toEqual(['buy', 'cart', 'sale']);
  });

  it('lists the most frequent terms for a topic', () => {
    expect(classifier.extractTopicKeywords('Cart buy cart order', 'ecommerce')).toEqual([
      'cart',
      'buy',
      'order',
    ]);
    expect(classifier.extractTopicKeywords('buy', 'unknown')).toEqual([]);
  });

  it('loads the bundled tables by default', () => {
    const bundled = new TopicClassifier({ minConfidence: 0.5, maxTopics: 10 });

    expect(bundled.classifyByUrl('https://example.com/recipe/bread')).toEqual([
      { topic: 'food', confidence: 0.7, keywords: ['recipe'] },
    ]);
  });
});
