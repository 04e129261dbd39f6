/**
 * Processors module exports
 */

export { loadDocument, extractCleanText, collapseWhitespace } from './document.js';
export {
  extractMetadata,
  extractKeywords,
  extractImages,
  extractLinks,
  countWords,
  firstOf,
  parseDate,
  type FieldSelector,
} from './metadata-extractor.js';
export {
  TopicClassifier,
  loadTopicTable,
  type TopicTable,
  type ClassifierOptions,
  type ClassifierTables,
} from './topic-classifier.js';
