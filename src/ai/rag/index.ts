/**
 * FAQ RAG - RAG Module Index
 * ==========================
 * Centralized exports for the retrieval pipeline.
 */

// Loader
export { loadKnowledgeBase, flattenCollection } from './loader';
export type { LoadOptions } from './loader';

// Indexer
export { SearchIndex, buildIndex } from './indexer';

// Retriever
export {
  searchDocuments,
  scoreDocuments,
  DEFAULT_MAX_RESULTS,
  DEFAULT_BOOST,
} from './retriever';

// Prompt builder
export {
  buildRAGPrompt,
  buildContext,
  DEFAULT_PROMPT_TEMPLATE,
  FAQ_ASSISTANT_INSTRUCTIONS,
} from './prompt';
export type { PromptTemplate, PromptField } from './prompt';

export { tokenize } from './tokenizer';
