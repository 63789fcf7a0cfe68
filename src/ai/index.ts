/**
 * FAQ RAG - Module Index
 * ======================
 * Centralized exports for the AI layer.
 */

// LLM Module
export * from './llm';

// RAG Module
export * from './rag';

// RAG Service
export {
  RagService,
  loadAndIndexKnowledgeBase,
  createRagServiceFromEnv,
} from './ragService';

export type { AnswerOptions, RagAnswer, RagServiceOptions } from './ragService';
