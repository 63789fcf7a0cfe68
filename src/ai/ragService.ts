/**
 * FAQ RAG - RAG Service
 * =====================
 * Main orchestration: load, index, retrieve, prompt, complete.
 */

import { env } from '../env';
import { createContextLogger, generateCorrelationId } from '../utils/logger';
import { DEFAULT_INDEX_SCHEMA } from '../data/types';
import type { IndexSchema, KnowledgeDocument, SearchQuery } from '../data/types';
import { loadKnowledgeBase } from './rag/loader';
import type { LoadOptions } from './rag/loader';
import { SearchIndex } from './rag/indexer';
import { searchDocuments } from './rag/retriever';
import { buildRAGPrompt, DEFAULT_PROMPT_TEMPLATE } from './rag/prompt';
import type { PromptTemplate } from './rag/prompt';
import { LLMGateway } from './llm/gateway';
import { OpenAIClient } from './llm/providers/OpenAIClient';

// ============================================
// TYPES
// ============================================

export interface AnswerOptions {
  boosts?: Record<string, number>;
  filters?: Record<string, string>;
  limit?: number;
  model?: string;
}

export interface RagAnswer {
  answer: string;
  prompt: string;
  results: KnowledgeDocument[];
  model: string;
  latencyMs: number;
}

export interface RagServiceOptions {
  template?: PromptTemplate;
  /** Result count used when a query gives none */
  defaultLimit?: number;
}

// ============================================
// KNOWLEDGE BASE
// ============================================

/**
 * Load a knowledge base file and index it with the FAQ schema
 */
export async function loadAndIndexKnowledgeBase(
  filePath: string,
  options: LoadOptions & { schema?: IndexSchema } = {}
): Promise<SearchIndex> {
  const { schema = DEFAULT_INDEX_SCHEMA, ...loadOptions } = options;
  const corpus = await loadKnowledgeBase(filePath, loadOptions);
  return SearchIndex.fit(corpus, schema);
}

// ============================================
// SERVICE
// ============================================

export class RagService {
  private readonly template: PromptTemplate;
  private readonly defaultLimit: number | undefined;

  constructor(
    readonly index: SearchIndex,
    private readonly gateway: LLMGateway,
    options: RagServiceOptions = {}
  ) {
    this.template = options.template ?? DEFAULT_PROMPT_TEMPLATE;
    this.defaultLimit = options.defaultLimit;
  }

  retrieve(query: SearchQuery): KnowledgeDocument[] {
    return searchDocuments(this.index, {
      ...query,
      limit: query.limit ?? this.defaultLimit,
    });
  }

  buildPrompt(question: string, results: readonly KnowledgeDocument[]): string {
    return buildRAGPrompt(question, results, this.template);
  }

  /**
   * Answer a question from the knowledge base
   */
  async answer(question: string, options: AnswerOptions = {}): Promise<RagAnswer> {
    const log = createContextLogger('rag-service', generateCorrelationId());
    const model = options.model ?? this.gateway.defaultModel;

    const results = this.retrieve({
      text: question,
      boosts: options.boosts,
      filters: options.filters,
      limit: options.limit,
    });
    log.info({ results: results.length, filters: options.filters }, 'Retrieved context');

    const prompt = this.buildPrompt(question, results);
    const response = await this.gateway.completeWithDetails(prompt, model);

    log.info({ model: response.model, latencyMs: response.latencyMs }, 'Answer generated');

    return {
      answer: response.content,
      prompt,
      results,
      model: response.model,
      latencyMs: response.latencyMs,
    };
  }
}

/**
 * Wire the service from validated environment variables
 */
export async function createRagServiceFromEnv(): Promise<RagService> {
  const client = new OpenAIClient({
    apiKey: env.OPENAI_API_KEY,
    baseUrl: env.OPENAI_BASE_URL,
    defaultModel: env.LLM_MODEL,
    timeoutMs: env.LLM_TIMEOUT_MS,
  });
  const gateway = new LLMGateway(client, { defaultModel: env.LLM_MODEL });
  const index = await loadAndIndexKnowledgeBase(env.KNOWLEDGE_BASE_PATH);

  return new RagService(index, gateway, { defaultLimit: env.RAG_TOP_K });
}
