/**
 * FAQ RAG - LLM Types
 * ===================
 * Provider-neutral chat completion types.
 */

// ============================================
// MESSAGE TYPES
// ============================================

export type LLMRole = 'system' | 'user' | 'assistant';

export interface LLMMessage {
  role: LLMRole;
  content: string;
}

// ============================================
// REQUEST/RESPONSE TYPES
// ============================================

export interface LLMCompletionRequest {
  messages: LLMMessage[];
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface LLMCompletionResponse {
  content: string;
  model: string;
  usage: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
  finishReason: string;
  latencyMs: number;
}

// ============================================
// PROVIDER CONFIGURATION
// ============================================

export type LLMProvider = 'openai';

export interface LLMProviderConfig {
  provider: LLMProvider;
  apiKey: string;
  baseUrl: string;
  defaultModel: string;
  timeoutMs: number;
}

export const DEFAULT_MODEL = 'gpt-4o';
