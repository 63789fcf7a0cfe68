/**
 * FAQ RAG - LLM Client Interface
 * ==============================
 * Abstract base class for LLM providers.
 */

import type {
  LLMCompletionRequest,
  LLMCompletionResponse,
  LLMProviderConfig,
  LLMProvider,
} from './types';

export abstract class LLMClient {
  protected config: LLMProviderConfig;

  constructor(config: LLMProviderConfig) {
    this.config = config;
  }

  abstract get provider(): LLMProvider;

  /**
   * Generate a chat completion. Implementations make exactly one request.
   */
  abstract complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse>;

  /**
   * Check if the client is properly configured
   */
  abstract isConfigured(): boolean;

  getDefaultModel(): string {
    return this.config.defaultModel;
  }
}
