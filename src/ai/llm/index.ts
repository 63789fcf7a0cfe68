/**
 * FAQ RAG - LLM Module Index
 * ==========================
 * Centralized exports for the LLM abstraction.
 */

// Types
export * from './types';

// Base client
export { LLMClient } from './LLMClient';

// Providers
export { OpenAIClient, OPENAI_API_URL } from './providers';

// Gateway
export { LLMGateway, complete } from './gateway';
export type { LLMGatewayOptions } from './gateway';

// ============================================
// FACTORY FUNCTION
// ============================================

import type { LLMProvider, LLMProviderConfig } from './types';
import { LLMClient } from './LLMClient';
import { OpenAIClient } from './providers/OpenAIClient';

/**
 * Create an LLM client for the specified provider
 */
export function createLLMClient(
  provider: LLMProvider,
  config?: Partial<Omit<LLMProviderConfig, 'provider'>>
): LLMClient {
  switch (provider) {
    case 'openai':
      return new OpenAIClient(config);
    default:
      throw new Error(`Unknown LLM provider: ${String(provider)}`);
  }
}
