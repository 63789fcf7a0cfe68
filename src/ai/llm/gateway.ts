/**
 * FAQ RAG - LLM Gateway
 * =====================
 * Sends a prompt as a single user message and returns the generated text.
 * One request per call: retry policy belongs to the caller.
 */

import { GatewayError } from '../../lib/errors';
import { llmLogger } from '../../utils/logger';
import type { LLMClient } from './LLMClient';
import { DEFAULT_MODEL } from './types';
import type { LLMCompletionResponse } from './types';

export interface LLMGatewayOptions {
  /** Model used when `complete` is called without one */
  defaultModel?: string;
}

export class LLMGateway {
  private readonly client: LLMClient;
  readonly defaultModel: string;

  constructor(client: LLMClient, options: LLMGatewayOptions = {}) {
    this.client = client;
    this.defaultModel = options.defaultModel ?? DEFAULT_MODEL;
  }

  get provider(): string {
    return this.client.provider;
  }

  async complete(prompt: string, modelName: string = this.defaultModel): Promise<string> {
    const response = await this.completeWithDetails(prompt, modelName);
    return response.content;
  }

  /**
   * Same request as `complete`, keeping usage and latency
   */
  async completeWithDetails(
    prompt: string,
    modelName: string = this.defaultModel
  ): Promise<LLMCompletionResponse> {
    try {
      return await this.client.complete({
        model: modelName,
        messages: [{ role: 'user', content: prompt }],
      });
    } catch (err) {
      const error =
        err instanceof GatewayError
          ? err
          : new GatewayError(
              `LLM call failed: ${err instanceof Error ? err.message : String(err)}`,
              this.client.provider,
              undefined,
              false,
              undefined,
              err
            );
      llmLogger.error({ err: error, model: modelName }, 'LLM completion failed');
      throw error;
    }
  }
}

/**
 * One-shot completion through an explicit client
 */
export async function complete(
  client: LLMClient,
  prompt: string,
  modelName: string = DEFAULT_MODEL
): Promise<string> {
  return new LLMGateway(client).complete(prompt, modelName);
}
