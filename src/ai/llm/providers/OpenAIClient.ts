/**
 * FAQ RAG - OpenAI Client
 * =======================
 * OpenAI-compatible chat completions over fetch.
 */

import { z } from 'zod';
import { LLMClient } from '../LLMClient';
import { DEFAULT_MODEL } from '../types';
import type {
  LLMCompletionRequest,
  LLMCompletionResponse,
  LLMProviderConfig,
  LLMProvider,
} from '../types';
import {
  GatewayAuthError,
  GatewayError,
  GatewayRateLimitError,
  GatewayTimeoutError,
} from '../../../lib/errors';
import { llmLogger } from '../../../utils/logger';

export const OPENAI_API_URL = 'https://api.openai.com/v1';
const DEFAULT_TIMEOUT_MS = 30000;

const chatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z.array(
    z.object({
      message: z.object({ content: z.string().nullable().optional() }),
      finish_reason: z.string().nullable().optional(),
    })
  ),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

const errorBodySchema = z.object({
  error: z.object({ message: z.string() }),
});

export class OpenAIClient extends LLMClient {
  constructor(config: Partial<Omit<LLMProviderConfig, 'provider'>> = {}) {
    super({
      provider: 'openai',
      apiKey: config.apiKey ?? '',
      baseUrl: (config.baseUrl ?? OPENAI_API_URL).replace(/\/+$/, ''),
      defaultModel: config.defaultModel ?? DEFAULT_MODEL,
      timeoutMs: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    });
  }

  get provider(): LLMProvider {
    return 'openai';
  }

  isConfigured(): boolean {
    return this.config.apiKey.length > 0;
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    if (!this.isConfigured()) {
      throw new GatewayAuthError('openai');
    }

    const model = request.model ?? this.getDefaultModel();
    const startTime = Date.now();

    const body = {
      model,
      messages: request.messages.map((m) => ({
        role: m.role,
        content: m.content,
      })),
      ...(request.temperature !== undefined && { temperature: request.temperature }),
      ...(request.maxTokens !== undefined && { max_tokens: request.maxTokens }),
      stream: false,
    };

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

    let response: Response;
    try {
      response = await fetch(`${this.config.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.config.apiKey}`,
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (err) {
      if (isAbortError(err)) {
        throw new GatewayTimeoutError('openai', this.config.timeoutMs);
      }
      throw new GatewayError(
        `OpenAI request failed: ${err instanceof Error ? err.message : String(err)}`,
        'openai',
        undefined,
        true,
        undefined,
        err
      );
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      await this.handleErrorResponse(response);
    }

    const parsed = chatCompletionSchema.safeParse(await this.readJson(response));
    if (!parsed.success) {
      throw new GatewayError('OpenAI returned an unexpected response body', 'openai', response.status);
    }

    const data = parsed.data;
    const choice = data.choices[0];
    if (!choice) {
      throw new GatewayError('OpenAI returned no choices', 'openai', response.status);
    }

    const latencyMs = Date.now() - startTime;
    const usage = {
      promptTokens: data.usage?.prompt_tokens ?? 0,
      completionTokens: data.usage?.completion_tokens ?? 0,
      totalTokens: data.usage?.total_tokens ?? 0,
    };

    llmLogger.info({ model, tokens: usage.totalTokens, latencyMs }, 'OpenAI completion');

    return {
      content: choice.message.content ?? '',
      model: data.model ?? model,
      usage,
      finishReason: choice.finish_reason ?? 'stop',
      latencyMs,
    };
  }

  private async readJson(response: Response): Promise<unknown> {
    try {
      return await response.json();
    } catch (err) {
      throw new GatewayError('OpenAI returned invalid JSON', 'openai', response.status, false, undefined, err);
    }
  }

  private async handleErrorResponse(response: Response): Promise<never> {
    const status = response.status;
    let errorMessage = `OpenAI API error: ${status}`;

    const body = errorBodySchema.safeParse(await response.json().catch(() => undefined));
    if (body.success) {
      errorMessage = body.data.error.message;
    }

    if (status === 401) {
      throw new GatewayAuthError('openai');
    }

    if (status === 429) {
      // Only the delay-seconds form is kept; an HTTP-date leaves it unset
      const retryAfter = response.headers.get('retry-after');
      const retryAfterSeconds = retryAfter === null ? NaN : Number(retryAfter);
      throw new GatewayRateLimitError(
        'openai',
        Number.isFinite(retryAfterSeconds) ? retryAfterSeconds * 1000 : undefined
      );
    }

    throw new GatewayError(errorMessage, 'openai', status, status >= 500);
  }
}

// fetch rejects with a DOMException named AbortError once the signal fires
function isAbortError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'name' in err && err.name === 'AbortError';
}
