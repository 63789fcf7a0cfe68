/**
 * FAQ RAG - LLM Providers Index
 * =============================
 */

export { OpenAIClient, OPENAI_API_URL } from './OpenAIClient';
