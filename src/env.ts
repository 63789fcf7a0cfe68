import { z } from 'zod';
import dotenv from 'dotenv';
import { ConfigError, formatIssues } from './lib/errors';

/**
 * Centralized environment variable validation using Zod
 * All variables are optional: the pipeline runs offline until an LLM call is made.
 */

dotenv.config();

const positiveInt = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((val) => Number(val))
    .pipe(z.number().int().positive());

const envSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'test', 'production'], {
      errorMap: () => ({
        message: 'NODE_ENV must be either development, test, or production',
      }),
    })
    .default('development'),

  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  // LLM provider
  OPENAI_API_KEY: z.string().optional(),

  OPENAI_BASE_URL: z
    .string()
    .url({ message: 'OPENAI_BASE_URL must be a valid URL' })
    .default('https://api.openai.com/v1'),

  LLM_MODEL: z.string().min(1, 'LLM_MODEL cannot be empty').default('gpt-4o'),

  LLM_TIMEOUT_MS: positiveInt('30000'),

  // Knowledge base
  KNOWLEDGE_BASE_PATH: z
    .string()
    .min(1, 'KNOWLEDGE_BASE_PATH cannot be empty')
    .default('data/documents.json'),

  RAG_TOP_K: positiveInt('5'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse an environment map, throwing ConfigError on invalid values
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error.issues));
  }
  return result.data;
}

function validateEnv(): Env {
  try {
    return parseEnv(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error('❌ Environment validation failed:\n');
      console.error(error.issues.map((issue) => `  - ${issue}`).join('\n'));
      console.error('\n📝 See .env.example for reference.\n');
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Validated environment variables
 * Use this throughout the application instead of process.env
 */
export const env = validateEnv();

export const isProduction = env.NODE_ENV === 'production';
export const isTesting = env.NODE_ENV === 'test';
