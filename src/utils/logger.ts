/**
 * Logger - FAQ RAG
 * Pino configuration with secret redaction
 */

import pino from 'pino';
import { v4 as uuidv4 } from 'uuid';
import { env } from '../env';

/**
 * Keys masked wherever they appear in a log line
 */
const SENSITIVE_KEYS = [
  'apiKey',
  'api_key',
  'authorization',
  'Authorization',
  'token',
  'secret',
  'OPENAI_API_KEY',
];

const loggerConfig: pino.LoggerOptions = {
  level: env.NODE_ENV === 'test' ? 'silent' : env.LOG_LEVEL,

  // Development: pretty output
  ...(env.NODE_ENV === 'development' && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'yyyy-mm-dd HH:MM:ss.l',
        ignore: 'pid,hostname',
        messageFormat: '{context} - {msg}',
        levelFirst: true,
      },
    },
  }),

  // Production: structured JSON
  ...(env.NODE_ENV === 'production' && {
    formatters: {
      level: (label: string) => ({ level: label.toUpperCase() }),
      bindings: (bindings: pino.Bindings) => ({
        pid: bindings.pid,
        hostname: bindings.hostname,
        environment: env.NODE_ENV,
        service: 'faq-rag',
      }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    messageKey: 'message',
  }),

  redact: {
    paths: SENSITIVE_KEYS.flatMap((key) => [key, `*.${key}`]),
    remove: false,
    censor: '***REDACTED***',
  },

  serializers: {
    err: pino.stdSerializers.err,
  },
};

export const logger = pino(loggerConfig);

/**
 * Child logger bound to a context and an optional correlation id
 */
export const createContextLogger = (context: string, correlationId?: string) => {
  return logger.child({
    context,
    ...(correlationId && { correlationId }),
  });
};

export const generateCorrelationId = (): string => {
  return uuidv4();
};

export const appLogger = createContextLogger('app');
export const ragLogger = createContextLogger('rag');
export const llmLogger = createContextLogger('llm');
