export * from './ai';
export * from './data/types';
export * from './lib/errors';
export { env, parseEnv } from './env';
export type { Env } from './env';
export { logger, createContextLogger, generateCorrelationId } from './utils/logger';
