#!/usr/bin/env tsx

/**
 * Ask the knowledge base a question
 * Usage: npm run ask -- "How do I enroll?" [groupId]
 */

import { createRagServiceFromEnv } from '../src/ai/ragService';
import { appLogger } from '../src/utils/logger';

async function main(): Promise<void> {
  const [question, groupId] = process.argv.slice(2);
  if (!question) {
    console.error('Usage: npm run ask -- "<question>" [groupId]');
    process.exit(1);
  }

  const service = await createRagServiceFromEnv();
  const result = await service.answer(question, {
    filters: groupId ? { group_id: groupId } : undefined,
  });

  appLogger.info({ sources: result.results.length, model: result.model }, 'Question answered');
  console.log(result.answer);
}

main().catch((error) => {
  console.error('❌ Failed to answer the question:', error);
  process.exit(1);
});
