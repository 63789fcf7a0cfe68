/**
 * FAQ RAG - Loader
 * ================
 * Reads a grouped knowledge base from disk and flattens it into a corpus.
 */

import { readFile } from 'fs/promises';
import { rawCollectionSchema } from '../../lib/validations';
import { MalformedInputError, NotFoundError, formatIssues } from '../../lib/errors';
import { ragLogger } from '../../utils/logger';
import { GROUP_FIELD, REQUIRED_FIELDS } from '../../data/types';
import type { FlatCorpus, KnowledgeDocument } from '../../data/types';

export interface LoadOptions {
  /**
   * Key holding the group identifier in the source file.
   * Defaults to `group_id`; the identifier is always exposed as `group_id` afterwards.
   */
  groupField?: string;
}

const MISSING_FILE_CODES = new Set(['ENOENT', 'ENOTDIR']);

/**
 * Validate a parsed collection and flatten it, preserving group and document order
 */
export function flattenCollection(raw: unknown, options: LoadOptions = {}): FlatCorpus {
  const groupField = options.groupField ?? GROUP_FIELD;
  const parsed = rawCollectionSchema(groupField).safeParse(raw);

  if (!parsed.success) {
    throw new MalformedInputError(
      'Knowledge base does not match the expected shape',
      formatIssues(parsed.error.issues)
    );
  }

  const corpus: KnowledgeDocument[] = [];

  for (const group of parsed.data) {
    for (const doc of group.documents) {
      const extra: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(doc)) {
        if (!(REQUIRED_FIELDS as readonly string[]).includes(key) && key !== GROUP_FIELD) {
          extra[key] = value;
        }
      }

      corpus.push(
        Object.freeze({
          question: doc.question,
          text: doc.text,
          section: doc.section,
          groupId: group.groupId,
          extra: Object.freeze(extra),
        })
      );
    }
  }

  return Object.freeze(corpus);
}

/**
 * Load a knowledge base JSON file
 */
export async function loadKnowledgeBase(
  filePath: string,
  options: LoadOptions = {}
): Promise<FlatCorpus> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) {
      ragLogger.error({ filePath }, 'Knowledge base not found');
      throw new NotFoundError(filePath, err);
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    ragLogger.error({ filePath }, 'Knowledge base is not valid JSON');
    throw new MalformedInputError(`Knowledge base is not valid JSON: ${filePath}`, [], err);
  }

  try {
    const corpus = flattenCollection(raw, options);
    ragLogger.info({ filePath, documents: corpus.length }, 'Knowledge base loaded');
    return corpus;
  } catch (err) {
    ragLogger.error({ filePath, err }, 'Knowledge base rejected');
    throw err;
  }
}

function isMissingFile(err: unknown): boolean {
  return (
    err instanceof Error &&
    'code' in err &&
    typeof err.code === 'string' &&
    MISSING_FILE_CODES.has(err.code)
  );
}
