/**
 * FAQ RAG - Retriever
 * ===================
 * Ranked search over a SearchIndex with per-field boosts and keyword filters.
 */

import { searchQuerySchema } from '../../lib/validations';
import { ValidationError, formatIssues } from '../../lib/errors';
import { ragLogger } from '../../utils/logger';
import type { KnowledgeDocument, SearchHit, SearchQuery } from '../../data/types';
import type { SearchIndex } from './indexer';
import { tokenize } from './tokenizer';

export const DEFAULT_MAX_RESULTS = 5;
export const DEFAULT_BOOST = 1.0;

/**
 * Score every document passing the filters, best first.
 * Ties keep corpus order; the result is truncated to `limit`.
 */
export function scoreDocuments(index: SearchIndex, query: SearchQuery): SearchHit[] {
  const parsed = searchQuerySchema.safeParse({
    ...query,
    limit: query.limit ?? DEFAULT_MAX_RESULTS,
  });
  if (!parsed.success) {
    const issues = formatIssues(parsed.error.issues);
    ragLogger.warn({ issues }, 'Search query rejected');
    throw new ValidationError(`Invalid search query: ${issues.join('; ')}`, issues);
  }

  const { text, boosts = {}, filters = {}, limit } = parsed.data;

  // Undeclared fields are ignored
  const weights = index.textFields.map((field) => ({
    field,
    boost: boosts[field] ?? DEFAULT_BOOST,
  }));
  const activeFilters = new Map(
    Object.entries(filters).filter(([field]) => index.isKeywordField(field))
  );

  const terms = tokenize(text);
  const hits: Array<SearchHit & { position: number }> = [];

  for (let position = 0; position < index.size; position++) {
    if (!index.passesFilters(position, activeFilters)) {
      continue;
    }

    let score = 0;
    for (const { field, boost } of weights) {
      score += boost * index.fieldScore(field, terms, position);
    }

    hits.push({ document: index.document(position), score, position });
  }

  hits.sort((a, b) => b.score - a.score || a.position - b.position);

  const top = hits.slice(0, limit).map(({ document, score }) => ({ document, score }));

  ragLogger.debug(
    {
      query: text.substring(0, 50),
      candidates: hits.length,
      returned: top.length,
      filters: Object.fromEntries(activeFilters),
    },
    'Search completed'
  );

  return top;
}

/**
 * Search the index and return full documents, best first
 */
export function searchDocuments(index: SearchIndex, query: SearchQuery): KnowledgeDocument[] {
  return scoreDocuments(index, query).map((hit) => hit.document);
}
