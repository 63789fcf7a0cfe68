/**
 * FAQ RAG - Data Types
 * ====================
 * Shapes shared by the loader, index, retriever and prompt builder.
 */

// ============================================
// SOURCE FORMAT
// ============================================

export interface RawDocument {
  question: string;
  text: string;
  section: string;
  [field: string]: unknown;
}

/**
 * One group of the serialized knowledge base. The identifier key is
 * `group_id` unless the loader is told otherwise.
 */
export interface RawGroup {
  documents: RawDocument[];
  [groupField: string]: unknown;
}

export type RawCollection = RawGroup[];

// ============================================
// FLATTENED CORPUS
// ============================================

/** Name under which a document exposes its owning group's identifier */
export const GROUP_FIELD = 'group_id';

export const REQUIRED_FIELDS = ['question', 'text', 'section'] as const;

export type RequiredField = (typeof REQUIRED_FIELDS)[number];

export interface KnowledgeDocument {
  readonly question: string;
  readonly text: string;
  readonly section: string;
  readonly groupId: string;
  /** Pass-through fields the pipeline does not interpret */
  readonly extra: Readonly<Record<string, unknown>>;
}

export type FlatCorpus = readonly KnowledgeDocument[];

/**
 * Look up a document field by name, the way the index schema refers to it
 */
export function readField(doc: KnowledgeDocument, field: string): unknown {
  switch (field) {
    case 'question':
      return doc.question;
    case 'text':
      return doc.text;
    case 'section':
      return doc.section;
    case GROUP_FIELD:
      return doc.groupId;
    default:
      return Object.prototype.hasOwnProperty.call(doc.extra, field) ? doc.extra[field] : undefined;
  }
}

// ============================================
// INDEX & QUERY
// ============================================

export interface IndexSchema {
  /** Tokenized, relevance-scored fields */
  textFields: readonly string[];
  /** Exact-match fields, used for filtering only */
  keywordFields: readonly string[];
}

export const DEFAULT_INDEX_SCHEMA: IndexSchema = {
  textFields: ['question', 'text', 'section'],
  keywordFields: [GROUP_FIELD],
};

export interface SearchQuery {
  text: string;
  /** Per text field weight, 1.0 when unlisted */
  boosts?: Record<string, number>;
  /** Keyword field -> required exact value */
  filters?: Record<string, string>;
  limit?: number;
}

export interface SearchHit {
  document: KnowledgeDocument;
  score: number;
}

export type SearchResult = KnowledgeDocument[];
