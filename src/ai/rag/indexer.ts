/**
 * FAQ RAG - Indexer
 * =================
 * In-memory search index over a flat corpus.
 * Text fields get one TF-IDF model each; keyword fields keep their literal values.
 */

import natural from 'natural';
import { SchemaError } from '../../lib/errors';
import { ragLogger } from '../../utils/logger';
import { readField } from '../../data/types';
import type { FlatCorpus, IndexSchema, KnowledgeDocument } from '../../data/types';
import { tokenize } from './tokenizer';

type FieldModel = InstanceType<typeof natural.TfIdf>;

// TfIdf keeps term counts on plain objects; prefixing keeps terms such as
// "constructor" off Object.prototype
const termKeys = (terms: readonly string[]): string[] => terms.map((term) => `t:${term}`);

export class SearchIndex {
  readonly documents: FlatCorpus;
  readonly textFields: readonly string[];
  readonly keywordFields: readonly string[];

  private readonly models: Map<string, FieldModel>;
  private readonly keywordValues: ReadonlyArray<ReadonlyMap<string, string>>;

  private constructor(
    documents: FlatCorpus,
    textFields: readonly string[],
    keywordFields: readonly string[]
  ) {
    this.documents = documents;
    this.textFields = textFields;
    this.keywordFields = keywordFields;

    this.models = new Map();
    for (const field of textFields) {
      const model = new natural.TfIdf();
      for (const doc of documents) {
        const value = readField(doc, field);
        model.addDocument(typeof value === 'string' ? termKeys(tokenize(value)) : []);
      }
      this.models.set(field, model);
    }

    this.keywordValues = documents.map((doc) => {
      const values = new Map<string, string>();
      for (const field of keywordFields) {
        const value = readField(doc, field);
        if (typeof value === 'string') {
          values.set(field, value);
        }
      }
      return values;
    });
  }

  /**
   * Build an index over `corpus`. There is no re-fit: build a new index for new data.
   */
  static fit(corpus: FlatCorpus, schema: IndexSchema): SearchIndex {
    const textFields = [...new Set(schema.textFields)];
    const keywordFields = [...new Set(schema.keywordFields)];

    const overlapping = textFields.filter((field) => keywordFields.includes(field));
    if (overlapping.length > 0) {
      ragLogger.error({ overlapping }, 'Index schema rejected');
      throw new SchemaError(overlapping);
    }

    const index = new SearchIndex(
      Object.freeze([...corpus]),
      Object.freeze(textFields),
      Object.freeze(keywordFields)
    );

    ragLogger.info(
      { documents: corpus.length, textFields, keywordFields },
      'Search index built'
    );

    return index;
  }

  get size(): number {
    return this.documents.length;
  }

  document(position: number): KnowledgeDocument {
    const doc = this.documents[position];
    if (doc === undefined) {
      throw new RangeError(`No document at position ${position}`);
    }
    return doc;
  }

  isTextField(field: string): boolean {
    return this.models.has(field);
  }

  isKeywordField(field: string): boolean {
    return this.keywordFields.includes(field);
  }

  /**
   * TF-IDF score of the query terms against one text field of one document
   */
  fieldScore(field: string, terms: string[], position: number): number {
    const model = this.models.get(field);
    if (!model || terms.length === 0) {
      return 0;
    }
    const score = model.tfidf(termKeys(terms), position);
    return Number.isFinite(score) ? score : 0;
  }

  /**
   * Whether the document's keyword values equal every given filter value
   */
  passesFilters(position: number, filters: ReadonlyMap<string, string>): boolean {
    const values = this.keywordValues[position];
    if (values === undefined) {
      return false;
    }
    for (const [field, expected] of filters) {
      if (values.get(field) !== expected) {
        return false;
      }
    }
    return true;
  }
}

export function buildIndex(corpus: FlatCorpus, schema: IndexSchema): SearchIndex {
  return SearchIndex.fit(corpus, schema);
}
