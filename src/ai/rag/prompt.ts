/**
 * FAQ RAG - Prompt Builder
 * ========================
 * Deterministic rendering of retrieved documents and a question into one prompt.
 */

import { MissingFieldError } from '../../lib/errors';
import { readField } from '../../data/types';
import type { KnowledgeDocument } from '../../data/types';

export interface PromptField {
  /** Label printed before the value */
  label: string;
  /** Document field to read */
  field: string;
}

export interface PromptTemplate {
  /**
   * Instruction text. `{question}` and `{context}` are substituted.
   */
  instructions: string;
  fields: readonly PromptField[];
}

export const FAQ_ASSISTANT_INSTRUCTIONS = `You're a course teaching assistant. Answer the QUESTION based on the CONTEXT from the FAQ database.
Use only the facts from the CONTEXT when answering the QUESTION.

QUESTION: {question}

CONTEXT:
{context}`;

export const DEFAULT_PROMPT_TEMPLATE: PromptTemplate = {
  instructions: FAQ_ASSISTANT_INSTRUCTIONS,
  fields: [
    { label: 'section', field: 'section' },
    { label: 'question', field: 'question' },
    { label: 'answer', field: 'text' },
  ],
};

/**
 * Render one labelled block per document, in order, separated by a blank line
 */
export function buildContext(
  results: readonly KnowledgeDocument[],
  fields: readonly PromptField[] = DEFAULT_PROMPT_TEMPLATE.fields
): string {
  return results
    .map((doc, position) =>
      fields
        .map(({ label, field }) => {
          const value = readField(doc, field);
          if (typeof value !== 'string') {
            throw new MissingFieldError(field, position + 1);
          }
          return `${label}: ${value}`;
        })
        .join('\n')
    )
    .join('\n\n');
}

/**
 * Build the RAG prompt sent to the model
 */
export function buildRAGPrompt(
  question: string,
  results: readonly KnowledgeDocument[],
  template: PromptTemplate = DEFAULT_PROMPT_TEMPLATE
): string {
  const context = buildContext(results, template.fields);

  // Single pass so a `{context}` inside the question is left alone
  return template.instructions
    .replace(/\{(question|context)\}/g, (_match, key: string) =>
      key === 'question' ? question : context
    )
    .trim();
}
