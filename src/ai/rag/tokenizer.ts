/**
 * FAQ RAG - Tokenizer
 * ===================
 * Shared by indexed field values and query text so the two agree.
 */

import natural from 'natural';

const tokenizer = new natural.WordTokenizer();
const STOP_WORDS = new Set(natural.stopwords);

/**
 * Lower-case, split on word boundaries, drop English stop words and stem
 */
export function tokenize(text: string): string[] {
  const tokens = tokenizer.tokenize(text.toLowerCase()) ?? [];
  return tokens
    .filter((token) => !STOP_WORDS.has(token))
    .map((token) => natural.PorterStemmer.stem(token));
}
