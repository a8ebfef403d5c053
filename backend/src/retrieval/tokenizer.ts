import stopWordList from './stop-words.json';

export const ENGLISH_STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

// 字母、数字、组合符号和下划线组成的连续片段
const TOKEN_PATTERN = /[\p{L}\p{N}\p{M}_]+/gu;

/**
 * Lowercase, split into word runs, drop single characters and stop words.
 */
export function tokenize(
  text: string,
  stopWords: ReadonlySet<string> = ENGLISH_STOP_WORDS,
): string[] {
  const matches = text.toLowerCase().match(TOKEN_PATTERN) ?? [];
  return matches.filter((token) => token.length >= 2 && !stopWords.has(token));
}

export function countTerms(tokens: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}
