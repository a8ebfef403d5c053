import type { HighlightSpan } from './query.types.js';

export const MIN_HIGHLIGHT_TERM_LENGTH = 3;

const escapeRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Sort spans by start and merge every span that starts at or before the
 * end of the previous one.
 */
export function mergeSpans(spans: readonly HighlightSpan[]): HighlightSpan[] {
  const sorted = [...spans].sort((a, b) => a.start - b.start);
  const merged: HighlightSpan[] = [];
  for (const span of sorted) {
    const last = merged[merged.length - 1];
    if (last && span.start <= last.end) {
      last.end = Math.max(last.end, span.end);
    } else {
      merged.push({ ...span });
    }
  }
  return merged;
}

/**
 * Case-insensitive positions of the query's terms inside `text`.
 * Terms shorter than three characters are skipped.
 */
export function findHighlights(text: string, query: string): HighlightSpan[] {
  const terms = query
    .split(/\s+/)
    .filter((term) => term.length >= MIN_HIGHLIGHT_TERM_LENGTH);

  // 在原文上匹配，避免大小写转换改变长度导致偏移错位
  const spans: HighlightSpan[] = [];
  for (const term of terms) {
    for (const match of text.matchAll(new RegExp(escapeRegExp(term), 'giu'))) {
      const start = match.index ?? 0;
      spans.push({ start, end: start + match[0].length });
    }
  }
  return mergeSpans(spans);
}
