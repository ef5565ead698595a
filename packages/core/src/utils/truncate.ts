import type { Tokenizer } from './tokenizer.js';

/**
 * Longest prefix of `items` whose cumulative token count stays within
 * `maxTokenSize`. A non-positive budget yields an empty list.
 */
export function truncateListByTokenSize<T>(
  items: readonly T[],
  key: (item: T) => string,
  maxTokenSize: number,
  tokenizer: Tokenizer,
): T[] {
  if (maxTokenSize <= 0) {
    return [];
  }
  let tokens = 0;
  for (let i = 0; i < items.length; i++) {
    tokens += tokenizer.encode(key(items[i])).length;
    if (tokens > maxTokenSize) {
      return items.slice(0, i);
    }
  }
  return [...items];
}
