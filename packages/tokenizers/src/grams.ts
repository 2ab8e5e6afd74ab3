/**
 * Sub-word grams.
 *
 * Words are handled as code points, so a surrogate pair never gets split
 * across two grams.
 */

/** Every contiguous run of `n` characters, left to right. */
export function ngrams(word: string, n: number): string[] {
  const chars = Array.from(word);
  const out: string[] = [];
  for (let i = 0; i + n <= chars.length; i++) {
    out.push(chars.slice(i, i + n).join(""));
  }
  return out;
}

/**
 * Characters picked with a step of `k`, one gram per starting offset.
 * `skipgrams("hello", 2)` is `["hlo", "el"]`.
 */
export function skipgrams(word: string, k: number): string[] {
  const chars = Array.from(word);
  const out: string[] = [];
  for (let offset = 0; offset < Math.min(k, chars.length); offset++) {
    let gram = "";
    for (let i = offset; i < chars.length; i += k) gram += chars[i];
    out.push(gram);
  }
  return out;
}

/**
 * All grams of one word: n-grams for each size in order, then skip-grams for
 * each skip size in order.
 */
export function wordGrams(
  word: string,
  ngramSizes: readonly number[],
  skipSizes: readonly number[],
): string[] {
  const grams: string[] = [];
  for (const n of ngramSizes) grams.push(...ngrams(word, n));
  for (const k of skipSizes) grams.push(...skipgrams(word, k));
  return grams;
}
