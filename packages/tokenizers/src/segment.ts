/**
 * Word-level text segmentation.
 *
 * Uses ICU word boundaries through `Intl.Segmenter`. Whitespace is dropped;
 * every other segment (words, numbers, punctuation marks) becomes a token,
 * so "Hi, you." yields `["Hi", ",", "you", "."]`.
 */
import type { WordSegmenter } from "@hashtok/core";

export class IntlWordSegmenter implements WordSegmenter {
  private readonly _segmenter: Intl.Segmenter;

  constructor(locale = "en") {
    this._segmenter = new Intl.Segmenter(locale, { granularity: "word" });
  }

  segment(text: string): string[] {
    const words: string[] = [];
    for (const { segment } of this._segmenter.segment(text)) {
      if (segment.trim().length > 0) words.push(segment);
    }
    return words;
  }
}

/** Leaves the input untouched: the whole string is one word. */
export const wholeInputSegmenter: WordSegmenter = {
  segment: (text) => [text],
};
