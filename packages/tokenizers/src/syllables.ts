/**
 * Syllable segmentation for rough positional bucketing.
 *
 * Only a closed set of languages is supported; asking for anything else is a
 * configuration error raised when the segmenter is built.
 */
import {
  ConfigurationError,
  SUPPORTED_LANGUAGES,
  isLanguage,
  type SyllableSegmenter,
} from "@hashtok/core";

const EN_VOWELS = new Set(["a", "e", "i", "o", "u"]);

function isEnglishVowel(chars: readonly string[], i: number): boolean {
  const c = chars[i].toLowerCase();
  if (EN_VOWELS.has(c)) return true;
  // "y" is a vowel unless it opens the word or follows another vowel.
  return c === "y" && i > 0 && !EN_VOWELS.has(chars[i - 1].toLowerCase());
}

/**
 * Vowel-group heuristic for English.
 *
 * Each vowel run is a syllable nucleus. A single consonant between two nuclei
 * starts the next syllable; a longer cluster leaves its first consonant
 * behind. A final "e" after a consonant is silent and stays with the
 * preceding syllable ("make" is one syllable, "table" is two).
 */
export class EnglishSyllableSegmenter implements SyllableSegmenter {
  readonly language = "en";

  segment(word: string): string[] {
    const chars = Array.from(word);
    const nuclei: Array<[number, number]> = [];
    let i = 0;
    while (i < chars.length) {
      if (isEnglishVowel(chars, i)) {
        const start = i;
        while (i < chars.length && isEnglishVowel(chars, i)) i++;
        nuclei.push([start, i]);
      } else {
        i++;
      }
    }

    // Drop a silent final "e" unless it follows "l" after a consonant ("-ble").
    const last = nuclei[nuclei.length - 1];
    if (
      nuclei.length > 1 &&
      last[0] === chars.length - 1 &&
      last[1] - last[0] === 1 &&
      chars[last[0]].toLowerCase() === "e" &&
      !(
        chars.length >= 3 &&
        chars[last[0] - 1].toLowerCase() === "l" &&
        !isEnglishVowel(chars, last[0] - 2)
      )
    ) {
      nuclei.pop();
    }

    if (nuclei.length <= 1) return chars.length > 0 ? [word] : [];

    const cuts: number[] = [];
    for (let n = 1; n < nuclei.length; n++) {
      const gapStart = nuclei[n - 1][1];
      const gapEnd = nuclei[n][0];
      const consonants = gapEnd - gapStart;
      cuts.push(consonants <= 1 ? gapStart : gapStart + 1);
    }

    const syllables: string[] = [];
    let from = 0;
    for (const cut of cuts) {
      syllables.push(chars.slice(from, cut).join(""));
      from = cut;
    }
    syllables.push(chars.slice(from).join(""));
    return syllables;
  }
}

/**
 * Thai segmentation through ICU's dictionary-based word breaker. Thai words
 * are short and mostly one or two syllables, so the breaker's units are used
 * as syllables.
 */
export class ThaiSyllableSegmenter implements SyllableSegmenter {
  readonly language = "th";
  private readonly _segmenter = new Intl.Segmenter("th", { granularity: "word" });

  segment(word: string): string[] {
    return Array.from(this._segmenter.segment(word), (s) => s.segment);
  }
}

/** Built-in segmenter for a supported language. */
export function syllableSegmenterFor(language: string): SyllableSegmenter {
  if (!isLanguage(language)) {
    throw new ConfigurationError({
      message: `Unsupported language "${language}". Supported: ${SUPPORTED_LANGUAGES.join(", ")}`,
    });
  }
  switch (language) {
    case "en":
      return new EnglishSyllableSegmenter();
    case "th":
      return new ThaiSyllableSegmenter();
  }
}
