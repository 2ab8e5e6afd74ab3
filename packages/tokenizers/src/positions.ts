/**
 * Positional bucketing: a coarse, bounded position for every character of a
 * word.
 */
import { Effect } from "effect";
import { MalformedInputError, type SyllableSegmenter } from "@hashtok/core";

/** Raw character index, clamped to `maxPositional - 1`. */
export function precisePositions(chars: readonly string[], maxPositional: number): Int32Array {
  const out = new Int32Array(chars.length);
  for (let i = 0; i < chars.length; i++) out[i] = Math.min(i, maxPositional - 1);
  return out;
}

/**
 * Syllable index of every character, clamped to `maxPositional - 1`.
 *
 * Fails if the segmenter's syllables do not join back into the word, since
 * the positions would no longer line up with the characters.
 */
export function roughPositions(
  chars: readonly string[],
  maxPositional: number,
  segmenter: SyllableSegmenter,
): Effect.Effect<Int32Array, MalformedInputError> {
  const word = chars.join("");
  const syllables = segmenter.segment(word);
  if (syllables.join("") !== word) {
    return Effect.fail(
      new MalformedInputError({
        message: `Syllable segmenter (${segmenter.language}) did not reproduce "${word}": ${JSON.stringify(syllables)}`,
      }),
    );
  }
  const out = new Int32Array(chars.length);
  let k = 0;
  syllables.forEach((syllable, j) => {
    const position = Math.min(j, maxPositional - 1);
    for (const _ of syllable) out[k++] = position;
  });
  return Effect.succeed(out);
}
