/**
 * 2D image tokenizer: one LSH id per (row, column) window of a matrix.
 */
import { Effect } from "effect";
import type {
  HashingTokenizer,
  ImageOptions,
  MalformedInputError,
  Matrix,
  WindowTensor,
} from "@hashtok/core";
import { encodeBatch } from "./batch.js";
import { resolveImageOptions, type OptionsInit } from "./config.js";
import { LshQuantizer } from "./lsh.js";
import { extractWindows2d } from "./window.js";

/**
 * Split a flat run of ids into `rows` rows of `cols` each.
 */
export function reshapeIds(ids: Int32Array, rows: number, cols: number): Int32Array[] {
  const out: Int32Array[] = [];
  for (let r = 0; r < rows; r++) out.push(ids.slice(r * cols, (r + 1) * cols));
  return out;
}

export class ImageTokenizer implements HashingTokenizer<Matrix, WindowTensor, Int32Array[]> {
  readonly name = "image";
  readonly options: ImageOptions;
  readonly quantizer: LshQuantizer;

  constructor(init: OptionsInit<ImageOptions>) {
    this.options = resolveImageOptions(init);
    this.quantizer = new LshQuantizer({
      numEmbeddings: this.options.numEmbeddings,
      paddingIdx: this.options.paddingIdx,
      dimension: this.options.windowHeight * this.options.windowWidth,
      randomSeed: this.options.randomSeed,
    });
  }

  get numEmbeddings(): number {
    return this.options.numEmbeddings;
  }

  get paddingIdx(): number {
    return this.options.paddingIdx;
  }

  /** `[outputHeight, outputWidth, windowHeight, windowWidth]` windows. */
  tokenize(image: Matrix): Effect.Effect<WindowTensor, MalformedInputError> {
    return extractWindows2d(image, this.options);
  }

  /** `outputHeight` rows of `outputWidth` ids. */
  numerize(windows: WindowTensor): Int32Array[] {
    const [rows = 0, cols = 0] = windows.shape;
    return reshapeIds(this.quantizer.quantizeRows(windows.data), rows, cols);
  }

  call(inputs: readonly Matrix[]): Effect.Effect<Int32Array[][], MalformedInputError> {
    return encodeBatch(this, inputs);
  }
}
