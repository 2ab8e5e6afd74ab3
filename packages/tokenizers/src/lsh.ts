/**
 * Random-hyperplane locality-sensitive hashing for numeric windows.
 *
 * The basis holds `ceil(log2(numEmbeddings))` Gaussian hyperplanes. A window
 * gets one bit per hyperplane (1 when it lies strictly on the positive side),
 * the bits are read as a binary number with the first hyperplane as the most
 * significant bit, and the number is reduced into the embedding range.
 *
 * Windows separated by a small angle share most bits, so nearby inputs tend
 * to land in the same bucket. Scaling a window by a positive factor never
 * changes its id.
 */
import {
  SeededRng,
  dot,
  firstHashedId,
  hyperplaneBits,
  type Quantizer,
} from "@hashtok/core";

export interface LshOptions {
  readonly numEmbeddings: number;
  readonly paddingIdx: number;
  /** Length of the (flattened) windows this quantizer hashes. */
  readonly dimension: number;
  readonly randomSeed: number;
}

export class LshQuantizer implements Quantizer<ArrayLike<number>> {
  readonly numEmbeddings: number;
  readonly firstId: number;
  readonly dimension: number;
  readonly bits: number;
  /** Row-major `[bits, dimension]` hyperplane normals. */
  readonly basis: Float64Array;

  constructor(options: LshOptions) {
    this.numEmbeddings = options.numEmbeddings;
    this.firstId = firstHashedId(options.paddingIdx);
    this.dimension = options.dimension;
    this.bits = hyperplaneBits(options.numEmbeddings);
    // Instance-local generator: the basis depends on the seed and nothing else.
    this.basis = new SeededRng(options.randomSeed).gaussianMatrix(this.bits, this.dimension);
  }

  /**
   * Bucket of one window. A window of the wrong length is a programmer
   * error, so it throws a `RangeError` instead of failing an Effect; the
   * facades only pass windows their own extractor cut to `dimension`.
   */
  quantize(window: ArrayLike<number>): number {
    if (window.length !== this.dimension) {
      throw new RangeError(`Window has ${window.length} values, quantizer expects ${this.dimension}`);
    }
    return this._quantizeAt(window, 0);
  }

  /**
   * Bucket of every `dimension`-sized row of a flat row-major block. Throws
   * a `RangeError` on a partial row, like {@link quantize}.
   */
  quantizeRows(data: Float64Array): Int32Array {
    if (data.length % this.dimension !== 0) {
      throw new RangeError(
        `Block of ${data.length} values is not a whole number of ${this.dimension}-wide rows`,
      );
    }
    const rows = data.length / this.dimension;
    const out = new Int32Array(rows);
    for (let r = 0; r < rows; r++) out[r] = this._quantizeAt(data, r * this.dimension);
    return out;
  }

  private _quantizeAt(data: ArrayLike<number>, offset: number): number {
    let code = 0;
    for (let k = 0; k < this.bits; k++) {
      const side = dot(data, offset, this.basis, k * this.dimension, this.dimension);
      code = code * 2 + (side > 0 ? 1 : 0);
    }
    return Math.max(code % this.numEmbeddings, this.firstId);
  }
}
