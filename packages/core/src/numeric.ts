/**
 * Small numeric helpers shared by the window extractor, quantizers and
 * signal facades.
 */
import type { Signal } from "./types.js";

/** Number of sign bits needed to address `numEmbeddings` buckets. */
export function hyperplaneBits(numEmbeddings: number): number {
  return Math.ceil(Math.log2(numEmbeddings));
}

/** Dot product of `n` entries starting at the given offsets. */
export function dot(
  a: ArrayLike<number>,
  aOffset: number,
  b: ArrayLike<number>,
  bOffset: number,
  n: number,
): number {
  let acc = 0;
  for (let i = 0; i < n; i++) acc += a[aOffset + i] * b[bOffset + i];
  return acc;
}

/** `out[i] = signal[i + 1] - signal[i]`; one sample shorter than the input. */
export function firstDifference(signal: Signal): Float64Array {
  const n = Math.max(signal.length - 1, 0);
  const out = new Float64Array(n);
  for (let i = 0; i < n; i++) out[i] = signal[i + 1] - signal[i];
  return out;
}

/** Index of the first sample that is not a finite number, or -1. */
export function firstNonFinite(values: ArrayLike<number>): number {
  for (let i = 0; i < values.length; i++) {
    if (!Number.isFinite(values[i])) return i;
  }
  return -1;
}

export function isPositiveInt(n: number): boolean {
  return Number.isInteger(n) && n > 0;
}

export function isNonNegativeInt(n: number): boolean {
  return Number.isInteger(n) && n >= 0;
}
