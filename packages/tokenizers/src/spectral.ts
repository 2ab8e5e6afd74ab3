/**
 * Waveform helpers for the spectrogram tokenizer: silence trimming, a
 * Hann-windowed short-time Fourier transform, and decibel scaling.
 *
 * The transform is a direct DFT against precomputed twiddle tables, so any
 * `nFft` works, not only powers of two. That costs `O(bins * nFft)` per
 * frame, about 2M multiply-adds at the default `nFft` of 2000.
 */
import type { Signal } from "@hashtok/core";

/** Lower clamp on magnitudes before taking logarithms. */
const AMIN = 1e-10;
/** Dynamic range kept below the loudest bin, in dB. */
export const TOP_DB = 80;

/**
 * Drop leading and trailing samples whose magnitude is at or below
 * `threshold`, keeping `offset` samples of context on each side. A signal
 * with no sample above the threshold is returned whole.
 */
export function trimSilence(signal: Signal, threshold: number, offset: number): Float64Array {
  let first = -1;
  for (let i = 0; i < signal.length; i++) {
    if (Math.abs(signal[i]) > threshold) {
      first = i;
      break;
    }
  }
  if (first < 0) return Float64Array.from(signal);

  let last = first;
  for (let i = signal.length - 1; i > first; i--) {
    if (Math.abs(signal[i]) > threshold) {
      last = i;
      break;
    }
  }
  const start = Math.max(0, first - offset);
  const end = Math.min(signal.length, last + offset + 1);
  const out = new Float64Array(end - start);
  for (let i = start; i < end; i++) out[i - start] = signal[i];
  return out;
}

/** Periodic Hann window of length `n`. */
export function hannWindow(n: number): Float64Array {
  const w = new Float64Array(n);
  for (let i = 0; i < n; i++) w[i] = 0.5 - 0.5 * Math.cos((2 * Math.PI * i) / n);
  return w;
}

export interface Spectrum {
  /** `nFft / 2 + 1` frequency bins, low to high. */
  readonly bins: number;
  readonly frames: number;
  /** Row-major `[bins, frames]`. */
  readonly data: Float64Array;
}

/**
 * Magnitude STFT. Frames start every `hopLength` samples and are not
 * centred; a signal shorter than `nFft` becomes a single zero-padded frame.
 */
export function stftMagnitude(signal: Signal, nFft: number, hopLength: number): Spectrum {
  const bins = Math.floor(nFft / 2) + 1;
  const frames = signal.length >= nFft ? Math.floor((signal.length - nFft) / hopLength) + 1 : 1;
  const window = hannWindow(nFft);
  const cos = new Float64Array(nFft);
  const sin = new Float64Array(nFft);
  for (let m = 0; m < nFft; m++) {
    cos[m] = Math.cos((2 * Math.PI * m) / nFft);
    sin[m] = Math.sin((2 * Math.PI * m) / nFft);
  }

  const data = new Float64Array(bins * frames);
  const frame = new Float64Array(nFft);
  for (let f = 0; f < frames; f++) {
    const start = f * hopLength;
    for (let n = 0; n < nFft; n++) {
      const src = start + n;
      frame[n] = src < signal.length ? signal[src] * window[n] : 0;
    }
    for (let k = 0; k < bins; k++) {
      let re = 0;
      let im = 0;
      // m tracks (k * n) mod nFft.
      let m = 0;
      for (let n = 0; n < nFft; n++) {
        re += frame[n] * cos[m];
        im -= frame[n] * sin[m];
        m += k;
        if (m >= nFft) m -= nFft;
      }
      data[k * frames + f] = Math.hypot(re, im);
    }
  }
  return { bins, frames, data };
}

/**
 * Decibels relative to the loudest bin, floored at `-topDb`. Returned as one
 * row per frequency bin.
 */
export function magnitudeToDb(spectrum: Spectrum, topDb = TOP_DB): Float64Array[] {
  let peak = 0;
  for (let i = 0; i < spectrum.data.length; i++) peak = Math.max(peak, spectrum.data[i]);
  const ref = 20 * Math.log10(Math.max(peak, AMIN));

  const rows: Float64Array[] = [];
  for (let k = 0; k < spectrum.bins; k++) {
    const row = new Float64Array(spectrum.frames);
    for (let f = 0; f < spectrum.frames; f++) {
      const db = 20 * Math.log10(Math.max(spectrum.data[k * spectrum.frames + f], AMIN)) - ref;
      row[f] = Math.max(db, -topDb);
    }
    rows.push(row);
  }
  return rows;
}
