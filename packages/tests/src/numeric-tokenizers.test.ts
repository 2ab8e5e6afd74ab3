import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import { ConfigurationError, MalformedInputError } from "@hashtok/core";
import {
  ImageTokenizer,
  SignalDerivativeTokenizer,
  SignalTokenizer,
  SpectrogramTokenizer,
} from "@hashtok/tokenizers";

const N = 1000;
const ramp = Array.from({ length: 11 }, (_, i) => i + 1);

describe("SignalTokenizer", () => {
  const tok = new SignalTokenizer({ numEmbeddings: N, windowSize: 4, stride: 3 });

  it("gives one id per window", () => {
    const [ids] = Effect.runSync(tok.call([ramp]));
    expect(ids.length).toBe(4);
    expect(ids[0]).toBe(tok.quantizer.quantize([1, 2, 3, 4]));
    expect(ids[3]).toBe(tok.quantizer.quantize([10, 11, 0, 0]));
  });

  it("keeps ids inside the embedding range", () => {
    const [ids] = Effect.runSync(tok.call([ramp.map((x) => Math.sin(x))]));
    for (const id of ids) {
      expect(id).toBeGreaterThanOrEqual(5);
      expect(id).toBeLessThan(N);
    }
  });

  it("ignores positive scaling of the signal", () => {
    const [a, b] = Effect.runSync(tok.call([ramp, ramp.map((x) => x * 2)]));
    expect(b).toEqual(a);
  });

  it("rejects signals too short for one window", () => {
    const short = new SignalTokenizer({ numEmbeddings: N, windowSize: 10, stride: 1 });
    const err = Effect.runSync(Effect.flip(short.call([[1, 2, 3, 4, 5]])));
    expect(err).toBeInstanceOf(MalformedInputError);
    expect(err.index).toBe(0);
  });

  it("rejects a zero stride at construction", () => {
    expect(() => new SignalTokenizer({ numEmbeddings: N, stride: 0 })).toThrow(ConfigurationError);
  });
});

describe("SignalDerivativeTokenizer", () => {
  const tok = new SignalDerivativeTokenizer({ numEmbeddings: N, windowSize: 4, stride: 3 });

  it("windows the first difference", () => {
    const windows = Effect.runSync(tok.tokenize(ramp));
    expect(windows.shape).toEqual([3, 4]);
    expect(Array.from(windows.data.subarray(0, 4))).toEqual([1, 1, 1, 1]);
  });

  it("ignores a constant offset", () => {
    const [a, b] = Effect.runSync(tok.call([ramp, ramp.map((x) => x + 5)]));
    expect(b).toEqual(a);
  });

  it("needs at least two samples", () => {
    const err = Effect.runSync(Effect.flip(tok.call([[1, 2, 3], [1]])));
    expect(err.index).toBe(1);
    expect(err.message).toBe("Input 1: A derivative needs at least 2 samples, got 1");
  });
});

describe("ImageTokenizer", () => {
  const tok = new ImageTokenizer({
    numEmbeddings: N,
    windowHeight: 2,
    windowWidth: 2,
    stride: 2,
    paddingValue: -1,
  });
  const image = [
    [1, 2, 3],
    [4, 5, 6],
    [7, 8, 9],
  ];

  it("gives a grid of ids, one per window", () => {
    const [grid] = Effect.runSync(tok.call([image]));
    const q = (w: number[]) => tok.quantizer.quantize(w);
    expect(grid).toEqual([
      Int32Array.from([q([1, 2, 4, 5]), q([3, -1, 6, -1])]),
      Int32Array.from([q([7, 8, -1, -1]), q([9, -1, -1, -1])]),
    ]);
  });

  it("hashes windows of windowHeight * windowWidth values", () => {
    expect(tok.quantizer.dimension).toBe(4);
  });

  it("rejects ragged images", () => {
    const err = Effect.runSync(Effect.flip(tok.call([image, [[1, 2], [3]]])));
    expect(err.index).toBe(1);
  });
});

describe("SpectrogramTokenizer", () => {
  const options = {
    numEmbeddings: N,
    windowSize: 2,
    stride: 1,
    nFft: 8,
    hopLength: 4,
    silenceThreshold: 0,
    silenceOffset: 0,
  };

  it("windows a bins-by-frames spectrogram", () => {
    const tok = new SpectrogramTokenizer(options);
    const wave = Array.from({ length: 16 }, (_, i) => Math.sin(i) + 2);
    const db = Effect.runSync(tok.spectrogram(wave));
    expect(db.length).toBe(5);
    expect(db[0].length).toBe(3);

    const windows = Effect.runSync(tok.tokenize(wave));
    expect(windows.shape).toEqual([4, 2, 2, 2]);

    const [grid] = Effect.runSync(tok.call([wave]));
    expect(grid.length).toBe(4);
    expect(grid.every((row) => row.length === 2)).toBe(true);
  });

  it("maps silence to the first hashed id", () => {
    const tok = new SpectrogramTokenizer(options);
    const [grid] = Effect.runSync(tok.call([new Float64Array(16)]));
    expect(grid.map((row) => Array.from(row))).toEqual([
      [5, 5],
      [5, 5],
      [5, 5],
      [5, 5],
    ]);
  });

  it("hashes square windows", () => {
    expect(new SpectrogramTokenizer(options).quantizer.dimension).toBe(4);
  });

  it("rejects empty and non-finite waveforms", () => {
    const tok = new SpectrogramTokenizer(options);
    expect(Effect.runSync(Effect.flip(tok.call([[]]))).message).toBe(
      "Input 0: Cannot tokenize an empty waveform",
    );
    expect(Effect.runSync(Effect.flip(tok.call([[1, Number.POSITIVE_INFINITY]]))).message).toBe(
      "Input 0: waveform has a non-finite sample at index 1",
    );
  });
});
