import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import { MalformedInputError } from "@hashtok/core";
import { extractWindows1d, extractWindows2d, minimumLength, planAxis } from "@hashtok/tokenizers";

describe("planAxis", () => {
  it("pads the tail so the last window is complete", () => {
    expect(planAxis(11, 4, 3)).toEqual({ outputLength: 4, paddingSize: 2 });
  });

  it("needs no padding when windows tile the input exactly", () => {
    expect(planAxis(10, 4, 3)).toEqual({ outputLength: 3, paddingSize: 0 });
  });

  it("pads an input shorter than one window", () => {
    expect(planAxis(3, 4, 3)).toEqual({ outputLength: 1, paddingSize: 1 });
  });

  it("covers every sample when the stride fits inside the window", () => {
    for (let size = 1; size <= 5; size++) {
      for (let stride = 1; stride <= size; stride++) {
        for (let length = minimumLength(size, stride); length <= 12; length++) {
          const { outputLength, paddingSize } = planAxis(length, size, stride);
          const covered = new Set<number>();
          for (let i = 0; i < outputLength; i++) {
            for (let j = i * stride; j < i * stride + size && j < length; j++) covered.add(j);
          }
          expect(covered.size).toBe(length);
          expect((outputLength - 1) * stride).toBeLessThan(length);
          expect(paddingSize).toBeGreaterThanOrEqual(0);
          expect(paddingSize).toBeLessThan(stride);
        }
      }
    }
  });

  it("reports the shortest input that still yields a window", () => {
    expect(minimumLength(5, 1)).toBe(5);
    expect(minimumLength(5, 2)).toBe(4);
    expect(minimumLength(2, 4)).toBe(1);
  });
});

describe("extractWindows1d", () => {
  it("cuts overlapping windows and pads the last one", () => {
    const out = Effect.runSync(
      extractWindows1d([1, 2, 3, 4, 5], { windowSize: 2, stride: 2, paddingValue: 0 }),
    );
    expect(out.shape).toEqual([3, 2]);
    expect(Array.from(out.data)).toEqual([1, 2, 3, 4, 5, 0]);
  });

  it("starts window i at i * stride", () => {
    const signal = Array.from({ length: 11 }, (_, i) => i + 1);
    const out = Effect.runSync(extractWindows1d(signal, { windowSize: 4, stride: 3, paddingValue: -1 }));
    expect(out.shape).toEqual([4, 4]);
    expect(Array.from(out.data.subarray(0, 4))).toEqual([1, 2, 3, 4]);
    expect(Array.from(out.data.subarray(12, 16))).toEqual([10, 11, -1, -1]);
  });

  it("rejects an empty signal", () => {
    const err = Effect.runSync(Effect.flip(extractWindows1d([], { windowSize: 2, stride: 1, paddingValue: 0 })));
    expect(err).toBeInstanceOf(MalformedInputError);
    expect(err.message).toBe("Cannot window an empty signal");
  });

  it("rejects a signal too short to pad into one window", () => {
    const err = Effect.runSync(Effect.flip(extractWindows1d([1, 2], { windowSize: 5, stride: 1, paddingValue: 0 })));
    expect(err.message).toBe(
      "signal of length 2 is too short for window 5 with stride 1 (needs at least 5)",
    );
  });

  it("rejects non-finite samples", () => {
    const err = Effect.runSync(
      Effect.flip(extractWindows1d([1, Number.NaN, 3], { windowSize: 2, stride: 1, paddingValue: 0 })),
    );
    expect(err.message).toBe("signal has a non-finite sample at index 1");
  });
});

describe("extractWindows2d", () => {
  const matrix = [
    [1, 2, 3],
    [4, 5, 6],
    [7, 8, 9],
  ];

  it("windows both axes and pads right and bottom", () => {
    const out = Effect.runSync(
      extractWindows2d(matrix, { windowHeight: 2, windowWidth: 2, stride: 2, paddingValue: -1 }),
    );
    expect(out.shape).toEqual([2, 2, 2, 2]);
    expect(Array.from(out.data)).toEqual([
      1, 2, 4, 5,
      3, -1, 6, -1,
      7, 8, -1, -1,
      9, -1, -1, -1,
    ]);
  });

  it("offsets rows and columns independently", () => {
    const out = Effect.runSync(
      extractWindows2d(
        [
          [1, 2, 3],
          [4, 5, 6],
        ],
        { windowHeight: 1, windowWidth: 2, stride: 1, paddingValue: 0 },
      ),
    );
    expect(out.shape).toEqual([2, 2, 1, 2]);
    expect(Array.from(out.data)).toEqual([1, 2, 2, 3, 4, 5, 5, 6]);
  });

  it("rejects ragged rows", () => {
    const err = Effect.runSync(
      Effect.flip(
        extractWindows2d([[1, 2], [3]], { windowHeight: 1, windowWidth: 1, stride: 1, paddingValue: 0 }),
      ),
    );
    expect(err.message).toBe("Matrix row 1 has 1 columns, expected 2");
  });

  it("rejects an empty matrix", () => {
    const err = Effect.runSync(
      Effect.flip(extractWindows2d([], { windowHeight: 1, windowWidth: 1, stride: 1, paddingValue: 0 })),
    );
    expect(err.message).toBe("Cannot window an empty matrix height");
  });
});
