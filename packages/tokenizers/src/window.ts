/**
 * Sliding-window extraction.
 *
 * Cuts a 1D signal or a 2D matrix into a fixed number of fixed-size windows.
 * The tail of every axis is padded with a constant so the last window is
 * complete:
 *
 *   outputLength = ceil((L - W) / S + 1)
 *   paddingSize  = (outputLength - 1) * S - L + W
 *
 * Padding is only ever appended, so window `i` always starts at `i * S` of
 * the original data.
 */
import { Effect } from "effect";
import {
  MalformedInputError,
  firstNonFinite,
  type Matrix,
  type Signal,
  type WindowTensor,
} from "@hashtok/core";

export interface AxisPlan {
  readonly outputLength: number;
  readonly paddingSize: number;
}

export interface Window1dOptions {
  readonly windowSize: number;
  readonly stride: number;
  readonly paddingValue: number;
}

export interface Window2dOptions {
  readonly windowHeight: number;
  readonly windowWidth: number;
  readonly stride: number;
  readonly paddingValue: number;
}

/**
 * Output length and tail padding for one axis. `outputLength` is below 1 when
 * the axis is too short to pad into a single window.
 */
export function planAxis(length: number, size: number, stride: number): AxisPlan {
  const outputLength = Math.ceil((length - size) / stride + 1);
  const paddingSize = (outputLength - 1) * stride - length + size;
  return { outputLength, paddingSize };
}

/** Shortest input that still yields one window. */
export function minimumLength(size: number, stride: number): number {
  return Math.max(1, size - stride + 1);
}

function checkAxis(
  label: string,
  length: number,
  size: number,
  stride: number,
): Effect.Effect<AxisPlan, MalformedInputError> {
  if (length === 0) {
    return Effect.fail(new MalformedInputError({ message: `Cannot window an empty ${label}` }));
  }
  const plan = planAxis(length, size, stride);
  if (plan.outputLength < 1) {
    return Effect.fail(
      new MalformedInputError({
        message:
          `${label} of length ${length} is too short for window ${size} with stride ${stride} ` +
          `(needs at least ${minimumLength(size, stride)})`,
      }),
    );
  }
  return Effect.succeed(plan);
}

function checkFinite(values: ArrayLike<number>, label: string): Effect.Effect<void, MalformedInputError> {
  const bad = firstNonFinite(values);
  return bad < 0
    ? Effect.void
    : Effect.fail(
        new MalformedInputError({ message: `${label} has a non-finite sample at index ${bad}` }),
      );
}

/**
 * Windows of a 1D signal, shape `[outputLength, windowSize]`.
 */
export function extractWindows1d(
  signal: Signal,
  options: Window1dOptions,
): Effect.Effect<WindowTensor, MalformedInputError> {
  const { windowSize, stride, paddingValue } = options;
  return Effect.gen(function* () {
    const plan = yield* checkAxis("signal", signal.length, windowSize, stride);
    yield* checkFinite(signal, "signal");

    const length = signal.length;
    const data = new Float64Array(plan.outputLength * windowSize);
    for (let w = 0; w < plan.outputLength; w++) {
      const start = w * stride;
      const base = w * windowSize;
      for (let k = 0; k < windowSize; k++) {
        const src = start + k;
        data[base + k] = src < length ? signal[src] : paddingValue;
      }
    }
    return { shape: [plan.outputLength, windowSize], data };
  });
}

/**
 * Windows of a 2D matrix, shape
 * `[outputHeight, outputWidth, windowHeight, windowWidth]`.
 *
 * Rows are offset by the row index and columns by the column index; both axes
 * share one stride.
 */
export function extractWindows2d(
  matrix: Matrix,
  options: Window2dOptions,
): Effect.Effect<WindowTensor, MalformedInputError> {
  const { windowHeight, windowWidth, stride, paddingValue } = options;
  return Effect.gen(function* () {
    const height = matrix.length;
    const width = height > 0 ? matrix[0].length : 0;
    for (let r = 0; r < height; r++) {
      if (matrix[r].length !== width) {
        return yield* Effect.fail(
          new MalformedInputError({
            message: `Matrix row ${r} has ${matrix[r].length} columns, expected ${width}`,
          }),
        );
      }
      yield* checkFinite(matrix[r], `matrix row ${r}`);
    }
    const rows = yield* checkAxis("matrix height", height, windowHeight, stride);
    const cols = yield* checkAxis("matrix width", width, windowWidth, stride);

    const windowArea = windowHeight * windowWidth;
    const data = new Float64Array(rows.outputLength * cols.outputLength * windowArea);
    let offset = 0;
    for (let i = 0; i < rows.outputLength; i++) {
      const startY = i * stride;
      for (let j = 0; j < cols.outputLength; j++) {
        const startX = j * stride;
        for (let y = 0; y < windowHeight; y++) {
          const srcY = startY + y;
          const row = srcY < height ? matrix[srcY] : undefined;
          for (let x = 0; x < windowWidth; x++) {
            const srcX = startX + x;
            data[offset++] = row !== undefined && srcX < width ? row[srcX] : paddingValue;
          }
        }
      }
    }
    return {
      shape: [rows.outputLength, cols.outputLength, windowHeight, windowWidth],
      data,
    };
  });
}
