import { describe, it, expect } from "vitest";
import { hannWindow, magnitudeToDb, stftMagnitude, trimSilence } from "@hashtok/tokenizers";

describe("trimSilence", () => {
  it("keeps the loud region plus offset samples each side", () => {
    expect(Array.from(trimSilence([0, 0, 0, 1, 0, 2, 0, 0, 0], 0.5, 1))).toEqual([0, 1, 0, 2, 0]);
  });

  it("clamps the offset to the signal bounds", () => {
    expect(Array.from(trimSilence([0, 1, 0], 0.5, 10))).toEqual([0, 1, 0]);
  });

  it("returns an all-quiet signal unchanged", () => {
    expect(Array.from(trimSilence([0.1, -0.1, 0], 0.5, 0))).toEqual([0.1, -0.1, 0]);
  });
});

describe("hannWindow", () => {
  it("is periodic", () => {
    const w = hannWindow(4);
    expect(w[0]).toBeCloseTo(0, 12);
    expect(w[1]).toBeCloseTo(0.5, 12);
    expect(w[2]).toBeCloseTo(1, 12);
    expect(w[3]).toBeCloseTo(0.5, 12);
  });
});

describe("stftMagnitude", () => {
  it("puts a constant signal in the lowest bins", () => {
    const spec = stftMagnitude(new Float64Array(8).fill(1), 8, 4);
    expect(spec.bins).toBe(5);
    expect(spec.frames).toBe(1);
    expect(spec.data[0]).toBeCloseTo(4, 9);
    expect(spec.data[1]).toBeCloseTo(2, 9);
    expect(spec.data[2]).toBeCloseTo(0, 9);
    expect(spec.data[3]).toBeCloseTo(0, 9);
    expect(spec.data[4]).toBeCloseTo(0, 9);
  });

  it("resolves a cosine at a non-power-of-two size", () => {
    const tone = Array.from({ length: 10 }, (_, n) => Math.cos((2 * Math.PI * 3 * n) / 10));
    const spec = stftMagnitude(tone, 10, 10);
    expect(spec.bins).toBe(6);
    // The Hann window spreads half the tone into the neighbouring bins.
    expect(spec.data[3]).toBeCloseTo(2.5, 9);
    expect(spec.data[2]).toBeCloseTo(1.25, 9);
    expect(spec.data[4]).toBeCloseTo(1.25, 9);
    for (const k of [0, 1, 5]) expect(spec.data[k]).toBeCloseTo(0, 9);
  });

  it("frames every hop without centring", () => {
    expect(stftMagnitude(new Float64Array(20), 8, 4).frames).toBe(4);
  });

  it("zero-pads a signal shorter than one frame", () => {
    const spec = stftMagnitude([1, 1, 1], 8, 4);
    expect(spec.frames).toBe(1);
    expect(spec.data.length).toBe(5);
  });
});

describe("magnitudeToDb", () => {
  it("scales relative to the peak and floors at -80 dB", () => {
    const rows = magnitudeToDb(stftMagnitude(new Float64Array(8).fill(1), 8, 4));
    expect(rows.length).toBe(5);
    expect(rows[0][0]).toBeCloseTo(0, 9);
    expect(rows[1][0]).toBeCloseTo(20 * Math.log10(0.5), 9);
    expect(rows[2][0]).toBe(-80);
    expect(rows[4][0]).toBe(-80);
  });

  it("gives 0 dB everywhere for silence", () => {
    const rows = magnitudeToDb(stftMagnitude(new Float64Array(8), 8, 4));
    expect(rows.map((r) => r[0])).toEqual([0, 0, 0, 0, 0]);
  });
});
