import { describe, it, expect } from "vitest";
import { SeededRng } from "@hashtok/core";

describe("SeededRng", () => {
  it("produces deterministic sequences", () => {
    const rng1 = new SeededRng(42);
    const rng2 = new SeededRng(42);

    const seq1 = Array.from({ length: 10 }, () => rng1.next());
    const seq2 = Array.from({ length: 10 }, () => rng2.next());

    expect(seq1).toEqual(seq2);
  });

  it("produces values in [0, 1)", () => {
    const rng = new SeededRng(123);
    for (let i = 0; i < 1000; i++) {
      const v = rng.next();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it("nextGauss has roughly zero mean and unit variance", () => {
    const rng = new SeededRng(42);
    let sum = 0;
    let sumSq = 0;
    const n = 10000;
    for (let i = 0; i < n; i++) {
      const g = rng.nextGauss();
      sum += g;
      sumSq += g * g;
    }
    expect(Math.abs(sum / n)).toBeLessThan(0.1);
    expect(Math.abs(sumSq / n - 1)).toBeLessThan(0.1);
  });

  it("different seeds give different sequences", () => {
    const rng1 = new SeededRng(1);
    const rng2 = new SeededRng(2);
    expect(rng1.next()).not.toBe(rng2.next());
  });

  it("distinguishes seeds above 2^32", () => {
    expect(new SeededRng(1).next()).not.toBe(new SeededRng(2 ** 32 + 1).next());
  });

  it("is unaffected by other generators in the process", () => {
    const expected = new SeededRng(5).gaussianMatrix(3, 4);
    const noisy = new SeededRng(6);
    for (let i = 0; i < 100; i++) noisy.nextGauss();
    expect(Array.from(new SeededRng(5).gaussianMatrix(3, 4))).toEqual(Array.from(expected));
  });

  it("rejects seeds that are not safe integers", () => {
    expect(() => new SeededRng(1.5)).toThrow(RangeError);
    expect(() => new SeededRng(Number.NaN)).toThrow(RangeError);
  });
});
