import { expect, test } from "vitest";

import { RandomSource } from "..";

function take(rng: RandomSource, n: number): number[] {
  return Array.from({ length: n }, () => rng.next());
}

test("deterministic", () => {
  const a = new RandomSource(42);
  const b = new RandomSource(42);
  const c = new RandomSource(43);
  const seqA = take(a, 20);
  expect(take(b, 20)).toEqual(seqA);
  expect(take(c, 20)).not.toEqual(seqA);
  for (const v of seqA) {
    expect(Number.isInteger(v)).toBeTruthy();
    expect(v).toBeGreaterThan(0);
    expect(v).toBeLessThan(0x100000000);
  }
});

test("zero seed", () => {
  const rng = new RandomSource(0x9E3779B9);
  expect(rng.next()).not.toBe(0);
});

test("int range", () => {
  const rng = new RandomSource(7);
  const seen = new Set<number>();
  for (let i = 0; i < 1000; ++i) {
    const v = rng.int(7);
    expect(v).toBeGreaterThanOrEqual(0);
    expect(v).toBeLessThanOrEqual(6);
    seen.add(v);
  }
  expect(seen.size).toBe(7);

  for (let i = 0; i < 100; ++i) {
    const v = rng.uniform(300, 500);
    expect(v).toBeGreaterThanOrEqual(300);
    expect(v).toBeLessThan(500);
  }
  expect(() => rng.int(0)).toThrow();
});

test("fork", () => {
  const parent = new RandomSource(4);
  const twin = new RandomSource(4);
  const child0 = parent.fork();
  const child1 = parent.fork();

  const seq0 = take(child0, 10);
  const seq1 = take(child1, 10);
  expect(seq0).not.toEqual(seq1);
  expect(take(parent, 10)).not.toEqual(seq0);

  expect(take(twin.fork(), 10)).toEqual(seq0);
  expect(take(twin.fork(), 10)).toEqual(seq1);
});
