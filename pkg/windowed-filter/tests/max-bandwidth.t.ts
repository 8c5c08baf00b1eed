import { expect, test } from "vitest";

import { MaxBandwidthFilter } from "..";

test("empty", () => {
  const f = new MaxBandwidthFilter();
  expect(f.windowLength).toBe(10);
  expect(f.best()).toBe(0);
  expect(f.size).toBe(0);
});

test.each([0, -1, 2.5])("invalid windowLength %d", (windowLength) => {
  expect(() => new MaxBandwidthFilter(windowLength)).toThrow(RangeError);
});

test("keeps maximum within window", () => {
  const f = new MaxBandwidthFilter(3);
  f.update(100, 1);
  expect(f.best()).toBe(100);
  f.update(80, 2);
  expect(f.best()).toBe(100);
  f.update(60, 3);
  expect(f.best()).toBe(100);
  expect(f.size).toBe(3);

  // round 1 leaves the window, 80 from round 2 takes over
  f.update(50, 4);
  expect(f.best()).toBe(80);
  f.update(40, 5);
  expect(f.best()).toBe(60);
  f.update(30, 6);
  expect(f.best()).toBe(50);
});

test("larger sample dominates older ones", () => {
  const f = new MaxBandwidthFilter(3);
  f.update(100, 1);
  f.update(80, 2);
  f.update(120, 3);
  expect(f.best()).toBe(120);
  expect(f.size).toBe(1);
  f.update(10, 5);
  expect(f.best()).toBe(120);
  f.update(10, 6);
  expect(f.best()).toBe(10);
});

test("one entry per round", () => {
  const f = new MaxBandwidthFilter(2);
  for (let i = 0; i < 10; ++i) {
    f.update(100 - i, 7);
  }
  expect(f.size).toBe(1);
  expect(f.best()).toBe(100);

  f.update(150, 7);
  expect(f.size).toBe(1);
  expect(f.best()).toBe(150);
});

test("best covers every sample in window", () => {
  const windowLength = 10;
  const f = new MaxBandwidthFilter(windowLength);
  const history: Array<[value: number, round: number]> = [];
  let x = 12345;
  for (let round = 0; round < 200; ++round) {
    for (let j = 0; j < 3; ++j) {
      x = (x * 1103515245 + 12345) % 0x80000000;
      const value = x % 1000;
      f.update(value, round);
      history.push([value, round]);

      const inWindow = history.filter(([, r]) => r > round - windowLength).map(([v]) => v);
      expect(f.best()).toBe(Math.max(...inWindow));
      expect(f.size).toBeLessThanOrEqual(windowLength);
    }
  }
});

test("reset and clone", () => {
  const f = new MaxBandwidthFilter(4);
  f.update(500, 1);
  f.update(300, 2);
  const copy = f.clone();

  f.reset(42, 0);
  expect(f.best()).toBe(42);
  expect(f.size).toBe(1);

  expect(copy.windowLength).toBe(4);
  expect(copy.best()).toBe(500);
  copy.update(100, 5);
  expect(copy.best()).toBe(300);
  expect(f.best()).toBe(42);
});
