import { expect, test } from "vitest";

import { MinRttFilter } from "..";

test("observe", () => {
  const f = new MinRttFilter(10000);
  expect(f.minRtt).toBe(Infinity);

  expect(f.observe(0, 0)).toBeFalsy();
  expect(f.observe(50, 100)).toBeTruthy();
  expect(f.minRtt).toBe(50);
  expect(f.stamp).toBe(100);

  expect(f.observe(60, 200)).toBeFalsy();
  expect(f.minRtt).toBe(50);
  expect(f.stamp).toBe(100);

  expect(f.observe(50, 300)).toBeTruthy();
  expect(f.stamp).toBe(300);

  expect(f.observe(40, 400)).toBeTruthy();
  expect(f.minRtt).toBe(40);
});

test("expiry", () => {
  const f = new MinRttFilter(10000);
  f.observe(40, 1000);
  expect(f.expired(11000)).toBeFalsy();
  expect(f.expired(11001)).toBeTruthy();

  // a smaller sample would restart the clock, a larger one does not before expiry
  expect(f.observe(45, 11000)).toBeFalsy();
  expect(f.observe(70, 11001)).toBeTruthy();
  expect(f.minRtt).toBe(70);
  expect(f.stamp).toBe(11001);
  expect(f.expired(11002)).toBeFalsy();
});

test("non-increasing between expiries", () => {
  const f = new MinRttFilter(1000);
  let prev = f.minRtt;
  let x = 7;
  for (let now = 0; now < 900; now += 3) {
    x = (x * 75 + 74) % 65537;
    f.observe(20 + (x % 80), now);
    expect(f.minRtt).toBeLessThanOrEqual(prev);
    prev = f.minRtt;
  }
});

test("refresh reset clone", () => {
  const f = new MinRttFilter(500);
  f.observe(30, 0);
  f.refresh(400);
  expect(f.minRtt).toBe(30);
  expect(f.expired(900)).toBeFalsy();

  const copy = f.clone();
  f.reset(Infinity, 1000);
  expect(f.minRtt).toBe(Infinity);
  expect(copy.minRtt).toBe(30);
  expect(copy.stamp).toBe(400);
  expect(copy.windowLength).toBe(500);
});

test("invalid windowLength", () => {
  expect(() => new MinRttFilter(0)).toThrow(RangeError);
});
