import { RandomSource } from "@tcp-bbr/util";
import { expect, test } from "vitest";

import { GainCycle, PACING_GAIN_CYCLE } from "..";

test("advance", () => {
  const cycle = new GainCycle();
  expect(cycle.length).toBe(8);
  expect(cycle.index).toBe(0);
  expect(cycle.gain).toBe(1.25);

  expect(cycle.advance(100)).toBe(0.75);
  expect(cycle.index).toBe(1);
  expect(cycle.stamp).toBe(100);

  const gains: number[] = [];
  for (let i = 0; i < 8; ++i) {
    gains.push(cycle.advance(200 + i));
  }
  expect(gains).toEqual([1, 1, 1, 1, 1, 1, 1.25, 0.75]);
  expect(cycle.index).toBe(1);
  expect(cycle.stamp).toBe(207);
});

test("start", () => {
  const random = new RandomSource(1);
  const seen = new Set<number>();
  for (let i = 0; i < 500; ++i) {
    const cycle = new GainCycle();
    const gain = cycle.start(300, random);
    expect(cycle.stamp).toBe(300);
    expect(gain).toBe(PACING_GAIN_CYCLE[cycle.index]);
    seen.add(cycle.index);
  }
  expect([...seen].sort((a, b) => a - b)).toEqual([0, 2, 3, 4, 5, 6, 7]);
});

test("clone", () => {
  const cycle = new GainCycle();
  cycle.advance(10);
  const copy = cycle.clone();
  cycle.advance(20);
  expect(copy.index).toBe(1);
  expect(copy.stamp).toBe(10);
  expect(cycle.index).toBe(2);
});
