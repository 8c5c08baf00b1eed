import { Bbr } from "@tcp-bbr/bbr";
import { expect, test } from "vitest";

import { loadBbrOptions, loadRttCacheCapacity, loadTraceEnabled } from "..";

test("defaults", () => {
  const opts = loadBbrOptions({});
  expect(Object.values(opts).every((v) => v === undefined)).toBeTruthy();
  expect(loadTraceEnabled({})).toBeFalsy();
  expect(loadRttCacheCapacity({})).toBe(10);

  const bbr = new Bbr(opts);
  expect(bbr.highGain).toBe(2.89);
  expect(bbr.probeRttDuration).toBe(200);
  expect(bbr.useEct0).toBeTruthy();
});

test("values", () => {
  const opts = loadBbrOptions({
    TCPBBR_HIGH_GAIN: "2.5",
    TCPBBR_BW_WINDOW: "8",
    TCPBBR_RTT_WINDOW: "5000",
    TCPBBR_PROBE_RTT_DURATION: "150",
    TCPBBR_EXTRA_ACKED_WINDOW: "4",
    TCPBBR_ACK_EPOCH_RESET_THRESH: "65536",
    TCPBBR_EXTRA_ACKED_GAIN: "0.5",
    TCPBBR_DCTCP_G: "0.125",
    TCPBBR_DCTCP_ALPHA: "0",
    TCPBBR_USE_ECT0: "false",
    TCPBBR_SEED: "-3",
  });
  expect(opts).toEqual({
    highGain: 2.5,
    bwWindowLength: 8,
    rttWindowLength: 5000,
    probeRttDuration: 150,
    extraAckedRttWindowLength: 4,
    ackEpochAckedResetThresh: 65536,
    extraAckedGain: 0.5,
    dctcpShiftG: 0.125,
    dctcpAlphaOnInit: 0,
    useEct0: false,
    seed: -3,
  });

  const bbr = new Bbr(opts);
  expect(bbr.highGain).toBe(2.5);
  expect(bbr.alpha).toBe(0);
  expect(bbr.useEct0).toBeFalsy();

  expect(loadTraceEnabled({ TCPBBR_TRACE: "1" })).toBeTruthy();
  expect(loadRttCacheCapacity({ TCPBBR_RTT_CACHE_CAPACITY: "32" })).toBe(32);
});

test.each([
  ["TCPBBR_HIGH_GAIN", "-1"],
  ["TCPBBR_BW_WINDOW", "2.5"],
  ["TCPBBR_USE_ECT0", "maybe"],
  ["TCPBBR_SEED", "x"],
])("malformed %s=%s", (key, value) => {
  expect(() => loadBbrOptions({ [key]: value })).toThrow(/should be/);
});

test("malformed capacity", () => {
  expect(() => loadRttCacheCapacity({ TCPBBR_RTT_CACHE_CAPACITY: "-5" })).toThrow(/should be/);
});
