import { EcnState } from "@tcp-bbr/tcp-state";
import { expect, test, vi } from "vitest";

import { BbrTracer } from "..";
import { BbrHarness } from "../test-fixture/harness";

test("tracer", () => {
  const h = new BbrHarness({ describe: "flow-3" });
  const log = vi.fn<(str: string) => void>();
  const tracer = BbrTracer.enable({ bbr: h.bbr, output: { log } });

  h.open();
  expect(log.mock.calls.map(([str]) => str)).toEqual([
    "flow-3 pacingGain 0.000->2.890",
    "flow-3 cwndGain 0.000->2.890",
  ]);
  log.mockClear();

  h.fillPipe();
  expect(log.mock.calls.map(([str]) => str)).toEqual([
    "flow-3 minRtt Infinity->40",
    "flow-3 mode Startup->Drain",
    "flow-3 pacingGain 2.890->0.346",
  ]);
  log.mockClear();

  h.tcb.nextTxSequence = 10000;
  h.tcb.ecnState = EcnState.EceRcvd;
  h.bbr.onPacketsAcked(h.tcb, 2, 40);
  h.tcb.lastAckedSeq = 10000;
  h.tcb.ecnState = EcnState.Idle;
  h.bbr.onPacketsAcked(h.tcb, 2, 40);
  expect(log.mock.calls.map(([str]) => str)).toEqual([
    "flow-3 cwndGain 2.890->2.500",
    "flow-3 ecn marked=2920 total=5840 alpha=0.96875",
  ]);
  log.mockClear();

  tracer.disable();
  h.ack({ rate: 34e6, inflight: 100000 });
  expect(log).not.toHaveBeenCalled();
});

test("tracer selective", () => {
  const h = new BbrHarness();
  const log = vi.fn<(str: string) => void>();
  BbrTracer.enable({ bbr: h.bbr, output: { log }, gain: false, minRtt: false });
  h.open();
  h.fillPipe();
  expect(log).toHaveBeenCalledOnce();
  expect(log).toHaveBeenCalledWith("Bbr mode Startup->Drain");
});
