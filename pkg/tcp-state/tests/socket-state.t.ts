import { expect, test } from "vitest";

import { CongState, EcnState, RateSample, TcpSocketState } from "..";

test("defaults", () => {
  const tcb = new TcpSocketState();
  expect(tcb.segmentSize).toBe(536);
  expect(tcb.initialCWnd).toBe(10);
  expect(tcb.cWnd).toBe(5360);
  expect(tcb.congState).toBe(CongState.Open);
  expect(tcb.ecnState).toBe(EcnState.Disabled);
  expect(tcb.minRtt).toBe(Infinity);
  expect(tcb.sendEmptyPacket).toBeUndefined();
});

test("init", () => {
  const tcb = new TcpSocketState({ segmentSize: 1460, initialCWnd: 4 });
  expect(tcb.cWnd).toBe(5840);

  const tcb1 = new TcpSocketState({ segmentSize: 1460, cWnd: 20000, bytesInFlight: 3000 });
  expect(tcb1.cWnd).toBe(20000);
  expect(tcb1.bytesInFlight).toBe(3000);
});

test("RateSample.create", () => {
  const rs = RateSample.create({ ackedSacked: 1460, deliveryRate: 1e6 });
  expect(rs).toEqual({
    deliveryRate: 1e6,
    isAppLimited: false,
    interval: 0,
    delivered: 0,
    priorDelivered: 0,
    priorInFlight: 0,
    bytesLoss: 0,
    ackedSacked: 1460,
  });
});
