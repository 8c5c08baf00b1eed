import { CongState, RateSample, TcpSocketState } from "@tcp-bbr/tcp-state";

import { Bbr } from "..";

/** Clock advanced by the test. */
export class SyntheticClock {
  public t = 0;

  public readonly now = () => this.t;

  public advance(ms: number): void {
    this.t += ms;
  }
}

/** Drive a {@link Bbr} controller with synthetic ACKs. */
export class BbrHarness {
  public readonly clock = new SyntheticClock();
  public readonly tcb: TcpSocketState;
  public readonly bbr: Bbr;
  /** Connection delivered count. */
  public delivered = 0;

  constructor(opts: Bbr.Options = {}, tcbInit: TcpSocketState.Init = {}) {
    this.tcb = new TcpSocketState({ segmentSize: 1460, ...tcbInit });
    this.bbr = new Bbr({ now: this.clock.now, ...opts });
  }

  /** Initialize the controller and enter Open state. */
  public open(): this {
    this.bbr.initialize(this.tcb);
    this.bbr.onCongestionStateChanged(this.tcb, CongState.Open);
    return this;
  }

  /**
   * Deliver one ACK.
   *
   * @remarks
   * By default, `priorDelivered` equals the delivered count before this ACK, so that every ACK
   * completes a round.
   */
  public ack({
    rate,
    acked = 1460,
    inflight = this.tcb.bytesInFlight,
    rtt = 40,
    dt = 40,
    appLimited = false,
    priorDelivered = this.delivered,
    bytesLoss = 0,
    interval = dt,
  }: BbrHarness.Ack): RateSample {
    this.clock.advance(dt);
    this.delivered += acked;
    this.tcb.lastRtt = rtt;
    this.tcb.bytesInFlight = inflight;
    this.tcb.lastAckedSackedBytes = acked;
    const rs = RateSample.create({
      deliveryRate: rate,
      isAppLimited: appLimited,
      interval,
      delivered: acked,
      priorDelivered,
      priorInFlight: inflight,
      bytesLoss,
      ackedSacked: acked,
    });
    this.bbr.onAck(this.tcb, { delivered: this.delivered }, rs);
    return rs;
  }

  /**
   * Leave Startup: three rounds of 30% growth followed by three rounds on a 34 MB/s plateau.
   * Inflight stays above the drain target, so the controller is left in Drain.
   */
  public fillPipe(): void {
    for (const rate of [20e6, 26e6, 33.8e6, 34e6, 34e6, 34e6]) {
      this.ack({ rate, inflight: 2e6 });
    }
  }
}

export namespace BbrHarness {
  export interface Ack {
    /** Delivery rate in bytes per second. */
    rate: number;
    acked?: number;
    inflight?: number;
    rtt?: number;
    dt?: number;
    appLimited?: boolean;
    priorDelivered?: number;
    bytesLoss?: number;
    interval?: number;
  }
}
