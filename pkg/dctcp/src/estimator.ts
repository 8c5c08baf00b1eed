import { CaEvent, EcnState, TcpFlag, type TcpSocketState } from "@tcp-bbr/tcp-state";
import { assert } from "@tcp-bbr/util";
import { TypedEventTarget } from "typescript-event-target";

type EventMap = {
  /** Emitted when an observation window closes. */
  congestionestimate: DctcpEstimator.CongestionEstimateEvent;
};

/**
 * DCTCP congestion estimate.
 * @see {@link https://datatracker.ietf.org/doc/html/rfc8257}
 *
 * @remarks
 * Acknowledged bytes are counted over an observation window that ends when the cumulative ACK
 * passes the sequence number that was next to be sent when the window began. At the end of each
 * window, alpha is moved toward the fraction of bytes that carried an ECN echo.
 */
export class DctcpEstimator extends TypedEventTarget<EventMap> {
  public readonly g: number;
  private alpha_ = 1;
  private started = false;

  private ackedBytesEcn = 0;
  private ackedBytesTotal = 0;
  private nextSeq?: number;

  private ceState_ = false;
  private delayedAckReserved_ = false;
  private priorRcvNxt?: number;

  constructor({
    g = 0.0625,
    alpha = 1,
  }: DctcpEstimator.Options = {}) {
    super();
    if (!(g > 0 && g < 1)) {
      throw new RangeError("DCTCP g must be within (0,1)");
    }
    this.g = g;
    this.setInitialAlpha(alpha);
  }

  /** Smoothed fraction of marked bytes. */
  public get alpha() { return this.alpha_; }

  /** Whether the most recent data packet received carried CE. */
  public get ceState() { return this.ceState_; }

  /** Whether a delayed ACK is pending. */
  public get delayedAckReserved() { return this.delayedAckReserved_; }

  /** Marked and total acknowledged bytes in the current observation window. */
  public get windowBytes(): DctcpEstimator.WindowBytes {
    return { markedBytes: this.ackedBytesEcn, totalBytes: this.ackedBytesTotal };
  }

  /**
   * Assign initial alpha.
   * @throws Error
   * Thrown if the estimator has started.
   */
  public setInitialAlpha(alpha: number): void {
    assert(!this.started, "DCTCP has already been initialized");
    if (!(alpha >= 0 && alpha <= 1)) {
      throw new RangeError("DCTCP alpha must be within [0,1]");
    }
    this.alpha_ = alpha;
  }

  /** Mark the estimator as running. */
  public start(): void {
    this.started = true;
  }

  /**
   * Account for acknowledged segments.
   * @returns Whether these segments were acknowledged with ECN echo.
   */
  public onPacketsAcked(tcb: TcpSocketState, segmentsAcked: number): boolean {
    const bytes = segmentsAcked * tcb.segmentSize;
    this.ackedBytesTotal += bytes;
    const marked = tcb.ecnState === EcnState.EceRcvd;
    if (marked) {
      this.ackedBytesEcn += bytes;
    }

    this.nextSeq ??= tcb.nextTxSequence;
    if (tcb.lastAckedSeq >= this.nextSeq) {
      const fraction = this.ackedBytesTotal > 0 ? this.ackedBytesEcn / this.ackedBytesTotal : 0;
      this.alpha_ = (1 - this.g) * this.alpha_ + this.g * fraction;
      this.dispatchTypedEvent("congestionestimate", new DctcpEstimator.CongestionEstimateEvent(
        "congestionestimate", this.ackedBytesEcn, this.ackedBytesTotal, this.alpha_));
      this.reset(tcb);
    }
    return marked;
  }

  /** Begin a new observation window at the next sequence number to be sent. */
  public reset(tcb: TcpSocketState): void {
    this.nextSeq = tcb.nextTxSequence;
    this.ackedBytesEcn = 0;
    this.ackedBytesTotal = 0;
  }

  /**
   * Handle a connection event.
   * Events unrelated to ECN or delayed ACK are ignored.
   */
  public onCwndEvent(tcb: TcpSocketState, event: CaEvent): void {
    switch (event) {
      case CaEvent.EcnIsCe: {
        this.ceState0to1(tcb);
        break;
      }
      case CaEvent.EcnNoCe: {
        this.ceState1to0(tcb);
        break;
      }
      case CaEvent.DelayedAck: {
        this.delayedAckReserved_ = true;
        break;
      }
      case CaEvent.NonDelayedAck: {
        this.delayedAckReserved_ = false;
        break;
      }
    }
  }

  /** Create an independent copy, without event listeners. */
  public clone(): DctcpEstimator {
    const copy = new DctcpEstimator({ g: this.g, alpha: this.alpha_ });
    copy.started = this.started;
    copy.ackedBytesEcn = this.ackedBytesEcn;
    copy.ackedBytesTotal = this.ackedBytesTotal;
    copy.nextSeq = this.nextSeq;
    copy.ceState_ = this.ceState_;
    copy.delayedAckReserved_ = this.delayedAckReserved_;
    copy.priorRcvNxt = this.priorRcvNxt;
    return copy;
  }

  private ceState0to1(tcb: TcpSocketState): void {
    if (!this.ceState_ && this.delayedAckReserved_ && this.priorRcvNxt !== undefined) {
      // the delayed ACK covers data received before CE; send it without ECE
      tcb.sendEmptyPacket?.(TcpFlag.ACK, this.priorRcvNxt);
    }
    this.priorRcvNxt = tcb.rxNextSequence;
    this.ceState_ = true;
    tcb.ecnState = EcnState.CeRcvd;
  }

  private ceState1to0(tcb: TcpSocketState): void {
    if (this.ceState_ && this.delayedAckReserved_ && this.priorRcvNxt !== undefined) {
      tcb.sendEmptyPacket?.(TcpFlag.ACK | TcpFlag.ECE, this.priorRcvNxt);
    }
    this.priorRcvNxt = tcb.rxNextSequence;
    this.ceState_ = false;
    if (tcb.ecnState === EcnState.CeRcvd || tcb.ecnState === EcnState.SendingEce) {
      tcb.ecnState = EcnState.Idle;
    }
  }
}

export namespace DctcpEstimator {
  export interface Options {
    /**
     * Estimation gain, within `(0,1)`.
     * @defaultValue 0.0625
     */
    g?: number;

    /**
     * Initial alpha, within `[0,1]`.
     * @defaultValue 1
     */
    alpha?: number;
  }

  export interface WindowBytes {
    markedBytes: number;
    totalBytes: number;
  }

  export class CongestionEstimateEvent extends Event {
    constructor(
        type: string,
        public readonly markedBytes: number,
        public readonly totalBytes: number,
        public readonly alpha: number,
    ) {
      super(type);
    }
  }
}
