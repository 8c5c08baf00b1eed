import type { RateSample } from "@tcp-bbr/tcp-state";
import { subFloor, toBytes } from "@tcp-bbr/util";

/**
 * ACK aggregation estimator.
 *
 * @remarks
 * ACKs often arrive in bursts. Within an ACK epoch, bytes acknowledged beyond what the estimated
 * bandwidth would deliver are counted as "extra acked". The maximum extra acked is kept in two
 * slots that alternate every `windowLength` rounds, and is added to the target cwnd so that the
 * sender can keep sending while ACKs are held back.
 */
export class AckAggregation {
  public readonly gain: number;
  public readonly windowLength: number;
  public readonly resetThresh: number;

  private readonly slots: [number, number] = [0, 0];
  private slotIndex = 0;
  private winRtt = 0;
  private epochTime = 0;
  private epochAcked = 0;

  constructor({
    gain = 1,
    windowLength = 5,
    resetThresh = 2 ** 17,
  }: AckAggregation.Options = {}) {
    if (!(gain >= 0 && Number.isFinite(gain))) {
      throw new RangeError("extraAckedGain must be a non-negative number");
    }
    if (!(Number.isInteger(windowLength) && windowLength > 0)) {
      throw new RangeError("extraAckedRttWindowLength must be a positive integer");
    }
    if (!(Number.isInteger(resetThresh) && resetThresh > 0)) {
      throw new RangeError("ackEpochAckedResetThresh must be a positive integer");
    }
    this.gain = gain;
    this.windowLength = windowLength;
    this.resetThresh = resetThresh;
  }

  /** Extra acked bytes in both slots. */
  public get extraAcked(): readonly [number, number] {
    return [this.slots[0], this.slots[1]];
  }

  /** Index of the slot being updated. */
  public get currentSlot() { return this.slotIndex; }

  /** Start time and acknowledged bytes of the current ACK epoch. */
  public get epoch(): AckAggregation.Epoch {
    return { time: this.epochTime, acked: this.epochAcked };
  }

  /** Clear both slots and start a new epoch. */
  public reset(now: number): void {
    this.slots[0] = 0;
    this.slots[1] = 0;
    this.slotIndex = 0;
    this.winRtt = 0;
    this.restartEpoch(now);
  }

  /** Start a new ACK epoch. */
  public restartEpoch(now: number): void {
    this.epochTime = now;
    this.epochAcked = 0;
  }

  /** Account for an ACK. */
  public update(rs: RateSample, { now, roundStart, bandwidth, cwnd }: AckAggregation.Context): void {
    if (this.gain === 0 || rs.ackedSacked <= 0 || rs.delivered < 0) {
      return;
    }

    if (roundStart) {
      this.winRtt = Math.min(31, this.winRtt + 1);
      if (this.winRtt >= this.windowLength) {
        this.winRtt = 0;
        this.slotIndex = this.slotIndex === 0 ? 1 : 0;
        this.slots[this.slotIndex] = 0;
      }
    }

    let expectedAcked = toBytes(bandwidth * (now - this.epochTime) / 1000);
    if (this.epochAcked <= expectedAcked || this.epochAcked + rs.ackedSacked >= this.resetThresh) {
      this.restartEpoch(now);
      expectedAcked = 0;
    }
    this.epochAcked += rs.ackedSacked;

    const extraAcked = Math.min(subFloor(this.epochAcked, expectedAcked), cwnd);
    if (extraAcked > this.slots[this.slotIndex]) {
      this.slots[this.slotIndex] = extraAcked;
    }
  }

  /**
   * Compute cwnd allowance for ACK aggregation.
   * @param bandwidth - Best bandwidth estimate in bytes per second.
   * @returns Extra cwnd in bytes, zero until the pipe is filled.
   */
  public cwnd(bandwidth: number, isPipeFilled: boolean): number {
    if (this.gain === 0 || !isPipeFilled) {
      return 0;
    }
    const maxAggrBytes = toBytes(bandwidth / 10);
    return Math.min(toBytes(this.gain * Math.max(...this.slots)), maxAggrBytes);
  }

  public clone(): AckAggregation {
    const copy = new AckAggregation(this);
    copy.slots[0] = this.slots[0];
    copy.slots[1] = this.slots[1];
    copy.slotIndex = this.slotIndex;
    copy.winRtt = this.winRtt;
    copy.epochTime = this.epochTime;
    copy.epochAcked = this.epochAcked;
    return copy;
  }
}

export namespace AckAggregation {
  export interface Options {
    /**
     * Gain applied to the extra acked estimate. Zero disables the estimator.
     * @defaultValue 1
     */
    gain?: number;

    /**
     * Number of rounds after which the other slot takes over.
     * @defaultValue 5
     */
    windowLength?: number;

    /**
     * Acknowledged bytes in an epoch that force a new epoch.
     * @defaultValue 2**17
     */
    resetThresh?: number;
  }

  export interface Context {
    now: number;
    /** Whether this ACK starts a new round. */
    roundStart: boolean;
    /** Best bandwidth estimate in bytes per second. */
    bandwidth: number;
    /** Current cwnd in bytes. */
    cwnd: number;
  }

  export interface Epoch {
    time: number;
    acked: number;
  }
}
