/**
 * Windowed minimum of RTT samples, with time-based expiry.
 *
 * @remarks
 * A sample is admitted if it does not exceed the current minimum, or if the current minimum is
 * older than `windowLength`. Admission restarts the expiry clock.
 */
export class MinRttFilter {
  private minRtt_ = Infinity;
  private stamp_ = 0;

  /**
   * Constructor.
   * @param windowLength - Window length in milliseconds.
   */
  constructor(public readonly windowLength = 10000) {
    if (!(windowLength > 0)) {
      throw new RangeError("windowLength must be positive");
    }
  }

  /** Current minimum RTT in milliseconds, Infinity if none. */
  public get minRtt() { return this.minRtt_; }

  /** Time when the current minimum was admitted or refreshed. */
  public get stamp() { return this.stamp_; }

  /** Determine whether the current minimum is older than the window. */
  public expired(now: number): boolean {
    return now > this.stamp_ + this.windowLength;
  }

  /**
   * Offer an RTT sample.
   * @param rtt - RTT sample in milliseconds; non-positive samples are ignored.
   * @returns Whether the sample was admitted.
   */
  public observe(rtt: number, now: number): boolean {
    if (!(rtt > 0) || (rtt > this.minRtt_ && !this.expired(now))) {
      return false;
    }
    this.minRtt_ = rtt;
    this.stamp_ = now;
    return true;
  }

  /** Restart the expiry clock without changing the minimum. */
  public refresh(now: number): void {
    this.stamp_ = now;
  }

  /** Replace the minimum. Infinity clears it. */
  public reset(rtt: number, now: number): void {
    this.minRtt_ = rtt;
    this.stamp_ = now;
  }

  /** Create an independent copy. */
  public clone(): MinRttFilter {
    const copy = new MinRttFilter(this.windowLength);
    copy.reset(this.minRtt_, this.stamp_);
    return copy;
  }
}
