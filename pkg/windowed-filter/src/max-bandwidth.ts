import FixedDeque from "mnemonist/fixed-deque.js";

interface Sample {
  readonly value: number;
  readonly round: number;
}

/**
 * Windowed maximum of delivery rate samples.
 *
 * @remarks
 * Samples are tagged with the round-trip count in which they were taken.
 * The filter retains the maximum over the most recent `windowLength` rounds.
 *
 * Internally this is a monotonic deque: values are strictly decreasing and rounds are strictly
 * increasing from front to back, so that there is at most one entry per round and the front is
 * the current best. Entries that fall out of the window are evicted when a new sample arrives.
 */
export class MaxBandwidthFilter {
  private readonly samples: FixedDeque<Sample>;

  /**
   * Constructor.
   * @param windowLength - Window length in rounds.
   */
  constructor(public readonly windowLength = 10) {
    if (!Number.isInteger(windowLength) || windowLength <= 0) {
      throw new RangeError("windowLength must be a positive integer");
    }
    this.samples = new FixedDeque<Sample>(Array, windowLength);
  }

  /** Number of retained entries. */
  public get size() { return this.samples.size; }

  /**
   * Return the maximum retained sample value.
   * @returns Maximum value, or zero if the filter is empty.
   */
  public best(): number {
    return this.samples.peekFirst()?.value ?? 0;
  }

  /**
   * Admit a sample.
   * @param value - Sample value.
   * @param round - Current round-trip count; must not decrease between calls.
   */
  public update(value: number, round: number): void {
    this.expire(round);

    for (let last = this.samples.peekLast(); last && last.value <= value; last = this.samples.peekLast()) {
      this.samples.pop();
    }

    const last = this.samples.peekLast();
    if (last && last.round >= round) {
      // dominated by a larger sample from the same round
      return;
    }
    this.samples.push({ value, round });
  }

  /** Discard all samples and retain a single sample. */
  public reset(value: number, round: number): void {
    this.samples.clear();
    this.samples.push({ value, round });
  }

  /** Create an independent copy. */
  public clone(): MaxBandwidthFilter {
    const copy = new MaxBandwidthFilter(this.windowLength);
    this.samples.forEach((sample) => copy.samples.push(sample));
    return copy;
  }

  private expire(round: number): void {
    for (let first = this.samples.peekFirst(); first && first.round + this.windowLength <= round;
      first = this.samples.peekFirst()) {
      this.samples.shift();
    }
  }
}
