import type { RandomSource } from "@tcp-bbr/util";

/** Pacing gains of the ProbeBW cycle. */
export const PACING_GAIN_CYCLE: readonly number[] = [5 / 4, 3 / 4, 1, 1, 1, 1, 1, 1];

/** Position within the ProbeBW pacing gain cycle. */
export class GainCycle {
  private index_ = 0;
  private stamp_ = 0;

  /** Number of phases. */
  public get length() { return PACING_GAIN_CYCLE.length; }

  /** Current phase index. */
  public get index() { return this.index_; }

  /** Time when the current phase started. */
  public get stamp() { return this.stamp_; }

  /** Pacing gain of the current phase. */
  public get gain() { return PACING_GAIN_CYCLE[this.index_]; }

  /**
   * Move to the next phase.
   * @returns Pacing gain of the new phase.
   */
  public advance(now: number): number {
    this.stamp_ = now;
    this.index_ = (this.index_ + 1) % this.length;
    return this.gain;
  }

  /**
   * Start cycling at a random phase.
   * @returns Pacing gain of the starting phase.
   *
   * @remarks
   * A phase is drawn among all but the 3/4 phase, so that a flow does not begin ProbeBW by
   * draining, and different flows probe at different times.
   * The offset from the last phase is drawn from [0,6] inclusive, so every phase except 3/4
   * can be the starting phase.
   */
  public start(now: number, random: RandomSource): number {
    this.index_ = this.length - 1 - random.int(this.length - 1);
    return this.advance(now);
  }

  public clone(): GainCycle {
    const copy = new GainCycle();
    copy.index_ = this.index_;
    copy.stamp_ = this.stamp_;
    return copy;
  }
}
