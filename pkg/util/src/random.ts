import assert from "tiny-invariant";

const GOLDEN = 0x9E3779B9;

/**
 * Seeded pseudo-random number source.
 *
 * @remarks
 * This is a xorshift32 generator. It is not suitable for cryptography.
 * The same seed always yields the same sequence.
 */
export class RandomSource {
  private x: number;

  /**
   * Constructor.
   * @param seed - 32-bit seed.
   */
  constructor(seed = 4) {
    this.x = (seed ^ GOLDEN) >>> 0 || GOLDEN;
  }

  /** Return next unsigned 32-bit integer. */
  public next(): number {
    let { x } = this;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.x = x >>> 0;
    return this.x;
  }

  /** Return a real number within `[min,max)` range. */
  public uniform(min = 0, max = 1): number {
    assert(max >= min);
    return min + (max - min) * (this.next() / 0x100000000);
  }

  /** Return an integer within `[0,n)` range. */
  public int(n: number): number {
    assert(Number.isInteger(n) && n > 0);
    return Math.floor(this.uniform(0, n));
  }

  /**
   * Create an independent source seeded from this source.
   *
   * @remarks
   * Forking consumes one value from this source, so that successive forks
   * receive different streams and the parent does not replay any of them.
   */
  public fork(): RandomSource {
    return new RandomSource(this.next());
  }
}
