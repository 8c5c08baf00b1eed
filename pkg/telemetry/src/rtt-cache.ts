import CircularBuffer from "mnemonist/circular-buffer.js";
import { Mutex, type Semaphore } from "wait-your-turn";

/**
 * Bounded buffer of recent RTT samples, shared among connections for external reporting.
 *
 * @remarks
 * When the buffer is full, pushing a sample evicts the oldest one.
 * Appenders and readers are serialized by the lock.
 */
export class RttCache {
  public readonly capacity: number;
  private readonly buffer: CircularBuffer<number>;
  private readonly lock: Pick<Semaphore, "acquire">;

  constructor({
    capacity = 10,
    lock = new Mutex(),
  }: RttCache.Options = {}) {
    if (!(Number.isInteger(capacity) && capacity > 0)) {
      throw new RangeError("capacity must be a positive integer");
    }
    this.capacity = capacity;
    this.buffer = new CircularBuffer<number>(Float64Array, capacity);
    this.lock = lock;
  }

  /**
   * Append an RTT sample.
   * @param rtt - RTT in milliseconds.
   */
  public async push(rtt: number): Promise<void> {
    const release = await this.lock.acquire();
    try {
      this.buffer.push(rtt);
    } finally {
      release();
    }
  }

  /** Return retained samples, oldest first. */
  public async snapshot(): Promise<number[]> {
    const release = await this.lock.acquire();
    try {
      return Array.from(this.buffer);
    } finally {
      release();
    }
  }

  /** Remove all samples. */
  public async clear(): Promise<void> {
    const release = await this.lock.acquire();
    try {
      this.buffer.clear();
    } finally {
      release();
    }
  }
}

export namespace RttCache {
  export interface Options {
    /**
     * Maximum number of retained samples.
     * @defaultValue 10
     */
    capacity?: number;

    /**
     * Lock that serializes access.
     * @defaultValue `new Mutex()` from `wait-your-turn` package
     */
    lock?: Pick<Semaphore, "acquire">;
  }
}
