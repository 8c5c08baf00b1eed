/**
 * Delivery statistics computed for one incoming ACK.
 *
 * @remarks
 * This is produced by the connection's rate sampler and is immutable.
 */
export interface RateSample {
  /** Delivery rate in bytes per second. */
  readonly deliveryRate: number;
  /** Whether the sample was taken while the sender was application-limited. */
  readonly isAppLimited: boolean;
  /** Sample interval in milliseconds. Zero means the sample is invalid. */
  readonly interval: number;
  /** Bytes delivered over the interval. Negative means the sample is invalid. */
  readonly delivered: number;
  /** Connection delivered count when the acknowledged packet was sent. */
  readonly priorDelivered: number;
  /** Bytes in flight before this ACK. */
  readonly priorInFlight: number;
  /** Bytes newly marked lost upon this ACK. */
  readonly bytesLoss: number;
  /** Bytes newly acknowledged or selectively acknowledged upon this ACK. */
  readonly ackedSacked: number;
}

export namespace RateSample {
  /** Create a RateSample, with omitted fields set to zero. */
  export function create(fields: Partial<RateSample> = {}): RateSample {
    return {
      deliveryRate: 0,
      isAppLimited: false,
      interval: 0,
      delivered: 0,
      priorDelivered: 0,
      priorInFlight: 0,
      bytesLoss: 0,
      ackedSacked: 0,
      ...fields,
    };
  }
}

/** Connection-wide delivery totals maintained by the rate sampler. */
export interface RateConnection {
  /** Total bytes delivered so far. */
  readonly delivered: number;
}
