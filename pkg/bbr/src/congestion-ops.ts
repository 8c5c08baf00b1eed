import type { CaEvent, CongState, RateConnection, RateSample, TcpSocketState } from "@tcp-bbr/tcp-state";

/**
 * Congestion control algorithm, as driven by a TCP connection.
 *
 * @remarks
 * Every method runs synchronously inside the connection's event processing.
 * The connection owns `tcb` and applies the window and pacing rate written into it.
 */
export interface CongestionOps {
  /** Algorithm name. */
  readonly name: string;

  /** Configure the connection for this algorithm. */
  initialize: (tcb: TcpSocketState) => void;

  /** Notify a congestion state transition. */
  onCongestionStateChanged: (tcb: TcpSocketState, newState: CongState) => void;

  /** Notify a connection event. */
  onCwndEvent: (tcb: TcpSocketState, event: CaEvent) => void;

  /** Process an ACK with its rate sample, updating window and pacing rate. */
  onAck: (tcb: TcpSocketState, rc: RateConnection, rs: RateSample) => void;

  /**
   * Notify newly acknowledged segments.
   * @param rtt - RTT sample in milliseconds.
   */
  onPacketsAcked: (tcb: TcpSocketState, segmentsAcked: number, rtt: number) => void;

  /** Return slow start threshold upon loss. */
  getSlowStartThreshold: (tcb: TcpSocketState, bytesInFlight: number) => number;

  /** Create an independent instance for a connection cloned from a listener. */
  fork: () => CongestionOps;
}
