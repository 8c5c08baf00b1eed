import { CongState, EcnCodePoint, EcnMode, EcnState, UseEcn } from "./an";

/**
 * Sender state of a TCP connection.
 *
 * @remarks
 * This object is owned by the connection. Congestion control reads it and writes the window,
 * threshold, pacing and ECN fields in place.
 */
export class TcpSocketState {
  /**
   * Constructor.
   * @param init - Initial field values.
   * If `cWnd` is omitted, it is computed from `initialCWnd` and `segmentSize`.
   */
  constructor(init: TcpSocketState.Init = {}) {
    Object.assign(this, init);
    this.cWnd = init.cWnd ?? this.initialCWnd * this.segmentSize;
  }

  /** Congestion window in bytes. */
  public cWnd = 0;
  /** Slow start threshold in bytes. */
  public ssThresh = 0xFFFFFFFF;
  /** Slow start threshold assigned when congestion control is (re)initialized. */
  public initialSsThresh = 0xFFFFFFFF;
  /** Initial congestion window in segments. */
  public initialCWnd = 10;
  /** Segment size in bytes. */
  public segmentSize = 536;
  /** Bytes sent but not yet acknowledged or marked lost. */
  public bytesInFlight = 0;
  /** Bytes acknowledged or selectively acknowledged by the most recent ACK. */
  public lastAckedSackedBytes = 0;

  /** Whether pacing is enabled. */
  public pacing = true;
  /** Pacing rate in bytes per second. */
  public pacingRate = 5e8;
  /** Maximum pacing rate in bytes per second. */
  public maxPacingRate = 5e8;

  /** Minimum RTT observed by the connection in milliseconds, Infinity if none. */
  public minRtt = Infinity;
  /** Smoothed RTT in milliseconds, Infinity if none. */
  public srtt = Infinity;
  /** Most recent RTT sample in milliseconds, zero if none. */
  public lastRtt = 0;

  /** Congestion state. */
  public congState = CongState.Open;
  /**
   * Whether the connection should hold window growth while it is not limited by the window.
   * Congestion control may clear this flag.
   */
  public suppressIncreaseIfCwndLimited = true;

  /** ECN negotiation setting. */
  public useEcn = UseEcn.Off;
  /** ECN operating mode. */
  public ecnMode = EcnMode.ClassicEcn;
  /** ECT codepoint placed on outgoing packets. */
  public ectCodePoint = EcnCodePoint.NotEct;
  /** ECN state. */
  public ecnState = EcnState.Disabled;

  /** Next sequence number to be sent. */
  public nextTxSequence = 0;
  /** Highest cumulatively acknowledged sequence number. */
  public lastAckedSeq = 0;
  /** Next sequence number expected from the peer. */
  public rxNextSequence = 0;

  /**
   * Callback to transmit an empty segment.
   * Congestion control uses this to re-send an ACK with a different ECE flag.
   */
  public sendEmptyPacket?: TcpSocketState.SendEmptyPacket;
}

export namespace TcpSocketState {
  export type Init = Partial<TcpSocketState>;

  /**
   * Transmit an empty segment.
   * @param flags - OR'ed {@link TcpFlag} values.
   * @param ackNumber - Acknowledgment number of the segment.
   */
  export type SendEmptyPacket = (flags: number, ackNumber: number) => void;
}
