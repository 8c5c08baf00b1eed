/** Congestion state of a TCP sender, as seen by congestion control. */
export enum CongState {
  /** Normal state, no dubious events. */
  Open,
  /** Duplicate ACKs or SACKs received, possibly reordering. */
  Disorder,
  /** Window was reduced due to ECN or local congestion. */
  CWR,
  /** Fast recovery after loss. */
  Recovery,
  /** Retransmission timeout fired. */
  Loss,
}

/** Events that the connection reports to congestion control. */
export enum CaEvent {
  /** First transmission when no packet is in flight. */
  TxStart,
  /** Congestion window restart after idle. */
  CwndRestart,
  /** End of congestion recovery. */
  CompleteCwr,
  /** Loss timeout. */
  Loss,
  /** ECT set, but not CE marked. */
  EcnNoCe,
  /** Received CE marked IP packet. */
  EcnIsCe,
  /** Delayed ACK is reserved. */
  DelayedAck,
  /** Non-delayed ACK is sent. */
  NonDelayedAck,
}

/** Whether the connection negotiates ECN. */
export enum UseEcn {
  Off,
  On,
  AcceptOnly,
}

/** ECN operating mode. */
export enum EcnMode {
  ClassicEcn,
  DctcpEcn,
}

/** ECN-capable transport codepoint placed on outgoing packets. */
export enum EcnCodePoint {
  NotEct = 0,
  Ect1 = 1,
  Ect0 = 2,
  CongExp = 3,
}

/** ECN state machine of a connection. */
export enum EcnState {
  Disabled,
  Idle,
  /** Last packet received had CE bit set. */
  CeRcvd,
  /** Receiver sends ECE until CWR is received. */
  SendingEce,
  /** Sender received ECE. */
  EceRcvd,
  /** Sender has reduced window and set CWR. */
  CwrSent,
}

/** TCP header flags. */
export const TcpFlag = {
  FIN: 0x01,
  SYN: 0x02,
  RST: 0x04,
  PSH: 0x08,
  ACK: 0x10,
  URG: 0x20,
  ECE: 0x40,
  CWR: 0x80,
} as const;
