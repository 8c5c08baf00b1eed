import { DctcpEstimator, nudgeCwndGain } from "@tcp-bbr/dctcp";
import { CaEvent, CongState, EcnCodePoint, EcnMode, type RateConnection, type RateSample, type TcpSocketState, UseEcn } from "@tcp-bbr/tcp-state";
import { assert, type Clock, console, makeClock, RandomSource, subFloor, toBytes } from "@tcp-bbr/util";
import { MaxBandwidthFilter, MinRttFilter } from "@tcp-bbr/windowed-filter";
import type { Except } from "type-fest";
import { TypedEventTarget } from "typescript-event-target";

import { AckAggregation } from "./ack-aggregation";
import type { CongestionOps } from "./congestion-ops";
import { GainCycle } from "./gain-cycle";

type EventMap = {
  /** Emitted when operating mode changes. */
  mode: Bbr.ModeEvent;
  /** Emitted when windowed minimum RTT changes. */
  minrtt: Bbr.ValueEvent;
  /** Emitted when pacing gain changes. */
  pacinggain: Bbr.ValueEvent;
  /** Emitted when cwnd gain changes. */
  cwndgain: Bbr.ValueEvent;
  /** Emitted when a DCTCP observation window closes. */
  congestionestimate: DctcpEstimator.CongestionEstimateEvent;
};

/** Round-trip windows for full pipe detection. */
const FULL_BW_COUNT = 3;
/** Bandwidth growth that restarts full pipe detection. */
const FULL_BW_THRESH = 1.25;

/**
 * BBR congestion control.
 * @see {@link https://datatracker.ietf.org/doc/html/draft-cardwell-iccrg-bbr-congestion-control}
 *
 * @remarks
 * BBR builds a model of the path from the maximum delivery rate over recent rounds and the
 * minimum RTT over recent seconds, and paces at a gain of the estimated bandwidth.
 * ECN echoes feed a DCTCP estimator, and each marked ACK nudges the cwnd gain.
 */
export class Bbr extends TypedEventTarget<EventMap> implements CongestionOps {
  public readonly name = "TcpBbr";
  public readonly describe: string;
  public readonly highGain: number;
  public readonly probeRttDuration: number;
  public readonly pacingMargin: number;
  public readonly useEct0: boolean;

  private readonly config: Bbr.Config;
  private readonly now: Clock;
  private readonly random: RandomSource;

  private maxBwFilter: MaxBandwidthFilter;
  private minRttFilter: MinRttFilter;
  private cycle = new GainCycle();
  private ackAggregation: AckAggregation;
  private dctcp: DctcpEstimator;

  private mode_ = Bbr.Mode.Startup;
  private pacingGain_ = 0;
  private cwndGain_ = 0;
  private isInitialized = false;

  private isPipeFilled_ = false;
  private fullBandwidth_ = 0;
  private fullBandwidthCount_ = 0;

  private roundCount_ = 0;
  private roundStart = false;
  private nextRoundDelivered = 0;

  private minRttExpired = false;
  private probeRttDoneStamp?: number;
  private probeRttRoundDone = false;
  private idleRestart = false;

  private packetConservation_ = false;
  private priorCwnd_ = 0;
  private targetCwnd_ = 0;
  private minPipeCwnd_ = 0;
  private sendQuantum_ = 0;

  private delivered = 0;
  private appLimited = 0;
  private hasSeenRtt = false;
  private rttJitter_ = 0;

  constructor({
    highGain = 2.89,
    bwWindowLength = 10,
    rttWindowLength = 10000,
    probeRttDuration = 200,
    extraAckedRttWindowLength = 5,
    ackEpochAckedResetThresh = 2 ** 17,
    extraAckedGain = 1,
    pacingMargin = 0.01,
    dctcpShiftG = 0.0625,
    dctcpAlphaOnInit = 1,
    useEct0 = true,
    seed = 4,
    random = new RandomSource(seed),
    now = makeClock(),
    describe = "Bbr",
  }: Bbr.Options = {}) {
    super();
    if (!(highGain > 1 && Number.isFinite(highGain))) {
      throw new RangeError("highGain must be a finite number greater than 1");
    }
    if (!(probeRttDuration > 0)) {
      throw new RangeError("probeRttDuration must be positive");
    }
    if (!(pacingMargin >= 0 && pacingMargin < 1)) {
      throw new RangeError("pacingMargin must be within [0,1)");
    }

    this.config = {
      highGain, bwWindowLength, rttWindowLength, probeRttDuration,
      extraAckedRttWindowLength, ackEpochAckedResetThresh, extraAckedGain,
      pacingMargin, dctcpShiftG, dctcpAlphaOnInit, useEct0, describe,
    };
    this.describe = describe;
    this.highGain = highGain;
    this.probeRttDuration = probeRttDuration;
    this.pacingMargin = pacingMargin;
    this.useEct0 = useEct0;
    this.now = now;
    this.random = random;

    this.maxBwFilter = new MaxBandwidthFilter(bwWindowLength);
    this.minRttFilter = new MinRttFilter(rttWindowLength);
    this.ackAggregation = new AckAggregation({
      gain: extraAckedGain,
      windowLength: extraAckedRttWindowLength,
      resetThresh: ackEpochAckedResetThresh,
    });
    this.dctcp = new DctcpEstimator({ g: dctcpShiftG, alpha: dctcpAlphaOnInit });
    this.dctcp.addEventListener("congestionestimate", this.forwardCongestionEstimate);
  }

  /** Operating mode. */
  public get mode() { return this.mode_; }
  private set mode(v: Bbr.Mode) {
    if (v === this.mode_) {
      return;
    }
    const evt = new Bbr.ModeEvent("mode", v, this.mode_);
    this.mode_ = v;
    this.dispatchTypedEvent("mode", evt);
  }

  /** Pacing gain. */
  public get pacingGain() { return this.pacingGain_; }
  private set pacingGain(v: number) {
    if (v === this.pacingGain_) {
      return;
    }
    const evt = new Bbr.ValueEvent("pacinggain", v, this.pacingGain_);
    this.pacingGain_ = v;
    this.dispatchTypedEvent("pacinggain", evt);
  }

  /** Congestion window gain. */
  public get cwndGain() { return this.cwndGain_; }
  private set cwndGain(v: number) {
    if (v === this.cwndGain_) {
      return;
    }
    const evt = new Bbr.ValueEvent("cwndgain", v, this.cwndGain_);
    this.cwndGain_ = v;
    this.dispatchTypedEvent("cwndgain", evt);
  }

  /** Windowed minimum RTT in milliseconds, Infinity if unknown. */
  public get minRtt() { return this.minRttFilter.minRtt; }

  /** Windowed maximum bandwidth in bytes per second. */
  public get bandwidth() { return this.maxBwFilter.best(); }

  /** Whether Startup has found the bottleneck bandwidth. */
  public get isPipeFilled() { return this.isPipeFilled_; }

  /** Bandwidth recorded at the last significant growth. */
  public get fullBandwidth() { return this.fullBandwidth_; }

  /** Rounds without significant bandwidth growth. */
  public get fullBandwidthCount() { return this.fullBandwidthCount_; }

  /** Number of completed rounds. */
  public get roundCount() { return this.roundCount_; }

  /** Phase index in the ProbeBW pacing gain cycle. */
  public get cycleIndex() { return this.cycle.index; }

  /** Whether cwnd is held by packet conservation during recovery. */
  public get packetConservation() { return this.packetConservation_; }

  /** cwnd saved before recovery or ProbeRTT. */
  public get priorCwnd() { return this.priorCwnd_; }

  /** cwnd that the model currently calls for. */
  public get targetCwnd() { return this.targetCwnd_; }

  /** Smallest cwnd that keeps the pipe busy. */
  public get minPipeCwnd() { return this.minPipeCwnd_; }

  /** Send quantum in bytes. */
  public get sendQuantum() { return this.sendQuantum_; }

  /** Smoothed deviation of RTT samples from the minimum, in milliseconds. */
  public get rttJitter() { return this.rttJitter_; }

  /** DCTCP smoothed fraction of marked bytes. */
  public get alpha() { return this.dctcp.alpha; }

  /** Extra acked bytes in both aggregation slots. */
  public get extraAcked() { return this.ackAggregation.extraAcked; }

  /** Start time and acknowledged bytes of the current ACK epoch. */
  public get ackEpoch() { return this.ackAggregation.epoch; }

  /**
   * Assign DCTCP initial alpha.
   * @throws Error
   * Thrown if the controller has been initialized.
   */
  public setDctcpAlphaOnInit(alpha: number): void {
    this.dctcp.setInitialAlpha(alpha);
  }

  public initialize(tcb: TcpSocketState): void {
    tcb.useEcn = UseEcn.On;
    tcb.ecnMode = EcnMode.DctcpEcn;
    tcb.ectCodePoint = this.useEct0 ? EcnCodePoint.Ect0 : EcnCodePoint.Ect1;
    tcb.suppressIncreaseIfCwndLimited = false;
    this.dctcp.start();
  }

  public onCongestionStateChanged(tcb: TcpSocketState, newState: CongState): void {
    switch (newState) {
      case CongState.Open: {
        if (!this.isInitialized) {
          this.init(tcb);
        }
        break;
      }
      case CongState.Loss: {
        this.saveCwnd(tcb);
        this.roundStart = true;
        break;
      }
      case CongState.Recovery: {
        this.saveCwnd(tcb);
        tcb.cWnd = tcb.bytesInFlight + Math.max(tcb.lastAckedSackedBytes, tcb.segmentSize);
        this.packetConservation_ = true;
        break;
      }
    }
  }

  public onCwndEvent(tcb: TcpSocketState, event: CaEvent): void {
    switch (event) {
      case CaEvent.CompleteCwr: {
        this.packetConservation_ = false;
        this.restoreCwnd(tcb);
        break;
      }
      case CaEvent.TxStart: {
        this.restartFromIdle(tcb);
        break;
      }
      default: {
        this.dctcp.onCwndEvent(tcb, event);
        break;
      }
    }
  }

  public onAck(tcb: TcpSocketState, rc: RateConnection, rs: RateSample): void {
    assert(this.isInitialized, "Bbr must enter Open state before receiving ACKs");
    this.delivered = rc.delivered;
    const now = this.now();
    this.updateModelAndState(tcb, rs, now);
    this.updateControlParameters(tcb, rs);
  }

  public onPacketsAcked(tcb: TcpSocketState, segmentsAcked: number, rtt: number): void {
    const minRtt = this.minRttFilter.minRtt;
    if (Number.isFinite(minRtt) && rtt > 0) {
      // smoothed with the DCTCP estimation gain
      const { g } = this.dctcp;
      this.rttJitter_ = (1 - g) * this.rttJitter_ + g * Math.abs(rtt - minRtt);
    }

    if (this.dctcp.onPacketsAcked(tcb, segmentsAcked)) {
      this.cwndGain = nudgeCwndGain(this.cwndGain_, tcb.ectCodePoint);
    }
  }

  public getSlowStartThreshold(tcb: TcpSocketState): number {
    this.saveCwnd(tcb);
    return tcb.ssThresh;
  }

  /**
   * Compute the bytes in flight that the model calls for at a gain.
   * @returns Bytes, or the initial window if minimum RTT is unknown.
   */
  public inFlight(tcb: TcpSocketState, gain: number): number {
    const minRtt = this.minRttFilter.minRtt;
    if (!Number.isFinite(minRtt)) {
      return tcb.initialCWnd * tcb.segmentSize;
    }

    const bdp = this.maxBwFilter.best() * minRtt / 1000;
    let inflight = gain * bdp + 3 * this.sendQuantum_;
    if (this.mode_ === Bbr.Mode.ProbeBW && this.cycle.index === 0) {
      inflight += 2 * tcb.segmentSize;
    }
    return toBytes(inflight);
  }

  /** Remember cwnd before recovery or ProbeRTT. */
  public saveCwnd(tcb: TcpSocketState): void {
    if (tcb.congState !== CongState.Recovery && this.mode_ !== Bbr.Mode.ProbeRTT) {
      this.priorCwnd_ = tcb.cWnd;
    } else {
      this.priorCwnd_ = Math.max(this.priorCwnd_, tcb.cWnd);
    }
  }

  /** Raise cwnd back to the remembered value. */
  public restoreCwnd(tcb: TcpSocketState): void {
    tcb.cWnd = Math.max(this.priorCwnd_, tcb.cWnd);
  }

  /**
   * Create an independent controller with the same state.
   *
   * @remarks
   * The copy receives a random source forked from this controller, and no event listeners.
   */
  public fork(): Bbr {
    const copy = new Bbr({ ...this.config, random: this.random.fork(), now: this.now });
    copy.maxBwFilter = this.maxBwFilter.clone();
    copy.minRttFilter = this.minRttFilter.clone();
    copy.cycle = this.cycle.clone();
    copy.ackAggregation = this.ackAggregation.clone();
    copy.dctcp.removeEventListener("congestionestimate", copy.forwardCongestionEstimate);
    copy.dctcp = this.dctcp.clone();
    copy.dctcp.addEventListener("congestionestimate", copy.forwardCongestionEstimate);

    copy.mode_ = this.mode_;
    copy.pacingGain_ = this.pacingGain_;
    copy.cwndGain_ = this.cwndGain_;
    copy.isInitialized = this.isInitialized;
    copy.isPipeFilled_ = this.isPipeFilled_;
    copy.fullBandwidth_ = this.fullBandwidth_;
    copy.fullBandwidthCount_ = this.fullBandwidthCount_;
    copy.roundCount_ = this.roundCount_;
    copy.roundStart = this.roundStart;
    copy.nextRoundDelivered = this.nextRoundDelivered;
    copy.minRttExpired = this.minRttExpired;
    copy.probeRttDoneStamp = this.probeRttDoneStamp;
    copy.probeRttRoundDone = this.probeRttRoundDone;
    copy.idleRestart = this.idleRestart;
    copy.packetConservation_ = this.packetConservation_;
    copy.priorCwnd_ = this.priorCwnd_;
    copy.targetCwnd_ = this.targetCwnd_;
    copy.minPipeCwnd_ = this.minPipeCwnd_;
    copy.sendQuantum_ = this.sendQuantum_;
    copy.delivered = this.delivered;
    copy.appLimited = this.appLimited;
    copy.hasSeenRtt = this.hasSeenRtt;
    copy.rttJitter_ = this.rttJitter_;
    return copy;
  }

  private readonly forwardCongestionEstimate = ({ markedBytes, totalBytes, alpha }: DctcpEstimator.CongestionEstimateEvent) => {
    this.dispatchTypedEvent("congestionestimate", new DctcpEstimator.CongestionEstimateEvent(
      "congestionestimate", markedBytes, totalBytes, alpha));
  };

  private init(tcb: TcpSocketState): void {
    const now = this.now();
    this.setMinRtt(Number.isFinite(tcb.srtt) && tcb.srtt > 0 ? tcb.srtt : Infinity, now);
    this.priorCwnd_ = tcb.cWnd;
    tcb.ssThresh = tcb.initialSsThresh;
    this.targetCwnd_ = tcb.cWnd;
    this.minPipeCwnd_ = 4 * tcb.segmentSize;
    this.sendQuantum_ = tcb.segmentSize;

    this.roundCount_ = 0;
    this.roundStart = false;
    this.nextRoundDelivered = 0;
    this.isPipeFilled_ = false;
    this.fullBandwidth_ = 0;
    this.fullBandwidthCount_ = 0;

    this.enterStartup();
    this.initPacingRate(tcb);
    this.ackAggregation.reset(now);
    this.isInitialized = true;
  }

  private initPacingRate(tcb: TcpSocketState): void {
    if (!tcb.pacing) {
      console.warn(`${this.describe} enabling pacing`);
      tcb.pacing = true;
    }

    let rtt = 1;
    if (Number.isFinite(tcb.minRtt)) {
      rtt = Math.max(tcb.minRtt, 1);
      this.hasSeenRtt = true;
    }
    const nominalBandwidth = tcb.cWnd * 1000 / rtt;
    tcb.pacingRate = this.pacingGain_ * nominalBandwidth;
    this.maxBwFilter.reset(nominalBandwidth, 0);
  }

  private setMinRtt(rtt: number, now: number): void {
    const prev = this.minRttFilter.minRtt;
    this.minRttFilter.reset(rtt, now);
    this.emitMinRtt(prev);
  }

  private emitMinRtt(prev: number): void {
    const value = this.minRttFilter.minRtt;
    if (value !== prev) {
      this.dispatchTypedEvent("minrtt", new Bbr.ValueEvent("minrtt", value, prev));
    }
  }

  private enterStartup(): void {
    this.mode = Bbr.Mode.Startup;
    this.pacingGain = this.highGain;
    this.cwndGain = this.highGain;
  }

  private enterDrain(): void {
    this.mode = Bbr.Mode.Drain;
    this.pacingGain = 1 / this.highGain;
    this.cwndGain = this.highGain;
  }

  private enterProbeBW(now: number): void {
    this.mode = Bbr.Mode.ProbeBW;
    this.cwndGain = 2;
    this.pacingGain = this.cycle.start(now, this.random);
  }

  private enterProbeRTT(): void {
    this.mode = Bbr.Mode.ProbeRTT;
    this.pacingGain = 1;
    this.cwndGain = 1;
  }

  private updateModelAndState(tcb: TcpSocketState, rs: RateSample, now: number): void {
    this.updateBottleneckBandwidth(rs);
    this.ackAggregation.update(rs, {
      now,
      roundStart: this.roundStart,
      bandwidth: this.maxBwFilter.best(),
      cwnd: tcb.cWnd,
    });
    this.checkCyclePhase(tcb, rs, now);
    this.checkFullPipe(rs);
    this.checkDrain(tcb, now);
    this.updateRTprop(tcb, now);
    this.checkProbeRTT(tcb, rs, now);
  }

  private updateControlParameters(tcb: TcpSocketState, rs: RateSample): void {
    this.setPacingRate(tcb, this.pacingGain_);
    this.sendQuantum_ = tcb.segmentSize;
    this.setCwnd(tcb, rs);
  }

  private updateBottleneckBandwidth(rs: RateSample): void {
    if (rs.delivered < 0 || rs.interval === 0) {
      return;
    }

    this.updateRound(rs);
    if (rs.deliveryRate >= this.maxBwFilter.best() || !rs.isAppLimited) {
      this.maxBwFilter.update(rs.deliveryRate, this.roundCount_);
    }
  }

  private updateRound(rs: RateSample): void {
    if (rs.priorDelivered >= this.nextRoundDelivered) {
      this.nextRoundDelivered = this.delivered;
      ++this.roundCount_;
      this.roundStart = true;
      this.packetConservation_ = false;
    } else {
      this.roundStart = false;
    }
  }

  private checkCyclePhase(tcb: TcpSocketState, rs: RateSample, now: number): void {
    if (this.mode_ === Bbr.Mode.ProbeBW && this.isNextCyclePhase(tcb, rs, now)) {
      this.pacingGain = this.cycle.advance(now);
    }
  }

  private isNextCyclePhase(tcb: TcpSocketState, rs: RateSample, now: number): boolean {
    const isFullLength = now - this.cycle.stamp > this.minRttFilter.minRtt;
    if (this.pacingGain_ === 1) {
      return isFullLength;
    }
    if (this.pacingGain_ > 1) {
      return isFullLength && (rs.bytesLoss > 0 || rs.priorInFlight >= this.inFlight(tcb, this.pacingGain_));
    }
    return isFullLength || rs.priorInFlight <= this.inFlight(tcb, 1);
  }

  private checkFullPipe(rs: RateSample): void {
    if (this.isPipeFilled_ || !this.roundStart || rs.isAppLimited) {
      return;
    }

    const bw = this.maxBwFilter.best();
    if (bw >= this.fullBandwidth_ * FULL_BW_THRESH) {
      this.fullBandwidth_ = bw;
      this.fullBandwidthCount_ = 0;
      return;
    }

    ++this.fullBandwidthCount_;
    if (this.fullBandwidthCount_ >= FULL_BW_COUNT) {
      this.isPipeFilled_ = true;
    }
  }

  private checkDrain(tcb: TcpSocketState, now: number): void {
    if (this.mode_ === Bbr.Mode.Startup && this.isPipeFilled_) {
      this.enterDrain();
      tcb.ssThresh = this.inFlight(tcb, 1);
    }

    if (this.mode_ === Bbr.Mode.Drain && tcb.bytesInFlight <= this.inFlight(tcb, 1)) {
      this.enterProbeBW(now);
    }
  }

  private updateRTprop(tcb: TcpSocketState, now: number): void {
    this.minRttExpired = this.minRttFilter.expired(now);
    const prev = this.minRttFilter.minRtt;
    if (this.minRttFilter.observe(tcb.lastRtt, now)) {
      this.emitMinRtt(prev);
    }
  }

  private checkProbeRTT(tcb: TcpSocketState, rs: RateSample, now: number): void {
    if (this.mode_ !== Bbr.Mode.ProbeRTT && this.minRttExpired && !this.idleRestart) {
      this.enterProbeRTT();
      this.saveCwnd(tcb);
      this.probeRttDoneStamp = undefined;
    }

    if (this.mode_ === Bbr.Mode.ProbeRTT) {
      this.handleProbeRTT(tcb, now);
    }

    if (rs.delivered > 0) {
      this.idleRestart = false;
    }
  }

  private handleProbeRTT(tcb: TcpSocketState, now: number): void {
    this.appLimited = Math.max(this.delivered + tcb.bytesInFlight, 1);

    if (this.probeRttDoneStamp === undefined) {
      if (tcb.bytesInFlight <= this.minPipeCwnd_) {
        this.probeRttDoneStamp = now + this.probeRttDuration;
        this.probeRttRoundDone = false;
        this.nextRoundDelivered = this.delivered;
      }
      return;
    }

    if (this.roundStart) {
      this.probeRttRoundDone = true;
    }
    this.maybeExitProbeRTT(tcb, now);
  }

  private maybeExitProbeRTT(tcb: TcpSocketState, now: number): void {
    if (!this.probeRttRoundDone || this.probeRttDoneStamp === undefined || now <= this.probeRttDoneStamp) {
      return;
    }

    this.minRttFilter.refresh(now);
    this.restoreCwnd(tcb);
    if (this.isPipeFilled_) {
      this.enterProbeBW(now);
    } else {
      this.enterStartup();
    }
  }

  /** Ignored until the first ProbeRTT sets the app-limited mark. */
  private restartFromIdle(tcb: TcpSocketState): void {
    if (this.appLimited === 0) {
      return;
    }

    const now = this.now();
    this.idleRestart = true;
    this.ackAggregation.restartEpoch(now);
    if (this.mode_ === Bbr.Mode.ProbeBW) {
      this.setPacingRate(tcb, 1);
    } else if (this.mode_ === Bbr.Mode.ProbeRTT) {
      this.maybeExitProbeRTT(tcb, now);
    }
  }

  private setPacingRate(tcb: TcpSocketState, gain: number): void {
    const rate = Math.min(gain * this.maxBwFilter.best() * (1 - this.pacingMargin), tcb.maxPacingRate);
    if (!this.hasSeenRtt && Number.isFinite(tcb.minRtt)) {
      this.initPacingRate(tcb);
    }
    if (this.isPipeFilled_ || rate > tcb.pacingRate) {
      tcb.pacingRate = rate;
    }
  }

  private setCwnd(tcb: TcpSocketState, rs: RateSample): void {
    if (rs.ackedSacked > 0 && !(tcb.congState === CongState.Recovery && this.modulateCwndForRecovery(tcb, rs))) {
      this.updateTargetCwnd(tcb);
      if (this.isPipeFilled_) {
        tcb.cWnd = Math.min(tcb.cWnd + rs.ackedSacked, this.targetCwnd_);
      } else if (tcb.cWnd < this.targetCwnd_ || this.delivered < tcb.initialCWnd * tcb.segmentSize) {
        tcb.cWnd += rs.ackedSacked;
      }
      tcb.cWnd = Math.max(tcb.cWnd, this.minPipeCwnd_);
    }

    if (this.mode_ === Bbr.Mode.ProbeRTT) {
      tcb.cWnd = Math.min(tcb.cWnd, this.minPipeCwnd_);
    }
  }

  /** @returns Whether packet conservation holds cwnd. */
  private modulateCwndForRecovery(tcb: TcpSocketState, rs: RateSample): boolean {
    if (rs.bytesLoss > 0) {
      tcb.cWnd = Math.max(subFloor(tcb.cWnd, rs.bytesLoss), tcb.segmentSize);
    }
    if (this.packetConservation_) {
      tcb.cWnd = Math.max(tcb.cWnd, tcb.bytesInFlight + rs.ackedSacked);
      return true;
    }
    return false;
  }

  private updateTargetCwnd(tcb: TcpSocketState): void {
    this.targetCwnd_ = this.inFlight(tcb, this.cwndGain_) +
      this.ackAggregation.cwnd(this.maxBwFilter.best(), this.isPipeFilled_);
  }
}

export namespace Bbr {
  /** Operating mode. */
  export enum Mode {
    /** Exponential growth to find bottleneck bandwidth. */
    Startup,
    /** Drain the queue built during Startup. */
    Drain,
    /** Cycle pacing gain to probe for bandwidth. */
    ProbeBW,
    /** Reduce inflight to measure minimum RTT. */
    ProbeRTT,
  }

  /** Options that determine controller behavior, excluding clock and random source. */
  export type Config = Required<Except<Options, "seed" | "random" | "now">>;

  export interface Options {
    /**
     * Startup pacing and cwnd gain.
     * @defaultValue 2.89
     */
    highGain?: number;

    /**
     * Bandwidth filter window length in rounds.
     * @defaultValue 10
     */
    bwWindowLength?: number;

    /**
     * Minimum RTT filter window length in milliseconds.
     * @defaultValue 10000
     */
    rttWindowLength?: number;

    /**
     * Minimum time to stay in ProbeRTT, in milliseconds.
     * @defaultValue 200
     */
    probeRttDuration?: number;

    /**
     * Rounds per ACK aggregation slot.
     * @defaultValue 5
     */
    extraAckedRttWindowLength?: number;

    /**
     * Acknowledged bytes in an ACK epoch that force a new epoch.
     * @defaultValue 2**17
     */
    ackEpochAckedResetThresh?: number;

    /**
     * Gain applied to ACK aggregation allowance. Zero disables it.
     * @defaultValue 1
     */
    extraAckedGain?: number;

    /**
     * Fraction by which pacing rate stays below estimated bandwidth.
     * @defaultValue 0.01
     */
    pacingMargin?: number;

    /**
     * DCTCP estimation gain.
     * @defaultValue 0.0625
     */
    dctcpShiftG?: number;

    /**
     * DCTCP initial alpha.
     * @defaultValue 1
     */
    dctcpAlphaOnInit?: number;

    /**
     * Mark outgoing packets ECT(0) instead of ECT(1).
     * @defaultValue true
     */
    useEct0?: boolean;

    /**
     * Random seed, used when `random` is omitted.
     * @defaultValue 4
     */
    seed?: number;

    /** Random source for ProbeBW phase selection. */
    random?: RandomSource;

    /**
     * Clock in milliseconds.
     * @defaultValue hirestime
     */
    now?: Clock;

    /**
     * Description for logging purpose.
     * @defaultValue "Bbr"
     */
    describe?: string;
  }

  export class ModeEvent extends Event {
    constructor(type: string, public readonly mode: Mode, public readonly prev: Mode) {
      super(type);
    }
  }

  export class ValueEvent extends Event {
    constructor(type: string, public readonly value: number, public readonly prev: number) {
      super(type);
    }
  }
}
