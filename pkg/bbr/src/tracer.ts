import type { DctcpEstimator } from "@tcp-bbr/dctcp";
import { console } from "@tcp-bbr/util";

import { Bbr } from "./bbr";

/** Print trace logs from {@link Bbr} events. */
export class BbrTracer {
  public static enable(opts: BbrTracer.Options): BbrTracer {
    return new BbrTracer(opts);
  }

  private readonly output: BbrTracer.Output;
  private readonly bbr: Bbr;

  private constructor({
    bbr,
    output = console,
    mode = true,
    gain = true,
    minRtt = true,
    ecn = true,
  }: BbrTracer.Options) {
    this.output = output;
    this.bbr = bbr;
    if (mode) {
      this.bbr.addEventListener("mode", this.mode);
    }
    if (gain) {
      this.bbr.addEventListener("pacinggain", this.pacinggain);
      this.bbr.addEventListener("cwndgain", this.cwndgain);
    }
    if (minRtt) {
      this.bbr.addEventListener("minrtt", this.minrtt);
    }
    if (ecn) {
      this.bbr.addEventListener("congestionestimate", this.congestionestimate);
    }
  }

  public disable(): void {
    this.bbr.removeEventListener("mode", this.mode);
    this.bbr.removeEventListener("pacinggain", this.pacinggain);
    this.bbr.removeEventListener("cwndgain", this.cwndgain);
    this.bbr.removeEventListener("minrtt", this.minrtt);
    this.bbr.removeEventListener("congestionestimate", this.congestionestimate);
  }

  private readonly mode = ({ mode, prev }: Bbr.ModeEvent) => {
    this.output.log(`${this.bbr.describe} mode ${Bbr.Mode[prev]}->${Bbr.Mode[mode]}`);
  };

  private readonly pacinggain = ({ value, prev }: Bbr.ValueEvent) => {
    this.output.log(`${this.bbr.describe} pacingGain ${prev.toFixed(3)}->${value.toFixed(3)}`);
  };

  private readonly cwndgain = ({ value, prev }: Bbr.ValueEvent) => {
    this.output.log(`${this.bbr.describe} cwndGain ${prev.toFixed(3)}->${value.toFixed(3)}`);
  };

  private readonly minrtt = ({ value, prev }: Bbr.ValueEvent) => {
    this.output.log(`${this.bbr.describe} minRtt ${prev}->${value}`);
  };

  private readonly congestionestimate = ({ markedBytes, totalBytes, alpha }: DctcpEstimator.CongestionEstimateEvent) => {
    this.output.log(`${this.bbr.describe} ecn marked=${markedBytes} total=${totalBytes} alpha=${alpha.toFixed(5)}`);
  };
}

export namespace BbrTracer {
  export interface Output {
    log: (str: string) => void;
  }

  export interface Options {
    /** Controller to trace. */
    bbr: Bbr;

    /**
     * Where to write log entries.
     * @defaultValue `console`
     */
    output?: Output;

    /**
     * Whether to log mode transitions.
     * @defaultValue true
     */
    mode?: boolean;

    /**
     * Whether to log pacing and cwnd gain changes.
     * @defaultValue true
     */
    gain?: boolean;

    /**
     * Whether to log minimum RTT changes.
     * @defaultValue true
     */
    minRtt?: boolean;

    /**
     * Whether to log DCTCP congestion estimates.
     * @defaultValue true
     */
    ecn?: boolean;
  }
}
