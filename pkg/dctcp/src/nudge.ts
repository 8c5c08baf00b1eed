import { EcnCodePoint } from "@tcp-bbr/tcp-state";

/**
 * Adjust cwnd gain upon an ACK that carries ECN echo.
 * @param gain - Current cwnd gain.
 * @param codePoint - ECT codepoint used by the sender.
 * @returns New cwnd gain.
 *
 * @remarks
 * With ECT(0) the gain moves up by `step` toward `upper`; with ECT(1) it moves down by `step`
 * toward `lower`; other codepoints leave it unchanged.
 * The step and bounds are empirical tunables.
 */
export function nudgeCwndGain(gain: number, codePoint: EcnCodePoint, {
  step = 0.1,
  lower = 1.5,
  upper = 2.5,
}: nudgeCwndGain.Options = {}): number {
  switch (codePoint) {
    case EcnCodePoint.Ect0: {
      return Math.min(upper, gain + step);
    }
    case EcnCodePoint.Ect1: {
      return Math.max(lower, gain - step);
    }
    default: {
      return gain;
    }
  }
}
export namespace nudgeCwndGain {
  export interface Options {
    /**
     * Change per marked ACK.
     * @defaultValue 0.1
     */
    step?: number;

    /**
     * Lower bound under ECT(1).
     * @defaultValue 1.5
     */
    lower?: number;

    /**
     * Upper bound under ECT(0).
     * @defaultValue 2.5
     */
    upper?: number;
  }
}
