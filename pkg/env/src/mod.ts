import "dotenv/config";

import type { Bbr } from "@tcp-bbr/bbr";
import { from } from "env-var";

type Env = Record<string, string | undefined>;

/**
 * Read {@link Bbr.Options} from environment variables.
 * Unset variables leave the option undefined, so that the default applies.
 * @throws EnvVarError
 * Thrown if a variable is malformed.
 */
export function loadBbrOptions(env: Env = process.env): Bbr.Options {
  const e = from(env);
  return {
    highGain: e.get("TCPBBR_HIGH_GAIN").asFloatPositive(),
    bwWindowLength: e.get("TCPBBR_BW_WINDOW").asIntPositive(),
    rttWindowLength: e.get("TCPBBR_RTT_WINDOW").asFloatPositive(),
    probeRttDuration: e.get("TCPBBR_PROBE_RTT_DURATION").asFloatPositive(),
    extraAckedRttWindowLength: e.get("TCPBBR_EXTRA_ACKED_WINDOW").asIntPositive(),
    ackEpochAckedResetThresh: e.get("TCPBBR_ACK_EPOCH_RESET_THRESH").asIntPositive(),
    extraAckedGain: e.get("TCPBBR_EXTRA_ACKED_GAIN").asFloatPositive(),
    dctcpShiftG: e.get("TCPBBR_DCTCP_G").asFloatPositive(),
    dctcpAlphaOnInit: e.get("TCPBBR_DCTCP_ALPHA").asFloat(),
    useEct0: e.get("TCPBBR_USE_ECT0").asBool(),
    seed: e.get("TCPBBR_SEED").asInt(),
  };
}

/** Determine whether BbrTracer should be enabled. */
export function loadTraceEnabled(env: Env = process.env): boolean {
  return from(env).get("TCPBBR_TRACE").asBool() ?? false;
}

/** Read RttCache capacity. */
export function loadRttCacheCapacity(env: Env = process.env): number {
  return from(env).get("TCPBBR_RTT_CACHE_CAPACITY").asIntPositive() ?? 10;
}
