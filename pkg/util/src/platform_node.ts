import { Console } from "node:console";

import hirestime from "hirestime";

/** Console on stderr. */
export const console = new Console(process.stderr);

/**
 * Monotonic clock in milliseconds.
 *
 * @remarks
 * Algorithms accept a Clock instead of reading a process-wide time source,
 * so that tests can drive synthetic time.
 */
export type Clock = () => number;

/** Create a Clock that reads zero when this function is called. */
export function makeClock(): Clock {
  return hirestime();
}
