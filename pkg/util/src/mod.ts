import assert from "tiny-invariant";

export { assert };
export { type Clock, console, makeClock } from "./platform_node";

export * from "./number";
export * from "./random";
