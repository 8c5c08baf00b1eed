export * from "./ack-aggregation";
export * from "./bbr";
export type { CongestionOps } from "./congestion-ops";
export * from "./gain-cycle";
export * from "./tracer";
