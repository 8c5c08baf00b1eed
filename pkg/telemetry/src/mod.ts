export * from "./rtt-cache";
