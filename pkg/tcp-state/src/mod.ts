export * from "./an";
export * from "./rate-sample";
export * from "./socket-state";
