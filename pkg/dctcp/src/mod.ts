export * from "./estimator";
export * from "./nudge";
