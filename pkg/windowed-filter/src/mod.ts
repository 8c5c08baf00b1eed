export * from "./max-bandwidth";
export * from "./min-rtt";
