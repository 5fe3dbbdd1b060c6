export * from "./lib/log";
export * from "./lib/wrapped-error";
export * from "./lib/retry";
export * from "./lib/sleep";
export * from "./lib/uuid";
