export * from "./lib/deferred-cleanup";
export * from "./lib/local-path";
export * from "./lib/temp-dir";
