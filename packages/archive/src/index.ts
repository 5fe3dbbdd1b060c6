export * from "./lib/archivable";
export * from "./lib/archive-errors";
export * from "./lib/archive-layout";
export * from "./lib/archive-config";
export * from "./lib/archive-backend";
export * from "./lib/loader-registry";
export * from "./lib/archive-writer";
export * from "./lib/archive-reader";
