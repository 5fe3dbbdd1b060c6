export * from "./lib/storage";
export * from "./lib/file-storage";
export * from "./lib/cloud-storage";
export * from "./lib/hdfs-storage";
export * from "./lib/storage-factory";
export * from "./lib/walk-directory";
export * from "./tests/mock-storage";
