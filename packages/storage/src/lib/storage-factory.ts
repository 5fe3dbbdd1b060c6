import { expandLocalPath } from "node-utils";
import { IStorage } from "./storage";
import { FileStorage } from "./file-storage";
import { CloudStorage, IS3Credentials } from "./cloud-storage";
import { DEFAULT_WEBHDFS_PORT, HdfsStorage, IHdfsConfig } from "./hdfs-storage";

//
// Join paths.
//
export function pathJoin(...paths: string[]): string {
    let result = paths.filter(path => path.length > 0).join('/').replace(/\/+$/, '');

    // Filter out double forward slashes.
    result = result.replace(/\/{2,}/g, '/');

    return result;
}

//
// The kinds of storage a location can address.
//
export type StorageType = "fs" | "s3" | "hdfs";

/**
 * Options for creating storage
 */
export interface IStorageConfig {
    /**
     * Credentials for S3 locations. When not set the AWS SDK finds its own.
     */
    s3?: IS3Credentials;

    /**
     * Settings for hdfs:// locations.
     */
    hdfs?: IHdfsConfig;
}

/**
 * Identifies the kind of storage a location string addresses.
 * "s3://" and "hdfs://" select remote storage, "fs:" or no prefix selects the local file system.
 */
export function classifyLocation(location: string): StorageType {
    if (location.startsWith("s3:")) {
        return "s3";
    }
    else if (location.startsWith("hdfs:")) {
        return "hdfs";
    }
    return "fs";
}

//
// Removes the scheme and any slashes that follow it.
//
function stripScheme(location: string, scheme: string): string {
    return location.substring(scheme.length).replace(/^\/+/, "");
}

/**
 * Converts a location to the path used with its storage.
 * Local paths are expanded and made absolute, S3 paths become <bucket>/<key>,
 * HDFS paths become the absolute path on the file system.
 */
export function normalizeLocation(location: string): string {
    switch (classifyLocation(location)) {
        case "s3":
            return stripScheme(location, "s3:").replace(/\/+$/, "");

        case "hdfs": {
            const url = new URL(location);
            return url.pathname.replace(/\/+$/, "") || "/";
        }

        case "fs": {
            const localPath = location.startsWith("fs:") ? location.substring("fs:".length) : location;
            return expandLocalPath(localPath);
        }
    }
}

//
// Works out the WebHDFS endpoint for an hdfs:// location.
//
function resolveWebHdfsUrl(location: string, config?: IHdfsConfig): string {
    if (config?.webHdfsUrl) {
        return config.webHdfsUrl;
    }

    const url = new URL(location);
    if (!url.hostname) {
        throw new Error(`No name node in ${location}. Include the host or configure the WebHDFS URL.`);
    }
    return `http://${url.hostname}:${DEFAULT_WEBHDFS_PORT}`;
}

//
// Makes the storage implementation for a type of location.
//
function makeStorage(type: StorageType, location: string, config?: IStorageConfig): IStorage {
    switch (type) {
        case "s3":
            return new CloudStorage("s3:", config?.s3);

        case "hdfs":
            return new HdfsStorage("hdfs:", {
                ...config?.hdfs,
                webHdfsUrl: resolveWebHdfsUrl(location, config?.hdfs),
            });

        case "fs":
            return new FileStorage("fs:");
    }
}

/**
 * Creates the appropriate storage implementation based on the prefix in the location
 * @param location Location with storage prefix (e.g. "fs:path", "s3://bucket/path" or "hdfs://namenode/path")
 * @param config Credentials and endpoints for remote storage
 * @returns The corresponding storage implementation and normalized path
 */
export function createStorage(
    location: string,
    config?: IStorageConfig
): { storage: IStorage, normalizedPath: string, type: StorageType } {
    if (!location) {
        throw new Error('Location is required');
    }

    const type = classifyLocation(location);
    const normalizedPath = normalizeLocation(location);

    const storage = makeStorage(type, location, config);

    return { storage, normalizedPath, type };
}
