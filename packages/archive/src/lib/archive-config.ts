import { IStorageConfig } from "storage";

//
// Settings for reading and writing archives.
//
export interface IArchiveConfig {
    //
    // Credentials and endpoints for remote storage.
    //
    storage?: IStorageConfig;

    //
    // Directory for staging, download and extraction. Defaults to the system temp directory.
    //
    tempDirectory?: string;

    //
    // Number of times each remote file transfer is attempted.
    //
    transferAttempts?: number;

    //
    // Milliseconds to wait before the first retry of a transfer. Doubles after each retry.
    //
    transferRetryWait?: number;
}

export const DEFAULT_TRANSFER_ATTEMPTS = 3;

export const DEFAULT_TRANSFER_RETRY_WAIT = 1000;

//
// Reads a positive integer from the environment.
//
function readPositiveInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
    const value = env[name];
    if (value === undefined || value === "") {
        return undefined;
    }

    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new Error(`Environment variable ${name} should be a positive integer, found "${value}".`);
    }
    return parsed;
}

//
// Builds the archive configuration from environment variables.
//
export function loadArchiveConfig(env: NodeJS.ProcessEnv = process.env): IArchiveConfig {
    const storage: IStorageConfig = {};

    const accessKeyId = env.AWS_ACCESS_KEY_ID;
    const secretAccessKey = env.AWS_SECRET_ACCESS_KEY;
    if (accessKeyId && secretAccessKey) {
        storage.s3 = {
            accessKeyId,
            secretAccessKey,
            region: env.AWS_REGION || env.AWS_DEFAULT_REGION,
            endpoint: env.AWS_ENDPOINT,
        };
    }

    const webHdfsUrl = env.HDFS_WEBHDFS_URL;
    const hdfsUser = env.HDFS_USER || env.HADOOP_USER_NAME;
    if (webHdfsUrl || hdfsUser) {
        storage.hdfs = {
            webHdfsUrl,
            user: hdfsUser,
        };
    }

    return {
        storage,
        tempDirectory: env.ARCHIVE_TMPDIR || undefined,
        transferAttempts: readPositiveInt(env, "ARCHIVE_TRANSFER_ATTEMPTS"),
        transferRetryWait: readPositiveInt(env, "ARCHIVE_TRANSFER_RETRY_WAIT"),
    };
}
