import { Readable } from "stream";
import aws from "aws-sdk";
import { IListResult, IStorage } from "./storage";
import { WrappedError, toError } from "utils";

//
// S3 credentials.
//
export interface IS3Credentials {
    accessKeyId: string;
    secretAccessKey: string;
    region?: string;
    endpoint?: string;
}

//
// The parts of an AWS error that storage cares about.
//
interface IAwsErrorInfo {
    code?: string;
    statusCode?: number;
}

function getAwsErrorInfo(err: unknown): IAwsErrorInfo {
    if (typeof err !== "object" || err === null) {
        return {};
    }
    return {
        code: "code" in err && typeof err.code === "string" ? err.code : undefined,
        statusCode: "statusCode" in err && typeof err.statusCode === "number" ? err.statusCode : undefined,
    };
}

//
// NOTE: These values have been tuned to allow uploading of 2GB+ files.
//
const uploadOptions: aws.S3.ManagedUpload.ManagedUploadOptions = {
    partSize: 100 * 1024 * 1024, // 100 MB
    queueSize: 1,
};

//
// Storage in an S3 compatible object store.
// Paths have the form <bucket>/<key>.
//
export class CloudStorage implements IStorage {

    //
    // AWS S3 interface.
    //
    private s3: aws.S3;

    constructor(public readonly location: string, credentials?: IS3Credentials) {
        const s3Config: aws.S3.ClientConfiguration = {
            endpoint: credentials?.endpoint || process.env.AWS_ENDPOINT,
        };

        if (credentials) {
            s3Config.accessKeyId = credentials.accessKeyId;
            s3Config.secretAccessKey = credentials.secretAccessKey;
            if (credentials.region) {
                s3Config.region = credentials.region;
            }
        }

        this.s3 = new aws.S3(s3Config);
    }

    //
    // Parse the path and extract the bucket and key.
    //
    private parsePath(path: string): { bucket: string, key: string } {
        const slashIndex = path.indexOf("/");
        if (slashIndex === -1) {
            throw new Error(`Invalid path: ${path}. Expected <bucket-name>/<path>`);
        }

        const bucket = path.slice(0, slashIndex);
        let key = path.slice(slashIndex + 1);
        if (key.startsWith("/")) {
            key = key.slice(1); // Remove leading slash.
        }
        if (bucket.length === 0 || key.length === 0) {
            throw new Error(`Invalid path: ${path}. Expected <bucket-name>/<path>`);
        }

        return {
            bucket,
            key,
        };
    }

    //
    // Parse a directory path. The key always ends with a slash.
    //
    private parseDirPath(path: string): { bucket: string, key: string } {
        const { bucket, key } = this.parsePath(path);
        return {
            bucket,
            key: key.endsWith("/") ? key : `${key}/`,
        };
    }

    //
    // List files in storage.
    //
    async listFiles(path: string, max: number, next?: string): Promise<IListResult> {
        const { bucket, key } = this.parseDirPath(path);

        try {
            const response = await this.s3.listObjectsV2({
                Bucket: bucket,
                Prefix: key,
                Delimiter: "/",
                MaxKeys: max,
                ContinuationToken: next,
            }).promise();

            const names: string[] = [];
            for (const item of response.Contents ?? []) {
                const name = item.Key?.slice(key.length);
                if (name) {
                    names.push(name);
                }
            }

            return {
                names,
                next: response.NextContinuationToken,
            };
        }
        catch (err: unknown) {
            throw new WrappedError(`Failed to list files in ${path}: ${toError(err).message}`, { cause: err });
        }
    }

    //
    // List directories in storage.
    //
    async listDirs(path: string, max: number, next?: string): Promise<IListResult> {
        const { bucket, key } = this.parseDirPath(path);

        try {
            const response = await this.s3.listObjectsV2({
                Bucket: bucket,
                Prefix: key,
                Delimiter: "/",
                MaxKeys: max,
                ContinuationToken: next,
            }).promise();

            const names: string[] = [];
            for (const item of response.CommonPrefixes ?? []) {
                const prefix = item.Prefix ?? "";
                const name = prefix.slice(key.length, prefix.length - 1); // Trims trailing slash.
                if (name) {
                    names.push(name);
                }
            }

            return {
                names,
                next: response.NextContinuationToken,
            };
        }
        catch (err: unknown) {
            throw new WrappedError(`Failed to list directories in ${path}: ${toError(err).message}`, { cause: err });
        }
    }

    //
    // Returns true if the specified file exists.
    //
    async fileExists(filePath: string): Promise<boolean> {
        const { bucket, key } = this.parsePath(filePath);

        try {
            await this.s3.headObject({ Bucket: bucket, Key: key }).promise();
            return true;
        }
        catch (err: unknown) {
            const { code, statusCode } = getAwsErrorInfo(err);
            if (statusCode === 404 || code === "NotFound") {
                return false;
            }
            throw new WrappedError(`Failed to check ${filePath}: ${toError(err).message}`, { cause: err });
        }
    }

    //
    // Returns true if the specified directory exists (has at least one object with the prefix).
    //
    async dirExists(dirPath: string): Promise<boolean> {
        const { bucket, key } = this.parseDirPath(dirPath);

        try {
            const response = await this.s3.listObjectsV2({
                Bucket: bucket,
                Prefix: key,
                MaxKeys: 1, // We only need to find one object to confirm directory exists
            }).promise();
            return response.Contents !== undefined && response.Contents.length > 0;
        }
        catch (err: unknown) {
            throw new WrappedError(`Failed to check if directory ${dirPath} exists: ${toError(err).message}`, { cause: err });
        }
    }

    //
    // Reads a file from storage.
    // Returns undefined if the file doesn't exist.
    //
    async read(filePath: string): Promise<Buffer | undefined> {
        const { bucket, key } = this.parsePath(filePath);

        try {
            const getObjectOutput = await this.s3.getObject({ Bucket: bucket, Key: key }).promise();
            const body = getObjectOutput.Body;
            if (body === undefined) {
                return Buffer.alloc(0);
            }
            if (Buffer.isBuffer(body)) {
                return body;
            }
            if (typeof body === "string") {
                return Buffer.from(body, "utf8");
            }
            if (body instanceof Uint8Array) {
                return Buffer.from(body);
            }
            throw new Error(`Unexpected body type reading ${filePath}`);
        }
        catch (err: unknown) {
            if (getAwsErrorInfo(err).code === "NoSuchKey") {
                return undefined;
            }
            throw new WrappedError(`Failed to read ${filePath}: ${toError(err).message}`, { cause: err });
        }
    }

    //
    // Writes a file to storage.
    //
    async write(filePath: string, contentType: string | undefined, data: Buffer): Promise<void> {
        const { bucket, key } = this.parsePath(filePath);

        try {
            await this.s3.upload({
                Bucket: bucket,
                Key: key,
                Body: data,
                ContentType: contentType,
                ContentLength: data.length,
            }, uploadOptions).promise();
        }
        catch (err: unknown) {
            throw new WrappedError(`Failed to write to ${filePath}: ${toError(err).message}`, { cause: err });
        }
    }

    //
    // Streams a file from storage.
    //
    readStream(filePath: string): Readable {
        const { bucket, key } = this.parsePath(filePath);
        return this.s3.getObject({ Bucket: bucket, Key: key }).createReadStream();
    }

    //
    // Writes an input stream to storage.
    //
    async writeStream(filePath: string, contentType: string | undefined, inputStream: Readable, contentLength?: number): Promise<void> {
        const { bucket, key } = this.parsePath(filePath);

        try {
            await this.s3.upload({
                Bucket: bucket,
                Key: key,
                Body: inputStream,
                ContentType: contentType,
                ContentLength: contentLength,
            }, uploadOptions).promise();
        }
        catch (err: unknown) {
            throw new WrappedError(`Failed to write stream to ${filePath}: ${toError(err).message}`, { cause: err });
        }
    }

    //
    // Deletes a directory and all its contents from storage.
    //
    async deleteDir(dirPath: string): Promise<void> {
        const { bucket, key } = this.parseDirPath(dirPath);

        try {
            let continuationToken: string | undefined = undefined;
            do {
                const listResult: aws.S3.ListObjectsV2Output = await this.s3.listObjectsV2({
                    Bucket: bucket,
                    Prefix: key,
                    ContinuationToken: continuationToken,
                }).promise();

                const objects: aws.S3.ObjectIdentifierList = [];
                for (const item of listResult.Contents ?? []) {
                    if (item.Key) {
                        objects.push({ Key: item.Key });
                    }
                }

                if (objects.length > 0) {
                    // Batch delete objects (up to 1000 at a time)
                    await this.s3.deleteObjects({
                        Bucket: bucket,
                        Delete: {
                            Objects: objects,
                        },
                    }).promise();
                }

                continuationToken = listResult.IsTruncated ? listResult.NextContinuationToken : undefined;
            } while (continuationToken);
        }
        catch (err: unknown) {
            throw new WrappedError(`Failed to delete directory ${dirPath}: ${toError(err).message}`, { cause: err });
        }
    }
}
