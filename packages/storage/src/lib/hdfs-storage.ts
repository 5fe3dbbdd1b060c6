import axios from "axios";
import { PassThrough, Readable } from "stream";
import { IListResult, IStorage } from "./storage";
import { WrappedError, toError } from "utils";

//
// Connection settings for a Hadoop distributed file system.
//
export interface IHdfsConfig {
    //
    // Base URL of the WebHDFS REST endpoint, e.g. http://namenode:9870.
    // When not set it is derived from the host in the hdfs:// path.
    //
    webHdfsUrl?: string;

    //
    // User name passed to WebHDFS with each request.
    //
    user?: string;
}

//
// The default HTTP port of the name node.
//
export const DEFAULT_WEBHDFS_PORT = 9870;

//
// File status as returned by WebHDFS.
//
interface IHdfsFileStatus {
    pathSuffix: string;
    type: "FILE" | "DIRECTORY" | "SYMLINK";
}

function isNotFound(err: unknown): boolean {
    return axios.isAxiosError(err) && err.response?.status === 404;
}

//
// Storage in HDFS through the WebHDFS REST API.
// Paths are absolute HDFS paths, e.g. /user/data/archive.
//
export class HdfsStorage implements IStorage {

    private readonly baseUrl: string;

    constructor(public readonly location: string, private readonly config: IHdfsConfig & { webHdfsUrl: string }) {
        this.baseUrl = config.webHdfsUrl.replace(/\/+$/, "");
    }

    //
    // Makes the URL for an operation on a path.
    //
    private makeUrl(filePath: string, op: string, params: Record<string, string> = {}): string {
        const encodedPath = filePath
            .split("/")
            .filter(part => part.length > 0)
            .map(part => encodeURIComponent(part))
            .join("/");
        const url = new URL(`${this.baseUrl}/webhdfs/v1/${encodedPath}`);
        url.searchParams.set("op", op);
        if (this.config.user) {
            url.searchParams.set("user.name", this.config.user);
        }
        for (const [name, value] of Object.entries(params)) {
            url.searchParams.set(name, value);
        }
        return url.toString();
    }

    //
    // Gets the status of a path, undefined if it doesn't exist.
    //
    private async getStatus(filePath: string): Promise<IHdfsFileStatus | undefined> {
        try {
            const response = await axios.get<{ FileStatus: IHdfsFileStatus }>(this.makeUrl(filePath, "GETFILESTATUS"));
            return response.data.FileStatus;
        }
        catch (err: unknown) {
            if (isNotFound(err)) {
                return undefined;
            }
            throw new WrappedError(`Failed to get status of ${filePath}: ${toError(err).message}`, { cause: err });
        }
    }

    //
    // Lists the entries of a directory, empty if it doesn't exist.
    //
    private async listStatus(dirPath: string): Promise<IHdfsFileStatus[]> {
        try {
            const response = await axios.get<{ FileStatuses: { FileStatus: IHdfsFileStatus[] } }>(this.makeUrl(dirPath, "LISTSTATUS"));
            return response.data.FileStatuses.FileStatus;
        }
        catch (err: unknown) {
            if (isNotFound(err)) {
                return [];
            }
            throw new WrappedError(`Failed to list ${dirPath}: ${toError(err).message}`, { cause: err });
        }
    }

    private async listNames(dirPath: string, type: IHdfsFileStatus["type"]): Promise<IListResult> {
        const entries = await this.listStatus(dirPath);
        const names = entries
            .filter(entry => entry.type === type)
            .map(entry => entry.pathSuffix)
            .sort((a, b) => a.localeCompare(b, undefined, { numeric: true }));
        return {
            names,
            next: undefined,
        };
    }

    //
    // Creates a file. The name node redirects the data to a data node.
    //
    private async create(filePath: string, body: Buffer | Readable, contentLength?: number): Promise<void> {
        try {
            const response = await axios.put(this.makeUrl(filePath, "CREATE", { overwrite: "true" }), undefined, {
                maxRedirects: 0,
                validateStatus: status => status === 307,
            });

            const dataNodeUrl = response.headers["location"];
            if (typeof dataNodeUrl !== "string") {
                throw new Error(`WebHDFS did not redirect the create request for ${filePath}`);
            }

            const headers: Record<string, string> = {
                "Content-Type": "application/octet-stream",
            };
            if (contentLength !== undefined) {
                headers["Content-Length"] = contentLength.toString();
            }

            await axios.put(dataNodeUrl, body, {
                headers,
                maxBodyLength: Infinity,
                maxContentLength: Infinity,
            });
        }
        catch (err: unknown) {
            throw new WrappedError(`Failed to write to ${filePath}: ${toError(err).message}`, { cause: err });
        }
    }

    private async delete(filePath: string, recursive: boolean): Promise<void> {
        try {
            await axios.delete(this.makeUrl(filePath, "DELETE", { recursive: recursive ? "true" : "false" }));
        }
        catch (err: unknown) {
            if (isNotFound(err)) {
                return;
            }
            throw new WrappedError(`Failed to delete ${filePath}: ${toError(err).message}`, { cause: err });
        }
    }

    //
    // List files in storage.
    // WebHDFS returns the whole listing at once so there is never a continuation token.
    //
    async listFiles(dirPath: string, max: number, next?: string): Promise<IListResult> {
        return this.listNames(dirPath, "FILE");
    }

    //
    // List directories in storage.
    //
    async listDirs(dirPath: string, max: number, next?: string): Promise<IListResult> {
        return this.listNames(dirPath, "DIRECTORY");
    }

    //
    // Returns true if the specified file exists.
    //
    async fileExists(filePath: string): Promise<boolean> {
        const status = await this.getStatus(filePath);
        return status?.type === "FILE";
    }

    //
    // Returns true if the specified directory exists.
    //
    async dirExists(dirPath: string): Promise<boolean> {
        const status = await this.getStatus(dirPath);
        return status?.type === "DIRECTORY";
    }

    //
    // Reads a file from storage.
    // Returns undefined if the file doesn't exist.
    //
    async read(filePath: string): Promise<Buffer | undefined> {
        try {
            const response = await axios.get<ArrayBuffer>(this.makeUrl(filePath, "OPEN"), { responseType: "arraybuffer" });
            return Buffer.from(response.data);
        }
        catch (err: unknown) {
            if (isNotFound(err)) {
                return undefined;
            }
            throw new WrappedError(`Failed to read ${filePath}: ${toError(err).message}`, { cause: err });
        }
    }

    //
    // Writes a file to storage.
    //
    async write(filePath: string, contentType: string | undefined, data: Buffer): Promise<void> {
        await this.create(filePath, data, data.length);
    }

    //
    // Streams a file from storage.
    // The request starts straight away, errors are reported through the returned stream.
    //
    readStream(filePath: string): Readable {
        const output = new PassThrough();
        axios.get<Readable>(this.makeUrl(filePath, "OPEN"), { responseType: "stream" })
            .then(response => {
                response.data.on("error", (err: Error) => output.destroy(err));
                response.data.pipe(output);
            })
            .catch((err: unknown) => {
                output.destroy(new WrappedError(`Failed to read stream from ${filePath}: ${toError(err).message}`, { cause: err }));
            });
        return output;
    }

    //
    // Writes an input stream to storage.
    //
    async writeStream(filePath: string, contentType: string | undefined, inputStream: Readable, contentLength?: number): Promise<void> {
        await this.create(filePath, inputStream, contentLength);
    }

    //
    // Deletes a directory and all its contents from storage.
    //
    async deleteDir(dirPath: string): Promise<void> {
        await this.delete(dirPath, true);
    }
}
