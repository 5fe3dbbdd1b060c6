import fs from "fs-extra";
import path from "path";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import { IListResult, IStorage } from "./storage";

//
// Storage on the local file system. Paths are local file system paths.
//
export class FileStorage implements IStorage {

    constructor(public readonly location: string) {
    }

    //
    // List files in storage.
    //
    async listFiles(dirPath: string, max: number, next?: string): Promise<IListResult> {
        return this.listEntries(dirPath, false);
    }

    //
    // List directories in storage.
    //
    async listDirs(dirPath: string, max: number, next?: string): Promise<IListResult> {
        return this.listEntries(dirPath, true);
    }

    private async listEntries(dirPath: string, directories: boolean): Promise<IListResult> {
        if (!await fs.pathExists(dirPath)) {
            return {
                names: [],
                next: undefined,
            };
        }

        let entries = await fs.readdir(dirPath, { withFileTypes: true });
        entries = entries.filter(entry => entry.isDirectory() === directories);

        //
        // Alphanumeric sort to simulate the order of file listing from S3.
        //
        entries.sort((a, b) => a.name.localeCompare(b.name, undefined, { numeric: true }));

        return {
            names: entries.map(entry => entry.name),
            next: undefined,
        };
    }

    //
    // Returns true if the specified file exists.
    //
    async fileExists(filePath: string): Promise<boolean> {
        if (!await fs.pathExists(filePath)) {
            return false;
        }

        // Ensure it's a file, not a directory
        const stats = await fs.stat(filePath);
        return stats.isFile();
    }

    //
    // Returns true if the specified directory exists.
    //
    async dirExists(dirPath: string): Promise<boolean> {
        if (!await fs.pathExists(dirPath)) {
            return false;
        }

        // Ensure it's a directory
        const stats = await fs.stat(dirPath);
        return stats.isDirectory();
    }

    //
    // Reads a file from storage.
    // Returns undefined if the file doesn't exist.
    //
    async read(filePath: string): Promise<Buffer | undefined> {
        if (!await fs.pathExists(filePath)) {
            return undefined;
        }

        return await fs.readFile(filePath);
    }

    //
    // Writes a file to storage.
    //
    async write(filePath: string, contentType: string | undefined, data: Buffer): Promise<void> {
        await fs.ensureDir(path.dirname(filePath));
        await fs.writeFile(filePath, data);
    }

    //
    // Streams a file from storage.
    //
    readStream(filePath: string): Readable {
        return fs.createReadStream(filePath);
    }

    //
    // Writes an input stream to storage.
    //
    async writeStream(filePath: string, contentType: string | undefined, inputStream: Readable): Promise<void> {
        await fs.ensureDir(path.dirname(filePath));
        await pipeline(inputStream, fs.createWriteStream(filePath));
    }

    //
    // Deletes a directory and all its contents from storage.
    //
    async deleteDir(dirPath: string): Promise<void> {
        await fs.remove(dirPath);
    }
}
