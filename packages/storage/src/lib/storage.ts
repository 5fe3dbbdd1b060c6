import { Readable } from "stream";

//
// Partial result of the list operation.
//
export interface IListResult {
    //
    // The list of file or directories names found in storage.
    //
    names: string[];

    //
    // If there are more names to read the contination token is set.
    //
    next?: string;
}

export interface IStorage {

    //
    // Gets the location of the storage.
    //
    readonly location: string;

    //
    // List files in storage.
    //
    listFiles(path: string, max: number, next?: string): Promise<IListResult>;

    //
    // List directories in storage.
    //
    listDirs(path: string, max: number, next?: string): Promise<IListResult>;

    //
    // Returns true if the specified file exists.
    //
    fileExists(filePath: string): Promise<boolean>;

    //
    // Returns true if the specified directory exists (contains at least one file or subdirectory).
    //
    dirExists(dirPath: string): Promise<boolean>;

    //
    // Reads a file from storage.
    // Returns undefined if the file doesn't exist.
    //
    read(filePath: string): Promise<Buffer | undefined>;

    //
    // Writes a file to storage.
    //
    write(filePath: string, contentType: string | undefined, data: Buffer): Promise<void>;

    //
    // Streams a file from storage.
    //
    readStream(filePath: string): Readable;

    //
    // Writes an input stream to storage.
    //
    writeStream(filePath: string, contentType: string | undefined, inputStream: Readable, contentLength?: number): Promise<void>;

    //
    // Deletes a directory and all its contents from storage.
    //
    deleteDir(dirPath: string): Promise<void>;
}
