import fs from "fs-extra";
import path from "path";
import { pipeline } from "stream/promises";
import { makeTempDirectory, makeTempFilePath } from "node-utils";
import { classifyLocation, createStorage, FileStorage, IStorage, normalizeLocation, pathJoin, StorageType, walkDirectory } from "storage";
import { log, retry, toError } from "utils";
import { DEFAULT_TRANSFER_ATTEMPTS, DEFAULT_TRANSFER_RETRY_WAIT, IArchiveConfig } from "./archive-config";
import { ArchiveConstructionError, BackendTransferError } from "./archive-errors";

//
// Where an archive is assembled before it is committed.
//
export interface IWriteStaging {
    //
    // Local directory the archive files are written to.
    //
    directory: string;

    //
    // Names already in the directory when it was staged.
    //
    previousEntries: string[];
}

//
// Where an archive can be read from locally.
//
export interface IReadStaging {
    //
    // Local file or directory holding the archive.
    //
    localPath: string;

    //
    // Set when the archive was downloaded to a single temporary file.
    //
    transientFile?: string;

    //
    // Set when the archive was downloaded to a temporary directory.
    //
    ownedDirectory?: string;
}

/**
 * Stages archives between a storage medium and the local file system.
 */
export interface IArchiveBackend {
    /**
     * The kind of storage this backend moves archives to and from.
     */
    readonly type: StorageType;

    /**
     * Set to true when archives have to be copied to and from local staging.
     */
    readonly isRemote: boolean;

    /**
     * Gets a local directory to write the archive for `target` into.
     */
    stageForWrite(target: string): Promise<IWriteStaging>;

    /**
     * Makes the archive written to `stagingDir` the contents of `target`.
     */
    commit(stagingDir: string, target: string): Promise<void>;

    /**
     * Makes the archive at `source` available locally.
     */
    stageForRead(source: string): Promise<IReadStaging>;
}

export interface IArchiveBackendOptions {
    config?: IArchiveConfig;

    //
    // Storage to use for a remote location instead of creating it from the location's scheme.
    //
    storage?: IStorage;
}

//
// Archives on the local file system are written and read in place.
//
export class LocalArchiveBackend implements IArchiveBackend {

    readonly type: StorageType = "fs";

    readonly isRemote = false;

    async stageForWrite(target: string): Promise<IWriteStaging> {
        try {
            if (await fs.pathExists(target)) {
                const stats = await fs.stat(target);
                if (stats.isDirectory()) {
                    await fs.access(target, fs.constants.W_OK);
                    return {
                        directory: target,
                        previousEntries: await fs.readdir(target),
                    };
                }

                // A file at the target is replaced by the archive directory.
                await fs.remove(target);
            }

            await fs.ensureDir(target);
            return {
                directory: target,
                previousEntries: [],
            };
        }
        catch (err: unknown) {
            throw new ArchiveConstructionError(`Can't write an archive to ${target}: ${toError(err).message}`, { cause: err });
        }
    }

    async commit(stagingDir: string, target: string): Promise<void> {
        // Already in place.
    }

    async stageForRead(source: string): Promise<IReadStaging> {
        if (!await fs.pathExists(source)) {
            throw new ArchiveConstructionError(`${source} is not a valid file name.`);
        }
        return {
            localPath: source,
        };
    }
}

//
// Archives in remote storage are assembled in, and downloaded to, temporary local directories.
//
export class RemoteArchiveBackend implements IArchiveBackend {

    readonly isRemote = true;

    private readonly transferAttempts: number;

    private readonly transferRetryWait: number;

    constructor(readonly type: StorageType, private readonly storage: IStorage, private readonly config: IArchiveConfig = {}) {
        this.transferAttempts = config.transferAttempts ?? DEFAULT_TRANSFER_ATTEMPTS;
        this.transferRetryWait = config.transferRetryWait ?? DEFAULT_TRANSFER_RETRY_WAIT;
    }

    private transfer<T>(operation: () => Promise<T>): Promise<T> {
        return retry(operation, this.transferAttempts, this.transferRetryWait);
    }

    async stageForWrite(target: string): Promise<IWriteStaging> {
        try {
            const directory = await makeTempDirectory("archive-staging-", this.config.tempDirectory);
            log.verbose(`Staging archive for ${this.storage.location}${target} in ${directory}.`);
            return {
                directory,
                previousEntries: [],
            };
        }
        catch (err: unknown) {
            throw new ArchiveConstructionError(`Can't create a staging directory for ${target}: ${toError(err).message}`, { cause: err });
        }
    }

    //
    // Clears the remote target and uploads the staging directory in full.
    //
    async commit(stagingDir: string, target: string): Promise<void> {
        try {
            await this.transfer(() => this.storage.deleteDir(target));

            const localStorage = new FileStorage("fs:");
            let numFiles = 0;
            for await (const file of walkDirectory(localStorage, stagingDir)) {
                const remotePath = pathJoin(target, file.relativePath);
                const { size } = await fs.stat(file.fileName);
                await this.transfer(() => this.storage.writeStream(remotePath, undefined, fs.createReadStream(file.fileName), size));
                numFiles += 1;
            }

            log.verbose(`Uploaded ${numFiles} files from ${stagingDir} to ${this.storage.location}${target}.`);
        }
        catch (err: unknown) {
            log.error(`Upload to ${this.storage.location}${target} failed, the archive is still staged in ${stagingDir}.`);
            throw new BackendTransferError(`Failed to upload archive to ${this.storage.location}${target}: ${toError(err).message}`, stagingDir, { cause: err });
        }
    }

    //
    // Downloads a single remote object to a temporary file, or a remote directory tree to a temporary directory.
    //
    async stageForRead(source: string): Promise<IReadStaging> {
        if (await this.storage.fileExists(source)) {
            const transientFile = makeTempFilePath("archive-download-", this.config.tempDirectory);
            try {
                await fs.ensureFile(transientFile);
                await this.transfer(() => pipeline(this.storage.readStream(source), fs.createWriteStream(transientFile)));
            }
            catch (err: unknown) {
                log.error(`Download of ${this.storage.location}${source} failed, partial download is in ${transientFile}.`);
                throw new BackendTransferError(`Failed to download ${this.storage.location}${source}: ${toError(err).message}`, transientFile, { cause: err });
            }

            log.verbose(`Downloaded ${this.storage.location}${source} to ${transientFile}.`);
            return {
                localPath: transientFile,
                transientFile,
            };
        }

        if (await this.storage.dirExists(source)) {
            const ownedDirectory = await makeTempDirectory("archive-download-", this.config.tempDirectory);
            try {
                for await (const file of walkDirectory(this.storage, source)) {
                    const localPath = path.join(ownedDirectory, file.relativePath);
                    await fs.ensureDir(path.dirname(localPath));
                    await this.transfer(() => pipeline(this.storage.readStream(file.fileName), fs.createWriteStream(localPath)));
                }
            }
            catch (err: unknown) {
                log.error(`Download of ${this.storage.location}${source} failed, partial download is in ${ownedDirectory}.`);
                throw new BackendTransferError(`Failed to download ${this.storage.location}${source}: ${toError(err).message}`, ownedDirectory, { cause: err });
            }

            log.verbose(`Downloaded ${this.storage.location}${source} to ${ownedDirectory}.`);
            return {
                localPath: ownedDirectory,
                ownedDirectory,
            };
        }

        throw new ArchiveConstructionError(`${this.storage.location}${source} does not exist.`);
    }
}

//
// Identifies the kind of storage a location addresses.
//
export function classify(location: string): StorageType {
    return classifyLocation(location);
}

//
// Makes the backend for a location, along with the normalized target path within it.
//
export function createArchiveBackend(location: string, options: IArchiveBackendOptions = {}): { backend: IArchiveBackend, target: string } {
    const type = classify(location);
    try {
        const target = normalizeLocation(location);
        if (type === "fs") {
            return { backend: new LocalArchiveBackend(), target };
        }

        const storage = options.storage ?? createStorage(location, options.config?.storage).storage;
        return { backend: new RemoteArchiveBackend(type, storage, options.config), target };
    }
    catch (err: unknown) {
        throw new ArchiveConstructionError(`Can't use ${location} as an archive location: ${toError(err).message}`, { cause: err });
    }
}
