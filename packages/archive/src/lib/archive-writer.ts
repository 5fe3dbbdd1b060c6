import fs from "fs-extra";
import { FileHandle, open } from "fs/promises";
import path from "path";
import { removeOrDefer } from "node-utils";
import { BsonObjectCodec, IObjectCodec, PersistentId } from "serialization";
import { IStorage } from "storage";
import { log, toError, uuid } from "utils";
import { getArchivableInfo } from "./archivable";
import { createArchiveBackend, IArchiveBackend } from "./archive-backend";
import { IArchiveConfig } from "./archive-config";
import { ArchiveClosedError, ArchiveConstructionError, ArchiveError } from "./archive-errors";
import { CURRENT_VERSION, MAIN_STREAM_FILE_NAME, RESERVED_NAMES, VERSION_FILE_NAME } from "./archive-layout";

export interface IArchiveWriterOptions {
    config?: IArchiveConfig;

    //
    // Storage to write a remote archive to. By default it is created from the location's scheme.
    //
    storage?: IStorage;

    //
    // Codec for the main stream.
    //
    codec?: IObjectCodec;
}

/**
 * Writes values to an archive.
 *
 * Objects that can archive themselves (see `IArchivable`) are saved to their own
 * files in the archive and referenced from the main stream. An object referenced
 * more than once is saved once.
 *
 * Always close the writer, or use `withArchiveWriter`. Nothing is uploaded to
 * remote storage until the writer is closed.
 */
export class ArchiveWriter {

    //
    // Identity of each archived object, for this session only.
    //
    private readonly identities = new WeakMap<object, number>();

    private nextIdentity = 1;

    private dumping = false;

    private closed = false;

    private constructor(
        readonly location: string,
        private readonly target: string,
        private readonly backend: IArchiveBackend,
        private readonly stagingDirectory: string,
        private readonly pendingDeletion: Set<string>,
        private mainStream: FileHandle | undefined,
        private readonly codec: IObjectCodec
    ) {
    }

    /**
     * Opens an archive for writing.
     * An archive already at the location is replaced when the writer is closed.
     *
     * @param location A local path, "s3://bucket/path" or "hdfs://namenode/path".
     */
    static async open(location: string, options: IArchiveWriterOptions = {}): Promise<ArchiveWriter> {
        const { backend, target } = createArchiveBackend(location, options);
        const staging = await backend.stageForWrite(target);

        //
        // Everything already in the directory is deleted at close, unless it is overwritten first.
        //
        const pendingDeletion = new Set(
            staging.previousEntries
                .filter(name => !RESERVED_NAMES.includes(name))
                .map(name => path.resolve(staging.directory, name))
        );

        let mainStream: FileHandle;
        try {
            await fs.writeFile(path.join(staging.directory, VERSION_FILE_NAME), CURRENT_VERSION);
            mainStream = await open(path.join(staging.directory, MAIN_STREAM_FILE_NAME), "w");
        }
        catch (err: unknown) {
            if (backend.isRemote) {
                await removeOrDefer(staging.directory);
            }
            throw new ArchiveConstructionError(`Failed to create archive at ${location}: ${toError(err).message}`, { cause: err });
        }

        log.verbose(`Opened archive ${location} for writing.`);

        return new ArchiveWriter(location, target, backend, staging.directory, pendingDeletion, mainStream, options.codec ?? new BsonObjectCodec());
    }

    //
    // Paths that will be deleted when the writer is closed.
    //
    getPendingDeletions(): string[] {
        return Array.from(this.pendingDeletion);
    }

    /**
     * Appends one value to the archive.
     */
    async dump(value: unknown): Promise<void> {
        const mainStream = this.mainStream;
        if (this.closed || !mainStream) {
            throw new ArchiveClosedError(`Can't write to ${this.location}, the archive writer is closed.`);
        }
        if (this.dumping) {
            throw new ArchiveError(`Can't write to ${this.location}, another value is still being written.`);
        }

        this.dumping = true;
        try {
            const record = await this.codec.encode(value, obj => this.resolveForWrite(obj));
            let offset = 0;
            while (offset < record.length) {
                const { bytesWritten } = await mainStream.write(record, offset);
                offset += bytesWritten;
            }
        }
        finally {
            this.dumping = false;
        }
    }

    //
    // Decides how the codec stores an object.
    // Archivable objects are saved to their own file the first time they are seen,
    // after that only their identity is stored.
    //
    private async resolveForWrite(obj: object): Promise<PersistentId | undefined> {
        const archivable = getArchivableInfo(obj);
        if (!archivable) {
            return undefined;
        }

        const identity = this.identities.get(obj);
        if (identity !== undefined) {
            return [null, null, identity];
        }

        const relativePath = uuid();
        const absolutePath = path.resolve(this.stagingDirectory, relativePath);
        this.pendingDeletion.delete(absolutePath);

        await archivable.save(absolutePath);

        const newIdentity = this.nextIdentity;
        this.nextIdentity += 1;
        this.identities.set(obj, newIdentity);

        return [archivable.archiveType, relativePath, newIdentity];
    }

    /**
     * Finishes the archive.
     * A remote archive replaces whatever was at the location and is then uploaded.
     * A local archive has the files of the archive it replaced deleted.
     * Calling close again does nothing.
     */
    async close(): Promise<void> {
        if (this.closed) {
            return;
        }
        if (this.dumping) {
            throw new ArchiveError(`Can't close ${this.location} while a value is being written.`);
        }

        this.closed = true;

        const mainStream = this.mainStream;
        this.mainStream = undefined;
        if (mainStream) {
            await mainStream.close();
        }

        if (this.backend.isRemote) {
            await this.backend.commit(this.stagingDirectory, this.target);
            await removeOrDefer(this.stagingDirectory);
        }
        else {
            for (const pendingPath of this.pendingDeletion) {
                await removeOrDefer(pendingPath);
            }
            this.pendingDeletion.clear();
        }

        log.verbose(`Closed archive ${this.location}.`);
    }
}

/**
 * Opens an archive writer, passes it to `fn` and closes it afterwards, also when `fn` fails.
 */
export async function withArchiveWriter<T>(location: string, fn: (writer: ArchiveWriter) => Promise<T>, options: IArchiveWriterOptions = {}): Promise<T> {
    const writer = await ArchiveWriter.open(location, options);
    try {
        return await fn(writer);
    }
    finally {
        await writer.close();
    }
}

/**
 * Writes a single value to an archive.
 */
export async function saveArchive(location: string, value: unknown, options: IArchiveWriterOptions = {}): Promise<void> {
    await withArchiveWriter(location, writer => writer.dump(value), options);
}
