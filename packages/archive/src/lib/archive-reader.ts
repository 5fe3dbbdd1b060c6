import { deferRemoval, removeOrDefer } from "node-utils";
import { BsonObjectCodec, IDeserializer, IObjectCodec } from "serialization";
import { IStorage } from "storage";
import { log } from "utils";
import { describeTypeDescriptor, isTypeDescriptor, TypeDescriptor } from "./archivable";
import { createArchiveBackend, IReadStaging } from "./archive-backend";
import { IArchiveConfig } from "./archive-config";
import { ArchiveClosedError, ArchiveError, UnresolvableReferenceError } from "./archive-errors";
import { ArchiveFormat, classifyAndValidate, getReferenceRules, IClassifiedArchive, IReferenceRules, resolveArchivePath } from "./archive-layout";
import { ArchiveLoader, LoaderRegistry } from "./loader-registry";

export interface IArchiveReaderOptions {
    //
    // Loaders for the objects referenced from the archive.
    //
    loaders?: LoaderRegistry;

    config?: IArchiveConfig;

    //
    // Storage to read a remote archive from. By default it is created from the location's scheme.
    //
    storage?: IStorage;

    //
    // Codec for the main stream.
    //
    codec?: IObjectCodec;
}

/**
 * Reads values back from an archive, a legacy zip bundle or a plain stream.
 *
 * Objects that were saved to their own files are loaded through the reader's
 * `LoaderRegistry`. Every reference to the same saved object loads as the same instance.
 */
export class ArchiveReader {

    //
    // Objects loaded so far, by the identity they were saved with.
    //
    private readonly memo = new Map<number, unknown>();

    private readonly rules: IReferenceRules;

    private mainStream: IDeserializer | undefined;

    private loading = false;

    private closed = false;

    private constructor(
        readonly location: string,
        private readonly archive: IClassifiedArchive,
        private readonly staging: IReadStaging,
        private readonly loaders: LoaderRegistry,
        private readonly codec: IObjectCodec
    ) {
        this.mainStream = archive.mainStream;
        this.rules = getReferenceRules(archive.version);
    }

    /**
     * Opens an archive for reading.
     * Remote archives are downloaded first.
     *
     * @param location A local path, "s3://bucket/path" or "hdfs://namenode/path".
     */
    static async open(location: string, options: IArchiveReaderOptions = {}): Promise<ArchiveReader> {
        const { backend, target } = createArchiveBackend(location, options);
        const staging = await backend.stageForRead(target);

        let archive: IClassifiedArchive;
        try {
            archive = await classifyAndValidate(staging.localPath, options.config?.tempDirectory);
        }
        catch (err: unknown) {
            await releaseStaging(staging);
            throw err;
        }

        log.verbose(`Opened ${archive.format} archive ${location}, version ${archive.version}.`);

        return new ArchiveReader(location, archive, staging, options.loaders ?? new LoaderRegistry(), options.codec ?? new BsonObjectCodec());
    }

    get format(): ArchiveFormat {
        return this.archive.format;
    }

    get version(): string {
        return this.archive.version;
    }

    //
    // Returns true while there are values left to load.
    //
    hasMore(): boolean {
        return this.mainStream !== undefined && this.mainStream.getRemainingBytes() > 0;
    }

    /**
     * Loads the next value from the archive.
     */
    async load(): Promise<unknown> {
        const mainStream = this.mainStream;
        if (this.closed || !mainStream) {
            throw new ArchiveClosedError(`Can't read from ${this.location}, the archive reader is closed.`);
        }
        if (this.loading) {
            throw new ArchiveError(`Can't read from ${this.location}, another value is still being read.`);
        }
        if (mainStream.getRemainingBytes() === 0) {
            throw new ArchiveError(`No more values to read from ${this.location}.`);
        }

        this.loading = true;
        try {
            return await this.codec.decode(mainStream, id => this.resolveForRead(id));
        }
        finally {
            this.loading = false;
        }
    }

    //
    // Turns a reference from the main stream back into an object.
    //
    private async resolveForRead(reference: unknown[]): Promise<unknown> {
        if (this.archive.format === "plain-stream") {
            throw new UnresolvableReferenceError(`Found an archived object reference in ${this.location}, but a plain stream has no archived objects.`);
        }

        if (reference.length === 2) {
            //
            // Legacy references have no identity and are loaded every time.
            //
            const [typeTag, relativePath] = reference;
            if (typeof typeTag !== "string" || typeof relativePath !== "string") {
                throw this.malformed(reference);
            }
            const loader = this.findBuiltinLoader(typeTag);
            return await loader(this.resolveSidePath(relativePath));
        }

        if (reference.length === 3) {
            const [descriptor, relativePath, identity] = reference;
            if (typeof identity !== "number") {
                throw this.malformed(reference);
            }

            // The identity decides, even when a path is also present.
            if (this.memo.has(identity)) {
                return this.memo.get(identity);
            }

            if (descriptor === null || relativePath === null) {
                throw new UnresolvableReferenceError(`Object ${identity} in ${this.location} is referenced before it is defined.`);
            }
            if (!isTypeDescriptor(descriptor) || typeof relativePath !== "string") {
                throw this.malformed(reference);
            }

            const loader = this.findLoader(descriptor);
            const obj = await loader(this.resolveSidePath(relativePath));
            this.memo.set(identity, obj);
            return obj;
        }

        throw this.malformed(reference);
    }

    private malformed(reference: unknown[]): UnresolvableReferenceError {
        return new UnresolvableReferenceError(`Malformed reference in ${this.location}: ${JSON.stringify(reference)}`);
    }

    private resolveSidePath(relativePath: string): string {
        const absolutePath = resolveArchivePath(this.archive.stagingRoot, relativePath);
        if (!absolutePath) {
            throw new UnresolvableReferenceError(`Reference in ${this.location} points outside the archive: ${relativePath}`);
        }
        return absolutePath;
    }

    private findBuiltinLoader(typeTag: string): ArchiveLoader {
        const loader = this.rules.builtinTags.some(tag => tag === typeTag) ? this.loaders.findBuiltin(typeTag) : undefined;
        if (!loader) {
            throw new UnresolvableReferenceError(`No loader for type "${typeTag}" in ${this.location}.`);
        }
        return loader;
    }

    private findLoader(descriptor: TypeDescriptor): ArchiveLoader {
        if (typeof descriptor === "string" && this.rules.builtinTags.some(tag => tag === descriptor)) {
            return this.findBuiltinLoader(descriptor);
        }

        const loader = this.rules.allowClassDescriptors ? this.loaders.findByDescriptor(descriptor) : undefined;
        if (!loader) {
            throw new UnresolvableReferenceError(`No loader registered for "${describeTypeDescriptor(descriptor)}" in ${this.location}. Register the class with the reader's LoaderRegistry.`);
        }
        return loader;
    }

    /**
     * Stops reading.
     * A downloaded archive file is deleted. Directories the archive was downloaded or
     * extracted to are kept until the process exits, since loaded objects may still use them.
     * Calling close again does nothing.
     */
    async close(): Promise<void> {
        if (this.closed) {
            return;
        }
        if (this.loading) {
            throw new ArchiveError(`Can't close ${this.location} while a value is being read.`);
        }

        this.closed = true;
        this.mainStream = undefined;

        if (this.staging.transientFile) {
            await removeOrDefer(this.staging.transientFile);
        }

        for (const directory of [this.staging.ownedDirectory, this.archive.extractedDirectory]) {
            if (directory) {
                deferRemoval(directory);
            }
        }

        log.verbose(`Closed archive ${this.location}.`);
    }
}

//
// Removes what was downloaded for an archive that couldn't be opened.
//
async function releaseStaging(staging: IReadStaging): Promise<void> {
    for (const stagedPath of [staging.transientFile, staging.ownedDirectory]) {
        if (stagedPath) {
            await removeOrDefer(stagedPath);
        }
    }
}

/**
 * Opens an archive reader, passes it to `fn` and closes it afterwards, also when `fn` fails.
 */
export async function withArchiveReader<T>(location: string, fn: (reader: ArchiveReader) => Promise<T>, options: IArchiveReaderOptions = {}): Promise<T> {
    const reader = await ArchiveReader.open(location, options);
    try {
        return await fn(reader);
    }
    finally {
        await reader.close();
    }
}

/**
 * Reads every value in an archive.
 */
export async function loadArchive(location: string, options: IArchiveReaderOptions = {}): Promise<unknown[]> {
    return await withArchiveReader(location, async reader => {
        const values: unknown[] = [];
        while (reader.hasMore()) {
            values.push(await reader.load());
        }
        return values;
    }, options);
}
