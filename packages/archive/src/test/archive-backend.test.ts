import fs from "fs-extra";
import path from "path";
import { Readable } from "stream";
import { MockStorage } from "storage";
import { log } from "utils";
import { classify, createArchiveBackend, LocalArchiveBackend, RemoteArchiveBackend } from "../lib/archive-backend";
import { ArchiveConstructionError, BackendTransferError } from "../lib/archive-errors";
import { makeTestDir } from "./archive-fixtures";

//
// Storage whose downloads break part way.
//
class BrokenDownloads extends MockStorage {
    readStream(filePath: string): Readable {
        return new Readable({
            read() {
                this.destroy(new Error(`Connection reset while reading ${filePath}`));
            },
        });
    }
}

//
// Runs a download that should fail and returns its error.
//
async function expectTransferError(download: Promise<unknown>): Promise<BackendTransferError> {
    const error = await download.then(() => undefined, (err: unknown) => err);
    if (!(error instanceof BackendTransferError)) {
        throw new Error(`Expected a BackendTransferError, got ${String(error)}`);
    }
    return error;
}

describe("archive backends", () => {
    let testDir: string;

    beforeEach(async () => {
        testDir = await makeTestDir("backend");
    });

    afterEach(async () => {
        jest.restoreAllMocks();
        await fs.remove(testDir);
    });

    test("locations are classified by their scheme", () => {
        expect(classify("s3://bucket/a")).toBe("s3");
        expect(classify("hdfs://namenode/a")).toBe("hdfs");
        expect(classify("fs:/tmp/a")).toBe("fs");
        expect(classify("relative/a")).toBe("fs");
    });

    describe("createArchiveBackend", () => {
        test("local paths get the local backend", () => {
            const { backend, target } = createArchiveBackend(path.join(testDir, "a"));

            expect(backend).toBeInstanceOf(LocalArchiveBackend);
            expect(backend.isRemote).toBe(false);
            expect(target).toBe(path.join(testDir, "a"));
        });

        test("S3 locations get a remote backend on bucket/key", () => {
            const { backend, target } = createArchiveBackend("s3://bucket/models/a/", { storage: new MockStorage() });

            expect(backend).toBeInstanceOf(RemoteArchiveBackend);
            expect(backend.type).toBe("s3");
            expect(target).toBe("bucket/models/a");
        });

        test("HDFS locations get a remote backend on the path", () => {
            const { backend, target } = createArchiveBackend("hdfs://namenode:9870/data/a", { storage: new MockStorage() });

            expect(backend.type).toBe("hdfs");
            expect(target).toBe("/data/a");
        });

        test("an HDFS location with no name node and no configured endpoint fails to open", () => {
            expect(() => createArchiveBackend("hdfs:///data/a")).toThrow(ArchiveConstructionError);
            expect(() => createArchiveBackend("hdfs:///data/a")).toThrow("Can't use hdfs:///data/a as an archive location: No name node in hdfs:///data/a.");
        });

        test("a location that isn't a valid URL fails to open", () => {
            expect(() => createArchiveBackend("hdfs://[bad/data")).toThrow(ArchiveConstructionError);
        });

        test("an HDFS location with a configured endpoint needs no name node", () => {
            const { backend, target } = createArchiveBackend("hdfs:///data/a", { config: { storage: { hdfs: { webHdfsUrl: "http://localhost:9870" } } } });

            expect(backend.type).toBe("hdfs");
            expect(target).toBe("/data/a");
        });
    });

    describe("LocalArchiveBackend", () => {
        const backend = new LocalArchiveBackend();

        test("staging a new location creates the directory", async () => {
            const target = path.join(testDir, "new", "archive");

            const staging = await backend.stageForWrite(target);

            expect(staging).toEqual({ directory: target, previousEntries: [] });
            expect((await fs.stat(target)).isDirectory()).toBe(true);
        });

        test("staging an existing directory lists what is in it", async () => {
            const target = path.join(testDir, "archive");
            await fs.outputFile(path.join(target, "old-side"), "x");
            await fs.outputFile(path.join(target, "version"), "1.0");

            const staging = await backend.stageForWrite(target);

            expect(staging.previousEntries.sort()).toEqual(["old-side", "version"]);
        });

        test("a file at the target is replaced by a directory", async () => {
            const target = path.join(testDir, "archive");
            await fs.writeFile(target, "not a directory");

            await backend.stageForWrite(target);

            expect((await fs.stat(target)).isDirectory()).toBe(true);
        });

        test("a target under a file can't be staged", async () => {
            const blocker = path.join(testDir, "blocker");
            await fs.writeFile(blocker, "x");

            await expect(backend.stageForWrite(path.join(blocker, "archive"))).rejects.toThrow(ArchiveConstructionError);
        });

        test("reading a missing path fails", async () => {
            const missing = path.join(testDir, "missing");

            await expect(backend.stageForRead(missing)).rejects.toThrow(`${missing} is not a valid file name.`);
        });

        test("reading an existing path reads it in place", async () => {
            expect(await backend.stageForRead(testDir)).toEqual({ localPath: testDir });
        });
    });

    describe("RemoteArchiveBackend", () => {
        let tempRoot: string;
        let storage: MockStorage;
        let backend: RemoteArchiveBackend;

        beforeEach(() => {
            tempRoot = path.join(testDir, "tmp");
            storage = new MockStorage();
            backend = new RemoteArchiveBackend("s3", storage, { tempDirectory: tempRoot, transferAttempts: 1 });
        });

        test("commit replaces the remote directory with the staged files", async () => {
            await storage.write("bucket/archive/stale", undefined, Buffer.from("old"));
            await storage.write("bucket/other", undefined, Buffer.from("keep"));

            const staging = await backend.stageForWrite("bucket/archive");
            expect(path.basename(staging.directory).startsWith("archive-staging-")).toBe(true);
            await fs.outputFile(path.join(staging.directory, "version"), "1.0");
            await fs.outputFile(path.join(staging.directory, "side", "rows.json"), "[1]");

            await backend.commit(staging.directory, "bucket/archive");

            expect(storage.listAllFiles()).toEqual(["bucket/archive/side/rows.json", "bucket/archive/version", "bucket/other"]);
            expect((await storage.read("bucket/archive/side/rows.json"))?.toString("utf8")).toBe("[1]");
        });

        test("a remote object is downloaded to a temporary file", async () => {
            await storage.write("bucket/single.gl", undefined, Buffer.from("bundle bytes"));

            const staging = await backend.stageForRead("bucket/single.gl");

            expect(staging.transientFile).toBe(staging.localPath);
            expect(staging.ownedDirectory).toBeUndefined();
            expect(path.dirname(staging.localPath)).toBe(tempRoot);
            expect(await fs.readFile(staging.localPath, "utf8")).toBe("bundle bytes");
        });

        test("a remote directory is downloaded to a temporary directory", async () => {
            await storage.write("bucket/archive/version", undefined, Buffer.from("1.0"));
            await storage.write("bucket/archive/side/rows.json", undefined, Buffer.from("[2]"));

            const staging = await backend.stageForRead("bucket/archive");

            expect(staging.ownedDirectory).toBe(staging.localPath);
            expect(staging.transientFile).toBeUndefined();
            expect(await fs.readFile(path.join(staging.localPath, "version"), "utf8")).toBe("1.0");
            expect(await fs.readFile(path.join(staging.localPath, "side", "rows.json"), "utf8")).toBe("[2]");
        });

        test("a failed download of a single object keeps the partial file", async () => {
            const broken = new BrokenDownloads();
            await broken.write("bucket/single.gl", undefined, Buffer.from("bundle bytes"));
            const brokenBackend = new RemoteArchiveBackend("s3", broken, { tempDirectory: tempRoot, transferAttempts: 1 });
            jest.spyOn(log, "error").mockImplementation(() => undefined);

            const error = await expectTransferError(brokenBackend.stageForRead("bucket/single.gl"));

            expect(error.message).toBe("Failed to download mock:bucket/single.gl: Connection reset while reading bucket/single.gl");
            expect(path.dirname(error.stagingLocation)).toBe(tempRoot);
            expect(path.basename(error.stagingLocation).startsWith("archive-download-")).toBe(true);
            expect((await fs.stat(error.stagingLocation)).isFile()).toBe(true);
        });

        test("a failed download of a directory keeps the partial directory", async () => {
            const broken = new BrokenDownloads();
            await broken.write("bucket/archive/version", undefined, Buffer.from("1.0"));
            await broken.write("bucket/archive/pickle_archive", undefined, Buffer.from("stream"));
            const brokenBackend = new RemoteArchiveBackend("s3", broken, { tempDirectory: tempRoot, transferAttempts: 1 });
            jest.spyOn(log, "error").mockImplementation(() => undefined);

            const error = await expectTransferError(brokenBackend.stageForRead("bucket/archive"));

            expect(error.message.startsWith("Failed to download mock:bucket/archive: Connection reset")).toBe(true);
            expect(path.dirname(error.stagingLocation)).toBe(tempRoot);
            expect((await fs.stat(error.stagingLocation)).isDirectory()).toBe(true);
        });

        test("a missing remote location fails", async () => {
            await expect(backend.stageForRead("bucket/missing")).rejects.toThrow("mock:bucket/missing does not exist.");
        });
    });
});
