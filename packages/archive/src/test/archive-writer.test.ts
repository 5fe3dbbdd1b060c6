import fs from "fs-extra";
import path from "path";
import { Readable } from "stream";
import { getDeferredRemovals } from "node-utils";
import { MockStorage } from "storage";
import { log } from "utils";
import { ArchiveClosedError, ArchiveConstructionError, ArchiveError, BackendTransferError } from "../lib/archive-errors";
import { loadArchive } from "../lib/archive-reader";
import { ArchiveWriter, saveArchive, withArchiveWriter } from "../lib/archive-writer";
import { LoaderRegistry } from "../lib/loader-registry";
import { Frame, makeTestDir } from "./archive-fixtures";

//
// Saves and loads itself, but its class names no archive type.
//
class Unlabelled {
    saved = 0;

    async saveToArchive(): Promise<void> {
        this.saved += 1;
    }

    static async loadFromArchive(): Promise<Unlabelled> {
        return new Unlabelled();
    }
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

describe("ArchiveWriter", () => {
    let testDir: string;

    beforeEach(async () => {
        testDir = await makeTestDir("writer");
    });

    afterEach(async () => {
        jest.restoreAllMocks();
        await fs.remove(testDir);
    });

    test("writes the version marker and the main stream", async () => {
        const archivePath = path.join(testDir, "archive");

        await saveArchive(archivePath, { answer: 42 });

        expect((await fs.readdir(archivePath)).sort()).toEqual(["pickle_archive", "version"]);
        expect(await fs.readFile(path.join(archivePath, "version"), "utf8")).toBe("1.0");
        expect(await loadArchive(archivePath)).toEqual([{ answer: 42 }]);
    });

    test("appends each dump to the main stream", async () => {
        const archivePath = path.join(testDir, "archive");

        await withArchiveWriter(archivePath, async writer => {
            await writer.dump("first");
            await writer.dump([2]);
            await writer.dump({ third: true });
        });

        expect(await loadArchive(archivePath)).toEqual(["first", [2], { third: true }]);
    });

    test("saves an object referenced many times only once", async () => {
        const archivePath = path.join(testDir, "archive");
        const frame = new Frame([1, 2, 3]);
        const saveSpy = jest.spyOn(Frame.prototype, "saveToArchive");

        await withArchiveWriter(archivePath, async writer => {
            await writer.dump({ a: frame, b: [frame, frame] });
            await writer.dump(frame);
        });

        expect(saveSpy).toHaveBeenCalledTimes(1);

        const sideFiles = (await fs.readdir(archivePath)).filter(name => name !== "pickle_archive" && name !== "version");
        expect(sideFiles).toHaveLength(1);
        expect(sideFiles[0]).toMatch(UUID_PATTERN);
        expect(await fs.readJson(path.join(archivePath, sideFiles[0], "rows.json"))).toEqual([1, 2, 3]);
    });

    test("saves distinct objects to distinct files", async () => {
        const archivePath = path.join(testDir, "archive");

        await saveArchive(archivePath, [new Frame([1]), new Frame([1])]);

        expect(await fs.readdir(archivePath)).toHaveLength(4);
    });

    test("replaces an existing archive and removes the files it no longer needs", async () => {
        const archivePath = path.join(testDir, "archive");
        await fs.outputFile(path.join(archivePath, "version"), "1.0");
        await fs.outputFile(path.join(archivePath, "pickle_archive"), "old stream");
        await fs.outputJson(path.join(archivePath, "uuid-A", "rows.json"), [9]);
        await fs.outputFile(path.join(archivePath, "notes.txt"), "stray");

        const writer = await ArchiveWriter.open(archivePath);
        expect(writer.getPendingDeletions().sort()).toEqual([
            path.join(archivePath, "notes.txt"),
            path.join(archivePath, "uuid-A"),
        ]);
        await writer.dump({ frame: new Frame([5]) });
        await writer.close();

        const entries = await fs.readdir(archivePath);
        expect(entries).toHaveLength(3);
        expect(entries).toContain("pickle_archive");
        expect(entries).toContain("version");
        expect(entries.filter(name => UUID_PATTERN.test(name))).toHaveLength(1);
        expect(writer.getPendingDeletions()).toEqual([]);
    });

    test("replaces a plain file at the target with an archive directory", async () => {
        const archivePath = path.join(testDir, "archive");
        await fs.writeFile(archivePath, "not an archive");

        await saveArchive(archivePath, 1);

        expect((await fs.stat(archivePath)).isDirectory()).toBe(true);
        expect(await loadArchive(archivePath)).toEqual([1]);
    });

    test("expands environment variables in local paths", async () => {
        process.env.ARCHIVE_WRITER_TEST_DIR = testDir;
        try {
            await saveArchive("$ARCHIVE_WRITER_TEST_DIR/expanded", "value");
        }
        finally {
            delete process.env.ARCHIVE_WRITER_TEST_DIR;
        }

        expect(await fs.pathExists(path.join(testDir, "expanded", "pickle_archive"))).toBe(true);
    });

    test("can't dump after close, and close can be called again", async () => {
        const writer = await ArchiveWriter.open(path.join(testDir, "archive"));
        await writer.close();
        await writer.close();

        await expect(writer.dump(1)).rejects.toThrow(ArchiveClosedError);
    });

    test("can't dump while another dump is running", async () => {
        const writer = await ArchiveWriter.open(path.join(testDir, "archive"));

        const first = writer.dump({ frame: new Frame([1]) });
        await expect(writer.dump(2)).rejects.toThrow("another value is still being written");
        await first;
        await writer.close();
    });

    test("the scoped writer is closed when the callback fails", async () => {
        const archivePath = path.join(testDir, "archive");
        const writers: ArchiveWriter[] = [];

        await expect(withArchiveWriter(archivePath, async writer => {
            writers.push(writer);
            await writer.dump("before the failure");
            throw new Error("Callback failed");
        })).rejects.toThrow("Callback failed");

        await expect(writers[0].dump(1)).rejects.toThrow(ArchiveClosedError);
        expect(await loadArchive(archivePath)).toEqual(["before the failure"]);
    });

    test("values that can't be encoded fail the dump", async () => {
        await expect(withArchiveWriter(path.join(testDir, "archive"), writer => writer.dump({ n: BigInt(1) })))
            .rejects.toThrow("Can't encode a bigint at $.n.");
    });

    test("an unusable location fails to open with a construction error", async () => {
        await expect(ArchiveWriter.open("hdfs:///data/archive")).rejects.toThrow(ArchiveConstructionError);
    });

    test("an object that saves itself without an archive type fails the dump", async () => {
        const archivePath = path.join(testDir, "archive");
        const heavy = new Unlabelled();

        await expect(saveArchive(archivePath, { heavy })).rejects.toThrow(ArchiveError);
        await expect(saveArchive(archivePath, { heavy })).rejects.toThrow("Can't archive an instance of Unlabelled");

        expect(heavy.saved).toBe(0);
        expect((await fs.readdir(archivePath)).sort()).toEqual(["pickle_archive", "version"]);
    });

    test("an old entry that can't be removed is left for exit and close still succeeds", async () => {
        const archivePath = path.join(testDir, "archive");
        const stuckPath = path.join(archivePath, "stuck");
        const stalePath = path.join(archivePath, "stale.txt");
        await fs.outputJson(path.join(stuckPath, "rows.json"), [1]);
        await fs.outputFile(stalePath, "x");

        const realRemove = fs.remove;
        jest.spyOn(fs, "remove").mockImplementation(async (...args: unknown[]) => {
            const [removePath] = args;
            if (typeof removePath !== "string") {
                throw new Error("Expected a path to remove");
            }
            if (removePath === stuckPath) {
                throw new Error("Resource busy");
            }
            await realRemove(removePath);
        });
        const warnSpy = jest.spyOn(log, "warn").mockImplementation(() => undefined);

        const writer = await ArchiveWriter.open(archivePath);
        await writer.dump(1);
        await expect(writer.close()).resolves.toBeUndefined();

        expect(warnSpy).toHaveBeenCalledTimes(1);
        expect(warnSpy).toHaveBeenCalledWith(`Failed to remove ${stuckPath}, will retry at exit: Resource busy`);
        expect(getDeferredRemovals()).toContain(stuckPath);
        expect(await fs.pathExists(stuckPath)).toBe(true);
        expect(await fs.pathExists(stalePath)).toBe(false);
    });

    describe("remote targets", () => {
        let tempRoot: string;

        beforeEach(async () => {
            tempRoot = path.join(testDir, "tmp");
            await fs.ensureDir(tempRoot);
        });

        test("uploads the archive and clears what was there before", async () => {
            const storage = new MockStorage();
            await storage.write("bucket/archive/stale.bin", undefined, Buffer.from("stale"));
            await storage.write("bucket/other/keep.bin", undefined, Buffer.from("keep"));

            await saveArchive("s3://bucket/archive", { frame: new Frame([7]) }, {
                storage,
                config: { tempDirectory: tempRoot },
            });

            const archiveFiles = storage.listAllFiles().filter(name => name.startsWith("bucket/archive/"));
            expect(archiveFiles).toHaveLength(3);
            expect(archiveFiles).toContain("bucket/archive/pickle_archive");
            expect(archiveFiles).toContain("bucket/archive/version");
            expect(archiveFiles.filter(name => /^bucket\/archive\/[0-9a-f-]{36}\/rows\.json$/.test(name))).toHaveLength(1);
            expect(await storage.read("bucket/archive/version")).toEqual(Buffer.from("1.0"));
            expect(await storage.fileExists("bucket/other/keep.bin")).toBe(true);

            // The staging directory is released after the upload.
            expect(await fs.readdir(tempRoot)).toEqual([]);
        });

        test("nothing is uploaded until the writer is closed", async () => {
            const storage = new MockStorage();

            const writer = await ArchiveWriter.open("s3://bucket/archive", { storage, config: { tempDirectory: tempRoot } });
            await writer.dump(1);
            expect(storage.listAllFiles()).toEqual([]);

            await writer.close();
            expect(storage.listAllFiles()).toEqual(["bucket/archive/pickle_archive", "bucket/archive/version"]);
        });

        test("a failed upload keeps the staged archive", async () => {
            class FailingStorage extends MockStorage {
                async writeStream(filePath: string, contentType: string | undefined, inputStream: Readable): Promise<void> {
                    inputStream.destroy();
                    throw new Error("Connection reset");
                }
            }
            jest.spyOn(log, "error").mockImplementation(() => {});

            await expect(saveArchive("s3://bucket/archive", { n: 1 }, {
                storage: new FailingStorage(),
                config: { tempDirectory: tempRoot, transferAttempts: 1 },
            })).rejects.toThrow(BackendTransferError);

            const staged = await fs.readdir(tempRoot);
            expect(staged).toHaveLength(1);
            expect(staged[0].startsWith("archive-staging-")).toBe(true);
            expect((await fs.readdir(path.join(tempRoot, staged[0]))).sort()).toEqual(["pickle_archive", "version"]);
        });

        test("reads back what it uploaded", async () => {
            const storage = new MockStorage();
            const frame = new Frame([4, 5]);

            await saveArchive("s3://bucket/archive", [frame, frame], { storage, config: { tempDirectory: tempRoot } });
            const values = await loadArchive("s3://bucket/archive", {
                storage,
                config: { tempDirectory: tempRoot },
                loaders: new LoaderRegistry().registerClass(Frame),
            });

            expect(values).toHaveLength(1);
            const loaded = values[0];
            expect(Array.isArray(loaded)).toBe(true);
            if (Array.isArray(loaded)) {
                expect(loaded[0]).toBeInstanceOf(Frame);
                expect(loaded[0]).toBe(loaded[1]);
                expect(loaded[0].rows).toEqual([4, 5]);
            }
        });
    });
});
