import { Stats } from "fs";
import fs from "fs-extra";
import { open } from "fs/promises";
import JSZip from "jszip";
import path from "path";
import { makeTempDirectory, removeOrDefer } from "node-utils";
import { BinaryDeserializer, IDeserializer } from "serialization";
import { log, toError } from "utils";
import { ArchiveConstructionError, UnsupportedVersionError } from "./archive-errors";

//
// Name of the file that holds the archive's version string.
//
export const VERSION_FILE_NAME = "version";

//
// Name of the file that holds the main stream of a directory archive.
//
export const MAIN_STREAM_FILE_NAME = "pickle_archive";

//
// Entry in a legacy zip bundle whose content names the main stream entry.
//
export const LEGACY_MARKER_ENTRY = "pickle_file";

//
// Names in an archive directory that belong to the archive itself rather than to an archived object.
//
export const RESERVED_NAMES: readonly string[] = [VERSION_FILE_NAME, MAIN_STREAM_FILE_NAME];

//
// Every archive version that can be read, oldest first.
//
export const SUPPORTED_VERSIONS: readonly string[] = ["1.0"];

//
// The version written to new archives.
//
export const CURRENT_VERSION = "1.0";

//
// The version assumed for legacy bundles that don't record one.
//
export const EARLIEST_VERSION = SUPPORTED_VERSIONS[0];

//
// Type tags with a fixed built-in loader.
//
export const BUILTIN_TYPE_TAGS = ["SFrame", "SGraph", "SArray", "Model"] as const;

export type BuiltinTypeTag = typeof BUILTIN_TYPE_TAGS[number];

export function isBuiltinTypeTag(value: unknown): value is BuiltinTypeTag {
    return BUILTIN_TYPE_TAGS.some(tag => tag === value);
}

//
// How references are resolved for a particular archive version.
//
export interface IReferenceRules {
    //
    // Tags dispatched straight to the built-in loaders.
    //
    builtinTags: readonly BuiltinTypeTag[];

    //
    // Set to true when references may name a registered class descriptor.
    //
    allowClassDescriptors: boolean;
}

const referenceRules: Record<string, IReferenceRules> = {
    "1.0": {
        builtinTags: BUILTIN_TYPE_TAGS,
        allowClassDescriptors: true,
    },
};

//
// Gets the reference rules for a version.
// A reader never guesses: an unknown version is an error.
//
export function getReferenceRules(version: string): IReferenceRules {
    const rules = referenceRules[version];
    if (!rules) {
        throw new UnsupportedVersionError(version, SUPPORTED_VERSIONS);
    }
    return rules;
}

//
// Trims a version string and checks that it is supported.
//
export function validateVersion(version: string): string {
    const trimmed = version.trim();
    if (!SUPPORTED_VERSIONS.includes(trimmed)) {
        throw new UnsupportedVersionError(trimmed, SUPPORTED_VERSIONS);
    }
    return trimmed;
}

//
// Resolves a relative path inside an archive root.
// Returns undefined if the path would escape the root.
//
export function resolveArchivePath(root: string, relativePath: string): string | undefined {
    const resolvedRoot = path.resolve(root);
    const resolved = path.resolve(resolvedRoot, relativePath);
    if (resolved === resolvedRoot || !resolved.startsWith(resolvedRoot + path.sep)) {
        return undefined;
    }
    return resolved;
}

export type ArchiveFormat = "directory" | "legacy-bundle" | "plain-stream";

//
// An input that has been classified and checked.
//
export interface IClassifiedArchive {
    format: ArchiveFormat;

    //
    // The main stream, positioned at the first record.
    //
    mainStream: IDeserializer;

    version: string;

    //
    // Directory that relative paths in references resolve against.
    //
    stagingRoot: string;

    //
    // Temporary directory a legacy bundle was extracted to.
    //
    extractedDirectory?: string;
}

//
// Returns true if the file starts with a zip local file header or an empty zip's end of directory record.
//
async function isZipFile(filePath: string): Promise<boolean> {
    const header = Buffer.alloc(4);
    const handle = await open(filePath, "r");
    try {
        const { bytesRead } = await handle.read(header, 0, 4, 0);
        if (bytesRead < 4) {
            return false;
        }
    }
    finally {
        await handle.close();
    }

    return header[0] === 0x50 && header[1] === 0x4b
        && ((header[2] === 0x03 && header[3] === 0x04) || (header[2] === 0x05 && header[3] === 0x06));
}

//
// Bundles record their version in the zip comment.
//
function getZipComment(zip: JSZip): string | undefined {
    return "comment" in zip && typeof zip.comment === "string" ? zip.comment.trim() : undefined;
}

//
// Extracts a legacy zip bundle and locates its main stream.
//
async function extractLegacyBundle(bundlePath: string, tempRoot?: string): Promise<IClassifiedArchive> {
    let zip: JSZip;
    try {
        zip = await JSZip.loadAsync(await fs.readFile(bundlePath));
    }
    catch (err: unknown) {
        throw new ArchiveConstructionError(`Failed to read zip bundle ${bundlePath}: ${toError(err).message}`, { cause: err });
    }

    const marker = zip.file(LEGACY_MARKER_ENTRY);
    if (!marker) {
        throw new ArchiveConstructionError(`${bundlePath} is a zip file but not an archive bundle, it has no "${LEGACY_MARKER_ENTRY}" entry.`);
    }
    const mainStreamName = (await marker.async("string")).trim();
    const version = validateVersion(getZipComment(zip) || EARLIEST_VERSION);

    const extractedDirectory = await makeTempDirectory("archive-extract-", tempRoot);
    try {
        for (const entry of Object.values(zip.files)) {
            const entryPath = resolveArchivePath(extractedDirectory, entry.name);
            if (!entryPath) {
                throw new ArchiveConstructionError(`Entry "${entry.name}" in ${bundlePath} would be extracted outside the archive.`);
            }

            if (entry.dir) {
                await fs.ensureDir(entryPath);
            }
            else {
                await fs.outputFile(entryPath, await entry.async("nodebuffer"));
            }
        }

        const mainStreamPath = resolveArchivePath(extractedDirectory, mainStreamName);
        if (!mainStreamPath || !await fs.pathExists(mainStreamPath)) {
            throw new ArchiveConstructionError(`Main stream "${mainStreamName}" named by ${bundlePath} is missing.`);
        }

        log.verbose(`Extracted bundle ${bundlePath} to ${extractedDirectory}.`);

        return {
            format: "legacy-bundle",
            mainStream: new BinaryDeserializer(await fs.readFile(mainStreamPath)),
            version,
            stagingRoot: extractedDirectory,
            extractedDirectory,
        };
    }
    catch (err: unknown) {
        await removeOrDefer(extractedDirectory);
        throw err;
    }
}

//
// Checks the version marker and main stream of a directory archive.
//
async function openDirectoryArchive(dirPath: string): Promise<IClassifiedArchive> {
    const versionPath = path.join(dirPath, VERSION_FILE_NAME);
    if (!await fs.pathExists(versionPath)) {
        throw new ArchiveConstructionError(`Corrupted archive ${dirPath}: missing version file.`);
    }

    const mainStreamPath = path.join(dirPath, MAIN_STREAM_FILE_NAME);
    if (!await fs.pathExists(mainStreamPath)) {
        throw new ArchiveConstructionError(`Corrupted archive ${dirPath}: missing main stream ${MAIN_STREAM_FILE_NAME}.`);
    }

    let versionText: string;
    try {
        versionText = await fs.readFile(versionPath, "utf8");
    }
    catch (err: unknown) {
        throw new ArchiveConstructionError(`Corrupted archive ${dirPath}: can't read the version file.`, { cause: err });
    }

    const version = validateVersion(versionText);

    return {
        format: "directory",
        mainStream: new BinaryDeserializer(await fs.readFile(mainStreamPath)),
        version,
        stagingRoot: path.resolve(dirPath),
    };
}

//
// Works out what kind of archive is at a local path and opens its main stream.
// A zip is a legacy bundle, a directory is a directory archive and any other file is a plain stream.
//
export async function classifyAndValidate(localPath: string, tempRoot?: string): Promise<IClassifiedArchive> {
    let stats: Stats;
    try {
        stats = await fs.stat(localPath);
    }
    catch (err: unknown) {
        throw new ArchiveConstructionError(`${localPath} is not a valid archive location: ${toError(err).message}`, { cause: err });
    }

    if (stats.isDirectory()) {
        return await openDirectoryArchive(localPath);
    }

    if (!stats.isFile()) {
        throw new ArchiveConstructionError(`${localPath} is neither a file nor a directory.`);
    }

    if (await isZipFile(localPath)) {
        return await extractLegacyBundle(localPath, tempRoot);
    }

    return {
        format: "plain-stream",
        mainStream: new BinaryDeserializer(await fs.readFile(localPath)),
        version: EARLIEST_VERSION,
        stagingRoot: path.dirname(path.resolve(localPath)),
    };
}
