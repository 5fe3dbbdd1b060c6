import { WrappedError } from "utils";

//
// Base class for errors raised by archive writers and readers.
//
export class ArchiveError extends WrappedError {
}

//
// The archive could not be opened: the target can't be written, or the source is missing or incomplete.
//
export class ArchiveConstructionError extends ArchiveError {
}

//
// The archive's version marker names a version this reader doesn't support.
//
export class UnsupportedVersionError extends ArchiveError {
    constructor(public readonly version: string, public readonly supportedVersions: readonly string[]) {
        super(`Unsupported archive version "${version}", expected one of: ${supportedVersions.join(", ")}.`);
    }
}

//
// A reference in the main stream can't be turned back into an object.
//
export class UnresolvableReferenceError extends ArchiveError {
}

//
// Upload or download of an archive failed.
// The local staging location is left in place so nothing is lost.
//
export class BackendTransferError extends ArchiveError {
    constructor(message: string, public readonly stagingLocation: string, options?: { cause: unknown }) {
        super(message, options);
    }
}

//
// The archive writer or reader was used after it was closed.
//
export class ArchiveClosedError extends ArchiveError {
}
