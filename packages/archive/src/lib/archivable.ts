import { ArchiveError } from "./archive-errors";

//
// Names the loader for an archived object.
// Either a built-in type tag such as "SFrame" or a [module, class] pair.
//
export type TypeDescriptor = string | [moduleName: string, className: string];

/**
 * An object that saves itself to its own file or directory instead of being encoded inline.
 */
export interface IArchivable {
    /**
     * Saves the object to the given absolute path.
     */
    saveToArchive(path: string): Promise<void>;
}

/**
 * The class side of an archivable object.
 * Pass classes like this to `LoaderRegistry.registerClass` so their objects can be loaded again.
 */
export interface IArchivableClass<T = unknown> {
    /**
     * Identifies the loader for objects of this class in archive references.
     */
    readonly archiveType: TypeDescriptor;

    /**
     * Loads an object from the path it was saved to.
     */
    loadFromArchive(path: string): Promise<T>;
}

//
// What the archive writer needs from an archivable object.
//
export interface IArchivableInfo {
    archiveType: TypeDescriptor;
    save(path: string): Promise<void>;
}

//
// Returns true if the value is a valid type descriptor.
//
export function isTypeDescriptor(value: unknown): value is TypeDescriptor {
    if (typeof value === "string") {
        return value.length > 0;
    }

    return Array.isArray(value)
        && value.length === 2
        && typeof value[0] === "string"
        && typeof value[1] === "string";
}

//
// Formats a type descriptor for error messages.
//
export function describeTypeDescriptor(descriptor: TypeDescriptor): string {
    return typeof descriptor === "string" ? descriptor : `${descriptor[0]}.${descriptor[1]}`;
}

//
// Checks if an object can be archived by reference.
// The object needs an instance saveToArchive method and its class needs a static
// loadFromArchive method and a static archiveType.
// Returns undefined for objects that are encoded inline.
// Throws when the object can save and load itself but its class has no valid archiveType.
//
export function getArchivableInfo(value: object): IArchivableInfo | undefined {
    if (!("saveToArchive" in value) || typeof value.saveToArchive !== "function") {
        return undefined;
    }
    const saveToArchive = value.saveToArchive;

    const archiveClass: unknown = value.constructor;
    if (typeof archiveClass !== "function") {
        return undefined;
    }

    if (!("loadFromArchive" in archiveClass) || typeof archiveClass.loadFromArchive !== "function") {
        return undefined;
    }

    //
    // Saving and loading make the object archivable, so it needs a type to be loaded by.
    //
    if (!("archiveType" in archiveClass) || !isTypeDescriptor(archiveClass.archiveType)) {
        throw new ArchiveError(`Can't archive an instance of ${archiveClass.name || "an anonymous class"}: it has saveToArchive and loadFromArchive but no valid static archiveType.`);
    }

    return {
        archiveType: archiveClass.archiveType,
        save: async (path: string): Promise<void> => {
            await saveToArchive.call(value, path);
        },
    };
}
