import { IArchivableClass, TypeDescriptor } from "./archivable";
import { BUILTIN_TYPE_TAGS, BuiltinTypeTag, isBuiltinTypeTag } from "./archive-layout";

//
// Loads an archived object from the absolute path it was saved to.
//
export type ArchiveLoader = (path: string) => Promise<unknown>;

//
// Loaders for the built-in type tags.
//
export type BuiltinLoaders = Partial<Record<BuiltinTypeTag, ArchiveLoader>>;

//
// Makes the lookup key for a descriptor.
//
function descriptorKey(descriptor: TypeDescriptor): string {
    return JSON.stringify(descriptor);
}

/**
 * The table of loaders an archive reader dispatches references to.
 *
 * There is no global table: each reader is given the registry it should use.
 * Built-in type tags get their loaders from the constructor, extension types are added
 * with `register` or `registerClass`.
 */
export class LoaderRegistry {

    private readonly builtins = new Map<BuiltinTypeTag, ArchiveLoader>();

    private readonly descriptors = new Map<string, ArchiveLoader>();

    constructor(builtinLoaders: BuiltinLoaders = {}) {
        for (const tag of BUILTIN_TYPE_TAGS) {
            const loader = builtinLoaders[tag];
            if (loader) {
                this.builtins.set(tag, loader);
            }
        }
    }

    /**
     * Registers the loader for a descriptor.
     * A built-in type tag replaces that tag's built-in loader.
     */
    register(descriptor: TypeDescriptor, loader: ArchiveLoader): this {
        if (isBuiltinTypeTag(descriptor)) {
            this.builtins.set(descriptor, loader);
        }
        else {
            this.descriptors.set(descriptorKey(descriptor), loader);
        }
        return this;
    }

    /**
     * Registers an archivable class under its `archiveType`.
     */
    registerClass(archivableClass: IArchivableClass): this {
        return this.register(archivableClass.archiveType, path => archivableClass.loadFromArchive(path));
    }

    //
    // Finds the loader for a built-in type tag.
    //
    findBuiltin(tag: string): ArchiveLoader | undefined {
        return isBuiltinTypeTag(tag) ? this.builtins.get(tag) : undefined;
    }

    //
    // Finds the loader registered for a descriptor.
    //
    findByDescriptor(descriptor: TypeDescriptor): ArchiveLoader | undefined {
        return this.descriptors.get(descriptorKey(descriptor));
    }
}
