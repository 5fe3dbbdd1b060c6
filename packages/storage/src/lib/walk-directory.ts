import { IStorage } from "./storage";
import { pathJoin } from "./storage-factory";

/**
 * A file found while walking a directory in storage.
 */
export interface IWalkedFile {
    /**
     * Full path of the file in storage.
     */
    fileName: string;

    /**
     * Path of the file relative to the directory the walk started from.
     */
    relativePath: string;
}

/**
 * Recursively walks a directory structure in storage, files first then subdirectories.
 * @param storage The storage to walk
 * @param dirPath Directory path to start walking from
 */
export async function* walkDirectory(storage: IStorage, dirPath: string, relativeDir: string = ""): AsyncGenerator<IWalkedFile> {
    let next: string | undefined = undefined;
    do {
        const fileBatch = await storage.listFiles(dirPath, 1000, next);
        for (const fileName of fileBatch.names) {
            yield {
                fileName: pathJoin(dirPath, fileName),
                relativePath: pathJoin(relativeDir, fileName),
            };
        }

        next = fileBatch.next;

    } while (next);

    next = undefined;
    do {
        const dirBatch = await storage.listDirs(dirPath, 1000, next);
        for (const dirName of dirBatch.names) {
            // Recursively walk subdirectories
            yield* walkDirectory(storage, pathJoin(dirPath, dirName), pathJoin(relativeDir, dirName));
        }

        next = dirBatch.next;

    } while (next);
}
