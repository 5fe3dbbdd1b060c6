import fs from "fs-extra";
import { mkdtemp } from "fs/promises";
import os from "os";
import path from "path";
import { uuid } from "utils";

//
// Creates a new, empty temporary directory.
//
export async function makeTempDirectory(prefix: string, rootDir?: string): Promise<string> {
    const baseDir = rootDir ?? os.tmpdir();
    await fs.ensureDir(baseDir);
    return await mkdtemp(path.join(baseDir, prefix));
}

//
// Makes a unique path for a temporary file. The file is not created.
//
export function makeTempFilePath(prefix: string, rootDir?: string): string {
    return path.join(rootDir ?? os.tmpdir(), `${prefix}${uuid()}`);
}
