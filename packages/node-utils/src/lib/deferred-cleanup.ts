import fs from "fs-extra";
import { log, toError } from "utils";

//
// Paths that could not be removed when they were released.
// They are removed, best effort, when the process exits.
//
const deferredRemovals = new Set<string>();

//
// Set to true after the exit handler has been registered.
//
let exitHandlerRegistered = false;

//
// Queues a file or directory for removal when the process exits.
//
export function deferRemoval(removePath: string): void {
    deferredRemovals.add(removePath);
    registerExitHandler();
}

//
// Gets the paths currently queued for removal at exit.
//
export function getDeferredRemovals(): string[] {
    return Array.from(deferredRemovals);
}

//
// Removes every queued path.
// Only synchronous operations work from the exit event, so this is synchronous.
// A path that still can't be removed stays queued.
//
export function runDeferredRemovals(): void {
    for (const removePath of Array.from(deferredRemovals)) {
        try {
            fs.removeSync(removePath);
            deferredRemovals.delete(removePath);
        }
        catch (err: unknown) {
            log.verbose(`Deferred removal of ${removePath} failed again: ${toError(err).message}`);
        }
    }
}

//
// Removes a file or directory now.
// If that fails the failure is logged as a warning and the removal is retried at process exit.
// Returns true if the path was removed immediately.
//
export async function removeOrDefer(removePath: string): Promise<boolean> {
    try {
        await fs.remove(removePath);
        return true;
    }
    catch (err: unknown) {
        log.warn(`Failed to remove ${removePath}, will retry at exit: ${toError(err).message}`);
        deferRemoval(removePath);
        return false;
    }
}

function registerExitHandler(): void {
    if (exitHandlerRegistered) {
        return;
    }

    process.on("exit", () => {
        runDeferredRemovals();
    });

    exitHandlerRegistered = true;
}
