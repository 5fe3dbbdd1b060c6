export interface ILog {
    //
    // Set to true when verbose messages are being recorded.
    // Check this before building an expensive verbose message.
    //
    readonly verboseEnabled: boolean;

    info(message: string): void;
    verbose(message: string): void;
    error(message: string): void;
    exception(message: string, error: Error): void;
    warn(message: string): void;
    debug(message: string): void;
}

//
// Sets the global log.
//
export function setLog(_log: ILog): void {
    log = _log;
}

export let log: ILog = {
    verboseEnabled: false,
    info(message: string): void {
        console.log(message);
    },
    verbose(message: string): void {
        // You have to override this method if you want to use it.
    },
    error(message: string): void {
        console.error(message);
    },
    exception(message: string, error: Error): void {
        console.error(message);
        console.error(error.stack || error.message || error);
    },
    warn(message: string): void {
        console.warn(message);
    },
    debug(message: string): void {
        console.debug(message);
    },
};
