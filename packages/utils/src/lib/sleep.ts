//
// Waits for the specified number of milliseconds.
//
export function sleep(timeMS: number): Promise<void> {
    return new Promise<void>(resolve => setTimeout(resolve, timeMS));
}
