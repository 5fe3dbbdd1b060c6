//
// An error that wraps another error to include the original cause.
//
export class WrappedError extends Error {
    constructor(message: string, public options?: { cause: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

//
// Converts an unknown thrown value to an Error.
//
export function toError(value: unknown): Error {
    if (value instanceof Error) {
        return value;
    }
    return new Error(String(value));
}
