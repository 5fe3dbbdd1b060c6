import { WrappedError, toError } from "../../lib/wrapped-error";

describe("WrappedError", () => {
    test("keeps the original error as the cause", () => {
        const cause = new Error("disk full");
        const error = new WrappedError("Failed to write", { cause });

        expect(error.message).toBe("Failed to write");
        expect(error.cause).toBe(cause);
        expect(error.options?.cause).toBe(cause);
    });

    test("names the error after the subclass", () => {
        class CustomWrappedError extends WrappedError {}

        const error = new CustomWrappedError("Something broke");

        expect(error.name).toBe("CustomWrappedError");
        expect(error).toBeInstanceOf(WrappedError);
    });
});

describe("toError", () => {
    test("returns errors unchanged", () => {
        const error = new Error("boom");
        expect(toError(error)).toBe(error);
    });

    test("wraps other values", () => {
        expect(toError(42).message).toBe("42");
    });
});
