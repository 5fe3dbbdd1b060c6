import { randomUUID } from "crypto";

//
// Generates a unique id.
//
export function uuid(): string {
    return randomUUID();
}
