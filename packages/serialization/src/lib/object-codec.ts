//
// Encodes a graph of values to length-prefixed BSON records.
// Objects can be replaced by persistent ids, which are resolved back to objects when decoding.
//

import { BinarySerializer, IDeserializer } from './serialization';

//
// A value as it is stored in a record.
//
export type EncodedValue =
    | null
    | boolean
    | number
    | string
    | Date
    | Buffer
    | EncodedValue[]
    | { [key: string]: EncodedValue };

//
// A reference that stands in for an object in the stream.
//
export type PersistentId = EncodedValue[];

//
// Offered each object while encoding.
// Returns a persistent id to store in place of the object, or undefined to encode the object inline.
//
export type ReferenceHook = (value: object) => Promise<PersistentId | undefined>;

//
// Turns a stored persistent id back into an object while decoding.
// The id comes straight from the stream and is not validated.
//
export type ReferenceResolver = (id: unknown[]) => Promise<unknown>;

//
// Encodes and decodes one top-level value at a time.
//
export interface IObjectCodec {
    //
    // Encodes a value to a single record.
    //
    encode(value: unknown, hook: ReferenceHook): Promise<Buffer>;

    //
    // Decodes the next record from the input.
    //
    decode(input: IDeserializer, resolver: ReferenceResolver): Promise<unknown>;
}

//
// The key of the single-field document that holds a persistent id.
//
export const REFERENCE_KEY = "$archiveRef";

//
// Thrown for values the codec can't represent.
//
export class UnsupportedValueError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "UnsupportedValueError";
    }
}

//
// Keys beginning with "$" get a second "$" so they can't be mistaken for a reference.
//
function escapeKey(key: string): string {
    return key.startsWith("$") ? `$${key}` : key;
}

function unescapeKey(key: string): string {
    return key.startsWith("$$") ? key.substring(1) : key;
}

//
// Codec that stores each top-level value as a BSON document { v: <value> }.
//
export class BsonObjectCodec implements IObjectCodec {

    async encode(value: unknown, hook: ReferenceHook): Promise<Buffer> {
        const encoded = await this.encodeValue(value, hook, new Set<object>(), "$");
        const serializer = new BinarySerializer();
        serializer.writeBSON({ v: encoded });
        return serializer.getBuffer();
    }

    async decode(input: IDeserializer, resolver: ReferenceResolver): Promise<unknown> {
        const doc = input.readBSON();
        if (!("v" in doc)) {
            throw new UnsupportedValueError(`Record at position ${input.getPosition()} has no value.`);
        }
        return await this.decodeValue(doc.v, resolver);
    }

    //
    // Values are encoded one at a time, in order, so the hook sees objects in stream order.
    //
    private async encodeValue(value: unknown, hook: ReferenceHook, ancestors: Set<object>, location: string): Promise<EncodedValue> {
        if (value === null || value === undefined) {
            return null;
        }

        switch (typeof value) {
            case "boolean":
            case "number":
            case "string":
                return value;

            case "bigint":
            case "function":
            case "symbol":
                throw new UnsupportedValueError(`Can't encode a ${typeof value} at ${location}.`);
        }

        if (typeof value !== "object") {
            throw new UnsupportedValueError(`Can't encode a ${typeof value} at ${location}.`);
        }

        const persistentId = await hook(value);
        if (persistentId !== undefined) {
            return { [REFERENCE_KEY]: persistentId };
        }

        if (value instanceof Date) {
            return new Date(value.getTime());
        }

        if (value instanceof Uint8Array) {
            return Buffer.from(value);
        }

        if (ArrayBuffer.isView(value) || value instanceof Map || value instanceof Set) {
            throw new UnsupportedValueError(`Can't encode a ${value.constructor.name} at ${location}.`);
        }

        if (ancestors.has(value)) {
            throw new UnsupportedValueError(`Circular reference at ${location}.`);
        }

        ancestors.add(value);
        try {
            if (Array.isArray(value)) {
                const items: EncodedValue[] = [];
                for (let index = 0; index < value.length; index += 1) {
                    items.push(await this.encodeValue(value[index], hook, ancestors, `${location}[${index}]`));
                }
                return items;
            }

            const fields: [string, EncodedValue][] = [];
            for (const [key, fieldValue] of Object.entries(value)) {
                fields.push([escapeKey(key), await this.encodeValue(fieldValue, hook, ancestors, `${location}.${key}`)]);
            }
            return Object.fromEntries(fields);
        }
        finally {
            ancestors.delete(value);
        }
    }

    private async decodeValue(value: unknown, resolver: ReferenceResolver): Promise<unknown> {
        if (value === null || value === undefined) {
            return null;
        }

        if (typeof value === "boolean" || typeof value === "number" || typeof value === "string") {
            return value;
        }

        if (value instanceof Date) {
            return value;
        }

        if (value instanceof Uint8Array) {
            return Buffer.isBuffer(value) ? value : Buffer.from(value);
        }

        if (Array.isArray(value)) {
            const items: unknown[] = [];
            for (const item of value) {
                items.push(await this.decodeValue(item, resolver));
            }
            return items;
        }

        if (typeof value === "object" && Object.getPrototypeOf(value) === Object.prototype) {
            const entries = Object.entries(value);
            if (entries.length === 1 && entries[0][0] === REFERENCE_KEY) {
                const persistentId = entries[0][1];
                if (!Array.isArray(persistentId)) {
                    throw new UnsupportedValueError(`Malformed reference in stream: ${JSON.stringify(persistentId)}`);
                }
                return await resolver(persistentId);
            }

            const fields: [string, unknown][] = [];
            for (const [key, fieldValue] of entries) {
                fields.push([unescapeKey(key), await this.decodeValue(fieldValue, resolver)]);
            }
            return Object.fromEntries(fields);
        }

        throw new UnsupportedValueError(`Unsupported value in stream: ${Object.prototype.toString.call(value)}`);
    }
}
