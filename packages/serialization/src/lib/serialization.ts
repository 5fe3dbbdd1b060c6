//
// Binary serialization and deserialization.
//

import { serialize as bsonSerialize, deserialize as bsonDeserialize, Document } from 'bson';

//
// Interface for writing binary data during serialization
//
export interface ISerializer {
    //
    // Write a 32-bit unsigned integer (little-endian)
    //
    writeUInt32(value: number): void;

    //
    // Write raw buffer data (prefixed with 32-bit length)
    //
    writeBuffer(buffer: Buffer): void;

    //
    // Write raw bytes without length prefix
    //
    writeBytes(buffer: Buffer): void;

    //
    // Write BSON data (serializes the document to BSON and writes with 32-bit length prefix)
    //
    writeBSON(doc: Document): void;
}

//
// Interface for reading binary data during deserialization
//
export interface IDeserializer {
    //
    // Read a 32-bit unsigned integer (little-endian)
    //
    readUInt32(): number;

    //
    // Read buffer data (reads 32-bit length prefix first)
    //
    readBuffer(): Buffer;

    //
    // Read specified number of raw bytes
    //
    readBytes(length: number): Buffer;

    //
    // Get current read position
    //
    getPosition(): number;

    //
    // Get remaining bytes from current position
    //
    getRemainingBytes(): number;

    //
    // Read BSON data (reads 32-bit length prefix and deserializes the document).
    // Binary values come back as Buffers.
    //
    readBSON(): Record<string, unknown>;
}

//
// Implementation of ISerializer for writing binary data
//
export class BinarySerializer implements ISerializer {
    private buffer: Buffer;
    private position: number = 0;
    private capacity: number;

    constructor(initialCapacity: number = 1024) {
        this.capacity = initialCapacity;
        this.buffer = Buffer.alloc(this.capacity);
    }

    private ensureCapacity(bytesNeeded: number): void {
        if (this.position + bytesNeeded > this.capacity) {
            // Double the capacity until we have enough space
            let newCapacity = this.capacity;
            while (this.position + bytesNeeded > newCapacity) {
                newCapacity *= 2;
            }

            const newBuffer = Buffer.alloc(newCapacity);
            this.buffer.copy(newBuffer, 0, 0, this.position);
            this.buffer = newBuffer;
            this.capacity = newCapacity;
        }
    }

    writeUInt32(value: number): void {
        this.ensureCapacity(4);
        this.buffer.writeUInt32LE(value, this.position);
        this.position += 4;
    }

    writeBuffer(buffer: Buffer): void {
        this.writeUInt32(buffer.length);
        this.writeBytes(buffer);
    }

    writeBytes(buffer: Buffer): void {
        this.ensureCapacity(buffer.length);
        buffer.copy(this.buffer, this.position);
        this.position += buffer.length;
    }

    writeBSON(doc: Document): void {
        const bsonBuffer = bsonSerialize(doc);
        this.writeBuffer(Buffer.from(bsonBuffer.buffer, bsonBuffer.byteOffset, bsonBuffer.byteLength));
    }

    getBuffer(): Buffer {
        // Return only the used portion of the buffer
        return this.buffer.subarray(0, this.position);
    }
}

//
// Implementation of IDeserializer for reading binary data
//
export class BinaryDeserializer implements IDeserializer {
    private position: number = 0;

    constructor(private readonly buffer: Buffer) {
    }

    readUInt32(): number {
        this.checkBounds(4);
        const value = this.buffer.readUInt32LE(this.position);
        this.position += 4;
        return value;
    }

    readBuffer(): Buffer {
        const length = this.readUInt32();
        return this.readBytes(length);
    }

    readBytes(length: number): Buffer {
        this.checkBounds(length);
        const value = this.buffer.subarray(this.position, this.position + length);
        this.position += length;
        return value;
    }

    getPosition(): number {
        return this.position;
    }

    getRemainingBytes(): number {
        return this.buffer.length - this.position;
    }

    readBSON(): Record<string, unknown> {
        const bsonBuffer = this.readBuffer();
        const doc: Record<string, unknown> = bsonDeserialize(bsonBuffer, { promoteBuffers: true });
        return doc;
    }

    private checkBounds(bytesNeeded: number): void {
        if (this.position + bytesNeeded > this.buffer.length) {
            throw new Error(`Cannot read ${bytesNeeded} bytes at position ${this.position}. Buffer length: ${this.buffer.length}`);
        }
    }
}
