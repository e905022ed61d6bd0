/**
 * Utilities for writing SCALE data types.
 *
 * @packageDocumentation
 */
import { ValueTooLargeError } from './errors.js';
import { COMPACT_MAX_BYTES } from './formats.js';
import type { UIntWidth } from './types.js';
import * as u8 from './uint8array-utils.js';

const COMPACT_SINGLE_BYTE_LIMIT = 1n << 6n;
const COMPACT_TWO_BYTE_LIMIT = 1n << 14n;
const COMPACT_FOUR_BYTE_LIMIT = 1n << 30n;

function bigIntByteLength(value: bigint): number {
    let length = 0;
    for (let rest = value; rest > 0n; rest >>= 8n) length++;
    return length;
}

/**
 * Number of bytes the compact encoding of `value` occupies.
 *
 * @throws ValueTooLargeError when `value` needs more than 67 payload bytes
 */
export function compactLength(value: bigint): number {
    if (value < COMPACT_SINGLE_BYTE_LIMIT) return 1;
    if (value < COMPACT_TWO_BYTE_LIMIT) return 2;
    if (value < COMPACT_FOUR_BYTE_LIMIT) return 4;

    const payload = Math.max(bigIntByteLength(value), 4);
    if (payload > COMPACT_MAX_BYTES) {
        throw new ValueTooLargeError(value, COMPACT_MAX_BYTES * 8);
    }
    return 1 + payload;
}

export class ByteWriter {
    public buffer: Uint8Array;
    public offset: number;

    constructor(buffer: Uint8Array, offset: number = 0) {
        if (!(buffer instanceof Uint8Array)) {
            throw new TypeError('buffer must be a Uint8Array');
        }
        if (typeof offset !== 'number' || offset < 0 || !Number.isInteger(offset)) {
            throw new TypeError('offset must be a non-negative integer');
        }
        this.buffer = buffer;
        this.offset = offset;
    }

    static withCapacity(size: number): ByteWriter {
        return new ByteWriter(new Uint8Array(size));
    }

    writeUInt8(value: number): void {
        this.offset = u8.writeUInt8(this.buffer, value, this.offset);
    }

    writeUInt16(value: number): void {
        this.offset = u8.writeUInt16LE(this.buffer, value, this.offset);
    }

    writeUInt32(value: number): void {
        this.offset = u8.writeUInt32LE(this.buffer, value, this.offset);
    }

    writeUInt64(value: bigint): void {
        this.offset = u8.writeUInt64LE(this.buffer, value, this.offset);
    }

    writeUInt128(value: bigint): void {
        this.offset = u8.writeUInt128LE(this.buffer, value, this.offset);
    }

    /** Range checks are the caller's; this only lays out the bytes. */
    writeUInt(value: bigint, width: UIntWidth): void {
        switch (width) {
            case 8:
                return this.writeUInt8(Number(value));
            case 16:
                return this.writeUInt16(Number(value));
            case 32:
                return this.writeUInt32(Number(value));
            case 64:
                return this.writeUInt64(value);
            case 128:
                return this.writeUInt128(value);
        }
    }

    /**
     * Writes `value` in SCALE compact form. The two low bits of the first
     * byte select the mode; the remaining bits carry the value, or in the
     * big-integer mode the payload length minus four.
     */
    writeCompact(value: bigint): void {
        if (value < COMPACT_SINGLE_BYTE_LIMIT) {
            this.writeUInt8(Number(value << 2n));
        } else if (value < COMPACT_TWO_BYTE_LIMIT) {
            this.writeUInt16(Number((value << 2n) | 0b01n));
        } else if (value < COMPACT_FOUR_BYTE_LIMIT) {
            this.writeUInt32(Number((value << 2n) | 0b10n));
        } else {
            const payload = compactLength(value) - 1;
            this.writeUInt8(((payload - 4) << 2) | 0b11);
            let rest = value;
            for (let i = 0; i < payload; i++) {
                this.writeUInt8(Number(rest & 0xffn));
                rest >>= 8n;
            }
        }
    }

    writeSlice(slice: Uint8Array): void {
        if (this.buffer.length < this.offset + slice.length) {
            throw new Error('Cannot write slice out of bounds');
        }
        this.buffer.set(slice, this.offset);
        this.offset += slice.length;
    }

    end(): Uint8Array {
        if (this.buffer.length === this.offset) {
            return this.buffer;
        }
        throw new Error(`buffer size ${this.buffer.length}, offset ${this.offset}`);
    }
}
