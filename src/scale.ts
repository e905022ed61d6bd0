/**
 * SCALE encoders for the primitives handed to the remote chain: fixed-width
 * unsigned integers, compact integers, short strings, 20-byte addresses and
 * optional values.
 *
 * @packageDocumentation
 */
import { ByteWriter, compactLength as compactByteLength } from './bufferutils.js';
import { StringTooLongError, ValueTooLargeError } from './errors.js';
import { STRING_MAX_LENGTH } from './formats.js';
import { fromUtf8 } from './io/index.js';
import { assertType, isUIntWidth, toBytes20, toUnsignedBigInt, uintMax, type UIntWidth } from './types.js';

const OPTION_NONE = 0x00;
const OPTION_SOME = 0x01;

/**
 * Encodes an unsigned integer as exactly `width / 8` little-endian bytes.
 *
 * @param value - non-negative integer; numbers must be safe integers
 * @param width - target width in bits
 * @throws ValueTooLargeError if `value` does not fit in `width` bits
 *
 * @example
 * ```typescript
 * import { encodeUnsigned, toHex } from 'ss58-scale-codec';
 *
 * toHex(encodeUnsigned(1n, 32)); // '01000000'
 * ```
 */
export function encodeUnsigned(value: bigint | number, width: UIntWidth): Uint8Array {
    assertType(isUIntWidth(width), `Expected width of 8, 16, 32, 64 or 128 bits, got ${width}`);
    const n = toUnsignedBigInt(value);
    if (n > uintMax(width)) {
        throw new ValueTooLargeError(n, width);
    }

    const writer = ByteWriter.withCapacity(width / 8);
    writer.writeUInt(n, width);
    return writer.end();
}

/**
 * Number of bytes `encodeCompact(value)` produces.
 */
export function compactLength(value: bigint | number): number {
    return compactByteLength(toUnsignedBigInt(value));
}

/**
 * Encodes an unsigned integer in SCALE compact form (1, 2, 4 or 5 to 68 bytes).
 *
 * @throws ValueTooLargeError if `value` is 2^536 or more
 */
export function encodeCompact(value: bigint | number): Uint8Array {
    const n = toUnsignedBigInt(value);
    const writer = ByteWriter.withCapacity(compactByteLength(n));
    writer.writeCompact(n);
    return writer.end();
}

/**
 * Encodes `text` as a single-byte compact length followed by its UTF-8 bytes.
 *
 * The length counts UTF-8 bytes and is limited to 63, the largest value the
 * single-byte compact mode holds.
 *
 * @throws StringTooLongError if the UTF-8 form is longer than 63 bytes
 */
export function encodeString(text: string): Uint8Array {
    const bytes = fromUtf8(text);
    if (bytes.length > STRING_MAX_LENGTH) {
        throw new StringTooLongError(bytes.length, STRING_MAX_LENGTH);
    }

    const writer = ByteWriter.withCapacity(1 + bytes.length);
    writer.writeCompact(BigInt(bytes.length));
    writer.writeSlice(bytes);
    return writer.end();
}

/**
 * Returns the 20 address bytes as they go on the wire: unchanged.
 */
export function encodeFixedAddress(address: Uint8Array): Uint8Array {
    return toBytes20(address).slice();
}

/**
 * Encodes an optional value: `0x00` when absent, else `0x01` followed by
 * `encode(value)`.
 */
export function encodeOptional<T>(value: T | null | undefined, encode: (value: T) => Uint8Array): Uint8Array {
    if (value === null || value === undefined) {
        return Uint8Array.of(OPTION_NONE);
    }

    const inner = encode(value);
    const writer = ByteWriter.withCapacity(1 + inner.length);
    writer.writeUInt8(OPTION_SOME);
    writer.writeSlice(inner);
    return writer.end();
}

export function encodeOptionalFixedAddress(address?: Uint8Array | null): Uint8Array {
    return encodeOptional(address, encodeFixedAddress);
}
