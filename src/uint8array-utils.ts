/**
 * Uint8Array utility functions for building wire-format byte sequences.
 * Uses DataView for the fixed-width little-endian writes.
 *
 * @packageDocumentation
 */

/**
 * Concatenates multiple Uint8Arrays into a single Uint8Array.
 *
 * @param arrays - Arrays to concatenate
 * @returns A new Uint8Array containing all input arrays
 *
 * @example
 * ```typescript
 * import { concat, fromHex } from 'ss58-scale-codec';
 *
 * const result = concat([fromHex('01'), fromHex('deadbeef')]);
 * // result is Uint8Array containing 01deadbeef
 * ```
 */
export function concat(arrays: Uint8Array[]): Uint8Array {
    const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
    const result = new Uint8Array(totalLength);
    let offset = 0;
    for (const arr of arrays) {
        result.set(arr, offset);
        offset += arr.length;
    }
    return result;
}

/**
 * Checks if two Uint8Arrays are equal.
 *
 * @returns True if arrays have the same length and contents
 */
export function equals(a: Uint8Array, b: Uint8Array): boolean {
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
        if (a[i] !== b[i]) return false;
    }
    return true;
}

/**
 * Converts a hex string to Uint8Array.
 *
 * @param hex - Hex string (with or without 0x prefix)
 * @throws Error if hex string is invalid
 *
 * @example
 * ```typescript
 * import { fromHex } from 'ss58-scale-codec';
 *
 * const bytes = fromHex('0xdeadbeef');
 * // bytes is Uint8Array [222, 173, 190, 239]
 * ```
 */
export function fromHex(hex: string): Uint8Array {
    if (hex.startsWith('0x') || hex.startsWith('0X')) {
        hex = hex.slice(2);
    }
    if (hex.length % 2 !== 0) {
        throw new Error('Invalid hex string: odd length');
    }
    const length = hex.length / 2;
    const result = new Uint8Array(length);
    for (let i = 0; i < length; i++) {
        const pair = hex.slice(i * 2, i * 2 + 2);
        if (!/^[0-9a-fA-F]{2}$/.test(pair)) {
            throw new Error(`Invalid hex character at position ${i * 2}`);
        }
        result[i] = parseInt(pair, 16);
    }
    return result;
}

const HEX_CHARS = '0123456789abcdef';

/**
 * Converts a Uint8Array to a lowercase hex string without prefix.
 */
export function toHex(bytes: Uint8Array): string {
    let result = '';
    for (let i = 0; i < bytes.length; i++) {
        result += HEX_CHARS[bytes[i] >> 4] + HEX_CHARS[bytes[i] & 0x0f];
    }
    return result;
}

const textEncoder = new TextEncoder();

/**
 * Encodes a string as UTF-8 bytes.
 *
 * @example
 * ```typescript
 * import { fromUtf8, toHex } from 'ss58-scale-codec';
 *
 * toHex(fromUtf8('SS58PRE')); // '53533538505245'
 * ```
 */
export function fromUtf8(str: string): Uint8Array {
    return textEncoder.encode(str);
}

// ============================================================================
// DataView-based write operations
// ============================================================================

/**
 * Creates a DataView for a Uint8Array at a given offset.
 * Handles alignment by creating a view at the correct buffer position.
 */
function getDataView(bytes: Uint8Array, offset: number, length: number): DataView {
    return new DataView(bytes.buffer, bytes.byteOffset + offset, length);
}

/**
 * Writes an 8-bit unsigned integer to a Uint8Array.
 *
 * @returns The offset after the written value (offset + 1)
 */
export function writeUInt8(bytes: Uint8Array, value: number, offset: number): number {
    bytes[offset] = value & 0xff;
    return offset + 1;
}

/**
 * Writes a 16-bit unsigned integer to a Uint8Array in little-endian format.
 *
 * @returns The offset after the written value (offset + 2)
 *
 * @example
 * ```typescript
 * const bytes = new Uint8Array(2);
 * writeUInt16LE(bytes, 256, 0);
 * toHex(bytes); // '0001'
 * ```
 */
export function writeUInt16LE(bytes: Uint8Array, value: number, offset: number): number {
    getDataView(bytes, offset, 2).setUint16(0, value, true);
    return offset + 2;
}

/**
 * Writes a 32-bit unsigned integer to a Uint8Array in little-endian format.
 *
 * @returns The offset after the written value (offset + 4)
 */
export function writeUInt32LE(bytes: Uint8Array, value: number, offset: number): number {
    getDataView(bytes, offset, 4).setUint32(0, value, true);
    return offset + 4;
}

/**
 * Writes a 64-bit unsigned integer to a Uint8Array in little-endian format from bigint.
 *
 * @returns The offset after the written value (offset + 8)
 *
 * @example
 * ```typescript
 * const bytes = new Uint8Array(8);
 * writeUInt64LE(bytes, 50000n, 0);
 * toHex(bytes); // '50c3000000000000'
 * ```
 */
export function writeUInt64LE(bytes: Uint8Array, value: bigint, offset: number): number {
    getDataView(bytes, offset, 8).setBigUint64(0, value, true);
    return offset + 8;
}

/**
 * Writes a 128-bit unsigned integer to a Uint8Array in little-endian format,
 * as the low 64-bit word followed by the high one.
 *
 * @returns The offset after the written value (offset + 16)
 */
export function writeUInt128LE(bytes: Uint8Array, value: bigint, offset: number): number {
    const low = value & 0xffffffffffffffffn;
    const high = value >> 64n;
    offset = writeUInt64LE(bytes, low, offset);
    return writeUInt64LE(bytes, high, offset);
}
