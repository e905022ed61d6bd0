/**
 * Base58 encoding/decoding using @scure/base.
 *
 * SS58 addresses use the Bitcoin alphabet without the base58check
 * double-SHA-256 trailer; the checksum is verified by the SS58 decoder.
 *
 * @packageDocumentation
 */

import { base58 } from '@scure/base';
import { Base58DecodeError } from '../errors.js';

/**
 * Encode a Uint8Array to a base58 string.
 * @param data - The data to encode
 * @returns The base58 encoded string
 */
export function encode(data: Uint8Array): string {
    return base58.encode(data);
}

/**
 * Decode a base58 string to a Uint8Array.
 * @param str - The base58 encoded string
 * @returns The decoded data
 * @throws Base58DecodeError if the string holds a character outside the alphabet
 */
export function decode(str: string): Uint8Array {
    try {
        return base58.decode(str);
    } catch (e) {
        throw new Base58DecodeError(e);
    }
}
