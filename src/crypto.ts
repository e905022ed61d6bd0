/**
 * Hash functions used by the SS58 codec.
 *
 * @packageDocumentation
 */
import { blake2b } from '@noble/hashes/blake2.js';
import { SS58_CHECKSUM_PREFIX } from './formats.js';
import { concat } from './io/index.js';

/**
 * Unkeyed BLAKE2b with a 64-byte digest.
 */
export function blake2b512(data: Uint8Array): Uint8Array {
    return blake2b(data, { dkLen: 64 });
}

/**
 * First `length` bytes of `BLAKE2b-512("SS58PRE" || body)`.
 *
 * @param body - format prefix followed by the account id
 * @param length - checksum length, 1 to 8
 */
export function ss58Checksum(body: Uint8Array, length: number): Uint8Array {
    return blake2b512(concat([SS58_CHECKSUM_PREFIX, body])).slice(0, length);
}
