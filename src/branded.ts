/**
 * Branded type definitions for type-safe primitives.
 *
 * @packageDocumentation
 */

declare const __brand: unique symbol;
export type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** A fixed 20-byte address, as carried by the remote chain's `H160` fields. */
export type Bytes20 = Brand<Uint8Array, 'Bytes20'>;
/** Account id bytes recovered from an SS58 address, checksum and format stripped. */
export type AccountId = Brand<Uint8Array, 'AccountId'>;
