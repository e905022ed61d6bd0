/**
 * SS58 format identifiers and the codec's fixed limits.
 *
 * @packageDocumentation
 */
import { fromUtf8 } from './uint8array-utils.js';

// Well-known SS58 format identifiers
export const polkadot = 0;
export const kusama = 2;
/** Generic Substrate format, used by development chains. */
export const generic = 42;

/** Largest identifier a two-byte format prefix can carry (14 bits). */
export const SS58_FORMAT_MAX = 0x3fff;

/** Reserved identifiers, rejected in either direction. */
export const RESERVED_FORMATS: ReadonlySet<number> = new Set([46, 47]);

/** Bytes hashed ahead of the address body when deriving its checksum. */
export const SS58_CHECKSUM_PREFIX = fromUtf8('SS58PRE');

/** Account id lengths of public-key addresses; shorter payloads are account indices. */
export const ACCOUNT_ID_LENGTHS: ReadonlySet<number> = new Set([32, 33]);

/** Longest string the single-byte compact length prefix can describe. */
export const STRING_MAX_LENGTH = 63;

/** Longest payload of a big-integer compact value. */
export const COMPACT_MAX_BYTES = 67;

export function isSs58Format(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= SS58_FORMAT_MAX;
}
