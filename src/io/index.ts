/**
 * Binary I/O module.
 *
 * Byte-level helpers plus the base58 text codec used for SS58 addresses.
 *
 * @packageDocumentation
 */

import * as base58 from './base58.js';

// Hex encoding/decoding
export { toHex, fromHex } from '../uint8array-utils.js';

// Utility functions
export { concat, equals, fromUtf8 } from '../uint8array-utils.js';

// Fixed-width little-endian writers
export {
    writeUInt8,
    writeUInt16LE,
    writeUInt32LE,
    writeUInt64LE,
    writeUInt128LE,
} from '../uint8array-utils.js';

export { base58 };
