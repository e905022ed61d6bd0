import * as formats from './formats.js';
import * as scale from './scale.js';
import * as ss58 from './ss58.js';

export * as formats from './formats.js';
export * as scale from './scale.js';
export * as ss58 from './ss58.js';

export * from './scale.js';
export * from './ss58.js';
export * from './errors.js';
export { ByteWriter } from './bufferutils.js';
export { blake2b512, ss58Checksum } from './crypto.js';
export { concat, equals, fromHex, fromUtf8, toHex } from './io/index.js';
export {
    ACCOUNT_ID_LENGTHS,
    RESERVED_FORMATS,
    SS58_CHECKSUM_PREFIX,
    SS58_FORMAT_MAX,
    STRING_MAX_LENGTH,
    isSs58Format,
} from './formats.js';

export { isBytes20, toBytes20, isAccountId, toAccountId } from './types.js';
export type { AccountId, Bytes20, UIntWidth } from './types.js';

const codec = {
    formats,
    scale,
    ss58,
};

export default codec;
