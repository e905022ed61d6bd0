/**
 * SS58 address decode and encode tools.
 *
 * An SS58 address is the base58 form of
 * `format prefix (1 or 2 bytes) || account id || checksum (1 to 8 bytes)`,
 * where the checksum is the head of `BLAKE2b-512("SS58PRE" || prefix || account id)`.
 *
 * @packageDocumentation
 */
import { ss58Checksum } from './crypto.js';
import {
    FormatMismatchError,
    InvalidAddressLengthError,
    InvalidChecksumError,
    ReservedFormatError,
    isCodecError,
} from './errors.js';
import { ACCOUNT_ID_LENGTHS, RESERVED_FORMATS, SS58_FORMAT_MAX, isSs58Format } from './formats.js';
import { base58, concat, equals, toHex } from './io/index.js';
import { encodeOptional } from './scale.js';
import { assertType, toAccountId, type AccountId } from './types.js';

/** Format prefix parsed from the head of a raw address. */
export interface FormatPrefix {
    /** bytes the prefix occupies */
    length: 1 | 2;
    /** format identifier, 0 to 16383 */
    value: number;
}

/** SS58 decode result */
export interface Ss58DecodeResult {
    /** format identifier of the network the address belongs to */
    format: number;
    /** account id (or account index) bytes */
    accountId: AccountId;
}

/**
 * Options for decoding an SS58 address.
 */
export interface DecodeOptions {
    /**
     * Format the address must carry. Addresses of any other format are
     * rejected with FormatMismatchError. Any format is accepted if omitted.
     */
    format?: number;
    /**
     * Optional callback for addresses whose payload is an account index
     * rather than a 32- or 33-byte account id.
     * If not provided, no warning is emitted.
     */
    onWarning?: (warning: string) => void;
}

type ChecksumRule = readonly [matches: (total: number, prefixLength: number) => boolean, checksumLength: number];

const lengthIn =
    (...totals: number[]) =>
    (total: number): boolean =>
        totals.includes(total);

/** Checksum length by raw address length, first match wins. */
const CHECKSUM_RULES: readonly ChecksumRule[] = [
    [lengthIn(3, 4, 6, 10), 1],
    [(total, prefixLength) => [5, 7, 11, 34 + prefixLength, 35 + prefixLength].includes(total), 2],
    [lengthIn(8, 12), 3],
    [lengthIn(9, 13), 4],
    [lengthIn(14), 5],
    [lengthIn(15), 6],
    [lengthIn(16), 7],
    [lengthIn(17), 8],
];

const MAX_CHECKSUM_LENGTH = 8;

function lookupChecksumLength(total: number, prefixLength: number): number | undefined {
    return CHECKSUM_RULES.find(([matches]) => matches(total, prefixLength))?.[1];
}

/**
 * Checksum length carried by a raw address of `total` bytes.
 *
 * @param total - raw (base58-decoded) address length
 * @param prefixLength - length of its format prefix
 * @throws InvalidAddressLengthError if no checksum length applies to `total`
 */
export function checksumLengthFor(total: number, prefixLength: number): number {
    const checksumLength = lookupChecksumLength(total, prefixLength);
    if (checksumLength === undefined) {
        throw new InvalidAddressLengthError(total);
    }
    return checksumLength;
}

/**
 * Reads the format prefix. Bit 6 of the first byte selects the two-byte form,
 * whose 14-bit identifier is split across both bytes.
 */
export function decodeFormatPrefix(raw: Uint8Array): FormatPrefix {
    if (raw.length === 0) {
        throw new InvalidAddressLengthError(0);
    }

    const first = raw[0];
    if ((first & 0x40) === 0) {
        return { length: 1, value: first };
    }

    if (raw.length < 2) {
        throw new InvalidAddressLengthError(raw.length);
    }
    const second = raw[1];
    return {
        length: 2,
        value: ((first & 0x3f) << 2) | (second >> 6) | ((second & 0x3f) << 8),
    };
}

/**
 * Inverse of {@link decodeFormatPrefix}: one byte below 64, two bytes above.
 */
export function encodeFormatPrefix(format: number): Uint8Array {
    assertType(isSs58Format(format), `Expected SS58 format between 0 and ${SS58_FORMAT_MAX}, got ${format}`);
    if (RESERVED_FORMATS.has(format)) throw new ReservedFormatError(format);

    if (format < 64) {
        return Uint8Array.of(format);
    }
    return Uint8Array.of(((format & 0xfc) >> 2) | 0x40, (format >> 8) | ((format & 0x03) << 6));
}

/**
 * Decodes an SS58 address into its format and account id, verifying
 * the structure and checksum.
 *
 * @throws Base58DecodeError if `address` is not base58
 * @throws ReservedFormatError if the format is 46 or 47
 * @throws FormatMismatchError if `options.format` is set and differs
 * @throws InvalidAddressLengthError if the decoded length has no checksum length
 * @throws InvalidChecksumError if the embedded checksum does not match
 */
export function decodeAddress(address: string, options: DecodeOptions = {}): Ss58DecodeResult {
    const raw = base58.decode(address);
    const prefix = decodeFormatPrefix(raw);

    if (RESERVED_FORMATS.has(prefix.value)) {
        throw new ReservedFormatError(prefix.value);
    }
    if (options.format !== undefined && options.format !== prefix.value) {
        throw new FormatMismatchError(options.format, prefix.value);
    }

    const checksumLength = checksumLengthFor(raw.length, prefix.length);
    const bodyEnd = raw.length - checksumLength;
    const expected = ss58Checksum(raw.subarray(0, bodyEnd), checksumLength);
    const actual = raw.subarray(bodyEnd);
    if (!equals(expected, actual)) {
        throw new InvalidChecksumError(toHex(expected), toHex(actual));
    }

    const accountId = toAccountId(raw.slice(prefix.length, bodyEnd));
    if (options.onWarning && !ACCOUNT_ID_LENGTHS.has(accountId.length)) {
        options.onWarning(
            `${address} carries a ${accountId.length}-byte account index, not a 32- or 33-byte account id`,
        );
    }

    return { format: prefix.value, accountId };
}

/**
 * Decodes an SS58 address to the account id bytes the remote chain expects.
 */
export function decodeSs58(address: string, options?: DecodeOptions): AccountId {
    return decodeAddress(address, options).accountId;
}

/**
 * Decodes an optional SS58 address: `0x00` for an empty or absent address,
 * else `0x01` followed by the account id.
 */
export function decodeOptionalSs58(address: string | null | undefined, options?: DecodeOptions): Uint8Array {
    return encodeOptional(address === '' ? undefined : address, (value) => decodeSs58(value, options));
}

/**
 * Encodes an account id with the given format into an SS58 address.
 * The checksum length is the shortest one {@link decodeAddress} reads back
 * for the resulting length.
 *
 * @throws ReservedFormatError if `format` is 46 or 47
 * @throws InvalidAddressLengthError if no checksum length fits `accountId`
 */
export function encodeAddress(accountId: Uint8Array, format: number): string {
    const prefix = encodeFormatPrefix(format);

    let checksumLength: number | undefined;
    for (let candidate = 1; candidate <= MAX_CHECKSUM_LENGTH; candidate++) {
        const total = prefix.length + accountId.length + candidate;
        if (lookupChecksumLength(total, prefix.length) === candidate) {
            checksumLength = candidate;
            break;
        }
    }
    if (checksumLength === undefined) {
        throw new InvalidAddressLengthError(
            accountId.length,
            `No checksum length fits a ${accountId.length}-byte account id behind a ${prefix.length}-byte format`,
        );
    }

    const body = concat([prefix, accountId]);
    return base58.encode(concat([body, ss58Checksum(body, checksumLength)]));
}

/**
 * Checks whether `address` decodes under `options`.
 */
export function isValidAddress(address: string, options?: DecodeOptions): boolean {
    try {
        decodeAddress(address, options);
        return true;
    } catch (e) {
        if (isCodecError(e)) return false;
        throw e;
    }
}
