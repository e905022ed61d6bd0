/**
 * Errors raised by the SCALE encoders and the SS58 decoder.
 *
 * Every failure is final: the input is malformed or adversarial and retrying
 * the same call cannot succeed. Callers branch on `code` or `instanceof`.
 *
 * @packageDocumentation
 */

export type CodecErrorCode =
    | 'VALUE_TOO_LARGE'
    | 'STRING_TOO_LONG'
    | 'RESERVED_FORMAT'
    | 'FORMAT_MISMATCH'
    | 'INVALID_ADDRESS_LENGTH'
    | 'INVALID_CHECKSUM'
    | 'BASE58_DECODE';

export abstract class CodecError extends Error {
    abstract readonly code: CodecErrorCode;

    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class ValueTooLargeError extends CodecError {
    readonly code = 'VALUE_TOO_LARGE';

    constructor(
        readonly value: bigint,
        readonly width: number,
    ) {
        super(`Value ${value} does not fit in ${width} bits`);
    }
}

export class StringTooLongError extends CodecError {
    readonly code = 'STRING_TOO_LONG';

    constructor(
        readonly length: number,
        readonly max: number,
    ) {
        super(`String of ${length} bytes exceeds the ${max}-byte limit`);
    }
}

export class ReservedFormatError extends CodecError {
    readonly code = 'RESERVED_FORMAT';

    constructor(readonly format: number) {
        super(`${format} is a reserved SS58 format`);
    }
}

export class FormatMismatchError extends CodecError {
    readonly code = 'FORMAT_MISMATCH';

    constructor(
        readonly expected: number,
        readonly actual: number,
    ) {
        super(`Expected SS58 format ${expected}, got ${actual}`);
    }
}

export class InvalidAddressLengthError extends CodecError {
    readonly code = 'INVALID_ADDRESS_LENGTH';

    constructor(
        readonly length: number,
        message: string = `Invalid address length: ${length} bytes`,
    ) {
        super(message);
    }
}

export class InvalidChecksumError extends CodecError {
    readonly code = 'INVALID_CHECKSUM';

    /**
     * @param expected - hex of the checksum computed from the address body
     * @param actual - hex of the checksum embedded in the address
     */
    constructor(
        readonly expected: string,
        readonly actual: string,
    ) {
        super(`Invalid checksum: expected ${expected}, got ${actual}`);
    }
}

/** Wraps a base58 library failure, kept unchanged as `cause`. */
export class Base58DecodeError extends CodecError {
    readonly code = 'BASE58_DECODE';

    constructor(cause: unknown) {
        super(`Invalid base58: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    }
}

export function isCodecError(value: unknown): value is CodecError {
    return value instanceof CodecError;
}
