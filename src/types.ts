/**
 * Type guards, width limits and assertion helpers shared by the encoders.
 *
 * @packageDocumentation
 */
import type { AccountId, Bytes20 } from './branded.js';

export type { AccountId, Bytes20 } from './branded.js';

// ============================================================================
// Widths
// ============================================================================

/** Bit widths of the fixed-size unsigned integers the encoder writes. */
export type UIntWidth = 8 | 16 | 32 | 64 | 128;

export const UINT_WIDTHS: readonly UIntWidth[] = [8, 16, 32, 64, 128];

/**
 * Largest value representable in `width` bits.
 */
export function uintMax(width: number): bigint {
    return (1n << BigInt(width)) - 1n;
}

// ============================================================================
// Type Guards
// ============================================================================

export function isUInt53(value: unknown): value is number {
    return (
        typeof value === 'number' &&
        globalThis.Number.isInteger(value) &&
        value >= 0 &&
        value <= globalThis.Number.MAX_SAFE_INTEGER
    );
}

export function isUIntWidth(value: unknown): value is UIntWidth {
    return UINT_WIDTHS.some((width) => width === value);
}

export function isBytes20(value: unknown): value is Bytes20 {
    return value instanceof Uint8Array && value.length === 20;
}

/** Account ids carry no length of their own; the SS58 checksum table decides it. */
export function isAccountId(value: unknown): value is AccountId {
    return value instanceof Uint8Array;
}

// ============================================================================
// Conversions
// ============================================================================

export function toBytes20(value: Uint8Array): Bytes20 {
    if (!isBytes20(value)) {
        throw new TypeError(`Expected 20-byte Uint8Array, got ${value.length} bytes`);
    }
    return value;
}

export function toAccountId(value: Uint8Array): AccountId {
    if (!isAccountId(value)) {
        throw new TypeError('Expected account id as a Uint8Array');
    }
    return value;
}

/**
 * Normalizes a caller-supplied unsigned integer to a bigint.
 * Numbers must be safe integers; neither form may be negative.
 */
export function toUnsignedBigInt(value: bigint | number): bigint {
    if (typeof value === 'bigint') {
        if (value < 0n) {
            throw new TypeError(`Expected a non-negative integer, got ${value}`);
        }
        return value;
    }
    if (!isUInt53(value)) {
        throw new TypeError(`Expected a non-negative safe integer, got ${value}`);
    }
    return BigInt(value);
}

// ============================================================================
// Assertion Helpers
// ============================================================================

export function assertType(condition: boolean, message: string): asserts condition {
    if (!condition) {
        throw new TypeError(message);
    }
}
