import assert from 'assert';
import { base58 } from '@scure/base';
import { describe, it } from 'vitest';

import {
    Base58DecodeError,
    FormatMismatchError,
    InvalidAddressLengthError,
    InvalidChecksumError,
    ReservedFormatError,
    checksumLengthFor,
    decodeAddress,
    decodeFormatPrefix,
    decodeOptionalSs58,
    decodeSs58,
    encodeAddress,
    encodeFormatPrefix,
    formats,
    isValidAddress,
} from '../src/index.js';
import { fromHex, toHex } from '../src/io/index.js';

import fixtures from './fixtures/ss58.json' with { type: 'json' };

const SAMPLE = '5GKWfWMDt1BdvT9Bj2KpUC7zLmK3hJJpaCTJ7naSLeFw5eJc';
const SAMPLE_ACCOUNT_ID = 'bc3bf00fe1154dd46bef2fe43a2a671c48df7738a734d3006442230039905252';
const SAMPLE_MUTATED = '5GKWfWMDt1BdvT9Bj2KpUC7zLmK3hJJpaCTJ7naSLeFw5eJd';

describe('SS58', () => {
    describe('decodeFormatPrefix', () => {
        it('reads a one-byte prefix when bit 6 is clear', () => {
            assert.deepStrictEqual(decodeFormatPrefix(fromHex('2a00')), { length: 1, value: 42 });
            assert.deepStrictEqual(decodeFormatPrefix(fromHex('3f')), { length: 1, value: 63 });
        });

        it('reads a two-byte prefix at the boundaries', () => {
            assert.deepStrictEqual(decodeFormatPrefix(fromHex('5000')), { length: 2, value: 64 });
            assert.deepStrictEqual(decodeFormatPrefix(fromHex('4001')), { length: 2, value: 256 });
            assert.deepStrictEqual(decodeFormatPrefix(fromHex('7fff')), { length: 2, value: 16383 });
        });

        it('keeps the bits above the low byte', () => {
            assert.deepStrictEqual(decodeFormatPrefix(fromHex('4b80')), { length: 2, value: 46 });
            const { value } = decodeFormatPrefix(encodeFormatPrefix(1284));
            assert.strictEqual(value, 1284);
        });

        it('rejects input shorter than its prefix', () => {
            assert.throws(() => decodeFormatPrefix(new Uint8Array(0)), InvalidAddressLengthError);
            assert.throws(() => decodeFormatPrefix(fromHex('40')), InvalidAddressLengthError);
        });
    });

    describe('encodeFormatPrefix', () => {
        it('writes one byte below 64 and two from 64 up', () => {
            assert.strictEqual(toHex(encodeFormatPrefix(0)), '00');
            assert.strictEqual(toHex(encodeFormatPrefix(63)), '3f');
            assert.strictEqual(toHex(encodeFormatPrefix(64)), '5000');
            assert.strictEqual(toHex(encodeFormatPrefix(16383)), '7fff');
        });

        it('round-trips every non-reserved format', () => {
            for (let format = 0; format <= 16383; format++) {
                if (format === 46 || format === 47) continue;
                const prefix = decodeFormatPrefix(encodeFormatPrefix(format));
                assert.strictEqual(prefix.value, format);
                assert.strictEqual(prefix.length, format < 64 ? 1 : 2);
            }
        });

        it('rejects reserved and out-of-range formats', () => {
            assert.throws(() => encodeFormatPrefix(46), ReservedFormatError);
            assert.throws(() => encodeFormatPrefix(47), ReservedFormatError);
            assert.throws(() => encodeFormatPrefix(16384), TypeError);
            assert.throws(() => encodeFormatPrefix(-1), TypeError);
            assert.throws(() => encodeFormatPrefix(1.5), TypeError);
        });
    });

    describe('checksumLengthFor', () => {
        const buckets: [total: number, prefixLength: number, checksumLength: number][] = [
            [3, 1, 1],
            [4, 1, 1],
            [6, 1, 1],
            [10, 1, 1],
            [5, 1, 2],
            [7, 1, 2],
            [11, 1, 2],
            [35, 1, 2],
            [36, 1, 2],
            [36, 2, 2],
            [37, 2, 2],
            [8, 1, 3],
            [12, 1, 3],
            [9, 1, 4],
            [13, 1, 4],
            [14, 1, 5],
            [15, 1, 6],
            [16, 1, 7],
            [17, 1, 8],
        ];

        it('maps every known length to its checksum length', () => {
            for (const [total, prefixLength, checksumLength] of buckets) {
                assert.strictEqual(checksumLengthFor(total, prefixLength), checksumLength, `${total}/${prefixLength}`);
            }
        });

        it('rejects every other length', () => {
            const invalid: [number, number][] = [
                [0, 1],
                [1, 1],
                [2, 1],
                [18, 1],
                [34, 1],
                [37, 1],
                [35, 2],
                [38, 2],
                [100, 1],
            ];
            for (const [total, prefixLength] of invalid) {
                assert.throws(
                    () => checksumLengthFor(total, prefixLength),
                    (e: unknown) => e instanceof InvalidAddressLengthError && e.length === total,
                );
            }
        });
    });

    describe('decodeAddress', () => {
        for (const f of fixtures.valid) {
            it(`decodes ${f.description}`, () => {
                const raw = base58.decode(f.address);
                assert.strictEqual(raw.length, f.rawLength);

                const result = decodeAddress(f.address);
                assert.strictEqual(result.format, f.format);
                assert.strictEqual(toHex(result.accountId), f.accountId);

                const prefixLength = decodeFormatPrefix(raw).length;
                assert.strictEqual(result.accountId.length, f.rawLength - prefixLength - f.checksumLength);
            });
        }

        it('decodes the 32-byte account id of a generic address', () => {
            const accountId = decodeSs58(SAMPLE);
            assert.strictEqual(accountId.length, 32);
            assert.strictEqual(toHex(accountId), SAMPLE_ACCOUNT_ID);
        });

        it('reports both checksums when the last character changes', () => {
            assert.throws(
                () => decodeSs58(SAMPLE_MUTATED),
                (e: unknown) =>
                    e instanceof InvalidChecksumError &&
                    e.code === 'INVALID_CHECKSUM' &&
                    e.expected === '38b1' &&
                    e.actual === '38b2',
            );
        });

        it('rejects a single flipped bit anywhere in the raw address', () => {
            const raw = base58.decode(SAMPLE);
            for (let i = 0; i < raw.length; i++) {
                const mutated = raw.slice();
                mutated[i] ^= 0x01;
                assert.throws(() => decodeAddress(base58.encode(mutated)), InvalidChecksumError, `byte ${i}`);
            }
        });

        for (const f of fixtures.invalid.reserved) {
            it(`rejects reserved format ${f.format} despite a valid checksum`, () => {
                assert.throws(
                    () => decodeAddress(f.address),
                    (e: unknown) => e instanceof ReservedFormatError && e.format === f.format,
                );
            });
        }

        for (const f of fixtures.invalid.length) {
            it(`rejects ${f.rawLength} raw bytes as an invalid length`, () => {
                assert.throws(
                    () => decodeAddress(f.address),
                    (e: unknown) => e instanceof InvalidAddressLengthError && e.length === f.rawLength,
                );
            });
        }

        for (const f of fixtures.invalid.checksum) {
            it(`rejects a checksum mismatch in ${f.address}`, () => {
                assert.throws(() => decodeAddress(f.address), InvalidChecksumError);
            });
        }

        for (const f of fixtures.invalid.base58) {
            it(`rejects non-base58 input ${f.address}`, () => {
                assert.throws(
                    () => decodeAddress(f.address),
                    (e: unknown) => e instanceof Base58DecodeError && e.cause instanceof Error,
                );
            });
        }

        it('rejects an empty string as an invalid length', () => {
            assert.throws(
                () => decodeAddress(''),
                (e: unknown) => e instanceof InvalidAddressLengthError && e.length === 0,
            );
        });

        it('accepts the expected format', () => {
            assert.strictEqual(decodeAddress(SAMPLE, { format: formats.generic }).format, 42);
        });

        it('rejects a format other than the expected one', () => {
            assert.throws(
                () => decodeAddress(SAMPLE, { format: formats.polkadot }),
                (e: unknown) => e instanceof FormatMismatchError && e.expected === 0 && e.actual === 42,
            );
        });

        it('reports a reserved format before a format mismatch', () => {
            const [reserved] = fixtures.invalid.reserved;
            assert.throws(() => decodeAddress(reserved.address, { format: formats.polkadot }), ReservedFormatError);
        });

        it('warns about account indices when asked to', () => {
            const warnings: string[] = [];
            const result = decodeAddress('NC8fzzqy', { onWarning: (w) => warnings.push(w) });

            assert.strictEqual(toHex(result.accountId), '8e7c4a74');
            assert.deepStrictEqual(warnings, [
                'NC8fzzqy carries a 4-byte account index, not a 32- or 33-byte account id',
            ]);
        });

        it('does not warn about 32-byte account ids', () => {
            const warnings: string[] = [];
            decodeAddress(SAMPLE, { onWarning: (w) => warnings.push(w) });
            assert.deepStrictEqual(warnings, []);
        });
    });

    describe('decodeOptionalSs58', () => {
        it('encodes an empty address as none', () => {
            assert.deepStrictEqual(decodeOptionalSs58(''), Uint8Array.of(0));
            assert.deepStrictEqual(decodeOptionalSs58(undefined), Uint8Array.of(0));
        });

        it('tags a present address', () => {
            assert.strictEqual(toHex(decodeOptionalSs58(SAMPLE)), '01' + SAMPLE_ACCOUNT_ID);
        });

        it('propagates decode failures', () => {
            assert.throws(() => decodeOptionalSs58(SAMPLE_MUTATED), InvalidChecksumError);
            assert.throws(() => decodeOptionalSs58(SAMPLE, { format: formats.kusama }), FormatMismatchError);
        });
    });

    describe('encodeAddress', () => {
        for (const f of fixtures.encode) {
            it(`encodes a ${f.accountId.length / 2}-byte account id with format ${f.format}`, () => {
                const address = encodeAddress(fromHex(f.accountId), f.format);
                assert.strictEqual(address, f.address);

                const decoded = decodeAddress(address);
                assert.strictEqual(decoded.format, f.format);
                assert.strictEqual(toHex(decoded.accountId), f.accountId);
            });
        }

        it('reproduces decoded public-key addresses', () => {
            for (const f of fixtures.valid.filter((v) => v.accountId.length >= 64)) {
                const { accountId, format } = decodeAddress(f.address);
                assert.strictEqual(encodeAddress(accountId, format), f.address, f.description);
            }
        });

        it('rejects payloads no checksum length fits', () => {
            assert.throws(
                () => encodeAddress(fromHex('0102'), 16383),
                (e: unknown) => e instanceof InvalidAddressLengthError && e.length === 2,
            );
            assert.throws(() => encodeAddress(new Uint8Array(18), formats.generic), InvalidAddressLengthError);
        });

        it('rejects reserved formats', () => {
            assert.throws(() => encodeAddress(new Uint8Array(32), 47), ReservedFormatError);
        });
    });

    describe('isValidAddress', () => {
        it('accepts valid addresses', () => {
            assert.strictEqual(isValidAddress(SAMPLE), true);
            assert.strictEqual(isValidAddress(SAMPLE, { format: formats.generic }), true);
        });

        it('rejects invalid ones without throwing', () => {
            assert.strictEqual(isValidAddress(SAMPLE_MUTATED), false);
            assert.strictEqual(isValidAddress('not-an-address'), false);
            assert.strictEqual(isValidAddress(SAMPLE, { format: formats.polkadot }), false);
        });

        it('lets errors from the warning callback through', () => {
            const boom = new Error('callback failed');
            assert.throws(
                () =>
                    isValidAddress('NC8fzzqy', {
                        onWarning: () => {
                            throw boom;
                        },
                    }),
                (e: unknown) => e === boom,
            );
        });
    });
});
