import assert from 'assert';
import { describe, it } from 'node:test';

import {
    MAX_UINT256,
    convertBigIntsToStrings,
    formatTokenAmount,
    parseTokenAmount,
    toBigInt,
    toDbString,
    tokens,
} from '../src/utils/bigint.js';

describe('bigint utils', () => {
    it('toBigInt strips padding and handles empty values', () => {
        assert.strictEqual(toBigInt('000123'), 123n);
        assert.strictEqual(toBigInt('-0005'), -5n);
        assert.strictEqual(toBigInt(null), 0n);
        assert.strictEqual(toBigInt(undefined), 0n);
        assert.strictEqual(toBigInt(12.9), 12n);
    });

    it('toDbString pads to 78 digits', () => {
        assert.strictEqual(toDbString(5n), '5'.padStart(78, '0'));
        assert.strictEqual(toDbString(-5n), '-' + '5'.padStart(78, '0'));
        assert.strictEqual(toDbString(MAX_UINT256), MAX_UINT256.toString());
        assert.strictEqual(MAX_UINT256.toString().length, 78);
        assert.throws(() => toDbString(10n ** 78n), /too large/);
    });

    it('keeps lexicographic order equal to numeric order', () => {
        const values = [1000n, 9n, 10n ** 20n, 0n];
        const sorted = values.map(v => toDbString(v)).sort();
        assert.deepStrictEqual(sorted.map(s => toBigInt(s)), [0n, 9n, 1000n, 10n ** 20n]);
    });

    it('formats amounts with 18 decimals', () => {
        assert.strictEqual(formatTokenAmount(1012500000000000000000n), '1012.5');
        assert.strictEqual(formatTokenAmount(0n), '0');
        assert.strictEqual(formatTokenAmount(1n), '0.000000000000000001');
        assert.strictEqual(formatTokenAmount(-2500000000000000000n), '-2.5');
        assert.strictEqual(formatTokenAmount(1234n, 2), '12.34');
    });

    it('parses decimal amounts', () => {
        assert.strictEqual(parseTokenAmount('1000.5'), 1000500000000000000000n);
        assert.strictEqual(parseTokenAmount('1'), 10n ** 18n);
        assert.strictEqual(parseTokenAmount('.25', 2), 25n);
    });

    it('tokens converts whole tokens to raw units', () => {
        assert.strictEqual(tokens(1000), 1000n * 10n ** 18n);
        assert.strictEqual(tokens(3n, 6), 3_000_000n);
    });

    it('converts nested bigints to strings', () => {
        assert.deepStrictEqual(convertBigIntsToStrings({ a: 1n, b: [2n, 'x'], c: { d: 3n }, e: true }), {
            a: '1',
            b: ['2', 'x'],
            c: { d: '3' },
            e: true,
        });
    });
});
