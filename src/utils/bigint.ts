import config from '../config.js';

// 2^256 - 1 has 78 digits; every stored quantity fits in this width
const MAX_INTEGER_LENGTH = 78;

export const MAX_UINT256 = (1n << 256n) - 1n;

/**
 * Convert a value to BigInt, handling null, undefined, and string inputs
 */
export function toBigInt(value: string | bigint | number | null | undefined): bigint {
    if (value === null || value === undefined) return BigInt(0);
    if (typeof value === 'bigint') return value;
    if (typeof value === 'number') return BigInt(Math.floor(value));
    if (value.startsWith('-')) return -toBigInt(value.slice(1));
    // Remove padding before converting to BigInt
    return BigInt(value.replace(/^0+/, '') || '0');
}

/**
 * Convert a value to a zero-padded string suitable for database storage.
 * Padding keeps lexicographical order equal to numeric order in MongoDB.
 */
export function toDbString(value: number | string | bigint, padLength = MAX_INTEGER_LENGTH): string {
    const bigValue = toBigInt(value);
    const isNegative = bigValue < 0n;
    const absStr = (isNegative ? -bigValue : bigValue).toString();

    if (absStr.length > padLength) {
        throw new Error(`Value ${value} too large to fit in padLength=${padLength}`);
    }

    const padded = absStr.padStart(padLength, '0');
    return isNegative ? '-' + padded : padded;
}

/**
 * Format a raw token amount with the token's decimal places, trimming trailing zeros.
 */
export function formatTokenAmount(value: bigint, decimals: number = config.decimals): string {
    if (value < 0n) return '-' + formatTokenAmount(-value, decimals);
    if (decimals === 0) return value.toString();
    const str = value.toString().padStart(decimals + 1, '0');
    const integerPart = str.slice(0, -decimals) || '0';
    const decimalPart = str.slice(-decimals);

    const trimmedDecimal = decimalPart.replace(/0+$/, '');
    return trimmedDecimal ? `${integerPart}.${trimmedDecimal}` : integerPart;
}

/**
 * Parse a decimal token amount string ("1000.5") into raw units.
 * Digits beyond the token's precision are dropped.
 */
export function parseTokenAmount(value: string, decimals: number = config.decimals): bigint {
    const [integerPart = '0', decimalPart = ''] = value.split('.');
    const paddedDecimal = decimalPart.padEnd(decimals, '0').slice(0, decimals);
    return BigInt((integerPart || '0') + paddedDecimal);
}

/**
 * Whole tokens to raw units, e.g. tokens(1000n) === 1000n * 10n ** 18n
 */
export function tokens(amount: bigint | number, decimals: number = config.decimals): bigint {
    return BigInt(amount) * 10n ** BigInt(decimals);
}

/**
 * Recursively convert bigint values to decimal strings so the result can go through JSON.stringify
 */
export function convertBigIntsToStrings<T>(obj: T): unknown {
    if (typeof obj === 'bigint') return obj.toString();
    if (Array.isArray(obj)) return obj.map(item => convertBigIntsToStrings(item));
    if (obj !== null && typeof obj === 'object') {
        const out: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(obj)) {
            out[key] = convertBigIntsToStrings(value);
        }
        return out;
    }
    return obj;
}
