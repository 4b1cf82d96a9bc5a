import config from '../config.js';

const DECIMAL = /^-?\d+$/;

/**
 * Validates a decimal integer string (or bigint) against specified constraints
 * @param allowZero - Whether to allow zero value
 * @param allowNegative - Whether to allow negative values
 * @param maxValue - Largest accepted value, the 256-bit maximum by default
 */
export default function validateBigInt(
    value: unknown,
    allowZero = false,
    allowNegative = false,
    maxValue: bigint = config.maxValue
): boolean {
    let numValue: bigint;
    if (typeof value === 'bigint') {
        numValue = value;
    } else if (typeof value === 'string' && DECIMAL.test(value)) {
        numValue = BigInt(value);
    } else {
        return false;
    }

    if (!allowZero && numValue === 0n) return false;
    if (!allowNegative && numValue < 0n) return false;
    if (numValue > maxValue) return false;

    return true;
}
