/**
 * Validates safe integers such as timestamps, deadlines and tiers.
 * Zero and negative values are refused unless allowed; `min` defaults to 0, or to
 * Number.MIN_SAFE_INTEGER when negatives are allowed.
 */
const validateInteger = (
    value: unknown,
    canBeZero = false,
    canBeNegative = false,
    max: number = Number.MAX_SAFE_INTEGER,
    min?: number
): value is number => {
    if (typeof value !== 'number' || !Number.isSafeInteger(value)) return false;
    if (value === 0 && !canBeZero) return false;
    if (value < 0 && !canBeNegative) return false;
    const lower = min ?? (canBeNegative ? Number.MIN_SAFE_INTEGER : 0);
    return value >= lower && value <= max;
};

export default validateInteger;
