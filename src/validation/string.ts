/**
 * Validates strings like account names, stake ids and signatures.
 * Every character must be in `allowedChars`; characters other than the first and last may
 * also come from `allowedCharsMiddle`.
 */
const validateString = (
    value: unknown,
    maxLength: number = Number.MAX_SAFE_INTEGER,
    minLength = 0,
    allowedChars?: string,
    allowedCharsMiddle?: string
): value is string => {
    if (typeof value !== 'string') return false;
    if (value.length > maxLength || value.length < minLength) return false;
    if (!allowedChars) return true;

    const last = value.length - 1;
    for (let i = 0; i <= last; i++) {
        const char = value[i];
        if (allowedChars.includes(char)) continue;
        const middle = i > 0 && i < last;
        if (!middle || !allowedCharsMiddle || !allowedCharsMiddle.includes(char)) return false;
    }
    return true;
};

export default validateString;
