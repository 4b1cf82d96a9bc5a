import type { Role } from '../state.js';
import AccessControl from '../token/access-control.js';
import address from './address.js';
import bigint from './bigint.js';
import integer from './integer.js';
import string from './string.js';

const BASE58 = '123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz';
const HEX = '0123456789abcdef';

/**
 * Validation module interface
 */
export interface ValidationModule {
    address: (value: unknown) => value is string;
    bigint: (value: unknown, allowZero?: boolean, allowNegative?: boolean, maxValue?: bigint) => boolean;
    integer: (value: unknown, canBeZero?: boolean, canBeNegative?: boolean, max?: number, min?: number) => value is number;
    string: (value: unknown, maxLength?: number, minLength?: number, allowedChars?: string, allowedCharsMiddle?: string) => value is string;
    amount: (value: unknown, allowZero?: boolean) => value is string;
    role: (value: unknown) => value is Role;
    signature: (value: unknown) => value is string;
    stakeId: (value: unknown) => value is string;
}

/**
 * Validation module with functions for validating transaction fields
 */
const validation: ValidationModule = {
    address,
    bigint,
    integer,
    string,
    // amounts travel as decimal strings of raw units
    amount: (value: unknown, allowZero = false): value is string => typeof value === 'string' && bigint(value, allowZero),
    role: (value: unknown): value is Role => typeof value === 'string' && AccessControl.isRole(value),
    signature: (value: unknown): value is string => string(value, 100, 80, BASE58),
    stakeId: (value: unknown): value is string => string(value, 64, 64, HEX),
};

export default validation;
