import validateString from './string.js';

const ALPHANUMERIC = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

/**
 * Account addresses are either base58 public keys or plain names such as "stakeledger-pool".
 * Dots and dashes may appear only inside the name.
 */
const validateAddress = (value: unknown): value is string =>
    validateString(value, 64, 1, ALPHANUMERIC, ALPHANUMERIC + '.-');

export default validateAddress;
