export type ErrorCategory = 'authorization' | 'state' | 'invariant' | 'input' | 'signature' | 'concurrency';

export type LedgerErrorCode =
    | 'PermissionDenied'
    | 'AlreadyPaused'
    | 'NotPaused'
    | 'ContractPaused'
    | 'AlreadyConfigured'
    | 'PoolNotOpen'
    | 'PoolClosed'
    | 'StillLocked'
    | 'StakeNotFound'
    | 'AlreadyBlacklisted'
    | 'NotBlacklisted'
    | 'Blacklisted'
    | 'CapExceeded'
    | 'InsufficientBalance'
    | 'InsufficientAllowance'
    | 'SelfAllowanceError'
    | 'ZeroAddressAllowanceError'
    | 'MustResetToZeroFirst'
    | 'CannotBlacklist'
    | 'InvalidTier'
    | 'BelowMinimum'
    | 'ExceedsUserLimit'
    | 'ExceedsPoolLimit'
    | 'TooFarInFuture'
    | 'InvalidReceiver'
    | 'InvalidAmount'
    | 'InvalidAccount'
    | 'AlreadyExecuted'
    | 'ExpiredDeadline'
    | 'InvalidSigner'
    | 'Reentrancy';

const CODE_TO_CATEGORY: Record<LedgerErrorCode, ErrorCategory> = {
    PermissionDenied: 'authorization',
    AlreadyPaused: 'state',
    NotPaused: 'state',
    ContractPaused: 'state',
    AlreadyConfigured: 'state',
    PoolNotOpen: 'state',
    PoolClosed: 'state',
    StillLocked: 'state',
    StakeNotFound: 'state',
    AlreadyBlacklisted: 'state',
    NotBlacklisted: 'state',
    Blacklisted: 'state',
    CapExceeded: 'invariant',
    InsufficientBalance: 'invariant',
    InsufficientAllowance: 'invariant',
    SelfAllowanceError: 'input',
    ZeroAddressAllowanceError: 'input',
    MustResetToZeroFirst: 'input',
    CannotBlacklist: 'input',
    InvalidTier: 'input',
    BelowMinimum: 'input',
    ExceedsUserLimit: 'input',
    ExceedsPoolLimit: 'input',
    TooFarInFuture: 'input',
    InvalidReceiver: 'input',
    InvalidAmount: 'input',
    InvalidAccount: 'input',
    AlreadyExecuted: 'state',
    ExpiredDeadline: 'signature',
    InvalidSigner: 'signature',
    Reentrancy: 'concurrency',
};

export type ErrorDetails = Record<string, string | bigint | number | boolean>;

export class LedgerError extends Error {
    public readonly category: ErrorCategory;

    constructor(
        public readonly code: LedgerErrorCode,
        message: string,
        public readonly details: ErrorDetails = {}
    ) {
        super(message);
        this.name = 'LedgerError';
        this.category = CODE_TO_CATEGORY[code];
    }
}

export function isLedgerError(err: unknown, code?: LedgerErrorCode): err is LedgerError {
    return err instanceof LedgerError && (code === undefined || err.code === code);
}

/**
 * Render any thrown value as the `<code>: <message>` string reported by transactions
 */
export function describeError(err: unknown): string {
    if (err instanceof LedgerError) return `${err.code}: ${err.message}`;
    return err instanceof Error ? err.message : String(err);
}
