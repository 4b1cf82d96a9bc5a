import type { Role } from '../state.js';

export enum TransactionType {
    // Token
    TOKEN_MINT = 1,
    TOKEN_BURN = 2,
    TOKEN_BURN_FROM = 3,
    TOKEN_TRANSFER = 4,
    TOKEN_TRANSFER_FROM = 5,
    TOKEN_APPROVE = 6,
    TOKEN_PERMIT = 7,
    TOKEN_PAUSE = 8,
    TOKEN_UNPAUSE = 9,

    // Access control
    ROLE_GRANT = 10,
    ROLE_REVOKE = 11,
    ROLE_RENOUNCE = 12,

    // Blacklist
    BLACKLIST_ADD = 13,
    BLACKLIST_REMOVE = 14,

    // Staking pool
    POOL_OPEN = 15,
    STAKE_CREATE = 16,
    STAKE_UNSTAKE = 17,
}

// Amounts are decimal strings of raw token units

export interface TokenMintData {
    to: string;
    amount: string;
}

export interface TokenBurnData {
    amount: string;
}

export interface TokenBurnFromData {
    from: string;
    amount: string;
}

export interface TokenTransferData {
    to: string;
    amount: string;
}

export interface TokenTransferFromData {
    from: string;
    to: string;
    amount: string;
}

export interface TokenApproveData {
    spender: string;
    value: string;
}

export interface TokenPermitData {
    owner: string;
    spender: string;
    value: string;
    deadline: number;
    signature: string;
}

export type EmptyData = Record<string, never>;

export interface RoleData {
    role: Role;
    account: string;
}

export interface BlacklistData {
    account: string;
}

export interface PoolOpenData {
    timestamp: number;
}

export interface StakeCreateData {
    amount: string;
    tier: number;
}

export interface StakeUnstakeData {
    stakeId: string;
}

export interface TransactionDataMap {
    [TransactionType.TOKEN_MINT]: TokenMintData;
    [TransactionType.TOKEN_BURN]: TokenBurnData;
    [TransactionType.TOKEN_BURN_FROM]: TokenBurnFromData;
    [TransactionType.TOKEN_TRANSFER]: TokenTransferData;
    [TransactionType.TOKEN_TRANSFER_FROM]: TokenTransferFromData;
    [TransactionType.TOKEN_APPROVE]: TokenApproveData;
    [TransactionType.TOKEN_PERMIT]: TokenPermitData;
    [TransactionType.TOKEN_PAUSE]: EmptyData;
    [TransactionType.TOKEN_UNPAUSE]: EmptyData;
    [TransactionType.ROLE_GRANT]: RoleData;
    [TransactionType.ROLE_REVOKE]: RoleData;
    [TransactionType.ROLE_RENOUNCE]: RoleData;
    [TransactionType.BLACKLIST_ADD]: BlacklistData;
    [TransactionType.BLACKLIST_REMOVE]: BlacklistData;
    [TransactionType.POOL_OPEN]: PoolOpenData;
    [TransactionType.STAKE_CREATE]: StakeCreateData;
    [TransactionType.STAKE_UNSTAKE]: StakeUnstakeData;
}

export function isTransactionType(value: unknown): value is TransactionType {
    return typeof value === 'number' && typeof TransactionType[value] === 'string';
}
