import config from './config.js';
import { LedgerError } from './errors.js';

export type Role = 'admin' | 'minter' | 'pauser' | 'blacklister' | 'burner';

export const ROLES: readonly Role[] = ['admin', 'minter', 'pauser', 'blacklister', 'burner'];

export interface AccountState {
    balance: bigint;
    // spender -> remaining allowance
    allowances: Record<string, bigint>;
    blacklisted: boolean;
    nonce: bigint;
}

export interface SupplyState {
    hardCap: bigint;
    totalMinted: bigint;
    totalBurned: bigint;
}

export interface StakeRecord {
    id: string;
    owner: string;
    amount: bigint;
    rewards: bigint;
    startTimestamp: number;
    durationMonths: number;
    apy: number;
}

export interface PoolState {
    timestampOpened: number;
    totalStaked: bigint;
    totalStakedByUser: Record<string, bigint>;
    stakes: Record<string, StakeRecord>;
    // owner -> active stake ids in creation order
    userStakeIds: Record<string, string[]>;
    nonce: bigint;
}

export interface LedgerState {
    accounts: Record<string, AccountState>;
    supply: SupplyState;
    roles: Record<Role, string[]>;
    paused: boolean;
    // custodial accounts that can never be blacklisted
    protectedAccounts: string[];
    pool: PoolState;
    eventSeq: number;
    // hash -> ts of executed transactions still inside the expiration window
    recentTxs: Record<string, number>;
}

export type EventName =
    | 'Transfer'
    | 'Approval'
    | 'UnlimitedAllowanceWarning'
    | 'RoleGranted'
    | 'RoleRevoked'
    | 'Paused'
    | 'Unpaused'
    | 'Blacklisted'
    | 'PoolOpened'
    | 'StakeCreated'
    | 'Unstake';

export type EventValue = string | bigint | number | boolean;

export interface LedgerEvent {
    seq: number;
    name: EventName;
    // positional arguments, in declaration order
    args: Record<string, EventValue>;
    timestamp: number;
}

export function emptyPoolState(): PoolState {
    return {
        timestampOpened: 0,
        totalStaked: 0n,
        totalStakedByUser: {},
        stakes: {},
        userStakeIds: {},
        nonce: 0n,
    };
}

export function emptyState(hardCap: bigint = config.hardCap): LedgerState {
    return {
        accounts: {},
        supply: { hardCap, totalMinted: 0n, totalBurned: 0n },
        roles: { admin: [], minter: [], pauser: [], blacklister: [], burner: [] },
        paused: false,
        protectedAccounts: [config.tokenAccount],
        pool: emptyPoolState(),
        eventSeq: 0,
        recentTxs: {},
    };
}

export function emptyAccount(): AccountState {
    return { balance: 0n, allowances: {}, blacklisted: false, nonce: 0n };
}

/**
 * Entry of a state map keyed by account name or id. Only own keys count, so names such as
 * "constructor" or "toString" never resolve to Object.prototype members.
 */
export function getEntry<T>(map: Record<string, T>, key: string): T | undefined {
    return Object.hasOwn(map, key) ? map[key] : undefined;
}

export function setEntry<T>(map: Record<string, T>, key: string, value: T): T {
    // assigning this key would replace the map's prototype instead of adding an entry
    if (key === '__proto__') {
        throw new LedgerError('InvalidAccount', `Invalid account or key: ${key}`, { key });
    }
    map[key] = value;
    return value;
}

/**
 * Existing entry, or a fresh one stored under `key`
 */
export function ensureEntry<T>(map: Record<string, T>, key: string, create: () => T): T {
    return getEntry(map, key) ?? setEntry(map, key, create());
}
