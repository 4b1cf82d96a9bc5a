import { LedgerError } from '../errors.js';

export type Tier = 0 | 1 | 2;

// lock duration in months: Silver, Gold, Platinum
export const TIER_DURATIONS: Record<Tier, number> = { 0: 3, 1: 6, 2: 12 };

interface RateBracket {
    // bracket applies while the pool has been open for fewer than this many months
    untilMonth: number;
    apy: number;
}

// APY in whole percent, by lock duration
const RATE_TABLE: Record<number, readonly RateBracket[]> = {
    3: [
        { untilMonth: 24, apy: 5 },
        { untilMonth: 48, apy: 4 },
        { untilMonth: 60, apy: 3 },
    ],
    6: [
        { untilMonth: 24, apy: 7 },
        { untilMonth: 48, apy: 6 },
        { untilMonth: 60, apy: 5 },
    ],
    12: [
        { untilMonth: 24, apy: 9 },
        { untilMonth: 48, apy: 8 },
        { untilMonth: 60, apy: 7 },
    ],
};

export function isTier(value: number): value is Tier {
    return value === 0 || value === 1 || value === 2;
}

export function durationForTier(tier: number): number {
    if (!isTier(tier)) {
        throw new LedgerError('InvalidTier', `Unknown stake tier ${tier}`, { tier });
    }
    return TIER_DURATIONS[tier];
}

/**
 * APY for a stake of `durationMonths` opened `startMonth` whole months after the pool opened.
 * The first bracket whose bound is strictly above startMonth wins, so month 24 is already
 * in the second bracket.
 */
export function apyFor(durationMonths: number, startMonth: number): number {
    const brackets = RATE_TABLE[durationMonths];
    if (!brackets) {
        throw new LedgerError('InvalidTier', `No rates for a ${durationMonths} month stake`, { durationMonths });
    }
    const bracket = brackets.find(b => startMonth < b.untilMonth);
    if (!bracket) {
        throw new LedgerError('PoolClosed', 'The stakepool is closed.', { startMonth });
    }
    return bracket.apy;
}

/**
 * amount * apy% * months / 12, multiplied out before the single division
 */
export function calculateRewards(amount: bigint, apy: number, durationMonths: number): bigint {
    return (amount * BigInt(apy) * BigInt(durationMonths)) / 1200n;
}
