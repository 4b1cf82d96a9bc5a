import StateCache from '../cache.js';
import type { Clock } from '../clock.js';
import config from '../config.js';
import { hashMessage } from '../crypto.js';
import { LedgerError } from '../errors.js';
import logger from '../logger.js';
import { type StakeRecord, ensureEntry, getEntry, setEntry } from '../state.js';
import Token from '../token/token.js';
import { formatTokenAmount } from '../utils/bigint.js';
import { apyFor, calculateRewards, durationForTier } from './rates.js';
import ReentrancyGuard from './reentrancy.js';

export interface StakingPoolOptions {
    account?: string;
    avgSecondsPerMonth?: number;
    poolLifetimeMonths?: number;
    maxOpenDelaySeconds?: number;
    minStakeAmount?: bigint;
    maxStakeAmountUser?: bigint;
    maxStakeAmountPool?: bigint;
}

/**
 * Fixed-term staking pool. Stakers approve the pool, stake for 3, 6 or 12 months and
 * receive principal plus a reward minted up front when the lock ends.
 */
export class StakingPool {
    readonly account: string;
    readonly avgSecondsPerMonth: number;
    readonly poolLifetimeMonths: number;
    readonly maxOpenDelaySeconds: number;
    readonly minStakeAmount: bigint;
    readonly maxStakeAmountUser: bigint;
    readonly maxStakeAmountPool: bigint;

    private readonly guard = new ReentrancyGuard();

    constructor(
        private readonly token: Token,
        private readonly store: StateCache,
        private readonly clock: Clock,
        options: StakingPoolOptions = {}
    ) {
        const defaults = config.staking;
        this.account = options.account ?? defaults.poolAccount;
        this.avgSecondsPerMonth = options.avgSecondsPerMonth ?? defaults.avgSecondsPerMonth;
        this.poolLifetimeMonths = options.poolLifetimeMonths ?? defaults.poolLifetimeMonths;
        this.maxOpenDelaySeconds = options.maxOpenDelaySeconds ?? defaults.maxOpenDelaySeconds;
        this.minStakeAmount = options.minStakeAmount ?? defaults.minStakeAmount;
        this.maxStakeAmountUser = options.maxStakeAmountUser ?? defaults.maxStakeAmountUser;
        this.maxStakeAmountPool = options.maxStakeAmountPool ?? defaults.maxStakeAmountPool;
        token.registerCustodian(this.account);
    }

    timestampOpened(): number {
        return this.store.state.pool.timestampOpened;
    }

    openStakePool(caller: string, timestamp: number): number {
        return this.store.atomic(() => {
            this.token.access.requireRole(caller, 'admin');
            const pool = this.store.state.pool;
            if (pool.timestampOpened !== 0) {
                throw new LedgerError('AlreadyConfigured', 'The Stakepool is already configured', {
                    timestampOpened: pool.timestampOpened,
                });
            }
            const now = this.clock.now();
            const max = now + this.maxOpenDelaySeconds;
            if (timestamp > max) {
                throw new LedgerError('TooFarInFuture', `The timestamp is too far into the future, maximum allowed: ${max}`, {
                    max,
                });
            }
            const opened = Math.max(timestamp, now);
            pool.timestampOpened = opened;
            logger.info(`[staking-pool] Pool ${this.account} opens at ${opened}`);
            this.store.emit('PoolOpened', { timestamp: opened }, now);
            return opened;
        });
    }

    isOpen(): boolean {
        const opened = this.store.state.pool.timestampOpened;
        const now = this.clock.now();
        return opened > 0 && opened <= now && now < opened + this.poolLifetimeMonths * this.avgSecondsPerMonth;
    }

    monthsOpen(): number {
        if (!this.isOpen()) {
            throw new LedgerError('PoolClosed', 'The stakepool is closed.');
        }
        return Math.floor((this.clock.now() - this.store.state.pool.timestampOpened) / this.avgSecondsPerMonth);
    }

    createStake(caller: string, amount: bigint, tier: number): StakeRecord {
        return this.guard.run('createStake', () =>
            this.store.atomic(() => {
                if (!this.isOpen()) {
                    throw new LedgerError('PoolNotOpen', 'The stakepool is not open.');
                }
                const pool = this.store.state.pool;
                if (amount < this.minStakeAmount) {
                    throw new LedgerError('BelowMinimum', 'The amount is below the minimal amount.', {
                        min: this.minStakeAmount,
                    });
                }
                const userTotal = getEntry(pool.totalStakedByUser, caller) ?? 0n;
                if (userTotal + amount > this.maxStakeAmountUser) {
                    throw new LedgerError('ExceedsUserLimit', 'This stake will surpass the maximum amount allowed per user.', {
                        max: this.maxStakeAmountUser,
                    });
                }
                if (pool.totalStaked + amount > this.maxStakeAmountPool) {
                    throw new LedgerError('ExceedsPoolLimit', 'This stake will surpass the maximum amount in the pool.', {
                        max: this.maxStakeAmountPool,
                    });
                }
                if (this.token.allowance(caller, this.account) < amount) {
                    throw new LedgerError('InsufficientAllowance', `Not enough allowance. ${caller}`, { account: caller });
                }
                if (this.token.balanceOf(caller) < amount) {
                    throw new LedgerError('InsufficientBalance', `Not enough Balance. ${caller}`, { account: caller });
                }

                const durationMonths = durationForTier(tier);
                const apy = apyFor(durationMonths, this.monthsOpen());
                const rewards = calculateRewards(amount, apy, durationMonths);
                const now = this.clock.now();
                const stake: StakeRecord = {
                    id: this.nextStakeId(caller, amount, now),
                    owner: caller,
                    amount,
                    rewards,
                    startTimestamp: now,
                    durationMonths,
                    apy,
                };

                setEntry(pool.stakes, stake.id, stake);
                ensureEntry(pool.userStakeIds, caller, () => []).push(stake.id);
                setEntry(pool.totalStakedByUser, caller, userTotal + amount);
                pool.totalStaked += amount;

                this.token.transferFrom(this.account, caller, this.account, amount);
                this.token.mint(this.account, this.account, rewards);

                logger.info(
                    `[staking-pool] ${caller} staked ${formatTokenAmount(amount)} for ${durationMonths} months at ${apy}% (reward ${formatTokenAmount(rewards)})`
                );
                this.store.emit(
                    'StakeCreated',
                    {
                        owner: caller,
                        stakeId: stake.id,
                        startTimestamp: now,
                        durationMonths,
                        amount,
                        rewards,
                    },
                    now
                );
                return { ...stake };
            })
        );
    }

    unstake(caller: string, stakeId: string): bigint {
        return this.guard.run('unstake', () =>
            this.store.atomic(() => {
                const pool = this.store.state.pool;
                const stake = getEntry(pool.stakes, stakeId);
                if (!stake || stake.owner !== caller) {
                    throw new LedgerError('StakeNotFound', `No active stake ${stakeId} for ${caller}`, { stakeId });
                }
                const now = this.clock.now();
                if (now < stake.startTimestamp + stake.durationMonths * this.avgSecondsPerMonth) {
                    throw new LedgerError('StillLocked', 'This stake is still locked', {
                        startTimestamp: stake.startTimestamp,
                        durationMonths: stake.durationMonths,
                    });
                }

                delete pool.stakes[stakeId];
                const ids = (getEntry(pool.userStakeIds, caller) ?? []).filter(id => id !== stakeId);
                if (ids.length === 0) {
                    delete pool.userStakeIds[caller];
                } else {
                    setEntry(pool.userStakeIds, caller, ids);
                }
                const remaining = (getEntry(pool.totalStakedByUser, caller) ?? 0n) - stake.amount;
                if (remaining === 0n) {
                    delete pool.totalStakedByUser[caller];
                } else {
                    setEntry(pool.totalStakedByUser, caller, remaining);
                }
                pool.totalStaked -= stake.amount;

                const payout = stake.amount + stake.rewards;
                this.token.transfer(this.account, caller, payout);

                logger.info(`[staking-pool] ${caller} unstaked ${stakeId}, paid out ${formatTokenAmount(payout)}`);
                this.store.emit('Unstake', { owner: caller, stakeId }, now);
                return payout;
            })
        );
    }

    getAllStakesForUser(account: string): StakeRecord[] {
        const pool = this.store.state.pool;
        const ids = getEntry(pool.userStakeIds, account) ?? [];
        const stakes: StakeRecord[] = [];
        for (const id of ids) {
            const stake = getEntry(pool.stakes, id);
            if (stake) stakes.push({ ...stake });
        }
        return stakes;
    }

    getStake(account: string, stakeId: string): StakeRecord | undefined {
        const stake = getEntry(this.store.state.pool.stakes, stakeId);
        return stake && stake.owner === account ? { ...stake } : undefined;
    }

    getTotalStakedAccount(account: string): bigint {
        return getEntry(this.store.state.pool.totalStakedByUser, account) ?? 0n;
    }

    getTotalStakedPool(): bigint {
        return this.store.state.pool.totalStaked;
    }

    private nextStakeId(caller: string, amount: bigint, now: number): string {
        const pool = this.store.state.pool;
        let id: string;
        do {
            pool.nonce += 1n;
            id = hashMessage([now, caller, amount, pool.nonce]);
        } while (Object.hasOwn(pool.stakes, id));
        return id;
    }
}

export default StakingPool;
