import StateCache from './cache.js';
import { type Clock, systemClock } from './clock.js';
import config from './config.js';
import logger from './logger.js';
import type { LedgerState } from './state.js';
import StakingPool, { type StakingPoolOptions } from './staking/pool.js';
import Token from './token/token.js';

export interface Chain {
    store: StateCache;
    clock: Clock;
    token: Token;
    pool: StakingPool;
}

export interface ChainOptions {
    clock?: Clock;
    state?: LedgerState;
    // receives every role on a fresh state
    deployer?: string;
    burnRequiresRole?: boolean;
    pool?: StakingPoolOptions;
    eventLogMax?: number;
}

/**
 * Wire the token and the staking pool over one state cache.
 * On a fresh state the deployer also grants the pool the minter role so it can mint rewards.
 */
export function createChain(options: ChainOptions = {}): Chain {
    const clock = options.clock ?? systemClock;
    const store = new StateCache(options.state, options.eventLogMax ?? config.eventLogMax);
    const fresh = store.state.roles.admin.length === 0;
    const token = new Token(store, clock, {
        deployer: options.deployer,
        burnRequiresRole: options.burnRequiresRole,
    });
    const pool = new StakingPool(token, store, clock, options.pool);

    if (fresh && options.deployer) {
        token.grantRole(options.deployer, 'minter', pool.account);
        logger.info(`[chain] Staking pool ${pool.account} may mint rewards`);
    }
    return { store, clock, token, pool };
}
