import assert from 'assert';

import { type Chain, type ChainOptions, createChain } from '../src/chain.js';
import { ManualClock } from '../src/clock.js';
import { LedgerError, type LedgerErrorCode } from '../src/errors.js';
import type { LedgerEvent } from '../src/state.js';

export const ADMIN = 'admin';
export const ALICE = 'alice';
export const BOB = 'bob';
export const CAROL = 'carol';

export const E18 = 10n ** 18n;
export const START = 1_700_000_000;

export interface TestChain extends Chain {
    clock: ManualClock;
}

export function setup(options: ChainOptions = {}): TestChain {
    const clock = new ManualClock(START);
    const chain = createChain({ deployer: ADMIN, ...options, clock });
    return { ...chain, clock };
}

export function expectLedgerError(fn: () => unknown, code: LedgerErrorCode, message?: string): LedgerError {
    let caught: unknown;
    try {
        fn();
    } catch (err) {
        caught = err;
    }
    assert(caught instanceof LedgerError, `expected LedgerError ${code}, got ${String(caught)}`);
    assert.strictEqual(caught.code, code);
    if (message !== undefined) assert.strictEqual(caught.message, message);
    return caught;
}

/**
 * Events committed after the given count, as [name, args] pairs
 */
export function eventsAfter(chain: Chain, count: number): Array<[string, LedgerEvent['args']]> {
    return chain.store.events.slice(count).map(e => [e.name, e.args]);
}

/**
 * Mint `amount` to an account and let the staking pool pull it
 */
export function fund(chain: Chain, account: string, amount: bigint): void {
    chain.token.mint(ADMIN, account, amount);
    chain.token.approve(account, chain.pool.account, amount);
}
