import assert from 'assert';
import { describe, it } from 'node:test';

import config from '../src/config.js';
import { type StateDocuments, stateFromDocuments, stateToDocuments } from '../src/mongo.js';
import type { LedgerState } from '../src/state.js';
import transaction, { type Transaction } from '../src/transaction.js';
import { TransactionType } from '../src/transactions/types.js';
import { ADMIN, ALICE, BOB, CAROL, E18, START, fund, setup } from './helpers.js';

const POOL = config.staking.poolAccount;

describe('mongo documents', () => {
    it('stores quantities as padded strings and allowances as a list', () => {
        const chain = setup();
        chain.token.mint(ADMIN, ALICE, 1_000n);
        chain.token.approve(ALICE, 'desk.v2', 250n);

        const docs = stateToDocuments(chain.store.state);
        const alice = docs.accounts.find(a => a._id === ALICE);
        assert(alice);
        assert.strictEqual(alice.balance, '1000'.padStart(78, '0'));
        assert.deepStrictEqual(alice.allowances, [{ spender: 'desk.v2', value: '250'.padStart(78, '0') }]);
        assert.strictEqual(alice.nonce, '0'.padStart(78, '0'));
        assert.strictEqual(docs.state._id, 0);
        assert.strictEqual(docs.state.totalMinted, '1000'.padStart(78, '0'));
        assert.deepStrictEqual(docs.state.roles.minter, [ADMIN, POOL]);
        assert.deepStrictEqual(docs.stakes, []);
    });

    it('rebuilds the pool indexes from stake documents', () => {
        const chain = setup();
        chain.pool.openStakePool(ADMIN, 0);
        fund(chain, ALICE, 3_000n * E18);
        fund(chain, BOB, 1_000n * E18);
        const first = chain.pool.createStake(ALICE, 1_000n * E18, 0);
        const bobs = chain.pool.createStake(BOB, 1_000n * E18, 2);
        const second = chain.pool.createStake(ALICE, 2_000n * E18, 1);
        chain.token.blacklist(ADMIN, 'mallory');
        chain.token.pause(ADMIN);

        const docs = stateToDocuments(chain.store.state);
        assert.deepStrictEqual(
            docs.stakes.map(s => [s._id, s.position]),
            [
                [first.id, 0],
                [second.id, 1],
                [bobs.id, 0],
            ]
        );

        // stored in reverse to show the order comes from position
        const restored = stateFromDocuments({ ...docs, stakes: [...docs.stakes].reverse() });
        assert.deepStrictEqual(restored, chain.store.state);
        assert.deepStrictEqual(restored.pool.userStakeIds[ALICE], [first.id, second.id]);
        assert.strictEqual(restored.pool.totalStakedByUser[ALICE], 3_000n * E18);
        assert.strictEqual(restored.accounts.mallory.blacklisted, true);
        assert.strictEqual(restored.paused, true);
    });

    it('restores executed transaction hashes', async () => {
        const chain = setup();
        chain.token.mint(ADMIN, ALICE, 10n);
        const tx: Transaction<TransactionType.TOKEN_TRANSFER> = {
            type: TransactionType.TOKEN_TRANSFER,
            sender: ALICE,
            data: { to: BOB, amount: '1' },
            ts: START,
        };
        assert.deepStrictEqual(await transaction.execute(tx, chain), { valid: true });

        const docs = stateToDocuments(chain.store.state);
        assert.deepStrictEqual(docs.transactions, [{ _id: transaction.createHash(tx), ts: START }]);

        const restored = setup({ state: stateFromDocuments(docs) });
        assert.deepStrictEqual(await transaction.execute(tx, restored), { valid: false, error: 'transaction already executed' });
        assert.strictEqual(restored.token.balanceOf(BOB), 1n);
    });

    it('takes documents that later scopes cannot change', () => {
        const chain = setup();
        chain.pool.openStakePool(ADMIN, 0);
        fund(chain, ALICE, 1_000n * E18);

        const commits: Array<{ docs: StateDocuments; committed: LedgerState }> = [];
        chain.store.onCommit((_events, committed) => {
            commits.push({ docs: stateToDocuments(committed), committed });
        });
        chain.token.grantRole(ADMIN, 'blacklister', BOB);
        chain.token.grantRole(ADMIN, 'blacklister', CAROL);
        assert.deepStrictEqual(commits[0].docs.state.roles.blacklister, [ADMIN, BOB]);

        const removeHook = chain.token.addTransferHook(() => {
            throw new Error('hook failed');
        });
        assert.throws(() => chain.pool.createStake(ALICE, 1_000n * E18, 0), /hook failed/);
        removeHook();

        assert.strictEqual(commits.length, 2);
        // the failed stake wrote into the committed object before the rollback replaced it
        assert.strictEqual(commits[1].committed.pool.totalStaked, 1_000n * E18);
        assert.strictEqual(chain.store.state.pool.totalStaked, 0n);
        assert.deepStrictEqual(commits[1].docs.stakes, []);
        assert.deepStrictEqual(commits[1].docs, stateToDocuments(chain.store.state));
    });
});
