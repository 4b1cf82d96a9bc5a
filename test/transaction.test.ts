import assert from 'assert';
import { describe, it } from 'node:test';

import config from '../src/config.js';
import { getNewKeyPair } from '../src/crypto.js';
import transaction, { type Transaction } from '../src/transaction.js';
import { TransactionType } from '../src/transactions/types.js';
import { ADMIN, ALICE, BOB, E18, START, setup } from './helpers.js';

const POOL = config.staking.poolAccount;

describe('transaction envelope', () => {
    it('signs and verifies against the sender key', () => {
        const keys = getNewKeyPair();
        const tx = transaction.sign(
            { type: TransactionType.TOKEN_TRANSFER, sender: keys.pub, data: { to: BOB, amount: '5' }, ts: START },
            keys.priv
        );
        assert.strictEqual(tx.hash, transaction.createHash(tx));
        assert.match(tx.hash ?? '', /^[0-9a-f]{64}$/);
        assert.strictEqual(transaction.isSignedBySender(tx), true);

        const tampered: Transaction<TransactionType.TOKEN_TRANSFER> = { ...tx, data: { to: BOB, amount: '6' } };
        assert.strictEqual(transaction.isSignedBySender(tampered), false);

        const other = getNewKeyPair();
        assert.strictEqual(transaction.isSignedBySender({ ...tx, sender: other.pub }), false);
        assert.strictEqual(transaction.isSignedBySender({ ...tx, signature: undefined }), false);
    });

    it('recognises well formed transactions only', () => {
        assert.strictEqual(transaction.isTransaction({ type: 4, sender: ALICE, data: { to: BOB, amount: '1' }, ts: START }), true);
        assert.strictEqual(transaction.isTransaction({ type: 4, sender: ALICE, data: { to: BOB, amount: '1' } }), false);
        assert.strictEqual(transaction.isTransaction({ type: 99, sender: ALICE, data: {} }), false);
        assert.strictEqual(transaction.isTransaction({ type: '4', sender: ALICE, data: {} }), false);
        assert.strictEqual(transaction.isTransaction({ type: 4, sender: '__proto__', data: {} }), false);
        assert.strictEqual(transaction.isTransaction({ type: 4, sender: ALICE, data: [] }), false);
        assert.strictEqual(transaction.isTransaction({ type: 4, sender: ALICE, data: {}, ts: -1 }), false);
        assert.strictEqual(transaction.isTransaction(null), false);
    });
});

describe('transaction.execute', () => {
    it('mints and transfers', async () => {
        const chain = setup();
        const minted = await transaction.execute(
            { type: TransactionType.TOKEN_MINT, sender: ADMIN, data: { to: ALICE, amount: '1000' }, ts: START },
            chain
        );
        assert.deepStrictEqual(minted, { valid: true });
        const moved = await transaction.execute(
            { type: TransactionType.TOKEN_TRANSFER, sender: ALICE, data: { to: BOB, amount: '400' }, ts: START },
            chain
        );
        assert.deepStrictEqual(moved, { valid: true });
        assert.strictEqual(chain.token.balanceOf(ALICE), 600n);
        assert.strictEqual(chain.token.balanceOf(BOB), 400n);
    });

    it('reports field errors from validateTx', async () => {
        const chain = setup();
        assert.deepStrictEqual(
            await transaction.execute({ type: TransactionType.TOKEN_MINT, sender: ADMIN, data: { to: ALICE, amount: '-5' }, ts: START }, chain),
            { valid: false, error: 'Invalid amount' }
        );
        assert.deepStrictEqual(
            await transaction.execute({ type: TransactionType.TOKEN_MINT, sender: ADMIN, data: { to: 'bad name!', amount: '5' }, ts: START }, chain),
            { valid: false, error: 'Invalid recipient' }
        );
        assert.deepStrictEqual(
            await transaction.execute({ type: TransactionType.STAKE_UNSTAKE, sender: ALICE, data: { stakeId: 'abc' }, ts: START }, chain),
            { valid: false, error: 'Invalid stake id' }
        );
        assert.strictEqual(chain.token.totalSupply(), 0n);
    });

    it('prefixes ledger rejections with their code', async () => {
        const chain = setup();
        assert.deepStrictEqual(
            await transaction.execute({ type: TransactionType.TOKEN_MINT, sender: ALICE, data: { to: ALICE, amount: '5' }, ts: START }, chain),
            { valid: false, error: 'PermissionDenied: Permissions: account alice is missing role minter' }
        );
        assert.deepStrictEqual(
            await transaction.execute({ type: TransactionType.TOKEN_PAUSE, sender: ADMIN, data: {}, ts: START }, chain),
            { valid: true }
        );
        assert.deepStrictEqual(
            await transaction.execute({ type: TransactionType.TOKEN_MINT, sender: ADMIN, data: { to: ALICE, amount: '5' }, ts: START }, chain),
            { valid: false, error: 'ContractPaused: Pausable: paused' }
        );
    });

    it('rejects a hash that does not match the content', async () => {
        const chain = setup();
        const tx: Transaction<TransactionType.TOKEN_MINT> = {
            type: TransactionType.TOKEN_MINT,
            sender: ADMIN,
            data: { to: ALICE, amount: '5' },
            ts: START,
        };
        const hash = transaction.createHash(tx);
        const result = await transaction.execute({ ...tx, data: { to: ALICE, amount: '6' }, hash }, chain);
        assert.deepStrictEqual(result, { valid: false, error: 'invalid hash' });
        assert.strictEqual(chain.token.balanceOf(ALICE), 0n);
    });

    it('reports unexpected failures as internal errors and rolls them back', async () => {
        const chain = setup();
        chain.token.addTransferHook(() => {
            throw new Error('hook failed');
        });
        const result = await transaction.execute(
            { type: TransactionType.TOKEN_MINT, sender: ADMIN, data: { to: ALICE, amount: '5' }, ts: START },
            chain
        );
        assert.deepStrictEqual(result, { valid: false, error: 'internal error' });
        assert.strictEqual(chain.token.totalSupply(), 0n);
    });

    it('runs roles, blacklist and staking transactions', async () => {
        const chain = setup();
        const run = <K extends TransactionType>(tx: Transaction<K>) => transaction.execute(tx, chain);

        assert.deepStrictEqual(await run({ type: TransactionType.ROLE_GRANT, sender: ADMIN, data: { role: 'blacklister', account: BOB }, ts: START }), {
            valid: true,
        });
        assert.strictEqual(chain.token.hasRole('blacklister', BOB), true);
        const unknownRole: unknown = JSON.parse(`{"type":10,"sender":"admin","data":{"role":"owner","account":"bob"},"ts":${START}}`);
        assert(transaction.isTransaction(unknownRole));
        assert.deepStrictEqual(await transaction.execute(unknownRole, chain), { valid: false, error: 'Unknown role' });
        assert.deepStrictEqual(await run({ type: TransactionType.BLACKLIST_ADD, sender: BOB, data: { account: 'mallory' }, ts: START }), {
            valid: true,
        });
        assert.strictEqual(chain.token.isBlacklisted('mallory'), true);

        assert.deepStrictEqual(await run({ type: TransactionType.POOL_OPEN, sender: ADMIN, data: { timestamp: 0 }, ts: START }), { valid: true });
        await run({ type: TransactionType.TOKEN_MINT, sender: ADMIN, data: { to: ALICE, amount: (1_000n * E18).toString() }, ts: START });
        await run({ type: TransactionType.TOKEN_APPROVE, sender: ALICE, data: { spender: POOL, value: (1_000n * E18).toString() }, ts: START });
        assert.deepStrictEqual(
            await run({ type: TransactionType.STAKE_CREATE, sender: ALICE, data: { amount: (1_000n * E18).toString(), tier: 3 }, ts: START }),
            { valid: false, error: 'InvalidTier: Unknown stake tier 3' }
        );
        assert.deepStrictEqual(
            await run({ type: TransactionType.STAKE_CREATE, sender: ALICE, data: { amount: (1_000n * E18).toString(), tier: 0 }, ts: START }),
            { valid: true }
        );
        const [stake] = chain.pool.getAllStakesForUser(ALICE);
        assert.deepStrictEqual(
            await run({ type: TransactionType.STAKE_UNSTAKE, sender: ALICE, data: { stakeId: stake.id }, ts: START }),
            { valid: false, error: 'StillLocked: This stake is still locked' }
        );
    });

    it('executes a transaction only once', async () => {
        const chain = setup();
        const keys = getNewKeyPair();
        chain.token.mint(ADMIN, keys.pub, 50n);
        const tx = transaction.sign(
            { type: TransactionType.TOKEN_TRANSFER, sender: keys.pub, data: { to: 'mallory', amount: '10' }, ts: START },
            keys.priv
        );

        assert.deepStrictEqual(await transaction.execute(tx, chain), { valid: true });
        for (let i = 0; i < 4; i++) {
            assert.deepStrictEqual(await transaction.execute(tx, chain), { valid: false, error: 'transaction already executed' });
        }
        assert.strictEqual(chain.token.balanceOf('mallory'), 10n);
        assert.strictEqual(chain.token.balanceOf(keys.pub), 40n);
        assert.deepStrictEqual(chain.store.state.recentTxs, { [tx.hash ?? '']: START });

        // same content with another ts is a new transaction
        const again = transaction.sign({ ...tx, ts: START + 1 }, keys.priv);
        assert.deepStrictEqual(await transaction.execute(again, chain), { valid: true });
        assert.strictEqual(chain.token.balanceOf('mallory'), 20n);
    });

    it('does not record transactions the ledger rejected', async () => {
        const chain = setup();
        const tx: Transaction<TransactionType.TOKEN_TRANSFER> = {
            type: TransactionType.TOKEN_TRANSFER,
            sender: ALICE,
            data: { to: BOB, amount: '10' },
            ts: START,
        };
        assert.deepStrictEqual(await transaction.execute(tx, chain), {
            valid: false,
            error: 'InsufficientBalance: Not enough Balance. alice holds 0',
        });
        assert.deepStrictEqual(chain.store.state.recentTxs, {});

        chain.token.mint(ADMIN, ALICE, 10n);
        assert.deepStrictEqual(await transaction.execute(tx, chain), { valid: true });
        assert.strictEqual(chain.token.balanceOf(BOB), 10n);
    });

    it('rejects transactions outside the expiration window', async () => {
        const chain = setup();
        chain.token.mint(ADMIN, ALICE, 100n);
        const window = config.txExpirationSeconds;
        const transfer = (ts: number): Transaction<TransactionType.TOKEN_TRANSFER> => ({
            type: TransactionType.TOKEN_TRANSFER,
            sender: ALICE,
            data: { to: BOB, amount: '1' },
            ts,
        });

        assert.deepStrictEqual(await transaction.execute(transfer(START - window - 1), chain), {
            valid: false,
            error: 'transaction expired',
        });
        assert.deepStrictEqual(await transaction.execute(transfer(START + window + 1), chain), {
            valid: false,
            error: 'transaction ts too far in the future',
        });
        assert.deepStrictEqual(await transaction.execute(transfer(START - window), chain), { valid: true });
        assert.deepStrictEqual(await transaction.execute(transfer(START + window), chain), { valid: true });
        assert.strictEqual(chain.token.balanceOf(BOB), 2n);
    });

    it('forgets executed hashes once they expire', async () => {
        const chain = setup();
        chain.token.mint(ADMIN, ALICE, 100n);
        const first: Transaction<TransactionType.TOKEN_TRANSFER> = {
            type: TransactionType.TOKEN_TRANSFER,
            sender: ALICE,
            data: { to: BOB, amount: '1' },
            ts: START,
        };
        assert.deepStrictEqual(await transaction.execute(first, chain), { valid: true });

        chain.clock.advance(config.txExpirationSeconds + 1);
        assert.deepStrictEqual(await transaction.execute(first, chain), { valid: false, error: 'transaction expired' });

        const later = { ...first, ts: chain.clock.now() };
        assert.deepStrictEqual(await transaction.execute(later, chain), { valid: true });
        assert.deepStrictEqual(Object.values(chain.store.state.recentTxs), [later.ts]);
    });
});
