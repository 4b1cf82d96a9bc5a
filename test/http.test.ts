import assert from 'assert';
import type { Server } from 'http';
import { after, before, describe, it } from 'node:test';

import config from '../src/config.js';
import { type KeyPair, getNewKeyPair } from '../src/crypto.js';
import { init } from '../src/modules/http/index.js';
import transaction, { type Transaction } from '../src/transaction.js';
import { TransactionType } from '../src/transactions/types.js';
import { ALICE, E18, START, type TestChain, setup } from './helpers.js';

const POOL = config.staking.poolAccount;

function field(value: unknown, ...path: string[]): unknown {
    let current = value;
    for (const key of path) {
        if (typeof current !== 'object' || current === null) return undefined;
        current = Object.getOwnPropertyDescriptor(current, key)?.value;
    }
    return current;
}

describe('http api', () => {
    let admin: KeyPair;
    let chain: TestChain;
    let server: Server;
    let baseUrl: string;
    let minted: Transaction<TransactionType.TOKEN_MINT>;

    before(async () => {
        admin = getNewKeyPair();
        chain = setup({ deployer: admin.pub });
        server = await init(chain, 0);
        const address = server.address();
        assert(address && typeof address !== 'string');
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    after(() => {
        server.closeAllConnections();
        server.close();
    });

    async function get(path: string): Promise<{ status: number; body: unknown }> {
        const res = await fetch(baseUrl + path);
        return { status: res.status, body: await res.json() };
    }

    async function post(body: unknown): Promise<{ status: number; body: unknown }> {
        const res = await fetch(baseUrl + '/transactions', {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify(body),
        });
        return { status: res.status, body: await res.json() };
    }

    it('describes the token', async () => {
        const { status, body } = await get('/token');
        assert.strictEqual(status, 200);
        assert.strictEqual(field(body, 'symbol'), 'STKL');
        assert.strictEqual(field(body, 'decimals'), 18);
        assert.deepStrictEqual(field(body, 'gates'), ['access-control', 'pause', 'blacklist']);
        assert.deepStrictEqual(field(body, 'cap'), { amount: '20000000', rawAmount: (20_000_000n * E18).toString() });
        assert.deepStrictEqual(field(body, 'roles', 'minter'), [admin.pub, POOL]);
    });

    it('applies a signed mint', async () => {
        minted = transaction.sign(
            { type: TransactionType.TOKEN_MINT, sender: admin.pub, data: { to: ALICE, amount: (1_500n * E18).toString() }, ts: START },
            admin.priv
        );
        const { status, body } = await post(minted);
        assert.strictEqual(status, 200);
        assert.deepStrictEqual(body, { valid: true, hash: minted.hash });

        const account = await get(`/accounts/${ALICE}`);
        assert.strictEqual(account.status, 200);
        assert.deepStrictEqual(field(account.body, 'balance'), { amount: '1500', rawAmount: (1_500n * E18).toString() });
        assert.strictEqual(field(account.body, 'blacklisted'), false);
        assert.deepStrictEqual(field(account.body, 'roles'), []);
    });

    it('refuses to apply a signed transaction twice', async () => {
        for (let i = 0; i < 4; i++) {
            const { status, body } = await post(minted);
            assert.strictEqual(status, 400);
            assert.deepStrictEqual(body, { valid: false, error: 'transaction already executed', hash: minted.hash });
        }
        const account = await get(`/accounts/${ALICE}`);
        assert.deepStrictEqual(field(account.body, 'balance'), { amount: '1500', rawAmount: (1_500n * E18).toString() });
        assert.strictEqual(chain.token.totalSupply(), 1_500n * E18);
    });

    it('returns 400 for rejected transactions', async () => {
        const tx = transaction.sign({ type: TransactionType.TOKEN_UNPAUSE, sender: admin.pub, data: {}, ts: START + 1 }, admin.priv);
        const { status, body } = await post(tx);
        assert.strictEqual(status, 400);
        assert.deepStrictEqual(body, { valid: false, error: 'NotPaused: Pausable: not paused', hash: tx.hash });
    });

    it('refuses unsigned or malformed transactions', async () => {
        const other = getNewKeyPair();
        const forged = transaction.sign(
            { type: TransactionType.TOKEN_MINT, sender: admin.pub, data: { to: ALICE, amount: '1' }, ts: START + 2 },
            other.priv
        );
        const unsigned = await post(forged);
        assert.strictEqual(unsigned.status, 401);
        assert.deepStrictEqual(unsigned.body, { valid: false, error: 'Invalid signature' });

        const malformed = await post({ type: 42, sender: admin.pub, data: {} });
        assert.strictEqual(malformed.status, 400);
        assert.deepStrictEqual(malformed.body, { valid: false, error: 'Malformed transaction' });
    });

    it('validates addresses in paths', async () => {
        const { status, body } = await get('/accounts/-bad');
        assert.strictEqual(status, 400);
        assert.deepStrictEqual(body, { error: 'Invalid address' });
    });

    it('reports the pool and stakes', async () => {
        const pool = await get('/pool');
        assert.strictEqual(field(pool.body, 'account'), POOL);
        assert.strictEqual(field(pool.body, 'isOpen'), false);
        assert.strictEqual(field(pool.body, 'monthsOpen'), null);
        assert.deepStrictEqual(field(pool.body, 'limits', 'minStakeAmount'), { amount: '1000', rawAmount: (1_000n * E18).toString() });

        const stakes = await get(`/stakes/${ALICE}`);
        assert.deepStrictEqual(stakes.body, { address: ALICE, total: { amount: '0', rawAmount: '0' }, data: [] });
    });

    it('lists committed events newest first', async () => {
        const { body } = await get('/events?name=Transfer&limit=5');
        assert.strictEqual(field(body, 'total'), 1);
        assert.strictEqual(field(body, 'limit'), 5);
        assert.deepStrictEqual(field(body, 'data', '0', 'args'), {
            from: config.nullAccount,
            to: ALICE,
            value: (1_500n * E18).toString(),
        });
    });
});
