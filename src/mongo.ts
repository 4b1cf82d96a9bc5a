import { type Db, MongoClient } from 'mongodb';

import logger from './logger.js';
import settings from './settings.js';
import {
    type AccountState,
    type LedgerState,
    ROLES,
    type Role,
    type StakeRecord,
    emptyState,
    ensureEntry,
    getEntry,
    setEntry,
} from './state.js';
import { toBigInt, toDbString } from './utils/bigint.js';

// bigint quantities are stored as zero-padded strings (see toDbString)

export interface AccountDoc {
    _id: string;
    balance: string;
    // array rather than a map: account names may contain dots
    allowances: Array<{ spender: string; value: string }>;
    blacklisted: boolean;
    nonce: string;
}

export interface StateDoc {
    _id: number;
    hardCap: string;
    totalMinted: string;
    totalBurned: string;
    roles: Record<Role, string[]>;
    paused: boolean;
    protectedAccounts: string[];
    poolOpened: number;
    poolTotalStaked: string;
    poolNonce: string;
    eventSeq: number;
}

export interface StakeDoc {
    _id: string;
    owner: string;
    amount: string;
    rewards: string;
    startTimestamp: number;
    durationMonths: number;
    apy: number;
    // index in the owner's stake list
    position: number;
}

// executed transaction hash, kept until its ts leaves the expiration window
export interface TransactionDoc {
    _id: string;
    ts: number;
}

export interface StateDocuments {
    accounts: AccountDoc[];
    state: StateDoc;
    stakes: StakeDoc[];
    transactions: TransactionDoc[];
}

export function stateToDocuments(state: LedgerState): StateDocuments {
    const accounts: AccountDoc[] = Object.entries(state.accounts).map(([address, account]) => ({
        _id: address,
        balance: toDbString(account.balance),
        allowances: Object.entries(account.allowances).map(([spender, value]) => ({ spender, value: toDbString(value) })),
        blacklisted: account.blacklisted,
        nonce: toDbString(account.nonce),
    }));

    const stakes: StakeDoc[] = [];
    for (const ids of Object.values(state.pool.userStakeIds)) {
        ids.forEach((id, position) => {
            const stake = getEntry(state.pool.stakes, id);
            if (!stake) return;
            stakes.push({
                _id: stake.id,
                owner: stake.owner,
                amount: toDbString(stake.amount),
                rewards: toDbString(stake.rewards),
                startTimestamp: stake.startTimestamp,
                durationMonths: stake.durationMonths,
                apy: stake.apy,
                position,
            });
        });
    }

    const roles: Record<Role, string[]> = { ...state.roles };
    for (const role of ROLES) roles[role] = [...roles[role]];

    return {
        accounts,
        state: {
            _id: 0,
            hardCap: toDbString(state.supply.hardCap),
            totalMinted: toDbString(state.supply.totalMinted),
            totalBurned: toDbString(state.supply.totalBurned),
            roles,
            paused: state.paused,
            protectedAccounts: [...state.protectedAccounts],
            poolOpened: state.pool.timestampOpened,
            poolTotalStaked: toDbString(state.pool.totalStaked),
            poolNonce: toDbString(state.pool.nonce),
            eventSeq: state.eventSeq,
        },
        stakes,
        transactions: Object.entries(state.recentTxs).map(([hash, ts]) => ({ _id: hash, ts })),
    };
}

export function stateFromDocuments(docs: StateDocuments): LedgerState {
    const state = emptyState(toBigInt(docs.state.hardCap));
    state.supply.totalMinted = toBigInt(docs.state.totalMinted);
    state.supply.totalBurned = toBigInt(docs.state.totalBurned);
    for (const role of ROLES) {
        state.roles[role] = [...(docs.state.roles[role] ?? [])];
    }
    state.paused = docs.state.paused;
    state.protectedAccounts = [...docs.state.protectedAccounts];
    state.eventSeq = docs.state.eventSeq;
    state.pool.timestampOpened = docs.state.poolOpened;
    state.pool.totalStaked = toBigInt(docs.state.poolTotalStaked);
    state.pool.nonce = toBigInt(docs.state.poolNonce);

    for (const doc of docs.accounts) {
        const account: AccountState = {
            balance: toBigInt(doc.balance),
            allowances: {},
            blacklisted: doc.blacklisted,
            nonce: toBigInt(doc.nonce),
        };
        for (const { spender, value } of doc.allowances) {
            setEntry(account.allowances, spender, toBigInt(value));
        }
        setEntry(state.accounts, doc._id, account);
    }

    const ordered = [...docs.stakes].sort((a, b) => a.position - b.position);
    for (const doc of ordered) {
        const stake: StakeRecord = {
            id: doc._id,
            owner: doc.owner,
            amount: toBigInt(doc.amount),
            rewards: toBigInt(doc.rewards),
            startTimestamp: doc.startTimestamp,
            durationMonths: doc.durationMonths,
            apy: doc.apy,
        };
        const pool = state.pool;
        setEntry(pool.stakes, stake.id, stake);
        ensureEntry(pool.userStakeIds, stake.owner, () => []).push(stake.id);
        setEntry(pool.totalStakedByUser, stake.owner, (getEntry(pool.totalStakedByUser, stake.owner) ?? 0n) + stake.amount);
    }
    for (const doc of docs.transactions) {
        setEntry(state.recentTxs, doc._id, doc.ts);
    }
    return state;
}

let client: MongoClient | null = null;
let db: Db | null = null;

export const mongo = {
    init: async (url: string = settings.mongoUrl, dbName: string = settings.mongoDb): Promise<Db> => {
        client = new MongoClient(url, {});
        await client.connect();
        db = client.db(dbName);
        logger.info(`Connected to ${url}/${db.databaseName}`);
        return db;
    },

    getDb: (): Db => {
        if (!db) {
            throw new Error('MongoDB not initialized. Call mongo.init() first.');
        }
        return db;
    },

    loadState: async (): Promise<LedgerState | null> => {
        const database = mongo.getDb();
        const stateDoc = await database.collection<StateDoc>('state').findOne({ _id: 0 });
        if (!stateDoc) {
            logger.info('[mongo] No stored state, starting fresh');
            return null;
        }
        const accounts = await database.collection<AccountDoc>('accounts').find({}).toArray();
        const stakes = await database.collection<StakeDoc>('stakes').find({}).toArray();
        const transactions = await database.collection<TransactionDoc>('transactions').find({}).toArray();
        logger.info(`[mongo] Loaded ${accounts.length} accounts and ${stakes.length} stakes`);
        return stateFromDocuments({ accounts, state: stateDoc, stakes, transactions });
    },

    saveState: async (state: LedgerState): Promise<void> => mongo.saveDocuments(stateToDocuments(state)),

    /**
     * Writes a snapshot taken with stateToDocuments. Later changes to the live state do not reach it.
     */
    saveDocuments: async (docs: StateDocuments): Promise<void> => {
        const database = mongo.getDb();

        await database.collection<StateDoc>('state').replaceOne({ _id: 0 }, docs.state, { upsert: true });
        if (docs.accounts.length > 0) {
            await database.collection<AccountDoc>('accounts').bulkWrite(
                docs.accounts.map(doc => ({ replaceOne: { filter: { _id: doc._id }, replacement: doc, upsert: true } }))
            );
        }
        const stakes = database.collection<StakeDoc>('stakes');
        if (docs.stakes.length > 0) {
            await stakes.bulkWrite(
                docs.stakes.map(doc => ({ replaceOne: { filter: { _id: doc._id }, replacement: doc, upsert: true } }))
            );
        }
        await stakes.deleteMany({ _id: { $nin: docs.stakes.map(s => s._id) } });
        const transactions = database.collection<TransactionDoc>('transactions');
        if (docs.transactions.length > 0) {
            await transactions.bulkWrite(
                docs.transactions.map(doc => ({ replaceOne: { filter: { _id: doc._id }, replacement: doc, upsert: true } }))
            );
        }
        await transactions.deleteMany({ _id: { $nin: docs.transactions.map(t => t._id) } });
        logger.debug(`[mongo] Saved state (${docs.accounts.length} accounts, ${docs.stakes.length} stakes)`);
    },

    close: async (): Promise<void> => {
        if (client) {
            await client.close();
            client = null;
            db = null;
        }
    },
};

export default mongo;
