import type { Chain } from './chain.js';
import config from './config.js';
import { hashMessage, signHash, verifySignature } from './crypto.js';
import logr from './logger.js';
import { type TxResult, invalid, isObject } from './transactions/handler.js';
import { transactionHandlers } from './transactions/index.js';
import { type TransactionDataMap, TransactionType, isTransactionType } from './transactions/types.js';
import validation from './validation/index.js';

export interface Transaction<K extends TransactionType = TransactionType> {
    type: K;
    sender: string;
    data: TransactionDataMap[K];
    // seconds, checked against the ledger clock
    ts: number;
    hash?: string;
    signature?: string;
}

interface TransactionModule {
    createHash: (tx: Transaction) => string;
    sign: <K extends TransactionType>(tx: Transaction<K>, privKey: string) => Transaction<K>;
    isSignedBySender: (tx: Transaction) => boolean;
    isTransaction: (value: unknown) => value is Transaction;
    execute: <K extends TransactionType>(tx: Transaction<K>, chain: Chain) => Promise<TxResult>;
}

const transaction: TransactionModule = {
    createHash: (tx: Transaction): string => {
        return hashMessage({
            type: tx.type,
            data: tx.data,
            sender: tx.sender,
            ts: tx.ts,
        });
    },

    sign: <K extends TransactionType>(tx: Transaction<K>, privKey: string): Transaction<K> => {
        const hash = transaction.createHash(tx);
        return { ...tx, hash, signature: signHash(hash, privKey) };
    },

    isSignedBySender: (tx: Transaction): boolean => {
        if (!tx.hash || !tx.signature) return false;
        if (tx.hash !== transaction.createHash(tx)) return false;
        return verifySignature(tx.hash, tx.signature, tx.sender);
    },

    /**
     * Envelope check for transactions arriving from outside. Field-level checks on
     * `data` are done by each handler's validateTx.
     */
    isTransaction: (value: unknown): value is Transaction => {
        if (!isObject(value)) return false;
        if (!isTransactionType(value.type)) return false;
        if (!validation.address(value.sender)) return false;
        if (!isObject(value.data)) return false;
        if (!validation.integer(value.ts, true)) return false;
        if (value.hash !== undefined && typeof value.hash !== 'string') return false;
        if (value.signature !== undefined && typeof value.signature !== 'string') return false;
        return true;
    },

    execute: async <K extends TransactionType>(tx: Transaction<K>, chain: Chain): Promise<TxResult> => {
        const typeName = TransactionType[tx.type];
        if (tx.hash !== undefined && tx.hash !== transaction.createHash(tx)) {
            logr.warn(`[transaction] Hash mismatch for ${typeName} from ${tx.sender}`);
            return invalid('invalid hash');
        }
        const now = chain.clock.now();
        if (tx.ts < now - config.txExpirationSeconds) {
            logr.warn(`[transaction] Expired ${typeName} from ${tx.sender} (ts ${tx.ts}, now ${now})`);
            return invalid('transaction expired');
        }
        if (tx.ts > now + config.txExpirationSeconds) {
            logr.warn(`[transaction] ${typeName} from ${tx.sender} is too far in the future (ts ${tx.ts}, now ${now})`);
            return invalid('transaction ts too far in the future');
        }
        const hash = tx.hash ?? transaction.createHash(tx);
        if (Object.hasOwn(chain.store.state.recentTxs, hash)) {
            logr.warn(`[transaction] Replay of ${typeName} ${hash} from ${tx.sender}`);
            return invalid('transaction already executed');
        }
        const handler = transactionHandlers[tx.type];
        try {
            const validated = await handler.validateTx(tx.data, tx.sender, chain);
            if (!validated.valid) {
                logr.warn(`[transaction] Invalid ${typeName} from ${tx.sender}: ${validated.error}`);
                return validated;
            }
            const result = await handler.processTx(tx.data, tx.sender, chain, { hash, ts: tx.ts });
            if (result.valid) {
                logr.debug(`[transaction] Executed ${typeName} from ${tx.sender}`);
            }
            return result;
        } catch (error) {
            logr.error(`[transaction] Error executing ${typeName}: ${error instanceof Error ? error.message : String(error)}`);
            return invalid('internal error');
        }
    },
};

export default transaction;
