import type { Chain } from '../chain.js';
import config from '../config.js';
import { LedgerError, describeError } from '../errors.js';
import logger from '../logger.js';
import { setEntry } from '../state.js';

export interface TxResult {
    valid: boolean;
    error?: string;
}

// identifies an executed transaction for replay protection
export interface TxReceipt {
    hash: string;
    ts: number;
}

export interface TransactionHandler<T> {
    validateTx(data: T, sender: string, chain: Chain): Promise<TxResult>;
    processTx(data: T, sender: string, chain: Chain, receipt: TxReceipt): Promise<TxResult>;
}

export function invalid(error: string): TxResult {
    return { valid: false, error };
}

export function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Remember an executed transaction and forget the ones whose ts left the expiration window.
 * Must run inside an atomic scope so a failed operation leaves no record.
 */
export function recordExecuted(chain: Chain, receipt: TxReceipt): void {
    const recent = chain.store.state.recentTxs;
    if (Object.hasOwn(recent, receipt.hash)) {
        throw new LedgerError('AlreadyExecuted', 'transaction already executed', { hash: receipt.hash });
    }
    const oldest = chain.clock.now() - config.txExpirationSeconds;
    for (const [hash, ts] of Object.entries(recent)) {
        if (ts < oldest) delete recent[hash];
    }
    setEntry(recent, receipt.hash, receipt.ts);
}

/**
 * Run a ledger operation for a transaction, in the same atomic scope as its replay record.
 * Ledger rejections come back as `<code>: <message>`; anything else is reported as an internal error.
 */
export function applyLedgerOp(tag: string, chain: Chain, receipt: TxReceipt, op: () => void): TxResult {
    try {
        chain.store.atomic(() => {
            recordExecuted(chain, receipt);
            op();
        });
        logger.debug(`[${tag}] applied`);
        return { valid: true };
    } catch (error) {
        if (error instanceof LedgerError) {
            logger.warn(`[${tag}] Rejected: ${describeError(error)}`);
            return invalid(describeError(error));
        }
        logger.error(`[${tag}] Error processing transaction: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
        return invalid('internal error');
    }
}
