import type { Chain } from '../../chain.js';
import validate from '../../validation/index.js';
import { type TxReceipt, type TxResult, applyLedgerOp, invalid } from '../handler.js';
import type { PoolOpenData } from '../types.js';

export async function validateTx(data: PoolOpenData, _sender: string): Promise<TxResult> {
    // 0 or any past timestamp opens the pool immediately
    if (!validate.integer(data.timestamp, true)) return invalid('Invalid opening timestamp');
    return { valid: true };
}

export async function processTx(
    data: PoolOpenData,
    sender: string,
    chain: Chain,
    receipt: TxReceipt,
): Promise<TxResult> {
    return applyLedgerOp('pool-open:process', chain, receipt, () => {
        chain.pool.openStakePool(sender, data.timestamp);
    });
}
