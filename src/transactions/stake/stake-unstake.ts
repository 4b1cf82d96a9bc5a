import type { Chain } from '../../chain.js';
import validate from '../../validation/index.js';
import { type TxReceipt, type TxResult, applyLedgerOp, invalid } from '../handler.js';
import type { StakeUnstakeData } from '../types.js';

export async function validateTx(data: StakeUnstakeData, _sender: string): Promise<TxResult> {
    if (!validate.stakeId(data.stakeId)) return invalid('Invalid stake id');
    return { valid: true };
}

export async function processTx(
    data: StakeUnstakeData,
    sender: string,
    chain: Chain,
    receipt: TxReceipt,
): Promise<TxResult> {
    return applyLedgerOp('stake-unstake:process', chain, receipt, () => {
        chain.pool.unstake(sender, data.stakeId);
    });
}
