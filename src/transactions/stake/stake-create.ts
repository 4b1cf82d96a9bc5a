import type { Chain } from '../../chain.js';
import { toBigInt } from '../../utils/bigint.js';
import validate from '../../validation/index.js';
import { type TxReceipt, type TxResult, applyLedgerOp, invalid } from '../handler.js';
import type { StakeCreateData } from '../types.js';

export async function validateTx(data: StakeCreateData, _sender: string): Promise<TxResult> {
    if (!validate.amount(data.amount)) return invalid('Invalid amount');
    // unknown tiers are rejected by the pool with InvalidTier
    if (!validate.integer(data.tier, true)) return invalid('Invalid tier');
    return { valid: true };
}

export async function processTx(
    data: StakeCreateData,
    sender: string,
    chain: Chain,
    receipt: TxReceipt,
): Promise<TxResult> {
    return applyLedgerOp('stake-create:process', chain, receipt, () => {
        chain.pool.createStake(sender, toBigInt(data.amount), data.tier);
    });
}
