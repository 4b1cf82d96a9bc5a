import type { Chain } from '../../chain.js';
import validate from '../../validation/index.js';
import { type TxReceipt, type TxResult, applyLedgerOp, invalid } from '../handler.js';
import type { BlacklistData } from '../types.js';

export async function validateTx(data: BlacklistData, _sender: string): Promise<TxResult> {
    if (!validate.address(data.account)) return invalid('Invalid account');
    return { valid: true };
}

export async function processTx(
    data: BlacklistData,
    sender: string,
    chain: Chain,
    receipt: TxReceipt,
): Promise<TxResult> {
    return applyLedgerOp('blacklist-remove:process', chain, receipt, () =>
        chain.token.unblacklist(sender, data.account)
    );
}
