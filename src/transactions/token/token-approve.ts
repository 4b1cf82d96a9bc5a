import type { Chain } from '../../chain.js';
import { toBigInt } from '../../utils/bigint.js';
import validate from '../../validation/index.js';
import { type TxReceipt, type TxResult, applyLedgerOp, invalid } from '../handler.js';
import type { TokenApproveData } from '../types.js';

export async function validateTx(data: TokenApproveData, _sender: string): Promise<TxResult> {
    if (!validate.address(data.spender)) return invalid('Invalid spender');
    // zero resets an allowance
    if (!validate.amount(data.value, true)) return invalid('Invalid allowance value');
    return { valid: true };
}

export async function processTx(
    data: TokenApproveData,
    sender: string,
    chain: Chain,
    receipt: TxReceipt,
): Promise<TxResult> {
    return applyLedgerOp('token-approve:process', chain, receipt, () =>
        chain.token.approve(sender, data.spender, toBigInt(data.value))
    );
}
