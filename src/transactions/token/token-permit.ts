import type { Chain } from '../../chain.js';
import { toBigInt } from '../../utils/bigint.js';
import validate from '../../validation/index.js';
import { type TxReceipt, type TxResult, applyLedgerOp, invalid } from '../handler.js';
import type { TokenPermitData } from '../types.js';

export async function validateTx(data: TokenPermitData, _sender: string): Promise<TxResult> {
    if (!validate.address(data.owner)) return invalid('Invalid owner');
    if (!validate.address(data.spender)) return invalid('Invalid spender');
    if (!validate.amount(data.value, true)) return invalid('Invalid allowance value');
    if (!validate.integer(data.deadline, true)) return invalid('Invalid deadline');
    if (!validate.signature(data.signature)) return invalid('Invalid signature format');
    return { valid: true };
}

export async function processTx(
    data: TokenPermitData,
    sender: string,
    chain: Chain,
    receipt: TxReceipt,
): Promise<TxResult> {
    return applyLedgerOp('token-permit:process', chain, receipt, () =>
        chain.token.permit(sender, data.owner, data.spender, toBigInt(data.value), data.deadline, data.signature)
    );
}
