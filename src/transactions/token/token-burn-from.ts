import type { Chain } from '../../chain.js';
import { toBigInt } from '../../utils/bigint.js';
import validate from '../../validation/index.js';
import { type TxReceipt, type TxResult, applyLedgerOp, invalid } from '../handler.js';
import type { TokenBurnFromData } from '../types.js';

export async function validateTx(data: TokenBurnFromData, _sender: string): Promise<TxResult> {
    if (!validate.address(data.from)) return invalid('Invalid account to burn from');
    if (!validate.amount(data.amount)) return invalid('Invalid amount');
    return { valid: true };
}

export async function processTx(
    data: TokenBurnFromData,
    sender: string,
    chain: Chain,
    receipt: TxReceipt,
): Promise<TxResult> {
    return applyLedgerOp('token-burn-from:process', chain, receipt, () =>
        chain.token.burnFrom(sender, data.from, toBigInt(data.amount))
    );
}
