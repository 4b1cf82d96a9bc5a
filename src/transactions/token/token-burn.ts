import type { Chain } from '../../chain.js';
import { toBigInt } from '../../utils/bigint.js';
import validate from '../../validation/index.js';
import { type TxReceipt, type TxResult, applyLedgerOp, invalid } from '../handler.js';
import type { TokenBurnData } from '../types.js';

export async function validateTx(data: TokenBurnData, _sender: string): Promise<TxResult> {
    if (!validate.amount(data.amount)) return invalid('Invalid amount');
    return { valid: true };
}

export async function processTx(
    data: TokenBurnData,
    sender: string,
    chain: Chain,
    receipt: TxReceipt,
): Promise<TxResult> {
    return applyLedgerOp('token-burn:process', chain, receipt, () => chain.token.burn(sender, toBigInt(data.amount)));
}
