import type { Chain } from '../../chain.js';
import { toBigInt } from '../../utils/bigint.js';
import validate from '../../validation/index.js';
import { type TxReceipt, type TxResult, applyLedgerOp, invalid } from '../handler.js';
import type { TokenTransferFromData } from '../types.js';

export async function validateTx(data: TokenTransferFromData, _sender: string): Promise<TxResult> {
    if (!validate.address(data.from)) return invalid('Invalid source account');
    if (!validate.address(data.to)) return invalid('Invalid recipient');
    if (!validate.amount(data.amount)) return invalid('Invalid amount');
    return { valid: true };
}

export async function processTx(
    data: TokenTransferFromData,
    sender: string,
    chain: Chain,
    receipt: TxReceipt,
): Promise<TxResult> {
    return applyLedgerOp('token-transfer-from:process', chain, receipt, () =>
        chain.token.transferFrom(sender, data.from, data.to, toBigInt(data.amount))
    );
}
