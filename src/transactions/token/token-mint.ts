import type { Chain } from '../../chain.js';
import { toBigInt } from '../../utils/bigint.js';
import validate from '../../validation/index.js';
import { type TxReceipt, type TxResult, applyLedgerOp, invalid } from '../handler.js';
import type { TokenMintData } from '../types.js';

export async function validateTx(data: TokenMintData, _sender: string): Promise<TxResult> {
    if (!validate.address(data.to)) return invalid('Invalid recipient');
    if (!validate.amount(data.amount)) return invalid('Invalid amount');
    return { valid: true };
}

export async function processTx(
    data: TokenMintData,
    sender: string,
    chain: Chain,
    receipt: TxReceipt,
): Promise<TxResult> {
    return applyLedgerOp('token-mint:process', chain, receipt, () =>
        chain.token.mint(sender, data.to, toBigInt(data.amount))
    );
}
