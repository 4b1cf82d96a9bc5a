import type { Chain } from '../../chain.js';
import { type TxReceipt, type TxResult, applyLedgerOp } from '../handler.js';
import type { EmptyData } from '../types.js';

export async function validateTx(_data: EmptyData, _sender: string): Promise<TxResult> {
    return { valid: true };
}

export async function processTx(_data: EmptyData, sender: string, chain: Chain, receipt: TxReceipt): Promise<TxResult> {
    return applyLedgerOp('token-unpause:process', chain, receipt, () => chain.token.unpause(sender));
}
