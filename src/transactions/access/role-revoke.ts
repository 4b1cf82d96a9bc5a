import type { Chain } from '../../chain.js';
import validate from '../../validation/index.js';
import { type TxReceipt, type TxResult, applyLedgerOp, invalid } from '../handler.js';
import type { RoleData } from '../types.js';

export async function validateTx(data: RoleData, _sender: string): Promise<TxResult> {
    if (!validate.role(data.role)) return invalid('Unknown role');
    if (!validate.address(data.account)) return invalid('Invalid account');
    return { valid: true };
}

export async function processTx(data: RoleData, sender: string, chain: Chain, receipt: TxReceipt): Promise<TxResult> {
    return applyLedgerOp('role-revoke:process', chain, receipt, () =>
        chain.token.revokeRole(sender, data.role, data.account)
    );
}
