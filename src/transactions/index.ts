import logger from '../logger.js';
import * as roleGrant from './access/role-grant.js';
import * as roleRenounce from './access/role-renounce.js';
import * as roleRevoke from './access/role-revoke.js';
import * as blacklistAdd from './blacklist/blacklist-add.js';
import * as blacklistRemove from './blacklist/blacklist-remove.js';
import type { TransactionHandler } from './handler.js';
import * as poolOpen from './stake/pool-open.js';
import * as stakeCreate from './stake/stake-create.js';
import * as stakeUnstake from './stake/stake-unstake.js';
import * as tokenApprove from './token/token-approve.js';
import * as tokenBurnFrom from './token/token-burn-from.js';
import * as tokenBurn from './token/token-burn.js';
import * as tokenMint from './token/token-mint.js';
import * as tokenPause from './token/token-pause.js';
import * as tokenPermit from './token/token-permit.js';
import * as tokenTransferFrom from './token/token-transfer-from.js';
import * as tokenTransfer from './token/token-transfer.js';
import * as tokenUnpause from './token/token-unpause.js';
import { type TransactionDataMap, TransactionType } from './types.js';

export type TransactionHandlers = { [K in TransactionType]: TransactionHandler<TransactionDataMap[K]> };

// One handler module per transaction type, named after the type (token-transfer.ts -> TOKEN_TRANSFER)
export const transactionHandlers: TransactionHandlers = {
    [TransactionType.TOKEN_MINT]: tokenMint,
    [TransactionType.TOKEN_BURN]: tokenBurn,
    [TransactionType.TOKEN_BURN_FROM]: tokenBurnFrom,
    [TransactionType.TOKEN_TRANSFER]: tokenTransfer,
    [TransactionType.TOKEN_TRANSFER_FROM]: tokenTransferFrom,
    [TransactionType.TOKEN_APPROVE]: tokenApprove,
    [TransactionType.TOKEN_PERMIT]: tokenPermit,
    [TransactionType.TOKEN_PAUSE]: tokenPause,
    [TransactionType.TOKEN_UNPAUSE]: tokenUnpause,
    [TransactionType.ROLE_GRANT]: roleGrant,
    [TransactionType.ROLE_REVOKE]: roleRevoke,
    [TransactionType.ROLE_RENOUNCE]: roleRenounce,
    [TransactionType.BLACKLIST_ADD]: blacklistAdd,
    [TransactionType.BLACKLIST_REMOVE]: blacklistRemove,
    [TransactionType.POOL_OPEN]: poolOpen,
    [TransactionType.STAKE_CREATE]: stakeCreate,
    [TransactionType.STAKE_UNSTAKE]: stakeUnstake,
};

logger.trace(
    `Registered transaction handlers: ${Object.keys(transactionHandlers)
        .map(k => `${k} (${TransactionType[Number(k)]})`)
        .join(', ')}`
);

export { TransactionType };
export type { TransactionDataMap };
