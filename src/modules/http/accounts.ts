import express, { type Request, type Response, type Router } from 'express';

import type { Chain } from '../../chain.js';
import { ROLES, getEntry } from '../../state.js';
import validate from '../../validation/index.js';
import { formatTokenAmountForResponse } from './utils.js';

export default function accountsRouter(chain: Chain): Router {
    const router: Router = express.Router();

    // GET /accounts/:address - balance, allowances, nonce, roles and blacklist flag
    router.get('/:address', (req: Request, res: Response) => {
        const { address } = req.params;
        if (!validate.address(address)) {
            res.status(400).json({ error: 'Invalid address' });
            return;
        }
        const { token, store } = chain;
        const allowances = Object.entries(getEntry(store.state.accounts, address)?.allowances ?? {}).map(([spender, value]) => ({
            spender,
            ...formatTokenAmountForResponse(value),
        }));
        res.json({
            address,
            balance: formatTokenAmountForResponse(token.balanceOf(address)),
            nonce: token.nonces(address).toString(),
            blacklisted: token.isBlacklisted(address),
            roles: ROLES.filter(role => token.hasRole(role, address)),
            allowances,
        });
    });

    return router;
}
