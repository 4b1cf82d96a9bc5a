import express, { type Request, type Response, type Router } from 'express';

import type { Chain } from '../../chain.js';
import validate from '../../validation/index.js';
import { formatTokenAmountForResponse } from './utils.js';

export default function stakesRouter(chain: Chain): Router {
    const router: Router = express.Router();

    // GET /stakes/:address - active stakes in creation order
    router.get('/:address', (req: Request, res: Response) => {
        const { address } = req.params;
        if (!validate.address(address)) {
            res.status(400).json({ error: 'Invalid address' });
            return;
        }
        const { pool } = chain;
        const data = pool.getAllStakesForUser(address).map(stake => ({
            id: stake.id,
            startTimestamp: stake.startTimestamp,
            durationMonths: stake.durationMonths,
            unlockTimestamp: stake.startTimestamp + stake.durationMonths * pool.avgSecondsPerMonth,
            apy: stake.apy,
            amount: formatTokenAmountForResponse(stake.amount),
            rewards: formatTokenAmountForResponse(stake.rewards),
        }));
        res.json({
            address,
            total: formatTokenAmountForResponse(pool.getTotalStakedAccount(address)),
            data,
        });
    });

    return router;
}
