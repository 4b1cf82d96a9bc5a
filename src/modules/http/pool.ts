import express, { type Request, type Response, type Router } from 'express';

import type { Chain } from '../../chain.js';
import { formatTokenAmountForResponse } from './utils.js';

export default function poolRouter(chain: Chain): Router {
    const router: Router = express.Router();

    // GET /pool - opening time, age and totals of the staking pool
    router.get('/', (_req: Request, res: Response) => {
        const { pool } = chain;
        const open = pool.isOpen();
        res.json({
            account: pool.account,
            timestampOpened: pool.timestampOpened(),
            isOpen: open,
            monthsOpen: open ? pool.monthsOpen() : null,
            totalStaked: formatTokenAmountForResponse(pool.getTotalStakedPool()),
            limits: {
                minStakeAmount: formatTokenAmountForResponse(pool.minStakeAmount),
                maxStakeAmountUser: formatTokenAmountForResponse(pool.maxStakeAmountUser),
                maxStakeAmountPool: formatTokenAmountForResponse(pool.maxStakeAmountPool),
            },
        });
    });

    return router;
}
