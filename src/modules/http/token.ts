import express, { type Request, type Response, type Router } from 'express';

import type { Chain } from '../../chain.js';
import { ROLES } from '../../state.js';
import { formatTokenAmountForResponse } from './utils.js';

/**
 * @api {get} /token Token overview
 * @apiSuccess {String} totalSupply Circulating supply (formatted), with rawTotalSupply
 * @apiSuccess {String} cap Effective cap: hard cap minus everything burned
 */
export default function tokenRouter(chain: Chain): Router {
    const router: Router = express.Router();

    router.get('/', (_req: Request, res: Response) => {
        const { token } = chain;
        const roles: Record<string, string[]> = {};
        for (const role of ROLES) roles[role] = token.getRoleMembers(role);
        res.json({
            name: token.name,
            symbol: token.symbol,
            decimals: token.decimals,
            totalSupply: formatTokenAmountForResponse(token.totalSupply()),
            totalMinted: formatTokenAmountForResponse(token.totalMinted()),
            burned: formatTokenAmountForResponse(token.burned()),
            cap: formatTokenAmountForResponse(token.cap()),
            hardCap: formatTokenAmountForResponse(token.hardCap()),
            paused: token.paused(),
            gates: token.gateOrder,
            domain: token.domain,
            roles,
        });
    });

    return router;
}
